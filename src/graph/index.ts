export { ServiceGraph, byName } from './serviceGraph.js';
export { GraphBuilder } from './graphBuilder.js';
export type { GraphBuildInput } from './graphBuilder.js';
