export type { RcaSummarizer } from './types.js';
export { RuleBasedSummarizer, chainToMermaid, formatPercent } from './ruleBasedSummarizer.js';
