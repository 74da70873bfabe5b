import { describe, it, expect } from 'vitest';
import { RcaEngine } from '../rcaEngine.js';
import { generateIncidentTimeline } from '../runAggregator.js';
import { ConfigLoader } from '../../config/loader.js';
import { defaultConfig } from '../../config/defaults.js';
import { RuleBasedSummarizer } from '../../summary/ruleBasedSummarizer.js';
import { ConfigurationError, ResourceLimitExceededError } from '../../utils/errors.js';
import { isErrorResponse } from '../../utils/errorHandling.js';

const iso = (second: number): string => new Date(Date.UTC(2024, 0, 1, 10, 0, 0) + second * 1000).toISOString();

const gatewayErrors = [0, 20, 40].map((second, index) => ({
  id: `gw-${index + 1}`,
  timestamp: iso(second),
  service: 'api-gateway',
  severity: 'ERROR',
  message: 'upstream timeout',
  correlationId: `req-${index + 1}`
}));

const userErrors = [3, 23, 43].map((second, index) => ({
  id: `us-${index + 1}`,
  timestamp: iso(second),
  service: 'user-service',
  severity: 'ERROR',
  message: 'DB connection pool exhausted',
  correlationId: `req-${index + 1}`
}));

const postgresWarnings = [1, 21].map((second, index) => ({
  id: `pg-${index + 1}`,
  timestamp: iso(second),
  service: 'postgres',
  severity: 'WARN',
  message: 'Max connections reached',
  metric: { name: 'connections.utilization', value: 95, unit: 'percent' }
}));

const spanHints = [
  { traceId: 'trace-1', spanId: 'span-us', service: 'user-service', timestamp: iso(2) },
  { traceId: 'trace-1', spanId: 'span-pg', parentSpanId: 'span-us', service: 'postgres', timestamp: iso(2) }
];

const scenario = {
  events: [...gatewayErrors, ...userErrors, ...postgresWarnings],
  spanHints,
  symptom: { service: 'api-gateway' }
};

describe('RcaEngine', () => {
  describe('connection pool exhaustion scenario', () => {
    it('should build the dependency graph', async () => {
      const result = await new RcaEngine().run(scenario);

      expect(result.serviceGraph.nodes).toEqual(['api-gateway', 'postgres', 'user-service']);
      expect(result.serviceGraph.edges).toEqual([
        {
          source: 'api-gateway',
          target: 'user-service',
          evidenceCount: 3,
          confidence: 'inferred',
          firstSeen: '2024-01-01T10:00:00.000Z',
          lastSeen: '2024-01-01T10:00:43.000Z'
        },
        {
          source: 'user-service',
          target: 'postgres',
          evidenceCount: 1,
          confidence: 'observed',
          firstSeen: '2024-01-01T10:00:02.000Z',
          lastSeen: '2024-01-01T10:00:02.000Z'
        }
      ]);
    });

    it('should detect one incident per affected service', async () => {
      const result = await new RcaEngine().run(scenario);

      expect(result.incidents.map(incident => [incident.service, incident.kind, incident.windowStart, incident.windowEnd])).toEqual([
        ['api-gateway', 'error_spike', iso(0), iso(40)],
        ['postgres', 'resource_exhaustion', iso(1), iso(21)],
        ['user-service', 'error_spike', iso(3), iso(43)]
      ]);
      expect(result.incidents[1].evidence).toEqual(['pg-1', 'pg-2']);
      expect(result.incidents[1].magnitude).toBe(0.9);
    });

    it('should trace one chain from the gateway to postgres', async () => {
      const result = await new RcaEngine().run(scenario);

      expect(result.causalChains).toHaveLength(1);
      expect(result.causalChains[0].id).toBe('chain-1');
      expect(result.causalChains[0].services).toEqual(['api-gateway', 'user-service', 'postgres']);
      expect(result.primarySymptom).toEqual({ service: 'api-gateway', incidentId: result.incidents[0].id });
    });

    it('should rank postgres as the top root cause', async () => {
      const result = await new RcaEngine().run(scenario);
      const top = result.rootCauses[0];

      expect(top).toMatchObject({
        service: 'postgres',
        kind: 'resource_exhaustion',
        rank: 1,
        evidence: ['pg-1', 'pg-2'],
        chainRef: 'chain-1',
        correlatedChanges: []
      });
      expect(top.incidentId).toBe(result.incidents[1].id);
      expect(top.confidence).toBeCloseTo(0.25 * (0.9 + 1 / 3 + 600 / 601 + Math.log(3)), 12);
    });

    it('should report run metadata without diagnostics', async () => {
      const result = await new RcaEngine().run(scenario);

      expect(result.diagnostics).toEqual([]);
      expect(result.metadata).toEqual({
        receivedEvents: 8,
        validEvents: 8,
        skippedEvents: 0,
        spanHints: 2,
        services: 3,
        dependencies: 2,
        incidents: 3,
        chains: 1,
        candidates: 1
      });
      expect(result.summary).toBeUndefined();
    });

    it('should produce identical results for identical input', async () => {
      const first = await new RcaEngine().run(scenario);
      const second = await new RcaEngine().run({ ...scenario, events: [...scenario.events].reverse() });
      expect(second).toEqual(first);
    });
  });

  it('should attach a config change to the candidate it precedes', async () => {
    const change = {
      id: 'cfg-1',
      timestamp: iso(-27),
      service: 'user-service',
      severity: 'INFO',
      message: 'config reload',
      configChange: { changeType: 'config', description: 'pool timeout 30s -> 5s' }
    };
    const result = await new RcaEngine().run({
      events: [...gatewayErrors, ...userErrors, change],
      symptom: { service: 'api-gateway' }
    });

    const configIncident = result.incidents.find(incident => incident.kind === 'config_change');
    expect(configIncident?.evidence).toEqual(['cfg-1']);
    expect(result.rootCauses).toHaveLength(1);
    expect(result.rootCauses[0]).toMatchObject({
      service: 'user-service',
      kind: 'error_spike',
      evidence: ['us-1', 'us-2', 'us-3', 'cfg-1'],
      correlatedChanges: [configIncident?.id]
    });
  });

  it('should skip invalid events and keep going', async () => {
    const result = await new RcaEngine().run({
      ...scenario,
      events: [...scenario.events, { service: 'postgres' }, { timestamp: iso(5), severity: 'ERROR' }]
    });

    expect(result.metadata.receivedEvents).toBe(10);
    expect(result.metadata.skippedEvents).toBe(2);
    expect(result.diagnostics.map(diagnostic => diagnostic.kind)).toEqual(['InputValidationError', 'InputValidationError']);
    expect(result.rootCauses[0].service).toBe('postgres');
  });

  it('should report an unknown symptom service and rank nothing', async () => {
    const result = await new RcaEngine().run({ ...scenario, symptom: { service: 'checkout' } });

    expect(result.primarySymptom).toEqual({ service: 'checkout', incidentId: null });
    expect(result.causalChains).toEqual([]);
    expect(result.rootCauses).toEqual([]);
    expect(result.diagnostics.map(diagnostic => diagnostic.kind)).toEqual(['SymptomResolution']);
  });

  it('should reject an invalid configuration before reading any event', async () => {
    const engine = new RcaEngine({ config: { ...defaultConfig, limits: { maxEvents: 1, maxProcessingMs: -5 } } });
    await expect(engine.run(scenario)).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('should abort when the event budget is exceeded', async () => {
    const engine = new RcaEngine({ config: ConfigLoader.load({ limits: { maxEvents: 5 } }) });
    await expect(engine.run(scenario)).rejects.toBeInstanceOf(ResourceLimitExceededError);
  });

  it('should return an error response from tryRun instead of a partial result', async () => {
    const engine = new RcaEngine({ config: ConfigLoader.load({ limits: { maxEvents: 5 } }) });
    const response = await engine.tryRun(scenario);

    expect(isErrorResponse(response)).toBe(true);
    if (isErrorResponse(response)) {
      expect(response.code).toBe('RESOURCE_LIMIT_EXCEEDED');
      expect(response.message).toBe('[RcaEngine] Resource limit maxEvents exceeded during ingestion: 8 > 5');
      expect(response.details).toMatchObject({ limit: 'maxEvents', allowed: 5, observed: 8 });
    }
  });

  it('should add a summary when a summarizer is configured', async () => {
    const result = await new RcaEngine({ summarizer: new RuleBasedSummarizer() }).run(scenario);

    expect(result.summary?.split('\n').slice(0, 4)).toEqual([
      '## RCA Summary: api-gateway',
      '',
      '**Most Likely Root Cause:** postgres (resource_exhaustion)',
      '**Confidence:** 83%'
    ]);
  });

  it('should order the incident timeline by window start', async () => {
    const result = await new RcaEngine().run(scenario);
    expect(generateIncidentTimeline(result).map(incident => incident.service)).toEqual([
      'api-gateway',
      'postgres',
      'user-service'
    ]);
  });
});
