import { describe, it, expect } from 'vitest';
import { RootCauseRanker, clamp01 } from '../rootCauseRanker.js';
import { ConfigLoader } from '../../config/loader.js';
import type { CausalChain, Incident, IncidentKind } from '../../types/incidents.js';

const at = (second: number): number => Date.UTC(2024, 0, 1, 10, 0, 0) + second * 1000;

function incident(
  id: string,
  service: string,
  start: number,
  options: { kind?: IncidentKind; magnitude?: number; evidence?: string[] } = {}
): Incident {
  const kind = options.kind ?? 'error_spike';
  return {
    id,
    service,
    kind,
    windowStart: at(start),
    windowEnd: at(start + 30),
    magnitude: options.magnitude ?? 0.8,
    evidence: options.evidence ?? [`${id}-e1`],
    description: `${kind} on ${service}`
  };
}

function chain(id: string, ...incidents: Incident[]): CausalChain {
  return { id, incidents };
}

describe('clamp01', () => {
  it('should clamp into the unit interval', () => {
    expect(clamp01(-0.2)).toBe(0);
    expect(clamp01(0.4)).toBe(0.4);
    expect(clamp01(3)).toBe(1);
    expect(clamp01(Number.NaN)).toBe(0);
  });
});

describe('RootCauseRanker', () => {
  const anchor = incident('sym', 'front', 0);

  it('should compute the weighted score', () => {
    const ranker = new RootCauseRanker(ConfigLoader.load());
    const score = ranker.score({ magnitude: 0.9, hopCount: 2, timeToSymptomSec: 1, evidenceCount: 2 });
    expect(score).toBeCloseTo(0.25 * (0.9 + 1 / 3 + 600 / 601 + Math.log(3)), 12);
  });

  it('should clamp scores above one', () => {
    const ranker = new RootCauseRanker(ConfigLoader.load({
      weights: { severity: 1, distance: 1, temporal: 1, evidence: 1 }
    }));
    expect(ranker.score({ magnitude: 1, hopCount: 0, timeToSymptomSec: 0, evidenceCount: 10 })).toBe(1);
  });

  it('should rank the tail of every chain with confidences in [0, 1]', () => {
    const ranker = new RootCauseRanker(ConfigLoader.load());
    const db = incident('db', 'postgres', 1, { kind: 'resource_exhaustion', magnitude: 0.9, evidence: ['p1', 'p2'] });
    const cache = incident('cache', 'redis', 2, { evidence: ['r1'] });
    const candidates = ranker.rank(
      [chain('chain-1', anchor, db), chain('chain-2', anchor, cache)],
      anchor,
      [anchor, db, cache]
    );

    expect(candidates.map(candidate => [candidate.service, candidate.rank, candidate.chainRef])).toEqual([
      ['postgres', 1, 'chain-1'],
      ['redis', 2, 'chain-2']
    ]);
    for (const candidate of candidates) {
      expect(candidate.confidence).toBeGreaterThanOrEqual(0);
      expect(candidate.confidence).toBeLessThanOrEqual(1);
    }
    expect(candidates[0].hopCount).toBe(1);
    expect(candidates[0].confidence).toBeCloseTo(0.25 * (0.9 + 1 / 2 + 600 / 601 + Math.log(3)), 12);
  });

  it('should attach nearby config changes instead of ranking them on their own', () => {
    const ranker = new RootCauseRanker(ConfigLoader.load());
    const users = incident('users-err', 'users', 40, { evidence: ['u1', 'u2', 'u3'] });
    const change = incident('users-cfg', 'users', 10, { kind: 'config_change', magnitude: 0.6, evidence: ['c1'] });
    const candidates = ranker.rank(
      [chain('chain-1', anchor, users), chain('chain-2', anchor, change)],
      anchor,
      [anchor, users, change]
    );

    expect(candidates).toHaveLength(1);
    expect(candidates[0].incident.id).toBe('users-err');
    expect(candidates[0].correlatedChanges.map(item => item.id)).toEqual(['users-cfg']);
    expect(candidates[0].evidence).toEqual(['u1', 'u2', 'u3', 'c1']);
    expect(candidates[0].confidence).toBeCloseTo(
      0.25 * (0.8 + 1 / 2 + 1 / (1 + 40 / 600) + Math.log(5)),
      12
    );
  });

  it('should ignore config changes outside the change window', () => {
    const ranker = new RootCauseRanker(ConfigLoader.load());
    const users = incident('users-err', 'users', 700);
    const change = incident('users-cfg', 'users', 0, { kind: 'config_change', magnitude: 0.6 });
    const candidates = ranker.rank([chain('chain-1', anchor, users)], anchor, [anchor, users, change]);
    expect(candidates[0].correlatedChanges).toEqual([]);
  });

  it('should keep one candidate per tail incident, from its best chain', () => {
    const ranker = new RootCauseRanker(ConfigLoader.load());
    const mid = incident('mid', 'orders', 1);
    const db = incident('db', 'postgres', 2);
    const candidates = ranker.rank(
      [chain('chain-1', anchor, mid, db), chain('chain-2', anchor, db)],
      anchor,
      [anchor, mid, db]
    );
    expect(candidates).toHaveLength(1);
    expect(candidates[0].chainRef).toBe('chain-2');
    expect(candidates[0].hopCount).toBe(1);
  });

  it('should break confidence ties by evidence count, then service name', () => {
    const ranker = new RootCauseRanker(ConfigLoader.load({ weights: { evidence: 0 } }));
    const beta = incident('b', 'beta', 5, { evidence: ['b1'] });
    const gamma = incident('g', 'gamma', 5, { evidence: ['g1', 'g2', 'g3'] });
    const alpha = incident('a', 'alpha', 5, { evidence: ['a1'] });
    const candidates = ranker.rank(
      [chain('chain-1', anchor, beta), chain('chain-2', anchor, gamma), chain('chain-3', anchor, alpha)],
      anchor,
      [anchor, beta, gamma, alpha]
    );
    expect(candidates.map(candidate => [candidate.service, candidate.rank])).toEqual([
      ['gamma', 1],
      ['alpha', 2],
      ['beta', 3]
    ]);
  });

  it('should rank the earlier-starting candidate first when confidence and evidence tie', () => {
    const ranker = new RootCauseRanker(ConfigLoader.load({ weights: { temporal: 0 } }));
    const alpha = incident('a', 'alpha', 8);
    const zeta = incident('z', 'zeta', 2);
    const candidates = ranker.rank(
      [chain('chain-1', anchor, alpha), chain('chain-2', anchor, zeta)],
      anchor,
      [anchor, alpha, zeta]
    );
    expect(candidates[0].confidence).toBe(candidates[1].confidence);
    expect(candidates.map(candidate => [candidate.service, candidate.rank])).toEqual([
      ['zeta', 1],
      ['alpha', 2]
    ]);
  });

  it('should return only the requested top candidates', () => {
    const ranker = new RootCauseRanker(ConfigLoader.load({ ranking: { topN: 1 } }));
    const a = incident('a', 'alpha', 1);
    const b = incident('b', 'beta', 2);
    const candidates = ranker.rank([chain('chain-1', anchor, a), chain('chain-2', anchor, b)], anchor, [anchor, a, b]);
    expect(candidates).toHaveLength(1);
    expect(candidates[0].rank).toBe(1);
  });

  it('should rank the symptom itself when nothing lies upstream', () => {
    const ranker = new RootCauseRanker(ConfigLoader.load());
    const candidates = ranker.rank([chain('chain-1', anchor)], anchor, [anchor]);
    expect(candidates[0]).toMatchObject({ service: 'front', rank: 1, hopCount: 0, chainRef: 'chain-1' });
  });
});
