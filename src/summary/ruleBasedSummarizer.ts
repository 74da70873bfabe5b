import type { CausalChain, IncidentKind, RootCauseCandidate, SymptomSpec } from '../types/incidents.js';
import type { ServiceGraph } from '../graph/serviceGraph.js';
import type { RcaSummarizer } from './types.js';
import { escapeMermaidString, toMermaidNodeId } from '../utils/mermaidEscaper.js';

const MAX_EVIDENCE = 5;
const MAX_OTHER_CANDIDATES = 3;

function recommendedActions(service: string, kind: IncidentKind): string[] {
  switch (kind) {
    case 'resource_exhaustion':
      return [
        `Scale up ${service} resources (CPU, memory, connections)`,
        'Check for resource leaks or inefficient queries',
        'Review recent traffic patterns and scaling policies'
      ];
    case 'error_spike':
    case 'latency_spike':
      return [
        `Investigate internal errors in ${service}`,
        'Check application logs for exceptions and stack traces',
        'Review recent code changes or deployments'
      ];
    case 'config_change':
      return [
        `Review recent changes in ${service}`,
        'Consider rolling back to the previous version',
        'Check deployment logs and config diffs'
      ];
    default:
      return [`Investigate ${kind} in ${service}`];
  }
}

export function formatPercent(confidence: number): string {
  return `${Math.round(confidence * 100)}%`;
}

/**
 * Mermaid flowchart of a causal chain, symptom side first
 */
export function chainToMermaid(chain: CausalChain): string {
  const lines = ['flowchart LR'];
  for (const incident of chain.incidents) {
    lines.push(`  ${toMermaidNodeId(incident.service)}["${escapeMermaidString(`${incident.service} (${incident.kind})`)}"]`);
  }
  for (let i = 1; i < chain.incidents.length; i++) {
    lines.push(`  ${toMermaidNodeId(chain.incidents[i - 1].service)} --> ${toMermaidNodeId(chain.incidents[i].service)}`);
  }
  return lines.join('\n');
}

/**
 * Deterministic markdown summary built from the ranked candidates
 */
export class RuleBasedSummarizer implements RcaSummarizer {
  summarize(
    _graph: ServiceGraph,
    candidates: readonly RootCauseCandidate[],
    symptom: SymptomSpec,
    chains: readonly CausalChain[] = []
  ): string {
    if (candidates.length === 0) {
      return `No root cause candidates identified for: ${symptom.service}`;
    }

    const top = candidates[0];
    const parts = [
      `## RCA Summary: ${symptom.service}`,
      '',
      `**Most Likely Root Cause:** ${top.service} (${top.incident.kind})`,
      `**Confidence:** ${formatPercent(top.confidence)}`,
      '',
      `**Explanation:** ${top.incident.description}`,
      '',
      '**Evidence:**'
    ];

    top.evidence.slice(0, MAX_EVIDENCE).forEach((id, index) => {
      parts.push(`${index + 1}. ${id}`);
    });

    if (top.correlatedChanges.length > 0) {
      parts.push('', '**Correlated Changes:**');
      for (const change of top.correlatedChanges) {
        parts.push(`- ${new Date(change.windowStart).toISOString()} ${change.description}`);
      }
    }

    parts.push('', '**Recommended Actions:**');
    recommendedActions(top.service, top.incident.kind).forEach((action, index) => {
      parts.push(`${index + 1}. ${action}`);
    });

    const chain = chains.find(candidateChain => candidateChain.id === top.chainRef);
    if (chain) {
      parts.push('', '**Causal Chain:**', '```mermaid', chainToMermaid(chain), '```');
    }

    if (candidates.length > 1) {
      parts.push('', '**Other Possible Causes:**');
      for (const candidate of candidates.slice(1, 1 + MAX_OTHER_CANDIDATES)) {
        parts.push(`- ${candidate.service}: ${candidate.incident.kind} (confidence: ${formatPercent(candidate.confidence)})`);
      }
    }

    return parts.join('\n');
  }
}
