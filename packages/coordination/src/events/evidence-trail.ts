import type { EvidenceTrailEntry } from './types.js';

/** Split a multi-line reasoning trace into trimmed, non-empty steps. */
export function splitReasoningSteps(reasoningTrace: string): string[] {
  return reasoningTrace
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * Expand raw evidence into trail entries: one `tool_output` per tool, in
 * insertion order, then one `reasoning` entry per step.
 *
 * Both the event-log path and the session-document path build trails here,
 * so the same finding always yields the same trail.
 */
export function buildEvidenceTrail(
  toolOutputs: Record<string, unknown>,
  reasoningTrace: string,
  confidence: number,
): EvidenceTrailEntry[] {
  const trail: EvidenceTrailEntry[] = Object.entries(toolOutputs).map(([tool, result]) => ({
    type: 'tool_output',
    tool,
    result,
  }));
  for (const step of splitReasoningSteps(reasoningTrace)) {
    trail.push({ type: 'reasoning', step, confidence });
  }
  return trail;
}
