/**
 * Log-level consensus heuristic.
 *
 * Deliberately distinct from the per-finding classification kept by the
 * session store: here a finding counts as *supported* once it has at least
 * `minValidations` AgentValidatedFinding events, or a single one whose
 * confidence reaches `confidenceThreshold`. Validation events count
 * regardless of the status they carry.
 *
 * Findings are the tasks with an AgentCompletedTask event. Each is placed
 * in exactly one class:
 *   supported + challenged → disputed
 *   supported only         → validated
 *   challenged only        → challenged
 *   neither                → under review
 */

import type {
  CoordinationEvent,
  LogConsensusState,
  LogConsensusThresholds,
} from './types.js';

export const DEFAULT_LOG_CONSENSUS_THRESHOLDS: LogConsensusThresholds = {
  minValidations: 2,
  confidenceThreshold: 0.8,
};

export function computeLogConsensus(
  events: readonly CoordinationEvent[],
  thresholds: LogConsensusThresholds = DEFAULT_LOG_CONSENSUS_THRESHOLDS,
): LogConsensusState {
  const findings = new Set<string>();
  const validationConfidences = new Map<string, number[]>();
  const challengedTasks = new Set<string>();

  for (const event of events) {
    switch (event.event_type) {
      case 'AgentCompletedTask':
        findings.add(event.payload.task_id);
        break;
      case 'AgentValidatedFinding': {
        const taskId = event.payload.validated_task_id;
        const confidences = validationConfidences.get(taskId) ?? [];
        confidences.push(event.payload.validation_result.confidence);
        validationConfidences.set(taskId, confidences);
        break;
      }
      case 'AgentChallengedFinding':
        challengedTasks.add(event.payload.challenged_task_id);
        break;
      default:
        break;
    }
  }

  let validated = 0;
  let challenged = 0;
  let disputed = 0;
  for (const taskId of findings) {
    const confidences = validationConfidences.get(taskId) ?? [];
    const supported =
      confidences.length >= thresholds.minValidations ||
      confidences.some((c) => c >= thresholds.confidenceThreshold);
    const isChallenged = challengedTasks.has(taskId);

    if (supported && isChallenged) disputed++;
    else if (supported) validated++;
    else if (isChallenged) challenged++;
  }

  const totalFindings = findings.size;
  return {
    totalFindings,
    validated,
    challenged,
    disputed,
    underReview: totalFindings - validated - challenged - disputed,
    consensusRate: totalFindings > 0 ? validated / totalFindings : 0,
  };
}
