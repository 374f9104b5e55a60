/**
 * Finding classification — the consensus state of a finding, derived from
 * its validations and never stored.
 *
 * Only confirmations and challenges move the classification; partial and
 * inconclusive verdicts are recorded but leave it unchanged.
 */

import type { Finding, Validation, ValidationStatus } from './types.js';

export const FindingClassification = {
  UnderReview: 'under_review',
  Validated: 'validated',
  Challenged: 'challenged',
  Disputed: 'disputed',
} as const;

export type FindingClassification = (typeof FindingClassification)[keyof typeof FindingClassification];

/**
 * Transition table for a single incoming verdict. `disputed` is absorbing.
 */
export const CLASSIFICATION_TRANSITIONS: Record<
  FindingClassification,
  Record<'confirmed' | 'challenged', FindingClassification>
> = {
  under_review: { confirmed: 'validated', challenged: 'challenged' },
  validated: { confirmed: 'validated', challenged: 'disputed' },
  challenged: { confirmed: 'disputed', challenged: 'challenged' },
  disputed: { confirmed: 'disputed', challenged: 'disputed' },
};

/** Classification after one more verdict arrives. */
export function advanceClassification(
  current: FindingClassification,
  status: ValidationStatus,
): FindingClassification {
  if (status !== 'confirmed' && status !== 'challenged') return current;
  return CLASSIFICATION_TRANSITIONS[current][status];
}

/**
 * Classify from the validation multiset (c = confirmations, h = challenges):
 * 0/0 under_review, c/0 validated, 0/h challenged, c/h disputed.
 */
export function classifyFinding(validations: readonly Pick<Validation, 'status'>[]): FindingClassification {
  let confirmed = 0;
  let challenged = 0;
  for (const v of validations) {
    if (v.status === 'confirmed') confirmed++;
    else if (v.status === 'challenged') challenged++;
  }
  if (confirmed > 0 && challenged > 0) return 'disputed';
  if (confirmed > 0) return 'validated';
  if (challenged > 0) return 'challenged';
  return 'under_review';
}

export interface ConsensusSummary {
  totalFindings: number;
  counts: Record<FindingClassification, number>;
  /** Finding ids grouped by classification, in posting order. */
  findingIds: Record<FindingClassification, string[]>;
  /** Per-finding classification, in posting order. */
  byFinding: Array<{ findingId: string; classification: FindingClassification }>;
  /** validated / total (0 when there are no findings). */
  consensusRate: number;
  /** disputed / total (0 when there are no findings). */
  debateRate: number;
}

/** Aggregate classifications across a session's findings. */
export function summarizeConsensus(findings: readonly Finding[]): ConsensusSummary {
  const counts: Record<FindingClassification, number> = {
    under_review: 0,
    validated: 0,
    challenged: 0,
    disputed: 0,
  };
  const findingIds: Record<FindingClassification, string[]> = {
    under_review: [],
    validated: [],
    challenged: [],
    disputed: [],
  };
  const byFinding = findings.map((finding) => {
    const classification = classifyFinding(finding.validations);
    counts[classification]++;
    findingIds[classification].push(finding.id);
    return { findingId: finding.id, classification };
  });

  const total = findings.length;
  return {
    totalFindings: total,
    counts,
    findingIds,
    byFinding,
    consensusRate: total > 0 ? counts.validated / total : 0,
    debateRate: total > 0 ? counts.disputed / total : 0,
  };
}
