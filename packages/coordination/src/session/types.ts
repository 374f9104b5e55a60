import { z } from 'zod';

/** Session lifecycle status. `complete` and `abandoned` are terminal. */
export const SessionStatus = {
  Active: 'active',
  Complete: 'complete',
  Abandoned: 'abandoned',
} as const;

export type SessionStatus = (typeof SessionStatus)[keyof typeof SessionStatus];

/** A peer's verdict on a finding. */
export const ValidationStatus = {
  Confirmed: 'confirmed',
  Partial: 'partial',
  Challenged: 'challenged',
  Inconclusive: 'inconclusive',
} as const;

export type ValidationStatus = (typeof ValidationStatus)[keyof typeof ValidationStatus];

const isoTimestamp = z.string().datetime();
const confidence = z.number().min(0).max(1);

export const InvestigationSchema = z.object({
  id: z.string().min(1),
  description: z.string(),
  needed_skills: z.array(z.string()),
}).strict();

export type Investigation = z.infer<typeof InvestigationSchema>;

export const ValidationSchema = z.object({
  validator: z.string().min(1),
  status: z.enum(['confirmed', 'partial', 'challenged', 'inconclusive']),
  reasoning: z.string(),
  confidence,
  created_at: isoTimestamp,
}).strict();

export type Validation = z.infer<typeof ValidationSchema>;

export const EvidenceSchema = z.object({
  tool_outputs: z.record(z.string(), z.unknown()),
  sources: z.array(z.string()),
}).strict();

export type Evidence = z.infer<typeof EvidenceSchema>;

export const FindingSchema = z.object({
  id: z.string().min(1),
  author: z.string().min(1),
  result: z.string(),
  evidence: EvidenceSchema,
  confidence,
  reasoning_trace: z.string(),
  created_at: isoTimestamp,
  validations: z.array(ValidationSchema),
}).strict();

export type Finding = z.infer<typeof FindingSchema>;

/** Zod schema for a session document (.colloquy/sessions/<id>.json). */
export const SessionSchema = z.object({
  id: z.string().min(1),
  topic: z.string(),
  description: z.string(),
  created_by: z.string().min(1),
  created_at: isoTimestamp,
  status: z.enum(['active', 'complete', 'abandoned']),
  max_participants: z.number().int().min(1),
  participants: z.array(z.string()),
  suggested_investigations: z.array(InvestigationSchema),
  claimed_investigations: z.record(z.string(), z.string()),
  findings: z.array(FindingSchema),
  timestamps: z.object({
    joined: z.record(z.string(), isoTimestamp),
    claimed: z.record(z.string(), isoTimestamp),
  }).strict(),
  summary: z.string().nullable(),
  result_post_id: z.string().nullable(),
  completed_at: isoTimestamp.nullable(),
  abandoned_reason: z.string().nullable(),
  metadata: z.record(z.string(), z.unknown()),
  version: z.number().int().min(1),
}).strict();

/** TypeScript type for a session document. */
export type Session = z.infer<typeof SessionSchema>;

/** Input for creating a session. */
export interface CreateSessionParams {
  /** Agent creating the session; becomes the sole initial participant. */
  createdBy: string;
  topic: string;
  description: string;
  suggestedInvestigations: Array<{ id: string; description: string; neededSkills?: string[] }>;
  /** Capacity; defaults to the configured `sessions.max_participants`. */
  maxParticipants?: number;
  metadata?: Record<string, unknown>;
}

/** Input for posting a finding. */
export interface PostFindingParams {
  result: string;
  evidence?: { toolOutputs?: Record<string, unknown>; sources?: string[] };
  confidence: number;
  reasoningTrace?: string;
}

/** Input for validating a finding. */
export interface ValidateFindingParams {
  status: ValidationStatus;
  reasoning: string;
  confidence: number;
}

/** Lightweight listing entry for active sessions. */
export interface SessionSummary {
  id: string;
  topic: string;
  createdBy: string;
  createdAt: string;
  participants: string[];
  maxParticipants: number;
  totalInvestigations: number;
  claimedInvestigations: number;
  findingCount: number;
}
