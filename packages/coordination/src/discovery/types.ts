import { z } from 'zod';

/** Availability advertised with every heartbeat. */
export const AgentAvailability = {
  Available: 'available',
  Busy: 'busy',
  Investigating: 'investigating',
} as const;

export type AgentAvailability = (typeof AgentAvailability)[keyof typeof AgentAvailability];

const isoTimestamp = z.string().datetime();

export const AgentRecordSchema = z.object({
  name: z.string().min(1),
  domain: z.string(),
  /** Sorted, de-duplicated. */
  skills: z.array(z.string()),
  /** Sorted, de-duplicated. */
  interests: z.array(z.string()),
  status: z.enum(['available', 'busy', 'investigating']),
  curiosity_style: z.string(),
  last_heartbeat: isoTimestamp,
}).strict();

export type AgentRecord = z.infer<typeof AgentRecordSchema>;

export const BroadcastSessionSchema = z.object({
  session_id: z.string().min(1),
  topic: z.string(),
  investigation_type: z.string(),
  needed_skills: z.array(z.string()),
  suggestion_count: z.number().int().min(0),
  created_at: isoTimestamp,
}).strict();

export type BroadcastSession = z.infer<typeof BroadcastSessionSchema>;

/** Zod schema for the shared discovery document (.colloquy/discovery/index.json). */
export const DiscoveryIndexSchema = z.object({
  agents: z.record(z.string(), AgentRecordSchema),
  /** skill → agent names; always the exact inverse of agents[*].skills. */
  skill_index: z.record(z.string(), z.array(z.string())),
  active_sessions: z.record(z.string(), BroadcastSessionSchema),
  last_updated: isoTimestamp,
  version: z.number().int().min(1),
}).strict();

export type DiscoveryIndexDocument = z.infer<typeof DiscoveryIndexSchema>;

/** Agent profile advertised on registration. */
export interface AgentProfile {
  skills: string[];
  interests?: string[];
  domain?: string;
  curiosityStyle?: string;
}

export interface BroadcastSessionParams {
  topic: string;
  investigationType?: string;
  /** Skills the session needs; inferred from `suggestedInvestigations` when omitted. */
  neededSkills?: string[];
  suggestedInvestigations?: Array<{ neededSkills?: string[] }>;
  /** Defaults to the number of `suggestedInvestigations`. */
  suggestionCount?: number;
}

export interface FindAgentsBySkillOptions {
  exclude?: string[];
  /** Status filter; `null` matches every status. Defaults to the configured availability. */
  availability?: AgentAvailability | null;
  /** Nice-to-have skills that only affect ranking. */
  preferred?: string[];
}

export interface FindAgentsByInterestOptions {
  maxAgents?: number;
  exclude?: string[];
}

export interface DiscoveryStatus {
  totalAgents: number;
  availableAgents: number;
  totalSkills: number;
  totalSessions: number;
  lastUpdated: string | null;
}
