import type { BroadcastSession } from '../discovery/types.js';
import type {
  Finding,
  Investigation,
  PostFindingParams,
  Session,
  ValidateFindingParams,
} from '../session/types.js';

/** The agent running a heartbeat. */
export interface AgentIdentity {
  name: string;
  skills: string[];
  interests: string[];
  domain?: string;
  curiosityStyle?: string;
}

/** A session the agent could act on this cycle. */
export interface CandidateSession {
  broadcast: BroadcastSession;
  session: Session;
  isParticipant: boolean;
  /** Suggested investigations nobody has claimed yet. */
  availableInvestigations: Investigation[];
  /** Findings by other agents that this agent has not validated yet. */
  findingsToReview: Finding[];
}

export interface DecisionContext {
  agent: AgentIdentity;
  candidates: CandidateSession[];
}

/** What the agent chose to do this cycle. */
export type Decision =
  | { action: 'join'; sessionId: string; reasoning: string }
  | { action: 'claim'; sessionId: string; investigationId: string; role?: string; reasoning: string }
  | { action: 'post'; sessionId: string; finding: PostFindingParams }
  | { action: 'validate'; sessionId: string; findingId: string; validation: ValidateFindingParams }
  | { action: 'complete'; sessionId: string; summary: string; publishTitle?: string }
  | { action: 'idle'; reasoning: string };

/**
 * Decision-making port. Implementations may consult a language model or
 * anything else; the coordination core only sees the returned Decision.
 */
export type Decide = (context: DecisionContext) => Promise<Decision>;

/** Publishes a human-visible summary of a completed session. */
export interface SessionPublisher {
  createPost(title: string, content: string): Promise<{ postId: string }>;
}
