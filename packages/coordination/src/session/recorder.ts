/**
 * SessionRecorder — performs SessionStore operations and mirrors each
 * state change into the session's EventLog.
 *
 * The store outcome is always what the caller gets back: a failed mirror
 * is logged as a warning and never turns a committed change into a failure.
 */

import { createLogger } from '@colloquy/core';
import type { Logger } from '@colloquy/core';
import type { EventLog } from '../events/event-log.js';
import type { CoordinationEventPayloads, CoordinationEventType } from '../events/types.js';
import type { SessionStore } from './session-store.js';
import type {
  ClaimInvestigationOutcome,
  CompleteSessionOutcome,
  CreateSessionOutcome,
  JoinSessionOutcome,
  PostFindingOutcome,
  ValidateFindingOutcome,
} from './session-store.js';
import type {
  CreateSessionParams,
  PostFindingParams,
  ValidateFindingParams,
} from './types.js';

export interface SessionRecorderOptions {
  logger?: Logger;
}

export interface RecordContext {
  /** Why the agent acted, kept in the audit trail. */
  reasoning?: string;
}

function mean(values: readonly number[]): number {
  return values.length > 0 ? values.reduce((a, b) => a + b, 0) / values.length : 0;
}

export class SessionRecorder {
  private readonly logger: Logger;

  constructor(
    private readonly sessions: SessionStore,
    private readonly events: EventLog,
    options: SessionRecorderOptions = {},
  ) {
    this.logger = options.logger ?? createLogger('recorder');
  }

  async createSession(
    params: CreateSessionParams,
    strategy: Record<string, unknown> = {},
  ): Promise<CreateSessionOutcome> {
    const outcome = await this.sessions.createSession(params);
    if (outcome.ok) {
      await this.mirror(outcome.sessionId, 'SessionCreated', {
        topic: params.topic,
        description: params.description,
        created_by: params.createdBy,
        strategy,
      });
    }
    return outcome;
  }

  async joinSession(
    sessionId: string,
    agentId: string,
    context: RecordContext & { skillMatch?: Record<string, unknown> } = {},
  ): Promise<JoinSessionOutcome> {
    const outcome = await this.sessions.joinSession(sessionId, agentId);
    if (outcome.ok && outcome.status === 'joined') {
      await this.mirror(sessionId, 'AgentJoinedSession', {
        agent_name: agentId,
        reasoning: context.reasoning ?? '',
        skill_match: context.skillMatch ?? {},
      });
    }
    return outcome;
  }

  async claimInvestigation(
    sessionId: string,
    investigationId: string,
    agentId: string,
    context: RecordContext & { role?: string } = {},
  ): Promise<ClaimInvestigationOutcome> {
    const outcome = await this.sessions.claimInvestigation(sessionId, investigationId, agentId);
    if (outcome.ok && outcome.status === 'claimed') {
      await this.mirror(sessionId, 'AgentClaimedTask', {
        task_id: investigationId,
        agent_name: agentId,
        role: context.role ?? 'investigator',
        reasoning: context.reasoning ?? '',
      });
    }
    return outcome;
  }

  /** Post a finding; mirrored as AgentCompletedTask (the evidence record) plus AgentPostedFinding. */
  async postFinding(sessionId: string, agentId: string, params: PostFindingParams): Promise<PostFindingOutcome> {
    const outcome = await this.sessions.postFinding(sessionId, agentId, params);
    if (!outcome.ok) return outcome;

    const { finding } = outcome;
    await this.mirror(sessionId, 'AgentCompletedTask', {
      task_id: finding.id,
      agent_name: agentId,
      result: finding.result,
      evidence: {
        tool_outputs: finding.evidence.tool_outputs,
        tool_params: {},
        reasoning_trace: finding.reasoning_trace,
        confidence: finding.confidence,
        sources: finding.evidence.sources,
      },
    });
    await this.mirror(sessionId, 'AgentPostedFinding', {
      agent_name: agentId,
      task_id: finding.id,
      finding_summary: finding.result,
      confidence: finding.confidence,
    });
    return outcome;
  }

  /**
   * Validate a finding. Also records ConsensusReached when the finding first
   * becomes validated and DisagreementRecorded when it first becomes disputed.
   */
  async validateFinding(
    sessionId: string,
    findingId: string,
    validatorId: string,
    params: ValidateFindingParams,
  ): Promise<ValidateFindingOutcome> {
    const outcome = await this.sessions.validateFinding(sessionId, findingId, validatorId, params);
    if (!outcome.ok) return outcome;

    const { validation, finding, previousClassification, classification } = outcome;
    if (validation.status === 'challenged') {
      await this.mirror(sessionId, 'AgentChallengedFinding', {
        challenger_agent: validatorId,
        challenged_task_id: findingId,
        challenge_reasoning: validation.reasoning,
        alternative_hypothesis: null,
        confidence: validation.confidence,
      });
    } else {
      await this.mirror(sessionId, 'AgentValidatedFinding', {
        validator_agent: validatorId,
        validated_task_id: findingId,
        validation_result: {
          status: validation.status,
          confidence: validation.confidence,
          reasoning: validation.reasoning,
        },
      });
    }

    if (classification === previousClassification) return outcome;

    const confirmations = finding.validations.filter((v) => v.status === 'confirmed');
    const challenges = finding.validations.filter((v) => v.status === 'challenged');
    if (classification === 'validated') {
      await this.mirror(sessionId, 'ConsensusReached', {
        task_id: findingId,
        consensus_statement: finding.result,
        validators: confirmations.map((v) => v.validator),
        confidence: mean(confirmations.map((v) => v.confidence)),
      });
    } else if (classification === 'disputed') {
      await this.mirror(sessionId, 'DisagreementRecorded', {
        task_id: findingId,
        agent_names: [...confirmations, ...challenges].map((v) => v.validator),
        disagreement_type: 'validation',
        description: `${confirmations.length} confirmation(s) against ${challenges.length} challenge(s)`,
      });
    }
    return outcome;
  }

  async completeSession(
    sessionId: string,
    summary: string,
    resultPostId?: string,
  ): Promise<CompleteSessionOutcome> {
    const outcome = await this.sessions.completeSession(sessionId, summary, resultPostId);
    if (outcome.ok && outcome.status === 'completed') {
      await this.mirror(sessionId, 'SessionCompleted', {
        summary,
        result_post_id: outcome.session.result_post_id,
      });
    }
    return outcome;
  }

  private async mirror<T extends CoordinationEventType>(
    sessionId: string,
    eventType: T,
    payload: CoordinationEventPayloads[T],
  ): Promise<void> {
    const logged = await this.events.logEvent(sessionId, eventType, payload);
    if (!logged.ok) {
      this.logger.warn(`Failed to record ${eventType} for session ${sessionId}: ${logged.message}`);
    }
  }
}
