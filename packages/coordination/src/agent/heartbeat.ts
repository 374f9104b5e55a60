/**
 * HeartbeatCoordinator — one discovery-and-act cycle for a single agent.
 *
 * A cycle registers the agent, gathers candidate sessions by skill and by
 * interest, asks the Decide port what to do and applies that decision
 * through the SessionRecorder. There are no timers: the host schedules
 * cycles on its own cadence and simply runs the next one after a failure.
 */

import { ErrorKind, createLogger, failure, hasOwnKey } from '@colloquy/core';
import type { Failure, Logger } from '@colloquy/core';
import type { DiscoveryIndex } from '../discovery/discovery-index.js';
import type { BroadcastSession } from '../discovery/types.js';
import type { SessionRecorder } from '../session/recorder.js';
import type { SessionStore } from '../session/session-store.js';
import type { AgentIdentity, CandidateSession, Decide, Decision, SessionPublisher } from './ports.js';

export interface HeartbeatCoordinatorConfig {
  sessions: SessionStore;
  discovery: DiscoveryIndex;
  recorder: SessionRecorder;
  decide: Decide;
  publisher?: SessionPublisher;
  /** Sessions considered per cycle. Default: 3 */
  maxCandidates?: number;
  /** Sessions fetched from each discovery query. Default: 5 */
  searchLimit?: number;
  logger?: Logger;
}

/** What one heartbeat did. */
export interface HeartbeatReport {
  agent: string;
  registered: boolean;
  candidateSessionIds: string[];
  decision: Decision;
  /** Outcome of applying the decision; null when idle. */
  outcome: { ok: true; status: string } | Failure | null;
}

export class HeartbeatCoordinator {
  private readonly sessions: SessionStore;
  private readonly discovery: DiscoveryIndex;
  private readonly recorder: SessionRecorder;
  private readonly decide: Decide;
  private readonly publisher?: SessionPublisher;
  private readonly maxCandidates: number;
  private readonly searchLimit: number;
  private readonly logger: Logger;

  constructor(config: HeartbeatCoordinatorConfig) {
    this.sessions = config.sessions;
    this.discovery = config.discovery;
    this.recorder = config.recorder;
    this.decide = config.decide;
    this.publisher = config.publisher;
    this.maxCandidates = config.maxCandidates ?? 3;
    this.searchLimit = config.searchLimit ?? 5;
    this.logger = config.logger ?? createLogger('heartbeat');
  }

  async runCycle(agent: AgentIdentity): Promise<HeartbeatReport> {
    const registration = await this.discovery.registerAgent(agent.name, {
      skills: agent.skills,
      interests: agent.interests,
      domain: agent.domain,
      curiosityStyle: agent.curiosityStyle,
    });
    if (!registration.ok) {
      this.logger.warn(`${agent.name} could not register: ${registration.message}`);
    }

    const candidates = await this.gatherCandidates(agent);
    let decision: Decision;
    try {
      decision = await this.decide({ agent, candidates });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error(`Decision failed for ${agent.name}: ${message}`);
      decision = { action: 'idle', reasoning: `decision failed: ${message}` };
    }

    const outcome = await this.apply(agent, decision);
    if (outcome && !outcome.ok) {
      this.logger.warn(`${agent.name} ${decision.action} failed: ${outcome.reason}`);
    } else if (outcome) {
      this.logger.info(`${agent.name} ${decision.action}: ${outcome.status}`);
    }

    return {
      agent: agent.name,
      registered: registration.ok,
      candidateSessionIds: candidates.map((c) => c.session.id),
      decision,
      outcome,
    };
  }

  private async gatherCandidates(agent: AgentIdentity): Promise<CandidateSession[]> {
    const bySkill = await this.discovery.findSessionsBySkill(agent.skills, this.searchLimit);
    const interestTopic = agent.interests.length > 0 ? agent.interests.join(' ') : agent.domain ?? '';
    const byInterest = interestTopic
      ? await this.discovery.findSessionsByInterest(interestTopic, this.searchLimit)
      : null;

    const broadcasts = new Map<string, BroadcastSession>();
    for (const found of [bySkill, byInterest]) {
      if (!found) continue;
      if (!found.ok) {
        this.logger.warn(`Session discovery failed: ${found.message}`);
        continue;
      }
      for (const session of found.sessions) {
        if (!broadcasts.has(session.session_id)) broadcasts.set(session.session_id, session);
      }
    }

    const candidates: CandidateSession[] = [];
    for (const broadcast of broadcasts.values()) {
      if (candidates.length >= this.maxCandidates) break;
      const loaded = await this.sessions.getSession(broadcast.session_id);
      if (!loaded.ok) {
        this.logger.debug(`Skipping broadcast ${broadcast.session_id}: ${loaded.reason}`);
        continue;
      }
      const { session } = loaded;
      if (session.status !== 'active') continue;

      candidates.push({
        broadcast,
        session,
        isParticipant: session.participants.includes(agent.name),
        availableInvestigations: session.suggested_investigations.filter(
          (inv) => !hasOwnKey(session.claimed_investigations, inv.id),
        ),
        findingsToReview: session.findings.filter(
          (f) => f.author !== agent.name && !f.validations.some((v) => v.validator === agent.name),
        ),
      });
    }
    return candidates;
  }

  private async apply(agent: AgentIdentity, decision: Decision): Promise<HeartbeatReport['outcome']> {
    switch (decision.action) {
      case 'idle':
        return null;
      case 'join':
        return this.recorder.joinSession(decision.sessionId, agent.name, { reasoning: decision.reasoning });
      case 'claim': {
        const claimed = await this.recorder.claimInvestigation(
          decision.sessionId,
          decision.investigationId,
          agent.name,
          { role: decision.role, reasoning: decision.reasoning },
        );
        if (claimed.ok && claimed.status === 'claimed') {
          const status = await this.discovery.setAgentStatus(agent.name, 'investigating');
          if (!status.ok) this.logger.warn(`Could not mark ${agent.name} investigating: ${status.message}`);
        }
        return claimed;
      }
      case 'post':
        return this.recorder.postFinding(decision.sessionId, agent.name, decision.finding);
      case 'validate':
        return this.recorder.validateFinding(decision.sessionId, decision.findingId, agent.name, decision.validation);
      case 'complete':
        return this.complete(agent, decision);
    }
  }

  private async complete(
    agent: AgentIdentity,
    decision: Extract<Decision, { action: 'complete' }>,
  ): Promise<HeartbeatReport['outcome']> {
    const loaded = await this.sessions.getSession(decision.sessionId);
    if (!loaded.ok) return loaded;
    if (loaded.session.created_by !== agent.name) {
      return failure(
        ErrorKind.PermissionDenied,
        'not_creator',
        `Only ${loaded.session.created_by} completes session "${decision.sessionId}"`,
      );
    }

    let postId: string | undefined;
    if (decision.publishTitle && this.publisher && loaded.session.status === 'active') {
      try {
        ({ postId } = await this.publisher.createPost(decision.publishTitle, decision.summary));
      } catch (err) {
        this.logger.warn(
          `Publishing session ${decision.sessionId} failed: ${err instanceof Error ? err.message : String(err)}`,
        );
      }
    }

    const completed = await this.recorder.completeSession(decision.sessionId, decision.summary, postId);
    if (completed.ok) {
      const removed = await this.discovery.removeSession(decision.sessionId);
      if (!removed.ok && removed.error !== ErrorKind.NotFound) {
        this.logger.warn(`Could not withdraw broadcast ${decision.sessionId}: ${removed.message}`);
      }
    }
    return completed;
  }
}
