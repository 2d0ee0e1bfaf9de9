import { agentMetrics } from '../metrics/agents.metrics';
import type { Mailbox } from '../services/ports/mailbox.port';
import type { PersistenceGatewayPort } from '../services/ports/persistence.port';
import type { MailboxAddresses } from '../config/agents.config';
import type { NewDecisionLogEntry } from '../types/agents.types';
import type {
  AdaptationAnalysisMessage,
  Envelope,
  RecommendationsReadyMessage,
  StudentRiskMessage,
} from '../types/messages.types';
import type { Logger } from '../utils/logger';
import { logger } from '../utils/logger';
import { decodeMessage, parseMessageBody, readMessageType } from '../utils/zod-schemas/agent-message.schema';
import { MailboxWorker } from './mailbox-worker';

export interface OrchestratorDeps {
  gateway: PersistenceGatewayPort;
  mailbox: Mailbox;
  addresses: MailboxAddresses;
  receiveTimeoutMs: number;
  now?: () => Date;
  log?: Logger;
}

export type RouteOutcome = 'dropped' | 'invalid' | 'ignored' | 'dispatched' | 'recorded';

/**
 * Central router. Every parseable inbound event is written to the decision
 * log before it is acted on; dispatch is a flat one-level fan-out with no
 * retries.
 */
export class OrchestratorWorker extends MailboxWorker {
  private readonly gateway: PersistenceGatewayPort;
  private readonly addresses: MailboxAddresses;
  private readonly now: () => Date;

  constructor(deps: OrchestratorDeps) {
    super('router', deps.mailbox, deps.receiveTimeoutMs, deps.log ?? logger.child({ component: 'router' }));
    this.gateway = deps.gateway;
    this.addresses = deps.addresses;
    this.now = deps.now ?? (() => new Date());
  }

  protected async handle(envelope: Envelope): Promise<void> {
    await this.route(envelope);
  }

  async route(envelope: Envelope): Promise<RouteOutcome> {
    const body = parseMessageBody(envelope.body);
    if (!body.ok) {
      agentMetrics.recordRejected(this.mailbox.address, 'malformed');
      this.log.warn('unparseable-event', { envelopeId: envelope.id, from: envelope.from, reason: body.reason });
      return 'dropped';
    }

    const rawType = readMessageType(body.payload);
    this.log.info('event-received', { type: rawType, from: envelope.from });
    await this.audit('inbound', {
      eventType: rawType ?? 'unknown',
      sourceAgent: envelope.from,
      targetAgent: null,
      studentId: readStudentId(body.payload),
      payload: body.payload,
      decision: null,
      createdAt: this.now(),
    });

    const decoded = decodeMessage(body.payload);
    if (!decoded.ok) {
      if (decoded.kind === 'invalid') {
        agentMetrics.recordRejected(this.mailbox.address, 'invalid');
        this.log.warn('invalid-event', { type: decoded.type, issues: decoded.issues });
        return 'invalid';
      }
      this.log.info('unknown-event-ignored', { type: decoded.type });
      return 'ignored';
    }

    const message = decoded.message;
    switch (message.type) {
      case 'student_risk':
        await this.onStudentRisk(message);
        return 'dispatched';
      case 'recommendations_ready':
        await this.onRecommendationsReady(message);
        return 'recorded';
      case 'adaptation_analysis':
        await this.onAdaptationAnalysis(message);
        return 'recorded';
      case 'generate_recommendations':
      case 'create_alert':
      case 'analyze_errors':
        // commands are never addressed to the router
        this.log.info('command-ignored', { type: message.type, from: envelope.from });
        return 'ignored';
    }
  }

  /**
   * Operator entry point: asks the adaptation worker for an error-pattern
   * analysis. Resolves false if the command could not be sent.
   */
  async requestErrorAnalysis(studentId: string, studentName = ''): Promise<boolean> {
    await this.audit('decision', {
      eventType: 'analyze_errors',
      sourceAgent: this.mailbox.address,
      targetAgent: this.addresses.adaptation,
      studentId,
      payload: null,
      decision: 'Requested error-pattern analysis',
      createdAt: this.now(),
    });
    return this.trySend(this.addresses.adaptation, { type: 'analyze_errors', studentId, studentName });
  }

  private async onStudentRisk(event: StudentRiskMessage): Promise<void> {
    await this.audit('decision', {
      eventType: 'student_risk',
      sourceAgent: this.mailbox.address,
      targetAgent: `${this.addresses.adaptation},${this.addresses.notification}`,
      studentId: event.studentId,
      payload: null,
      decision: `Score=${event.score}%, dispatching to adaptation and notification`,
      createdAt: this.now(),
    });
    // both sends are attempted; trySend never throws
    await this.trySend(this.addresses.adaptation, {
      type: 'generate_recommendations',
      studentId: event.studentId,
      studentName: event.studentName,
      score: event.score,
    });
    await this.trySend(this.addresses.notification, {
      type: 'create_alert',
      studentId: event.studentId,
      studentName: event.studentName,
      score: event.score,
      severity: event.severity,
    });
  }

  private async onRecommendationsReady(event: RecommendationsReadyMessage): Promise<void> {
    await this.audit('decision', {
      eventType: 'recommendations_ready',
      sourceAgent: this.mailbox.address,
      targetAgent: null,
      studentId: event.studentId,
      payload: null,
      decision: `Generated ${event.recommendationsCount} recommendations (external=${event.aiUsed ? 'yes' : 'no'})`,
      createdAt: this.now(),
    });
    this.log.info('recommendations-ready', {
      studentId: event.studentId,
      count: event.recommendationsCount,
      external: event.aiUsed,
    });
  }

  private async onAdaptationAnalysis(event: AdaptationAnalysisMessage): Promise<void> {
    await this.audit('decision', {
      eventType: 'adaptation_analysis',
      sourceAgent: this.mailbox.address,
      targetAgent: null,
      studentId: event.studentId,
      payload: null,
      decision: `Suggested difficulty=${event.suggestedDifficulty}`,
      createdAt: this.now(),
    });
  }

  /** Decision-log writes are best effort and never block dispatch. */
  private async audit(kind: 'inbound' | 'decision', entry: NewDecisionLogEntry): Promise<void> {
    try {
      await this.gateway.appendDecisionLog(entry);
      agentMetrics.recordDecision(kind, 'ok');
    } catch (err) {
      agentMetrics.recordDecision(kind, 'failed');
      this.log.error('decision-log-write-failed', { kind, eventType: entry.eventType, error: err });
    }
  }
}

function readStudentId(payload: Record<string, unknown>): string | null {
  const id = payload.student_id;
  if (typeof id === 'string' && id.length > 0) return id;
  if (typeof id === 'number' && Number.isFinite(id)) return String(id);
  return null;
}
