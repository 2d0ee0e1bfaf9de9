import { agentMetrics } from '../metrics/agents.metrics';
import type { Mailbox } from '../services/ports/mailbox.port';
import type { AgentMessage, AgentMessageType, Envelope } from '../types/messages.types';
import { TransportError } from '../utils/errors';
import type { Logger } from '../utils/logger';
import { decodeMessage, parseMessageBody } from '../utils/zod-schemas/agent-message.schema';

const RECEIVE_ERROR_BACKOFF_MS = 1000;

/**
 * Receive loop shared by the reactive workers. Each envelope is handled once
 * and acknowledged afterwards, whatever the handler did; failures stay inside
 * the worker.
 */
export abstract class MailboxWorker {
  private running = false;
  private loop: Promise<void> | null = null;

  protected constructor(
    readonly name: string,
    protected readonly mailbox: Mailbox,
    protected readonly receiveTimeoutMs: number,
    protected readonly log: Logger
  ) {}

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.log.info('worker-started', { mailbox: this.mailbox.address });
    this.loop = this.runLoop();
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    await this.mailbox.close();
    if (this.loop) await this.loop;
    this.loop = null;
    this.log.info('worker-stopped', { mailbox: this.mailbox.address });
  }

  /** Handles at most one envelope. Returns false when the receive timed out. */
  async pollOnce(): Promise<boolean> {
    const envelope = await this.mailbox.receive(this.receiveTimeoutMs);
    if (!envelope) return false;
    agentMetrics.recordReceived(this.mailbox.address);
    try {
      await this.handle(envelope);
    } catch (err) {
      agentMetrics.recordWorkerFailure(this.name, 'handle');
      this.log.error('envelope-handling-failed', { envelopeId: envelope.id, from: envelope.from, error: err });
    } finally {
      await this.ackQuietly(envelope);
    }
    return true;
  }

  protected abstract handle(envelope: Envelope): Promise<void>;

  /**
   * Decodes a command body for a worker that only accepts `accepted` types.
   * Anything else is logged, counted and answered with null.
   */
  protected decodeCommand<T extends AgentMessageType>(
    envelope: Envelope,
    accepted: readonly T[]
  ): Extract<AgentMessage, { type: T }> | null {
    const body = parseMessageBody(envelope.body);
    if (!body.ok) {
      agentMetrics.recordRejected(this.mailbox.address, 'malformed');
      this.log.warn('malformed-envelope', { envelopeId: envelope.id, from: envelope.from, reason: body.reason });
      return null;
    }
    const decoded = decodeMessage(body.payload);
    if (!decoded.ok) {
      const reason = decoded.kind === 'invalid' ? 'invalid' : 'unexpected_type';
      agentMetrics.recordRejected(this.mailbox.address, reason);
      this.log.warn('rejected-envelope', {
        envelopeId: envelope.id,
        type: decoded.type,
        reason,
        issues: decoded.kind === 'invalid' ? decoded.issues : undefined,
      });
      return null;
    }
    const message = decoded.message;
    if (!isAccepted(message, accepted)) {
      agentMetrics.recordRejected(this.mailbox.address, 'unexpected_type');
      this.log.warn('unexpected-message-type', { envelopeId: envelope.id, type: message.type });
      return null;
    }
    return message;
  }

  /** Sends and records the outcome; a failed send is logged and reported as false. */
  protected async trySend(destination: string, message: AgentMessage): Promise<boolean> {
    try {
      await this.mailbox.send(destination, message);
      agentMetrics.recordSent(this.mailbox.address, message.type);
      return true;
    } catch (err) {
      agentMetrics.recordSendFailure(this.mailbox.address, destination);
      this.log.error('send-failed', {
        destination,
        type: message.type,
        code: err instanceof TransportError ? err.code : undefined,
        error: err,
      });
      return false;
    }
  }

  private async ackQuietly(envelope: Envelope): Promise<void> {
    try {
      await this.mailbox.ack(envelope);
    } catch (err) {
      this.log.warn('ack-failed', { envelopeId: envelope.id, error: err });
    }
  }

  private async runLoop(): Promise<void> {
    while (this.running) {
      try {
        await this.pollOnce();
      } catch (err) {
        if (!this.running) break;
        agentMetrics.recordWorkerFailure(this.name, 'receive');
        this.log.error('receive-failed', err);
        await new Promise((resolve) => setTimeout(resolve, RECEIVE_ERROR_BACKOFF_MS));
      }
    }
  }
}

function isAccepted<T extends AgentMessageType>(
  message: AgentMessage,
  accepted: readonly T[]
): message is Extract<AgentMessage, { type: T }> {
  return accepted.some((type) => type === message.type);
}
