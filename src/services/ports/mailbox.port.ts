import type { AgentMessage, Envelope } from '../../types/messages.types';

/**
 * One worker's addressed inbound queue.
 *
 * - `send` throws `TransportError` when the destination is not a declared address.
 * - `receive` resolves with the next envelope (FIFO for this mailbox) or `null`
 *   once `timeoutMs` elapses or the mailbox is closed.
 * - `ack` confirms an envelope was handled; unacknowledged envelopes may be
 *   delivered again (at-least-once), so handlers must be idempotent.
 */
export interface Mailbox {
  readonly address: string;
  send(destination: string, message: AgentMessage): Promise<Envelope>;
  receive(timeoutMs: number): Promise<Envelope | null>;
  ack(envelope: Envelope): Promise<void>;
  close(): Promise<void>;
}

export interface MailboxTransport {
  readonly kind: 'memory' | 'redis';
  open(address: string): Promise<Mailbox>;
  shutdown(): Promise<void>;
}
