import { v4 as uuidv4 } from 'uuid';
import type { Mailbox, MailboxTransport } from '../services/ports/mailbox.port';
import type { AgentMessage, Envelope } from '../types/messages.types';
import { encodeMessage } from '../utils/zod-schemas/agent-message.schema';
import { TransportError } from '../utils/errors';

interface Waiter {
  resolve: (envelope: Envelope | null) => void;
  timer: NodeJS.Timeout;
}

interface Slot {
  queue: Envelope[];
  waiters: Waiter[];
}

/**
 * Process-local transport: one FIFO queue per declared address. Envelopes are
 * frozen on send, and delivery hands each one to exactly one receiver.
 */
export class InMemoryMailboxTransport implements MailboxTransport {
  readonly kind = 'memory' as const;
  private readonly slots = new Map<string, Slot>();
  private closed = false;

  constructor(addresses: Iterable<string>, private readonly clock: () => Date = () => new Date()) {
    for (const address of addresses) {
      this.slots.set(address, { queue: [], waiters: [] });
    }
  }

  async open(address: string): Promise<Mailbox> {
    if (!this.slots.has(address)) {
      throw new TransportError(`Mailbox "${address}" is not a declared address`, 'unknown_destination', address);
    }
    return new InMemoryMailbox(this, address);
  }

  deliver(from: string, to: string, body: string): Envelope {
    if (this.closed) {
      throw new TransportError('Transport is shut down', 'transport_closed', to);
    }
    const slot = this.slots.get(to);
    if (!slot) {
      throw new TransportError(`Unknown destination "${to}"`, 'unknown_destination', to);
    }
    const envelope: Envelope = Object.freeze({ id: uuidv4(), from, to, sentAt: this.clock(), body });
    const waiter = slot.waiters.shift();
    if (waiter) {
      clearTimeout(waiter.timer);
      waiter.resolve(envelope);
    } else {
      slot.queue.push(envelope);
    }
    return envelope;
  }

  take(address: string, timeoutMs: number): Promise<Envelope | null> {
    const slot = this.slots.get(address);
    if (!slot || this.closed) return Promise.resolve(null);
    const next = slot.queue.shift();
    if (next) return Promise.resolve(next);
    return new Promise<Envelope | null>((resolve) => {
      const waiter: Waiter = {
        resolve,
        timer: setTimeout(() => {
          slot.waiters = slot.waiters.filter((w) => w !== waiter);
          resolve(null);
        }, Math.max(0, timeoutMs)),
      };
      slot.waiters.push(waiter);
    });
  }

  /** Wakes pending receivers of one address with `null`. */
  wake(address: string): void {
    const slot = this.slots.get(address);
    if (!slot) return;
    for (const waiter of slot.waiters.splice(0)) {
      clearTimeout(waiter.timer);
      waiter.resolve(null);
    }
  }

  pending(address: string): number {
    return this.slots.get(address)?.queue.length ?? 0;
  }

  async shutdown(): Promise<void> {
    this.closed = true;
    for (const address of this.slots.keys()) this.wake(address);
  }
}

class InMemoryMailbox implements Mailbox {
  constructor(private readonly transport: InMemoryMailboxTransport, readonly address: string) {}

  async send(destination: string, message: AgentMessage): Promise<Envelope> {
    return this.transport.deliver(this.address, destination, encodeMessage(message));
  }

  receive(timeoutMs: number): Promise<Envelope | null> {
    return this.transport.take(this.address, timeoutMs);
  }

  async ack(_envelope: Envelope): Promise<void> {
    // delivery already removed the envelope from the queue
  }

  async close(): Promise<void> {
    this.transport.wake(this.address);
  }
}
