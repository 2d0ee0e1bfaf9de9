import type { Mailbox, MailboxTransport } from '../services/ports/mailbox.port';
import type { AgentMessage, Envelope } from '../types/messages.types';
import { encodeMessage } from '../utils/zod-schemas/agent-message.schema';
import { TransportError, describeError } from '../utils/errors';
import { logger } from '../utils/logger';

/**
 * The subset of a Redis connection the stream transport needs. `ioredis`
 * satisfies it through `redis.call(command, args)`.
 */
export interface StreamCommandClient {
  call(command: string, args: Array<string | number>): Promise<unknown>;
  quit(): Promise<unknown>;
}

export interface RedisStreamTransportOptions {
  addresses: Iterable<string>;
  streamPrefix: string;
  consumerName: string;
  group?: string;
  /** Max entries kept per stream (approximate trim on XADD). */
  maxLen?: number;
}

interface StreamEntry {
  id: string;
  fields: Record<string, string>;
}

const log = logger.child({ component: 'mailbox.redis' });

export function parseStreamReply(reply: unknown): StreamEntry[] {
  if (!Array.isArray(reply)) return [];
  const entries: StreamEntry[] = [];
  for (const stream of reply) {
    if (!Array.isArray(stream) || !Array.isArray(stream[1])) continue;
    for (const raw of stream[1]) {
      if (!Array.isArray(raw) || typeof raw[0] !== 'string') continue;
      const kv: unknown = raw[1];
      const fields: Record<string, string> = {};
      if (Array.isArray(kv)) {
        for (let i = 0; i + 1 < kv.length; i += 2) fields[String(kv[i])] = String(kv[i + 1]);
      }
      entries.push({ id: raw[0], fields });
    }
  }
  return entries;
}

function toEnvelope(entry: StreamEntry, address: string): Envelope {
  const sentAt = entry.fields.sent_at ? new Date(entry.fields.sent_at) : new Date();
  return {
    id: entry.id,
    from: entry.fields.from ?? 'unknown',
    to: entry.fields.to ?? address,
    sentAt: Number.isNaN(sentAt.getTime()) ? new Date() : sentAt,
    body: entry.fields.body ?? '',
  };
}

/**
 * One Redis stream per address with a consumer group. Blocking reads need a
 * connection of their own, so every opened mailbox gets a dedicated reader
 * from `connect`; sends go through the shared writer.
 */
export class RedisStreamMailboxTransport implements MailboxTransport {
  readonly kind = 'redis' as const;
  private readonly addresses: Set<string>;
  private readonly group: string;
  private readonly maxLen: number;
  private readonly readers: StreamCommandClient[] = [];

  constructor(
    private readonly writer: StreamCommandClient,
    private readonly connect: () => StreamCommandClient,
    private readonly options: RedisStreamTransportOptions
  ) {
    this.addresses = new Set(options.addresses);
    this.group = options.group ?? 'agents';
    this.maxLen = options.maxLen ?? 10_000;
  }

  streamKey(address: string): string {
    return `${this.options.streamPrefix}:${address}`;
  }

  async ensureGroup(client: StreamCommandClient, address: string): Promise<void> {
    try {
      await client.call('XGROUP', ['CREATE', this.streamKey(address), this.group, '$', 'MKSTREAM']);
      log.debug('mailbox-group-created', { address, group: this.group });
    } catch (err) {
      if (describeError(err).includes('BUSYGROUP')) return;
      throw new TransportError(`Failed to create consumer group for "${address}"`, 'send_failed', address, {
        cause: err,
      });
    }
  }

  async open(address: string): Promise<Mailbox> {
    if (!this.addresses.has(address)) {
      throw new TransportError(`Mailbox "${address}" is not a declared address`, 'unknown_destination', address);
    }
    const reader = this.connect();
    this.readers.push(reader);
    await this.ensureGroup(reader, address);
    return new RedisStreamMailbox(this, reader, address, this.group, this.options.consumerName);
  }

  async append(from: string, to: string, body: string): Promise<Envelope> {
    if (!this.addresses.has(to)) {
      throw new TransportError(`Unknown destination "${to}"`, 'unknown_destination', to);
    }
    const sentAt = new Date();
    let id: unknown;
    try {
      id = await this.writer.call('XADD', [
        this.streamKey(to),
        'MAXLEN',
        '~',
        this.maxLen,
        '*',
        'from',
        from,
        'to',
        to,
        'sent_at',
        sentAt.toISOString(),
        'body',
        body,
      ]);
    } catch (err) {
      throw new TransportError(`XADD to "${to}" failed: ${describeError(err)}`, 'send_failed', to, { cause: err });
    }
    return { id: String(id), from, to, sentAt, body };
  }

  async shutdown(): Promise<void> {
    const clients = [...this.readers.splice(0), this.writer];
    for (const client of clients) {
      try {
        await client.quit();
      } catch (err) {
        log.warn('redis-quit-failed', err);
      }
    }
  }
}

class RedisStreamMailbox implements Mailbox {
  // Re-deliver this consumer's unacknowledged entries before taking new ones.
  private drainingPending = true;
  private closed = false;

  constructor(
    private readonly transport: RedisStreamMailboxTransport,
    private readonly reader: StreamCommandClient,
    readonly address: string,
    private readonly group: string,
    private readonly consumer: string
  ) {}

  send(destination: string, message: AgentMessage): Promise<Envelope> {
    return this.transport.append(this.address, destination, encodeMessage(message));
  }

  async receive(timeoutMs: number): Promise<Envelope | null> {
    if (this.closed) return null;
    const key = this.transport.streamKey(this.address);
    if (this.drainingPending) {
      const pending = parseStreamReply(
        await this.reader.call('XREADGROUP', ['GROUP', this.group, this.consumer, 'COUNT', 1, 'STREAMS', key, '0'])
      );
      if (pending.length > 0) return toEnvelope(pending[0], this.address);
      this.drainingPending = false;
    }
    const reply = await this.reader.call('XREADGROUP', [
      'GROUP',
      this.group,
      this.consumer,
      'COUNT',
      1,
      'BLOCK',
      Math.max(1, Math.floor(timeoutMs)),
      'STREAMS',
      key,
      '>',
    ]);
    const entries = parseStreamReply(reply);
    return entries.length > 0 ? toEnvelope(entries[0], this.address) : null;
  }

  async ack(envelope: Envelope): Promise<void> {
    try {
      await this.reader.call('XACK', [this.transport.streamKey(this.address), this.group, envelope.id]);
    } catch (err) {
      // a replayed entry would come straight back; leave it pending for the next open
      this.drainingPending = false;
      throw err;
    }
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
