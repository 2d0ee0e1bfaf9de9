import type { StreamCommandClient } from '../../adapters/mailbox.redis-stream';

interface FakeEntry {
  id: string;
  fields: string[];
}

interface FakeGroup {
  delivered: number;
  pending: Map<string, string[]>;
}

interface FakeStream {
  entries: FakeEntry[];
  groups: Map<string, FakeGroup>;
}

/**
 * In-process stand-in for the handful of Redis commands the stream mailbox
 * and the dedup lock issue. Blocking reads return immediately.
 */
export class FakeRedisServer {
  readonly streams = new Map<string, FakeStream>();
  readonly keys = new Map<string, string>();
  readonly calls: Array<{ command: string; args: Array<string | number> }> = [];
  private seq = 0;
  failNext: Error | null = null;

  client(): StreamCommandClient & { quitCalls: number } {
    const server = this;
    return {
      quitCalls: 0,
      async call(command: string, args: Array<string | number>) {
        return server.handle(command, args);
      },
      async quit() {
        this.quitCalls += 1;
        return 'OK';
      },
    };
  }

  private stream(key: string): FakeStream {
    const existing = this.streams.get(key);
    if (existing) return existing;
    const created: FakeStream = { entries: [], groups: new Map() };
    this.streams.set(key, created);
    return created;
  }

  handle(command: string, args: Array<string | number>): unknown {
    this.calls.push({ command, args });
    if (this.failNext) {
      const err = this.failNext;
      this.failNext = null;
      throw err;
    }
    const a = args.map(String);
    switch (command) {
      case 'XGROUP': {
        const [, key, group] = a;
        const stream = this.stream(key);
        if (stream.groups.has(group)) throw new Error('BUSYGROUP Consumer Group name already exists');
        stream.groups.set(group, { delivered: stream.entries.length, pending: new Map() });
        return 'OK';
      }
      case 'XADD': {
        const key = a[0];
        const star = a.indexOf('*');
        this.seq += 1;
        const id = `${this.seq}-0`;
        this.stream(key).entries.push({ id, fields: a.slice(star + 1) });
        return id;
      }
      case 'XREADGROUP': {
        const group = a[1];
        const consumer = a[2];
        const count = Number(a[a.indexOf('COUNT') + 1]);
        const key = a[a.length - 2];
        const from = a[a.length - 1];
        const stream = this.stream(key);
        const state = stream.groups.get(group);
        if (!state) throw new Error('NOGROUP No such key or consumer group');
        const pending = state.pending.get(consumer) ?? [];
        state.pending.set(consumer, pending);
        if (from === '0') {
          const ids = pending.slice(0, count);
          const entries = stream.entries.filter((e) => ids.includes(e.id));
          return [[key, entries.map((e) => [e.id, e.fields])]];
        }
        const fresh = stream.entries.slice(state.delivered, state.delivered + count);
        if (fresh.length === 0) return null;
        state.delivered += fresh.length;
        pending.push(...fresh.map((e) => e.id));
        return [[key, fresh.map((e) => [e.id, e.fields])]];
      }
      case 'XACK': {
        const [key, group, id] = a;
        const state = this.stream(key).groups.get(group);
        if (!state) return 0;
        for (const [consumer, ids] of state.pending) {
          state.pending.set(
            consumer,
            ids.filter((p) => p !== id)
          );
        }
        return 1;
      }
      case 'SET': {
        const [key, value] = a;
        if (a.includes('NX') && this.keys.has(key)) return null;
        this.keys.set(key, value);
        return 'OK';
      }
      case 'DEL': {
        return this.keys.delete(a[0]) ? 1 : 0;
      }
      case 'EVAL': {
        // only the lock's compare-and-delete script is ever evaluated
        const [, , key, token] = a;
        if (this.keys.get(key) !== token) return 0;
        this.keys.delete(key);
        return 1;
      }
      default:
        throw new Error(`ERR unknown command '${command}'`);
    }
  }

  /** Drops a key as if its PX TTL had run out. */
  expire(key: string): void {
    this.keys.delete(key);
  }

  pendingFor(key: string, group: string, consumer: string): string[] {
    return this.streams.get(key)?.groups.get(group)?.pending.get(consumer) ?? [];
  }
}
