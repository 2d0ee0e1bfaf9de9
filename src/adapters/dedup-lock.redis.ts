import { v4 as uuidv4 } from 'uuid';
import type { DedupLockPort } from '../services/ports/dedup-lock.port';
import type { StreamCommandClient } from './mailbox.redis-stream';

const RELEASE_IF_OWNER = "if redis.call('GET', KEYS[1]) == ARGV[1] then return redis.call('DEL', KEYS[1]) end return 0";

/**
 * Redis-backed dedup lock
 * - SET key token NX PX ttlMs for atomic acquisition
 * - release is a compare-and-delete on the token, so a holder whose TTL ran
 *   out cannot free the next holder's lock
 */
export class RedisDedupLockAdapter implements DedupLockPort {
  constructor(private readonly client: StreamCommandClient, private readonly owner: string) {}

  async acquire(key: string, ttlMs: number): Promise<string | null> {
    const token = `${this.owner}:${uuidv4()}`;
    const result = await this.client.call('SET', [key, token, 'NX', 'PX', Math.max(1, Math.floor(ttlMs))]);
    return result === 'OK' ? token : null;
  }

  async release(key: string, token: string): Promise<boolean> {
    const deleted = await this.client.call('EVAL', [RELEASE_IF_OWNER, 1, key, token]);
    return deleted === 1;
  }
}
