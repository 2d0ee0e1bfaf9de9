import { v4 as uuidv4 } from 'uuid';
import type { DedupLockPort } from '../services/ports/dedup-lock.port';

interface HeldLock {
  token: string;
  expiresAt: number;
}

export class InMemoryDedupLockAdapter implements DedupLockPort {
  private readonly held = new Map<string, HeldLock>();

  constructor(private readonly now: () => number = () => Date.now()) {}

  async acquire(key: string, ttlMs: number): Promise<string | null> {
    const current = this.held.get(key);
    if (current && current.expiresAt > this.now()) return null;
    const token = uuidv4();
    this.held.set(key, { token, expiresAt: this.now() + ttlMs });
    return token;
  }

  async release(key: string, token: string): Promise<boolean> {
    const current = this.held.get(key);
    if (!current || current.token !== token) return false;
    this.held.delete(key);
    return true;
  }
}
