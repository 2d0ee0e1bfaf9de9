/**
 * Short-lived exclusive lock around a dedup read-then-write, keyed per
 * (agent, student[, topic]). Without it two concurrent scans may both pass
 * the dedup check.
 */
export interface DedupLockPort {
  /** Returns the holder's token, or null if another holder has the key. */
  acquire(key: string, ttlMs: number): Promise<string | null>;
  /** Deletes the key only while it still carries `token`; false when the lock expired or changed hands. */
  release(key: string, token: string): Promise<boolean>;
}

export function monitoringLockKey(studentId: string): string {
  return `dedup:monitoring:${studentId}`;
}

export function adaptationLockKey(studentId: string, topicId: string | null): string {
  return `dedup:adaptation:${studentId}:${topicId ?? 'general'}`;
}
