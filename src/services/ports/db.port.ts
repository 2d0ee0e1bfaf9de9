export interface DbQueryOptions {
  /**
   * Optional label for metrics/logging to indicate logical operation (e.g., findLatestAlert).
   */
  operation?: string;
}

export type DbRow = Record<string, unknown>;

export interface DbPort {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  query(sql: string, params?: unknown[], options?: DbQueryOptions): Promise<DbRow[]>;
  queryOne(sql: string, params?: unknown[], options?: DbQueryOptions): Promise<DbRow | null>;
  /** Inserts one row and returns it as stored (`RETURNING *`). */
  insert(tableFqn: string, row: Record<string, unknown>, options?: DbQueryOptions): Promise<DbRow>;
}
