/**
 * Valid SQL parameter types
 * Includes undefined for optional parameters
 */
export type SqlParam = string | number | boolean | null | undefined | Buffer;

export interface ExecuteResult {
  affectedRows: number;
  insertId?: number;
}

/**
 * Storage handle injected into every store.
 *
 * Not safe for concurrent use: callers await one operation before starting
 * the next on the same connection.
 */
export interface DatabaseConnection {
  connect?(): Promise<void>;
  query<T>(sql: string, params?: SqlParam[]): Promise<T[]>;
  get<T>(sql: string, params?: SqlParam[]): Promise<T | undefined>;
  execute(sql: string, params?: SqlParam[]): Promise<ExecuteResult>;
  close(): Promise<void>;
  beginTransaction(): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
}
