/**
 * Abstract database backend interface.
 *
 * All implementations use raw SQL. Statements use `?`
 * placeholders regardless of the backend.
 */
export type SqlValue = string | number | null;

export interface DatabaseBackend {
  /** Create tables / indexes from schema.ts. */
  initialize(): Promise<void>;

  /** Execute a write statement (INSERT, UPDATE, DELETE). */
  execute(sql: string, params?: SqlValue[]): Promise<void>;

  /** Run a SELECT and return all matching rows. */
  query<T = Record<string, unknown>>(sql: string, params?: SqlValue[]): Promise<T[]>;

  /** Run a SELECT and return the first row, or null. */
  queryOne<T = Record<string, unknown>>(
    sql: string,
    params?: SqlValue[],
  ): Promise<T | null>;

  /** Close the connection / release resources. */
  close(): Promise<void>;
}
