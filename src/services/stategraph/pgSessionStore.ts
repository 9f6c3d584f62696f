import { z } from 'zod';
import logger from '../../utils/logger';
import { PersistenceError } from './errors';
import { parseExecutionSnapshot, type ExecutionSnapshot, type SessionStore } from './sessionStore';

/** The part of `pg.Pool` / `pg.Client` this store needs. */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

export interface PostgresSessionStoreOptions {
  table?: string;
  /** Rows older than this are ignored on load; unset keeps them forever. */
  ttlSeconds?: number;
  now?: () => Date;
}

const IDENTIFIER = /^[a-z_][a-z0-9_]*$/;

const snapshotRowSchema = z.object({ snapshot: z.unknown() });

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Session store on a Postgres table, one row per execution. The snapshot is
 * kept in a jsonb column and replaced on every save.
 */
export class PostgresSessionStore implements SessionStore {
  private readonly table: string;
  private readonly ttlSeconds?: number;
  private readonly now: () => Date;

  constructor(
    private readonly db: Queryable,
    options: PostgresSessionStoreOptions = {},
  ) {
    const table = options.table ?? 'graph_sessions';
    if (!IDENTIFIER.test(table)) {
      throw new PersistenceError(`Invalid session table name: ${table}`);
    }
    this.table = table;
    this.ttlSeconds = options.ttlSeconds && options.ttlSeconds > 0 ? options.ttlSeconds : undefined;
    this.now = options.now ?? (() => new Date());
  }

  async ensureSchema(): Promise<void> {
    await this.exec('create session table', `
      CREATE TABLE IF NOT EXISTS ${this.table} (
        execution_id TEXT PRIMARY KEY,
        graph_name TEXT NOT NULL,
        status TEXT NOT NULL,
        snapshot JSONB NOT NULL,
        updated_at TIMESTAMPTZ NOT NULL,
        expires_at TIMESTAMPTZ
      )`);
    logger.info(`[PostgresSessionStore] Table ${this.table} ready`);
  }

  async save(executionId: string, snapshot: ExecutionSnapshot): Promise<void> {
    const now = this.now();
    const expiresAt = this.ttlSeconds
      ? new Date(now.getTime() + this.ttlSeconds * 1000).toISOString()
      : null;
    await this.exec(
      `save ${executionId}`,
      `INSERT INTO ${this.table} (execution_id, graph_name, status, snapshot, updated_at, expires_at)
       VALUES ($1, $2, $3, $4::jsonb, $5, $6)
       ON CONFLICT (execution_id) DO UPDATE SET
         graph_name = EXCLUDED.graph_name,
         status = EXCLUDED.status,
         snapshot = EXCLUDED.snapshot,
         updated_at = EXCLUDED.updated_at,
         expires_at = EXCLUDED.expires_at`,
      [
        executionId,
        snapshot.graphName,
        snapshot.status,
        JSON.stringify(snapshot),
        now.toISOString(),
        expiresAt,
      ],
    );
  }

  async load(executionId: string): Promise<ExecutionSnapshot | null> {
    const rows = await this.exec(
      `load ${executionId}`,
      `SELECT snapshot FROM ${this.table}
       WHERE execution_id = $1 AND (expires_at IS NULL OR expires_at > $2)`,
      [executionId, this.now().toISOString()],
    );
    if (rows.length === 0) return null;

    const row = snapshotRowSchema.parse(rows[0]);
    // pg hands jsonb back parsed; other drivers may return text
    const value = typeof row.snapshot === 'string' ? JSON.parse(row.snapshot) : row.snapshot;
    return parseExecutionSnapshot(value);
  }

  async delete(executionId: string): Promise<void> {
    await this.exec(`delete ${executionId}`, `DELETE FROM ${this.table} WHERE execution_id = $1`, [
      executionId,
    ]);
  }

  private async exec(action: string, text: string, values?: unknown[]): Promise<unknown[]> {
    try {
      const result = await this.db.query(text, values);
      return result.rows;
    } catch (error) {
      logger.error(`[PostgresSessionStore] Failed to ${action}`, { error: errorMessage(error) });
      throw new PersistenceError(`Session store failed to ${action}: ${errorMessage(error)}`);
    }
  }
}
