/**
 * PostgreSQL Database Adapter
 *
 * Implements DatabaseAdapter using node-postgres (pg).
 * Provides async operations with connection pooling and transaction support.
 *
 * Each transaction checks out its own pool client; AsyncLocalStorage routes
 * the queries issued inside `fn` to that client, and nested calls become
 * savepoints on it.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { Pool, type PoolClient, type PoolConfig } from 'pg';
import type { DatabaseAdapter } from '../repository.js';
import type { SqlValue } from '../schema.types.js';
import { logger } from '../../core/utils/logger.js';

interface TransactionFrame {
  readonly client: PoolClient;
  readonly depth: number;
}

export class PostgreSQLAdapter implements DatabaseAdapter {
  private readonly pool: Pool;
  private readonly frames = new AsyncLocalStorage<TransactionFrame>();

  constructor(config: PoolConfig) {
    this.pool = new Pool({
      max: 20,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
      ...config,
    });

    // Error handler for pool-level errors
    this.pool.on('error', (err: Error) => {
      logger.error('Unexpected PostgreSQL pool error', {
        error: err.message,
        stack: err.stack,
      });
    });
  }

  private get client(): Pool | PoolClient {
    return this.frames.getStore()?.client ?? this.pool;
  }

  async queryOne<T>(sql: string, params: ReadonlyArray<SqlValue> = []): Promise<T | null> {
    const result = await this.client.query(this.parameterize(sql), [...params]);
    return (result.rows[0] as T | undefined) ?? null;
  }

  async queryMany<T>(sql: string, params: ReadonlyArray<SqlValue> = []): Promise<ReadonlyArray<T>> {
    const result = await this.client.query(this.parameterize(sql), [...params]);
    return result.rows as T[];
  }

  async execute(sql: string, params: ReadonlyArray<SqlValue> = []): Promise<number> {
    const result = await this.client.query(this.parameterize(sql), [...params]);
    return result.rowCount ?? 0;
  }

  async transaction<T>(fn: () => Promise<T>): Promise<T> {
    const frame = this.frames.getStore();

    if (frame) {
      // Nested transaction - use savepoint
      const depth = frame.depth + 1;
      const savepoint = `sp_${depth}`;
      await frame.client.query(`SAVEPOINT ${savepoint}`);
      try {
        const result = await this.frames.run({ client: frame.client, depth }, fn);
        await frame.client.query(`RELEASE SAVEPOINT ${savepoint}`);
        return result;
      } catch (error) {
        await frame.client.query(`ROLLBACK TO SAVEPOINT ${savepoint}`);
        throw error;
      }
    }

    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const result = await this.frames.run({ client, depth: 0 }, fn);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  /**
   * Convert SQLite-style ? placeholders to PostgreSQL $1, $2, etc.
   */
  private parameterize(sql: string): string {
    let paramIndex = 1;
    return sql.replace(/\?/g, () => `$${paramIndex++}`);
  }

  /**
   * Initialize database schema from SQL file.
   */
  async initializeSchema(schemaSQL: string): Promise<void> {
    // PostgreSQL uses same SQL as SQLite
    await this.pool.query(schemaSQL);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  /**
   * Check connection health.
   */
  async healthCheck(): Promise<boolean> {
    try {
      await this.pool.query('SELECT 1');
      return true;
    } catch (error) {
      logger.warn('PostgreSQL health check failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }
}
