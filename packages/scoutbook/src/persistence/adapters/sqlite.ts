/**
 * SQLite Database Adapter
 *
 * Implements DatabaseAdapter on top of synchronous better-sqlite3.
 *
 * ARCHITECTURE:
 * - One connection; WAL mode for concurrent readers in other processes
 * - Top-level transactions and statements outside them are serialized on
 *   a single lock, since every statement on the connection would otherwise
 *   join (or observe) whichever transaction is open
 * - Nested transaction() calls (tracked with AsyncLocalStorage) become
 *   savepoints of the enclosing transaction
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import Database from 'better-sqlite3';
import type { DatabaseAdapter } from '../repository.js';
import type { SqlValue } from '../schema.types.js';
import { KeyedMutex } from '../../resilience/keyed-mutex.js';

interface TransactionFrame {
  readonly depth: number;
}

const WRITE_LOCK = 'connection';

export class SQLiteAdapter implements DatabaseAdapter {
  private readonly db: Database.Database;
  private readonly frames = new AsyncLocalStorage<TransactionFrame>();
  private readonly writeLock = new KeyedMutex();

  constructor(dbPath: string = ':memory:') {
    this.db = new Database(dbPath);

    if (dbPath !== ':memory:') {
      // Enable WAL mode for concurrent reads
      this.db.pragma('journal_mode = WAL');
    }

    // Line items cascade with their report
    this.db.pragma('foreign_keys = ON');
    this.db.pragma('synchronous = NORMAL');
  }

  async queryOne<T>(sql: string, params: ReadonlyArray<SqlValue> = []): Promise<T | null> {
    const row = await this.statement(() => this.db.prepare(sql).get(...params) as T | undefined);
    return row ?? null;
  }

  async queryMany<T>(sql: string, params: ReadonlyArray<SqlValue> = []): Promise<ReadonlyArray<T>> {
    return this.statement(() => this.db.prepare(sql).all(...params) as T[]);
  }

  async execute(sql: string, params: ReadonlyArray<SqlValue> = []): Promise<number> {
    return this.statement(() => this.db.prepare(sql).run(...params).changes);
  }

  /**
   * Inside a transaction the statement joins it. Outside, it waits for any
   * open transaction to finish, so reads never see a half-written one.
   */
  private async statement<T>(run: () => T): Promise<T> {
    if (this.frames.getStore()) {
      return run();
    }
    return this.writeLock.runExclusive(WRITE_LOCK, async () => run());
  }

  async transaction<T>(fn: () => Promise<T>): Promise<T> {
    const frame = this.frames.getStore();
    if (frame) {
      return this.savepoint(frame.depth + 1, fn);
    }

    return this.writeLock.runExclusive(WRITE_LOCK, async () => {
      this.db.exec('BEGIN IMMEDIATE');
      try {
        const result = await this.frames.run({ depth: 0 }, fn);
        this.db.exec('COMMIT');
        return result;
      } catch (error) {
        this.db.exec('ROLLBACK');
        throw error;
      }
    });
  }

  private async savepoint<T>(depth: number, fn: () => Promise<T>): Promise<T> {
    const name = `sp_${depth}`;
    this.db.exec(`SAVEPOINT ${name}`);
    try {
      const result = await this.frames.run({ depth }, fn);
      this.db.exec(`RELEASE SAVEPOINT ${name}`);
      return result;
    } catch (error) {
      this.db.exec(`ROLLBACK TO SAVEPOINT ${name}`);
      this.db.exec(`RELEASE SAVEPOINT ${name}`);
      throw error;
    }
  }

  async initializeSchema(schemaSQL: string): Promise<void> {
    this.db.exec(schemaSQL);
  }

  async close(): Promise<void> {
    this.db.close();
  }

  /**
   * Check connection health.
   */
  async healthCheck(): Promise<boolean> {
    try {
      this.db.prepare('SELECT 1').get();
      return true;
    } catch {
      return false;
    }
  }
}
