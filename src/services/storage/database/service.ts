/**
 * ExampleDatabase class for all example store persistence
 *
 * Wraps one better-sqlite3 connection. Each process opens its own
 * connection; WAL mode lets readers proceed while examples are appended.
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import type { Example, ExampleCounters, ExampleFilter } from '../../../models/example.js';
import type { FeedbackRecord } from '../../../models/feedback.js';
import { initializeDatabase, verifySchema } from '../migrations/index.js';
import * as exampleOps from './example-operations.js';
import * as feedbackOps from './feedback-operations.js';
import { getQualityStats } from './stats-operations.js';
import { DatabaseError, DatabaseErrorCode, type QualityStats } from './types.js';

export class ExampleDatabase {
  private readonly db: Database.Database;
  private readonly path: string;

  private constructor(db: Database.Database, path: string) {
    this.db = db;
    this.path = path;
  }

  /**
   * Open (creating if needed) the database file at `dbPath` and bring the
   * schema up to date. `:memory:` opens a private in-memory database.
   *
   * @throws DatabaseError if the file cannot be opened
   * @throws MigrationError if schema initialization fails
   */
  static open(dbPath: string): ExampleDatabase {
    if (dbPath !== ':memory:') {
      const dir = dirname(dbPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true, mode: 0o700 });
      }
    }

    let db: Database.Database;
    try {
      db = new Database(dbPath);
    } catch (error) {
      throw new DatabaseError(
        `Failed to open database at ${dbPath}: ${String(error)}`,
        DatabaseErrorCode.PERMISSION_DENIED,
        error
      );
    }

    try {
      initializeDatabase(db);
    } catch (error) {
      db.close();
      throw error;
    }

    return new ExampleDatabase(db, dbPath);
  }

  close(): void {
    try {
      this.db.pragma('optimize');
    } catch (error) {
      console.error(
        '[ExampleDatabase] pragma optimize failed:',
        error instanceof Error ? error.message : String(error)
      );
    }
    this.db.close();
  }

  isOpen(): boolean {
    return this.db.open;
  }

  getPath(): string {
    return this.path;
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  getConnection(): Database.Database {
    return this.db;
  }

  verifySchema(): ReturnType<typeof verifySchema> {
    return verifySchema(this.db);
  }

  // ==================== EXAMPLE OPERATIONS ====================

  insertExample(example: Example): string {
    return exampleOps.insertExample(this.db, example);
  }

  insertExampleIfAbsent(example: Example): boolean {
    return exampleOps.insertExampleIfAbsent(this.db, example);
  }

  getExample(id: string): Example | null {
    return exampleOps.getExample(this.db, id);
  }

  getExampleCounters(id: string): ExampleCounters | null {
    return exampleOps.getCounters(this.db, id);
  }

  compareAndSetCounters(
    id: string,
    expectedVersion: number,
    counters: { usage_count: number; success_count: number; last_used_at: string | null }
  ): boolean {
    return exampleOps.compareAndSetCounters(this.db, id, expectedVersion, counters);
  }

  listActiveExamplesByField(domainCategory: string, variant: string, fieldName: string): Example[] {
    return exampleOps.listActiveByField(this.db, domainCategory, variant, fieldName);
  }

  listRetrievalCandidates(domainCategory: string, variant: string, fieldNames: string[]): Example[] {
    return exampleOps.listRetrievalCandidates(this.db, domainCategory, variant, fieldNames);
  }

  findExampleByContext(fieldName: string, contextHash: string): Example | null {
    return exampleOps.findByContext(this.db, fieldName, contextHash);
  }

  listExamples(filter?: ExampleFilter): Example[] {
    return exampleOps.listExamples(this.db, filter);
  }

  scanExamplePage(afterRowid: number, limit: number): Array<{ rowid: number; example: Example }> {
    return exampleOps.scanPage(this.db, afterRowid, limit);
  }

  setExampleEmbedding(id: string, vector: Float32Array, model: string): boolean {
    return exampleOps.setEmbedding(this.db, id, vector, model);
  }

  setExampleDeprioritized(id: string, deprioritized: boolean): boolean {
    return exampleOps.setDeprioritized(this.db, id, deprioritized);
  }

  listExampleFieldNames(): string[] {
    return exampleOps.listFieldNames(this.db);
  }

  // ==================== FEEDBACK OPERATIONS ====================

  insertFeedback(record: FeedbackRecord): string {
    return feedbackOps.insertFeedback(this.db, record);
  }

  getFeedback(id: string): FeedbackRecord | null {
    return feedbackOps.getFeedback(this.db, id);
  }

  listFeedbackByField(fieldName: string, limit?: number): FeedbackRecord[] {
    return feedbackOps.listFeedbackByField(this.db, fieldName, limit);
  }

  // ==================== STATISTICS ====================

  getQualityStats(): QualityStats {
    return getQualityStats(this.db);
  }
}
