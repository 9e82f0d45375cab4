import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import type { ConfidenceRecord } from 'validation-core';
import type { ConfidenceRecordStore } from './confidenceStore.js';
import { assertValidConfidenceRecord } from './confidenceStoreUtils.js';
import { logger } from './logger.js';

const BUSY_MAX_ATTEMPTS = 5;
const BUSY_RETRY_DELAY_MS = 50;

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

const sqliteLogger = logger.child({ module: 'sqliteConfidenceStore' });

export interface SqliteConfidenceStoreConfig {
  dbPath: string;
}

interface UpsertParams {
  response_id: string;
  record_json: string;
  confidence_final: number;
  refused: number;
  created_at: string;
  updated_at: string;
}

export class SqliteConfidenceStore implements ConfidenceRecordStore {
  private readonly db: Database.Database;
  private readonly upsertStatement: Database.Statement<[UpsertParams]>;
  private readonly retrieveStatement: Database.Statement<[string], { record_json: string }>;
  private readonly deleteStatement: Database.Statement<[string]>;

  constructor(config: SqliteConfidenceStoreConfig) {
    const resolvedPath = path.resolve(config.dbPath);
    // Ensure the parent directory exists before opening the database.
    fs.mkdirSync(path.dirname(resolvedPath), { recursive: true });

    this.db = new Database(resolvedPath);
    this.db.pragma('journal_mode = WAL');

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS confidence_records (
        response_id TEXT PRIMARY KEY,
        record_json TEXT NOT NULL,
        confidence_final REAL NOT NULL,
        refused INTEGER NOT NULL,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_confidence_records_refused ON confidence_records (refused);
    `);

    this.upsertStatement = this.db.prepare<[UpsertParams]>(`
      INSERT INTO confidence_records (response_id, record_json, confidence_final, refused, created_at, updated_at)
      VALUES (@response_id, @record_json, @confidence_final, @refused, @created_at, @updated_at)
      ON CONFLICT(response_id) DO UPDATE SET
        record_json = excluded.record_json,
        confidence_final = excluded.confidence_final,
        refused = excluded.refused,
        updated_at = excluded.updated_at
    `);
    this.retrieveStatement = this.db.prepare<[string], { record_json: string }>(
      `SELECT record_json FROM confidence_records WHERE response_id = ? LIMIT 1`
    );
    this.deleteStatement = this.db.prepare<[string]>(`DELETE FROM confidence_records WHERE response_id = ?`);

    sqliteLogger.info(`Initialized SQLite confidence store at ${resolvedPath}`);
  }

  private isBusyError(error: unknown): boolean {
    if (!(error instanceof Error) || !('code' in error)) {
      return false;
    }
    return error.code === 'SQLITE_BUSY' || error.code === 'SQLITE_LOCKED';
  }

  private async withRetry<T>(operation: () => T): Promise<T> {
    for (let attempt = 1; attempt <= BUSY_MAX_ATTEMPTS; attempt++) {
      try {
        return operation();
      } catch (error) {
        if (this.isBusyError(error) && attempt < BUSY_MAX_ATTEMPTS) {
          await sleep(BUSY_RETRY_DELAY_MS * attempt);
          continue;
        }
        throw error;
      }
    }

    throw new Error('Failed to execute SQLite operation after retries.');
  }

  async upsert(responseId: string, record: ConfidenceRecord): Promise<void> {
    const now = new Date().toISOString();

    await this.withRetry(() =>
      this.upsertStatement.run({
        response_id: responseId,
        record_json: JSON.stringify(record),
        confidence_final: record.confidenceFinal,
        refused: record.refused ? 1 : 0,
        created_at: now,
        updated_at: now
      })
    );
    sqliteLogger.debug(`Confidence record stored: ${responseId}`);
  }

  async retrieve(responseId: string): Promise<ConfidenceRecord | null> {
    const row = await this.withRetry(() => this.retrieveStatement.get(responseId));
    if (!row) {
      return null;
    }

    const parsed: unknown = JSON.parse(row.record_json);
    assertValidConfidenceRecord(parsed, responseId);
    return parsed;
  }

  async delete(responseId: string): Promise<void> {
    await this.withRetry(() => this.deleteStatement.run(responseId));
  }

  close(): void {
    this.db.close();
  }
}
