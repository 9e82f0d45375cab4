/**
 * @groundcheck-module: ConfidenceStore
 * @groundcheck-risk: moderate
 * @groundcheck-scope: utility
 *
 * @description: Persistence of confidence records keyed by response id, plus the factory that picks the database path.
 *
 * @impact
 * Risk: Storage failures lose the explanation shown beside a chat message; they never change a score.
 */

import type { ConfidenceRecord } from 'validation-core';
import { assertValidConfidenceRecord } from './confidenceStoreUtils.js';
import { SqliteConfidenceStore } from './sqliteConfidenceStore.js';

export interface ConfidenceRecordStore {
  upsert(responseId: string, record: ConfidenceRecord): Promise<void>;
  retrieve(responseId: string): Promise<ConfidenceRecord | null>;
  delete(responseId: string): Promise<void>;
  close(): void;
}

export { assertValidConfidenceRecord };

const DEFAULT_DB_PATH = './data/confidence.db';

/**
 * Opens the SQLite store at CONFIDENCE_SQLITE_PATH, or ./data/confidence.db.
 *
 * @throws when the database cannot be opened; callers decide whether to run without storage
 */
export function createConfidenceStoreFromEnv(env: NodeJS.ProcessEnv = process.env): ConfidenceRecordStore {
  return new SqliteConfidenceStore({ dbPath: env.CONFIDENCE_SQLITE_PATH?.trim() || DEFAULT_DB_PATH });
}
