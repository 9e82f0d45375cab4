/**
 * @description Public exports for shared utilities: logging, scoring configuration and confidence record storage.
 * @groundcheck-scope interface
 * @groundcheck-module SharedIndex
 * @groundcheck-risk: low - Export changes can break downstream imports.
 */

/**
 * Logging utilities.
 */
export { logger, sanitizeLogData, MAX_LOGGED_STRING_LENGTH } from './logger.js';

/**
 * Scoring configuration loaded from YAML.
 */
export {
  DEFAULT_VALIDATION_CONFIG_PATH,
  loadValidationConfig,
  resolveValidationConfigPath
} from './validationConfig.js';

/**
 * Confidence record storage for persisting and retrieving scored responses.
 */
export * from './confidenceStore.js';
export { SqliteConfidenceStore } from './sqliteConfidenceStore.js';
export type { SqliteConfidenceStoreConfig } from './sqliteConfidenceStore.js';
