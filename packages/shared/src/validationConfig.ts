/**
 * @groundcheck-module: ValidationConfigLoader
 * @groundcheck-risk: moderate
 * @groundcheck-scope: utility
 *
 * @description: Loads the scoring configuration from YAML and validates it against the core schema.
 * The bundled defaults live in config/validation.yaml; operators can point
 * VALIDATION_CONFIG_PATH at a replacement file.
 */

import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import yaml from 'js-yaml';
import { ConfigurationError, parseValidationConfig, type ValidationConfig } from 'validation-core';
import { logger } from './logger.js';

const configLogger = logger.child({ module: 'validationConfig' });

export const DEFAULT_VALIDATION_CONFIG_PATH = fileURLToPath(new URL('../config/validation.yaml', import.meta.url));

export function resolveValidationConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.VALIDATION_CONFIG_PATH?.trim();
  return override ? path.resolve(override) : DEFAULT_VALIDATION_CONFIG_PATH;
}

/**
 * Reads and validates a configuration file.
 *
 * @throws ConfigurationError when the file is missing, is not valid YAML or fails the schema
 */
export function loadValidationConfig(filePath: string = resolveValidationConfigPath()): ValidationConfig {
  if (!fs.existsSync(filePath)) {
    throw new ConfigurationError(`Validation configuration file not found: ${filePath}`);
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Validation configuration is not valid YAML: ${filePath}`, [reason]);
  }

  const config = parseValidationConfig(parsed, filePath);
  configLogger.info(`Loaded validation configuration from ${filePath}`);
  return config;
}
