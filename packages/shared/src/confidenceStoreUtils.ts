/**
 * @groundcheck-module: ConfidenceStoreUtils
 * @groundcheck-risk: moderate
 * @groundcheck-scope: utility
 *
 * @description
 * Shape check for stored confidence records. Split out to avoid circular
 * imports between the store factory and the SQLite backend.
 */

import type { ConfidenceRecord } from 'validation-core';

const RISK_LEVELS = new Set(['NONE', 'LOW', 'MED', 'HIGH']);
const GROUNDINGS = new Set(['FACTUAL', 'CONTEXTUAL_ONLY', 'NONE']);

const isObject = (value: unknown): value is Record<string, unknown> =>
  value !== null && typeof value === 'object' && !Array.isArray(value);

function invalidRecord(responseId: string, problem: string): never {
  throw new Error(`Confidence record "${responseId}" is invalid (${problem}).`);
}

export function assertValidConfidenceRecord(
  value: unknown,
  responseId: string
): asserts value is ConfidenceRecord {
  // Fail fast on unexpected shapes so a corrupted row is never served as an explanation.
  const fail = (problem: string) => invalidRecord(responseId, problem);

  if (!isObject(value)) {
    invalidRecord(responseId, 'expected object');
  }

  for (const field of ['confidenceInitial', 'confidenceFinal', 'conflictReduction'] as const) {
    const score = value[field];
    if (typeof score !== 'number' || score < 0 || score > 1) {
      fail(`${field} must be a number between 0 and 1`);
    }
  }

  if (typeof value.refused !== 'boolean') {
    fail('refused must be boolean');
  }
  if (typeof value.riskLevel !== 'string' || !RISK_LEVELS.has(value.riskLevel)) {
    fail('unknown riskLevel');
  }
  if (typeof value.grounding !== 'string' || !GROUNDINGS.has(value.grounding)) {
    fail('unknown grounding');
  }
  if (value.extractionStrategy !== 'model' && value.extractionStrategy !== 'pattern') {
    fail('unknown extractionStrategy');
  }
  if (!isObject(value.veto) || !Array.isArray(value.veto.signals)) {
    fail('veto signals missing');
  }
  if (!isObject(value.factualGuard)) {
    fail('factualGuard missing');
  }

  for (const field of ['verifications', 'sourceConflicts', 'sourceBreakdown', 'uncertaintyFlags', 'stages'] as const) {
    if (!Array.isArray(value[field])) {
      fail(`${field} must be an array`);
    }
  }
}
