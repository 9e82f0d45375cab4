/**
 * @description Maps the number of unverified entities to a risk level and a confidence cap.
 * @groundcheck-scope core
 * @groundcheck-module FactualGuard
 * @groundcheck-risk: high - Caps are the only thing stopping unverified specifics from scoring high.
 */

import type { ValidationConfig } from './config.js';
import type { FactualGuardAssessment, RiskLevel, VerificationResult } from './types.js';

export type FactualGuardConfig = ValidationConfig['factualGuard'];

export function riskForCount(unverified: number, thresholds: FactualGuardConfig['thresholds']): RiskLevel {
    if (unverified >= thresholds.high) {
        return 'HIGH';
    }
    if (unverified >= thresholds.medium) {
        return 'MED';
    }
    return unverified > 0 ? 'LOW' : 'NONE';
}

/**
 * Counts unverified results and caps confidence accordingly. Excluded
 * entities count as verified.
 */
export function assessFactualGuard(
    verifications: readonly VerificationResult[],
    config: FactualGuardConfig
): FactualGuardAssessment {
    const unverifiedEntities = verifications
        .filter((result) => !result.verified)
        .map((result) => result.entity.text);
    const risk = riskForCount(unverifiedEntities.length, config.thresholds);

    return {
        risk,
        unverifiedEntities,
        cap: risk === 'NONE' ? 1 : config.caps[risk]
    };
}
