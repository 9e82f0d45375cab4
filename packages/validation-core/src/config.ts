/**
 * @description Schema and parser for the validation configuration: source priors, risk caps, veto and hedging vocabularies, and heuristic constants.
 * @groundcheck-scope utility
 * @groundcheck-module ValidationConfig
 * @groundcheck-risk: moderate - A loose threshold silently inflates the confidence users see.
 */

import { z } from 'zod';
import { ConfigurationError } from './errors.js';

const probability = z.number().min(0).max(1);
const phraseList = z.array(z.string().trim().min(1));

export const ValidationConfigSchema = z
    .object({
        priors: z.object({
            FILE: probability,
            MEMORY: probability,
            WEB: probability,
            HISTORY: probability,
            FOLLOW_UP: probability
        }),
        factualGuard: z.object({
            // Unverified-entity counts at which MED and HIGH begin; 1 unverified is always LOW.
            thresholds: z.object({
                medium: z.number().int().min(2),
                high: z.number().int().min(3)
            }),
            caps: z.object({
                LOW: probability,
                MED: probability,
                HIGH: probability
            })
        }),
        veto: z.object({
            softCap: probability,
            hardPhrases: phraseList.min(1),
            softPhrases: phraseList.min(1),
            confidentMarkers: phraseList
        }),
        conflicts: z.object({
            reductionPerConflict: probability
        }),
        entities: z.object({
            minLength: z.number().int().min(1)
        }),
        uncertainty: z.object({
            // Final confidence below this raises a low-confidence flag.
            confidenceThreshold: probability,
            // Confidence reported on the flag raised by hedging words.
            languageConfidence: probability,
            phrases: phraseList
        })
    })
    .superRefine((config, ctx) => {
        const { thresholds, caps } = config.factualGuard;
        if (thresholds.medium >= thresholds.high) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['factualGuard', 'thresholds'],
                message: 'medium threshold must be below the high threshold'
            });
        }
        // Higher risk must never allow a higher cap.
        if (caps.HIGH > caps.MED || caps.MED > caps.LOW) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['factualGuard', 'caps'],
                message: 'caps must satisfy HIGH <= MED <= LOW'
            });
        }
    });

export type ValidationConfig = z.infer<typeof ValidationConfigSchema>;

/**
 * Validates an untyped configuration object (typically parsed YAML).
 *
 * @param source - Label used in error messages, such as a file path
 * @throws ConfigurationError listing every schema violation
 */
export function parseValidationConfig(value: unknown, source = 'validation config'): ValidationConfig {
    const result = ValidationConfigSchema.safeParse(value);
    if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigurationError(`Invalid ${source}`, issues);
    }

    return result.data;
}
