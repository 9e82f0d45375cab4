/**
 * @description Validates and normalizes the answer, reasoning and context bundle before any scoring runs.
 * @groundcheck-scope interface
 * @groundcheck-module EvaluationInput
 * @groundcheck-risk: high - Accepting malformed bundles could produce a confident score from nothing.
 */

import { z } from 'zod';
import type { ValidationConfig } from './config.js';
import { ValidationInputError } from './errors.js';
import type { ResolvedSource } from './types.js';

const PRIOR_TOLERANCE = 1e-9;

const probability = z.number().min(0).max(1);
const sourceKind = z.enum(['FILE', 'MEMORY', 'WEB', 'HISTORY', 'FOLLOW_UP']);

const SourceRecordSchema = z.object({
    sourceKind,
    text: z.string(),
    identifier: z.string().refine((value) => value.trim().length > 0, { message: 'identifier must not be empty' }),
    priorConfidence: probability.optional(),
    relevance: probability.optional()
});

const EvaluationInputSchema = z.object({
    answer: z.string().refine((value) => value.trim().length > 0, { message: 'answer must not be empty' }),
    reasoning: z.string().nullable().optional(),
    context: z.object({
        sources: z.array(SourceRecordSchema)
    })
});

export interface NormalizedInput {
    answer: string;
    reasoning: string | null;
    sources: ResolvedSource[];
}

/**
 * Checks the raw call arguments and resolves each source's prior and
 * relevance against the configuration.
 *
 * @throws ValidationInputError with one issue per problem found
 */
export function normalizeEvaluationInput(
    answer: unknown,
    reasoning: unknown,
    context: unknown,
    config: ValidationConfig
): NormalizedInput {
    const result = EvaluationInputSchema.safeParse({ answer, reasoning, context });
    if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new ValidationInputError('Invalid evaluation input', issues);
    }

    const issues: string[] = [];
    const seen = new Set<string>();
    const sources = result.data.context.sources.map((source, index): ResolvedSource => {
        if (seen.has(source.identifier)) {
            issues.push(`context.sources.${index}.identifier: duplicate identifier "${source.identifier}"`);
        }
        seen.add(source.identifier);

        const configuredPrior = config.priors[source.sourceKind];
        if (
            source.priorConfidence !== undefined
            && Math.abs(source.priorConfidence - configuredPrior) > PRIOR_TOLERANCE
        ) {
            issues.push(
                `context.sources.${index}.priorConfidence: ${source.sourceKind} prior is fixed at ${configuredPrior}, got ${source.priorConfidence}`
            );
        }

        return {
            sourceKind: source.sourceKind,
            text: source.text,
            identifier: source.identifier,
            priorConfidence: configuredPrior,
            relevance: source.relevance ?? 1
        };
    });

    if (issues.length > 0) {
        throw new ValidationInputError('Invalid evaluation input', issues);
    }

    return {
        answer: result.data.answer,
        reasoning: result.data.reasoning ?? null,
        sources
    };
}
