/**
 * @description Classifies context sources as factual or contextual and orders factual kinds by citation priority.
 * @groundcheck-scope core
 * @groundcheck-module SourceLayers
 * @groundcheck-risk: high - Treating history as evidence would let the model cite itself.
 */

import type { FactualSourceKind, Grounding, ResolvedSource, SourceKind, SourceReference } from './types.js';

// Highest priority first.
export const FACTUAL_PRIORITY: readonly FactualSourceKind[] = ['FILE', 'MEMORY', 'WEB'];

export function isFactualKind(kind: SourceKind): kind is FactualSourceKind {
    return kind === 'FILE' || kind === 'MEMORY' || kind === 'WEB';
}

export function isFactualSource(source: ResolvedSource): source is ResolvedSource & { sourceKind: FactualSourceKind } {
    return isFactualKind(source.sourceKind);
}

/**
 * A source counts as used when it carries text and upstream did not rank it
 * as irrelevant.
 */
export function isUsedSource(source: ResolvedSource): boolean {
    return source.text.trim().length > 0 && source.relevance > 0;
}

export interface SeedSelection {
    confidence: number;
    grounding: Grounding;
    sourceUsed: SourceReference | null;
}

/**
 * Picks the used factual source with the highest-priority kind (the first of
 * that kind in bundle order) and seeds confidence with its prior. Without one,
 * confidence starts at 0 whatever contextual sources are present.
 */
export function selectSeedSource(sources: readonly ResolvedSource[]): SeedSelection {
    const used = sources.filter(isUsedSource);

    for (const kind of FACTUAL_PRIORITY) {
        const source = used.find((candidate) => candidate.sourceKind === kind);
        if (source) {
            return {
                confidence: source.priorConfidence,
                grounding: 'FACTUAL',
                sourceUsed: { identifier: source.identifier, sourceKind: kind }
            };
        }
    }

    return {
        confidence: 0,
        grounding: used.length > 0 ? 'CONTEXTUAL_ONLY' : 'NONE',
        sourceUsed: null
    };
}
