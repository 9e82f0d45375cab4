/**
 * @description Flags what a scored answer may be unsure about: a weak final confidence or hedging words in the answer.
 * @groundcheck-scope core
 * @groundcheck-module UncertaintyDetector
 * @groundcheck-risk: low - Flags qualify an answer; they never change its score.
 */

import type { ValidationConfig } from './config.js';
import type { SourceReference, SuggestedAction, UncertaintyFlag } from './types.js';

export type UncertaintyConfig = ValidationConfig['uncertainty'];

const SUGGESTED_ACTIONS: readonly SuggestedAction[] = ['search_web', 'ask_user'];

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

export class UncertaintyDetector {
    private readonly hedges: ReadonlyArray<{ phrase: string; pattern: RegExp }>;

    constructor(private readonly config: UncertaintyConfig) {
        this.hedges = [...new Set(config.phrases.map((phrase) => phrase.toLowerCase()))].map((phrase) => ({
            phrase,
            pattern: new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegExp(phrase)}(?![\\p{L}\\p{N}])`, 'iu')
        }));
    }

    /**
     * At most two flags, low confidence first. Hedges are whole words or
     * phrases, so "assume" matches but "assumed" does not.
     */
    detect(answer: string, sourceUsed: SourceReference | null, confidence: number): UncertaintyFlag[] {
        const flags: UncertaintyFlag[] = [];

        if (confidence < this.config.confidenceThreshold) {
            flags.push({
                aspect: `Selected source (${sourceUsed?.identifier ?? 'none'}) has low confidence`,
                confidence,
                suggestedActions: [...SUGGESTED_ACTIONS]
            });
        }

        const text = answer.replace(/’/g, "'");
        const found = this.hedges.filter(({ pattern }) => pattern.test(text)).map(({ phrase }) => phrase);
        if (found.length > 0) {
            flags.push({
                aspect: `Response contains uncertainty language (${found.join(', ')})`,
                confidence: this.config.languageConfidence,
                suggestedActions: [...SUGGESTED_ACTIONS]
            });
        }

        return flags;
    }
}
