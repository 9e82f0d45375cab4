/**
 * @description Decides whether an answer entity is supported by a factual source using exact, partial, stem and acronym matching.
 * @groundcheck-scope core
 * @groundcheck-module FuzzyEntityMatcher
 * @groundcheck-risk: high - A lenient match hides hallucinations; a strict one caps correct answers.
 */

import { isFactualSource, isUsedSource } from './sources.js';
import { sharesStem, tokenize, type Token } from './text.js';
import type { Entity, MatchStrategy, ResolvedSource, VerificationResult } from './types.js';

export interface FuzzyMatcherOptions {
    minEntityLength: number;
}

interface PreparedSource {
    source: ResolvedSource;
    lowerText: string;
    tokens: Token[];
    rawTokens: Set<string>;
}

type StrategyTest = (entity: Entity, prepared: PreparedSource) => boolean;

// Words an expansion may skip without breaking the acronym ("Bureau of Investigation").
const MINOR_WORDS = new Set(['of', 'and', 'the', 'for', 'to', 'in', 'on', 'at', 'a', 'an', 'de', 'la', 'du', 'von', 'van']);
const ACRONYM_ENTITY = /^[A-Z]{2,6}$/;

const exact: StrategyTest = (entity, prepared) => prepared.source.text.includes(entity.text);

const partial: StrategyTest = (entity, prepared) => prepared.lowerText.includes(entity.text.toLowerCase());

const stem: StrategyTest = (entity, prepared) => {
    const words = tokenize(entity.text).map((token) => token.word);
    const tokens = prepared.tokens;
    if (words.length === 0) {
        return false;
    }

    for (let start = 0; start + words.length <= tokens.length; start++) {
        if (words.every((word, offset) => sharesStem(word, tokens[start + offset].word))) {
            return true;
        }
    }
    return false;
};

const acronym: StrategyTest = (entity, prepared) => {
    if (ACRONYM_ENTITY.test(entity.text)) {
        return expansionInSource(entity.text.toLowerCase(), prepared.tokens);
    }

    const initials = acronymOf(entity.text);
    return initials !== null && (prepared.rawTokens.has(initials) || prepared.rawTokens.has(`${initials}s`));
};

const STRATEGIES: ReadonlyArray<{ name: Exclude<MatchStrategy, 'NONE' | 'EXCLUDED'>; test: StrategyTest }> = [
    { name: 'EXACT', test: exact },
    { name: 'PARTIAL', test: partial },
    { name: 'STEM', test: stem },
    { name: 'ACRONYM', test: acronym }
];

/**
 * True when consecutive capitalized source words spell the letters, allowing
 * minor words in between.
 */
function expansionInSource(letters: string, tokens: Token[]): boolean {
    for (let start = 0; start < tokens.length; start++) {
        let letter = 0;
        let index = start;
        while (letter < letters.length && index < tokens.length) {
            const token = tokens[index];
            if (token.word[0] === letters[letter] && isCapitalized(token.raw)) {
                letter++;
                index++;
            } else if (letter > 0 && MINOR_WORDS.has(token.word)) {
                index++;
            } else {
                break;
            }
        }
        if (letter === letters.length) {
            return true;
        }
    }
    return false;
}

function acronymOf(text: string): string | null {
    const words = tokenize(text).filter((token) => !MINOR_WORDS.has(token.word));
    if (words.length < 2 || words.length > 6) {
        return null;
    }
    return words.map((token) => token.raw[0].toUpperCase()).join('');
}

const isCapitalized = (word: string): boolean => word[0] !== word[0].toLowerCase();

export class FuzzyEntityMatcher {
    private readonly minEntityLength: number;
    private readonly prepared = new WeakMap<ResolvedSource, PreparedSource>();

    constructor(options: FuzzyMatcherOptions) {
        this.minEntityLength = options.minEntityLength;
    }

    /**
     * Verifies one entity against the factual sources. Strategies are tried in
     * priority order and, within a strategy, sources in bundle order; the first
     * hit wins. Contextual sources are never consulted, nor are factual ones
     * that are empty or ranked irrelevant (relevance 0).
     */
    verify(entity: Entity, sources: readonly ResolvedSource[]): VerificationResult {
        if (entity.text.length < this.minEntityLength) {
            return { entity, verified: true, matchedSource: null, matchStrategy: 'EXCLUDED' };
        }

        const candidates = sources
            .filter((source) => isFactualSource(source) && isUsedSource(source))
            .map((source) => this.prepare(source));

        for (const strategy of STRATEGIES) {
            for (const prepared of candidates) {
                if (strategy.test(entity, prepared)) {
                    return {
                        entity,
                        verified: true,
                        matchedSource: prepared.source.identifier,
                        matchStrategy: strategy.name
                    };
                }
            }
        }

        return { entity, verified: false, matchedSource: null, matchStrategy: 'NONE' };
    }

    verifyAll(entities: readonly Entity[], sources: readonly ResolvedSource[]): VerificationResult[] {
        return entities.map((entity) => this.verify(entity, sources));
    }

    private prepare(source: ResolvedSource): PreparedSource {
        const cached = this.prepared.get(source);
        if (cached) {
            return cached;
        }

        const tokens = tokenize(source.text);
        const prepared: PreparedSource = {
            source,
            lowerText: source.text.toLowerCase(),
            tokens,
            rawTokens: new Set(tokens.map((token) => token.raw))
        };
        this.prepared.set(source, prepared);
        return prepared;
    }
}
