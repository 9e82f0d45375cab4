/**
 * @description Builds entity candidates from pattern rules and capitalized spans, and resolves overlaps into a stable entity list.
 * @groundcheck-scope core
 * @groundcheck-module EntityCandidates
 * @groundcheck-risk: moderate - Unstable ordering would make confidence scores irreproducible.
 */

import type { Entity, EntityLabel } from '../types.js';
import {
    CAPITALIZED_SPAN,
    CAPITALIZED_WORD,
    findAcronyms,
    findDates,
    findMoney,
    isStopword,
    type PatternMatch
} from './patterns.js';

export interface EntityCandidate {
    text: string;
    label: EntityLabel;
    start: number;
    end: number;
    rank: number; // Lower wins when two candidates cover the same span
}

export const RANK = {
    date: 0,
    money: 1,
    name: 2,
    acronym: 3,
    // Capitalized spans backing up a model that left them untagged.
    fallbackName: 4
} as const;

const ORG_SUFFIXES = new Set([
    'corp', 'corporation', 'inc', 'ltd', 'llc', 'plc', 'co', 'company', 'group', 'holdings',
    'university', 'college', 'institute', 'school', 'hospital', 'foundation', 'bank', 'agency',
    'association', 'council', 'committee', 'commission', 'society', 'ministry', 'department',
    'labs', 'laboratories', 'systems', 'technologies', 'partners'
]);

const HONORIFIC_BEFORE = /\b(?:Mr|Mrs|Ms|Dr|Prof|Sir)\.?\s+$/;
const PLACE_PREPOSITION_BEFORE = /\b(?:in|from|near|across|throughout)\s+$/i;

const LABEL_ORDER: Record<EntityLabel, number> = {
    PERSON: 0,
    ORG: 1,
    GPE: 2,
    DATE: 3,
    MONEY: 4,
    OTHER: 5
};

const toCandidates = (matches: PatternMatch[], label: EntityLabel, rank: number): EntityCandidate[] =>
    matches.map((match) => ({ text: match.text, label, start: match.start, end: match.end, rank }));

/**
 * Dates, money and acronyms. Both extraction strategies use these rules.
 */
export function patternCandidates(text: string): EntityCandidate[] {
    return [
        ...toCandidates(findDates(text), 'DATE', RANK.date),
        ...toCandidates(findMoney(text), 'MONEY', RANK.money),
        ...toCandidates(findAcronyms(text), 'OTHER', RANK.acronym)
    ];
}

/**
 * Capitalized multi-word spans with stopwords removed. A stopword inside a
 * span splits it, so "The Acme Corp" yields "Acme Corp".
 */
export function capitalizedSpanCandidates(text: string, rank: number = RANK.name): EntityCandidate[] {
    const candidates: EntityCandidate[] = [];

    for (const span of text.matchAll(CAPITALIZED_SPAN)) {
        const spanStart = span.index ?? 0;
        let segment: Array<{ word: string; start: number; end: number }> = [];

        const flush = () => {
            if (segment.length > 0) {
                const start = segment[0].start;
                const end = segment[segment.length - 1].end;
                const words = segment.map((entry) => entry.word);
                candidates.push({
                    text: text.slice(start, end),
                    label: labelSpan(words, text.slice(0, start)),
                    start,
                    end,
                    rank
                });
            }
            segment = [];
        };

        for (const word of span[0].matchAll(CAPITALIZED_WORD)) {
            const start = spanStart + (word.index ?? 0);
            if (isStopword(word[0])) {
                flush();
                continue;
            }
            segment.push({ word: word[0], start, end: start + word[0].length });
        }
        flush();
    }

    return candidates;
}

function labelSpan(words: string[], before: string): EntityLabel {
    const last = words[words.length - 1].toLowerCase();
    if (ORG_SUFFIXES.has(last)) {
        return 'ORG';
    }
    if (HONORIFIC_BEFORE.test(before)) {
        return 'PERSON';
    }
    if (PLACE_PREPOSITION_BEFORE.test(before)) {
        return 'GPE';
    }
    return words.length > 1 ? 'PERSON' : 'OTHER';
}

/**
 * Keeps the earliest, then longest, then best-ranked candidate wherever
 * candidates overlap, drops case-insensitive duplicates (first occurrence
 * wins) and orders the result by offset, then label.
 */
export function resolveCandidates(candidates: EntityCandidate[]): Entity[] {
    const ordered = [...candidates].sort((left, right) =>
        left.start - right.start
        || (right.end - right.start) - (left.end - left.start)
        || left.rank - right.rank
        || LABEL_ORDER[left.label] - LABEL_ORDER[right.label]
    );

    const accepted: EntityCandidate[] = [];
    let coveredUntil = 0;
    for (const candidate of ordered) {
        if (candidate.start < coveredUntil) {
            continue;
        }
        accepted.push(candidate);
        coveredUntil = candidate.end;
    }

    const seen = new Set<string>();
    const entities: Entity[] = [];
    for (const candidate of accepted) {
        const key = candidate.text.toLowerCase();
        if (seen.has(key)) {
            continue;
        }
        seen.add(key);
        entities.push({ text: candidate.text, label: candidate.label, offset: candidate.start });
    }

    return entities.sort((left, right) =>
        left.offset - right.offset || LABEL_ORDER[left.label] - LABEL_ORDER[right.label]
    );
}
