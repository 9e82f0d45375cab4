/**
 * @description Statistical entity extraction backed by the compromise NLP library. Dates, money and acronyms still come from
 * the pattern rules, and capitalized spans the model leaves untagged are kept at a lower rank.
 * @groundcheck-scope core
 * @groundcheck-module ModelEntityExtractor
 * @groundcheck-risk: moderate - Model tagging errors change which entities are verified.
 */

import type { Entity, EntityExtractor, EntityLabel } from '../types.js';
import { capitalizedSpanCandidates, patternCandidates, RANK, resolveCandidates, type EntityCandidate } from './candidates.js';
import { isStopword } from './patterns.js';

export interface NlpAnnotation {
    people: string[];
    organizations: string[];
    places: string[];
}

/**
 * Runs the loaded model over a text. The model itself is read-only after
 * loading, so one annotator is shared across concurrent calls.
 */
export type NlpAnnotator = (text: string) => NlpAnnotation;

const EDGE_PUNCTUATION = /^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu;
// The tagger returns "Zenith Labs, Orion Partners and Kestrel Group" as one match.
const LIST_SEPARATOR = /\s*[,;]\s*|\s+(?:and|&)\s+/;
const LEADING_HONORIFICS = /^(?:(?:Mr|Mrs|Ms|Mx|Dr|Prof|Sir|Dame|Rev)\.?\s+)+/i;

/**
 * Splits a tagged phrase into the names it lists and strips titles, so
 * "Dr. Elena Marquez" is checked as "Elena Marquez".
 */
export function splitTaggedPhrase(phrase: string): string[] {
    return phrase
        .split(LIST_SEPARATOR)
        .map((term) => term.replace(EDGE_PUNCTUATION, '').replace(LEADING_HONORIFICS, ''))
        .filter((term) => term.length > 0 && !isStopword(term));
}

export class ModelEntityExtractor implements EntityExtractor {
    readonly strategy = 'model' as const;

    constructor(private readonly annotate: NlpAnnotator) {}

    extract(text: string): Entity[] {
        if (!text) {
            return [];
        }

        const annotation = this.annotate(text);
        const candidates: EntityCandidate[] = [
            ...this.locate(text, annotation.people, 'PERSON'),
            ...this.locate(text, annotation.organizations, 'ORG'),
            ...this.locate(text, annotation.places, 'GPE'),
            ...patternCandidates(text),
            ...capitalizedSpanCandidates(text, RANK.fallbackName)
        ];

        return resolveCandidates(candidates);
    }

    // The model reports phrases, not offsets; anchor each at its first occurrence.
    private locate(text: string, phrases: string[], label: EntityLabel): EntityCandidate[] {
        const candidates: EntityCandidate[] = [];
        const lowerText = text.toLowerCase();

        for (const cleaned of phrases.flatMap(splitTaggedPhrase)) {
            let start = text.indexOf(cleaned);
            if (start === -1) {
                start = lowerText.indexOf(cleaned.toLowerCase());
            }
            if (start === -1) {
                continue;
            }

            candidates.push({
                text: text.slice(start, start + cleaned.length),
                label,
                start,
                end: start + cleaned.length,
                rank: RANK.name
            });
        }

        return candidates;
    }
}

const toStrings = (value: unknown): string[] =>
    Array.isArray(value) ? value.filter((entry): entry is string => typeof entry === 'string') : [];

/**
 * Loads compromise and wraps its topic tagger as an annotator.
 */
export async function loadCompromiseAnnotator(): Promise<NlpAnnotator> {
    const { default: nlp } = await import('compromise');

    return (text: string): NlpAnnotation => {
        const doc = nlp(text);
        return {
            people: toStrings(doc.people().out('array')),
            organizations: toStrings(doc.organizations().out('array')),
            places: toStrings(doc.places().out('array'))
        };
    };
}
