/**
 * @description Heuristic detection of factual sources that assert different dates, amounts or figures for the same subject.
 * @groundcheck-scope core
 * @groundcheck-module SourceConflictDetector
 * @groundcheck-risk: moderate - False conflicts shave confidence off well-grounded answers; missed ones overstate it.
 *
 * A subject is any non-value entity the injected extractor finds in a
 * sentence. Values that follow it, up to the next subject in the same
 * sentence, are taken as that subject's assertions.
 */

import { findDates, findMoney, findNumbers, findPercentages, type PatternMatch } from './entities/patterns.js';
import { isFactualSource, isUsedSource } from './sources.js';
import { splitSentences } from './text.js';
import type {
    ConflictValueKind,
    Entity,
    EntityExtractor,
    ResolvedSource,
    SourceConflict,
    SourceConflictDetector
} from './types.js';

interface ValueMatch extends PatternMatch {
    kind: ConflictValueKind;
}

interface SubjectAssertions {
    subject: string;
    values: Map<ConflictValueKind, Set<string>>;
}

type SourceAssertions = Map<string, SubjectAssertions>;

const VALUE_KINDS: readonly ConflictValueKind[] = ['DATE', 'MONEY', 'PERCENT', 'NUMBER'];
const KIND_PRIORITY: Record<ConflictValueKind, number> = { DATE: 0, MONEY: 1, PERCENT: 2, NUMBER: 3 };

const MONTHS: Record<string, number> = {
    jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6, jul: 7, aug: 8, sep: 9, oct: 10, nov: 11, dec: 12
};

const MAGNITUDES: Record<string, number> = {
    thousand: 1e3, k: 1e3, million: 1e6, m: 1e6, billion: 1e9, bn: 1e9, b: 1e9, trillion: 1e12
};

const CURRENCIES: Record<string, string> = {
    '$': '$', usd: '$', dollars: '$',
    '€': '€', eur: '€', euros: '€',
    '£': '£', gbp: '£', pounds: '£',
    '¥': '¥', jpy: '¥'
};

export class HeuristicConflictDetector implements SourceConflictDetector {
    constructor(
        private readonly extractor: EntityExtractor,
        private readonly reductionPerConflict: number
    ) {}

    detect(sources: ResolvedSource[]): SourceConflict[] {
        const factual = sources.filter((source) => isFactualSource(source) && isUsedSource(source));
        const assertions = factual.map((source) => this.collectAssertions(source.text));
        const conflicts: SourceConflict[] = [];

        for (let left = 0; left < factual.length; left++) {
            for (let right = left + 1; right < factual.length; right++) {
                conflicts.push(...this.compare(factual[left], assertions[left], factual[right], assertions[right]));
            }
        }

        return conflicts;
    }

    private compare(
        leftSource: ResolvedSource,
        leftAssertions: SourceAssertions,
        rightSource: ResolvedSource,
        rightAssertions: SourceAssertions
    ): SourceConflict[] {
        const conflicts: SourceConflict[] = [];
        const sharedSubjects = [...leftAssertions.keys()].filter((key) => rightAssertions.has(key)).sort();

        for (const key of sharedSubjects) {
            const left = leftAssertions.get(key);
            const right = rightAssertions.get(key);
            if (!left || !right) {
                continue;
            }

            for (const kind of VALUE_KINDS) {
                const leftValues = left.values.get(kind);
                const rightValues = right.values.get(kind);
                if (!leftValues || !rightValues || [...leftValues].some((value) => rightValues.has(value))) {
                    continue;
                }

                conflicts.push({
                    sources: [leftSource.identifier, rightSource.identifier],
                    subject: left.subject,
                    valueKind: kind,
                    values: {
                        [leftSource.identifier]: [...leftValues],
                        [rightSource.identifier]: [...rightValues]
                    },
                    reason: `${leftSource.identifier} and ${rightSource.identifier} disagree on the ${kind.toLowerCase()} for "${left.subject}": `
                        + `${[...leftValues].join(', ')} vs ${[...rightValues].join(', ')}`,
                    confidenceReduction: this.reductionPerConflict
                });
            }
        }

        return conflicts;
    }

    private collectAssertions(text: string): SourceAssertions {
        const assertions: SourceAssertions = new Map();

        for (const sentence of splitSentences(text)) {
            const subjects = this.extractor
                .extract(sentence.text)
                .filter((entity) => entity.label !== 'DATE' && entity.label !== 'MONEY');
            if (subjects.length === 0) {
                continue;
            }
            const values = findValues(sentence.text);

            subjects.forEach((subject, index) => {
                const windowStart = subject.offset + subject.text.length;
                const windowEnd = index + 1 < subjects.length ? subjects[index + 1].offset : sentence.text.length;
                const asserted = firstValuePerKind(values, windowStart, windowEnd);
                if (asserted.size > 0) {
                    record(assertions, subject, asserted);
                }
            });
        }

        return assertions;
    }
}

function record(assertions: SourceAssertions, subject: Entity, asserted: Map<ConflictValueKind, string>): void {
    const key = subject.text.toLowerCase();
    let entry = assertions.get(key);
    if (!entry) {
        entry = { subject: subject.text, values: new Map() };
        assertions.set(key, entry);
    }

    for (const [kind, value] of asserted) {
        const existing = entry.values.get(kind);
        if (existing) {
            existing.add(value);
        } else {
            entry.values.set(kind, new Set([value]));
        }
    }
}

function firstValuePerKind(values: ValueMatch[], windowStart: number, windowEnd: number): Map<ConflictValueKind, string> {
    const asserted = new Map<ConflictValueKind, string>();
    for (const value of values) {
        if (value.start >= windowStart && value.end <= windowEnd && !asserted.has(value.kind)) {
            asserted.set(value.kind, normalizeValue(value));
        }
    }
    return asserted;
}

/**
 * All values in a sentence, non-overlapping. Where matches overlap the
 * earliest, then longest, then most specific kind wins, so "$5 million" is
 * money and "2024" is a date rather than a bare number.
 */
export function findValues(text: string): ValueMatch[] {
    const tagged = (matches: PatternMatch[], kind: ConflictValueKind): ValueMatch[] =>
        matches.map((match) => ({ ...match, kind }));

    const ordered = [
        ...tagged(findDates(text), 'DATE'),
        ...tagged(findMoney(text), 'MONEY'),
        ...tagged(findPercentages(text), 'PERCENT'),
        ...tagged(findNumbers(text), 'NUMBER')
    ].sort((left, right) =>
        left.start - right.start
        || (right.end - right.start) - (left.end - left.start)
        || KIND_PRIORITY[left.kind] - KIND_PRIORITY[right.kind]
    );

    const accepted: ValueMatch[] = [];
    let coveredUntil = 0;
    for (const match of ordered) {
        if (match.start >= coveredUntil) {
            accepted.push(match);
            coveredUntil = match.end;
        }
    }
    return accepted;
}

export function normalizeValue(value: ValueMatch): string {
    const text = value.text.replace(/,/g, '').replace(/\s+/g, ' ').trim();
    switch (value.kind) {
        case 'MONEY':
            return normalizeMoney(text);
        case 'PERCENT':
            return `${formatNumber(parseFloat(text))}%`;
        case 'NUMBER':
            return formatNumber(parseFloat(text));
        case 'DATE':
            return normalizeDate(text);
    }
}

function normalizeMoney(text: string): string {
    const lower = text.toLowerCase();
    const amount = /\d+(?:\.\d+)?/.exec(lower);
    if (!amount) {
        return lower;
    }

    const currencyToken = /^[$€£¥]|^(?:usd|eur|gbp|jpy)\b|\b(?:usd|eur|gbp|jpy|dollars|euros|pounds)$/.exec(lower);
    const currency = currencyToken ? CURRENCIES[currencyToken[0]] ?? '' : '';
    const magnitudeToken = /\d\s?(thousand|million|billion|trillion|bn|k|m|b)\b/.exec(lower);
    const multiplier = magnitudeToken ? MAGNITUDES[magnitudeToken[1]] ?? 1 : 1;

    return `${currency}${formatNumber(parseFloat(amount[0]) * multiplier)}`;
}

function normalizeDate(text: string): string {
    const lower = text.toLowerCase().replace(/(\d)(?:st|nd|rd|th)\b/g, '$1').replace(/\./g, '');
    const words = lower.split(' ');
    const month = words.map(monthNumber).find((number) => number !== null) ?? null;
    const numbers = words.filter((word) => /^\d+$/.test(word));
    const year = numbers.find((word) => word.length === 4);
    const day = numbers.find((word) => word.length <= 2);

    if (month === null) {
        return lower;
    }
    if (year && day) {
        return `${year}-${pad(month)}-${pad(Number(day))}`;
    }
    if (year) {
        return `${year}-${pad(month)}`;
    }
    if (day) {
        return `--${pad(month)}-${pad(Number(day))}`;
    }
    return lower;
}

function monthNumber(word: string): number | null {
    const month = MONTHS[word.slice(0, 3)];
    return month !== undefined && /^[a-z]+$/.test(word) ? month : null;
}

const pad = (value: number): string => String(value).padStart(2, '0');

// Rounds away float noise from magnitude multiplication.
const formatNumber = (value: number): string => String(Math.round(value * 1e6) / 1e6);
