/**
 * @description Regex rules for dates, money, acronyms and bare values, plus the capitalized-word stoplist.
 * @groundcheck-scope utility
 * @groundcheck-module EntityPatterns
 * @groundcheck-risk: moderate - Over-eager patterns inflate unverified counts and cap good answers.
 */

import fs from 'node:fs';
import { fileURLToPath } from 'node:url';

export interface PatternMatch {
    text: string;
    start: number;
    end: number;
}

const MONTH = '(?:January|February|March|April|May|June|July|August|September|October|November|December|Jan|Feb|Mar|Apr|Jun|Jul|Aug|Sept|Sep|Oct|Nov|Dec)';
const WEEKDAY = '(?:Monday|Tuesday|Wednesday|Thursday|Friday|Saturday|Sunday)';
const AMOUNT = '\\d[\\d,]*(?:\\.\\d+)?';
const MAGNITUDE = '(?:million|billion|trillion|thousand|bn|[MBK])';

// "May" alone is too often the modal verb; it only counts inside a full date.
const BARE_MONTH = '(?:January|February|March|April|June|July|August|September|October|November|December)';

const DATE_PATTERNS: readonly RegExp[] = [
    new RegExp(`\\b${MONTH}\\.?\\s+\\d{1,2}(?:st|nd|rd|th)?(?:,?\\s+\\d{4})?\\b`, 'g'),
    new RegExp(`\\b\\d{1,2}(?:st|nd|rd|th)?\\s+${MONTH}(?:\\s+\\d{4})?\\b`, 'g'),
    new RegExp(`\\b${MONTH}\\s+\\d{4}\\b`, 'g'),
    /\b\d{4}-\d{2}-\d{2}\b/g,
    /\b\d{1,2}\/\d{1,2}\/\d{2,4}\b/g,
    new RegExp(`\\b${WEEKDAY}\\b`, 'g'),
    new RegExp(`\\b${BARE_MONTH}\\b`, 'g'),
    /\b(?:1\d|20)\d{2}\b/g
];

const MONEY_PATTERNS: readonly RegExp[] = [
    new RegExp(`[$€£¥]\\s?${AMOUNT}(?:\\s?${MAGNITUDE})?\\b`, 'g'),
    new RegExp(`\\b(?:USD|EUR|GBP|JPY)\\s?${AMOUNT}(?:\\s?${MAGNITUDE})?\\b`, 'g'),
    new RegExp(`\\b${AMOUNT}\\s?(?:${MAGNITUDE}\\s)?(?:USD|EUR|GBP|JPY|dollars|euros|pounds)\\b`, 'g')
];

const PERCENT_PATTERN = new RegExp(`\\b${AMOUNT}\\s?(?:%|percent\\b)`, 'g');
const NUMBER_PATTERN = new RegExp(`\\b${AMOUNT}\\b`, 'g');
const ACRONYM_PATTERN = /\b[A-Z]{2,6}s?\b/g;

// Capitalized words, optionally camel-cased or hyphenated ("McDonald", "Jean-Luc").
const CAPITALIZED_TOKEN = '\\p{Lu}\\p{Ll}+(?:\\p{Lu}\\p{Ll}+)*(?:-\\p{Lu}\\p{Ll}+)*';
export const CAPITALIZED_SPAN = new RegExp(
    `(?<![\\p{L}\\p{N}])${CAPITALIZED_TOKEN}(?:[ \\t]+${CAPITALIZED_TOKEN})*(?![\\p{L}\\p{N}])`,
    'gu'
);
export const CAPITALIZED_WORD = new RegExp(CAPITALIZED_TOKEN, 'gu');

const CALENDAR_WORDS = new Set([
    'january', 'february', 'march', 'april', 'may', 'june', 'july', 'august',
    'september', 'october', 'november', 'december',
    'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday'
]);

function loadStopwords(): Set<string> {
    const filePath = fileURLToPath(new URL('../../data/capitalized-stopwords.json', import.meta.url));
    const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    if (!Array.isArray(parsed) || !parsed.every((entry): entry is string => typeof entry === 'string')) {
        throw new Error(`Stopword list at ${filePath} must be an array of strings.`);
    }
    return new Set(parsed.map((entry) => entry.toLowerCase()));
}

const STOPWORDS = loadStopwords();

/**
 * True for words that are capitalized by position or convention rather than
 * because they name something: sentence starters, pronouns, demonyms and
 * calendar words (handled by the date rules).
 */
export function isStopword(word: string): boolean {
    const lower = word.toLowerCase();
    return STOPWORDS.has(lower) || CALENDAR_WORDS.has(lower);
}

export function matchAll(text: string, patterns: readonly RegExp[]): PatternMatch[] {
    const matches: PatternMatch[] = [];
    for (const pattern of patterns) {
        for (const match of text.matchAll(pattern)) {
            const start = match.index ?? 0;
            matches.push({ text: match[0], start, end: start + match[0].length });
        }
    }
    return matches;
}

export const findDates = (text: string): PatternMatch[] => matchAll(text, DATE_PATTERNS);
export const findMoney = (text: string): PatternMatch[] => matchAll(text, MONEY_PATTERNS);
export const findPercentages = (text: string): PatternMatch[] => matchAll(text, [PERCENT_PATTERN]);
export const findNumbers = (text: string): PatternMatch[] => matchAll(text, [NUMBER_PATTERN]);
export const findAcronyms = (text: string): PatternMatch[] => matchAll(text, [ACRONYM_PATTERN]);
