/**
 * @description Word tokenization, sentence splitting and suffix-stripping stems shared by the matcher and the conflict detector.
 * @groundcheck-scope utility
 * @groundcheck-module TextUtils
 * @groundcheck-risk: low - Tokenization quirks shift individual matches, not the scoring rules.
 */

export interface Token {
    word: string;  // Lowercased
    raw: string;
    start: number;
}

export interface Sentence {
    text: string;
    start: number;
}

const WORD_REGEX = /[\p{L}\p{N}]+/gu;
const SENTENCE_BOUNDARY = /[.!?]+(?=\s)|\n+/g;

export function tokenize(text: string): Token[] {
    const tokens: Token[] = [];
    for (const match of text.matchAll(WORD_REGEX)) {
        tokens.push({ word: match[0].toLowerCase(), raw: match[0], start: match.index ?? 0 });
    }
    return tokens;
}

/**
 * Splits on sentence punctuation followed by whitespace and on line breaks.
 * Decimal points ("3.5") do not end a sentence.
 */
export function splitSentences(text: string): Sentence[] {
    const sentences: Sentence[] = [];
    let cursor = 0;

    for (const match of text.matchAll(SENTENCE_BOUNDARY)) {
        const end = (match.index ?? 0) + match[0].length;
        pushSentence(sentences, text.slice(cursor, end), cursor);
        cursor = end;
    }
    pushSentence(sentences, text.slice(cursor), cursor);

    return sentences;
}

function pushSentence(sentences: Sentence[], chunk: string, offset: number): void {
    const leading = chunk.length - chunk.trimStart().length;
    const trimmed = chunk.trim();
    if (trimmed.length > 0) {
        sentences.push({ text: trimmed, start: offset + leading });
    }
}

/**
 * All forms a word may take once a plural suffix is stripped:
 * "companies" -> company, "boxes" -> box, "apis" -> api.
 */
export function stemVariants(word: string): Set<string> {
    const lower = word.toLowerCase();
    const variants = new Set<string>([lower]);

    if (lower.endsWith('ies') && lower.length > 4) {
        variants.add(`${lower.slice(0, -3)}y`);
    }
    if (lower.endsWith('es') && lower.length > 3) {
        variants.add(lower.slice(0, -2));
    }
    if (lower.endsWith('s') && !lower.endsWith('ss') && lower.length > 2) {
        variants.add(lower.slice(0, -1));
    }

    return variants;
}

export function sharesStem(left: string, right: string): boolean {
    const leftVariants = stemVariants(left);
    for (const variant of stemVariants(right)) {
        if (leftVariants.has(variant)) {
            return true;
        }
    }
    return false;
}
