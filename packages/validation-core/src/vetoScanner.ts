/**
 * @description Scans the answer and reasoning for phrases that admit missing verification (hard) or hedge (soft).
 * @groundcheck-scope core
 * @groundcheck-module VetoScanner
 * @groundcheck-risk: high - A missed hard phrase lets an answer the model itself doubted go out confidently.
 */

import type { ValidationConfig } from './config.js';
import type { VetoScanResult, VetoSignal } from './types.js';

export type VetoConfig = ValidationConfig['veto'];

export class VetoScanner {
    private readonly hardPhrases: string[];
    private readonly softPhrases: string[];
    private readonly confidentMarkers: string[];

    constructor(config: VetoConfig) {
        this.hardPhrases = dedupe(config.hardPhrases);
        this.softPhrases = dedupe(config.softPhrases);
        this.confidentMarkers = dedupe(config.confidentMarkers);
    }

    scan(answer: string, reasoning: string | null = null): VetoScanResult {
        const answerText = answer.toLowerCase();
        const reasoningText = reasoning?.toLowerCase() ?? '';

        const hard = findSignals(this.hardPhrases, 'HARD', answerText, reasoningText);
        const soft = findSignals(this.softPhrases, 'SOFT', answerText, reasoningText);

        // Checked on the raw vocabularies: a phrase shared with the answer is attributed to the answer.
        const reasoningHedges = [...this.hardPhrases, ...this.softPhrases].some((phrase) => reasoningText.includes(phrase));
        const toneContradiction = reasoningHedges
            && this.confidentMarkers.some((marker) => answerText.includes(marker));

        if (hard.length > 0) {
            return { level: 'HARD', signals: hard, toneContradiction };
        }
        if (soft.length > 0) {
            return { level: 'SOFT', signals: soft, toneContradiction };
        }
        return { level: 'NONE', signals: [], toneContradiction };
    }
}

function findSignals(
    phrases: readonly string[],
    level: VetoSignal['level'],
    answerText: string,
    reasoningText: string
): VetoSignal[] {
    const signals: VetoSignal[] = [];
    for (const phrase of phrases) {
        if (answerText.includes(phrase)) {
            signals.push({ phrase, level, origin: 'answer' });
        } else if (reasoningText.includes(phrase)) {
            signals.push({ phrase, level, origin: 'reasoning' });
        }
    }
    return signals;
}

// Lowercased, first occurrence kept, vocabulary order preserved.
function dedupe(phrases: readonly string[]): string[] {
    return [...new Set(phrases.map((phrase) => phrase.toLowerCase()))];
}
