/**
 * @description Pattern-based entity extraction. Always available; used whenever the NLP model cannot be loaded.
 * @groundcheck-scope core
 * @groundcheck-module PatternEntityExtractor
 * @groundcheck-risk: moderate - Missed entities let hallucinated names through unchecked.
 */

import type { Entity, EntityExtractor } from '../types.js';
import { capitalizedSpanCandidates, patternCandidates, resolveCandidates } from './candidates.js';

export class PatternEntityExtractor implements EntityExtractor {
    readonly strategy = 'pattern' as const;

    extract(text: string): Entity[] {
        if (!text) {
            return [];
        }

        return resolveCandidates([...patternCandidates(text), ...capitalizedSpanCandidates(text)]);
    }
}
