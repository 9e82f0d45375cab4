/**
 * @description Resolves the entity extraction strategy once at startup, degrading to patterns when the model is unavailable.
 * @groundcheck-scope core
 * @groundcheck-module ExtractorSelection
 * @groundcheck-risk: low - Fallback is always available; only extraction quality changes.
 */

import type { EntityExtractor, ValidationLogger } from '../types.js';
import { loadCompromiseAnnotator, ModelEntityExtractor, type NlpAnnotator } from './modelExtractor.js';
import { PatternEntityExtractor } from './patternExtractor.js';

export interface ExtractorSelectionOptions {
    preferModel: boolean;
    loadAnnotator?: () => Promise<NlpAnnotator>;
    logger?: ValidationLogger;
}

const SAMPLE_TEXT = 'Ada Lovelace worked with Charles Babbage in London.';

export async function selectEntityExtractor({
    preferModel,
    loadAnnotator = loadCompromiseAnnotator,
    logger
}: ExtractorSelectionOptions): Promise<EntityExtractor> {
    if (!preferModel) {
        logger?.info('Entity extraction: pattern mode (model disabled by configuration)');
        return new PatternEntityExtractor();
    }

    try {
        const annotate = await loadAnnotator();
        // A model that loads but cannot annotate is as unavailable as one that fails to load.
        annotate(SAMPLE_TEXT);
        logger?.info('Entity extraction: model mode (compromise)');
        return new ModelEntityExtractor(annotate);
    } catch (error) {
        logger?.warn(
            `Entity model unavailable; using pattern-based extraction: ${error instanceof Error ? error.message : String(error)}`
        );
        return new PatternEntityExtractor();
    }
}
