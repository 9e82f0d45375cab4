/**
 * @description Shared configuration and builders for validation-core tests.
 * @groundcheck-scope test
 */

import { PatternEntityExtractor } from '../src/entities/patternExtractor.js';
import { ConfidencePipeline } from '../src/pipeline/confidencePipeline.js';
import type { ValidationConfig } from '../src/config.js';
import type { ResolvedSource, SourceKind } from '../src/types.js';

export function createTestConfig(): ValidationConfig {
    return {
        priors: { FILE: 0.99, MEMORY: 0.85, WEB: 0.65, HISTORY: 0, FOLLOW_UP: 0 },
        factualGuard: {
            thresholds: { medium: 3, high: 6 },
            caps: { LOW: 0.6, MED: 0.5, HIGH: 0.4 }
        },
        veto: {
            softCap: 0.6,
            hardPhrases: ['cannot confirm', 'cannot verify', 'cannot determine', 'no reliable source', 'no evidence', 'conflicting sources', 'sources disagree'],
            softPhrases: ['uncertain', 'speculation', 'probably', 'likely', 'not sure', 'estimate', 'guess', 'assumption', 'inferred', 'low confidence'],
            confidentMarkers: ['definitely', 'clearly', 'certainly', 'without doubt']
        },
        conflicts: { reductionPerConflict: 0.1 },
        entities: { minLength: 3 },
        uncertainty: {
            confidenceThreshold: 0.5,
            languageConfidence: 0.6,
            phrases: ['might', 'could', 'possibly', 'unclear', 'assume', "i'm not sure", 'uncertain', 'confusing']
        }
    };
}

export function createTestPipeline(config: ValidationConfig = createTestConfig()): ConfidencePipeline {
    return new ConfidencePipeline({ config, extractor: new PatternEntityExtractor() });
}

const PRIORS: Record<SourceKind, number> = { FILE: 0.99, MEMORY: 0.85, WEB: 0.65, HISTORY: 0, FOLLOW_UP: 0 };

export function resolvedSource(sourceKind: SourceKind, identifier: string, text: string, relevance = 1): ResolvedSource {
    return { sourceKind, identifier, text, priorConfidence: PRIORS[sourceKind], relevance };
}
