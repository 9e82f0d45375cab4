/**
 * @description: Public exports for validation-core: the confidence pipeline, its components and record types.
 * @groundcheck-scope: interface
 * @groundcheck-module: ValidationCoreIndex
 * @groundcheck-risk: low - Export changes can break downstream imports.
 */

// Types
export type {
    ConfidenceRecord,
    ConflictValueKind,
    ContextBundle,
    Entity,
    EntityExtractor,
    EntityLabel,
    ExtractionStrategyName,
    FactualGuardAssessment,
    FactualSourceKind,
    Grounding,
    MatchStrategy,
    ResolvedSource,
    RiskLevel,
    SourceBreakdownEntry,
    SourceConflict,
    SourceConflictDetector,
    SourceKind,
    SourceRecord,
    SourceReference,
    StageName,
    StageTrace,
    SuggestedAction,
    UncertaintyFlag,
    ValidationLogger,
    VerificationResult,
    VetoLevel,
    VetoScanResult,
    VetoSignal
} from './types.js';

// Configuration and errors
export { parseValidationConfig, ValidationConfigSchema, type ValidationConfig } from './config.js';
export { ConfigurationError, ValidationInputError } from './errors.js';

// Components
export { PatternEntityExtractor } from './entities/patternExtractor.js';
export { ModelEntityExtractor, loadCompromiseAnnotator, type NlpAnnotation, type NlpAnnotator } from './entities/modelExtractor.js';
export { selectEntityExtractor, type ExtractorSelectionOptions } from './entities/selectExtractor.js';
export { FuzzyEntityMatcher, type FuzzyMatcherOptions } from './matcher.js';
export { assessFactualGuard, riskForCount } from './factualGuard.js';
export { VetoScanner } from './vetoScanner.js';
export { HeuristicConflictDetector } from './conflictDetector.js';
export { UncertaintyDetector, type UncertaintyConfig } from './uncertainty.js';
export { isFactualKind, isUsedSource, selectSeedSource } from './sources.js';

// Pipeline
export {
    ConfidencePipeline,
    createConfidencePipeline,
    type ConfidencePipelineOptions
} from './pipeline/confidencePipeline.js';
export { DEFAULT_STAGES, type ConfidenceStage, type PipelineAnalysis, type StageOutcome, type StageState } from './pipeline/stages.js';
