/**
 * @description Evaluates an answer against its context bundle and produces the immutable confidence record.
 * @groundcheck-scope core
 * @groundcheck-module ConfidencePipeline
 * @groundcheck-risk: high - This is the number users are shown; any error here is a trust error.
 *
 * Evaluation has two phases. Analysis (veto scan, entity verification,
 * factual guard, conflict detection) always runs in full so the record
 * explains itself. Scoring then runs the stage list in order, recording a
 * trace entry for every stage, including those skipped after a hard veto.
 * Uncertainty flags are raised last, against the final confidence.
 */

import { parseValidationConfig, type ValidationConfig } from '../config.js';
import { HeuristicConflictDetector } from '../conflictDetector.js';
import { assessFactualGuard } from '../factualGuard.js';
import { normalizeEvaluationInput } from '../input.js';
import { FuzzyEntityMatcher } from '../matcher.js';
import { isFactualKind, isUsedSource, selectSeedSource } from '../sources.js';
import type {
    ConfidenceRecord,
    EntityExtractor,
    ResolvedSource,
    SourceBreakdownEntry,
    SourceConflictDetector,
    StageTrace,
    ValidationLogger,
    VerificationResult
} from '../types.js';
import { UncertaintyDetector } from '../uncertainty.js';
import { VetoScanner } from '../vetoScanner.js';
import { DEFAULT_STAGES, type ConfidenceStage, type PipelineAnalysis, type StageState } from './stages.js';

export interface ConfidencePipelineOptions {
    config: unknown;
    extractor: EntityExtractor;
    matcher?: FuzzyEntityMatcher;
    vetoScanner?: VetoScanner;
    conflictDetector?: SourceConflictDetector;
    uncertaintyDetector?: UncertaintyDetector;
    stages?: readonly ConfidenceStage[];
    logger?: ValidationLogger;
}

// Records are shared with callers and stores; freezing keeps them as evaluated.
function deepFreeze<T>(value: T): T {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
    }
    return value;
}

export class ConfidencePipeline {
    readonly config: ValidationConfig;
    private readonly extractor: EntityExtractor;
    private readonly matcher: FuzzyEntityMatcher;
    private readonly vetoScanner: VetoScanner;
    private readonly conflictDetector: SourceConflictDetector;
    private readonly uncertaintyDetector: UncertaintyDetector;
    private readonly stages: readonly ConfidenceStage[];
    private readonly logger?: ValidationLogger;

    /**
     * @throws ConfigurationError when the configuration does not satisfy the schema
     */
    constructor(options: ConfidencePipelineOptions) {
        this.config = parseValidationConfig(options.config);
        this.extractor = options.extractor;
        this.matcher = options.matcher ?? new FuzzyEntityMatcher({ minEntityLength: this.config.entities.minLength });
        this.vetoScanner = options.vetoScanner ?? new VetoScanner(this.config.veto);
        this.conflictDetector = options.conflictDetector
            ?? new HeuristicConflictDetector(this.extractor, this.config.conflicts.reductionPerConflict);
        this.uncertaintyDetector = options.uncertaintyDetector ?? new UncertaintyDetector(this.config.uncertainty);
        this.stages = options.stages ?? DEFAULT_STAGES;
        this.logger = options.logger;
    }

    get extractionStrategy(): EntityExtractor['strategy'] {
        return this.extractor.strategy;
    }

    /**
     * Scores one answer and returns a frozen record. Pure apart from optional
     * debug logging: identical inputs always produce an identical record.
     * Arguments may come straight from a request body: the answer must be a
     * non-empty string, reasoning a string or null, and context a ContextBundle.
     *
     * @throws ValidationInputError when the answer or bundle is malformed
     */
    evaluate(answer: unknown, reasoning: unknown, context: unknown): ConfidenceRecord {
        const input = normalizeEvaluationInput(answer, reasoning, context, this.config);
        const { verifications, analysis } = this.analyze(input.answer, input.reasoning, input.sources);

        const state: StageState = { confidence: 0, confidenceInitial: 0, refused: false };
        const stages: StageTrace[] = [];
        let halted = false;

        for (const stage of this.stages) {
            const before = state.confidence;
            if (halted) {
                stages.push({ stage: stage.name, before, after: before, applied: false, note: 'skipped after hard veto' });
                continue;
            }

            const outcome = stage.run(state, analysis);
            state.confidence = outcome.confidence;
            if (stage.name === 'seed') {
                state.confidenceInitial = outcome.confidence;
            }
            state.refused = state.refused || outcome.refused === true;
            halted = outcome.halt === true;
            stages.push({ stage: stage.name, before, after: outcome.confidence, applied: outcome.applied, note: outcome.note });
        }

        const record: ConfidenceRecord = {
            confidenceInitial: state.confidenceInitial,
            confidenceFinal: state.confidence,
            riskLevel: analysis.factualGuard.risk,
            refused: state.refused,
            grounding: analysis.seed.grounding,
            sourceUsed: analysis.seed.sourceUsed,
            extractionStrategy: this.extractor.strategy,
            veto: {
                level: analysis.veto.level,
                signals: analysis.veto.signals,
                cap: analysis.veto.cap,
                toneContradiction: analysis.veto.toneContradiction
            },
            factualGuard: analysis.factualGuard,
            verifications,
            sourceConflicts: analysis.sourceConflicts,
            conflictReduction: analysis.conflictReduction,
            sourceBreakdown: buildSourceBreakdown(input.sources, verifications),
            uncertaintyFlags: this.uncertaintyDetector.detect(input.answer, analysis.seed.sourceUsed, state.confidence),
            stages
        };

        this.logger?.debug(
            `Confidence ${record.confidenceInitial} -> ${record.confidenceFinal} `
            + `(grounding=${record.grounding}, veto=${record.veto.level}, risk=${record.riskLevel}, `
            + `conflicts=${record.sourceConflicts.length}, uncertainties=${record.uncertaintyFlags.length}, refused=${record.refused})`
        );

        return deepFreeze(record);
    }

    private analyze(
        answer: string,
        reasoning: string | null,
        sources: ResolvedSource[]
    ): { verifications: VerificationResult[]; analysis: PipelineAnalysis } {
        const vetoScan = this.vetoScanner.scan(answer, reasoning);
        const vetoCap = vetoScan.level === 'HARD' ? 0 : vetoScan.level === 'SOFT' ? this.config.veto.softCap : 1;

        const entities = this.extractor.extract(answer);
        const verifications = this.matcher.verifyAll(entities, sources);
        const factualGuard = assessFactualGuard(verifications, this.config.factualGuard);

        const sourceConflicts = this.conflictDetector.detect(sources);
        const conflictReduction = Math.round(
            sourceConflicts.reduce((total, conflict) => total + conflict.confidenceReduction, 0) * 1e9
        ) / 1e9;

        return {
            verifications,
            analysis: {
                seed: selectSeedSource(sources),
                veto: { ...vetoScan, cap: vetoCap },
                factualGuard,
                sourceConflicts,
                conflictReduction
            }
        };
    }
}

function buildSourceBreakdown(
    sources: readonly ResolvedSource[],
    verifications: readonly VerificationResult[]
): SourceBreakdownEntry[] {
    return sources.map((source) => ({
        identifier: source.identifier,
        sourceKind: source.sourceKind,
        factual: isFactualKind(source.sourceKind),
        priorConfidence: source.priorConfidence,
        relevance: source.relevance,
        used: isUsedSource(source),
        verifiedEntityCount: verifications.filter((result) => result.matchedSource === source.identifier).length
    }));
}

export function createConfidencePipeline(options: ConfidencePipelineOptions): ConfidencePipeline {
    return new ConfidencePipeline(options);
}
