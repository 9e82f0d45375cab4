/**
 * @description The ordered confidence stages. Each takes the running confidence and the finished analysis and returns the adjusted value.
 * @groundcheck-scope core
 * @groundcheck-module ConfidenceStages
 * @groundcheck-risk: high - Stage order is part of the scoring contract; reordering changes results.
 */

import type {
    FactualGuardAssessment,
    Grounding,
    SourceConflict,
    SourceReference,
    StageName,
    VetoScanResult
} from '../types.js';

/**
 * Everything the stages read. Produced once per evaluation before any stage
 * runs, so every field is populated even when a hard veto ends scoring early.
 */
export interface PipelineAnalysis {
    seed: {
        confidence: number;
        grounding: Grounding;
        sourceUsed: SourceReference | null;
    };
    veto: VetoScanResult & { cap: number };
    factualGuard: FactualGuardAssessment;
    sourceConflicts: SourceConflict[];
    conflictReduction: number;
}

export interface StageState {
    confidence: number;
    confidenceInitial: number;
    refused: boolean;
}

export interface StageOutcome {
    confidence: number;
    applied: boolean;
    note: string;
    refused?: boolean;
    halt?: boolean; // Remaining stages are recorded as skipped
}

export interface ConfidenceStage {
    name: StageName;
    run(state: StageState, analysis: PipelineAnalysis): StageOutcome;
}

const round = (value: number): number => Math.round(value * 1e9) / 1e9;

const capStage = (name: StageName, cap: (analysis: PipelineAnalysis) => number | null, label: string): ConfidenceStage => ({
    name,
    run: (state, analysis) => {
        const limit = cap(analysis);
        if (limit === null) {
            return { confidence: state.confidence, applied: false, note: `no ${label}` };
        }
        return {
            confidence: Math.min(state.confidence, limit),
            applied: true,
            note: `${label} cap ${limit}`
        };
    }
});

export const seedStage: ConfidenceStage = {
    name: 'seed',
    run: (_state, analysis) => {
        const { seed } = analysis;
        if (!seed.sourceUsed) {
            return { confidence: 0, applied: true, note: `no factual source used (grounding ${seed.grounding})` };
        }
        return {
            confidence: seed.confidence,
            applied: true,
            note: `prior of ${seed.sourceUsed.sourceKind} source ${seed.sourceUsed.identifier}`
        };
    }
};

export const hardVetoStage: ConfidenceStage = {
    name: 'hardVeto',
    run: (state, analysis) => {
        if (analysis.veto.level !== 'HARD') {
            return { confidence: state.confidence, applied: false, note: 'no hard veto' };
        }
        const phrases = analysis.veto.signals.map((signal) => `"${signal.phrase}"`).join(', ');
        return { confidence: 0, applied: true, note: `hard veto: ${phrases}`, refused: true, halt: true };
    }
};

export const softVetoStage = capStage(
    'softVeto',
    (analysis) => (analysis.veto.level === 'SOFT' ? analysis.veto.cap : null),
    'soft veto'
);

export const factualGuardStage = capStage(
    'factualGuard',
    (analysis) => (analysis.factualGuard.risk === 'NONE' ? null : analysis.factualGuard.cap),
    'factual risk'
);

export const conflictStage: ConfidenceStage = {
    name: 'conflicts',
    run: (state, analysis) => {
        if (analysis.sourceConflicts.length === 0) {
            return { confidence: state.confidence, applied: false, note: 'no source conflicts' };
        }
        return {
            confidence: round(Math.max(0, state.confidence - analysis.conflictReduction)),
            applied: true,
            note: `${analysis.sourceConflicts.length} source conflict(s), -${analysis.conflictReduction}`
        };
    }
};

export const clampStage: ConfidenceStage = {
    name: 'clamp',
    run: (state) => {
        const upper = Math.min(1, state.confidenceInitial);
        const clamped = Math.min(Math.max(state.confidence, 0), upper);
        return { confidence: clamped, applied: clamped !== state.confidence, note: `bounded to [0, ${upper}]` };
    }
};

export const DEFAULT_STAGES: readonly ConfidenceStage[] = [
    seedStage,
    hardVetoStage,
    softVetoStage,
    factualGuardStage,
    conflictStage,
    clampStage
];
