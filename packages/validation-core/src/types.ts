/**
 * @description Defines the records exchanged by the answer-validation pipeline: sources, entities, vetoes, conflicts and the confidence record.
 * @groundcheck-scope interface
 * @groundcheck-module ValidationCoreTypes
 * @groundcheck-risk: low - Type drift can break downstream assumptions or validations.
 */

/**
 * Where a piece of context came from.
 * - FILE, MEMORY, WEB: factual sources, citable as evidence
 * - HISTORY, FOLLOW_UP: contextual sources, used for continuity only
 */
export type SourceKind = 'FILE' | 'MEMORY' | 'WEB' | 'HISTORY' | 'FOLLOW_UP';

export type FactualSourceKind = Extract<SourceKind, 'FILE' | 'MEMORY' | 'WEB'>;

/**
 * One retrieved piece of context, as assembled upstream.
 */
export interface SourceRecord {
    sourceKind: SourceKind;
    text: string;
    identifier: string;
    priorConfidence?: number; // Fixed per kind; filled in from configuration when omitted
    relevance?: number;       // 0.0–1.0, defaults to 1
}

/**
 * A source after input validation: prior and relevance are always present.
 */
export interface ResolvedSource {
    sourceKind: SourceKind;
    text: string;
    identifier: string;
    priorConfidence: number;
    relevance: number;
}

export interface ContextBundle {
    sources: SourceRecord[];
}

export type EntityLabel = 'PERSON' | 'ORG' | 'GPE' | 'DATE' | 'MONEY' | 'OTHER';

export interface Entity {
    text: string;
    label: EntityLabel;
    offset: number; // Character index of the first occurrence
}

export type ExtractionStrategyName = 'model' | 'pattern';

/**
 * Capability interface for entity extraction. The concrete variant is chosen
 * once at startup and injected wherever entities are needed.
 */
export interface EntityExtractor {
    readonly strategy: ExtractionStrategyName;
    extract(text: string): Entity[];
}

export type MatchStrategy = 'EXACT' | 'PARTIAL' | 'STEM' | 'ACRONYM' | 'NONE' | 'EXCLUDED';

export interface VerificationResult {
    entity: Entity;
    verified: boolean;
    matchedSource: string | null;
    matchStrategy: MatchStrategy;
}

export type RiskLevel = 'NONE' | 'LOW' | 'MED' | 'HIGH';

export interface FactualGuardAssessment {
    risk: RiskLevel;
    unverifiedEntities: string[];
    cap: number; // 1.0 when risk is NONE
}

export type VetoLevel = 'HARD' | 'SOFT' | 'NONE';

export interface VetoSignal {
    phrase: string;
    level: Exclude<VetoLevel, 'NONE'>;
    origin: 'answer' | 'reasoning';
}

export interface VetoScanResult {
    level: VetoLevel;
    signals: VetoSignal[];
    // Reasoning hedges while the answer sounds certain. Reported, never scored.
    toneContradiction: boolean;
}

export type ConflictValueKind = 'DATE' | 'MONEY' | 'PERCENT' | 'NUMBER';

export interface SourceConflict {
    sources: [string, string];
    subject: string;
    valueKind: ConflictValueKind;
    values: Record<string, string[]>; // identifier -> values asserted by that source
    reason: string;
    confidenceReduction: number;
}

export interface SourceConflictDetector {
    detect(sources: ResolvedSource[]): SourceConflict[];
}

export type Grounding = 'FACTUAL' | 'CONTEXTUAL_ONLY' | 'NONE';

export interface SourceReference {
    identifier: string;
    sourceKind: FactualSourceKind;
}

export interface SourceBreakdownEntry {
    identifier: string;
    sourceKind: SourceKind;
    factual: boolean;
    priorConfidence: number;
    relevance: number;
    used: boolean;
    verifiedEntityCount: number;
}

export type SuggestedAction = 'search_web' | 'ask_user';

/**
 * Something the answer may be unsure about, and what could settle it.
 */
export interface UncertaintyFlag {
    aspect: string;
    confidence: number;
    suggestedActions: SuggestedAction[];
}

export type StageName = 'seed' | 'hardVeto' | 'softVeto' | 'factualGuard' | 'conflicts' | 'clamp';

export interface StageTrace {
    stage: StageName;
    before: number;
    after: number;
    applied: boolean;
    note: string;
}

/**
 * The complete, immutable outcome of one validation call. Callers persist it
 * alongside the chat message and forward it to the client.
 */
export interface ConfidenceRecord {
    confidenceInitial: number;
    confidenceFinal: number;
    riskLevel: RiskLevel;
    refused: boolean;
    grounding: Grounding;
    sourceUsed: SourceReference | null;
    extractionStrategy: ExtractionStrategyName;
    veto: {
        level: VetoLevel;
        signals: VetoSignal[];
        cap: number;
        toneContradiction: boolean;
    };
    factualGuard: FactualGuardAssessment;
    verifications: VerificationResult[];
    sourceConflicts: SourceConflict[];
    conflictReduction: number;
    sourceBreakdown: SourceBreakdownEntry[];
    uncertaintyFlags: UncertaintyFlag[];
    stages: StageTrace[];
}

/**
 * Minimal logging surface the core writes to. A winston logger satisfies it.
 */
export interface ValidationLogger {
    debug(message: string, ...meta: unknown[]): unknown;
    info(message: string, ...meta: unknown[]): unknown;
    warn(message: string, ...meta: unknown[]): unknown;
}
