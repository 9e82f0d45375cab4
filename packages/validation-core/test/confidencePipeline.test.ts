/**
 * @groundcheck-module: ConfidencePipelineTests
 * @groundcheck-risk: high
 * @groundcheck-scope: test
 *
 * @description: End-to-end scoring scenarios and the properties every record must hold:
 * monotonicity, hard-veto dominance, contextual exclusion and idempotence.
 */

import test from 'node:test';
import assert from 'node:assert/strict';

import { loadCompromiseAnnotator, ModelEntityExtractor } from '../src/entities/modelExtractor.js';
import { ConfigurationError, ValidationInputError } from '../src/errors.js';
import { ConfidencePipeline } from '../src/pipeline/confidencePipeline.js';
import type { ContextBundle, SourceRecord } from '../src/types.js';
import { createTestConfig, createTestPipeline } from './fixtures.js';

const pipeline = createTestPipeline();

const bundle = (...sources: SourceRecord[]): ContextBundle => ({ sources });

test('a hard veto refuses the answer and zeroes confidence', () => {
    const record = pipeline.evaluate(
        'The capital is Paris, though I cannot confirm this with reliable sources.',
        null,
        bundle({ sourceKind: 'WEB', identifier: 'web-1', text: 'Paris is the capital of France.' })
    );

    assert.equal(record.refused, true);
    assert.equal(record.confidenceFinal, 0);
    assert.equal(record.confidenceInitial, 0.65);
    assert.equal(record.veto.level, 'HARD');
    assert.equal(record.veto.cap, 0);
    assert.deepEqual(
        record.stages.map((stage) => [stage.stage, stage.applied]),
        [['seed', true], ['hardVeto', true], ['softVeto', false], ['factualGuard', false], ['conflicts', false], ['clamp', false]]
    );
    assert.equal(record.stages[2].note, 'skipped after hard veto');
    // Analysis still runs for transparency.
    assert.deepEqual(record.verifications.map((result) => result.matchStrategy), ['EXACT']);
});

test('a clean answer grounded in a file keeps the file prior', () => {
    const record = pipeline.evaluate(
        'The supplier is Acme Corp.',
        null,
        bundle({ sourceKind: 'FILE', identifier: 'file-1', text: 'Acme Corp supplies the widgets for the project.' })
    );

    assert.equal(record.confidenceInitial, 0.99);
    assert.equal(record.confidenceFinal, 0.99);
    assert.equal(record.riskLevel, 'NONE');
    assert.equal(record.refused, false);
    assert.equal(record.grounding, 'FACTUAL');
    assert.deepEqual(record.sourceUsed, { identifier: 'file-1', sourceKind: 'FILE' });
    assert.equal(record.extractionStrategy, 'pattern');
    assert.deepEqual(record.uncertaintyFlags, []);
    assert.deepEqual(record.sourceBreakdown, [
        {
            identifier: 'file-1',
            sourceKind: 'FILE',
            factual: true,
            priorConfidence: 0.99,
            relevance: 1,
            used: true,
            verifiedEntityCount: 1
        }
    ]);
});

test('a soft veto and four unverified entities over a web source score 0.5', () => {
    const record = pipeline.evaluate(
        'The summit will probably include Zenith Labs, Orion Partners, Kestrel Group and Halcyon Works.',
        null,
        bundle({ sourceKind: 'WEB', identifier: 'web-1', text: 'The summit agenda is still being finalized by organizers.' })
    );

    assert.equal(record.confidenceInitial, 0.65);
    assert.equal(record.veto.level, 'SOFT');
    assert.equal(record.riskLevel, 'MED');
    assert.deepEqual(record.factualGuard.unverifiedEntities, ['Zenith Labs', 'Orion Partners', 'Kestrel Group', 'Halcyon Works']);
    assert.equal(record.confidenceFinal, 0.5);
    assert.deepEqual(
        record.stages.map((stage) => stage.after),
        [0.65, 0.65, 0.6, 0.5, 0.5, 0.5]
    );
});

test('the compromise extractor scores the four-organization answer the same as patterns', async () => {
    const modelPipeline = new ConfidencePipeline({
        config: createTestConfig(),
        extractor: new ModelEntityExtractor(await loadCompromiseAnnotator())
    });
    const record = modelPipeline.evaluate(
        'The summit will probably include Zenith Labs, Orion Partners, Kestrel Group and Halcyon Works.',
        null,
        bundle({ sourceKind: 'WEB', identifier: 'web-1', text: 'The summit agenda is still being finalized by organizers.' })
    );

    assert.equal(record.extractionStrategy, 'model');
    assert.equal(record.riskLevel, 'MED');
    assert.equal(record.confidenceFinal, 0.5);
});

test('a hard veto in the reasoning alone refuses a confident answer', () => {
    const record = pipeline.evaluate(
        'Acme Corp definitely supplies the widgets.',
        'I cannot confirm who the supplier is.',
        bundle({ sourceKind: 'FILE', identifier: 'file-1', text: 'Acme Corp supplies the widgets.' })
    );

    assert.equal(record.refused, true);
    assert.equal(record.confidenceFinal, 0);
    assert.equal(record.veto.level, 'HARD');
    assert.deepEqual(record.veto.signals, [{ phrase: 'cannot confirm', level: 'HARD', origin: 'reasoning' }]);
    assert.equal(record.veto.toneContradiction, true);
});

test('thresholds come from the configuration passed to the pipeline', () => {
    const config = createTestConfig();
    config.veto.softCap = 0.3;
    const strict = createTestPipeline(config);

    const record = strict.evaluate(
        'The summit will probably include Zenith Labs.',
        null,
        bundle({ sourceKind: 'WEB', identifier: 'web-1', text: 'The summit includes Zenith Labs.' })
    );
    assert.equal(record.confidenceFinal, 0.3);
});

test('contextual sources alone never seed confidence', () => {
    const record = pipeline.evaluate(
        'Acme Corp makes widgets.',
        null,
        bundle(
            { sourceKind: 'HISTORY', identifier: 'history-1', text: 'Acme Corp makes widgets.' },
            { sourceKind: 'FOLLOW_UP', identifier: 'follow-up-1', text: 'What does Acme Corp make?' }
        )
    );

    assert.equal(record.confidenceInitial, 0);
    assert.equal(record.confidenceFinal, 0);
    assert.equal(record.grounding, 'CONTEXTUAL_ONLY');
    assert.equal(record.sourceUsed, null);
    assert.equal(record.verifications[0].verified, false);
    assert.deepEqual(record.uncertaintyFlags, [
        {
            aspect: 'Selected source (none) has low confidence',
            confidence: 0,
            suggestedActions: ['search_web', 'ask_user']
        }
    ]);

    assert.equal(pipeline.evaluate('Acme Corp makes widgets.', null, bundle()).grounding, 'NONE');
});

test('the highest-priority used factual source seeds confidence', () => {
    const withFile = pipeline.evaluate(
        'Acme Corp makes widgets.',
        null,
        bundle(
            { sourceKind: 'MEMORY', identifier: 'memory-1', text: 'Acme Corp makes widgets.' },
            { sourceKind: 'FILE', identifier: 'file-1', text: 'Acme Corp makes widgets.' }
        )
    );
    assert.deepEqual(withFile.sourceUsed, { identifier: 'file-1', sourceKind: 'FILE' });
    assert.equal(withFile.confidenceInitial, 0.99);

    const emptyFile = pipeline.evaluate(
        'Acme Corp makes widgets.',
        null,
        bundle(
            { sourceKind: 'FILE', identifier: 'file-1', text: '   ' },
            { sourceKind: 'MEMORY', identifier: 'memory-1', text: 'Acme Corp makes widgets.' }
        )
    );
    assert.deepEqual(emptyFile.sourceUsed, { identifier: 'memory-1', sourceKind: 'MEMORY' });
    assert.equal(emptyFile.confidenceInitial, 0.85);
});

test('conflicting factual sources reduce confidence after the caps', () => {
    const record = pipeline.evaluate(
        'Acme Corp was founded in 1999.',
        null,
        bundle(
            { sourceKind: 'FILE', identifier: 'file-1', text: 'Acme Corp was founded in 1999.' },
            { sourceKind: 'MEMORY', identifier: 'memory-1', text: 'Acme Corp was founded in 2001.' }
        )
    );

    assert.equal(record.sourceConflicts.length, 1);
    assert.equal(record.conflictReduction, 0.1);
    assert.equal(record.confidenceFinal, 0.89);
});

test('final confidence never exceeds initial confidence', () => {
    const answers = [
        'Acme Corp was founded in 1999.',
        'It is definitely Acme Corp, probably.',
        'Zenith Labs, Orion Partners and Kestrel Group signed with Acme Corp in March 2020.'
    ];
    const contexts = [
        bundle({ sourceKind: 'FILE', identifier: 'file-1', text: 'Acme Corp was founded in 1999.' }),
        bundle({ sourceKind: 'WEB', identifier: 'web-1', text: 'Zenith Labs signed in March 2020.' }),
        bundle({ sourceKind: 'HISTORY', identifier: 'history-1', text: 'Acme Corp.' })
    ];

    for (const answer of answers) {
        for (const context of contexts) {
            const record = pipeline.evaluate(answer, 'Some reasoning.', context);
            assert.ok(record.confidenceFinal <= record.confidenceInitial);
            assert.ok(record.confidenceFinal >= 0);
        }
    }
});

test('any hard phrase forces refusal regardless of grounding', () => {
    for (const phrase of createTestConfig().veto.hardPhrases) {
        const record = pipeline.evaluate(
            `Acme Corp supplies the widgets, but there is ${phrase} here.`,
            null,
            bundle({ sourceKind: 'FILE', identifier: 'file-1', text: 'Acme Corp supplies the widgets.' })
        );
        assert.equal(record.refused, true, phrase);
        assert.equal(record.confidenceFinal, 0, phrase);
    }
});

test('identical inputs produce identical, frozen records', () => {
    const context = bundle(
        { sourceKind: 'FILE', identifier: 'file-1', text: 'Acme Corp was founded in 1999.' },
        { sourceKind: 'WEB', identifier: 'web-1', text: 'Acme Corp was founded in 2001.' }
    );
    const first = pipeline.evaluate('Acme Corp was probably founded in 1999.', 'Two sources.', context);
    const second = pipeline.evaluate('Acme Corp was probably founded in 1999.', 'Two sources.', context);

    assert.equal(JSON.stringify(first), JSON.stringify(second));
    assert.ok(Object.isFrozen(first));
    assert.ok(Object.isFrozen(first.veto.signals));
    assert.ok(Object.isFrozen(first.stages[0]));
});

test('malformed input is rejected with every issue listed', () => {
    assert.throws(
        () => pipeline.evaluate('   ', null, bundle()),
        (error: unknown) => error instanceof ValidationInputError
            && error.issues.length === 1
            && error.issues[0] === 'answer: answer must not be empty'
    );

    assert.throws(
        () => pipeline.evaluate('Acme Corp.', null, bundle(
            { sourceKind: 'FILE', identifier: 'dup', text: 'one' },
            { sourceKind: 'WEB', identifier: 'dup', text: 'two', priorConfidence: 0.5 }
        )),
        (error: unknown) => error instanceof ValidationInputError
            && error.issues.length === 2
            && error.issues[0] === 'context.sources.1.identifier: duplicate identifier "dup"'
            && error.issues[1] === 'context.sources.1.priorConfidence: WEB prior is fixed at 0.65, got 0.5'
    );

    assert.throws(
        () => pipeline.evaluate('Acme Corp.', null, { sources: [{ sourceKind: 'RUMOR', identifier: 'x', text: 'y' }] }),
        ValidationInputError
    );
    assert.throws(() => pipeline.evaluate('Acme Corp.', null, null), ValidationInputError);
});

test('an invalid configuration is rejected at construction', () => {
    const config = createTestConfig();
    config.factualGuard.caps.HIGH = 0.9;

    assert.throws(
        () => createTestPipeline(config),
        (error: unknown) => error instanceof ConfigurationError
            && error.issues.includes('factualGuard.caps: caps must satisfy HIGH <= MED <= LOW')
    );
});
