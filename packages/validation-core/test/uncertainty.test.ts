/**
 * @groundcheck-module: UncertaintyDetectorTests
 * @groundcheck-risk: low
 * @groundcheck-scope: test
 *
 * @description: Covers low-confidence and hedging-language flags.
 */

import test from 'node:test';
import assert from 'node:assert/strict';

import { UncertaintyDetector } from '../src/uncertainty.js';
import { createTestConfig } from './fixtures.js';

const detector = new UncertaintyDetector(createTestConfig().uncertainty);

test('a confident, well-scored answer raises no flags', () => {
    assert.deepEqual(
        detector.detect('Acme Corp supplies the widgets.', { identifier: 'file-1', sourceKind: 'FILE' }, 0.99),
        []
    );
});

test('low confidence and hedging words each raise a flag', () => {
    assert.deepEqual(detector.detect('It might be Acme Corp, but I’m not sure.', null, 0.3), [
        {
            aspect: 'Selected source (none) has low confidence',
            confidence: 0.3,
            suggestedActions: ['search_web', 'ask_user']
        },
        {
            aspect: "Response contains uncertainty language (might, i'm not sure)",
            confidence: 0.6,
            suggestedActions: ['search_web', 'ask_user']
        }
    ]);
});

test('hedges match whole words only and the threshold is exclusive', () => {
    const source = { identifier: 'web-1', sourceKind: 'WEB' } as const;
    assert.deepEqual(detector.detect('The assumed value came from Acme Corp.', source, 0.5), []);
    assert.equal(detector.detect('Could Acme Corp be the supplier?', source, 0.5)[0].aspect,
        'Response contains uncertainty language (could)');
});
