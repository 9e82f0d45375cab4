/**
 * @groundcheck-module: VetoScannerTests
 * @groundcheck-risk: high
 * @groundcheck-scope: test
 */

import test from 'node:test';
import assert from 'node:assert/strict';

import { VetoScanner } from '../src/vetoScanner.js';
import { createTestConfig } from './fixtures.js';

const scanner = new VetoScanner(createTestConfig().veto);

test('a hard phrase in the answer is a HARD veto, case-insensitively', () => {
    assert.deepEqual(scanner.scan('I CANNOT CONFIRM this figure.'), {
        level: 'HARD',
        signals: [{ phrase: 'cannot confirm', level: 'HARD', origin: 'answer' }],
        toneContradiction: false
    });
});

test('hard signals take precedence and soft signals are not reported alongside them', () => {
    const result = scanner.scan('It is probably fine, but I cannot verify it.');
    assert.equal(result.level, 'HARD');
    assert.deepEqual(result.signals, [{ phrase: 'cannot verify', level: 'HARD', origin: 'answer' }]);
});

test('a soft phrase in the reasoning alone is a SOFT veto', () => {
    const result = scanner.scan('Acme Corp supplies the widgets.', 'This is probably right.');
    assert.equal(result.level, 'SOFT');
    assert.deepEqual(result.signals, [{ phrase: 'probably', level: 'SOFT', origin: 'reasoning' }]);
});

test('a phrase found in both texts is attributed to the answer', () => {
    const result = scanner.scan('This is only a guess.', 'My guess is based on memory.');
    assert.deepEqual(result.signals, [{ phrase: 'guess', level: 'SOFT', origin: 'answer' }]);
});

test('signals follow vocabulary order', () => {
    const result = scanner.scan('This estimate is speculation.');
    assert.deepEqual(result.signals.map((signal) => signal.phrase), ['speculation', 'estimate']);
});

test('confident answers over hedged reasoning are flagged as a tone contradiction', () => {
    const result = scanner.scan('It is definitely Acme Corp.', 'I am not sure about the supplier.');
    assert.equal(result.level, 'SOFT');
    assert.equal(result.toneContradiction, true);
});

test('text without veto phrases scans clean', () => {
    assert.deepEqual(scanner.scan('Acme Corp supplies the widgets.', null), {
        level: 'NONE',
        signals: [],
        toneContradiction: false
    });
});
