/**
 * @groundcheck-module: FuzzyEntityMatcherTests
 * @groundcheck-risk: high
 * @groundcheck-scope: test
 *
 * @description: Verifies strategy precedence and the factual-only source rule.
 */

import test from 'node:test';
import assert from 'node:assert/strict';

import { FuzzyEntityMatcher } from '../src/matcher.js';
import type { Entity } from '../src/types.js';
import { resolvedSource } from './fixtures.js';

const matcher = new FuzzyEntityMatcher({ minEntityLength: 3 });
const entity = (text: string, label: Entity['label'] = 'ORG'): Entity => ({ text, label, offset: 0 });

test('verbatim text matches EXACT', () => {
    const result = matcher.verify(entity('Acme Corp'), [resolvedSource('FILE', 'file-1', 'Acme Corp supplies widgets.')]);
    assert.deepEqual(result, {
        entity: entity('Acme Corp'),
        verified: true,
        matchedSource: 'file-1',
        matchStrategy: 'EXACT'
    });
});

test('case differences match PARTIAL', () => {
    const result = matcher.verify(entity('ACME CORP'), [resolvedSource('FILE', 'file-1', 'Acme Corp supplies widgets.')]);
    assert.equal(result.matchStrategy, 'PARTIAL');
    assert.equal(result.verified, true);
});

test('a plural entity matches its singular in the source via STEM', () => {
    const result = matcher.verify(entity('APIs', 'OTHER'), [resolvedSource('WEB', 'web-1', 'The public API is documented.')]);
    assert.equal(result.matchStrategy, 'STEM');
    assert.equal(result.matchedSource, 'web-1');
});

test('an acronym matches its capitalized expansion and the reverse', () => {
    const expansion = matcher.verify(entity('FBI'), [
        resolvedSource('FILE', 'file-1', 'The Federal Bureau of Investigation opened a case.')
    ]);
    assert.equal(expansion.matchStrategy, 'ACRONYM');

    const reverse = matcher.verify(entity('World Health Organization'), [
        resolvedSource('MEMORY', 'memory-1', 'The WHO issued guidance.')
    ]);
    assert.equal(reverse.matchStrategy, 'ACRONYM');
    assert.equal(reverse.matchedSource, 'memory-1');
});

test('a stronger strategy in a later source beats a weaker one in an earlier source', () => {
    const result = matcher.verify(entity('Acme Corp'), [
        resolvedSource('FILE', 'file-1', 'acme corp is a supplier.'),
        resolvedSource('WEB', 'web-1', 'Acme Corp is a supplier.')
    ]);
    assert.equal(result.matchStrategy, 'EXACT');
    assert.equal(result.matchedSource, 'web-1');
});

test('contextual sources never verify an entity', () => {
    const result = matcher.verify(entity('Acme Corp'), [
        resolvedSource('HISTORY', 'history-1', 'Earlier you said Acme Corp makes widgets.'),
        resolvedSource('FOLLOW_UP', 'follow-up-1', 'Tell me more about Acme Corp.')
    ]);
    assert.deepEqual(result, {
        entity: entity('Acme Corp'),
        verified: false,
        matchedSource: null,
        matchStrategy: 'NONE'
    });
});

test('factual sources ranked irrelevant are not evidence', () => {
    const result = matcher.verify(entity('Acme Corp'), [
        resolvedSource('FILE', 'file-1', 'Acme Corp supplies widgets.', 0),
        resolvedSource('WEB', 'web-1', 'Widgets are made by ACME CORP.', 0.4)
    ]);
    assert.equal(result.matchedSource, 'web-1');
    assert.equal(result.matchStrategy, 'PARTIAL');
});

test('entities below the minimum length are excluded and count as verified', () => {
    const result = matcher.verify(entity('AI', 'OTHER'), []);
    assert.equal(result.matchStrategy, 'EXCLUDED');
    assert.equal(result.verified, true);
    assert.equal(result.matchedSource, null);
});
