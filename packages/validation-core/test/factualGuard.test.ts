/**
 * @groundcheck-module: FactualGuardTests
 * @groundcheck-risk: high
 * @groundcheck-scope: test
 */

import test from 'node:test';
import assert from 'node:assert/strict';

import { assessFactualGuard } from '../src/factualGuard.js';
import type { VerificationResult } from '../src/types.js';
import { createTestConfig } from './fixtures.js';

const config = createTestConfig().factualGuard;

function results(unverified: number, verified = 0): VerificationResult[] {
    const list: VerificationResult[] = [];
    for (let index = 0; index < verified; index++) {
        list.push({
            entity: { text: `Known ${index}`, label: 'OTHER', offset: index },
            verified: true,
            matchedSource: 'file-1',
            matchStrategy: 'EXACT'
        });
    }
    for (let index = 0; index < unverified; index++) {
        list.push({
            entity: { text: `Unknown ${index}`, label: 'OTHER', offset: 100 + index },
            verified: false,
            matchedSource: null,
            matchStrategy: 'NONE'
        });
    }
    return list;
}

test('no unverified entities means no risk and no cap', () => {
    assert.deepEqual(assessFactualGuard(results(0, 4), config), { risk: 'NONE', unverifiedEntities: [], cap: 1 });
});

test('unverified counts map to LOW, MED and HIGH at the configured thresholds', () => {
    assert.equal(assessFactualGuard(results(2), config).risk, 'LOW');
    assert.equal(assessFactualGuard(results(3), config).risk, 'MED');
    assert.equal(assessFactualGuard(results(5), config).risk, 'MED');
    assert.equal(assessFactualGuard(results(6), config).risk, 'HIGH');
});

test('caps never increase as the unverified count grows', () => {
    let previous = 1;
    for (let count = 0; count <= 8; count++) {
        const { cap } = assessFactualGuard(results(count), config);
        assert.ok(cap <= previous, `cap for ${count} unverified should not exceed ${previous}`);
        previous = cap;
    }
});

test('unverified entity texts are listed in order and excluded entities do not count', () => {
    const assessment = assessFactualGuard(
        [
            ...results(2),
            { entity: { text: 'AI', label: 'OTHER', offset: 0 }, verified: true, matchedSource: null, matchStrategy: 'EXCLUDED' }
        ],
        config
    );
    assert.deepEqual(assessment, { risk: 'LOW', unverifiedEntities: ['Unknown 0', 'Unknown 1'], cap: 0.6 });
});
