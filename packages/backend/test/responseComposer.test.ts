/**
 * @groundcheck-module: ResponseComposerTests
 * @groundcheck-risk: high
 * @groundcheck-scope: test
 *
 * @description: Confirms refused answers are withheld, doubtful ones are qualified and clean ones pass through.
 */

import test from 'node:test';
import assert from 'node:assert/strict';

import { DEFAULT_VALIDATION_CONFIG_PATH, loadValidationConfig } from '@groundcheck/shared';
import { createConfidencePipeline, PatternEntityExtractor, type ContextBundle } from 'validation-core';
import {
  composeResponse,
  HIGH_RISK_REFUSAL_MESSAGE,
  REFUSAL_MESSAGE,
  VERIFICATION_DISCLAIMER
} from '../src/services/responseComposer.js';

const pipeline = createConfidencePipeline({
  config: loadValidationConfig(DEFAULT_VALIDATION_CONFIG_PATH),
  extractor: new PatternEntityExtractor()
});

const fileContext: ContextBundle = {
  sources: [{ sourceKind: 'FILE', identifier: 'file-1', text: 'Acme Corp is the supplier.' }]
};

const compose = (answer: string, context: ContextBundle = fileContext) =>
  composeResponse(answer, pipeline.evaluate(answer, null, context));

test('refused answers are replaced by the refusal message', () => {
  assert.deepEqual(compose('Acme Corp is the supplier, but I cannot verify that.'), {
    state: 'REFUSED',
    content: REFUSAL_MESSAGE
  });
});

test('high factual risk is refused even without a hard veto', () => {
  const composed = compose(
    'The summit features Zenith Labs, Orion Partners, Kestrel Group, Halcyon Works, Vantor Systems and Corvel Holdings.',
    { sources: [{ sourceKind: 'WEB', identifier: 'web-1', text: 'The summit agenda is still being finalized.' }] }
  );
  assert.deepEqual(composed, { state: 'REFUSED', content: HIGH_RISK_REFUSAL_MESSAGE });
});

test('soft vetoes qualify the answer and soften certainty words', () => {
  assert.deepEqual(compose('Clearly, Acme Corp will definitely remain the supplier, probably.'), {
    state: 'QUALIFIED',
    content: `${VERIFICATION_DISCLAIMER}\n\nSeems, Acme Corp may likely remain the supplier, probably.`
  });
});

test('hedging language qualifies an otherwise verified answer', () => {
  assert.deepEqual(compose('The supplier might be Acme Corp.'), {
    state: 'QUALIFIED',
    content: `${VERIFICATION_DISCLAIMER}\n\nThe supplier might be Acme Corp.`
  });
});

test('unverified entities qualify the answer even without hedging', () => {
  const composed = compose('Acme Corp partnered with Zenith Labs.');
  assert.equal(composed.state, 'QUALIFIED');
  assert.equal(composed.content, `${VERIFICATION_DISCLAIMER}\n\nAcme Corp partnered with Zenith Labs.`);
});

test('verified answers without vetoes are delivered unchanged', () => {
  assert.deepEqual(compose('The supplier is Acme Corp.'), {
    state: 'DELIVERED',
    content: 'The supplier is Acme Corp.'
  });
});
