/**
 * @description: Turns a scored answer into what the user sees: a refusal, a qualified answer, or the answer as written.
 * @groundcheck-scope: backend
 * @groundcheck-module: ResponseComposer
 * @groundcheck-risk: high - Delivering a refused answer defeats the whole validation step.
 */
import type { ConfidenceRecord } from 'validation-core';

type ResponseState = 'REFUSED' | 'QUALIFIED' | 'DELIVERED';

type ComposedResponse = {
  state: ResponseState;
  content: string;
};

const REFUSAL_MESSAGE = "I couldn't confirm this with the available sources, so I'd rather not state it as fact. "
  + 'Please share a source or rephrase the question.';

const HIGH_RISK_REFUSAL_MESSAGE = "I can't reliably confirm this with available sources. "
  + 'Please provide more information or enable web search.';

const VERIFICATION_DISCLAIMER = "I may be missing verification for some details. Here's my best effort:";

// Certainty words softened when the answer could not be fully verified.
const TONE_REPLACEMENTS: ReadonlyArray<[RegExp, string]> = [
  [/\bdefinitely\b/gi, 'likely'],
  [/\bclearly\b/gi, 'seems'],
  [/\bwill\b/gi, 'may']
];

const preserveCase = (original: string, replacement: string): string =>
  original[0] === original[0].toUpperCase()
    ? replacement[0].toUpperCase() + replacement.slice(1)
    : replacement;

const softenTone = (answer: string): string =>
  TONE_REPLACEMENTS.reduce(
    (text, [pattern, replacement]) => text.replace(pattern, (match) => preserveCase(match, replacement)),
    answer
  );

/**
 * Refused records and HIGH factual risk never deliver the answer. A soft
 * veto, LOW or MED risk, or any uncertainty flag qualifies it; otherwise it
 * passes through unchanged.
 */
const composeResponse = (answer: string, record: ConfidenceRecord): ComposedResponse => {
  if (record.refused) {
    return { state: 'REFUSED', content: REFUSAL_MESSAGE };
  }

  if (record.riskLevel === 'HIGH') {
    return { state: 'REFUSED', content: HIGH_RISK_REFUSAL_MESSAGE };
  }

  if (record.veto.level === 'SOFT' || record.riskLevel !== 'NONE' || record.uncertaintyFlags.length > 0) {
    return { state: 'QUALIFIED', content: `${VERIFICATION_DISCLAIMER}\n\n${softenTone(answer)}` };
  }

  return { state: 'DELIVERED', content: answer };
};

export { composeResponse, HIGH_RISK_REFUSAL_MESSAGE, REFUSAL_MESSAGE, VERIFICATION_DISCLAIMER };
export type { ComposedResponse, ResponseState };
