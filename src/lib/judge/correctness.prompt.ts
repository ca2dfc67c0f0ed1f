/**
 * Correctness rubric for LLM-as-judge grading
 */

import type { CorrectnessInput } from './judge.types';

export const CORRECTNESS_SYSTEM_PROMPT = `You grade answers produced by a documentation chat assistant.
Compare the answer with the reference answer and decide whether it is factually correct.

Rubric:
- The answer must not contradict the reference answer.
- Extra detail is fine as long as it is accurate.
- An answer that only reports an error, refuses, or is unrelated to the question is incorrect.
- Wording does not need to match; meaning does.

Respond with a JSON object only, of the form:
{"reasoning": "<one or two sentences>", "score": true | false}`;

export function buildCorrectnessPrompt(input: CorrectnessInput): string {
  return [
    '<question>',
    input.inputs,
    '</question>',
    '',
    '<answer>',
    input.outputs,
    '</answer>',
    '',
    '<reference_answer>',
    input.referenceOutputs,
    '</reference_answer>',
  ].join('\n');
}
