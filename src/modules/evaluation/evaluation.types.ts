/**
 * Evaluation Types
 */

import type { CorrectnessVerdict } from '../../lib/judge';
import type { EvalMessage, EvalOutput, ExtractionRequest, ExtractionResult } from '../chat/chat.types';

/**
 * One question with its reference answer, as stored in the dataset file
 */
export interface DatasetEntry {
  question: string;
  response: string;
}

export type EvalInputs = Record<string, unknown>;

export interface DatasetExample {
  inputs: { messages: EvalMessage[] };
  outputs: EvalOutput;
}

/**
 * Anything that turns a request into a result; the engine or the admission-controlled service
 */
export type ExtractFn = (request: ExtractionRequest) => Promise<ExtractionResult>;

export interface EvaluationOptions {
  experimentPrefix: string;
  maxConcurrency: number;
  headless: boolean;
  timeoutMs: number;
}

export interface ExampleResult {
  index: number;
  prompt: string;
  referenceAnswer: string;
  answer: string;
  kind: ExtractionResult['kind'];
  errorType?: string;
  /** Null when no judge is configured or the judge failed */
  verdict: CorrectnessVerdict | null;
  judgeError?: string;
  durationMs: number;
}

export interface EvaluationSummary {
  experimentPrefix: string;
  total: number;
  succeeded: number;
  failed: number;
  scored: number;
  /** Share of scored examples judged correct, null when nothing was scored */
  averageScore: number | null;
  results: ExampleResult[];
}
