/**
 * Extraction result construction and projections
 */

import { classifyError } from '../../lib/scraping/errors';
import {
  CHAT_SOURCE,
  type ContentSource,
  type EvalOutput,
  type ExtractionFailure,
  type ExtractionRequest,
  type ExtractionResult,
  type ExtractionSuccess,
  type CaptureStatus,
} from './chat.types';

export const ERROR_PREFIX = `Error scraping ${CHAT_SOURCE}: `;

export interface SuccessInput {
  request: ExtractionRequest;
  text: string;
  url: string;
  contentSource: ContentSource;
  rawMarkup: string | null;
  rawMarkupStatus: CaptureStatus;
  messageCount: number;
  networkIdle: boolean;
}

export function createSuccessResult(input: SuccessInput): ExtractionSuccess {
  const result: ExtractionSuccess = {
    kind: 'success',
    text: input.text.trim(),
    messageCount: Math.max(1, Math.floor(input.messageCount)),
    capturedAt: new Date(),
    source: CHAT_SOURCE,
    metadata: Object.freeze({
      url: input.url,
      headless: input.request.headless,
      timeout: input.request.timeoutMs,
      content_source: input.contentSource,
      raw_markup: input.rawMarkupStatus,
      network_idle: input.networkIdle,
    }),
  };
  if (input.rawMarkup !== null) {
    return Object.freeze({ ...result, rawMarkup: input.rawMarkup });
  }
  return Object.freeze(result);
}

export function createFailureResult(error: unknown, request: ExtractionRequest): ExtractionFailure {
  const classified = classifyError(error);
  const message = classified.message.trim() || classified.name;

  const result: ExtractionFailure = {
    kind: 'failure',
    text: `${ERROR_PREFIX}${message}`,
    messageCount: 1,
    capturedAt: new Date(),
    source: CHAT_SOURCE,
    metadata: Object.freeze({
      error: message,
      error_type: classified.name,
      error_category: classified.type,
      headless: request.headless,
      timeout: request.timeoutMs,
    }),
  };
  return Object.freeze(result);
}

export function isSuccess(result: ExtractionResult): result is ExtractionSuccess {
  return result.kind === 'success';
}

export function isFailure(result: ExtractionResult): result is ExtractionFailure {
  return result.kind === 'failure';
}

export function extractText(result: ExtractionResult): string {
  return result.text;
}

/**
 * Shape consumed by the evaluators: a single AI turn
 */
export function toEvalFormat(result: ExtractionResult): EvalOutput {
  return { messages: [{ role: 'ai', content: extractText(result) }] };
}

export function normalizeResponse(result: ExtractionResult): string {
  return extractText(result);
}
