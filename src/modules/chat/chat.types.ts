/**
 * Chat Module Types
 * Requests, results and events for prompt-to-answer capture
 */

import type { ExtractionErrorType } from '../../lib/scraping/errors';

// ============================================================================
// Constants
// ============================================================================

export const CHAT_SOURCE = 'chat.langchain.com';

export type ChatSource = typeof CHAT_SOURCE;

// ============================================================================
// Requests
// ============================================================================

export interface ExtractionRequest {
  readonly prompt: string;
  readonly headless: boolean;
  readonly timeoutMs: number;
}

export interface ExtractOptions {
  /** Abort to cancel; the browser session is still torn down */
  signal?: AbortSignal;
  runId?: string;
}

// ============================================================================
// Results
// ============================================================================

export type ContentSource = 'clipboard' | 'dom';

/**
 * Outcome of a best-effort lookup: keeps "nothing there" apart from "lookup broke"
 */
export type CaptureResult<T> =
  | { status: 'found'; value: T }
  | { status: 'not_found' }
  | { status: 'failed'; error: Error };

export type CaptureStatus = CaptureResult<unknown>['status'];

export interface SuccessMetadata {
  url: string;
  headless: boolean;
  timeout: number;
  content_source: ContentSource;
  raw_markup: CaptureStatus;
  network_idle: boolean;
  [key: string]: unknown;
}

export interface FailureMetadata {
  error: string;
  error_type: string;
  error_category: ExtractionErrorType;
  headless: boolean;
  timeout: number;
  [key: string]: unknown;
}

interface ExtractionResultBase {
  readonly text: string;
  readonly messageCount: number;
  readonly capturedAt: Date;
  readonly source: ChatSource;
}

export interface ExtractionSuccess extends ExtractionResultBase {
  readonly kind: 'success';
  readonly rawMarkup?: string;
  readonly metadata: Readonly<SuccessMetadata>;
}

export interface ExtractionFailure extends ExtractionResultBase {
  readonly kind: 'failure';
  readonly metadata: Readonly<FailureMetadata>;
}

export type ExtractionResult = ExtractionSuccess | ExtractionFailure;

// ============================================================================
// Evaluation projection
// ============================================================================

export interface EvalMessage {
  role: 'ai' | 'user';
  content: string;
}

export interface EvalOutput {
  messages: EvalMessage[];
}

// ============================================================================
// Live action events
// ============================================================================

export type ExtractionActionType =
  | 'NAVIGATION'
  | 'ACTION'
  | 'WAIT'
  | 'OBSERVATION'
  | 'EXTRACTION'
  | 'STATE';

export interface ExtractionActionEvent {
  runId: string;
  type: ExtractionActionType;
  message: string;
  details?: Record<string, unknown>;
  timestamp: string;
}
