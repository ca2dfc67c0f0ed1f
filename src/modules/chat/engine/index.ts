/**
 * Extraction engine barrel export
 */

export { ExtractionEngine, extract } from './extraction.engine';
export type { ExtractionEngineDeps } from './extraction.engine';
export { CompletionDetector, CompletionState } from './completion.detector';
export type { CompletionOutcome, CompletionTimings, CompletionTransition } from './completion.detector';
export { ContentExtractor, cleanContainerText, resolveMessageCount } from './content.extractor';
export type { AnswerText, ContentExtractionOptions } from './content.extractor';
export { createEngineConfig, ANSWER_CONTAINER_SELECTOR, MESSAGE_SELECTOR } from './engine.config';
export type { EngineConfig } from './engine.config';
export { openChat, submitPrompt } from './prompt.submitter';
