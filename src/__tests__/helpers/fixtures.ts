/**
 * Test Fixtures
 * Reusable test data
 */

import type { EngineConfig } from '../../modules/chat/engine/engine.config';
import type { ExtractionRequest } from '../../modules/chat/chat.types';
import type { DatasetEntry } from '../../modules/evaluation/evaluation.types';

export const TEST_CHAT_URL = 'https://chat.langchain.com';

export const testEngineConfig: Partial<EngineConfig> = {
  chatUrl: TEST_CHAT_URL,
  navigationTimeoutMs: 30000,
  defaultTimeoutMs: 30000,
  inputName: 'Ask me anything about',
  submitKey: 'Enter',
  copyLabel: 'Copy',
  graceDelayMs: 2000,
  settleDelayMs: 2000,
  clipboardSettleMs: 300,
};

export function testRequest(overrides: Partial<ExtractionRequest> = {}): ExtractionRequest {
  return {
    prompt: 'What is LangChain?',
    headless: true,
    timeoutMs: 30000,
    ...overrides,
  };
}

export const langchainAnswer =
  'LangChain is a framework for developing applications powered by language models.';

/** Container text as rendered, copy control label included */
export const langgraphContainerText =
  'LangGraph is a library for building stateful, multi-actor applications.\nCopy';

export const langgraphAnswer =
  'LangGraph is a library for building stateful, multi-actor applications.';

export const answerMarkup = '<p>LangChain is a framework for developing applications powered by language models.</p>';

export const testDatasetEntries: DatasetEntry[] = [
  {
    question: 'What is LangChain?',
    response: 'LangChain is a framework for building applications with LLMs.',
  },
  {
    question: 'What is LangGraph?',
    response: 'LangGraph is a library for building stateful applications with LLMs.',
  },
];
