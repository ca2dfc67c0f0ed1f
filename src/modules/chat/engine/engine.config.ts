/**
 * Extraction engine configuration
 */

import { env } from '../../../config/env';

export const ANSWER_CONTAINER_SELECTOR =
  '[class*="message"], [class*="response"], [class*="assistant"]';
export const MESSAGE_SELECTOR = '[class*="message"]';

export interface EngineConfig {
  /** Destination chat application */
  chatUrl: string;
  navigationTimeoutMs: number;
  /** Default for locator actions (input box lookup) */
  defaultTimeoutMs: number;

  /** Accessible name of the prompt textbox */
  inputName: string;
  submitKey: string;
  /** Accessible name and visible label of the copy-response control */
  copyLabel: string;

  answerContainerSelector: string;
  messageSelector: string;

  /** Wait after submission before any completion detection */
  graceDelayMs: number;
  /** Used instead of network idle when that never arrives */
  settleDelayMs: number;
  clipboardSettleMs: number;
}

export function createEngineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  return {
    chatUrl: env.CHAT_URL,
    navigationTimeoutMs: env.CHAT_NAVIGATION_TIMEOUT,
    defaultTimeoutMs: env.CHAT_DEFAULT_TIMEOUT,
    inputName: env.CHAT_INPUT_NAME,
    submitKey: env.CHAT_SUBMIT_KEY,
    copyLabel: env.CHAT_COPY_LABEL,
    answerContainerSelector: ANSWER_CONTAINER_SELECTOR,
    messageSelector: MESSAGE_SELECTOR,
    graceDelayMs: env.CHAT_GRACE_DELAY_MS,
    settleDelayMs: env.CHAT_SETTLE_DELAY_MS,
    clipboardSettleMs: env.CHAT_CLIPBOARD_SETTLE_MS,
    ...overrides,
  };
}
