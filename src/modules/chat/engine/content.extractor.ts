/**
 * Content Extraction
 * Clipboard round-trip first, DOM scrape around the copy control second.
 * Raw markup and message count are independent best-effort captures.
 */

import type { ChatLocator, ChatPage } from '../../../lib/browser';
import {
  AuxiliaryExtractionError,
  ClipboardUnavailableError,
  toError,
} from '../../../lib/scraping/errors';
import type { ContentSource, CaptureResult } from '../chat.types';

export interface ContentExtractionOptions {
  copyLabel: string;
  answerContainerSelector: string;
  messageSelector: string;
  clipboardSettleMs: number;
}

export interface AnswerText {
  text: string;
  source: ContentSource;
  /** Set when the clipboard itself failed (as opposed to coming back empty) */
  clipboardError?: ClipboardUnavailableError;
}

export type DegradeListener = (error: Error) => void;

/**
 * Remove leftover control labels picked up with the container text
 */
export function cleanContainerText(raw: string, label: string): string {
  if (!label) {
    return raw.trim();
  }
  return raw.split(label).join('').trim();
}

export class ContentExtractor {
  constructor(
    private readonly page: ChatPage,
    private readonly options: ContentExtractionOptions,
    private readonly onDegrade?: DegradeListener
  ) {}

  /**
   * Clipboard text when it is non-empty, otherwise the DOM fallback.
   * Throws only when both channels come back empty.
   */
  async readAnswer(copyControl: ChatLocator): Promise<AnswerText> {
    let clipboardError: ClipboardUnavailableError | undefined;

    try {
      const copied = await this.copyViaClipboard(copyControl);
      if (copied.trim()) {
        return { text: copied.trim(), source: 'clipboard' };
      }
    } catch (error) {
      if (!(error instanceof ClipboardUnavailableError)) {
        throw error;
      }
      clipboardError = error;
      this.onDegrade?.(error);
    }

    const scraped = await this.scrapeNearControl();
    if (scraped) {
      return { text: scraped, source: 'dom', clipboardError };
    }

    throw new ClipboardUnavailableError(
      clipboardError
        ? `Clipboard unavailable (${clipboardError.message}) and no answer container was found`
        : 'Clipboard was empty and no answer container was found',
      clipboardError,
      true
    );
  }

  private async copyViaClipboard(copyControl: ChatLocator): Promise<string> {
    // Anything read afterwards must come from this click, not an earlier run
    try {
      await this.page.writeClipboard('');
    } catch (error) {
      throw new ClipboardUnavailableError(`Clipboard write failed: ${toError(error).message}`, toError(error));
    }

    await copyControl.click();

    // UI-triggered clipboard writes land asynchronously
    await this.page.waitForTimeout(this.options.clipboardSettleMs);

    try {
      return await this.page.readClipboard();
    } catch (error) {
      throw new ClipboardUnavailableError(`Clipboard read failed: ${toError(error).message}`, toError(error));
    }
  }

  private async scrapeNearControl(): Promise<string> {
    const raw = await this.page.findAnswerNearControl({
      label: this.options.copyLabel,
      containerSelector: this.options.answerContainerSelector,
    });
    if (raw === null) {
      return '';
    }
    return cleanContainerText(raw, this.options.copyLabel);
  }

  /**
   * Markup of the last answer-like element, assumed to be the newest turn
   */
  async captureRawMarkup(): Promise<CaptureResult<string>> {
    try {
      const markup = await this.page.lastMarkup(this.options.answerContainerSelector);
      return markup === null ? { status: 'not_found' } : { status: 'found', value: markup };
    } catch (error) {
      const failure = new AuxiliaryExtractionError(`Raw markup capture failed: ${toError(error).message}`, toError(error));
      this.onDegrade?.(failure);
      return { status: 'failed', error: failure };
    }
  }

  async countMessages(): Promise<CaptureResult<number>> {
    try {
      const count = await this.page.countElements(this.options.messageSelector);
      return count > 0 ? { status: 'found', value: count } : { status: 'not_found' };
    } catch (error) {
      const failure = new AuxiliaryExtractionError(`Message count failed: ${toError(error).message}`, toError(error));
      this.onDegrade?.(failure);
      return { status: 'failed', error: failure };
    }
  }
}

/**
 * Reaching extraction means at least one answer exists
 */
export function resolveMessageCount(capture: CaptureResult<number>): number {
  return capture.status === 'found' ? capture.value : 1;
}
