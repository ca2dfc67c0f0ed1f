/**
 * Playwright adapter for the ChatPage contract
 */

import type { Locator, Page } from 'playwright';
import type { AnswerLookup, ChatLocator, ChatPage, ChatRole } from './browser.types';
import {
  countElementsInPage,
  findAnswerNearControlInPage,
  lastMarkupInPage,
  readClipboardInPage,
  writeClipboardInPage,
} from './page-scripts';

class PlaywrightChatLocator implements ChatLocator {
  constructor(private readonly locator: Locator) {}

  async click(): Promise<void> {
    await this.locator.click();
  }

  async fill(value: string): Promise<void> {
    await this.locator.fill(value);
  }

  async press(key: string): Promise<void> {
    await this.locator.press(key);
  }

  async waitFor(options: { state: 'visible'; timeout: number }): Promise<void> {
    await this.locator.waitFor(options);
  }
}

export class PlaywrightChatPage implements ChatPage {
  constructor(private readonly page: Page) {}

  url(): string {
    return this.page.url();
  }

  async goto(url: string, options: { waitUntil: 'networkidle'; timeout: number }): Promise<void> {
    await this.page.goto(url, options);
  }

  getByRole(role: ChatRole, options: { name: string; exact?: boolean }): ChatLocator {
    return new PlaywrightChatLocator(this.page.getByRole(role, options));
  }

  async waitForNetworkIdle(timeout: number): Promise<void> {
    await this.page.waitForLoadState('networkidle', { timeout });
  }

  async waitForTimeout(ms: number): Promise<void> {
    await this.page.waitForTimeout(ms);
  }

  async writeClipboard(text: string): Promise<void> {
    await this.page.evaluate(writeClipboardInPage, text);
  }

  async readClipboard(): Promise<string> {
    return this.page.evaluate(readClipboardInPage);
  }

  async findAnswerNearControl(lookup: AnswerLookup): Promise<string | null> {
    return this.page.evaluate(findAnswerNearControlInPage, lookup);
  }

  async lastMarkup(selector: string): Promise<string | null> {
    return this.page.evaluate(lastMarkupInPage, selector);
  }

  async countElements(selector: string): Promise<number> {
    return this.page.evaluate(countElementsInPage, selector);
  }
}
