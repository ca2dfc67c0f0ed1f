/**
 * Browser Session Acquisition
 * One Chromium process per extraction, clipboard permissions pre-granted
 */

import { chromium, type Browser } from 'playwright';
import { PlaywrightChatPage } from './playwright.page';
import type { BrowserSession, SessionFactory, SessionOptions } from './browser.types';

const LAUNCH_ARGS = [
  '--no-sandbox',
  '--disable-setuid-sandbox',
  '--disable-dev-shm-usage',
  '--disable-gpu',
  '--disable-extensions',
  '--disable-sync',
  '--disable-translate',
  '--mute-audio',
  '--no-first-run',
];

const CLIPBOARD_PERMISSIONS = ['clipboard-read', 'clipboard-write'];

/**
 * Wraps a close function so repeated calls (abort listener + finally) share one teardown
 */
export function onceClosable(close: () => Promise<void>): () => Promise<void> {
  let closing: Promise<void> | null = null;
  return () => {
    if (!closing) {
      closing = close();
    }
    return closing;
  };
}

export class PlaywrightSessionFactory implements SessionFactory {
  async open(options: SessionOptions): Promise<BrowserSession> {
    const browser: Browser = await chromium.launch({
      headless: options.headless,
      args: LAUNCH_ARGS,
    });

    try {
      const context = await browser.newContext({ permissions: CLIPBOARD_PERMISSIONS });
      const page = await context.newPage();
      page.setDefaultTimeout(options.defaultTimeoutMs);

      return {
        page: new PlaywrightChatPage(page),
        close: onceClosable(() => browser.close()),
      };
    } catch (error) {
      // Context setup failed after launch: the caller never gets a session to release
      await browser.close();
      throw error;
    }
  }
}

export const playwrightSessionFactory = new PlaywrightSessionFactory();
