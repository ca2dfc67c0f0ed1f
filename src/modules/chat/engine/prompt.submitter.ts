/**
 * Navigation and prompt submission
 */

import type { ChatPage } from '../../../lib/browser';
import {
  LocatorTimeoutError,
  NavigationFailureError,
  isTimeoutError,
  toError,
} from '../../../lib/scraping/errors';

/**
 * Load the chat application and wait for its scripts to go quiet,
 * since the prompt input may not exist before then.
 */
export async function openChat(page: ChatPage, url: string, timeoutMs: number): Promise<void> {
  try {
    await page.goto(url, { waitUntil: 'networkidle', timeout: timeoutMs });
  } catch (error) {
    const err = toError(error);
    throw new NavigationFailureError(`Navigation to ${url} failed: ${err.message}`, err);
  }
}

export interface SubmitOptions {
  inputName: string;
  submitKey: string;
}

export async function submitPrompt(
  page: ChatPage,
  prompt: string,
  options: SubmitOptions
): Promise<void> {
  const textbox = page.getByRole('textbox', { name: options.inputName });

  try {
    await textbox.click();
  } catch (error) {
    const err = toError(error);
    if (isTimeoutError(err)) {
      throw new LocatorTimeoutError(`Prompt input "${options.inputName}" was not found: ${err.message}`, err);
    }
    throw err;
  }

  await textbox.fill(prompt);
  await textbox.press(options.submitKey);
}
