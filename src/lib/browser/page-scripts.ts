/**
 * In-page scripts
 * Serialized by Playwright and run inside the chat page, so each function must
 * stay self-contained: no imports, no references to module scope.
 */

import type { AnswerLookup } from './browser.types';

export function writeClipboardInPage(text: string): Promise<void> {
  return navigator.clipboard.writeText(text);
}

export function readClipboardInPage(): Promise<string> {
  return navigator.clipboard.readText();
}

/**
 * Find the copy control by its visible label and return the text of the
 * closest message-like ancestor (or the control's grandparent).
 */
export function findAnswerNearControlInPage(lookup: AnswerLookup): string | null {
  const control = Array.from(document.querySelectorAll('button')).find(
    (button) => button.textContent?.trim() === lookup.label
  );
  if (!control) {
    return null;
  }

  let container: Element | null = control.closest(lookup.containerSelector);
  if (!container) {
    container = control.parentElement?.parentElement ?? null;
  }
  if (!container) {
    return null;
  }

  // innerText is layout-aware but missing outside real browsers
  const rendered = container instanceof HTMLElement ? container.innerText : undefined;
  return rendered || container.textContent || '';
}

export function lastMarkupInPage(selector: string): string | null {
  const elements = document.querySelectorAll(selector);
  if (elements.length === 0) {
    return null;
  }
  return elements[elements.length - 1].innerHTML;
}

export function countElementsInPage(selector: string): number {
  return document.querySelectorAll(selector).length;
}
