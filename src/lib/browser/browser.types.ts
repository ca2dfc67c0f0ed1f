/**
 * Browser automation contracts
 * The extraction engine only talks to these interfaces; Playwright sits behind them
 */

export type ChatRole = 'textbox' | 'button';

export interface ChatLocator {
  click(): Promise<void>;
  fill(value: string): Promise<void>;
  press(key: string): Promise<void>;
  waitFor(options: { state: 'visible'; timeout: number }): Promise<void>;
}

export interface AnswerLookup {
  /** Visible label of the copy control */
  label: string;
  /** Ancestor selector for message/response/assistant containers */
  containerSelector: string;
}

/**
 * A single controllable page inside an isolated browsing context
 */
export interface ChatPage {
  url(): string;
  goto(url: string, options: { waitUntil: 'networkidle'; timeout: number }): Promise<void>;
  getByRole(role: ChatRole, options: { name: string; exact?: boolean }): ChatLocator;
  waitForNetworkIdle(timeout: number): Promise<void>;
  waitForTimeout(ms: number): Promise<void>;

  writeClipboard(text: string): Promise<void>;
  readClipboard(): Promise<string>;

  /** Raw text of the container around the copy control, or null when nothing matched */
  findAnswerNearControl(lookup: AnswerLookup): Promise<string | null>;
  /** innerHTML of the last element matching the selector, or null when none exist */
  lastMarkup(selector: string): Promise<string | null>;
  countElements(selector: string): Promise<number>;
}

export interface SessionOptions {
  headless: boolean;
  /** Default timeout for page-level operations such as locator actions */
  defaultTimeoutMs: number;
}

/**
 * One browser process scoped to one extraction
 */
export interface BrowserSession {
  readonly page: ChatPage;
  close(): Promise<void>;
}

export interface SessionFactory {
  open(options: SessionOptions): Promise<BrowserSession>;
}
