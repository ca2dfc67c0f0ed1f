/**
 * Browser automation barrel export
 */

export { PlaywrightSessionFactory, playwrightSessionFactory, onceClosable } from './browser.session';
export { PlaywrightChatPage } from './playwright.page';
export type {
  AnswerLookup,
  BrowserSession,
  ChatLocator,
  ChatPage,
  ChatRole,
  SessionFactory,
  SessionOptions,
} from './browser.types';
