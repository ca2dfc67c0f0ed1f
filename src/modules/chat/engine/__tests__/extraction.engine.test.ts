/**
 * Extraction Engine Tests
 * End-to-end runs against the scripted chat page
 */

import { ExtractionEngine } from '../extraction.engine';
import { ExtractionActionsService } from '../../extraction-actions.service';
import { ExtractionErrorType } from '../../../../lib/scraping/errors';
import type { ExtractionActionEvent, ExtractionRequest, ExtractionResult } from '../../chat.types';
import { FakeSessionFactory, type ChatScript } from '../../../../__tests__/helpers/mocks';
import {
  TEST_CHAT_URL,
  answerMarkup,
  langchainAnswer,
  langgraphAnswer,
  langgraphContainerText,
  testEngineConfig,
  testRequest,
} from '../../../../__tests__/helpers/fixtures';

function setup(script: ChatScript = {}, openError?: Error) {
  const sessions = new FakeSessionFactory(script, openError);
  const actions = new ExtractionActionsService(false);
  const events: ExtractionActionEvent[] = [];
  actions.onAction((event) => events.push(event));
  const engine = new ExtractionEngine(testEngineConfig, { sessions, actions });
  return { sessions, actions, events, engine };
}

function expectFailure(result: ExtractionResult) {
  if (result.kind !== 'failure') {
    throw new Error(`Expected a failure result, got: ${result.text}`);
  }
  return result;
}

function expectSuccess(result: ExtractionResult) {
  if (result.kind !== 'success') {
    throw new Error(`Expected a success result, got: ${result.text}`);
  }
  return result;
}

describe('ExtractionEngine', () => {
  describe('successful extraction', () => {
    it('should capture the clipboard answer with full metadata', async () => {
      const { engine, sessions } = setup({
        clipboardText: langchainAnswer,
        markup: answerMarkup,
        messageCount: 2,
      });

      const result = expectSuccess(await engine.extract(testRequest()));

      expect(result.text).toBe(langchainAnswer);
      expect(result.rawMarkup).toBe(answerMarkup);
      expect(result.messageCount).toBe(2);
      expect(result.source).toBe('chat.langchain.com');
      expect(result.capturedAt).toBeInstanceOf(Date);
      expect(result.metadata).toEqual({
        url: TEST_CHAT_URL,
        headless: true,
        timeout: 30000,
        content_source: 'clipboard',
        raw_markup: 'found',
        network_idle: true,
      });
      expect(sessions.open).toHaveBeenCalledWith({ headless: true, defaultTimeoutMs: 30000 });
      expect(sessions.lastPage?.lookups).toEqual([]);
      expect(sessions.closedSessions).toBe(1);
    });

    it('should drive the page in protocol order', async () => {
      const { engine, sessions } = setup({ clipboardText: langchainAnswer });

      await engine.extract(testRequest({ timeoutMs: 20000 }));

      expect(sessions.lastPage?.calls).toEqual([
        `goto:${TEST_CHAT_URL}:networkidle`,
        'click:Ask me anything about',
        'fill:What is LangChain?',
        'press:Enter',
        'wait:2000',
        'waitFor:Copy:20000',
        'networkidle:20000',
        'clipboard:write',
        'click:Copy',
        'wait:300',
        'clipboard:read',
      ]);
      expect(sessions.lastPage?.locators).toContainEqual({ role: 'button', name: 'Copy', exact: true });
    });

    it('should pass the headless flag through to the session', async () => {
      const { engine, sessions } = setup({ clipboardText: langchainAnswer });

      const result = expectSuccess(await engine.extract(testRequest({ headless: false })));

      expect(sessions.open).toHaveBeenCalledWith({ headless: false, defaultTimeoutMs: 30000 });
      expect(result.metadata.headless).toBe(false);
    });

    it('should fall back to the answer container when the clipboard is empty', async () => {
      const { engine } = setup({
        clipboardText: '',
        nearControlText: langgraphContainerText,
        messageCount: 1,
      });

      const result = expectSuccess(await engine.extract(testRequest({ prompt: 'What is LangGraph?' })));

      expect(result.text).toBe(langgraphAnswer);
      expect(result.text).not.toContain('Copy');
      expect(result.metadata.content_source).toBe('dom');
    });

    it('should default the message count to one when no message elements exist', async () => {
      const { engine } = setup({ clipboardText: langchainAnswer, messageCount: 0 });

      const result = await engine.extract(testRequest());

      expect(result.kind).toBe('success');
      expect(result.messageCount).toBe(1);
    });

    it('should omit raw markup when no container matches', async () => {
      const { engine } = setup({ clipboardText: langchainAnswer, markup: null });

      const result = expectSuccess(await engine.extract(testRequest()));

      expect(result.rawMarkup).toBeUndefined();
      expect('rawMarkup' in result).toBe(false);
      expect(result.metadata.raw_markup).toBe('not_found');
    });

    it('should absorb auxiliary capture failures', async () => {
      const { engine, sessions } = setup({
        clipboardText: langchainAnswer,
        markupError: new Error('Execution context was destroyed'),
        countError: new Error('Execution context was destroyed'),
      });

      const result = expectSuccess(await engine.extract(testRequest()));

      expect(result.text).toBe(langchainAnswer);
      expect(result.metadata.raw_markup).toBe('failed');
      expect(result.messageCount).toBe(1);
      expect(sessions.closedSessions).toBe(1);
    });

    it('should use the settle delay when the network never goes idle', async () => {
      const { engine, sessions } = setup({ clipboardText: langchainAnswer, networkIdle: false });

      const result = expectSuccess(await engine.extract(testRequest()));

      expect(result.metadata.network_idle).toBe(false);
      expect(sessions.lastPage?.waits).toEqual([2000, 2000, 300]);
    });

    it('should freeze the result', async () => {
      const { engine } = setup({ clipboardText: langchainAnswer });

      const result = await engine.extract(testRequest());

      expect(Object.isFrozen(result)).toBe(true);
      expect(Object.isFrozen(result.metadata)).toBe(true);
    });
  });

  describe('delayed copy control', () => {
    beforeEach(() => {
      jest.useFakeTimers();
    });

    afterEach(() => {
      jest.useRealTimers();
    });

    function waitStarted() {
      let markStarted: () => void = () => undefined;
      const started = new Promise<void>((resolve) => {
        markStarted = resolve;
      });
      return { started, markStarted: () => markStarted() };
    }

    it('should capture the answer once the copy control appears after 1.5s', async () => {
      const { started, markStarted } = waitStarted();
      const { engine, sessions } = setup({
        clipboardText: langchainAnswer,
        copyRevealMs: 1500,
        whileWaitingForCopy: markStarted,
        messageCount: 1,
      });

      const pending = engine.extract(testRequest({ prompt: 'What is LangChain?', timeoutMs: 30000 }));
      await started;
      await jest.advanceTimersByTimeAsync(1499);

      expect(sessions.lastPage?.calls).not.toContain('networkidle:30000');

      await jest.advanceTimersByTimeAsync(1);
      const result = expectSuccess(await pending);

      expect(result.text).toBe(langchainAnswer);
      expect(result.messageCount).toBeGreaterThanOrEqual(1);
      expect(result.metadata.timeout).toBe(30000);
      expect(result.metadata.content_source).toBe('clipboard');
      expect(sessions.lastPage?.calls).toContain('networkidle:30000');
    });

    it('should time out when the copy control appears after the budget', async () => {
      const { started, markStarted } = waitStarted();
      const { engine, sessions } = setup({
        clipboardText: langchainAnswer,
        copyRevealMs: 45000,
        whileWaitingForCopy: markStarted,
      });

      const pending = engine.extract(testRequest({ timeoutMs: 30000 }));
      await started;
      await jest.advanceTimersByTimeAsync(30000);
      const result = expectFailure(await pending);

      expect(result.metadata.error_type).toBe('LocatorTimeoutError');
      expect(result.metadata.error).toBe('Copy control did not appear within 30000ms');
      expect(sessions.closedSessions).toBe(1);
    });
  });

  describe('failed extraction', () => {
    it('should report a locator timeout when the copy control never appears', async () => {
      const { engine, sessions } = setup({ copyAppears: false });

      const result = expectFailure(await engine.extract(testRequest({ timeoutMs: 5000 })));

      expect(result.text).toBe('Error scraping chat.langchain.com: Copy control did not appear within 5000ms');
      expect(result.text.startsWith('Error scraping')).toBe(true);
      expect(result.metadata.error_type).toBe('LocatorTimeoutError');
      expect(result.metadata.error_category).toBe(ExtractionErrorType.LOCATOR_TIMEOUT);
      expect(result.metadata.error).toBe('Copy control did not appear within 5000ms');
      expect(result.messageCount).toBe(1);
      expect(sessions.closedSessions).toBe(1);
    });

    it('should report navigation failures', async () => {
      const { engine, sessions } = setup({ navigationError: new Error('net::ERR_CONNECTION_REFUSED') });

      const result = expectFailure(await engine.extract(testRequest()));

      expect(result.metadata.error_type).toBe('NavigationFailureError');
      expect(result.text).toBe(
        `Error scraping chat.langchain.com: Navigation to ${TEST_CHAT_URL} failed: net::ERR_CONNECTION_REFUSED`
      );
      expect(sessions.lastPage?.calls).toEqual([`goto:${TEST_CHAT_URL}:networkidle`]);
      expect(sessions.closedSessions).toBe(1);
    });

    it('should report a missing prompt input as a locator timeout', async () => {
      const { engine, sessions } = setup({ inputMissing: true });

      const result = expectFailure(await engine.extract(testRequest()));

      expect(result.metadata.error_type).toBe('LocatorTimeoutError');
      expect(sessions.closedSessions).toBe(1);
    });

    it('should fail when neither clipboard nor page yields text', async () => {
      const { engine, sessions } = setup({ clipboardText: '', nearControlText: null });

      const result = expectFailure(await engine.extract(testRequest()));

      expect(result.metadata.error_type).toBe('ClipboardUnavailableError');
      expect(result.metadata.error).toBe('Clipboard was empty and no answer container was found');
      expect(sessions.closedSessions).toBe(1);
    });

    it('should report browser launch failures without a session to close', async () => {
      const { engine, sessions } = setup({}, new Error('Executable does not exist'));

      const result = expectFailure(await engine.extract(testRequest()));

      expect(result.text).toBe('Error scraping chat.langchain.com: Executable does not exist');
      expect(result.metadata.error_type).toBe('Error');
      expect(sessions.closedSessions).toBe(0);
    });

    it('should keep request settings in failure metadata', async () => {
      const { engine } = setup({ copyAppears: false });

      const result = expectFailure(await engine.extract(testRequest({ headless: false, timeoutMs: 1000 })));

      expect(result.metadata.headless).toBe(false);
      expect(result.metadata.timeout).toBe(1000);
    });

    const invalidRequests: Array<[string, Partial<ExtractionRequest>, string]> = [
      ['an empty prompt', { prompt: '   ' }, 'Prompt must be a non-empty string'],
      ['a zero timeout', { timeoutMs: 0 }, 'Timeout must be a positive integer, got 0'],
      ['a fractional timeout', { timeoutMs: 1.5 }, 'Timeout must be a positive integer, got 1.5'],
    ];

    it.each(invalidRequests)('should reject %s without launching a browser', async (_label, overrides, message) => {
      const { engine, sessions } = setup();

      const result = expectFailure(await engine.extract(testRequest(overrides)));

      expect(result.metadata.error_type).toBe('InvalidRequestError');
      expect(result.metadata.error).toBe(message);
      expect(sessions.open).not.toHaveBeenCalled();
    });
  });

  describe('cancellation', () => {
    it('should not launch a browser for an already aborted signal', async () => {
      const { engine, sessions } = setup({ clipboardText: langchainAnswer });
      const controller = new AbortController();
      controller.abort();

      const result = expectFailure(await engine.extract(testRequest(), { signal: controller.signal }));

      expect(result.metadata.error_type).toBe('AbortError');
      expect(result.text).toBe('Error scraping chat.langchain.com: Extraction was cancelled');
      expect(sessions.open).not.toHaveBeenCalled();
    });

    it('should close the session mid-run and report AbortError', async () => {
      const controller = new AbortController();
      const { engine, sessions } = setup({
        clipboardText: langchainAnswer,
        whileWaitingForCopy: () => controller.abort(),
      });

      const result = expectFailure(await engine.extract(testRequest(), { signal: controller.signal }));

      expect(result.metadata.error_type).toBe('AbortError');
      expect(result.metadata.error_category).toBe(ExtractionErrorType.ABORTED);
      expect(sessions.lastPage?.closed).toBe(true);
      expect(sessions.closedSessions).toBe(1);
      expect(sessions.lastPage?.calls).not.toContain('clipboard:read');
    });
  });

  describe('action events', () => {
    it('should publish every completion transition for the run', async () => {
      const { engine, events } = setup({ clipboardText: langchainAnswer });

      await engine.extract(testRequest(), { runId: 'run-1' });

      const states = events.filter((e) => e.type === 'STATE').map((e) => e.message);
      expect(states).toEqual([
        'submitted -> streaming: grace delay of 2000ms elapsed',
        'streaming -> likely_complete: copy control is visible',
        'likely_complete -> settled: network idle',
      ]);
      expect(events.every((e) => e.runId === 'run-1')).toBe(true);
    });

    it('should publish the failed transition', async () => {
      const { engine, events } = setup({ copyAppears: false });

      await engine.extract(testRequest({ timeoutMs: 5000 }), { runId: 'run-2' });

      const states = events.filter((e) => e.type === 'STATE').map((e) => e.message);
      expect(states[states.length - 1]).toBe(
        'streaming -> failed: Copy control did not appear within 5000ms'
      );
    });
  });

  describe('independent invocations', () => {
    it('should give each concurrent run its own session', async () => {
      const { engine, sessions } = setup({ clipboardText: langchainAnswer });

      const results = await Promise.all([
        engine.extract(testRequest({ prompt: 'first' })),
        engine.extract(testRequest({ prompt: 'second' })),
      ]);

      expect(results.map((r) => r.kind)).toEqual(['success', 'success']);
      expect(sessions.pages).toHaveLength(2);
      expect(sessions.pages[0]).not.toBe(sessions.pages[1]);
      expect(sessions.pages.map((p) => p.calls[2])).toEqual(['fill:first', 'fill:second']);
      expect(sessions.closedSessions).toBe(2);
    });

    it('should always return non-empty text', async () => {
      const scripts: ChatScript[] = [
        { clipboardText: langchainAnswer },
        { copyAppears: false },
        { clipboardText: '', nearControlText: null },
        { navigationError: new Error('') },
      ];

      for (const script of scripts) {
        const { engine } = setup(script);
        const result = await engine.extract(testRequest());
        expect(result.text.length).toBeGreaterThan(0);
      }
    });
  });
});
