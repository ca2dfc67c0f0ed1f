/**
 * Extraction Engine
 * Submits one prompt to the chat application and captures the rendered answer.
 * `extract` never rejects: every outcome becomes an ExtractionResult.
 */

import { randomUUID } from 'crypto';
import { env } from '../../../config/env';
import { playwrightSessionFactory, type BrowserSession, type SessionFactory } from '../../../lib/browser';
import {
  ExtractionAbortedError,
  InvalidRequestError,
  classifyError,
  isAbortError,
  toError,
} from '../../../lib/scraping/errors';
import { createFailureResult, createSuccessResult } from '../chat.response';
import type { ExtractOptions, ExtractionRequest, ExtractionResult, ExtractionSuccess } from '../chat.types';
import { ExtractionActionsService, extractionActionsService } from '../extraction-actions.service';
import { CompletionDetector } from './completion.detector';
import { ContentExtractor, resolveMessageCount } from './content.extractor';
import { createEngineConfig, type EngineConfig } from './engine.config';
import { openChat, submitPrompt } from './prompt.submitter';

export interface ExtractionEngineDeps {
  sessions?: SessionFactory;
  actions?: ExtractionActionsService;
}

function validateRequest(request: ExtractionRequest): void {
  if (typeof request.prompt !== 'string' || !request.prompt.trim()) {
    throw new InvalidRequestError('Prompt must be a non-empty string');
  }
  if (!Number.isInteger(request.timeoutMs) || request.timeoutMs <= 0) {
    throw new InvalidRequestError(`Timeout must be a positive integer, got ${request.timeoutMs}`);
  }
}

function ensureActive(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new ExtractionAbortedError();
  }
}

export class ExtractionEngine {
  readonly config: EngineConfig;
  private readonly sessions: SessionFactory;
  private readonly actions: ExtractionActionsService;

  constructor(config: Partial<EngineConfig> = {}, deps: ExtractionEngineDeps = {}) {
    this.config = createEngineConfig(config);
    this.sessions = deps.sessions ?? playwrightSessionFactory;
    this.actions = deps.actions ?? extractionActionsService;
  }

  async extract(request: ExtractionRequest, options: ExtractOptions = {}): Promise<ExtractionResult> {
    const runId = options.runId ?? randomUUID();
    const { signal } = options;
    let session: BrowserSession | null = null;

    const onAbort = () => {
      this.actions.observe(runId, 'Cancellation requested, closing browser');
      session?.close().catch((err: unknown) => {
        console.error(`Run ${runId}: error closing browser after cancellation:`, err);
      });
    };

    try {
      validateRequest(request);
      ensureActive(signal);
      this.actions.action(runId, 'Launching browser', { headless: request.headless });
      session = await this.sessions.open({
        headless: request.headless,
        defaultTimeoutMs: this.config.defaultTimeoutMs,
      });
      signal?.addEventListener('abort', onAbort, { once: true });
      ensureActive(signal);

      const result = await this.capture(session, request, runId, signal);
      this.actions.extract(runId, `Captured ${result.text.length} chars`, {
        contentSource: result.metadata.content_source,
        messageCount: result.messageCount,
      });
      return result;
    } catch (error) {
      const failure = signal?.aborted && !isAbortError(error)
        ? new ExtractionAbortedError('Extraction was cancelled', toError(error))
        : error;
      const classified = classifyError(failure);
      console.error(`Run ${runId}: extraction failed (${classified.name}): ${classified.message}`);
      this.actions.observe(runId, 'Extraction failed', { errorType: classified.name, error: classified.message });
      return createFailureResult(failure, request);
    } finally {
      signal?.removeEventListener('abort', onAbort);
      if (session) {
        await this.release(session, runId);
      }
    }
  }

  private async capture(
    session: BrowserSession,
    request: ExtractionRequest,
    runId: string,
    signal: AbortSignal | undefined
  ): Promise<ExtractionSuccess> {
    const { page } = session;
    const config = this.config;

    this.actions.navigate(runId, `Opening ${config.chatUrl}`);
    await openChat(page, config.chatUrl, config.navigationTimeoutMs);
    ensureActive(signal);

    this.actions.action(runId, 'Submitting prompt', { length: request.prompt.length });
    await submitPrompt(page, request.prompt, {
      inputName: config.inputName,
      submitKey: config.submitKey,
    });
    ensureActive(signal);

    const copyControl = page.getByRole('button', { name: config.copyLabel, exact: true });
    const detector = new CompletionDetector(
      page,
      copyControl,
      {
        graceDelayMs: config.graceDelayMs,
        settleDelayMs: config.settleDelayMs,
        timeoutMs: request.timeoutMs,
      },
      (transition) => this.actions.state(runId, `${transition.from} -> ${transition.to}: ${transition.reason}`)
    );
    this.actions.wait(runId, `Waiting up to ${request.timeoutMs}ms for the answer to finish`);
    const completion = await detector.waitForCompletion();
    ensureActive(signal);

    const extractor = new ContentExtractor(
      page,
      {
        copyLabel: config.copyLabel,
        answerContainerSelector: config.answerContainerSelector,
        messageSelector: config.messageSelector,
        clipboardSettleMs: config.clipboardSettleMs,
      },
      (degraded) => this.actions.observe(runId, degraded.message, { errorType: degraded.name })
    );

    this.actions.action(runId, 'Copying answer');
    const answer = await extractor.readAnswer(copyControl);
    ensureActive(signal);

    const markup = await extractor.captureRawMarkup();
    const messages = await extractor.countMessages();

    return createSuccessResult({
      request,
      text: answer.text,
      url: page.url(),
      contentSource: answer.source,
      rawMarkup: markup.status === 'found' ? markup.value : null,
      rawMarkupStatus: markup.status,
      messageCount: resolveMessageCount(messages),
      networkIdle: completion.networkIdle,
    });
  }

  private async release(session: BrowserSession, runId: string): Promise<void> {
    try {
      await session.close();
    } catch (err) {
      console.error(`Run ${runId}: error closing browser:`, err);
    }
  }
}

/**
 * One-shot extraction with default configuration
 */
export function extract(
  prompt: string,
  headless: boolean = env.CHAT_HEADLESS,
  timeoutMs: number = env.CHAT_TIMEOUT
): Promise<ExtractionResult> {
  return new ExtractionEngine().extract({ prompt, headless, timeoutMs });
}
