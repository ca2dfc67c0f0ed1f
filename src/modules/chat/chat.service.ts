/**
 * Chat Service
 * Admission control and cancellation around the extraction engine
 */

import { randomUUID } from 'crypto';
import { env } from '../../config/env';
import { ConcurrencyLimiter, type LimiterStats } from '../../lib/concurrency/concurrency.limiter';
import { ExtractionEngine } from './engine';
import type { ExtractionResult } from './chat.types';

export interface ExtractInput {
  prompt: string;
  headless?: boolean;
  timeoutMs?: number;
}

export interface ExtractRun {
  runId: string;
  result: ExtractionResult;
}

export class ChatService {
  private readonly activeRuns = new Map<string, AbortController>();

  constructor(
    private readonly engine: ExtractionEngine = new ExtractionEngine(),
    private readonly limiter: ConcurrencyLimiter = new ConcurrencyLimiter(env.MAX_CONCURRENT_EXTRACTIONS)
  ) {}

  /**
   * Queue an extraction behind the concurrency cap; resolves with a result even on failure
   */
  async extract(input: ExtractInput, runId: string = randomUUID()): Promise<ExtractRun> {
    const controller = new AbortController();
    this.activeRuns.set(runId, controller);

    try {
      const result = await this.limiter.run(() =>
        this.engine.extract(
          {
            prompt: input.prompt,
            headless: input.headless ?? env.CHAT_HEADLESS,
            timeoutMs: input.timeoutMs ?? env.CHAT_TIMEOUT,
          },
          { runId, signal: controller.signal }
        )
      );
      return { runId, result };
    } finally {
      this.activeRuns.delete(runId);
    }
  }

  /**
   * Abort an in-flight or queued run. Returns false for unknown run ids.
   */
  cancel(runId: string): boolean {
    const controller = this.activeRuns.get(runId);
    if (!controller) {
      return false;
    }
    controller.abort();
    return true;
  }

  getActiveRunIds(): string[] {
    return Array.from(this.activeRuns.keys());
  }

  getStats(): LimiterStats {
    return this.limiter.getStats();
  }
}

export const chatService = new ChatService();
