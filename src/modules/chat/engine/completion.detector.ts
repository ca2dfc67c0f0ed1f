/**
 * Completion Detection
 * The chat UI never signals "done streaming", so completion is inferred in layers:
 *
 *   submitted ──grace delay──▶ streaming ──copy control visible──▶ likely_complete
 *       ──network idle (or settle delay)──▶ settled
 *
 * Only the copy-control wait can fail the run. Everything after it degrades.
 */

import type { ChatLocator, ChatPage } from '../../../lib/browser';
import {
  LocatorTimeoutError,
  SecondaryWaitTimeoutError,
  isTimeoutError,
  toError,
} from '../../../lib/scraping/errors';

export enum CompletionState {
  SUBMITTED = 'submitted',
  STREAMING = 'streaming',
  LIKELY_COMPLETE = 'likely_complete',
  SETTLED = 'settled',
  FAILED = 'failed',
}

export interface CompletionTimings {
  graceDelayMs: number;
  settleDelayMs: number;
  timeoutMs: number;
}

export interface CompletionTransition {
  from: CompletionState;
  to: CompletionState;
  reason: string;
}

export interface CompletionOutcome {
  state: CompletionState.SETTLED;
  /** False when the settle delay stood in for network idle */
  networkIdle: boolean;
  transitions: CompletionTransition[];
}

export type TransitionListener = (transition: CompletionTransition) => void;

const ALLOWED_TRANSITIONS: Record<CompletionState, CompletionState[]> = {
  [CompletionState.SUBMITTED]: [CompletionState.STREAMING, CompletionState.FAILED],
  [CompletionState.STREAMING]: [CompletionState.LIKELY_COMPLETE, CompletionState.FAILED],
  [CompletionState.LIKELY_COMPLETE]: [CompletionState.SETTLED, CompletionState.FAILED],
  [CompletionState.SETTLED]: [],
  [CompletionState.FAILED]: [],
};

export class CompletionDetector {
  private current: CompletionState = CompletionState.SUBMITTED;
  private readonly transitions: CompletionTransition[] = [];

  constructor(
    private readonly page: ChatPage,
    private readonly copyControl: ChatLocator,
    private readonly timings: CompletionTimings,
    private readonly onTransition?: TransitionListener
  ) {}

  get state(): CompletionState {
    return this.current;
  }

  get history(): readonly CompletionTransition[] {
    return this.transitions;
  }

  async waitForCompletion(): Promise<CompletionOutcome> {
    if (this.current !== CompletionState.SUBMITTED) {
      throw new Error(`Completion detection already ran (state: ${this.current})`);
    }

    try {
      // First tokens need a moment before the response area is worth watching
      await this.page.waitForTimeout(this.timings.graceDelayMs);
      this.moveTo(CompletionState.STREAMING, `grace delay of ${this.timings.graceDelayMs}ms elapsed`);

      await this.waitForCopyControl();
      this.moveTo(CompletionState.LIKELY_COMPLETE, 'copy control is visible');

      const degraded = await this.waitForQuiescence();
      const networkIdle = degraded === null;
      this.moveTo(
        CompletionState.SETTLED,
        degraded
          ? `${degraded.message}; settle delay of ${this.timings.settleDelayMs}ms elapsed`
          : 'network idle'
      );

      return {
        state: CompletionState.SETTLED,
        networkIdle,
        transitions: [...this.transitions],
      };
    } catch (error) {
      if (this.state !== CompletionState.FAILED) {
        this.moveTo(CompletionState.FAILED, toError(error).message);
      }
      throw error;
    }
  }

  private async waitForCopyControl(): Promise<void> {
    try {
      await this.copyControl.waitFor({ state: 'visible', timeout: this.timings.timeoutMs });
    } catch (error) {
      const err = toError(error);
      if (isTimeoutError(err)) {
        throw new LocatorTimeoutError(
          `Copy control did not appear within ${this.timings.timeoutMs}ms`,
          err
        );
      }
      throw err;
    }
  }

  /**
   * Long-poll and keep-alive connections can keep the network busy after the
   * answer is complete, so a timeout here falls back to the settle delay.
   */
  private async waitForQuiescence(): Promise<SecondaryWaitTimeoutError | null> {
    try {
      await this.page.waitForNetworkIdle(this.timings.timeoutMs);
      return null;
    } catch (error) {
      if (!isTimeoutError(error)) {
        throw error;
      }
      await this.page.waitForTimeout(this.timings.settleDelayMs);
      return new SecondaryWaitTimeoutError(
        `Network did not go idle within ${this.timings.timeoutMs}ms`,
        toError(error)
      );
    }
  }

  private moveTo(next: CompletionState, reason: string): void {
    if (!ALLOWED_TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Invalid completion transition ${this.current} -> ${next}`);
    }
    const transition: CompletionTransition = { from: this.current, to: next, reason };
    this.current = next;
    this.transitions.push(transition);
    this.onTransition?.(transition);
  }
}
