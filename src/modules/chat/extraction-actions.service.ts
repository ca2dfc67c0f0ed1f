/**
 * Extraction Actions Service
 * Publishes action events while an extraction runs
 */

import { EventEmitter } from 'events';
import { env } from '../../config/env';
import { ExtractionActionEvent, ExtractionActionType } from './chat.types';

export const ACTION_EVENT = 'action';

export class ExtractionActionsService extends EventEmitter {
  constructor(private readonly logToConsole: boolean = env.LOG_ACTIONS) {
    super();
  }

  emitAction(
    runId: string,
    type: ExtractionActionType,
    message: string,
    details?: Record<string, unknown>
  ): void {
    const actionEvent: ExtractionActionEvent = {
      runId,
      type,
      message,
      details,
      timestamp: new Date().toISOString(),
    };

    if (this.logToConsole) {
      console.log(`Run ${runId}: [${type}] ${message}`);
    }

    try {
      this.emit(ACTION_EVENT, actionEvent);
    } catch (error) {
      console.error('Error emitting action:', error);
    }
  }

  onAction(listener: (event: ExtractionActionEvent) => void): () => void {
    this.on(ACTION_EVENT, listener);
    return () => {
      this.off(ACTION_EVENT, listener);
    };
  }

  /**
   * Helper methods for common action types
   */
  observe(runId: string, message: string, details?: Record<string, unknown>): void {
    this.emitAction(runId, 'OBSERVATION', message, details);
  }

  action(runId: string, message: string, details?: Record<string, unknown>): void {
    this.emitAction(runId, 'ACTION', message, details);
  }

  extract(runId: string, message: string, details?: Record<string, unknown>): void {
    this.emitAction(runId, 'EXTRACTION', message, details);
  }

  navigate(runId: string, message: string, details?: Record<string, unknown>): void {
    this.emitAction(runId, 'NAVIGATION', message, details);
  }

  wait(runId: string, message: string, details?: Record<string, unknown>): void {
    this.emitAction(runId, 'WAIT', message, details);
  }

  state(runId: string, message: string, details?: Record<string, unknown>): void {
    this.emitAction(runId, 'STATE', message, details);
  }
}

export const extractionActionsService = new ExtractionActionsService();
