/**
 * Extraction Error Handling
 * Error taxonomy for browser-driven answer capture
 */

export enum ExtractionErrorType {
  LOCATOR_TIMEOUT = 'LOCATOR_TIMEOUT',
  NAVIGATION_FAILURE = 'NAVIGATION_FAILURE',
  CLIPBOARD_UNAVAILABLE = 'CLIPBOARD_UNAVAILABLE',
  SECONDARY_WAIT_TIMEOUT = 'SECONDARY_WAIT_TIMEOUT',
  AUXILIARY_EXTRACTION_FAILURE = 'AUXILIARY_EXTRACTION_FAILURE',
  ABORTED = 'ABORTED',
  INVALID_REQUEST = 'INVALID_REQUEST',
  UNKNOWN = 'UNKNOWN',
}

export interface ClassifiedError {
  type: ExtractionErrorType;
  name: string;
  message: string;
  fatal: boolean;
}

/**
 * Base class for every error raised by the extraction engine.
 * `fatal` errors abort the invocation; the rest are absorbed where they occur.
 */
export class ExtractionError extends Error {
  readonly type: ExtractionErrorType;
  readonly fatal: boolean;

  constructor(type: ExtractionErrorType, message: string, fatal: boolean, cause?: Error) {
    super(message, cause ? { cause } : undefined);
    this.name = new.target.name;
    this.type = type;
    this.fatal = fatal;
  }
}

export class LocatorTimeoutError extends ExtractionError {
  constructor(message: string, cause?: Error) {
    super(ExtractionErrorType.LOCATOR_TIMEOUT, message, true, cause);
  }
}

export class NavigationFailureError extends ExtractionError {
  constructor(message: string, cause?: Error) {
    super(ExtractionErrorType.NAVIGATION_FAILURE, message, true, cause);
  }
}

/**
 * Non-fatal while the DOM fallback can still recover the answer.
 */
export class ClipboardUnavailableError extends ExtractionError {
  constructor(message: string, cause?: Error, fatal: boolean = false) {
    super(ExtractionErrorType.CLIPBOARD_UNAVAILABLE, message, fatal, cause);
  }
}

export class SecondaryWaitTimeoutError extends ExtractionError {
  constructor(message: string, cause?: Error) {
    super(ExtractionErrorType.SECONDARY_WAIT_TIMEOUT, message, false, cause);
  }
}

export class AuxiliaryExtractionError extends ExtractionError {
  constructor(message: string, cause?: Error) {
    super(ExtractionErrorType.AUXILIARY_EXTRACTION_FAILURE, message, false, cause);
  }
}

export class ExtractionAbortedError extends ExtractionError {
  constructor(message: string = 'Extraction was cancelled', cause?: Error) {
    super(ExtractionErrorType.ABORTED, message, true, cause);
    this.name = 'AbortError';
  }
}

export class InvalidRequestError extends ExtractionError {
  constructor(message: string) {
    super(ExtractionErrorType.INVALID_REQUEST, message, true);
  }
}

/**
 * Normalize anything thrown into an Error instance
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  if (typeof error === 'string') {
    return new Error(error);
  }
  try {
    return new Error(JSON.stringify(error));
  } catch {
    return new Error(String(error));
  }
}

/**
 * Playwright raises `TimeoutError` for expired waits and locators
 */
export function isTimeoutError(error: unknown): boolean {
  const err = toError(error);
  return err.name === 'TimeoutError' || /timeout .*exceeded/i.test(err.message);
}

export function isAbortError(error: unknown): boolean {
  return error instanceof ExtractionAbortedError || toError(error).name === 'AbortError';
}

/**
 * Classify an error for result metadata and logging
 */
export function classifyError(error: unknown): ClassifiedError {
  const err = toError(error);

  if (err instanceof ExtractionError) {
    return {
      type: err.type,
      name: err.name,
      message: err.message,
      fatal: err.fatal,
    };
  }

  if (isAbortError(err)) {
    return {
      type: ExtractionErrorType.ABORTED,
      name: 'AbortError',
      message: err.message,
      fatal: true,
    };
  }

  if (isTimeoutError(err)) {
    return {
      type: ExtractionErrorType.LOCATOR_TIMEOUT,
      name: err.name,
      message: err.message,
      fatal: true,
    };
  }

  return {
    type: ExtractionErrorType.UNKNOWN,
    name: err.name || 'Error',
    message: err.message || 'Unknown error',
    fatal: true,
  };
}
