/**
 * Error Types for Threadline
 *
 * Single source of truth for typed error classes shared by the packages.
 */

export class ThreadlineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ThreadlineError';
  }
}

export class ThreadStoreUnavailableError extends ThreadlineError {
  readonly roomId: string;

  constructor(roomId: string, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : cause === undefined ? 'unknown' : String(cause);
    super(`Thread store unavailable for room ${roomId}: ${reason}`);
    this.name = 'ThreadStoreUnavailableError';
    this.roomId = roomId;
    this.cause = cause;
  }
}

export class ConfigValidationError extends ThreadlineError {
  readonly source: string;
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`Invalid configuration in ${source}: ${issues.join('; ')}`);
    this.name = 'ConfigValidationError';
    this.source = source;
    this.issues = issues;
  }
}

export class ScreenNotFoundError extends ThreadlineError {
  constructor(index: number) {
    super(`Screen not found at index ${index}`);
    this.name = 'ScreenNotFoundError';
  }
}
