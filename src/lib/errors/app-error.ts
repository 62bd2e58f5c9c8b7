/**
 * Application Error Types
 *
 * Typed error codes with safe messages. Only programmer and setup errors are
 * thrown; remote and input failures travel as result unions instead.
 * Safe messages never carry credentials or tokens.
 */

export type AppErrorCode = 'NOT_INITIALIZED' | 'CONFIG_ERROR';

/**
 * Application Error
 *
 * Extends Error with a typed code and a safe message.
 */
export class AppError extends Error {
  public readonly code: AppErrorCode;
  public readonly safeMessage: string;
  /** Optional payload for diagnostics (e.g. zod issues for CONFIG_ERROR) */
  public readonly details?: Record<string, unknown>;

  constructor(
    code: AppErrorCode,
    safeMessage: string,
    causeOrDetails?: unknown,
  ) {
    super(safeMessage);
    this.name = 'AppError';
    this.code = code;
    this.safeMessage = safeMessage;

    if (causeOrDetails instanceof Error) {
      // Preserve original error as cause (for debugging)
      this.cause = causeOrDetails;
    } else if (
      causeOrDetails &&
      typeof causeOrDetails === 'object' &&
      !Array.isArray(causeOrDetails)
    ) {
      this.details = { ...causeOrDetails };
    } else if (causeOrDetails) {
      this.cause = new Error(String(causeOrDetails));
    }
  }

  /**
   * Convert to a plain object for serialization
   */
  toJSON(): {
    code: AppErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      code: this.code,
      message: this.safeMessage,
      ...(this.details && { details: this.details }),
    };
  }
}

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}
