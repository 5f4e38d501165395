/**
 * Activity log error codes.
 *
 * Every code is fatal for the run: processing halts at the first error and
 * output written so far is kept.
 */

export const ActivityErrorCodes = {
  /** Line is not JSON or lacks textPayload / hub label */
  MALFORMED_LINE: 'E_MALFORMED_LINE',
  /** Payload has fewer tokens than the positional layout needs */
  TOKEN_LAYOUT: 'E_TOKEN_LAYOUT',
  /** Date/time tokens do not form a valid instant */
  BAD_TIMESTAMP: 'E_BAD_TIMESTAMP',
  /** Record hour is earlier than the open bucket's hour */
  OUT_OF_ORDER: 'E_OUT_OF_ORDER',
  /** Input path cannot be opened for reading */
  INPUT_UNREADABLE: 'E_INPUT_UNREADABLE',
  /** Output path cannot be opened for writing */
  OUTPUT_UNWRITABLE: 'E_OUTPUT_UNWRITABLE',
  /** Invalid pipeline configuration */
  INVALID_CONFIG: 'E_INVALID_CONFIG',
} as const;

export type ActivityErrorCode = (typeof ActivityErrorCodes)[keyof typeof ActivityErrorCodes];

/**
 * Diagnostic context attached to an error. For parse failures this holds the
 * parsed log entry and the payload tokens so format drift can be diagnosed.
 */
export type ActivityErrorDetails = Record<string, unknown>;

/**
 * Fatal activity log error with code, details and (once known) line number.
 */
export class ActivityLogError extends Error {
  readonly code: ActivityErrorCode;
  readonly details: ActivityErrorDetails;
  readonly lineNumber?: number;

  constructor(
    code: ActivityErrorCode,
    message: string,
    details: ActivityErrorDetails = {},
    options: { lineNumber?: number; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'ActivityLogError';
    this.code = code;
    this.details = details;
    this.lineNumber = options.lineNumber;
  }

  /**
   * Copy of this error located at an input line.
   */
  atLine(lineNumber: number): ActivityLogError {
    return new ActivityLogError(this.code, `line ${lineNumber}: ${this.message}`, this.details, {
      lineNumber,
      cause: this,
    });
  }
}

export function isActivityLogError(error: unknown): error is ActivityLogError {
  return error instanceof ActivityLogError;
}
