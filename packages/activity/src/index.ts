/**
 * @hubanon/activity
 *
 * Extracts server start/stop events from JupyterHub logs, pseudonymizes the
 * users and releases only hour buckets that meet the k threshold.
 */

export const ACTIVITY_VERSION = '0.1.0';

// Pipeline
export {
  anonymizeLog,
  anonymizeFile,
  createStreamSink,
  type AnonymizeOptions,
  type LineSink,
} from './pipeline.js';

// Extraction
export { extractActivity } from './extractor.js';
export {
  ACTIVITY_MARKER,
  HUB_LABEL,
  LOG_FORMAT_VERSION,
  MIN_START_TOKENS,
  MIN_TOKENS,
  RawLogLineSchema,
  TOKEN_INDEX,
  actionFromToken,
  isActivityCandidate,
  parseRawLine,
  readPayloadFields,
  tokenizePayload,
  type PayloadFields,
  type RawLogLine,
} from './wire-format.js';
export { parseLogTimestamp, truncateToHour } from './time.js';

// Suppression
export {
  HourBucketSuppressor,
  DEFAULT_MIN_ENTRIES_PER_HOUR,
  type SuppressorOptions,
} from './suppressor.js';

// Serialization
export { toOutputRecord, formatOutputLine, formatOutputLines } from './jsonl.js';

// Errors
export {
  ActivityErrorCodes,
  ActivityLogError,
  isActivityLogError,
  type ActivityErrorCode,
  type ActivityErrorDetails,
} from './errors.js';

// Logging
export { createLogger, LOGGER_NAME, type Logger, type LoggerOptions } from './logger.js';

// Types
export type {
  ActivityAction,
  ActivityRecord,
  BucketDecision,
  OutputRecord,
  RunSummary,
  TimestampResolution,
} from './types.js';
