import pino, { type DestinationStream, type Logger } from 'pino';

export type { Logger };

export const LOGGER_NAME = 'hub-activity-anonymizer';

const REDACT_PATHS = ['key', '*.key', 'hmacKey', '*.hmacKey', 'secret', '*.secret'];

export interface LoggerOptions {
  /** pino level (default: LOG_LEVEL or info) */
  level?: string;
  /** Where log lines go (default: stderr) */
  destination?: DestinationStream;
}

/**
 * Structured diagnostics logger. Writes to stderr by default so stdout and
 * the output file only ever carry data.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino(
    {
      name: LOGGER_NAME,
      level: options.level ?? process.env.LOG_LEVEL ?? 'info',

      formatters: {
        level: (label) => ({ level: label }),
      },

      serializers: {
        err: pino.stdSerializers.err,
      },

      redact: {
        paths: REDACT_PATHS,
        censor: '[REDACTED]',
      },

      timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
    },
    options.destination ?? pino.destination({ dest: 2, sync: true })
  );
}
