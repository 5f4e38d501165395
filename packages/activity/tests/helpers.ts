import { RunKey } from '@hubanon/privacy';
import { createLogger, type Logger } from '../src/logger.js';
import { truncateToHour } from '../src/time.js';
import type { ActivityRecord } from '../src/types.js';

export const TEST_KEY = RunKey.fromBytes(Buffer.from('test-secret', 'utf8'));

export interface LineOptions {
  date?: string;
  time?: string;
  user?: string;
  action?: 'start' | 'stop';
  hub?: string;
  spawn?: string;
}

/**
 * JupyterHub message as it appears in textPayload
 */
export function payload(opts: LineOptions = {}): string {
  const { date = '2018-01-21', time = '21:09:10.123', user = 'alice', spawn = '1.234' } = opts;
  if (opts.action === 'stop') {
    return `[I ${date} ${time} JupyterHub proxy:301] User ${user} server took 0.512 seconds to stop`;
  }
  return `[I ${date} ${time} JupyterHub log:158] User ${user} took ${spawn} seconds to start`;
}

/**
 * One raw JSON log line
 */
export function logLine(opts: LineOptions = {}): string {
  return JSON.stringify({
    textPayload: payload(opts),
    labels: { 'k8s-pod/release': opts.hub ?? 'prod' },
    severity: 'INFO',
  });
}

/**
 * Activity record at a given instant (pseudonym is a fixed placeholder)
 */
export function record(iso: string, user = 'u1', action: 'start' | 'stop' = 'start'): ActivityRecord {
  const timestampTrue = new Date(iso);
  return {
    timestampTrue,
    timestampHour: truncateToHour(timestampTrue),
    userPseudonym: user,
    action,
    hub: 'prod',
    spawnTime: action === 'start' ? '1.000' : '',
  };
}

export function silentLogger(): Logger {
  return createLogger({ level: 'silent' });
}

/**
 * Logger that collects parsed log lines in memory
 */
export function captureLogger(level = 'debug'): { logger: Logger; entries: Record<string, unknown>[] } {
  const entries: Record<string, unknown>[] = [];
  const logger = createLogger({
    level,
    destination: {
      write(msg: string) {
        entries.push(JSON.parse(msg) as Record<string, unknown>);
      },
    },
  });
  return { logger, entries };
}
