/**
 * Types for the hub-anonymize CLI
 */

import type { RunSummary } from '@hubanon/activity';

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  /** Error code for fatal pipeline errors */
  code?: string;
  timing?: {
    started: number;
    completed: number;
    duration: number;
  };
}

export interface AnonymizeResult {
  input: string;
  output: string;
  summary: RunSummary;
}
