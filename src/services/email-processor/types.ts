/**
 * @fileoverview Email processing results.
 */

export const SKIPPED_CONFIG_REASON = 'configuration_not_found_or_disabled';

export type ProcessingResult =
  | { status: 'success'; processedCount: number; errors: string[] }
  | { status: 'skipped'; reason: string }
  | { status: 'error'; error: string };

/** Identity of the queue job a processing pass runs under. */
export interface JobContext {
  id: string;
  name?: string;
  attempt?: number;
}

/** What happened to a single fetched email. */
export type EmailOutcome =
  | { kind: 'posted'; emailId: string; markError?: string }
  | { kind: 'skipped'; emailId: string; reason: 'no_transaction' | 'unknown_amount' | 'already_processed' }
  | { kind: 'failed'; emailId: string; error: string };

export interface BatchTally {
  readonly processedCount: number;
  readonly errors: readonly string[];
}
