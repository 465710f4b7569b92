/**
 * @fileoverview Ledger API contract.
 */

import type { ExtractedTransaction } from '../extractor/types.js';

/** An extracted transaction plus the email it came from. */
export interface TransactionCandidate extends ExtractedTransaction {
  emailId: string;
  emailSubject: string;
  emailFrom: string;
  emailDate: string | null;
}

export interface LedgerPostResult {
  success: boolean;
  error?: string;
}

export interface LedgerClient {
  /** Resolves with `{ success: false, error }` for expected failures; never throws for them. */
  createTransaction(userId: number, candidate: TransactionCandidate): Promise<LedgerPostResult>;
}

export interface LedgerPosting {
  account: string;
  amount: string;
  currency: string;
}

export interface LedgerTransactionPayload {
  date: string;
  payee: string;
  postings: [LedgerPosting, LedgerPosting];
}

/** Account lookups exported by the ledger's mappings endpoint. */
export interface AccountMappings {
  /** account number -> asset account */
  bankAccounts: Map<string, string>;
  /** recipient -> expense account and optional description */
  expenseAccounts: Map<string, { account: string; description: string | null }>;
}
