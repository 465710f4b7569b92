/**
 * @fileoverview HTTP client for the ledger's transaction API.
 *
 * Each candidate becomes a balanced two-posting transaction: the mapped
 * bank account is credited and the mapped expense account debited. Account
 * mappings are fetched once per client from the mappings export endpoint
 * and fall back to configured defaults when a lookup misses.
 */

import { DateTime } from 'luxon';
import { errorMessage } from '../../utils/errors.js';
import { fetchWithRetry } from '../../utils/fetch-with-retry.js';
import { createLogger, type AppLogger } from '../../utils/observability/index.js';
import type {
  AccountMappings,
  LedgerClient,
  LedgerPostResult,
  LedgerTransactionPayload,
  TransactionCandidate,
} from './types.js';

const TRANSACTIONS_PATH = 'api/v1/transactions';
const MAPPINGS_PATH = 'api/v1/mappings/export';
const LEDGER_DATE_FORMATS = ['dd-MM-yyyy', 'd-M-yyyy', 'dd-MM-yy', 'd-M-yy', 'yyyy-MM-dd'];

export interface HttpLedgerClientOptions {
  baseUrl: string;
  apiKey: string;
  defaultBankAccount: string;
  defaultExpenseAccount: string;
  timeoutMs?: number;
  retryDelaysMs?: number[];
  logger?: AppLogger;
}

/** Parse the extractor's DD-MM-YYYY (or ISO) date into the ledger's YYYY-MM-DD. */
export function toLedgerDate(value: string): string | null {
  for (const format of LEDGER_DATE_FORMATS) {
    const parsed = DateTime.fromFormat(value.trim(), format);
    if (parsed.isValid) {
      return parsed.toFormat('yyyy-MM-dd');
    }
  }
  return null;
}

/** Normalise a numeric amount string; null when it is not a positive-or-zero number. */
export function toLedgerAmount(value: string): string | null {
  const cleaned = value.replace(/,/g, '').trim();
  if (!/^\d+(\.\d+)?$/.test(cleaned)) return null;
  return String(Number(cleaned));
}

function emptyMappings(): AccountMappings {
  return { bankAccounts: new Map(), expenseAccounts: new Map() };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Read the export body; malformed entries are dropped individually. */
export function parseMappings(body: unknown): AccountMappings {
  const mappings = emptyMappings();
  if (!isRecord(body)) return mappings;

  const bank = body['bank-account-map'];
  if (isRecord(bank)) {
    for (const [accountNumber, account] of Object.entries(bank)) {
      if (typeof account === 'string') mappings.bankAccounts.set(accountNumber, account);
    }
  }

  const expense = body['expense-account-map'];
  if (isRecord(expense)) {
    for (const [recipient, entry] of Object.entries(expense)) {
      if (Array.isArray(entry) && typeof entry[0] === 'string') {
        const description = typeof entry[1] === 'string' ? entry[1] : null;
        mappings.expenseAccounts.set(recipient, { account: entry[0], description });
      } else if (typeof entry === 'string') {
        mappings.expenseAccounts.set(recipient, { account: entry, description: null });
      }
    }
  }
  return mappings;
}

export class HttpLedgerClient implements LedgerClient {
  private readonly logger: AppLogger;
  private mappings: Promise<AccountMappings> | null = null;

  constructor(private readonly options: HttpLedgerClientOptions) {
    this.logger = options.logger ?? createLogger({ domain: 'ledger-client' });
  }

  async createTransaction(userId: number, candidate: TransactionCandidate): Promise<LedgerPostResult> {
    const amount = toLedgerAmount(candidate.amount);
    if (amount === null) {
      return { success: false, error: `Invalid amount: ${candidate.amount}` };
    }
    const date = toLedgerDate(candidate.date);
    if (date === null) {
      return { success: false, error: `Invalid transaction date: ${candidate.date}` };
    }

    const mappings = await this.loadMappings();
    const payload = this.buildPayload(candidate, amount, date, mappings);

    try {
      const response = await fetchWithRetry(
        this.url(TRANSACTIONS_PATH),
        {
          method: 'POST',
          headers: this.headers(),
          body: JSON.stringify(payload),
        },
        'ledger create transaction',
        { timeoutMs: this.options.timeoutMs ?? 15000, retryDelaysMs: this.options.retryDelaysMs }
      );

      if (!response.ok) {
        const text = await response.text();
        this.logger.warn('ledger_transaction_rejected', { userId, status: response.status, emailId: candidate.emailId });
        return { success: false, error: `Ledger API returned ${response.status}: ${text.slice(0, 200)}` };
      }

      this.logger.info('ledger_transaction_created', {
        userId,
        emailId: candidate.emailId,
        date,
        fromAccount: payload.postings[0].account,
        toAccount: payload.postings[1].account,
      });
      return { success: true };
    } catch (error) {
      this.logger.error('ledger_request_failed', { userId, emailId: candidate.emailId, error: errorMessage(error) });
      return { success: false, error: `Ledger API request failed: ${errorMessage(error)}` };
    }
  }

  buildPayload(
    candidate: TransactionCandidate,
    amount: string,
    date: string,
    mappings: AccountMappings
  ): LedgerTransactionPayload {
    const fromAccount = mappings.bankAccounts.get(candidate.accountNumber) ?? this.options.defaultBankAccount;
    const expense = mappings.expenseAccounts.get(candidate.recipient);
    const toAccount = expense?.account ?? this.options.defaultExpenseAccount;
    const payee = [candidate.recipient, expense?.description, candidate.transactionTime]
      .filter((part): part is string => typeof part === 'string' && part !== '')
      .join(' ');

    return {
      date,
      payee,
      postings: [
        { account: fromAccount, amount: `-${amount}`, currency: candidate.currency },
        { account: toAccount, amount, currency: candidate.currency },
      ],
    };
  }

  /** Fetched once; a failed fetch is not retried for the life of this client. */
  private loadMappings(): Promise<AccountMappings> {
    if (!this.mappings) {
      this.mappings = this.fetchMappings();
    }
    return this.mappings;
  }

  private async fetchMappings(): Promise<AccountMappings> {
    try {
      const response = await fetchWithRetry(
        this.url(MAPPINGS_PATH),
        { method: 'GET', headers: this.headers() },
        'ledger mappings export',
        { timeoutMs: this.options.timeoutMs ?? 15000, retryDelaysMs: this.options.retryDelaysMs }
      );
      if (!response.ok) {
        this.logger.warn('ledger_mappings_unavailable', { status: response.status });
        return emptyMappings();
      }
      const mappings = parseMappings(await response.json());
      this.logger.info('ledger_mappings_loaded', {
        bankAccounts: mappings.bankAccounts.size,
        expenseAccounts: mappings.expenseAccounts.size,
      });
      return mappings;
    } catch (error) {
      this.logger.warn('ledger_mappings_unavailable', { error: errorMessage(error) });
      return emptyMappings();
    }
  }

  private url(path: string): string {
    const base = this.options.baseUrl.endsWith('/') ? this.options.baseUrl : `${this.options.baseUrl}/`;
    return new URL(path, base).toString();
  }

  private headers(): Record<string, string> {
    return {
      'X-API-Key': this.options.apiKey,
      'Content-Type': 'application/json',
    };
  }
}
