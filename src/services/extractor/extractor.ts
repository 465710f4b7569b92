/**
 * @fileoverview LLM-backed transaction extractor.
 *
 * Sends a cleaned email body plus few-shot examples to Claude, reads back a
 * JSON object of transaction fields and normalises it: commas stripped from
 * the amount, dates in DD-MM-YYYY, USD amounts converted to the ledger
 * currency. Anything the model cannot supply comes back as UNKNOWN; an
 * unusable response or API failure yields an all-UNKNOWN result.
 */

import Anthropic from '@anthropic-ai/sdk';
import { createLogger, type AppLogger } from '../../utils/observability/index.js';
import { errorMessage } from '../../utils/errors.js';
import type { ApiKeyProvider } from './api-key.js';
import { standardizeDate } from './dates.js';
import type { ExchangeRateService } from './exchange-rates.js';
import { EXTRACTION_SYSTEM_PROMPT, buildExtractionPrompt } from './prompt.js';
import { UNKNOWN, type ExtractedTransaction, type SampleEmail, type TransactionExtractor } from './types.js';

const MAX_ATTEMPTS = 2;

type ModelFields = Pick<ExtractedTransaction, 'amount' | 'date' | 'transactionTime' | 'accountNumber' | 'recipient'>;

const FIELD_KEYS: Record<keyof ModelFields, string> = {
  amount: 'amount',
  date: 'date',
  transactionTime: 'transaction_time',
  accountNumber: 'account_number',
  recipient: 'recipient',
};

/** Undo quoted-printable soft breaks and encoded spaces left in bodies. */
export function cleanEmailBody(body: string): string {
  return body
    .replace(/=\s*\r?\n/g, '')
    .replace(/=20/g, ' ')
    .replace(/=A0/gi, ' ')
    .replace(/\r/g, '')
    .trim();
}

/** USD when the body mentions it, otherwise the ledger's own currency. */
export function detectCurrency(body: string, defaultCurrency: string): string {
  return /\bUSD\b/i.test(body) ? 'USD' : defaultCurrency;
}

export function unknownTransaction(currency: string): ExtractedTransaction {
  return {
    amount: UNKNOWN,
    date: UNKNOWN,
    transactionTime: UNKNOWN,
    accountNumber: UNKNOWN,
    recipient: UNKNOWN,
    currency,
  };
}

/**
 * Parse the model's reply. Tolerates markdown code fences and prose
 * around the object; throws when no JSON object can be read.
 */
export function parseModelFields(text: string): ModelFields {
  let jsonText = text.trim();
  const codeBlockMatch = jsonText.match(/```(?:json)?\s*\n?([\s\S]*?)\n?\s*```/);
  if (codeBlockMatch?.[1]) {
    jsonText = codeBlockMatch[1].trim();
  }
  const start = jsonText.indexOf('{');
  const end = jsonText.lastIndexOf('}');
  if (start === -1 || end < start) {
    throw new Error('No JSON object in extractor response');
  }

  const parsed: unknown = JSON.parse(jsonText.slice(start, end + 1));
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error('Extractor response is not a JSON object');
  }

  const read = (key: string): string => {
    const value: unknown = Object.entries(parsed).find(([k]) => k === key)?.[1];
    if (typeof value === 'string' && value.trim() !== '') return value.trim();
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
    return UNKNOWN;
  };

  return {
    amount: read(FIELD_KEYS.amount),
    date: read(FIELD_KEYS.date),
    transactionTime: read(FIELD_KEYS.transactionTime),
    accountNumber: read(FIELD_KEYS.accountNumber),
    recipient: read(FIELD_KEYS.recipient),
  };
}

export interface LlmTransactionExtractorOptions {
  apiKeys: ApiKeyProvider;
  exchangeRates: ExchangeRateService;
  modelId: string;
  defaultCurrency: string;
  logger?: AppLogger;
}

export class LlmTransactionExtractor implements TransactionExtractor {
  private readonly logger: AppLogger;
  private client: { apiKey: string; anthropic: Anthropic } | null = null;

  constructor(private readonly options: LlmTransactionExtractorOptions) {
    this.logger = options.logger ?? createLogger({ domain: 'extractor' });
  }

  async extract(emailBody: string, samples: readonly SampleEmail[]): Promise<ExtractedTransaction> {
    const body = cleanEmailBody(emailBody);
    const currency = detectCurrency(body, this.options.defaultCurrency);

    const apiKey = await this.options.apiKeys.getApiKey();
    if (!apiKey) {
      this.logger.warn('extractor_no_api_key');
      return unknownTransaction(currency);
    }

    const fields = await this.requestFields(apiKey, body, samples);
    if (!fields) {
      return unknownTransaction(currency);
    }
    return this.normalize(fields, currency);
  }

  private async requestFields(
    apiKey: string,
    body: string,
    samples: readonly SampleEmail[]
  ): Promise<ModelFields | null> {
    const anthropic = this.getClient(apiKey);
    const prompt = buildExtractionPrompt(body, samples);

    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
      try {
        const response = await anthropic.messages.create({
          model: this.options.modelId,
          max_tokens: 512,
          temperature: 0.2,
          system: EXTRACTION_SYSTEM_PROMPT,
          messages: [{ role: 'user', content: prompt }],
        });

        const textBlock = response.content.find((block) => block.type === 'text');
        if (!textBlock || textBlock.type !== 'text') {
          throw new Error('No text response from extractor');
        }
        return parseModelFields(textBlock.text);
      } catch (error) {
        this.logger.warn('extractor_attempt_failed', {
          attempt,
          maxAttempts: MAX_ATTEMPTS,
          error: errorMessage(error),
        });
      }
    }
    return null;
  }

  private async normalize(fields: ModelFields, currency: string): Promise<ExtractedTransaction> {
    const result: ExtractedTransaction = { ...fields, currency };

    if (fields.amount !== UNKNOWN) {
      result.amount = fields.amount.replace(/,/g, '');
    }
    if (fields.date !== UNKNOWN) {
      result.date = standardizeDate(fields.date);
    }

    if (result.amount !== UNKNOWN && currency !== this.options.defaultCurrency) {
      const converted = await this.options.exchangeRates.convert(result.amount, currency, this.options.defaultCurrency);
      this.logger.info('extractor_currency_converted', {
        from: currency,
        to: this.options.defaultCurrency,
        originalAmount: result.amount,
        amount: converted,
      });
      result.originalAmount = result.amount;
      result.originalCurrency = currency;
      result.amount = converted;
      result.currency = this.options.defaultCurrency;
    }

    return result;
  }

  private getClient(apiKey: string): Anthropic {
    if (this.client && this.client.apiKey === apiKey) {
      return this.client.anthropic;
    }
    const anthropic = new Anthropic({ apiKey });
    this.client = { apiKey, anthropic };
    return anthropic;
  }
}
