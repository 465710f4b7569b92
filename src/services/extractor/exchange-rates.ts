/**
 * @fileoverview Currency conversion for amounts quoted in foreign currency.
 *
 * Rates come from exchangerate-api.com and are kept in an explicit,
 * per-instance cache with a TTL. Without an API key, or when the lookup
 * fails, the configured fallback rate is used.
 */

import { fetchWithRetry } from '../../utils/fetch-with-retry.js';
import { errorMessage } from '../../utils/errors.js';
import { createLogger, type AppLogger } from '../../utils/observability/index.js';

const EXCHANGE_RATE_API_BASE = 'https://v6.exchangerate-api.com/v6';

interface CachedRate {
  rate: number;
  storedAt: number;
}

export class ExchangeRateCache {
  private readonly entries = new Map<string, CachedRate>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now
  ) {}

  /** The cached rate, or null when missing or older than the TTL. */
  get(from: string, to: string): number | null {
    const key = cacheKey(from, to);
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (this.now() - entry.storedAt >= this.ttlMs) {
      this.entries.delete(key);
      return null;
    }
    return entry.rate;
  }

  set(from: string, to: string, rate: number): void {
    this.entries.set(cacheKey(from, to), { rate, storedAt: this.now() });
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

function cacheKey(from: string, to: string): string {
  return `${from.toUpperCase()}/${to.toUpperCase()}`;
}

export interface ExchangeRateServiceOptions {
  apiKey: string | undefined;
  fallbackRate: number;
  cache: ExchangeRateCache;
  logger?: AppLogger;
}

export class ExchangeRateService {
  private readonly logger: AppLogger;

  constructor(private readonly options: ExchangeRateServiceOptions) {
    this.logger = options.logger ?? createLogger({ domain: 'exchange-rates' });
  }

  async getRate(from: string, to: string): Promise<number> {
    const cached = this.options.cache.get(from, to);
    if (cached !== null) {
      return cached;
    }

    if (!this.options.apiKey) {
      this.logger.warn('exchange_rate_fallback', { from, to, reason: 'no_api_key' });
      this.options.cache.set(from, to, this.options.fallbackRate);
      return this.options.fallbackRate;
    }

    try {
      const url = `${EXCHANGE_RATE_API_BASE}/${encodeURIComponent(this.options.apiKey)}/pair/${from}/${to}`;
      const response = await fetchWithRetry(url, { method: 'GET' }, 'exchange rate lookup', { timeoutMs: 10000 });
      if (!response.ok) {
        throw new Error(`HTTP ${response.status}`);
      }
      const rate = readConversionRate(await response.json());
      if (rate === null) {
        throw new Error('Response has no conversion_rate');
      }
      this.options.cache.set(from, to, rate);
      return rate;
    } catch (error) {
      // not cached, so the next conversion retries the lookup
      this.logger.error('exchange_rate_lookup_failed', { from, to, error: errorMessage(error) });
      return this.options.fallbackRate;
    }
  }

  /**
   * Convert a numeric amount string, returning it with two decimals.
   * Same-currency or non-numeric amounts are returned unchanged.
   */
  async convert(amount: string, from: string, to: string): Promise<string> {
    const value = Number(amount);
    if (from.toUpperCase() === to.toUpperCase() || amount.trim() === '' || !Number.isFinite(value)) {
      return amount;
    }
    const rate = await this.getRate(from, to);
    return (value * rate).toFixed(2);
  }
}

function readConversionRate(body: unknown): number | null {
  if (typeof body !== 'object' || body === null || !('conversion_rate' in body)) {
    return null;
  }
  const rate = Number(body.conversion_rate);
  return Number.isFinite(rate) && rate > 0 ? rate : null;
}
