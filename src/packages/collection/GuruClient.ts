/**
 * Guru API Client
 *
 * Paged collection of approved transactions from the Guru Digital Manager API.
 * https://docs.digitalmanager.guru
 *
 * Every page request goes through the shared RateGate. Transient failures
 * are reported as a `retryable` outcome instead of being thrown.
 */

import axios from 'axios';
import type { Tier } from '../../types/domain.js';
import { transactionPageSchema, transactionSchema } from '../../types/guru.js';
import type { Transaction, TransactionPage } from '../../types/guru.js';
import { createChildLogger } from '../../utils/logger.js';
import type { Logger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';
import type { RateGate } from './RateGate.js';

// =============================================================================
// Types
// =============================================================================

/**
 * The slice of an axios instance the client needs
 */
export interface HttpGetter {
  get(
    url: string,
    config: { params: Record<string, string | string[]> }
  ): Promise<{ status: number; data: unknown }>;
}

export interface GuruClientConfig {
  apiKey: string;

  /**
   * @default 'https://digitalmanager.guru/api/v2'
   */
  baseUrl?: string;

  /**
   * Per-request timeout (milliseconds)
   * @default 15000
   */
  timeoutMs?: number;

  /**
   * Shared admission control
   */
  gate: RateGate;

  /**
   * Retries of a single page after its first failure
   * @default 2
   */
  maxPageRetries?: number;

  /**
   * Whole-window attempts in fetchWithRetry
   * @default 3
   */
  fetchAttempts?: number;

  /**
   * Base unit of the backoff delays (milliseconds)
   * @default 1000
   */
  backoffBaseMs?: number;

  http?: HttpGetter;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  logger?: Logger;
}

export interface FetchOptions {
  /** Tag every collected transaction with this tier */
  tier?: Tier;
}

export type FetchOutcome =
  | { kind: 'ok'; transactions: Transaction[]; pages: number; partial: boolean }
  | { kind: 'retryable'; reason: string };

type PageResult = { ok: true; page: TransactionPage } | { ok: false; reason: string };

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// =============================================================================
// GuruClient
// =============================================================================

export class GuruClient {
  private readonly http: HttpGetter;
  private readonly gate: RateGate;
  private readonly maxPageRetries: number;
  private readonly fetchAttempts: number;
  private readonly backoffBaseMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;
  private readonly logger: Logger;

  constructor(config: GuruClientConfig) {
    this.gate = config.gate;
    this.maxPageRetries = Math.max(0, config.maxPageRetries ?? 2);
    this.fetchAttempts = Math.max(1, config.fetchAttempts ?? 3);
    this.backoffBaseMs = Math.max(0, config.backoffBaseMs ?? 1000);
    this.sleep = config.sleep ?? defaultSleep;
    this.random = config.random ?? Math.random;
    this.logger = config.logger ?? createChildLogger({ module: 'GuruClient' });
    this.http =
      config.http ??
      axios.create({
        baseURL: config.baseUrl ?? 'https://digitalmanager.guru/api/v2',
        headers: {
          Authorization: `Bearer ${config.apiKey}`,
          Accept: 'application/json',
        },
        timeout: config.timeoutMs ?? 15000,
      });
  }

  /**
   * Collect every page of approved transactions of one product in one window
   */
  async fetchAll(
    productId: string,
    windowStart: string,
    windowEnd: string,
    options: FetchOptions = {}
  ): Promise<FetchOutcome> {
    const transactions: Transaction[] = [];
    let cursor: string | undefined;
    let pages = 0;

    for (;;) {
      const params: Record<string, string | string[]> = {
        transaction_status: ['approved'],
        ordered_at_ini: windowStart,
        ordered_at_end: windowEnd,
        product_id: productId,
      };
      if (cursor) {
        params.cursor = cursor;
      }

      const result = await this.fetchPage(params);

      if (!result.ok) {
        if (pages === 0) {
          this.logger.warn(
            { productId, windowStart, windowEnd, reason: result.reason },
            'First page failed after retries'
          );
          return { kind: 'retryable', reason: result.reason };
        }
        this.logger.warn(
          { productId, windowStart, windowEnd, pages, collected: transactions.length, reason: result.reason },
          'Page failed after retries, keeping partial result'
        );
        return { kind: 'ok', transactions, pages, partial: true };
      }

      pages++;
      transactions.push(...this.parseItems(result.page.data, productId, options.tier));

      const next = result.page.next_cursor;
      if (!next) {
        break;
      }
      cursor = next;
    }

    this.logger.debug({ productId, windowStart, windowEnd, pages, count: transactions.length }, 'Window collected');
    return { kind: 'ok', transactions, pages, partial: false };
  }

  /**
   * fetchAll with whole-window retries; resolves to [] once attempts run out
   */
  async fetchWithRetry(
    productId: string,
    windowStart: string,
    windowEnd: string,
    options: FetchOptions = {}
  ): Promise<Transaction[]> {
    for (let attempt = 0; attempt < this.fetchAttempts; attempt++) {
      const outcome = await this.fetchAll(productId, windowStart, windowEnd, options);
      if (outcome.kind === 'ok') {
        return outcome.transactions;
      }

      if (attempt < this.fetchAttempts - 1) {
        const delay = this.backoffBaseMs * 2 ** attempt + this.random() * this.backoffBaseMs;
        this.logger.warn(
          { productId, windowStart, windowEnd, attempt: attempt + 1, delay, reason: outcome.reason },
          'Retrying window collection'
        );
        await this.sleep(delay);
      }
    }

    this.logger.error(
      { productId, windowStart, windowEnd, attempts: this.fetchAttempts },
      'Window collection failed, giving up'
    );
    return [];
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private async fetchPage(params: Record<string, string | string[]>): Promise<PageResult> {
    let reason = 'unknown error';

    for (let attempt = 0; attempt <= this.maxPageRetries; attempt++) {
      try {
        const response = await this.gate.run(() => this.http.get('/transactions', { params }));
        if (response.status < 200 || response.status >= 300) {
          reason = `HTTP ${response.status}`;
        } else {
          const parsed = transactionPageSchema.safeParse(response.data);
          if (parsed.success) {
            return { ok: true, page: parsed.data };
          }
          reason = `Malformed page: ${parsed.error.issues[0]?.message ?? 'invalid body'}`;
        }
      } catch (error) {
        reason = axios.isAxiosError(error)
          ? `Guru API error: ${error.response?.status ?? error.code ?? 'network'} - ${error.message}`
          : errorMessage(error);
      }

      if (attempt < this.maxPageRetries) {
        const delay = this.backoffBaseMs * 1.5 ** attempt + this.random() * this.backoffBaseMs;
        this.logger.debug({ attempt: attempt + 1, delay, reason, cursor: params.cursor }, 'Retrying page');
        await this.sleep(delay);
      }
    }

    return { ok: false, reason };
  }

  private parseItems(items: unknown[], productId: string, tier: Tier | undefined): Transaction[] {
    const parsed: Transaction[] = [];
    for (const item of items) {
      const result = transactionSchema.safeParse(item);
      if (!result.success) {
        this.logger.warn(
          { productId, issue: result.error.issues[0]?.message },
          'Skipping malformed transaction'
        );
        continue;
      }
      parsed.push(tier ? { ...result.data, tier } : result.data);
    }
    return parsed;
  }
}
