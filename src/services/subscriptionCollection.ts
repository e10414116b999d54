/**
 * Subscription collection
 *
 * Builds the run context of a subscription collection and fans the fetch
 * out over tier x plan id x window.
 */

import { MULTI_YEAR_TIERS, TIERS } from '../types/domain.js';
import type { PeriodMode, Periodicity, Tier } from '../types/domain.js';
import type { Transaction } from '../types/guru.js';
import type { SubscriptionRunContext } from '../types/run.js';
import { multiYearWindow, splitIntoQuarterBlocks, subscriptionPeriod } from '../packages/collection/periods.js';
import type { DateBlock } from '../packages/collection/periods.js';
import { runTasks } from '../packages/collection/TaskScheduler.js';
import type { ProgressCallback, Task } from '../packages/collection/TaskScheduler.js';
import type { GuruClient } from '../packages/collection/GuruClient.js';
import { BoxUnavailableError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import type { Catalog } from './catalog.js';

export type TransactionSource = Pick<GuruClient, 'fetchWithRetry'>;

export interface CollectionDeps {
  client: TransactionSource;
  catalog: Catalog;
  maxConcurrency: number;
  /** Earliest date ever collected */
  collectionFloor: Date;
  logger?: Logger;
}

export interface CollectionResult {
  transactions: Transaction[];
  errors: string[];
  tasks: number;
}

export interface SubscriptionRunRequest {
  year: number;
  month: number;
  /** @default 'bimonthly' */
  periodicity?: Periodicity;
  periodMode: PeriodMode;
  boxName?: string;
}

const PLAN_YEARS: Partial<Record<Tier, number>> = {
  annual: 1,
  biennial: 2,
  triennial: 3,
};

export function buildSubscriptionRunContext(
  request: SubscriptionRunRequest,
  catalog: Catalog,
  runDate: Date = new Date()
): SubscriptionRunContext {
  const periodicity = request.periodicity ?? 'bimonthly';
  const { start, end, period } = subscriptionPeriod(request.year, request.month, periodicity);

  const boxName = (request.boxName ?? '').trim();
  if (boxName && catalog.isUnavailable(boxName)) {
    throw new BoxUnavailableError(boxName);
  }

  return {
    mode: 'subscriptions',
    year: request.year,
    month: request.month,
    periodicity,
    periodMode: request.periodMode,
    period,
    activeWindow: { start, end },
    boxName,
    planIds: catalog.planIds(periodicity).all,
    runDate,
  };
}

/**
 * Collection windows of one tier
 */
export function windowsForTier(
  tier: Tier,
  context: SubscriptionRunContext,
  collectionFloor: Date
): DateBlock[] {
  const { start, end } = context.activeWindow;
  const years = PLAN_YEARS[tier];

  if (MULTI_YEAR_TIERS.has(tier) && years !== undefined) {
    return context.periodMode === 'period'
      ? splitIntoQuarterBlocks(start, end)
      : multiYearWindow(end, years, collectionFloor);
  }

  // Short plans are only collected in runs of their own periodicity
  return tier === context.periodicity ? splitIntoQuarterBlocks(start, end) : [];
}

export async function collectSubscriptionTransactions(
  context: SubscriptionRunContext,
  deps: CollectionDeps,
  onProgress?: ProgressCallback
): Promise<CollectionResult> {
  const planIds = deps.catalog.planIds(context.periodicity);
  const tasks: Array<Task<Transaction>> = [];

  for (const tier of TIERS) {
    const ids = planIds.byTier.get(tier) ?? [];
    if (ids.length === 0) {
      continue;
    }
    const windows = windowsForTier(tier, context, deps.collectionFloor);
    for (const productId of ids) {
      for (const [windowStart, windowEnd] of windows) {
        tasks.push(() => deps.client.fetchWithRetry(productId, windowStart, windowEnd, { tier }));
      }
    }
  }

  deps.logger?.info(
    { year: context.year, month: context.month, periodicity: context.periodicity, tasks: tasks.length },
    'Collecting subscription transactions'
  );

  const { results, errors } = await runTasks(tasks, {
    concurrency: deps.maxConcurrency,
    label: 'Collecting subscription transactions',
    onProgress,
    logger: deps.logger,
  });

  return { transactions: results, errors, tasks: tasks.length };
}
