/**
 * Product collection
 *
 * Builds the run context of a product collection and fans the fetch out over
 * product id x date block.
 */

import type { Transaction } from '../types/guru.js';
import type { ProductRunContext } from '../types/run.js';
import { splitIntoQuarterBlocks } from '../packages/collection/periods.js';
import { runTasks } from '../packages/collection/TaskScheduler.js';
import type { ProgressCallback, Task } from '../packages/collection/TaskScheduler.js';
import { formatIsoDate, parseIsoDate } from '../utils/dates.js';
import { ValidationError } from '../utils/errors.js';
import type { Catalog } from './catalog.js';
import type { CollectionDeps, CollectionResult } from './subscriptionCollection.js';

export interface ProductRunRequest {
  startDate: string;
  endDate: string;
  /** Collect one product; every non-subscription product when omitted */
  productName?: string;
  boxName?: string;
}

export function buildProductRunContext(
  request: ProductRunRequest,
  catalog: Catalog,
  runDate: Date = new Date()
): ProductRunContext {
  const start = parseIsoDate(request.startDate);
  const end = parseIsoDate(request.endDate);
  if (!start) {
    throw new ValidationError(`Invalid start date: ${request.startDate}`, 'start_date');
  }
  if (!end) {
    throw new ValidationError(`Invalid end date: ${request.endDate}`, 'end_date');
  }
  if (start.getTime() > end.getTime()) {
    throw new ValidationError('Start date must not be after end date', 'start_date');
  }

  return {
    mode: 'products',
    startDate: formatIsoDate(start),
    endDate: formatIsoDate(end),
    productIds: catalog.productIds(request.productName),
    boxName: (request.boxName ?? '').trim(),
    runDate,
  };
}

export async function collectProductTransactions(
  context: ProductRunContext,
  deps: CollectionDeps,
  onProgress?: ProgressCallback
): Promise<CollectionResult> {
  const requestedStart = parseIsoDate(context.startDate);
  const end = parseIsoDate(context.endDate);
  if (!requestedStart || !end) {
    throw new ValidationError('Invalid product run window');
  }

  const start = requestedStart.getTime() < deps.collectionFloor.getTime() ? deps.collectionFloor : requestedStart;
  const blocks = start.getTime() > end.getTime() ? [] : splitIntoQuarterBlocks(start, end);

  const tasks: Array<Task<Transaction>> = [];
  for (const productId of context.productIds) {
    for (const [windowStart, windowEnd] of blocks) {
      tasks.push(() => deps.client.fetchWithRetry(productId, windowStart, windowEnd));
    }
  }

  deps.logger?.info(
    { startDate: formatIsoDate(start), endDate: context.endDate, products: context.productIds.length, tasks: tasks.length },
    'Collecting product transactions'
  );

  const { results, errors } = await runTasks(tasks, {
    concurrency: deps.maxConcurrency,
    label: 'Collecting product transactions',
    onProgress,
    logger: deps.logger,
  });

  return { transactions: results, errors, tasks: tasks.length };
}
