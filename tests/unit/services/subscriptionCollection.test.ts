import { describe, it, expect, vi } from 'vitest';
import type { FetchOptions } from '../../../src/packages/collection/GuruClient.js';
import {
  buildSubscriptionRunContext,
  collectSubscriptionTransactions,
  windowsForTier,
} from '../../../src/services/subscriptionCollection.js';
import type { Transaction } from '../../../src/types/guru.js';
import { BoxUnavailableError, ValidationError } from '../../../src/utils/errors.js';
import { buildCatalog, catalogFixture, makeTransaction, subscriptionContext } from '../../helpers/fixtures.js';

const floor = new Date('2024-10-01T00:00:00Z');

function fakeClient(failFor?: string) {
  return {
    fetchWithRetry: vi.fn(
      async (productId: string, windowStart: string, windowEnd: string, options?: FetchOptions): Promise<Transaction[]> => {
        if (productId === failFor) {
          throw new Error('boom');
        }
        return [makeTransaction({ id: `${productId}@${windowStart}..${windowEnd}`, productId, tier: options?.tier })];
      }
    ),
  };
}

describe('subscription collection', () => {
  describe('buildSubscriptionRunContext', () => {
    it('should default to bimonthly runs', () => {
      const runDate = new Date('2025-05-02T12:00:00Z');

      const context = buildSubscriptionRunContext(
        { year: 2025, month: 3, periodMode: 'period', boxName: ' Box Classics ' },
        buildCatalog(),
        runDate
      );

      expect(context.periodicity).toBe('bimonthly');
      expect(context.period).toBe(2);
      expect(context.activeWindow.start.toISOString()).toBe('2025-03-01T00:00:00.000Z');
      expect(context.activeWindow.end.toISOString()).toBe('2025-04-30T23:59:59.999Z');
      expect(context.boxName).toBe('Box Classics');
      expect([...context.planIds]).toEqual(['pln-annual', 'pln-2y', 'pln-bi']);
      expect(context.runDate).toBe(runDate);
    });

    it('should use the plans of a monthly run', () => {
      const context = buildSubscriptionRunContext(
        { year: 2025, month: 2, periodicity: 'monthly', periodMode: 'all' },
        buildCatalog()
      );

      expect(context.period).toBe(2);
      expect(context.activeWindow.end.toISOString()).toBe('2025-02-28T23:59:59.999Z');
      expect([...context.planIds]).toEqual(['pln-monthly']);
      expect(context.boxName).toBe('');
    });

    it('should refuse an unavailable box', () => {
      const catalog = buildCatalog({
        ...catalogFixture,
        'Box Fantasy': { ...catalogFixture['Box Fantasy'], unavailable: true },
      });

      expect(() =>
        buildSubscriptionRunContext({ year: 2025, month: 3, periodMode: 'period', boxName: 'Box Fantasy' }, catalog)
      ).toThrow(BoxUnavailableError);
    });

    it('should refuse an invalid month', () => {
      expect(() =>
        buildSubscriptionRunContext({ year: 2025, month: 0, periodMode: 'period' }, buildCatalog())
      ).toThrow(ValidationError);
    });
  });

  describe('windowsForTier', () => {
    it('should collect only the period in period mode', () => {
      const context = subscriptionContext();

      expect(windowsForTier('annual', context, floor)).toEqual([['2025-03-01', '2025-04-30']]);
      expect(windowsForTier('bimonthly', context, floor)).toEqual([['2025-03-01', '2025-04-30']]);
    });

    it('should skip short plans of another periodicity', () => {
      expect(windowsForTier('monthly', subscriptionContext(), floor)).toEqual([]);
    });

    it('should look back the plan length in all mode', () => {
      const context = subscriptionContext({ periodMode: 'all' });

      expect(windowsForTier('annual', context, floor)).toEqual([
        ['2024-10-01', '2024-12-31'],
        ['2025-01-01', '2025-04-30'],
      ]);
      expect(windowsForTier('bimonthly', context, floor)).toEqual([['2025-03-01', '2025-04-30']]);
    });
  });

  describe('collectSubscriptionTransactions', () => {
    it('should fetch every plan id of every tier, tagged with its tier', async () => {
      const client = fakeClient();

      const result = await collectSubscriptionTransactions(subscriptionContext(), {
        client,
        catalog: buildCatalog(),
        maxConcurrency: 2,
        collectionFloor: floor,
      });

      expect(result.tasks).toBe(3);
      expect(result.errors).toEqual([]);
      expect(client.fetchWithRetry).toHaveBeenCalledWith('pln-annual', '2025-03-01', '2025-04-30', { tier: 'annual' });
      expect(client.fetchWithRetry).toHaveBeenCalledWith('pln-2y', '2025-03-01', '2025-04-30', { tier: 'biennial' });
      expect(client.fetchWithRetry).toHaveBeenCalledWith('pln-bi', '2025-03-01', '2025-04-30', { tier: 'bimonthly' });
      expect(result.transactions.map((tx) => [tx.productId, tx.tier]).sort()).toEqual([
        ['pln-2y', 'biennial'],
        ['pln-annual', 'annual'],
        ['pln-bi', 'bimonthly'],
      ]);
    });

    it('should keep collecting when one task fails', async () => {
      const client = fakeClient('pln-2y');
      const onProgress = vi.fn();

      const result = await collectSubscriptionTransactions(
        subscriptionContext(),
        { client, catalog: buildCatalog(), maxConcurrency: 1, collectionFloor: floor },
        onProgress
      );

      expect(result.transactions).toHaveLength(2);
      expect(result.errors).toEqual(['Failed to fetch transactions (Collecting subscription transactions): boom']);
      expect(onProgress).toHaveBeenLastCalledWith('Collecting subscription transactions', 3, 3);
    });
  });
});
