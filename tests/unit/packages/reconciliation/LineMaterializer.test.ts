import { describe, it, expect } from 'vitest';
import { LineMaterializer, derivedDedupId } from '../../../../src/packages/reconciliation/LineMaterializer.js';
import { RuleEngine } from '../../../../src/packages/reconciliation/RuleEngine.js';
import { ValueCalculator } from '../../../../src/packages/reconciliation/ValueCalculator.js';
import { BLING_COLUMNS } from '../../../../src/types/lines.js';
import { rulesFileSchema } from '../../../../src/types/rules.js';
import {
  buildCatalog,
  catalogFixture,
  makeTransaction,
  productContext,
  subscriptionContext,
} from '../../../helpers/fixtures.js';

const defaultRules = [
  {
    applies_to: 'coupon',
    coupon: { code: 'WELCOME' },
    applicability_labels: ['Annual Subscription (bimonthly)'],
    action: { type: 'override_box', box: 'Box Fantasy' },
  },
  {
    applies_to: 'coupon',
    coupon: { code: 'WELCOME' },
    action: { type: 'add_gifts', gifts: ['Bookmark Set'] },
  },
  {
    applies_to: 'offer',
    offer: { id: 'ofr-annual-journal' },
    action: { type: 'add_gifts', gifts: ['Reading Journal'] },
  },
];

function createMaterializer(rawCatalog: unknown = catalogFixture): LineMaterializer {
  const catalog = buildCatalog(rawCatalog);
  const ruleEngine = new RuleEngine(rulesFileSchema.parse({ rules: defaultRules }).rules);
  return new LineMaterializer({ catalog, calculator: new ValueCalculator({ catalog, ruleEngine }) });
}

describe('LineMaterializer', () => {
  it('should derive dedup ids from the transaction and SKU', () => {
    expect(derivedDedupId('t1', ' gft-bmk ')).toBe('t1:GFT-BMK');
  });

  describe('subscription runs', () => {
    it('should force the table price for a multi-plan group and add coupon gifts', () => {
      const transactions = [
        makeTransaction({
          id: 't1',
          productId: 'prd-box-classics',
          subscriptionId: 'sub-1',
          isOrderBump: true,
          orderedAt: new Date('2025-03-01T10:00:00Z'),
          payment: { total: 15 },
        }),
        makeTransaction({
          id: 't2',
          productId: 'pln-bi',
          subscriptionId: 'sub-1',
          tier: 'bimonthly',
          orderedAt: new Date('2025-03-05T10:00:00Z'),
          payment: { total: 59.9 },
        }),
        makeTransaction({
          id: 't3',
          productId: 'pln-annual',
          subscriptionId: 'sub-1',
          tier: 'annual',
          orderedAt: new Date('2025-03-20T10:00:00Z'),
          payment: { total: 480, couponCode: 'welcome', couponIncidenceType: 'fixed', couponIncidenceValue: 10 },
        }),
      ];

      const result = createMaterializer().materialize(transactions, subscriptionContext());

      expect(result.lines).toHaveLength(2);
      const [base, gift] = result.lines;
      expect(base?.Produto).toBe('Box Fantasy');
      expect(base?.SKU).toBe('BOX-FAN');
      expect(base?.['Valor Unitário']).toBe('80,00');
      expect(base?.['Valor Total']).toBe('80,00');
      expect(base?.dedup_id).toBe('t3');
      expect(base?.periodo).toBe('2');
      expect(base?.periodicidade).toBe('bimonthly');
      expect(base?.['Plano Assinatura']).toBe('annual');
      expect(base?.Cupom).toBe('welcome');
      expect(base?.Data).toBe('02/05/2025');
      expect(base?.['Data Pedido']).toBe('20/03/2025');
      expect(base?.subscription_id).toBe('sub-1');

      expect(gift?.Produto).toBe('Bookmark Set');
      expect(gift?.SKU).toBe('GFT-BMK');
      expect(gift?.['Valor Unitário']).toBe('0,00');
      expect(gift?.dedup_id).toBe('t3:GFT-BMK');

      expect(result.counters).toEqual({ annual: { subscriptions: 1, coupons: 1, embedded: 0 } });
      expect(result.skipped).toBe(0);
    });

    it('should add the embedded product of the offer', () => {
      const tx = makeTransaction({
        id: 't4',
        productId: 'pln-annual',
        subscriptionId: 'sub-4',
        tier: 'annual',
        offerId: 'ofr-annual-journal',
        payment: { total: 500 },
      });

      const result = createMaterializer().materialize([tx], subscriptionContext());

      expect(result.lines.map((line) => [line.Produto, line.SKU, line['Valor Unitário'], line.dedup_id])).toEqual([
        ['Box Classics', 'BOX-CLS', '80,00', 't4'],
        ['Reading Journal', 'GFT-JRN', '0,00', 't4:GFT-JRN'],
      ]);
      expect(result.counters).toEqual({ annual: { subscriptions: 1, coupons: 0, embedded: 1 } });
    });

    it('should add the embedded product to a forced multi-plan group', () => {
      const transactions = [
        makeTransaction({
          id: 'a',
          productId: 'pln-bi',
          subscriptionId: 'sub-11',
          tier: 'bimonthly',
          orderedAt: new Date('2025-03-05T10:00:00Z'),
          payment: { total: 59.9 },
        }),
        makeTransaction({
          id: 'b',
          productId: 'pln-annual',
          subscriptionId: 'sub-11',
          tier: 'annual',
          offerId: 'ofr-annual-journal',
          orderedAt: new Date('2025-03-20T10:00:00Z'),
          payment: { total: 480 },
        }),
      ];

      const result = createMaterializer().materialize(transactions, subscriptionContext());

      expect(result.lines.map((line) => [line.Produto, line.SKU, line['Valor Unitário'], line.dedup_id])).toEqual([
        ['Box Classics', 'BOX-CLS', '80,00', 'b'],
        ['Reading Journal', 'GFT-JRN', '0,00', 'b:GFT-JRN'],
      ]);
      expect(result.counters).toEqual({ annual: { subscriptions: 1, coupons: 0, embedded: 1 } });
    });

    it('should add the embedded product for a short-term tier', () => {
      const tx = makeTransaction({
        id: 't12',
        productId: 'pln-bi',
        subscriptionId: 'sub-12',
        tier: 'bimonthly',
        offerId: 'ofr-annual-journal',
        payment: { total: 59.9 },
      });

      const result = createMaterializer().materialize([tx], subscriptionContext());

      expect(result.lines.map((line) => [line.Produto, line['Valor Unitário'], line.dedup_id])).toEqual([
        ['Box Classics', '59,90', 't12'],
        ['Reading Journal', '0,00', 't12:GFT-JRN'],
      ]);
      expect(result.counters).toEqual({ bimonthly: { subscriptions: 1, coupons: 0, embedded: 1 } });
    });

    it('should not add the embedded product outside the active window', () => {
      const tx = makeTransaction({
        id: 't13',
        productId: 'pln-annual',
        subscriptionId: 'sub-13',
        tier: 'annual',
        offerId: 'ofr-annual-journal',
        orderedAt: new Date('2025-02-10T10:00:00Z'),
        payment: { total: 480 },
      });

      const result = createMaterializer().materialize([tx], subscriptionContext());

      expect(result.lines.map((line) => line.dedup_id)).toEqual(['t13']);
      expect(result.counters).toEqual({ annual: { subscriptions: 1, coupons: 0, embedded: 0 } });
    });

    it('should prefer the override box over the run box', () => {
      const tx = makeTransaction({
        id: 't14',
        productId: 'pln-annual',
        subscriptionId: 'sub-14',
        tier: 'annual',
        payment: { total: 480, couponCode: 'WELCOME' },
      });

      const result = createMaterializer().materialize([tx], subscriptionContext({ boxName: 'Box Classics' }));

      expect(result.lines[0]?.Produto).toBe('Box Fantasy');
      expect(result.lines[0]?.SKU).toBe('BOX-FAN');
    });

    it('should use the run box, then the principal, without an override', () => {
      const tx = makeTransaction({
        id: 't15',
        productId: 'pln-annual',
        subscriptionId: 'sub-15',
        tier: 'annual',
        payment: { total: 480 },
      });

      expect(createMaterializer().materialize([tx], subscriptionContext()).lines[0]?.Produto).toBe('Box Classics');
      expect(createMaterializer().materialize([tx], subscriptionContext({ boxName: '' })).lines[0]?.Produto).toBe(
        'Annual Plan'
      );
    });

    it('should sum the principal payments of a single-plan group', () => {
      const transactions = [
        makeTransaction({
          id: 't5',
          productId: 'pln-bi',
          subscriptionId: 'sub-5',
          tier: 'bimonthly',
          orderedAt: new Date('2025-03-02T10:00:00Z'),
          payment: { total: 29.95 },
        }),
        makeTransaction({
          id: 't6',
          productId: 'pln-bi',
          subscriptionId: 'sub-5',
          tier: 'bimonthly',
          orderedAt: new Date('2025-03-10T10:00:00Z'),
          payment: { total: 30 },
        }),
        makeTransaction({
          id: 't7',
          productId: 'pln-annual',
          subscriptionId: 'sub-5',
          isOrderBump: true,
          orderedAt: new Date('2025-03-01T10:00:00Z'),
          payment: { total: 15 },
        }),
      ];

      const result = createMaterializer().materialize(transactions, subscriptionContext());

      expect(result.lines).toHaveLength(1);
      expect(result.lines[0]?.dedup_id).toBe('t6');
      expect(result.lines[0]?.['Valor Unitário']).toBe('59,95');
      expect(result.counters).toEqual({ bimonthly: { subscriptions: 1, coupons: 0, embedded: 0 } });
    });

    it('should keep the first transaction when order dates tie', () => {
      const orderedAt = new Date('2025-03-10T10:00:00Z');
      const transactions = [
        makeTransaction({ id: 'first', productId: 'pln-bi', subscriptionId: 'sub-6', tier: 'bimonthly', orderedAt }),
        makeTransaction({ id: 'second', productId: 'pln-bi', subscriptionId: 'sub-6', tier: 'bimonthly', orderedAt }),
      ];

      const result = createMaterializer().materialize(transactions, subscriptionContext());

      expect(result.lines.map((line) => line.dedup_id)).toEqual(['first']);
    });

    it('should derive the period from the order date in all mode', () => {
      const tx = makeTransaction({
        id: 't8',
        productId: 'pln-annual',
        subscriptionId: 'sub-8',
        tier: 'annual',
        orderedAt: new Date('2024-11-20T10:00:00Z'),
        payment: { total: 480 },
      });

      const result = createMaterializer().materialize([tx], subscriptionContext({ periodMode: 'all' }));

      expect(result.lines[0]?.periodo).toBe('6');
    });

    it('should drop transactions without a subscription and count untiered groups', () => {
      const transactions = [
        makeTransaction({ id: 'loose', productId: 'pln-bi', payment: { total: 10 } }),
        makeTransaction({ id: 't9', productId: 'pln-bi', subscriptionId: 'sub-9', payment: { total: 10 } }),
      ];

      const result = createMaterializer().materialize(transactions, subscriptionContext());

      expect(result.lines.map((line) => line.dedup_id)).toEqual(['t9']);
      expect(result.counters).toEqual({ untiered: { subscriptions: 1, coupons: 0, embedded: 0 } });
    });

    it('should flag lines of unavailable boxes', () => {
      const catalog = { ...catalogFixture, 'Box Classics': { ...catalogFixture['Box Classics'], unavailable: true } };
      const tx = makeTransaction({ id: 't10', productId: 'pln-bi', subscriptionId: 'sub-10', tier: 'bimonthly' });

      const result = createMaterializer(catalog).materialize([tx], subscriptionContext());

      expect(result.lines[0]?.indisponivel).toBe('S');
    });
  });

  describe('product runs', () => {
    it('should emit one standardized line per plain product', () => {
      const tx = makeTransaction({ id: 'p1', productId: 'prd-box-classics', payment: { total: 59.9 } });

      const result = createMaterializer().materialize([tx], productContext());

      expect(result.lines).toHaveLength(1);
      const [line] = result.lines;
      expect(Object.keys(line ?? {})).toEqual([...BLING_COLUMNS]);
      expect(line?.Produto).toBe('Box Classics');
      expect(line?.['Valor Unitário']).toBe('59,90');
      expect(line?.dedup_id).toBe('p1');
      expect(line?.['Número pedido']).toBe('');
      expect(line?.indisponivel).toBe('');
      expect(result.counters).toEqual({});
    });

    it('should split a combo into its components', () => {
      const tx = makeTransaction({ id: 'p2', productId: 'prd-reader-kit', payment: { total: 100 } });

      const result = createMaterializer().materialize([tx], productContext());

      expect(
        result.lines.map((line) => [line.Produto, line.SKU, line['Valor Unitário'], line.Combo, line.dedup_id])
      ).toEqual([
        ['Tote Bag', 'GFT-TOTE', '33,33', 'Reader Kit', 'p2:GFT-TOTE'],
        ['Reading Journal', 'GFT-JRN', '33,33', 'Reader Kit', 'p2:GFT-JRN'],
        ['Bookmark Set', 'GFT-BMK', '33,34', 'Reader Kit', 'p2:GFT-BMK'],
      ]);
    });

    it('should keep an unavailable mapped combo as a single flagged line', () => {
      const catalog = {
        ...catalogFixture,
        'Reader Kit': { ...catalogFixture['Reader Kit'], unavailable: true, shopify_ids: ['shp-1'] },
      };
      const tx = makeTransaction({ id: 'p3', productId: 'prd-reader-kit', payment: { total: 100 } });

      const result = createMaterializer(catalog).materialize([tx], productContext());

      expect(result.lines.map((line) => [line.Produto, line.SKU, line.indisponivel, line.dedup_id])).toEqual([
        ['Reader Kit', 'CMB-KIT', 'S', 'p3'],
      ]);
    });

    it('should ship an unknown component under its own reference', () => {
      const catalog = {
        ...catalogFixture,
        'Reader Kit': { ...catalogFixture['Reader Kit'], composed_of: ['GFT-TOTE', 'UNKNOWN-REF'] },
      };
      const tx = makeTransaction({ id: 'p6', productId: 'prd-reader-kit', payment: { total: 50 } });

      const result = createMaterializer(catalog).materialize([tx], productContext());

      expect(result.skipped).toBe(0);
      expect(result.lines.map((line) => [line.Produto, line.SKU, line['Valor Unitário'], line.dedup_id])).toEqual([
        ['Tote Bag', 'GFT-TOTE', '25,00', 'p6:GFT-TOTE'],
        ['UNKNOWN-REF', 'UNKNOWN-REF', '25,00', 'p6:UNKNOWN-REF'],
      ]);
    });

    it('should skip a transaction whose combo has a catalog component without SKU', () => {
      const catalog = {
        ...catalogFixture,
        'Mystery Item': {},
        'Reader Kit': { ...catalogFixture['Reader Kit'], composed_of: ['GFT-TOTE', 'Mystery Item'] },
      };
      const transactions = [
        makeTransaction({ id: 'p4', productId: 'prd-reader-kit', payment: { total: 100 } }),
        makeTransaction({ id: 'p5', productId: 'prd-box-classics', payment: { total: 59.9 } }),
      ];

      const result = createMaterializer(catalog).materialize(transactions, productContext());

      expect(result.skipped).toBe(1);
      expect(result.lines.map((line) => line.dedup_id)).toEqual(['p5']);
    });
  });
});
