import { Catalog } from '../../src/services/catalog.js';
import { catalogFileSchema } from '../../src/types/catalog.js';
import type { Transaction } from '../../src/types/guru.js';
import type { ProductRunContext, SubscriptionRunContext } from '../../src/types/run.js';

export const catalogFixture = {
  'Box Classics': { sku: 'BOX-CLS', weight: 1.2, guru_ids: ['prd-box-classics'] },
  'Box Fantasy': { sku: 'BOX-FAN', weight: 1.1 },
  'Bookmark Set': { sku: 'GFT-BMK' },
  'Tote Bag': { sku: 'GFT-TOTE' },
  'Reading Journal': { sku: 'GFT-JRN' },
  'Reader Kit': {
    sku: 'CMB-KIT',
    type: 'combo',
    guru_ids: ['prd-reader-kit'],
    composed_of: ['GFT-TOTE', 'Reading Journal', 'GFT-BMK'],
  },
  'Annual Plan': {
    sku: 'SUB-ANU',
    type: 'subscription',
    periodicity: 'bimonthly',
    recurrence: 'annual',
    guru_ids: ['pln-annual'],
  },
  '2 Years Plan': {
    sku: 'SUB-2Y',
    type: 'subscription',
    periodicity: 'bimonthly',
    recurrence: 'biennial',
    guru_ids: ['pln-2y'],
  },
  'Bimonthly Plan': {
    sku: 'SUB-BI',
    type: 'subscription',
    periodicity: 'bimonthly',
    recurrence: 'bimonthly',
    guru_ids: ['pln-bi'],
  },
  'Monthly Plan': {
    sku: 'SUB-MEN',
    type: 'subscription',
    periodicity: 'monthly',
    recurrence: 'monthly',
    guru_ids: ['pln-monthly'],
  },
};

export function buildCatalog(raw: unknown = catalogFixture): Catalog {
  return new Catalog(catalogFileSchema.parse(raw));
}

type TransactionOverrides = Omit<Partial<Transaction>, 'payment'> & {
  id: string;
  payment?: Partial<Transaction['payment']>;
};

export function makeTransaction(overrides: TransactionOverrides): Transaction {
  const { payment, ...rest } = overrides;
  return {
    productId: '',
    productName: '',
    offerId: '',
    subscriptionId: null,
    invoiceType: '',
    orderedAt: new Date('2025-03-15T12:00:00Z'),
    isOrderBump: false,
    contact: {
      name: 'Ana Teste',
      doc: '00000000000',
      email: 'ana@example.com',
      phone: '11999990000',
      address: 'Rua A',
      number: '10',
      complement: '',
      district: 'Centro',
      zipCode: '01000-000',
      city: 'Sao Paulo',
      state: 'SP',
    },
    ...rest,
    payment: {
      total: 0,
      method: 'credit_card',
      couponCode: '',
      couponIncidenceType: '',
      couponIncidenceValue: 0,
      ...payment,
    },
  };
}

/**
 * Bimonthly run for March 2025 (bimester 2: Mar 1 - Apr 30)
 */
export function subscriptionContext(overrides: Partial<SubscriptionRunContext> = {}): SubscriptionRunContext {
  return {
    mode: 'subscriptions',
    year: 2025,
    month: 3,
    periodicity: 'bimonthly',
    periodMode: 'period',
    period: 2,
    activeWindow: {
      start: new Date('2025-03-01T00:00:00.000Z'),
      end: new Date('2025-04-30T23:59:59.999Z'),
    },
    boxName: 'Box Classics',
    planIds: new Set(['pln-annual', 'pln-2y', 'pln-bi']),
    runDate: new Date('2025-05-02T12:00:00Z'),
    ...overrides,
  };
}

export function productContext(overrides: Partial<ProductRunContext> = {}): ProductRunContext {
  return {
    mode: 'products',
    startDate: '2025-03-01',
    endDate: '2025-03-31',
    productIds: ['prd-box-classics', 'prd-reader-kit'],
    boxName: '',
    runDate: new Date('2025-05-02T12:00:00Z'),
    ...overrides,
  };
}
