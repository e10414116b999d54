import { z } from 'zod';
import { parseInstant } from '../utils/dates.js';
import type { Tier } from './domain.js';

/**
 * Guru transaction as consumed by the pipeline
 */
export interface Transaction {
  id: string;
  productId: string;
  productName: string;
  offerId: string;
  payment: {
    total: number;
    method: string;
    couponCode: string;
    couponIncidenceType: string;
    couponIncidenceValue: number;
  };
  subscriptionId: string | null;
  invoiceType: string;
  orderedAt: Date;
  isOrderBump: boolean;
  contact: Contact;
  /** Tier of the plan id this transaction was collected for */
  tier?: Tier;
}

export interface Contact {
  name: string;
  doc: string;
  email: string;
  phone: string;
  address: string;
  number: string;
  complement: string;
  district: string;
  zipCode: string;
  city: string;
  state: string;
}

// ----------------------------------------------------------------------------
// Wire schemas
// ----------------------------------------------------------------------------

const idString = z.union([z.string(), z.number()]).transform((value) => String(value).trim());
const optionalText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? '' : String(value).trim()));
const optionalNumber = z
  .union([z.number(), z.string()])
  .nullish()
  .transform((value) => {
    const parsed = typeof value === 'string' ? Number(value.replace(',', '.')) : value;
    return typeof parsed === 'number' && Number.isFinite(parsed) ? parsed : 0;
  });

const contactSchema = z
  .object({
    name: optionalText,
    doc: optionalText,
    email: optionalText,
    phone_number: optionalText,
    address: optionalText,
    address_number: optionalText,
    address_comp: optionalText,
    address_district: optionalText,
    address_zip_code: optionalText,
    address_city: optionalText,
    address_state: optionalText,
  })
  .nullish();

/**
 * Raw transaction item from GET /transactions
 */
export const transactionSchema = z
  .object({
    id: idString,
    product: z
      .object({
        internal_id: optionalText,
        name: optionalText,
        offer: z.object({ id: optionalText }).nullish(),
      })
      .nullish(),
    payment: z
      .object({
        total: optionalNumber,
        method: optionalText,
        coupon: z
          .object({
            coupon_code: optionalText,
            incidence_type: optionalText,
            incidence_value: optionalNumber,
          })
          .nullish(),
      })
      .nullish(),
    subscription: z.object({ id: optionalText }).nullish(),
    invoice: z.object({ type: optionalText }).nullish(),
    dates: z.object({ ordered_at: z.union([z.number(), z.string()]).nullish() }).nullish(),
    ordered_at: z.union([z.number(), z.string()]).nullish(),
    created_at: z.union([z.number(), z.string()]).nullish(),
    is_order_bump: z.union([z.boolean(), z.number(), z.string()]).nullish(),
    contact: contactSchema,
  })
  .transform((raw): Transaction => {
    const contact = raw.contact;
    const subscriptionId = raw.subscription?.id ?? '';
    const orderedAt =
      parseInstant(raw.dates?.ordered_at) ??
      parseInstant(raw.ordered_at) ??
      parseInstant(raw.created_at) ??
      new Date(0);

    return {
      id: raw.id,
      productId: raw.product?.internal_id ?? '',
      productName: raw.product?.name ?? '',
      offerId: raw.product?.offer?.id ?? '',
      payment: {
        total: raw.payment?.total ?? 0,
        method: raw.payment?.method ?? '',
        couponCode: (raw.payment?.coupon?.coupon_code ?? '').toLowerCase(),
        couponIncidenceType: (raw.payment?.coupon?.incidence_type ?? '').toLowerCase(),
        couponIncidenceValue: raw.payment?.coupon?.incidence_value ?? 0,
      },
      subscriptionId: subscriptionId === '' ? null : subscriptionId,
      invoiceType: (raw.invoice?.type ?? '').toLowerCase(),
      orderedAt,
      isOrderBump: parseFlag(raw.is_order_bump),
      contact: {
        name: contact?.name ?? '',
        doc: contact?.doc ?? '',
        email: contact?.email ?? '',
        phone: contact?.phone_number ?? '',
        address: contact?.address ?? '',
        number: contact?.address_number ?? '',
        complement: contact?.address_comp ?? '',
        district: contact?.address_district ?? '',
        zipCode: contact?.address_zip_code ?? '',
        city: contact?.address_city ?? '',
        state: contact?.address_state ?? '',
      },
    };
  });

function parseFlag(value: boolean | number | string | null | undefined): boolean {
  if (typeof value === 'string') {
    return ['1', 'true', 'yes', 's', 'sim'].includes(value.trim().toLowerCase());
  }
  return Boolean(value);
}

/**
 * One page of GET /transactions
 */
export const transactionPageSchema = z.object({
  data: z.array(z.unknown()).default([]),
  next_cursor: z.string().nullish(),
});

export type TransactionPage = z.infer<typeof transactionPageSchema>;
