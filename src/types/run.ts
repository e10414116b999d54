import type { DateWindow, PeriodMode, Periodicity } from './domain.js';

/**
 * Parameters of one subscription collection run
 */
export interface SubscriptionRunContext {
  mode: 'subscriptions';
  year: number;
  month: number;
  periodicity: Periodicity;
  periodMode: PeriodMode;
  /** Month (monthly) or bimester (bimonthly) number of the selected period */
  period: number;
  /** Rules, coupon boxes and embedded products only apply to orders inside it */
  activeWindow: DateWindow;
  /** Box shipped in the selected period; may be empty */
  boxName: string;
  /** Guru ids of every plan collected in this run */
  planIds: ReadonlySet<string>;
  /** Date written to the "Data" column */
  runDate: Date;
}

/**
 * Parameters of one product collection run
 */
export interface ProductRunContext {
  mode: 'products';
  startDate: string;
  endDate: string;
  productIds: string[];
  boxName: string;
  runDate: Date;
}

export type RunContext = SubscriptionRunContext | ProductRunContext;
