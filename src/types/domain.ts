/**
 * Subscription tiers, by recurrence of the plan
 */
export const TIERS = ['annual', 'biennial', 'triennial', 'bimonthly', 'monthly'] as const;
export type Tier = (typeof TIERS)[number];

/**
 * Shipping periodicity of a subscription box
 */
export const PERIODICITIES = ['monthly', 'bimonthly'] as const;
export type Periodicity = (typeof PERIODICITIES)[number];

/**
 * How collection windows are chosen for subscription runs:
 * - period: only the selected month or bimester
 * - all: the selected period plus the multi-year look-back of each tier
 */
export type PeriodMode = 'period' | 'all';

export const MULTI_YEAR_TIERS: ReadonlySet<Tier> = new Set<Tier>(['annual', 'biennial', 'triennial']);

export interface DateWindow {
  start: Date;
  end: Date;
}
