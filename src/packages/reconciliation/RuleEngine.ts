/**
 * RuleEngine
 *
 * Evaluates coupon rules for subscription transactions:
 * - `override_box` swaps the shipped box (most specific label match wins)
 * - `add_gifts` adds zero-priced gift lines
 *
 * Offer rules are exposed as the embedded-product map, and coupon box
 * overrides as per-tier coupon maps.
 */

import type { Periodicity, Tier } from '../../types/domain.js';
import type { Gift, OfferRule, Rule } from '../../types/rules.js';
import type { RunContext } from '../../types/run.js';
import type { Transaction } from '../../types/guru.js';
import { parseIsoDate } from '../../utils/dates.js';
import { normalizeText } from '../../utils/text.js';

// ============================================================================
// Types
// ============================================================================

export interface RuleOutcome {
  overrideBox: string | null;
  gifts: string[];
}

export interface EmbeddedOffer {
  name: string;
  validFrom?: Date;
  /** Inclusive through the end of the day */
  validUntil?: Date;
}

export interface CouponBoxMaps {
  /** coupon -> box for annual, biennial and triennial plans */
  multiYear: Map<string, string>;
  /** coupon -> box for bimonthly and monthly plans */
  shortTerm: Map<string, string>;
}

// ============================================================================
// Labels
// ============================================================================

const TIER_LABELS: Record<Tier, string> = {
  annual: 'Annual Subscription',
  biennial: '2 Years Subscription',
  triennial: '3 Years Subscription',
  bimonthly: 'Bimonthly Subscription',
  monthly: 'Monthly Subscription',
};

const GENERIC_TOKENS = new Set(['annual', '2 years', '3 years', 'monthly', 'bimonthly']);

const MULTI_YEAR_KEYWORDS = ['annual', '2 years', 'biennial', '3 years', 'triennial'];
const SHORT_TERM_KEYWORDS = ['bimonthly', 'monthly'];

/**
 * Normalized labels a rule may use to target this tier, e.g.
 * "annual subscription (monthly)"
 */
export function tierLabels(tier: Tier | undefined, periodicity: Periodicity | undefined): Set<string> {
  const base = tier ? TIER_LABELS[tier] : 'Subscription';
  return new Set([normalizeText(periodicity ? `${base} (${periodicity})` : base)]);
}

const NO_MATCH = -1;

/**
 * Specificity of a rule's applicability labels: 3 exact tier label,
 * 2 current box name, 1 generic token, 0 unrestricted, -1 no match
 */
export function scoreLabels(
  labels: readonly string[],
  targets: ReadonlySet<string>,
  baseProduct: string
): number {
  if (labels.length === 0) {
    return 0;
  }

  const base = normalizeText(baseProduct);
  const joinedTargets = [...targets].sort().join(' ');
  let best = NO_MATCH;

  for (const label of labels) {
    const normalized = normalizeText(label);
    if (!normalized) {
      best = Math.max(best, 0);
    } else if (targets.has(normalized)) {
      best = Math.max(best, 3);
    } else if (normalized === base) {
      best = Math.max(best, 2);
    } else if (GENERIC_TOKENS.has(normalized) && joinedTargets.includes(normalized)) {
      best = Math.max(best, 1);
    }
  }

  return best;
}

function giftName(gift: Gift): string {
  return (typeof gift === 'string' ? gift : gift.name).trim();
}

function endOfDay(date: Date): Date {
  return new Date(date.getTime() + 24 * 60 * 60 * 1000 - 1);
}

// ============================================================================
// RuleEngine
// ============================================================================

export class RuleEngine {
  private readonly rules: readonly Rule[];

  constructor(rules: readonly Rule[]) {
    this.rules = rules.filter((rule) => rule.enabled);
  }

  /**
   * Rules only apply to subscription orders placed inside the run's active window
   */
  isWithinActiveWindow(orderedAt: Date, context: RunContext): boolean {
    if (context.mode !== 'subscriptions') {
      return false;
    }
    const time = orderedAt.getTime();
    return time >= context.activeWindow.start.getTime() && time <= context.activeWindow.end.getTime();
  }

  apply(transaction: Transaction, context: RunContext, baseProduct: string): RuleOutcome {
    if (context.mode !== 'subscriptions' || !this.isWithinActiveWindow(transaction.orderedAt, context)) {
      return { overrideBox: null, gifts: [] };
    }

    const coupon = normalizeText(transaction.payment.couponCode);
    const targets = tierLabels(transaction.tier, context.periodicity);
    let overrideBox: string | null = null;
    let overrideScore = NO_MATCH;
    const rawGifts: string[] = [];

    for (const rule of this.rules) {
      if (rule.applies_to !== 'coupon') {
        continue;
      }
      const code = normalizeText(rule.coupon.code);
      if (!code || code !== coupon) {
        continue;
      }

      const score = scoreLabels(rule.applicability_labels, targets, baseProduct);
      if (score === NO_MATCH) {
        continue;
      }

      if (rule.action.type === 'add_gifts') {
        rawGifts.push(...rule.action.gifts.map(giftName));
      } else if (score > overrideScore) {
        overrideBox = rule.action.box.trim();
        overrideScore = score;
      }
    }

    const excluded = new Set([normalizeText(baseProduct), normalizeText(overrideBox)]);
    const seen = new Set<string>();
    const gifts: string[] = [];
    for (const name of rawGifts) {
      const key = normalizeText(name);
      if (!key || seen.has(key) || excluded.has(key)) {
        continue;
      }
      seen.add(key);
      gifts.push(name);
    }

    return { overrideBox, gifts };
  }

  /**
   * offer id -> embedded product, from offer rules that add gifts
   */
  embeddedOffers(): Map<string, EmbeddedOffer> {
    const offers = new Map<string, EmbeddedOffer>();
    for (const rule of this.rules) {
      if (rule.applies_to !== 'offer' || rule.action.type !== 'add_gifts') {
        continue;
      }
      const first = rule.action.gifts[0];
      const name = first === undefined ? '' : giftName(first);
      if (!rule.offer.id || !name) {
        continue;
      }
      offers.set(rule.offer.id, { name, ...offerValidity(rule) });
    }
    return offers;
  }

  couponBoxMaps(): CouponBoxMaps {
    const maps: CouponBoxMaps = { multiYear: new Map(), shortTerm: new Map() };
    for (const rule of this.rules) {
      if (rule.applies_to !== 'coupon' || rule.action.type !== 'override_box') {
        continue;
      }
      const coupon = normalizeText(rule.coupon.code);
      const box = rule.action.box.trim();
      if (!coupon || !box) {
        continue;
      }
      const text = rule.applicability_labels.map(normalizeText).join(' | ');
      if (MULTI_YEAR_KEYWORDS.some((keyword) => text.includes(keyword))) {
        maps.multiYear.set(coupon, box);
      }
      if (SHORT_TERM_KEYWORDS.some((keyword) => text.includes(keyword))) {
        maps.shortTerm.set(coupon, box);
      }
    }
    return maps;
  }
}

function offerValidity(rule: OfferRule): Omit<EmbeddedOffer, 'name'> {
  const validity: Omit<EmbeddedOffer, 'name'> = {};
  const from = rule.valid_from ? parseIsoDate(rule.valid_from) : null;
  const until = rule.valid_until ? parseIsoDate(rule.valid_until) : null;
  if (from) {
    validity.validFrom = from;
  }
  if (until) {
    validity.validUntil = endOfDay(until);
  }
  return validity;
}
