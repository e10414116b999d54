/**
 * ValueCalculator
 *
 * Prices one transaction: resolves the principal product, applies coupon
 * rules inside the active window, picks the charge (paid amount or fixed
 * table price) and spreads it over the shipments of the plan.
 *
 * All amounts are integer cents.
 */

import { MULTI_YEAR_TIERS } from '../../types/domain.js';
import type { Periodicity, Tier } from '../../types/domain.js';
import type { SkuInfo } from '../../types/catalog.js';
import type { Transaction } from '../../types/guru.js';
import type { RunContext, SubscriptionRunContext } from '../../types/run.js';
import type { Catalog } from '../../services/catalog.js';
import { createChildLogger } from '../../utils/logger.js';
import type { Logger } from '../../utils/logger.js';
import { applyPercentDiscount, divideCents, toCents } from '../../utils/money.js';
import { normalizeText } from '../../utils/text.js';
import type { CouponBoxMaps, EmbeddedOffer, RuleEngine } from './RuleEngine.js';

// ============================================================================
// Pricing tables
// ============================================================================

/**
 * Full price of multi-year plans, in cents
 */
export const FIXED_PRICE_TABLE: Partial<Record<Tier, Record<Periodicity, number>>> = {
  annual: { monthly: 96000, bimonthly: 48000 },
  biennial: { monthly: 192000, bimonthly: 96000 },
  triennial: { monthly: 288000, bimonthly: 144000 },
};

/**
 * Shipments covered by one charge
 */
export const DIVISORS: Record<Tier, Record<Periodicity, number>> = {
  triennial: { monthly: 36, bimonthly: 18 },
  biennial: { monthly: 24, bimonthly: 12 },
  annual: { monthly: 12, bimonthly: 6 },
  bimonthly: { monthly: 2, bimonthly: 1 },
  monthly: { monthly: 1, bimonthly: 1 },
};

export function divisorFor(tier: Tier | undefined, periodicity: Periodicity): number {
  if (!tier) {
    return 1;
  }
  return Math.max(1, Math.floor(DIVISORS[tier][periodicity]));
}

export function fixedPriceFor(tier: Tier | undefined, periodicity: Periodicity): number | undefined {
  return tier ? FIXED_PRICE_TABLE[tier]?.[periodicity] : undefined;
}

// ============================================================================
// Types
// ============================================================================

export interface PricedOrder {
  transactionId: string;
  offerId: string;
  principalProduct: string;
  principalSku: string;
  principalWeight: number;
  unitCents: number;
  totalCents: number;
  /** Unit value plus the embedded bonus when it is included */
  orderTotalCents: number;
  embeddedCents: number;
  /** Embedded value counts toward orderTotalCents */
  includeEmbedded: boolean;
  /** Offer maps to an embedded product valid for this order inside the window */
  offerActive: boolean;
  embeddedProduct: string;
  gifts: string[];
  /** Box set by an override rule, if any */
  overrideBox: string | null;
  orderedAt: Date;
  paymentMethod: string;
  usedCoupon: boolean;
  tier: Tier | null;
  periodicity: Periodicity | null;
  divisor: number;
}

export interface ComputeOptions {
  /** Charge the table price (multi-principal groups and upgrades) */
  forceFixedPrice?: boolean;
  /** Amount paid for the group; defaults to the transaction's total */
  paidCents?: number;
}

export interface ValueCalculatorDeps {
  catalog: Catalog;
  ruleEngine: RuleEngine;
  logger?: Logger;
}

interface Principal {
  name: string;
  info: SkuInfo | undefined;
}

// ============================================================================
// ValueCalculator
// ============================================================================

export class ValueCalculator {
  private readonly catalog: Catalog;
  private readonly ruleEngine: RuleEngine;
  private readonly embeddedOffers: Map<string, EmbeddedOffer>;
  private readonly couponBoxes: CouponBoxMaps;
  private readonly logger: Logger;

  constructor(deps: ValueCalculatorDeps) {
    this.catalog = deps.catalog;
    this.ruleEngine = deps.ruleEngine;
    this.embeddedOffers = deps.ruleEngine.embeddedOffers();
    this.couponBoxes = deps.ruleEngine.couponBoxMaps();
    this.logger = deps.logger ?? createChildLogger({ module: 'ValueCalculator' });
  }

  compute(transaction: Transaction, context: RunContext, options: ComputeOptions = {}): PricedOrder {
    const paidCents = options.paidCents ?? toCents(transaction.payment.total);
    const principal = this.resolvePrincipal(transaction, context.boxName);

    const base: PricedOrder = {
      transactionId: transaction.id,
      offerId: transaction.offerId,
      principalProduct: principal?.name ?? '',
      principalSku: principal?.info?.sku ?? '',
      principalWeight: principal?.info?.weight ?? 0,
      unitCents: paidCents,
      totalCents: paidCents,
      orderTotalCents: paidCents,
      embeddedCents: 0,
      includeEmbedded: false,
      offerActive: false,
      embeddedProduct: '',
      gifts: [],
      overrideBox: null,
      orderedAt: transaction.orderedAt,
      paymentMethod: transaction.payment.method,
      usedCoupon: transaction.payment.couponCode !== '',
      tier: null,
      periodicity: null,
      divisor: 1,
    };

    if (!principal || context.mode === 'products' || !transaction.subscriptionId) {
      return base;
    }

    return this.priceSubscription(transaction, context, principal, base, paidCents, options.forceFixedPrice ?? false);
  }

  // --------------------------------------------------------------------------
  // Subscriptions
  // --------------------------------------------------------------------------

  private priceSubscription(
    transaction: Transaction,
    context: SubscriptionRunContext,
    resolved: Principal,
    base: PricedOrder,
    paidCents: number,
    forceFixedPrice: boolean
  ): PricedOrder {
    const tier = transaction.tier;
    const windowOpen = this.ruleEngine.isWithinActiveWindow(transaction.orderedAt, context);
    let principal = resolved;

    const rules = this.ruleEngine.apply(transaction, context, principal.name);
    if (rules.overrideBox) {
      principal = { name: rules.overrideBox, info: this.catalog.find(rules.overrideBox)?.info };
    }

    if (windowOpen && tier) {
      const maps = MULTI_YEAR_TIERS.has(tier) ? this.couponBoxes.multiYear : this.couponBoxes.shortTerm;
      const custom = maps.get(normalizeText(transaction.payment.couponCode));
      const entry = custom ? this.catalog.find(custom) : undefined;
      if (entry) {
        principal = entry;
      }
    }

    const periodicity = context.periodicity;
    const offer = this.embeddedOffers.get(transaction.offerId);
    const offerActive = offer !== undefined && windowOpen && this.withinOffer(offer, transaction.orderedAt, context);
    let includeEmbedded = offerActive;
    let embeddedCents = 0;
    let chargeCents: number;

    if (forceFixedPrice || (tier !== undefined && MULTI_YEAR_TIERS.has(tier))) {
      const tablePrice = fixedPriceFor(tier, periodicity);
      if (tablePrice === undefined) {
        this.logger.warn(
          { transactionId: transaction.id, tier: tier ?? null, periodicity, paidCents },
          'No fixed price for tier, charging the paid amount'
        );
      }
      chargeCents = tablePrice ?? paidCents;
      if (transaction.payment.couponIncidenceType === 'percent') {
        chargeCents = applyPercentDiscount(chargeCents, transaction.payment.couponIncidenceValue);
      }
      if (forceFixedPrice) {
        includeEmbedded = false;
      } else {
        embeddedCents = Math.max(0, paidCents - chargeCents);
      }
    } else {
      chargeCents = paidCents;
      includeEmbedded = false;
    }

    const divisor = divisorFor(tier, periodicity);
    const unitCents = divideCents(chargeCents, divisor);

    return {
      ...base,
      principalProduct: principal.name,
      principalSku: principal.info?.sku ?? '',
      principalWeight: principal.info?.weight ?? 0,
      unitCents,
      totalCents: unitCents,
      orderTotalCents: unitCents + (includeEmbedded ? embeddedCents : 0),
      embeddedCents,
      includeEmbedded,
      offerActive,
      embeddedProduct: offer?.name ?? '',
      gifts: rules.gifts,
      overrideBox: rules.overrideBox,
      tier: tier ?? null,
      periodicity,
      divisor,
    };
  }

  private withinOffer(offer: EmbeddedOffer, orderedAt: Date, context: SubscriptionRunContext): boolean {
    const from = offer.validFrom ?? context.activeWindow.start;
    const until = offer.validUntil ?? context.activeWindow.end;
    const time = orderedAt.getTime();
    return time >= from.getTime() && time <= until.getTime();
  }

  // --------------------------------------------------------------------------
  // Principal product
  // --------------------------------------------------------------------------

  /**
   * guru id -> API product name -> run box -> first catalog entry
   */
  private resolvePrincipal(transaction: Transaction, boxName: string): Principal | undefined {
    if (transaction.productId) {
      const byId = this.catalog.findByGuruId(transaction.productId);
      if (byId) {
        return byId;
      }
    }

    if (transaction.productName) {
      const byName = this.catalog.find(transaction.productName);
      if (byName) {
        return byName;
      }
    }

    const box = boxName.trim();
    if (box) {
      return { name: box, info: this.catalog.find(box)?.info };
    }

    const first = this.catalog.first();
    if (first) {
      this.logger.warn(
        { transactionId: transaction.id, productId: transaction.productId, fallback: first.name },
        'No catalog match for product, using first catalog entry'
      );
      return first;
    }

    this.logger.warn({ transactionId: transaction.id }, 'Catalog is empty, pricing at paid amount');
    return undefined;
  }
}
