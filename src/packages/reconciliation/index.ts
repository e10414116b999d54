/**
 * Reconciliation package
 *
 * Rules, pricing and line materialization for collected transactions.
 */

export { RuleEngine, scoreLabels, tierLabels } from './RuleEngine.js';
export type { RuleOutcome, EmbeddedOffer, CouponBoxMaps } from './RuleEngine.js';
export { ValueCalculator, DIVISORS, FIXED_PRICE_TABLE, divisorFor, fixedPriceFor } from './ValueCalculator.js';
export type { PricedOrder, ComputeOptions, ValueCalculatorDeps } from './ValueCalculator.js';
export { LineMaterializer, derivedDedupId } from './LineMaterializer.js';
export type { MaterializeResult, TierCounters, LineMaterializerDeps } from './LineMaterializer.js';
export { splitComboValue } from './combo.js';
