/**
 * LineMaterializer
 *
 * Turns collected transactions into Bling invoice lines.
 *
 * Subscription runs group transactions by subscription and emit, per group:
 * - one priced base line (dedup id = transaction id)
 * - one zero-priced line per gift
 * - one zero-priced line for the embedded product of the offer
 *
 * Product runs emit one line per transaction and split combos into their
 * components. Derived lines use the dedup id "{transaction_id}:{SKU}".
 */

import type { Tier } from '../../types/domain.js';
import type { Transaction } from '../../types/guru.js';
import { standardizeLine } from '../../types/lines.js';
import type { Line } from '../../types/lines.js';
import type { ProductRunContext, RunContext, SubscriptionRunContext } from '../../types/run.js';
import type { Catalog, CatalogEntry } from '../../services/catalog.js';
import { periodOfDate } from '../collection/periods.js';
import { formatBrDate } from '../../utils/dates.js';
import { ValidationError, logError } from '../../utils/errors.js';
import { createChildLogger } from '../../utils/logger.js';
import type { Logger } from '../../utils/logger.js';
import { formatCents, toCents } from '../../utils/money.js';
import { splitComboValue } from './combo.js';
import type { PricedOrder, ValueCalculator } from './ValueCalculator.js';

// ============================================================================
// Types
// ============================================================================

export interface TierCounters {
  subscriptions: number;
  coupons: number;
  embedded: number;
}

export interface MaterializeResult {
  lines: Line[];
  /** Keyed by tier ("untiered" for transactions collected without one) */
  counters: Record<string, TierCounters>;
  /** Groups or transactions dropped after an error */
  skipped: number;
}

export interface LineMaterializerDeps {
  catalog: Catalog;
  calculator: ValueCalculator;
  logger?: Logger;
}

interface SubscriptionGroup {
  subscriptionId: string;
  transactions: Transaction[];
}

const ZERO = formatCents(0);

export function derivedDedupId(transactionId: string, sku: string): string {
  return `${transactionId}:${sku.trim().toUpperCase()}`;
}

// ============================================================================
// LineMaterializer
// ============================================================================

export class LineMaterializer {
  private readonly catalog: Catalog;
  private readonly calculator: ValueCalculator;
  private readonly logger: Logger;

  constructor(deps: LineMaterializerDeps) {
    this.catalog = deps.catalog;
    this.calculator = deps.calculator;
    this.logger = deps.logger ?? createChildLogger({ module: 'LineMaterializer' });
  }

  materialize(transactions: readonly Transaction[], context: RunContext): MaterializeResult {
    const result: MaterializeResult = { lines: [], counters: {}, skipped: 0 };

    if (context.mode === 'subscriptions') {
      this.materializeSubscriptions(transactions, context, result);
    } else {
      this.materializeProducts(transactions, context, result);
    }

    result.lines = result.lines.map(standardizeLine);
    this.logger.info(
      { mode: context.mode, transactions: transactions.length, lines: result.lines.length, skipped: result.skipped },
      'Lines materialized'
    );
    return result;
  }

  // --------------------------------------------------------------------------
  // Subscriptions
  // --------------------------------------------------------------------------

  private materializeSubscriptions(
    transactions: readonly Transaction[],
    context: SubscriptionRunContext,
    result: MaterializeResult
  ): void {
    for (const group of groupBySubscription(transactions)) {
      try {
        result.lines.push(...this.subscriptionLines(group, context, result.counters));
      } catch (error) {
        result.skipped++;
        logError(error, { subscriptionId: group.subscriptionId, stage: 'materialize' });
      }
    }
  }

  private subscriptionLines(
    group: SubscriptionGroup,
    context: SubscriptionRunContext,
    counters: Record<string, TierCounters>
  ): Line[] {
    const representative = latestOf(group.transactions);
    const principals = group.transactions.filter(
      (tx) => context.planIds.has(tx.productId) && !tx.isOrderBump
    );
    const distinctPlans = new Set(principals.map((tx) => tx.productId));
    const forceFixedPrice = distinctPlans.size > 1 || representative.invoiceType === 'upgrade';

    const paidCents =
      forceFixedPrice || principals.length === 0
        ? toCents(representative.payment.total)
        : principals.reduce((sum, tx) => sum + toCents(tx.payment.total), 0);

    const priced = this.calculator.compute(representative, context, { forceFixedPrice, paidCents });
    const tier = representative.tier ?? group.transactions.find((tx) => tx.tier)?.tier;
    const tally = counterFor(counters, tier);

    const productName = priced.overrideBox ?? (context.boxName.trim() || priced.principalProduct);
    const periodicity = priced.periodicity ?? context.periodicity;
    const period = context.periodMode === 'all' ? periodOfDate(priced.orderedAt, periodicity) : context.period;

    const base: Line = {
      ...this.baseLine(representative, priced, context),
      Produto: productName,
      SKU: this.catalog.skuOf(productName),
      'Valor Unitário': formatCents(priced.unitCents),
      'Valor Total': formatCents(priced.totalCents),
      periodicidade: periodicity,
      periodo: String(period),
      indisponivel: this.catalog.isUnavailable(productName) ? 'S' : '',
      dedup_id: representative.id,
    };

    const lines: Line[] = [base];
    tally.subscriptions++;
    if (priced.usedCoupon) {
      tally.coupons++;
    }

    for (const gift of priced.gifts) {
      lines.push(this.zeroPricedLine(base, representative.id, gift));
    }

    if (priced.offerActive && priced.embeddedProduct) {
      lines.push(this.zeroPricedLine(base, representative.id, priced.embeddedProduct));
      tally.embedded++;
    }

    return lines;
  }

  private zeroPricedLine(base: Line, transactionId: string, productName: string): Line {
    const sku = this.catalog.skuOf(productName);
    return {
      ...base,
      Produto: productName,
      SKU: sku,
      'Valor Unitário': ZERO,
      'Valor Total': ZERO,
      indisponivel: this.catalog.isUnavailable(productName) ? 'S' : '',
      dedup_id: derivedDedupId(transactionId, sku || productName),
    };
  }

  // --------------------------------------------------------------------------
  // Products
  // --------------------------------------------------------------------------

  private materializeProducts(
    transactions: readonly Transaction[],
    context: ProductRunContext,
    result: MaterializeResult
  ): void {
    for (const transaction of transactions) {
      try {
        result.lines.push(...this.productLines(transaction, context));
      } catch (error) {
        result.skipped++;
        logError(error, { transactionId: transaction.id, stage: 'materialize' });
      }
    }
  }

  private productLines(transaction: Transaction, context: ProductRunContext): Line[] {
    const priced = this.calculator.compute(transaction, context);
    const entry = this.catalog.find(priced.principalProduct);

    const base: Line = {
      ...this.baseLine(transaction, priced, context),
      Produto: priced.principalProduct,
      SKU: priced.principalSku,
      'Valor Unitário': formatCents(priced.unitCents),
      'Valor Total': formatCents(priced.totalCents),
      indisponivel: entry?.info.unavailable ? 'S' : '',
      dedup_id: transaction.id,
    };

    if (!entry || entry.info.composed_of.length === 0) {
      return [base];
    }

    const { info } = entry;
    if (info.unavailable && info.guru_ids.length > 0 && info.shopify_ids.length > 0) {
      return [{ ...base, indisponivel: 'S' }];
    }

    return this.decomposeCombo(entry, base, transaction.id, priced.totalCents);
  }

  private decomposeCombo(combo: CatalogEntry, base: Line, transactionId: string, totalCents: number): Line[] {
    const components = combo.info.composed_of.map((ref) => this.resolveComponent(ref));
    const values = splitComboValue(totalCents, components.length);

    return components.map((component, index) => {
      if (!component.sku) {
        throw new ValidationError(
          `Combo component without SKU: ${component.name} (combo ${combo.name}, transaction ${transactionId})`,
          'composed_of'
        );
      }
      const value = formatCents(values[index] ?? 0);
      return {
        ...base,
        Produto: component.name,
        SKU: component.sku,
        'Valor Unitário': value,
        'Valor Total': value,
        Combo: combo.name,
        indisponivel: component.unavailable ? 'S' : '',
        dedup_id: derivedDedupId(transactionId, component.sku),
      };
    });
  }

  private resolveComponent(ref: string): { name: string; sku: string; unavailable: boolean } {
    const entry = this.catalog.findBySku(ref) ?? this.catalog.find(ref);
    if (entry) {
      return { name: entry.name, sku: entry.info.sku.trim(), unavailable: entry.info.unavailable };
    }
    // Unknown references ship under their own text as name and SKU
    return { name: ref, sku: ref.trim(), unavailable: false };
  }

  // --------------------------------------------------------------------------
  // Shared
  // --------------------------------------------------------------------------

  private baseLine(transaction: Transaction, priced: PricedOrder, context: RunContext): Line {
    const contact = transaction.contact;
    return {
      'Nome Comprador': contact.name,
      Data: formatBrDate(context.runDate),
      'Data Pedido': formatBrDate(priced.orderedAt),
      'CPF/CNPJ Comprador': contact.doc,
      'Endereço Comprador': contact.address,
      'Número Comprador': contact.number,
      'Complemento Comprador': contact.complement,
      'Bairro Comprador': contact.district,
      'CEP Comprador': contact.zipCode,
      'Cidade Comprador': contact.city,
      'UF Comprador': contact.state,
      'Telefone Comprador': contact.phone,
      'Celular Comprador': contact.phone,
      'E-mail Comprador': contact.email,
      'Nome Entrega': contact.name,
      'Endereço Entrega': contact.address,
      'Número Entrega': contact.number,
      'Complemento Entrega': contact.complement,
      'Bairro Entrega': contact.district,
      'CEP Entrega': contact.zipCode,
      'Cidade Entrega': contact.city,
      'UF Entrega': contact.state,
      Un: 'UN',
      Quantidade: '1',
      'Forma Pagamento': priced.paymentMethod,
      transaction_id: transaction.id,
      subscription_id: transaction.subscriptionId ?? '',
      product_id: transaction.productId,
      'Plano Assinatura': priced.tier ?? '',
      periodicidade: priced.periodicity ?? '',
      Cupom: transaction.payment.couponCode,
    };
  }
}

// ============================================================================
// Grouping helpers
// ============================================================================

function groupBySubscription(transactions: readonly Transaction[]): SubscriptionGroup[] {
  const groups = new Map<string, Transaction[]>();
  for (const tx of transactions) {
    if (!tx.subscriptionId) {
      continue;
    }
    const members = groups.get(tx.subscriptionId);
    if (members) {
      members.push(tx);
    } else {
      groups.set(tx.subscriptionId, [tx]);
    }
  }
  return [...groups].map(([subscriptionId, members]) => ({ subscriptionId, transactions: members }));
}

/**
 * Latest order; the first one seen wins ties
 */
function latestOf(transactions: readonly Transaction[]): Transaction {
  const [first, ...rest] = transactions;
  if (!first) {
    throw new ValidationError('Empty subscription group');
  }
  return rest.reduce(
    (latest, tx) => (tx.orderedAt.getTime() > latest.orderedAt.getTime() ? tx : latest),
    first
  );
}

function counterFor(counters: Record<string, TierCounters>, tier: Tier | undefined): TierCounters {
  const key = tier ?? 'untiered';
  const existing = counters[key];
  if (existing) {
    return existing;
  }
  const created: TierCounters = { subscriptions: 0, coupons: 0, embedded: 0 };
  counters[key] = created;
  return created;
}
