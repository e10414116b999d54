/**
 * Sales Pipeline
 *
 * Orchestrates one collection run end to end:
 * context -> concurrent collection -> rules and pricing -> lines -> planilha.
 */

import type { Line } from '../types/lines.js';
import type { RunContext } from '../types/run.js';
import type { ProgressCallback } from '../packages/collection/TaskScheduler.js';
import { LineMaterializer } from '../packages/reconciliation/LineMaterializer.js';
import type { TierCounters } from '../packages/reconciliation/LineMaterializer.js';
import type { RuleEngine } from '../packages/reconciliation/RuleEngine.js';
import { ValueCalculator } from '../packages/reconciliation/ValueCalculator.js';
import type { PlanilhaStore } from '../packages/storage/PlanilhaStore.js';
import { createChildLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import type { Catalog } from './catalog.js';
import { buildProductRunContext, collectProductTransactions } from './productCollection.js';
import type { ProductRunRequest } from './productCollection.js';
import { buildSubscriptionRunContext, collectSubscriptionTransactions } from './subscriptionCollection.js';
import type { CollectionDeps, CollectionResult, SubscriptionRunRequest, TransactionSource } from './subscriptionCollection.js';

export interface SalesPipelineDeps {
  catalog: Catalog;
  ruleEngine: RuleEngine;
  client: TransactionSource;
  store: PlanilhaStore;
  maxConcurrency: number;
  collectionFloor: Date;
  now?: () => Date;
  logger?: Logger;
}

export interface PipelineResult {
  mode: RunContext['mode'];
  transactions: number;
  lines: Line[];
  counters: Record<string, TierCounters>;
  skipped: number;
  errors: string[];
  persistence: { planilha_id: string; added: number; updated: number } | null;
}

export interface RunOptions {
  /** Planilha that receives the lines; nothing is stored when omitted */
  planilhaId?: string;
  onProgress?: ProgressCallback;
}

export class SalesPipeline {
  private readonly deps: SalesPipelineDeps;
  private readonly materializer: LineMaterializer;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(deps: SalesPipelineDeps) {
    this.deps = deps;
    this.logger = deps.logger ?? createChildLogger({ module: 'SalesPipeline' });
    this.now = deps.now ?? (() => new Date());
    const calculator = new ValueCalculator({ catalog: deps.catalog, ruleEngine: deps.ruleEngine });
    this.materializer = new LineMaterializer({ catalog: deps.catalog, calculator });
  }

  async runSubscriptions(request: SubscriptionRunRequest, options: RunOptions = {}): Promise<PipelineResult> {
    const context = buildSubscriptionRunContext(request, this.deps.catalog, this.now());
    return this.execute(context, options, (deps) =>
      collectSubscriptionTransactions(context, deps, options.onProgress)
    );
  }

  async runProducts(request: ProductRunRequest, options: RunOptions = {}): Promise<PipelineResult> {
    const context = buildProductRunContext(request, this.deps.catalog, this.now());
    return this.execute(context, options, (deps) =>
      collectProductTransactions(context, deps, options.onProgress)
    );
  }

  private async execute(
    context: RunContext,
    options: RunOptions,
    collect: (deps: CollectionDeps) => Promise<CollectionResult>
  ): Promise<PipelineResult> {
    // Fail before collecting when the target planilha does not exist
    if (options.planilhaId) {
      await this.deps.store.load(options.planilhaId);
    }

    const collected = await collect({
      client: this.deps.client,
      catalog: this.deps.catalog,
      maxConcurrency: this.deps.maxConcurrency,
      collectionFloor: this.deps.collectionFloor,
      logger: this.logger,
    });

    const { lines, counters, skipped } = this.materializer.materialize(collected.transactions, context);

    let persistence: PipelineResult['persistence'] = null;
    if (options.planilhaId) {
      const appended = await this.deps.store.append(options.planilhaId, lines);
      persistence = { planilha_id: options.planilhaId, ...appended };
    }

    this.logger.info(
      {
        mode: context.mode,
        tasks: collected.tasks,
        transactions: collected.transactions.length,
        lines: lines.length,
        errors: collected.errors.length,
        planilhaId: options.planilhaId,
      },
      'Collection run finished'
    );

    return {
      mode: context.mode,
      transactions: collected.transactions.length,
      lines,
      counters,
      skipped,
      errors: collected.errors,
      persistence,
    };
  }
}
