/**
 * Guru Reconciliation Service Entry Point
 *
 * This service:
 * - Collects approved Guru transactions for subscription and product runs
 * - Applies coupon and offer rules, prices each order
 * - Accumulates Bling invoice lines in deduplicated planilhas
 */

import { parseConfig } from './config.js';
import { logger } from './utils/logger.js';
import { parseIsoDate } from './utils/dates.js';
import { ConfigurationError } from './utils/errors.js';
import { startServer } from './api/server.js';
import { GuruClient, RateGate } from './packages/collection/index.js';
import { RuleEngine } from './packages/reconciliation/index.js';
import { PlanilhaStore } from './packages/storage/index.js';
import { Catalog } from './services/catalog.js';
import { loadRules } from './services/rulesConfig.js';
import { SalesPipeline } from './services/SalesPipeline.js';

async function main(): Promise<void> {
  const config = parseConfig();
  logger.info({ config: { port: config.api.port, host: config.api.host } }, 'Starting Guru Reconciliation Service');

  const collectionFloor = parseIsoDate(config.guru.collectionFloor);
  if (!collectionFloor) {
    throw new ConfigurationError(`Invalid collection floor: ${config.guru.collectionFloor}`);
  }

  const catalog = await Catalog.load(config.data.catalogPath);
  const rules = await loadRules(config.data.rulesPath);
  logger.info({ products: catalog.size, rules: rules.length }, 'Catalog and rules loaded');

  const gate = new RateGate({ qps: config.guru.qps, maxConcurrency: config.guru.maxConcurrency });
  const client = new GuruClient({
    apiKey: config.guru.apiKey,
    baseUrl: config.guru.baseUrl,
    timeoutMs: config.guru.timeoutMs,
    gate,
    maxPageRetries: config.guru.pageRetries,
    fetchAttempts: config.guru.fetchAttempts,
    backoffBaseMs: config.guru.backoffBaseMs,
  });

  const store = new PlanilhaStore({ baseDir: config.planilhas.dir, timeZone: config.planilhas.timeZone });
  const pipeline = new SalesPipeline({
    catalog,
    ruleEngine: new RuleEngine(rules),
    client,
    store,
    maxConcurrency: config.guru.maxConcurrency,
    collectionFloor,
  });

  const server = await startServer(config, { pipeline, store });

  let shuttingDown = false;
  const shutdown = (signal: string): void => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info({ signal }, 'Received shutdown signal');
    server.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ error }, 'Error during shutdown');
        process.exit(1);
      }
    );
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  logger.info('Guru Reconciliation Service started successfully');
}

main().catch((error: unknown) => {
  logger.fatal({ error }, 'Failed to start Guru Reconciliation Service');
  process.exit(1);
});
