/**
 * Collection Routes
 *
 * - POST /coletas/assinaturas   subscription run for a month or bimester
 * - POST /coletas/produtos      product run for a date range
 *
 * Both append the resulting lines to the given planilha.
 */

import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { PERIODICITIES } from '../types/domain.js';
import type { SalesPipeline } from '../services/SalesPipeline.js';
import type { ProgressCallback } from '../packages/collection/TaskScheduler.js';
import { logger } from '../utils/logger.js';
import { planilhaIdSchema } from './planilhas.routes.js';

// =============================================================================
// Schema Definitions
// =============================================================================

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');

const subscriptionRunSchema = z.object({
  planilha_id: planilhaIdSchema,
  year: z.coerce.number().int().min(1900),
  month: z.coerce.number().int().min(1).max(12),
  period_mode: z.enum(['period', 'all']).default('period'),
  periodicity: z.enum(PERIODICITIES).default('bimonthly'),
  box_name: z.string().trim().default(''),
});

const productRunSchema = z.object({
  planilha_id: planilhaIdSchema,
  start_date: isoDate,
  end_date: isoDate,
  product_name: z.string().trim().min(1).optional(),
});

// =============================================================================
// Router
// =============================================================================

function progressLogger(runLabel: string): ProgressCallback {
  return (label, completed, total) => {
    logger.debug({ run: runLabel, label, completed, total }, 'Collection progress');
  };
}

export function createCollectionRouter(pipeline: SalesPipeline): Router {
  const router = Router();

  /**
   * POST /coletas/assinaturas
   */
  router.post('/assinaturas', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = subscriptionRunSchema.parse(req.body);

      logger.info(
        { planilhaId: body.planilha_id, year: body.year, month: body.month, periodicity: body.periodicity },
        'Subscription collection requested'
      );

      const result = await pipeline.runSubscriptions(
        {
          year: body.year,
          month: body.month,
          periodicity: body.periodicity,
          periodMode: body.period_mode,
          boxName: body.box_name,
        },
        { planilhaId: body.planilha_id, onProgress: progressLogger('subscriptions') }
      );

      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /coletas/produtos
   */
  router.post('/produtos', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = productRunSchema.parse(req.body);

      logger.info(
        { planilhaId: body.planilha_id, startDate: body.start_date, endDate: body.end_date },
        'Product collection requested'
      );

      const result = await pipeline.runProducts(
        {
          startDate: body.start_date,
          endDate: body.end_date,
          productName: body.product_name,
        },
        { planilhaId: body.planilha_id, onProgress: progressLogger('products') }
      );

      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
