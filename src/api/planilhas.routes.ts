/**
 * Planilha Routes
 *
 * - POST /planilhas       create an empty planilha
 * - GET  /planilhas       list planilhas
 * - GET  /planilhas/:id   full document
 */

import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { PlanilhaStore } from '../packages/storage/PlanilhaStore.js';
import { PLANILHA_ID_PATTERN } from '../packages/storage/PlanilhaStore.js';
import { logger } from '../utils/logger.js';

// =============================================================================
// Schema Definitions
// =============================================================================

export const planilhaIdSchema = z
  .string()
  .trim()
  .regex(PLANILHA_ID_PATTERN, 'planilha_id must use letters, digits, "_" or "-"');

const createPlanilhaSchema = z.object({
  planilha_id: planilhaIdSchema,
  meta: z.record(z.string(), z.unknown()).default({}),
});

// =============================================================================
// Router
// =============================================================================

export function createPlanilhaRouter(store: PlanilhaStore): Router {
  const router = Router();

  /**
   * POST /planilhas
   */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = createPlanilhaSchema.parse(req.body);
      const document = await store.create(body.planilha_id, body.meta);

      logger.info({ planilhaId: document.planilha_id }, 'Planilha created via API');

      res.status(201).json({
        planilha_id: document.planilha_id,
        created_at: document.created_at,
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /planilhas
   */
  router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ planilhas: await store.list() });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /planilhas/:id
   */
  router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const planilhaId = planilhaIdSchema.parse(req.params.id);
      res.json(await store.load(planilhaId));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
