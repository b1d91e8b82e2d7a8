import { Router } from 'express';
import type { ApiContext } from '../context';
import { createHealthRouter } from './health';
import { createCatalogRouter } from './catalog';
import { createMatchRouter } from './match';
import { createBenefitsRouter } from './benefits';
import { createChecklistRouter } from './checklist';

export function createApiRouter(ctx: ApiContext): Router {
  const router = Router();
  router.use(createHealthRouter(ctx));
  router.use('/catalog', createCatalogRouter(ctx));
  router.use('/match', createMatchRouter(ctx));
  router.use('/benefits', createBenefitsRouter(ctx));
  router.use('/checklist', createChecklistRouter(ctx));
  return router;
}
