import { Router } from 'express';
import type { ApiResponse, HealthStatus } from '@shared/types';
import type { ApiContext } from '../context';

export function createHealthRouter(ctx: ApiContext): Router {
  const router = Router();

  router.get('/health', (_req, res) => {
    const response: ApiResponse<HealthStatus> = {
      success: true,
      data: {
        status: 'ok',
        catalog: ctx.catalog.meta.packId,
        programs: ctx.catalog.programs.length,
        timestamp: new Date().toISOString(),
      },
    };
    res.json(response);
  });

  return router;
}
