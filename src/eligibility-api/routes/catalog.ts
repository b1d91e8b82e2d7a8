import { Router } from 'express';
import { z } from 'zod';
import { catalogStats, countByCategory, filterPrograms } from '@core/browse';
import { PROGRAM_CATEGORIES } from '@shared/constants';
import type { ApiResponse, CatalogOverview } from '@shared/types';
import type { ApiContext } from '../context';

const catalogQuerySchema = z.object({
  category: z.enum(PROGRAM_CATEGORIES).optional(),
  q: z.string().trim().min(1).max(100).optional(),
  emergency: z
    .enum(['true', 'false'])
    .transform((v) => v === 'true')
    .optional(),
});

export function createCatalogRouter(ctx: ApiContext): Router {
  const router = Router();

  // GET /catalog?category=&q=&emergency= -- active programs plus counts
  router.get('/', (req, res) => {
    const query = catalogQuerySchema.safeParse(req.query);
    if (!query.success) {
      return res.status(400).json({ success: false, error: query.error.message });
    }

    const { catalog } = ctx;
    const programs = filterPrograms(catalog.programs, {
      category: query.data.category,
      query: query.data.q,
      emergencyOnly: query.data.emergency,
    });

    const response: ApiResponse<CatalogOverview> = {
      success: true,
      data: {
        meta: catalog.meta,
        programs: programs.map((p) => ({
          id: p.id,
          name: p.name,
          category: p.category,
          isEmergency: p.isEmergency,
          isActive: p.isActive,
          benefitFamily: p.benefitFamily,
        })),
        counts: countByCategory(catalog.programs),
        stats: catalogStats(catalog.programs),
        rejected: catalog.rejected,
        calculators: [...ctx.registry.keys()].sort(),
      },
    };
    res.json(response);
  });

  return router;
}
