import { Router } from 'express';
import { estimateBenefit } from '@core/benefits/registry';
import { validateBenefitInput } from '@core/benefits/types';
import type { ApiContext } from '../context';

export function createBenefitsRouter(ctx: ApiContext): Router {
  const router = Router();

  // POST /benefits/:family/estimate -- ad-hoc estimate for one benefit family
  router.post('/:family/estimate', (req, res) => {
    const input = validateBenefitInput(req.body);
    if (!input.success) {
      return res.status(400).json({ success: false, error: input.error });
    }

    const result = estimateBenefit(ctx.registry, req.params.family, input.data);
    if (result === null) {
      return res.status(404).json({
        success: false,
        error: `No benefit calculator for "${req.params.family}"`,
      });
    }
    res.json({ success: true, data: result });
  });

  return router;
}
