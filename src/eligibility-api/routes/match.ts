// src/eligibility-api/routes/match.ts
import { Router } from 'express';
import { z } from 'zod';
import { buildChecklist, checklistContextFromProfile } from '@core/checklist';
import { match } from '@core/matcher';
import type { ApiResponse, MatchResponse } from '@shared/types';
import type { ApiContext } from '../context';

const asOfSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'asOf must be YYYY-MM-DD')
  .transform((s) => new Date(`${s}T00:00:00Z`))
  .refine((d) => !Number.isNaN(d.getTime()), 'asOf is not a valid date');

const matchRequestSchema = z.object({
  profile: z.unknown(),
  asOf: asOfSchema.optional(),
});

export function createMatchRouter(ctx: ApiContext): Router {
  const router = Router();

  // POST /match -- rank programs for one profile; nothing is stored
  router.post('/', (req, res) => {
    const request = matchRequestSchema.safeParse(req.body);
    if (!request.success) {
      return res.status(400).json({ success: false, error: request.error.message });
    }

    const outcome = match(request.data.profile, ctx.catalog, {
      asOf: request.data.asOf,
      policy: ctx.policy,
      registry: ctx.registry,
    });
    if (!outcome.success) {
      return res.status(400).json({ success: false, error: outcome.error });
    }
    const { profile, report } = outcome;

    const matchedIds = new Set(report.matches.map((m) => m.programId));
    const checklist = buildChecklist(
      ctx.catalog.programs.filter((p) => matchedIds.has(p.id)),
      ctx.catalog.documents,
      checklistContextFromProfile(profile),
    );

    if (report.excluded.some((e) => e.kind === 'malformed')) {
      console.warn(
        `[MATCH] Malformed catalog data in: ${report.excluded
          .filter((e) => e.kind === 'malformed')
          .map((e) => e.programId)
          .join(', ')}`,
      );
    }

    const response: ApiResponse<MatchResponse> = {
      success: true,
      data: {
        asOf: report.asOf,
        totalMatches: report.matches.length,
        matches: report.matches,
        emergency: report.emergency,
        excluded: report.excluded,
        checklist,
      },
    };
    res.json(response);
  });

  return router;
}
