import { Router } from 'express';
import { z } from 'zod';
import { buildChecklist, checklistContextFromProfile, type ChecklistContext } from '@core/checklist';
import { validateProfile } from '@core/profile';
import type { ApiContext } from '../context';

const checklistRequestSchema = z.object({
  programIds: z.array(z.string().min(1)).min(1),
  profile: z.unknown().optional(),
});

export function createChecklistRouter(ctx: ApiContext): Router {
  const router = Router();

  router.post('/', (req, res) => {
    const request = checklistRequestSchema.safeParse(req.body);
    if (!request.success) {
      return res.status(400).json({ success: false, error: request.error.message });
    }

    const unknownIds = request.data.programIds.filter(
      (id) => !ctx.catalog.programs.some((p) => p.id === id),
    );
    if (unknownIds.length > 0) {
      return res.status(404).json({ success: false, error: `Unknown programs: ${unknownIds.join(', ')}` });
    }

    // Without a profile only unconditioned requirements apply
    let context: ChecklistContext = { needs: [] };
    if (request.data.profile !== undefined) {
      const profile = validateProfile(request.data.profile);
      if (!profile.success) {
        return res.status(400).json({ success: false, error: profile.error });
      }
      context = checklistContextFromProfile(profile.data);
    }

    const wanted = new Set(request.data.programIds);
    const checklist = buildChecklist(
      ctx.catalog.programs.filter((p) => wanted.has(p.id)),
      ctx.catalog.documents,
      context,
    );
    res.json({ success: true, data: checklist });
  });

  return router;
}
