import { Router, type Request, type Response } from 'express';
import type { AppContext } from '../appContext';
import { systemSettingsSchema } from '../config/systemSettings';
import { asyncErrorHandler, settingsErrorMap } from '../middleware/validation/errors';

export function createAdminRouter(ctx: AppContext): Router {
  const router = Router();

  router.get('/admin/settings', (_req: Request, res: Response) => {
    res.json({ settings: ctx.settings.get(), effective: ctx.settings.policies() });
  });

  router.put(
    '/admin/settings',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = systemSettingsSchema.strict().safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.flatten() });
      }
      const settings = await ctx.settings.update(parsed.data);
      return res.json({ settings, effective: ctx.settings.policies() });
    }, settingsErrorMap)
  );

  return router;
}
