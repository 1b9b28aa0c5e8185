import express from 'express';
import type { AppContext } from './appContext';
import { requestContextMiddleware } from './middleware/requestContext.middleware';
import { requestLoggerMiddleware } from './middleware/requestLogger.middleware';
import { createAdminRouter } from './routes/admin.routes';
import { createAllocationsRouter } from './routes/allocations.routes';
import { createHealthRouter } from './routes/health.routes';
import { createMasterDataRouter } from './routes/masterData.routes';
import { createPoReviewRouter } from './routes/poReview.routes';

export function createApp(ctx: AppContext) {
  const app = express();
  app.use(requestContextMiddleware);
  app.use(requestLoggerMiddleware);
  // CSV documents travel inline in the JSON body
  app.use(express.json({ limit: '10mb' }));

  app.use(createHealthRouter(ctx));
  app.use(createPoReviewRouter(ctx));
  app.use(createAllocationsRouter(ctx));
  app.use(createMasterDataRouter(ctx));
  app.use(createAdminRouter(ctx));

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}
