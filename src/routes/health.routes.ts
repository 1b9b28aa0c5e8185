import { Router, type Request, type Response } from 'express';
import type { AppContext } from '../appContext';
import { withTimeout } from '../lib/timeouts';

const DB_TIMEOUT_MS = Number(process.env.HEALTH_DB_TIMEOUT_MS || 1500);

export function createHealthRouter(ctx: AppContext): Router {
  const router = Router();

  router.get('/health', async (_req: Request, res: Response) => {
    const snapshot = ctx.masterData.getSnapshot();
    const details: Record<string, unknown> = {
      masterData: {
        source: snapshot.source,
        loadedAt: snapshot.loadedAt,
        productCount: snapshot.products.size,
        stockSkuCount: snapshot.stock.size
      }
    };
    let ready = true;

    if (ctx.pingDatabase) {
      try {
        await withTimeout(ctx.pingDatabase(), DB_TIMEOUT_MS, 'db');
        details.db = { ok: true };
      } catch (error) {
        details.db = { ok: false, error: error instanceof Error ? error.message : String(error) };
        ready = false;
      }
    } else {
      details.db = { ok: true, configured: false };
    }

    res.status(ready ? 200 : 503).json({
      status: ready ? 'ok' : 'not_ready',
      ready,
      timestamp: new Date().toISOString(),
      details
    });
  });

  return router;
}
