import { Router, type Request, type Response } from 'express';
import type { AppContext } from '../appContext';
import { asyncErrorHandler, masterDataErrorMap } from '../middleware/validation/errors';
import { skuBatchSchema } from '../schemas/poReview.schema';
import { describeSku, lookupMasterData, normalizeSkuList } from '../services/masterData.service';

export function createMasterDataRouter(ctx: AppContext): Router {
  const router = Router();
  const lookup = (skus: string[]) =>
    lookupMasterData(skus, ctx.masterData, ctx.masterDataClient, {
      logger: ctx.logger,
      timeoutMs: ctx.lookupTimeoutMs
    });

  router.get(
    '/master-data/skus/:sku',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const sku = req.params.sku.trim();
      const masterData = await lookup([sku]);
      const { allocationPolicy } = ctx.settings.policies();
      const check = describeSku(sku, masterData, allocationPolicy.defaultSafetyStock, allocationPolicy.defaultStockMode);
      if (!check.found) throw new Error('SKU_NOT_FOUND');
      return res.json(check);
    }, masterDataErrorMap)
  );

  // Batch check for an order form: unknown SKUs come back with found: false instead of a 404.
  router.post(
    '/master-data/skus/validate',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = skuBatchSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.flatten() });
      }
      const skus = normalizeSkuList(parsed.data.skus);
      const masterData = await lookup(skus);
      const { allocationPolicy } = ctx.settings.policies();
      return res.json({
        data: skus.map((sku) =>
          describeSku(sku, masterData, allocationPolicy.defaultSafetyStock, allocationPolicy.defaultStockMode)
        ),
        masterDataDegraded: masterData.degraded
      });
    })
  );

  router.post(
    '/master-data/reload',
    asyncErrorHandler(async (_req: Request, res: Response) => {
      const snapshot = await ctx.masterData.reload().catch((error: unknown) => {
        throw new Error('MASTER_DATA_RELOAD_FAILED', { cause: error });
      });
      return res.json({
        source: snapshot.source,
        loadedAt: snapshot.loadedAt,
        productCount: snapshot.products.size,
        stockSkuCount: snapshot.stock.size
      });
    }, masterDataErrorMap)
  );

  return router;
}
