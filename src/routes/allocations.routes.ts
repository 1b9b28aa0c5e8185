import { Router, type Request, type Response } from 'express';
import type { AppContext } from '../appContext';
import { asyncErrorHandler } from '../middleware/validation/errors';
import { palletPlanSchema, reconcileSchema, unitPalletPlanSchema, validateItemsSchema } from '../schemas/poReview.schema';
import { mapLineItem, mapPalletInput } from '../services/allocation/mappers';
import { reconcileAllocation } from '../services/allocationReconcile.service';
import { normalizeStockMode, resolveSafetyStock } from '../services/availability.service';
import { validateLineItems } from '../services/lineItemValidation.service';
import { lookupMasterData } from '../services/masterData.service';
import {
  findPalletLimitViolations,
  packPallets,
  packPalletsByDestination,
  planPalletsFromUnits
} from '../services/palletizer.service';
import { summarizeValidatedItems } from '../services/poSummary.service';
import { sanitizeForExternalization } from '../services/reviewRecord.service';

export function createAllocationsRouter(ctx: AppContext): Router {
  const router = Router();
  const lookup = (skus: string[]) =>
    lookupMasterData(skus, ctx.masterData, ctx.masterDataClient, {
      logger: ctx.logger,
      timeoutMs: ctx.lookupTimeoutMs
    });

  router.post(
    '/allocations/validate',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = validateItemsSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.flatten() });
      }
      const items = parsed.data.items.map((raw) => mapLineItem(raw));
      const { allocationPolicy } = ctx.settings.policies();
      const masterData = await lookup(items.map((item) => item.sku));
      const safetyStock = resolveSafetyStock(parsed.data.safetyStock, allocationPolicy.defaultSafetyStock);
      const stockMode = normalizeStockMode(parsed.data.stockMode, allocationPolicy.defaultStockMode);
      const validated = validateLineItems(items, masterData.stock, masterData.products, safetyStock, stockMode);
      const summary = summarizeValidatedItems(validated, {
        useDocumentCostForAggregate: allocationPolicy.useDocumentCostForAggregate
      });
      return res.json(
        sanitizeForExternalization({
          safetyStock,
          stockMode,
          items: validated,
          summary,
          masterDataDegraded: masterData.degraded
        })
      );
    })
  );

  router.post(
    '/allocations/reconcile',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = reconcileSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.flatten() });
      }
      const aggregateItems = parsed.data.aggregateItems.map((raw) => mapLineItem({ isAggregate: true, ...raw }));
      const breakdownItems = parsed.data.breakdownItems.map((raw) => mapLineItem({ isAggregate: false, ...raw }));
      const masterData = await lookup([...aggregateItems, ...breakdownItems].map((item) => item.sku));
      return res.json(reconcileAllocation(aggregateItems, breakdownItems, { products: masterData.products }));
    })
  );

  router.post(
    '/pallets/plan',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = palletPlanSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.flatten() });
      }
      const { palletPolicy: policy } = ctx.settings.policies();
      const inputs = parsed.data.items.map((raw) => mapPalletInput(raw));
      const pallets = parsed.data.byDestination
        ? packPalletsByDestination(inputs, { policy })
        : packPallets(inputs, { policy });
      return res.json({
        pallets,
        palletCount: pallets.length,
        violations: findPalletLimitViolations(pallets, policy)
      });
    })
  );

  router.post(
    '/pallets/plan-units',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = unitPalletPlanSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.flatten() });
      }
      const { palletPolicy: policy } = ctx.settings.policies();
      const lines = parsed.data.items.map((raw) => mapLineItem(raw));
      const masterData = await lookup(lines.map((line) => line.sku));
      const pallets = planPalletsFromUnits(lines, masterData.products, {
        policy,
        byDestination: parsed.data.byDestination
      });
      return res.json({
        pallets,
        palletCount: pallets.length,
        violations: findPalletLimitViolations(pallets, policy),
        masterDataDegraded: masterData.degraded
      });
    })
  );

  return router;
}
