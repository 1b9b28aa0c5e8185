import { Router, type Request, type Response } from 'express';
import type { AppContext } from '../appContext';
import { tagRequestWithReview } from '../lib/requestContext';
import { asyncErrorHandler, poReviewErrorMap } from '../middleware/validation/errors';
import { validatePagination, validateUuidParam } from '../middleware/validation/schema';
import { poReviewSchema, type DocumentInput } from '../schemas/poReview.schema';
import { documentFromLineItems, type DocumentRole, type ParsedDocument } from '../services/documentIntake.service';
import { intakeDocument, runPoReview } from '../services/poReview.service';
import { sanitizeForExternalization } from '../services/reviewRecord.service';

async function resolveDocument(ctx: AppContext, doc: DocumentInput, role: DocumentRole): Promise<ParsedDocument> {
  const name = doc.name ?? `${role}.csv`;
  if (doc.csv !== undefined) {
    const parsed = await intakeDocument(ctx.parser, { name, content: doc.csv }, role, ctx.logger);
    return {
      ...parsed,
      documentNumber: doc.documentNumber || parsed.documentNumber,
      shipWindow: doc.shipWindow || parsed.shipWindow
    };
  }
  return documentFromLineItems(doc.items ?? [], {
    name,
    role,
    documentNumber: doc.documentNumber,
    shipWindow: doc.shipWindow
  });
}

export function createPoReviewRouter(ctx: AppContext): Router {
  const router = Router();

  router.post(
    '/po-reviews',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = poReviewSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.flatten() });
      }
      const aggregate = await resolveDocument(ctx, parsed.data.aggregate, 'aggregate');
      const breakdown = parsed.data.breakdown
        ? await resolveDocument(ctx, parsed.data.breakdown, 'breakdown')
        : null;

      const { allocationPolicy, palletPolicy } = ctx.settings.policies();
      const result = await runPoReview(
        {
          aggregate,
          breakdown,
          safetyStock: parsed.data.safetyStock,
          stockMode: parsed.data.stockMode
        },
        {
          store: ctx.masterData,
          client: ctx.masterDataClient,
          repository: ctx.reviews,
          allocationPolicy,
          palletPolicy,
          logger: ctx.logger,
          lookupTimeoutMs: ctx.lookupTimeoutMs
        }
      );
      tagRequestWithReview(result.reviewId);
      return res.status(201).json(sanitizeForExternalization(result));
    }, poReviewErrorMap)
  );

  router.get(
    '/po-reviews',
    validatePagination(20),
    asyncErrorHandler(async (req: Request, res: Response) => {
      const limit = req.reviewPagination?.limit ?? 20;
      const offset = req.reviewPagination?.offset ?? 0;
      const rows = await ctx.reviews.list(limit, offset);
      return res.json({ data: rows, paging: { limit, offset } });
    })
  );

  router.delete(
    '/po-reviews/:id',
    validateUuidParam('id'),
    asyncErrorHandler(async (req: Request, res: Response) => {
      const removed = await ctx.reviews.remove(req.params.id);
      if (!removed) throw new Error('REVIEW_NOT_FOUND');
      return res.status(204).send();
    }, poReviewErrorMap)
  );

  return router;
}
