import type { AllocationPolicy } from '../config/allocationPolicy';
import type { PalletPolicy } from '../config/palletPolicy';
import { PO_REVIEW_EVENT, emitPoReviewEvent, type EventLogger } from '../observability/poReview.events';
import type {
  Pallet,
  PalletLimitViolation,
  POLineItem,
  ReconciliationResult,
  StockMode,
  ValidatedItem,
  ValidationSummary
} from './allocation/types';
import { reconcileAllocation } from './allocationReconcile.service';
import { normalizeStockMode, resolveSafetyStock } from './availability.service';
import {
  assertDocumentParsed,
  type DocumentParser,
  type DocumentRole,
  type ParsedDocument
} from './documentIntake.service';
import { validateLineItems } from './lineItemValidation.service';
import { lookupMasterData, type MasterDataClient, type MasterDataStore } from './masterData.service';
import { buildPalletInputs, findPalletLimitViolations, packPalletsByDestination } from './palletizer.service';
import { summarizeValidatedItems } from './poSummary.service';
import {
  buildReviewRecord,
  type ReviewRecord,
  type ReviewRecordOptions,
  type ReviewRecordRepository
} from './reviewRecord.service';

export type PoReviewDependencies = ReviewRecordOptions & {
  store: Pick<MasterDataStore, 'getSnapshot'>;
  client?: MasterDataClient | null;
  repository?: ReviewRecordRepository | null;
  allocationPolicy: AllocationPolicy;
  palletPolicy: PalletPolicy;
  logger?: EventLogger;
  lookupTimeoutMs?: number;
};

export type PoReviewInput = {
  aggregate: ParsedDocument;
  breakdown?: ParsedDocument | null;
  safetyStock?: unknown;
  stockMode?: unknown;
};

export type PoReviewResult = {
  reviewId: string;
  aggregateDocNumber: string;
  breakdownDocNumber: string | null;
  shipWindow: string;
  safetyStock: number;
  stockMode: StockMode;
  validatedItems: ValidatedItem[];
  reconciliation: ReconciliationResult | null;
  pallets: Pallet[];
  palletViolations: PalletLimitViolation[];
  summary: ValidationSummary;
  record: ReviewRecord;
  masterDataDegraded: boolean;
};

export type DocumentSource = {
  name: string;
  content: Uint8Array | string;
};

/**
 * Parses one uploaded document. A failed parse is logged and rethrown as
 * DocumentParseError; an empty document is returned as is.
 */
export async function intakeDocument(
  parser: DocumentParser,
  source: DocumentSource,
  role: DocumentRole,
  logger: EventLogger = console.warn
): Promise<ParsedDocument> {
  const doc = await parser.parseDocument(source.content, { name: source.name, role });
  if (doc.error !== null) {
    emitPoReviewEvent(
      PO_REVIEW_EVENT.DOCUMENT_PARSE_FAILED,
      { documentName: source.name, role, error: doc.error },
      logger
    );
  }
  return assertDocumentParsed(doc, source);
}

/**
 * Destination-level documents usually carry no price. Such lines take the unit
 * cost the aggregate document states for the same SKU.
 */
export function inheritAggregateUnitCost(
  breakdownItems: readonly POLineItem[],
  aggregateItems: readonly POLineItem[]
): POLineItem[] {
  const costBySku = new Map<string, number>();
  for (const item of aggregateItems) {
    if (item.unitCost > 0 && !costBySku.has(item.sku)) costBySku.set(item.sku, item.unitCost);
  }
  return breakdownItems.map((item) => {
    if (item.unitCost > 0) return item;
    const unitCost = costBySku.get(item.sku);
    return unitCost === undefined ? item : { ...item, unitCost };
  });
}

/**
 * Runs one PO through validation, reconciliation, palletizing and the summary.
 *
 * With a breakdown document the per-destination lines are validated and packed
 * and the aggregate is only reconciled against them; without one the aggregate
 * lines are validated and packed directly.
 */
export async function runPoReview(input: PoReviewInput, deps: PoReviewDependencies): Promise<PoReviewResult> {
  const logger = deps.logger ?? console.warn;
  const { aggregate } = input;
  const breakdown = input.breakdown ?? null;

  const workingItems = breakdown ? inheritAggregateUnitCost(breakdown.items, aggregate.items) : aggregate.items;
  const skus = [...aggregate.items, ...(breakdown?.items ?? [])].map((item) => item.sku);
  const masterData = await lookupMasterData(skus, deps.store, deps.client, {
    logger,
    timeoutMs: deps.lookupTimeoutMs
  });

  const safetyStock = resolveSafetyStock(input.safetyStock, deps.allocationPolicy.defaultSafetyStock);
  const stockMode = normalizeStockMode(input.stockMode, deps.allocationPolicy.defaultStockMode);
  const validatedItems = validateLineItems(workingItems, masterData.stock, masterData.products, safetyStock, stockMode);

  const reconciliation = breakdown
    ? reconcileAllocation(aggregate.items, breakdown.items, { products: masterData.products })
    : null;

  const policy = deps.palletPolicy;
  const pallets = packPalletsByDestination(buildPalletInputs(validatedItems, masterData.products, policy), { policy });
  const palletViolations = findPalletLimitViolations(pallets, policy);

  const summary = summarizeValidatedItems(validatedItems, {
    useDocumentCostForAggregate: deps.allocationPolicy.useDocumentCostForAggregate
  });

  const record = buildReviewRecord(
    {
      aggregateDocNumber: aggregate.documentNumber,
      breakdownDocNumber: breakdown?.documentNumber ?? null,
      summary,
      validatedItems,
      reconciliation,
      palletViolations
    },
    deps
  );
  if (deps.repository) {
    await deps.repository.save(record);
  }

  emitPoReviewEvent(
    PO_REVIEW_EVENT.REVIEW_COMPLETED,
    {
      reviewId: record.id,
      aggregateDocNumber: record.aggregateDocNumber,
      breakdownDocNumber: record.breakdownDocNumber,
      lineCount: summary.lineCount,
      palletCount: pallets.length,
      mismatchCount: record.mismatchCount,
      warningCount: record.warningCount
    },
    logger
  );

  return {
    reviewId: record.id,
    aggregateDocNumber: aggregate.documentNumber,
    breakdownDocNumber: record.breakdownDocNumber,
    shipWindow: aggregate.shipWindow,
    safetyStock,
    stockMode,
    validatedItems,
    reconciliation,
    pallets,
    palletViolations,
    summary,
    record,
    masterDataDegraded: masterData.degraded
  };
}
