import { roundCurrency } from '../lib/numbers';
import { UNASSIGNED_DESTINATION } from './allocation/mappers';
import type { DestinationSummary, ShortageLine, ValidatedItem, ValidationSummary } from './allocation/types';

export type SummaryOptions = {
  useDocumentCostForAggregate?: boolean;
};

type SummarizableItem = Pick<
  ValidatedItem,
  | 'sku'
  | 'destinationId'
  | 'quantityUnits'
  | 'effectivePackSize'
  | 'unitCost'
  | 'isAggregate'
  | 'systemPrice'
  | 'inventoryStatus'
  | 'priceStatus'
  | 'remainingShortage'
  | 'transferFromSub'
>;

function lineAmount(item: SummarizableItem, options: SummaryOptions): number {
  if (options.useDocumentCostForAggregate && item.isAggregate && item.unitCost > 0) {
    return item.quantityUnits * item.unitCost;
  }
  return item.quantityUnits * item.systemPrice;
}

function lineCartons(item: SummarizableItem): number {
  if (item.quantityUnits <= 0) return 0;
  return Math.ceil(item.quantityUnits / Math.max(1, item.effectivePackSize));
}

/**
 * Rolls validated lines up into order totals, status counts and per-destination
 * figures. Lines without a destination are reported under `N/A`.
 */
export function summarizeValidatedItems(
  items: readonly SummarizableItem[],
  options: SummaryOptions = {}
): ValidationSummary {
  const perDestination = new Map<string, DestinationSummary>();
  const shortageItems: ShortageLine[] = [];
  let totalUnits = 0;
  let totalCartons = 0;
  let totalAmount = 0;
  let okCount = 0;
  let lowCount = 0;
  let outOfStockCount = 0;
  let priceMismatchCount = 0;
  let productMissingCount = 0;
  let totalShortage = 0;
  let totalTransferFromSub = 0;

  for (const item of items) {
    const cartons = lineCartons(item);
    const amount = lineAmount(item, options);
    totalUnits += item.quantityUnits;
    totalCartons += cartons;
    totalAmount += amount;
    totalShortage += item.remainingShortage;
    totalTransferFromSub += item.transferFromSub;

    if (item.inventoryStatus === 'OK') okCount += 1;
    else if (item.inventoryStatus === 'INVENTORY_LOW') lowCount += 1;
    else outOfStockCount += 1;

    if (item.priceStatus === 'PRICE_MISMATCH') priceMismatchCount += 1;
    else if (item.priceStatus === 'PRODUCT_MISSING') productMissingCount += 1;

    const destinationId = item.destinationId || UNASSIGNED_DESTINATION;
    if (item.remainingShortage > 0) {
      shortageItems.push({ sku: item.sku, destinationId, shortage: item.remainingShortage });
    }

    const bucket = perDestination.get(destinationId) ?? { lines: 0, units: 0, cartons: 0, amount: 0, shortageLines: 0 };
    bucket.lines += 1;
    bucket.units += item.quantityUnits;
    bucket.cartons += cartons;
    bucket.amount = roundCurrency(bucket.amount + amount);
    if (item.remainingShortage > 0) bucket.shortageLines += 1;
    perDestination.set(destinationId, bucket);
  }

  return {
    lineCount: items.length,
    totalUnits,
    totalCartons,
    totalAmount: roundCurrency(totalAmount),
    okCount,
    lowCount,
    outOfStockCount,
    priceMismatchCount,
    productMissingCount,
    totalShortage,
    totalTransferFromSub,
    shortageItems,
    perDestination
  };
}
