import type {
  DestinationAllocation,
  DestinationRollup,
  POLineItem,
  ProductMaster,
  ReconciliationRecord,
  ReconciliationResult
} from './allocation/types';
import { UNASSIGNED_DESTINATION, compareIds } from './allocation/mappers';

export const SKU_PREVIEW_LIMIT = 5;

type ReconcileOptions = {
  products?: ProductMaster;
};

type BreakdownCell = {
  qty: number;
  // first positive pack size seen on a breakdown line for this SKU and destination
  linePackSize: number;
};

type NormalizedLine = {
  sku: string;
  destinationId: string;
  qty: number;
  packSize: number;
};

function normalizeLines(items: readonly POLineItem[], withDestination: boolean): NormalizedLine[] {
  const lines: NormalizedLine[] = [];
  for (const item of items) {
    const qty = Math.trunc(item.quantityUnits);
    if (!(qty > 0)) continue;
    const sku = item.sku.trim();
    if (!sku) continue;
    const destinationId = withDestination ? item.destinationId.trim() || UNASSIGNED_DESTINATION : '';
    lines.push({ sku, destinationId, qty, packSize: item.packSize > 0 ? Math.floor(item.packSize) : 0 });
  }
  return lines;
}

function cartonsFor(qty: number, linePackSize: number, sku: string, products?: ProductMaster): number {
  const masterPack = products?.get(sku)?.packSize ?? 0;
  const packSize = linePackSize > 0 ? linePackSize : masterPack > 0 ? Math.floor(masterPack) : 1;
  return Math.ceil(qty / packSize);
}

/**
 * Compares the per-SKU totals of an aggregate ("mother") PO with the sum of its
 * per-destination breakdown.
 *
 * Every SKU seen in either document gets exactly one record; `mismatches` holds
 * the ones that are not `ok`. Lines with a non-positive quantity are dropped
 * before anything is summed.
 */
export function reconcileAllocation(
  aggregateItems: readonly POLineItem[],
  breakdownItems: readonly POLineItem[],
  options: ReconcileOptions = {}
): ReconciliationResult {
  const aggregateTotals = new Map<string, number>();
  for (const line of normalizeLines(aggregateItems, false)) {
    aggregateTotals.set(line.sku, (aggregateTotals.get(line.sku) ?? 0) + line.qty);
  }

  const breakdownTotals = new Map<string, number>();
  const cellsBySku = new Map<string, Map<string, BreakdownCell>>();
  for (const line of normalizeLines(breakdownItems, true)) {
    breakdownTotals.set(line.sku, (breakdownTotals.get(line.sku) ?? 0) + line.qty);
    const cells = cellsBySku.get(line.sku) ?? new Map<string, BreakdownCell>();
    const cell = cells.get(line.destinationId) ?? { qty: 0, linePackSize: 0 };
    cell.qty += line.qty;
    if (cell.linePackSize === 0 && line.packSize > 0) cell.linePackSize = line.packSize;
    cells.set(line.destinationId, cell);
    cellsBySku.set(line.sku, cells);
  }

  const allocationsFor = (sku: string): DestinationAllocation[] => {
    const cells = cellsBySku.get(sku);
    if (!cells) return [];
    return [...cells.entries()]
      .sort(([a], [b]) => compareIds(a, b))
      .map(([destinationId, cell]) => ({
        destinationId,
        qty: cell.qty,
        cartons: cartonsFor(cell.qty, cell.linePackSize, sku, options.products)
      }));
  };

  const records: ReconciliationRecord[] = [];
  for (const sku of [...aggregateTotals.keys()].sort(compareIds)) {
    const aggregateQty = aggregateTotals.get(sku) ?? 0;
    const breakdownTotalQty = breakdownTotals.get(sku) ?? 0;
    const difference = breakdownTotalQty - aggregateQty;
    records.push({
      sku,
      aggregateQty,
      breakdownTotalQty,
      difference,
      status: difference === 0 ? 'ok' : difference > 0 ? 'over' : 'under',
      breakdownByDestination: allocationsFor(sku)
    });
  }

  const extraSkus = [...breakdownTotals.keys()].filter((sku) => !aggregateTotals.has(sku)).sort(compareIds);
  for (const sku of extraSkus) {
    const breakdownTotalQty = breakdownTotals.get(sku) ?? 0;
    records.push({
      sku,
      aggregateQty: 0,
      breakdownTotalQty,
      difference: breakdownTotalQty,
      status: 'extra',
      breakdownByDestination: allocationsFor(sku)
    });
  }

  const mismatches = records.filter((record) => record.status !== 'ok');
  const aggregateQty = sumValues(aggregateTotals);
  const breakdownQty = sumValues(breakdownTotals);
  const qtyMatch = aggregateQty === breakdownQty;

  return {
    records,
    mismatches,
    totals: {
      aggregateQty,
      breakdownQty,
      difference: breakdownQty - aggregateQty,
      qtyMatch,
      skuCount: records.length
    },
    // both the per-SKU records and the grand totals must agree
    isValid: mismatches.length === 0 && qtyMatch,
    byDestination: rollupDestinations(records)
  };
}

function sumValues(map: Map<string, number>): number {
  let total = 0;
  for (const value of map.values()) total += value;
  return total;
}

function rollupDestinations(records: readonly ReconciliationRecord[]): DestinationRollup[] {
  const rollups = new Map<string, { totalUnits: number; totalCartons: number; skus: Set<string> }>();
  for (const record of records) {
    for (const allocation of record.breakdownByDestination) {
      const rollup = rollups.get(allocation.destinationId) ?? { totalUnits: 0, totalCartons: 0, skus: new Set<string>() };
      rollup.totalUnits += allocation.qty;
      rollup.totalCartons += allocation.cartons;
      rollup.skus.add(record.sku);
      rollups.set(allocation.destinationId, rollup);
    }
  }

  return [...rollups.entries()]
    .sort(([a], [b]) => compareIds(a, b))
    .map(([destinationId, rollup]) => {
      const skus = [...rollup.skus].sort(compareIds);
      return {
        destinationId,
        totalUnits: rollup.totalUnits,
        totalCartons: rollup.totalCartons,
        skuCount: skus.length,
        skuPreview: skus.slice(0, SKU_PREVIEW_LIMIT)
      };
    });
}
