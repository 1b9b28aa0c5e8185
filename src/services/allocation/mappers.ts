import { parseOptionalNumber, toInt, toNonNegativeInt, toNumber, toPositiveInt, toQuantity } from '../../lib/numbers';
import { DEFAULT_PALLET_POLICY } from '../../config/palletPolicy';
import type { PalletInput, POLineItem, ProductRecord, StockMode, StockRecord } from './types';

export const DEFAULT_CARTON_WEIGHT = 15;
export const DEFAULT_CARTON_HEIGHT = 10;
export const UNASSIGNED_DESTINATION = 'N/A';

export type RawLineItem = {
  sku?: unknown;
  description?: unknown;
  destinationId?: unknown;
  quantityUnits?: unknown;
  packSize?: unknown;
  unitCost?: unknown;
  documentNumber?: unknown;
  shipWindow?: unknown;
  isAggregate?: unknown;
  stockMode?: unknown;
};

export type RawProductRow = {
  sku?: unknown;
  name?: unknown;
  unitPrice?: unknown;
  packSize?: unknown;
  cartonWeight?: unknown;
  cartonHeight?: unknown;
  maxCartonsPerPallet?: unknown;
};

export type RawStockRow = {
  sku?: unknown;
  location?: unknown;
  onHand?: unknown;
};

function toText(value: unknown): string {
  if (value === null || value === undefined) return '';
  return String(value).trim();
}

export function normalizeStockModeValue(value: unknown): StockMode | undefined {
  const normalized = toText(value).toUpperCase();
  if (normalized === 'MAIN' || normalized === 'SUB' || normalized === 'TOTAL') return normalized;
  return undefined;
}

/**
 * Coerces an extractor record into a POLineItem. Malformed numbers become 0
 * (a pack size of 0 means the document did not state one), and so do quantities
 * above MAX_LINE_QUANTITY; the line is kept so the rest of the document still processes.
 */
export function mapLineItem(raw: RawLineItem): POLineItem {
  const destinationId = toText(raw.destinationId);
  const unitCost = Math.max(0, toNumber(raw.unitCost));
  const isAggregate = typeof raw.isAggregate === 'boolean' ? raw.isAggregate : destinationId === '';
  const stockMode = normalizeStockModeValue(raw.stockMode);

  return {
    sku: toText(raw.sku),
    description: toText(raw.description),
    destinationId,
    quantityUnits: toQuantity(raw.quantityUnits),
    packSize: toNonNegativeInt(raw.packSize),
    unitCost,
    documentNumber: toText(raw.documentNumber),
    shipWindow: toText(raw.shipWindow),
    isAggregate,
    ...(stockMode ? { stockMode } : {})
  };
}

export function mapProductRecord(raw: RawProductRow): ProductRecord {
  const weight = parseOptionalNumber(raw.cartonWeight);
  const height = parseOptionalNumber(raw.cartonHeight);
  return {
    sku: toText(raw.sku),
    name: toText(raw.name),
    unitPrice: Math.max(0, toNumber(raw.unitPrice)),
    packSize: toPositiveInt(raw.packSize, 1),
    cartonWeight: weight !== null && weight > 0 ? weight : DEFAULT_CARTON_WEIGHT,
    cartonHeight: height !== null && height > 0 ? height : DEFAULT_CARTON_HEIGHT,
    maxCartonsPerPallet: toPositiveInt(raw.maxCartonsPerPallet, DEFAULT_PALLET_POLICY.defaultCartonsPerPallet)
  };
}

export function emptyStockRecord(): StockRecord {
  return { total: 0, byLocation: {} };
}

/**
 * Folds per-location rows into one StockRecord per SKU. Location codes are
 * upper-cased; rows without a location count towards MAIN.
 */
export function buildStockRecords(rows: Iterable<RawStockRow>): Map<string, StockRecord> {
  const grouped = new Map<string, Record<string, number>>();
  for (const row of rows) {
    const sku = toText(row.sku);
    if (!sku) continue;
    const location = toText(row.location).toUpperCase() || 'MAIN';
    const byLocation = grouped.get(sku) ?? {};
    byLocation[location] = (byLocation[location] ?? 0) + toInt(row.onHand);
    grouped.set(sku, byLocation);
  }

  const records = new Map<string, StockRecord>();
  for (const [sku, byLocation] of grouped) {
    const total = Object.values(byLocation).reduce((sum, qty) => sum + qty, 0);
    records.set(sku, { total, byLocation: Object.freeze(byLocation) });
  }
  return records;
}

export function stockAt(stock: StockRecord, location: string): number {
  return toInt(stock.byLocation[location]);
}

/** Case-sensitive code-unit ordering for SKUs and destination ids. */
export function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export type RawPalletInput = {
  sku?: unknown;
  cartonQty?: unknown;
  packSize?: unknown;
  description?: unknown;
  cartonWeightLbs?: unknown;
  cartonHeightIn?: unknown;
  maxCartonsPerPallet?: unknown;
  destinationId?: unknown;
};

export function mapPalletInput(raw: RawPalletInput): PalletInput {
  const weight = parseOptionalNumber(raw.cartonWeightLbs);
  const height = parseOptionalNumber(raw.cartonHeightIn);
  return {
    sku: toText(raw.sku),
    cartonQty: toQuantity(raw.cartonQty),
    packSize: toPositiveInt(raw.packSize, 1),
    description: toText(raw.description),
    cartonWeightLbs: weight !== null && weight > 0 ? weight : DEFAULT_CARTON_WEIGHT,
    cartonHeightIn: height !== null && height > 0 ? height : DEFAULT_CARTON_HEIGHT,
    maxCartonsPerPallet: parseOptionalNumber(raw.maxCartonsPerPallet),
    destinationId: toText(raw.destinationId)
  };
}
