import { MAIN_LOCATION, SUB_LOCATION } from './allocation/types';
import type {
  CombinedStatus,
  InventoryStatus,
  POLineItem,
  PriceStatus,
  ProductMaster,
  ProductRecord,
  StockLedger,
  ValidatedItem
} from './allocation/types';
import { emptyStockRecord, stockAt } from './allocation/mappers';
import { normalizeStockMode, resolveAvailability, resolveSafetyStock } from './availability.service';
import { toInt } from '../lib/numbers';

// Absolute dollars. The slack keeps 10.01 vs 10.00 on the OK side despite binary rounding.
const PRICE_TOLERANCE = 0.01;
const PRICE_EPSILON = 1e-9;

export function classifyInventory(remainingShortage: number, availableSelected: number): InventoryStatus {
  if (remainingShortage === 0) return 'OK';
  if (availableSelected > 0) return 'INVENTORY_LOW';
  return 'OUT_OF_STOCK';
}

export function classifyPrice(
  item: Pick<POLineItem, 'unitCost' | 'isAggregate'>,
  product: ProductRecord | undefined
): { status: PriceStatus; warning: string } {
  if (!product) {
    return { status: 'PRODUCT_MISSING', warning: '' };
  }
  const systemPrice = product.unitPrice;
  if (item.isAggregate || (item.unitCost > 0 && systemPrice > 0)) {
    if (Math.abs(item.unitCost - systemPrice) - PRICE_TOLERANCE > PRICE_EPSILON) {
      return {
        status: 'PRICE_MISMATCH',
        warning: `PO: $${item.unitCost.toFixed(2)} vs System: $${systemPrice.toFixed(2)}`
      };
    }
    return { status: 'OK', warning: '' };
  }
  if (systemPrice === 0) {
    return { status: 'PRODUCT_MISSING', warning: '' };
  }
  return { status: 'OK', warning: '' };
}

export function resolveEffectivePackSize(item: Pick<POLineItem, 'packSize'>, product?: ProductRecord): number {
  if (item.packSize > 0) return Math.floor(item.packSize) || 1;
  if (product && product.packSize > 0) return Math.floor(product.packSize) || 1;
  return 1;
}

export function validateLineItem(
  item: POLineItem,
  stock: StockLedger,
  products: ProductMaster,
  safetyStock: number,
  mode: unknown
): ValidatedItem {
  const stockRecord = stock.get(item.sku) ?? emptyStockRecord();
  const product = products.get(item.sku);
  const stockMode = item.stockMode ?? normalizeStockMode(mode);
  const availability = resolveAvailability(stockRecord, safetyStock, stockMode);

  // safety stock reduces supply; the requirement stays at the PO quantity
  const requiredQty = item.quantityUnits;
  const shortage = Math.max(0, requiredQty - availability.availableSelected);

  let transferFromSub = 0;
  if (stockMode === 'MAIN' && shortage > 0 && availability.availableSub > 0) {
    transferFromSub = Math.min(availability.availableSub, shortage);
  }
  const remainingShortage = Math.max(0, shortage - transferFromSub);

  const inventoryStatus = classifyInventory(remainingShortage, availability.availableSelected);
  const price = classifyPrice(item, product);
  const combinedStatus: CombinedStatus = price.status === 'OK' ? inventoryStatus : price.status;

  return {
    ...item,
    stockMode,
    mainStock: stockAt(stockRecord, MAIN_LOCATION),
    subStock: stockAt(stockRecord, SUB_LOCATION),
    totalStock: toInt(stockRecord.total),
    availableMain: availability.availableMain,
    availableSub: availability.availableSub,
    availableTotal: availability.availableTotal,
    availableStock: availability.availableSelected,
    requiredQty,
    shortage,
    transferFromSub,
    remainingShortage,
    inventoryStatus,
    priceStatus: price.status,
    combinedStatus,
    systemPrice: product?.unitPrice ?? 0,
    effectivePackSize: resolveEffectivePackSize(item, product),
    priceWarning: price.warning
  };
}

/**
 * Validates every PO line against the stock ledger and product master.
 *
 * Price and registration problems win the display status (`combinedStatus`) but
 * `remainingShortage` is always reported. Nothing here throws for a bad line.
 */
export function validateLineItems(
  items: readonly POLineItem[],
  stock: StockLedger,
  products: ProductMaster,
  safetyStock: unknown,
  mode: unknown
): ValidatedItem[] {
  const reserve = resolveSafetyStock(safetyStock);
  const defaultMode = normalizeStockMode(mode);
  return items.map((item) => validateLineItem(item, stock, products, reserve, defaultMode));
}
