import { parseOptionalNumber, toInt } from '../lib/numbers';
import { MAIN_LOCATION, SUB_LOCATION } from './allocation/types';
import type { Availability, StockMode, StockRecord } from './allocation/types';
import { normalizeStockModeValue, stockAt } from './allocation/mappers';

function coerceSafetyStock(value: unknown): number | null {
  const parsed = parseOptionalNumber(value);
  if (parsed === null) return null;
  return Math.max(0, Math.trunc(parsed));
}

/**
 * Resolves the safety stock for a request: the explicit value when it reads as a
 * number (negatives clamp to 0), otherwise the configured default, otherwise 0.
 * Bad input falls back instead of failing the request.
 */
export function resolveSafetyStock(requested: unknown, configuredDefault?: unknown): number {
  return coerceSafetyStock(requested) ?? coerceSafetyStock(configuredDefault) ?? 0;
}

export function normalizeStockMode(value: unknown, fallback: StockMode = 'TOTAL'): StockMode {
  return normalizeStockModeValue(value) ?? fallback;
}

function availableAcrossPools(stock: StockRecord, reserve: number): number {
  const pools = Object.keys(stock.byLocation);
  if (pools.length === 0) {
    return Math.max(0, toInt(stock.total) - reserve);
  }
  return pools.reduce((sum, location) => sum + Math.max(0, stockAt(stock, location) - reserve), 0);
}

/**
 * Available quantity per pool after reserving `safetyStock`. The reserve is taken
 * from every location pool separately and TOTAL is the sum of what each pool has
 * left: MAIN 50 / SUB 80 with a reserve of 10 gives 40 / 70 / 110. A record with no
 * location breakdown is treated as a single pool holding `total`.
 */
export function resolveAvailability(stock: StockRecord, safetyStock: number, mode: unknown): Availability {
  const reserve = resolveSafetyStock(safetyStock);
  const availableMain = Math.max(0, stockAt(stock, MAIN_LOCATION) - reserve);
  const availableSub = Math.max(0, stockAt(stock, SUB_LOCATION) - reserve);
  const availableTotal = availableAcrossPools(stock, reserve);

  const byMode: Record<StockMode, number> = {
    MAIN: availableMain,
    SUB: availableSub,
    TOTAL: availableTotal
  };

  return {
    availableMain,
    availableSub,
    availableTotal,
    availableSelected: byMode[normalizeStockMode(mode)]
  };
}
