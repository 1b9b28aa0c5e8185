import type { StockMode } from '../services/allocation/types';

export type AllocationPolicy = {
  defaultSafetyStock: number;
  defaultStockMode: StockMode;
  useDocumentCostForAggregate: boolean;
};

function parseNonNegativeInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value === null || value === '') return fallback;
  const parsed = Number(value);
  if (Number.isNaN(parsed)) return fallback;
  return Math.max(0, Math.trunc(parsed));
}

function parseStockMode(value: string | undefined, fallback: StockMode): StockMode {
  const normalized = value?.trim().toUpperCase();
  if (normalized === 'MAIN' || normalized === 'SUB' || normalized === 'TOTAL') return normalized;
  return fallback;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;
  return fallback;
}

export function getAllocationPolicy(env: NodeJS.ProcessEnv = process.env): AllocationPolicy {
  return {
    defaultSafetyStock: parseNonNegativeInt(env.SAFETY_STOCK, 0),
    defaultStockMode: parseStockMode(env.STOCK_MODE, 'TOTAL'),
    useDocumentCostForAggregate: parseBoolean(env.USE_DOCUMENT_COST_FOR_AGGREGATE, false)
  };
}
