import { describe, expect, it } from 'vitest';
import { summarizeValidatedItems } from './poSummary.service';

type Line = Parameters<typeof summarizeValidatedItems>[0][number];

function line(overrides: Partial<Line>): Line {
  return {
    sku: 'A',
    destinationId: 'DC1',
    quantityUnits: 0,
    effectivePackSize: 1,
    unitCost: 0,
    isAggregate: false,
    systemPrice: 0,
    inventoryStatus: 'OK',
    priceStatus: 'OK',
    remainingShortage: 0,
    transferFromSub: 0,
    ...overrides
  };
}

const items: Line[] = [
  line({ sku: 'A', quantityUnits: 100, effectivePackSize: 12, systemPrice: 4.5, transferFromSub: 10 }),
  line({ sku: 'B', quantityUnits: 30, effectivePackSize: 10, systemPrice: 9, inventoryStatus: 'INVENTORY_LOW', remainingShortage: 5 }),
  line({
    sku: 'Z',
    destinationId: '',
    quantityUnits: 5,
    inventoryStatus: 'OUT_OF_STOCK',
    priceStatus: 'PRODUCT_MISSING',
    remainingShortage: 5
  }),
  line({ sku: 'C', destinationId: 'DC2', effectivePackSize: 24, systemPrice: 3.1, priceStatus: 'PRICE_MISMATCH' })
];

describe('summarizeValidatedItems', () => {
  const summary = summarizeValidatedItems(items);

  it('totals units, cartons and amount', () => {
    expect(summary.lineCount).toBe(4);
    expect(summary.totalUnits).toBe(135);
    expect(summary.totalCartons).toBe(17);
    expect(summary.totalAmount).toBe(720);
  });

  it('counts inventory and price statuses separately', () => {
    expect(summary.okCount).toBe(2);
    expect(summary.lowCount).toBe(1);
    expect(summary.outOfStockCount).toBe(1);
    expect(summary.priceMismatchCount).toBe(1);
    expect(summary.productMissingCount).toBe(1);
  });

  it('lists remaining shortages and transfers', () => {
    expect(summary.totalShortage).toBe(10);
    expect(summary.totalTransferFromSub).toBe(10);
    expect(summary.shortageItems).toEqual([
      { sku: 'B', destinationId: 'DC1', shortage: 5 },
      { sku: 'Z', destinationId: 'N/A', shortage: 5 }
    ]);
  });

  it('groups figures per destination', () => {
    expect(Object.fromEntries(summary.perDestination)).toEqual({
      DC1: { lines: 2, units: 130, cartons: 12, amount: 720, shortageLines: 1 },
      'N/A': { lines: 1, units: 5, cartons: 5, amount: 0, shortageLines: 1 },
      DC2: { lines: 1, units: 0, cartons: 0, amount: 0, shortageLines: 0 }
    });
  });

  it('prices aggregate lines at the document cost when asked to', () => {
    const aggregate = [line({ quantityUnits: 10, unitCost: 5, systemPrice: 4.5, isAggregate: true })];
    expect(summarizeValidatedItems(aggregate).totalAmount).toBe(45);
    expect(summarizeValidatedItems(aggregate, { useDocumentCostForAggregate: true }).totalAmount).toBe(50);
  });

  it('rounds amounts to cents', () => {
    expect(summarizeValidatedItems([line({ quantityUnits: 3, systemPrice: 0.1 })]).totalAmount).toBe(0.3);
  });
});
