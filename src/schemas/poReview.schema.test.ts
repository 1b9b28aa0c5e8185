import { describe, expect, it } from 'vitest';
import { lineItemSchema, palletPlanSchema } from './poReview.schema';

describe('lineItemSchema', () => {
  it('accepts quantities written as numbers or formatted strings', () => {
    expect(lineItemSchema.safeParse({ sku: 'A100', quantityUnits: '1,200' }).success).toBe(true);
    expect(lineItemSchema.safeParse({ sku: 'A100', quantityUnits: 1_000_000 }).success).toBe(true);
  });

  it('rejects quantities above the line maximum', () => {
    const parsed = lineItemSchema.safeParse({ sku: 'A100', quantityUnits: '1e18' });
    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      expect(parsed.error.flatten().fieldErrors.quantityUnits).toEqual(['Quantity must not exceed 1000000.']);
    }
  });
});

describe('palletPlanSchema', () => {
  it('rejects a carton count above the line maximum', () => {
    const parsed = palletPlanSchema.safeParse({ items: [{ sku: 'A100', cartonQty: 1_000_001 }] });
    expect(parsed.success).toBe(false);
  });
});
