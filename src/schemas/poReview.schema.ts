import { z } from 'zod';
import { MAX_LINE_QUANTITY, toNumber } from '../lib/numbers';

// Extracted documents give numbers as strings ("1,200", "$4.50"); the mappers coerce them.
const numeric = z.union([z.number(), z.string().max(32)]);

const quantity = numeric.refine((value) => toNumber(value) <= MAX_LINE_QUANTITY, {
  message: `Quantity must not exceed ${MAX_LINE_QUANTITY}.`
});

export const stockModeSchema = z.enum(['MAIN', 'SUB', 'TOTAL']);

export const lineItemSchema = z.object({
  sku: z.string().min(1).max(64),
  description: z.string().max(500).optional(),
  destinationId: z.string().max(64).optional(),
  quantityUnits: quantity,
  packSize: numeric.optional(),
  unitCost: numeric.optional(),
  documentNumber: z.string().max(64).optional(),
  shipWindow: z.string().max(120).optional(),
  isAggregate: z.boolean().optional(),
  stockMode: stockModeSchema.optional()
});

export const documentSchema = z
  .object({
    name: z.string().min(1).max(255).optional(),
    documentNumber: z.string().max(64).optional(),
    shipWindow: z.string().max(120).optional(),
    items: z.array(lineItemSchema).max(5000).optional(),
    csv: z.string().max(5_000_000).optional()
  })
  .refine((doc) => (doc.items === undefined) !== (doc.csv === undefined), {
    message: 'Provide exactly one of items or csv.'
  });

const allocationOptions = {
  safetyStock: numeric.optional(),
  stockMode: z.string().max(16).optional()
};

export const poReviewSchema = z.object({
  aggregate: documentSchema,
  breakdown: documentSchema.optional(),
  ...allocationOptions
});

export const validateItemsSchema = z.object({
  items: z.array(lineItemSchema).max(5000),
  ...allocationOptions
});

export const reconcileSchema = z.object({
  aggregateItems: z.array(lineItemSchema).max(5000),
  breakdownItems: z.array(lineItemSchema).max(20000)
});

export const palletItemSchema = z.object({
  sku: z.string().min(1).max(64),
  cartonQty: quantity,
  packSize: numeric.optional(),
  description: z.string().max(500).optional(),
  cartonWeightLbs: numeric.optional(),
  cartonHeightIn: numeric.optional(),
  maxCartonsPerPallet: numeric.nullable().optional(),
  destinationId: z.string().max(64).optional()
});

export const palletPlanSchema = z.object({
  items: z.array(palletItemSchema).max(5000),
  byDestination: z.boolean().optional()
});

export type DocumentInput = z.infer<typeof documentSchema>;

export const unitOrderItemSchema = z.object({
  sku: z.string().min(1).max(64),
  quantityUnits: quantity,
  packSize: numeric.optional(),
  description: z.string().max(500).optional(),
  destinationId: z.string().max(64).optional()
});

export const unitPalletPlanSchema = z.object({
  items: z.array(unitOrderItemSchema).max(5000),
  byDestination: z.boolean().optional()
});

export const skuBatchSchema = z.object({
  skus: z.array(z.string().max(64)).max(5000)
});
