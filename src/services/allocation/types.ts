export type LocationId = string;

export const MAIN_LOCATION: LocationId = 'MAIN';
export const SUB_LOCATION: LocationId = 'SUB';

export type StockMode = 'MAIN' | 'SUB' | 'TOTAL';


/** On-hand quantities for one SKU. Locations missing from `byLocation` hold 0. */
export type StockRecord = {
  total: number;
  byLocation: Readonly<Record<LocationId, number>>;
};

export type ProductRecord = {
  sku: string;
  name: string;
  unitPrice: number;
  packSize: number;
  cartonWeight: number;
  cartonHeight: number;
  maxCartonsPerPallet: number;
};

export type StockLedger = ReadonlyMap<string, StockRecord>;
export type ProductMaster = ReadonlyMap<string, ProductRecord>;

/**
 * One line of a parsed PO document.
 *
 * `destinationId` is '' on aggregate ("mother") documents; `unitCost` is 0 on
 * destination-level documents. `packSize` is 0 when the document states none.
 * `stockMode` overrides the request-level mode.
 */
export type POLineItem = {
  sku: string;
  description: string;
  destinationId: string;
  quantityUnits: number;
  packSize: number;
  unitCost: number;
  documentNumber: string;
  shipWindow: string;
  isAggregate: boolean;
  stockMode?: StockMode;
};

export type InventoryStatus = 'OK' | 'INVENTORY_LOW' | 'OUT_OF_STOCK';
export type PriceStatus = 'OK' | 'PRICE_MISMATCH' | 'PRODUCT_MISSING';
export type CombinedStatus = InventoryStatus | Exclude<PriceStatus, 'OK'>;

export type Availability = {
  availableMain: number;
  availableSub: number;
  availableTotal: number;
  availableSelected: number;
};

export type ValidatedItem = POLineItem & {
  stockMode: StockMode;
  mainStock: number;
  subStock: number;
  totalStock: number;
  availableMain: number;
  availableSub: number;
  availableTotal: number;
  availableStock: number;
  requiredQty: number;
  shortage: number;
  transferFromSub: number;
  remainingShortage: number;
  inventoryStatus: InventoryStatus;
  priceStatus: PriceStatus;
  combinedStatus: CombinedStatus;
  systemPrice: number;
  effectivePackSize: number;
  priceWarning: string;
};

export type ReconciliationStatus = 'ok' | 'over' | 'under' | 'extra';

export type DestinationAllocation = {
  destinationId: string;
  qty: number;
  cartons: number;
};

export type ReconciliationRecord = {
  sku: string;
  aggregateQty: number;
  breakdownTotalQty: number;
  difference: number;
  status: ReconciliationStatus;
  breakdownByDestination: DestinationAllocation[];
};

export type DestinationRollup = {
  destinationId: string;
  totalUnits: number;
  totalCartons: number;
  skuCount: number;
  skuPreview: string[];
};

export type ReconciliationTotals = {
  aggregateQty: number;
  breakdownQty: number;
  difference: number;
  qtyMatch: boolean;
  skuCount: number;
};

export type ReconciliationResult = {
  records: ReconciliationRecord[];
  mismatches: ReconciliationRecord[];
  totals: ReconciliationTotals;
  isValid: boolean;
  byDestination: DestinationRollup[];
};

export type PalletKind = 'FULL' | 'MIXED';

export type PalletLineEntry = {
  sku: string;
  cartonQty: number;
  description: string;
  packSize: number;
};

export type Pallet = {
  id: string;
  kind: PalletKind;
  destinationId: string;
  lineEntries: PalletLineEntry[];
  totalCartons: number;
  totalUnits: number;
  totalWeight: number;
  totalHeight: number;
  utilizationPercent: number;
};

export type PalletInput = {
  sku: string;
  cartonQty: number;
  packSize: number;
  description: string;
  cartonWeightLbs: number;
  cartonHeightIn: number;
  maxCartonsPerPallet?: number | null;
  destinationId?: string;
};

export type PalletLimitViolation = {
  palletId: string;
  limit: 'weight' | 'height';
  actual: number;
  max: number;
};

export type DestinationSummary = {
  lines: number;
  units: number;
  cartons: number;
  amount: number;
  shortageLines: number;
};

export type ShortageLine = {
  sku: string;
  destinationId: string;
  shortage: number;
};

export type ValidationSummary = {
  lineCount: number;
  totalUnits: number;
  totalCartons: number;
  totalAmount: number;
  okCount: number;
  lowCount: number;
  outOfStockCount: number;
  priceMismatchCount: number;
  productMissingCount: number;
  totalShortage: number;
  totalTransferFromSub: number;
  shortageItems: ShortageLine[];
  perDestination: Map<string, DestinationSummary>;
};
