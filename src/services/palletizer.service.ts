import { DEFAULT_PALLET_POLICY, type PalletPolicy } from '../config/palletPolicy';
import { roundQuantity, toNumber, toPositiveInt, toQuantity } from '../lib/numbers';
import { DEFAULT_CARTON_HEIGHT, DEFAULT_CARTON_WEIGHT, compareIds } from './allocation/mappers';
import type {
  Pallet,
  PalletInput,
  PalletLimitViolation,
  PalletLineEntry,
  POLineItem,
  ProductMaster,
  ValidatedItem
} from './allocation/types';
import { resolveEffectivePackSize } from './lineItemValidation.service';

// Slack for binary accumulation error when a bin sums to exactly one pallet.
const VOLUME_EPSILON = 1e-9;

export type PackOptions = {
  policy?: PalletPolicy;
  firstPalletNumber?: number;
};

export type PackLine = {
  sku: string;
  description: string;
  packSize: number;
  cartonWeight: number;
  cartonHeight: number;
  capacity: number;
  destinationId: string;
};

export type SplitEntry = {
  line: PackLine;
  cartonQty: number;
  volume: number;
};

export type Bin = {
  volume: number;
  entries: SplitEntry[];
};

type PalletDraft = Omit<Pallet, 'id'>;

export function formatPalletId(sequence: number): string {
  return `P${String(sequence).padStart(3, '0')}`;
}

/** Cartons per full pallet: absent, non-finite or non-positive values fall back to the policy default. */
export function resolvePalletCapacity(value: unknown, fallback: number = DEFAULT_PALLET_POLICY.defaultCartonsPerPallet): number {
  return toPositiveInt(value, fallback);
}

function toPackLine(item: PalletInput, policy: PalletPolicy): PackLine {
  const weight = toNumber(item.cartonWeightLbs);
  const height = toNumber(item.cartonHeightIn);
  return {
    sku: item.sku.trim(),
    description: item.description,
    packSize: toPositiveInt(item.packSize, 1),
    cartonWeight: weight > 0 ? weight : 0,
    cartonHeight: height > 0 ? height : 0,
    capacity: resolvePalletCapacity(item.maxCartonsPerPallet, policy.defaultCartonsPerPallet),
    destinationId: item.destinationId?.trim() ?? ''
  };
}

function fullPallet(line: PackLine, policy: PalletPolicy): PalletDraft {
  const cartons = line.capacity;
  const layers = Math.ceil(cartons / policy.cartonsPerLayer);
  return {
    kind: 'FULL',
    destinationId: line.destinationId,
    lineEntries: [{ sku: line.sku, cartonQty: cartons, description: line.description, packSize: line.packSize }],
    totalCartons: cartons,
    totalUnits: cartons * line.packSize,
    totalWeight: roundQuantity(policy.palletBaseWeight + cartons * line.cartonWeight),
    totalHeight: roundQuantity(layers * line.cartonHeight + policy.palletBaseHeight),
    utilizationPercent: 100
  };
}

function mixedPallet(bin: Bin, policy: PalletPolicy): PalletDraft {
  const entries = new Map<string, PalletLineEntry>();
  let totalCartons = 0;
  let totalUnits = 0;
  let cartonWeight = 0;
  let tallestCarton = 0;

  for (const { line, cartonQty } of bin.entries) {
    const key = `${line.sku}\u0000${line.packSize}`;
    const existing = entries.get(key);
    if (existing) {
      existing.cartonQty += cartonQty;
    } else {
      entries.set(key, { sku: line.sku, cartonQty, description: line.description, packSize: line.packSize });
    }
    totalCartons += cartonQty;
    totalUnits += cartonQty * line.packSize;
    cartonWeight += cartonQty * line.cartonWeight;
    tallestCarton = Math.max(tallestCarton, line.cartonHeight);
  }

  const destinations = new Set(bin.entries.map((entry) => entry.line.destinationId));

  return {
    kind: 'MIXED',
    destinationId: destinations.size === 1 ? bin.entries[0].line.destinationId : '',
    lineEntries: [...entries.values()],
    totalCartons,
    totalUnits,
    totalWeight: roundQuantity(policy.palletBaseWeight + cartonWeight),
    totalHeight: roundQuantity(tallestCarton + policy.palletBaseHeight),
    utilizationPercent: Math.round(bin.volume * 100)
  };
}

/**
 * First-Fit-Decreasing over the fractional pallet volume of each remainder.
 * Entries are sorted by descending volume (ties keep input order) and each one
 * goes into the first open bin it fits, or a new bin.
 */
export function binPackRemainders(entries: readonly SplitEntry[]): Bin[] {
  const sorted = [...entries].sort((a, b) => b.volume - a.volume);
  const bins: Bin[] = [];
  for (const entry of sorted) {
    const target = bins.find((bin) => bin.volume + entry.volume <= 1 + VOLUME_EPSILON);
    if (target) {
      target.volume += entry.volume;
      target.entries.push(entry);
    } else {
      bins.push({ volume: entry.volume, entries: [entry] });
    }
  }
  return bins;
}

/**
 * Assigns cartons to pallets.
 *
 * Every line first yields as many single-SKU FULL pallets as it fills; the
 * remainders are then packed onto MIXED pallets by volume fraction
 * (cartons / cartons-per-pallet). Lines with no cartons, or with a count
 * above MAX_LINE_QUANTITY, are skipped. Pallet ids
 * run P001, P002, ... starting at `firstPalletNumber`.
 */
export function packPallets(items: readonly PalletInput[], options: PackOptions = {}): Pallet[] {
  const policy = options.policy ?? DEFAULT_PALLET_POLICY;
  const drafts: PalletDraft[] = [];
  const split: SplitEntry[] = [];

  for (const item of items) {
    const cartons = toQuantity(item.cartonQty);
    if (cartons <= 0) continue;
    const line = toPackLine(item, policy);

    const fullCount = Math.floor(cartons / line.capacity);
    for (let i = 0; i < fullCount; i += 1) {
      drafts.push(fullPallet(line, policy));
    }
    const remaining = cartons % line.capacity;
    if (remaining > 0) {
      split.push({ line, cartonQty: remaining, volume: remaining / line.capacity });
    }
  }

  for (const bin of binPackRemainders(split)) {
    drafts.push(mixedPallet(bin, policy));
  }

  const first = options.firstPalletNumber ?? 1;
  return drafts.map((draft, index) => ({ id: formatPalletId(first + index), ...draft }));
}

/** Packs each destination separately (ascending destination id) with one running pallet sequence. */
export function packPalletsByDestination(items: readonly PalletInput[], options: PackOptions = {}): Pallet[] {
  const groups = new Map<string, PalletInput[]>();
  for (const item of items) {
    const destinationId = item.destinationId?.trim() ?? '';
    const group = groups.get(destinationId) ?? [];
    group.push(item);
    groups.set(destinationId, group);
  }

  const pallets: Pallet[] = [];
  let next = options.firstPalletNumber ?? 1;
  for (const destinationId of [...groups.keys()].sort(compareIds)) {
    const packed = packPallets(groups.get(destinationId) ?? [], { ...options, firstPalletNumber: next });
    pallets.push(...packed);
    next += packed.length;
  }
  return pallets;
}

/**
 * Caps cartons per pallet by what the height and weight limits allow
 * (Ti-Hi: full layers that fit under the height limit times cartons per layer).
 */
export function capPalletCapacity(
  configured: unknown,
  cartonWeight: number,
  cartonHeight: number,
  policy: PalletPolicy = DEFAULT_PALLET_POLICY
): number {
  let capacity = resolvePalletCapacity(configured, policy.defaultCartonsPerPallet);
  if (cartonHeight > 0) {
    const layers = Math.floor((policy.maxPalletHeight - policy.palletBaseHeight) / cartonHeight);
    capacity = Math.min(capacity, layers * policy.cartonsPerLayer);
  }
  if (cartonWeight > 0) {
    capacity = Math.min(capacity, Math.floor((policy.maxPalletWeight - policy.palletBaseWeight) / cartonWeight));
  }
  return Math.max(1, capacity);
}

export type PalletSourceItem = Pick<
  ValidatedItem,
  'sku' | 'description' | 'destinationId' | 'quantityUnits' | 'effectivePackSize'
>;

/** Converts validated unit quantities into carton lines for the packer. */
export function buildPalletInputs(
  items: readonly PalletSourceItem[],
  products: ProductMaster,
  policy: PalletPolicy = DEFAULT_PALLET_POLICY
): PalletInput[] {
  const inputs: PalletInput[] = [];
  for (const item of items) {
    if (item.quantityUnits <= 0) continue;
    const product = products.get(item.sku);
    const packSize = Math.max(1, Math.floor(item.effectivePackSize));
    const cartonWeightLbs = product?.cartonWeight ?? DEFAULT_CARTON_WEIGHT;
    const cartonHeightIn = product?.cartonHeight ?? DEFAULT_CARTON_HEIGHT;
    inputs.push({
      sku: item.sku,
      cartonQty: Math.ceil(item.quantityUnits / packSize),
      packSize,
      description: product?.name || item.description,
      cartonWeightLbs,
      cartonHeightIn,
      maxCartonsPerPallet: capPalletCapacity(product?.maxCartonsPerPallet, cartonWeightLbs, cartonHeightIn, policy),
      destinationId: item.destinationId
    });
  }
  return inputs;
}

export type UnitOrderLine = Pick<POLineItem, 'sku' | 'description' | 'destinationId' | 'quantityUnits' | 'packSize'>;

export type UnitPlanOptions = PackOptions & {
  byDestination?: boolean;
};

/**
 * Pallet plan for a direct order that skips the PO review: units become cartons
 * through the line's pack size (else the product's, else 1) and are packed the
 * same way as reviewed lines.
 */
export function planPalletsFromUnits(
  lines: readonly UnitOrderLine[],
  products: ProductMaster,
  options: UnitPlanOptions = {}
): Pallet[] {
  const policy = options.policy ?? DEFAULT_PALLET_POLICY;
  const sources: PalletSourceItem[] = lines.map((line) => {
    const sku = line.sku.trim();
    return {
      sku,
      description: line.description,
      destinationId: line.destinationId.trim(),
      quantityUnits: line.quantityUnits,
      effectivePackSize: resolveEffectivePackSize(line, products.get(sku))
    };
  });
  const inputs = buildPalletInputs(sources, products, policy);
  const packOptions: PackOptions = { policy, firstPalletNumber: options.firstPalletNumber };
  return options.byDestination ? packPalletsByDestination(inputs, packOptions) : packPallets(inputs, packOptions);
}

export function findPalletLimitViolations(
  pallets: readonly Pallet[],
  policy: PalletPolicy = DEFAULT_PALLET_POLICY
): PalletLimitViolation[] {
  const violations: PalletLimitViolation[] = [];
  for (const pallet of pallets) {
    if (pallet.totalWeight > policy.maxPalletWeight) {
      violations.push({ palletId: pallet.id, limit: 'weight', actual: pallet.totalWeight, max: policy.maxPalletWeight });
    }
    if (pallet.totalHeight > policy.maxPalletHeight) {
      violations.push({ palletId: pallet.id, limit: 'height', actual: pallet.totalHeight, max: policy.maxPalletHeight });
    }
  }
  return violations;
}
