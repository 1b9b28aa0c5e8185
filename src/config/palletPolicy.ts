export type PalletPolicy = {
  maxPalletHeight: number;
  maxPalletWeight: number;
  palletBaseWeight: number;
  palletBaseHeight: number;
  defaultCartonsPerPallet: number;
  cartonsPerLayer: number;
};

export const DEFAULT_PALLET_POLICY: PalletPolicy = Object.freeze({
  maxPalletHeight: 68,
  maxPalletWeight: 2500,
  palletBaseWeight: 40,
  palletBaseHeight: 6,
  defaultCartonsPerPallet: 20,
  cartonsPerLayer: 10
});

function parsePositive(value: string | number | undefined, fallback: number): number {
  if (value === undefined || value === null || value === '') return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function parseNonNegative(value: string | number | undefined, fallback: number): number {
  if (value === undefined || value === null || value === '') return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

/**
 * Clamps a partially specified policy onto the defaults. Non-positive limits and
 * capacities fall back silently; processing is never blocked by bad settings.
 */
export function normalizePalletPolicy(input: Partial<Record<keyof PalletPolicy, string | number>> = {}): PalletPolicy {
  return {
    maxPalletHeight: parsePositive(input.maxPalletHeight, DEFAULT_PALLET_POLICY.maxPalletHeight),
    maxPalletWeight: parsePositive(input.maxPalletWeight, DEFAULT_PALLET_POLICY.maxPalletWeight),
    palletBaseWeight: parseNonNegative(input.palletBaseWeight, DEFAULT_PALLET_POLICY.palletBaseWeight),
    palletBaseHeight: parseNonNegative(input.palletBaseHeight, DEFAULT_PALLET_POLICY.palletBaseHeight),
    defaultCartonsPerPallet: Math.floor(
      parsePositive(input.defaultCartonsPerPallet, DEFAULT_PALLET_POLICY.defaultCartonsPerPallet)
    ) || DEFAULT_PALLET_POLICY.defaultCartonsPerPallet,
    cartonsPerLayer: Math.floor(parsePositive(input.cartonsPerLayer, DEFAULT_PALLET_POLICY.cartonsPerLayer))
      || DEFAULT_PALLET_POLICY.cartonsPerLayer
  };
}

export function getPalletPolicy(env: NodeJS.ProcessEnv = process.env): PalletPolicy {
  return normalizePalletPolicy({
    maxPalletHeight: env.PALLET_MAX_HEIGHT,
    maxPalletWeight: env.PALLET_MAX_WEIGHT,
    palletBaseWeight: env.PALLET_BASE_WEIGHT,
    palletBaseHeight: env.PALLET_BASE_HEIGHT,
    defaultCartonsPerPallet: env.PALLET_DEFAULT_CARTONS,
    cartonsPerLayer: env.PALLET_CARTONS_PER_LAYER
  });
}
