/**
 * Converts common numeric-like inputs into a number.
 *
 * PO extraction is noisy, so every numeric field goes through here:
 * - number => itself (NaN/Infinity => 0)
 * - string => thousands separators and a leading `$` stripped, then parseFloat (NaN => 0)
 * - null/undefined => 0
 * - other => Number(value) (NaN => 0)
 */
export function toNumber(value: unknown): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : 0;
  }
  if (typeof value === 'string') {
    const parsed = parseFloat(value.trim().replace(/^\$/, '').replace(/,/g, ''));
    return Number.isFinite(parsed) ? parsed : 0;
  }
  if (value === null || value === undefined) {
    return 0;
  }
  const num = Number(value);
  return Number.isFinite(num) ? num : 0;
}

/**
 * Returns the numeric value of `value`, or null when it does not look like a number at all.
 * Used where "absent" and "zero" lead to different defaults.
 */
export function parseOptionalNumber(value: unknown): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string') {
    const trimmed = value.trim().replace(/^\$/, '').replace(/,/g, '');
    if (trimmed === '') return null;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/** Truncates to an integer; values outside the safe-integer range count as malformed (0). */
export function toInt(value: unknown): number {
  const truncated = Math.trunc(toNumber(value));
  return Number.isSafeInteger(truncated) ? truncated : 0;
}

export function toNonNegativeInt(value: unknown): number {
  return Math.max(0, toInt(value));
}

/** Largest unit or carton count accepted on one line. */
export const MAX_LINE_QUANTITY = 1_000_000;

/** Unit and carton counts: non-negative integers up to MAX_LINE_QUANTITY, anything else is 0. */
export function toQuantity(value: unknown): number {
  const quantity = toNonNegativeInt(value);
  return quantity <= MAX_LINE_QUANTITY ? quantity : 0;
}

/** Pack sizes and pallet capacities: anything below 1 becomes `fallback`. */
export function toPositiveInt(value: unknown, fallback: number): number {
  const parsed = Math.floor(toNumber(value));
  return parsed >= 1 ? parsed : fallback;
}

/** Rounds to cents. */
export function roundCurrency(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

/**
 * Rounds to 6 decimal places (volume precision for reporting).
 */
export function roundQuantity(value: number): number {
  return parseFloat(value.toFixed(6));
}
