/**
 * Coerces a value to a finite number, falling back when invalid.
 */
export const toFiniteNumber = (value: unknown, fallback = 0): number => {
  const parsed = typeof value === "number" ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

/**
 * Coerces a value to a non-negative integer id, or undefined when it is not one.
 */
export const toUnsignedId = (value: unknown): number | undefined => {
  if (typeof value === "string" && value.trim().length === 0) {
    return undefined;
  }
  const parsed = toFiniteNumber(value, Number.NaN);
  if (!Number.isInteger(parsed) || parsed < 0) {
    return undefined;
  }
  return parsed;
};
