/**
 * Parses a positive number from an environment value, falling back when the
 * value is missing or not a positive finite number.
 */
export const toInt = (value: string | undefined, fallback: number): number => {
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};
