/**
 * Smallest valid quantization mask; fee amounts are rounded to a
 * multiple of the mask, so it must never be zero.
 */
export const MIN_QUANTIZATION_MASK = 1;

/**
 * Replace a zero mask with the minimum valid granularity
 */
export function normalizeQuantizationMask(mask: number): number {
  return mask === 0 ? MIN_QUANTIZATION_MASK : mask;
}
