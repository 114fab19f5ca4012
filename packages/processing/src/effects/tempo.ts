/**
 * Numeric helpers for filter arguments
 */

// atempo only supports 0.5-2.0 per instance
export const ATEMPO_MIN = 0.5;
export const ATEMPO_MAX = 2.0;

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Render a number with at most three decimals and no trailing zeros
 */
export function formatNumber(value: number): string {
  return String(Number(value.toFixed(3)));
}

/**
 * Split a tempo factor into a chain of factors that each stay within
 * [0.5, 2.0]. The last factor is rounded to three decimals.
 */
export function decomposeTempo(factor: number): number[] {
  if (!Number.isFinite(factor) || factor <= 0) {
    throw new RangeError(`Tempo factor must be a positive number, got ${factor}`);
  }

  const tempos: number[] = [];
  let remaining = factor;

  if (remaining < ATEMPO_MIN) {
    while (remaining < ATEMPO_MIN) {
      tempos.push(ATEMPO_MIN);
      remaining /= ATEMPO_MIN;
    }
  } else {
    while (remaining > ATEMPO_MAX) {
      tempos.push(ATEMPO_MAX);
      remaining /= ATEMPO_MAX;
    }
  }

  tempos.push(Math.round(remaining * 1000) / 1000);
  return tempos;
}
