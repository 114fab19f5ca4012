import { describe, expect, it } from 'vitest';
import { ATEMPO_MAX, ATEMPO_MIN, decomposeTempo, formatNumber } from '../effects/tempo.js';

describe('decomposeTempo', () => {
  it.each([0.125, 0.2, 0.3, 0.5, 0.75, 1, 1.5, 2, 2.5, 3, 3.7, 4])(
    'keeps every step in range and preserves %s',
    (factor) => {
      const tempos = decomposeTempo(factor);

      for (const tempo of tempos) {
        expect(tempo).toBeGreaterThanOrEqual(ATEMPO_MIN);
        expect(tempo).toBeLessThanOrEqual(ATEMPO_MAX);
      }
      const product = tempos.reduce((acc, tempo) => acc * tempo, 1);
      expect(product).toBeCloseTo(factor, 2);
    }
  );

  it('chains halvings for slow factors', () => {
    expect(decomposeTempo(0.125)).toEqual([0.5, 0.5, 0.5]);
    expect(decomposeTempo(0.3)).toEqual([0.5, 0.6]);
  });

  it('chains doublings for fast factors', () => {
    expect(decomposeTempo(3)).toEqual([2, 1.5]);
    expect(decomposeTempo(4)).toEqual([2, 2]);
  });

  it('leaves in-range factors alone', () => {
    expect(decomposeTempo(1.25)).toEqual([1.25]);
  });

  it('rejects non-positive factors', () => {
    expect(() => decomposeTempo(0)).toThrow(RangeError);
  });
});

describe('formatNumber', () => {
  it('drops trailing zeros and rounds to three decimals', () => {
    expect(formatNumber(2)).toBe('2');
    expect(formatNumber(1 / 3)).toBe('0.333');
    expect(formatNumber(0.4 * 0.6)).toBe('0.24');
    expect(formatNumber(1.05)).toBe('1.05');
  });
});
