import { describe, expect, it } from 'vitest';
import { isPlotSafe, toSafeSeries } from '@/domain/analytics/plotSafety';

/**
 * 単体テスト: プロット安全ゲート
 */
describe('plotSafety', () => {
  describe('isPlotSafe()', () => {
    it('3 点以上・すべて有限・2 種類以上の値なら true', () => {
      expect(isPlotSafe([1, 2, 3])).toBe(true);
    });

    it('点数不足は false', () => {
      expect(isPlotSafe([1, 2])).toBe(false);
      expect(isPlotSafe([1, 2], 2)).toBe(true);
    });

    it('非有限値を含む系列は false', () => {
      expect(isPlotSafe([1, 2, Number.NaN])).toBe(false);
      expect(isPlotSafe([1, 2, Number.POSITIVE_INFINITY])).toBe(false);
    });

    it('定数系列は false', () => {
      expect(isPlotSafe([4, 4, 4, 4])).toBe(false);
    });
  });

  describe('toSafeSeries()', () => {
    it('timestamp を ISO-8601 にして返す', () => {
      const series = toSafeSeries([
        { timestamp: 0, value: 1 },
        { timestamp: 60_000, value: 2 },
        { timestamp: 120_000, value: 3 },
      ]);

      expect(series).toEqual([
        { timestamp: '1970-01-01T00:00:00.000Z', value: 1 },
        { timestamp: '1970-01-01T00:01:00.000Z', value: 2 },
        { timestamp: '1970-01-01T00:02:00.000Z', value: 3 },
      ]);
    });

    it('安全でない系列は空配列に置き換える', () => {
      expect(
        toSafeSeries([
          { timestamp: 0, value: 5 },
          { timestamp: 1, value: 5 },
          { timestamp: 2, value: 5 },
        ])
      ).toEqual([]);
      expect(toSafeSeries([])).toEqual([]);
    });
  });
});
