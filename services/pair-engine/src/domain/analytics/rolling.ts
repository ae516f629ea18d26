import type { TimePoint } from '@/domain/models/PairAnalysis';
import type { AlignedSeries } from './alignment';
import { mean, pearson, sampleStd } from './statistics';

/**
 * 末尾 window 点のローリング z-score。
 * ウィンドウが定数（標準偏差 0）の位置はゼロ除算を避けるため捨てる（0 や ±Infinity にはしない）。
 */
export function rollingZScore(points: readonly TimePoint[], window: number): TimePoint[] {
  if (points.length < window) {
    return [];
  }
  const values = points.map((point) => point.value);
  const result: TimePoint[] = [];

  for (let end = window; end <= values.length; end++) {
    const slice = values.slice(end - window, end);
    const std = sampleStd(slice);
    if (std === 0 || !Number.isFinite(std)) {
      continue;
    }
    const z = (values[end - 1] - mean(slice)) / std;
    if (Number.isFinite(z)) {
      result.push({ timestamp: points[end - 1].timestamp, value: z });
    }
  }

  return result;
}

/**
 * 揃えた価格ペアのローリング相関。未定義の位置は捨てる。
 */
export function rollingCorrelation(aligned: AlignedSeries, window: number): TimePoint[] {
  const n = aligned.timestamps.length;
  if (n < window) {
    return [];
  }
  const result: TimePoint[] = [];

  for (let end = window; end <= n; end++) {
    const corr = pearson(aligned.left.slice(end - window, end), aligned.right.slice(end - window, end));
    if (Number.isFinite(corr)) {
      result.push({ timestamp: aligned.timestamps[end - 1], value: corr });
    }
  }

  return result;
}
