import type { SeriesPoint, TimePoint } from '@/domain/models/PairAnalysis';

export const PLOT_SAFE_MIN_POINTS = 3;

/**
 * 可視化に渡してよい系列かどうか。
 * 点数不足・非有限値を含む・全点同一値（定数系列）の場合は false。
 */
export function isPlotSafe(values: readonly number[], minPoints = PLOT_SAFE_MIN_POINTS): boolean {
  if (values.length < minPoints) {
    return false;
  }
  if (values.some((value) => !Number.isFinite(value))) {
    return false;
  }
  return new Set(values).size > 1;
}

/**
 * 外部へ返す系列のゲート。安全でない系列は空配列に置き換える。
 */
export function toSafeSeries(points: readonly TimePoint[]): SeriesPoint[] {
  if (!isPlotSafe(points.map((point) => point.value))) {
    return [];
  }

  const series = points
    .filter((point) => Number.isFinite(point.value))
    .map((point) => ({ timestamp: new Date(point.timestamp).toISOString(), value: point.value }));

  return series.length < 2 ? [] : series;
}
