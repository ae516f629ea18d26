import type { TimePoint } from '@/domain/models/PairAnalysis';

/**
 * 2系列を共通の timestamp に揃えたもの。
 * timestamps は狭義単調増加、left / right は timestamps と同じ長さ。
 */
export interface AlignedSeries {
  readonly timestamps: readonly number[];
  readonly left: readonly number[];
  readonly right: readonly number[];
}

function toFiniteMap(points: readonly TimePoint[]): Map<number, number> {
  const map = new Map<number, number>();
  for (const point of points) {
    if (Number.isFinite(point.timestamp) && Number.isFinite(point.value)) {
      // 同一 timestamp が重複した場合は後勝ち
      map.set(point.timestamp, point.value);
    }
  }
  return map;
}

/**
 * 両系列に有限値が存在する timestamp だけを残して揃える。
 */
export function alignSeries(left: readonly TimePoint[], right: readonly TimePoint[]): AlignedSeries {
  const leftMap = toFiniteMap(left);
  const rightMap = toFiniteMap(right);

  const timestamps = [...leftMap.keys()].filter((ts) => rightMap.has(ts)).sort((a, b) => a - b);

  const leftValues: number[] = [];
  const rightValues: number[] = [];
  for (const ts of timestamps) {
    leftValues.push(leftMap.get(ts) ?? Number.NaN);
    rightValues.push(rightMap.get(ts) ?? Number.NaN);
  }

  return { timestamps, left: leftValues, right: rightValues };
}
