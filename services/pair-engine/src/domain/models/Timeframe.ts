import { InvalidTimeframeError } from '@/domain/errors/PairEngineError';

/**
 * リサンプリング対象の時間足と、そのバケット幅（秒）。
 */
export const TIMEFRAME_SECONDS = {
  '1s': 1,
  '1m': 60,
  '5m': 300,
} as const;

export type Timeframe = keyof typeof TIMEFRAME_SECONDS;

export const TIMEFRAMES: readonly Timeframe[] = ['1s', '1m', '5m'];

export function isTimeframe(value: string): value is Timeframe {
  return Object.hasOwn(TIMEFRAME_SECONDS, value);
}

/**
 * 外部から受け取った文字列を Timeframe に変換する。
 * @throws {InvalidTimeframeError} 未知の時間足の場合
 */
export function parseTimeframe(value: string): Timeframe {
  if (!isTimeframe(value)) {
    throw new InvalidTimeframeError(value);
  }
  return value;
}
