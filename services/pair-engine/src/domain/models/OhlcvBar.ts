import type { Timeframe } from './Timeframe';

/**
 * 固定幅バケットの OHLCV 足。
 * timestamp はバケット開始時刻（エポックミリ秒）。同一 (symbol, timeframe) 内で一意かつ昇順。
 */
export interface OhlcvBar {
  readonly symbol: string;
  readonly timeframe: Timeframe;
  readonly timestamp: number;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
}
