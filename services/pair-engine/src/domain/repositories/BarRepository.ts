import type { OhlcvBar } from '@/domain/models/OhlcvBar';
import type { Timeframe } from '@/domain/models/Timeframe';

/**
 * OHLCV 足の永続化先（インフラ層で実装される）。
 * (symbol, timeframe, timestamp) をキーとした upsert セマンティクスを持つ。
 */
export interface BarRepository {
  /**
   * 足を書き込む。同じキーの足は上書きされる（重複しない）。
   */
  upsertBars(bars: readonly OhlcvBar[]): Promise<void>;

  findBar(symbol: string, timeframe: Timeframe, timestamp: number): Promise<OhlcvBar | null>;

  /**
   * 永続化済みの足を古い順に最大 limit 件返す。
   */
  findBars(symbol: string, timeframe: Timeframe, limit: number): Promise<OhlcvBar[]>;
}
