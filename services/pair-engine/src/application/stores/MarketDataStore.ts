import type { OhlcvBar } from '@/domain/models/OhlcvBar';
import type { Timeframe } from '@/domain/models/Timeframe';
import { TickBuffer } from './TickBuffer';

/**
 * アプリケーション層: インメモリの市場データ
 *
 * 責務: ティックバッファと (銘柄, 時間足) ごとの OHLCV テーブルを所有する。
 * プロセス内で共有する状態はすべてここを経由する。
 */
export class MarketDataStore {
  readonly ticks: TickBuffer;
  private readonly tables = new Map<string, readonly OhlcvBar[]>();

  constructor(tickCapacity?: number) {
    this.ticks = new TickBuffer(tickCapacity);
  }

  /**
   * テーブルを丸ごと置き換える。
   */
  replaceBars(symbol: string, timeframe: Timeframe, bars: readonly OhlcvBar[]): void {
    this.tables.set(tableKey(symbol, timeframe), [...bars]);
  }

  /**
   * @param limit 指定時は新しい方から最大 limit 本（古い順）
   */
  getBars(symbol: string, timeframe: Timeframe, limit?: number): OhlcvBar[] {
    const bars = this.tables.get(tableKey(symbol, timeframe)) ?? [];
    if (limit === undefined || limit >= bars.length) {
      return [...bars];
    }
    return limit <= 0 ? [] : bars.slice(bars.length - limit);
  }

  symbols(): string[] {
    return this.ticks.symbols();
  }
}

function tableKey(symbol: string, timeframe: Timeframe): string {
  return `${symbol}:${timeframe}`;
}
