import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { MarketDataStore } from '@/application/stores/MarketDataStore';
import type { OhlcvBar } from '@/domain/models/OhlcvBar';
import type { Tick } from '@/domain/models/Tick';
import { TIMEFRAME_SECONDS, type Timeframe } from '@/domain/models/Timeframe';
import type { BarRepository } from '@/domain/repositories/BarRepository';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

export const DEFAULT_PERSIST_TAIL = 100;
const MIN_TICKS_FOR_RESAMPLE = 2;

/**
 * ティック列を bucketSeconds 幅のバケットに分けて OHLCV 足にする。
 * 空のバケットは埋めない。入力は変更しない。
 */
export function aggregateBars(
  ticks: readonly Tick[],
  symbol: string,
  timeframe: Timeframe,
  bucketSeconds: number = TIMEFRAME_SECONDS[timeframe]
): OhlcvBar[] {
  const bucketMs = bucketSeconds * 1000;
  // Array.prototype.sort は安定ソート（同時刻のティックは到着順のまま）
  const sorted = [...ticks].sort((a, b) => a.timestamp - b.timestamp);
  const bars: OhlcvBar[] = [];

  let current: {
    timestamp: number;
    open: number;
    high: number;
    low: number;
    close: number;
    volume: number;
  } | null = null;

  for (const tick of sorted) {
    const bucket = Math.floor(tick.timestamp / bucketMs) * bucketMs;
    if (current && current.timestamp === bucket) {
      current.high = Math.max(current.high, tick.price);
      current.low = Math.min(current.low, tick.price);
      current.close = tick.price;
      current.volume += tick.quantity;
      continue;
    }
    if (current) {
      bars.push({ symbol, timeframe, ...current });
    }
    current = {
      timestamp: bucket,
      open: tick.price,
      high: tick.price,
      low: tick.price,
      close: tick.price,
      volume: tick.quantity,
    };
  }
  if (current) {
    bars.push({ symbol, timeframe, ...current });
  }
  return bars;
}

interface ResamplerOptions {
  /** 永続化する直近の足の本数 */
  persistTail?: number;
  logger?: Logger;
  metricsCollector?: MetricsCollector;
}

/**
 * アプリケーション層: ティックバッファ → OHLCV テーブルの再計算
 *
 * 責務: バッファのスナップショットから足を作り直してテーブルを置き換え、直近の足を永続化する。
 * 永続化は待たずに投げっぱなしにし、失敗は戻り値とテーブルに影響しない。
 * 書き込み中のものは flush() で待てる。
 */
export class Resampler {
  private readonly logger: Logger;
  private readonly persistTail: number;
  private readonly metricsCollector?: MetricsCollector;
  private readonly pendingWrites = new Set<Promise<void>>();

  constructor(
    private readonly store: MarketDataStore,
    private readonly repository: BarRepository,
    options?: ResamplerOptions
  ) {
    this.logger = (options?.logger ?? LoggerFactory.create()).child({ component: 'Resampler' });
    this.persistTail = options?.persistTail ?? DEFAULT_PERSIST_TAIL;
    this.metricsCollector = options?.metricsCollector;
  }

  /**
   * @returns 作り直した足。ティックが 2 件未満なら null（テーブルは変更しない）
   */
  async resample(
    symbol: string,
    timeframe: Timeframe,
    bucketSeconds: number = TIMEFRAME_SECONDS[timeframe]
  ): Promise<OhlcvBar[] | null> {
    const ticks = this.store.ticks.recent(symbol);
    if (ticks.length < MIN_TICKS_FOR_RESAMPLE) {
      this.logger.warn('Not enough ticks to resample', { symbol, timeframe, ticks: ticks.length });
      return null;
    }

    const bars = aggregateBars(ticks, symbol, timeframe, bucketSeconds);
    this.store.replaceBars(symbol, timeframe, bars);
    this.track(this.persist(symbol, timeframe, bars));
    return bars;
  }

  /** 書き込み中の永続化の数 */
  get pendingWriteCount(): number {
    return this.pendingWrites.size;
  }

  /**
   * 書き込み中の永続化がすべて終わるまで待つ（失敗は persist 内で記録済み）。
   */
  async flush(): Promise<void> {
    await Promise.all([...this.pendingWrites]);
  }

  private track(write: Promise<void>): void {
    this.pendingWrites.add(write);
    void write.finally(() => {
      this.pendingWrites.delete(write);
    });
  }

  private async persist(symbol: string, timeframe: Timeframe, bars: readonly OhlcvBar[]): Promise<void> {
    if (this.persistTail <= 0) {
      return;
    }
    const tail = bars.slice(-this.persistTail);
    try {
      await this.repository.upsertBars(tail);
      this.metricsCollector?.incrementBarsPersisted(timeframe, tail.length);
    } catch (error) {
      this.logger.error('Failed to persist bars', { err: error, symbol, timeframe, bars: tail.length });
      this.metricsCollector?.incrementError('persist_error');
    }
  }
}
