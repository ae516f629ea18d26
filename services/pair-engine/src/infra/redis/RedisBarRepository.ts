import Redis from 'ioredis';
import type { Logger } from '@/application/interfaces/Logger';
import type { OhlcvBar } from '@/domain/models/OhlcvBar';
import { isTimeframe, type Timeframe } from '@/domain/models/Timeframe';
import type { BarRepository } from '@/domain/repositories/BarRepository';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

/**
 * 永続化する 1 行分の JSON（timestamp は ISO-8601）
 */
interface StoredBarRow {
  symbol: string;
  timeframe: string;
  timestamp: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export function barKey(symbol: string, timeframe: Timeframe): string {
  return `ohlcv:${symbol}:${timeframe}`;
}

function toRow(bar: OhlcvBar): StoredBarRow {
  return {
    symbol: bar.symbol,
    timeframe: bar.timeframe,
    timestamp: new Date(bar.timestamp).toISOString(),
    open: bar.open,
    high: bar.high,
    low: bar.low,
    close: bar.close,
    volume: bar.volume,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStoredBarRow(value: unknown): value is StoredBarRow {
  return (
    isRecord(value) &&
    typeof value.symbol === 'string' &&
    typeof value.timeframe === 'string' &&
    typeof value.timestamp === 'string' &&
    typeof value.open === 'number' &&
    typeof value.high === 'number' &&
    typeof value.low === 'number' &&
    typeof value.close === 'number' &&
    typeof value.volume === 'number'
  );
}

/**
 * インフラ層: OHLCV 足の Redis 永続化
 *
 * 責務: (銘柄, 時間足) ごとの Hash に、バケット開始時刻（ISO-8601）をフィールドとして
 * JSON 行を HSET する。同じフィールドへの書き込みは上書き（upsert）になる。
 */
export class RedisBarRepository implements BarRepository {
  private readonly redis: Redis;
  private readonly logger: Logger;

  /**
   * @param redis Redis 接続 URL、または接続済みのクライアント
   * @param logger ロガー（オプショナル、未指定の場合は LoggerFactory から取得）
   */
  constructor(redis: string | Redis, logger?: Logger) {
    this.redis = typeof redis === 'string' ? new Redis(redis) : redis;
    this.logger = logger ?? LoggerFactory.create();
  }

  async upsertBars(bars: readonly OhlcvBar[]): Promise<void> {
    const grouped = new Map<string, Record<string, string>>();
    for (const bar of bars) {
      const key = barKey(bar.symbol, bar.timeframe);
      const row = toRow(bar);
      const fields = grouped.get(key) ?? {};
      fields[row.timestamp] = JSON.stringify(row);
      grouped.set(key, fields);
    }
    for (const [key, fields] of grouped) {
      await this.redis.hset(key, fields);
    }
  }

  async findBar(symbol: string, timeframe: Timeframe, timestamp: number): Promise<OhlcvBar | null> {
    const raw = await this.redis.hget(barKey(symbol, timeframe), new Date(timestamp).toISOString());
    return raw === null ? null : this.decode(raw);
  }

  async findBars(symbol: string, timeframe: Timeframe, limit: number): Promise<OhlcvBar[]> {
    if (limit <= 0) {
      return [];
    }
    const hash = await this.redis.hgetall(barKey(symbol, timeframe));
    const bars: OhlcvBar[] = [];
    for (const raw of Object.values(hash)) {
      const bar = this.decode(raw);
      if (bar) {
        bars.push(bar);
      }
    }
    bars.sort((a, b) => a.timestamp - b.timestamp);
    return bars.slice(-limit);
  }

  /**
   * Redis 接続を閉じる。
   */
  async close(): Promise<void> {
    await this.redis.quit();
  }

  private decode(raw: string): OhlcvBar | null {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      this.logger.warn('Corrupted bar row', { err: error });
      return null;
    }
    if (!isStoredBarRow(parsed) || !isTimeframe(parsed.timeframe)) {
      this.logger.warn('Unexpected bar row shape', { raw });
      return null;
    }
    const timestamp = Date.parse(parsed.timestamp);
    if (Number.isNaN(timestamp)) {
      this.logger.warn('Unexpected bar timestamp', { raw });
      return null;
    }
    return {
      symbol: parsed.symbol,
      timeframe: parsed.timeframe,
      timestamp,
      open: parsed.open,
      high: parsed.high,
      low: parsed.low,
      close: parsed.close,
      volume: parsed.volume,
    };
  }
}
