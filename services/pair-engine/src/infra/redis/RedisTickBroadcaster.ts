import Redis from 'ioredis';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { Tick } from '@/domain/models/Tick';
import type { TickBroadcaster } from '@/domain/repositories/TickBroadcaster';

export const TICK_STREAM = 'md:tick';
export const DEFAULT_STREAM_MAX_LEN = 10_000;

interface RedisTickBroadcasterOptions {
  stream?: string;
  /** 近似トリム（MAXLEN ~）の上限 */
  maxLen?: number;
  metricsCollector?: MetricsCollector;
}

/**
 * インフラ層: Redis Stream へのティック配信
 *
 * 責務: 正規化ティックを Redis Stream に XADD する（購読側は XREAD でファンアウトを受ける）。
 */
export class RedisTickBroadcaster implements TickBroadcaster {
  private readonly redis: Redis;
  private readonly stream: string;
  private readonly maxLen: number;
  private readonly metricsCollector?: MetricsCollector;

  /**
   * @param redis Redis 接続 URL、または接続済みのクライアント
   */
  constructor(redis: string | Redis, options?: RedisTickBroadcasterOptions) {
    this.redis = typeof redis === 'string' ? new Redis(redis) : redis;
    this.stream = options?.stream ?? TICK_STREAM;
    this.maxLen = options?.maxLen ?? DEFAULT_STREAM_MAX_LEN;
    this.metricsCollector = options?.metricsCollector;
  }

  /**
   * @throws Redis への書き込みに失敗した場合（呼び出し側でログ・計上する）
   */
  async publish(tick: Tick): Promise<void> {
    const payload = {
      symbol: tick.symbol,
      price: tick.price.toString(),
      quantity: tick.quantity.toString(),
      ts: tick.timestamp.toString(),
    };

    try {
      await this.redis.xadd(this.stream, 'MAXLEN', '~', this.maxLen, '*', ...Object.entries(payload).flat());
      this.metricsCollector?.incrementTicksBroadcast(tick.symbol);
    } catch (error) {
      this.metricsCollector?.incrementError('broadcast_error');
      throw error;
    }
  }

  /**
   * Redis 接続を閉じる。
   */
  async close(): Promise<void> {
    await this.redis.quit();
  }
}
