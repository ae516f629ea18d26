import { Counter, Registry } from 'prom-client';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';

/**
 * Prometheus メトリクスコレクター実装
 * テストで別レジストリを使用するため、シングルトンパターンの実装にはしていない。
 *
 * 責務: prom-client を使用してメトリクスを収集・保持
 */
export class PrometheusMetricsCollector implements MetricsCollector {
  private readonly register: Registry;
  private readonly ticksReceivedCounter: Counter;
  private readonly ticksBroadcastCounter: Counter;
  private readonly barsPersistedCounter: Counter;
  private readonly errorCounter: Counter;
  private readonly reconnectCounter: Counter;

  constructor() {
    this.register = new Registry();

    this.ticksReceivedCounter = new Counter({
      name: 'pair_engine_ticks_received_total',
      help: 'Total number of trade ticks normalized from the exchange stream',
      labelNames: ['symbol'],
      registers: [this.register],
    });

    this.ticksBroadcastCounter = new Counter({
      name: 'pair_engine_ticks_broadcast_total',
      help: 'Total number of ticks published to the broadcast stream',
      labelNames: ['symbol'],
      registers: [this.register],
    });

    this.barsPersistedCounter = new Counter({
      name: 'pair_engine_bars_persisted_total',
      help: 'Total number of OHLCV bars written to durable storage',
      labelNames: ['timeframe'],
      registers: [this.register],
    });

    this.errorCounter = new Counter({
      name: 'pair_engine_errors_total',
      help: 'Total number of errors',
      labelNames: ['error_type'],
      registers: [this.register],
    });

    this.reconnectCounter = new Counter({
      name: 'pair_engine_reconnects_total',
      help: 'Total number of scheduled reconnections',
      labelNames: ['symbol'],
      registers: [this.register],
    });
  }

  incrementTicksReceived(symbol: string): void {
    this.ticksReceivedCounter.inc({ symbol });
  }

  incrementTicksBroadcast(symbol: string): void {
    this.ticksBroadcastCounter.inc({ symbol });
  }

  incrementBarsPersisted(timeframe: string, count: number): void {
    if (count > 0) {
      this.barsPersistedCounter.inc({ timeframe }, count);
    }
  }

  incrementError(errorType: string): void {
    this.errorCounter.inc({ error_type: errorType });
  }

  incrementReconnect(symbol: string): void {
    this.reconnectCounter.inc({ symbol });
  }

  async getMetrics(): Promise<string> {
    return await this.register.metrics();
  }

  getRegistry(): Registry {
    // Registry は MetricsRegistry インターフェースを満たす（contentType プロパティを持つ）
    return this.register;
  }
}
