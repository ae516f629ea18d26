import type { Logger } from '@/application/interfaces/Logger';
import type { MarketDataAdapter } from '@/application/interfaces/MarketDataAdapter';
import type { MessageParser } from '@/application/interfaces/MessageParser';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { TickSource } from '@/application/interfaces/TickSource';
import { IngestTickUsecase } from '@/application/usecases/IngestTickUsecase';
import type { TickSink } from '@/domain/models/Tick';
import { BinanceMessageParser } from '@/infra/adapters/binance/BinanceMessageParser';
import { BinanceTradeAdapter, DEFAULT_BINANCE_WS_BASE_URL } from '@/infra/adapters/binance/BinanceTradeAdapter';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { DEFAULT_RECONNECT_DELAY_MS, FixedBackoffStrategy } from '@/infra/reconnect/BackoffStrategy';
import { TradeStreamHandler } from './TradeStreamHandler';

export interface TickSourceConnectorOptions {
  wsBaseUrl?: string;
  reconnectDelayMs?: number;
  parser?: MessageParser;
  logger?: Logger;
  metricsCollector?: MetricsCollector;
  /** 銘柄ごとのアダプタを生成する（テストで差し替える） */
  adapterFactory?: (symbol: string) => MarketDataAdapter;
}

/**
 * プレゼンテーション層: 取引所コネクタ
 *
 * 責務: 銘柄ごとに TradeStreamHandler を生成し、まとめて起動・停止する。
 * 銘柄内の順序は保たれ、銘柄間の順序は保証しない。
 */
export class TickSourceConnector implements TickSource {
  private readonly handlers = new Map<string, TradeStreamHandler>();
  private readonly logger: Logger;
  private readonly parser: MessageParser;
  private readonly adapterFactory: (symbol: string) => MarketDataAdapter;

  constructor(private readonly options: TickSourceConnectorOptions = {}) {
    this.logger = (options.logger ?? LoggerFactory.create()).child({ component: 'TickSourceConnector' });
    this.parser = options.parser ?? new BinanceMessageParser();
    this.adapterFactory =
      options.adapterFactory ??
      ((symbol) =>
        new BinanceTradeAdapter(symbol, options.wsBaseUrl ?? DEFAULT_BINANCE_WS_BASE_URL, {
          logger: this.logger,
        }));
  }

  symbols(): string[] {
    return [...this.handlers.keys()];
  }

  async run(symbols: Iterable<string>, sink: TickSink): Promise<void> {
    const started: TradeStreamHandler[] = [];
    for (const symbol of symbols) {
      if (this.handlers.has(symbol)) {
        this.logger.warn('Stream already running', { symbol });
        continue;
      }
      const usecase = new IngestTickUsecase(this.parser, sink, this.logger, this.options.metricsCollector);
      const handler = new TradeStreamHandler(symbol, this.adapterFactory(symbol), usecase, {
        logger: this.logger,
        metricsCollector: this.options.metricsCollector,
        backoff: new FixedBackoffStrategy(this.options.reconnectDelayMs ?? DEFAULT_RECONNECT_DELAY_MS),
      });
      this.handlers.set(symbol, handler);
      started.push(handler);
    }

    this.logger.info('Starting trade streams', { symbols: started.map((handler) => handler.symbol) });
    // すべてのハンドラを並列で起動し、WebSocket 接続を張る。
    await Promise.all(started.map((handler) => handler.start()));
  }

  async stop(): Promise<void> {
    const handlers = [...this.handlers.values()];
    this.handlers.clear();
    for (const handler of handlers) {
      handler.stop();
    }
    await Promise.all(handlers.map((handler) => handler.drain()));
    this.logger.info('Trade streams stopped', { count: handlers.length });
  }
}
