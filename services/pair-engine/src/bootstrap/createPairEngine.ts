import Redis from 'ioredis';
import { TickChannel } from '@/application/channel/TickChannel';
import { TickDispatcher } from '@/application/handlers/TickDispatcher';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { TickSource } from '@/application/interfaces/TickSource';
import { MarketQueryService } from '@/application/services/MarketQueryService';
import { PairAnalyzer } from '@/application/services/PairAnalyzer';
import { ResampleScheduler } from '@/application/services/ResampleScheduler';
import { Resampler } from '@/application/services/Resampler';
import { MarketDataStore } from '@/application/stores/MarketDataStore';
import type { AppConfig } from '@/config/AppConfig';
import type { BarRepository } from '@/domain/repositories/BarRepository';
import type { TickBroadcaster } from '@/domain/repositories/TickBroadcaster';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { MetricsServer } from '@/infra/metrics/MetricsServer';
import { PrometheusMetricsCollector } from '@/infra/metrics/PrometheusMetricsCollector';
import { RedisBarRepository } from '@/infra/redis/RedisBarRepository';
import { RedisTickBroadcaster } from '@/infra/redis/RedisTickBroadcaster';
import { TickSourceConnector } from '@/presentation/websocket/TickSourceConnector';

/**
 * 差し替え可能な依存（未指定のものは設定から生成する）
 */
export interface PairEngineDependencies {
  logger?: Logger;
  metricsCollector?: MetricsCollector;
  tickSource?: TickSource;
  barRepository?: BarRepository;
  broadcaster?: TickBroadcaster;
}

export interface PairEngine {
  readonly store: MarketDataStore;
  readonly query: MarketQueryService;
  readonly scheduler: ResampleScheduler;
  /**
   * メトリクスサーバー・配送ループ・リサンプリング・取引所ストリームを起動する。
   */
  start(): Promise<void>;
  /**
   * コネクタ → スケジューラ → チャネル → Redis の順に止める。二重に呼んでも 1 回だけ実行される。
   */
  stop(): Promise<void>;
}

/**
 * コンポーネントの生成と配線だけを行う。
 */
export function createPairEngine(config: AppConfig, deps: PairEngineDependencies = {}): PairEngine {
  const logger = deps.logger ?? LoggerFactory.create();
  const metricsCollector = deps.metricsCollector ?? new PrometheusMetricsCollector();

  // Redis クライアントは注入されなかった依存のためだけに 1 本作り、共有する
  const redis = deps.barRepository && deps.broadcaster ? null : new Redis(config.redisUrl);
  const barRepository = deps.barRepository ?? new RedisBarRepository(redis ?? config.redisUrl, logger);
  const broadcaster =
    deps.broadcaster ?? new RedisTickBroadcaster(redis ?? config.redisUrl, { metricsCollector });

  const store = new MarketDataStore(config.bufferCapacity);
  const channel = new TickChannel(config.channelCapacity);
  const dispatcher = new TickDispatcher(
    channel,
    [
      { name: 'buffer', consume: (tick) => store.ticks.add(tick) },
      { name: 'broadcaster', consume: (tick) => broadcaster.publish(tick) },
    ],
    logger,
    metricsCollector
  );
  const resampler = new Resampler(store, barRepository, {
    persistTail: config.persistTail,
    logger,
    metricsCollector,
  });
  const scheduler = new ResampleScheduler(resampler, store, {
    intervalMs: config.resampleIntervalMs,
    logger,
    metricsCollector,
  });
  const query = new MarketQueryService(store, new PairAnalyzer(logger.child({ component: 'PairAnalyzer' })), barRepository, {
    defaultWindow: config.defaultWindow,
    logger,
  });
  const tickSource =
    deps.tickSource ??
    new TickSourceConnector({
      wsBaseUrl: config.wsBaseUrl,
      reconnectDelayMs: config.reconnectDelayMs,
      logger,
      metricsCollector,
    });
  const metricsServer =
    config.metricsPort === null ? null : new MetricsServer(metricsCollector, config.metricsPort, logger);

  let dispatching: Promise<void> | null = null;
  let stopping: Promise<void> | null = null;

  const shutdown = async (): Promise<void> => {
    logger.info('Shutting down pair engine');
    await tickSource.stop();
    await scheduler.stop();
    channel.close();
    if (dispatching) {
      await dispatching;
    }
    if (metricsServer) {
      await metricsServer.stop();
    }
    if (redis) {
      await redis.quit();
    }
    logger.info('Pair engine stopped');
  };

  return {
    store,
    query,
    scheduler,
    async start() {
      if (metricsServer) {
        await metricsServer.start();
      }
      dispatching = dispatcher.run();
      scheduler.start();
      await tickSource.run(config.symbols, (tick) => channel.send(tick));
      logger.info('Pair engine started', { symbols: config.symbols });
    },
    stop() {
      stopping ??= shutdown();
      return stopping;
    },
  };
}
