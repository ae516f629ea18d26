import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { TickConsumer } from '@/application/interfaces/TickConsumer';
import type { TickChannel } from '@/application/channel/TickChannel';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

/**
 * アプリケーション層: チャネルからティックを取り出し、登録順に各コンシューマへ渡す
 *
 * コンシューマの失敗はログとメトリクスに残し、他のコンシューマ・後続のティックは止めない。
 */
export class TickDispatcher {
  private readonly logger: Logger;
  private loop: Promise<void> | null = null;
  private dispatched = 0;

  /**
   * @param channel 取り出し元のチャネル
   * @param consumers 配送先（配列の順に呼ばれる）
   * @param logger ロガー（オプショナル、未指定の場合は LoggerFactory から取得）
   * @param metricsCollector メトリクスコレクター（オプショナル）
   */
  constructor(
    private readonly channel: TickChannel,
    private readonly consumers: readonly TickConsumer[],
    logger?: Logger,
    private readonly metricsCollector?: MetricsCollector
  ) {
    this.logger = (logger ?? LoggerFactory.create()).child({ component: 'TickDispatcher' });
  }

  get dispatchedCount(): number {
    return this.dispatched;
  }

  /**
   * 取り出しループを開始する。チャネルがクローズされ、空になった時点で解決される。
   * 二重に呼んだ場合は同じループの Promise を返す。
   */
  run(): Promise<void> {
    this.loop ??= this.drain();
    return this.loop;
  }

  private async drain(): Promise<void> {
    for (;;) {
      const tick = await this.channel.receive();
      if (tick === null) {
        this.logger.info('Tick channel drained', { dispatched: this.dispatched });
        return;
      }
      for (const consumer of this.consumers) {
        try {
          await consumer.consume(tick);
        } catch (error) {
          this.logger.error('Tick consumer failed', {
            err: error,
            consumer: consumer.name,
            symbol: tick.symbol,
          });
          this.metricsCollector?.incrementError('consumer_error');
        }
      }
      this.dispatched += 1;
    }
  }
}
