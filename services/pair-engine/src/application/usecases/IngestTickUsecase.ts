import type { Logger } from '@/application/interfaces/Logger';
import type { MessageParser } from '@/application/interfaces/MessageParser';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { TickSink } from '@/domain/models/Tick';

/**
 * アプリケーション層: ティック取り込みユースケース
 *
 * 責務: 受信メッセージを正規化し、sink（チャネル）へ渡す司令塔
 */
export class IngestTickUsecase {
  constructor(
    private readonly parser: MessageParser,
    private readonly sink: TickSink,
    private readonly logger?: Logger,
    private readonly metricsCollector?: MetricsCollector
  ) {}

  /**
   * @returns ティックとして取り込んだ場合は true
   */
  async execute(rawMessage: unknown): Promise<boolean> {
    // 1. 正規化（インフラ層のパーサーを使用）
    const tick = this.parser.parse(rawMessage);
    // 2. 約定以外・不正な形式は捨てる
    if (!tick) {
      this.logger?.debug('Skipped non-trade message');
      this.metricsCollector?.incrementError('parse_error');
      return false;
    }

    this.metricsCollector?.incrementTicksReceived(tick.symbol);

    // 3. 配信（満杯のときは空くまで待つ）
    await this.sink(tick);
    return true;
  }
}
