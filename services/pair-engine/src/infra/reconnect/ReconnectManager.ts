import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { type BackoffStrategy, FixedBackoffStrategy } from '@/infra/reconnect/BackoffStrategy';

/**
 * インフラ層: 再接続スケジューラ（connect 関数を受け取って再試行）
 *
 * 責務: 再接続のスケジュール管理。接続関数を受け取り、失敗時に自動的に再接続を試みる。
 * stop() されるまで無期限に再試行する。
 */
export class ReconnectManager {
  private reconnectTimer: NodeJS.Timeout | null = null;
  private stopped = false;
  private readonly logger: Logger;

  /**
   * @param connectFn 再接続時に実行する接続関数
   * @param logger ロガー（オプショナル、未指定の場合は LoggerFactory から取得）
   * @param metricsCollector メトリクスコレクター（オプショナル）
   * @param backoff 待ち時間の戦略（デフォルトは 2 秒固定）
   * @param symbol メトリクスのラベルに使う銘柄
   */
  constructor(
    private readonly connectFn: () => Promise<void>,
    logger?: Logger,
    private readonly metricsCollector?: MetricsCollector,
    private readonly backoff: BackoffStrategy = new FixedBackoffStrategy(),
    private readonly symbol: string = 'unknown'
  ) {
    this.logger = logger ?? LoggerFactory.create();
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  /**
   * 再接続管理を開始する。初回の接続試行が終わった時点で解決される（失敗しても reject しない）。
   */
  async start(): Promise<void> {
    this.stopped = false;
    await this.safeConnect();
  }

  /**
   * 再接続をスケジュールする。
   * 既に停止されている場合は何もしない。
   */
  scheduleReconnect(): void {
    if (this.stopped) {
      return;
    }
    const delay = this.backoff.getNextDelay();
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
    }
    this.logger.info('Reconnect scheduled', { symbol: this.symbol, delayMs: delay });
    this.metricsCollector?.incrementReconnect(this.symbol);
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      void this.safeConnect();
    }, delay);
  }

  /**
   * 再接続管理を停止する。
   */
  stop(): void {
    this.stopped = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  /**
   * 安全に接続を試みる。
   * 成功時はバックオフをリセットし、失敗時は再接続をスケジュールする。
   */
  private async safeConnect(): Promise<void> {
    if (this.stopped) {
      return;
    }
    try {
      await this.connectFn();
      this.backoff.reset();
    } catch (error) {
      this.logger.error('Reconnect attempt failed', { err: error });
      this.scheduleReconnect();
    }
  }
}
