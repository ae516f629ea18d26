import type { Logger } from '@/application/interfaces/Logger';
import type { MarketDataAdapter } from '@/application/interfaces/MarketDataAdapter';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { IngestTickUsecase } from '@/application/usecases/IngestTickUsecase';
import { ChannelClosedError } from '@/domain/errors/PairEngineError';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import type { BackoffStrategy } from '@/infra/reconnect/BackoffStrategy';
import { ReconnectManager } from '@/infra/reconnect/ReconnectManager';
import type { WebSocketData } from '@/infra/websocket/interfaces/WebSocketConnection';

/** 処理待ちがこの件数に達したらソケットの受信を止める */
export const DEFAULT_BACKLOG_HIGH_WATER_MARK = 256;
/** 処理待ちの上限。超えた分は backlog_overflow として捨てる */
export const DEFAULT_MAX_BACKLOG = 1024;

interface TradeStreamHandlerOptions {
  logger?: Logger;
  metricsCollector?: MetricsCollector;
  backoff?: BackoffStrategy;
  highWaterMark?: number;
  maxBacklog?: number;
}

/**
 * プレゼンテーション層: 1 銘柄分の約定ストリームハンドラ
 *
 * 責務: WS接続の維持・メッセージ受信
 * - WebSocket 接続の維持（切断時は ReconnectManager で再接続）
 * - 受信メッセージを到着順に 1 件ずつ usecase に委譲
 * - 処理待ちが highWaterMark に達したら受信を止め、半分まで減ったら再開する
 */
export class TradeStreamHandler {
  readonly reconnectManager: ReconnectManager;
  private readonly logger: Logger;
  private readonly metricsCollector?: MetricsCollector;
  private readonly highWaterMark: number;
  private readonly maxBacklog: number;
  private chain: Promise<void> = Promise.resolve();
  private pending = 0;
  private paused = false;
  private stopped = false;

  constructor(
    readonly symbol: string,
    private readonly adapter: MarketDataAdapter,
    private readonly usecase: IngestTickUsecase,
    options?: TradeStreamHandlerOptions
  ) {
    this.logger = (options?.logger ?? LoggerFactory.create()).child({ component: 'TradeStreamHandler', symbol });
    this.metricsCollector = options?.metricsCollector;
    this.highWaterMark = options?.highWaterMark ?? DEFAULT_BACKLOG_HIGH_WATER_MARK;
    this.maxBacklog = Math.max(options?.maxBacklog ?? DEFAULT_MAX_BACKLOG, this.highWaterMark);
    this.reconnectManager = new ReconnectManager(
      () => this.connect(),
      this.logger,
      this.metricsCollector,
      options?.backoff,
      symbol
    );

    this.adapter.setOnMessage((data) => {
      this.enqueue(data);
    });
    // ws は error の後に必ず close を通知するので、再接続は close 側だけで行う
    this.adapter.setOnClose(() => {
      if (!this.stopped) {
        this.reconnectManager.scheduleReconnect();
      }
    });
    this.adapter.setOnError((error) => {
      this.logger.debug('stream error, waiting for close', { err: error });
    });
  }

  /**
   * WebSocket 接続を開始する。
   * ReconnectManager を通じて接続を試み、失敗時は自動的に再接続をスケジュールする。
   */
  async start(): Promise<void> {
    this.stopped = false;
    await this.reconnectManager.start();
  }

  /**
   * WebSocket 接続を切断し、再接続のスケジュールも停止する。
   * 以降に届いた（または処理待ちの）メッセージは捨てる。
   */
  stop(): void {
    this.stopped = true;
    this.reconnectManager.stop();
    this.adapter.disconnect();
  }

  /** 処理待ち（処理中を含む）のメッセージ数 */
  get backlog(): number {
    return this.pending;
  }

  /**
   * 処理中のメッセージがすべて終わった時点で解決される。
   */
  drain(): Promise<void> {
    return this.chain;
  }

  /**
   * メッセージを受信して処理する。
   * @param data WebSocket から受信した生データ
   */
  async handleMessage(data: WebSocketData): Promise<void> {
    if (this.stopped) {
      return;
    }
    const rawMessage = this.adapter.parseMessage(data);
    if (rawMessage === null) {
      this.metricsCollector?.incrementError('parse_error');
      return;
    }

    try {
      // ユースケースに処理を委譲（正規化→チャネル）
      await this.usecase.execute(rawMessage);
    } catch (error) {
      if (error instanceof ChannelClosedError) {
        this.logger.debug('tick dropped after shutdown');
        return;
      }
      this.logger.error('Failed to ingest message', { err: error });
    }
  }

  private async connect(): Promise<void> {
    await this.adapter.connect();
    // 接続中に stop() された場合は張った接続をすぐに閉じる
    if (this.stopped) {
      this.adapter.disconnect();
      return;
    }
    // 新しい接続は受信中の状態で始まる
    this.paused = false;
    this.applyBackpressure();
  }

  private enqueue(data: WebSocketData): void {
    if (this.stopped) {
      return;
    }
    if (this.pending >= this.maxBacklog) {
      this.metricsCollector?.incrementError('backlog_overflow');
      return;
    }
    this.pending++;
    this.applyBackpressure();
    this.chain = this.chain
      .then(() => this.handleMessage(data))
      .finally(() => {
        this.pending--;
        this.applyBackpressure();
      });
  }

  private applyBackpressure(): void {
    if (!this.paused && this.pending >= this.highWaterMark) {
      this.paused = true;
      this.logger.warn('backlog full, pausing stream', { backlog: this.pending });
      this.adapter.pause();
    } else if (this.paused && this.pending <= Math.floor(this.highWaterMark / 2)) {
      this.paused = false;
      this.logger.info('backlog drained, resuming stream', { backlog: this.pending });
      this.adapter.resume();
    }
  }
}
