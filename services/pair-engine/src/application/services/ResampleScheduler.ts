import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { MarketDataStore } from '@/application/stores/MarketDataStore';
import { TIMEFRAMES, type Timeframe } from '@/domain/models/Timeframe';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import type { Resampler } from './Resampler';

export const DEFAULT_RESAMPLE_INTERVAL_MS = 1000;

interface ResampleSchedulerOptions {
  intervalMs?: number;
  timeframes?: readonly Timeframe[];
  logger?: Logger;
  metricsCollector?: MetricsCollector;
}

/**
 * アプリケーション層: 定期リサンプリング
 *
 * intervalMs ごとに、ティックを受け取った全銘柄 × 全時間足で resample を実行する。
 * 前回のパスが終わってから次のタイマーを張るため、パスが重なることはない。
 * 永続化はパスの完了を待たせない（Resampler が投げっぱなしで扱う）。
 */
export class ResampleScheduler {
  private readonly logger: Logger;
  private readonly intervalMs: number;
  private readonly timeframes: readonly Timeframe[];
  private readonly metricsCollector?: MetricsCollector;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private running = false;

  constructor(
    private readonly resampler: Resampler,
    private readonly store: MarketDataStore,
    options?: ResampleSchedulerOptions
  ) {
    this.logger = (options?.logger ?? LoggerFactory.create()).child({ component: 'ResampleScheduler' });
    this.intervalMs = options?.intervalMs ?? DEFAULT_RESAMPLE_INTERVAL_MS;
    this.timeframes = options?.timeframes ?? TIMEFRAMES;
    this.metricsCollector = options?.metricsCollector;
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.logger.info('Resample scheduler started', { intervalMs: this.intervalMs });
    this.scheduleNext();
  }

  /**
   * タイマーを止め、実行中のパスと書き込み中の永続化が終わるまで待つ。
   */
  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
    await this.resampler.flush();
  }

  /**
   * 1 パス分のリサンプリング。個々の失敗はログに残して次へ進む。
   */
  async runOnce(): Promise<void> {
    for (const symbol of this.store.symbols()) {
      for (const timeframe of this.timeframes) {
        try {
          await this.resampler.resample(symbol, timeframe);
        } catch (error) {
          this.logger.error('Resample failed', { err: error, symbol, timeframe });
          this.metricsCollector?.incrementError('resample_error');
        }
      }
    }
  }

  private scheduleNext(): void {
    if (!this.running) {
      return;
    }
    this.timer = setTimeout(() => {
      this.timer = null;
      this.inFlight = this.runOnce().finally(() => {
        this.inFlight = null;
        this.scheduleNext();
      });
    }, this.intervalMs);
  }
}
