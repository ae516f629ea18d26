import type { Logger } from '@/application/interfaces/Logger';
import type { MarketDataStore } from '@/application/stores/MarketDataStore';
import { sanitizeStats } from '@/domain/analytics/sanitize';
import { describe } from '@/domain/analytics/statistics';
import { InvalidWindowError } from '@/domain/errors/PairEngineError';
import type { OhlcvBar } from '@/domain/models/OhlcvBar';
import type { PairAnalysisOutcome, StatsLookup, TimePoint } from '@/domain/models/PairAnalysis';
import { parseTimeframe } from '@/domain/models/Timeframe';
import type { BarRepository } from '@/domain/repositories/BarRepository';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { DEFAULT_ROLLING_WINDOW, MIN_ALIGNED_POINTS, type PairAnalyzer } from './PairAnalyzer';

export const DEFAULT_BAR_LIMIT = 1000;
/** 分析に使う各銘柄の足の本数（直近から） */
export const ANALYSIS_BAR_LIMIT = 1000;
/** 時系列として返すのに必要な最小本数 */
export const MIN_SERIES_BARS = 2;

interface MarketQueryServiceOptions {
  defaultWindow?: number;
  logger?: Logger;
}

function toClosePoints(bars: readonly OhlcvBar[]): TimePoint[] {
  return bars.map((bar) => ({ timestamp: bar.timestamp, value: bar.close }));
}

/**
 * アプリケーション層: 問い合わせ窓口（HTTP 層から呼ばれる）
 *
 * 責務: 入力値の検証（時間足・ウィンドウ）と、ストア・分析エンジン・永続化層への委譲。
 */
export class MarketQueryService {
  private readonly logger: Logger;
  private readonly defaultWindow: number;

  constructor(
    private readonly store: MarketDataStore,
    private readonly analyzer: PairAnalyzer,
    private readonly repository: BarRepository,
    options?: MarketQueryServiceOptions
  ) {
    this.logger = (options?.logger ?? LoggerFactory.create()).child({ component: 'MarketQueryService' });
    this.defaultWindow = options?.defaultWindow ?? DEFAULT_ROLLING_WINDOW;
  }

  /**
   * ティックを受信済みの銘柄（アルファベット順）
   */
  listSymbols(): string[] {
    return this.store.symbols().sort();
  }

  /**
   * 直近 limit 本の足。2 本未満しか無い場合は時系列にならないので空配列。
   * @throws {InvalidTimeframeError} 未知の時間足の場合
   */
  getBars(symbol: string, timeframe: string, limit: number = DEFAULT_BAR_LIMIT): OhlcvBar[] {
    const bars = this.store.getBars(symbol, parseTimeframe(timeframe), limit);
    return bars.length < MIN_SERIES_BARS ? [] : bars;
  }

  /**
   * 2 銘柄の終値でペア分析を行う。どちらかの足が無い場合は insufficient_data。
   * @throws {InvalidTimeframeError} 未知の時間足の場合
   * @throws {InvalidWindowError} window が 2 以上の整数でない場合
   */
  analyzePair(symbol1: string, symbol2: string, timeframe: string, window?: number): PairAnalysisOutcome {
    const tf = parseTimeframe(timeframe);
    const rollingWindow = window ?? this.defaultWindow;
    if (!Number.isSafeInteger(rollingWindow) || rollingWindow < 2) {
      throw new InvalidWindowError(rollingWindow);
    }

    const bars1 = this.store.getBars(symbol1, tf, ANALYSIS_BAR_LIMIT);
    const bars2 = this.store.getBars(symbol2, tf, ANALYSIS_BAR_LIMIT);
    if (bars1.length === 0 || bars2.length === 0) {
      const missing = [bars1.length === 0 ? symbol1 : null, bars2.length === 0 ? symbol2 : null]
        .filter((symbol): symbol is string => symbol !== null)
        .join(', ');
      this.logger.warn('No bars available for pair analysis', { symbol1, symbol2, timeframe: tf });
      return {
        kind: 'insufficient_data',
        observed: 0,
        required: Math.max(MIN_ALIGNED_POINTS, rollingWindow),
        message: `No ${tf} bars available for ${missing}`,
      };
    }

    return this.analyzer.analyze({
      symbol1,
      symbol2,
      prices1: toClosePoints(bars1),
      prices2: toClosePoints(bars2),
      window: rollingWindow,
    });
  }

  /**
   * 終値の記述統計。足が 2 本未満の場合は not_found。
   * @throws {InvalidTimeframeError} 未知の時間足の場合
   */
  getStats(symbol: string, timeframe: string): StatsLookup {
    const tf = parseTimeframe(timeframe);
    const closes = this.store.getBars(symbol, tf).map((bar) => bar.close);
    const stats = sanitizeStats(describe(closes));
    if (!stats) {
      return { kind: 'not_found', symbol, timeframe: tf };
    }
    return { kind: 'ok', symbol, timeframe: tf, stats };
  }

  /**
   * 永続化済みの足を読み出す。
   * @param timestamp バケット開始時刻（エポックミリ秒）
   */
  async getPersistedBar(symbol: string, timeframe: string, timestamp: number): Promise<OhlcvBar | null> {
    return await this.repository.findBar(symbol, parseTimeframe(timeframe), timestamp);
  }

  async getPersistedBars(symbol: string, timeframe: string, limit: number = DEFAULT_BAR_LIMIT): Promise<OhlcvBar[]> {
    return await this.repository.findBars(symbol, parseTimeframe(timeframe), limit);
  }
}
