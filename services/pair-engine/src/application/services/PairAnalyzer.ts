import type { Logger } from '@/application/interfaces/Logger';
import type {
  InsufficientData,
  PairAnalysisOutcome,
  TimePoint,
} from '@/domain/models/PairAnalysis';
import { adfTest } from '@/domain/analytics/adf';
import { type AlignedSeries, alignSeries } from '@/domain/analytics/alignment';
import { toSafeSeries } from '@/domain/analytics/plotSafety';
import { rollingCorrelation, rollingZScore } from '@/domain/analytics/rolling';
import { sanitizeAdf, sanitizeNumber, sanitizeStats } from '@/domain/analytics/sanitize';
import { describe, linearRegression } from '@/domain/analytics/statistics';

export const MIN_ALIGNED_POINTS = 5;
export const MIN_OLS_POINTS = 10;
export const DEFAULT_ROLLING_WINDOW = 20;

export interface PairAnalysisInput {
  symbol1: string;
  symbol2: string;
  prices1: readonly TimePoint[];
  prices2: readonly TimePoint[];
  window?: number;
}

export interface HedgeRatioEstimate {
  hedgeRatio: number;
  rSquared: number;
}

/**
 * price1 = hedgeRatio * price2 + intercept の OLS 推定。
 * 点数が足りない場合は失敗させず hedgeRatio = 1, R² = 0 に縮退する。
 */
export function estimateHedgeRatio(prices1: readonly number[], prices2: readonly number[]): HedgeRatioEstimate {
  if (prices1.length < MIN_OLS_POINTS) {
    return { hedgeRatio: 1.0, rSquared: 0.0 };
  }
  const fit = linearRegression(prices2, prices1);
  return { hedgeRatio: fit.slope, rSquared: fit.r * fit.r };
}

/**
 * spread = price1 - hedgeRatio * price2。非有限値の点は捨てる。
 */
export function computeSpread(aligned: AlignedSeries, hedgeRatio: number): TimePoint[] {
  const spread: TimePoint[] = [];
  for (let i = 0; i < aligned.timestamps.length; i++) {
    const value = aligned.left[i] - hedgeRatio * aligned.right[i];
    if (Number.isFinite(value)) {
      spread.push({ timestamp: aligned.timestamps[i], value });
    }
  }
  return spread;
}

/**
 * 最新位置（timestamp）の値。その位置が捨てられていれば null。
 */
function valueAt(points: readonly TimePoint[], timestamp: number): number | null {
  const last = points.at(-1);
  return last !== undefined && last.timestamp === timestamp ? last.value : null;
}

/**
 * アプリケーション層: ペアトレード分析パイプライン
 *
 * 整列 → ヘッジ比率 → スプレッド → ローリング統計 → 記述統計・ADF 検定 の順に実行し、
 * 外部へ返す系列はすべてプロット安全ゲートを、スカラーはすべてサニタイザを通す。
 * 途中で打ち切る場合は insufficient_data を返す（例外は投げない）。
 */
export class PairAnalyzer {
  constructor(private readonly logger?: Logger) {}

  analyze(input: PairAnalysisInput): PairAnalysisOutcome {
    const window = input.window ?? DEFAULT_ROLLING_WINDOW;
    const aligned = alignSeries(input.prices1, input.prices2);
    const observed = aligned.timestamps.length;
    const required = Math.max(MIN_ALIGNED_POINTS, window);

    if (observed < required) {
      const outcome: InsufficientData = {
        kind: 'insufficient_data',
        observed,
        required,
        message: `Insufficient aligned data: ${observed} points, need at least ${required}`,
      };
      this.logger?.warn('Insufficient aligned data', {
        symbol1: input.symbol1,
        symbol2: input.symbol2,
        observed,
        required,
      });
      return outcome;
    }

    if (observed < MIN_OLS_POINTS) {
      this.logger?.warn('Not enough points for OLS hedge ratio', {
        symbol1: input.symbol1,
        symbol2: input.symbol2,
        observed,
        required: MIN_OLS_POINTS,
      });
    }
    const { hedgeRatio, rSquared } = estimateHedgeRatio(aligned.left, aligned.right);
    if (!Number.isFinite(hedgeRatio)) {
      this.logger?.warn('Hedge ratio undefined, second price series is constant', {
        symbol1: input.symbol1,
        symbol2: input.symbol2,
        observed,
      });
    }
    const latest = aligned.timestamps[observed - 1];
    const spread = computeSpread(aligned, hedgeRatio);
    const zscore = rollingZScore(spread, window);
    const correlation = rollingCorrelation(aligned, window);
    const spreadValues = spread.map((point) => point.value);

    const series = {
      spread: toSafeSeries(spread),
      zscore: toSafeSeries(zscore),
      correlation: toSafeSeries(correlation),
    };

    this.logger?.debug('Pair analysis complete', {
      symbol1: input.symbol1,
      symbol2: input.symbol2,
      aligned: observed,
      spreadPoints: series.spread.length,
      zscorePoints: series.zscore.length,
      correlationPoints: series.correlation.length,
    });

    return {
      kind: 'ok',
      result: {
        symbol1: input.symbol1,
        symbol2: input.symbol2,
        window,
        alignedPoints: observed,
        hedgeRatio: sanitizeNumber(hedgeRatio),
        rSquared: sanitizeNumber(rSquared),
        currentSpread: sanitizeNumber(valueAt(spread, latest)),
        currentZscore: sanitizeNumber(valueAt(zscore, latest)),
        currentCorrelation: sanitizeNumber(valueAt(correlation, latest)),
        stats: {
          symbol1: sanitizeStats(describe(aligned.left)),
          symbol2: sanitizeStats(describe(aligned.right)),
          spread: sanitizeStats(describe(spreadValues)),
        },
        adfTest: sanitizeAdf(adfTest(spreadValues)),
        series,
      },
    };
  }
}
