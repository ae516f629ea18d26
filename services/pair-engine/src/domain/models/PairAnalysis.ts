import type { Timeframe } from './Timeframe';

/**
 * ドメイン層: ペア分析の結果型
 *
 * 数値フィールドの null は「欠損」を表す（NaN / Infinity はサニタイズ時に null へ変換される）。
 */

/** 時刻付きの値（内部計算用、timestamp はエポックミリ秒） */
export interface TimePoint {
  readonly timestamp: number;
  readonly value: number;
}

/** 外部に返す系列の1点（timestamp は ISO-8601） */
export interface SeriesPoint {
  readonly timestamp: string;
  readonly value: number;
}

export interface DescriptiveStats {
  mean: number;
  std: number;
  min: number;
  max: number;
  last: number;
  /** 単純リターンの標準偏差 × √252 */
  volatility: number;
}

export type SanitizedStats = { readonly [K in keyof DescriptiveStats]: number | null };

export interface CriticalValues<T = number> {
  '1%': T;
  '5%': T;
  '10%': T;
}

export interface AdfTestReport {
  kind: 'ok';
  adfStatistic: number | null;
  pValue: number | null;
  usedLag: number | null;
  nObservations: number | null;
  criticalValues: CriticalValues<number | null>;
  isStationary: boolean;
}

export interface AdfTestError {
  kind: 'error';
  error: string;
}

export type AdfTestResult = AdfTestReport | AdfTestError;

export interface PairAnalysisResult {
  symbol1: string;
  symbol2: string;
  window: number;
  alignedPoints: number;
  hedgeRatio: number | null;
  rSquared: number | null;
  currentSpread: number | null;
  currentZscore: number | null;
  currentCorrelation: number | null;
  stats: {
    symbol1: SanitizedStats | null;
    symbol2: SanitizedStats | null;
    spread: SanitizedStats | null;
  };
  adfTest: AdfTestResult;
  series: {
    spread: SeriesPoint[];
    zscore: SeriesPoint[];
    correlation: SeriesPoint[];
  };
}

export interface InsufficientData {
  kind: 'insufficient_data';
  observed: number;
  required: number;
  message: string;
}

export type PairAnalysisOutcome = { kind: 'ok'; result: PairAnalysisResult } | InsufficientData;

export type StatsLookup =
  | { kind: 'ok'; symbol: string; timeframe: Timeframe; stats: SanitizedStats }
  | { kind: 'not_found'; symbol: string; timeframe: Timeframe };
