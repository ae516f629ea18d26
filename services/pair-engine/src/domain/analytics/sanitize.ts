import type {
  AdfTestResult,
  DescriptiveStats,
  SanitizedStats,
} from '@/domain/models/PairAnalysis';
import type { AdfOutcome } from './adf';

/**
 * コア境界を越える数値はすべてここを通す。
 * NaN / ±Infinity は欠損（null）に写し、0 に丸めることはしない。
 */
export function sanitizeNumber(value: number | null | undefined): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

/**
 * 整数として扱うべき値（ラグ数、観測数など）。安全な整数でなければ欠損。
 */
export function sanitizeInteger(value: number | null | undefined): number | null {
  return typeof value === 'number' && Number.isSafeInteger(value) ? value : null;
}

export function sanitizeStats(stats: DescriptiveStats | null): SanitizedStats | null {
  if (!stats) {
    return null;
  }
  return {
    mean: sanitizeNumber(stats.mean),
    std: sanitizeNumber(stats.std),
    min: sanitizeNumber(stats.min),
    max: sanitizeNumber(stats.max),
    last: sanitizeNumber(stats.last),
    volatility: sanitizeNumber(stats.volatility),
  };
}

export function sanitizeAdf(outcome: AdfOutcome): AdfTestResult {
  if (outcome.kind === 'error') {
    return outcome;
  }
  const pValue = sanitizeNumber(outcome.pValue);
  return {
    kind: 'ok',
    adfStatistic: sanitizeNumber(outcome.statistic),
    pValue,
    usedLag: sanitizeInteger(outcome.usedLag),
    nObservations: sanitizeInteger(outcome.nObservations),
    criticalValues: {
      '1%': sanitizeNumber(outcome.criticalValues['1%']),
      '5%': sanitizeNumber(outcome.criticalValues['5%']),
      '10%': sanitizeNumber(outcome.criticalValues['10%']),
    },
    isStationary: pValue !== null && pValue < 0.05,
  };
}
