import type { CriticalValues } from '@/domain/models/PairAnalysis';
import { fitOls } from './ols';

/**
 * 拡張 Dickey-Fuller 検定（定数項あり、AIC による自動ラグ選択）。
 *
 * p 値は MacKinnon (1994) の近似、臨界値は MacKinnon (2010) の応答曲面による。
 */

export const ADF_MIN_OBSERVATIONS = 12;

export interface AdfStatistics {
  kind: 'ok';
  statistic: number;
  pValue: number;
  usedLag: number;
  nObservations: number;
  criticalValues: CriticalValues;
}

export type AdfOutcome = AdfStatistics | { kind: 'error'; error: string };

// MacKinnon (1994): 定数項あり、系列数 N = 1
const TAU_MAX = 2.74;
const TAU_MIN = -18.83;
const TAU_STAR = -1.61;
const TAU_SMALL_P = [2.1659, 1.4412, 0.038269];
const TAU_LARGE_P = [1.7339, 0.93202, -0.12745, -0.010368];

// MacKinnon (2010): 定数項あり、N = 1。crit = c0 + c1/T + c2/T^2 + c3/T^3
const TAU_C_2010: CriticalValues<readonly number[]> = {
  '1%': [-3.43035, -6.5393, -16.786, -79.433],
  '5%': [-2.86154, -2.8903, -4.234, -40.04],
  '10%': [-2.56677, -1.5384, -2.809, 0],
};

/** coefficients[0] + coefficients[1] * x + ... */
function polyval(coefficients: readonly number[], x: number): number {
  let result = 0;
  for (let i = coefficients.length - 1; i >= 0; i--) {
    result = result * x + coefficients[i];
  }
  return result;
}

/**
 * 相補誤差関数（Numerical Recipes の Chebyshev 近似、相対誤差 1.2e-7 未満）。
 */
function erfc(x: number): number {
  const z = Math.abs(x);
  const t = 1 / (1 + 0.5 * z);
  const r =
    t *
    Math.exp(
      -z * z -
        1.26551223 +
        t *
          (1.00002368 +
            t *
              (0.37409196 +
                t *
                  (0.09678418 +
                    t * (-0.18628806 + t * (0.27886807 + t * (-1.13520398 + t * (1.48851587 + t * (-0.82215223 + t * 0.17087277))))))))
    );
  return x >= 0 ? r : 2 - r;
}

export function normalCdf(x: number): number {
  return 0.5 * erfc(-x / Math.SQRT2);
}

export function mackinnonPValue(statistic: number): number {
  if (statistic > TAU_MAX) {
    return 1;
  }
  if (statistic < TAU_MIN) {
    return 0;
  }
  const coefficients = statistic <= TAU_STAR ? TAU_SMALL_P : TAU_LARGE_P;
  return normalCdf(polyval(coefficients, statistic));
}

export function mackinnonCriticalValues(nobs: number): CriticalValues {
  const inv = 1 / nobs;
  return {
    '1%': polyval(TAU_C_2010['1%'], inv),
    '5%': polyval(TAU_C_2010['5%'], inv),
    '10%': polyval(TAU_C_2010['10%'], inv),
  };
}

/**
 * Schwert の規則による最大ラグ。定数項の分だけ上限を絞る。
 */
export function maxLagFor(nobs: number): number {
  const schwert = Math.ceil(12 * (nobs / 100) ** 0.25);
  return Math.min(Math.floor(nobs / 2) - 2, schwert);
}

/**
 * 差分系列に lag 個の遅れ差分を並べた補助回帰の設計行列を作る。
 * 各行: [定数, x_{t-1}, Δx_{t-1}, ..., Δx_{t-lag}]、目的変数は Δx_t。
 * 行数は len(diff) - trim（trim >= lag）。
 */
function buildDesign(
  levels: readonly number[],
  diffs: readonly number[],
  lag: number,
  trim: number
): { y: number[]; X: number[][] } {
  const y: number[] = [];
  const X: number[][] = [];
  for (let j = trim; j < diffs.length; j++) {
    const row = [1, levels[j]];
    for (let l = 1; l <= lag; l++) {
      row.push(diffs[j - l]);
    }
    y.push(diffs[j]);
    X.push(row);
  }
  return { y, X };
}

export function adfTest(series: readonly number[]): AdfOutcome {
  if (series.length < ADF_MIN_OBSERVATIONS) {
    return { kind: 'error', error: 'Insufficient data for ADF test' };
  }
  if (series.some((value) => !Number.isFinite(value))) {
    return { kind: 'error', error: 'Invalid input, x contains non-finite values' };
  }
  if (Math.max(...series) === Math.min(...series)) {
    return { kind: 'error', error: 'Invalid input, x is constant' };
  }

  const maxLag = maxLagFor(series.length);
  if (maxLag < 0) {
    return { kind: 'error', error: 'sample size is too short to use selected regression component' };
  }

  const diffs: number[] = [];
  for (let i = 1; i < series.length; i++) {
    diffs.push(series[i] - series[i - 1]);
  }

  // ラグ選択: 全候補を同じ標本（先頭 maxLag 行を捨てた範囲）で比較する
  let bestLag = -1;
  let bestAic = Number.POSITIVE_INFINITY;
  for (let lag = 0; lag <= maxLag; lag++) {
    const { y, X } = buildDesign(series, diffs, lag, maxLag);
    const fit = fitOls(y, X);
    if (fit && fit.aic < bestAic) {
      bestAic = fit.aic;
      bestLag = lag;
    }
  }
  if (bestLag < 0) {
    return { kind: 'error', error: 'Singular design matrix in ADF regression' };
  }

  // 選択したラグで標本を取り直して再推定する
  const { y, X } = buildDesign(series, diffs, bestLag, bestLag);
  const fit = fitOls(y, X);
  if (!fit) {
    return { kind: 'error', error: 'Singular design matrix in ADF regression' };
  }

  const statistic = fit.tValues[1];
  return {
    kind: 'ok',
    statistic,
    pValue: mackinnonPValue(statistic),
    usedLag: bestLag,
    nObservations: fit.nobs,
    criticalValues: mackinnonCriticalValues(fit.nobs),
  };
}
