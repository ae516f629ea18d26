import type { DescriptiveStats } from '@/domain/models/PairAnalysis';

/** 年率換算に使う営業日数 */
export const TRADING_DAYS_PER_YEAR = 252;

/** 値幅がこの相対誤差以下の系列は定数とみなす */
export const FLAT_RELATIVE_TOLERANCE = 1e-12;

export function mean(values: readonly number[]): number {
  if (values.length === 0) {
    return Number.NaN;
  }
  let sum = 0;
  for (const value of values) {
    sum += value;
  }
  return sum / values.length;
}

/**
 * 全点が（丸め誤差の範囲で）同じ値かどうか。
 * 0.1 を並べた系列でも平均に丸め誤差が乗るため、分散ではなく値幅で判定する。
 * 非有限値を含む系列は定数とみなさない。
 */
export function isFlat(values: readonly number[]): boolean {
  if (values.length === 0) {
    return true;
  }
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  for (const value of values) {
    if (!Number.isFinite(value)) {
      return false;
    }
    if (value < min) min = value;
    if (value > max) max = value;
  }
  const scale = Math.max(Math.abs(min), Math.abs(max), 1);
  return max - min <= FLAT_RELATIVE_TOLERANCE * scale;
}

/**
 * 標本標準偏差（ddof = 1）。2点未満は NaN、定数系列はちょうど 0。
 */
export function sampleStd(values: readonly number[]): number {
  if (values.length < 2) {
    return Number.NaN;
  }
  if (isFlat(values)) {
    return 0;
  }
  const m = mean(values);
  let sumSquares = 0;
  for (const value of values) {
    const d = value - m;
    sumSquares += d * d;
  }
  return Math.sqrt(sumSquares / (values.length - 1));
}

/**
 * ピアソン相関係数。どちらかが定数の場合は NaN。
 */
export function pearson(x: readonly number[], y: readonly number[]): number {
  const n = Math.min(x.length, y.length);
  if (n < 2 || isFlat(x.slice(0, n)) || isFlat(y.slice(0, n))) {
    return Number.NaN;
  }
  const mx = mean(x.slice(0, n));
  const my = mean(y.slice(0, n));
  let sxy = 0;
  let sxx = 0;
  let syy = 0;
  for (let i = 0; i < n; i++) {
    const dx = x[i] - mx;
    const dy = y[i] - my;
    sxy += dx * dy;
    sxx += dx * dx;
    syy += dy * dy;
  }
  const denominator = Math.sqrt(sxx * syy);
  return denominator === 0 ? Number.NaN : sxy / denominator;
}

export interface LinearFit {
  slope: number;
  intercept: number;
  /** 相関係数 r（R² は r の二乗） */
  r: number;
}

/**
 * y = slope * x + intercept の単回帰（最小二乗法）。
 * x が定数の場合 slope / intercept は NaN、r は 0。
 */
export function linearRegression(x: readonly number[], y: readonly number[]): LinearFit {
  const n = Math.min(x.length, y.length);
  const mx = mean(x.slice(0, n));
  const my = mean(y.slice(0, n));
  let sxy = 0;
  let sxx = 0;
  let syy = 0;
  for (let i = 0; i < n; i++) {
    const dx = x[i] - mx;
    const dy = y[i] - my;
    sxy += dx * dy;
    sxx += dx * dx;
    syy += dy * dy;
  }

  if (isFlat(x.slice(0, n))) {
    return { slope: Number.NaN, intercept: Number.NaN, r: 0 };
  }

  const slope = sxy / sxx;
  const denominator = Math.sqrt(sxx * syy);
  const r = denominator === 0 || isFlat(y.slice(0, n)) ? 0 : Math.max(-1, Math.min(1, sxy / denominator));
  return { slope, intercept: my - slope * mx, r };
}

/**
 * 単純リターン p[i] / p[i-1] - 1。0 / 0 は NaN、x / 0 は ±Infinity になる。
 */
export function pctChange(values: readonly number[]): number[] {
  const returns: number[] = [];
  for (let i = 1; i < values.length; i++) {
    returns.push(values[i] / values[i - 1] - 1);
  }
  return returns;
}

/**
 * 年率ボラティリティ。リターン系列が退化している（2点未満、無限大を含む、全点同一等）場合は 0。
 */
export function annualizedVolatility(values: readonly number[]): number {
  const returns = pctChange(values).filter((value) => !Number.isNaN(value));
  const std = sampleStd(returns);
  return Number.isFinite(std) ? std * Math.sqrt(TRADING_DAYS_PER_YEAR) : 0;
}

/**
 * 記述統計。2点未満の系列は null。
 */
export function describe(values: readonly number[]): DescriptiveStats | null {
  if (values.length < 2) {
    return null;
  }
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  for (const value of values) {
    if (value < min) min = value;
    if (value > max) max = value;
  }
  return {
    mean: mean(values),
    std: sampleStd(values),
    min,
    max,
    last: values[values.length - 1],
    volatility: annualizedVolatility(values),
  };
}
