/**
 * 多変量の最小二乗回帰（正規方程式 + Gauss-Jordan 法）。
 * ADF 検定の補助回帰で使う程度の小さな設計行列を前提とする。
 */
export interface OlsFit {
  params: number[];
  tValues: number[];
  ssr: number;
  nobs: number;
  /** 赤池情報量規準（-2 * 対数尤度 + 2 * パラメータ数） */
  aic: number;
}

const SINGULAR_TOLERANCE = 1e-12;

/**
 * 正方行列の逆行列。特異（またはそれに近い）場合は null。
 */
export function invert(matrix: readonly (readonly number[])[]): number[][] | null {
  const size = matrix.length;
  const work = matrix.map((row, i) => [...row, ...Array.from({ length: size }, (_, j) => (i === j ? 1 : 0))]);

  let scale = 0;
  for (const row of matrix) {
    for (const value of row) {
      scale = Math.max(scale, Math.abs(value));
    }
  }
  if (scale === 0) {
    return null;
  }

  for (let col = 0; col < size; col++) {
    let pivotRow = col;
    for (let row = col + 1; row < size; row++) {
      if (Math.abs(work[row][col]) > Math.abs(work[pivotRow][col])) {
        pivotRow = row;
      }
    }
    const pivot = work[pivotRow][col];
    if (!Number.isFinite(pivot) || Math.abs(pivot) <= scale * SINGULAR_TOLERANCE) {
      return null;
    }
    [work[col], work[pivotRow]] = [work[pivotRow], work[col]];

    const pivotLine = work[col];
    for (let j = 0; j < 2 * size; j++) {
      pivotLine[j] /= pivot;
    }
    for (let row = 0; row < size; row++) {
      if (row === col) continue;
      const factor = work[row][col];
      if (factor === 0) continue;
      const line = work[row];
      for (let j = 0; j < 2 * size; j++) {
        line[j] -= factor * pivotLine[j];
      }
    }
  }

  return work.map((row) => row.slice(size));
}

/**
 * y を説明変数 X（行 = 観測）に回帰する。
 * 設計行列が特異、または自由度が残らない場合は null。
 */
export function fitOls(y: readonly number[], X: readonly (readonly number[])[]): OlsFit | null {
  const nobs = y.length;
  const k = X.length > 0 ? X[0].length : 0;
  if (k === 0 || nobs !== X.length || nobs <= k) {
    return null;
  }

  const xtx = Array.from({ length: k }, () => new Array<number>(k).fill(0));
  const xty = new Array<number>(k).fill(0);
  for (let i = 0; i < nobs; i++) {
    const row = X[i];
    for (let a = 0; a < k; a++) {
      xty[a] += row[a] * y[i];
      for (let b = a; b < k; b++) {
        xtx[a][b] += row[a] * row[b];
      }
    }
  }
  for (let a = 0; a < k; a++) {
    for (let b = 0; b < a; b++) {
      xtx[a][b] = xtx[b][a];
    }
  }

  const inverse = invert(xtx);
  if (!inverse) {
    return null;
  }

  const params = inverse.map((row) => row.reduce((acc, value, j) => acc + value * xty[j], 0));

  let ssr = 0;
  for (let i = 0; i < nobs; i++) {
    const fitted = X[i].reduce((acc, value, j) => acc + value * params[j], 0);
    const resid = y[i] - fitted;
    ssr += resid * resid;
  }

  const sigma2 = ssr / (nobs - k);
  const tValues = params.map((param, j) => param / Math.sqrt(sigma2 * inverse[j][j]));

  const half = nobs / 2;
  const llf = -half * Math.log(2 * Math.PI) - half * Math.log(ssr / nobs) - half;
  const aic = -2 * llf + 2 * k;

  return { params, tValues, ssr, nobs, aic };
}
