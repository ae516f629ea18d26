import type { OhlcvBar } from '@/domain/models/OhlcvBar';
import type { Tick } from '@/domain/models/Tick';
import type { Timeframe } from '@/domain/models/Timeframe';

/** 2024-01-01T00:00:00.000Z */
export const T0 = Date.UTC(2024, 0, 1);

export function makeTick(overrides: Partial<Tick> = {}): Tick {
  return {
    symbol: 'BTCUSDT',
    timestamp: T0,
    price: 100,
    quantity: 1,
    ...overrides,
  };
}

/**
 * 終値だけを指定して 1 分足を並べる（timestamp は T0 から 1 分刻み）。
 */
export function makeBars(symbol: string, closes: readonly number[], timeframe: Timeframe = '1m'): OhlcvBar[] {
  return closes.map((close, i) => ({
    symbol,
    timeframe,
    timestamp: T0 + i * 60_000,
    open: close,
    high: close,
    low: close,
    close,
    volume: 1,
  }));
}

/**
 * Binance `<symbol>@trade` 形式のメッセージ（JSON 文字列）
 */
export function tradeMessage(symbol: string, tradeTime: number, price: string, quantity: string): string {
  return JSON.stringify({
    e: 'trade',
    E: tradeTime + 5,
    T: tradeTime,
    s: symbol,
    t: 1,
    p: price,
    q: quantity,
    X: 'MARKET',
    m: false,
  });
}

/**
 * 線形合同法による決定的な一様乱数列（-1 以上 1 未満）
 */
export function lcgNoise(count: number, seed = 12345): number[] {
  let state = seed;
  const values: number[] = [];
  for (let i = 0; i < count; i++) {
    state = (1664525 * state + 1013904223) % 4294967296;
    values.push((state / 4294967296) * 2 - 1);
  }
  return values;
}
