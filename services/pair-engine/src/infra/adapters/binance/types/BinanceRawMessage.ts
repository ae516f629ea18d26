/**
 * Binance USDⓈ-M 先物 `<symbol>@trade` ストリームのメッセージ
 * 価格・数量は 10 進文字列で届く。
 */
export interface BinanceTradeMessage {
  /** イベント種別 */
  e: 'trade';
  /** イベント時刻（エポックミリ秒） */
  E?: number;
  /** 銘柄 */
  s: string;
  /** 約定 ID */
  t?: number;
  /** 価格 */
  p: string;
  /** 数量 */
  q: string;
  /** 約定時刻（エポックミリ秒） */
  T: number;
  /** 買い手がメイカーか */
  m?: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isBinanceTradeMessage(value: unknown): value is BinanceTradeMessage {
  return (
    isRecord(value) &&
    value.e === 'trade' &&
    typeof value.s === 'string' &&
    value.s.length > 0 &&
    typeof value.T === 'number' &&
    typeof value.p === 'string' &&
    typeof value.q === 'string'
  );
}
