/**
 * ドメイン層: 正規化された約定ティック
 *
 * 取引所固有のメッセージから生成され、生成後は変更されない。
 */
export type Tick = Readonly<{
  /** 銘柄（例: 'BTCUSDT'） */
  symbol: string;
  /** 約定時刻（エポックミリ秒） */
  timestamp: number;
  /** 約定価格 */
  price: number;
  /** 約定数量 */
  quantity: number;
}>;

/**
 * ティックを受け取る側の契約（バッファ、ブロードキャスタなど）。
 */
export type TickSink = (tick: Tick) => Promise<void>;
