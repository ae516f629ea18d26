import type { MessageParser } from '@/application/interfaces/MessageParser';
import type { Tick } from '@/domain/models/Tick';
import { isBinanceTradeMessage } from './types/BinanceRawMessage';

/**
 * 10 進文字列を数値に変換する。空文字・数値でない文字列は NaN。
 */
function parseDecimal(raw: string): number {
  return raw.trim() === '' ? Number.NaN : Number(raw);
}

/**
 * インフラ層: Binance 約定メッセージ → Tick
 */
export class BinanceMessageParser implements MessageParser {
  parse(rawMessage: unknown): Tick | null {
    if (!isBinanceTradeMessage(rawMessage)) {
      return null;
    }

    const price = parseDecimal(rawMessage.p);
    const quantity = parseDecimal(rawMessage.q);
    if (!Number.isFinite(rawMessage.T) || !Number.isFinite(price) || !Number.isFinite(quantity)) {
      return null;
    }
    if (price <= 0 || quantity < 0) {
      return null;
    }

    return {
      symbol: rawMessage.s.toUpperCase(),
      timestamp: rawMessage.T,
      price,
      quantity,
    };
  }
}
