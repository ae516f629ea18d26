import type { Tick } from '@/domain/models/Tick';

/**
 * メッセージパーサーのインターフェイス（インフラ層で実装される）。
 */
export interface MessageParser {
  /**
   * 取引所固有のメッセージを正規化ティックに変換する。
   * @param rawMessage JSON デコード済みの生メッセージ
   * @returns 正規化ティック。約定以外のメッセージや不正な形式の場合は null
   */
  parse(rawMessage: unknown): Tick | null;
}
