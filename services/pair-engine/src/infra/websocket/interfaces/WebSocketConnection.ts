import type { RawData } from 'ws';

/**
 * 受信データ。ws は Buffer / ArrayBuffer / Buffer[] を渡す（テストでは文字列も使う）
 */
export type WebSocketData = RawData | string;

/**
 * インフラ層: 取引所非依存の WebSocket 接続ラッパ（インターフェース）
 *
 * 責務: WebSocket 接続の確立・管理・イベント処理を抽象化する。
 */
export interface WebSocketConnection {
  /**
   * 接続が確立されたときに呼ばれるコールバック
   */
  onOpen(callback: () => void): void;

  /**
   * メッセージを受信したときに呼ばれるコールバック
   */
  onMessage(callback: (data: WebSocketData) => void): void;

  /**
   * 接続が閉じられたときに呼ばれるコールバック
   */
  onClose(callback: () => void): void;

  /**
   * エラーが発生したときに呼ばれるコールバック
   */
  onError(callback: (error: Error) => void): void;

  send(data: string): void;

  close(): void;

  /**
   * 登録したコールバックをすべて解除する
   */
  removeAllListeners(): void;

  /**
   * 受信を一時停止する（読み込み済みのデータ分はイベントが届くことがある）
   */
  pause(): void;

  resume(): void;

  /**
   * 接続を強制終了する（クローズハンドシェイクを待たない）
   */
  terminate(): void;
}
