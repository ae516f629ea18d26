import type { WebSocketData } from '@/infra/websocket/interfaces/WebSocketConnection';

/**
 * アプリケーション層: 取引所 WebSocket アダプタの共通インターフェイス
 *
 * 責務: 1 銘柄分のストリーム接続の契約を定義する（実装はインフラ層が担当）。
 */
export interface MarketDataAdapter {
  /**
   * WebSocket 接続を確立する。
   * @returns 接続が確立されたら解決される。失敗時は reject される
   */
  connect(): Promise<void>;

  /**
   * WebSocket 接続を切断する。
   */
  disconnect(): void;

  /**
   * 受信を一時停止する。未接続なら何もしない
   */
  pause(): void;

  resume(): void;

  setOnMessage(callback: (data: WebSocketData) => void): void;

  setOnClose(callback: () => void): void;

  setOnError(callback: (error: Error) => void): void;

  /**
   * 受信データを JSON としてデコードする。
   * @returns デコード結果。デコードできない場合は null
   */
  parseMessage(data: WebSocketData): unknown;
}
