import WebSocket from 'ws';
import type { Logger } from '@/application/interfaces/Logger';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import type { WebSocketConnection, WebSocketData } from '@/infra/websocket/interfaces/WebSocketConnection';
import { WsWebSocketConnection } from '@/infra/websocket/WsWebSocketConnection';

/**
 * 受信データを UTF-8 文字列にする。
 */
export function decodeWebSocketData(data: WebSocketData): string {
  if (typeof data === 'string') {
    return data;
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf-8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf-8');
  }
  return data.toString('utf-8');
}

/**
 * インフラ層: Binance WebSocket 接続・受信（低レベル）
 *
 * 責務: 接続の確立と生メッセージのデコードのみを担当する。
 * Binance はストリーム名を URL で指定するため購読メッセージは送らない。
 */
export class BinanceWebSocketClient {
  private connection: WebSocketConnection | null = null;
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? LoggerFactory.create();
  }

  /**
   * WebSocket 接続を確立する。
   * @param wsUrl ストリーム URL（例: wss://fstream.binance.com/ws/btcusdt@trade）
   * @returns 接続が確立されたら解決される
   */
  async connect(wsUrl: string): Promise<WebSocketConnection> {
    return new Promise<WebSocketConnection>((resolve, reject) => {
      const socket = new WebSocket(wsUrl);
      const connection = new WsWebSocketConnection(socket);

      const onOpen = () => {
        connection.removeAllListeners();
        this.connection = connection;
        resolve(connection);
      };

      const onError = (error: Error) => {
        connection.removeAllListeners();
        connection.terminate();
        reject(new Error(`WebSocket connection failed: ${error.message}`));
      };

      connection.onOpen(onOpen);
      connection.onError(onError);
    });
  }

  /**
   * 接続を閉じる。
   */
  disconnect(): void {
    if (this.connection) {
      this.connection.close();
      this.connection = null;
    }
  }

  /**
   * 生メッセージを JSON としてデコードする。
   * @returns デコード結果。JSON でない場合は null
   */
  parseMessage(data: WebSocketData): unknown {
    try {
      return JSON.parse(decodeWebSocketData(data));
    } catch (error) {
      this.logger.warn('failed to parse message', { err: error });
      return null;
    }
  }
}
