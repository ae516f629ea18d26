import type { Logger } from '@/application/interfaces/Logger';
import type { MarketDataAdapter } from '@/application/interfaces/MarketDataAdapter';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import type { WebSocketConnection, WebSocketData } from '@/infra/websocket/interfaces/WebSocketConnection';
import { BinanceWebSocketClient } from './BinanceWebSocketClient';

export const DEFAULT_BINANCE_WS_BASE_URL = 'wss://fstream.binance.com/ws';

/**
 * 銘柄の約定ストリーム URL を組み立てる。
 * @example buildTradeStreamUrl('wss://fstream.binance.com/ws', 'BTCUSDT') // 'wss://fstream.binance.com/ws/btcusdt@trade'
 */
export function buildTradeStreamUrl(baseUrl: string, symbol: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/${symbol.toLowerCase()}@trade`;
}

/**
 * BinanceTradeAdapter の初期化オプション
 */
interface BinanceTradeAdapterOptions {
  logger?: Logger;
  client?: BinanceWebSocketClient;
  onMessage?: (data: WebSocketData) => void;
  onClose?: () => void;
  onError?: (error: Error) => void;
}

/**
 * インフラ層: MarketDataAdapter 実装
 *
 * 責務: 1 銘柄分の Binance 約定ストリームへの接続とイベントの中継
 */
export class BinanceTradeAdapter implements MarketDataAdapter {
  private connection: WebSocketConnection | null = null;
  private readonly webSocketClient: BinanceWebSocketClient;
  private readonly logger: Logger;
  readonly streamUrl: string;

  private onMessageCallback?: (data: WebSocketData) => void;
  private onCloseCallback?: () => void;
  private onErrorCallback?: (error: Error) => void;

  /**
   * @param symbol 銘柄（例: 'BTCUSDT'）
   * @param wsBaseUrl ストリームのベース URL
   * @param options オプション（ロガー、コールバック関数など）
   */
  constructor(
    private readonly symbol: string,
    wsBaseUrl: string = DEFAULT_BINANCE_WS_BASE_URL,
    options?: BinanceTradeAdapterOptions
  ) {
    this.logger = (options?.logger ?? LoggerFactory.create()).child({ component: 'BinanceTradeAdapter', symbol });
    this.webSocketClient = options?.client ?? new BinanceWebSocketClient(this.logger);
    this.streamUrl = buildTradeStreamUrl(wsBaseUrl, symbol);
    if (options?.onMessage) this.onMessageCallback = options.onMessage;
    if (options?.onClose) this.onCloseCallback = options.onClose;
    if (options?.onError) this.onErrorCallback = options.onError;
  }

  setOnMessage(callback: (data: WebSocketData) => void): void {
    this.onMessageCallback = callback;
  }

  setOnClose(callback: () => void): void {
    this.onCloseCallback = callback;
  }

  setOnError(callback: (error: Error) => void): void {
    this.onErrorCallback = callback;
  }

  /**
   * WebSocket 接続を確立する。
   * 既存の接続がある場合はクリーンアップしてから新規接続を試みる。
   */
  async connect(): Promise<void> {
    if (this.connection) {
      this.connection.removeAllListeners();
      this.connection.terminate();
      this.connection = null;
    }

    const connection = await this.webSocketClient.connect(this.streamUrl);
    this.connection = connection;
    this.logger.info('socket connected', { url: this.streamUrl });

    connection.onMessage((data) => {
      this.onMessageCallback?.(data);
    });

    connection.onClose(() => {
      this.logger.warn('socket closed', { symbol: this.symbol });
      this.onCloseCallback?.();
    });

    connection.onError((error) => {
      this.logger.error('socket error', { symbol: this.symbol, err: error });
      this.onErrorCallback?.(error);
    });
  }

  /**
   * WebSocket 接続を切断する。切断後はコールバックを呼ばない。
   */
  disconnect(): void {
    if (this.connection) {
      this.connection.removeAllListeners();
      this.connection.close();
      this.connection = null;
    }
    this.webSocketClient.disconnect();
  }

  pause(): void {
    this.connection?.pause();
  }

  resume(): void {
    this.connection?.resume();
  }

  parseMessage(data: WebSocketData): unknown {
    return this.webSocketClient.parseMessage(data);
  }
}
