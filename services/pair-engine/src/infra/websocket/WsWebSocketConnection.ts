import type WebSocket from 'ws';
import type { WebSocketConnection, WebSocketData } from './interfaces/WebSocketConnection';

/**
 * ws ライブラリを使った WebSocket 接続の実装
 */
export class WsWebSocketConnection implements WebSocketConnection {
  private openCallbacks: Array<() => void> = [];
  private messageCallbacks: Array<(data: WebSocketData) => void> = [];
  private closeCallbacks: Array<() => void> = [];
  private errorCallbacks: Array<(error: Error) => void> = [];

  constructor(private readonly socket: WebSocket) {
    // ws のイベントを内部で管理（error リスナーが無いと ws は例外を投げるため常に登録しておく）
    this.socket.on('open', () => {
      for (const cb of this.openCallbacks) {
        cb();
      }
    });

    this.socket.on('message', (data: WebSocket.RawData) => {
      for (const cb of this.messageCallbacks) {
        cb(data);
      }
    });

    this.socket.on('close', () => {
      for (const cb of this.closeCallbacks) {
        cb();
      }
    });

    this.socket.on('error', (error: Error) => {
      for (const cb of this.errorCallbacks) {
        cb(error);
      }
    });
  }

  onOpen(callback: () => void): void {
    this.openCallbacks.push(callback);
  }

  onMessage(callback: (data: WebSocketData) => void): void {
    this.messageCallbacks.push(callback);
  }

  onClose(callback: () => void): void {
    this.closeCallbacks.push(callback);
  }

  onError(callback: (error: Error) => void): void {
    this.errorCallbacks.push(callback);
  }

  send(data: string): void {
    this.socket.send(data);
  }

  close(): void {
    this.socket.close();
  }

  removeAllListeners(): void {
    this.openCallbacks = [];
    this.messageCallbacks = [];
    this.closeCallbacks = [];
    this.errorCallbacks = [];
  }

  pause(): void {
    this.socket.pause();
  }

  resume(): void {
    this.socket.resume();
  }

  terminate(): void {
    this.socket.terminate();
  }
}
