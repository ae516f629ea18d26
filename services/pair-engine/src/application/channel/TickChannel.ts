import { ChannelClosedError } from '@/domain/errors/PairEngineError';
import type { Tick } from '@/domain/models/Tick';

export const DEFAULT_CHANNEL_CAPACITY = 1000;

interface PendingSend {
  tick: Tick;
  resolve: () => void;
}

/**
 * アプリケーション層: コネクタと消費側をつなぐ有界 FIFO キュー
 *
 * - send: 空きがあれば即座に積む。満杯なら空くまで待つ（待ち順も FIFO）
 * - receive: 単一の消費者を想定。空なら次の send か close まで待つ
 * - close: 以降の send は ChannelClosedError。積まれたティックは receive で取り出せる
 */
export class TickChannel {
  private readonly queue: Tick[] = [];
  private readonly pendingSends: PendingSend[] = [];
  private waitingReceiver: ((tick: Tick | null) => void) | null = null;
  private closed = false;

  constructor(readonly capacity: number = DEFAULT_CHANNEL_CAPACITY) {
    if (!Number.isSafeInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer: ${capacity}`);
    }
  }

  get size(): number {
    return this.queue.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  send(tick: Tick): Promise<void> {
    if (this.closed) {
      return Promise.reject(new ChannelClosedError());
    }
    if (this.waitingReceiver) {
      const receiver = this.waitingReceiver;
      this.waitingReceiver = null;
      receiver(tick);
      return Promise.resolve();
    }
    if (this.pendingSends.length === 0 && this.queue.length < this.capacity) {
      this.queue.push(tick);
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.pendingSends.push({ tick, resolve });
    });
  }

  /**
   * @returns 次のティック。クローズ済みかつ空なら null
   */
  receive(): Promise<Tick | null> {
    const tick = this.queue.shift();
    if (tick !== undefined) {
      this.admitPending();
      return Promise.resolve(tick);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    if (this.waitingReceiver) {
      return Promise.reject(new Error('TickChannel supports a single receiver'));
    }
    return new Promise<Tick | null>((resolve) => {
      this.waitingReceiver = resolve;
    });
  }

  /**
   * 待機中の send は受け入れてから閉じる。
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const pending of this.pendingSends.splice(0)) {
      this.queue.push(pending.tick);
      pending.resolve();
    }
    if (this.waitingReceiver && this.queue.length === 0) {
      const receiver = this.waitingReceiver;
      this.waitingReceiver = null;
      receiver(null);
    }
  }

  private admitPending(): void {
    while (this.queue.length < this.capacity) {
      const pending = this.pendingSends.shift();
      if (!pending) {
        return;
      }
      this.queue.push(pending.tick);
      pending.resolve();
    }
  }
}
