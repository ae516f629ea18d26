import type { Tick } from '@/domain/models/Tick';

export const DEFAULT_TICK_CAPACITY = 10_000;

/**
 * 1 銘柄分の固定長リングバッファ。満杯になると最古の要素を上書きする。
 */
class TickRing {
  private readonly items: Tick[] = [];
  private head = 0;

  constructor(private readonly capacity: number) {}

  get size(): number {
    return this.items.length;
  }

  push(tick: Tick): void {
    if (this.items.length < this.capacity) {
      this.items.push(tick);
      return;
    }
    this.items[this.head] = tick;
    this.head = (this.head + 1) % this.capacity;
  }

  /**
   * 新しい方から最大 limit 件を古い順で返す（コピー）。
   */
  tail(limit: number): Tick[] {
    const count = Math.min(Math.max(limit, 0), this.items.length);
    const result: Tick[] = new Array<Tick>(count);
    const start = this.items.length - count;
    for (let i = 0; i < count; i++) {
      result[i] = this.items[(this.head + start + i) % this.items.length];
    }
    return result;
  }
}

/**
 * アプリケーション層: 銘柄ごとのティックバッファ
 *
 * 各銘柄で最新 capacity 件だけを到着順に保持する。読み出しは常にスナップショット。
 */
export class TickBuffer {
  private readonly rings = new Map<string, TickRing>();

  constructor(readonly capacity: number = DEFAULT_TICK_CAPACITY) {
    if (!Number.isSafeInteger(capacity) || capacity < 1) {
      throw new RangeError(`Tick buffer capacity must be a positive integer: ${capacity}`);
    }
  }

  add(tick: Tick): void {
    let ring = this.rings.get(tick.symbol);
    if (!ring) {
      ring = new TickRing(this.capacity);
      this.rings.set(tick.symbol, ring);
    }
    ring.push(tick);
  }

  /**
   * @param limit 省略時はバッファ全体
   * @returns 古い順。未知の銘柄は空配列
   */
  recent(symbol: string, limit: number = this.capacity): Tick[] {
    return this.rings.get(symbol)?.tail(limit) ?? [];
  }

  size(symbol: string): number {
    return this.rings.get(symbol)?.size ?? 0;
  }

  /**
   * 1 件以上ティックを受け取った銘柄（初回受信順）
   */
  symbols(): string[] {
    return [...this.rings.keys()];
  }
}
