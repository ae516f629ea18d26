import type { Tick } from '@/domain/models/Tick';

/**
 * 正規化ティックの配信先（インフラ層で実装される）。
 */
export interface TickBroadcaster {
  /**
   * ティックを購読者へ配信する。
   * @param tick 正規化されたティック
   */
  publish(tick: Tick): Promise<void>;
}
