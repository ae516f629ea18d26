export const DEFAULT_RECONNECT_DELAY_MS = 2000;

/**
 * インフラ層: 再接続の待ち時間を決める戦略
 */
export interface BackoffStrategy {
  /**
   * 次の再接続までの遅延時間（ミリ秒）を取得する。
   */
  getNextDelay(): number;

  /**
   * 接続成功時に呼び出される。
   */
  reset(): void;
}

/**
 * 固定間隔で再試行する戦略。失敗回数によらず常に同じ遅延を返す。
 */
export class FixedBackoffStrategy implements BackoffStrategy {
  constructor(private readonly delayMs: number = DEFAULT_RECONNECT_DELAY_MS) {
    if (!Number.isFinite(delayMs) || delayMs < 0) {
      throw new RangeError(`Reconnect delay must be a non-negative number: ${delayMs}`);
    }
  }

  getNextDelay(): number {
    return this.delayMs;
  }

  reset(): void {
    // 固定間隔なので状態を持たない
  }
}
