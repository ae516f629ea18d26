import type { Tick } from '@/domain/models/Tick';

/**
 * チャネルから取り出したティックの配送先。
 */
export interface TickConsumer {
  /** ログ・メトリクス用の名前 */
  readonly name: string;
  consume(tick: Tick): void | Promise<void>;
}
