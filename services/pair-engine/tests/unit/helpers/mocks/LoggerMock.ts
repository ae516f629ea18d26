import { type Mock, vi } from 'vitest';
import type { Logger } from '@/application/interfaces/Logger';

type LogFn = (msg: string, meta?: object) => void;

/**
 * テスト用ロガーモック
 *
 * vitest の vi.fn() を使用して、ロガーメソッドの呼び出しを記録・検証できるようにする。
 * child() は自分自身を返すので、子ロガー経由のログも同じモックで検証できる。
 */
export class LoggerMock implements Logger {
  debug: Mock<LogFn> = vi.fn<LogFn>();
  info: Mock<LogFn> = vi.fn<LogFn>();
  warn: Mock<LogFn> = vi.fn<LogFn>();
  error: Mock<LogFn> = vi.fn<LogFn>();
  fatal: Mock<LogFn> = vi.fn<LogFn>();
  child: Mock<(bindings: object) => Logger> = vi.fn<(bindings: object) => Logger>(() => this);

  /**
   * すべてのモックをリセットする
   */
  reset(): void {
    this.debug.mockReset();
    this.info.mockReset();
    this.warn.mockReset();
    this.error.mockReset();
    this.fatal.mockReset();
    this.child.mockReset();
    this.child.mockImplementation(() => this);
  }
}
