import type { TickSink } from '@/domain/models/Tick';

/**
 * ティック供給元（取引所コネクタ）の契約。
 */
export interface TickSource {
  /**
   * 銘柄ごとにストリームを張り、受信したティックを sink に渡し続ける。
   * 初回の接続試行が終わった時点で解決される（接続失敗は内部で再試行される）。
   */
  run(symbols: Iterable<string>, sink: TickSink): Promise<void>;

  /**
   * 全ストリームを停止する。処理中のティックは sink まで流れ切ってから解決される。
   */
  stop(): Promise<void>;
}
