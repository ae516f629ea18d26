/**
 * メトリクスレジストリの最小インターフェース
 * prom-client の Registry 型を抽象化
 */
export interface MetricsRegistry {
  contentType: string;
}

/**
 * メトリクス収集インターフェース
 *
 * 責務: メトリクスの収集・保持・公開を抽象化
 */
export interface MetricsCollector {
  /**
   * 正規化に成功したティック数をカウント
   * @param symbol 銘柄（BTCUSDT など）
   */
  incrementTicksReceived(symbol: string): void;

  /**
   * ブロードキャストしたティック数をカウント
   */
  incrementTicksBroadcast(symbol: string): void;

  /**
   * 永続化した OHLCV 足の本数を加算
   * @param timeframe 時間足（1s, 1m, 5m）
   * @param count 本数
   */
  incrementBarsPersisted(timeframe: string, count: number): void;

  /**
   * エラー数をカウント
   * @param errorType エラータイプ（parse_error, persist_error, broadcast_error, consumer_error, resample_error, backlog_overflow）
   */
  incrementError(errorType: string): void;

  /**
   * 再接続回数をカウント
   */
  incrementReconnect(symbol: string): void;

  /**
   * Prometheus 形式のメトリクス文字列を取得
   */
  getMetrics(): Promise<string>;

  /**
   * メトリクスレジストリを取得（HTTP サーバーで使用）
   */
  getRegistry(): MetricsRegistry;
}
