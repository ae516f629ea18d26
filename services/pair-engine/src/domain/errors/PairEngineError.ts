/**
 * ドメイン層: アプリケーション共通のエラー基底クラス
 */
export class PairEngineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * 環境変数などの設定値が不正な場合のエラー。起動時にのみ発生する。
 */
export class ConfigError extends PairEngineError {}

/**
 * 呼び出し側のパラメータ不正（コアに到達する前に境界で弾く）。
 */
export class InvalidRequestError extends PairEngineError {}

export class InvalidTimeframeError extends InvalidRequestError {
  constructor(readonly timeframe: string) {
    super(`Invalid timeframe: ${timeframe}`);
  }
}

export class InvalidWindowError extends InvalidRequestError {
  constructor(readonly window: number) {
    super(`Invalid rolling window: ${window} (must be an integer >= 2)`);
  }
}

/**
 * クローズ済みのチャネルへ送信しようとした場合のエラー。
 */
export class ChannelClosedError extends PairEngineError {
  constructor() {
    super('Tick channel is closed');
  }
}
