import { ConfigError } from '@/domain/errors/PairEngineError';

type Env = Readonly<Record<string, string | undefined>>;

/**
 * 起動時に環境変数から読み込む設定値
 */
export interface AppConfig {
  /** 購読する銘柄（大文字、重複なし） */
  symbols: string[];
  redisUrl: string;
  wsBaseUrl: string;
  bufferCapacity: number;
  persistTail: number;
  resampleIntervalMs: number;
  reconnectDelayMs: number;
  channelCapacity: number;
  defaultWindow: number;
  /** 未設定の場合はメトリクスサーバーを起動しない */
  metricsPort: number | null;
  logLevel: string;
  nodeEnv: string;
}

/**
 * 必須環境変数を取得する。未設定の場合はエラーを投げる。
 * @throws {ConfigError} 環境変数が未設定の場合
 */
function requireEnv(env: Env, key: string): string {
  const value = env[key]?.trim();
  if (!value) {
    throw new ConfigError(`Missing required environment variable: ${key}`);
  }
  return value;
}

/**
 * 整数の環境変数を読む。未設定・空文字の場合は fallback。
 * @throws {ConfigError} 整数でない、または min 未満の場合
 */
function intEnv(env: Env, key: string, fallback: number, min: number): number {
  const raw = env[key]?.trim();
  if (!raw) {
    return fallback;
  }
  const value = Number(raw);
  if (!/^-?\d+$/.test(raw) || !Number.isSafeInteger(value)) {
    throw new ConfigError(`Environment variable ${key} must be an integer: ${raw}`);
  }
  if (value < min) {
    throw new ConfigError(`Environment variable ${key} must be >= ${min}: ${raw}`);
  }
  return value;
}

function parseSymbols(raw: string): string[] {
  const symbols = raw
    .split(',')
    .map((symbol) => symbol.trim().toUpperCase())
    .filter(Boolean);
  if (symbols.length === 0) {
    throw new ConfigError('SYMBOLS must contain at least one symbol');
  }
  return [...new Set(symbols)];
}

/**
 * 環境変数から設定を組み立てる。
 * @throws {ConfigError} 必須項目の欠落・数値の不正
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const metricsPortRaw = env.METRICS_PORT?.trim();

  return {
    symbols: parseSymbols(requireEnv(env, 'SYMBOLS')),
    redisUrl: requireEnv(env, 'REDIS_URL'),
    wsBaseUrl: env.WS_BASE_URL?.trim() || 'wss://fstream.binance.com/ws',
    bufferCapacity: intEnv(env, 'BUFFER_CAPACITY', 10_000, 1),
    persistTail: intEnv(env, 'PERSIST_TAIL', 100, 0),
    resampleIntervalMs: intEnv(env, 'RESAMPLE_INTERVAL_MS', 1000, 1),
    reconnectDelayMs: intEnv(env, 'RECONNECT_DELAY_MS', 2000, 0),
    channelCapacity: intEnv(env, 'CHANNEL_CAPACITY', 1000, 1),
    defaultWindow: intEnv(env, 'DEFAULT_WINDOW', 20, 2),
    metricsPort: metricsPortRaw ? intEnv(env, 'METRICS_PORT', 0, 1) : null,
    logLevel: env.LOG_LEVEL?.trim() || 'info',
    nodeEnv: env.NODE_ENV?.trim() || 'development',
  };
}
