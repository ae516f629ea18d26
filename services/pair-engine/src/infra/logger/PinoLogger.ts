import pino from 'pino';
import type { Logger } from '@/application/interfaces/Logger';

export interface PinoLoggerOptions {
  level?: string;
  pretty?: boolean;
}

/**
 * pino のインスタンスを生成する。
 *
 * 開発環境では `pino-pretty` を使用して人間可読形式で出力。
 * 本番環境では JSON 形式で出力。
 */
function createPino(options?: PinoLoggerOptions): pino.Logger {
  const level = options?.level ?? process.env.LOG_LEVEL ?? 'info';
  const usePretty = options?.pretty ?? process.env.NODE_ENV !== 'production';

  if (usePretty) {
    return pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
        },
      },
    });
  }
  return pino({ level });
}

/**
 * pino を使用したロガー実装
 *
 * child() で作成した子ロガーも同じクラスでラップする。
 */
export class PinoLogger implements Logger {
  private readonly pinoLogger: pino.Logger;

  constructor(options?: PinoLoggerOptions | pino.Logger) {
    this.pinoLogger = isPinoLogger(options) ? options : createPino(options);
  }

  debug(msg: string, meta?: object): void {
    this.pinoLogger.debug(meta ?? {}, msg);
  }

  info(msg: string, meta?: object): void {
    this.pinoLogger.info(meta ?? {}, msg);
  }

  warn(msg: string, meta?: object): void {
    this.pinoLogger.warn(meta ?? {}, msg);
  }

  error(msg: string, meta?: object): void {
    this.pinoLogger.error(meta ?? {}, msg);
  }

  fatal(msg: string, meta?: object): void {
    this.pinoLogger.fatal(meta ?? {}, msg);
  }

  child(bindings: object): Logger {
    return new PinoLogger(this.pinoLogger.child(bindings));
  }
}

function isPinoLogger(value: PinoLoggerOptions | pino.Logger | undefined): value is pino.Logger {
  return value !== undefined && 'child' in value && typeof value.child === 'function';
}
