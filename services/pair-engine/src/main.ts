import 'dotenv/config';
import process from 'node:process';
import { createPairEngine } from '@/bootstrap/createPairEngine';
import { loadConfig } from '@/config/AppConfig';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

/**
 * エントリーポイント: 設定の読み込み、依存関係の注入、シグナルハンドリング
 *
 * 注意: WebSocket の挙動や分析ロジックは main.ts から完全に追い出し、ただ「配線するだけ」にする。
 */
async function bootstrap(): Promise<void> {
  const config = loadConfig();
  const logger = LoggerFactory.create();
  const engine = createPairEngine(config, { logger });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info('Received signal', { signal });
    engine.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.fatal('Failed to shut down cleanly', { err: error });
        process.exit(1);
      }
    );
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await engine.start();
}

bootstrap().catch((error: unknown) => {
  LoggerFactory.create().fatal('Failed to bootstrap pair engine', { err: error });
  process.exit(1);
});
