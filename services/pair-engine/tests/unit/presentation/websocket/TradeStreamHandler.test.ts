import { T0, tradeMessage } from '@test/unit/helpers/fixtures/market';
import { LoggerMock } from '@test/unit/helpers/mocks/LoggerMock';
import { MarketDataAdapterMock } from '@test/unit/helpers/mocks/MarketDataAdapterMock';
import { MetricsCollectorMock } from '@test/unit/helpers/mocks/MetricsCollectorMock';
import { afterEach, beforeEach, describe, expect, it, type Mock, vi } from 'vitest';
import { IngestTickUsecase } from '@/application/usecases/IngestTickUsecase';
import { ChannelClosedError } from '@/domain/errors/PairEngineError';
import type { Tick } from '@/domain/models/Tick';
import { BinanceMessageParser } from '@/infra/adapters/binance/BinanceMessageParser';
import { FixedBackoffStrategy } from '@/infra/reconnect/BackoffStrategy';
import {
  DEFAULT_BACKLOG_HIGH_WATER_MARK,
  DEFAULT_MAX_BACKLOG,
  TradeStreamHandler,
} from '@/presentation/websocket/TradeStreamHandler';

/**
 * 単体テスト: TradeStreamHandler
 *
 * - 接続開始と再接続（close 起点）
 * - 受信メッセージの逐次処理
 * - stop() 後の振る舞い
 * - 処理待ちの上限と受信の一時停止
 */
describe('TradeStreamHandler', () => {
  let adapter: MarketDataAdapterMock;
  let sink: Mock<(tick: Tick) => Promise<void>>;
  let loggerMock: LoggerMock;
  let metricsMock: MetricsCollectorMock;
  let handler: TradeStreamHandler;

  beforeEach(() => {
    adapter = new MarketDataAdapterMock('BTCUSDT');
    sink = vi.fn<(tick: Tick) => Promise<void>>(async () => undefined);
    loggerMock = new LoggerMock();
    metricsMock = new MetricsCollectorMock();
    const usecase = new IngestTickUsecase(new BinanceMessageParser(), sink, loggerMock, metricsMock);
    handler = new TradeStreamHandler('BTCUSDT', adapter, usecase, {
      logger: loggerMock,
      metricsCollector: metricsMock,
      backoff: new FixedBackoffStrategy(100),
    });
  });

  afterEach(() => {
    handler.stop();
    vi.useRealTimers();
  });

  describe('start()', () => {
    it('アダプタに接続する', async () => {
      await handler.start();

      expect(adapter.connect).toHaveBeenCalledTimes(1);
      expect(loggerMock.child).toHaveBeenCalledWith({ component: 'TradeStreamHandler', symbol: 'BTCUSDT' });
    });

    it('接続に失敗しても reject せず、再接続する', async () => {
      vi.useFakeTimers();
      adapter.connect.mockRejectedValueOnce(new Error('WebSocket connection failed: ECONNREFUSED'));

      await handler.start();
      await vi.advanceTimersByTimeAsync(100);

      expect(adapter.connect).toHaveBeenCalledTimes(2);
      expect(metricsMock.incrementReconnect).toHaveBeenCalledWith('BTCUSDT');
    });

    it('接続中に stop() された場合は張った接続を閉じる', async () => {
      let finishConnect: () => void = () => undefined;
      adapter.connect.mockImplementationOnce(
        () =>
          new Promise<void>((resolve) => {
            finishConnect = resolve;
          })
      );

      const starting = handler.start();
      handler.stop();
      finishConnect();
      await starting;

      expect(adapter.disconnect).toHaveBeenCalledTimes(2);
    });
  });

  describe('再接続', () => {
    it('close を受けると再接続をスケジュールする', async () => {
      vi.useFakeTimers();
      await handler.start();

      adapter.emitClose();
      await vi.advanceTimersByTimeAsync(100);

      expect(adapter.connect).toHaveBeenCalledTimes(2);
    });

    it('error だけでは再接続しない', async () => {
      vi.useFakeTimers();
      await handler.start();
      const error = new Error('boom');

      adapter.emitError(error);
      await vi.advanceTimersByTimeAsync(1000);

      expect(adapter.connect).toHaveBeenCalledTimes(1);
      expect(loggerMock.debug).toHaveBeenCalledWith('stream error, waiting for close', { err: error });
    });

    it('stop() 後の close では再接続しない', async () => {
      vi.useFakeTimers();
      await handler.start();

      handler.stop();
      adapter.emitClose();
      await vi.advanceTimersByTimeAsync(1000);

      expect(adapter.connect).toHaveBeenCalledTimes(1);
      expect(adapter.disconnect).toHaveBeenCalledTimes(1);
    });
  });

  describe('メッセージ処理', () => {
    it('受信順にティックを sink へ渡す', async () => {
      let releaseFirst: () => void = () => undefined;
      sink.mockImplementationOnce(
        () =>
          new Promise<void>((resolve) => {
            releaseFirst = resolve;
          })
      );
      await handler.start();

      adapter.emitMessage(tradeMessage('BTCUSDT', T0, '100', '1'));
      adapter.emitMessage(tradeMessage('BTCUSDT', T0 + 1, '101', '2'));
      await vi.waitFor(() => expect(sink).toHaveBeenCalledTimes(1));
      releaseFirst();
      await handler.drain();

      expect(sink.mock.calls.map(([tick]) => tick)).toEqual([
        { symbol: 'BTCUSDT', timestamp: T0, price: 100, quantity: 1 },
        { symbol: 'BTCUSDT', timestamp: T0 + 1, price: 101, quantity: 2 },
      ]);
      expect(metricsMock.incrementTicksReceived).toHaveBeenCalledTimes(2);
    });

    it('JSON でないメッセージは parse_error として数えて捨てる', async () => {
      await handler.handleMessage('not json');

      expect(metricsMock.incrementError).toHaveBeenCalledWith('parse_error');
      expect(sink).not.toHaveBeenCalled();
    });

    it('約定以外のメッセージは捨てる', async () => {
      await handler.handleMessage('{"result":null,"id":1}');

      expect(metricsMock.incrementError).toHaveBeenCalledWith('parse_error');
      expect(sink).not.toHaveBeenCalled();
    });

    it('チャネルが閉じた後のティックは debug ログで捨てる', async () => {
      sink.mockRejectedValueOnce(new ChannelClosedError());

      await handler.handleMessage(tradeMessage('BTCUSDT', T0, '100', '1'));

      expect(loggerMock.debug).toHaveBeenCalledWith('tick dropped after shutdown');
      expect(loggerMock.error).not.toHaveBeenCalled();
    });

    it('その他の失敗はエラーログを出して次のメッセージへ進む', async () => {
      const error = new Error('unexpected');
      sink.mockRejectedValueOnce(error);
      await handler.start();

      adapter.emitMessage(tradeMessage('BTCUSDT', T0, '100', '1'));
      adapter.emitMessage(tradeMessage('BTCUSDT', T0 + 1, '101', '1'));
      await handler.drain();

      expect(loggerMock.error).toHaveBeenCalledWith('Failed to ingest message', { err: error });
      expect(sink).toHaveBeenCalledTimes(2);
    });

    it('stop() 後に届いたメッセージは処理しない', async () => {
      await handler.start();
      handler.stop();

      adapter.emitMessage(tradeMessage('BTCUSDT', T0, '100', '1'));
      await handler.handleMessage(tradeMessage('BTCUSDT', T0, '100', '1'));
      await handler.drain();

      expect(sink).not.toHaveBeenCalled();
    });
  });

  describe('バックプレッシャー', () => {
    it('sink が詰まったままでも処理待ちは上限で止まり、超えた分は backlog_overflow として捨てる', async () => {
      sink.mockImplementation(() => new Promise<void>(() => undefined));
      await handler.start();

      for (let i = 0; i < 5000; i++) {
        adapter.emitMessage(tradeMessage('BTCUSDT', T0 + i, '100', '1'));
      }
      await vi.waitFor(() => expect(sink).toHaveBeenCalledTimes(1));

      expect(handler.backlog).toBe(DEFAULT_MAX_BACKLOG);
      expect(adapter.pause).toHaveBeenCalledTimes(1);
      expect(loggerMock.warn).toHaveBeenCalledWith('backlog full, pausing stream', {
        backlog: DEFAULT_BACKLOG_HIGH_WATER_MARK,
      });
      const overflows = metricsMock.incrementError.mock.calls.filter(([type]) => type === 'backlog_overflow');
      expect(overflows).toHaveLength(5000 - DEFAULT_MAX_BACKLOG);
      expect(sink).toHaveBeenCalledTimes(1);
    });

    it('処理待ちが半分まで減ると受信を再開する', async () => {
      let release: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      sink.mockImplementation(() => gate);
      const usecase = new IngestTickUsecase(new BinanceMessageParser(), sink, loggerMock, metricsMock);
      const small = new TradeStreamHandler('BTCUSDT', adapter, usecase, {
        logger: loggerMock,
        metricsCollector: metricsMock,
        highWaterMark: 4,
        maxBacklog: 8,
      });

      for (let i = 0; i < 4; i++) {
        adapter.emitMessage(tradeMessage('BTCUSDT', T0 + i, '100', '1'));
      }
      expect(small.backlog).toBe(4);
      expect(adapter.pause).toHaveBeenCalledTimes(1);
      expect(adapter.resume).not.toHaveBeenCalled();

      release();
      await small.drain();

      expect(small.backlog).toBe(0);
      expect(adapter.resume).toHaveBeenCalledTimes(1);
      expect(loggerMock.info).toHaveBeenCalledWith('backlog drained, resuming stream', { backlog: 2 });
      expect(sink).toHaveBeenCalledTimes(4);
      small.stop();
    });

    it('再接続した接続は受信中から始め、処理待ちが多ければすぐに止め直す', async () => {
      sink.mockImplementation(() => new Promise<void>(() => undefined));
      await handler.start();
      for (let i = 0; i < DEFAULT_BACKLOG_HIGH_WATER_MARK; i++) {
        adapter.emitMessage(tradeMessage('BTCUSDT', T0 + i, '100', '1'));
      }
      expect(adapter.pause).toHaveBeenCalledTimes(1);

      vi.useFakeTimers();
      adapter.emitClose();
      await vi.advanceTimersByTimeAsync(100);

      expect(adapter.connect).toHaveBeenCalledTimes(2);
      expect(adapter.pause).toHaveBeenCalledTimes(2);
    });
  });
});
