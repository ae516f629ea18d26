import { makeBars, T0 } from '@test/unit/helpers/fixtures/market';
import { LoggerMock } from '@test/unit/helpers/mocks/LoggerMock';
import { RedisMock } from '@test/unit/helpers/mocks/RedisMock';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { OhlcvBar } from '@/domain/models/OhlcvBar';
import { barKey, RedisBarRepository } from '@/infra/redis/RedisBarRepository';

vi.mock('ioredis', async () => {
  const { RedisMock } = await import('@test/unit/helpers/mocks/RedisMock');
  return { default: RedisMock };
});

const BAR: OhlcvBar = {
  symbol: 'BTCUSDT',
  timeframe: '1m',
  timestamp: T0,
  open: 100,
  high: 110,
  low: 95,
  close: 105,
  volume: 2.5,
};

/**
 * 単体テスト: RedisBarRepository
 *
 * - HSET による upsert（フィールドはバケット開始時刻の ISO-8601）
 * - HGET / HGETALL による読み出し
 * - 壊れた行の扱い
 */
describe('RedisBarRepository', () => {
  let repository: RedisBarRepository;
  let redis: RedisMock;
  let loggerMock: LoggerMock;

  beforeEach(() => {
    RedisMock.reset();
    loggerMock = new LoggerMock();
    repository = new RedisBarRepository('redis://localhost:6379/0', loggerMock);
    redis = RedisMock.latest();
  });

  it('URL から Redis クライアントを作る', () => {
    expect(redis.url).toBe('redis://localhost:6379/0');
  });

  describe('barKey()', () => {
    it('ohlcv:<symbol>:<timeframe>', () => {
      expect(barKey('ETHUSDT', '5m')).toBe('ohlcv:ETHUSDT:5m');
    });
  });

  describe('upsertBars()', () => {
    it('ISO-8601 のフィールドに JSON 行を書き込む', async () => {
      await repository.upsertBars([BAR]);

      expect(redis.hset).toHaveBeenCalledWith('ohlcv:BTCUSDT:1m', {
        '2024-01-01T00:00:00.000Z':
          '{"symbol":"BTCUSDT","timeframe":"1m","timestamp":"2024-01-01T00:00:00.000Z","open":100,"high":110,"low":95,"close":105,"volume":2.5}',
      });
    });

    it('同じキーの足はまとめて 1 回の HSET にする', async () => {
      await repository.upsertBars([...makeBars('BTCUSDT', [1, 2, 3]), ...makeBars('ETHUSDT', [4])]);

      expect(redis.hset).toHaveBeenCalledTimes(2);
      expect(redis.hashes.get('ohlcv:BTCUSDT:1m')?.size).toBe(3);
      expect(redis.hashes.get('ohlcv:ETHUSDT:1m')?.size).toBe(1);
    });

    it('同じバケットへの書き込みは上書きされる', async () => {
      await repository.upsertBars([BAR]);
      await repository.upsertBars([{ ...BAR, close: 120, high: 120 }]);

      expect(await repository.findBars('BTCUSDT', '1m', 10)).toEqual([{ ...BAR, close: 120, high: 120 }]);
    });

    it('空配列なら何も書き込まない', async () => {
      await repository.upsertBars([]);

      expect(redis.hset).not.toHaveBeenCalled();
    });

    it('HSET のエラーは伝播する', async () => {
      redis.hset.mockRejectedValueOnce(new Error('Redis connection failed'));

      await expect(repository.upsertBars([BAR])).rejects.toThrow('Redis connection failed');
    });
  });

  describe('findBar()', () => {
    it('バケット開始時刻で 1 本を取得する', async () => {
      await repository.upsertBars([BAR]);

      expect(await repository.findBar('BTCUSDT', '1m', T0)).toEqual(BAR);
      expect(redis.hget).toHaveBeenCalledWith('ohlcv:BTCUSDT:1m', '2024-01-01T00:00:00.000Z');
    });

    it('存在しなければ null', async () => {
      expect(await repository.findBar('BTCUSDT', '1m', T0)).toBeNull();
    });
  });

  describe('findBars()', () => {
    it('古い順に並べ、直近 limit 本を返す', async () => {
      const bars = makeBars('BTCUSDT', [1, 2, 3, 4]);
      await repository.upsertBars([bars[2], bars[0], bars[3], bars[1]]);

      expect(await repository.findBars('BTCUSDT', '1m', 2)).toEqual([bars[2], bars[3]]);
      expect(await repository.findBars('BTCUSDT', '1m', 100)).toEqual(bars);
    });

    it('limit <= 0 なら Redis に問い合わせず空配列', async () => {
      expect(await repository.findBars('BTCUSDT', '1m', 0)).toEqual([]);
      expect(redis.hgetall).not.toHaveBeenCalled();
    });

    it('壊れた行は警告ログを出して読み飛ばす', async () => {
      await repository.upsertBars([BAR]);
      const hash = redis.hashes.get('ohlcv:BTCUSDT:1m');
      hash?.set('broken-json', '{not json');
      hash?.set('wrong-shape', '{"symbol":"BTCUSDT"}');
      hash?.set(
        'bad-timeframe',
        '{"symbol":"BTCUSDT","timeframe":"1h","timestamp":"2024-01-01T00:00:00.000Z","open":1,"high":1,"low":1,"close":1,"volume":1}'
      );
      hash?.set(
        'bad-timestamp',
        '{"symbol":"BTCUSDT","timeframe":"1m","timestamp":"yesterday","open":1,"high":1,"low":1,"close":1,"volume":1}'
      );

      expect(await repository.findBars('BTCUSDT', '1m', 10)).toEqual([BAR]);
      expect(loggerMock.warn).toHaveBeenCalledWith('Corrupted bar row', { err: expect.any(SyntaxError) });
      expect(loggerMock.warn).toHaveBeenCalledWith('Unexpected bar row shape', { raw: '{"symbol":"BTCUSDT"}' });
      expect(loggerMock.warn).toHaveBeenCalledWith('Unexpected bar timestamp', {
        raw: '{"symbol":"BTCUSDT","timeframe":"1m","timestamp":"yesterday","open":1,"high":1,"low":1,"close":1,"volume":1}',
      });
      expect(loggerMock.warn).toHaveBeenCalledTimes(4);
    });
  });

  describe('close()', () => {
    it('Redis 接続を閉じる', async () => {
      await repository.close();

      expect(redis.quit).toHaveBeenCalledTimes(1);
    });
  });
});
