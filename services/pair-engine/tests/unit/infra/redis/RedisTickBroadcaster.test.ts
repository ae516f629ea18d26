import { makeTick, T0 } from '@test/unit/helpers/fixtures/market';
import { MetricsCollectorMock } from '@test/unit/helpers/mocks/MetricsCollectorMock';
import { RedisMock } from '@test/unit/helpers/mocks/RedisMock';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { DEFAULT_STREAM_MAX_LEN, RedisTickBroadcaster, TICK_STREAM } from '@/infra/redis/RedisTickBroadcaster';

vi.mock('ioredis', async () => {
  const { RedisMock } = await import('@test/unit/helpers/mocks/RedisMock');
  return { default: RedisMock };
});

/**
 * 単体テスト: RedisTickBroadcaster
 *
 * - XADD の引数（ストリーム名・近似トリム・フィールド）
 * - Redis エラー時の計上と伝播
 * - close() の動作
 */
describe('RedisTickBroadcaster', () => {
  let broadcaster: RedisTickBroadcaster;
  let redis: RedisMock;
  let metricsMock: MetricsCollectorMock;

  beforeEach(() => {
    RedisMock.reset();
    metricsMock = new MetricsCollectorMock();
    broadcaster = new RedisTickBroadcaster('redis://localhost:6379/0', { metricsCollector: metricsMock });
    redis = RedisMock.latest();
  });

  describe('publish()', () => {
    it('md:tick に MAXLEN ~ 付きで XADD する', async () => {
      await broadcaster.publish(makeTick({ price: 42000.5, quantity: 0.013 }));

      expect(TICK_STREAM).toBe('md:tick');
      expect(redis.xadd).toHaveBeenCalledWith(
        'md:tick',
        'MAXLEN',
        '~',
        DEFAULT_STREAM_MAX_LEN,
        '*',
        'symbol',
        'BTCUSDT',
        'price',
        '42000.5',
        'quantity',
        '0.013',
        'ts',
        '1704067200000'
      );
      expect(metricsMock.incrementTicksBroadcast).toHaveBeenCalledWith('BTCUSDT');
    });

    it('ストリーム名と上限を上書きできる', async () => {
      const custom = new RedisTickBroadcaster('redis://localhost:6379/1', { stream: 'md:test', maxLen: 50 });
      const client = RedisMock.latest();

      await custom.publish(makeTick({ symbol: 'ETHUSDT', timestamp: T0 + 1 }));

      expect(client.streams.get('md:test')).toEqual([
        { id: '1-0', fields: ['symbol', 'ETHUSDT', 'price', '100', 'quantity', '1', 'ts', '1704067200001'] },
      ]);
      expect(client.xadd.mock.calls[0].slice(1, 4)).toEqual(['MAXLEN', '~', 50]);
    });

    it('接続済みのクライアントを共有できる', async () => {
      const shared = new RedisMock();
      const withClient = new RedisTickBroadcaster(shared as unknown as ConstructorParameters<typeof RedisTickBroadcaster>[0]);

      await withClient.publish(makeTick());

      expect(shared.xadd).toHaveBeenCalledTimes(1);
      expect(RedisMock.instances).toHaveLength(2);
    });

    it('XADD が失敗した場合、broadcast_error を計上してエラーが伝播する', async () => {
      redis.xadd.mockRejectedValueOnce(new Error('ECONNREFUSED'));

      await expect(broadcaster.publish(makeTick())).rejects.toThrow('ECONNREFUSED');
      expect(metricsMock.incrementError).toHaveBeenCalledWith('broadcast_error');
      expect(metricsMock.incrementTicksBroadcast).not.toHaveBeenCalled();
    });
  });

  describe('close()', () => {
    it('Redis 接続を閉じる', async () => {
      await broadcaster.close();

      expect(redis.quit).toHaveBeenCalledTimes(1);
    });

    it('close() のエラーは伝播する', async () => {
      redis.quit.mockRejectedValueOnce(new Error('Failed to close connection'));

      await expect(broadcaster.close()).rejects.toThrow('Failed to close connection');
    });
  });
});
