import { makeTick } from '@test/unit/helpers/fixtures/market';
import { describe, expect, it } from 'vitest';
import { TickChannel } from '@/application/channel/TickChannel';
import { ChannelClosedError } from '@/domain/errors/PairEngineError';

/**
 * 単体テスト: TickChannel
 *
 * - FIFO の順序保証
 * - 満杯時の背圧（送信側の待機）
 * - クローズ時の挙動
 */
describe('TickChannel', () => {
  const a = makeTick({ price: 1 });
  const b = makeTick({ price: 2 });
  const c = makeTick({ price: 3 });

  it('空きがあれば send は即座に積み、receive は積んだ順に返す', async () => {
    const channel = new TickChannel(10);

    await channel.send(a);
    await channel.send(b);

    expect(channel.size).toBe(2);
    expect(await channel.receive()).toBe(a);
    expect(await channel.receive()).toBe(b);
    expect(channel.size).toBe(0);
  });

  it('満杯の場合、send は空きができるまで待つ', async () => {
    const channel = new TickChannel(1);
    await channel.send(a);

    let admitted = false;
    const pending = channel.send(b).then(() => {
      admitted = true;
    });
    await Promise.resolve();
    expect(admitted).toBe(false);
    expect(channel.size).toBe(1);

    expect(await channel.receive()).toBe(a);
    await pending;
    expect(admitted).toBe(true);
    expect(await channel.receive()).toBe(b);
  });

  it('待機中の send は到着順に受け入れられる', async () => {
    const channel = new TickChannel(1);
    await channel.send(a);
    const pendingB = channel.send(b);
    const pendingC = channel.send(c);

    const received = [await channel.receive()];
    await pendingB;
    received.push(await channel.receive());
    await pendingC;
    received.push(await channel.receive());

    expect(received).toEqual([a, b, c]);
  });

  it('空のときの receive は次の send で解決される', async () => {
    const channel = new TickChannel(1);

    const receiving = channel.receive();
    await channel.send(a);

    expect(await receiving).toBe(a);
    expect(channel.size).toBe(0);
  });

  it('close() 後も積まれたティックは取り出せ、空になると null を返す', async () => {
    const channel = new TickChannel(1);
    await channel.send(a);
    const pending = channel.send(b);

    channel.close();
    await pending;

    expect(channel.isClosed).toBe(true);
    expect(await channel.receive()).toBe(a);
    expect(await channel.receive()).toBe(b);
    expect(await channel.receive()).toBeNull();
  });

  it('close() は待機中の receive を null で起こす', async () => {
    const channel = new TickChannel(1);

    const receiving = channel.receive();
    channel.close();

    expect(await receiving).toBeNull();
  });

  it('close() 後の send は ChannelClosedError で reject される', async () => {
    const channel = new TickChannel(1);
    channel.close();

    await expect(channel.send(a)).rejects.toBeInstanceOf(ChannelClosedError);
  });

  it('容量が正の整数でなければ RangeError', () => {
    expect(() => new TickChannel(0)).toThrow(RangeError);
    expect(() => new TickChannel(1.5)).toThrow(RangeError);
  });
});
