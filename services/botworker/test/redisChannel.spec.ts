import { Readable } from 'node:stream';
import type Redis from 'ioredis';
import { describe, expect, it, vi } from 'vitest';
import { RedisCompletionBroadcaster } from '../src/redis/broadcast';
import { RedisMessageChannel } from '../src/redis/channel';

type ExecResult = Array<[Error | null, unknown]> | null;

function fakeRedis(execResult: ExecResult = [[null, 1]]) {
  const multi = {
    rpush: vi.fn(() => multi),
    expire: vi.fn(() => multi),
    exec: vi.fn(async () => execResult),
  };
  const redis = {
    multi: vi.fn(() => multi),
    blpop: vi.fn(async (): Promise<[string, string] | null> => null),
    scanStream: vi.fn(() => Readable.from([['browser-bots-a', 'browser-bots-b'], [], ['browser-bots-c']])),
    del: vi.fn(async (...keys: string[]) => keys.length),
    ping: vi.fn(async () => 'PONG'),
    publish: vi.fn(async () => 1),
  };
  return { redis, multi, client: redis as unknown as Redis };
}

describe('RedisMessageChannel', () => {
  it('pushes and sets the expiry in one transaction', async () => {
    const { client, multi } = fakeRedis([
      [null, 1],
      [null, 1],
    ]);

    await new RedisMessageChannel(client).push('browser-bots-ping-abc', '{"ok":true}', { ttlSeconds: 60 });

    expect(multi.rpush).toHaveBeenCalledWith('browser-bots-ping-abc', '{"ok":true}');
    expect(multi.expire).toHaveBeenCalledWith('browser-bots-ping-abc', 60);
    expect(multi.exec).toHaveBeenCalledTimes(1);
  });

  it('leaves request channels without an expiry', async () => {
    const { client, multi } = fakeRedis();

    await new RedisMessageChannel(client).push('browser-bots-a', '{}');

    expect(multi.rpush).toHaveBeenCalledWith('browser-bots-a', '{}');
    expect(multi.expire).not.toHaveBeenCalled();
  });

  it('rounds fractional expiries up to whole seconds', async () => {
    const { client, multi } = fakeRedis();

    await new RedisMessageChannel(client).push('k', 'v', { ttlSeconds: 0.5 });

    expect(multi.expire).toHaveBeenCalledWith('k', 1);
  });

  it('throws the first failed command of the transaction', async () => {
    const { client } = fakeRedis([
      [null, 1],
      [new Error('WRONGTYPE Operation against a key'), null],
    ]);

    await expect(new RedisMessageChannel(client).push('k', 'v', { ttlSeconds: 5 })).rejects.toThrow('WRONGTYPE');
  });

  it('pops across every listened key with one blocking call', async () => {
    const { client, redis } = fakeRedis();
    redis.blpop.mockResolvedValueOnce(['browser-bots-b', '{"command":"ping"}']);
    const channel = new RedisMessageChannel(client);

    const popped = await channel.popBlocking(['browser-bots-a', 'browser-bots-b'], 3);

    expect(redis.blpop).toHaveBeenCalledWith(['browser-bots-a', 'browser-bots-b'], 3);
    expect(popped).toEqual({ key: 'browser-bots-b', value: '{"command":"ping"}' });
  });

  it('returns null when the pop times out', async () => {
    const { client } = fakeRedis();
    await expect(new RedisMessageChannel(client).popBlocking(['browser-bots-a'], 0.1)).resolves.toBeNull();
  });

  it('deletes every key the scan matches, batch by batch', async () => {
    const { client, redis } = fakeRedis();

    const deleted = await new RedisMessageChannel(client).deleteMatching('browser-bots-[abc]');

    expect(redis.scanStream).toHaveBeenCalledWith({ match: 'browser-bots-[abc]', count: 100 });
    expect(redis.del).toHaveBeenCalledTimes(2);
    expect(redis.del).toHaveBeenNthCalledWith(1, 'browser-bots-a', 'browser-bots-b');
    expect(redis.del).toHaveBeenNthCalledWith(2, 'browser-bots-c');
    expect(deleted).toBe(3);
  });

  it('pings through the connection', async () => {
    const { client, redis } = fakeRedis();
    redis.ping.mockRejectedValueOnce(new Error('Connection is closed.'));

    await expect(new RedisMessageChannel(client).ping()).rejects.toThrow('Connection is closed.');
  });
});

describe('RedisCompletionBroadcaster', () => {
  it('publishes the message on the group channel', async () => {
    const { client, redis } = fakeRedis();

    await new RedisCompletionBroadcaster(client).broadcast('browser-bots-client-sess1', '{"text":"abc123"}');

    expect(redis.publish).toHaveBeenCalledWith('browser-bots-client-sess1', '{"text":"abc123"}');
  });
});
