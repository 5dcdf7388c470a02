import type Redis from 'ioredis';
import type { MessageChannel, PoppedMessage, PushOptions } from '../contracts/channel';
import { createRedisConnection } from './client';

const SCAN_BATCH = 100;

/** `MessageChannel` on Redis lists: RPUSH to enqueue, BLPOP to dequeue. */
export class RedisMessageChannel implements MessageChannel {
  constructor(private readonly redis: Redis) {}

  async push(key: string, value: string, options: PushOptions = {}): Promise<void> {
    const multi = this.redis.multi().rpush(key, value);
    if (options.ttlSeconds && options.ttlSeconds > 0) {
      multi.expire(key, Math.ceil(options.ttlSeconds));
    }
    const results = await multi.exec();
    for (const [err] of results ?? []) {
      if (err) throw err;
    }
  }

  async popBlocking(keys: readonly string[], timeoutSeconds: number): Promise<PoppedMessage | null> {
    const result = await this.redis.blpop([...keys], timeoutSeconds);
    if (!result) return null;
    const [key, value] = result;
    return { key, value };
  }

  async deleteMatching(pattern: string): Promise<number> {
    let deleted = 0;
    const stream = this.redis.scanStream({ match: pattern, count: SCAN_BATCH });
    for await (const batch of stream) {
      if (!Array.isArray(batch)) continue;
      const keys = batch.filter((key): key is string => typeof key === 'string');
      if (keys.length === 0) continue;
      deleted += await this.redis.del(...keys);
    }
    return deleted;
  }

  async ping(): Promise<void> {
    await this.redis.ping();
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}

/** Channel on its own connection, for a listener or a caller that blocks on replies. */
export function createRedisChannel(url?: string): RedisMessageChannel {
  return new RedisMessageChannel(createRedisConnection(url));
}
