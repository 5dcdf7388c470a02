import Redis from 'ioredis';
import { config } from '../config';

let client: Redis | null = null;

export function createRedisConnection(url: string = config.redisUrl): Redis {
  return new Redis(url, {
    lazyConnect: false,
    maxRetriesPerRequest: null,
    enableReadyCheck: true,
  });
}

/**
 * Shared connection for non-blocking commands (publish, sweeps, health).
 * Blocking pops need their own connection from `createRedisConnection`.
 */
export function getRedis(): Redis {
  if (!client) {
    client = createRedisConnection();
  }
  return client;
}

export async function closeRedis(): Promise<void> {
  if (!client) return;
  const current = client;
  client = null;
  await current.quit();
}
