import type Redis from 'ioredis';
import type { CompletionBroadcaster } from '../contracts/channel';

export class RedisCompletionBroadcaster implements CompletionBroadcaster {
  constructor(private readonly redis: Redis) {}

  async broadcast(group: string, message: string): Promise<void> {
    await this.redis.publish(group, message);
  }
}
