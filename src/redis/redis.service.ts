import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import Redis from 'ioredis';
import { ConfigService } from '../config/config.service';

// Deletes the key only while it still holds the caller's token.
const RELEASE_LOCK_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
end
return 0
`;

@Injectable()
export class RedisService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(RedisService.name);
  private client: Redis | null = null;

  constructor(private readonly configService: ConfigService) {}

  onModuleInit() {
    const url = this.configService.redisUrl;

    if (!url) {
      throw new Error('REDIS_URL environment variable is not set');
    }

    this.client = new Redis(url, {
      lazyConnect: true,
      retryStrategy: (times) => Math.min(times * 500, 5000),
      maxRetriesPerRequest: 3,
      enableReadyCheck: true,
      keepAlive: 30000,
      connectTimeout: 10000,
      reconnectOnError: (err) => {
        const targetErrors = ['ECONNRESET', 'ETIMEDOUT', 'EPIPE', 'ECONNREFUSED'];
        return targetErrors.some((e) => err.message.includes(e));
      },
    });

    this.client.on('connect', () => this.logger.log('Redis connected'));
    this.client.on('reconnecting', (ms: number) =>
      this.logger.warn(`Redis reconnecting in ${ms}ms`),
    );
    this.client.on('error', (err) => {
      if (err.message?.includes('ECONNRESET')) {
        this.logger.warn('Redis ECONNRESET — will reconnect automatically');
      } else {
        this.logger.error('Redis error:', err);
      }
    });
  }

  onModuleDestroy() {
    this.client?.disconnect();
  }

  private get redis(): Redis {
    if (!this.client) {
      throw new Error('Redis client used before module initialization');
    }
    return this.client;
  }

  /**
   * Take a lock owned by `token` that expires after `ttlMs`
   */
  async acquireLock(key: string, token: string, ttlMs: number): Promise<boolean> {
    const result = await this.redis.set(key, token, 'PX', ttlMs, 'NX');
    return result === 'OK';
  }

  /**
   * Release a lock, unless it expired and someone else took it
   */
  async releaseLock(key: string, token: string): Promise<boolean> {
    const result = await this.redis.eval(RELEASE_LOCK_SCRIPT, 1, key, token);
    return result === 1;
  }

  /**
   * Publish a JSON-serialised message on a pub/sub channel
   */
  async publish(channel: string, message: unknown): Promise<void> {
    await this.redis.publish(channel, JSON.stringify(message));
  }
}
