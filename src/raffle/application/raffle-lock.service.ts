import { Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { setTimeout as sleep } from 'timers/promises';
import { ConfigService } from '../../config/config.service';
import { RedisService } from '../../redis/redis.service';
import { RaffleBusyException } from '../domain/raffle.errors';

const RAFFLE_LOCK_KEY = 'raffle:lock';
const RETRY_DELAY_MS = 50;

/**
 * Serializes raffle operations across every instance of the service.
 */
@Injectable()
export class RaffleLockService {
  private readonly logger = new Logger(RaffleLockService.name);

  constructor(
    private readonly redisService: RedisService,
    private readonly configService: ConfigService,
  ) {}

  async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const token = randomUUID();
    const deadline = Date.now() + this.configService.raffleLockWaitMs;

    while (!(await this.redisService.acquireLock(RAFFLE_LOCK_KEY, token, this.configService.raffleLockTtlMs))) {
      if (Date.now() >= deadline) {
        throw new RaffleBusyException();
      }
      await sleep(RETRY_DELAY_MS);
    }

    try {
      return await task();
    } finally {
      const released = await this.redisService.releaseLock(RAFFLE_LOCK_KEY, token);
      if (!released) {
        this.logger.warn('Raffle lock expired before the operation finished');
      }
    }
  }
}
