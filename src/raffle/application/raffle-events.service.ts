import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '../../config/config.service';
import { RedisService } from '../../redis/redis.service';
import { RaffleEvent } from '../domain/raffle-events';

@Injectable()
export class RaffleEventsService {
  private readonly logger = new Logger(RaffleEventsService.name);

  constructor(
    private readonly redisService: RedisService,
    private readonly configService: ConfigService,
  ) {}

  /**
   * Broadcast a committed raffle event. Delivery is best effort: a failed
   * publish is logged and does not affect the operation that emitted it.
   */
  async publish(event: RaffleEvent): Promise<void> {
    this.logger.log(`${event.type} ${JSON.stringify(event)}`);
    try {
      await this.redisService.publish(this.configService.raffleEventsChannel, event);
    } catch (error) {
      this.logger.error(`Failed to publish ${event.type} event:`, error);
    }
  }
}
