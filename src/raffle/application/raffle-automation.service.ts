import { Injectable, Logger } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { ConfigService } from '../../config/config.service';
import { RaffleService } from './raffle.service';

/**
 * In-process keeper, enabled with RAFFLE_AUTOMATION_ENABLED=true. Any
 * deployment may instead drive GET/POST /raffle/upkeep from outside.
 */
@Injectable()
export class RaffleAutomationService {
  private readonly logger = new Logger(RaffleAutomationService.name);

  constructor(
    private readonly raffleService: RaffleService,
    private readonly configService: ConfigService,
  ) {}

  @Cron(CronExpression.EVERY_10_SECONDS)
  async handleUpkeep() {
    if (!this.configService.automationEnabled) {
      return;
    }

    try {
      const check = await this.raffleService.checkUpkeep();
      if (!check.upkeepNeeded) {
        this.logger.debug(
          `Upkeep not needed (time: ${check.timeHasPassed}, open: ${check.isOpen}, players: ${check.hasPlayers})`,
        );
        return;
      }

      const { requestId } = await this.raffleService.performUpkeep();
      this.logger.log(`Automatic draw requested: #${requestId}`);
    } catch (error) {
      this.logger.error('Error performing automatic upkeep:', error);
    }
  }
}
