import { Injectable } from '@nestjs/common';
import { ConfigService } from './config/config.service';
import { RaffleService } from './raffle/application/raffle.service';

@Injectable()
export class AppService {
  constructor(
    private readonly raffleService: RaffleService,
    private readonly configService: ConfigService,
  ) {}

  getHello() {
    return { message: 'Raffle API is running' };
  }

  async getStats() {
    const raffle = await this.raffleService.getRaffle();

    // Earliest moment the next draw may be requested
    const nextDrawAt = new Date((raffle.lastTimestamp + raffle.interval) * 1000);

    return {
      environment: this.configService.nodeEnv,
      coordinatorMode: this.configService.coordinatorMode,
      raffleState: raffle.raffleState,
      numberOfPlayers: raffle.numberOfPlayers,
      pot: raffle.balance,
      recentWinner: raffle.recentWinner,
      nextDrawAt: nextDrawAt.toISOString(),
    };
  }
}
