import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '../../config/config.service';
import {
  Raffle,
  RAFFLE_CONFIG_KEYS,
  RaffleConfig,
  RaffleState,
  UpkeepCheck,
} from '../domain/raffle.entity';
import { WinnerPayoutFailedException } from '../domain/raffle.errors';
import { RAFFLE_REPOSITORY, RaffleRepository } from '../domain/raffle.repository';
import {
  RANDOMNESS_COORDINATOR,
  RandomnessCoordinator,
} from '../domain/randomness-coordinator';
import { PAYOUT_GATEWAY, PayoutGateway } from '../domain/payout-gateway';
import { RaffleLockService } from './raffle-lock.service';
import { RaffleEventsService } from './raffle-events.service';
import {
  DrawRequestedResponseDto,
  RaffleResponseDto,
  WinnerPickedResponseDto,
} from './dto/raffle-response.dto';

function nowInSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

@Injectable()
export class RaffleService implements OnModuleInit {
  private readonly logger = new Logger(RaffleService.name);

  constructor(
    @Inject(RAFFLE_REPOSITORY)
    private readonly raffleRepository: RaffleRepository,
    @Inject(RANDOMNESS_COORDINATOR)
    private readonly coordinator: RandomnessCoordinator,
    @Inject(PAYOUT_GATEWAY)
    private readonly payoutGateway: PayoutGateway,
    private readonly lockService: RaffleLockService,
    private readonly eventsService: RaffleEventsService,
    private readonly configService: ConfigService,
  ) {}

  async onModuleInit() {
    const raffle = await this.lockService.runExclusive(() => this.loadRaffle());
    this.warnOnConfigDrift(raffle.config, this.configService.raffle);
  }

  /**
   * Buy one ticket. The whole payment goes to the pot.
   */
  async enterRaffle(player: string, payment: bigint): Promise<RaffleResponseDto> {
    const raffle = await this.lockService.runExclusive(async () => {
      const current = await this.loadRaffle();
      return this.raffleRepository.save(current.enter(player, payment));
    });

    this.logger.log(`${player} entered with ${payment} (${raffle.numberOfPlayers} ticket(s))`);
    await this.eventsService.publish({ type: 'RaffleEntered', player });
    return this.toResponseDto(raffle);
  }

  async checkUpkeep(): Promise<UpkeepCheck> {
    const raffle = await this.loadRaffle();
    return raffle.checkUpkeep(nowInSeconds());
  }

  /**
   * Close entries and ask the coordinator for a random word. Nothing is
   * committed unless the coordinator accepted the request.
   */
  async performUpkeep(): Promise<DrawRequestedResponseDto> {
    const { raffle, requestId } = await this.lockService.runExclusive(async () => {
      const current = await this.loadRaffle();
      const now = nowInSeconds();
      current.assertUpkeepNeeded(now);

      const id = await this.coordinator.requestRandomWords(current.randomWordsRequest());
      const next = await this.raffleRepository.save(current.startDraw(id, now));
      return { raffle: next, requestId: id.toString() };
    });

    this.logger.log(`Draw requested: #${requestId} for ${raffle.numberOfPlayers} ticket(s)`);
    await this.eventsService.publish({ type: 'RequestedRaffleWinner', requestId });
    return { requestId, raffleState: raffle.raffleState };
  }

  /**
   * Coordinator callback. The prize is transferred before anything is
   * committed; if the transfer fails the stored raffle is left as it was.
   * The transfer is keyed by the draw, so retrying a draw whose commit
   * failed does not pay the pot twice.
   */
  async fulfillRandomWords(
    requestId: bigint,
    randomWords: readonly bigint[],
  ): Promise<WinnerPickedResponseDto> {
    const draw = await this.lockService.runExclusive(async () => {
      const current = await this.loadRaffle();
      const settled = current.settleDraw(requestId, randomWords, nowInSeconds());

      try {
        await this.payoutGateway.transfer(settled.winner, settled.prize, settled.payoutId);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        this.logger.error(
          `Payout of ${settled.prize} to ${settled.winner} failed for draw #${requestId}: ${reason}`,
        );
        throw new WinnerPayoutFailedException(requestId, settled.winner, settled.prize, reason);
      }

      const next = await this.raffleRepository.save(settled.next);
      return { ...settled, next };
    });

    this.logger.log(
      `Winner picked for draw #${requestId}: ${draw.winner} (ticket ${draw.winnerIndex}) wins ${draw.prize}`,
    );
    await this.eventsService.publish({ type: 'WinnerPicked', winner: draw.winner });

    return {
      requestId: requestId.toString(),
      winner: draw.winner,
      winnerIndex: draw.winnerIndex,
      prize: draw.prize.toString(),
      raffleState: draw.next.raffleState,
    };
  }

  async getRaffle(): Promise<RaffleResponseDto> {
    return this.toResponseDto(await this.loadRaffle());
  }

  async getEntranceFee(): Promise<bigint> {
    return (await this.loadRaffle()).entranceFee;
  }

  async getRaffleState(): Promise<RaffleState> {
    return (await this.loadRaffle()).raffleState;
  }

  async getPlayer(index: number): Promise<string> {
    return (await this.loadRaffle()).getPlayer(index);
  }

  async getLastTimestamp(): Promise<number> {
    return (await this.loadRaffle()).lastTimestamp;
  }

  async getRecentWinner(): Promise<string | null> {
    return (await this.loadRaffle()).recentWinner;
  }

  /**
   * The stored raffle, constructed from configuration on first use.
   */
  private async loadRaffle(): Promise<Raffle> {
    const existing = await this.raffleRepository.findCurrent();
    if (existing) {
      return existing;
    }

    const created = await this.raffleRepository.save(
      Raffle.create(this.configService.raffle, nowInSeconds()),
    );
    this.logger.log(
      `Raffle created: fee ${created.entranceFee}, interval ${created.interval}s, coordinator ${created.vrfCoordinator}`,
    );
    return created;
  }

  private warnOnConfigDrift(stored: RaffleConfig, configured: RaffleConfig) {
    const drifted = RAFFLE_CONFIG_KEYS.filter(
      (key) => stored[key] !== configured[key],
    );
    if (drifted.length > 0) {
      this.logger.warn(
        `Raffle parameters are immutable; ignoring changed configuration for: ${drifted.join(', ')}`,
      );
    }
  }

  private toResponseDto(raffle: Raffle): RaffleResponseDto {
    return {
      entranceFee: raffle.entranceFee.toString(),
      interval: raffle.interval,
      raffleState: raffle.raffleState,
      numberOfPlayers: raffle.numberOfPlayers,
      players: [...raffle.players],
      balance: raffle.balance.toString(),
      lastTimestamp: raffle.lastTimestamp,
      recentWinner: raffle.recentWinner,
      pendingRequestId:
        raffle.pendingRequestId === null ? null : raffle.pendingRequestId.toString(),
    };
  }
}
