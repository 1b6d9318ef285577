import {
  BadRequestException,
  Body,
  Controller,
  ForbiddenException,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
} from '@nestjs/common';
import { ConfigService } from '../../config/config.service';
import { RaffleService } from '../application/raffle.service';
import { OverrideRandomWordsDto } from '../application/dto/override-random-words.dto';
import { RaffleBusyException } from '../domain/raffle.errors';
import { LocalVrfCoordinator } from '../infrastructure/coordinators/local-vrf-coordinator';

/**
 * Development endpoints standing in for the oracle's callback. Only
 * available with VRF_COORDINATOR_MODE=local.
 */
@Controller('coordinator')
export class LocalCoordinatorController {
  constructor(
    private readonly coordinator: LocalVrfCoordinator,
    private readonly raffleService: RaffleService,
    private readonly configService: ConfigService,
  ) {}

  @Get('requests')
  listPending() {
    this.assertLocalMode();
    return this.coordinator.listPending().map((request) => ({
      requestId: request.requestId.toString(),
      keyHash: request.keyHash,
      subscriptionId: request.subscriptionId.toString(),
      requestConfirmations: request.requestConfirmations,
      callbackGasLimit: request.callbackGasLimit,
      numWords: request.numWords,
      extraArgs: request.extraArgs,
      requestedAt: request.requestedAt.toISOString(),
    }));
  }

  @Post('requests/:requestId/fulfill')
  @HttpCode(HttpStatus.OK)
  async fulfill(
    @Param('requestId') requestId: string,
    @Body() dto: OverrideRandomWordsDto,
  ) {
    this.assertLocalMode();
    if (!/^\d+$/.test(requestId)) {
      throw new BadRequestException('requestId must be a non-negative integer');
    }

    const id = BigInt(requestId);
    const words = this.coordinator.wordsFor(id, dto.randomWords?.map((word) => BigInt(word)));
    try {
      const result = await this.raffleService.fulfillRandomWords(id, words);
      this.coordinator.discard(id);
      return result;
    } catch (error) {
      // A busy raffle never saw the words; the request can be fulfilled again.
      if (!(error instanceof RaffleBusyException)) {
        this.coordinator.discard(id);
      }
      throw error;
    }
  }

  private assertLocalMode() {
    if (this.configService.coordinatorMode !== 'local') {
      throw new ForbiddenException('Local coordinator is disabled');
    }
  }
}
