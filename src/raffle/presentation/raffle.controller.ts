import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { RaffleService } from '../application/raffle.service';
import { EnterRaffleDto } from '../application/dto/enter-raffle.dto';
import { FulfillRandomWordsDto } from '../application/dto/fulfill-random-words.dto';
import { COORDINATOR_JWT_STRATEGY } from '../../auth/strategies/coordinator-jwt.strategy';

@Controller('raffle')
export class RaffleController {
  constructor(private readonly raffleService: RaffleService) {}

  @Get()
  async getRaffle() {
    return this.raffleService.getRaffle();
  }

  @Get('entrance-fee')
  async getEntranceFee() {
    const entranceFee = await this.raffleService.getEntranceFee();
    return { entranceFee: entranceFee.toString() };
  }

  @Get('state')
  async getRaffleState() {
    return { raffleState: await this.raffleService.getRaffleState() };
  }

  @Get('players/:index')
  async getPlayer(@Param('index', ParseIntPipe) index: number) {
    return { index, player: await this.raffleService.getPlayer(index) };
  }

  @Get('last-timestamp')
  async getLastTimestamp() {
    return { lastTimestamp: await this.raffleService.getLastTimestamp() };
  }

  @Get('recent-winner')
  async getRecentWinner() {
    return { recentWinner: await this.raffleService.getRecentWinner() };
  }

  @Post('entries')
  @HttpCode(HttpStatus.CREATED)
  async enter(@Body() dto: EnterRaffleDto) {
    return this.raffleService.enterRaffle(dto.player, BigInt(dto.amount));
  }

  @Get('upkeep')
  async checkUpkeep() {
    return this.raffleService.checkUpkeep();
  }

  @Post('upkeep')
  @HttpCode(HttpStatus.ACCEPTED)
  async performUpkeep() {
    return this.raffleService.performUpkeep();
  }

  @Post('fulfillments')
  @HttpCode(HttpStatus.OK)
  @UseGuards(AuthGuard(COORDINATOR_JWT_STRATEGY))
  async fulfillRandomWords(@Body() dto: FulfillRandomWordsDto) {
    return this.raffleService.fulfillRandomWords(
      BigInt(dto.requestId),
      dto.randomWords.map((word) => BigInt(word)),
    );
  }
}
