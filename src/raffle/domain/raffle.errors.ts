import {
  BadRequestException,
  ConflictException,
  InternalServerErrorException,
  NotFoundException,
  ServiceUnavailableException,
} from '@nestjs/common';
import { RaffleState } from './raffle-state';

/**
 * Raffle failures. Each one aborts the operation that raised it and carries
 * its diagnostic values in the response body, amounts as decimal strings.
 */

export class EntranceFeeNotMetException extends BadRequestException {
  constructor(
    readonly entranceFee: bigint,
    readonly payment: bigint,
  ) {
    super({
      error: 'EntranceFeeNotMet',
      message: `Payment of ${payment} is below the entrance fee of ${entranceFee}`,
      entranceFee: entranceFee.toString(),
      payment: payment.toString(),
    });
  }
}

export class RaffleNotOpenException extends ConflictException {
  constructor(readonly raffleState: RaffleState) {
    super({
      error: 'NotOpen',
      message: 'Raffle is not accepting entries while a draw is in progress',
      raffleState,
    });
  }
}

export class UpkeepNotNeededException extends ConflictException {
  constructor(
    readonly balance: bigint,
    readonly playersLength: number,
    readonly raffleState: RaffleState,
  ) {
    super({
      error: 'UpkeepNotNeeded',
      message: 'Raffle is not eligible for a draw',
      balance: balance.toString(),
      playersLength,
      raffleState,
    });
  }
}

export class UnknownRequestException extends NotFoundException {
  constructor(
    readonly requestId: bigint,
    readonly pendingRequestId: bigint | null,
  ) {
    super({
      error: 'UnknownRequest',
      message: `Request ${requestId} does not match an outstanding draw`,
      requestId: requestId.toString(),
      pendingRequestId: pendingRequestId === null ? null : pendingRequestId.toString(),
    });
  }
}

export class PlayerNotFoundException extends NotFoundException {
  constructor(
    readonly index: number,
    readonly playersLength: number,
  ) {
    super({
      error: 'PlayerNotFound',
      message: `No player at index ${index}`,
      index,
      playersLength,
    });
  }
}

export class WinnerPayoutFailedException extends InternalServerErrorException {
  constructor(
    readonly requestId: bigint,
    readonly winner: string,
    readonly amount: bigint,
    readonly reason: string,
  ) {
    super({
      error: 'WinnerPayoutFailed',
      message: `Transfer of ${amount} to ${winner} failed; draw ${requestId} is lost`,
      requestId: requestId.toString(),
      winner,
      amount: amount.toString(),
      reason,
    });
  }
}

export class RaffleBusyException extends ServiceUnavailableException {
  constructor() {
    super({
      error: 'RaffleBusy',
      message: 'Another raffle operation is in progress, try again',
    });
  }
}

export class RaffleConflictException extends ConflictException {
  constructor(readonly expectedVersion: number) {
    super({
      error: 'RaffleConflict',
      message: 'The raffle changed while the operation ran; nothing was committed',
      expectedVersion,
    });
  }
}
