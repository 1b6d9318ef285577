import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { IRaffle, Raffle } from '../../domain/raffle.entity';
import { RaffleConflictException } from '../../domain/raffle.errors';
import { RaffleRepository } from '../../domain/raffle.repository';
import { CURRENT_RAFFLE_KEY, RaffleDocument } from '../schemas/raffle.schema';

type RaffleFields = Pick<
  RaffleDocument,
  | 'entranceFee'
  | 'interval'
  | 'vrfCoordinator'
  | 'keyHash'
  | 'subscriptionId'
  | 'callbackGasLimit'
  | 'players'
  | 'raffleState'
  | 'lastTimestamp'
  | 'recentWinner'
  | 'balance'
  | 'pendingRequestId'
  | 'version'
>;

@Injectable()
export class MongoRaffleRepository implements RaffleRepository {
  constructor(
    @InjectModel(RaffleDocument.name)
    private readonly raffleModel: Model<RaffleDocument>,
  ) {}

  async findCurrent(): Promise<Raffle | null> {
    const doc = await this.raffleModel.findOne({ key: CURRENT_RAFFLE_KEY }).exec();
    return doc ? this.toEntity(doc) : null;
  }

  async save(raffle: Raffle): Promise<Raffle> {
    const fields = this.toPersistence(raffle.snapshot());

    if (raffle.version === 0) {
      const doc = await this.raffleModel
        .findOneAndUpdate(
          { key: CURRENT_RAFFLE_KEY },
          { $setOnInsert: fields },
          { upsert: true, new: true },
        )
        .exec();
      if (!doc) {
        throw new RaffleConflictException(0);
      }
      return this.toEntity(doc);
    }

    // Fenced on the prior version so a writer whose lock expired cannot
    // overwrite a newer raffle.
    const expectedVersion = raffle.version - 1;
    const doc = await this.raffleModel
      .findOneAndUpdate(
        { key: CURRENT_RAFFLE_KEY, version: expectedVersion },
        { $set: fields },
        { new: true },
      )
      .exec();
    if (!doc) {
      throw new RaffleConflictException(expectedVersion);
    }
    return this.toEntity(doc);
  }

  private toPersistence(raffle: IRaffle): RaffleFields {
    return {
      entranceFee: raffle.entranceFee.toString(),
      interval: raffle.interval,
      vrfCoordinator: raffle.vrfCoordinator,
      keyHash: raffle.keyHash,
      subscriptionId: raffle.subscriptionId.toString(),
      callbackGasLimit: raffle.callbackGasLimit,
      players: [...raffle.players],
      raffleState: raffle.raffleState,
      lastTimestamp: raffle.lastTimestamp,
      recentWinner: raffle.recentWinner,
      balance: raffle.balance.toString(),
      pendingRequestId: raffle.pendingRequestId === null ? null : raffle.pendingRequestId.toString(),
      version: raffle.version,
    };
  }

  private toEntity(doc: RaffleFields): Raffle {
    return new Raffle({
      entranceFee: BigInt(doc.entranceFee),
      interval: doc.interval,
      vrfCoordinator: doc.vrfCoordinator,
      keyHash: doc.keyHash,
      subscriptionId: BigInt(doc.subscriptionId),
      callbackGasLimit: doc.callbackGasLimit,
      players: doc.players,
      raffleState: doc.raffleState,
      lastTimestamp: doc.lastTimestamp,
      recentWinner: doc.recentWinner ?? null,
      balance: BigInt(doc.balance),
      pendingRequestId: doc.pendingRequestId ? BigInt(doc.pendingRequestId) : null,
      version: doc.version ?? 0,
    });
  }
}
