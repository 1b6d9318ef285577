import { Raffle } from './raffle.entity';

export const RAFFLE_REPOSITORY = 'RaffleRepository';

export interface RaffleRepository {
  findCurrent(): Promise<Raffle | null>;
  /**
   * A version 0 raffle is stored only if none exists yet, and the stored one
   * is returned. Any later version replaces the version it was derived from,
   * or fails with RaffleConflictException when the stored raffle has moved on.
   */
  save(raffle: Raffle): Promise<Raffle>;
}
