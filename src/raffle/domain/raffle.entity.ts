import { RaffleState } from './raffle-state';
import { RandomWordsRequest } from './randomness-coordinator';
import {
  EntranceFeeNotMetException,
  PlayerNotFoundException,
  RaffleNotOpenException,
  UnknownRequestException,
  UpkeepNotNeededException,
} from './raffle.errors';

export { RaffleState };

export const REQUEST_CONFIRMATIONS = 3;
export const NUM_WORDS = 1;

/**
 * The six construction parameters. Immutable for the life of the raffle.
 */
export interface RaffleConfig {
  entranceFee: bigint;       // smallest currency unit
  interval: number;          // seconds between draws
  vrfCoordinator: string;    // oracle service address
  keyHash: string;           // gas lane / proving key
  subscriptionId: bigint;    // oracle billing account
  callbackGasLimit: number;
}

export const RAFFLE_CONFIG_KEYS: readonly (keyof RaffleConfig)[] = [
  'entranceFee',
  'interval',
  'vrfCoordinator',
  'keyHash',
  'subscriptionId',
  'callbackGasLimit',
];

export interface IRaffle extends RaffleConfig {
  players: readonly string[];
  raffleState: RaffleState;
  lastTimestamp: number;
  recentWinner: string | null;
  balance: bigint;
  pendingRequestId: bigint | null;
  version: number;
}

export interface UpkeepCheck {
  upkeepNeeded: boolean;
  timeHasPassed: boolean;
  isOpen: boolean;
  hasBalance: boolean;
  hasPlayers: boolean;
  performData: string;
}

export interface SettledDraw {
  next: Raffle;
  winner: string;
  winnerIndex: number;
  prize: bigint;
  payoutId: string;
}

/**
 * Raffle aggregate. Every transition returns a new Raffle and leaves the
 * receiver untouched, so callers commit only once all side effects of an
 * operation have succeeded.
 */
export class Raffle implements IRaffle {
  readonly entranceFee: bigint;
  readonly interval: number;
  readonly vrfCoordinator: string;
  readonly keyHash: string;
  readonly subscriptionId: bigint;
  readonly callbackGasLimit: number;

  readonly players: readonly string[];
  readonly raffleState: RaffleState;
  readonly lastTimestamp: number;
  readonly recentWinner: string | null;
  readonly balance: bigint;
  readonly pendingRequestId: bigint | null;
  // Bumped by every transition; a save only lands on the version it was derived from.
  readonly version: number;

  constructor(props: IRaffle) {
    this.entranceFee = props.entranceFee;
    this.interval = props.interval;
    this.vrfCoordinator = props.vrfCoordinator;
    this.keyHash = props.keyHash;
    this.subscriptionId = props.subscriptionId;
    this.callbackGasLimit = props.callbackGasLimit;
    this.players = Object.freeze([...props.players]);
    this.raffleState = props.raffleState;
    this.lastTimestamp = props.lastTimestamp;
    this.recentWinner = props.recentWinner;
    this.balance = props.balance;
    this.pendingRequestId = props.pendingRequestId;
    this.version = props.version;
  }

  static create(config: RaffleConfig, now: number): Raffle {
    return new Raffle({
      ...config,
      players: [],
      raffleState: RaffleState.OPEN,
      lastTimestamp: now,
      recentWinner: null,
      balance: 0n,
      pendingRequestId: null,
      version: 0,
    });
  }

  get config(): RaffleConfig {
    return {
      entranceFee: this.entranceFee,
      interval: this.interval,
      vrfCoordinator: this.vrfCoordinator,
      keyHash: this.keyHash,
      subscriptionId: this.subscriptionId,
      callbackGasLimit: this.callbackGasLimit,
    };
  }

  get numberOfPlayers(): number {
    return this.players.length;
  }

  getPlayer(index: number): string {
    if (!Number.isInteger(index) || index < 0 || index >= this.players.length) {
      throw new PlayerNotFoundException(index, this.players.length);
    }
    return this.players[index];
  }

  enter(player: string, payment: bigint): Raffle {
    if (payment < this.entranceFee) {
      throw new EntranceFeeNotMetException(this.entranceFee, payment);
    }
    if (this.raffleState !== RaffleState.OPEN) {
      throw new RaffleNotOpenException(this.raffleState);
    }
    return this.with({
      players: [...this.players, player],
      balance: this.balance + payment,
    });
  }

  checkUpkeep(now: number): UpkeepCheck {
    const timeHasPassed = now - this.lastTimestamp >= this.interval;
    const isOpen = this.raffleState === RaffleState.OPEN;
    const hasBalance = this.balance > 0n;
    const hasPlayers = this.players.length > 0;

    return {
      upkeepNeeded: timeHasPassed && isOpen && hasBalance && hasPlayers,
      timeHasPassed,
      isOpen,
      hasBalance,
      hasPlayers,
      performData: '0x',
    };
  }

  assertUpkeepNeeded(now: number): void {
    if (!this.checkUpkeep(now).upkeepNeeded) {
      throw new UpkeepNotNeededException(this.balance, this.players.length, this.raffleState);
    }
  }

  randomWordsRequest(): RandomWordsRequest {
    return {
      keyHash: this.keyHash,
      subscriptionId: this.subscriptionId,
      requestConfirmations: REQUEST_CONFIRMATIONS,
      callbackGasLimit: this.callbackGasLimit,
      numWords: NUM_WORDS,
      extraArgs: { nativePayment: false },
    };
  }

  startDraw(requestId: bigint, now: number): Raffle {
    this.assertUpkeepNeeded(now);
    return this.with({
      raffleState: RaffleState.CALCULATING,
      pendingRequestId: requestId,
    });
  }

  /**
   * Picks players[randomWords[0] mod players.length]. The modulo bias is
   * negligible while the player count is far below 2^256.
   */
  settleDraw(requestId: bigint, randomWords: readonly bigint[], now: number): SettledDraw {
    if (this.raffleState !== RaffleState.CALCULATING || this.pendingRequestId !== requestId) {
      throw new UnknownRequestException(requestId, this.pendingRequestId);
    }
    if (randomWords.length === 0) {
      throw new RangeError(`Request ${requestId} was fulfilled without random words`);
    }
    if (randomWords[0] < 0n) {
      throw new RangeError(`Request ${requestId} was fulfilled with a negative random word`);
    }

    const winnerIndex = Number(randomWords[0] % BigInt(this.players.length));
    const winner = this.players[winnerIndex];

    return {
      next: this.with({
        players: [],
        raffleState: RaffleState.OPEN,
        lastTimestamp: now,
        recentWinner: winner,
        balance: 0n,
        pendingRequestId: null,
      }),
      winner,
      winnerIndex,
      prize: this.balance,
      // Stable across retries of the same draw, unique across draws.
      payoutId: `draw:${requestId}:${this.version}`,
    };
  }

  private with(changes: Partial<IRaffle>): Raffle {
    return new Raffle({ ...this.snapshot(), ...changes, version: this.version + 1 });
  }

  snapshot(): IRaffle {
    return {
      ...this.config,
      players: this.players,
      raffleState: this.raffleState,
      lastTimestamp: this.lastTimestamp,
      recentWinner: this.recentWinner,
      balance: this.balance,
      pendingRequestId: this.pendingRequestId,
      version: this.version,
    };
  }
}
