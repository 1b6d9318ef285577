import { Raffle, RaffleConfig, RaffleState } from './raffle.entity';
import {
  EntranceFeeNotMetException,
  PlayerNotFoundException,
  RaffleNotOpenException,
  UnknownRequestException,
  UpkeepNotNeededException,
} from './raffle.errors';

const FEE = 100000000000000000n; // 0.1 ETH
const START = 1_700_000_000;

const config: RaffleConfig = {
  entranceFee: FEE,
  interval: 30,
  vrfCoordinator: '0x00000000000000000000000000000000000000c0',
  keyHash: '0xabc123',
  subscriptionId: 7n,
  callbackGasLimit: 500000,
};

const ALICE = '0x000000000000000000000000000000000000a11c';
const BOB = '0x0000000000000000000000000000000000000b0b';
const CAROL = '0x00000000000000000000000000000000000ca201';
const DAVE = '0x000000000000000000000000000000000000da7e';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected the call to throw');
}

function enterAll(raffle: Raffle, players: string[]): Raffle {
  return players.reduce((current, player) => current.enter(player, FEE), raffle);
}

describe('Raffle', () => {
  let raffle: Raffle;

  beforeEach(() => {
    raffle = Raffle.create(config, START);
  });

  it('starts open, empty and stamped with the construction time', () => {
    expect(raffle.raffleState).toBe(RaffleState.OPEN);
    expect(raffle.players).toEqual([]);
    expect(raffle.balance).toBe(0n);
    expect(raffle.lastTimestamp).toBe(START);
    expect(raffle.recentWinner).toBeNull();
    expect(raffle.pendingRequestId).toBeNull();
    expect(raffle.version).toBe(0);
    expect(raffle.config).toEqual(config);
  });

  describe('enter', () => {
    it('rejects a payment below the entrance fee and keeps the players', () => {
      expect(() => raffle.enter(ALICE, FEE - 1n)).toThrow(EntranceFeeNotMetException);
      expect(raffle.players).toEqual([]);
    });

    it('reports fee and payment in the error body', () => {
      const error = captureError(() => raffle.enter(ALICE, 5n));

      expect(error).toBeInstanceOf(EntranceFeeNotMetException);
      expect((error as EntranceFeeNotMetException).getResponse()).toEqual({
        error: 'EntranceFeeNotMet',
        message: 'Payment of 5 is below the entrance fee of 100000000000000000',
        entranceFee: '100000000000000000',
        payment: '5',
      });
    });

    it('appends one ticket per entry and keeps the whole payment', () => {
      const next = raffle.enter(ALICE, FEE).enter(ALICE, FEE * 2n);

      expect(next.players).toEqual([ALICE, ALICE]);
      expect(next.numberOfPlayers).toBe(2);
      expect(next.balance).toBe(FEE * 3n);
      expect(next.getPlayer(1)).toBe(ALICE);
    });

    it('does not change the receiver', () => {
      raffle.enter(ALICE, FEE);

      expect(raffle.players).toEqual([]);
      expect(raffle.balance).toBe(0n);
    });

    it('checks the fee before the state', () => {
      const calculating = raffle.enter(ALICE, FEE).startDraw(1n, START + 31);

      expect(() => calculating.enter(BOB, 0n)).toThrow(EntranceFeeNotMetException);
      expect(() => calculating.enter(BOB, FEE)).toThrow(RaffleNotOpenException);
    });
  });

  describe('checkUpkeep', () => {
    it('is false without players regardless of elapsed time', () => {
      expect(raffle.checkUpkeep(START + 10_000)).toEqual({
        upkeepNeeded: false,
        timeHasPassed: true,
        isOpen: true,
        hasBalance: false,
        hasPlayers: false,
        performData: '0x',
      });
    });

    it('is false before the interval has elapsed', () => {
      const entered = raffle.enter(ALICE, FEE);

      expect(entered.checkUpkeep(START + 29).upkeepNeeded).toBe(false);
      expect(entered.checkUpkeep(START + 30).upkeepNeeded).toBe(true);
    });

    it('is false while calculating', () => {
      const calculating = raffle.enter(ALICE, FEE).startDraw(1n, START + 31);

      expect(calculating.checkUpkeep(START + 10_000).upkeepNeeded).toBe(false);
      expect(calculating.checkUpkeep(START + 10_000).isOpen).toBe(false);
    });

    it('requires a positive balance even with players', () => {
      const free = Raffle.create({ ...config, entranceFee: 0n }, START).enter(ALICE, 0n);

      expect(free.checkUpkeep(START + 31)).toMatchObject({
        upkeepNeeded: false,
        hasPlayers: true,
        hasBalance: false,
      });
    });
  });

  describe('startDraw', () => {
    it('moves to calculating and records the request id', () => {
      const next = raffle.enter(ALICE, FEE).startDraw(1n, START + 31);

      expect(next.raffleState).toBe(RaffleState.CALCULATING);
      expect(next.pendingRequestId).toBe(1n);
      expect(next.players).toEqual([ALICE]);
    });

    it('fails with diagnostics when the raffle is not eligible', () => {
      const entered = raffle.enter(ALICE, FEE);

      const error = captureError(() => entered.startDraw(1n, START + 5));

      expect(error).toBeInstanceOf(UpkeepNotNeededException);
      expect((error as UpkeepNotNeededException).getResponse()).toEqual({
        error: 'UpkeepNotNeeded',
        message: 'Raffle is not eligible for a draw',
        balance: '100000000000000000',
        playersLength: 1,
        raffleState: 'open',
      });
    });

    it('cannot be started twice without a fulfillment', () => {
      const calculating = raffle.enter(ALICE, FEE).startDraw(1n, START + 31);

      expect(() => calculating.startDraw(2n, START + 62)).toThrow(UpkeepNotNeededException);
    });
  });

  it('builds a single-word request with three confirmations', () => {
    expect(raffle.randomWordsRequest()).toEqual({
      keyHash: '0xabc123',
      subscriptionId: 7n,
      requestConfirmations: 3,
      callbackGasLimit: 500000,
      numWords: 1,
      extraArgs: { nativePayment: false },
    });
  });

  describe('settleDraw', () => {
    it('pays a lone player whatever the random word', () => {
      const calculating = raffle.enter(ALICE, FEE).startDraw(1n, START + 31);

      const draw = calculating.settleDraw(1n, [7n], START + 40);

      expect(draw.winner).toBe(ALICE);
      expect(draw.winnerIndex).toBe(0);
      expect(draw.prize).toBe(FEE);
      expect(draw.next.players).toEqual([]);
      expect(draw.next.balance).toBe(0n);
      expect(draw.next.raffleState).toBe(RaffleState.OPEN);
      expect(draw.next.recentWinner).toBe(ALICE);
      expect(draw.next.lastTimestamp).toBe(START + 40);
      expect(draw.next.pendingRequestId).toBeNull();
    });

    it('selects the player at word mod player count', () => {
      const calculating = enterAll(raffle, [ALICE, BOB, CAROL, DAVE]).startDraw(1n, START + 31);

      const draw = calculating.settleDraw(1n, [5n], START + 40);

      expect(draw.winner).toBe(BOB);
      expect(draw.prize).toBe(FEE * 4n);
    });

    it('reduces full-range random words', () => {
      const calculating = enterAll(raffle, [ALICE, BOB, CAROL]).startDraw(1n, START + 31);
      const word = 2n ** 256n - 1n; // 2^256 - 1 is divisible by 3

      expect(calculating.settleDraw(1n, [word], START + 40).winner).toBe(ALICE);
    });

    it('leaves the calculating raffle untouched', () => {
      const calculating = enterAll(raffle, [ALICE, BOB]).startDraw(1n, START + 31);

      calculating.settleDraw(1n, [1n], START + 40);

      expect(calculating.raffleState).toBe(RaffleState.CALCULATING);
      expect(calculating.players).toEqual([ALICE, BOB]);
      expect(calculating.balance).toBe(FEE * 2n);
    });

    it('rejects a request id that is not outstanding', () => {
      const calculating = raffle.enter(ALICE, FEE).startDraw(1n, START + 31);

      expect(() => calculating.settleDraw(2n, [1n], START + 40)).toThrow(UnknownRequestException);
    });

    it('rejects a fulfillment while open', () => {
      expect(() => raffle.settleDraw(1n, [1n], START)).toThrow(UnknownRequestException);
    });

    it('rejects an empty word list', () => {
      const calculating = raffle.enter(ALICE, FEE).startDraw(1n, START + 31);

      expect(() => calculating.settleDraw(1n, [], START + 40)).toThrow(RangeError);
    });

    it('rejects a negative random word', () => {
      const calculating = enterAll(raffle, [ALICE, BOB]).startDraw(1n, START + 31);

      expect(() => calculating.settleDraw(1n, [-1n], START + 40)).toThrow(
        'Request 1 was fulfilled with a negative random word',
      );
    });

    it('keys the payout on the request and the pending raffle version', () => {
      const calculating = enterAll(raffle, [ALICE, BOB]).startDraw(4n, START + 31);

      const draw = calculating.settleDraw(4n, [1n], START + 40);

      expect(calculating.version).toBe(3);
      expect(draw.payoutId).toBe('draw:4:3');
      expect(calculating.settleDraw(4n, [0n], START + 50).payoutId).toBe('draw:4:3');
      expect(draw.next.version).toBe(4);
    });
  });

  it('reports out-of-range player lookups', () => {
    expect(() => raffle.enter(ALICE, FEE).getPlayer(1)).toThrow(PlayerNotFoundException);
    expect(() => raffle.getPlayer(-1)).toThrow(PlayerNotFoundException);
  });
});
