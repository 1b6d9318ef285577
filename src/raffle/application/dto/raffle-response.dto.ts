import { RaffleState } from '../../domain/raffle-state';

// uint256 values are serialised as decimal strings
export interface RaffleResponseDto {
  entranceFee: string;
  interval: number;
  raffleState: RaffleState;
  numberOfPlayers: number;
  players: string[];
  balance: string;
  lastTimestamp: number;
  recentWinner: string | null;
  pendingRequestId: string | null;
}

export interface DrawRequestedResponseDto {
  requestId: string;
  raffleState: RaffleState;
}

export interface WinnerPickedResponseDto {
  requestId: string;
  winner: string;
  winnerIndex: number;
  prize: string;
  raffleState: RaffleState;
}
