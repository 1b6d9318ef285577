export interface RaffleEnteredEvent {
  type: 'RaffleEntered';
  player: string;
}

export interface RequestedRaffleWinnerEvent {
  type: 'RequestedRaffleWinner';
  requestId: string;
}

export interface WinnerPickedEvent {
  type: 'WinnerPicked';
  winner: string;
}

export type RaffleEvent = RaffleEnteredEvent | RequestedRaffleWinnerEvent | WinnerPickedEvent;
