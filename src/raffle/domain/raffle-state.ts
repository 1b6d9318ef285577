export enum RaffleState {
  OPEN = 'open',               // Accepting entries
  CALCULATING = 'calculating', // Waiting for the coordinator's random word
}
