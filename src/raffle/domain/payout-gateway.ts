export const PAYOUT_GATEWAY = 'PayoutGateway';

export class PayoutRejectedError extends Error {
  constructor(readonly recipient: string) {
    super(`Recipient ${recipient} does not accept payouts`);
    this.name = 'PayoutRejectedError';
  }
}

/**
 * Moves the pot out of the raffle. Resolves once the funds are credited,
 * rejects if the recipient or the ledger refused them. A repeated payoutId
 * resolves without crediting again.
 */
export interface PayoutGateway {
  transfer(to: string, amount: bigint, payoutId: string): Promise<void>;
}
