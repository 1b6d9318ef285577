export const RANDOMNESS_COORDINATOR = 'RandomnessCoordinator';

export interface RandomWordsRequest {
  keyHash: string;
  subscriptionId: bigint;
  requestConfirmations: number;
  callbackGasLimit: number;
  numWords: number;
  extraArgs: {
    nativePayment: boolean;
  };
}

/**
 * Outbound side of the oracle. The random words arrive later through
 * RaffleService.fulfillRandomWords, correlated by the returned id.
 */
export interface RandomnessCoordinator {
  requestRandomWords(request: RandomWordsRequest): Promise<bigint>;
}
