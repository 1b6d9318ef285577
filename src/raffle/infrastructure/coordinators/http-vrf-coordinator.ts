import { BadGatewayException, Logger } from '@nestjs/common';
import { AxiosInstance } from 'axios';
import {
  RandomnessCoordinator,
  RandomWordsRequest,
} from '../../domain/randomness-coordinator';

interface RequestRandomWordsResponse {
  requestId?: unknown;
}

/**
 * Forwards draw requests to a remote oracle service. The oracle answers
 * later on POST /raffle/fulfillments.
 */
export class HttpVrfCoordinator implements RandomnessCoordinator {
  private readonly logger = new Logger(HttpVrfCoordinator.name);

  constructor(private readonly http: Pick<AxiosInstance, 'post'>) {}

  async requestRandomWords(request: RandomWordsRequest): Promise<bigint> {
    let data: RequestRandomWordsResponse;
    try {
      const response = await this.http.post<RequestRandomWordsResponse>('/requests', {
        keyHash: request.keyHash,
        subId: request.subscriptionId.toString(),
        requestConfirmations: request.requestConfirmations,
        callbackGasLimit: request.callbackGasLimit,
        numWords: request.numWords,
        extraArgs: request.extraArgs,
      });
      data = response.data;
    } catch (error) {
      this.logger.error('Random words request failed:', error);
      throw new BadGatewayException('Randomness coordinator request failed');
    }

    if (typeof data?.requestId !== 'string' || !/^\d+$/.test(data.requestId)) {
      throw new BadGatewayException('Randomness coordinator returned no request id');
    }
    return BigInt(data.requestId);
  }
}
