import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { randomBytes } from 'crypto';
import {
  RandomnessCoordinator,
  RandomWordsRequest,
} from '../../domain/randomness-coordinator';

export interface PendingRandomWordsRequest extends RandomWordsRequest {
  requestId: bigint;
  requestedAt: Date;
}

/**
 * In-process stand-in for the oracle, for development and tests. Requests
 * stay pending until their fulfillment has been delivered to the consumer,
 * whether or not the consumer accepts the words.
 */
@Injectable()
export class LocalVrfCoordinator implements RandomnessCoordinator {
  private readonly logger = new Logger(LocalVrfCoordinator.name);
  private readonly pending = new Map<bigint, PendingRandomWordsRequest>();
  private nextRequestId = 1n;

  async requestRandomWords(request: RandomWordsRequest): Promise<bigint> {
    if (request.numWords < 1) {
      throw new RangeError('numWords must be at least 1');
    }

    const requestId = this.nextRequestId++;
    this.pending.set(requestId, { ...request, requestId, requestedAt: new Date() });
    this.logger.log(`Random words requested: #${requestId} (${request.numWords} word(s))`);
    return requestId;
  }

  listPending(): PendingRandomWordsRequest[] {
    return [...this.pending.values()];
  }

  /**
   * The words for a pending request: the override when given, otherwise 32
   * random bytes per word. The request stays pending.
   */
  wordsFor(requestId: bigint, override?: bigint[]): bigint[] {
    const request = this.pending.get(requestId);
    if (!request) {
      throw new NotFoundException(`No pending random words request #${requestId}`);
    }

    if (override && override.length > 0) {
      return override;
    }
    return Array.from({ length: request.numWords }, () =>
      BigInt(`0x${randomBytes(32).toString('hex')}`),
    );
  }

  discard(requestId: bigint): void {
    this.pending.delete(requestId);
  }

  consume(requestId: bigint, override?: bigint[]): bigint[] {
    const words = this.wordsFor(requestId, override);
    this.discard(requestId);
    return words;
  }
}
