import { Repository } from 'typeorm';
import { FailedRelay } from '../models/FailedRelay';
import { TransferEvent } from '../types';

export interface FailureQuery {
  transactionHash?: string;
  page?: number;
  pageSize?: number;
}

/**
 * Durable record of events whose delivery retries were exhausted
 */
export class DeadLetterService {
  private failedRelayRepository: Repository<FailedRelay>;

  constructor(failedRelayRepository: Repository<FailedRelay>) {
    this.failedRelayRepository = failedRelayRepository;
  }

  public async record(event: TransferEvent, attempts: number, lastError: string | null): Promise<FailedRelay> {
    const failure = new FailedRelay();
    failure.transactionHash = event.transactionHash.toLowerCase();
    failure.logIndex = event.logIndex;
    failure.blockNumber = event.blockNumber;
    failure.sourceChainId = event.sourceChainId;
    failure.destinationChainId = event.destinationChainId;
    failure.user = event.user;
    failure.token = event.token;
    failure.amount = event.amount;
    failure.attempts = attempts;
    failure.lastError = lastError;

    return this.failedRelayRepository.save(failure);
  }

  /**
   * Failed relays, newest block first
   */
  public async getFailures(params: FailureQuery): Promise<{ failures: FailedRelay[]; totalCount: number }> {
    const { transactionHash, page = 1, pageSize = 10 } = params;

    const queryBuilder = this.failedRelayRepository.createQueryBuilder('failure');

    if (transactionHash) {
      queryBuilder.andWhere('failure.transactionHash = :transactionHash', { transactionHash: transactionHash.toLowerCase() });
    }

    const totalCount = await queryBuilder.getCount();

    queryBuilder
      .orderBy('failure.blockNumber', 'DESC')
      .addOrderBy('failure.logIndex', 'ASC')
      .skip((page - 1) * pageSize)
      .take(pageSize);

    const failures = await queryBuilder.getMany();

    return { failures, totalCount };
  }

  public async count(): Promise<number> {
    return this.failedRelayRepository.count();
  }
}
