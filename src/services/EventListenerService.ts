import { ListenerConfig, SourceChainConfig } from '../config/config';
import { DeliveryFailure, MalformedLogError, classifyLoopError, errorMessage } from '../errors';
import {
  ChainEventSource,
  EventFilter,
  ListenerState,
  ListenerStatus,
  RawLog,
  RelayDestination,
  RelayOutcome,
  RelayStats,
  TransferEvent
} from '../types';
import { Logger } from '../utils/logger';
import { toTransferEvent } from '../utils/normalize';

export interface DeadLetterStore {
  record(event: TransferEvent, attempts: number, lastError: string | null): Promise<unknown>;
}

export interface ListenerDependencies {
  deadLetters?: DeadLetterStore;
  sleep?: (ms: number) => Promise<void>;
}

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Orchestrates the relay pipeline: polls the source chain filter, normalizes
 * each log and delivers it to the destination, with bounded retries per event
 * and reconnection when the poll cycle fails.
 *
 * A single loop owns the connector, the filter and the cursor; events are
 * delivered one at a time in the order the filter returned them.
 */
export class EventListenerService {
  private connector: ChainEventSource;
  private relayer: RelayDestination;
  private source: SourceChainConfig;
  private listener: ListenerConfig;
  private logger: Logger;
  private deadLetters: DeadLetterStore | null;
  private sleep: (ms: number) => Promise<void>;

  private state: ListenerState = 'STARTING';
  private filter: EventFilter | null = null;
  private cursor: number | null = null;
  private shutdownRequested: boolean = false;
  private lastError: string | null = null;
  private startedAt: Date | null = null;
  private stats: RelayStats = { relayed: 0, failed: 0, skipped: 0, deliveryAttempts: 0 };
  private outcomeListeners: Array<(outcome: RelayOutcome) => void> = [];

  constructor(
    connector: ChainEventSource,
    relayer: RelayDestination,
    config: { source: SourceChainConfig; listener: ListenerConfig },
    logger: Logger,
    dependencies: ListenerDependencies = {}
  ) {
    this.connector = connector;
    this.relayer = relayer;
    this.source = config.source;
    this.listener = config.listener;
    this.logger = logger;
    this.deadLetters = dependencies.deadLetters ?? null;
    this.sleep = dependencies.sleep ?? sleep;
  }

  /**
   * Connect, install the event filter and initialize the cursor.
   * Failures here are fatal and propagate to the caller.
   */
  public async start(): Promise<void> {
    if (this.state !== 'STARTING') {
      throw new Error(`Cannot start listener in state ${this.state}`);
    }

    await this.connector.connect();
    this.filter = await this.subscribe();
    this.cursor = (await this.connector.latestBlockHeight()) - 1;
    this.startedAt = new Date();
    this.transition('POLLING');
  }

  /**
   * Main loop. Resolves once stop() has been observed at the top of an iteration.
   */
  public async run(): Promise<void> {
    if (this.state !== 'POLLING') {
      throw new Error(`Listener must be started before run(), current state ${this.state}`);
    }

    this.logger.info(`Starting event listener for '${this.source.eventName}' events...`);

    while (!this.shutdownRequested) {
      if (this.getState() === 'RECOVERING') {
        await this.recover();
        continue;
      }

      try {
        await this.pollCycle();
        if (!this.shutdownRequested) {
          await this.sleep(this.listener.pollIntervalMs);
        }
      } catch (error) {
        this.enterRecovery(error);
      }
    }

    this.transition('STOPPED');
    this.logger.info('Shutdown signal received. Event listener stopped.');
  }

  public stop(): void {
    this.shutdownRequested = true;
  }

  /**
   * Normalize and relay a single log. Returns null when the log is skipped.
   */
  public async processLog(log: RawLog): Promise<RelayOutcome | null> {
    this.logger.info(`New event received: ${this.source.eventName} in transaction ${log.transactionHash}`, {
      blockNumber: log.blockNumber,
      logIndex: log.logIndex
    });
    this.advanceCursor(log.blockNumber);

    let event: TransferEvent;
    try {
      event = toTransferEvent(log, this.source.chainId);
    } catch (error) {
      if (error instanceof MalformedLogError) {
        this.stats.skipped++;
        this.logger.warn(`${error.message}. Skipping.`, { log });
        return null;
      }
      throw error;
    }

    const outcome = await this.relay(event);
    this.emitOutcome(outcome);
    return outcome;
  }

  public onRelayOutcome(callback: (outcome: RelayOutcome) => void): void {
    this.outcomeListeners.push(callback);
  }

  public getState(): ListenerState {
    return this.state;
  }

  public getStatus(): ListenerStatus {
    return {
      state: this.state,
      eventName: this.source.eventName,
      cursor: this.cursor,
      stats: { ...this.stats },
      lastError: this.lastError,
      startedAt: this.startedAt ? this.startedAt.toISOString() : null
    };
  }

  private async pollCycle(): Promise<void> {
    if (!this.filter) {
      throw new Error('No active event filter');
    }

    const logs = await this.connector.poll(this.filter);
    if (logs.length === 0) {
      this.logger.debug('No new events found in this poll.');
      return;
    }

    for (const log of logs) {
      await this.processLog(log);
    }
  }

  /**
   * Deliver with up to maxRetries attempts. The delay after failed attempt n
   * is retryBackoffMs * 2^n and only applies when another attempt follows.
   */
  private async relay(event: TransferEvent): Promise<RelayOutcome> {
    const { maxRetries, retryBackoffMs } = this.listener;
    let lastFailure: DeliveryFailure | null = null;

    for (let attempt = 0; attempt < maxRetries; attempt++) {
      this.stats.deliveryAttempts++;
      const result = await this.relayer.deliver(event);

      if (result.ok) {
        this.stats.relayed++;
        this.logger.info(`Successfully processed and relayed event for tx ${event.transactionHash}`, {
          attempts: attempt + 1
        });
        return { event, status: 'relayed', attempts: attempt + 1 };
      }

      lastFailure = result.error;
      if (attempt < maxRetries - 1) {
        const delay = retryBackoffMs * 2 ** attempt;
        this.logger.warn(`Attempt ${attempt + 1}/${maxRetries} to relay event failed. Retrying in ${delay}ms...`, {
          transactionHash: event.transactionHash,
          reason: result.error.message
        });
        await this.sleep(delay);
      } else {
        this.logger.warn(`Attempt ${attempt + 1}/${maxRetries} to relay event failed.`, {
          transactionHash: event.transactionHash,
          reason: result.error.message
        });
      }
    }

    const lastError = lastFailure ? lastFailure.message : null;
    this.stats.failed++;
    await this.recordDeadLetter(event, maxRetries, lastError);
    this.logger.error(`Failed to relay event for tx ${event.transactionHash} after ${maxRetries} attempts. Manual intervention required.`, {
      event,
      lastError
    });

    return { event, status: 'failed', attempts: maxRetries, error: lastError ?? undefined };
  }

  private async recordDeadLetter(event: TransferEvent, attempts: number, lastError: string | null): Promise<void> {
    if (!this.deadLetters) return;
    try {
      await this.deadLetters.record(event, attempts, lastError);
    } catch (error) {
      this.logger.error(`Could not record failed relay for tx ${event.transactionHash}`, { reason: errorMessage(error) }, error);
    }
  }

  private enterRecovery(error: unknown): void {
    const fault = classifyLoopError(error);
    this.lastError = fault.error.message;

    const message =
      fault.kind === 'connection'
        ? `Lost connection to source chain: ${fault.error.message}`
        : `An unexpected error occurred in the main loop: ${fault.error.message}`;
    this.logger.critical(message, { kind: fault.kind }, fault.error);
    this.logger.info(`Attempting to reconnect in ${this.listener.reconnectDelayMs}ms...`);
    this.transition('RECOVERING');
  }

  private async recover(): Promise<void> {
    await this.sleep(this.listener.reconnectDelayMs);
    if (this.shutdownRequested) return;

    try {
      await this.connector.reconnect();
      this.filter = await this.subscribe();
      this.transition('POLLING');
      this.logger.info('Successfully reconnected and recreated event filter.');
    } catch (error) {
      this.lastError = errorMessage(error);
      this.logger.error(`Failed to reconnect or recreate filter: ${this.lastError}. Will retry on next cycle.`);
    }
  }

  private subscribe(): Promise<EventFilter> {
    return this.connector.subscribe(this.source.contractAddress, this.source.contractAbi, this.source.eventName);
  }

  private advanceCursor(blockNumber: number): void {
    if (this.cursor === null || blockNumber > this.cursor) {
      this.cursor = blockNumber;
    }
  }

  private emitOutcome(outcome: RelayOutcome): void {
    for (const callback of this.outcomeListeners) {
      try {
        callback(outcome);
      } catch (error) {
        this.logger.error('Relay outcome subscriber failed', { reason: errorMessage(error) }, error);
      }
    }
  }

  private transition(next: ListenerState): void {
    if (this.state === next) return;
    this.logger.info(`Listener state ${this.state} -> ${next}`);
    this.state = next;
  }
}
