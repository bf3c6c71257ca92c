import type { ethers } from 'ethers';
import type { DeliveryFailure } from '../errors';

/**
 * A decoded event log as returned by a filter poll.
 * `args` is absent when the log could not be decoded against the event fragment.
 */
export interface RawLog {
  transactionHash: string;
  blockNumber: number;
  logIndex: number;
  args?: Record<string, unknown>;
}

/**
 * Normalized transfer relayed to the destination service
 */
export interface TransferEvent {
  transactionHash: string;
  blockNumber: number;
  logIndex: number;
  sourceChainId: number;
  destinationChainId: number | null;
  user: string | null;
  token: string | null;
  amount: string; // decimal string, never a number
}

/**
 * Wire body posted to the destination relayer
 */
export interface RelayPayload {
  source_tx_hash: string;
  source_chain_id: number;
  destination_chain_id: number | null;
  user: string | null;
  token: string | null;
  amount: string;
  block_number: number;
}

export interface EventFilter {
  id: string;
  address: string;
  eventName: string;
  topic: string;
  createdAt: number;
}

export type DeliveryResult =
  | { ok: true; status: number; body: unknown }
  | { ok: false; error: DeliveryFailure };

/**
 * Source of contract events (implemented by ChainConnector)
 */
export interface ChainEventSource {
  connect(): Promise<void>;
  latestBlockHeight(): Promise<number>;
  subscribe(contractAddress: string, abi: ethers.InterfaceAbi, eventName: string): Promise<EventFilter>;
  poll(filter: EventFilter): Promise<RawLog[]>;
  reconnect(): Promise<void>;
}

/**
 * Destination for normalized events (implemented by DestinationRelayer)
 */
export interface RelayDestination {
  deliver(event: TransferEvent): Promise<DeliveryResult>;
}

export type ListenerState = 'STARTING' | 'POLLING' | 'RECOVERING' | 'STOPPED';

export interface RelayOutcome {
  event: TransferEvent;
  status: 'relayed' | 'failed';
  attempts: number;
  error?: string;
}

export interface RelayStats {
  relayed: number;
  failed: number;
  skipped: number;
  deliveryAttempts: number;
}

export interface ListenerStatus {
  state: ListenerState;
  eventName: string;
  cursor: number | null;
  stats: RelayStats;
  lastError: string | null;
  startedAt: string | null;
}
