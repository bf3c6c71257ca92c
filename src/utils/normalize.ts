import { MalformedLogError } from '../errors';
import { RawLog, RelayPayload, TransferEvent } from '../types';

/**
 * Build a TransferEvent from a decoded log. Optional fields that are missing
 * or unreadable become null; a missing args payload or amount is malformed.
 */
export function toTransferEvent(log: RawLog, sourceChainId: number): TransferEvent {
  const args = log.args;
  if (!args) {
    throw new MalformedLogError(`Log ${log.transactionHash} is missing its args payload`);
  }

  const amount = toDecimalString(args.amount);
  if (amount === null) {
    throw new MalformedLogError(`Log ${log.transactionHash} has no readable amount`);
  }

  return {
    transactionHash: log.transactionHash,
    blockNumber: log.blockNumber,
    logIndex: log.logIndex,
    sourceChainId,
    destinationChainId: toChainId(args.destinationChainId),
    user: toAddress(args.user),
    token: toAddress(args.token),
    amount
  };
}

export function toRelayPayload(event: TransferEvent): RelayPayload {
  return {
    source_tx_hash: event.transactionHash,
    source_chain_id: event.sourceChainId,
    destination_chain_id: event.destinationChainId,
    user: event.user,
    token: event.token,
    amount: event.amount,
    block_number: event.blockNumber
  };
}

function toDecimalString(value: unknown): string | null {
  if (typeof value === 'bigint') {
    return value >= 0n ? value.toString() : null;
  }
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) && value >= 0 ? value.toString() : null;
  }
  if (typeof value === 'string' && /^\d+$/.test(value)) {
    return BigInt(value).toString();
  }
  return null;
}

function toChainId(value: unknown): number | null {
  const decimal = toDecimalString(value);
  if (decimal === null) return null;
  const chainId = Number(decimal);
  return Number.isSafeInteger(chainId) ? chainId : null;
}

function toAddress(value: unknown): string | null {
  return typeof value === 'string' && value.length > 0 ? value : null;
}
