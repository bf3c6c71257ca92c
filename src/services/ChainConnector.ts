import { ethers } from 'ethers';
import { ConnectionFailure, UnknownEventError, errorMessage } from '../errors';
import { ChainEventSource, EventFilter, RawLog } from '../types';
import { Logger } from '../utils/logger';
import { TrackedProvider } from '../utils/TrackedProvider';

/**
 * The slice of a JSON-RPC provider the connector relies on
 */
export interface ChainProvider {
  send(method: string, params: Array<unknown>): Promise<unknown>;
  destroy(): void;
}

export type ChainProviderFactory = (rpcUrl: string, chainId: number) => ChainProvider;

// Log object as returned by eth_getFilterChanges
interface RpcLog {
  address: string;
  topics: string[];
  data: string;
  blockNumber: string;
  transactionHash: string;
  logIndex?: string;
  removed?: boolean;
}

function isRpcLog(value: unknown): value is RpcLog {
  return (
    typeof value === 'object' &&
    value !== null &&
    'transactionHash' in value &&
    typeof value.transactionHash === 'string' &&
    'blockNumber' in value &&
    typeof value.blockNumber === 'string' &&
    'data' in value &&
    typeof value.data === 'string' &&
    'topics' in value &&
    Array.isArray(value.topics) &&
    value.topics.every((topic) => typeof topic === 'string')
  );
}

interface ActiveFilter {
  filter: EventFilter;
  fragment: ethers.EventFragment;
  iface: ethers.Interface;
}

/**
 * Connection to the source chain: liveness, block height and live event filters.
 * No retries happen here; the caller owns the resilience policy.
 */
export class ChainConnector implements ChainEventSource {
  private rpcUrl: string;
  private chainId: number;
  private logger: Logger;
  private providerFactory: ChainProviderFactory;
  private provider: ChainProvider | null = null;
  private activeFilter: ActiveFilter | null = null;

  constructor(rpcUrl: string, chainId: number, logger: Logger, providerFactory?: ChainProviderFactory) {
    this.rpcUrl = rpcUrl;
    this.chainId = chainId;
    this.logger = logger;
    this.providerFactory = providerFactory ?? ((url, id) => new TrackedProvider(url, id, logger));
  }

  public isConnected(): boolean {
    return this.provider !== null;
  }

  /**
   * Open a provider and probe it. The provider is only kept if the probe succeeds.
   */
  public async connect(): Promise<void> {
    const provider = this.providerFactory(this.rpcUrl, this.chainId);
    try {
      await provider.send('eth_blockNumber', []);
    } catch (error) {
      provider.destroy();
      this.logger.error('Error connecting to blockchain', { rpcUrl: this.maskedUrl(), reason: errorMessage(error) });
      throw new ConnectionFailure(`Could not establish connection to ${this.maskedUrl()}`, { cause: error });
    }

    this.provider = provider;
    this.logger.info('Connected to source chain RPC endpoint', { rpcUrl: this.maskedUrl(), chainId: this.chainId });
  }

  public async latestBlockHeight(): Promise<number> {
    const result = await this.call('eth_blockNumber', []);
    try {
      return ethers.getNumber(toQuantity(result), 'blockNumber');
    } catch (error) {
      throw new ConnectionFailure(`Unexpected eth_blockNumber response: ${String(result)}`, { cause: error });
    }
  }

  /**
   * Install a live filter for `eventName` on the contract. Only logs emitted
   * after this call are returned by poll().
   */
  public async subscribe(contractAddress: string, abi: ethers.InterfaceAbi, eventName: string): Promise<EventFilter> {
    const iface = new ethers.Interface(abi);
    const fragment = iface.getEvent(eventName);
    if (!fragment) {
      throw new UnknownEventError(eventName);
    }

    const address = ethers.getAddress(contractAddress);
    const id = await this.call('eth_newFilter', [{ address, topics: [fragment.topicHash], fromBlock: 'latest' }]);
    if (typeof id !== 'string') {
      throw new ConnectionFailure(`eth_newFilter returned an invalid filter id: ${String(id)}`);
    }

    const filter: EventFilter = {
      id,
      address,
      eventName: fragment.name,
      topic: fragment.topicHash,
      createdAt: Date.now()
    };
    this.activeFilter = { filter, fragment, iface };
    this.logger.info(`Created event filter for '${fragment.name}'`, { filterId: id, address });
    return filter;
  }

  /**
   * Logs that arrived since the previous poll of the same filter, in chain order
   */
  public async poll(filter: EventFilter): Promise<RawLog[]> {
    const active = this.activeFilter;
    if (!active || active.filter.id !== filter.id) {
      throw new ConnectionFailure(`Event filter ${filter.id} is no longer active`);
    }

    const result = await this.call('eth_getFilterChanges', [filter.id]);
    if (!Array.isArray(result)) {
      throw new ConnectionFailure('eth_getFilterChanges returned a non-array result');
    }

    const logs: RawLog[] = [];
    for (const entry of result) {
      if (!isRpcLog(entry)) {
        this.logger.warn('Ignoring filter entry that is not a log object', { entry });
        continue;
      }
      if (entry.removed) {
        this.logger.debug('Ignoring removed log', { transactionHash: entry.transactionHash });
        continue;
      }
      logs.push(this.decode(entry, active));
    }
    return logs;
  }

  /**
   * Drop the current provider and filter and connect again.
   * subscribe() must be called afterwards.
   */
  public async reconnect(): Promise<void> {
    const stale = this.activeFilter;
    this.activeFilter = null;
    if (this.provider) {
      if (stale) {
        await this.uninstallFilter(this.provider, stale.filter.id);
      }
      this.provider.destroy();
      this.provider = null;
    }
    await this.connect();
  }

  // Best effort: the old provider is often the reason we are reconnecting
  private async uninstallFilter(provider: ChainProvider, filterId: string): Promise<void> {
    try {
      await provider.send('eth_uninstallFilter', [filterId]);
    } catch (error) {
      this.logger.debug('Could not uninstall stale event filter', { filterId, reason: errorMessage(error) });
    }
  }

  private decode(log: RpcLog, active: ActiveFilter): RawLog {
    const rawLog: RawLog = {
      transactionHash: log.transactionHash,
      blockNumber: ethers.getNumber(log.blockNumber),
      logIndex: log.logIndex ? ethers.getNumber(log.logIndex) : 0
    };

    try {
      const decoded = active.iface.decodeEventLog(active.fragment, log.data, log.topics);
      rawLog.args = decoded.toObject();
    } catch (error) {
      // Leave args unset; the listener skips logs it cannot read
      this.logger.debug('Could not decode log against event fragment', {
        transactionHash: log.transactionHash,
        reason: errorMessage(error)
      });
    }
    return rawLog;
  }

  private async call(method: string, params: Array<unknown>): Promise<unknown> {
    if (!this.provider) {
      throw new ConnectionFailure('Source chain provider not initialized');
    }
    try {
      return await this.provider.send(method, params);
    } catch (error) {
      throw new ConnectionFailure(`RPC call ${method} failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  private maskedUrl(): string {
    return this.rpcUrl.replace(/\/\/[^/]*@/, '//****@');
  }
}

function toQuantity(value: unknown): ethers.BigNumberish {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'bigint') {
    return value;
  }
  throw new Error(`not a quantity: ${String(value)}`);
}
