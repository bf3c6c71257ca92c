import { ethers } from 'ethers';
import { Logger } from './logger';

/**
 * JsonRpcProvider that records per-method RPC successes and failures in the logger.
 * The network is pinned up front so a dead endpoint fails fast instead of
 * looping on network detection.
 */
export class TrackedProvider extends ethers.JsonRpcProvider {
  private logger: Logger;

  constructor(url: string, chainId: number, logger: Logger) {
    const network = ethers.Network.from(chainId);
    super(url, network, { staticNetwork: network });
    this.logger = logger;
  }

  /**
   * Override send method to track API calls
   */
  async send(method: string, params: Array<unknown> | Record<string, unknown>): Promise<unknown> {
    const startTime = Date.now();
    try {
      const result: unknown = await super.send(method, params);
      this.logger.logApiSuccess(method, params, Date.now() - startTime);
      return result;
    } catch (error) {
      this.logger.logApiFailure(method, params, error, Date.now() - startTime);
      throw error;
    }
  }
}
