import { DestinationConfig } from '../config/config';
import { DeliveryFailure, errorMessage } from '../errors';
import { DeliveryResult, RelayDestination, TransferEvent } from '../types';
import { Logger } from '../utils/logger';
import { toRelayPayload } from '../utils/normalize';

/**
 * Posts normalized events to the destination chain's relayer service.
 * One HTTP call per delivery, no retries and no state between calls.
 */
export class DestinationRelayer implements RelayDestination {
  private endpoint: string;
  private headers: Record<string, string>;
  private requestTimeoutMs: number;
  private logger: Logger;

  constructor(config: DestinationConfig, logger: Logger) {
    this.endpoint = config.endpoint;
    this.headers = {
      'Content-Type': 'application/json',
      'X-API-KEY': config.apiKey
    };
    this.requestTimeoutMs = config.requestTimeoutMs;
    this.logger = logger;
  }

  public async deliver(event: TransferEvent): Promise<DeliveryResult> {
    const payload = toRelayPayload(event);
    this.logger.info(`Relaying event to ${this.endpoint}`, { payload });

    let response: Response;
    try {
      response = await fetch(this.endpoint, {
        method: 'POST',
        headers: this.headers,
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.requestTimeoutMs)
      });
    } catch (error) {
      const reason = isTimeout(error) ? `timed out after ${this.requestTimeoutMs}ms` : errorMessage(error);
      this.logger.error('Failed to relay event to destination API', { transactionHash: event.transactionHash, reason });
      return { ok: false, error: new DeliveryFailure(`Request to destination failed: ${reason}`, { cause: error }) };
    }

    const responseBody = await readBody(response);

    if (!response.ok) {
      this.logger.error('Destination API rejected relayed event', {
        transactionHash: event.transactionHash,
        status: response.status,
        responseBody
      });
      return {
        ok: false,
        error: new DeliveryFailure(`Destination responded with HTTP ${response.status}`, {
          status: response.status,
          responseBody
        })
      };
    }

    this.logger.info('Successfully relayed event', { transactionHash: event.transactionHash, status: response.status, responseBody });
    return { ok: true, status: response.status, body: parseBody(responseBody) };
  }
}

async function readBody(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    return `<unreadable body: ${errorMessage(error)}>`;
  }
}

function parseBody(text: string): unknown {
  if (text.length === 0) return null;
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}
