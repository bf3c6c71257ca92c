/**
 * Error taxonomy for the relayer
 */
export class RelayerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The source chain endpoint is unreachable or failed its liveness probe
 */
export class ConnectionFailure extends RelayerError {}

/**
 * The configured event name does not exist in the contract ABI
 */
export class UnknownEventError extends RelayerError {
  public readonly eventName: string;

  constructor(eventName: string) {
    super(`Event '${eventName}' not found in contract ABI`);
    this.eventName = eventName;
  }
}

export class MalformedLogError extends RelayerError {}

/**
 * The destination service did not acknowledge a delivery
 */
export class DeliveryFailure extends RelayerError {
  public readonly status: number | null;
  public readonly responseBody: string | null;

  constructor(message: string, details: { status?: number; responseBody?: string; cause?: unknown } = {}) {
    super(message, { cause: details.cause });
    this.status = details.status ?? null;
    this.responseBody = details.responseBody ?? null;
  }
}

export class ConfigError extends RelayerError {
  public readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.problems = problems;
  }
}

export type LoopFault =
  | { kind: 'connection'; error: ConnectionFailure }
  | { kind: 'unexpected'; error: Error };

/**
 * Classify anything thrown out of a poll cycle. Every fault leads to recovery,
 * the kind only changes how it is reported.
 */
export function classifyLoopError(error: unknown): LoopFault {
  if (error instanceof ConnectionFailure) {
    return { kind: 'connection', error };
  }
  if (error instanceof Error) {
    return { kind: 'unexpected', error };
  }
  return { kind: 'unexpected', error: new RelayerError(String(error)) };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
