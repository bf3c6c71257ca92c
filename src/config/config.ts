import fs from 'fs';
import path from 'path';
import { ethers } from 'ethers';
import { ConfigError } from '../errors';
import { isLogLevel, LogLevel } from '../utils/logger';

export interface SourceChainConfig {
  rpcUrl: string;
  chainId: number;
  contractAddress: string;
  contractAbi: ethers.InterfaceAbi;
  eventName: string;
}

export interface DestinationConfig {
  endpoint: string;
  apiKey: string;
  requestTimeoutMs: number;
}

export interface ListenerConfig {
  pollIntervalMs: number;
  maxRetries: number;
  retryBackoffMs: number;
  reconnectDelayMs: number;
}

export interface RelayerConfig {
  source: SourceChainConfig;
  destination: DestinationConfig;
  listener: ListenerConfig;
  port: number;
  dbName: string;
  logDir: string;
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

export const DEFAULT_ABI_PATH = 'abis/BridgeDeposit.json';
export const DEFAULT_EVENT_NAME = 'BridgeDepositInitiated';

/**
 * Build the relayer configuration from environment variables.
 * Every problem found is collected and reported in a single ConfigError.
 */
export function loadConfig(env: Env = process.env, cwd: string = process.cwd()): RelayerConfig {
  const problems: string[] = [];

  const required = (name: string): string => {
    const value = env[name]?.trim();
    if (!value) {
      problems.push(`Missing required env var: ${name}`);
      return '';
    }
    return value;
  };

  const integer = (name: string, fallback: number, min: number): number => {
    const raw = env[name]?.trim();
    if (!raw) return fallback;
    const parsed = Number(raw);
    if (!Number.isInteger(parsed) || parsed < min) {
      problems.push(`${name} must be an integer >= ${min}, got '${raw}'`);
      return fallback;
    }
    return parsed;
  };

  const rpcUrl = required('SOURCE_CHAIN_RPC_URL');
  const rawContractAddress = required('BRIDGE_CONTRACT_ADDRESS');
  const endpoint = required('DESTINATION_API_ENDPOINT');
  const apiKey = required('DESTINATION_API_KEY');

  let contractAddress = rawContractAddress;
  if (rawContractAddress && !ethers.isAddress(rawContractAddress)) {
    problems.push(`BRIDGE_CONTRACT_ADDRESS is not a valid address: '${rawContractAddress}'`);
  } else if (rawContractAddress) {
    contractAddress = ethers.getAddress(rawContractAddress);
  }

  if (endpoint && !/^https?:\/\//i.test(endpoint)) {
    problems.push(`DESTINATION_API_ENDPOINT must be an http(s) URL, got '${endpoint}'`);
  }

  const logLevel = env.LOG_LEVEL?.trim() || 'info';
  if (!isLogLevel(logLevel)) {
    problems.push(`LOG_LEVEL must be one of debug, info, warn, error, critical, got '${logLevel}'`);
  }

  const abiPath = path.resolve(cwd, env.CONTRACT_ABI_PATH?.trim() || DEFAULT_ABI_PATH);
  const contractAbi = readAbi(abiPath, problems);

  const config: RelayerConfig = {
    source: {
      rpcUrl,
      chainId: integer('SOURCE_CHAIN_ID', 1, 1),
      contractAddress,
      contractAbi,
      eventName: env.EVENT_NAME?.trim() || DEFAULT_EVENT_NAME
    },
    destination: {
      endpoint,
      apiKey,
      requestTimeoutMs: integer('REQUEST_TIMEOUT_MS', 10_000, 1)
    },
    listener: {
      pollIntervalMs: integer('POLL_INTERVAL_MS', 5_000, 0),
      maxRetries: integer('MAX_RETRIES', 3, 1),
      retryBackoffMs: integer('RETRY_BACKOFF_MS', 1_000, 0),
      reconnectDelayMs: integer('RECONNECT_DELAY_MS', 15_000, 0)
    },
    port: integer('PORT', 3000, 0),
    dbName: env.DB_NAME?.trim() || 'relayer.db',
    logDir: path.resolve(cwd, env.LOG_DIR?.trim() || 'logs'),
    logLevel: isLogLevel(logLevel) ? logLevel : 'info'
  };

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }

  return config;
}

function readAbi(abiPath: string, problems: string[]): ethers.InterfaceAbi {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(abiPath, 'utf8'));
  } catch (error) {
    problems.push(`Could not read contract ABI from ${abiPath}: ${error instanceof Error ? error.message : String(error)}`);
    return [];
  }

  if (!Array.isArray(parsed)) {
    problems.push(`Contract ABI at ${abiPath} must be a JSON array`);
    return [];
  }
  return parsed;
}

/**
 * Configuration with secrets masked, safe to log
 */
export function getConfigSummary(config: RelayerConfig): Record<string, unknown> {
  return {
    rpcUrl: config.source.rpcUrl.replace(/\/[^/]*@/, '/****@'),
    sourceChainId: config.source.chainId,
    contractAddress: config.source.contractAddress,
    eventName: config.source.eventName,
    destinationEndpoint: config.destination.endpoint,
    destinationApiKey: config.destination.apiKey ? '****' : '',
    pollIntervalMs: config.listener.pollIntervalMs,
    maxRetries: config.listener.maxRetries,
    reconnectDelayMs: config.listener.reconnectDelayMs,
    port: config.port
  };
}
