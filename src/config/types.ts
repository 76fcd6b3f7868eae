// src/config/types.ts

/**
 * Chain endpoint and bridge contract on one side of the relay
 */
export interface ChainConfig {
  /** Chain name, used in logs */
  name: string;
  /** Chain ID */
  chainId: number;
  /** RPC URL for chain */
  rpcUrl: string;
  /** Bridge contract address */
  bridgeAddress: string;
}

export interface DestinationChainConfig extends ChainConfig {
  /** Receipts to wait for after submitting a mint, 0 to not wait */
  confirmations: number;
  /** Fixed gas limit; estimated per transaction when absent */
  gasLimit?: number;
}

export interface CheckpointConfig {
  /** Path of the checkpoint JSON file */
  path: string;
  /** Number of processed idempotency keys kept for deduplication */
  dedupCapacity: number;
}

export interface BackoffConfig {
  initialDelayMs: number;
  maxDelayMs: number;
}

/** First block to scan when no checkpoint exists */
export type StartBlock = number | 'latest';

/**
 * Main configuration structure
 */
export interface RelayerConfig {
  /** Polling interval in milliseconds */
  pollingIntervalMs: number;
  /** Largest block range queried in one cycle */
  maxWindowSize: number;
  /** Blocks behind the source tip that scanning stays */
  confirmationLag: number;
  startBlock: StartBlock;
  checkpoint: CheckpointConfig;
  backoff: BackoffConfig;
  source: ChainConfig;
  destination: DestinationChainConfig;
}

/**
 * Environment variables structure
 */
export interface EnvVars {
  /** Private key for transaction signing */
  PRIVATE_KEY?: string;
  /** Path of the YAML config file */
  CONFIG_PATH?: string;
  POLLING_INTERVAL_MS?: string;
  MAX_WINDOW_SIZE?: string;
  CONFIRMATION_LAG?: string;
  START_BLOCK?: string;
  CHECKPOINT_PATH?: string;
  SOURCE_RPC_URL?: string;
  DESTINATION_RPC_URL?: string;
  /** Log level */
  LOG_LEVEL?: string;
}
