// src/config/index.ts

import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { ethers } from 'ethers';
import {
  BackoffConfig,
  ChainConfig,
  CheckpointConfig,
  DestinationChainConfig,
  EnvVars,
  RelayerConfig,
  StartBlock
} from './types';
import { ConfigError, describeError } from '../utils/errors';
import { logger } from '../utils/logger';

// Load environment variables
dotenv.config();

type RawSection = Record<string, unknown>;

const DEFAULTS = {
  pollingIntervalMs: 30_000,
  maxWindowSize: 100,
  confirmationLag: 12,
  checkpointPath: './data/relayer-checkpoint.json',
  dedupCapacity: 10_000,
  initialDelayMs: 1_000,
  maxDelayMs: 60_000,
  confirmations: 1
};

/**
 * Pick the variables the relayer reads from an environment
 */
export function getEnvVars(env: NodeJS.ProcessEnv = process.env): EnvVars {
  return {
    PRIVATE_KEY: env.PRIVATE_KEY,
    CONFIG_PATH: env.CONFIG_PATH,
    POLLING_INTERVAL_MS: env.POLLING_INTERVAL_MS,
    MAX_WINDOW_SIZE: env.MAX_WINDOW_SIZE,
    CONFIRMATION_LAG: env.CONFIRMATION_LAG,
    START_BLOCK: env.START_BLOCK,
    CHECKPOINT_PATH: env.CHECKPOINT_PATH,
    SOURCE_RPC_URL: env.SOURCE_RPC_URL,
    DESTINATION_RPC_URL: env.DESTINATION_RPC_URL,
    LOG_LEVEL: env.LOG_LEVEL,
  };
}

/**
 * Relayer signing key, 0x-prefixed
 */
export function getPrivateKey(env: EnvVars = getEnvVars()): string {
  if (!env.PRIVATE_KEY) {
    throw new ConfigError('PRIVATE_KEY environment variable is required');
  }

  const key = env.PRIVATE_KEY.startsWith('0x') ? env.PRIVATE_KEY : `0x${env.PRIVATE_KEY}`;
  if (!ethers.utils.isHexString(key, 32)) {
    throw new ConfigError('PRIVATE_KEY must be 32 bytes of hex');
  }
  return key;
}

/**
 * Load the raw YAML document
 */
export function loadConfigFromFile(filePath: string): unknown {
  try {
    const fileContents = fs.readFileSync(filePath, 'utf8');
    return yaml.load(fileContents);
  } catch (error) {
    throw new ConfigError(`Failed to load config file: ${describeError(error)}`, { cause: error });
  }
}

/**
 * Environment values win over the file
 */
export function applyEnvOverrides(raw: unknown, env: EnvVars): RawSection {
  const root = { ...section(raw, 'config') };

  if (env.POLLING_INTERVAL_MS) root.pollingIntervalMs = env.POLLING_INTERVAL_MS;
  if (env.MAX_WINDOW_SIZE) root.maxWindowSize = env.MAX_WINDOW_SIZE;
  if (env.CONFIRMATION_LAG) root.confirmationLag = env.CONFIRMATION_LAG;
  if (env.START_BLOCK) root.startBlock = env.START_BLOCK;

  if (env.CHECKPOINT_PATH) {
    root.checkpoint = { ...optionalSection(root.checkpoint, 'checkpoint'), path: env.CHECKPOINT_PATH };
  }
  if (env.SOURCE_RPC_URL) {
    root.source = { ...optionalSection(root.source, 'source'), rpcUrl: env.SOURCE_RPC_URL };
  }
  if (env.DESTINATION_RPC_URL) {
    root.destination = { ...optionalSection(root.destination, 'destination'), rpcUrl: env.DESTINATION_RPC_URL };
  }

  return root;
}

/**
 * Turn an untyped document into a RelayerConfig, filling defaults
 */
export function parseRelayerConfig(raw: unknown): RelayerConfig {
  const root = section(raw, 'config');
  const checkpoint = optionalSection(root.checkpoint, 'checkpoint');
  const backoff = optionalSection(root.backoff, 'backoff');

  const checkpointConfig: CheckpointConfig = {
    path: readString(checkpoint, 'checkpoint.path', 'path', DEFAULTS.checkpointPath),
    dedupCapacity: readInteger(checkpoint, 'checkpoint.dedupCapacity', 'dedupCapacity', 1, DEFAULTS.dedupCapacity),
  };

  const backoffConfig: BackoffConfig = {
    initialDelayMs: readInteger(backoff, 'backoff.initialDelayMs', 'initialDelayMs', 0, DEFAULTS.initialDelayMs),
    maxDelayMs: readInteger(backoff, 'backoff.maxDelayMs', 'maxDelayMs', 0, DEFAULTS.maxDelayMs),
  };

  const destination = section(root.destination, 'destination');
  const destinationConfig: DestinationChainConfig = {
    ...parseChain(destination, 'destination'),
    confirmations: readInteger(destination, 'destination.confirmations', 'confirmations', 0, DEFAULTS.confirmations),
  };
  if (destination.gasLimit !== undefined) {
    destinationConfig.gasLimit = readInteger(destination, 'destination.gasLimit', 'gasLimit', 21_000);
  }

  return {
    pollingIntervalMs: readInteger(root, 'pollingIntervalMs', 'pollingIntervalMs', 0, DEFAULTS.pollingIntervalMs),
    maxWindowSize: readInteger(root, 'maxWindowSize', 'maxWindowSize', 1, DEFAULTS.maxWindowSize),
    confirmationLag: readInteger(root, 'confirmationLag', 'confirmationLag', 0, DEFAULTS.confirmationLag),
    startBlock: parseStartBlock(root.startBlock),
    checkpoint: checkpointConfig,
    backoff: backoffConfig,
    source: parseChain(section(root.source, 'source'), 'source'),
    destination: destinationConfig,
  };
}

/**
 * Load relayer configuration
 */
export function loadConfig(env: EnvVars = getEnvVars()): RelayerConfig {
  let configPath: string;
  if (env.CONFIG_PATH) {
    configPath = env.CONFIG_PATH;
    logger.info(`Loading configuration from specified path: ${configPath}`);
  } else {
    configPath = path.join(process.cwd(), 'config.yaml');
    logger.info(`Loading configuration from default path: ${configPath}`);
  }

  if (!fs.existsSync(configPath)) {
    throw new ConfigError(`Config file not found at ${configPath}`);
  }

  const fileConfig = loadConfigFromFile(configPath);
  return parseRelayerConfig(applyEnvOverrides(fileConfig, env));
}

/**
 * Validate configuration
 */
export function validateConfig(config: RelayerConfig): void {
  if (config.source.chainId === config.destination.chainId) {
    throw new ConfigError(`Source and destination share chain ID ${config.source.chainId}`);
  }

  if (config.backoff.maxDelayMs < config.backoff.initialDelayMs) {
    throw new ConfigError('backoff.maxDelayMs must not be lower than backoff.initialDelayMs');
  }
}

/**
 * Get relayer configuration
 */
export function getConfig(env: EnvVars = getEnvVars()): RelayerConfig {
  const config = loadConfig(env);
  validateConfig(config);
  return config;
}

function parseChain(raw: RawSection, prefix: string): ChainConfig {
  const bridgeAddress = readString(raw, `${prefix}.bridgeAddress`, 'bridgeAddress');
  if (!ethers.utils.isAddress(bridgeAddress)) {
    throw new ConfigError(`${prefix}.bridgeAddress is not an address: ${bridgeAddress}`);
  }

  return {
    name: readString(raw, `${prefix}.name`, 'name', prefix),
    chainId: readInteger(raw, `${prefix}.chainId`, 'chainId', 1),
    rpcUrl: readString(raw, `${prefix}.rpcUrl`, 'rpcUrl'),
    bridgeAddress: ethers.utils.getAddress(bridgeAddress),
  };
}

function parseStartBlock(value: unknown): StartBlock {
  if (value === undefined || value === 'latest') {
    return 'latest';
  }
  return toInteger(value, 'startBlock', 0);
}

function section(value: unknown, name: string): RawSection {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new ConfigError(`${name} must be a mapping`);
  }
  return { ...value };
}

function optionalSection(value: unknown, name: string): RawSection {
  return value === undefined ? {} : section(value, name);
}

function readString(raw: RawSection, name: string, key: string, fallback?: string): string {
  const value = raw[key];
  if (value === undefined && fallback !== undefined) {
    return fallback;
  }
  if (typeof value !== 'string' || value.length === 0) {
    throw new ConfigError(`${name} must be a non-empty string`);
  }
  return value;
}

function readInteger(raw: RawSection, name: string, key: string, min: number, fallback?: number): number {
  const value = raw[key];
  if (value === undefined && fallback !== undefined) {
    return fallback;
  }
  return toInteger(value, name, min);
}

function toInteger(value: unknown, name: string, min: number): number {
  const parsed = typeof value === 'string' && /^\d+$/.test(value) ? parseInt(value, 10) : value;
  if (typeof parsed !== 'number' || !Number.isSafeInteger(parsed) || parsed < min) {
    throw new ConfigError(`${name} must be an integer >= ${min}, got ${String(value)}`);
  }
  return parsed;
}

// Export types
export * from './types';
