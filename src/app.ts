import { RelayerConfig } from './config/types';
import {
  ActionBuilder,
  CheckpointStore,
  EvmChainClient,
  FileCheckpointStore,
  RangeScanner,
  RelayOrchestrator,
  RelayState
} from './services';
import { ChainClient } from './types';
import { StartupError, describeError } from './utils/errors';
import { componentLogger, logger } from './utils/logger';

/**
 * Collaborators that can be swapped out, mostly for tests
 */
export interface RelayerDependencies {
  source?: ChainClient;
  destination?: ChainClient;
  store?: CheckpointStore;
}

/**
 * Main application class that coordinates all relayer components
 */
export class RelayerApp {
  private readonly source: ChainClient;
  private readonly destination: ChainClient;
  private readonly orchestrator: RelayOrchestrator;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private starting: Promise<void> | null = null;

  /**
   * Creates a new RelayerApp instance
   *
   * @param config The relayer configuration
   * @param privateKey Private key for signing destination transactions
   */
  constructor(
    private readonly config: RelayerConfig,
    privateKey: string,
    dependencies: RelayerDependencies = {}
  ) {
    logger.info('Initializing relayer application');

    this.source = dependencies.source ?? new EvmChainClient({
      name: config.source.name,
      chainId: config.source.chainId,
      rpcUrl: config.source.rpcUrl,
      bridgeAddress: config.source.bridgeAddress,
    });

    this.destination = dependencies.destination ?? this.createDestinationClient(privateKey);

    const store = dependencies.store ?? new FileCheckpointStore(
      config.checkpoint.path,
      config.source.chainId,
      config.checkpoint.dedupCapacity
    );

    this.orchestrator = new RelayOrchestrator({
      source: this.source,
      destination: this.destination,
      store,
      scanner: new RangeScanner(this.source, {
        sourceChainId: config.source.chainId,
        bridgeAddress: config.source.bridgeAddress,
        destinationChainId: config.destination.chainId,
      }),
      builder: new ActionBuilder(config.destination.chainId),
      settings: {
        maxWindowSize: config.maxWindowSize,
        confirmationLag: config.confirmationLag,
        pollingIntervalMs: config.pollingIntervalMs,
        startBlock: config.startBlock,
        backoff: config.backoff,
      },
      logger: componentLogger('orchestrator'),
    });
  }

  public get isRunning(): boolean {
    return this.loop !== null;
  }

  public get state(): RelayState {
    return this.orchestrator.getState();
  }

  /**
   * Check both chains, load the checkpoint and start the relay loop.
   * Resolves once the loop is running. A call made while a start is in
   * flight waits for that start instead of beginning another one.
   */
  public async start(): Promise<void> {
    if (this.isRunning) {
      logger.warn('Relayer is already running');
      return;
    }
    if (this.starting) {
      return this.starting;
    }

    this.starting = this.launch();
    try {
      await this.starting;
    } finally {
      this.starting = null;
    }
  }

  /**
   * Resolves when the loop exits, whether stopped or failed
   */
  public async done(): Promise<void> {
    if (this.loop) {
      await this.loop;
    }
  }

  /**
   * Request cancellation and wait for the current cycle to wind down
   */
  public async stop(): Promise<void> {
    if (this.starting) {
      await this.starting.catch((error: unknown) => {
        logger.warn(`Relayer failed to start before stop: ${describeError(error)}`);
      });
    }

    const loop = this.loop;
    if (!loop || !this.controller) {
      logger.warn('Relayer is not running');
      return;
    }

    logger.info('Stopping relay loop');
    this.controller.abort();
    try {
      await loop;
    } finally {
      this.loop = null;
      this.controller = null;
    }
  }

  private async launch(): Promise<void> {
    await this.checkChain(this.source, this.config.source.chainId);
    await this.checkChain(this.destination, this.config.destination.chainId);
    await this.orchestrator.initialize();

    logger.info('Starting relay loop');
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.orchestrator.run(controller.signal);
  }

  private createDestinationClient(privateKey: string): EvmChainClient {
    const client = new EvmChainClient({
      name: this.config.destination.name,
      chainId: this.config.destination.chainId,
      rpcUrl: this.config.destination.rpcUrl,
      bridgeAddress: this.config.destination.bridgeAddress,
      privateKey,
      confirmations: this.config.destination.confirmations,
      gasLimit: this.config.destination.gasLimit,
    });
    logger.info(`Signing mints on ${client.name} as ${client.address ?? 'nobody'}`);
    return client;
  }

  private async checkChain(client: ChainClient, expectedChainId: number): Promise<void> {
    let chainId: number;
    try {
      chainId = await client.getChainId();
    } catch (error) {
      throw new StartupError(`Cannot reach ${client.name}: ${describeError(error)}`, { cause: error });
    }

    if (chainId !== expectedChainId) {
      throw new StartupError(`${client.name} reports chain ID ${chainId}, expected ${expectedChainId}`);
    }
    logger.info(`Connected to ${client.name}`, { chainId });
  }
}
