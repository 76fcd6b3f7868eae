import { ethers } from 'ethers';
import { encodeMintCall } from '../contracts/bridge';
import {
  ChainClient,
  LogFilter,
  RawLog,
  RelayAction,
  SignedAction,
  SubmissionHandle
} from '../types';
import { SubmissionError, TransientFetchError, describeError } from '../utils/errors';
import { Logger, componentLogger } from '../utils/logger';

export interface EvmChainClientOptions {
  name: string;
  chainId: number;
  rpcUrl: string;
  /** Contract that receives signed mint calls */
  bridgeAddress: string;
  /** Signing key; read-only client when absent */
  privateKey?: string;
  /** Receipts to wait for after submitting, 0 to not wait */
  confirmations?: number;
  gasLimit?: number;
}

/**
 * ChainClient over an ethers JSON-RPC provider
 */
export class EvmChainClient implements ChainClient {
  public readonly name: string;
  private readonly provider: ethers.providers.JsonRpcProvider;
  private readonly wallet: ethers.Wallet | null;
  private readonly logger: Logger;

  constructor(
    private readonly options: EvmChainClientOptions,
    provider?: ethers.providers.JsonRpcProvider,
    logger?: Logger
  ) {
    this.name = options.name;
    this.provider = provider ?? new ethers.providers.StaticJsonRpcProvider(options.rpcUrl, {
      chainId: options.chainId,
      name: options.name,
    });
    this.wallet = options.privateKey ? new ethers.Wallet(options.privateKey, this.provider) : null;
    this.logger = logger ?? componentLogger(`chain:${options.name}`);
  }

  /** Signing address, null for a read-only client */
  public get address(): string | null {
    return this.wallet ? this.wallet.address : null;
  }

  /**
   * Chain ID reported by the node itself, not the configured one
   */
  public async getChainId(): Promise<number> {
    return this.read('eth_chainId', async () => {
      const chainId: unknown = await this.provider.send('eth_chainId', []);
      return ethers.BigNumber.from(chainId).toNumber();
    });
  }

  public async getTipHeight(): Promise<number> {
    return this.read('getBlockNumber', () => this.provider.getBlockNumber());
  }

  public async getLogs(fromBlock: number, toBlock: number, filter: LogFilter): Promise<RawLog[]> {
    const logs = await this.read('getLogs', () => this.provider.getLogs({
      address: filter.address,
      topics: filter.topics,
      fromBlock,
      toBlock,
    }));
    return logs.map(toRawLog);
  }

  public async sign(action: RelayAction): Promise<SignedAction> {
    const wallet = this.wallet;
    if (!wallet) {
      throw new SubmissionError(`${this.name} client has no signing key`, false);
    }

    try {
      const request: ethers.providers.TransactionRequest = {
        to: this.options.bridgeAddress,
        data: encodeMintCall(action),
        chainId: this.options.chainId,
      };
      if (this.options.gasLimit !== undefined) {
        request.gasLimit = this.options.gasLimit;
      }

      const populated = await wallet.populateTransaction(request);
      const rawTransaction = await wallet.signTransaction(populated);
      return { action, rawTransaction, hash: ethers.utils.keccak256(rawTransaction) };
    } catch (error) {
      throw toSubmissionError(`Failed to sign mint for ${action.idempotencyKey}`, error);
    }
  }

  public async submit(signed: SignedAction): Promise<SubmissionHandle> {
    const confirmations = this.options.confirmations ?? 1;

    try {
      const response = await this.provider.sendTransaction(signed.rawTransaction);
      this.logger.info(`Mint transaction sent: ${response.hash}`, {
        idempotencyKey: signed.action.idempotencyKey,
        nonce: response.nonce,
      });

      if (confirmations === 0) {
        return { txHash: response.hash, blockNumber: null };
      }

      const receipt = await response.wait(confirmations);
      this.logger.info(`Mint transaction confirmed: block=${receipt.blockNumber}, hash=${receipt.transactionHash}`);
      return { txHash: receipt.transactionHash, blockNumber: receipt.blockNumber };
    } catch (error) {
      throw toSubmissionError(`Failed to submit mint for ${signed.action.idempotencyKey}`, error);
    }
  }

  private async read<T>(operation: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      throw new TransientFetchError(`${this.name} ${operation} failed: ${describeError(error)}`, { cause: error });
    }
  }
}

export function toRawLog(log: ethers.providers.Log): RawLog {
  return {
    blockNumber: log.blockNumber,
    transactionHash: log.transactionHash,
    logIndex: log.logIndex,
    address: log.address,
    topics: [...log.topics],
    data: log.data,
    removed: log.removed === true,
  };
}

/**
 * Malformed transaction data fails the same way on every attempt: an ethers
 * INVALID_ARGUMENT, or a node rejecting the payload as bad RLP. Anything else
 * (RPC outage, revert, replacement) is retried.
 */
export function isRetryableSubmissionFailure(error: unknown): boolean {
  if (errorCode(error) === 'INVALID_ARGUMENT') {
    return false;
  }
  return !/\brlp\b/i.test(describeError(error));
}

function toSubmissionError(context: string, error: unknown): SubmissionError {
  if (error instanceof SubmissionError) {
    return error;
  }
  return new SubmissionError(`${context}: ${describeError(error)}`, isRetryableSubmissionFailure(error), {
    cause: error,
  });
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return String(error.code);
  }
  return undefined;
}
