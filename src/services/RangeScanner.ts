import { ethers } from 'ethers';
import { bridgeInterface, TOKENS_LOCKED_TOPIC } from '../contracts/bridge';
import { Checkpoint, ChainClient, DomainEvent, RawLog, ScanWindow } from '../types';
import { TransientFetchError, describeError, isRelayerError } from '../utils/errors';
import { Logger, componentLogger } from '../utils/logger';

export interface RangeScannerOptions {
  /** Source chain ID stamped on every event */
  sourceChainId: number;
  /** Source bridge contract emitting TokensLocked */
  bridgeAddress: string;
  /** Only events addressed to this chain are relayed */
  destinationChainId: number;
}

/**
 * Computes block windows and turns source logs into ordered DomainEvents
 */
export class RangeScanner {
  private readonly bridgeAddress: string;
  private readonly logger: Logger;

  constructor(
    private readonly source: ChainClient,
    private readonly options: RangeScannerOptions,
    logger: Logger = componentLogger('range-scanner')
  ) {
    this.bridgeAddress = ethers.utils.getAddress(options.bridgeAddress);
    this.logger = logger;
  }

  /**
   * Next window after the checkpoint, or null when nothing is confirmed yet
   */
  public nextWindow(
    checkpoint: Pick<Checkpoint, 'lastScannedBlock'>,
    sourceTip: number,
    maxWindowSize: number,
    confirmationLag: number
  ): ScanWindow | null {
    const fromBlock = checkpoint.lastScannedBlock + 1;
    const safeTip = sourceTip - confirmationLag;

    if (fromBlock > safeTip) {
      return null;
    }

    return {
      fromBlock,
      toBlock: Math.min(fromBlock + Math.max(maxWindowSize, 1) - 1, safeTip),
    };
  }

  /**
   * Events in `window`, ascending by (block, logIndex). Logs that do not
   * decode into a relayable event are dropped.
   */
  public async scan(window: ScanWindow): Promise<DomainEvent[]> {
    let logs: RawLog[];
    try {
      logs = await this.source.getLogs(window.fromBlock, window.toBlock, {
        address: this.bridgeAddress,
        topics: [TOKENS_LOCKED_TOPIC],
      });
    } catch (error) {
      if (isRelayerError(error) && error.kind === 'transient-fetch') {
        throw error;
      }
      throw new TransientFetchError(
        `Failed to fetch logs ${window.fromBlock}-${window.toBlock} from ${this.source.name}: ${describeError(error)}`,
        { cause: error }
      );
    }

    const events: DomainEvent[] = [];
    for (const log of logs) {
      const event = this.normalize(log, window);
      if (event) {
        events.push(event);
      }
    }

    events.sort(compareEvents);

    this.logger.debug(`Scanned blocks ${window.fromBlock}-${window.toBlock}`, {
      logs: logs.length,
      events: events.length,
    });
    return events;
  }

  private normalize(log: RawLog, window: ScanWindow): DomainEvent | null {
    const where = { txHash: log.transactionHash, logIndex: log.logIndex, blockNumber: log.blockNumber };

    if (log.removed) {
      this.logger.debug('Dropping removed log', where);
      return null;
    }
    if (log.blockNumber < window.fromBlock || log.blockNumber > window.toBlock) {
      this.logger.debug('Dropping log outside the scan window', where);
      return null;
    }
    if (!addressesEqual(log.address, this.bridgeAddress)) {
      this.logger.debug('Dropping log from another contract', { ...where, address: log.address });
      return null;
    }

    let parsed: ethers.utils.LogDescription;
    try {
      parsed = bridgeInterface.parseLog({ topics: log.topics, data: log.data });
    } catch (error) {
      this.logger.debug(`Dropping undecodable log: ${describeError(error)}`, where);
      return null;
    }
    if (parsed.name !== 'TokensLocked') {
      return null;
    }

    const destinationChainId = toSafeNumber(parsed.args.destinationChainId);
    if (destinationChainId !== this.options.destinationChainId) {
      this.logger.debug('Dropping event for another destination', { ...where, destinationChainId });
      return null;
    }

    return {
      sourceChainId: this.options.sourceChainId,
      sourceBlockNumber: log.blockNumber,
      sourceTxHash: log.transactionHash,
      logIndex: log.logIndex,
      sender: String(parsed.args.sender),
      recipient: String(parsed.args.recipient),
      amount: ethers.BigNumber.from(parsed.args.amount).toBigInt(),
      assetId: String(parsed.args.token),
      destinationChainId,
    };
  }
}

export function compareEvents(a: DomainEvent, b: DomainEvent): number {
  return a.sourceBlockNumber - b.sourceBlockNumber || a.logIndex - b.logIndex;
}

function addressesEqual(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

// Chain IDs beyond 2^53 cannot match a configured destination
function toSafeNumber(value: unknown): number {
  const big = ethers.BigNumber.from(value).toBigInt();
  return big <= BigInt(Number.MAX_SAFE_INTEGER) ? Number(big) : -1;
}
