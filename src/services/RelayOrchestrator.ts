import { BackoffConfig, StartBlock } from '../config/types';
import { Checkpoint, ChainClient, DomainEvent, RelayAction, ScanWindow } from '../types';
import { Backoff } from '../utils/backoff';
import {
  MalformedEventError,
  StartupError,
  StorageError,
  SubmissionError,
  TransientFetchError,
  describeError
} from '../utils/errors';
import { Logger } from '../utils/logger';
import { sleep } from '../utils/sleep';
import { ActionBuilder } from './ActionBuilder';
import { CheckpointStore } from './CheckpointStore';
import { RangeScanner } from './RangeScanner';

export type RelayState =
  | 'IDLE'
  | 'FETCH_TIP'
  | 'COMPUTE_WINDOW'
  | 'SCAN'
  | 'BUILD_AND_SUBMIT'
  | 'COMMIT'
  | 'SLEEP'
  | 'SHUTTING_DOWN';

export interface RelaySettings {
  maxWindowSize: number;
  confirmationLag: number;
  pollingIntervalMs: number;
  startBlock: StartBlock;
  backoff: BackoffConfig;
}

/**
 * Everything one relay loop touches, passed in explicitly
 */
export interface RelayContext {
  source: ChainClient;
  destination: ChainClient;
  store: CheckpointStore;
  scanner: RangeScanner;
  builder: ActionBuilder;
  settings: RelaySettings;
  logger: Logger;
}

export type CycleOutcome =
  | 'no-work'
  | 'completed'
  | 'partial'
  | 'fetch-failed'
  | 'commit-failed'
  | 'failed'
  | 'cancelled';

export interface CycleReport {
  outcome: CycleOutcome;
  tip: number | null;
  window: ScanWindow | null;
  submitted: number;
  duplicates: number;
  rejected: number;
  malformed: number;
  /** lastScannedBlock once the cycle is over */
  committedBlock: number;
  error: Error | null;
}

interface SubmissionPass {
  /** Highest block whose events all reached a terminal outcome */
  lastResolvedBlock: number;
  newIds: string[];
  failure: SubmissionError | null;
  interrupted: boolean;
}

/**
 * The relay control loop: fetch tip, scan one window, submit what is new,
 * commit, sleep. One cycle at a time; nothing runs concurrently.
 */
export class RelayOrchestrator {
  private state: RelayState = 'IDLE';
  private readonly backoff: Backoff;
  private readonly logger: Logger;

  constructor(private readonly context: RelayContext) {
    this.backoff = new Backoff(context.settings.backoff);
    this.logger = context.logger;
  }

  public getState(): RelayState {
    return this.state;
  }

  /**
   * Load the checkpoint and, on a first run, persist the starting point
   */
  public async initialize(): Promise<Checkpoint> {
    const { store, settings } = this.context;
    const checkpoint = await store.load();

    if (checkpoint.updatedAt !== null) {
      this.logger.info(`Resuming after block ${checkpoint.lastScannedBlock}`);
      return checkpoint;
    }

    const baseline = await this.resolveStartBlock(settings.startBlock);
    const committed = await store.commit(Math.max(baseline, checkpoint.lastScannedBlock), []);
    this.logger.info(`No previous state found. Starting scan after block ${committed.lastScannedBlock}`);
    return committed;
  }

  /**
   * Run cycles until `signal` aborts. A cycle that is committing when the
   * signal fires finishes its commit first.
   */
  public async run(signal: AbortSignal): Promise<void> {
    this.logger.info('Relay loop started', {
      pollingIntervalMs: this.context.settings.pollingIntervalMs,
      maxWindowSize: this.context.settings.maxWindowSize,
      confirmationLag: this.context.settings.confirmationLag,
    });

    while (!signal.aborted) {
      const report = await this.runCycle(signal);
      if (signal.aborted) break;

      const delay = this.delayAfter(report);
      this.transition('SLEEP');
      await sleep(delay, signal);
      this.transition('IDLE');
    }

    this.transition('SHUTTING_DOWN');
    this.logger.info('Relay loop stopped', {
      lastScannedBlock: this.context.store.current().lastScannedBlock,
    });
  }

  /**
   * One pass through FETCH_TIP .. COMMIT
   */
  public async runCycle(signal?: AbortSignal): Promise<CycleReport> {
    const report: CycleReport = {
      outcome: 'completed',
      tip: null,
      window: null,
      submitted: 0,
      duplicates: 0,
      rejected: 0,
      malformed: 0,
      committedBlock: this.context.store.current().lastScannedBlock,
      error: null,
    };

    try {
      return await this.executeCycle(report, signal);
    } catch (error) {
      this.logger.error(`Relay cycle failed: ${describeError(error)}`, {
        stack: error instanceof Error ? error.stack : undefined,
      });
      return this.finish(report, 'failed', error);
    }
  }

  private async executeCycle(report: CycleReport, signal?: AbortSignal): Promise<CycleReport> {
    const { source, store, scanner, settings } = this.context;

    if (signal?.aborted) return this.finish(report, 'cancelled');
    this.transition('FETCH_TIP');
    let tip: number;
    try {
      tip = await source.getTipHeight();
    } catch (error) {
      return this.fetchFailed(report, error);
    }
    report.tip = tip;

    if (signal?.aborted) return this.finish(report, 'cancelled');
    this.transition('COMPUTE_WINDOW');
    const checkpoint = store.current();
    const window = scanner.nextWindow(checkpoint, tip, settings.maxWindowSize, settings.confirmationLag);
    if (!window) {
      this.logger.debug(`No new confirmed blocks. Current head is ${tip}`);
      return this.finish(report, 'no-work');
    }
    report.window = window;

    if (signal?.aborted) return this.finish(report, 'cancelled');
    this.transition('SCAN');
    let events: DomainEvent[];
    try {
      events = await scanner.scan(window);
    } catch (error) {
      return this.fetchFailed(report, error);
    }

    if (signal?.aborted) return this.finish(report, 'cancelled');
    this.transition('BUILD_AND_SUBMIT');
    const pass = await this.submitEvents(events, window, checkpoint.lastScannedBlock, report, signal);

    this.transition('COMMIT');
    if (pass.lastResolvedBlock > checkpoint.lastScannedBlock || pass.newIds.length > 0) {
      try {
        const committed = await store.commit(pass.lastResolvedBlock, pass.newIds);
        report.committedBlock = committed.lastScannedBlock;
      } catch (error) {
        if (!(error instanceof StorageError)) throw error;
        this.logger.error(`Checkpoint commit failed, keeping block ${checkpoint.lastScannedBlock}: ${error.message}`);
        return this.finish(report, 'commit-failed', error);
      }
    }

    this.logger.info(`Processed blocks ${window.fromBlock}-${window.toBlock}`, {
      events: events.length,
      submitted: report.submitted,
      duplicates: report.duplicates,
      rejected: report.rejected,
      malformed: report.malformed,
      lastScannedBlock: report.committedBlock,
    });

    if (pass.failure) return this.finish(report, 'partial', pass.failure);
    if (pass.interrupted) return this.finish(report, 'cancelled');
    return this.finish(report, 'completed');
  }

  /**
   * Submit events in order. Stops at the first retryable failure so the
   * checkpoint never passes a block holding an unsubmitted event.
   */
  private async submitEvents(
    events: DomainEvent[],
    window: ScanWindow,
    lastScannedBlock: number,
    report: CycleReport,
    signal?: AbortSignal
  ): Promise<SubmissionPass> {
    const { builder, destination, store } = this.context;
    const newIds: string[] = [];
    const seen = new Set<string>();
    const stopBefore = (event: DomainEvent) => Math.max(event.sourceBlockNumber - 1, lastScannedBlock);

    for (const event of events) {
      if (signal?.aborted) {
        return { lastResolvedBlock: stopBefore(event), newIds, failure: null, interrupted: true };
      }

      let action: RelayAction;
      try {
        action = builder.build(event);
      } catch (error) {
        if (!(error instanceof MalformedEventError)) throw error;
        report.malformed++;
        this.logger.warn(`Skipping malformed event: ${error.message}`, { blockNumber: event.sourceBlockNumber });
        continue;
      }

      const key = action.idempotencyKey;
      if (store.has(key) || seen.has(key)) {
        report.duplicates++;
        this.logger.debug(`Skipping already processed event ${key}`);
        continue;
      }
      seen.add(key);

      try {
        const signed = await destination.sign(action);
        const handle = await destination.submit(signed);
        report.submitted++;
        newIds.push(key);
        this.logger.info(`Relayed ${key}`, {
          recipient: action.recipient,
          amount: action.amount.toString(),
          asset: action.assetId,
          txHash: handle.txHash,
        });
      } catch (error) {
        const failure = error instanceof SubmissionError
          ? error
          : new SubmissionError(`Submission of ${key} failed: ${describeError(error)}`, true, { cause: error });

        if (!failure.retryable) {
          report.rejected++;
          newIds.push(key);
          this.logger.error(`Mint for ${key} permanently rejected, not retrying: ${failure.message}`);
          continue;
        }

        this.logger.warn(`Submission failed, stopping window at block ${event.sourceBlockNumber}: ${failure.message}`);
        return { lastResolvedBlock: stopBefore(event), newIds, failure, interrupted: false };
      }
    }

    return { lastResolvedBlock: window.toBlock, newIds, failure: null, interrupted: false };
  }

  private async resolveStartBlock(startBlock: StartBlock): Promise<number> {
    if (startBlock !== 'latest') {
      return Math.max(startBlock - 1, 0);
    }

    try {
      const tip = await this.context.source.getTipHeight();
      return Math.max(tip - this.context.settings.confirmationLag, 0);
    } catch (error) {
      throw new StartupError(`Cannot resolve latest block on ${this.context.source.name}: ${describeError(error)}`, {
        cause: error,
      });
    }
  }

  private fetchFailed(report: CycleReport, error: unknown): CycleReport {
    if (!(error instanceof TransientFetchError)) throw error;
    this.logger.warn(`Source fetch failed, retrying next cycle: ${error.message}`);
    return this.finish(report, 'fetch-failed', error);
  }

  private finish(report: CycleReport, outcome: CycleOutcome, error?: unknown): CycleReport {
    report.outcome = outcome;
    report.committedBlock = this.context.store.current().lastScannedBlock;
    if (error !== undefined) {
      report.error = error instanceof Error ? error : new Error(String(error));
    }
    return report;
  }

  private delayAfter(report: CycleReport): number {
    const { pollingIntervalMs } = this.context.settings;
    if (report.outcome === 'completed' || report.outcome === 'no-work') {
      this.backoff.reset();
      return pollingIntervalMs;
    }

    const delay = Math.max(pollingIntervalMs, this.backoff.next());
    this.logger.info(`Backing off for ${delay}ms after ${report.outcome} cycle`, {
      consecutiveFailures: this.backoff.consecutiveFailures,
    });
    return delay;
  }

  private transition(next: RelayState): void {
    if (next !== this.state) {
      this.logger.debug(`State ${this.state} -> ${next}`);
      this.state = next;
    }
  }
}
