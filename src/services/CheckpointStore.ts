import { promises as fs } from 'fs';
import path from 'path';
import { Checkpoint } from '../types';
import { StorageError, describeError } from '../utils/errors';
import { Logger, componentLogger } from '../utils/logger';

const STATE_VERSION = 1;

interface CheckpointFile {
  version: number;
  chainId: number;
  lastScannedBlock: number;
  processedIds: string[];
  updatedAt: string;
}

/**
 * Durable relay progress plus a bounded set of processed idempotency keys
 */
export interface CheckpointStore {
  load(): Promise<Checkpoint>;
  current(): Checkpoint;
  has(id: string): boolean;
  commit(newLastBlock: number, newlyProcessedIds: readonly string[]): Promise<Checkpoint>;
}

/**
 * Insertion-ordered set that evicts its oldest entries past `capacity`
 */
export class BoundedIdSet {
  private readonly ids = new Set<string>();

  constructor(private readonly capacity: number, initial: Iterable<string> = []) {
    this.addAll(initial);
  }

  public has(id: string): boolean {
    return this.ids.has(id);
  }

  public addAll(ids: Iterable<string>): void {
    for (const id of ids) {
      this.ids.add(id);
    }
    for (const oldest of this.ids) {
      if (this.ids.size <= this.capacity) break;
      this.ids.delete(oldest);
    }
  }

  public clone(): BoundedIdSet {
    return new BoundedIdSet(this.capacity, this.ids);
  }

  public toArray(): string[] {
    return Array.from(this.ids);
  }

  public get size(): number {
    return this.ids.size;
  }
}

/**
 * JSON file checkpoint. Commits go to `<path>.tmp` first and are renamed
 * over the real file, so a crash leaves either the old or the new state.
 */
export class FileCheckpointStore implements CheckpointStore {
  private checkpoint: Checkpoint;
  private processed: BoundedIdSet;
  private readonly logger: Logger;

  constructor(
    private readonly filePath: string,
    private readonly chainId: number,
    private readonly dedupCapacity: number,
    logger: Logger = componentLogger('checkpoint-store')
  ) {
    this.logger = logger;
    this.checkpoint = this.zeroCheckpoint();
    this.processed = new BoundedIdSet(dedupCapacity);
  }

  public async load(): Promise<Checkpoint> {
    let contents: string;
    try {
      contents = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        this.logger.warn(`No checkpoint at ${this.filePath}, starting from the zero checkpoint`);
        return this.reset();
      }
      throw new StorageError(`Failed to read checkpoint ${this.filePath}: ${describeError(error)}`, { cause: error });
    }

    let parsed: CheckpointFile;
    try {
      parsed = parseCheckpointFile(JSON.parse(contents));
    } catch (error) {
      this.logger.warn(`Ignoring corrupt checkpoint at ${this.filePath}: ${describeError(error)}`);
      return this.reset();
    }

    if (parsed.chainId !== this.chainId) {
      throw new StorageError(
        `Checkpoint ${this.filePath} belongs to chain ${parsed.chainId}, expected ${this.chainId}`
      );
    }

    this.processed = new BoundedIdSet(this.dedupCapacity, parsed.processedIds);
    this.checkpoint = {
      chainId: parsed.chainId,
      lastScannedBlock: parsed.lastScannedBlock,
      processedIds: this.processed.toArray(),
      updatedAt: parsed.updatedAt,
    };

    this.logger.info('Loaded checkpoint', {
      lastScannedBlock: this.checkpoint.lastScannedBlock,
      processedIds: this.processed.size,
      updatedAt: this.checkpoint.updatedAt,
    });
    return this.current();
  }

  public current(): Checkpoint {
    return { ...this.checkpoint, processedIds: [...this.checkpoint.processedIds] };
  }

  public has(id: string): boolean {
    return this.processed.has(id);
  }

  public async commit(newLastBlock: number, newlyProcessedIds: readonly string[]): Promise<Checkpoint> {
    if (newLastBlock < this.checkpoint.lastScannedBlock) {
      throw new StorageError(
        `Refusing to move checkpoint back from ${this.checkpoint.lastScannedBlock} to ${newLastBlock}`
      );
    }

    const processed = this.processed.clone();
    processed.addAll(newlyProcessedIds);

    const next: Checkpoint = {
      chainId: this.chainId,
      lastScannedBlock: newLastBlock,
      processedIds: processed.toArray(),
      updatedAt: new Date().toISOString(),
    };

    await this.write(next);

    this.checkpoint = next;
    this.processed = processed;
    this.logger.debug('Committed checkpoint', {
      lastScannedBlock: newLastBlock,
      added: newlyProcessedIds.length,
    });
    return this.current();
  }

  private async write(checkpoint: Checkpoint): Promise<void> {
    const state: CheckpointFile = {
      version: STATE_VERSION,
      chainId: checkpoint.chainId,
      lastScannedBlock: checkpoint.lastScannedBlock,
      processedIds: checkpoint.processedIds,
      updatedAt: checkpoint.updatedAt ?? new Date().toISOString(),
    };
    const tmpPath = `${this.filePath}.tmp`;

    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      const handle = await fs.open(tmpPath, 'w');
      try {
        await handle.writeFile(JSON.stringify(state, null, 2), 'utf8');
        await handle.sync();
      } finally {
        await handle.close();
      }
      await fs.rename(tmpPath, this.filePath);
    } catch (error) {
      throw new StorageError(`Failed to write checkpoint ${this.filePath}: ${describeError(error)}`, { cause: error });
    }
  }

  private reset(): Checkpoint {
    this.checkpoint = this.zeroCheckpoint();
    this.processed = new BoundedIdSet(this.dedupCapacity);
    return this.current();
  }

  private zeroCheckpoint(): Checkpoint {
    return { chainId: this.chainId, lastScannedBlock: 0, processedIds: [], updatedAt: null };
  }
}

function parseCheckpointFile(value: unknown): CheckpointFile {
  if (typeof value !== 'object' || value === null) {
    throw new Error('checkpoint is not an object');
  }
  const record: Record<string, unknown> = { ...value };
  const { version, chainId, lastScannedBlock, processedIds, updatedAt } = record;

  if (version !== STATE_VERSION) {
    throw new Error(`unsupported checkpoint version ${String(version)}`);
  }
  if (typeof chainId !== 'number' || !Number.isSafeInteger(chainId)) {
    throw new Error('chainId is not an integer');
  }
  if (typeof lastScannedBlock !== 'number' || !Number.isSafeInteger(lastScannedBlock) || lastScannedBlock < 0) {
    throw new Error('lastScannedBlock is not a block number');
  }
  if (!Array.isArray(processedIds) || !processedIds.every((id): id is string => typeof id === 'string')) {
    throw new Error('processedIds is not a list of strings');
  }
  if (typeof updatedAt !== 'string') {
    throw new Error('updatedAt is missing');
  }

  return { version, chainId, lastScannedBlock, processedIds, updatedAt };
}

// fs errors can come from another realm under a test runner, so match on shape
function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
