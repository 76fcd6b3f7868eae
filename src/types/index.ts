/**
 * Durable relay progress for one source chain
 */
export interface Checkpoint {
  /** Source chain the progress belongs to */
  chainId: number;
  /** Highest source block whose events are fully resolved */
  lastScannedBlock: number;
  /** Idempotency keys of recently processed events, oldest first */
  processedIds: string[];
  /** ISO timestamp of the last durable commit, null if never persisted */
  updatedAt: string | null;
}

/**
 * A `TokensLocked` log normalized into a typed event
 */
export interface DomainEvent {
  sourceChainId: number;
  sourceBlockNumber: number;
  sourceTxHash: string;
  logIndex: number;
  sender: string;
  recipient: string;
  amount: bigint;
  /** Token contract address on the source chain */
  assetId: string;
  /** Chain the sender asked the tokens to be minted on */
  destinationChainId: number;
}

/**
 * The mint instruction submitted to the destination chain
 */
export interface RelayAction {
  destinationChainId: number;
  recipient: string;
  amount: bigint;
  assetId: string;
  /** `<sourceChainId>:<sourceTxHash>:<logIndex>` */
  idempotencyKey: string;
  /** keccak256 of the idempotency key, passed on-chain as bytes32 */
  sourceRef: string;
  /** Orders actions the way the scanner orders events */
  nonceHint: bigint;
}

/** Inclusive block range */
export interface ScanWindow {
  fromBlock: number;
  toBlock: number;
}

export interface RawLog {
  blockNumber: number;
  transactionHash: string;
  logIndex: number;
  address: string;
  topics: string[];
  data: string;
  removed: boolean;
}

export interface LogFilter {
  address: string;
  topics: string[];
}

export interface SignedAction {
  action: RelayAction;
  rawTransaction: string;
  hash: string;
}

export interface SubmissionHandle {
  txHash: string;
  /** Block the transaction was mined in, null when receipts are not awaited */
  blockNumber: number | null;
}

/**
 * Everything the relay core needs from a chain. Reads fail with
 * TransientFetchError, sign/submit with SubmissionError.
 */
export interface ChainClient {
  readonly name: string;
  getChainId(): Promise<number>;
  getTipHeight(): Promise<number>;
  getLogs(fromBlock: number, toBlock: number, filter: LogFilter): Promise<RawLog[]>;
  sign(action: RelayAction): Promise<SignedAction>;
  submit(signed: SignedAction): Promise<SubmissionHandle>;
}
