export * from './ActionBuilder';
export * from './CheckpointStore';
export * from './EvmChainClient';
export * from './RangeScanner';
export * from './RelayOrchestrator';
