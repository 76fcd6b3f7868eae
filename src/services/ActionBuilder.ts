import { ethers } from 'ethers';
import { DomainEvent, RelayAction } from '../types';
import { MalformedEventError } from '../utils/errors';

const TX_HASH_PATTERN = /^0x[0-9a-fA-F]+$/;

/**
 * Identity of a source log; stable for the lifetime of the deployment
 */
export function idempotencyKeyOf(event: Pick<DomainEvent, 'sourceChainId' | 'sourceTxHash' | 'logIndex'>): string {
  return `${event.sourceChainId}:${event.sourceTxHash.toLowerCase()}:${event.logIndex}`;
}

/**
 * Maps a lock event to the mint it should cause. Pure: the same event
 * always builds the same action.
 */
export class ActionBuilder {
  constructor(private readonly destinationChainId: number) {}

  public build(event: DomainEvent): RelayAction {
    const idempotencyKey = idempotencyKeyOf(event);
    const fail: (reason: string) => never = reason => {
      throw new MalformedEventError(`Malformed event ${idempotencyKey}: ${reason}`, idempotencyKey);
    };

    if (!Number.isSafeInteger(event.sourceChainId) || event.sourceChainId <= 0) {
      fail(`invalid source chain ID ${event.sourceChainId}`);
    }
    if (!TX_HASH_PATTERN.test(event.sourceTxHash)) {
      fail(`invalid transaction hash ${event.sourceTxHash}`);
    }
    if (!Number.isSafeInteger(event.logIndex) || event.logIndex < 0) {
      fail(`invalid log index ${event.logIndex}`);
    }
    if (!Number.isSafeInteger(event.sourceBlockNumber) || event.sourceBlockNumber < 0) {
      fail(`invalid block number ${event.sourceBlockNumber}`);
    }
    if (event.amount <= 0n) {
      fail(`amount must be positive, got ${event.amount}`);
    }

    // the mint does not carry the sender, but a bad one still marks a bad log
    checkedAddress(event.sender, 'sender', fail);
    const recipient = checkedAddress(event.recipient, 'recipient', fail);
    const assetId = checkedAddress(event.assetId, 'asset', fail);

    return {
      destinationChainId: this.destinationChainId,
      recipient,
      amount: event.amount,
      assetId,
      idempotencyKey,
      sourceRef: ethers.utils.id(idempotencyKey),
      nonceHint: (BigInt(event.sourceBlockNumber) << 32n) | BigInt(event.logIndex),
    };
  }
}

function checkedAddress(value: string, field: string, fail: (reason: string) => never): string {
  if (!ethers.utils.isAddress(value)) {
    return fail(`${field} is not an address: ${value}`);
  }
  const address = ethers.utils.getAddress(value);
  if (address === ethers.constants.AddressZero) {
    return fail(`${field} is the zero address`);
  }
  return address;
}
