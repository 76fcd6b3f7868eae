import { ethers } from 'ethers';
import { RelayAction } from '../types';

// ABI fragments for the lock/mint bridge pair
export const BRIDGE_ABI = [
  'event TokensLocked(address indexed token, address indexed sender, address indexed recipient, uint256 amount, uint256 destinationChainId)',
  'function mintTokens(address token, address recipient, uint256 amount, bytes32 sourceTransactionHash) external'
];

export const bridgeInterface = new ethers.utils.Interface(BRIDGE_ABI);

export const TOKENS_LOCKED_TOPIC = bridgeInterface.getEventTopic('TokensLocked');

/**
 * Calldata for `mintTokens`; identical actions always encode to identical bytes
 */
export function encodeMintCall(action: RelayAction): string {
  return bridgeInterface.encodeFunctionData('mintTokens', [
    action.assetId,
    action.recipient,
    action.amount.toString(),
    action.sourceRef
  ]);
}
