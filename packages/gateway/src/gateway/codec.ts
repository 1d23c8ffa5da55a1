/**
 * Gateway wire formats (ethers ABI).
 *
 * - finalizeWithdraw calldata carried by the cross-domain messenger
 * - transfer data: abi.encode(uint256 nonce, bytes payload)
 * - router data:   abi.encode(address originalSender, bytes originalData)
 */

import { ethers } from 'ethers';
import { address, hexData, ValidationError } from '../boundaries/index.js';
import type { Address, HexData } from '../boundaries/index.js';

export const GATEWAY_ABI = [
  'function finalizeWithdraw(address sourceToken, address destinationToken, address from, address to, uint256 amount, bytes data)',
];

const gatewayInterface = new ethers.Interface(GATEWAY_ABI);
const abiCoder = ethers.AbiCoder.defaultAbiCoder();

export interface FinalizeWithdrawArgs {
  sourceToken: Address;
  destinationToken: Address;
  from: Address;
  to: Address;
  amount: bigint;
  data: HexData;
}

// =============================================================================
// GATEWAY CALLDATA
// =============================================================================

export function encodeFinalizeWithdraw(args: FinalizeWithdrawArgs): HexData {
  return hexData(
    gatewayInterface.encodeFunctionData('finalizeWithdraw', [
      args.sourceToken,
      args.destinationToken,
      args.from,
      args.to,
      args.amount,
      args.data,
    ])
  );
}

export function decodeFinalizeWithdraw(calldata: HexData): FinalizeWithdrawArgs {
  let parsed: ethers.TransactionDescription | null;
  try {
    parsed = gatewayInterface.parseTransaction({ data: calldata });
  } catch {
    parsed = null;
  }
  if (!parsed || parsed.name !== 'finalizeWithdraw') {
    throw new ValidationError('UNKNOWN_CALL', `Unsupported gateway call: ${calldata.slice(0, 10)}`);
  }

  const [sourceToken, destinationToken, from, to, amount, data] = parsed.args.toArray();
  return {
    sourceToken: readAddress(sourceToken, 'sourceToken'),
    destinationToken: readAddress(destinationToken, 'destinationToken'),
    from: readAddress(from, 'from'),
    to: readAddress(to, 'to'),
    amount: readBigInt(amount, 'amount'),
    data: readBytes(data, 'data'),
  };
}

// =============================================================================
// TRANSFER DATA
// =============================================================================

export function encodeTransferData(nonce: bigint, payload: HexData): HexData {
  return hexData(abiCoder.encode(['uint256', 'bytes'], [nonce, payload]));
}

export function decodeTransferData(data: HexData): { nonce: bigint; payload: HexData } {
  const [nonce, payload] = decodePair(['uint256', 'bytes'], data, 'transfer data');
  return {
    nonce: readBigInt(nonce, 'nonce'),
    payload: readBytes(payload, 'payload'),
  };
}

// =============================================================================
// ROUTER DATA
// =============================================================================

export function encodeRouterData(originalSender: Address, originalData: HexData): HexData {
  return hexData(abiCoder.encode(['address', 'bytes'], [originalSender, originalData]));
}

export function decodeRouterData(data: HexData): { from: Address; data: HexData } {
  const [from, inner] = decodePair(['address', 'bytes'], data, 'router data');
  return {
    from: readAddress(from, 'originalSender'),
    data: readBytes(inner, 'originalData'),
  };
}

// =============================================================================
// HELPERS
// =============================================================================

function decodePair(types: [string, string], data: HexData, what: string): unknown[] {
  try {
    return abiCoder.decode(types, data).toArray();
  } catch {
    throw new ValidationError('MALFORMED_PAYLOAD', `Cannot decode ${what}`);
  }
}

function readAddress(value: unknown, field: string): Address {
  if (typeof value !== 'string') {
    throw new ValidationError('MALFORMED_PAYLOAD', `${field} is not an address`);
  }
  return address(value);
}

function readBigInt(value: unknown, field: string): bigint {
  if (typeof value !== 'bigint') {
    throw new ValidationError('MALFORMED_PAYLOAD', `${field} is not a uint256`);
  }
  return value;
}

function readBytes(value: unknown, field: string): HexData {
  if (typeof value !== 'string') {
    throw new ValidationError('MALFORMED_PAYLOAD', `${field} is not bytes`);
  }
  return hexData(value);
}
