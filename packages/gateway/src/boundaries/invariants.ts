/**
 * Gateway Boundary Invariants
 *
 * Types, guards, and assertions that enforce the gateway's hard constraints
 * at compile-time and runtime.
 *
 * 1. Addresses are checksummed before they reach the core
 * 2. Transfer nonces are uint64 values assigned by CCTP
 * 3. Payloads crossing a boundary are 0x-prefixed hex
 * 4. No reentrant call may observe a half-finished transfer
 */

import { ethers } from 'ethers';
import { StatePreconditionError, ValidationError } from './errors.js';

// =============================================================================
// BRANDED TYPES (Compile-time enforcement)
// =============================================================================

declare const __brand: unique symbol;
type Brand<T, B> = T & { readonly [__brand]: B };

/**
 * EIP-55 checksummed 20-byte address.
 */
export type Address = Brand<string, 'Address'>;

/**
 * 0x-prefixed hex byte string (calldata, CCTP messages, attestations).
 */
export type HexData = Brand<string, 'HexData'>;

export const MAX_UINT64 = (1n << 64n) - 1n;

/**
 * Create a checksummed address. The ONLY way to obtain an Address.
 */
export function address(raw: string): Address {
  if (!ethers.isAddress(raw)) {
    throw new ValidationError('INVALID_ADDRESS', `Invalid address: ${raw}`);
  }
  return ethers.getAddress(raw) as Address;
}

export function hexData(raw: string): HexData {
  if (!ethers.isHexString(raw) || raw.length % 2 !== 0) {
    throw new ValidationError('INVALID_HEX', `Expected 0x-prefixed hex bytes, got: ${raw}`);
  }
  return raw.toLowerCase() as HexData;
}

export const ZERO_ADDRESS = address(ethers.ZeroAddress);

export const ZERO_BYTES32 = hexData(ethers.ZeroHash);

export const EMPTY_BYTES = hexData('0x');

export function isZeroAddress(value: Address): boolean {
  return value === ZERO_ADDRESS;
}

/**
 * Parse a transfer nonce. CCTP nonces are uint64.
 */
export function transferNonce(raw: bigint | number | string): bigint {
  let value: bigint;
  try {
    value = BigInt(raw);
  } catch {
    throw new ValidationError('INVALID_NONCE', `Transfer nonce is not an integer: ${String(raw)}`);
  }
  if (value < 0n || value > MAX_UINT64) {
    throw new ValidationError('INVALID_NONCE', `Transfer nonce out of uint64 range: ${value}`);
  }
  return value;
}

// =============================================================================
// BYTES32 CONVERSIONS
// =============================================================================

/**
 * Left-pad an address to bytes32, as CCTP encodes recipients and callers.
 */
export function toBytes32(value: Address): HexData {
  return hexData(ethers.zeroPadValue(value, 32));
}

/**
 * Recover an address from its bytes32 form. The upper 12 bytes must be zero.
 */
export function fromBytes32(value: string): Address {
  if (!ethers.isHexString(value, 32)) {
    throw new ValidationError('INVALID_BYTES32', `Expected bytes32, got: ${value}`);
  }
  if (ethers.dataSlice(value, 0, 12) !== ethers.dataSlice(ethers.ZeroHash, 0, 12)) {
    throw new ValidationError('INVALID_BYTES32', `bytes32 value is not a padded address: ${value}`);
  }
  return address(ethers.dataSlice(value, 12));
}

// =============================================================================
// REENTRANCY GUARD
// =============================================================================

/**
 * Single-writer lock scoped to one guarded call.
 *
 * Any collaborator call may re-enter the gateway before returning. A guarded
 * entry point that is re-entered while another guarded call is in flight is
 * rejected outright.
 */
export class ReentrancyGuard {
  private entered = false;

  async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    if (this.entered) {
      throw new StatePreconditionError('REENTRANT_CALL', `Reentrant call into ${operation}`);
    }
    this.entered = true;
    try {
      return await fn();
    } finally {
      this.entered = false;
    }
  }

  isEntered(): boolean {
    return this.entered;
  }
}
