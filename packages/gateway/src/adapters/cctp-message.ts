/**
 * CCTP v1 message layout.
 *
 * Header (116 bytes, packed):
 *   version u32 | sourceDomain u32 | destinationDomain u32 | nonce u64 |
 *   sender b32 | recipient b32 | destinationCaller b32
 * followed by the body. Burn messages carry:
 *   version u32 | burnToken b32 | mintRecipient b32 | amount u256 | messageSender b32
 */

import { ethers } from 'ethers';
import { hexData, ValidationError } from '../boundaries/index.js';
import type { HexData } from '../boundaries/index.js';

export const CCTP_MESSAGE_VERSION = 0;
export const CCTP_BURN_MESSAGE_VERSION = 0;

const HEADER_LENGTH = 116;
const BURN_BODY_LENGTH = 132;

export interface CctpMessage {
  version: number;
  sourceDomain: number;
  destinationDomain: number;
  nonce: bigint;
  sender: HexData;
  recipient: HexData;
  destinationCaller: HexData;
  body: HexData;
}

export interface BurnMessage {
  version: number;
  burnToken: HexData;
  mintRecipient: HexData;
  amount: bigint;
  messageSender: HexData;
}

export function encodeCctpMessage(message: CctpMessage): HexData {
  return hexData(
    ethers.solidityPacked(
      ['uint32', 'uint32', 'uint32', 'uint64', 'bytes32', 'bytes32', 'bytes32', 'bytes'],
      [
        message.version,
        message.sourceDomain,
        message.destinationDomain,
        message.nonce,
        message.sender,
        message.recipient,
        message.destinationCaller,
        message.body,
      ]
    )
  );
}

export function decodeCctpMessage(raw: string): CctpMessage {
  const message = hexData(raw);
  if (ethers.dataLength(message) < HEADER_LENGTH) {
    throw new ValidationError('MALFORMED_MESSAGE', 'CCTP message shorter than its header');
  }
  return {
    version: readUint(message, 0, 4),
    sourceDomain: readUint(message, 4, 8),
    destinationDomain: readUint(message, 8, 12),
    nonce: ethers.toBigInt(ethers.dataSlice(message, 12, 20)),
    sender: hexData(ethers.dataSlice(message, 20, 52)),
    recipient: hexData(ethers.dataSlice(message, 52, 84)),
    destinationCaller: hexData(ethers.dataSlice(message, 84, 116)),
    body: hexData(ethers.dataSlice(message, HEADER_LENGTH)),
  };
}

export function encodeBurnMessage(body: BurnMessage): HexData {
  return hexData(
    ethers.solidityPacked(
      ['uint32', 'bytes32', 'bytes32', 'uint256', 'bytes32'],
      [body.version, body.burnToken, body.mintRecipient, body.amount, body.messageSender]
    )
  );
}

export function decodeBurnMessage(raw: string): BurnMessage {
  const body = hexData(raw);
  if (ethers.dataLength(body) !== BURN_BODY_LENGTH) {
    throw new ValidationError('MALFORMED_MESSAGE', 'CCTP burn message has the wrong length');
  }
  return {
    version: readUint(body, 0, 4),
    burnToken: hexData(ethers.dataSlice(body, 4, 36)),
    mintRecipient: hexData(ethers.dataSlice(body, 36, 68)),
    amount: ethers.toBigInt(ethers.dataSlice(body, 68, 100)),
    messageSender: hexData(ethers.dataSlice(body, 100, 132)),
  };
}

/**
 * Read only the nonce, without decoding the body.
 */
export function cctpMessageNonce(raw: string): bigint {
  return decodeCctpMessage(raw).nonce;
}

function readUint(data: HexData, start: number, end: number): number {
  return Number(ethers.toBigInt(ethers.dataSlice(data, start, end)));
}
