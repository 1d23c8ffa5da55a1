/**
 * Gateway Types
 *
 * Shared type definitions for the transfer state machine, its collaborators
 * and the events committed by a chain.
 */

import type { Address, HexData } from './boundaries/index.js';

// =============================================================================
// TRANSFER STATE
// =============================================================================

export type TransferStatus =
  | 'NONE'     // Nothing observed for this nonce
  | 'PENDING'  // Messenger notification delivered, mint not yet claimed
  | 'DONE';    // Mint claimed (terminal)

/**
 * One cross-chain transfer. Never stored as a whole: built at deposit,
 * carried in the messenger payload, consumed at finalize.
 */
export interface TransferRecord {
  sourceToken: Address;
  destinationToken: Address;
  from: Address;
  to: Address;
  amount: bigint;
  data: HexData;
  nonce: bigint;
}

// =============================================================================
// CALL CONTEXT
// =============================================================================

/**
 * Caller identity and attached native value for one call frame.
 * Contracts pass a fresh context with their own address when they call out.
 */
export interface CallContext {
  sender: Address;
  value: bigint;
}

export function callFrom(sender: Address, value: bigint = 0n): CallContext {
  return { sender, value };
}

// =============================================================================
// TRANSACTIONAL STATE
// =============================================================================

/**
 * State that takes part in chain transactions.
 * `checkpoint` captures the current state and returns a function restoring it.
 */
export interface Checkpointable {
  checkpoint(): () => void;
}

/**
 * Sink for events raised while a transaction runs.
 * Events are buffered and only delivered if the transaction commits.
 */
export interface EventSink {
  emit(event: ChainEvent): void;
}

// =============================================================================
// GATEWAY EVENTS
// =============================================================================

export type GatewayEvent =
  | ({ type: 'DEPOSIT_INITIATED'; gateway: Address } & TransferRecord)
  | ({ type: 'WITHDRAW_FINALIZED'; gateway: Address } & TransferRecord)
  | { type: 'TRANSFER_CLAIMED'; gateway: Address; nonce: bigint; claimer: Address }
  | { type: 'CIRCLE_CALLER_UPDATED'; gateway: Address; tokenMessenger: Address; messageTransmitter: Address }
  | { type: 'PAUSE_CHANGED'; gateway: Address; flow: 'deposit' | 'withdraw'; paused: boolean };

// =============================================================================
// COLLABORATOR EVENTS
// =============================================================================

export type CctpEvent =
  | {
      type: 'CCTP_DEPOSIT_FOR_BURN';
      tokenMessenger: Address;
      nonce: bigint;
      burnToken: Address;
      amount: bigint;
      depositor: Address;
      mintRecipient: HexData;
      destinationDomain: number;
      destinationCaller: HexData;
    }
  | { type: 'CCTP_MESSAGE_SENT'; messageTransmitter: Address; sourceDomain: number; nonce: bigint; message: HexData }
  | { type: 'CCTP_MESSAGE_RECEIVED'; messageTransmitter: Address; caller: Address; sourceDomain: number; nonce: bigint }
  | { type: 'CCTP_MINT_AND_WITHDRAW'; tokenMessenger: Address; mintRecipient: Address; amount: bigint; token: Address };

export interface MessengerEnvelope {
  from: Address;
  to: Address;
  value: bigint;
  messageNonce: bigint;
  message: HexData;
}

export type MessengerEvent =
  | { type: 'MESSENGER_SENT_MESSAGE'; messenger: Address; envelope: MessengerEnvelope; gasLimit: bigint; fee: bigint }
  | { type: 'MESSENGER_RELAYED_MESSAGE'; messenger: Address; messageHash: HexData };

export type ChainEvent = GatewayEvent | CctpEvent | MessengerEvent;
