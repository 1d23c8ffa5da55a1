/**
 * Message Status Ledger
 *
 * Per-nonce transfer state: NONE → PENDING → DONE.
 *
 * Guarantees:
 * - Monotonic: no transition other than NONE→PENDING and PENDING→DONE exists
 * - Append-only: entries are created at the first PENDING and never deleted
 * - Sole replay guard: every mint or re-notification checks it first
 */

import { StatePreconditionError } from '../boundaries/index.js';
import type { Checkpointable, TransferStatus } from '../types.js';

// =============================================================================
// LEDGER INTERFACE
// =============================================================================

export interface MessageStatusLedger extends Checkpointable {
  /**
   * Current status. Unseen nonces are NONE.
   */
  statusOf(nonce: bigint): TransferStatus;

  /**
   * NONE → PENDING. Fails for any other current status.
   */
  setPending(nonce: bigint): void;

  /**
   * PENDING → DONE. Fails for any other current status.
   */
  setDone(nonce: bigint): void;

  /**
   * Recorded entries in insertion order.
   */
  entries(): Array<{ nonce: bigint; status: TransferStatus }>;
}

// =============================================================================
// IN-MEMORY IMPLEMENTATION
// =============================================================================

export class InMemoryMessageStatusLedger implements MessageStatusLedger {
  private statuses: Map<bigint, TransferStatus> = new Map();

  statusOf(nonce: bigint): TransferStatus {
    return this.statuses.get(nonce) ?? 'NONE';
  }

  setPending(nonce: bigint): void {
    const current = this.statusOf(nonce);
    if (current !== 'NONE') {
      throw new StatePreconditionError(
        'TRANSFER_ALREADY_SEEN',
        `Transfer ${nonce} is ${current}, expected NONE`
      );
    }
    this.statuses.set(nonce, 'PENDING');
  }

  setDone(nonce: bigint): void {
    const current = this.statusOf(nonce);
    if (current !== 'PENDING') {
      throw new StatePreconditionError(
        'TRANSFER_NOT_PENDING',
        `Transfer ${nonce} is ${current}, expected PENDING`
      );
    }
    this.statuses.set(nonce, 'DONE');
  }

  entries(): Array<{ nonce: bigint; status: TransferStatus }> {
    return Array.from(this.statuses, ([nonce, status]) => ({ nonce, status }));
  }

  // Used only to roll back a failed transaction, never as a transition.
  checkpoint(): () => void {
    const saved = new Map(this.statuses);
    return () => {
      this.statuses = saved;
    };
  }
}
