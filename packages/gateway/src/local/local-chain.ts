/**
 * Local Chain
 *
 * In-process chain runtime for the devnet and tests.
 *
 * Invariant: one transaction at a time, and every transaction either commits
 * all of its effects or none of them.
 *
 * - Transactions are serialized through a lock queue
 * - Tracked state is checkpointed before and restored on any throw
 * - Events and after-commit effects are buffered until commit
 */

import { ethers } from 'ethers';
import { address } from '../boundaries/index.js';
import type { Address } from '../boundaries/index.js';
import type { CallContext, ChainEvent, Checkpointable, EventSink } from '../types.js';

/**
 * Revert raised by the local stand-ins, carrying a contract-style reason.
 */
export class Revert extends Error {
  constructor(reason: string) {
    super(reason);
    this.name = 'Revert';
  }
}

export interface CommittedEvent {
  chainId: number;
  txIndex: number;
  event: ChainEvent;
}

export type ChainEventHandler = (committed: CommittedEvent) => void;

interface ChainLock {
  held: boolean;
  queue: Array<() => void>;
}

// =============================================================================
// LOCAL CHAIN
// =============================================================================

export class LocalChain implements EventSink {
  private tracked: Checkpointable[] = [];
  private handlers: ChainEventHandler[] = [];
  private history: CommittedEvent[] = [];
  private lock: ChainLock = { held: false, queue: [] };
  private pendingEffects: Array<() => void> | null = null;
  private txCount = 0;

  constructor(
    readonly name: string,
    readonly chainId: number
  ) {}

  /**
   * Deterministic address for a contract deployed under `label`.
   */
  deriveAddress(label: string): Address {
    return address(ethers.dataSlice(ethers.id(`${this.name}/${label}`), 12));
  }

  /**
   * Register state that must roll back with failed transactions.
   */
  track(state: Checkpointable): void {
    this.tracked.push(state);
  }

  /**
   * Subscribe to committed events.
   */
  onEvent(handler: ChainEventHandler): void {
    this.handlers.push(handler);
  }

  events(): CommittedEvent[] {
    return [...this.history];
  }

  get transactionCount(): number {
    return this.txCount;
  }

  inTransaction(): boolean {
    return this.pendingEffects !== null;
  }

  /**
   * Buffer an event for the running transaction.
   */
  emit(event: ChainEvent): void {
    this.afterCommit(() => {
      const committed: CommittedEvent = { chainId: this.chainId, txIndex: this.txCount, event };
      this.history.push(committed);
      for (const handler of this.handlers) {
        try {
          handler(committed);
        } catch (e) {
          console.error('Chain event handler error:', e);
        }
      }
    });
  }

  /**
   * Schedule `effect` to run only if the running transaction commits.
   */
  afterCommit(effect: () => void): void {
    if (!this.pendingEffects) {
      throw new Error(`No transaction is running on ${this.name}`);
    }
    this.pendingEffects.push(effect);
  }

  /**
   * Run `fn` as one transaction sent by `sender` with `value` attached.
   */
  async transact<T>(sender: Address, value: bigint, fn: (ctx: CallContext) => Promise<T>): Promise<T> {
    await this.acquire();

    const restores = this.tracked.map((state) => state.checkpoint());
    const effects: Array<() => void> = [];
    this.pendingEffects = effects;

    try {
      const result = await fn({ sender, value });
      this.pendingEffects = null;
      this.txCount += 1;
      for (const effect of effects) {
        effect();
      }
      return result;
    } catch (error) {
      this.pendingEffects = null;
      for (const restore of restores.reverse()) {
        restore();
      }
      throw error;
    } finally {
      this.release();
    }
  }

  // ===========================================================================
  // Lock
  // ===========================================================================

  private async acquire(): Promise<void> {
    if (!this.lock.held) {
      this.lock.held = true;
      return;
    }
    await new Promise<void>((resolve) => {
      this.lock.queue.push(resolve);
    });
  }

  private release(): void {
    const next = this.lock.queue.shift();
    if (next) {
      // Hand the lock straight to the next waiter
      next();
    } else {
      this.lock.held = false;
    }
  }
}
