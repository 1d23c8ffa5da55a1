/**
 * Domain Message Relay
 *
 * Wraps the generic cross-domain messenger for one gateway and its
 * counterpart. Authentication of relayed calls is the messenger's own proof
 * mechanism; this module only checks who the messenger says is calling.
 */

import { AuthorizationError, callCollaborator } from '../boundaries/index.js';
import type { Address, HexData } from '../boundaries/index.js';
import { callFrom } from '../types.js';
import type { CallContext } from '../types.js';

// =============================================================================
// MESSENGER INTERFACE
// =============================================================================

export interface CrossDomainMessenger {
  readonly address: Address;

  /**
   * Queue `message` for `target` on the other domain. `ctx.value - value`
   * is the relay fee.
   */
  sendMessage(
    ctx: CallContext,
    target: Address,
    value: bigint,
    message: HexData,
    gasLimit: bigint
  ): Promise<void>;

  /**
   * Sender on the other domain of the message currently being delivered.
   */
  xDomainMessageSender(): Address;

  /**
   * Low-level entry: decode `calldata` against the messenger's own ABI and
   * run it (typically a relay with proof).
   */
  execute(ctx: CallContext, calldata: HexData): Promise<void>;
}

/**
 * A contract the messenger can deliver calldata to.
 */
export interface MessageTarget {
  handleMessage(ctx: CallContext, calldata: HexData): Promise<void>;
}

// =============================================================================
// RELAY
// =============================================================================

export class DomainMessageRelay {
  constructor(
    private readonly self: Address,
    private readonly messenger: CrossDomainMessenger,
    readonly counterpart: Address
  ) {}

  get messengerAddress(): Address {
    return this.messenger.address;
  }

  /**
   * Send `payload` to the counterpart, forwarding `attachedValue` as the fee.
   */
  async send(attachedValue: bigint, payload: HexData, gasLimit: bigint): Promise<void> {
    await callCollaborator('MESSAGE_SEND_FAILED', 'Cross-domain message send failed', () =>
      this.messenger.sendMessage(callFrom(this.self, attachedValue), this.counterpart, 0n, payload, gasLimit)
    );
  }

  /**
   * Reject any call that is not the messenger delivering on behalf of the
   * counterpart.
   */
  assertFromCounterpart(ctx: CallContext): void {
    if (ctx.sender !== this.messenger.address) {
      throw new AuthorizationError('NOT_MESSENGER', `Caller ${ctx.sender} is not the messenger`);
    }
    const xDomainSender = this.messenger.xDomainMessageSender();
    if (xDomainSender !== this.counterpart) {
      throw new AuthorizationError(
        'NOT_COUNTERPART',
        `Cross-domain sender ${xDomainSender} is not the counterpart ${this.counterpart}`
      );
    }
  }

  /**
   * Hand caller-supplied calldata to the messenger.
   */
  async relay(encodedCall: HexData): Promise<void> {
    await callCollaborator('RELAY_FAILED', 'Relayed message execution failed', () =>
      this.messenger.execute(callFrom(this.self), encodedCall)
    );
  }
}
