/**
 * Burn/Mint Adapter
 *
 * Wraps the attested burn-and-mint system (CCTP).
 *
 * Implements:
 * - initiateBurn: approve + depositForBurnWithCaller, returning the nonce
 * - claim: receiveMessage on the transmitter, gated by the status ledger
 *
 * Does NOT implement:
 * - attestation signature checks (the transmitter is the trusted oracle)
 * - re-deriving mint recipient or amount (the attested message decides)
 */

import {
  callCollaborator,
  CollaboratorError,
  StatePreconditionError,
  toBytes32,
  ValidationError,
} from '../boundaries/index.js';
import type { Address, HexData } from '../boundaries/index.js';
import type { MessageStatusLedger } from '../ledger/index.js';
import { callFrom } from '../types.js';
import type { CallContext } from '../types.js';
import { cctpMessageNonce } from './cctp-message.js';
import type { Erc20Token } from './erc20.js';

// =============================================================================
// CCTP COLLABORATOR INTERFACES
// =============================================================================

export interface TokenMessenger {
  readonly address: Address;

  /**
   * Burn `amount` of `burnToken` pulled from the caller. Only
   * `destinationCaller` may complete the mint on the destination domain.
   * Returns the CCTP nonce of the emitted message.
   */
  depositForBurnWithCaller(
    ctx: CallContext,
    amount: bigint,
    destinationDomain: number,
    mintRecipient: HexData,
    burnToken: Address,
    destinationCaller: HexData
  ): Promise<bigint>;
}

export interface MessageTransmitter {
  readonly address: Address;

  /**
   * Verify the attestation and deliver the message (minting for burn
   * messages). Returns false or throws when the message is rejected.
   */
  receiveMessage(ctx: CallContext, message: HexData, attestation: HexData): Promise<boolean>;
}

/**
 * Resolves configured addresses to contract handles.
 */
export interface CircleContractResolver {
  tokenMessengerAt(address: Address): TokenMessenger | undefined;
  messageTransmitterAt(address: Address): MessageTransmitter | undefined;
}

export interface CircleContracts {
  tokenMessenger: Address;
  messageTransmitter: Address;
}

// =============================================================================
// ADAPTER
// =============================================================================

export class BurnMintAdapter {
  private contracts: CircleContracts;

  constructor(
    private readonly self: Address,
    private readonly resolver: CircleContractResolver,
    private readonly ledger: MessageStatusLedger,
    private readonly destinationDomain: number,
    contracts: CircleContracts
  ) {
    this.contracts = { ...contracts };
  }

  get circleContracts(): CircleContracts {
    return { ...this.contracts };
  }

  /**
   * Configuration write. Authorization is the orchestrator's concern.
   */
  updateContracts(contracts: CircleContracts): void {
    this.contracts = { ...contracts };
  }

  /**
   * Burn tokens held by the gateway. The burn is irrevocable once the
   * enclosing transaction commits.
   */
  async initiateBurn(
    token: Erc20Token,
    amount: bigint,
    recipient: Address,
    destinationCaller: Address
  ): Promise<bigint> {
    const messenger = this.resolveTokenMessenger();
    const ctx = callFrom(this.self);

    return callCollaborator('BURN_FAILED', 'CCTP burn failed', async () => {
      await token.approve(ctx, messenger.address, amount);
      return messenger.depositForBurnWithCaller(
        ctx,
        amount,
        this.destinationDomain,
        toBytes32(recipient),
        token.address,
        toBytes32(destinationCaller)
      );
    });
  }

  /**
   * Complete the mint for a transfer whose notification was delivered.
   */
  async claim(nonce: bigint, message: HexData, attestation: HexData): Promise<void> {
    const status = this.ledger.statusOf(nonce);
    if (status !== 'PENDING') {
      throw new StatePreconditionError(
        'TRANSFER_NOT_PENDING',
        `Cannot claim transfer ${nonce}: status is ${status}, expected PENDING`
      );
    }

    const messageNonce = cctpMessageNonce(message);
    if (messageNonce !== nonce) {
      throw new ValidationError(
        'NONCE_MISMATCH',
        `Attested message carries nonce ${messageNonce}, expected ${nonce}`
      );
    }

    const transmitter = this.resolveMessageTransmitter();
    const accepted = await callCollaborator('MINT_FAILED', 'CCTP receiveMessage failed', () =>
      transmitter.receiveMessage(callFrom(this.self), message, attestation)
    );
    if (!accepted) {
      throw new CollaboratorError('MINT_FAILED', `Message transmitter rejected transfer ${nonce}`);
    }

    this.ledger.setDone(nonce);
  }

  private resolveTokenMessenger(): TokenMessenger {
    const messenger = this.resolver.tokenMessengerAt(this.contracts.tokenMessenger);
    if (!messenger) {
      throw new CollaboratorError('BURN_FAILED', `No token messenger at ${this.contracts.tokenMessenger}`);
    }
    return messenger;
  }

  private resolveMessageTransmitter(): MessageTransmitter {
    const transmitter = this.resolver.messageTransmitterAt(this.contracts.messageTransmitter);
    if (!transmitter) {
      throw new CollaboratorError('MINT_FAILED', `No message transmitter at ${this.contracts.messageTransmitter}`);
    }
    return transmitter;
  }
}
