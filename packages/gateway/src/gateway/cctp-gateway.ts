/**
 * CCTP Gateway
 *
 * Transfer orchestrator deployed once per chain, paired with a counterpart on
 * the other chain. Tokens move through CCTP burn/mint; the transfer record
 * moves through the cross-domain messenger. The CCTP nonce correlates both.
 *
 * Flows:
 * - deposit:          pull → burn → send finalizeWithdraw to the counterpart
 * - finalizeWithdraw: counterpart-relayed, NONE → PENDING, moves no tokens
 * - claim:            PENDING → DONE, CCTP mints to the attested recipient
 * - relayAndClaim:    relay the finalize message, then claim, in one call
 *
 * Invariants:
 * 1. A nonce is finalized at most once and claimed at most once
 * 2. A claim never precedes the finalize notification for its nonce
 * 3. Preconditions are checked before any side effect
 * 4. No reentrant call observes funds pulled but burn/send not yet issued
 */

import {
  AuthorizationError,
  callCollaborator,
  EMPTY_BYTES,
  isZeroAddress,
  ReentrancyGuard,
  StatePreconditionError,
  ValidationError,
  ZERO_ADDRESS,
} from '../boundaries/index.js';
import type { Address, HexData } from '../boundaries/index.js';
import { BurnMintAdapter, DomainMessageRelay } from '../adapters/index.js';
import type {
  CircleContractResolver,
  CircleContracts,
  CrossDomainMessenger,
  Erc20Token,
  MessageTarget,
} from '../adapters/index.js';
import { InMemoryMessageStatusLedger } from '../ledger/index.js';
import type { MessageStatusLedger } from '../ledger/index.js';
import { callFrom } from '../types.js';
import type { CallContext, Checkpointable, EventSink, TransferStatus } from '../types.js';
import {
  decodeFinalizeWithdraw,
  decodeRouterData,
  decodeTransferData,
  encodeFinalizeWithdraw,
  encodeTransferData,
} from './codec.js';
import type { FinalizeWithdrawArgs } from './codec.js';

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface CctpGatewayOptions {
  address: Address;
  owner: Address;
  /** Paired gateway on the other chain. Fixed for the gateway's lifetime. */
  counterpart: Address;
  /** Local token burned and minted by CCTP. */
  token: Erc20Token;
  /** The same token's address on the counterpart chain. */
  counterpartToken: Address;
  /** Router whose calls carry abi.encode(originalSender, originalData). */
  router?: Address;
  messenger: CrossDomainMessenger;
  circle: CircleContractResolver;
  circleContracts: CircleContracts;
  /** CCTP domain of the counterpart chain. */
  destinationDomain: number;
  events: EventSink;
  ledger?: MessageStatusLedger;
}

export interface DepositParams {
  token: Address;
  to: Address;
  amount: bigint;
  data?: HexData;
  gasLimit: bigint;
}

// =============================================================================
// GATEWAY
// =============================================================================

export class CctpGateway implements MessageTarget, Checkpointable {
  readonly address: Address;
  readonly owner: Address;
  readonly counterpart: Address;
  readonly counterpartToken: Address;
  readonly router: Address;
  readonly destinationDomain: number;

  private readonly token: Erc20Token;
  private readonly ledger: MessageStatusLedger;
  private readonly burnMint: BurnMintAdapter;
  private readonly relay: DomainMessageRelay;
  private readonly guard = new ReentrancyGuard();
  private readonly events: EventSink;

  private depositPaused = false;
  private withdrawPaused = false;

  constructor(options: CctpGatewayOptions) {
    this.address = options.address;
    this.owner = options.owner;
    this.counterpart = options.counterpart;
    this.counterpartToken = options.counterpartToken;
    this.router = options.router ?? ZERO_ADDRESS;
    this.destinationDomain = options.destinationDomain;
    this.token = options.token;
    this.events = options.events;
    this.ledger = options.ledger ?? new InMemoryMessageStatusLedger();
    this.burnMint = new BurnMintAdapter(
      this.address,
      options.circle,
      this.ledger,
      options.destinationDomain,
      options.circleContracts
    );
    this.relay = new DomainMessageRelay(this.address, options.messenger, options.counterpart);
  }

  // ===========================================================================
  // Views
  // ===========================================================================

  get tokenAddress(): Address {
    return this.token.address;
  }

  get circleContracts(): CircleContracts {
    return this.burnMint.circleContracts;
  }

  get messengerAddress(): Address {
    return this.relay.messengerAddress;
  }

  isDepositPaused(): boolean {
    return this.depositPaused;
  }

  isWithdrawPaused(): boolean {
    return this.withdrawPaused;
  }

  statusOf(nonce: bigint): TransferStatus {
    return this.ledger.statusOf(nonce);
  }

  transfers(): Array<{ nonce: bigint; status: TransferStatus }> {
    return this.ledger.entries();
  }

  /**
   * Counterpart-chain address of `token`, or the zero address when the
   * gateway does not bridge it.
   */
  counterpartTokenOf(token: Address): Address {
    return token === this.token.address ? this.counterpartToken : ZERO_ADDRESS;
  }

  // ===========================================================================
  // Deposit (outbound)
  // ===========================================================================

  /**
   * Burn `amount` here and notify the counterpart. `ctx.value` pays the
   * messenger fee. Returns the CCTP nonce identifying the transfer.
   */
  async deposit(ctx: CallContext, params: DepositParams): Promise<bigint> {
    return this.guard.run('deposit', async () => {
      if (this.depositPaused) {
        throw new StatePreconditionError('DEPOSIT_PAUSED', 'Deposits are paused');
      }
      if (params.token !== this.token.address) {
        throw new ValidationError('TOKEN_MISMATCH', `Token ${params.token} is not bridged by this gateway`);
      }
      if (params.amount <= 0n) {
        throw new ValidationError('ZERO_AMOUNT', 'Deposit amount must be positive');
      }
      if (isZeroAddress(params.to)) {
        throw new ValidationError('ZERO_RECIPIENT', 'Deposit recipient is the zero address');
      }

      const { from, data } = this.resolveSender(ctx, params.data ?? EMPTY_BYTES);
      const amount = await this.pullFunds(from, params.amount);

      const nonce = await this.burnMint.initiateBurn(this.token, amount, params.to, this.counterpart);

      const message = encodeFinalizeWithdraw({
        sourceToken: this.token.address,
        destinationToken: this.counterpartToken,
        from,
        to: params.to,
        amount,
        data: encodeTransferData(nonce, data),
      });
      await this.relay.send(ctx.value, message, params.gasLimit);

      this.events.emit({
        type: 'DEPOSIT_INITIATED',
        gateway: this.address,
        sourceToken: this.token.address,
        destinationToken: this.counterpartToken,
        from,
        to: params.to,
        amount,
        data,
        nonce,
      });

      return nonce;
    });
  }

  /**
   * The router wraps the original sender and payload; unwrap exactly once.
   */
  private resolveSender(ctx: CallContext, data: HexData): { from: Address; data: HexData } {
    if (!isZeroAddress(this.router) && ctx.sender === this.router) {
      return decodeRouterData(data);
    }
    return { from: ctx.sender, data };
  }

  private async pullFunds(from: Address, amount: bigint): Promise<bigint> {
    const self = callFrom(this.address);
    const received = await callCollaborator('TOKEN_TRANSFER_FAILED', 'Token transfer into gateway failed', async () => {
      const before = await this.token.balanceOf(this.address);
      await this.token.transferFrom(self, from, this.address, amount);
      const after = await this.token.balanceOf(this.address);
      return after - before;
    });
    if (received <= 0n) {
      throw new ValidationError('ZERO_AMOUNT', 'Gateway received no tokens');
    }
    return received;
  }

  // ===========================================================================
  // Finalize (inbound notification)
  // ===========================================================================

  /**
   * Entry point for the messenger. Decodes the calldata and dispatches.
   */
  async handleMessage(ctx: CallContext, calldata: HexData): Promise<void> {
    const args = decodeFinalizeWithdraw(calldata);
    await this.finalizeWithdraw(ctx, args);
  }

  /**
   * Record that the counterpart burned tokens for this chain. Authorizes a
   * later claim; moves no tokens.
   */
  async finalizeWithdraw(ctx: CallContext, args: FinalizeWithdrawArgs): Promise<void> {
    await this.guard.run('finalizeWithdraw', async () => {
      this.relay.assertFromCounterpart(ctx);
      if (this.withdrawPaused) {
        throw new StatePreconditionError('WITHDRAW_PAUSED', 'Withdraw finalization is paused');
      }
      if (ctx.value !== 0n) {
        throw new ValidationError('NONZERO_VALUE', 'finalizeWithdraw does not accept value');
      }
      if (args.sourceToken !== this.counterpartToken || args.destinationToken !== this.token.address) {
        throw new ValidationError(
          'TOKEN_MISMATCH',
          `Token pair ${args.sourceToken}/${args.destinationToken} is not bridged by this gateway`
        );
      }

      const { nonce, payload } = decodeTransferData(args.data);
      this.ledger.setPending(nonce);

      this.events.emit({
        type: 'WITHDRAW_FINALIZED',
        gateway: this.address,
        sourceToken: args.sourceToken,
        destinationToken: args.destinationToken,
        from: args.from,
        to: args.to,
        amount: args.amount,
        data: payload,
        nonce,
      });
    });
  }

  // ===========================================================================
  // Claim
  // ===========================================================================

  /**
   * Present the CCTP attestation for a finalized transfer. Anyone may call;
   * the mint goes to the recipient encoded in the attested message.
   */
  async claim(ctx: CallContext, nonce: bigint, message: HexData, attestation: HexData): Promise<void> {
    await this.guard.run('claim', async () => {
      await this.burnMint.claim(nonce, message, attestation);
      this.events.emit({ type: 'TRANSFER_CLAIMED', gateway: this.address, nonce, claimer: ctx.sender });
    });
  }

  /**
   * Relay the finalize message through the messenger, then claim.
   *
   * The only evidence that `relayCall` was the finalize message for `nonce`
   * is that the nonce moved from NONE to PENDING across the relay.
   */
  async relayAndClaim(
    ctx: CallContext,
    nonce: bigint,
    message: HexData,
    attestation: HexData,
    relayCall: HexData
  ): Promise<void> {
    const before = this.ledger.statusOf(nonce);
    if (before !== 'NONE') {
      throw new StatePreconditionError(
        'TRANSFER_ALREADY_SEEN',
        `Transfer ${nonce} is ${before}, expected NONE before relay`
      );
    }

    await this.relay.relay(relayCall);

    const after = this.ledger.statusOf(nonce);
    if (after !== 'PENDING') {
      throw new StatePreconditionError(
        'RELAY_DID_NOT_FINALIZE',
        `Relayed call left transfer ${nonce} at ${after}, expected PENDING`
      );
    }

    await this.claim(ctx, nonce, message, attestation);
  }

  // ===========================================================================
  // Owner configuration
  // ===========================================================================

  async updateCircleCaller(ctx: CallContext, tokenMessenger: Address, messageTransmitter: Address): Promise<void> {
    this.assertOwner(ctx);
    if (isZeroAddress(tokenMessenger) || isZeroAddress(messageTransmitter)) {
      throw new ValidationError('INVALID_ADDRESS', 'Circle contract addresses must be non-zero');
    }
    this.burnMint.updateContracts({ tokenMessenger, messageTransmitter });
    this.events.emit({ type: 'CIRCLE_CALLER_UPDATED', gateway: this.address, tokenMessenger, messageTransmitter });
  }

  async pauseDeposit(ctx: CallContext, paused: boolean): Promise<void> {
    this.assertOwner(ctx);
    this.depositPaused = paused;
    this.events.emit({ type: 'PAUSE_CHANGED', gateway: this.address, flow: 'deposit', paused });
  }

  async pauseWithdraw(ctx: CallContext, paused: boolean): Promise<void> {
    this.assertOwner(ctx);
    this.withdrawPaused = paused;
    this.events.emit({ type: 'PAUSE_CHANGED', gateway: this.address, flow: 'withdraw', paused });
  }

  private assertOwner(ctx: CallContext): void {
    if (ctx.sender !== this.owner) {
      throw new AuthorizationError('NOT_OWNER', `Caller ${ctx.sender} is not the owner`);
    }
  }

  // ===========================================================================
  // Transactional state
  // ===========================================================================

  checkpoint(): () => void {
    const restoreLedger = this.ledger.checkpoint();
    const contracts = this.burnMint.circleContracts;
    const depositPaused = this.depositPaused;
    const withdrawPaused = this.withdrawPaused;
    return () => {
      restoreLedger();
      this.burnMint.updateContracts(contracts);
      this.depositPaused = depositPaused;
      this.withdrawPaused = withdrawPaused;
    };
  }
}
