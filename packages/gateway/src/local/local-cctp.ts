/**
 * Local CCTP
 *
 * In-process stand-in for Circle's Cross-Chain Transfer Protocol on one
 * domain: TokenMessenger (burn / mint), MessageTransmitter (nonces,
 * attestation check, replay protection) and an attestation service.
 */

import { ethers } from 'ethers';
import {
  address,
  fromBytes32,
  hexData,
  toBytes32,
  ZERO_BYTES32,
} from '../boundaries/index.js';
import type { Address, HexData } from '../boundaries/index.js';
import {
  CCTP_BURN_MESSAGE_VERSION,
  CCTP_MESSAGE_VERSION,
  decodeBurnMessage,
  decodeCctpMessage,
  encodeBurnMessage,
  encodeCctpMessage,
} from '../adapters/index.js';
import type {
  AttestationProvider,
  AttestationResponse,
  CircleContractResolver,
  MessageTransmitter,
  TokenMessenger,
} from '../adapters/index.js';
import { callFrom } from '../types.js';
import type { CallContext, Checkpointable, EventSink } from '../types.js';
import { LocalChain, Revert } from './local-chain.js';
import type { LocalToken } from './local-token.js';

// =============================================================================
// MESSAGE TRANSMITTER
// =============================================================================

interface TransmitterState {
  nextNonce: bigint;
  usedNonces: Set<string>;
}

export class LocalMessageTransmitter implements MessageTransmitter, Checkpointable {
  private state: TransmitterState;
  private handler: LocalTokenMessenger | null = null;

  constructor(
    readonly address: Address,
    readonly localDomain: number,
    readonly attester: Address,
    private readonly events: EventSink,
    initialNonce: bigint
  ) {
    this.state = { nextNonce: initialNonce, usedNonces: new Set() };
  }

  setHandler(handler: LocalTokenMessenger): void {
    this.handler = handler;
  }

  get nextAvailableNonce(): bigint {
    return this.state.nextNonce;
  }

  isNonceUsed(sourceDomain: number, nonce: bigint): boolean {
    return this.state.usedNonces.has(nonceKey(sourceDomain, nonce));
  }

  async sendMessageWithCaller(
    ctx: CallContext,
    destinationDomain: number,
    recipient: HexData,
    destinationCaller: HexData,
    body: HexData
  ): Promise<bigint> {
    const nonce = this.state.nextNonce;
    this.state.nextNonce = nonce + 1n;

    const message = encodeCctpMessage({
      version: CCTP_MESSAGE_VERSION,
      sourceDomain: this.localDomain,
      destinationDomain,
      nonce,
      sender: toBytes32(ctx.sender),
      recipient,
      destinationCaller,
      body,
    });

    this.events.emit({
      type: 'CCTP_MESSAGE_SENT',
      messageTransmitter: this.address,
      sourceDomain: this.localDomain,
      nonce,
      message,
    });
    return nonce;
  }

  async receiveMessage(ctx: CallContext, message: HexData, attestation: HexData): Promise<boolean> {
    let decoded;
    try {
      decoded = decodeCctpMessage(message);
    } catch {
      throw new Revert('Invalid message length');
    }
    if (decoded.destinationDomain !== this.localDomain) {
      throw new Revert('Invalid destination domain');
    }
    if (decoded.version !== CCTP_MESSAGE_VERSION) {
      throw new Revert('Invalid message version');
    }

    let signer: string;
    try {
      signer = ethers.recoverAddress(ethers.keccak256(message), attestation);
    } catch {
      throw new Revert('Invalid attestation');
    }
    if (signer !== this.attester) {
      throw new Revert('Invalid signature: not attester');
    }

    if (decoded.destinationCaller !== ZERO_BYTES32 && decoded.destinationCaller !== toBytes32(ctx.sender)) {
      throw new Revert('Invalid caller for message');
    }

    const key = nonceKey(decoded.sourceDomain, decoded.nonce);
    if (this.state.usedNonces.has(key)) {
      throw new Revert('Nonce already used');
    }
    this.state.usedNonces.add(key);

    if (!this.handler || decoded.recipient !== toBytes32(this.handler.address)) {
      throw new Revert('Unknown message recipient');
    }
    const handled = await this.handler.handleReceiveMessage(
      callFrom(this.address),
      decoded.sourceDomain,
      decoded.sender,
      decoded.body
    );
    if (!handled) {
      throw new Revert('handleReceiveMessage() failed');
    }

    this.events.emit({
      type: 'CCTP_MESSAGE_RECEIVED',
      messageTransmitter: this.address,
      caller: ctx.sender,
      sourceDomain: decoded.sourceDomain,
      nonce: decoded.nonce,
    });
    return true;
  }

  checkpoint(): () => void {
    const saved: TransmitterState = {
      nextNonce: this.state.nextNonce,
      usedNonces: new Set(this.state.usedNonces),
    };
    return () => {
      this.state = saved;
    };
  }
}

// =============================================================================
// TOKEN MESSENGER
// =============================================================================

export class LocalTokenMessenger implements TokenMessenger {
  private remoteMessengers: Map<number, HexData> = new Map();
  private burnTokens: Map<Address, LocalToken> = new Map();
  private mintTokens: Map<string, LocalToken> = new Map();

  constructor(
    readonly address: Address,
    private readonly transmitter: LocalMessageTransmitter,
    private readonly events: EventSink,
    private maxBurnAmountPerMessage: bigint
  ) {}

  addRemoteTokenMessenger(domain: number, messenger: Address): void {
    this.remoteMessengers.set(domain, toBytes32(messenger));
  }

  /**
   * Accept `localToken` for burns and mint it for burns of `remoteToken`
   * on `remoteDomain`.
   */
  linkTokenPair(remoteDomain: number, remoteToken: Address, localToken: LocalToken): void {
    this.burnTokens.set(localToken.address, localToken);
    this.mintTokens.set(mintKey(remoteDomain, toBytes32(remoteToken)), localToken);
  }

  setMaxBurnAmountPerMessage(amount: bigint): void {
    this.maxBurnAmountPerMessage = amount;
  }

  async depositForBurnWithCaller(
    ctx: CallContext,
    amount: bigint,
    destinationDomain: number,
    mintRecipient: HexData,
    burnToken: Address,
    destinationCaller: HexData
  ): Promise<bigint> {
    if (destinationCaller === ZERO_BYTES32) {
      throw new Revert('Invalid destination caller');
    }
    if (amount <= 0n) {
      throw new Revert('Amount must be nonzero');
    }
    if (mintRecipient === ZERO_BYTES32) {
      throw new Revert('Mint recipient must be nonzero');
    }
    const remoteMessenger = this.remoteMessengers.get(destinationDomain);
    if (!remoteMessenger) {
      throw new Revert('No TokenMessenger for domain');
    }
    const token = this.burnTokens.get(burnToken);
    if (!token) {
      throw new Revert('Burn token not supported');
    }
    if (amount > this.maxBurnAmountPerMessage) {
      throw new Revert('Burn amount exceeds per tx limit');
    }

    const self = callFrom(this.address);
    await token.transferFrom(self, ctx.sender, this.address, amount);
    await token.burn(self, amount);

    const body = encodeBurnMessage({
      version: CCTP_BURN_MESSAGE_VERSION,
      burnToken: toBytes32(burnToken),
      mintRecipient,
      amount,
      messageSender: toBytes32(ctx.sender),
    });
    const nonce = await this.transmitter.sendMessageWithCaller(
      self,
      destinationDomain,
      remoteMessenger,
      destinationCaller,
      body
    );

    this.events.emit({
      type: 'CCTP_DEPOSIT_FOR_BURN',
      tokenMessenger: this.address,
      nonce,
      burnToken,
      amount,
      depositor: ctx.sender,
      mintRecipient,
      destinationDomain,
      destinationCaller,
    });
    return nonce;
  }

  async handleReceiveMessage(
    ctx: CallContext,
    remoteDomain: number,
    sender: HexData,
    body: HexData
  ): Promise<boolean> {
    if (ctx.sender !== this.transmitter.address) {
      throw new Revert('Invalid message transmitter');
    }
    if (this.remoteMessengers.get(remoteDomain) !== sender) {
      throw new Revert('Remote TokenMessenger unsupported');
    }

    let burn;
    try {
      burn = decodeBurnMessage(body);
    } catch {
      throw new Revert('Invalid burn message');
    }
    const token = this.mintTokens.get(mintKey(remoteDomain, burn.burnToken));
    if (!token) {
      throw new Revert('Mint token not supported');
    }

    const recipient = fromBytes32(burn.mintRecipient);
    await token.mint(callFrom(this.address), recipient, burn.amount);

    this.events.emit({
      type: 'CCTP_MINT_AND_WITHDRAW',
      tokenMessenger: this.address,
      mintRecipient: recipient,
      amount: burn.amount,
      token: token.address,
    });
    return true;
  }
}

// =============================================================================
// DOMAIN
// =============================================================================

export interface LocalCctpDomainOptions {
  chain: LocalChain;
  domain: number;
  attester: Address;
  maxBurnAmountPerMessage: bigint;
  initialNonce?: bigint;
}

/**
 * CCTP contracts of one chain, resolvable by address.
 */
export class LocalCctpDomain implements CircleContractResolver {
  readonly domain: number;
  readonly tokenMessenger: LocalTokenMessenger;
  readonly messageTransmitter: LocalMessageTransmitter;

  constructor(options: LocalCctpDomainOptions) {
    this.domain = options.domain;
    this.messageTransmitter = new LocalMessageTransmitter(
      options.chain.deriveAddress('cctp/message-transmitter'),
      options.domain,
      options.attester,
      options.chain,
      options.initialNonce ?? 0n
    );
    this.tokenMessenger = new LocalTokenMessenger(
      options.chain.deriveAddress('cctp/token-messenger'),
      this.messageTransmitter,
      options.chain,
      options.maxBurnAmountPerMessage
    );
    this.messageTransmitter.setHandler(this.tokenMessenger);
    options.chain.track(this.messageTransmitter);
  }

  /**
   * Link with the CCTP domain of the other chain for one token pair.
   */
  link(remote: LocalCctpDomain, localToken: LocalToken, remoteToken: LocalToken): void {
    this.tokenMessenger.addRemoteTokenMessenger(remote.domain, remote.tokenMessenger.address);
    this.tokenMessenger.linkTokenPair(remote.domain, remoteToken.address, localToken);
    localToken.configureMinter(this.tokenMessenger.address);
  }

  tokenMessengerAt(target: Address): TokenMessenger | undefined {
    return target === this.tokenMessenger.address ? this.tokenMessenger : undefined;
  }

  messageTransmitterAt(target: Address): MessageTransmitter | undefined {
    return target === this.messageTransmitter.address ? this.messageTransmitter : undefined;
  }
}

// =============================================================================
// ATTESTATION SERVICE
// =============================================================================

/**
 * Signs every committed CCTP message it sees. Messages from rolled-back
 * transactions are never attested.
 */
export class LocalAttestationService implements AttestationProvider {
  private messages: Map<string, HexData> = new Map();
  private withheld: Set<string> = new Set();

  constructor(private readonly signingKey: ethers.SigningKey) {}

  get attester(): Address {
    return address(ethers.computeAddress(this.signingKey));
  }

  /**
   * Observe a chain's committed CCTP messages.
   */
  watch(chain: LocalChain): void {
    chain.onEvent(({ event }) => {
      if (event.type === 'CCTP_MESSAGE_SENT') {
        this.messages.set(nonceKey(event.sourceDomain, event.nonce), event.message);
      }
    });
  }

  attest(message: HexData): HexData {
    return hexData(this.signingKey.sign(ethers.keccak256(message)).serialized);
  }

  /**
   * Keep answering `pending` for a message until `release` is called.
   */
  withhold(sourceDomain: number, nonce: bigint): void {
    this.withheld.add(nonceKey(sourceDomain, nonce));
  }

  release(sourceDomain: number, nonce: bigint): void {
    this.withheld.delete(nonceKey(sourceDomain, nonce));
  }

  async fetchAttestation(sourceDomain: number, nonce: bigint): Promise<AttestationResponse> {
    const key = nonceKey(sourceDomain, nonce);
    const message = this.messages.get(key);
    if (!message || this.withheld.has(key)) {
      return { status: 'pending' };
    }
    return { status: 'complete', message, attestation: this.attest(message) };
  }
}

function nonceKey(domain: number, nonce: bigint): string {
  return `${domain}:${nonce}`;
}

function mintKey(domain: number, token: HexData): string {
  return `${domain}:${token}`;
}
