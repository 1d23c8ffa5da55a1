/**
 * Local cross-domain messenger.
 *
 * Two linked instances, one per chain. A message sent on one side becomes
 * provable on the other once its transaction commits; relaying it with the
 * proof delivers the calldata to the target with the sender recorded as
 * `xDomainMessageSender`.
 */

import { ethers } from 'ethers';
import { address, hexData, ValidationError } from '../boundaries/index.js';
import type { Address, HexData } from '../boundaries/index.js';
import type { CrossDomainMessenger, MessageTarget } from '../adapters/index.js';
import { callFrom } from '../types.js';
import type { CallContext, Checkpointable, MessengerEnvelope } from '../types.js';
import { Revert } from './local-chain.js';
import type { LocalChain } from './local-chain.js';

const MESSENGER_ABI = [
  'function relayMessageWithProof(address from, address to, uint256 value, uint256 nonce, bytes message)',
];

const messengerInterface = new ethers.Interface(MESSENGER_ABI);

interface MessengerState {
  nextMessageNonce: bigint;
  outbox: MessengerEnvelope[];
  relayed: Set<HexData>;
}

export class LocalMessenger implements CrossDomainMessenger, Checkpointable {
  private state: MessengerState = { nextMessageNonce: 0n, outbox: [], relayed: new Set() };
  private committed: Set<HexData> = new Set();
  private targets: Map<Address, MessageTarget> = new Map();
  private remote: LocalMessenger | null = null;
  private xDomainSender: Address | null = null;

  constructor(
    readonly address: Address,
    private readonly chain: LocalChain
  ) {}

  link(remote: LocalMessenger): void {
    this.remote = remote;
  }

  registerTarget(target: Address, handler: MessageTarget): void {
    this.targets.set(target, handler);
  }

  /**
   * True once the transaction that sent the message has committed.
   */
  isCommitted(messageHash: HexData): boolean {
    return this.committed.has(messageHash);
  }

  isRelayed(messageHash: HexData): boolean {
    return this.state.relayed.has(messageHash);
  }

  /**
   * Sent envelopes whose transaction has committed.
   */
  sentMessages(): MessengerEnvelope[] {
    return this.state.outbox.filter((envelope) => this.committed.has(hashEnvelope(envelope)));
  }

  async sendMessage(
    ctx: CallContext,
    target: Address,
    value: bigint,
    message: HexData,
    gasLimit: bigint
  ): Promise<void> {
    if (ctx.value < value) {
      throw new Revert('msg.value too low');
    }
    const envelope: MessengerEnvelope = {
      from: ctx.sender,
      to: target,
      value,
      messageNonce: this.state.nextMessageNonce,
      message,
    };
    this.state.nextMessageNonce += 1n;
    this.state.outbox.push(envelope);

    const messageHash = hashEnvelope(envelope);
    this.chain.emit({
      type: 'MESSENGER_SENT_MESSAGE',
      messenger: this.address,
      envelope,
      gasLimit,
      fee: ctx.value - value,
    });
    this.chain.afterCommit(() => {
      this.committed.add(messageHash);
    });
  }

  xDomainMessageSender(): Address {
    if (!this.xDomainSender) {
      throw new Revert('xDomainMessageSender is not set');
    }
    return this.xDomainSender;
  }

  async execute(ctx: CallContext, calldata: HexData): Promise<void> {
    const parsed = messengerInterface.parseTransaction({ data: calldata });
    if (!parsed) {
      throw new Revert('Unknown messenger call');
    }
    await this.relayMessageWithProof(ctx, decodeRelayArgs(parsed.args));
  }

  /**
   * Deliver a message proven committed on the linked messenger.
   */
  async relayMessageWithProof(_ctx: CallContext, envelope: MessengerEnvelope): Promise<void> {
    const messageHash = hashEnvelope(envelope);
    if (this.state.relayed.has(messageHash)) {
      throw new Revert('Message was already successfully executed');
    }
    if (!this.remote || !this.remote.isCommitted(messageHash)) {
      throw new Revert('Invalid proof');
    }
    const target = this.targets.get(envelope.to);
    if (!target) {
      throw new Revert('Unknown message target');
    }

    // Mark first so a nested relay of the same message is rejected
    this.state.relayed.add(messageHash);
    const previous = this.xDomainSender;
    this.xDomainSender = envelope.from;
    try {
      await target.handleMessage(callFrom(this.address, envelope.value), envelope.message);
    } finally {
      this.xDomainSender = previous;
    }

    this.chain.emit({ type: 'MESSENGER_RELAYED_MESSAGE', messenger: this.address, messageHash });
  }

  checkpoint(): () => void {
    const saved: MessengerState = {
      nextMessageNonce: this.state.nextMessageNonce,
      outbox: [...this.state.outbox],
      relayed: new Set(this.state.relayed),
    };
    return () => {
      this.state = saved;
    };
  }
}

// =============================================================================
// ENCODING
// =============================================================================

/**
 * Calldata relaying `envelope` on the destination messenger.
 */
export function encodeRelayCall(envelope: MessengerEnvelope): HexData {
  return hexData(
    messengerInterface.encodeFunctionData('relayMessageWithProof', [
      envelope.from,
      envelope.to,
      envelope.value,
      envelope.messageNonce,
      envelope.message,
    ])
  );
}

export function hashEnvelope(envelope: MessengerEnvelope): HexData {
  return hexData(ethers.keccak256(encodeRelayCall(envelope)));
}

function decodeRelayArgs(args: ethers.Result): MessengerEnvelope {
  const [from, to, value, messageNonce, message] = args.toArray();
  if (
    typeof from !== 'string' ||
    typeof to !== 'string' ||
    typeof value !== 'bigint' ||
    typeof messageNonce !== 'bigint' ||
    typeof message !== 'string'
  ) {
    throw new ValidationError('MALFORMED_PAYLOAD', 'Relay call arguments have unexpected types');
  }
  return {
    from: address(from),
    to: address(to),
    value,
    messageNonce,
    message: hexData(message),
  };
}
