/**
 * Devnet
 *
 * Two local chains with CCTP, a linked messenger pair, a USDC-style token
 * on each side and a gateway pair bound to each other.
 */

import { ethers } from 'ethers';
import type { Address } from '../boundaries/index.js';
import { CctpGateway } from '../gateway/index.js';
import { LocalChain } from './local-chain.js';
import { LocalAttestationService, LocalCctpDomain } from './local-cctp.js';
import { LocalMessenger, hashEnvelope } from './local-messenger.js';
import { LocalToken } from './local-token.js';

export type Side = 'l1' | 'l2';

export interface DevnetSide {
  side: Side;
  chain: LocalChain;
  domain: number;
  token: LocalToken;
  cctp: LocalCctpDomain;
  messenger: LocalMessenger;
  gateway: CctpGateway;
}

export interface DevnetOptions {
  /** CCTP domains of the two chains. Defaults to 0 and 3. */
  domains?: { l1: number; l2: number };
  maxBurnAmountPerMessage?: bigint;
  /** First CCTP nonce issued on each side. */
  initialNonces?: { l1?: bigint; l2?: bigint };
  /** Signing key of the attestation service. Random when omitted. */
  attester?: ethers.SigningKey;
}

export interface Devnet {
  l1: DevnetSide;
  l2: DevnetSide;
  attestations: LocalAttestationService;
  owner: Address;
  router: Address;
  /** Address the faucet mints from. Configured as a minter on both tokens. */
  faucetAddress: Address;
  side(name: Side): DevnetSide;
  other(name: Side): DevnetSide;
  faucet(side: Side, to: Address, amount: bigint): Promise<void>;
  /**
   * Relay every committed, not yet relayed messenger message from `from`
   * to the other side, one transaction each. Returns the number relayed.
   */
  deliverMessages(from: Side, relayer: Address): Promise<number>;
}

export const DEFAULT_MAX_BURN_AMOUNT = 1_000_000n * 10n ** 6n;

export function createDevnet(options: DevnetOptions = {}): Devnet {
  const domains = options.domains ?? { l1: 0, l2: 3 };
  const signingKey = options.attester ?? new ethers.SigningKey(ethers.Wallet.createRandom().privateKey);
  const attestations = new LocalAttestationService(signingKey);
  const maxBurn = options.maxBurnAmountPerMessage ?? DEFAULT_MAX_BURN_AMOUNT;

  const l1Chain = new LocalChain('l1', 1);
  const l2Chain = new LocalChain('l2', 2);

  const owner = l1Chain.deriveAddress('accounts/owner');
  const router = l2Chain.deriveAddress('router');
  const faucetAddress = l1Chain.deriveAddress('accounts/faucet');

  const l1Token = new LocalToken(l1Chain.deriveAddress('usdc'), 'USDC');
  const l2Token = new LocalToken(l2Chain.deriveAddress('usdc'), 'USDC');

  const l1Cctp = new LocalCctpDomain({
    chain: l1Chain,
    domain: domains.l1,
    attester: attestations.attester,
    maxBurnAmountPerMessage: maxBurn,
    initialNonce: options.initialNonces?.l1,
  });
  const l2Cctp = new LocalCctpDomain({
    chain: l2Chain,
    domain: domains.l2,
    attester: attestations.attester,
    maxBurnAmountPerMessage: maxBurn,
    initialNonce: options.initialNonces?.l2,
  });
  l1Cctp.link(l2Cctp, l1Token, l2Token);
  l2Cctp.link(l1Cctp, l2Token, l1Token);
  l1Token.configureMinter(faucetAddress);
  l2Token.configureMinter(faucetAddress);

  const l1Messenger = new LocalMessenger(l1Chain.deriveAddress('messenger'), l1Chain);
  const l2Messenger = new LocalMessenger(l2Chain.deriveAddress('messenger'), l2Chain);
  l1Messenger.link(l2Messenger);
  l2Messenger.link(l1Messenger);

  // Both addresses are known before either gateway exists
  const l1GatewayAddress = l1Chain.deriveAddress('gateway');
  const l2GatewayAddress = l2Chain.deriveAddress('gateway');

  const l1Gateway = new CctpGateway({
    address: l1GatewayAddress,
    owner,
    counterpart: l2GatewayAddress,
    token: l1Token,
    counterpartToken: l2Token.address,
    messenger: l1Messenger,
    circle: l1Cctp,
    circleContracts: {
      tokenMessenger: l1Cctp.tokenMessenger.address,
      messageTransmitter: l1Cctp.messageTransmitter.address,
    },
    destinationDomain: domains.l2,
    events: l1Chain,
  });
  const l2Gateway = new CctpGateway({
    address: l2GatewayAddress,
    owner,
    counterpart: l1GatewayAddress,
    token: l2Token,
    counterpartToken: l1Token.address,
    router,
    messenger: l2Messenger,
    circle: l2Cctp,
    circleContracts: {
      tokenMessenger: l2Cctp.tokenMessenger.address,
      messageTransmitter: l2Cctp.messageTransmitter.address,
    },
    destinationDomain: domains.l1,
    events: l2Chain,
  });
  l1Messenger.registerTarget(l1GatewayAddress, l1Gateway);
  l2Messenger.registerTarget(l2GatewayAddress, l2Gateway);

  for (const [chain, token, messenger, gateway] of [
    [l1Chain, l1Token, l1Messenger, l1Gateway],
    [l2Chain, l2Token, l2Messenger, l2Gateway],
  ] as const) {
    chain.track(token);
    chain.track(messenger);
    chain.track(gateway);
  }
  attestations.watch(l1Chain);
  attestations.watch(l2Chain);

  const l1: DevnetSide = {
    side: 'l1',
    chain: l1Chain,
    domain: domains.l1,
    token: l1Token,
    cctp: l1Cctp,
    messenger: l1Messenger,
    gateway: l1Gateway,
  };
  const l2: DevnetSide = {
    side: 'l2',
    chain: l2Chain,
    domain: domains.l2,
    token: l2Token,
    cctp: l2Cctp,
    messenger: l2Messenger,
    gateway: l2Gateway,
  };

  const side = (name: Side): DevnetSide => (name === 'l1' ? l1 : l2);
  const other = (name: Side): DevnetSide => (name === 'l1' ? l2 : l1);

  return {
    l1,
    l2,
    attestations,
    owner,
    router,
    faucetAddress,
    side,
    other,

    async faucet(name, to, amount) {
      const { chain, token } = side(name);
      await chain.transact(faucetAddress, 0n, (ctx) => token.mint(ctx, to, amount));
    },

    async deliverMessages(from, relayer) {
      const source = side(from);
      const destination = other(from);
      let relayed = 0;
      for (const envelope of source.messenger.sentMessages()) {
        if (destination.messenger.isRelayed(hashEnvelope(envelope))) {
          continue;
        }
        await destination.chain.transact(relayer, 0n, (ctx) =>
          destination.messenger.relayMessageWithProof(ctx, envelope)
        );
        relayed += 1;
      }
      return relayed;
    },
  };
}
