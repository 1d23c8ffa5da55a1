/**
 * Shared test helpers: failure capture and devnet shortcuts.
 */

import { ethers } from 'ethers';
import { address, GatewayError } from '../src/boundaries/index.js';
import type { Address, HexData } from '../src/boundaries/index.js';
import type { Devnet, LocalChain, Side } from '../src/local/index.js';
import type { ChainEvent } from '../src/types.js';

/**
 * Await `promise` and return the GatewayError it rejects with.
 */
export async function captureError(promise: Promise<unknown>): Promise<GatewayError> {
  const error = await captureFailure(promise);
  if (!(error instanceof GatewayError)) {
    throw new Error(`Expected a GatewayError, got ${error.name}: ${error.message}`);
  }
  return error;
}

/**
 * Await `promise` and return whatever Error it rejects with.
 */
export async function captureFailure(promise: Promise<unknown>): Promise<Error> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof Error) return error;
    throw new Error(`Rejected with a non-Error: ${String(error)}`);
  }
  throw new Error('Expected the call to fail, but it succeeded');
}

export function account(label: string): Address {
  return address(ethers.dataSlice(ethers.id(`test-account/${label}`), 12));
}

export const RELAYER = account('relayer');

/**
 * Fund `sender` on `side`, then approve and deposit in one transaction.
 * Returns the CCTP nonce.
 */
export async function deposit(
  devnet: Devnet,
  side: Side,
  sender: Address,
  to: Address,
  amount: bigint,
  options: { fund?: boolean; data?: HexData; fee?: bigint } = {}
): Promise<bigint> {
  const { chain, token, gateway } = devnet.side(side);
  if (options.fund ?? true) {
    await devnet.faucet(side, sender, amount);
  }
  return chain.transact(sender, options.fee ?? 0n, async (ctx) => {
    await token.approve(ctx, gateway.address, amount);
    return gateway.deposit(ctx, { token: token.address, to, amount, data: options.data, gasLimit: 200_000n });
  });
}

/**
 * Attested CCTP message for a burn made on `sourceSide`.
 */
export async function attestationFor(
  devnet: Devnet,
  sourceSide: Side,
  nonce: bigint
): Promise<{ message: HexData; attestation: HexData }> {
  const response = await devnet.attestations.fetchAttestation(devnet.side(sourceSide).domain, nonce);
  if (response.status !== 'complete') {
    throw new Error(`No attestation for nonce ${nonce}`);
  }
  return { message: response.message, attestation: response.attestation };
}

/**
 * Committed events of one type, oldest first.
 */
export function eventsOfType<T extends ChainEvent['type']>(
  chain: LocalChain,
  type: T
): Array<Extract<ChainEvent, { type: T }>> {
  return chain
    .events()
    .map((committed) => committed.event)
    .filter((event): event is Extract<ChainEvent, { type: T }> => event.type === type);
}
