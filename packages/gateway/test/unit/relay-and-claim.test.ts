/**
 * Relay-and-Claim Tests
 *
 * Proves:
 * - One call relays the finalize message and claims the mint
 * - The nonce must be unseen before the relay and PENDING after it
 * - Any failure after the relay rolls the relay back too
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { hexData } from '../../src/boundaries/index.js';
import { createDevnet, encodeRelayCall, hashEnvelope } from '../../src/local/index.js';
import type { Devnet } from '../../src/local/index.js';
import type { MessengerEnvelope } from '../../src/types.js';
import { account, attestationFor, captureError, deposit, eventsOfType, RELAYER } from '../helpers.js';

const alice = account('alice');
const bob = account('bob');

function sentEnvelope(devnet: Devnet, index: number): MessengerEnvelope {
  const envelope = devnet.l1.messenger.sentMessages()[index];
  if (!envelope) {
    throw new Error(`No message ${index} sent on l1`);
  }
  return envelope;
}

describe('CctpGateway.relayAndClaim', () => {
  let devnet: Devnet;

  beforeEach(() => {
    devnet = createDevnet();
  });

  it('relays the finalize message and claims in one transaction', async () => {
    const { l2 } = devnet;
    const nonce = await deposit(devnet, 'l1', alice, bob, 1000n);
    const { message, attestation } = await attestationFor(devnet, 'l1', nonce);
    const envelope = sentEnvelope(devnet, 0);

    await l2.chain.transact(RELAYER, 0n, (ctx) =>
      l2.gateway.relayAndClaim(ctx, nonce, message, attestation, encodeRelayCall(envelope))
    );

    expect(l2.gateway.statusOf(nonce)).toBe('DONE');
    expect(await l2.token.balanceOf(bob)).toBe(1000n);
    expect(l2.messenger.isRelayed(hashEnvelope(envelope))).toBe(true);
    expect(l2.chain.transactionCount).toBe(1);
    expect(eventsOfType(l2.chain, 'TRANSFER_CLAIMED')).toEqual([
      { type: 'TRANSFER_CLAIMED', gateway: l2.gateway.address, nonce, claimer: RELAYER },
    ]);
    expect(await devnet.deliverMessages('l1', RELAYER)).toBe(0);
  });

  it('rejects a nonce that was already finalized', async () => {
    const { l2 } = devnet;
    const nonce = await deposit(devnet, 'l1', alice, bob, 1000n);
    await devnet.deliverMessages('l1', RELAYER);
    const { message, attestation } = await attestationFor(devnet, 'l1', nonce);

    const error = await captureError(
      l2.chain.transact(RELAYER, 0n, (ctx) =>
        l2.gateway.relayAndClaim(ctx, nonce, message, attestation, encodeRelayCall(sentEnvelope(devnet, 0)))
      )
    );

    expect(error.code).toBe('TRANSFER_ALREADY_SEEN');
    expect(error.message).toBe('Transfer 0 is PENDING, expected NONE before relay');
    expect(l2.gateway.statusOf(nonce)).toBe('PENDING');
  });

  it('rejects a relay that finalizes a different nonce', async () => {
    const { l2 } = devnet;
    await deposit(devnet, 'l1', alice, bob, 100n);
    const second = await deposit(devnet, 'l1', alice, bob, 200n);
    const { message, attestation } = await attestationFor(devnet, 'l1', second);
    const firstEnvelope = sentEnvelope(devnet, 0);

    const error = await captureError(
      l2.chain.transact(RELAYER, 0n, (ctx) =>
        l2.gateway.relayAndClaim(ctx, second, message, attestation, encodeRelayCall(firstEnvelope))
      )
    );

    expect(error.code).toBe('RELAY_DID_NOT_FINALIZE');
    expect(error.message).toBe('Relayed call left transfer 1 at NONE, expected PENDING');
    expect(l2.gateway.statusOf(0n)).toBe('NONE');
    expect(l2.messenger.isRelayed(hashEnvelope(firstEnvelope))).toBe(false);
    expect(eventsOfType(l2.chain, 'WITHDRAW_FINALIZED')).toEqual([]);
  });

  it('rejects a relay of a message that was never sent', async () => {
    const { l2 } = devnet;
    const nonce = await deposit(devnet, 'l1', alice, bob, 1000n);
    const { message, attestation } = await attestationFor(devnet, 'l1', nonce);
    const forged = { ...sentEnvelope(devnet, 0), messageNonce: 99n };

    const error = await captureError(
      l2.chain.transact(RELAYER, 0n, (ctx) =>
        l2.gateway.relayAndClaim(ctx, nonce, message, attestation, encodeRelayCall(forged))
      )
    );

    expect(error.code).toBe('RELAY_FAILED');
    expect(error.message).toBe('Relayed message execution failed: Invalid proof');
    expect(l2.gateway.statusOf(nonce)).toBe('NONE');
  });

  it('rejects calldata the messenger does not recognise', async () => {
    const { l2 } = devnet;
    const nonce = await deposit(devnet, 'l1', alice, bob, 1000n);
    const { message, attestation } = await attestationFor(devnet, 'l1', nonce);

    const error = await captureError(
      l2.chain.transact(RELAYER, 0n, (ctx) =>
        l2.gateway.relayAndClaim(ctx, nonce, message, attestation, hexData('0xdeadbeef'))
      )
    );

    expect(error.code).toBe('RELAY_FAILED');
  });

  it('rolls the relay back when the claim fails', async () => {
    const { l2 } = devnet;
    const nonce = await deposit(devnet, 'l1', alice, bob, 1000n);
    const { message } = await attestationFor(devnet, 'l1', nonce);
    const forgedAttestation = createDevnet().attestations.attest(message);
    const envelope = sentEnvelope(devnet, 0);

    const error = await captureError(
      l2.chain.transact(RELAYER, 0n, (ctx) =>
        l2.gateway.relayAndClaim(ctx, nonce, message, forgedAttestation, encodeRelayCall(envelope))
      )
    );

    expect(error.code).toBe('MINT_FAILED');
    expect(l2.gateway.statusOf(nonce)).toBe('NONE');
    expect(l2.messenger.isRelayed(hashEnvelope(envelope))).toBe(false);
    expect(await l2.token.balanceOf(bob)).toBe(0n);

    // The plain relay path still works afterwards
    expect(await devnet.deliverMessages('l1', RELAYER)).toBe(1);
    expect(l2.gateway.statusOf(nonce)).toBe('PENDING');
  });
});
