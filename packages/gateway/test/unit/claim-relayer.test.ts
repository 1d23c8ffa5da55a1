/**
 * Claim Relayer Tests
 *
 * Proves:
 * - One job per committed gateway message, none for rolled-back deposits
 * - Unfinalized transfers are relayed and claimed in one transaction
 * - Finalized transfers are claimed directly, including ones finalized
 *   while the attestation was being fetched
 * - A transfer claimed by someone else completes without a submission
 * - Pending attestations are waited on, not counted as failures
 * - Failures are retried up to maxAttempts, then the job is abandoned
 * - Finished jobs leave the queue and their nonces are not queued again
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { EMPTY_BYTES } from '../../src/boundaries/index.js';
import type { AttestationProvider } from '../../src/adapters/index.js';
import { createDevnet } from '../../src/local/index.js';
import type { Devnet } from '../../src/local/index.js';
import type { TransferMetrics } from '../../src/observability/index.js';
import { ClaimRelayer } from '../../src/relayer/index.js';
import type { ClaimRelayerOptions } from '../../src/relayer/index.js';
import { JsonLogger } from '../../src/utils/index.js';
import { account, attestationFor, captureError, deposit, RELAYER } from '../helpers.js';

const alice = account('alice');
const bob = account('bob');

function recordingMetrics() {
  return {
    jobQueued: vi.fn<TransferMetrics['jobQueued']>(),
    attestationPending: vi.fn<TransferMetrics['attestationPending']>(),
    attestationTimedOut: vi.fn<TransferMetrics['attestationTimedOut']>(),
    claimSubmitted: vi.fn<TransferMetrics['claimSubmitted']>(),
    claimCompleted: vi.fn<TransferMetrics['claimCompleted']>(),
    claimFailed: vi.fn<TransferMetrics['claimFailed']>(),
    claimAbandoned: vi.fn<TransferMetrics['claimAbandoned']>(),
  } satisfies TransferMetrics;
}

describe('ClaimRelayer', () => {
  let devnet: Devnet;
  let metrics: ReturnType<typeof recordingMetrics>;

  function createRelayer(overrides: Partial<ClaimRelayerOptions> = {}): ClaimRelayer {
    return new ClaimRelayer({
      source: devnet.l1,
      destination: devnet.l2,
      attestations: devnet.attestations,
      relayer: RELAYER,
      logger: new JsonLogger({}, 'error', () => {}),
      metrics,
      now: () => 1_000,
      ...overrides,
    });
  }

  beforeEach(() => {
    devnet = createDevnet();
    metrics = recordingMetrics();
  });

  // ===========================================================================
  // Observation
  // ===========================================================================

  describe('observation', () => {
    it('queues a job for each committed deposit', async () => {
      const relayer = createRelayer();

      await deposit(devnet, 'l1', alice, bob, 1000n);

      expect(relayer.jobs()).toEqual([
        {
          nonce: 0n,
          sourceDomain: 0,
          relayCall: expect.stringMatching(/^0x/),
          status: 'AWAITING_ATTESTATION',
          attempts: 0,
          createdAt: 1_000,
        },
      ]);
      expect(metrics.jobQueued).toHaveBeenCalledWith(0);
    });

    it('ignores deposits that rolled back', async () => {
      devnet = createDevnet({ maxBurnAmountPerMessage: 10n });
      const relayer = createRelayer();

      await captureError(deposit(devnet, 'l1', alice, bob, 1000n));

      expect(relayer.jobs()).toEqual([]);
    });

    it('ignores messages not sent by the gateway', async () => {
      const relayer = createRelayer();
      const { l1, l2 } = devnet;

      await l1.chain.transact(alice, 0n, (ctx) =>
        l1.messenger.sendMessage(ctx, l2.gateway.address, 0n, EMPTY_BYTES, 1n)
      );

      expect(relayer.jobs()).toEqual([]);
    });

    it('ignores the opposite direction', async () => {
      const relayer = createRelayer();

      await deposit(devnet, 'l2', alice, bob, 1000n);

      expect(relayer.jobs()).toEqual([]);
    });
  });

  // ===========================================================================
  // Processing
  // ===========================================================================

  describe('processOnce', () => {
    it('relays and claims an unfinalized transfer', async () => {
      const relayer = createRelayer();
      await deposit(devnet, 'l1', alice, bob, 1000n);

      const result = await relayer.processOnce();

      expect(result).toEqual({ completed: 1, failed: 0, waiting: 0 });
      expect(await devnet.l2.token.balanceOf(bob)).toBe(1000n);
      expect(devnet.l2.gateway.statusOf(0n)).toBe('DONE');
      expect(relayer.job(0n)).toMatchObject({ status: 'COMPLETED', outcome: 'claimed', attempts: 0 });
      expect(metrics.claimSubmitted).toHaveBeenCalledWith(3, 'relayAndClaim');
      expect(metrics.claimCompleted).toHaveBeenCalledWith(3, 'claimed', 0);
    });

    it('claims directly once the finalize message was delivered', async () => {
      const relayer = createRelayer();
      await deposit(devnet, 'l1', alice, bob, 1000n);
      await devnet.deliverMessages('l1', account('someone-else'));

      await relayer.processOnce();

      expect(devnet.l2.gateway.statusOf(0n)).toBe('DONE');
      expect(metrics.claimSubmitted).toHaveBeenCalledWith(3, 'claim');
    });

    it('claims directly when the message is delivered during the attestation fetch', async () => {
      const deliveringFirst: AttestationProvider = {
        fetchAttestation: async (sourceDomain, nonce) => {
          await devnet.deliverMessages('l1', account('someone-else'));
          return devnet.attestations.fetchAttestation(sourceDomain, nonce);
        },
      };
      const relayer = createRelayer({ attestations: deliveringFirst, maxAttempts: 1 });
      await deposit(devnet, 'l1', alice, bob, 1000n);

      expect(await relayer.processOnce()).toEqual({ completed: 1, failed: 0, waiting: 0 });
      expect(relayer.job(0n)).toMatchObject({ status: 'COMPLETED', outcome: 'claimed', attempts: 0 });
      expect(metrics.claimSubmitted).toHaveBeenCalledTimes(1);
      expect(metrics.claimSubmitted).toHaveBeenCalledWith(3, 'claim');
      expect(devnet.l2.gateway.statusOf(0n)).toBe('DONE');
      expect(await devnet.l2.token.balanceOf(bob)).toBe(1000n);
    });

    it('completes without submitting when the transfer was already claimed', async () => {
      const relayer = createRelayer();
      const { l2 } = devnet;
      await deposit(devnet, 'l1', alice, bob, 1000n);
      await devnet.deliverMessages('l1', RELAYER);
      const { message, attestation } = await attestationFor(devnet, 'l1', 0n);
      await l2.chain.transact(bob, 0n, (ctx) => l2.gateway.claim(ctx, 0n, message, attestation));

      const result = await relayer.processOnce();

      expect(result).toEqual({ completed: 1, failed: 0, waiting: 0 });
      expect(relayer.job(0n)?.outcome).toBe('already_claimed');
      expect(metrics.claimSubmitted).not.toHaveBeenCalled();
      expect(await l2.token.balanceOf(bob)).toBe(1000n);
    });

    it('waits while the attestation is pending', async () => {
      const relayer = createRelayer();
      await deposit(devnet, 'l1', alice, bob, 1000n);
      devnet.attestations.withhold(0, 0n);

      expect(await relayer.processOnce()).toEqual({ completed: 0, failed: 0, waiting: 1 });
      expect(relayer.job(0n)).toMatchObject({ status: 'AWAITING_ATTESTATION', attempts: 0 });
      expect(metrics.attestationPending).toHaveBeenCalledWith(0);
      expect(devnet.l2.gateway.statusOf(0n)).toBe('NONE');

      devnet.attestations.release(0, 0n);

      expect(await relayer.processOnce()).toEqual({ completed: 1, failed: 0, waiting: 0 });
    });

    it('skips finished jobs on later passes', async () => {
      const relayer = createRelayer();
      await deposit(devnet, 'l1', alice, bob, 1000n);
      await relayer.processOnce();

      expect(await relayer.processOnce()).toEqual({ completed: 0, failed: 0, waiting: 0 });
    });

    it('drops finished jobs from the queue', async () => {
      const relayer = createRelayer();
      await deposit(devnet, 'l1', alice, bob, 1000n);

      await relayer.processOnce();

      expect(relayer.jobs()).toEqual([]);
      expect(relayer.job(0n)).toMatchObject({ status: 'COMPLETED', outcome: 'claimed' });
    });

    it('keeps only the most recent finished jobs', async () => {
      const relayer = createRelayer({ historyLimit: 1 });
      await deposit(devnet, 'l1', alice, bob, 1000n);
      await deposit(devnet, 'l1', alice, bob, 500n);

      expect(await relayer.processOnce()).toEqual({ completed: 2, failed: 0, waiting: 0 });
      expect(relayer.job(0n)).toBeUndefined();
      expect(relayer.job(1n)).toMatchObject({ status: 'COMPLETED', outcome: 'claimed' });
    });

    it('does not queue a finished nonce again', async () => {
      const relayer = createRelayer({ historyLimit: 0 });
      const { l1, l2 } = devnet;
      await deposit(devnet, 'l1', alice, bob, 1000n);
      await relayer.processOnce();
      const [envelope] = l1.messenger.sentMessages();
      if (!envelope) throw new Error('No message sent');

      await l1.chain.transact(l1.gateway.address, 0n, (ctx) =>
        l1.messenger.sendMessage(ctx, l2.gateway.address, 0n, envelope.message, 200_000n)
      );

      expect(relayer.jobs()).toEqual([]);
      expect(relayer.job(0n)).toBeUndefined();
      expect(metrics.jobQueued).toHaveBeenCalledTimes(1);
    });

    it('shares a pass already in flight', async () => {
      const relayer = createRelayer();

      const first = relayer.processOnce();
      const second = relayer.processOnce();

      expect(second).toBe(first);
      await first;
    });
  });

  // ===========================================================================
  // Failures
  // ===========================================================================

  describe('failures', () => {
    it('retries a failing claim and abandons it after maxAttempts', async () => {
      const relayer = createRelayer({ maxAttempts: 2 });
      const { l2 } = devnet;
      await l2.chain.transact(devnet.owner, 0n, (ctx) => l2.gateway.pauseWithdraw(ctx, true));
      await deposit(devnet, 'l1', alice, bob, 1000n);

      expect(await relayer.processOnce()).toEqual({ completed: 0, failed: 0, waiting: 1 });
      expect(relayer.job(0n)).toMatchObject({
        status: 'AWAITING_ATTESTATION',
        attempts: 1,
        lastError: {
          code: 'RELAY_FAILED',
          message: 'Relayed message execution failed: Withdraw finalization is paused',
        },
      });
      expect(metrics.claimFailed).toHaveBeenCalledWith(3, 'RELAY_FAILED', 1);

      expect(await relayer.processOnce()).toEqual({ completed: 0, failed: 1, waiting: 0 });
      expect(relayer.job(0n)?.status).toBe('FAILED');
      expect(metrics.claimAbandoned).toHaveBeenCalledWith(3, 'RELAY_FAILED');

      expect(await relayer.processOnce()).toEqual({ completed: 0, failed: 0, waiting: 0 });
      expect(l2.gateway.statusOf(0n)).toBe('NONE');
    });

    it('leaves the job open when another relayer finalized after a failed relay', async () => {
      const relayer = createRelayer({ maxAttempts: 1 });
      const { l2 } = devnet;
      await deposit(devnet, 'l1', alice, bob, 1000n);
      vi.spyOn(l2.gateway, 'relayAndClaim').mockRejectedValueOnce(new Error('relay reverted'));
      vi.spyOn(l2.gateway, 'statusOf')
        .mockReturnValueOnce('NONE')
        .mockReturnValueOnce('NONE')
        .mockReturnValueOnce('PENDING');

      expect(await relayer.processOnce()).toEqual({ completed: 0, failed: 0, waiting: 1 });
      expect(relayer.job(0n)).toMatchObject({ status: 'AWAITING_ATTESTATION', attempts: 0 });
      expect(metrics.claimFailed).not.toHaveBeenCalled();

      await devnet.deliverMessages('l1', account('someone-else'));

      expect(await relayer.processOnce()).toEqual({ completed: 1, failed: 0, waiting: 0 });
      expect(metrics.claimSubmitted).toHaveBeenLastCalledWith(3, 'claim');
      expect(await l2.token.balanceOf(bob)).toBe(1000n);
    });

    it('counts an attestation timeout as a failed attempt', async () => {
      const hanging: AttestationProvider = {
        fetchAttestation: () => new Promise(() => {}),
      };
      const relayer = createRelayer({
        attestations: hanging,
        timeouts: { attestationTimeoutMs: 10, submissionTimeoutMs: 1_000 },
      });
      await deposit(devnet, 'l1', alice, bob, 1000n);

      await relayer.processOnce();

      expect(relayer.job(0n)).toMatchObject({
        attempts: 1,
        lastError: { code: 'TIMEOUT', message: 'Operation timed out: fetchAttestation after 10ms' },
      });
      expect(metrics.attestationTimedOut).toHaveBeenCalledWith(0, 10);
      expect(metrics.claimFailed).toHaveBeenCalledWith(3, 'TIMEOUT', 1);
    });
  });
});
