/**
 * Claim Relayer
 *
 * Completes transfers for users: watches one direction of a gateway pair,
 * waits for each burn's attestation, then relays the finalize message and
 * claims in a single destination transaction.
 *
 * Job lifecycle:
 *   AWAITING_ATTESTATION → COMPLETED | FAILED
 *
 * Rules:
 * - One job per CCTP nonce, created from committed source events only
 * - The claim method is chosen inside the destination transaction from the
 *   ledger state at that moment; whatever someone else left decides the call
 * - A pending attestation is not a failed attempt
 * - A finalize by someone else after our relay rolled back is not a failure
 * - Attempts are bounded by `maxAttempts`
 * - Finished jobs leave the queue; their nonces are never queued again
 */

import { GatewayError } from '../boundaries/index.js';
import type { Address, HexData } from '../boundaries/index.js';
import type { AttestationProvider, AttestationResponse } from '../adapters/index.js';
import { decodeFinalizeWithdraw, decodeTransferData } from '../gateway/index.js';
import { DEFAULT_TIMEOUT_CONFIG, OperationTimeoutError, createTimeoutGuard } from '../execution/index.js';
import type { TimeoutConfig, TimeoutGuard } from '../execution/index.js';
import { encodeRelayCall, Revert } from '../local/index.js';
import type { CommittedEvent, DevnetSide } from '../local/index.js';
import type { CallContext } from '../types.js';
import { NoOpMetrics } from '../observability/index.js';
import type { ClaimMethod, ClaimOutcome, TransferMetrics } from '../observability/index.js';
import type { Logger } from '../utils/index.js';

// =============================================================================
// TYPES
// =============================================================================

export type ClaimJobStatus = 'AWAITING_ATTESTATION' | 'COMPLETED' | 'FAILED';

export interface ClaimJob {
  nonce: bigint;
  sourceDomain: number;
  /** Messenger calldata delivering the finalize message on the destination. */
  relayCall: HexData;
  status: ClaimJobStatus;
  attempts: number;
  createdAt: number;
  outcome?: ClaimOutcome;
  lastError?: { code: string; message: string };
}

export interface ClaimRelayerOptions {
  source: DevnetSide;
  destination: DevnetSide;
  attestations: AttestationProvider;
  /** Account submitting destination transactions. */
  relayer: Address;
  logger: Logger;
  metrics?: TransferMetrics;
  timeouts?: TimeoutConfig;
  maxAttempts?: number;
  /** Finished jobs kept for `job()` lookups, oldest evicted first. */
  historyLimit?: number;
  now?: () => number;
}

export interface RelayerPassResult {
  completed: number;
  failed: number;
  waiting: number;
}

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_HISTORY_LIMIT = 1_000;

// =============================================================================
// RELAYER
// =============================================================================

export class ClaimRelayer {
  private readonly source: DevnetSide;
  private readonly destination: DevnetSide;
  private readonly attestations: AttestationProvider;
  private readonly relayer: Address;
  private readonly logger: Logger;
  private readonly metrics: TransferMetrics;
  private readonly maxAttempts: number;
  private readonly historyLimit: number;
  private readonly now: () => number;
  private readonly attestationGuard: TimeoutGuard;
  private readonly submissionGuard: TimeoutGuard;

  private readonly pending: Map<bigint, ClaimJob> = new Map();
  private readonly history: Map<bigint, ClaimJob> = new Map();
  private readonly settled: Set<bigint> = new Set();
  private inFlight: Promise<RelayerPassResult> | null = null;
  private timer: NodeJS.Timeout | null = null;

  constructor(options: ClaimRelayerOptions) {
    this.source = options.source;
    this.destination = options.destination;
    this.attestations = options.attestations;
    this.relayer = options.relayer;
    this.metrics = options.metrics ?? new NoOpMetrics();
    this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    this.historyLimit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT;
    this.now = options.now ?? Date.now;
    this.logger = options.logger.child({
      component: 'claim-relayer',
      route: `${options.source.side}->${options.destination.side}`,
    });

    const timeouts = options.timeouts ?? DEFAULT_TIMEOUT_CONFIG;
    this.attestationGuard = createTimeoutGuard(timeouts.attestationTimeoutMs, 'fetchAttestation');
    this.submissionGuard = createTimeoutGuard(timeouts.submissionTimeoutMs, 'submitClaim');

    this.source.chain.onEvent((committed) => this.observe(committed));
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  /** Open jobs only. */
  jobs(): ClaimJob[] {
    return [...this.pending.values()].map((job) => ({ ...job }));
  }

  job(nonce: bigint): ClaimJob | undefined {
    const job = this.pending.get(nonce) ?? this.history.get(nonce);
    return job ? { ...job } : undefined;
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Run one pass over every open job. Concurrent callers share the pass in
   * flight.
   */
  processOnce(): Promise<RelayerPassResult> {
    if (!this.inFlight) {
      this.inFlight = this.runPass().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  start(intervalMs: number): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.processOnce().catch((error: unknown) => {
        this.logger.error({ error }, 'Relayer pass failed');
      });
    }, intervalMs);
    this.logger.info({ intervalMs }, 'Claim relayer started');
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.logger.info({}, 'Claim relayer stopped');
  }

  // ===========================================================================
  // Observation
  // ===========================================================================

  private observe({ event }: CommittedEvent): void {
    if (
      event.type !== 'MESSENGER_SENT_MESSAGE' ||
      event.messenger !== this.source.messenger.address ||
      event.envelope.from !== this.source.gateway.address ||
      event.envelope.to !== this.destination.gateway.address
    ) {
      return;
    }

    let nonce: bigint;
    try {
      nonce = decodeTransferData(decodeFinalizeWithdraw(event.envelope.message).data).nonce;
    } catch (error) {
      this.logger.warn({ error }, 'Ignoring undecodable gateway message');
      return;
    }
    if (this.pending.has(nonce) || this.settled.has(nonce)) return;

    this.pending.set(nonce, {
      nonce,
      sourceDomain: this.source.domain,
      relayCall: encodeRelayCall(event.envelope),
      status: 'AWAITING_ATTESTATION',
      attempts: 0,
      createdAt: this.now(),
    });
    this.metrics.jobQueued(this.source.domain);
    this.logger.info({ nonce }, 'Claim job queued');
  }

  // ===========================================================================
  // Processing
  // ===========================================================================

  private async runPass(): Promise<RelayerPassResult> {
    const result: RelayerPassResult = { completed: 0, failed: 0, waiting: 0 };
    for (const job of [...this.pending.values()]) {
      if (job.status !== 'AWAITING_ATTESTATION') continue;
      const status = await this.processJob(job);
      if (status === 'COMPLETED') result.completed += 1;
      else if (status === 'FAILED') result.failed += 1;
      else result.waiting += 1;
    }
    return result;
  }

  private async processJob(job: ClaimJob): Promise<ClaimJobStatus> {
    await this.attempt(job);
    return job.status;
  }

  private async attempt(job: ClaimJob): Promise<void> {
    const gateway = this.destination.gateway;
    if (gateway.statusOf(job.nonce) === 'DONE') {
      this.complete(job, 'already_claimed');
      return;
    }

    let response: AttestationResponse;
    try {
      response = await this.attestationGuard.execute(() =>
        this.attestations.fetchAttestation(job.sourceDomain, job.nonce)
      );
    } catch (error) {
      this.recordFailure(job, error);
      return;
    }
    if (response.status === 'pending') {
      this.metrics.attestationPending(job.sourceDomain);
      this.logger.debug({ nonce: job.nonce }, 'Attestation pending');
      return;
    }

    const { message, attestation } = response;
    const submission: { method: ClaimMethod | null } = { method: null };
    let outcome: ClaimOutcome;
    try {
      outcome = await this.submissionGuard.execute(() =>
        this.destination.chain.transact(this.relayer, 0n, async (ctx): Promise<ClaimOutcome> => {
          submission.method = this.chooseMethod(job.nonce);
          if (!submission.method) return 'already_claimed';
          await this.submit(ctx, job, submission.method, message, attestation);
          return 'claimed';
        })
      );
    } catch (error) {
      const after = gateway.statusOf(job.nonce);
      // Lost a race with another claimer
      if (after === 'DONE') {
        this.complete(job, 'already_claimed');
        return;
      }
      if (after === 'PENDING' && submission.method === 'relayAndClaim') {
        this.logger.info({ nonce: job.nonce }, 'Transfer finalized by another relayer, claiming next pass');
        return;
      }
      this.recordFailure(job, error);
      return;
    }
    this.complete(job, outcome);
  }

  /** Null when the transfer is already claimed. */
  private chooseMethod(nonce: bigint): ClaimMethod | null {
    switch (this.destination.gateway.statusOf(nonce)) {
      case 'NONE':
        return 'relayAndClaim';
      case 'PENDING':
        return 'claim';
      case 'DONE':
        return null;
    }
  }

  private async submit(
    ctx: CallContext,
    job: ClaimJob,
    method: ClaimMethod,
    message: HexData,
    attestation: HexData
  ): Promise<void> {
    const gateway = this.destination.gateway;
    this.metrics.claimSubmitted(this.destination.domain, method);
    if (method === 'claim') {
      await gateway.claim(ctx, job.nonce, message, attestation);
    } else {
      await gateway.relayAndClaim(ctx, job.nonce, message, attestation, job.relayCall);
    }
  }

  private complete(job: ClaimJob, outcome: ClaimOutcome): void {
    job.status = 'COMPLETED';
    job.outcome = outcome;
    this.settle(job);
    this.metrics.claimCompleted(this.destination.domain, outcome, this.now() - job.createdAt);
    this.logger.info({ nonce: job.nonce, outcome }, 'Transfer claimed');
  }

  private settle(job: ClaimJob): void {
    this.pending.delete(job.nonce);
    this.settled.add(job.nonce);
    this.history.set(job.nonce, job);
    for (const nonce of this.history.keys()) {
      if (this.history.size <= this.historyLimit) break;
      this.history.delete(nonce);
    }
  }

  private recordFailure(job: ClaimJob, error: unknown): void {
    job.attempts += 1;
    const code = errorCode(error);
    job.lastError = { code, message: error instanceof Error ? error.message : String(error) };

    if (error instanceof OperationTimeoutError && error.operation === 'fetchAttestation') {
      this.metrics.attestationTimedOut(job.sourceDomain, error.timeoutMs);
    }

    if (job.attempts >= this.maxAttempts) {
      job.status = 'FAILED';
      this.settle(job);
      this.metrics.claimAbandoned(this.destination.domain, code);
      this.logger.error({ nonce: job.nonce, attempts: job.attempts, error }, 'Claim job failed');
      return;
    }
    this.metrics.claimFailed(this.destination.domain, code, job.attempts);
    this.logger.warn({ nonce: job.nonce, attempt: job.attempts, code }, 'Claim attempt failed');
  }
}

function errorCode(error: unknown): string {
  if (error instanceof GatewayError) return error.code;
  if (error instanceof OperationTimeoutError) return 'TIMEOUT';
  if (error instanceof Revert) return 'REVERT';
  return 'UNKNOWN';
}
