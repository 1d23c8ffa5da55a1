/**
 * Metrics Interface
 *
 * Write-only signals for observability.
 *
 * HARD CONSTRAINT: The gateway and the relayer must NEVER read metrics or act
 * on them. Metrics are purely for external monitoring.
 *
 * Default implementation is no-op.
 */

export type ClaimMethod = 'relayAndClaim' | 'claim';

export type ClaimOutcome = 'claimed' | 'already_claimed';

// =============================================================================
// METRICS INTERFACE
// =============================================================================

/**
 * Write-only metrics sink.
 *
 * All methods are fire-and-forget.
 * Implementations must never throw.
 */
export interface TransferMetrics {
  // =========================================================================
  // Relayer jobs
  // =========================================================================

  /**
   * A deposit was observed on the source chain and a claim job recorded.
   */
  jobQueued(sourceDomain: number): void;

  /**
   * The attestation service has not signed the message yet.
   */
  attestationPending(sourceDomain: number): void;

  /**
   * Attestation lookup exceeded its timeout.
   */
  attestationTimedOut(sourceDomain: number, timeoutMs: number): void;

  // =========================================================================
  // Claims
  // =========================================================================

  /**
   * A claim transaction was submitted on the destination chain.
   */
  claimSubmitted(destinationDomain: number, method: ClaimMethod): void;

  /**
   * The transfer reached DONE on the destination chain.
   */
  claimCompleted(destinationDomain: number, outcome: ClaimOutcome, durationMs: number): void;

  /**
   * One attempt failed; the job stays queued.
   */
  claimFailed(destinationDomain: number, errorCode: string, attempt: number): void;

  /**
   * Attempts exhausted; the job is FAILED.
   */
  claimAbandoned(destinationDomain: number, errorCode: string): void;
}

// =============================================================================
// NO-OP IMPLEMENTATION (Default)
// =============================================================================

export class NoOpMetrics implements TransferMetrics {
  jobQueued(_sourceDomain: number): void {}
  attestationPending(_sourceDomain: number): void {}
  attestationTimedOut(_sourceDomain: number, _timeoutMs: number): void {}

  claimSubmitted(_destinationDomain: number, _method: ClaimMethod): void {}
  claimCompleted(_destinationDomain: number, _outcome: ClaimOutcome, _durationMs: number): void {}
  claimFailed(_destinationDomain: number, _errorCode: string, _attempt: number): void {}
  claimAbandoned(_destinationDomain: number, _errorCode: string): void {}
}

// =============================================================================
// CONSOLE METRICS (for development)
// =============================================================================

/**
 * Logs every signal to console as one JSON line.
 */
export class ConsoleMetrics implements TransferMetrics {
  private log(category: string, event: string, data: Record<string, unknown>): void {
    console.log(JSON.stringify({
      timestamp: new Date().toISOString(),
      category,
      event,
      ...data,
    }));
  }

  jobQueued(sourceDomain: number): void {
    this.log('job', 'queued', { sourceDomain });
  }

  attestationPending(sourceDomain: number): void {
    this.log('attestation', 'pending', { sourceDomain });
  }

  attestationTimedOut(sourceDomain: number, timeoutMs: number): void {
    this.log('attestation', 'timed_out', { sourceDomain, timeoutMs });
  }

  claimSubmitted(destinationDomain: number, method: ClaimMethod): void {
    this.log('claim', 'submitted', { destinationDomain, method });
  }

  claimCompleted(destinationDomain: number, outcome: ClaimOutcome, durationMs: number): void {
    this.log('claim', 'completed', { destinationDomain, outcome, durationMs });
  }

  claimFailed(destinationDomain: number, errorCode: string, attempt: number): void {
    this.log('claim', 'failed', { destinationDomain, errorCode, attempt });
  }

  claimAbandoned(destinationDomain: number, errorCode: string): void {
    this.log('claim', 'abandoned', { destinationDomain, errorCode });
  }
}
