/**
 * Operation Timeout Enforcement
 *
 * Timeouts are operational failures, not correctness failures. A timed-out
 * attestation fetch or claim submission is retried by the relayer; nothing in
 * the gateway core ever times out.
 */

// =============================================================================
// TIMEOUT CONFIG
// =============================================================================

export interface TimeoutConfig {
  /**
   * How long one attestation lookup may take (ms).
   */
  attestationTimeoutMs: number;

  /**
   * How long one claim transaction may take, queueing included (ms).
   */
  submissionTimeoutMs: number;
}

export const DEFAULT_TIMEOUT_CONFIG: TimeoutConfig = {
  attestationTimeoutMs: 10_000,
  submissionTimeoutMs: 30_000,
};

// =============================================================================
// TIMEOUT ERROR
// =============================================================================

export class OperationTimeoutError extends Error {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super(`Operation timed out: ${operation} after ${timeoutMs}ms`);
    this.name = 'OperationTimeoutError';
  }
}

// =============================================================================
// TIMEOUT WRAPPER
// =============================================================================

/**
 * Execute a function with timeout.
 *
 * Does NOT cancel the underlying operation. A claim transaction may still
 * commit after its timeout fired; the relayer re-reads the ledger before
 * every attempt.
 */
export async function withTimeout<T>(
  fn: () => Promise<T>,
  timeoutMs: number,
  operation: string
): Promise<T> {
  let timeoutId: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new OperationTimeoutError(operation, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(), timeoutPromise]);
  } finally {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * A timeout bound to one operation name.
 *
 * Usage:
 *   const guard = createTimeoutGuard(config.attestationTimeoutMs, 'fetchAttestation');
 *   const response = await guard.execute(() => provider.fetchAttestation(domain, nonce));
 */
export interface TimeoutGuard {
  timeoutMs: number;
  execute<T>(fn: () => Promise<T>): Promise<T>;
}

export function createTimeoutGuard(timeoutMs: number, operation: string): TimeoutGuard {
  return {
    timeoutMs,
    execute: <T>(fn: () => Promise<T>) => withTimeout(fn, timeoutMs, operation),
  };
}
