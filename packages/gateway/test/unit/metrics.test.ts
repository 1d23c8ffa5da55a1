/**
 * Metrics Tests
 *
 * Proves:
 * - Metrics are write-only signals
 * - The default no-op implementation accepts every signal
 * - Console metrics write one JSON line per signal
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { NoOpMetrics, ConsoleMetrics } from '../../src/observability/metrics.js';

describe('NoOpMetrics', () => {
  it('accepts every signal', () => {
    const metrics = new NoOpMetrics();

    expect(() => metrics.jobQueued(0)).not.toThrow();
    expect(() => metrics.attestationPending(0)).not.toThrow();
    expect(() => metrics.attestationTimedOut(0, 10_000)).not.toThrow();
    expect(() => metrics.claimSubmitted(3, 'relayAndClaim')).not.toThrow();
    expect(() => metrics.claimCompleted(3, 'claimed', 1_500)).not.toThrow();
    expect(() => metrics.claimFailed(3, 'MINT_FAILED', 1)).not.toThrow();
    expect(() => metrics.claimAbandoned(3, 'MINT_FAILED')).not.toThrow();
  });
});

describe('ConsoleMetrics', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  function captureLines(): () => Array<Record<string, unknown>> {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    return () => spy.mock.calls.map(([line]) => JSON.parse(String(line)));
  }

  it('logs a queued job', () => {
    const lines = captureLines();

    new ConsoleMetrics().jobQueued(0);

    const [entry] = lines();
    expect(entry).toMatchObject({ category: 'job', event: 'queued', sourceDomain: 0 });
    expect(typeof entry?.timestamp).toBe('string');
  });

  it('logs the attestation timeout', () => {
    const lines = captureLines();

    new ConsoleMetrics().attestationTimedOut(0, 10_000);

    expect(lines()[0]).toMatchObject({
      category: 'attestation',
      event: 'timed_out',
      sourceDomain: 0,
      timeoutMs: 10_000,
    });
  });

  it('logs the claim lifecycle', () => {
    const lines = captureLines();
    const metrics = new ConsoleMetrics();

    metrics.claimSubmitted(3, 'claim');
    metrics.claimFailed(3, 'RELAY_FAILED', 2);
    metrics.claimCompleted(3, 'already_claimed', 250);
    metrics.claimAbandoned(3, 'TIMEOUT');

    expect(lines().map(({ timestamp: _timestamp, ...rest }) => rest)).toEqual([
      { category: 'claim', event: 'submitted', destinationDomain: 3, method: 'claim' },
      { category: 'claim', event: 'failed', destinationDomain: 3, errorCode: 'RELAY_FAILED', attempt: 2 },
      { category: 'claim', event: 'completed', destinationDomain: 3, outcome: 'already_claimed', durationMs: 250 },
      { category: 'claim', event: 'abandoned', destinationDomain: 3, errorCode: 'TIMEOUT' },
    ]);
  });
});
