/**
 * Configuration Tests
 */

import { describe, it, expect } from 'vitest';
import { loadConfigFromEnv } from '../../src/config.js';
import { DEFAULT_MAX_BURN_AMOUNT } from '../../src/local/index.js';
import { captureError } from '../helpers.js';

describe('loadConfigFromEnv', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadConfigFromEnv({})).toEqual({
      port: 3000,
      host: '0.0.0.0',
      l1Domain: 0,
      l2Domain: 3,
      maxBurnAmountPerMessage: DEFAULT_MAX_BURN_AMOUNT,
      defaultGasLimit: 200_000n,
      relayerEnabled: true,
      relayerIntervalMs: 2_000,
      attestationTimeoutMs: 10_000,
      submissionTimeoutMs: 30_000,
      maxAttempts: 3,
      logLevel: 'info',
      consoleMetrics: false,
    });
  });

  it('reads overrides', () => {
    const config = loadConfigFromEnv({
      PORT: '8080',
      L2_DOMAIN: '6',
      MAX_BURN_AMOUNT_PER_MESSAGE: '5000000',
      RELAYER_ENABLED: 'false',
      LOG_LEVEL: 'debug',
      CONSOLE_METRICS: 'true',
    });

    expect(config).toMatchObject({
      port: 8080,
      l2Domain: 6,
      maxBurnAmountPerMessage: 5_000_000n,
      relayerEnabled: false,
      logLevel: 'debug',
      consoleMetrics: true,
    });
  });

  it('treats empty values as unset', () => {
    expect(loadConfigFromEnv({ PORT: '', LOG_LEVEL: '' })).toMatchObject({ port: 3000, logLevel: 'info' });
  });

  it('rejects a non-numeric port', async () => {
    const error = await captureError(Promise.resolve().then(() => loadConfigFromEnv({ PORT: 'http' })));

    expect(error.code).toBe('INVALID_CONFIG');
    expect(error.message).toBe('PORT must be a non-negative integer, got "http"');
  });

  it('rejects a negative burn limit', async () => {
    const error = await captureError(
      Promise.resolve().then(() => loadConfigFromEnv({ MAX_BURN_AMOUNT_PER_MESSAGE: '-1' }))
    );

    expect(error.message).toBe('MAX_BURN_AMOUNT_PER_MESSAGE must be a non-negative integer, got "-1"');
  });

  it('rejects a malformed flag', async () => {
    const error = await captureError(Promise.resolve().then(() => loadConfigFromEnv({ RELAYER_ENABLED: 'yes' })));

    expect(error.message).toBe('RELAYER_ENABLED must be "true" or "false", got "yes"');
  });

  it('rejects an unknown log level', async () => {
    const error = await captureError(Promise.resolve().then(() => loadConfigFromEnv({ LOG_LEVEL: 'trace' })));

    expect(error.message).toBe('LOG_LEVEL must be one of debug, info, warn, error, got "trace"');
  });
});
