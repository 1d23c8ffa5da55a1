/**
 * Application configuration, read from the environment.
 */

import { ValidationError } from './boundaries/index.js';
import { DEFAULT_MAX_BURN_AMOUNT } from './local/index.js';
import { LOG_LEVELS } from './utils/index.js';
import type { LogLevel } from './utils/index.js';

export interface GatewayAppConfig {
  // Server
  port: number;
  host: string;

  // Devnet
  l1Domain: number;
  l2Domain: number;
  maxBurnAmountPerMessage: bigint;
  defaultGasLimit: bigint;

  // Relayer
  relayerEnabled: boolean;
  relayerIntervalMs: number;
  attestationTimeoutMs: number;
  submissionTimeoutMs: number;
  maxAttempts: number;

  // Observability
  logLevel: LogLevel;
  consoleMetrics: boolean;
}

export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): GatewayAppConfig {
  return {
    port: readInt(env, 'PORT', 3000),
    host: env.HOST ?? '0.0.0.0',
    l1Domain: readInt(env, 'L1_DOMAIN', 0),
    l2Domain: readInt(env, 'L2_DOMAIN', 3),
    maxBurnAmountPerMessage: readBigInt(env, 'MAX_BURN_AMOUNT_PER_MESSAGE', DEFAULT_MAX_BURN_AMOUNT),
    defaultGasLimit: readBigInt(env, 'DEFAULT_GAS_LIMIT', 200_000n),
    relayerEnabled: readBool(env, 'RELAYER_ENABLED', true),
    relayerIntervalMs: readInt(env, 'RELAYER_INTERVAL_MS', 2_000),
    attestationTimeoutMs: readInt(env, 'ATTESTATION_TIMEOUT_MS', 10_000),
    submissionTimeoutMs: readInt(env, 'SUBMISSION_TIMEOUT_MS', 30_000),
    maxAttempts: readInt(env, 'RELAYER_MAX_ATTEMPTS', 3),
    logLevel: readLogLevel(env, 'LOG_LEVEL', 'info'),
    consoleMetrics: readBool(env, 'CONSOLE_METRICS', false),
  };
}

// =============================================================================
// PARSERS
// =============================================================================

function readInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  if (!/^\d+$/.test(raw)) {
    throw new ValidationError('INVALID_CONFIG', `${name} must be a non-negative integer, got "${raw}"`);
  }
  return parseInt(raw, 10);
}

function readBigInt(env: NodeJS.ProcessEnv, name: string, fallback: bigint): bigint {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  if (!/^\d+$/.test(raw)) {
    throw new ValidationError('INVALID_CONFIG', `${name} must be a non-negative integer, got "${raw}"`);
  }
  return BigInt(raw);
}

function readBool(env: NodeJS.ProcessEnv, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  throw new ValidationError('INVALID_CONFIG', `${name} must be "true" or "false", got "${raw}"`);
}

function readLogLevel(env: NodeJS.ProcessEnv, name: string, fallback: LogLevel): LogLevel {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  const level = LOG_LEVELS.find((candidate) => candidate === raw);
  if (!level) {
    throw new ValidationError('INVALID_CONFIG', `${name} must be one of ${LOG_LEVELS.join(', ')}, got "${raw}"`);
  }
  return level;
}
