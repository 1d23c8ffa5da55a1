/**
 * CCTP Gateway
 *
 * Cross-chain USDC transfers: tokens move through CCTP burn/mint, the
 * transfer record moves through a cross-domain messenger, and a per-nonce
 * ledger (NONE → PENDING → DONE) gates every mint.
 */

export * from './boundaries/index.js';
export * from './ledger/index.js';
export * from './adapters/index.js';
export * from './gateway/index.js';
export * from './local/index.js';
export * from './relayer/index.js';
export * from './execution/index.js';
export * from './observability/index.js';
export * from './http/index.js';
export * from './utils/index.js';
export * from './types.js';
export { loadConfigFromEnv } from './config.js';
export type { GatewayAppConfig } from './config.js';
