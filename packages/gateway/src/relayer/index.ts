/**
 * Relayer Module
 */

export type { ClaimJob, ClaimJobStatus, ClaimRelayerOptions, RelayerPassResult } from './claim-relayer.js';
export { ClaimRelayer, DEFAULT_MAX_ATTEMPTS } from './claim-relayer.js';
