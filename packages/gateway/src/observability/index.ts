/**
 * Observability Module
 */

// Type-only exports
export type { TransferMetrics, ClaimMethod, ClaimOutcome } from './metrics.js';

// Value exports
export { NoOpMetrics, ConsoleMetrics } from './metrics.js';
