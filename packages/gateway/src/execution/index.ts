/**
 * Execution Module
 */

// Type-only exports
export type { TimeoutConfig, TimeoutGuard } from './timeout.js';

// Value exports
export { DEFAULT_TIMEOUT_CONFIG, OperationTimeoutError, withTimeout, createTimeoutGuard } from './timeout.js';
