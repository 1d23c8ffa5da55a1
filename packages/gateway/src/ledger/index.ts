export type { MessageStatusLedger } from './status-ledger.js';
export { InMemoryMessageStatusLedger } from './status-ledger.js';
