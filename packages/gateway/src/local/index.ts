/**
 * In-process stand-ins for the chains, CCTP and the messenger.
 */

export { LocalChain, Revert } from './local-chain.js';
export type { CommittedEvent, ChainEventHandler } from './local-chain.js';
export { LocalToken } from './local-token.js';
export {
  LocalAttestationService,
  LocalCctpDomain,
  LocalMessageTransmitter,
  LocalTokenMessenger,
} from './local-cctp.js';
export type { LocalCctpDomainOptions } from './local-cctp.js';
export { LocalMessenger, encodeRelayCall, hashEnvelope } from './local-messenger.js';
export { createDevnet, DEFAULT_MAX_BURN_AMOUNT } from './devnet.js';
export type { Devnet, DevnetOptions, DevnetSide, Side } from './devnet.js';
