/**
 * Gateway Adapters
 *
 * Wrappers around the external collaborators:
 * - CCTP (burn/mint with attestation)
 * - Cross-domain messenger
 * - ERC20 token
 */

export type {
  TokenMessenger,
  MessageTransmitter,
  CircleContractResolver,
  CircleContracts,
} from './burn-mint-adapter.js';
export { BurnMintAdapter } from './burn-mint-adapter.js';

export type { CrossDomainMessenger, MessageTarget } from './domain-relay.js';
export { DomainMessageRelay } from './domain-relay.js';

export type { Erc20Token } from './erc20.js';

export type { CctpMessage, BurnMessage } from './cctp-message.js';
export {
  CCTP_MESSAGE_VERSION,
  CCTP_BURN_MESSAGE_VERSION,
  encodeCctpMessage,
  decodeCctpMessage,
  encodeBurnMessage,
  decodeBurnMessage,
  cctpMessageNonce,
} from './cctp-message.js';

export type { AttestationProvider, AttestationResponse } from './attestation.js';
