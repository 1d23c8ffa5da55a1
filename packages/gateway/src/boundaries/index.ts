/**
 * Gateway Boundaries
 *
 * Branded types, runtime assertions and the error taxonomy.
 */

export type { Address, HexData } from './invariants.js';
export {
  address,
  hexData,
  transferNonce,
  toBytes32,
  fromBytes32,
  isZeroAddress,
  ZERO_ADDRESS,
  ZERO_BYTES32,
  EMPTY_BYTES,
  MAX_UINT64,
  ReentrancyGuard,
} from './invariants.js';

export type { GatewayErrorCategory } from './errors.js';
export {
  GatewayError,
  ValidationError,
  AuthorizationError,
  StatePreconditionError,
  CollaboratorError,
  callCollaborator,
  describeError,
} from './errors.js';
