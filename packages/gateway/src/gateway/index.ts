export type { CctpGatewayOptions, DepositParams } from './cctp-gateway.js';
export { CctpGateway } from './cctp-gateway.js';

export type { FinalizeWithdrawArgs } from './codec.js';
export {
  GATEWAY_ABI,
  encodeFinalizeWithdraw,
  decodeFinalizeWithdraw,
  encodeTransferData,
  decodeTransferData,
  encodeRouterData,
  decodeRouterData,
} from './codec.js';
