/**
 * ERC20 collaborator interface.
 */

import type { Address } from '../boundaries/index.js';
import type { CallContext } from '../types.js';

export interface Erc20Token {
  readonly address: Address;
  balanceOf(account: Address): Promise<bigint>;
  allowance(owner: Address, spender: Address): Promise<bigint>;
  approve(ctx: CallContext, spender: Address, amount: bigint): Promise<void>;
  transfer(ctx: CallContext, to: Address, amount: bigint): Promise<void>;
  transferFrom(ctx: CallContext, from: Address, to: Address, amount: bigint): Promise<void>;
}
