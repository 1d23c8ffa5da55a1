/**
 * Local ERC20 token with minter roles (USDC-style).
 */

import type { Address } from '../boundaries/index.js';
import type { Erc20Token } from '../adapters/index.js';
import type { CallContext, Checkpointable } from '../types.js';
import { Revert } from './local-chain.js';

interface TokenState {
  balances: Map<Address, bigint>;
  allowances: Map<string, bigint>;
  totalSupply: bigint;
}

export class LocalToken implements Erc20Token, Checkpointable {
  private state: TokenState = { balances: new Map(), allowances: new Map(), totalSupply: 0n };
  private minters: Set<Address> = new Set();

  constructor(
    readonly address: Address,
    readonly symbol: string,
    readonly decimals: number = 6
  ) {}

  configureMinter(minter: Address): void {
    this.minters.add(minter);
  }

  isMinter(account: Address): boolean {
    return this.minters.has(account);
  }

  get totalSupply(): bigint {
    return this.state.totalSupply;
  }

  async balanceOf(account: Address): Promise<bigint> {
    return this.state.balances.get(account) ?? 0n;
  }

  async allowance(owner: Address, spender: Address): Promise<bigint> {
    return this.state.allowances.get(allowanceKey(owner, spender)) ?? 0n;
  }

  async approve(ctx: CallContext, spender: Address, amount: bigint): Promise<void> {
    this.state.allowances.set(allowanceKey(ctx.sender, spender), amount);
  }

  async transfer(ctx: CallContext, to: Address, amount: bigint): Promise<void> {
    this.move(ctx.sender, to, amount);
  }

  async transferFrom(ctx: CallContext, from: Address, to: Address, amount: bigint): Promise<void> {
    const key = allowanceKey(from, ctx.sender);
    const allowed = this.state.allowances.get(key) ?? 0n;
    if (allowed < amount) {
      throw new Revert('ERC20: transfer amount exceeds allowance');
    }
    this.move(from, to, amount);
    this.state.allowances.set(key, allowed - amount);
  }

  async mint(ctx: CallContext, to: Address, amount: bigint): Promise<void> {
    this.assertMinter(ctx);
    if (amount <= 0n) {
      throw new Revert('FiatToken: mint amount not greater than 0');
    }
    this.state.balances.set(to, (this.state.balances.get(to) ?? 0n) + amount);
    this.state.totalSupply += amount;
  }

  /**
   * Burn from the caller's own balance.
   */
  async burn(ctx: CallContext, amount: bigint): Promise<void> {
    this.assertMinter(ctx);
    const balance = this.state.balances.get(ctx.sender) ?? 0n;
    if (amount <= 0n) {
      throw new Revert('FiatToken: burn amount not greater than 0');
    }
    if (balance < amount) {
      throw new Revert('FiatToken: burn amount exceeds balance');
    }
    this.state.balances.set(ctx.sender, balance - amount);
    this.state.totalSupply -= amount;
  }

  checkpoint(): () => void {
    const saved: TokenState = {
      balances: new Map(this.state.balances),
      allowances: new Map(this.state.allowances),
      totalSupply: this.state.totalSupply,
    };
    return () => {
      this.state = saved;
    };
  }

  private move(from: Address, to: Address, amount: bigint): void {
    const balance = this.state.balances.get(from) ?? 0n;
    if (balance < amount) {
      throw new Revert('ERC20: transfer amount exceeds balance');
    }
    this.state.balances.set(from, balance - amount);
    this.state.balances.set(to, (this.state.balances.get(to) ?? 0n) + amount);
  }

  private assertMinter(ctx: CallContext): void {
    if (!this.minters.has(ctx.sender)) {
      throw new Revert('FiatToken: caller is not a minter');
    }
  }
}

function allowanceKey(owner: Address, spender: Address): string {
  return `${owner}:${spender}`;
}
