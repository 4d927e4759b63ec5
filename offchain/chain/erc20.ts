import { Address, maxUint256, zeroAddress } from 'viem';
import { Contract } from './contract';
import type { Msg } from './context';

type Erc20State = {
  totalSupply: bigint;
  balances: Map<Address, bigint>;
  allowances: Map<string, bigint>;
};

function allowanceKey(owner: Address, spender: Address): string {
  return `${owner}:${spender}`;
}

export class Erc20 extends Contract<Erc20State> {
  readonly contractName = 'ERC20';

  constructor(
    address: Address,
    readonly symbol: string,
    readonly decimals: number,
  ) {
    super(address, { totalSupply: 0n, balances: new Map(), allowances: new Map() });
  }

  totalSupply(): bigint {
    return this.state.totalSupply;
  }

  balanceOf(account: Address): bigint {
    return this.state.balances.get(account) ?? 0n;
  }

  allowance(owner: Address, spender: Address): bigint {
    return this.state.allowances.get(allowanceKey(owner, spender)) ?? 0n;
  }

  approve(msg: Msg, spender: Address, amount: bigint): boolean {
    if (spender === zeroAddress) this.revert('InvalidSpender');
    this.state.allowances.set(allowanceKey(msg.sender, spender), amount);
    this.emit(msg, 'Approval', { owner: msg.sender, spender, value: amount });
    return true;
  }

  transfer(msg: Msg, to: Address, amount: bigint): boolean {
    this.move(msg, msg.sender, to, amount);
    return true;
  }

  transferFrom(msg: Msg, from: Address, to: Address, amount: bigint): boolean {
    const current = this.allowance(from, msg.sender);
    if (current < amount) {
      this.revert('InsufficientAllowance', { owner: from, spender: msg.sender, allowance: current, needed: amount });
    }
    if (current !== maxUint256) {
      this.state.allowances.set(allowanceKey(from, msg.sender), current - amount);
    }
    this.move(msg, from, to, amount);
    return true;
  }

  /** Test and bootstrap faucet. */
  mint(msg: Msg, to: Address, amount: bigint): void {
    this.credit(msg, to, amount);
  }

  protected credit(msg: Msg, to: Address, amount: bigint): void {
    if (to === zeroAddress) this.revert('InvalidReceiver');
    this.state.totalSupply += amount;
    this.state.balances.set(to, this.balanceOf(to) + amount);
    this.emit(msg, 'Transfer', { from: zeroAddress, to, value: amount });
  }

  protected burn(msg: Msg, from: Address, amount: bigint): void {
    const balance = this.balanceOf(from);
    if (balance < amount) this.revert('InsufficientBalance', { account: from, balance, needed: amount });
    this.state.totalSupply -= amount;
    this.state.balances.set(from, balance - amount);
    this.emit(msg, 'Transfer', { from, to: zeroAddress, value: amount });
  }

  private move(msg: Msg, from: Address, to: Address, amount: bigint): void {
    if (to === zeroAddress) this.revert('InvalidReceiver');
    const balance = this.balanceOf(from);
    if (balance < amount) {
      this.revert('InsufficientBalance', { account: from, balance, needed: amount });
    }
    this.state.balances.set(from, balance - amount);
    this.state.balances.set(to, this.balanceOf(to) + amount);
    this.emit(msg, 'Transfer', { from, to, value: amount });
  }
}
