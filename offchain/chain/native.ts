import { Address, zeroAddress } from 'viem';
import { Contract } from './contract';
import type { Msg } from './context';

type NativeState = {
  balances: Map<Address, bigint>;
};

/** The chain's gas coin. Value moves by explicit transfer from the sender. */
export class NativeCoin extends Contract<NativeState> {
  readonly contractName = 'Native';

  constructor(address: Address) {
    super(address, { balances: new Map() });
  }

  balanceOf(account: Address): bigint {
    return this.state.balances.get(account) ?? 0n;
  }

  transfer(msg: Msg, to: Address, amount: bigint): void {
    if (to === zeroAddress) this.revert('InvalidReceiver');
    const balance = this.balanceOf(msg.sender);
    if (balance < amount) this.revert('InsufficientBalance', { account: msg.sender, balance, needed: amount });
    this.state.balances.set(msg.sender, balance - amount);
    this.state.balances.set(to, this.balanceOf(to) + amount);
    this.emit(msg, 'Transfer', { from: msg.sender, to, value: amount });
  }

  /** Test and bootstrap faucet. */
  mint(msg: Msg, to: Address, amount: bigint): void {
    this.state.balances.set(to, this.balanceOf(to) + amount);
    this.emit(msg, 'Transfer', { from: zeroAddress, to, value: amount });
  }
}
