import type { Address } from 'viem';
import { Msg, callFrom } from './context';
import { Erc20 } from './erc20';
import type { NativeCoin } from './native';

/** ERC-20 backed one to one by native coin it holds. */
export class WrappedNative extends Erc20 {
  constructor(
    address: Address,
    private readonly native: NativeCoin,
    symbol = 'WBNB',
    decimals = 18,
  ) {
    super(address, symbol, decimals);
  }

  /** Takes `amount` native from the sender and credits the same in wrapped tokens. */
  deposit(msg: Msg, amount: bigint): void {
    this.native.transfer(msg, this.address, amount);
    this.credit(msg, msg.sender, amount);
    this.emit(msg, 'Deposit', { dst: msg.sender, wad: amount });
  }

  withdraw(msg: Msg, amount: bigint): void {
    this.burn(msg, msg.sender, amount);
    this.native.transfer(callFrom(msg, this.address), msg.sender, amount);
    this.emit(msg, 'Withdrawal', { src: msg.sender, wad: amount });
  }
}
