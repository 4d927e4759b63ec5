import { Address, Hex, decodeFunctionData } from 'viem';
import type { Chain } from '../chain/chain';
import { CalldataContract } from '../chain/calldata';
import { Msg, callFrom } from '../chain/context';
import { Erc20 } from '../chain/erc20';
import { mulExp } from '../util/math';
import { fixedRateExchangeAbi } from './abi';

type ExchangeState = {
  owner: Address;
  rates: Map<string, bigint>;
};

const pairKey = (tokenIn: Address, tokenOut: Address) => `${tokenIn}:${tokenOut}`;

/**
 * Swap venue quoting a fixed rate per pair: raw output units per raw input
 * unit, 1e18-scaled. Pays out of its own inventory.
 */
export class FixedRateExchange extends CalldataContract<ExchangeState> {
  readonly contractName = 'FixedRateExchange';

  constructor(
    address: Address,
    private readonly chain: Chain,
    owner: Address,
  ) {
    super(address, { owner, rates: new Map() });
  }

  rate(tokenIn: Address, tokenOut: Address): bigint {
    return this.state.rates.get(pairKey(tokenIn, tokenOut)) ?? 0n;
  }

  quote(tokenIn: Address, tokenOut: Address, amountIn: bigint): bigint {
    return mulExp(amountIn, this.rate(tokenIn, tokenOut));
  }

  setRate(msg: Msg, tokenIn: Address, tokenOut: Address, rateMantissa: bigint): void {
    if (msg.sender !== this.state.owner) this.revert('Unauthorized', { sender: msg.sender });
    this.state.rates.set(pairKey(tokenIn, tokenOut), rateMantissa);
    this.emit(msg, 'RateUpdated', { tokenIn, tokenOut, rateMantissa });
  }

  async call(msg: Msg, data: Hex): Promise<void> {
    const { args } = decodeFunctionData({ abi: fixedRateExchangeAbi, data });
    this.swap(msg, ...args);
  }

  swap(msg: Msg, tokenIn: Address, tokenOut: Address, amountIn: bigint, minAmountOut: bigint, recipient: Address): bigint {
    const rate = this.rate(tokenIn, tokenOut);
    if (rate === 0n) this.revert('PairNotSupported', { tokenIn, tokenOut });
    const amountOut = mulExp(amountIn, rate);
    if (amountOut < minAmountOut) this.revert('InsufficientOutput', { amountOut, minAmountOut });

    const self = callFrom(msg, this.address);
    this.token(tokenIn).transferFrom(self, msg.sender, this.address, amountIn);
    this.token(tokenOut).transfer(self, recipient, amountOut);
    this.emit(msg, 'Swap', { sender: msg.sender, tokenIn, tokenOut, amountIn, amountOut, recipient });
    return amountOut;
  }

  private token(address: Address): Erc20 {
    const token = this.chain.contractAt(address, Erc20);
    if (!token) this.revert('InvalidToken', { token: address });
    return token;
  }
}
