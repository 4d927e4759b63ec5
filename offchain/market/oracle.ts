import type { Address } from 'viem';
import type { Chain, AnyContract } from '../chain/chain';
import type { Msg } from '../chain/context';
import { Contract } from '../chain/contract';
import type { AccessControlManager } from './access_control';
import { VToken } from './vtoken';

/**
 * Anything that quotes an asset in USD per smallest unit, scaled by 1e36.
 * A zero price means the source has no valid price.
 */
export abstract class PriceOracle<S extends object> extends Contract<S> {
  abstract getPrice(asset: Address): bigint;
}

export function isPriceOracle(contract: AnyContract): contract is PriceOracle<object> {
  return contract instanceof PriceOracle;
}

type ResilientOracleState = {
  prices: Map<Address, bigint>;
};

/** Reference price feed of the lending market. */
export class ResilientOracle extends PriceOracle<ResilientOracleState> {
  readonly contractName = 'ResilientOracle';

  constructor(
    address: Address,
    private readonly chain: Chain,
    private readonly acm: AccessControlManager,
  ) {
    super(address, { prices: new Map() });
  }

  setPrice(msg: Msg, asset: Address, price: bigint): void {
    if (!this.acm.isAllowedToCall(msg.sender, this.address, 'setPrice')) {
      this.revert('Unauthorized', { sender: msg.sender });
    }
    const previous = this.getPrice(asset);
    this.state.prices.set(asset, price);
    this.emit(msg, 'PricePosted', { asset, previous, price });
  }

  getPrice(asset: Address): bigint {
    return this.state.prices.get(asset) ?? 0n;
  }

  getUnderlyingPrice(market: Address): bigint {
    const vToken = this.chain.contractAt(market, VToken);
    if (!vToken) return 0n;
    return this.getPrice(vToken.underlying.address);
  }
}
