import { Address, zeroAddress } from 'viem';
import type { Chain } from '../chain/chain';
import type { EventValue } from '../chain/events';
import type { AccessControlManager } from '../market/access_control';
import type { ResilientOracle } from '../market/oracle';
import { BaseTokenConfig, DeviationSentinelBase } from './base_sentinel';
import { quoteDexPrice } from './dex_pools';
import { SentinelError } from './errors';

export type PoolTokenConfig = BaseTokenConfig & {
  /** A `DexKind` id. */
  dex: number;
  pool: Address;
};

/** Compares the oracle against a DEX pool configured per asset. */
export class PriceDeviationSentinel extends DeviationSentinelBase<PoolTokenConfig> {
  readonly contractName = 'PriceDeviationSentinel';

  constructor(address: Address, chain: Chain, acm: AccessControlManager, oracle: ResilientOracle) {
    super(address, chain, acm, oracle, 'price-deviation-sentinel');
  }

  protected validateConfig(config: PoolTokenConfig): void {
    if (config.pool === zeroAddress) this.revert(SentinelError.ZeroAddress);
  }

  protected configEventArgs(config: PoolTokenConfig): Record<string, EventValue> {
    return { ...super.configEventArgs(config), dex: config.dex, pool: config.pool };
  }

  protected comparisonPrice(asset: Address, config: PoolTokenConfig): bigint {
    const quote = quoteDexPrice(this.chain, config.dex, config.pool, asset, (token) => this.oracle.getPrice(token));
    if (!quote.ok) this.revert(quote.reason, quote.detail);
    return quote.price;
  }
}
