import type { Address } from 'viem';
import type { Chain } from '../chain/chain';
import type { AccessControlManager } from '../market/access_control';
import type { ResilientOracle } from '../market/oracle';
import { Action } from '../market/types';
import { BaseTokenConfig, DeviationSentinelBase } from './base_sentinel';
import type { SentinelOracle } from './sentinel_oracle';

/** Compares the oracle against whatever source the sentinel oracle routes each asset to. */
export class DeviationSentinel extends DeviationSentinelBase<BaseTokenConfig> {
  readonly contractName = 'DeviationSentinel';

  constructor(
    address: Address,
    chain: Chain,
    acm: AccessControlManager,
    oracle: ResilientOracle,
    readonly sentinelOracle: SentinelOracle,
  ) {
    super(address, chain, acm, oracle, 'deviation-sentinel');
  }

  protected comparisonPrice(asset: Address): bigint {
    return this.sentinelOracle.getPrice(asset);
  }

  /** Supply is paused too while the asset trades below the oracle. */
  protected collateralZeroedActions(): readonly Action[] {
    return [Action.MINT];
  }
}
