import { Address, zeroAddress } from 'viem';
import type { Chain } from '../chain/chain';
import type { Msg } from '../chain/context';
import type { AccessControlManager } from '../market/access_control';
import { PriceOracle, ResilientOracle } from '../market/oracle';
import { ConcentratedLiquidityKind, DexKind, quoteDexPrice } from './dex_pools';
import { SentinelError } from './errors';

type DexOracleState = {
  pools: Map<Address, Address>;
};

/**
 * Quotes tokens off concentrated-liquidity pools of one DEX, pricing the
 * counter token through the resilient oracle.
 */
export class DexPoolOracle extends PriceOracle<DexOracleState> {
  readonly contractName: string;

  constructor(
    address: Address,
    private readonly chain: Chain,
    private readonly acm: AccessControlManager,
    private readonly referenceOracle: ResilientOracle,
    readonly dex: ConcentratedLiquidityKind,
  ) {
    super(address, { pools: new Map() });
    this.contractName = dex === DexKind.UNISWAP_V3 ? 'UniswapOracle' : 'PancakeSwapOracle';
  }

  poolFor(token: Address): Address | undefined {
    return this.state.pools.get(token);
  }

  setPoolConfig(msg: Msg, token: Address, pool: Address): void {
    if (!this.acm.isAllowedToCall(msg.sender, this.address, 'setPoolConfig')) {
      this.revert(SentinelError.Unauthorized, { sender: msg.sender });
    }
    if (token === zeroAddress || pool === zeroAddress) this.revert(SentinelError.ZeroAddress);
    this.state.pools.set(token, pool);
    this.emit(msg, 'PoolConfigUpdated', { token, pool });
  }

  getPrice(token: Address): bigint {
    const pool = this.state.pools.get(token);
    if (!pool) this.revert(SentinelError.TokenNotConfigured, { token });
    const quote = quoteDexPrice(this.chain, this.dex, pool, token, (reference) => this.referenceOracle.getPrice(reference));
    if (!quote.ok) this.revert(quote.reason, quote.detail);
    return quote.price;
  }
}
