import { Address, zeroAddress } from 'viem';
import type { Chain } from '../chain/chain';
import type { Msg } from '../chain/context';
import type { AccessControlManager } from '../market/access_control';
import { PriceOracle, isPriceOracle } from '../market/oracle';
import { SentinelError } from './errors';

type SentinelOracleState = {
  oracles: Map<Address, Address>;
  directPrices: Map<Address, bigint>;
};

/** Routes each token to the oracle the deviation sentinel compares against. A direct price wins. */
export class SentinelOracle extends PriceOracle<SentinelOracleState> {
  readonly contractName = 'SentinelOracle';

  constructor(
    address: Address,
    private readonly chain: Chain,
    private readonly acm: AccessControlManager,
  ) {
    super(address, { oracles: new Map(), directPrices: new Map() });
  }

  oracleFor(token: Address): Address | undefined {
    return this.state.oracles.get(token);
  }

  setTokenOracleConfig(msg: Msg, token: Address, oracle: Address): void {
    this.onlyAllowed(msg, 'setTokenOracleConfig');
    if (token === zeroAddress || oracle === zeroAddress) this.revert(SentinelError.ZeroAddress);
    this.state.oracles.set(token, oracle);
    this.emit(msg, 'TokenOracleConfigUpdated', { token, oracle });
  }

  /** Zero clears the override. */
  setDirectPrice(msg: Msg, token: Address, price: bigint): void {
    this.onlyAllowed(msg, 'setDirectPrice');
    if (token === zeroAddress) this.revert(SentinelError.ZeroAddress);
    if (price === 0n) this.state.directPrices.delete(token);
    else this.state.directPrices.set(token, price);
    this.emit(msg, 'DirectPriceUpdated', { token, price });
  }

  getPrice(token: Address): bigint {
    const direct = this.state.directPrices.get(token);
    if (direct !== undefined) return direct;
    const oracleAddress = this.state.oracles.get(token);
    if (!oracleAddress) this.revert(SentinelError.TokenNotConfigured, { token });
    const oracle = this.chain.lookup(oracleAddress);
    if (!oracle || !isPriceOracle(oracle) || oracle === this) {
      this.revert(SentinelError.InvalidOracle, { oracle: oracleAddress });
    }
    return oracle.getPrice(token);
  }

  private onlyAllowed(msg: Msg, fn: string): void {
    if (!this.acm.isAllowedToCall(msg.sender, this.address, fn)) {
      this.revert(SentinelError.Unauthorized, { sender: msg.sender });
    }
  }
}
