import { Address, Hex, maxUint256 } from 'viem';
import type { Logger } from 'pino';
import type { Chain } from '../chain/chain';
import { Contract } from '../chain/contract';
import { Msg, callFrom } from '../chain/context';
import { counter } from '../infra/metrics';
import { log } from '../infra/logger';
import { EXP_SCALE, mulExp } from '../util/math';
import type { AccessControlManager } from './access_control';
import type { ResilientOracle } from './oracle';
import {
  AccountLiquidity,
  Action,
  CORE_POOL_ID,
  FlashLoanReceiver,
  MarketError,
  MarketErrorCode,
  PoolMarket,
  PoolModel,
  UNLISTED,
} from './types';
import { VToken } from './vtoken';

type Pool = {
  label: string;
  markets: Address[];
};

type ComptrollerState = {
  allMarkets: Address[];
  poolMarkets: Map<string, PoolMarket>;
  pools: Map<number, Pool>;
  lastPoolId: number;
  userPoolId: Map<Address, number>;
  accountAssets: Map<Address, Address[]>;
  actionPaused: Set<string>;
  borrowCaps: Map<Address, bigint>;
  supplyCaps: Map<Address, bigint>;
  delegates: Set<string>;
  flashLoanWhitelist: Set<Address>;
  whitelistedExecutors: Set<Address>;
};

type LiquidityAdjustment = {
  market: Address;
  redeemTokens: bigint;
  borrowAmount: bigint;
};

const poolKey = (poolId: number, market: Address) => `${poolId}:${market}`;
const actionKey = (market: Address, action: Action) => `${market}:${action}`;
const delegateKey = (account: Address, delegate: Address) => `${account}:${delegate}`;

/**
 * Risk manager of a lending market. In the `core` model it also keeps
 * numbered pools (pool 0 is the core pool) with per-pool collateral factors;
 * an `isolated` comptroller has only pool 0.
 */
export class Comptroller extends Contract<ComptrollerState> {
  readonly contractName = 'Comptroller';
  private readonly logger: Logger;

  constructor(
    address: Address,
    private readonly chain: Chain,
    readonly accessControl: AccessControlManager,
    readonly oracle: ResilientOracle,
    readonly poolModel: PoolModel,
  ) {
    super(address, {
      allMarkets: [],
      poolMarkets: new Map(),
      pools: new Map([[CORE_POOL_ID, { label: 'core', markets: [] }]]),
      lastPoolId: CORE_POOL_ID,
      userPoolId: new Map(),
      accountAssets: new Map(),
      actionPaused: new Set(),
      borrowCaps: new Map(),
      supplyCaps: new Map(),
      delegates: new Set(),
      flashLoanWhitelist: new Set(),
      whitelistedExecutors: new Set(),
    });
    this.logger = log.child({ module: 'comptroller', address, poolModel });
  }

  // ---- views ----

  markets(market: Address): PoolMarket {
    return this.poolMarkets(CORE_POOL_ID, market);
  }

  poolMarkets(poolId: number, market: Address): PoolMarket {
    return this.state.poolMarkets.get(poolKey(poolId, market)) ?? UNLISTED;
  }

  lastPoolId(): number {
    return this.state.lastPoolId;
  }

  getAllMarkets(): Address[] {
    return [...this.state.allMarkets];
  }

  getPoolMarkets(poolId: number): Address[] {
    return [...(this.state.pools.get(poolId)?.markets ?? [])];
  }

  userPoolId(account: Address): number {
    return this.state.userPoolId.get(account) ?? CORE_POOL_ID;
  }

  getAssetsIn(account: Address): Address[] {
    return [...(this.state.accountAssets.get(account) ?? [])];
  }

  checkMembership(account: Address, market: Address): boolean {
    return this.getAssetsIn(account).includes(market);
  }

  actionPaused(market: Address, action: Action): boolean {
    return this.state.actionPaused.has(actionKey(market, action));
  }

  borrowCaps(market: Address): bigint {
    return this.state.borrowCaps.get(market) ?? 0n;
  }

  supplyCaps(market: Address): bigint {
    return this.state.supplyCaps.get(market) ?? 0n;
  }

  approvedDelegates(account: Address, delegate: Address): boolean {
    return this.state.delegates.has(delegateKey(account, delegate));
  }

  isWhitelistedExecutor(account: Address): boolean {
    return this.state.whitelistedExecutors.has(account);
  }

  isFlashLoanWhitelisted(account: Address): boolean {
    return this.state.flashLoanWhitelist.has(account);
  }

  /** Liquidity from stored balances and stored borrow indices; accrue first for a current figure. */
  getAccountLiquidity(account: Address): AccountLiquidity {
    return this.hypotheticalLiquidity(account);
  }

  getHypotheticalAccountLiquidity(
    account: Address,
    market: Address,
    redeemTokens: bigint,
    borrowAmount: bigint,
  ): AccountLiquidity {
    return this.hypotheticalLiquidity(account, { market, redeemTokens, borrowAmount });
  }

  // ---- governance ----

  supportMarket(msg: Msg, vToken: VToken): void {
    this.onlyAllowed(msg, 'supportMarket');
    if (vToken.comptroller !== this) this.revert('ComptrollerMismatch', { market: vToken.address });
    if (this.markets(vToken.address).isListed) this.revert('MarketAlreadyListed', { market: vToken.address });
    this.state.poolMarkets.set(poolKey(CORE_POOL_ID, vToken.address), {
      isListed: true,
      isBorrowAllowed: true,
      collateralFactorMantissa: 0n,
      liquidationThresholdMantissa: 0n,
    });
    this.state.allMarkets.push(vToken.address);
    this.state.pools.get(CORE_POOL_ID)?.markets.push(vToken.address);
    this.state.borrowCaps.set(vToken.address, maxUint256);
    this.state.supplyCaps.set(vToken.address, maxUint256);
    this.emit(msg, 'MarketSupported', { market: vToken.address });
  }

  createPool(msg: Msg, label: string): number {
    this.onlyAllowed(msg, 'createPool');
    if (this.poolModel !== 'core') this.revert('PoolsNotSupported');
    const poolId = this.state.lastPoolId + 1;
    this.state.lastPoolId = poolId;
    this.state.pools.set(poolId, { label, markets: [] });
    this.emit(msg, 'PoolCreated', { poolId, label });
    return poolId;
  }

  addPoolMarket(msg: Msg, poolId: number, market: Address): void {
    this.onlyAllowed(msg, 'addPoolMarket');
    const pool = this.state.pools.get(poolId);
    if (poolId === CORE_POOL_ID || !pool) this.revert('InvalidPool', { poolId });
    if (!this.markets(market).isListed) this.revert('MarketNotListed', { market });
    if (this.poolMarkets(poolId, market).isListed) this.revert('MarketAlreadyListed', { market, poolId });
    this.state.poolMarkets.set(poolKey(poolId, market), {
      isListed: true,
      isBorrowAllowed: false,
      collateralFactorMantissa: 0n,
      liquidationThresholdMantissa: 0n,
    });
    pool.markets.push(market);
    this.emit(msg, 'PoolMarketAdded', { poolId, market });
  }

  setCollateralFactor(msg: Msg, poolId: number, market: Address, cfMantissa: bigint, ltMantissa: bigint): void {
    this.onlyAllowed(msg, 'setCollateralFactor');
    const key = poolKey(poolId, market);
    const current = this.state.poolMarkets.get(key);
    if (!current?.isListed) this.revert('MarketNotListed', { market, poolId });
    if (cfMantissa > ltMantissa || ltMantissa > EXP_SCALE) {
      this.revert('InvalidCollateralFactor', { cfMantissa, ltMantissa });
    }
    this.state.poolMarkets.set(key, {
      ...current,
      collateralFactorMantissa: cfMantissa,
      liquidationThresholdMantissa: ltMantissa,
    });
    this.emit(msg, 'NewCollateralFactor', {
      poolId,
      market,
      oldCollateralFactorMantissa: current.collateralFactorMantissa,
      newCollateralFactorMantissa: cfMantissa,
      newLiquidationThresholdMantissa: ltMantissa,
    });
  }

  setIsBorrowAllowed(msg: Msg, poolId: number, market: Address, allowed: boolean): void {
    this.onlyAllowed(msg, 'setIsBorrowAllowed');
    const key = poolKey(poolId, market);
    const current = this.state.poolMarkets.get(key);
    if (!current?.isListed) this.revert('MarketNotListed', { market, poolId });
    this.state.poolMarkets.set(key, { ...current, isBorrowAllowed: allowed });
    this.emit(msg, 'BorrowAllowedUpdated', { poolId, market, allowed });
  }

  setActionsPaused(msg: Msg, markets: readonly Address[], actions: readonly Action[], paused: boolean): void {
    this.onlyAllowed(msg, 'setActionsPaused');
    for (const market of markets) {
      for (const action of actions) {
        if (paused) this.state.actionPaused.add(actionKey(market, action));
        else this.state.actionPaused.delete(actionKey(market, action));
        this.emit(msg, 'ActionPausedMarket', { market, action, paused });
      }
    }
  }

  setMarketBorrowCaps(msg: Msg, markets: readonly Address[], caps: readonly bigint[]): void {
    this.onlyAllowed(msg, 'setMarketBorrowCaps');
    if (markets.length !== caps.length) this.revert('InvalidInput');
    markets.forEach((market, i) => {
      this.state.borrowCaps.set(market, caps[i]);
      this.emit(msg, 'NewBorrowCap', { market, cap: caps[i] });
    });
  }

  setMarketSupplyCaps(msg: Msg, markets: readonly Address[], caps: readonly bigint[]): void {
    this.onlyAllowed(msg, 'setMarketSupplyCaps');
    if (markets.length !== caps.length) this.revert('InvalidInput');
    markets.forEach((market, i) => {
      this.state.supplyCaps.set(market, caps[i]);
      this.emit(msg, 'NewSupplyCap', { market, cap: caps[i] });
    });
  }

  setWhiteListFlashLoanAccount(msg: Msg, account: Address, allowed: boolean): void {
    this.onlyAllowed(msg, 'setWhiteListFlashLoanAccount');
    if (allowed) this.state.flashLoanWhitelist.add(account);
    else this.state.flashLoanWhitelist.delete(account);
    this.emit(msg, 'IsAccountFlashLoanWhitelisted', { account, allowed });
  }

  /** Lets `account` call `seize` on listed markets, as a market would. */
  setWhitelistedExecutor(msg: Msg, account: Address, allowed: boolean): void {
    this.onlyAllowed(msg, 'setWhitelistedExecutor');
    if (allowed) this.state.whitelistedExecutors.add(account);
    else this.state.whitelistedExecutors.delete(account);
    this.emit(msg, 'WhitelistedExecutorUpdated', { account, allowed });
  }

  /** Requires collateral factor zero and mint, borrow and enter paused. */
  unlistMarket(msg: Msg, market: Address): void {
    this.onlyAllowed(msg, 'unlistMarket');
    if (!this.markets(market).isListed) this.revert('MarketNotListed', { market });
    const blocked = [Action.MINT, Action.BORROW, Action.ENTER_MARKET].every((a) => this.actionPaused(market, a));
    if (!blocked || this.markets(market).collateralFactorMantissa !== 0n) {
      this.revert('MarketNotPaused', { market });
    }
    for (const [poolId, pool] of this.state.pools) {
      this.state.poolMarkets.delete(poolKey(poolId, market));
      pool.markets = pool.markets.filter((m) => m !== market);
    }
    this.state.allMarkets = this.state.allMarkets.filter((m) => m !== market);
    this.emit(msg, 'MarketUnlisted', { market });
  }

  // ---- account operations ----

  updateDelegate(msg: Msg, delegate: Address, approved: boolean): void {
    if (approved) this.state.delegates.add(delegateKey(msg.sender, delegate));
    else this.state.delegates.delete(delegateKey(msg.sender, delegate));
    this.emit(msg, 'DelegateUpdated', { approver: msg.sender, delegate, approved });
  }

  enterPool(msg: Msg, poolId: number): void {
    if (poolId !== CORE_POOL_ID && !this.state.pools.has(poolId)) this.revert('InvalidPool', { poolId });
    this.state.userPoolId.set(msg.sender, poolId);
    const liquidity = this.getAccountLiquidity(msg.sender);
    if (liquidity.errorCode !== MarketError.NO_ERROR || liquidity.shortfall > 0n) {
      this.revert('LiquidityCheckFailed', { errorCode: liquidity.errorCode, shortfall: liquidity.shortfall });
    }
    this.emit(msg, 'PoolSelected', { account: msg.sender, poolId });
  }

  enterMarkets(msg: Msg, markets: readonly Address[]): MarketErrorCode[] {
    return markets.map((market) => this.addToMarket(msg, market, msg.sender));
  }

  enterMarketBehalf(msg: Msg, account: Address, market: Address): MarketErrorCode {
    if (!this.approvedDelegates(account, msg.sender)) {
      this.revert('NotAnApprovedDelegate', { account, delegate: msg.sender });
    }
    return this.addToMarket(msg, market, account);
  }

  exitMarket(msg: Msg, market: Address): MarketErrorCode {
    const vToken = this.vToken(market);
    if (!vToken) return MarketError.MARKET_NOT_LISTED;
    if (this.actionPaused(market, Action.EXIT_MARKET)) return MarketError.ACTION_PAUSED;
    if (vToken.borrowBalanceStored(msg.sender) !== 0n) return MarketError.NONZERO_BORROW_BALANCE;
    const allowed = this.redeemAllowed(market, msg.sender, vToken.balanceOf(msg.sender));
    if (allowed !== MarketError.NO_ERROR) return allowed;
    if (!this.checkMembership(msg.sender, market)) return MarketError.NO_ERROR;
    this.state.accountAssets.set(
      msg.sender,
      this.getAssetsIn(msg.sender).filter((m) => m !== market),
    );
    this.emit(msg, 'MarketExited', { market, account: msg.sender });
    return MarketError.NO_ERROR;
  }

  // ---- hooks called by markets ----

  mintAllowed(market: Address, _minter: Address, amount: bigint): MarketErrorCode {
    const vToken = this.vToken(market);
    if (!vToken || !this.markets(market).isListed) return MarketError.MARKET_NOT_LISTED;
    if (this.actionPaused(market, Action.MINT)) return MarketError.ACTION_PAUSED;
    const cap = this.supplyCaps(market);
    if (cap !== maxUint256) {
      const supplied = mulExp(vToken.totalSupply(), vToken.exchangeRateStored());
      if (supplied + amount > cap) return MarketError.SUPPLY_CAP_REACHED;
    }
    return MarketError.NO_ERROR;
  }

  redeemAllowed(market: Address, redeemer: Address, redeemTokens: bigint): MarketErrorCode {
    if (!this.markets(market).isListed) return MarketError.MARKET_NOT_LISTED;
    if (this.actionPaused(market, Action.REDEEM)) return MarketError.ACTION_PAUSED;
    if (!this.checkMembership(redeemer, market)) return MarketError.NO_ERROR;
    const liquidity = this.getHypotheticalAccountLiquidity(redeemer, market, redeemTokens, 0n);
    if (liquidity.errorCode !== MarketError.NO_ERROR) return liquidity.errorCode;
    if (liquidity.shortfall > 0n) return MarketError.INSUFFICIENT_LIQUIDITY;
    return MarketError.NO_ERROR;
  }

  /** Called by the market itself; enters `borrower` into it when needed. */
  borrowAllowed(msg: Msg, market: Address, borrower: Address, amount: bigint): MarketErrorCode {
    const vToken = this.vToken(market);
    if (!vToken || !this.markets(market).isListed) return MarketError.MARKET_NOT_LISTED;
    if (this.actionPaused(market, Action.BORROW)) return MarketError.ACTION_PAUSED;
    const poolId = this.userPoolId(borrower);
    const poolEntry = this.poolMarkets(poolId, market);
    const borrowAllowed = poolEntry.isListed ? poolEntry.isBorrowAllowed : this.markets(market).isBorrowAllowed;
    if (!borrowAllowed) return MarketError.BORROW_NOT_ALLOWED;

    if (!this.checkMembership(borrower, market)) {
      if (msg.sender !== market) return MarketError.UNAUTHORIZED;
      const code = this.addToMarket(msg, market, borrower);
      if (code !== MarketError.NO_ERROR) return code;
    }
    if (this.oracle.getUnderlyingPrice(market) === 0n) return MarketError.PRICE_ERROR;

    const cap = this.borrowCaps(market);
    if (cap !== maxUint256 && vToken.totalBorrows() + amount > cap) return MarketError.BORROW_CAP_REACHED;

    const liquidity = this.getHypotheticalAccountLiquidity(borrower, market, 0n, amount);
    if (liquidity.errorCode !== MarketError.NO_ERROR) return liquidity.errorCode;
    if (liquidity.shortfall > 0n) return MarketError.INSUFFICIENT_LIQUIDITY;
    return MarketError.NO_ERROR;
  }

  repayAllowed(market: Address): MarketErrorCode {
    if (!this.markets(market).isListed) return MarketError.MARKET_NOT_LISTED;
    if (this.actionPaused(market, Action.REPAY)) return MarketError.ACTION_PAUSED;
    return MarketError.NO_ERROR;
  }

  /** `seizer` is the market or whitelisted executor calling `seize` on `collateralMarket`, which must be listed. */
  seizeAllowed(collateralMarket: Address, seizer: Address, liquidator: Address, borrower: Address): MarketErrorCode {
    if (this.actionPaused(collateralMarket, Action.SEIZE)) return MarketError.ACTION_PAUSED;
    if (!this.markets(collateralMarket).isListed) return MarketError.MARKET_NOT_LISTED;
    if (!this.markets(seizer).isListed && !this.isWhitelistedExecutor(seizer)) {
      return MarketError.MARKET_NOT_LISTED;
    }
    if (liquidator === borrower) return MarketError.LIQUIDATOR_IS_BORROWER;
    return MarketError.NO_ERROR;
  }

  // ---- flash loans ----

  /**
   * Lends `amounts` from `markets` to `receiver`, invokes its callback with the
   * caller as initiator, then settles each leg. Unpaid principal becomes
   * `onBehalf`'s debt.
   */
  async executeFlashLoan(
    msg: Msg,
    onBehalf: Address,
    receiver: FlashLoanReceiver,
    markets: readonly Address[],
    amounts: readonly bigint[],
    data: Hex,
  ): Promise<void> {
    if (markets.length === 0 || markets.length !== amounts.length) this.revert('InvalidFlashLoanParams');
    if (!this.isFlashLoanWhitelisted(msg.sender)) this.revert('SenderNotAuthorizedForFlashLoan', { sender: msg.sender });

    const self = callFrom(msg, this.address);
    const legs = markets.map((market, i) => {
      const vToken = this.vToken(market);
      if (!vToken || !this.markets(market).isListed) this.revert('MarketNotListed', { market });
      if (amounts[i] === 0n) this.revert('InvalidAmount', { market });
      return { vToken, amount: amounts[i], premium: vToken.flashLoanPremium(amounts[i]) };
    });

    for (const leg of legs) {
      leg.vToken.transferOutForFlashLoan(self, receiver.address, leg.amount);
    }

    const result = await receiver.executeOperation(self, {
      assets: legs.map((leg) => leg.vToken.address),
      amounts: legs.map((leg) => leg.amount),
      premiums: legs.map((leg) => leg.premium),
      initiator: msg.sender,
      onBehalf,
      data,
    });
    if (!result.success) this.revert('ExecuteFlashLoanFailed');
    if (result.repayAmounts.length !== legs.length) this.revert('InvalidRepayAmounts');

    legs.forEach((leg, i) => {
      leg.vToken.settleFlashLoan(self, receiver.address, onBehalf, leg.amount, leg.premium, result.repayAmounts[i]);
      counter.flashLoans.inc({ market: leg.vToken.symbol });
    });
    this.emit(msg, 'FlashLoanExecuted', {
      receiver: receiver.address,
      onBehalf,
      markets: legs.map((leg) => leg.vToken.address),
      amounts: legs.map((leg) => leg.amount),
    });
    this.logger.debug({ receiver: receiver.address, onBehalf, legs: legs.length }, 'flash-loan-settled');
  }

  // ---- internals ----

  private vToken(market: Address): VToken | undefined {
    const vToken = this.chain.contractAt(market, VToken);
    return vToken && vToken.comptroller === this ? vToken : undefined;
  }

  private addToMarket(msg: Msg, market: Address, account: Address): MarketErrorCode {
    if (!this.markets(market).isListed) return MarketError.MARKET_NOT_LISTED;
    if (this.actionPaused(market, Action.ENTER_MARKET)) return MarketError.ACTION_PAUSED;
    if (this.checkMembership(account, market)) return MarketError.NO_ERROR;
    this.state.accountAssets.set(account, [...this.getAssetsIn(account), market]);
    this.emit(msg, 'MarketEntered', { market, account });
    return MarketError.NO_ERROR;
  }

  private collateralFactorFor(poolId: number, market: Address): bigint {
    const entry = this.poolMarkets(poolId, market);
    if (poolId !== CORE_POOL_ID && entry.isListed) return entry.collateralFactorMantissa;
    return this.markets(market).collateralFactorMantissa;
  }

  private hypotheticalLiquidity(account: Address, adjustment?: LiquidityAdjustment): AccountLiquidity {
    const poolId = this.userPoolId(account);
    let sumCollateral = 0n;
    let sumBorrowPlusEffects = 0n;

    for (const market of this.getAssetsIn(account)) {
      const vToken = this.vToken(market);
      if (!vToken) continue;
      const price = this.oracle.getUnderlyingPrice(market);
      if (price === 0n) return { errorCode: MarketError.PRICE_ERROR, liquidity: 0n, shortfall: 0n };

      const cf = this.collateralFactorFor(poolId, market);
      const tokensToDenom = mulExp(mulExp(cf, vToken.exchangeRateStored()), price);
      sumCollateral += mulExp(tokensToDenom, vToken.balanceOf(account));
      sumBorrowPlusEffects += mulExp(price, vToken.borrowBalanceStored(account));

      if (adjustment && adjustment.market === market) {
        sumBorrowPlusEffects += mulExp(tokensToDenom, adjustment.redeemTokens);
        sumBorrowPlusEffects += mulExp(price, adjustment.borrowAmount);
      }
    }

    return sumCollateral > sumBorrowPlusEffects
      ? { errorCode: MarketError.NO_ERROR, liquidity: sumCollateral - sumBorrowPlusEffects, shortfall: 0n }
      : { errorCode: MarketError.NO_ERROR, liquidity: 0n, shortfall: sumBorrowPlusEffects - sumCollateral };
  }

  private onlyAllowed(msg: Msg, fn: string): void {
    if (!this.accessControl.isAllowedToCall(msg.sender, this.address, fn)) {
      this.revert('Unauthorized', { sender: msg.sender, fn });
    }
  }
}
