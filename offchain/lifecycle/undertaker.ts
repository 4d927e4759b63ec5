import type { Address } from 'viem';
import type { Logger } from 'pino';
import type { Chain } from '../chain/chain';
import { Contract } from '../chain/contract';
import { Msg, callFrom } from '../chain/context';
import { counter } from '../infra/metrics';
import { log } from '../infra/logger';
import type { Comptroller } from '../market/comptroller';
import { Action } from '../market/types';
import { VToken } from '../market/vtoken';
import { mulExp } from '../util/math';

type MarketExpiry = {
  toBePausedAfterTimestamp: bigint;
  canUnlist: boolean;
  unlistDepositThreshold: bigint;
};

type UndertakerState = {
  owner: Address;
  globalDepositThreshold: bigint;
  expiries: Map<Address, MarketExpiry>;
  pausedByUndertaker: Set<Address>;
};

const PAUSED_ACTIONS = [Action.MINT, Action.BORROW, Action.ENTER_MARKET];

/**
 * Winds down markets. Anyone may pause a market once its deposits fall below
 * the global threshold or its expiry passes; a market it paused can later be
 * unlisted when governance allowed it and deposits are below the market's
 * own threshold. Thresholds are USD with 18 decimals.
 */
export class Undertaker extends Contract<UndertakerState> {
  readonly contractName = 'Undertaker';
  private readonly logger: Logger;

  constructor(
    address: Address,
    private readonly chain: Chain,
    readonly comptroller: Comptroller,
    owner: Address,
  ) {
    super(address, { owner, globalDepositThreshold: 0n, expiries: new Map(), pausedByUndertaker: new Set() });
    this.logger = log.child({ module: 'undertaker', address });
  }

  globalDepositThreshold(): bigint {
    return this.state.globalDepositThreshold;
  }

  marketExpiry(market: Address): MarketExpiry | undefined {
    const expiry = this.state.expiries.get(market);
    return expiry ? { ...expiry } : undefined;
  }

  isMarketPaused(market: Address): boolean {
    return this.state.pausedByUndertaker.has(market);
  }

  setGlobalDepositThreshold(msg: Msg, threshold: bigint): void {
    this.onlyOwner(msg);
    this.state.globalDepositThreshold = threshold;
    this.emit(msg, 'GlobalDepositThresholdUpdated', { threshold });
  }

  setMarketExpiry(
    msg: Msg,
    market: Address,
    toBePausedAfterTimestamp: bigint,
    canUnlist: boolean,
    unlistDepositThreshold: bigint,
  ): void {
    this.onlyOwner(msg);
    if (!this.comptroller.markets(market).isListed) this.revert('MarketNotListed', { market });
    if (toBePausedAfterTimestamp <= msg.tx.timestamp) {
      this.revert('ExpiryInPast', { toBePausedAfterTimestamp });
    }
    this.state.expiries.set(market, { toBePausedAfterTimestamp, canUnlist, unlistDepositThreshold });
    this.emit(msg, 'MarketExpirySet', { market, toBePausedAfterTimestamp, canUnlist, unlistDepositThreshold });
  }

  /** USD value of all deposits, 18 decimals. */
  totalDepositsUsd(market: Address): bigint {
    const vToken = this.chain.contractAt(market, VToken);
    if (!vToken) return 0n;
    const underlyingSupplied = mulExp(vToken.totalSupply(), vToken.exchangeRateStored());
    return mulExp(underlyingSupplied, this.comptroller.oracle.getUnderlyingPrice(market));
  }

  canPauseMarket(market: Address): boolean {
    if (!this.comptroller.markets(market).isListed) return false;
    if (this.state.pausedByUndertaker.has(market)) return false;
    if (this.totalDepositsUsd(market) < this.state.globalDepositThreshold) return true;
    return this.expired(market);
  }

  canUnlistMarket(market: Address): boolean {
    if (!this.comptroller.markets(market).isListed) return false;
    if (!this.state.pausedByUndertaker.has(market)) return false;
    const expiry = this.state.expiries.get(market);
    if (!expiry?.canUnlist || !this.expired(market)) return false;
    return this.totalDepositsUsd(market) < expiry.unlistDepositThreshold;
  }

  pauseMarket(msg: Msg, market: Address): void {
    if (!this.canPauseMarket(market)) this.revert('MarketCannotBePaused', { market });
    const self = callFrom(msg, this.address);
    for (let poolId = 0; poolId <= this.comptroller.lastPoolId(); poolId++) {
      const entry = this.comptroller.poolMarkets(poolId, market);
      if (!entry.isListed) continue;
      this.comptroller.setCollateralFactor(self, poolId, market, 0n, entry.liquidationThresholdMantissa);
    }
    this.comptroller.setActionsPaused(self, [market], PAUSED_ACTIONS, true);
    this.comptroller.setMarketSupplyCaps(self, [market], [0n]);
    this.comptroller.setMarketBorrowCaps(self, [market], [0n]);
    this.state.pausedByUndertaker.add(market);
    this.emit(msg, 'MarketPaused', { market });
    counter.undertakerActions.inc({ action: 'pause' });
    this.logger.info({ market }, 'undertaker-market-paused');
  }

  unlistMarket(msg: Msg, market: Address): void {
    if (!this.canUnlistMarket(market)) this.revert('MarketCannotBeUnlisted', { market });
    this.comptroller.unlistMarket(callFrom(msg, this.address), market);
    this.state.expiries.delete(market);
    this.emit(msg, 'MarketUnlisted', { market });
    counter.undertakerActions.inc({ action: 'unlist' });
    this.logger.info({ market }, 'undertaker-market-unlisted');
  }

  private expired(market: Address): boolean {
    const expiry = this.state.expiries.get(market);
    return expiry !== undefined && this.chain.now() >= expiry.toBePausedAfterTimestamp;
  }

  private onlyOwner(msg: Msg): void {
    if (msg.sender !== this.state.owner) this.revert('Unauthorized', { sender: msg.sender });
  }
}
