import { Address, Hex, maxUint256, zeroAddress } from 'viem';
import type { Logger } from 'pino';
import type { Chain } from '../chain/chain';
import type { CalldataContract } from '../chain/calldata';
import { Contract } from '../chain/contract';
import { Msg, callFrom } from '../chain/context';
import { Erc20 } from '../chain/erc20';
import { RevertDetail, revertReason } from '../chain/errors';
import { swapThroughConverter } from '../converter/swap';
import { counter } from '../infra/metrics';
import { log } from '../infra/logger';
import type { Comptroller } from '../market/comptroller';
import { MarketError, MarketErrorCode } from '../market/types';
import { VToken } from '../market/vtoken';
import { PositionSwapperError, PositionSwapperErrorCode } from './errors';

export type PositionSwapperParams = {
  comptroller: Comptroller;
  converter: CalldataContract<object>;
  owner: Address;
};

type PositionSwapperState = {
  owner: Address;
  approvedPairs: Set<string>;
};

const pairKey = (marketFrom: Address, marketTo: Address) => `${marketFrom}:${marketTo}`;

/**
 * Moves a position between two markets of one comptroller. Collateral is
 * seized from the source market, redeemed, swapped and supplied to the target;
 * debt is borrowed on the target, swapped and repaid on the source. Only
 * owner-approved market pairs are served, and the account must end with no
 * shortfall. Seizing needs the swapper whitelisted as an executor on the
 * comptroller; borrowing needs it as the account's approved delegate.
 */
export class PositionSwapper extends Contract<PositionSwapperState> {
  readonly contractName = 'PositionSwapper';
  readonly comptroller: Comptroller;
  readonly converter: CalldataContract<object>;
  private readonly logger: Logger;

  constructor(
    address: Address,
    private readonly chain: Chain,
    params: PositionSwapperParams,
  ) {
    super(address, { owner: params.owner, approvedPairs: new Set() });
    for (const [name, value] of [
      ['comptroller', params.comptroller.address],
      ['converter', params.converter.address],
      ['owner', params.owner],
    ] as const) {
      if (value === zeroAddress) this.fail(PositionSwapperError.ZeroAddress, { param: name });
    }
    this.comptroller = params.comptroller;
    this.converter = params.converter;
    this.logger = log.child({ module: 'position-swapper', address });
  }

  owner(): Address {
    return this.state.owner;
  }

  isApprovedPair(marketFrom: Address, marketTo: Address): boolean {
    return this.state.approvedPairs.has(pairKey(marketFrom, marketTo));
  }

  setApprovedPair(msg: Msg, marketFrom: Address, marketTo: Address, approved: boolean): void {
    if (msg.sender !== this.state.owner) this.fail(PositionSwapperError.Unauthorized, { sender: msg.sender });
    if (approved) this.state.approvedPairs.add(pairKey(marketFrom, marketTo));
    else this.state.approvedPairs.delete(pairKey(marketFrom, marketTo));
    this.emit(msg, 'ApprovedPairUpdated', { marketFrom, marketTo, approved });
  }

  /**
   * Moves `seizeTokens` of `user`'s `marketFrom` vTokens (`maxUint256` for all)
   * into `marketTo`. Returns the underlying supplied to `marketTo`.
   */
  async swapCollateral(
    msg: Msg,
    user: Address,
    marketFrom: Address,
    marketTo: Address,
    seizeTokens: bigint,
    minAmountOut: bigint,
    swapData: Hex,
  ): Promise<bigint> {
    return this.track('COLLATERAL', async () => {
      this.authorize(msg, user);
      const [from, to] = this.marketPair(marketFrom, marketTo);
      if (seizeTokens === 0n) this.fail(PositionSwapperError.ZeroAmount);
      const balance = from.balanceOf(user);
      const amount = seizeTokens === maxUint256 ? balance : seizeTokens;
      if (balance === 0n || amount > balance) {
        this.fail(PositionSwapperError.NoVTokenBalance, { balance, requested: amount });
      }
      const self = callFrom(msg, this.address);

      this.check(PositionSwapperError.SeizeFailed, from.seize(self, this.address, user, amount));
      const before = from.underlying.balanceOf(this.address);
      this.check(PositionSwapperError.RedeemFailed, from.redeem(self, amount));
      const redeemed = from.underlying.balanceOf(this.address) - before;

      const supplied = await this.swap(self, from.underlying, redeemed, to.underlying, minAmountOut, swapData);
      if (this.comptroller.checkMembership(user, from.address) && !this.comptroller.checkMembership(user, to.address)) {
        this.check(PositionSwapperError.EnterMarketFailed, this.comptroller.enterMarketBehalf(self, user, to.address));
      }
      to.underlying.approve(self, to.address, supplied);
      this.check(PositionSwapperError.MintFailed, to.mintBehalf(self, user, supplied));

      this.checkAccountSafe(user);
      this.emit(msg, 'CollateralSwapped', {
        user,
        marketFrom: from.address,
        marketTo: to.address,
        seizedTokens: amount,
        amountRedeemed: redeemed,
        amountSupplied: supplied,
      });
      return supplied;
    });
  }

  /**
   * Borrows `borrowAmount` on `marketTo` for `user` and repays `repayAmount`
   * (`maxUint256` for all) of their `marketFrom` debt with the swap output.
   * Output beyond the repayment goes to `user`. Returns the amount repaid.
   */
  async swapDebt(
    msg: Msg,
    user: Address,
    marketFrom: Address,
    marketTo: Address,
    repayAmount: bigint,
    borrowAmount: bigint,
    swapData: Hex,
  ): Promise<bigint> {
    return this.track('DEBT', async () => {
      this.authorize(msg, user);
      const [from, to] = this.marketPair(marketFrom, marketTo);
      if (repayAmount === 0n || borrowAmount === 0n) this.fail(PositionSwapperError.ZeroAmount);
      const self = callFrom(msg, this.address);
      const debt = from.borrowBalanceCurrent(self, user);
      const repay = repayAmount === maxUint256 ? debt : repayAmount;
      if (debt === 0n || repay > debt) this.fail(PositionSwapperError.NoBorrowBalance, { debt, requested: repay });

      this.check(PositionSwapperError.BorrowFailed, to.borrowBehalf(self, user, borrowAmount));
      const received = await this.swap(self, to.underlying, borrowAmount, from.underlying, repay, swapData);
      from.underlying.approve(self, from.address, repay);
      this.check(PositionSwapperError.RepayFailed, from.repayBorrowBehalf(self, user, repay));
      if (received > repay) from.underlying.transfer(self, user, received - repay);

      this.checkAccountSafe(user);
      this.emit(msg, 'DebtSwapped', {
        user,
        marketFrom: from.address,
        marketTo: to.address,
        amountRepaid: repay,
        amountBorrowed: borrowAmount,
      });
      return repay;
    });
  }

  sweepToken(msg: Msg, tokenAddress: Address): bigint {
    if (msg.sender !== this.state.owner) this.fail(PositionSwapperError.Unauthorized, { sender: msg.sender });
    const token = this.chain.contractAt(tokenAddress, Erc20);
    if (!token) this.fail(PositionSwapperError.InvalidToken, { token: tokenAddress });
    const amount = token.balanceOf(this.address);
    if (amount > 0n) token.transfer(callFrom(msg, this.address), this.state.owner, amount);
    this.emit(msg, 'SweepToken', { token: token.address, receiver: this.state.owner, amount });
    return amount;
  }

  // ---- steps ----

  private async swap(
    self: Msg,
    tokenIn: Erc20,
    amountIn: bigint,
    tokenOut: Erc20,
    minAmountOut: bigint,
    swapData: Hex,
  ): Promise<bigint> {
    let amountOut = amountIn;
    if (tokenIn !== tokenOut) {
      try {
        amountOut = await swapThroughConverter(self, this.converter, { tokenIn, amountIn, tokenOut, swapData });
      } catch (err) {
        this.fail(PositionSwapperError.SwapFailed, { reason: revertReason(err) });
      }
    }
    if (amountOut === 0n || amountOut < minAmountOut) {
      this.fail(PositionSwapperError.InsufficientAmountOut, { expected: minAmountOut, actual: amountOut });
    }
    return amountOut;
  }

  private authorize(msg: Msg, user: Address): void {
    if (user === zeroAddress) this.fail(PositionSwapperError.ZeroAddress, { param: 'user' });
    if (user !== msg.sender && !this.comptroller.approvedDelegates(user, msg.sender)) {
      this.fail(PositionSwapperError.Unauthorized, { user, sender: msg.sender });
    }
  }

  private marketPair(marketFrom: Address, marketTo: Address): [VToken, VToken] {
    const from = this.listedMarket(marketFrom);
    const to = this.listedMarket(marketTo);
    if (from === to) this.fail(PositionSwapperError.IdenticalMarkets);
    if (!this.isApprovedPair(from.address, to.address)) {
      this.fail(PositionSwapperError.PairNotApproved, { marketFrom, marketTo });
    }
    return [from, to];
  }

  private listedMarket(market: Address): VToken {
    const vToken = this.chain.contractAt(market, VToken);
    if (!vToken || vToken.comptroller !== this.comptroller || !this.comptroller.markets(market).isListed) {
      this.fail(PositionSwapperError.MarketNotListed, { market });
    }
    return vToken;
  }

  private checkAccountSafe(user: Address): void {
    const { errorCode, shortfall } = this.comptroller.getAccountLiquidity(user);
    if (errorCode !== MarketError.NO_ERROR || shortfall > 0n) {
      this.fail(PositionSwapperError.SwapCausesLiquidation, { errorCode, shortfall });
    }
  }

  private check(code: PositionSwapperErrorCode, marketCode: MarketErrorCode): void {
    if (marketCode !== MarketError.NO_ERROR) this.fail(code, { code: marketCode });
  }

  private async track(kind: 'COLLATERAL' | 'DEBT', run: () => Promise<bigint>): Promise<bigint> {
    try {
      const amount = await run();
      counter.routerOps.inc({ contract: this.contractName, kind, outcome: 'ok' });
      this.logger.info({ kind, amount: amount.toString() }, 'position-swap-completed');
      return amount;
    } catch (err) {
      counter.routerOps.inc({ contract: this.contractName, kind, outcome: 'reverted' });
      this.logger.warn({ kind, reason: revertReason(err) }, 'position-swap-reverted');
      throw err;
    }
  }

  private fail(code: PositionSwapperErrorCode, detail: RevertDetail = {}): never {
    this.revert(code, detail);
  }
}
