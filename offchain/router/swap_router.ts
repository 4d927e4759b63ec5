import { Address, Hex, zeroAddress } from 'viem';
import type { Logger } from 'pino';
import type { Chain } from '../chain/chain';
import type { CalldataContract } from '../chain/calldata';
import { Contract } from '../chain/contract';
import { Msg, callFrom } from '../chain/context';
import { Erc20 } from '../chain/erc20';
import { RevertDetail, revertReason } from '../chain/errors';
import type { WrappedNative } from '../chain/wrapped_native';
import { swapThroughConverter } from '../converter/swap';
import { counter } from '../infra/metrics';
import { log } from '../infra/logger';
import type { Comptroller } from '../market/comptroller';
import { MarketError } from '../market/types';
import { VToken } from '../market/vtoken';
import { minBigInt } from '../util/math';
import { SwapRouterError, SwapRouterErrorCode } from './errors';

export type SwapRouterParams = {
  comptroller: Comptroller;
  swapHelper: CalldataContract<object>;
  wrappedNative: WrappedNative;
  owner: Address;
};

type RouterKind = 'SUPPLY' | 'SUPPLY_NATIVE' | 'REPAY' | 'REPAY_NATIVE' | 'REPAY_FULL';

type RouterSwap = {
  user: Address;
  vToken: VToken;
  tokenIn: Erc20;
  amountIn: bigint;
  minAmountOut: bigint;
  swapData: Hex;
};

/**
 * Swaps a user's token (or native coin) into a market's underlying through the
 * swap helper, then supplies it or repays debt on the user's behalf. Anything
 * the swap returns beyond the debt goes back to the user.
 */
export class SwapRouter extends Contract<{ owner: Address }> {
  readonly contractName = 'SwapRouter';
  readonly comptroller: Comptroller;
  readonly swapHelper: CalldataContract<object>;
  readonly wrappedNative: WrappedNative;
  private readonly logger: Logger;

  constructor(
    address: Address,
    private readonly chain: Chain,
    params: SwapRouterParams,
  ) {
    super(address, { owner: params.owner });
    for (const [name, value] of [
      ['comptroller', params.comptroller.address],
      ['swapHelper', params.swapHelper.address],
      ['wrappedNative', params.wrappedNative.address],
      ['owner', params.owner],
    ] as const) {
      if (value === zeroAddress) this.fail(SwapRouterError.ZeroAddress, { param: name });
    }
    this.comptroller = params.comptroller;
    this.swapHelper = params.swapHelper;
    this.wrappedNative = params.wrappedNative;
    this.logger = log.child({ module: 'swap-router', address });
  }

  owner(): Address {
    return this.state.owner;
  }

  /** Returns the underlying amount supplied. */
  async swapAndSupply(
    msg: Msg,
    market: Address,
    tokenIn: Address,
    amountIn: bigint,
    minAmountOut: bigint,
    swapData: Hex,
  ): Promise<bigint> {
    return this.track('SUPPLY', async () => {
      if (amountIn === 0n) this.fail(SwapRouterError.ZeroAmount);
      const vToken = this.listedMarket(market);
      const token = this.token(tokenIn);
      this.pull(msg, token, amountIn);
      return this.swapAndSupplyFresh(msg, { user: msg.sender, vToken, tokenIn: token, amountIn, minAmountOut, swapData });
    });
  }

  /** Wraps `value` of the sender's native coin and supplies what it swaps into. */
  async swapNativeAndSupply(
    msg: Msg,
    market: Address,
    minAmountOut: bigint,
    swapData: Hex,
    value: bigint,
  ): Promise<bigint> {
    return this.track('SUPPLY_NATIVE', async () => {
      if (value === 0n) this.fail(SwapRouterError.ZeroAmount);
      const vToken = this.listedMarket(market);
      this.wrap(msg, value);
      return this.swapAndSupplyFresh(msg, {
        user: msg.sender,
        vToken,
        tokenIn: this.wrappedNative,
        amountIn: value,
        minAmountOut,
        swapData,
      });
    });
  }

  /** Repays up to the sender's debt and returns the rest of the output; returns the amount repaid. */
  async swapAndRepay(
    msg: Msg,
    market: Address,
    tokenIn: Address,
    amountIn: bigint,
    minAmountOut: bigint,
    swapData: Hex,
  ): Promise<bigint> {
    return this.track('REPAY', async () => {
      if (amountIn === 0n) this.fail(SwapRouterError.ZeroAmount);
      const vToken = this.listedMarket(market);
      const token = this.token(tokenIn);
      this.requireDebt(msg, vToken);
      this.pull(msg, token, amountIn);
      return this.swapAndRepayFresh(msg, { user: msg.sender, vToken, tokenIn: token, amountIn, minAmountOut, swapData });
    });
  }

  async swapNativeAndRepay(
    msg: Msg,
    market: Address,
    minAmountOut: bigint,
    swapData: Hex,
    value: bigint,
  ): Promise<bigint> {
    return this.track('REPAY_NATIVE', async () => {
      if (value === 0n) this.fail(SwapRouterError.ZeroAmount);
      const vToken = this.listedMarket(market);
      this.requireDebt(msg, vToken);
      this.wrap(msg, value);
      return this.swapAndRepayFresh(msg, {
        user: msg.sender,
        vToken,
        tokenIn: this.wrappedNative,
        amountIn: value,
        minAmountOut,
        swapData,
      });
    });
  }

  /** Like `swapAndRepay`, but the swap must cover the whole debt. */
  async swapAndRepayFull(
    msg: Msg,
    market: Address,
    tokenIn: Address,
    amountIn: bigint,
    swapData: Hex,
  ): Promise<bigint> {
    return this.track('REPAY_FULL', async () => {
      if (amountIn === 0n) this.fail(SwapRouterError.ZeroAmount);
      const vToken = this.listedMarket(market);
      const token = this.token(tokenIn);
      const debt = this.requireDebt(msg, vToken);
      this.pull(msg, token, amountIn);
      return this.swapAndRepayFresh(msg, {
        user: msg.sender,
        vToken,
        tokenIn: token,
        amountIn,
        minAmountOut: debt,
        swapData,
      });
    });
  }

  sweepToken(msg: Msg, tokenAddress: Address): bigint {
    this.onlyOwner(msg);
    const token = this.token(tokenAddress);
    const amount = token.balanceOf(this.address);
    if (amount > 0n) token.transfer(callFrom(msg, this.address), this.state.owner, amount);
    this.emit(msg, 'SweepToken', { token: token.address, receiver: this.state.owner, amount });
    return amount;
  }

  sweepNative(msg: Msg): bigint {
    this.onlyOwner(msg);
    const amount = this.chain.native.balanceOf(this.address);
    if (amount > 0n) this.chain.native.transfer(callFrom(msg, this.address), this.state.owner, amount);
    this.emit(msg, 'SweepNative', { receiver: this.state.owner, amount });
    return amount;
  }

  // ---- steps ----

  private async swapAndSupplyFresh(msg: Msg, request: RouterSwap): Promise<bigint> {
    const { user, vToken, tokenIn, amountIn } = request;
    const self = callFrom(msg, this.address);
    const amountOut = await this.swap(self, request);

    vToken.underlying.approve(self, vToken.address, amountOut);
    const code = vToken.mintBehalf(self, user, amountOut);
    if (code !== MarketError.NO_ERROR) this.fail(SwapRouterError.SupplyFailed, { code });

    this.emit(msg, 'SwapAndSupply', {
      user,
      vToken: vToken.address,
      tokenIn: tokenIn.address,
      tokenOut: vToken.underlying.address,
      amountIn,
      amountOut,
      amountSupplied: amountOut,
    });
    return amountOut;
  }

  private async swapAndRepayFresh(msg: Msg, request: RouterSwap): Promise<bigint> {
    const { user, vToken, tokenIn, amountIn } = request;
    const self = callFrom(msg, this.address);
    const amountOut = await this.swap(self, request);

    const debt = vToken.borrowBalanceCurrent(self, user);
    const repaid = minBigInt(amountOut, debt);
    vToken.underlying.approve(self, vToken.address, repaid);
    const code = vToken.repayBorrowBehalf(self, user, repaid);
    if (code !== MarketError.NO_ERROR) this.fail(SwapRouterError.RepayFailed, { code });
    if (amountOut > repaid) vToken.underlying.transfer(self, user, amountOut - repaid);

    this.emit(msg, 'SwapAndRepay', {
      user,
      vToken: vToken.address,
      tokenIn: tokenIn.address,
      tokenOut: vToken.underlying.address,
      amountIn,
      amountOut,
      amountRepaid: repaid,
    });
    return repaid;
  }

  /** Converts `amountIn` of `tokenIn` into the market's underlying; same-token requests skip the helper. */
  private async swap(self: Msg, request: RouterSwap): Promise<bigint> {
    const { vToken, tokenIn, amountIn, minAmountOut, swapData } = request;
    const tokenOut = vToken.underlying;
    let amountOut = amountIn;
    if (tokenIn !== tokenOut) {
      try {
        amountOut = await swapThroughConverter(self, this.swapHelper, { tokenIn, amountIn, tokenOut, swapData });
      } catch (err) {
        this.fail(SwapRouterError.SwapFailed, { reason: revertReason(err) });
      }
    }
    if (amountOut === 0n || amountOut < minAmountOut) {
      this.fail(SwapRouterError.InsufficientAmountOut, { expected: minAmountOut, actual: amountOut });
    }
    return amountOut;
  }

  private pull(msg: Msg, token: Erc20, amount: bigint): void {
    const balance = token.balanceOf(msg.sender);
    if (balance < amount) this.fail(SwapRouterError.InsufficientBalance, { balance, needed: amount });
    token.transferFrom(callFrom(msg, this.address), msg.sender, this.address, amount);
  }

  private wrap(msg: Msg, value: bigint): void {
    this.chain.native.transfer(msg, this.address, value);
    this.wrappedNative.deposit(callFrom(msg, this.address), value);
  }

  private requireDebt(msg: Msg, vToken: VToken): bigint {
    const debt = vToken.borrowBalanceCurrent(callFrom(msg, this.address), msg.sender);
    if (debt === 0n) this.fail(SwapRouterError.ZeroAmount, { debt });
    return debt;
  }

  private listedMarket(market: Address): VToken {
    if (market === zeroAddress) this.fail(SwapRouterError.ZeroAddress, { param: 'market' });
    const vToken = this.chain.contractAt(market, VToken);
    if (!vToken || vToken.comptroller !== this.comptroller || !this.comptroller.markets(market).isListed) {
      this.fail(SwapRouterError.MarketNotListed, { market });
    }
    return vToken;
  }

  private token(address: Address): Erc20 {
    if (address === zeroAddress) this.fail(SwapRouterError.ZeroAddress, { param: 'token' });
    const token = this.chain.contractAt(address, Erc20);
    if (!token) this.fail(SwapRouterError.InvalidToken, { token: address });
    return token;
  }

  private onlyOwner(msg: Msg): void {
    if (msg.sender !== this.state.owner) this.fail(SwapRouterError.Unauthorized, { sender: msg.sender });
  }

  private async track(kind: RouterKind, run: () => Promise<bigint>): Promise<bigint> {
    try {
      const amount = await run();
      counter.routerOps.inc({ contract: this.contractName, kind, outcome: 'ok' });
      this.logger.info({ kind, amount: amount.toString() }, 'router-operation-completed');
      return amount;
    } catch (err) {
      counter.routerOps.inc({ contract: this.contractName, kind, outcome: 'reverted' });
      this.logger.warn({ kind, reason: revertReason(err) }, 'router-operation-reverted');
      throw err;
    }
  }

  private fail(code: SwapRouterErrorCode, detail: RevertDetail = {}): never {
    this.revert(code, detail);
  }
}
