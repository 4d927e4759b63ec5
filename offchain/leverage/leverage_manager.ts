import { Address, Hex, zeroAddress } from 'viem';
import type { Logger } from 'pino';
import type { Chain } from '../chain/chain';
import type { CalldataContract } from '../chain/calldata';
import { Contract } from '../chain/contract';
import { Msg, callFrom } from '../chain/context';
import type { Erc20 } from '../chain/erc20';
import { RevertDetail, revertReason } from '../chain/errors';
import { TransientSlot } from '../chain/transient';
import { swapThroughConverter } from '../converter/swap';
import { counter } from '../infra/metrics';
import { log } from '../infra/logger';
import type { Comptroller } from '../market/comptroller';
import { FlashLoanCallback, FlashLoanReceiver, FlashLoanResult, MarketError, MarketErrorCode } from '../market/types';
import { VToken } from '../market/vtoken';
import { minBigInt } from '../util/math';
import { LeverageError, LeverageErrorCode } from './errors';
import { InFlightOperation, OperationKind, assertNever, flashMarketOf } from './operation';

export type DustRecipient = 'reserve' | 'initiator';

export type LeverageManagerParams = {
  comptroller: Comptroller;
  converter: CalldataContract<object>;
  nativeMarket: Address;
  protocolShareReserve: Address;
  /** Where borrow-asset dust goes after an exit. Defaults to the reserve. */
  exitBorrowDustRecipient?: DustRecipient;
};

export type LeverageCallOptions = {
  /** Account whose position changes; must have approved the caller as a delegate. */
  onBehalfOf?: Address;
};

/**
 * Opens and unwinds leveraged positions in one transaction: a flash loan from
 * the lending market funds the position, and the initiator's own borrow repays
 * it. The orchestrator must be an approved delegate of every initiator.
 */
export class LeverageStrategiesManager extends Contract<Record<string, never>> implements FlashLoanReceiver {
  readonly contractName = 'LeverageStrategiesManager';
  readonly comptroller: Comptroller;
  readonly converter: CalldataContract<object>;
  readonly nativeMarket: Address;
  readonly protocolShareReserve: Address;
  readonly exitBorrowDustRecipient: DustRecipient;
  private readonly operation = new TransientSlot<InFlightOperation>();
  private readonly logger: Logger;

  constructor(
    address: Address,
    private readonly chain: Chain,
    params: LeverageManagerParams,
  ) {
    super(address, {});
    for (const [name, value] of [
      ['comptroller', params.comptroller.address],
      ['converter', params.converter.address],
      ['nativeMarket', params.nativeMarket],
      ['protocolShareReserve', params.protocolShareReserve],
    ] as const) {
      if (value === zeroAddress) this.fail(LeverageError.ZeroAddress, { param: name });
    }
    this.comptroller = params.comptroller;
    this.converter = params.converter;
    this.nativeMarket = params.nativeMarket;
    this.protocolShareReserve = params.protocolShareReserve;
    this.exitBorrowDustRecipient = params.exitBorrowDustRecipient ?? 'reserve';
    this.logger = log.child({ module: 'leverage', address });
  }

  // ---- entry points ----

  async enterSingleAssetLeverage(
    msg: Msg,
    market: Address,
    seedAmount: bigint,
    flashLoanAmount: bigint,
    options: LeverageCallOptions = {},
  ): Promise<void> {
    await this.track('ENTER_SINGLE_ASSET', async () => {
      if (flashLoanAmount === 0n) this.fail(LeverageError.ZeroFlashLoanAmount);
      const collateral = this.listedMarket(market);
      const initiator = this.authorize(msg, options);
      const self = callFrom(msg, this.address);

      if (seedAmount > 0n) collateral.underlying.transferFrom(self, initiator, this.address, seedAmount);
      await this.flashLoan(msg, { kind: 'ENTER_SINGLE_ASSET', initiator, collateral, seedAmount }, flashLoanAmount);

      this.checkAccountSafe(self, initiator, [collateral]);
      this.sweepDust(self, collateral.underlying, initiator, initiator);
      this.emit(msg, 'SingleAssetLeverageEntered', {
        initiator,
        market: collateral.address,
        seedAmount,
        flashLoanAmount,
      });
      return initiator;
    });
  }

  async enterLeverage(
    msg: Msg,
    collateralMarket: Address,
    collateralSeed: bigint,
    borrowMarket: Address,
    flashLoanAmount: bigint,
    minCollateralAfterSwap: bigint,
    swapData: Hex,
    options: LeverageCallOptions = {},
  ): Promise<void> {
    await this.track('ENTER', async () => {
      if (flashLoanAmount === 0n) this.fail(LeverageError.ZeroFlashLoanAmount);
      const [collateral, borrow] = this.marketPair(collateralMarket, borrowMarket);
      const initiator = this.authorize(msg, options);
      const self = callFrom(msg, this.address);

      if (collateralSeed > 0n) collateral.underlying.transferFrom(self, initiator, this.address, collateralSeed);
      await this.flashLoan(
        msg,
        { kind: 'ENTER', initiator, collateral, borrow, collateralSeed, minAmountOut: minCollateralAfterSwap, swapData },
        flashLoanAmount,
      );

      this.checkAccountSafe(self, initiator, [collateral, borrow]);
      this.sweepDust(self, collateral.underlying, initiator, initiator);
      this.sweepDust(self, borrow.underlying, initiator, initiator);
      this.emit(msg, 'LeverageEntered', {
        initiator,
        collateralMarket: collateral.address,
        collateralSeed,
        borrowMarket: borrow.address,
        flashLoanAmount,
      });
      return initiator;
    });
  }

  async enterLeverageFromBorrow(
    msg: Msg,
    collateralMarket: Address,
    borrowMarket: Address,
    borrowedSeed: bigint,
    flashLoanAmount: bigint,
    minCollateralAfterSwap: bigint,
    swapData: Hex,
    options: LeverageCallOptions = {},
  ): Promise<void> {
    await this.track('ENTER_FROM_BORROW', async () => {
      if (flashLoanAmount === 0n) this.fail(LeverageError.ZeroFlashLoanAmount);
      const [collateral, borrow] = this.marketPair(collateralMarket, borrowMarket);
      const initiator = this.authorize(msg, options);
      const self = callFrom(msg, this.address);

      if (borrowedSeed > 0n) borrow.underlying.transferFrom(self, initiator, this.address, borrowedSeed);
      await this.flashLoan(
        msg,
        {
          kind: 'ENTER_FROM_BORROW',
          initiator,
          collateral,
          borrow,
          borrowedSeed,
          minAmountOut: minCollateralAfterSwap,
          swapData,
        },
        flashLoanAmount,
      );

      this.checkAccountSafe(self, initiator, [collateral, borrow]);
      this.sweepDust(self, collateral.underlying, initiator, initiator);
      this.sweepDust(self, borrow.underlying, initiator, initiator);
      this.emit(msg, 'LeverageEnteredFromBorrow', {
        initiator,
        collateralMarket: collateral.address,
        borrowMarket: borrow.address,
        borrowedSeed,
        flashLoanAmount,
      });
      return initiator;
    });
  }

  async exitLeverage(
    msg: Msg,
    collateralMarket: Address,
    collateralRedeemAmount: bigint,
    borrowMarket: Address,
    repayFlashLoanAmount: bigint,
    minBorrowedAfterSwap: bigint,
    swapData: Hex,
    options: LeverageCallOptions = {},
  ): Promise<void> {
    await this.track('EXIT', async () => {
      if (repayFlashLoanAmount === 0n) this.fail(LeverageError.ZeroFlashLoanAmount);
      const [collateral, borrow] = this.marketPair(collateralMarket, borrowMarket);
      const initiator = this.authorize(msg, options);
      const self = callFrom(msg, this.address);

      await this.flashLoan(
        msg,
        {
          kind: 'EXIT',
          initiator,
          collateral,
          borrow,
          collateralRedeemAmount,
          minAmountOut: minBorrowedAfterSwap,
          swapData,
        },
        repayFlashLoanAmount,
      );

      this.checkAccountSafe(self, initiator, [collateral, borrow]);
      this.sweepDust(self, collateral.underlying, initiator, initiator);
      const borrowDustRecipient = this.exitBorrowDustRecipient === 'reserve' ? this.protocolShareReserve : initiator;
      this.sweepDust(self, borrow.underlying, borrowDustRecipient, initiator);
      this.emit(msg, 'LeverageExited', {
        initiator,
        collateralMarket: collateral.address,
        collateralRedeemAmount,
        borrowMarket: borrow.address,
        flashLoanAmount: repayFlashLoanAmount,
      });
      return initiator;
    });
  }

  async exitSingleAssetLeverage(
    msg: Msg,
    market: Address,
    flashLoanAmount: bigint,
    options: LeverageCallOptions = {},
  ): Promise<void> {
    await this.track('EXIT_SINGLE_ASSET', async () => {
      if (flashLoanAmount === 0n) this.fail(LeverageError.ZeroFlashLoanAmount);
      const collateral = this.listedMarket(market);
      const initiator = this.authorize(msg, options);
      const self = callFrom(msg, this.address);

      await this.flashLoan(msg, { kind: 'EXIT_SINGLE_ASSET', initiator, collateral }, flashLoanAmount);

      this.checkAccountSafe(self, initiator, [collateral]);
      this.sweepDust(self, collateral.underlying, initiator, initiator);
      this.emit(msg, 'SingleAssetLeverageExited', { initiator, market: collateral.address, flashLoanAmount });
      return initiator;
    });
  }

  // ---- flash-loan callback ----

  async executeOperation(msg: Msg, params: FlashLoanCallback): Promise<FlashLoanResult> {
    if (msg.sender !== this.comptroller.address) {
      this.fail(LeverageError.UnauthorizedExecutor, { sender: msg.sender });
    }
    if (params.initiator !== this.address) {
      this.fail(LeverageError.InitiatorMismatch, { initiator: params.initiator });
    }
    const op = this.operation.get(msg.tx);
    const expectedOnBehalf = op?.initiator ?? zeroAddress;
    if (params.onBehalf !== expectedOnBehalf) {
      this.fail(LeverageError.OnBehalfMismatch, { onBehalf: params.onBehalf, expected: expectedOnBehalf });
    }
    if (params.assets.length !== 1 || params.amounts.length !== 1 || params.premiums.length !== 1) {
      this.fail(LeverageError.FlashLoanAssetOrAmountMismatch, { assets: params.assets.length });
    }
    if (!op) this.fail(LeverageError.InvalidExecuteOperation);

    const flashMarket = flashMarketOf(op);
    if (params.assets[0] !== flashMarket.address) {
      this.fail(LeverageError.FlashLoanAssetOrAmountMismatch, { asset: params.assets[0] });
    }

    const self = callFrom(msg, this.address);
    const [amount] = params.amounts;
    const [premium] = params.premiums;
    let repayAmount: bigint;
    switch (op.kind) {
      case 'ENTER_SINGLE_ASSET':
        repayAmount = this.continueEnterSingleAsset(self, op, amount, premium);
        break;
      case 'ENTER':
        repayAmount = await this.continueEnter(self, op, amount, premium);
        break;
      case 'ENTER_FROM_BORROW':
        repayAmount = await this.continueEnterFromBorrow(self, op, amount, premium);
        break;
      case 'EXIT':
        repayAmount = await this.continueExit(self, op, amount, premium);
        break;
      case 'EXIT_SINGLE_ASSET':
        repayAmount = this.continueExitSingleAsset(self, op, amount, premium);
        break;
      default:
        return assertNever(op);
    }

    flashMarket.underlying.approve(self, flashMarket.address, repayAmount);
    return { success: true, repayAmounts: [repayAmount] };
  }

  // ---- continuations ----

  private continueEnterSingleAsset(
    self: Msg,
    op: Extract<InFlightOperation, { kind: 'ENTER_SINGLE_ASSET' }>,
    amount: bigint,
    premium: bigint,
  ): bigint {
    this.supplyCollateral(self, op.initiator, op.collateral, amount + op.seedAmount);
    this.borrowFor(self, op.initiator, op.collateral, amount + premium);
    return amount + premium;
  }

  private async continueEnter(
    self: Msg,
    op: Extract<InFlightOperation, { kind: 'ENTER' }>,
    amount: bigint,
    premium: bigint,
  ): Promise<bigint> {
    const received = await this.swap(self, op.borrow.underlying, amount, op.collateral.underlying, op.minAmountOut, op.swapData);
    this.supplyCollateral(self, op.initiator, op.collateral, received + op.collateralSeed);
    this.borrowFor(self, op.initiator, op.borrow, amount + premium);
    return amount + premium;
  }

  private async continueEnterFromBorrow(
    self: Msg,
    op: Extract<InFlightOperation, { kind: 'ENTER_FROM_BORROW' }>,
    amount: bigint,
    premium: bigint,
  ): Promise<bigint> {
    const received = await this.swap(
      self,
      op.borrow.underlying,
      amount + op.borrowedSeed,
      op.collateral.underlying,
      op.minAmountOut,
      op.swapData,
    );
    this.supplyCollateral(self, op.initiator, op.collateral, received);
    this.borrowFor(self, op.initiator, op.borrow, amount + premium);
    return amount + premium;
  }

  private async continueExit(
    self: Msg,
    op: Extract<InFlightOperation, { kind: 'EXIT' }>,
    amount: bigint,
    premium: bigint,
  ): Promise<bigint> {
    this.repayFor(self, op.initiator, op.borrow, amount);
    this.redeemFor(self, op.initiator, op.collateral, op.collateralRedeemAmount);
    await this.swap(
      self,
      op.collateral.underlying,
      op.collateralRedeemAmount,
      op.borrow.underlying,
      op.minAmountOut,
      op.swapData,
    );
    return this.requireRepayable(op.borrow.underlying, amount + premium);
  }

  private continueExitSingleAsset(
    self: Msg,
    op: Extract<InFlightOperation, { kind: 'EXIT_SINGLE_ASSET' }>,
    amount: bigint,
    premium: bigint,
  ): bigint {
    this.repayFor(self, op.initiator, op.collateral, amount);
    const owed = amount + premium;
    const held = op.collateral.underlying.balanceOf(this.address);
    if (held < owed) this.redeemFor(self, op.initiator, op.collateral, owed - held);
    return this.requireRepayable(op.collateral.underlying, owed);
  }

  // ---- market steps ----

  private supplyCollateral(self: Msg, initiator: Address, market: VToken, amount: bigint): void {
    if (!this.comptroller.checkMembership(initiator, market.address)) {
      const code = this.comptroller.enterMarketBehalf(self, initiator, market.address);
      if (code !== MarketError.NO_ERROR) this.failWithCode(LeverageError.EnterMarketFailed, code);
    }
    market.underlying.approve(self, market.address, amount);
    const code = market.mintBehalf(self, initiator, amount);
    if (code !== MarketError.NO_ERROR) this.failWithCode(LeverageError.MintBehalfFailed, code);
  }

  private borrowFor(self: Msg, initiator: Address, market: VToken, amount: bigint): void {
    const code = market.borrowBehalf(self, initiator, amount);
    if (code !== MarketError.NO_ERROR) this.failWithCode(LeverageError.BorrowBehalfFailed, code);
  }

  /** Repays up to `available`, capped at the initiator's current debt; returns the amount repaid. */
  private repayFor(self: Msg, initiator: Address, market: VToken, available: bigint): bigint {
    const debt = market.borrowBalanceCurrent(self, initiator);
    const repayAmount = minBigInt(available, debt);
    if (repayAmount === 0n) return 0n;
    market.underlying.approve(self, market.address, repayAmount);
    const code = market.repayBorrowBehalf(self, initiator, repayAmount);
    if (code !== MarketError.NO_ERROR) this.failWithCode(LeverageError.RepayBehalfFailed, code);
    return repayAmount;
  }

  private redeemFor(self: Msg, initiator: Address, market: VToken, amount: bigint): void {
    const code = market.redeemUnderlyingBehalf(self, initiator, amount);
    if (code !== MarketError.NO_ERROR) this.failWithCode(LeverageError.RedeemBehalfFailed, code);
  }

  private requireRepayable(token: Erc20, owed: bigint): bigint {
    const available = token.balanceOf(this.address);
    if (available < owed) {
      this.fail(LeverageError.InsufficientFundsToRepayFlashloan, { available, owed });
    }
    return owed;
  }

  private async swap(
    self: Msg,
    tokenIn: Erc20,
    amountIn: bigint,
    tokenOut: Erc20,
    minAmountOut: bigint,
    swapData: Hex,
  ): Promise<bigint> {
    let received: bigint;
    try {
      received = await swapThroughConverter(self, this.converter, { tokenIn, amountIn, tokenOut, swapData });
    } catch (err) {
      this.fail(LeverageError.TokenSwapCallFailed, { reason: revertReason(err) });
    }
    if (received === 0n) this.fail(LeverageError.TokenSwapCallFailed, { reason: 'zero-output' });
    if (received < minAmountOut) {
      this.fail(LeverageError.SlippageExceeded, { expected: minAmountOut, actual: received });
    }
    return received;
  }

  // ---- shared checks ----

  private async flashLoan(msg: Msg, op: InFlightOperation, amount: bigint): Promise<void> {
    if (this.operation.get(msg.tx)) this.fail(LeverageError.OperationInProgress);
    this.operation.set(msg.tx, op);
    try {
      await this.comptroller.executeFlashLoan(
        callFrom(msg, this.address),
        op.initiator,
        this,
        [flashMarketOf(op).address],
        [amount],
        '0x',
      );
    } finally {
      this.operation.clear(msg.tx);
    }
  }

  private listedMarket(market: Address): VToken {
    if (market === zeroAddress) this.fail(LeverageError.ZeroAddress, { param: 'market' });
    const vToken = this.chain.contractAt(market, VToken);
    if (!vToken || vToken.comptroller !== this.comptroller || !this.comptroller.markets(market).isListed) {
      this.fail(LeverageError.MarketNotListed, { market });
    }
    if (market === this.nativeMarket) this.fail(LeverageError.VBNBNotSupported);
    return vToken;
  }

  private marketPair(collateralMarket: Address, borrowMarket: Address): [VToken, VToken] {
    const collateral = this.listedMarket(collateralMarket);
    const borrow = this.listedMarket(borrowMarket);
    if (collateral === borrow) this.fail(LeverageError.IdenticalMarkets);
    return [collateral, borrow];
  }

  private authorize(msg: Msg, options: LeverageCallOptions): Address {
    const initiator = options.onBehalfOf ?? msg.sender;
    if (initiator === zeroAddress) this.fail(LeverageError.ZeroAddress, { param: 'onBehalfOf' });
    if (initiator !== msg.sender && !this.comptroller.approvedDelegates(initiator, msg.sender)) {
      this.fail(LeverageError.NotAnApprovedDelegate, { account: initiator, delegate: msg.sender });
    }
    if (!this.comptroller.approvedDelegates(initiator, this.address)) {
      this.fail(LeverageError.NotAnApprovedDelegate, { account: initiator, delegate: this.address });
    }
    return initiator;
  }

  /** Accrues every touched and entered market, then requires zero shortfall. */
  private checkAccountSafe(self: Msg, initiator: Address, touched: VToken[]): void {
    const markets = new Map<Address, VToken>(touched.map((m) => [m.address, m]));
    for (const address of this.comptroller.getAssetsIn(initiator)) {
      const vToken = this.chain.contractAt(address, VToken);
      if (vToken) markets.set(address, vToken);
    }
    for (const market of markets.values()) {
      const code = market.accrueInterest(self);
      if (code !== MarketError.NO_ERROR) {
        this.fail(LeverageError.AccrueInterestFailed, { market: market.address, code });
      }
    }
    const { errorCode, shortfall } = this.comptroller.getAccountLiquidity(initiator);
    if (errorCode !== MarketError.NO_ERROR || shortfall > 0n) {
      this.fail(LeverageError.LeverageCausesLiquidation, { errorCode, shortfall });
    }
  }

  private sweepDust(self: Msg, token: Erc20, recipient: Address, initiator: Address): void {
    const amount = token.balanceOf(this.address);
    if (amount === 0n) return;
    token.transfer(self, recipient, amount);
    this.emit(self, 'DustTransferred', { recipient, asset: token.address, amount });
    counter.dustSwept.inc({ recipient: recipient === initiator ? 'initiator' : 'reserve' });
  }

  private async track(kind: OperationKind, run: () => Promise<Address>): Promise<void> {
    try {
      const initiator = await run();
      counter.leverageOps.inc({ kind, outcome: 'ok' });
      this.logger.info({ kind, initiator }, 'leverage-operation-completed');
    } catch (err) {
      counter.leverageOps.inc({ kind, outcome: 'reverted' });
      this.logger.warn({ kind, reason: revertReason(err) }, 'leverage-operation-reverted');
      throw err;
    }
  }

  private failWithCode(code: LeverageErrorCode, marketCode: MarketErrorCode): never {
    this.fail(code, { code: marketCode });
  }

  private fail(code: LeverageErrorCode, detail: RevertDetail = {}): never {
    this.revert(code, detail);
  }
}
