import { Address, maxUint256 } from 'viem';
import { Contract } from '../chain/contract';
import { Msg, callFrom } from '../chain/context';
import type { Erc20 } from '../chain/erc20';
import { EXP_SCALE, ceilDiv, divExp, mulExp } from '../util/math';
import type { Comptroller } from './comptroller';
import type { JumpRateModel } from './interest_rate';
import { MarketError, MarketErrorCode } from './types';

/** Upper bound on the per-second borrow rate; accrual fails above it. */
export const MAX_BORROW_RATE_PER_SECOND = 5_000_000_000_000n;

type BorrowSnapshot = {
  principal: bigint;
  interestIndex: bigint;
};

type VTokenState = {
  totalSupply: bigint;
  accountTokens: Map<Address, bigint>;
  accountBorrows: Map<Address, BorrowSnapshot>;
  totalBorrows: bigint;
  totalReserves: bigint;
  borrowIndex: bigint;
  accrualTimestamp: bigint;
  reserveFactorMantissa: bigint;
  flashLoanEnabled: boolean;
  flashLoanFeeMantissa: bigint;
  flashLoanProtocolShareMantissa: bigint;
  flashLoanOutstanding: bigint;
};

export type VTokenParams = {
  symbol: string;
  underlying: Erc20;
  comptroller: Comptroller;
  rateModel: JumpRateModel;
  protocolShareReserve: Address;
  accrualTimestamp: bigint;
  initialExchangeRateMantissa?: bigint;
  reserveFactorMantissa?: bigint;
  flashLoanEnabled?: boolean;
  flashLoanFeeMantissa?: bigint;
  flashLoanProtocolShareMantissa?: bigint;
};

/**
 * Interest-bearing market over one underlying token. Balances are vTokens;
 * `exchangeRateStored` converts them to underlying at 1e18 precision.
 */
export class VToken extends Contract<VTokenState> {
  readonly contractName = 'VToken';
  readonly symbol: string;
  readonly underlying: Erc20;
  readonly comptroller: Comptroller;
  readonly protocolShareReserve: Address;
  private readonly rateModel: JumpRateModel;
  private readonly initialExchangeRateMantissa: bigint;

  constructor(address: Address, params: VTokenParams) {
    super(address, {
      totalSupply: 0n,
      accountTokens: new Map(),
      accountBorrows: new Map(),
      totalBorrows: 0n,
      totalReserves: 0n,
      borrowIndex: EXP_SCALE,
      accrualTimestamp: params.accrualTimestamp,
      reserveFactorMantissa: params.reserveFactorMantissa ?? 0n,
      flashLoanEnabled: params.flashLoanEnabled ?? true,
      flashLoanFeeMantissa: params.flashLoanFeeMantissa ?? 0n,
      flashLoanProtocolShareMantissa: params.flashLoanProtocolShareMantissa ?? 0n,
      flashLoanOutstanding: 0n,
    });
    this.symbol = params.symbol;
    this.underlying = params.underlying;
    this.comptroller = params.comptroller;
    this.protocolShareReserve = params.protocolShareReserve;
    this.rateModel = params.rateModel;
    this.initialExchangeRateMantissa = params.initialExchangeRateMantissa ?? EXP_SCALE;
  }

  // ---- views ----

  balanceOf(account: Address): bigint {
    return this.state.accountTokens.get(account) ?? 0n;
  }

  totalSupply(): bigint {
    return this.state.totalSupply;
  }

  totalBorrows(): bigint {
    return this.state.totalBorrows;
  }

  totalReserves(): bigint {
    return this.state.totalReserves;
  }

  borrowIndex(): bigint {
    return this.state.borrowIndex;
  }

  accrualTimestamp(): bigint {
    return this.state.accrualTimestamp;
  }

  /** Underlying held by the market, excluding flash-loaned funds that are out. */
  getCash(): bigint {
    return this.underlying.balanceOf(this.address);
  }

  flashLoanFeeMantissa(): bigint {
    return this.state.flashLoanFeeMantissa;
  }

  flashLoanProtocolShareMantissa(): bigint {
    return this.state.flashLoanProtocolShareMantissa;
  }

  isFlashLoanEnabled(): boolean {
    return this.state.flashLoanEnabled;
  }

  exchangeRateStored(): bigint {
    if (this.state.totalSupply === 0n) return this.initialExchangeRateMantissa;
    const backing = this.accountingCash() + this.state.totalBorrows - this.state.totalReserves;
    return divExp(backing, this.state.totalSupply);
  }

  borrowBalanceStored(account: Address): bigint {
    const snapshot = this.state.accountBorrows.get(account);
    if (!snapshot || snapshot.principal === 0n) return 0n;
    return (snapshot.principal * this.state.borrowIndex) / snapshot.interestIndex;
  }

  // ---- interest ----

  accrueInterest(msg: Msg): MarketErrorCode {
    const now = msg.tx.timestamp;
    const prior = this.state.accrualTimestamp;
    if (now <= prior) return MarketError.NO_ERROR;

    const { totalBorrows, totalReserves, borrowIndex } = this.state;
    const borrowRate = this.rateModel.getBorrowRate(this.accountingCash(), totalBorrows, totalReserves);
    if (borrowRate > MAX_BORROW_RATE_PER_SECOND) return MarketError.BORROW_RATE_TOO_HIGH;

    const interestFactor = borrowRate * (now - prior);
    const interestAccumulated = mulExp(interestFactor, totalBorrows);
    this.state.totalBorrows = totalBorrows + interestAccumulated;
    this.state.totalReserves = totalReserves + mulExp(this.state.reserveFactorMantissa, interestAccumulated);
    this.state.borrowIndex = borrowIndex + mulExp(interestFactor, borrowIndex);
    this.state.accrualTimestamp = now;
    this.emit(msg, 'AccrueInterest', {
      interestAccumulated,
      borrowIndex: this.state.borrowIndex,
      totalBorrows: this.state.totalBorrows,
    });
    return MarketError.NO_ERROR;
  }

  borrowBalanceCurrent(msg: Msg, account: Address): bigint {
    const code = this.accrueInterest(msg);
    if (code !== MarketError.NO_ERROR) this.revert('AccrueInterestFailed', { code });
    return this.borrowBalanceStored(account);
  }

  balanceOfUnderlying(msg: Msg, account: Address): bigint {
    const code = this.accrueInterest(msg);
    if (code !== MarketError.NO_ERROR) this.revert('AccrueInterestFailed', { code });
    return mulExp(this.exchangeRateStored(), this.balanceOf(account));
  }

  // ---- user operations ----

  mint(msg: Msg, amount: bigint): MarketErrorCode {
    return this.mintFresh(msg, msg.sender, amount);
  }

  /** Supplies the caller's underlying and credits the vTokens to `receiver`. */
  mintBehalf(msg: Msg, receiver: Address, amount: bigint): MarketErrorCode {
    return this.mintFresh(msg, receiver, amount);
  }

  redeem(msg: Msg, redeemTokens: bigint): MarketErrorCode {
    return this.redeemFresh(msg, msg.sender, msg.sender, redeemTokens, 0n);
  }

  redeemUnderlying(msg: Msg, amount: bigint): MarketErrorCode {
    return this.redeemFresh(msg, msg.sender, msg.sender, 0n, amount);
  }

  /** Redeems `redeemer`'s collateral and pays the underlying to the caller, an approved delegate. */
  redeemUnderlyingBehalf(msg: Msg, redeemer: Address, amount: bigint): MarketErrorCode {
    this.requireDelegate(redeemer, msg.sender);
    return this.redeemFresh(msg, redeemer, msg.sender, 0n, amount);
  }

  borrow(msg: Msg, amount: bigint): MarketErrorCode {
    return this.borrowFresh(msg, msg.sender, msg.sender, amount);
  }

  /** Books the debt on `borrower` and pays the underlying to the caller, an approved delegate. */
  borrowBehalf(msg: Msg, borrower: Address, amount: bigint): MarketErrorCode {
    this.requireDelegate(borrower, msg.sender);
    return this.borrowFresh(msg, borrower, msg.sender, amount);
  }

  repayBorrow(msg: Msg, amount: bigint): MarketErrorCode {
    return this.repayFresh(msg, msg.sender, amount);
  }

  /** Repays `borrower`'s debt from the caller's underlying. `maxUint256` repays it all. */
  repayBorrowBehalf(msg: Msg, borrower: Address, amount: bigint): MarketErrorCode {
    return this.repayFresh(msg, borrower, amount);
  }

  /** Moves `seizeTokens` of `borrower`'s vTokens to `liquidator`. Only another listed market may call it. */
  seize(msg: Msg, liquidator: Address, borrower: Address, seizeTokens: bigint): MarketErrorCode {
    const allowed = this.comptroller.seizeAllowed(this.address, msg.sender, liquidator, borrower);
    if (allowed !== MarketError.NO_ERROR) return allowed;
    const balance = this.balanceOf(borrower);
    if (balance < seizeTokens) return MarketError.INSUFFICIENT_BALANCE;

    this.state.accountTokens.set(borrower, balance - seizeTokens);
    this.state.accountTokens.set(liquidator, this.balanceOf(liquidator) + seizeTokens);
    this.emit(msg, 'Transfer', { from: borrower, to: liquidator, value: seizeTokens });
    return MarketError.NO_ERROR;
  }

  // ---- governance ----

  setReserveFactor(msg: Msg, reserveFactorMantissa: bigint): void {
    this.onlyAllowed(msg, 'setReserveFactor');
    if (reserveFactorMantissa > EXP_SCALE) this.revert('InvalidReserveFactor');
    this.state.reserveFactorMantissa = reserveFactorMantissa;
    this.emit(msg, 'NewReserveFactor', { reserveFactorMantissa });
  }

  setFlashLoanEnabled(msg: Msg, enabled: boolean): void {
    this.onlyAllowed(msg, 'setFlashLoanEnabled');
    this.state.flashLoanEnabled = enabled;
    this.emit(msg, 'FlashLoanStatusChanged', { enabled });
  }

  setFlashLoanFeeMantissa(msg: Msg, feeMantissa: bigint, protocolShareMantissa: bigint): void {
    this.onlyAllowed(msg, 'setFlashLoanFeeMantissa');
    if (feeMantissa > EXP_SCALE || protocolShareMantissa > EXP_SCALE) this.revert('InvalidFlashLoanFee');
    this.state.flashLoanFeeMantissa = feeMantissa;
    this.state.flashLoanProtocolShareMantissa = protocolShareMantissa;
    this.emit(msg, 'FlashLoanFeeUpdated', { feeMantissa, protocolShareMantissa });
  }

  // ---- flash loans (comptroller only) ----

  flashLoanPremium(amount: bigint): bigint {
    return mulExp(amount, this.state.flashLoanFeeMantissa);
  }

  transferOutForFlashLoan(msg: Msg, receiver: Address, amount: bigint): void {
    this.onlyComptroller(msg);
    if (!this.state.flashLoanEnabled) this.revert('FlashLoanNotEnabled');
    if (this.getCash() < amount) this.revert('InsufficientCash', { cash: this.getCash(), amount });
    this.state.flashLoanOutstanding += amount;
    this.underlying.transfer(callFrom(msg, this.address), receiver, amount);
  }

  /**
   * Pulls up to principal plus premium from `receiver`. The premium must be
   * covered; any unpaid principal becomes `onBehalf`'s debt.
   */
  settleFlashLoan(
    msg: Msg,
    receiver: Address,
    onBehalf: Address,
    amount: bigint,
    premium: bigint,
    repayAmount: bigint,
  ): void {
    this.onlyComptroller(msg);
    const self = callFrom(msg, this.address);
    const owed = amount + premium;
    const pulled = repayAmount < owed ? repayAmount : owed;
    if (pulled < premium) this.revert('InsufficientFlashLoanRepayment', { pulled, premium });

    this.underlying.transferFrom(self, receiver, this.address, pulled);
    this.state.flashLoanOutstanding -= amount;

    const accrued = this.accrueInterest(msg);
    if (accrued !== MarketError.NO_ERROR) this.revert('AccrueInterestFailed', { code: accrued });

    const unpaid = owed - pulled;
    if (unpaid > 0n) {
      this.requireDelegate(onBehalf, receiver);
      const allowed = this.comptroller.borrowAllowed(self, this.address, onBehalf, unpaid);
      if (allowed !== MarketError.NO_ERROR) this.revert('FlashLoanDebtRejected', { code: allowed });
      const debt = this.borrowBalanceStored(onBehalf);
      this.state.accountBorrows.set(onBehalf, { principal: debt + unpaid, interestIndex: this.state.borrowIndex });
      this.state.totalBorrows += unpaid;
    }

    const protocolShare = mulExp(premium, this.state.flashLoanProtocolShareMantissa);
    if (protocolShare > 0n) {
      this.underlying.transfer(self, this.protocolShareReserve, protocolShare);
    }
    this.state.totalReserves += premium - protocolShare;
    this.emit(msg, 'FlashLoanRepaid', { receiver, onBehalf, amount, premium, repaid: pulled, debtCreated: unpaid });
  }

  // ---- internals ----

  private accountingCash(): bigint {
    return this.getCash() + this.state.flashLoanOutstanding;
  }

  private mintFresh(msg: Msg, receiver: Address, amount: bigint): MarketErrorCode {
    const accrued = this.accrueInterest(msg);
    if (accrued !== MarketError.NO_ERROR) return accrued;
    const allowed = this.comptroller.mintAllowed(this.address, receiver, amount);
    if (allowed !== MarketError.NO_ERROR) return allowed;

    const exchangeRate = this.exchangeRateStored();
    this.underlying.transferFrom(callFrom(msg, this.address), msg.sender, this.address, amount);
    const mintTokens = divExp(amount, exchangeRate);
    this.state.totalSupply += mintTokens;
    this.state.accountTokens.set(receiver, this.balanceOf(receiver) + mintTokens);
    this.emit(msg, 'Mint', { payer: msg.sender, receiver, mintAmount: amount, mintTokens });
    return MarketError.NO_ERROR;
  }

  private redeemFresh(
    msg: Msg,
    redeemer: Address,
    receiver: Address,
    redeemTokensIn: bigint,
    redeemAmountIn: bigint,
  ): MarketErrorCode {
    const accrued = this.accrueInterest(msg);
    if (accrued !== MarketError.NO_ERROR) return accrued;

    const exchangeRate = this.exchangeRateStored();
    const redeemTokens = redeemTokensIn > 0n ? redeemTokensIn : ceilDiv(redeemAmountIn * EXP_SCALE, exchangeRate);
    const redeemAmount = redeemTokensIn > 0n ? mulExp(exchangeRate, redeemTokensIn) : redeemAmountIn;

    const allowed = this.comptroller.redeemAllowed(this.address, redeemer, redeemTokens);
    if (allowed !== MarketError.NO_ERROR) return allowed;
    const balance = this.balanceOf(redeemer);
    if (balance < redeemTokens) return MarketError.INSUFFICIENT_BALANCE;
    if (this.getCash() < redeemAmount) return MarketError.INSUFFICIENT_CASH;

    this.state.totalSupply -= redeemTokens;
    this.state.accountTokens.set(redeemer, balance - redeemTokens);
    this.underlying.transfer(callFrom(msg, this.address), receiver, redeemAmount);
    this.emit(msg, 'Redeem', { redeemer, receiver, redeemAmount, redeemTokens });
    return MarketError.NO_ERROR;
  }

  private borrowFresh(msg: Msg, borrower: Address, receiver: Address, amount: bigint): MarketErrorCode {
    const accrued = this.accrueInterest(msg);
    if (accrued !== MarketError.NO_ERROR) return accrued;
    const allowed = this.comptroller.borrowAllowed(callFrom(msg, this.address), this.address, borrower, amount);
    if (allowed !== MarketError.NO_ERROR) return allowed;
    if (this.getCash() < amount) return MarketError.INSUFFICIENT_CASH;

    const debt = this.borrowBalanceStored(borrower);
    this.state.accountBorrows.set(borrower, { principal: debt + amount, interestIndex: this.state.borrowIndex });
    this.state.totalBorrows += amount;
    this.underlying.transfer(callFrom(msg, this.address), receiver, amount);
    this.emit(msg, 'Borrow', { borrower, receiver, borrowAmount: amount, accountBorrows: debt + amount });
    return MarketError.NO_ERROR;
  }

  private repayFresh(msg: Msg, borrower: Address, amount: bigint): MarketErrorCode {
    const accrued = this.accrueInterest(msg);
    if (accrued !== MarketError.NO_ERROR) return accrued;
    const allowed = this.comptroller.repayAllowed(this.address);
    if (allowed !== MarketError.NO_ERROR) return allowed;

    const debt = this.borrowBalanceStored(borrower);
    const repayAmount = amount === maxUint256 ? debt : amount;
    if (repayAmount > debt) return MarketError.REPAY_EXCEEDS_DEBT;

    this.underlying.transferFrom(callFrom(msg, this.address), msg.sender, this.address, repayAmount);
    this.state.accountBorrows.set(borrower, { principal: debt - repayAmount, interestIndex: this.state.borrowIndex });
    this.state.totalBorrows = this.state.totalBorrows > repayAmount ? this.state.totalBorrows - repayAmount : 0n;
    this.emit(msg, 'RepayBorrow', { payer: msg.sender, borrower, repayAmount, accountBorrows: debt - repayAmount });
    return MarketError.NO_ERROR;
  }

  private requireDelegate(account: Address, delegate: Address): void {
    if (account !== delegate && !this.comptroller.approvedDelegates(account, delegate)) {
      this.revert('NotAnApprovedDelegate', { account, delegate });
    }
  }

  private onlyComptroller(msg: Msg): void {
    if (msg.sender !== this.comptroller.address) this.revert('OnlyComptroller', { sender: msg.sender });
  }

  private onlyAllowed(msg: Msg, fn: string): void {
    if (!this.comptroller.accessControl.isAllowedToCall(msg.sender, this.address, fn)) {
      this.revert('Unauthorized', { sender: msg.sender, fn });
    }
  }
}
