import type { Address, Hex } from 'viem';
import type { Msg } from '../chain/context';

export const Action = {
  MINT: 0,
  REDEEM: 1,
  BORROW: 2,
  REPAY: 3,
  SEIZE: 4,
  LIQUIDATE: 5,
  TRANSFER: 6,
  ENTER_MARKET: 7,
  EXIT_MARKET: 8,
} as const;
export type Action = (typeof Action)[keyof typeof Action];

/** Non-zero codes are returned, not thrown, the way the lending market reports recoverable failures. */
export const MarketError = {
  NO_ERROR: 0,
  UNAUTHORIZED: 1,
  MARKET_NOT_LISTED: 2,
  ACTION_PAUSED: 3,
  INSUFFICIENT_LIQUIDITY: 4,
  PRICE_ERROR: 5,
  SUPPLY_CAP_REACHED: 6,
  BORROW_CAP_REACHED: 7,
  INSUFFICIENT_CASH: 8,
  REPAY_EXCEEDS_DEBT: 9,
  INSUFFICIENT_BALANCE: 10,
  BORROW_RATE_TOO_HIGH: 11,
  BORROW_NOT_ALLOWED: 12,
  NONZERO_BORROW_BALANCE: 13,
  LIQUIDATOR_IS_BORROWER: 14,
} as const;
export type MarketErrorCode = (typeof MarketError)[keyof typeof MarketError];

export type PoolModel = 'core' | 'isolated';

export const CORE_POOL_ID = 0;

export type PoolMarket = {
  isListed: boolean;
  isBorrowAllowed: boolean;
  collateralFactorMantissa: bigint;
  liquidationThresholdMantissa: bigint;
};

export const UNLISTED: PoolMarket = {
  isListed: false,
  isBorrowAllowed: false,
  collateralFactorMantissa: 0n,
  liquidationThresholdMantissa: 0n,
};

export type AccountLiquidity = {
  errorCode: MarketErrorCode;
  liquidity: bigint;
  shortfall: bigint;
};

export type FlashLoanCallback = {
  assets: readonly Address[];
  amounts: readonly bigint[];
  premiums: readonly bigint[];
  initiator: Address;
  onBehalf: Address;
  data: Hex;
};

export type FlashLoanResult = {
  success: boolean;
  repayAmounts: readonly bigint[];
};

export interface FlashLoanReceiver {
  readonly address: Address;
  executeOperation(msg: Msg, params: FlashLoanCallback): Promise<FlashLoanResult>;
}
