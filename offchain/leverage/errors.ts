export const LeverageError = {
  ZeroAddress: 'ZeroAddress',
  ZeroFlashLoanAmount: 'ZeroFlashLoanAmount',
  MarketNotListed: 'MarketNotListed',
  VBNBNotSupported: 'VBNBNotSupported',
  NotAnApprovedDelegate: 'NotAnApprovedDelegate',
  IdenticalMarkets: 'IdenticalMarkets',
  TokenSwapCallFailed: 'TokenSwapCallFailed',
  SlippageExceeded: 'SlippageExceeded',
  InsufficientFundsToRepayFlashloan: 'InsufficientFundsToRepayFlashloan',
  MintBehalfFailed: 'MintBehalfFailed',
  BorrowBehalfFailed: 'BorrowBehalfFailed',
  RepayBehalfFailed: 'RepayBehalfFailed',
  RedeemBehalfFailed: 'RedeemBehalfFailed',
  AccrueInterestFailed: 'AccrueInterestFailed',
  EnterMarketFailed: 'EnterMarketFailed',
  LeverageCausesLiquidation: 'LeverageCausesLiquidation',
  UnauthorizedExecutor: 'UnauthorizedExecutor',
  InitiatorMismatch: 'InitiatorMismatch',
  OnBehalfMismatch: 'OnBehalfMismatch',
  FlashLoanAssetOrAmountMismatch: 'FlashLoanAssetOrAmountMismatch',
  InvalidExecuteOperation: 'InvalidExecuteOperation',
  OperationInProgress: 'OperationInProgress',
} as const;

export type LeverageErrorCode = (typeof LeverageError)[keyof typeof LeverageError];
