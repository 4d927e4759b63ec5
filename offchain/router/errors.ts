export const SwapRouterError = {
  ZeroAddress: 'ZeroAddress',
  ZeroAmount: 'ZeroAmount',
  MarketNotListed: 'MarketNotListed',
  InvalidToken: 'InvalidToken',
  InsufficientBalance: 'InsufficientBalance',
  InsufficientAmountOut: 'InsufficientAmountOut',
  SwapFailed: 'SwapFailed',
  SupplyFailed: 'SupplyFailed',
  RepayFailed: 'RepayFailed',
  Unauthorized: 'Unauthorized',
} as const;

export type SwapRouterErrorCode = (typeof SwapRouterError)[keyof typeof SwapRouterError];

export const PositionSwapperError = {
  ZeroAddress: 'ZeroAddress',
  ZeroAmount: 'ZeroAmount',
  Unauthorized: 'Unauthorized',
  MarketNotListed: 'MarketNotListed',
  IdenticalMarkets: 'IdenticalMarkets',
  InvalidToken: 'InvalidToken',
  PairNotApproved: 'PairNotApproved',
  NoVTokenBalance: 'NoVTokenBalance',
  NoBorrowBalance: 'NoBorrowBalance',
  SeizeFailed: 'SeizeFailed',
  RedeemFailed: 'RedeemFailed',
  MintFailed: 'MintFailed',
  BorrowFailed: 'BorrowFailed',
  RepayFailed: 'RepayFailed',
  EnterMarketFailed: 'EnterMarketFailed',
  SwapFailed: 'SwapFailed',
  InsufficientAmountOut: 'InsufficientAmountOut',
  SwapCausesLiquidation: 'SwapCausesLiquidation',
} as const;

export type PositionSwapperErrorCode = (typeof PositionSwapperError)[keyof typeof PositionSwapperError];
