export const SentinelError = {
  ZeroAddress: 'ZeroAddress',
  TokenNotConfigured: 'TokenNotConfigured',
  UnauthorizedKeeper: 'UnauthorizedKeeper',
  TokenMonitoringDisabled: 'TokenMonitoringDisabled',
  ExceedsMaxDeviation: 'ExceedsMaxDeviation',
  InvalidPool: 'InvalidPool',
  UnsupportedDEX: 'UnsupportedDEX',
  InvalidMarket: 'InvalidMarket',
  InvalidOracle: 'InvalidOracle',
  Unauthorized: 'Unauthorized',
} as const;

export type SentinelErrorCode = (typeof SentinelError)[keyof typeof SentinelError];
