import { EXP_SCALE, mulExp } from '../util/math';

export type JumpRateParams = {
  baseRatePerSecond: bigint;
  multiplierPerSecond: bigint;
  jumpMultiplierPerSecond: bigint;
  kinkMantissa: bigint;
};

export const ZERO_RATE: JumpRateParams = {
  baseRatePerSecond: 0n,
  multiplierPerSecond: 0n,
  jumpMultiplierPerSecond: 0n,
  kinkMantissa: EXP_SCALE,
};

export function utilizationRate(cash: bigint, borrows: bigint, reserves: bigint): bigint {
  if (borrows === 0n) return 0n;
  const supplied = cash + borrows - reserves;
  if (supplied <= 0n) return EXP_SCALE;
  return (borrows * EXP_SCALE) / supplied;
}

export class JumpRateModel {
  constructor(readonly params: JumpRateParams) {}

  getBorrowRate(cash: bigint, borrows: bigint, reserves: bigint): bigint {
    const { baseRatePerSecond, multiplierPerSecond, jumpMultiplierPerSecond, kinkMantissa } = this.params;
    const util = utilizationRate(cash, borrows, reserves);
    if (util <= kinkMantissa) {
      return mulExp(util, multiplierPerSecond) + baseRatePerSecond;
    }
    const normalRate = mulExp(kinkMantissa, multiplierPerSecond) + baseRatePerSecond;
    return mulExp(util - kinkMantissa, jumpMultiplierPerSecond) + normalRate;
  }
}

export const SECONDS_PER_YEAR = 31_536_000n;

/** Builds per-second parameters from annualized mantissas. */
export function fromAnnualRates(annual: {
  baseRatePerYear: bigint;
  multiplierPerYear: bigint;
  jumpMultiplierPerYear: bigint;
  kink: bigint;
}): JumpRateParams {
  return {
    baseRatePerSecond: annual.baseRatePerYear / SECONDS_PER_YEAR,
    multiplierPerSecond: annual.multiplierPerYear / SECONDS_PER_YEAR,
    jumpMultiplierPerSecond: annual.jumpMultiplierPerYear / SECONDS_PER_YEAR,
    kinkMantissa: annual.kink,
  };
}
