import { maxUint256 } from 'viem';
import { absDiff } from '../util/math';

export type DeviationResult = {
  hasDeviation: boolean;
  oraclePrice: bigint;
  dexPrice: bigint;
  deviationPercent: bigint;
};

/**
 * Integer percent distance of `dexPrice` from `oraclePrice`. A zero oracle
 * price is reported as the maximum deviation.
 */
export function computeDeviation(oraclePrice: bigint, dexPrice: bigint, maxDeviationPercent: number): DeviationResult {
  if (oraclePrice === 0n) {
    return { hasDeviation: true, oraclePrice, dexPrice, deviationPercent: maxUint256 };
  }
  const deviationPercent = (absDiff(dexPrice, oraclePrice) * 100n) / oraclePrice;
  return {
    hasDeviation: deviationPercent > BigInt(maxDeviationPercent),
    oraclePrice,
    dexPrice,
    deviationPercent,
  };
}
