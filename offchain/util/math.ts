export const EXP_SCALE = 10n ** 18n;

export function ceilDiv(a: bigint, b: bigint): bigint {
  if (b === 0n) throw new Error('division by zero');
  return (a + b - 1n) / b;
}

/** a * b / 1e18, truncated */
export function mulExp(a: bigint, b: bigint): bigint {
  return (a * b) / EXP_SCALE;
}

/** a * 1e18 / b, truncated */
export function divExp(a: bigint, b: bigint): bigint {
  return (a * EXP_SCALE) / b;
}

export function minBigInt(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

export function absDiff(a: bigint, b: bigint): bigint {
  return a > b ? a - b : b - a;
}

/** floor(sqrt(n)) */
export function sqrtBigInt(n: bigint): bigint {
  if (n < 0n) throw new Error('square root of negative value');
  if (n < 2n) return n;
  let x = n;
  let y = (x + 1n) / 2n;
  while (y < x) {
    x = y;
    y = (x + n / x) / 2n;
  }
  return x;
}
