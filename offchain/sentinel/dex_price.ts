const Q192 = 1n << 192n;

/**
 * USD price of one raw unit of the asset, in the oracle's 1e36-based scale,
 * from a concentrated-liquidity pool's sqrtPriceX96 (raw token1 per raw token0).
 * Decimals need no extra adjustment: both sides are already per raw unit.
 */
export function priceFromSqrtPriceX96(sqrtPriceX96: bigint, assetIsToken0: boolean, referencePrice: bigint): bigint {
  const ratioX192 = sqrtPriceX96 * sqrtPriceX96;
  if (ratioX192 === 0n) return 0n;
  return assetIsToken0 ? (ratioX192 * referencePrice) / Q192 : (referencePrice * Q192) / ratioX192;
}

/** Same scale, from a reserve pair: referenceReserve / assetReserve × referencePrice. */
export function priceFromReserves(assetReserve: bigint, referenceReserve: bigint, referencePrice: bigint): bigint {
  if (assetReserve === 0n) return 0n;
  return (referenceReserve * referencePrice) / assetReserve;
}
