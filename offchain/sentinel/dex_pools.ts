import type { Address } from 'viem';
import type { Chain } from '../chain/chain';
import { Contract } from '../chain/contract';
import type { Msg } from '../chain/context';
import type { RevertDetail } from '../chain/errors';
import { priceFromReserves, priceFromSqrtPriceX96 } from './dex_price';

export const DexKind = {
  UNISWAP_V3: 0,
  PANCAKESWAP_V3: 1,
  PANCAKESWAP_V2: 2,
} as const;
export type DexKind = (typeof DexKind)[keyof typeof DexKind];

export const DEX_KIND_NAMES = ['uniswap_v3', 'pancakeswap_v3', 'pancakeswap_v2'] as const;
export type DexKindName = (typeof DEX_KIND_NAMES)[number];

export const DEX_KIND_BY_NAME: Record<DexKindName, DexKind> = {
  uniswap_v3: DexKind.UNISWAP_V3,
  pancakeswap_v3: DexKind.PANCAKESWAP_V3,
  pancakeswap_v2: DexKind.PANCAKESWAP_V2,
};

export type ConcentratedLiquidityKind = typeof DexKind.UNISWAP_V3 | typeof DexKind.PANCAKESWAP_V3;

export function isConcentratedLiquidityKind(dex: number): dex is ConcentratedLiquidityKind {
  return dex === DexKind.UNISWAP_V3 || dex === DexKind.PANCAKESWAP_V3;
}

type V3PoolState = {
  sqrtPriceX96: bigint;
};

/** Concentrated-liquidity pool; only the price slot is modelled. */
export class ConcentratedLiquidityPool extends Contract<V3PoolState> {
  readonly contractName = 'ConcentratedLiquidityPool';

  constructor(
    address: Address,
    readonly token0: Address,
    readonly token1: Address,
    readonly fee: number,
    sqrtPriceX96: bigint,
  ) {
    super(address, { sqrtPriceX96 });
  }

  slot0(): { sqrtPriceX96: bigint } {
    return { sqrtPriceX96: this.state.sqrtPriceX96 };
  }

  /** Moves the pool price, standing in for trading activity. */
  setSqrtPriceX96(msg: Msg, sqrtPriceX96: bigint): void {
    this.state.sqrtPriceX96 = sqrtPriceX96;
    this.emit(msg, 'PriceMoved', { sqrtPriceX96 });
  }
}

type PairState = {
  reserve0: bigint;
  reserve1: bigint;
};

export class ReservePair extends Contract<PairState> {
  readonly contractName = 'ReservePair';

  constructor(
    address: Address,
    readonly token0: Address,
    readonly token1: Address,
    reserve0: bigint,
    reserve1: bigint,
  ) {
    super(address, { reserve0, reserve1 });
  }

  getReserves(): { reserve0: bigint; reserve1: bigint } {
    return { reserve0: this.state.reserve0, reserve1: this.state.reserve1 };
  }

  sync(msg: Msg, reserve0: bigint, reserve1: bigint): void {
    this.state.reserve0 = reserve0;
    this.state.reserve1 = reserve1;
    this.emit(msg, 'Sync', { reserve0, reserve1 });
  }
}

export type DexQuote =
  | { ok: true; price: bigint; referenceToken: Address }
  | { ok: false; reason: 'InvalidPool' | 'UnsupportedDEX'; detail: RevertDetail };

function otherToken(pool: { token0: Address; token1: Address }, asset: Address): { assetIsToken0: boolean; reference: Address } | null {
  if (asset === pool.token0) return { assetIsToken0: true, reference: pool.token1 };
  if (asset === pool.token1) return { assetIsToken0: false, reference: pool.token0 };
  return null;
}

/**
 * Prices `asset` off a DEX pool against the pool's other token, whose USD
 * price comes from `referencePriceOf`.
 */
export function quoteDexPrice(
  chain: Chain,
  dex: number,
  poolAddress: Address,
  asset: Address,
  referencePriceOf: (token: Address) => bigint,
): DexQuote {
  switch (dex) {
    case DexKind.UNISWAP_V3:
    case DexKind.PANCAKESWAP_V3: {
      const pool = chain.contractAt(poolAddress, ConcentratedLiquidityPool);
      const side = pool ? otherToken(pool, asset) : null;
      if (!pool || !side) return { ok: false, reason: 'InvalidPool', detail: { pool: poolAddress, asset } };
      const price = priceFromSqrtPriceX96(pool.slot0().sqrtPriceX96, side.assetIsToken0, referencePriceOf(side.reference));
      return { ok: true, price, referenceToken: side.reference };
    }
    case DexKind.PANCAKESWAP_V2: {
      const pair = chain.contractAt(poolAddress, ReservePair);
      const side = pair ? otherToken(pair, asset) : null;
      if (!pair || !side) return { ok: false, reason: 'InvalidPool', detail: { pool: poolAddress, asset } };
      const { reserve0, reserve1 } = pair.getReserves();
      const [assetReserve, referenceReserve] = side.assetIsToken0 ? [reserve0, reserve1] : [reserve1, reserve0];
      const price = priceFromReserves(assetReserve, referenceReserve, referencePriceOf(side.reference));
      return { ok: true, price, referenceToken: side.reference };
    }
    default:
      return { ok: false, reason: 'UnsupportedDEX', detail: { dex } };
  }
}
