import type { Address, Hex } from 'viem';
import type { VToken } from '../market/vtoken';
import { bigintReplacer } from '../util/serialize';

type Base = {
  initiator: Address;
  collateral: VToken;
};

/** Operation recorded for the duration of one flash loan. */
export type InFlightOperation =
  | (Base & { kind: 'ENTER_SINGLE_ASSET'; seedAmount: bigint })
  | (Base & {
      kind: 'ENTER';
      borrow: VToken;
      collateralSeed: bigint;
      minAmountOut: bigint;
      swapData: Hex;
    })
  | (Base & {
      kind: 'ENTER_FROM_BORROW';
      borrow: VToken;
      borrowedSeed: bigint;
      minAmountOut: bigint;
      swapData: Hex;
    })
  | (Base & {
      kind: 'EXIT';
      borrow: VToken;
      collateralRedeemAmount: bigint;
      minAmountOut: bigint;
      swapData: Hex;
    })
  | (Base & { kind: 'EXIT_SINGLE_ASSET' });

export type OperationKind = InFlightOperation['kind'];

/** The market the flash loan is drawn from. */
export function flashMarketOf(op: InFlightOperation): VToken {
  switch (op.kind) {
    case 'ENTER_SINGLE_ASSET':
    case 'EXIT_SINGLE_ASSET':
      return op.collateral;
    case 'ENTER':
    case 'ENTER_FROM_BORROW':
    case 'EXIT':
      return op.borrow;
  }
}

export function assertNever(value: never): never {
  throw new Error(`unhandled operation: ${JSON.stringify(value, bigintReplacer)}`);
}
