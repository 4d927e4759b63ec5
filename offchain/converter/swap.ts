import type { Hex } from 'viem';
import type { CalldataContract } from '../chain/calldata';
import type { Msg } from '../chain/context';
import type { Erc20 } from '../chain/erc20';

export type SwapLeg = {
  tokenIn: Erc20;
  amountIn: bigint;
  tokenOut: Erc20;
  swapData: Hex;
};

/**
 * Hands `amountIn` to the converter and runs `swapData` in one call frame.
 * Returns the `tokenOut` the caller (`self.sender`) gained. A failing batch
 * rolls its frame back and rethrows.
 */
export async function swapThroughConverter(
  self: Msg,
  converter: CalldataContract<object>,
  leg: SwapLeg,
): Promise<bigint> {
  const { tokenIn, amountIn, tokenOut, swapData } = leg;
  const before = tokenOut.balanceOf(self.sender);
  await self.tx.subcall(async () => {
    tokenIn.transfer(self, converter.address, amountIn);
    await converter.call(self, swapData);
  });
  const after = tokenOut.balanceOf(self.sender);
  return after > before ? after - before : 0n;
}
