import { Address, Hex, LocalAccount, encodeFunctionData, keccak256, toHex } from 'viem';
import { MULTICALL_TYPES, fixedRateExchangeAbi, multicallDomain, swapHelperAbi } from './abi';

export function encodeSweep(token: Address, to: Address): Hex {
  return encodeFunctionData({ abi: swapHelperAbi, functionName: 'sweep', args: [token, to] });
}

export function encodeApproveMax(token: Address, spender: Address): Hex {
  return encodeFunctionData({ abi: swapHelperAbi, functionName: 'approveMax', args: [token, spender] });
}

/** Wraps `amount` of the native coin the helper holds. */
export function encodeWrap(amount: bigint): Hex {
  return encodeFunctionData({ abi: swapHelperAbi, functionName: 'wrap', args: [amount] });
}

export function encodeGenericCall(target: Address, data: Hex): Hex {
  return encodeFunctionData({ abi: swapHelperAbi, functionName: 'genericCall', args: [target, data] });
}

export function encodeExchangeSwap(
  tokenIn: Address,
  tokenOut: Address,
  amountIn: bigint,
  minAmountOut: bigint,
  recipient: Address,
): Hex {
  return encodeFunctionData({
    abi: fixedRateExchangeAbi,
    functionName: 'swap',
    args: [tokenIn, tokenOut, amountIn, minAmountOut, recipient],
  });
}

export function saltFor(label: string): Hex {
  return keccak256(toHex(label));
}

export type MulticallRequest = {
  helper: Address;
  chainId: number;
  calls: Hex[];
  deadline: bigint;
  salt: Hex;
  /** Unsigned when omitted. */
  signer?: LocalAccount;
};

/** Calldata for `SwapHelper.multicall`, signed by `signer` when given. */
export async function buildMulticall(request: MulticallRequest): Promise<Hex> {
  const { helper, chainId, calls, deadline, salt, signer } = request;
  let signature: Hex = '0x';
  if (signer) {
    signature = await signer.signTypedData({
      domain: multicallDomain(chainId, helper),
      types: MULTICALL_TYPES,
      primaryType: 'Multicall',
      message: { calls, deadline, salt },
    });
  }
  return encodeFunctionData({
    abi: swapHelperAbi,
    functionName: 'multicall',
    args: [calls, deadline, salt, signature],
  });
}

/**
 * The usual leverage swap: approve the venue, swap all of `amountIn`, and
 * sweep the output back to `recipient`.
 */
export function exchangeSwapCalls(params: {
  helper: Address;
  exchange: Address;
  tokenIn: Address;
  tokenOut: Address;
  amountIn: bigint;
  recipient: Address;
}): Hex[] {
  const { helper, exchange, tokenIn, tokenOut, amountIn, recipient } = params;
  return [
    encodeApproveMax(tokenIn, exchange),
    encodeGenericCall(exchange, encodeExchangeSwap(tokenIn, tokenOut, amountIn, 0n, helper)),
    encodeSweep(tokenOut, recipient),
  ];
}
