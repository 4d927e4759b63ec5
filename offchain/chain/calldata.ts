import type { Hex } from 'viem';
import type { AnyContract } from './chain';
import type { Msg } from './context';
import { Contract } from './contract';

/** A contract reachable through raw ABI-encoded calldata. */
export abstract class CalldataContract<S extends object> extends Contract<S> {
  abstract call(msg: Msg, data: Hex): Promise<void>;
}

export function isCalldataContract(contract: AnyContract): contract is CalldataContract<object> {
  return contract instanceof CalldataContract;
}
