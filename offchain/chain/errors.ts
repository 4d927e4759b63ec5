import { serializeError } from '../util/serialize';

export type RevertDetail = Record<string, bigint | number | string | boolean>;

/**
 * A contract-level revert. `code` is the contract's error name. The enclosing
 * transaction (or subcall) is rolled back before this reaches the caller.
 */
export class ContractRevertError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly contract: string,
    public readonly detail: RevertDetail = {},
  ) {
    super(message);
    this.name = 'ContractRevertError';
  }
}

export function isRevert(err: unknown, code?: string): err is ContractRevertError {
  if (!(err instanceof ContractRevertError)) return false;
  return code === undefined || err.code === code;
}

export function revertReason(err: unknown): string {
  if (err instanceof ContractRevertError) return `${err.contract}:${err.code}`;
  return serializeError(err);
}
