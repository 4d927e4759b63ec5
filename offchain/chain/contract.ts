import type { Address } from 'viem';
import type { Msg } from './context';
import { ContractRevertError, RevertDetail } from './errors';
import type { EventValue } from './events';

/**
 * Base for in-process contracts. All mutable storage lives in `state`, which
 * must stay structured-cloneable (plain objects, Maps, Sets, bigints) so the
 * chain can snapshot and restore it around transactions.
 */
export abstract class Contract<S extends object> {
  abstract readonly contractName: string;
  protected state: S;

  constructor(
    readonly address: Address,
    initialState: S,
  ) {
    this.state = initialState;
  }

  capture(): () => void {
    const saved = structuredClone(this.state);
    return () => {
      this.state = structuredClone(saved);
    };
  }

  protected emit(msg: Msg, name: string, args: Record<string, EventValue>): void {
    msg.tx.emit({ emitter: this.address, contract: this.contractName, name, args });
  }

  protected revert(code: string, detail: RevertDetail = {}): never {
    throw new ContractRevertError(code, `${this.contractName} reverted: ${code}`, this.contractName, detail);
  }
}
