import type { TxContext } from './context';

/** Storage cleared at the end of every transaction. */
export class TransientSlot<T> {
  private readonly values = new WeakMap<TxContext, T>();

  get(tx: TxContext): T | undefined {
    return this.values.get(tx);
  }

  set(tx: TxContext, value: T): void {
    this.values.set(tx, value);
  }

  clear(tx: TxContext): void {
    this.values.delete(tx);
  }
}
