import type { Address } from 'viem';
import type { ChainEvent } from './events';

/**
 * Per-transaction context. Holds the event buffer and the block timestamp, and
 * scopes transient storage. Discarded when the transaction ends.
 */
export class TxContext {
  private readonly buffered: ChainEvent[] = [];

  constructor(
    readonly origin: Address,
    readonly timestamp: bigint,
    private readonly captureState: () => () => void,
  ) {}

  emit(event: ChainEvent): void {
    this.buffered.push(event);
  }

  get events(): readonly ChainEvent[] {
    return this.buffered;
  }

  /**
   * Runs a nested call frame. A throw restores every contract's state and drops
   * the frame's events, then propagates.
   */
  async subcall<T>(fn: () => Promise<T>): Promise<T> {
    const restore = this.captureState();
    const mark = this.buffered.length;
    try {
      return await fn();
    } catch (err) {
      restore();
      this.buffered.length = mark;
      throw err;
    }
  }
}

export type Msg = {
  sender: Address;
  tx: TxContext;
};

/** The message a contract sends when it calls out: same transaction, itself as sender. */
export function callFrom(msg: Msg, sender: Address): Msg {
  return { sender, tx: msg.tx };
}
