import { Address, getAddress, getContractAddress } from 'viem';
import type { Logger } from 'pino';
import { log } from '../infra/logger';
import { labelAddress } from '../util/address';
import { revertReason } from './errors';
import { Msg, TxContext } from './context';
import type { Contract } from './contract';
import { NativeCoin } from './native';
import type { ChainEvent } from './events';

export type Receipt<T> = {
  result: T;
  events: readonly ChainEvent[];
};

export type AnyContract = Contract<object>;

/**
 * In-process ledger: a registry of contracts plus a clock and the native coin.
 * Transactions are serialized and atomic; a throw anywhere inside one restores
 * every contract.
 */
export class Chain {
  readonly native: NativeCoin;
  private readonly contracts = new Map<Address, AnyContract>();
  private readonly logs: ChainEvent[] = [];
  private readonly deployer: Address;
  private nonce = 0n;
  private timestamp: bigint;
  private readonly logger: Logger;
  /** Settles when the last queued transaction or simulation has finished. */
  private queue: Promise<void> = Promise.resolve();

  constructor(
    readonly chainId: number,
    options: { timestamp?: bigint; deployerLabel?: string } = {},
  ) {
    this.timestamp = options.timestamp ?? 1_700_000_000n;
    this.deployer = labelAddress(options.deployerLabel ?? 'deployer');
    this.logger = log.child({ module: 'chain', chainId });
    this.native = new NativeCoin(labelAddress('native-coin'));
    this.contracts.set(this.native.address, this.native);
  }

  deploy<C extends AnyContract>(factory: (address: Address) => C): C {
    const address = getContractAddress({ from: this.deployer, nonce: this.nonce });
    this.nonce += 1n;
    const contract = factory(address);
    this.contracts.set(address, contract);
    this.logger.debug({ address, contract: contract.contractName }, 'contract-deployed');
    return contract;
  }

  /** Looks up a deployed contract and narrows it to `kind`; undefined on a miss or type mismatch. */
  contractAt<C extends AnyContract>(address: string, kind: abstract new (...args: never[]) => C): C | undefined {
    const found = this.contracts.get(getAddress(address));
    return found instanceof kind ? found : undefined;
  }

  lookup(address: string): AnyContract | undefined {
    return this.contracts.get(getAddress(address));
  }

  now(): bigint {
    return this.timestamp;
  }

  advanceTime(seconds: bigint): void {
    this.timestamp += seconds;
  }

  capture(): () => void {
    const restores = [...this.contracts.values()].map((contract) => contract.capture());
    return () => {
      for (const restore of restores) restore();
    };
  }

  /** Executes `fn` as one transaction sent by `sender`. Must not be called from inside another transaction. */
  async transact<T>(sender: Address, fn: (msg: Msg) => Promise<T> | T): Promise<Receipt<T>> {
    return this.serialize(async () => {
      const tx = new TxContext(sender, this.timestamp, () => this.capture());
      const restore = this.capture();
      try {
        const result = await fn({ sender, tx });
        this.logs.push(...tx.events);
        return { result, events: tx.events };
      } catch (err) {
        restore();
        this.logger.debug({ sender, reason: revertReason(err) }, 'tx-reverted');
        throw err;
      }
    });
  }

  /** Runs `fn` like a transaction and always discards its effects. */
  async simulate<T>(sender: Address, fn: (msg: Msg) => Promise<T> | T): Promise<T> {
    return this.serialize(async () => {
      const tx = new TxContext(sender, this.timestamp, () => this.capture());
      const restore = this.capture();
      try {
        return await fn({ sender, tx });
      } finally {
        restore();
      }
    });
  }

  private serialize<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.queue.then(fn);
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  events(filter: { name?: string; emitter?: Address } = {}): ChainEvent[] {
    return this.logs.filter(
      (event) =>
        (filter.name === undefined || event.name === filter.name) &&
        (filter.emitter === undefined || event.emitter === filter.emitter),
    );
  }
}
