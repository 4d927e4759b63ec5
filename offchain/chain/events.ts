import type { Address } from 'viem';

export type EventValue = bigint | number | string | boolean | readonly Address[] | readonly bigint[];

export type ChainEvent = {
  emitter: Address;
  contract: string;
  name: string;
  args: Record<string, EventValue>;
};

export function eventsNamed(events: readonly ChainEvent[], name: string): ChainEvent[] {
  return events.filter((event) => event.name === name);
}
