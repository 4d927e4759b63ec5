import { Address, getAddress, keccak256, slice, toHex } from 'viem';

/** Deterministic externally-owned account for a label, e.g. `labelAddress('keeper')`. */
export function labelAddress(label: string): Address {
  return getAddress(slice(keccak256(toHex(label)), 12));
}
