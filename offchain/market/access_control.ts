import { Address, zeroAddress } from 'viem';
import { Contract } from '../chain/contract';
import type { Msg } from '../chain/context';

type AcmState = {
  owner: Address;
  permissions: Set<string>;
};

function permissionKey(contract: Address, fn: string, account: Address): string {
  return `${contract}:${fn}:${account}`;
}

/**
 * Function-level permissions for governance calls. A grant on the zero address
 * covers that function on every contract.
 */
export class AccessControlManager extends Contract<AcmState> {
  readonly contractName = 'AccessControlManager';

  constructor(address: Address, owner: Address) {
    super(address, { owner, permissions: new Set() });
  }

  owner(): Address {
    return this.state.owner;
  }

  giveCallPermission(msg: Msg, contract: Address, fn: string, account: Address): void {
    this.onlyOwner(msg);
    this.state.permissions.add(permissionKey(contract, fn, account));
    this.emit(msg, 'PermissionGranted', { contract, fn, account });
  }

  revokeCallPermission(msg: Msg, contract: Address, fn: string, account: Address): void {
    this.onlyOwner(msg);
    this.state.permissions.delete(permissionKey(contract, fn, account));
    this.emit(msg, 'PermissionRevoked', { contract, fn, account });
  }

  isAllowedToCall(account: Address, contract: Address, fn: string): boolean {
    return (
      this.state.permissions.has(permissionKey(contract, fn, account)) ||
      this.state.permissions.has(permissionKey(zeroAddress, fn, account))
    );
  }

  private onlyOwner(msg: Msg): void {
    if (msg.sender !== this.state.owner) this.revert('Unauthorized', { sender: msg.sender });
  }
}
