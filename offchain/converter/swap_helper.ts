import { Address, Hex, decodeFunctionData, maxUint256, recoverTypedDataAddress } from 'viem';
import type { Logger } from 'pino';
import type { Chain } from '../chain/chain';
import { CalldataContract, isCalldataContract } from '../chain/calldata';
import { Msg, callFrom } from '../chain/context';
import { Erc20 } from '../chain/erc20';
import { WrappedNative } from '../chain/wrapped_native';
import { log } from '../infra/logger';
import { serializeError } from '../util/serialize';
import { MULTICALL_TYPES, multicallDomain, swapHelperAbi } from './abi';

type SwapHelperState = {
  owner: Address;
  backendSigner: Address;
  usedSalts: Set<Hex>;
};

/**
 * Executes batches of sweep, wrap, approveMax and genericCall instructions. A batch
 * may carry an EIP-712 signature by the backend signer; a signed batch's salt
 * is single-use. Instructions only run inside `multicall`.
 */
export class SwapHelper extends CalldataContract<SwapHelperState> {
  readonly contractName = 'SwapHelper';
  private readonly logger: Logger;

  constructor(
    address: Address,
    private readonly chain: Chain,
    owner: Address,
    backendSigner: Address,
    private readonly wrappedNative: Address,
  ) {
    super(address, { owner, backendSigner, usedSalts: new Set() });
    this.logger = log.child({ module: 'swap-helper', address });
  }

  backendSigner(): Address {
    return this.state.backendSigner;
  }

  isSaltUsed(salt: Hex): boolean {
    return this.state.usedSalts.has(salt);
  }

  setBackendSigner(msg: Msg, signer: Address): void {
    if (msg.sender !== this.state.owner) this.revert('Unauthorized', { sender: msg.sender });
    this.state.backendSigner = signer;
    this.emit(msg, 'BackendSignerUpdated', { signer });
  }

  async call(msg: Msg, data: Hex): Promise<void> {
    const decoded = decodeFunctionData({ abi: swapHelperAbi, data });
    if (decoded.functionName !== 'multicall') {
      this.revert('DirectCallNotAllowed', { functionName: decoded.functionName });
    }
    const [calls, deadline, salt, signature] = decoded.args;
    await this.multicall(msg, calls, deadline, salt, signature);
  }

  async multicall(msg: Msg, calls: readonly Hex[], deadline: bigint, salt: Hex, signature: Hex): Promise<void> {
    if (deadline < msg.tx.timestamp) this.revert('DeadlineReached', { deadline, now: msg.tx.timestamp });

    if (signature !== '0x') {
      if (this.state.usedSalts.has(salt)) this.revert('SaltAlreadyUsed', { salt });
      const signer = await this.recoverSigner(calls, deadline, salt, signature);
      if (signer !== this.state.backendSigner) this.revert('Unauthorized', { signer });
      this.state.usedSalts.add(salt);
    }

    const self = callFrom(msg, this.address);
    for (const data of calls) {
      const decoded = decodeFunctionData({ abi: swapHelperAbi, data });
      switch (decoded.functionName) {
        case 'sweep':
          this.sweep(self, decoded.args[0], decoded.args[1]);
          break;
        case 'wrap':
          this.wrapped().deposit(self, decoded.args[0]);
          break;
        case 'approveMax':
          this.token(decoded.args[0]).approve(self, decoded.args[1], maxUint256);
          break;
        case 'genericCall':
          await this.genericCall(self, decoded.args[0], decoded.args[1]);
          break;
        case 'multicall':
          this.revert('NestedMulticall');
      }
    }
    this.emit(msg, 'MulticallExecuted', { caller: msg.sender, calls: calls.length, salt });
    this.logger.debug({ caller: msg.sender, calls: calls.length }, 'multicall-executed');
  }

  private sweep(self: Msg, tokenAddress: Address, to: Address): void {
    const token = this.token(tokenAddress);
    const balance = token.balanceOf(this.address);
    if (balance === 0n) return;
    token.transfer(self, to, balance);
    this.emit(self, 'Swept', { token: token.address, to, amount: balance });
  }

  private async genericCall(self: Msg, target: Address, data: Hex): Promise<void> {
    const contract = this.chain.lookup(target);
    if (!contract || !isCalldataContract(contract)) this.revert('InvalidCallTarget', { target });
    await contract.call(self, data);
  }

  private wrapped(): WrappedNative {
    const token = this.chain.contractAt(this.wrappedNative, WrappedNative);
    if (!token) this.revert('InvalidToken', { token: this.wrappedNative });
    return token;
  }

  private token(address: Address): Erc20 {
    const token = this.chain.contractAt(address, Erc20);
    if (!token) this.revert('InvalidToken', { token: address });
    return token;
  }

  private async recoverSigner(calls: readonly Hex[], deadline: bigint, salt: Hex, signature: Hex): Promise<Address> {
    try {
      return await recoverTypedDataAddress({
        domain: multicallDomain(this.chain.chainId, this.address),
        types: MULTICALL_TYPES,
        primaryType: 'Multicall',
        message: { calls, deadline, salt },
        signature,
      });
    } catch (err) {
      this.revert('Unauthorized', { reason: serializeError(err) });
    }
  }
}
