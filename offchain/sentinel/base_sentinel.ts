import { Address, zeroAddress } from 'viem';
import type { Logger } from 'pino';
import type { Chain } from '../chain/chain';
import { Contract } from '../chain/contract';
import { Msg, callFrom } from '../chain/context';
import type { EventValue } from '../chain/events';
import { counter, gauge } from '../infra/metrics';
import { log } from '../infra/logger';
import type { AccessControlManager } from '../market/access_control';
import type { ResilientOracle } from '../market/oracle';
import { Action } from '../market/types';
import { VToken } from '../market/vtoken';
import { DeviationResult, computeDeviation } from './deviation';
import { SentinelError } from './errors';

export type MarketState = 'NORMAL' | 'BORROW_PAUSED' | 'COLLATERAL_ZEROED';

const MARKET_STATE_CODE: Record<MarketState, number> = {
  NORMAL: 0,
  BORROW_PAUSED: 1,
  COLLATERAL_ZEROED: 2,
};

export type BaseTokenConfig = {
  /** Integer percent, 1..100. */
  maxDeviationPercent: number;
  enabled: boolean;
};

type SavedFactors = {
  cf: bigint;
  lt: bigint;
};

export type Intervention = {
  isPaused: boolean;
  collateralFactorModified: boolean;
  savedCollateralFactor: bigint;
  savedLiquidationThreshold: bigint;
  poolFactors: Map<number, SavedFactors>;
  /** Actions this sentinel paused alongside the collateral factor change. */
  pausedActions: Action[];
};

type SentinelState<C> = {
  tokenConfigs: Map<Address, C>;
  trustedKeepers: Set<Address>;
  interventions: Map<Address, Intervention>;
};

export type HandleOutcome = DeviationResult & { state: MarketState };

function emptyIntervention(): Intervention {
  return {
    isPaused: false,
    collateralFactorModified: false,
    savedCollateralFactor: 0n,
    savedLiquidationThreshold: 0n,
    poolFactors: new Map(),
    pausedActions: [],
  };
}

/**
 * Watches the oracle price of each configured asset against a second price
 * and intervenes on its market: a comparison price above the oracle pauses
 * borrowing, one below zeroes the collateral factor in every pool. Prior
 * values are saved and restored once prices converge.
 */
export abstract class DeviationSentinelBase<C extends BaseTokenConfig> extends Contract<SentinelState<C>> {
  protected readonly logger: Logger;

  constructor(
    address: Address,
    protected readonly chain: Chain,
    protected readonly acm: AccessControlManager,
    protected readonly oracle: ResilientOracle,
    loggerModule: string,
  ) {
    super(address, { tokenConfigs: new Map(), trustedKeepers: new Set(), interventions: new Map() });
    this.logger = log.child({ module: loggerModule, address });
  }

  /** Price compared against the resilient oracle, same scale. */
  protected abstract comparisonPrice(asset: Address, config: C): bigint;

  /** Market actions paused while the collateral factor is zeroed, and lifted with its restore. */
  protected collateralZeroedActions(): readonly Action[] {
    return [];
  }

  protected validateConfig(_config: C): void {}

  protected configEventArgs(config: C): Record<string, EventValue> {
    return { maxDeviationPercent: config.maxDeviationPercent, enabled: config.enabled };
  }

  // ---- views ----

  tokenConfig(asset: Address): C | undefined {
    return this.state.tokenConfigs.get(asset);
  }

  isTrustedKeeper(account: Address): boolean {
    return this.state.trustedKeepers.has(account);
  }

  intervention(market: Address): Intervention {
    return structuredClone(this.state.interventions.get(market) ?? emptyIntervention());
  }

  marketState(market: Address): MarketState {
    const current = this.state.interventions.get(market);
    if (current?.isPaused) return 'BORROW_PAUSED';
    if (current?.collateralFactorModified) return 'COLLATERAL_ZEROED';
    return 'NORMAL';
  }

  checkPriceDeviation(market: Address): DeviationResult {
    const vToken = this.resolveMarket(market);
    return this.evaluate(vToken, this.requireConfig(vToken));
  }

  // ---- governance ----

  setTokenConfig(msg: Msg, asset: Address, config: C): void {
    this.onlyAllowed(msg, 'setTokenConfig');
    if (asset === zeroAddress) this.revert(SentinelError.ZeroAddress);
    const percent = config.maxDeviationPercent;
    if (!Number.isInteger(percent) || percent <= 0 || percent > 100) {
      this.revert(SentinelError.ExceedsMaxDeviation, { maxDeviationPercent: config.maxDeviationPercent });
    }
    this.validateConfig(config);
    this.state.tokenConfigs.set(asset, { ...config });
    this.emit(msg, 'TokenConfigUpdated', { asset, ...this.configEventArgs(config) });
  }

  setTokenMonitoringEnabled(msg: Msg, asset: Address, enabled: boolean): void {
    this.onlyAllowed(msg, 'setTokenMonitoringEnabled');
    const config = this.state.tokenConfigs.get(asset);
    if (!config) this.revert(SentinelError.TokenNotConfigured, { asset });
    this.state.tokenConfigs.set(asset, { ...config, enabled });
    this.emit(msg, 'TokenMonitoringStatusChanged', { asset, enabled });
  }

  setTrustedKeeper(msg: Msg, keeper: Address, trusted: boolean): void {
    this.onlyAllowed(msg, 'setTrustedKeeper');
    if (keeper === zeroAddress) this.revert(SentinelError.ZeroAddress);
    if (trusted) this.state.trustedKeepers.add(keeper);
    else this.state.trustedKeepers.delete(keeper);
    this.emit(msg, 'TrustedKeeperUpdated', { keeper, trusted });
  }

  // ---- keeper entry point ----

  handleDeviation(msg: Msg, market: Address): HandleOutcome {
    if (!this.state.trustedKeepers.has(msg.sender)) this.revert(SentinelError.UnauthorizedKeeper, { sender: msg.sender });
    const vToken = this.resolveMarket(market);
    const config = this.requireConfig(vToken);
    if (!config.enabled) this.revert(SentinelError.TokenMonitoringDisabled, { asset: vToken.underlying.address });

    const result = this.evaluate(vToken, config);
    const self = callFrom(msg, this.address);
    const current = this.intervention(market);

    if (result.hasDeviation && result.dexPrice > result.oraclePrice) {
      if (current.collateralFactorModified) this.restoreCollateralFactors(self, vToken);
      if (!current.isPaused) this.pauseBorrow(self, vToken);
    } else if (result.hasDeviation) {
      if (current.isPaused) this.unpauseBorrow(self, vToken);
      if (!current.collateralFactorModified) this.zeroCollateralFactors(self, vToken);
    } else {
      if (current.isPaused) this.unpauseBorrow(self, vToken);
      if (current.collateralFactorModified) this.restoreCollateralFactors(self, vToken);
    }

    const state = this.marketState(market);
    gauge.marketState.set({ sentinel: this.contractName, market: vToken.symbol }, MARKET_STATE_CODE[state]);
    return { ...result, state };
  }

  // ---- interventions ----

  private pauseBorrow(self: Msg, vToken: VToken): void {
    const comptroller = vToken.comptroller;
    if (comptroller.actionPaused(vToken.address, Action.BORROW)) {
      // paused elsewhere; not ours to lift
      this.logger.info({ market: vToken.symbol }, 'sentinel-borrow-already-paused');
      return;
    }
    comptroller.setActionsPaused(self, [vToken.address], [Action.BORROW], true);
    this.update(vToken.address, (s) => ({ ...s, isPaused: true }));
    this.emit(self, 'BorrowPaused', { market: vToken.address });
    this.recordTransition(vToken, 'borrow-paused');
  }

  private unpauseBorrow(self: Msg, vToken: VToken): void {
    this.update(vToken.address, (s) => ({ ...s, isPaused: false }));
    if (!vToken.comptroller.actionPaused(vToken.address, Action.BORROW)) {
      this.logger.info({ market: vToken.symbol }, 'sentinel-borrow-already-unpaused');
      return;
    }
    vToken.comptroller.setActionsPaused(self, [vToken.address], [Action.BORROW], false);
    this.emit(self, 'BorrowUnpaused', { market: vToken.address });
    this.recordTransition(vToken, 'borrow-unpaused');
  }

  private zeroCollateralFactors(self: Msg, vToken: VToken): void {
    const comptroller = vToken.comptroller;
    const market = vToken.address;

    if (comptroller.poolModel === 'core') {
      const saved = new Map<number, SavedFactors>();
      for (let poolId = 0; poolId <= comptroller.lastPoolId(); poolId++) {
        const entry = comptroller.poolMarkets(poolId, market);
        if (!entry.isListed) continue;
        saved.set(poolId, { cf: entry.collateralFactorMantissa, lt: entry.liquidationThresholdMantissa });
        comptroller.setCollateralFactor(self, poolId, market, 0n, entry.liquidationThresholdMantissa);
        this.emit(self, 'CollateralFactorUpdated', {
          market,
          poolId,
          oldCollateralFactor: entry.collateralFactorMantissa,
          newCollateralFactor: 0n,
        });
      }
      this.update(market, (s) => ({ ...s, collateralFactorModified: true, poolFactors: saved }));
    } else {
      const entry = comptroller.markets(market);
      comptroller.setCollateralFactor(self, 0, market, 0n, entry.liquidationThresholdMantissa);
      this.emit(self, 'CollateralFactorUpdated', {
        market,
        poolId: 0,
        oldCollateralFactor: entry.collateralFactorMantissa,
        newCollateralFactor: 0n,
      });
      this.update(market, (s) => ({
        ...s,
        collateralFactorModified: true,
        savedCollateralFactor: entry.collateralFactorMantissa,
        savedLiquidationThreshold: entry.liquidationThresholdMantissa,
      }));
    }
    const paused = this.collateralZeroedActions().filter((action) => !comptroller.actionPaused(market, action));
    if (paused.length > 0) {
      comptroller.setActionsPaused(self, [market], paused, true);
    }
    this.update(market, (s) => ({ ...s, pausedActions: paused }));
    this.recordTransition(vToken, 'collateral-zeroed');
  }

  private restoreCollateralFactors(self: Msg, vToken: VToken): void {
    const comptroller = vToken.comptroller;
    const market = vToken.address;
    const current = this.intervention(market);

    if (comptroller.poolModel === 'core') {
      for (const [poolId, saved] of current.poolFactors) {
        if (!comptroller.poolMarkets(poolId, market).isListed) continue;
        comptroller.setCollateralFactor(self, poolId, market, saved.cf, saved.lt);
        this.emit(self, 'CollateralFactorRestored', { market, poolId, collateralFactor: saved.cf });
      }
    } else {
      comptroller.setCollateralFactor(self, 0, market, current.savedCollateralFactor, current.savedLiquidationThreshold);
      this.emit(self, 'CollateralFactorRestored', { market, poolId: 0, collateralFactor: current.savedCollateralFactor });
    }
    const paused = current.pausedActions.filter((action) => comptroller.actionPaused(market, action));
    if (paused.length > 0) {
      comptroller.setActionsPaused(self, [market], paused, false);
    }
    this.update(market, (s) => ({
      ...s,
      pausedActions: [],
      collateralFactorModified: false,
      savedCollateralFactor: 0n,
      savedLiquidationThreshold: 0n,
      poolFactors: new Map(),
    }));
    this.recordTransition(vToken, 'collateral-restored');
  }

  // ---- internals ----

  private evaluate(vToken: VToken, config: C): DeviationResult {
    const asset = vToken.underlying.address;
    const oraclePrice = this.oracle.getPrice(asset);
    const result = computeDeviation(oraclePrice, this.comparisonPrice(asset, config), config.maxDeviationPercent);
    if (oraclePrice > 0n) {
      gauge.deviationPct.set({ sentinel: this.contractName, market: vToken.symbol }, Number(result.deviationPercent));
    }
    return result;
  }

  private resolveMarket(market: Address): VToken {
    const vToken = this.chain.contractAt(market, VToken);
    if (!vToken) this.revert(SentinelError.InvalidMarket, { market });
    return vToken;
  }

  private requireConfig(vToken: VToken): C {
    const config = this.state.tokenConfigs.get(vToken.underlying.address);
    if (!config) this.revert(SentinelError.TokenNotConfigured, { asset: vToken.underlying.address });
    return config;
  }

  private update(market: Address, fn: (current: Intervention) => Intervention): void {
    this.state.interventions.set(market, fn(this.intervention(market)));
  }

  private recordTransition(vToken: VToken, transition: string): void {
    counter.sentinelTransitions.inc({ sentinel: this.contractName, transition });
    this.logger.info({ market: vToken.symbol, transition }, `sentinel-${transition}`);
  }

  private onlyAllowed(msg: Msg, fn: string): void {
    if (!this.acm.isAllowedToCall(msg.sender, this.address, fn)) {
      this.revert(SentinelError.Unauthorized, { sender: msg.sender, fn });
    }
  }
}
