import { Address, parseUnits, zeroAddress } from 'viem';
import { Chain } from '../chain/chain';
import { Msg } from '../chain/context';
import { Erc20 } from '../chain/erc20';
import { WrappedNative } from '../chain/wrapped_native';
import { FixedRateExchange } from '../converter/fixed_rate_exchange';
import { SwapHelper } from '../converter/swap_helper';
import type { AppConfig, DexPoolCfg } from '../infra/config';
import { log } from '../infra/logger';
import { LeverageStrategiesManager } from '../leverage/leverage_manager';
import { Undertaker } from '../lifecycle/undertaker';
import { AccessControlManager } from '../market/access_control';
import { Comptroller } from '../market/comptroller';
import { JumpRateModel, ZERO_RATE, fromAnnualRates } from '../market/interest_rate';
import { ResilientOracle } from '../market/oracle';
import { MarketError } from '../market/types';
import { VToken } from '../market/vtoken';
import { PositionSwapper } from '../router/position_swapper';
import { SwapRouter } from '../router/swap_router';
import {
  ConcentratedLiquidityPool,
  DEX_KIND_BY_NAME,
  DexKind,
  ReservePair,
  isConcentratedLiquidityKind,
} from '../sentinel/dex_pools';
import { DexPoolOracle } from '../sentinel/dex_oracle';
import { DeviationSentinel } from '../sentinel/deviation_sentinel';
import { PriceDeviationSentinel } from '../sentinel/price_deviation_sentinel';
import { SentinelOracle } from '../sentinel/sentinel_oracle';
import { labelAddress } from '../util/address';
import { EXP_SCALE, sqrtBigInt } from '../util/math';

const logger = log.child({ module: 'bootstrap' });

/** Functions governance may call on any contract. */
const GOVERNANCE_FUNCTIONS = [
  'supportMarket',
  'createPool',
  'addPoolMarket',
  'setCollateralFactor',
  'setIsBorrowAllowed',
  'setActionsPaused',
  'setMarketBorrowCaps',
  'setMarketSupplyCaps',
  'setWhiteListFlashLoanAccount',
  'setWhitelistedExecutor',
  'unlistMarket',
  'setReserveFactor',
  'setFlashLoanEnabled',
  'setFlashLoanFeeMantissa',
  'setPrice',
  'setPoolConfig',
  'setTokenOracleConfig',
  'setDirectPrice',
  'setTokenConfig',
  'setTokenMonitoringEnabled',
  'setTrustedKeeper',
];

const SENTINEL_COMPTROLLER_FUNCTIONS = ['setActionsPaused', 'setCollateralFactor'];
const UNDERTAKER_COMPTROLLER_FUNCTIONS = [
  'setActionsPaused',
  'setCollateralFactor',
  'setMarketBorrowCaps',
  'setMarketSupplyCaps',
  'unlistMarket',
];

export type DexPool = ConcentratedLiquidityPool | ReservePair;
export type Sentinel = PriceDeviationSentinel | DeviationSentinel;

export type Deployment = {
  config: AppConfig;
  chain: Chain;
  governance: Address;
  acm: AccessControlManager;
  oracle: ResilientOracle;
  comptroller: Comptroller;
  tokens: Map<string, Erc20>;
  markets: Map<string, VToken>;
  swapHelper: SwapHelper;
  exchange: FixedRateExchange;
  leverage: LeverageStrategiesManager;
  router: SwapRouter;
  positionSwapper: PositionSwapper;
  undertaker: Undertaker;
  dexPools: Map<string, DexPool>;
  sentinel: Sentinel;
  /** Markets whose underlying has a sentinel config. */
  monitoredMarkets: VToken[];
};

/** Oracle price scale: USD per raw unit, 36 decimals minus the token's. */
export function oraclePrice(priceUsd: string, decimals: number): bigint {
  return parseUnits(priceUsd, 36 - decimals);
}

/** sqrt(token1 per token0 in raw units) as Q64.96, given both USD prices. */
export function sqrtPriceX96FromPrices(price0: bigint, price1: bigint): bigint {
  if (price1 === 0n) throw new Error('reference price is zero');
  return sqrtBigInt((price0 << 192n) / price1);
}

function sortTokens(a: Address, b: Address): [Address, Address] {
  return BigInt(a) < BigInt(b) ? [a, b] : [b, a];
}

function required<V>(map: Map<string, V>, key: string, what: string): V {
  const value = map.get(key);
  if (value === undefined) throw new Error(`Unknown ${what} ${key}`);
  return value;
}

/** Deploys and wires every contract described by `cfg` on a fresh in-process chain. */
export async function bootstrap(cfg: AppConfig): Promise<Deployment> {
  const chain = new Chain(cfg.chainId, { timestamp: BigInt(cfg.startTimestamp) });
  const governance = cfg.governance;
  const gov = <T>(fn: (msg: Msg) => T | Promise<T>) => chain.transact(governance, fn);

  const acm = chain.deploy((address) => new AccessControlManager(address, governance));
  await gov(async (msg) => {
    for (const fn of GOVERNANCE_FUNCTIONS) acm.giveCallPermission(msg, zeroAddress, fn, governance);
  });

  const oracle = chain.deploy((address) => new ResilientOracle(address, chain, acm));
  const comptroller = chain.deploy((address) => new Comptroller(address, chain, acm, oracle, cfg.poolModel));

  const nativeMarket = cfg.markets.find((m) => m.native);
  if (!nativeMarket) throw new Error('No native market configured');

  const tokens = new Map<string, Erc20>();
  const prices = new Map<string, bigint>();
  for (const [symbol, token] of Object.entries(cfg.tokens)) {
    const deployed =
      symbol === nativeMarket.underlying
        ? chain.deploy((address) => new WrappedNative(address, chain.native, symbol, token.decimals))
        : chain.deploy((address) => new Erc20(address, symbol, token.decimals));
    tokens.set(symbol, deployed);
    prices.set(symbol, oraclePrice(token.priceUsd, token.decimals));
  }
  await gov((msg) => {
    for (const [symbol, token] of tokens) oracle.setPrice(msg, token.address, required(prices, symbol, 'token'));
  });

  const markets = new Map<string, VToken>();
  for (const market of cfg.markets) {
    const underlying = required(tokens, market.underlying, 'token');
    const rateModel = new JumpRateModel(market.interestRate ? fromAnnualRates(market.interestRate) : ZERO_RATE);
    const vToken = chain.deploy(
      (address) =>
        new VToken(address, {
          symbol: market.symbol,
          underlying,
          comptroller,
          rateModel,
          protocolShareReserve: cfg.protocolShareReserve,
          accrualTimestamp: chain.now(),
          reserveFactorMantissa: market.reserveFactor,
          flashLoanFeeMantissa: market.flashLoanFee,
          flashLoanProtocolShareMantissa: market.flashLoanProtocolShare,
        }),
    );
    markets.set(market.symbol, vToken);
    await gov((msg) => {
      comptroller.supportMarket(msg, vToken);
      comptroller.setCollateralFactor(msg, 0, vToken.address, market.collateralFactor, market.liquidationThreshold);
    });
  }

  for (const pool of cfg.pools) {
    await gov((msg) => {
      const poolId = comptroller.createPool(msg, pool.label);
      for (const [symbol, entry] of Object.entries(pool.markets)) {
        const market = required(markets, symbol, 'market').address;
        comptroller.addPoolMarket(msg, poolId, market);
        comptroller.setCollateralFactor(msg, poolId, market, entry.collateralFactor, entry.liquidationThreshold);
        comptroller.setIsBorrowAllowed(msg, poolId, market, entry.borrowAllowed);
      }
    });
  }

  await seedLiquidity(chain, cfg, tokens, markets);

  const wrappedNative = required(tokens, nativeMarket.underlying, 'token').address;
  const swapHelper = chain.deploy(
    (address) => new SwapHelper(address, chain, governance, cfg.converter.backendSigner, wrappedNative),
  );
  const exchange = chain.deploy((address) => new FixedRateExchange(address, chain, governance));
  await gov((msg) => {
    for (const [inSymbol, tokenIn] of tokens) {
      for (const [outSymbol, tokenOut] of tokens) {
        if (inSymbol === outSymbol) continue;
        const rate = (required(prices, inSymbol, 'token') * EXP_SCALE) / required(prices, outSymbol, 'token');
        exchange.setRate(msg, tokenIn.address, tokenOut.address, rate);
      }
    }
    for (const [symbol, amount] of Object.entries(cfg.converter.exchangeInventory)) {
      const token = required(tokens, symbol, 'token');
      token.mint(msg, exchange.address, parseUnits(amount, token.decimals));
    }
  });

  const leverage = chain.deploy(
    (address) =>
      new LeverageStrategiesManager(address, chain, {
        comptroller,
        converter: swapHelper,
        nativeMarket: required(markets, nativeMarket.symbol, 'market').address,
        protocolShareReserve: cfg.protocolShareReserve,
        exitBorrowDustRecipient: cfg.leverage.exitBorrowDustRecipient,
      }),
  );
  await gov((msg) => comptroller.setWhiteListFlashLoanAccount(msg, leverage.address, true));

  const wrapped = chain.contractAt(wrappedNative, WrappedNative);
  if (!wrapped) throw new Error(`Native underlying ${nativeMarket.underlying} is not a wrapped native token`);
  const router = chain.deploy(
    (address) => new SwapRouter(address, chain, { comptroller, swapHelper, wrappedNative: wrapped, owner: governance }),
  );
  const positionSwapper = chain.deploy(
    (address) => new PositionSwapper(address, chain, { comptroller, converter: swapHelper, owner: governance }),
  );
  await gov((msg) => {
    comptroller.setWhitelistedExecutor(msg, positionSwapper.address, true);
    for (const from of markets.values()) {
      for (const to of markets.values()) {
        if (from !== to) positionSwapper.setApprovedPair(msg, from.address, to.address, true);
      }
    }
  });

  const undertaker = chain.deploy((address) => new Undertaker(address, chain, comptroller, governance));
  await gov((msg) => {
    for (const fn of UNDERTAKER_COMPTROLLER_FUNCTIONS) {
      acm.giveCallPermission(msg, comptroller.address, fn, undertaker.address);
    }
  });

  const dexPools = new Map<string, DexPool>();
  for (const pool of cfg.dexPools) {
    dexPools.set(pool.id, deployDexPool(chain, pool, tokens, prices));
  }

  const sentinel = await deploySentinel(chain, cfg, acm, oracle, tokens, dexPools);
  await gov((msg) => {
    for (const fn of SENTINEL_COMPTROLLER_FUNCTIONS) {
      acm.giveCallPermission(msg, comptroller.address, fn, sentinel.address);
    }
    for (const keeper of cfg.sentinel.keepers) sentinel.setTrustedKeeper(msg, keeper, true);
  });

  const monitored = new Set(Object.keys(cfg.sentinel.tokens));
  const monitoredMarkets = cfg.markets
    .filter((m) => monitored.has(m.underlying))
    .map((m) => required(markets, m.symbol, 'market'));

  logger.info(
    {
      chainId: cfg.chainId,
      markets: markets.size,
      dexPools: dexPools.size,
      sentinel: sentinel.contractName,
      monitored: monitoredMarkets.map((m) => m.symbol),
    },
    'deployment-ready',
  );

  return {
    config: cfg,
    chain,
    governance,
    acm,
    oracle,
    comptroller,
    tokens,
    markets,
    swapHelper,
    exchange,
    leverage,
    router,
    positionSwapper,
    undertaker,
    dexPools,
    sentinel,
    monitoredMarkets,
  };
}

async function seedLiquidity(
  chain: Chain,
  cfg: AppConfig,
  tokens: Map<string, Erc20>,
  markets: Map<string, VToken>,
): Promise<void> {
  const lender = labelAddress('bootstrap-lender');
  for (const market of cfg.markets) {
    const token = required(tokens, market.underlying, 'token');
    const amount = parseUnits(market.initialLiquidity, token.decimals);
    if (amount === 0n) continue;
    const vToken = required(markets, market.symbol, 'market');
    await chain.transact(lender, (msg) => {
      token.mint(msg, lender, amount);
      token.approve(msg, vToken.address, amount);
      const code = vToken.mint(msg, amount);
      if (code !== MarketError.NO_ERROR) throw new Error(`Seeding ${market.symbol} failed with code ${code}`);
    });
  }
}

function deployDexPool(chain: Chain, pool: DexPoolCfg, tokens: Map<string, Erc20>, prices: Map<string, bigint>): DexPool {
  const asset = required(tokens, pool.asset, 'token');
  const reference = required(tokens, pool.reference, 'token');
  const assetPrice = required(prices, pool.asset, 'token');
  const referencePrice = required(prices, pool.reference, 'token');
  const [token0, token1] = sortTokens(asset.address, reference.address);
  const assetIsToken0 = token0 === asset.address;

  if (DEX_KIND_BY_NAME[pool.kind] === DexKind.PANCAKESWAP_V2) {
    const assetReserve = parseUnits(pool.assetReserve, asset.decimals);
    const referenceReserve = (assetReserve * assetPrice) / referencePrice;
    const [reserve0, reserve1] = assetIsToken0 ? [assetReserve, referenceReserve] : [referenceReserve, assetReserve];
    return chain.deploy((address) => new ReservePair(address, token0, token1, reserve0, reserve1));
  }
  const sqrtPriceX96 = assetIsToken0
    ? sqrtPriceX96FromPrices(assetPrice, referencePrice)
    : sqrtPriceX96FromPrices(referencePrice, assetPrice);
  return chain.deploy((address) => new ConcentratedLiquidityPool(address, token0, token1, pool.fee, sqrtPriceX96));
}

async function deploySentinel(
  chain: Chain,
  cfg: AppConfig,
  acm: AccessControlManager,
  oracle: ResilientOracle,
  tokens: Map<string, Erc20>,
  dexPools: Map<string, DexPool>,
): Promise<Sentinel> {
  const gov = (fn: (msg: Msg) => void) => chain.transact(cfg.governance, fn);
  const entries = Object.entries(cfg.sentinel.tokens).map(([symbol, token]) => {
    const poolCfg = cfg.dexPools.find((p) => p.id === token.pool);
    if (!poolCfg) throw new Error(`Unknown pool ${token.pool}`);
    return {
      asset: required(tokens, symbol, 'token').address,
      pool: required(dexPools, token.pool, 'pool').address,
      dex: DEX_KIND_BY_NAME[poolCfg.kind],
      maxDeviationPercent: token.maxDeviationPercent,
      enabled: token.enabled,
    };
  });

  if (cfg.sentinel.mode === 'pool') {
    const sentinel = chain.deploy((address) => new PriceDeviationSentinel(address, chain, acm, oracle));
    await gov((msg) => {
      for (const { asset, ...config } of entries) sentinel.setTokenConfig(msg, asset, config);
    });
    return sentinel;
  }

  const dexOracles = new Map<number, DexPoolOracle>();
  const oracleFor = (dex: number): DexPoolOracle => {
    if (!isConcentratedLiquidityKind(dex)) {
      throw new Error(`DEX kind ${dex} has no pool oracle`);
    }
    const existing = dexOracles.get(dex);
    if (existing) return existing;
    const deployed = chain.deploy((address) => new DexPoolOracle(address, chain, acm, oracle, dex));
    dexOracles.set(dex, deployed);
    return deployed;
  };
  const sentinelOracle = chain.deploy((address) => new SentinelOracle(address, chain, acm));
  const sentinel = chain.deploy((address) => new DeviationSentinel(address, chain, acm, oracle, sentinelOracle));
  await gov((msg) => {
    for (const entry of entries) {
      const dexOracle = oracleFor(entry.dex);
      dexOracle.setPoolConfig(msg, entry.asset, entry.pool);
      sentinelOracle.setTokenOracleConfig(msg, entry.asset, dexOracle.address);
      sentinel.setTokenConfig(msg, entry.asset, {
        maxDeviationPercent: entry.maxDeviationPercent,
        enabled: entry.enabled,
      });
    }
  });
  return sentinel;
}
