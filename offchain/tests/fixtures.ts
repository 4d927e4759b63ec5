import { Address, Hex, maxUint256, zeroAddress } from 'viem';
import { Chain } from '../chain/chain';
import { Erc20 } from '../chain/erc20';
import { WrappedNative } from '../chain/wrapped_native';
import { FixedRateExchange } from '../converter/fixed_rate_exchange';
import { SwapHelper } from '../converter/swap_helper';
import { buildMulticall, exchangeSwapCalls, saltFor } from '../converter/instructions';
import { DustRecipient, LeverageStrategiesManager } from '../leverage/leverage_manager';
import { AccessControlManager } from '../market/access_control';
import { Comptroller } from '../market/comptroller';
import { JumpRateModel, JumpRateParams, ZERO_RATE } from '../market/interest_rate';
import { ResilientOracle } from '../market/oracle';
import { MarketError, PoolModel } from '../market/types';
import { VToken } from '../market/vtoken';
import { DexKind, ReservePair } from '../sentinel/dex_pools';
import { PriceDeviationSentinel } from '../sentinel/price_deviation_sentinel';
import { labelAddress } from '../util/address';
import { expectEqual } from './test_harness';

export const E18 = 10n ** 18n;

export const GOV = labelAddress('governance');
export const ALICE = labelAddress('alice');
export const BOB = labelAddress('bob');
export const KEEPER = labelAddress('keeper');
export const LENDER = labelAddress('lender');
export const RESERVE = labelAddress('protocol-share-reserve');
export const SIGNER = labelAddress('backend-signer');

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

/** USDT and BNB at $1, BTC at $100; all 18 decimals. */
export type Fixture = {
  chain: Chain;
  acm: AccessControlManager;
  oracle: ResilientOracle;
  comptroller: Comptroller;
  usdt: Erc20;
  btc: Erc20;
  wbnb: WrappedNative;
  vUsdt: VToken;
  vBtc: VToken;
  vBnb: VToken;
  swapHelper: SwapHelper;
  exchange: FixedRateExchange;
  manager: LeverageStrategiesManager;
};

export type FixtureOptions = {
  poolModel?: PoolModel;
  flashLoanFeeMantissa?: bigint;
  flashLoanProtocolShareMantissa?: bigint;
  exitBorrowDustRecipient?: DustRecipient;
  usdtRate?: JumpRateParams;
  bnbRate?: JumpRateParams;
};

export const CF = 8n * 10n ** 17n;
export const LT = 85n * 10n ** 16n;
export const LIQUIDITY = 1_000n * E18;

export async function deployFixture(options: FixtureOptions = {}): Promise<Fixture> {
  const chain = new Chain(97);
  const acm = chain.deploy((address) => new AccessControlManager(address, GOV));
  await chain.transact(GOV, (msg) => {
    for (const fn of GOVERNANCE_FUNCTIONS) acm.giveCallPermission(msg, zeroAddress, fn, GOV);
  });
  const oracle = chain.deploy((address) => new ResilientOracle(address, chain, acm));
  const comptroller = chain.deploy(
    (address) => new Comptroller(address, chain, acm, oracle, options.poolModel ?? 'core'),
  );

  const usdt = chain.deploy((address) => new Erc20(address, 'USDT', 18));
  const btc = chain.deploy((address) => new Erc20(address, 'BTC', 18));
  const wbnb = chain.deploy((address) => new WrappedNative(address, chain.native));

  const market = (symbol: string, underlying: Erc20, rate: JumpRateParams) =>
    chain.deploy(
      (address) =>
        new VToken(address, {
          symbol,
          underlying,
          comptroller,
          rateModel: new JumpRateModel(rate),
          protocolShareReserve: RESERVE,
          accrualTimestamp: chain.now(),
          flashLoanFeeMantissa: options.flashLoanFeeMantissa ?? 0n,
          flashLoanProtocolShareMantissa: options.flashLoanProtocolShareMantissa ?? 0n,
        }),
    );
  const vUsdt = market('vUSDT', usdt, options.usdtRate ?? ZERO_RATE);
  const vBtc = market('vBTC', btc, ZERO_RATE);
  const vBnb = market('vBNB', wbnb, options.bnbRate ?? ZERO_RATE);

  await chain.transact(GOV, (msg) => {
    oracle.setPrice(msg, usdt.address, E18);
    oracle.setPrice(msg, btc.address, 100n * E18);
    oracle.setPrice(msg, wbnb.address, E18);
    for (const vToken of [vUsdt, vBtc, vBnb]) {
      comptroller.supportMarket(msg, vToken);
      comptroller.setCollateralFactor(msg, 0, vToken.address, CF, LT);
    }
  });
  for (const vToken of [vUsdt, vBtc, vBnb]) {
    await supply({ chain }, LENDER, vToken, LIQUIDITY, { enter: false });
  }

  const swapHelper = chain.deploy((address) => new SwapHelper(address, chain, GOV, SIGNER, wbnb.address));
  const exchange = chain.deploy((address) => new FixedRateExchange(address, chain, GOV));
  await chain.transact(GOV, (msg) => {
    exchange.setRate(msg, usdt.address, btc.address, 10n ** 16n);
    exchange.setRate(msg, btc.address, usdt.address, 100n * E18);
    usdt.mint(msg, exchange.address, 100_000n * E18);
    btc.mint(msg, exchange.address, 1_000n * E18);
  });

  const manager = chain.deploy(
    (address) =>
      new LeverageStrategiesManager(address, chain, {
        comptroller,
        converter: swapHelper,
        nativeMarket: vBnb.address,
        protocolShareReserve: RESERVE,
        exitBorrowDustRecipient: options.exitBorrowDustRecipient,
      }),
  );
  await chain.transact(GOV, (msg) => comptroller.setWhiteListFlashLoanAccount(msg, manager.address, true));

  return { chain, acm, oracle, comptroller, usdt, btc, wbnb, vUsdt, vBtc, vBnb, swapHelper, exchange, manager };
}

/** Mints `amount` of the underlying to `account` and supplies it, entering the market unless told not to. */
export async function supply(
  fx: { chain: Chain },
  account: Address,
  vToken: VToken,
  amount: bigint,
  options: { enter?: boolean } = {},
): Promise<void> {
  await fx.chain.transact(account, (msg) => {
    vToken.underlying.mint(msg, account, amount);
    vToken.underlying.approve(msg, vToken.address, amount);
    expectEqual(vToken.mint(msg, amount), MarketError.NO_ERROR, `mint into ${vToken.symbol} failed`);
    if (options.enter ?? true) vToken.comptroller.enterMarkets(msg, [vToken.address]);
  });
}

/** Approves the manager as `account`'s delegate and lets it pull `token` seeds. */
export async function approveManager(fx: Fixture, account: Address, tokens: Erc20[] = []): Promise<void> {
  await fx.chain.transact(account, (msg) => {
    fx.comptroller.updateDelegate(msg, fx.manager.address, true);
    for (const token of tokens) token.approve(msg, fx.manager.address, maxUint256);
  });
}

export async function mintTo(fx: Fixture, token: Erc20, account: Address, amount: bigint): Promise<void> {
  await fx.chain.transact(account, (msg) => token.mint(msg, account, amount));
}

let saltNonce = 0;

/** Unsigned converter calldata swapping `amountIn` on the fixed-rate venue and returning the output to `recipient`. */
export async function swapData(
  fx: Fixture,
  tokenIn: Erc20,
  tokenOut: Erc20,
  amountIn: bigint,
  recipient: Address = fx.manager.address,
): Promise<Hex> {
  saltNonce += 1;
  return buildMulticall({
    helper: fx.swapHelper.address,
    chainId: fx.chain.chainId,
    calls: exchangeSwapCalls({
      helper: fx.swapHelper.address,
      exchange: fx.exchange.address,
      tokenIn: tokenIn.address,
      tokenOut: tokenOut.address,
      amountIn,
      recipient,
    }),
    deadline: fx.chain.now() + 3_600n,
    salt: saltFor(`swap-${saltNonce}`),
  });
}

export function underlyingOf(vToken: VToken, account: Address): bigint {
  return (vToken.balanceOf(account) * vToken.exchangeRateStored()) / E18;
}

export type SentinelFixture = Fixture & {
  sentinel: PriceDeviationSentinel;
  pair: ReservePair;
};

const PAIR_BTC_RESERVE = 10n * E18;

/** Adds a BTC/USDT reserve pair priced at the oracle's $100 and a sentinel watching BTC at 10%. */
export async function deploySentinelFixture(options: FixtureOptions = {}): Promise<SentinelFixture> {
  const fx = await deployFixture(options);
  const btcIsToken0 = BigInt(fx.btc.address) < BigInt(fx.usdt.address);
  const [token0, token1] = btcIsToken0 ? [fx.btc.address, fx.usdt.address] : [fx.usdt.address, fx.btc.address];
  const [reserve0, reserve1] = pairReserves(btcIsToken0, 100n);
  const pair = fx.chain.deploy((address) => new ReservePair(address, token0, token1, reserve0, reserve1));
  const sentinel = fx.chain.deploy((address) => new PriceDeviationSentinel(address, fx.chain, fx.acm, fx.oracle));

  await fx.chain.transact(GOV, (msg) => {
    for (const fn of ['setActionsPaused', 'setCollateralFactor']) {
      fx.acm.giveCallPermission(msg, fx.comptroller.address, fn, sentinel.address);
    }
    sentinel.setTrustedKeeper(msg, KEEPER, true);
    sentinel.setTokenConfig(msg, fx.btc.address, {
      maxDeviationPercent: 10,
      enabled: true,
      dex: DexKind.PANCAKESWAP_V2,
      pool: pair.address,
    });
  });
  return { ...fx, sentinel, pair };
}

function pairReserves(btcIsToken0: boolean, usdPerBtc: bigint): [bigint, bigint] {
  const usdtReserve = PAIR_BTC_RESERVE * usdPerBtc;
  return btcIsToken0 ? [PAIR_BTC_RESERVE, usdtReserve] : [usdtReserve, PAIR_BTC_RESERVE];
}

/** Moves the pair so it prices BTC at `usdPerBtc` dollars. */
export async function setPairPrice(fx: SentinelFixture, usdPerBtc: bigint): Promise<void> {
  const [reserve0, reserve1] = pairReserves(fx.pair.token0 === fx.btc.address, usdPerBtc);
  await fx.chain.transact(GOV, (msg) => fx.pair.sync(msg, reserve0, reserve1));
}
