import { Address, maxUint256, zeroAddress } from 'viem';
import { eventsNamed } from '../chain/events';
import type { Erc20 } from '../chain/erc20';
import { SwapRouter } from '../router/swap_router';
import { test, expect, expectEqual, expectRevert } from './test_harness';
import { ALICE, BOB, E18, Fixture, GOV, deployFixture, mintTo, supply, swapData } from './fixtures';

type RouterFixture = Fixture & { router: SwapRouter };

/** Adds a router owned by governance and a 1:1 WBNB/USDT rate on the exchange. */
async function deployRouterFixture(): Promise<RouterFixture> {
  const fx = await deployFixture();
  const router = fx.chain.deploy(
    (address) =>
      new SwapRouter(address, fx.chain, {
        comptroller: fx.comptroller,
        swapHelper: fx.swapHelper,
        wrappedNative: fx.wbnb,
        owner: GOV,
      }),
  );
  await fx.chain.transact(GOV, (msg) => {
    fx.exchange.setRate(msg, fx.wbnb.address, fx.usdt.address, E18);
    fx.exchange.setRate(msg, fx.usdt.address, fx.wbnb.address, E18);
  });
  return { ...fx, router };
}

async function fund(fx: RouterFixture, token: Erc20, account: Address, amount: bigint): Promise<void> {
  await mintTo(fx, token, account, amount);
  await fx.chain.transact(account, (msg) => token.approve(msg, fx.router.address, maxUint256));
}

async function fundNative(fx: RouterFixture, account: Address, amount: bigint): Promise<void> {
  await fx.chain.transact(account, (msg) => fx.chain.native.mint(msg, account, amount));
}

/** ALICE backs 10 BTC and borrows 50 USDT. */
async function borrowUsdt(fx: RouterFixture): Promise<void> {
  await supply(fx, ALICE, fx.vBtc, 10n * E18);
  await fx.chain.transact(ALICE, (msg) => fx.vUsdt.borrow(msg, 50n * E18));
}

test('swapAndSupply swaps into the market underlying and supplies for the sender', async () => {
  const fx = await deployRouterFixture();
  await fund(fx, fx.usdt, ALICE, 100n * E18);
  const data = await swapData(fx, fx.usdt, fx.btc, 100n * E18, fx.router.address);

  const { result, events } = await fx.chain.transact(ALICE, (msg) =>
    fx.router.swapAndSupply(msg, fx.vBtc.address, fx.usdt.address, 100n * E18, E18, data),
  );

  expectEqual(result, E18);
  expectEqual(fx.vBtc.balanceOf(ALICE), E18);
  expectEqual(fx.usdt.balanceOf(ALICE), 0n);
  expectEqual(fx.btc.balanceOf(fx.router.address), 0n);
  const supplied = eventsNamed(events, 'SwapAndSupply');
  expectEqual(supplied.length, 1);
  expectEqual(supplied[0].args.user, ALICE);
  expectEqual(supplied[0].args.tokenIn, fx.usdt.address);
  expectEqual(supplied[0].args.tokenOut, fx.btc.address);
  expectEqual(supplied[0].args.amountIn, 100n * E18);
  expectEqual(supplied[0].args.amountSupplied, E18);
});

test('swapAndSupply reverts on short or failed swaps and leaves the sender whole', async () => {
  const fx = await deployRouterFixture();
  await fund(fx, fx.usdt, ALICE, 100n * E18);

  const data = await swapData(fx, fx.usdt, fx.btc, 100n * E18, fx.router.address);
  await expectRevert(
    () =>
      fx.chain.transact(ALICE, (msg) =>
        fx.router.swapAndSupply(msg, fx.vBtc.address, fx.usdt.address, 100n * E18, 2n * E18, data),
      ),
    'InsufficientAmountOut',
  );

  const oversized = await swapData(fx, fx.usdt, fx.btc, 200n * E18, fx.router.address);
  await expectRevert(
    () =>
      fx.chain.transact(ALICE, (msg) =>
        fx.router.swapAndSupply(msg, fx.vBtc.address, fx.usdt.address, 100n * E18, 0n, oversized),
      ),
    'SwapFailed',
  );

  expectEqual(fx.usdt.balanceOf(ALICE), 100n * E18);
  expectEqual(fx.vBtc.balanceOf(ALICE), 0n);
});

test('zero amounts, unlisted markets and unfunded senders are rejected', async () => {
  const fx = await deployRouterFixture();
  const data = await swapData(fx, fx.usdt, fx.btc, E18, fx.router.address);
  const supplyFrom = (market: Address, amount: bigint) =>
    fx.chain.transact(BOB, (msg) => fx.router.swapAndSupply(msg, market, fx.usdt.address, amount, 0n, data));

  await expectRevert(() => supplyFrom(fx.vBtc.address, 0n), 'ZeroAmount');
  await expectRevert(() => supplyFrom(fx.usdt.address, E18), 'MarketNotListed');
  await expectRevert(() => supplyFrom(fx.vBtc.address, E18), 'InsufficientBalance');
  await expectRevert(
    () => fx.chain.transact(BOB, (msg) => fx.router.swapNativeAndSupply(msg, fx.vUsdt.address, 0n, data, 0n)),
    'ZeroAmount',
  );
  await expectRevert(
    async () =>
      fx.chain.deploy(
        (address) =>
          new SwapRouter(address, fx.chain, {
            comptroller: fx.comptroller,
            swapHelper: fx.swapHelper,
            wrappedNative: fx.wbnb,
            owner: zeroAddress,
          }),
      ),
    'ZeroAddress',
  );
});

test('supplying the market underlying itself skips the swap helper', async () => {
  const fx = await deployRouterFixture();
  await fund(fx, fx.usdt, ALICE, 50n * E18);

  const { events } = await fx.chain.transact(ALICE, (msg) =>
    fx.router.swapAndSupply(msg, fx.vUsdt.address, fx.usdt.address, 50n * E18, 50n * E18, '0x'),
  );

  expectEqual(fx.vUsdt.balanceOf(ALICE), 50n * E18);
  expectEqual(eventsNamed(events, 'MulticallExecuted').length, 0);
  expectEqual(eventsNamed(events, 'SwapAndSupply')[0].args.amountOut, 50n * E18);
});

test('swapNativeAndSupply wraps the coin before swapping it', async () => {
  const fx = await deployRouterFixture();
  await fundNative(fx, ALICE, 15n * E18);
  const data = await swapData(fx, fx.wbnb, fx.usdt, 10n * E18, fx.router.address);

  await fx.chain.transact(ALICE, (msg) =>
    fx.router.swapNativeAndSupply(msg, fx.vUsdt.address, 10n * E18, data, 10n * E18),
  );
  expectEqual(fx.vUsdt.balanceOf(ALICE), 10n * E18);
  expectEqual(fx.chain.native.balanceOf(ALICE), 5n * E18);
  expectEqual(fx.chain.native.balanceOf(fx.wbnb.address), 10n * E18);
  expectEqual(fx.wbnb.balanceOf(fx.exchange.address), 10n * E18);

  await fx.chain.transact(ALICE, (msg) => fx.router.swapNativeAndSupply(msg, fx.vBnb.address, 5n * E18, '0x', 5n * E18));
  expectEqual(fx.vBnb.balanceOf(ALICE), 5n * E18);
  expectEqual(fx.chain.native.balanceOf(ALICE), 0n);
});

test('swapAndRepay repays the debt and returns the excess output', async () => {
  const fx = await deployRouterFixture();
  await borrowUsdt(fx);
  await fund(fx, fx.btc, ALICE, E18);
  const data = await swapData(fx, fx.btc, fx.usdt, E18, fx.router.address);

  const { result, events } = await fx.chain.transact(ALICE, (msg) =>
    fx.router.swapAndRepay(msg, fx.vUsdt.address, fx.btc.address, E18, 100n * E18, data),
  );

  expectEqual(result, 50n * E18);
  expectEqual(fx.vUsdt.borrowBalanceStored(ALICE), 0n);
  expectEqual(fx.usdt.balanceOf(ALICE), 100n * E18);
  expectEqual(fx.btc.balanceOf(ALICE), 0n);
  expectEqual(fx.usdt.balanceOf(fx.router.address), 0n);
  const repaid = eventsNamed(events, 'SwapAndRepay');
  expectEqual(repaid.length, 1);
  expectEqual(repaid[0].args.amountOut, 100n * E18);
  expectEqual(repaid[0].args.amountRepaid, 50n * E18);
});

test('repaying without debt is refused', async () => {
  const fx = await deployRouterFixture();
  await fund(fx, fx.btc, BOB, E18);
  const data = await swapData(fx, fx.btc, fx.usdt, E18, fx.router.address);

  await expectRevert(
    () => fx.chain.transact(BOB, (msg) => fx.router.swapAndRepay(msg, fx.vUsdt.address, fx.btc.address, E18, 0n, data)),
    'ZeroAmount',
  );
  await expectRevert(
    () => fx.chain.transact(BOB, (msg) => fx.router.swapAndRepayFull(msg, fx.vUsdt.address, fx.btc.address, E18, data)),
    'ZeroAmount',
  );
  expectEqual(fx.btc.balanceOf(BOB), E18);
});

test('swapAndRepayFull needs an output covering the whole debt', async () => {
  const fx = await deployRouterFixture();
  await borrowUsdt(fx);
  await fund(fx, fx.btc, ALICE, E18);

  const short = await swapData(fx, fx.btc, fx.usdt, 4n * 10n ** 17n, fx.router.address);
  await expectRevert(
    () =>
      fx.chain.transact(ALICE, (msg) =>
        fx.router.swapAndRepayFull(msg, fx.vUsdt.address, fx.btc.address, 4n * 10n ** 17n, short),
      ),
    'InsufficientAmountOut',
  );
  expectEqual(fx.vUsdt.borrowBalanceStored(ALICE), 50n * E18);

  const exact = await swapData(fx, fx.btc, fx.usdt, 5n * 10n ** 17n, fx.router.address);
  await fx.chain.transact(ALICE, (msg) =>
    fx.router.swapAndRepayFull(msg, fx.vUsdt.address, fx.btc.address, 5n * 10n ** 17n, exact),
  );
  expectEqual(fx.vUsdt.borrowBalanceStored(ALICE), 0n);
  expectEqual(fx.btc.balanceOf(ALICE), 5n * 10n ** 17n);
  expectEqual(fx.usdt.balanceOf(ALICE), 50n * E18);
});

test('swapNativeAndRepay repays from wrapped coin and refunds the rest', async () => {
  const fx = await deployRouterFixture();
  await borrowUsdt(fx);
  await fundNative(fx, ALICE, 60n * E18);
  const data = await swapData(fx, fx.wbnb, fx.usdt, 60n * E18, fx.router.address);

  await fx.chain.transact(ALICE, (msg) => fx.router.swapNativeAndRepay(msg, fx.vUsdt.address, 0n, data, 60n * E18));

  expectEqual(fx.vUsdt.borrowBalanceStored(ALICE), 0n);
  expectEqual(fx.usdt.balanceOf(ALICE), 60n * E18);
  expectEqual(fx.chain.native.balanceOf(ALICE), 0n);
});

test('only the owner sweeps tokens and native coin', async () => {
  const fx = await deployRouterFixture();
  await mintTo(fx, fx.usdt, ALICE, 3n * E18);
  await fundNative(fx, ALICE, 2n * E18);
  await fx.chain.transact(ALICE, (msg) => {
    fx.usdt.transfer(msg, fx.router.address, 3n * E18);
    fx.chain.native.transfer(msg, fx.router.address, 2n * E18);
  });

  await expectRevert(() => fx.chain.transact(BOB, (msg) => fx.router.sweepToken(msg, fx.usdt.address)), 'Unauthorized');
  await expectRevert(() => fx.chain.transact(BOB, (msg) => fx.router.sweepNative(msg)), 'Unauthorized');

  const { events } = await fx.chain.transact(GOV, (msg) => {
    fx.router.sweepToken(msg, fx.usdt.address);
    fx.router.sweepNative(msg);
  });
  expectEqual(fx.usdt.balanceOf(GOV), 3n * E18);
  expectEqual(fx.chain.native.balanceOf(GOV), 2n * E18);
  expectEqual(fx.usdt.balanceOf(fx.router.address), 0n);
  expectEqual(eventsNamed(events, 'SweepToken')[0].args.amount, 3n * E18);
  expectEqual(eventsNamed(events, 'SweepNative')[0].args.amount, 2n * E18);
  expect(fx.router.owner() === GOV, 'governance owns the router');
});
