import { Address, maxUint256 } from 'viem';
import { eventsNamed } from '../chain/events';
import { Action } from '../market/types';
import { PositionSwapper } from '../router/position_swapper';
import { test, expect, expectEqual, expectRevert } from './test_harness';
import { ALICE, BOB, E18, Fixture, GOV, deployFixture, mintTo, supply, swapData } from './fixtures';

type SwapperFixture = Fixture & { swapper: PositionSwapper };

/** Adds a governance-owned swapper, whitelisted to seize, serving USDT<->BTC in both directions. */
async function deploySwapperFixture(): Promise<SwapperFixture> {
  const fx = await deployFixture();
  const swapper = fx.chain.deploy(
    (address) => new PositionSwapper(address, fx.chain, { comptroller: fx.comptroller, converter: fx.swapHelper, owner: GOV }),
  );
  await fx.chain.transact(GOV, (msg) => {
    fx.comptroller.setWhitelistedExecutor(msg, swapper.address, true);
    swapper.setApprovedPair(msg, fx.vUsdt.address, fx.vBtc.address, true);
    swapper.setApprovedPair(msg, fx.vBtc.address, fx.vUsdt.address, true);
  });
  return { ...fx, swapper };
}

async function approveSwapper(fx: SwapperFixture, account: Address): Promise<void> {
  await fx.chain.transact(account, (msg) => fx.comptroller.updateDelegate(msg, fx.swapper.address, true));
}

/** ALICE backs 10 BTC, borrows 50 USDT and lets the swapper act for her. */
async function borrowUsdt(fx: SwapperFixture): Promise<void> {
  await supply(fx, ALICE, fx.vBtc, 10n * E18);
  await fx.chain.transact(ALICE, (msg) => fx.vUsdt.borrow(msg, 50n * E18));
  await approveSwapper(fx, ALICE);
}

const PAUSABLE_STEPS = [
  { market: 'vUsdt', action: Action.SEIZE, code: 'SeizeFailed' },
  { market: 'vUsdt', action: Action.REDEEM, code: 'RedeemFailed' },
  { market: 'vBtc', action: Action.MINT, code: 'MintFailed' },
] as const;

test('swapCollateral moves a whole entered supply into the target market', async () => {
  const fx = await deploySwapperFixture();
  await supply(fx, ALICE, fx.vUsdt, 100n * E18);
  await approveSwapper(fx, ALICE);
  const data = await swapData(fx, fx.usdt, fx.btc, 100n * E18, fx.swapper.address);

  const { result, events } = await fx.chain.transact(ALICE, (msg) =>
    fx.swapper.swapCollateral(msg, ALICE, fx.vUsdt.address, fx.vBtc.address, maxUint256, E18, data),
  );

  expectEqual(result, E18);
  expectEqual(fx.vUsdt.balanceOf(ALICE), 0n);
  expectEqual(fx.vBtc.balanceOf(ALICE), E18);
  expect(fx.comptroller.checkMembership(ALICE, fx.vBtc.address), 'target market should be entered');
  expectEqual(fx.vUsdt.balanceOf(fx.swapper.address), 0n);
  expectEqual(fx.usdt.balanceOf(fx.swapper.address), 0n);
  const swapped = eventsNamed(events, 'CollateralSwapped');
  expectEqual(swapped.length, 1);
  expectEqual(swapped[0].args.seizedTokens, 100n * E18);
  expectEqual(swapped[0].args.amountRedeemed, 100n * E18);
  expectEqual(swapped[0].args.amountSupplied, E18);
});

test('a partial collateral swap leaves the rest and enters nothing new', async () => {
  const fx = await deploySwapperFixture();
  await supply(fx, ALICE, fx.vUsdt, 100n * E18, { enter: false });
  const data = await swapData(fx, fx.usdt, fx.btc, 40n * E18, fx.swapper.address);

  await fx.chain.transact(ALICE, (msg) =>
    fx.swapper.swapCollateral(msg, ALICE, fx.vUsdt.address, fx.vBtc.address, 40n * E18, 0n, data),
  );

  expectEqual(fx.vUsdt.balanceOf(ALICE), 60n * E18);
  expectEqual(fx.vBtc.balanceOf(ALICE), 4n * 10n ** 17n);
  expect(!fx.comptroller.checkMembership(ALICE, fx.vBtc.address), 'an unentered supply stays unentered');
});

test('swapCollateral enforces the caller, the amount and the pair', async () => {
  const fx = await deploySwapperFixture();
  await supply(fx, ALICE, fx.vUsdt, 100n * E18, { enter: false });
  const data = await swapData(fx, fx.usdt, fx.btc, 100n * E18, fx.swapper.address);
  const swap = (sender: Address, user: Address, from: Address, to: Address, amount: bigint) =>
    fx.chain.transact(sender, (msg) => fx.swapper.swapCollateral(msg, user, from, to, amount, 0n, data));

  await expectRevert(() => swap(BOB, ALICE, fx.vUsdt.address, fx.vBtc.address, maxUint256), 'Unauthorized');
  await expectRevert(() => swap(ALICE, ALICE, fx.vUsdt.address, fx.vBtc.address, 0n), 'ZeroAmount');
  await expectRevert(() => swap(BOB, BOB, fx.vUsdt.address, fx.vBtc.address, maxUint256), 'NoVTokenBalance');
  await expectRevert(() => swap(ALICE, ALICE, fx.vUsdt.address, fx.vBtc.address, 101n * E18), 'NoVTokenBalance');
  await expectRevert(() => swap(ALICE, ALICE, fx.vUsdt.address, fx.vBnb.address, maxUint256), 'PairNotApproved');
  await expectRevert(() => swap(ALICE, ALICE, fx.vUsdt.address, fx.vUsdt.address, maxUint256), 'IdenticalMarkets');
  await expectRevert(
    () => fx.chain.transact(BOB, (msg) => fx.swapper.setApprovedPair(msg, fx.vUsdt.address, fx.vBnb.address, true)),
    'Unauthorized',
  );
  expectEqual(fx.vUsdt.balanceOf(ALICE), 100n * E18);
});

test('a collateral swap that would leave a shortfall is rolled back', async () => {
  const fx = await deploySwapperFixture();
  await supply(fx, ALICE, fx.vUsdt, 100n * E18);
  await fx.chain.transact(ALICE, (msg) => fx.vBnb.borrow(msg, 50n * E18));
  await approveSwapper(fx, ALICE);
  await fx.chain.transact(GOV, (msg) => fx.exchange.setRate(msg, fx.usdt.address, fx.btc.address, 10n ** 15n));
  const data = await swapData(fx, fx.usdt, fx.btc, 100n * E18, fx.swapper.address);

  await expectRevert(
    () =>
      fx.chain.transact(ALICE, (msg) =>
        fx.swapper.swapCollateral(msg, ALICE, fx.vUsdt.address, fx.vBtc.address, maxUint256, 0n, data),
      ),
    'SwapCausesLiquidation',
  );
  expectEqual(fx.vUsdt.balanceOf(ALICE), 100n * E18);
  expectEqual(fx.vBtc.balanceOf(ALICE), 0n);
});

test('paused market steps surface as the matching collateral swap error', async () => {
  const fx = await deploySwapperFixture();
  await supply(fx, ALICE, fx.vUsdt, 100n * E18, { enter: false });
  const data = await swapData(fx, fx.usdt, fx.btc, 100n * E18, fx.swapper.address);

  for (const step of PAUSABLE_STEPS) {
    const market = fx[step.market].address;
    await fx.chain.transact(GOV, (msg) => fx.comptroller.setActionsPaused(msg, [market], [step.action], true));
    await expectRevert(
      () =>
        fx.chain.transact(ALICE, (msg) =>
          fx.swapper.swapCollateral(msg, ALICE, fx.vUsdt.address, fx.vBtc.address, maxUint256, 0n, data),
        ),
      step.code,
    );
    await fx.chain.transact(GOV, (msg) => fx.comptroller.setActionsPaused(msg, [market], [step.action], false));
  }
  expectEqual(fx.vUsdt.balanceOf(ALICE), 100n * E18);
});

test('swapDebt moves a whole borrow to another market', async () => {
  const fx = await deploySwapperFixture();
  await borrowUsdt(fx);
  const data = await swapData(fx, fx.btc, fx.usdt, 5n * 10n ** 17n, fx.swapper.address);

  const { result, events } = await fx.chain.transact(ALICE, (msg) =>
    fx.swapper.swapDebt(msg, ALICE, fx.vUsdt.address, fx.vBtc.address, maxUint256, 5n * 10n ** 17n, data),
  );

  expectEqual(result, 50n * E18);
  expectEqual(fx.vUsdt.borrowBalanceStored(ALICE), 0n);
  expectEqual(fx.vBtc.borrowBalanceStored(ALICE), 5n * 10n ** 17n);
  expectEqual(fx.usdt.balanceOf(fx.swapper.address), 0n);
  expectEqual(fx.btc.balanceOf(fx.swapper.address), 0n);
  const swapped = eventsNamed(events, 'DebtSwapped');
  expectEqual(swapped.length, 1);
  expectEqual(swapped[0].args.amountRepaid, 50n * E18);
  expectEqual(swapped[0].args.amountBorrowed, 5n * 10n ** 17n);
});

test('a partial debt swap hands surplus output to the borrower', async () => {
  const fx = await deploySwapperFixture();
  await borrowUsdt(fx);
  const data = await swapData(fx, fx.btc, fx.usdt, 3n * 10n ** 17n, fx.swapper.address);

  await fx.chain.transact(ALICE, (msg) =>
    fx.swapper.swapDebt(msg, ALICE, fx.vUsdt.address, fx.vBtc.address, 20n * E18, 3n * 10n ** 17n, data),
  );

  expectEqual(fx.vUsdt.borrowBalanceStored(ALICE), 30n * E18);
  expectEqual(fx.vBtc.borrowBalanceStored(ALICE), 3n * 10n ** 17n);
  expectEqual(fx.usdt.balanceOf(ALICE), 60n * E18);
});

test('swapDebt rejects missing debt, oversized repayments and short swaps', async () => {
  const fx = await deploySwapperFixture();
  await borrowUsdt(fx);
  const data = await swapData(fx, fx.btc, fx.usdt, 4n * 10n ** 17n, fx.swapper.address);
  const swap = (sender: Address, repay: bigint, borrow: bigint) =>
    fx.chain.transact(sender, (msg) =>
      fx.swapper.swapDebt(msg, sender, fx.vUsdt.address, fx.vBtc.address, repay, borrow, data),
    );

  await expectRevert(() => swap(BOB, maxUint256, E18), 'NoBorrowBalance');
  await expectRevert(() => swap(ALICE, 60n * E18, E18), 'NoBorrowBalance');
  await expectRevert(() => swap(ALICE, 0n, E18), 'ZeroAmount');
  await expectRevert(() => swap(ALICE, maxUint256, 4n * 10n ** 17n), 'InsufficientAmountOut');

  await fx.chain.transact(ALICE, (msg) => fx.comptroller.updateDelegate(msg, fx.swapper.address, false));
  await expectRevert(() => swap(ALICE, 40n * E18, 4n * 10n ** 17n), 'NotAnApprovedDelegate');
  expectEqual(fx.vUsdt.borrowBalanceStored(ALICE), 50n * E18);
  expectEqual(fx.vBtc.borrowBalanceStored(ALICE), 0n);
});

test('only the owner sweeps tokens left on the swapper', async () => {
  const fx = await deploySwapperFixture();
  await mintTo(fx, fx.wbnb, ALICE, 2n * E18);
  await fx.chain.transact(ALICE, (msg) => fx.wbnb.transfer(msg, fx.swapper.address, 2n * E18));

  await expectRevert(
    () => fx.chain.transact(ALICE, (msg) => fx.swapper.sweepToken(msg, fx.wbnb.address)),
    'Unauthorized',
  );
  await fx.chain.transact(GOV, (msg) => fx.swapper.sweepToken(msg, fx.wbnb.address));
  expectEqual(fx.wbnb.balanceOf(GOV), 2n * E18);
  expectEqual(fx.wbnb.balanceOf(fx.swapper.address), 0n);
});
