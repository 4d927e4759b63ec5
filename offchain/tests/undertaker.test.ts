import { eventsNamed } from '../chain/events';
import { Undertaker } from '../lifecycle/undertaker';
import { Action } from '../market/types';
import { test, expect, expectEqual, expectRevert } from './test_harness';
import { ALICE, E18, Fixture, GOV, LT, deployFixture } from './fixtures';

const UNDERTAKER_FUNCTIONS = [
  'setCollateralFactor',
  'setActionsPaused',
  'setMarketSupplyCaps',
  'setMarketBorrowCaps',
  'unlistMarket',
];

async function deployUndertaker(): Promise<Fixture & { undertaker: Undertaker }> {
  const fx = await deployFixture();
  const undertaker = fx.chain.deploy((address) => new Undertaker(address, fx.chain, fx.comptroller, GOV));
  await fx.chain.transact(GOV, (msg) => {
    for (const fn of UNDERTAKER_FUNCTIONS) {
      fx.acm.giveCallPermission(msg, fx.comptroller.address, fn, undertaker.address);
    }
  });
  return { ...fx, undertaker };
}

test('deposits are valued in USD at the oracle price', async () => {
  const fx = await deployUndertaker();

  expectEqual(fx.undertaker.totalDepositsUsd(fx.vUsdt.address), 1_000n * E18);
  expectEqual(fx.undertaker.totalDepositsUsd(fx.vBtc.address), 100_000n * E18);
  expectEqual(fx.undertaker.totalDepositsUsd(fx.usdt.address), 0n);
});

test('a market below the global threshold can be paused by anyone', async () => {
  const fx = await deployUndertaker();
  await fx.chain.transact(GOV, (msg) => fx.undertaker.setGlobalDepositThreshold(msg, 2_000n * E18));

  expect(fx.undertaker.canPauseMarket(fx.vUsdt.address), 'vUSDT should be pausable');
  expect(!fx.undertaker.canPauseMarket(fx.vBtc.address), 'vBTC is above the threshold');

  const { events } = await fx.chain.transact(ALICE, (msg) => fx.undertaker.pauseMarket(msg, fx.vUsdt.address));
  const entry = fx.comptroller.markets(fx.vUsdt.address);
  expectEqual(entry.collateralFactorMantissa, 0n);
  expectEqual(entry.liquidationThresholdMantissa, LT);
  for (const action of [Action.MINT, Action.BORROW, Action.ENTER_MARKET]) {
    expect(fx.comptroller.actionPaused(fx.vUsdt.address, action), `action ${action} should be paused`);
  }
  expect(!fx.comptroller.actionPaused(fx.vUsdt.address, Action.REDEEM), 'redeem stays open');
  expectEqual(fx.comptroller.supplyCaps(fx.vUsdt.address), 0n);
  expectEqual(fx.comptroller.borrowCaps(fx.vUsdt.address), 0n);
  expect(fx.undertaker.isMarketPaused(fx.vUsdt.address), 'undertaker should record the pause');
  expectEqual(eventsNamed(events, 'MarketPaused').length, 1);

  expect(!fx.undertaker.canPauseMarket(fx.vUsdt.address), 'a paused market cannot be paused again');
  await expectRevert(
    () => fx.chain.transact(ALICE, (msg) => fx.undertaker.pauseMarket(msg, fx.vUsdt.address)),
    'MarketCannotBePaused',
  );
  await expectRevert(
    () => fx.chain.transact(ALICE, (msg) => fx.undertaker.pauseMarket(msg, fx.vBtc.address)),
    'MarketCannotBePaused',
  );
});

test('an expired market is paused and then unlisted', async () => {
  const fx = await deployUndertaker();
  const expiry = fx.chain.now() + 100n;
  await fx.chain.transact(GOV, (msg) =>
    fx.undertaker.setMarketExpiry(msg, fx.vBtc.address, expiry, true, 200_000n * E18),
  );

  expect(!fx.undertaker.canPauseMarket(fx.vBtc.address), 'not expired yet');
  fx.chain.advanceTime(100n);
  expect(fx.undertaker.canPauseMarket(fx.vBtc.address), 'expired market should be pausable');
  expect(!fx.undertaker.canUnlistMarket(fx.vBtc.address), 'unpaused market cannot be unlisted');

  await fx.chain.transact(ALICE, (msg) => fx.undertaker.pauseMarket(msg, fx.vBtc.address));
  expect(fx.undertaker.canUnlistMarket(fx.vBtc.address), 'paused expired market should be unlistable');

  const { events } = await fx.chain.transact(ALICE, (msg) => fx.undertaker.unlistMarket(msg, fx.vBtc.address));
  expectEqual(fx.comptroller.markets(fx.vBtc.address).isListed, false);
  expect(!fx.comptroller.getAllMarkets().includes(fx.vBtc.address), 'market should leave the market list');
  expectEqual(fx.undertaker.marketExpiry(fx.vBtc.address), undefined);
  expectEqual(eventsNamed(events, 'MarketUnlisted').length, 2);
});

test('unlisting needs governance consent and low deposits', async () => {
  const fx = await deployUndertaker();
  const expiry = fx.chain.now() + 100n;
  await fx.chain.transact(GOV, (msg) => {
    fx.undertaker.setMarketExpiry(msg, fx.vBtc.address, expiry, false, 200_000n * E18);
    fx.undertaker.setMarketExpiry(msg, fx.vUsdt.address, expiry, true, 500n * E18);
  });
  fx.chain.advanceTime(100n);
  await fx.chain.transact(ALICE, (msg) => {
    fx.undertaker.pauseMarket(msg, fx.vBtc.address);
    fx.undertaker.pauseMarket(msg, fx.vUsdt.address);
  });

  expect(!fx.undertaker.canUnlistMarket(fx.vBtc.address), 'unlisting was not allowed');
  expect(!fx.undertaker.canUnlistMarket(fx.vUsdt.address), 'deposits are above the unlist threshold');
  await expectRevert(
    () => fx.chain.transact(ALICE, (msg) => fx.undertaker.unlistMarket(msg, fx.vUsdt.address)),
    'MarketCannotBeUnlisted',
  );
});

test('undertaker configuration is owner-only and validated', async () => {
  const fx = await deployUndertaker();

  await expectRevert(
    () => fx.chain.transact(ALICE, (msg) => fx.undertaker.setGlobalDepositThreshold(msg, E18)),
    'Unauthorized',
  );
  await expectRevert(
    () =>
      fx.chain.transact(GOV, (msg) =>
        fx.undertaker.setMarketExpiry(msg, fx.vBtc.address, fx.chain.now(), true, 0n),
      ),
    'ExpiryInPast',
  );
  await expectRevert(
    () =>
      fx.chain.transact(GOV, (msg) =>
        fx.undertaker.setMarketExpiry(msg, fx.usdt.address, fx.chain.now() + 1n, true, 0n),
      ),
    'MarketNotListed',
  );
});
