import fs from 'fs';
import os from 'os';
import path from 'path';
import { runKeeperOnce, startSentinelKeeper } from '../keeper/sentinel_keeper';
import { Action } from '../market/types';
import { test, expect, expectEqual } from './test_harness';
import { ALICE, KEEPER, deploySentinelFixture, setPairPrice } from './fixtures';

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

test('a keeper pass handles each market in its own transaction', async () => {
  const fx = await deploySentinelFixture();
  await setPairPrice(fx, 150n);

  const [btc, usdt] = await runKeeperOnce({
    chain: fx.chain,
    keeper: KEEPER,
    sentinel: fx.sentinel,
    markets: [fx.vBtc, fx.vUsdt],
  });

  expectEqual(btc.market, 'vBTC');
  expect(btc.ok && btc.state === 'BORROW_PAUSED' && btc.deviationPercent === 50n, 'vBTC should be paused at 50%');
  expectEqual(usdt.ok ? 'handled' : usdt.reason, 'PriceDeviationSentinel:TokenNotConfigured');
  expect(fx.comptroller.actionPaused(fx.vBtc.address, Action.BORROW), 'the failing market must not undo the other');
});

test('an untrusted keeper gets a failed check per market', async () => {
  const fx = await deploySentinelFixture();

  const checks = await runKeeperOnce({ chain: fx.chain, keeper: ALICE, sentinel: fx.sentinel, markets: [fx.vBtc] });
  expectEqual(checks.length, 1);
  const [check] = checks;
  expectEqual(check.ok ? 'handled' : check.reason, 'PriceDeviationSentinel:UnauthorizedKeeper');
});

test('the keeper loop runs on its interval until stopped', async () => {
  const fx = await deploySentinelFixture();
  await setPairPrice(fx, 80n);

  const keeper = startSentinelKeeper({
    chain: fx.chain,
    keeper: KEEPER,
    sentinel: fx.sentinel,
    markets: [fx.vBtc],
    intervalMs: 5,
  });
  await sleep(60);
  keeper.stop();
  keeper.stop();

  expectEqual(fx.sentinel.marketState(fx.vBtc.address), 'COLLATERAL_ZEROED');
  expectEqual(fx.comptroller.markets(fx.vBtc.address).collateralFactorMantissa, 0n);

  await setPairPrice(fx, 100n);
  await sleep(30);
  expectEqual(fx.sentinel.marketState(fx.vBtc.address), 'COLLATERAL_ZEROED');
});

test('passes are skipped while the halt file exists', async () => {
  const fx = await deploySentinelFixture();
  await setPairPrice(fx, 150n);
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'sentinel-keeper-'));
  const haltFile = path.join(dir, 'halt');
  fs.writeFileSync(haltFile, '');

  const keeper = startSentinelKeeper({
    chain: fx.chain,
    keeper: KEEPER,
    sentinel: fx.sentinel,
    markets: [fx.vBtc],
    intervalMs: 5,
    haltFile,
    haltPollMs: 0,
  });
  try {
    await sleep(40);
    expectEqual(fx.sentinel.marketState(fx.vBtc.address), 'NORMAL');

    fs.rmSync(haltFile);
    await sleep(60);
    expectEqual(fx.sentinel.marketState(fx.vBtc.address), 'BORROW_PAUSED');
  } finally {
    keeper.stop();
    fs.rmSync(dir, { recursive: true, force: true });
  }
});
