import type { Address } from 'viem';
import type { Chain } from '../chain/chain';
import type { Msg } from '../chain/context';
import { revertReason } from '../chain/errors';
import { createKillSwitch } from '../infra/kill_switch';
import { log } from '../infra/logger';
import { counter, histogram } from '../infra/metrics';
import type { VToken } from '../market/vtoken';
import type { HandleOutcome, MarketState } from '../sentinel/base_sentinel';

const keeperLog = log.child({ module: 'sentinel-keeper' });

/** The part of a deviation sentinel the keeper drives. */
export type KeeperSentinel = {
  readonly address: Address;
  readonly contractName: string;
  handleDeviation(msg: Msg, market: Address): HandleOutcome;
};

export type KeeperCheck =
  | { market: string; ok: true; state: MarketState; hasDeviation: boolean; deviationPercent: bigint }
  | { market: string; ok: false; reason: string };

export type KeeperParams = {
  chain: Chain;
  keeper: Address;
  sentinel: KeeperSentinel;
  markets: readonly VToken[];
};

/**
 * One pass over every monitored market, each in its own transaction. A
 * market that reverts is logged and skipped; the rest still run.
 */
export async function runKeeperOnce(params: KeeperParams): Promise<KeeperCheck[]> {
  const { chain, keeper, sentinel, markets } = params;
  const endTimer = histogram.keeperRunMs.startTimer();
  const checks: KeeperCheck[] = [];
  try {
    for (const market of markets) {
      try {
        const { result } = await chain.transact(keeper, (msg) => sentinel.handleDeviation(msg, market.address));
        counter.keeperRuns.inc({ sentinel: sentinel.contractName, outcome: 'handled' });
        if (result.hasDeviation) {
          keeperLog.warn(
            { market: market.symbol, deviationPct: result.deviationPercent.toString(), state: result.state },
            'price-deviation-detected',
          );
        } else {
          keeperLog.debug({ market: market.symbol, state: result.state }, 'price-within-bounds');
        }
        checks.push({
          market: market.symbol,
          ok: true,
          state: result.state,
          hasDeviation: result.hasDeviation,
          deviationPercent: result.deviationPercent,
        });
      } catch (err) {
        const reason = revertReason(err);
        counter.keeperRuns.inc({ sentinel: sentinel.contractName, outcome: 'failed' });
        keeperLog.error({ market: market.symbol, reason }, 'keeper-check-failed');
        checks.push({ market: market.symbol, ok: false, reason });
      }
    }
  } finally {
    endTimer();
  }
  return checks;
}

export type KeeperHandle = {
  stop: () => void;
};

export type KeeperLoopParams = KeeperParams & {
  intervalMs: number;
  /** Passes are skipped while this file exists. Defaults to KILL_SWITCH_FILE. */
  haltFile?: string;
  /** How often the halt file is re-read. */
  haltPollMs?: number;
};

/** Runs `runKeeperOnce` every `intervalMs` until stopped. */
export function startSentinelKeeper(params: KeeperLoopParams): KeeperHandle {
  let stopped = false;
  let timer: NodeJS.Timeout | null = null;
  const killSwitch = createKillSwitch({ path: params.haltFile, pollMs: params.haltPollMs });

  const tick = async (): Promise<void> => {
    if (killSwitch.isActive()) {
      counter.keeperRuns.inc({ sentinel: params.sentinel.contractName, outcome: 'halted' });
      keeperLog.error({ killSwitch: killSwitch.path }, 'kill-switch-triggered');
    } else {
      await runKeeperOnce(params);
    }
  };

  const schedule = () => {
    if (stopped) return;
    timer = setTimeout(() => {
      timer = null;
      tick()
        .catch((err) => keeperLog.error({ reason: revertReason(err) }, 'keeper-pass-failed'))
        .finally(schedule);
    }, params.intervalMs);
  };

  keeperLog.info(
    { sentinel: params.sentinel.contractName, markets: params.markets.map((m) => m.symbol), intervalMs: params.intervalMs },
    'keeper-started',
  );
  schedule();

  return {
    stop: () => {
      if (stopped) return;
      stopped = true;
      if (timer) {
        clearTimeout(timer);
        timer = null;
      }
      keeperLog.info('keeper-stopped');
    },
  };
}
