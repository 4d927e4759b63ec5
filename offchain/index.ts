import './infra/env';
import { loadConfig } from './infra/config';
import { log } from './infra/logger';
import { startMetricsServer } from './infra/metrics_server';
import { bootstrap } from './deploy/bootstrap';
import { startSentinelKeeper } from './keeper/sentinel_keeper';

async function main(): Promise<void> {
  const cfg = loadConfig();
  const deployment = await bootstrap(cfg);

  const promPort = Number(process.env.PROM_PORT ?? 0);
  const metricsServer = promPort > 0 ? startMetricsServer(promPort) : null;

  const keeper = startSentinelKeeper({
    chain: deployment.chain,
    keeper: cfg.sentinel.keepers[0],
    sentinel: deployment.sentinel,
    markets: deployment.monitoredMarkets,
    intervalMs: cfg.sentinel.intervalMs,
  });

  const shutdown = (signal: string) => {
    log.warn({ signal }, 'shutdown-requested');
    keeper.stop();
    metricsServer?.close();
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err) => {
  log.error({ err: err instanceof Error ? err.message : String(err) }, 'sentinel-service-fatal');
  process.exit(1);
});
