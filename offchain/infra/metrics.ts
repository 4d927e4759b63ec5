import client from 'prom-client';

export const registry = new client.Registry();
client.collectDefaultMetrics({ register: registry });

export const counter = {
  leverageOps: new client.Counter({
    name: 'leverage_operations_total',
    help: 'Leverage operations by kind and outcome',
    labelNames: ['kind', 'outcome'],
    registers: [registry],
  }),
  routerOps: new client.Counter({
    name: 'router_operations_total',
    help: 'Swap router and position swapper operations by kind and outcome',
    labelNames: ['contract', 'kind', 'outcome'],
    registers: [registry],
  }),
  flashLoans: new client.Counter({
    name: 'flash_loans_total',
    help: 'Flash loans settled by the lending market',
    labelNames: ['market'],
    registers: [registry],
  }),
  dustSwept: new client.Counter({
    name: 'leverage_dust_transfers_total',
    help: 'Residual balances swept after a leverage operation',
    labelNames: ['recipient'],
    registers: [registry],
  }),
  sentinelTransitions: new client.Counter({
    name: 'sentinel_transitions_total',
    help: 'Intervention transitions applied by a deviation sentinel',
    labelNames: ['sentinel', 'transition'],
    registers: [registry],
  }),
  keeperRuns: new client.Counter({
    name: 'sentinel_keeper_checks_total',
    help: 'Per-market keeper checks by outcome',
    labelNames: ['sentinel', 'outcome'],
    registers: [registry],
  }),
  undertakerActions: new client.Counter({
    name: 'undertaker_actions_total',
    help: 'Markets paused or unlisted by the undertaker',
    labelNames: ['action'],
    registers: [registry],
  }),
};

export const gauge = {
  deviationPct: new client.Gauge({
    name: 'sentinel_price_deviation_pct',
    help: 'Last observed deviation between the comparison price and the oracle price',
    labelNames: ['sentinel', 'market'],
    registers: [registry],
  }),
  marketState: new client.Gauge({
    name: 'sentinel_market_state',
    help: 'Intervention state per market (0=normal, 1=borrow paused, 2=collateral zeroed)',
    labelNames: ['sentinel', 'market'],
    registers: [registry],
  }),
};

export const histogram = {
  keeperRunMs: new client.Histogram({
    name: 'sentinel_keeper_run_ms',
    help: 'Duration of one keeper pass over all monitored markets',
    buckets: [1, 5, 10, 25, 50, 100, 250, 500, 1000],
    registers: [registry],
  }),
};
