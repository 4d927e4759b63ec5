import fs from 'fs';
import YAML from 'yaml';
import { parseUnits } from 'viem';
import { z } from 'zod';
import { DEX_KIND_NAMES } from '../sentinel/dex_pools';
import { EvmAddressSchema } from './address';

const DecimalString = z.union([z.string(), z.number()]).transform((value, ctx) => {
  const text = String(value).trim();
  if (!/^\d+(\.\d+)?$/.test(text)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a non-negative decimal: ${text}` });
    return z.NEVER;
  }
  return text;
});

/** Decimal string scaled to an 18-decimal mantissa. */
const Mantissa = DecimalString.transform((value) => parseUnits(value, 18));

const InterestRateSchema = z.object({
  baseRatePerYear: Mantissa.default('0'),
  multiplierPerYear: Mantissa.default('0'),
  jumpMultiplierPerYear: Mantissa.default('0'),
  kink: Mantissa.default('1'),
});

const TokenSchema = z.object({
  decimals: z.number().int().min(0).max(36),
  priceUsd: DecimalString,
});

const MarketSchema = z.object({
  symbol: z.string().min(1),
  underlying: z.string().min(1),
  native: z.boolean().default(false),
  collateralFactor: Mantissa,
  liquidationThreshold: Mantissa,
  reserveFactor: Mantissa.default('0'),
  flashLoanFee: Mantissa.default('0'),
  flashLoanProtocolShare: Mantissa.default('0'),
  /** Underlying units supplied by the bootstrap lender. */
  initialLiquidity: DecimalString.default('0'),
  interestRate: InterestRateSchema.optional(),
});

const PoolSchema = z.object({
  label: z.string().min(1),
  markets: z.record(
    z.string(),
    z.object({ collateralFactor: Mantissa, liquidationThreshold: Mantissa, borrowAllowed: z.boolean().default(true) }),
  ),
});

const DexPoolSchema = z.object({
  id: z.string().min(1),
  kind: z.enum(DEX_KIND_NAMES),
  asset: z.string().min(1),
  reference: z.string().min(1),
  fee: z.number().int().nonnegative().default(500),
  /** Asset units in a reserve pair; the reference side is sized at the oracle price. */
  assetReserve: DecimalString.default('1000'),
});

const SentinelTokenSchema = z.object({
  pool: z.string().min(1),
  maxDeviationPercent: z.number().int().min(1).max(100),
  enabled: z.boolean().default(true),
});

const ConfigSchema = z.object({
  chainId: z.number().int().positive(),
  startTimestamp: z.number().int().positive().default(1_700_000_000),
  poolModel: z.enum(['core', 'isolated']).default('core'),
  governance: EvmAddressSchema,
  protocolShareReserve: EvmAddressSchema,
  tokens: z.record(z.string(), TokenSchema),
  markets: z.array(MarketSchema).min(1),
  pools: z.array(PoolSchema).default([]),
  converter: z.object({
    backendSigner: EvmAddressSchema,
    /** Inventory of the fixed-rate venue, in underlying units per token symbol. */
    exchangeInventory: z.record(z.string(), DecimalString).default({}),
  }),
  leverage: z
    .object({ exitBorrowDustRecipient: z.enum(['reserve', 'initiator']).default('reserve') })
    .default({}),
  dexPools: z.array(DexPoolSchema).default([]),
  sentinel: z.object({
    mode: z.enum(['pool', 'oracle']).default('pool'),
    keepers: z.array(EvmAddressSchema).min(1),
    intervalMs: z.number().int().positive().default(15_000),
    tokens: z.record(z.string(), SentinelTokenSchema).default({}),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;
export type TokenCfg = z.infer<typeof TokenSchema>;
export type MarketCfg = z.infer<typeof MarketSchema>;
export type DexPoolCfg = z.infer<typeof DexPoolSchema>;

function ensureFile(path: string): string {
  if (!fs.existsSync(path)) {
    throw new Error(`Config missing at ${path}`);
  }
  return fs.readFileSync(path, 'utf8');
}

export function parseConfig(raw: unknown): AppConfig {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new Error(`Invalid config: ${issues.join('; ')}`);
  }
  validateReferences(result.data);
  return result.data;
}

export function loadConfig(path = process.env.CONFIG_PATH || 'config.yaml'): AppConfig {
  return parseConfig(YAML.parse(ensureFile(path)));
}

function validateReferences(cfg: AppConfig): void {
  const marketSymbols = new Set<string>();
  for (const market of cfg.markets) {
    if (!cfg.tokens[market.underlying]) {
      throw new Error(`Market ${market.symbol} references unknown token ${market.underlying}`);
    }
    if (marketSymbols.has(market.symbol)) throw new Error(`Duplicate market ${market.symbol}`);
    if (market.collateralFactor > market.liquidationThreshold) {
      throw new Error(`Market ${market.symbol} collateralFactor exceeds liquidationThreshold`);
    }
    marketSymbols.add(market.symbol);
  }
  if (cfg.markets.filter((m) => m.native).length !== 1) {
    throw new Error('Exactly one market must be marked native');
  }
  if (cfg.poolModel === 'isolated' && cfg.pools.length > 0) {
    throw new Error('Pools require the core pool model');
  }
  for (const pool of cfg.pools) {
    for (const symbol of Object.keys(pool.markets)) {
      if (!marketSymbols.has(symbol)) throw new Error(`Pool ${pool.label} references unknown market ${symbol}`);
    }
  }
  for (const symbol of Object.keys(cfg.converter.exchangeInventory)) {
    if (!cfg.tokens[symbol]) throw new Error(`Exchange inventory references unknown token ${symbol}`);
  }
  const dexIds = new Set<string>();
  for (const pool of cfg.dexPools) {
    if (!cfg.tokens[pool.asset] || !cfg.tokens[pool.reference]) {
      throw new Error(`DEX pool ${pool.id} references an unknown token`);
    }
    if (pool.asset === pool.reference) throw new Error(`DEX pool ${pool.id} pairs a token with itself`);
    dexIds.add(pool.id);
  }
  for (const [symbol, token] of Object.entries(cfg.sentinel.tokens)) {
    if (!cfg.tokens[symbol]) throw new Error(`Sentinel config references unknown token ${symbol}`);
    const pool = cfg.dexPools.find((p) => p.id === token.pool);
    if (!pool || !dexIds.has(token.pool)) throw new Error(`Sentinel token ${symbol} references unknown pool ${token.pool}`);
    if (pool.asset !== symbol) throw new Error(`Sentinel token ${symbol} pool ${token.pool} prices ${pool.asset}`);
    if (cfg.sentinel.mode === 'oracle' && pool.kind === 'pancakeswap_v2') {
      throw new Error(`Sentinel token ${symbol}: oracle mode needs a concentrated-liquidity pool`);
    }
  }
}
