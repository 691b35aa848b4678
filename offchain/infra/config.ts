import fs from 'fs';
import path from 'path';
import YAML from 'yaml';
import { parseUnits, type Address, type Hex } from 'viem';
import { z } from 'zod';
import { MarginError, MarginErrorCode } from '../margin/errors';
import type { MarketInput, RiskParams } from '../margin/types';
import { Bytes32Schema, EvmAddressSchema } from './address';
import { log } from './logger';

const DECIMAL_RE = /^\d+(\.\d+)?$/;

// Fractions are written as decimals (0.85) and carried as WAD bigints.
const WadFractionSchema = z.union([z.number(), z.string()]).transform((value, ctx) => {
  const text = typeof value === 'number' ? value.toString() : value.trim();
  if (!DECIMAL_RE.test(text)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a decimal fraction, got ${text}` });
    return z.NEVER;
  }
  return parseUnits(text, 18);
});

const DecimalsSchema = z.number().int().min(0).max(36);

const MarketSchema = z.object({
  label: z.string().min(1).optional(),
  loanToken: EvmAddressSchema,
  collateralToken: EvmAddressSchema,
  oracle: EvmAddressSchema,
  irm: EvmAddressSchema,
  lltv: WadFractionSchema,
  collateralFactor: WadFractionSchema,
  collateralDecimals: DecimalsSchema,
  loanDecimals: DecimalsSchema,
  supported: z.boolean().default(true),
});

const ConfigSchema = z.object({
  chain: z.object({
    id: z.number().int().positive(),
    name: z.string().min(1),
  }),
  rpcUrl: z.string().url().optional(),
  morphoBlue: EvmAddressSchema,
  exchange: EvmAddressSchema,
  subAccounts: z.object({
    factory: EvmAddressSchema,
    initCodeHash: Bytes32Schema,
    // owners whose sub-accounts already exist on chain
    owners: z.array(EvmAddressSchema).default([]),
  }),
  risk: z.object({
    liquidationThreshold: WadFractionSchema.default('0.05'),
    liquidationIncentive: WadFractionSchema.default('0.05'),
    feeRecipient: EvmAddressSchema,
  }),
  callTimeoutMs: z.number().int().positive().default(5_000),
  keeper: z
    .object({
      address: EvmAddressSchema.optional(),
      autoLiquidate: z.boolean().default(false),
      scanIntervalMs: z.number().int().min(1_000).default(15_000),
    })
    .default({}),
  server: z
    .object({
      host: z.string().default('0.0.0.0'),
      port: z.number().int().positive().default(4010),
    })
    .default({}),
  markets: z.array(MarketSchema).min(1),
});

export type AppConfig = {
  chainId: number;
  chainName: string;
  rpcUrl: string;
  morphoBlue: Address;
  exchange: Address;
  subAccounts: { factory: Address; initCodeHash: Hex; owners: Address[] };
  risk: RiskParams;
  callTimeoutMs: number;
  keeper: { address?: Address; autoLiquidate: boolean; scanIntervalMs: number };
  server: { host: string; port: number };
  markets: MarketInput[];
};

const DEFAULT_RPC_URL = 'http://127.0.0.1:8545';

export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new MarginError(MarginErrorCode.InvalidConfig, `invalid margin config: ${issues.join('; ')}`, { issues });
  }
  const cfg = parsed.data;
  const rpcUrl = env.RPC_URL?.trim() || cfg.rpcUrl || DEFAULT_RPC_URL;
  return {
    chainId: cfg.chain.id,
    chainName: cfg.chain.name,
    rpcUrl,
    morphoBlue: cfg.morphoBlue,
    exchange: cfg.exchange,
    subAccounts: cfg.subAccounts,
    risk: cfg.risk,
    callTimeoutMs: cfg.callTimeoutMs,
    keeper: cfg.keeper,
    server: cfg.server,
    markets: cfg.markets,
  };
}

export function loadConfig(file = process.env.MARGIN_CONFIG ?? 'config/margin.yaml'): AppConfig {
  const resolved = path.resolve(process.cwd(), file);
  if (!fs.existsSync(resolved)) {
    throw new MarginError(MarginErrorCode.InvalidConfig, `margin config missing at ${resolved}`);
  }
  const cfg = parseConfig(YAML.parse(fs.readFileSync(resolved, 'utf8')));
  log.info(
    { file: resolved, chainId: cfg.chainId, markets: cfg.markets.map((m) => m.label ?? m.collateralToken) },
    'margin-config-loaded',
  );
  return cfg;
}
