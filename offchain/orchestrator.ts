import './infra/env';
import './infra/metrics_server';
import type { Hex } from 'viem';
import { loadConfig, type AppConfig } from './infra/config';
import { log } from './infra/logger';
import { gauge } from './infra/metrics';
import { createClients } from './infra/rpc_clients';
import { PositionAggregator } from './margin/aggregator';
import { HealthEngine } from './margin/health_engine';
import { BalanceLedger } from './margin/ledger';
import { MarginManager } from './margin/manager';
import { MarketRegistry } from './margin/market_registry';
import { SubAccountStore } from './margin/sub_accounts';
import { LiquidationMonitor } from './pipeline/monitor';
import { MorphoBlueLending } from './protocols/morphoblue';
import { RisexExchange } from './protocols/risex';
import { buildServer } from './risk_engine/server';
import { MorphoOracleFeed } from './util/morpho_oracle';

function keeperKey(): Hex | undefined {
  const raw = process.env.KEEPER_PRIVATE_KEY?.trim();
  if (!raw) return undefined;
  if (!/^0x[0-9a-fA-F]{64}$/.test(raw)) {
    throw new Error('KEEPER_PRIVATE_KEY must be a 32-byte hex string');
  }
  return `0x${raw.slice(2)}`;
}

export function buildKeeper(cfg: AppConfig, privateKey?: Hex) {
  const { publicClient, walletClient } = createClients(cfg, privateKey);
  const registry = new MarketRegistry(cfg.markets);
  gauge.registeredMarkets.set(registry.size);

  const loanDecimals = registry.loanDecimals() ?? 6;
  const lending = new MorphoBlueLending(cfg.morphoBlue, publicClient, walletClient);
  const exchange = new RisexExchange(cfg.exchange, loanDecimals, publicClient, walletClient);
  const oracle = new MorphoOracleFeed(publicClient);

  const subAccounts = new SubAccountStore(cfg.subAccounts);
  subAccounts.preload(cfg.subAccounts.owners);
  const ledger = new BalanceLedger();
  const aggregator = new PositionAggregator({ registry, lending, oracle, exchange, callTimeoutMs: cfg.callTimeoutMs });
  const engine = new HealthEngine({
    registry,
    aggregator,
    subAccounts,
    ledger,
    lending,
    exchange,
    risk: cfg.risk,
    callTimeoutMs: cfg.callTimeoutMs,
  });
  const manager = new MarginManager({
    registry,
    aggregator,
    engine,
    subAccounts,
    ledger,
    lending,
    exchange,
    callTimeoutMs: cfg.callTimeoutMs,
  });

  const keeper = cfg.keeper.address ?? walletClient?.account.address;
  const monitor = keeper
    ? new LiquidationMonitor(engine, subAccounts, {
        keeper,
        autoLiquidate: cfg.keeper.autoLiquidate,
        scanIntervalMs: cfg.keeper.scanIntervalMs,
      })
    : null;
  const server = buildServer({ engine, manager, registry, subAccounts });

  return { registry, subAccounts, ledger, aggregator, engine, manager, monitor, server };
}

async function main() {
  const cfg = loadConfig();
  const keeper = buildKeeper(cfg, keeperKey());

  if (keeper.monitor) {
    keeper.monitor.start();
  } else {
    log.warn('monitor-disabled-no-keeper-address');
  }

  const { host, port } = cfg.server;
  await keeper.server.listen({ port, host });
  log.info({ port, host, markets: keeper.registry.size }, 'risk-engine-ready');

  const shutdown = async (signal: string) => {
    log.info({ signal }, 'shutdown');
    keeper.monitor?.stop();
    await keeper.server.close();
    process.exit(0);
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err) => {
        log.error({ err: err instanceof Error ? err.message : String(err), signal }, 'shutdown-failed');
        process.exit(1);
      });
    });
  }
}

if (require.main === module) {
  main().catch((err) => {
    log.fatal({ err: err instanceof Error ? err.message : String(err) }, 'risk-engine-failed');
    process.exit(1);
  });
}
