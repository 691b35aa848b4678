import client from 'prom-client';

export const registry = new client.Registry();
client.collectDefaultMetrics({ register: registry });

export const gauge = {
  accountHealthFactor: new client.Gauge({
    name: 'account_health_factor',
    help: 'Latest health factor per sub-account (WAD as float, -1 when debt is zero)',
    labelNames: ['account'],
    registers: [registry],
  }),
  accountDebtValue: new client.Gauge({
    name: 'account_debt_value',
    help: 'Latest debt value per sub-account in loan-token units',
    labelNames: ['account'],
    registers: [registry],
  }),
  liquidatableAccounts: new client.Gauge({
    name: 'liquidatable_accounts',
    help: 'Number of liquidatable accounts in the last scan',
    registers: [registry],
  }),
  registeredMarkets: new client.Gauge({
    name: 'registered_markets',
    help: 'Number of markets in the registry',
    registers: [registry],
  }),
};

export const counter = {
  liquidations: new client.Counter({
    name: 'liquidations_total',
    help: 'Liquidation attempts by outcome',
    labelNames: ['outcome'],
    registers: [registry],
  }),
  seizedCollateral: new client.Counter({
    name: 'seized_collateral_markets_total',
    help: 'Markets whose collateral was seized',
    labelNames: ['market'],
    registers: [registry],
  }),
  externalCallErrors: new client.Counter({
    name: 'external_call_errors_total',
    help: 'Failed collaborator calls',
    labelNames: ['source', 'operation', 'kind'],
    registers: [registry],
  }),
  scans: new client.Counter({
    name: 'monitor_scans_total',
    help: 'Completed monitor scans',
    registers: [registry],
  }),
  scanFailures: new client.Counter({
    name: 'monitor_scan_failures_total',
    help: 'Per-account failures during monitor scans',
    labelNames: ['code'],
    registers: [registry],
  }),
  managerOps: new client.Counter({
    name: 'manager_operations_total',
    help: 'Owner operations by name and outcome',
    labelNames: ['operation', 'outcome'],
    registers: [registry],
  }),
};

export const histogram = {
  externalCallDuration: new client.Histogram({
    name: 'external_call_duration_seconds',
    help: 'Duration of collaborator calls in seconds',
    labelNames: ['source', 'operation', 'status'],
    buckets: [0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
    registers: [registry],
  }),
  aggregateDuration: new client.Histogram({
    name: 'aggregate_duration_seconds',
    help: 'Time spent aggregating one account',
    buckets: [0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5],
    registers: [registry],
  }),
};
