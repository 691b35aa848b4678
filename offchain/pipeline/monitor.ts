import type { Address } from 'viem';
import { log } from '../infra/logger';
import { counter, gauge } from '../infra/metrics';
import { isMarginError } from '../margin/errors';
import type { HealthEngine } from '../margin/health_engine';
import { wadToNumber, INFINITE_HEALTH_FACTOR } from '../margin/math';
import type { SubAccountStore } from '../margin/sub_accounts';
import type { HealthStatus, LiquidationResult } from '../margin/types';
import { serializeError } from '../util/serialize';

export type MonitorOptions = {
  keeper: Address;
  autoLiquidate: boolean;
  scanIntervalMs: number;
};

export type ScanFailure = {
  account: Address;
  stage: 'evaluate' | 'liquidate';
  code: string;
  message: string;
};

export type ScanReport = {
  evaluated: number;
  statuses: HealthStatus[];
  liquidatable: Address[];
  liquidated: LiquidationResult[];
  failures: ScanFailure[];
  startedAt: number;
  finishedAt: number;
};

function failureOf(account: Address, stage: ScanFailure['stage'], err: unknown): ScanFailure {
  return {
    account,
    stage,
    code: isMarginError(err) ? err.code : 'unexpected',
    message: serializeError(err),
  };
}

export class LiquidationMonitor {
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private readonly monitorLog = log.child({ module: 'pipeline.monitor' });

  constructor(
    private readonly engine: HealthEngine,
    private readonly subAccounts: SubAccountStore,
    private readonly options: MonitorOptions,
  ) {}

  async scanOnce(): Promise<ScanReport> {
    const startedAt = Date.now();
    const report: ScanReport = {
      evaluated: 0,
      statuses: [],
      liquidatable: [],
      liquidated: [],
      failures: [],
      startedAt,
      finishedAt: startedAt,
    };

    for (const sub of this.subAccounts.list()) {
      let status: HealthStatus;
      try {
        status = await this.engine.evaluateHealth(sub.owner);
      } catch (err) {
        this.recordFailure(report, failureOf(sub.owner, 'evaluate', err));
        continue;
      }
      report.evaluated += 1;
      report.statuses.push(status);
      gauge.accountHealthFactor
        .labels({ account: sub.owner })
        .set(status.healthFactor === INFINITE_HEALTH_FACTOR ? -1 : wadToNumber(status.healthFactor));
      gauge.accountDebtValue.labels({ account: sub.owner }).set(Number(status.debtValue));

      if (status.healthy) continue;
      report.liquidatable.push(sub.owner);
      if (!this.options.autoLiquidate) {
        this.monitorLog.warn({ account: sub.owner, debtValue: status.debtValue.toString() }, 'account-liquidatable');
        continue;
      }
      try {
        report.liquidated.push(await this.engine.liquidate(sub.owner, this.options.keeper));
      } catch (err) {
        this.recordFailure(report, failureOf(sub.owner, 'liquidate', err));
      }
    }

    report.finishedAt = Date.now();
    gauge.liquidatableAccounts.set(report.liquidatable.length);
    counter.scans.inc();
    this.monitorLog.info(
      {
        evaluated: report.evaluated,
        liquidatable: report.liquidatable.length,
        liquidated: report.liquidated.length,
        failures: report.failures.length,
        durationMs: report.finishedAt - startedAt,
      },
      'monitor-scan-complete',
    );
    return report;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.monitorLog.info(
      { intervalMs: this.options.scanIntervalMs, autoLiquidate: this.options.autoLiquidate },
      'monitor-started',
    );
    this.schedule(0);
  }

  stop(): void {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  get isRunning(): boolean {
    return this.running;
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.scanOnce()
        .catch((err) => {
          this.monitorLog.error({ err: serializeError(err) }, 'monitor-scan-crashed');
        })
        .finally(() => {
          if (this.running) this.schedule(this.options.scanIntervalMs);
        });
    }, delayMs);
  }

  private recordFailure(report: ScanReport, failure: ScanFailure): void {
    report.failures.push(failure);
    counter.scanFailures.inc({ code: failure.code });
    this.monitorLog.warn(failure, 'monitor-account-failed');
  }
}
