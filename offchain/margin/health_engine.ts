import { isAddressEqual, zeroAddress, type Address } from 'viem';
import { withAccountLock } from '../infra/account_lock';
import { DEFAULT_CALL_TIMEOUT_MS, guardedCall } from '../infra/instrument';
import { log } from '../infra/logger';
import { counter } from '../infra/metrics';
import type { LendingMarket, MarginExchange } from '../protocols/types';
import { unwrapCall, type PositionAggregator } from './aggregator';
import { MarginError, MarginErrorCode } from './errors';
import type { BalanceLedger } from './ledger';
import type { MarketRegistry } from './market_registry';
import { INFINITE_HEALTH_FACTOR, WAD, mulDivDown, wDivDown } from './math';
import { debitRepaid, planRepay } from './repay';
import type { SubAccountStore } from './sub_accounts';
import type {
  AggregateSnapshot,
  HealthTotals,
  HealthStatus,
  LiquidationResult,
  Repayment,
  RiskParams,
  Seizure,
} from './types';

export const DEFAULT_LIQUIDATION_THRESHOLD = WAD / 20n;
export const DEFAULT_LIQUIDATION_INCENTIVE = WAD / 20n;

export type HealthVerdict = {
  healthFactor: bigint;
  healthy: boolean;
};

/**
 * Health factor is the WAD-scaled margin of net value over debt. Only positive
 * external equity counts toward net value; a negative balance on the exchange
 * does not reduce it.
 */
export function computeHealth(totals: HealthTotals, threshold: bigint): HealthVerdict {
  if (totals.debtValue === 0n) {
    return { healthFactor: INFINITE_HEALTH_FACTOR, healthy: true };
  }
  const equity = totals.externalEquity ?? 0n;
  const netValue = totals.collateralValue + (equity > 0n ? equity : 0n);
  if (netValue < totals.debtValue) {
    return { healthFactor: 0n, healthy: false };
  }
  const healthFactor = wDivDown(netValue - totals.debtValue, totals.debtValue);
  return { healthFactor, healthy: healthFactor >= threshold };
}

export function toHealthStatus(
  account: Address,
  holder: Address | null,
  totals: HealthTotals,
  threshold: bigint,
): HealthStatus {
  const { healthFactor, healthy } = computeHealth(totals, threshold);
  return {
    account,
    holder,
    collateralValue: totals.collateralValue,
    debtValue: totals.debtValue,
    externalEquity: totals.externalEquity ?? 0n,
    exchangeAccountExists: totals.externalEquity !== null,
    healthFactor,
    healthy,
    state: healthy ? 'HEALTHY' : 'LIQUIDATABLE',
  };
}

export function validateRiskParams(risk: RiskParams): RiskParams {
  if (risk.liquidationThreshold < 0n) {
    throw new MarginError(MarginErrorCode.InvalidParameter, 'liquidation threshold must not be negative', {
      liquidationThreshold: risk.liquidationThreshold.toString(),
    });
  }
  if (risk.liquidationIncentive < 0n || risk.liquidationIncentive >= WAD) {
    throw new MarginError(MarginErrorCode.InvalidParameter, 'liquidation incentive must be within [0, 1)', {
      liquidationIncentive: risk.liquidationIncentive.toString(),
    });
  }
  if (isAddressEqual(risk.feeRecipient, zeroAddress)) {
    throw new MarginError(MarginErrorCode.ZeroAddress, 'fee recipient must not be the zero address');
  }
  return risk;
}

export type HealthEngineDeps = {
  registry: MarketRegistry;
  aggregator: PositionAggregator;
  subAccounts: SubAccountStore;
  ledger: BalanceLedger;
  lending: LendingMarket;
  exchange: MarginExchange;
  risk: RiskParams;
  callTimeoutMs?: number;
};

type Progress = {
  withdrawnEquity: bigint;
  repayments: Repayment[];
  seizures: Seizure[];
};

function hasStarted(progress: Progress): boolean {
  return progress.withdrawnEquity > 0n || progress.repayments.length > 0 || progress.seizures.length > 0;
}

export type LiquidationOutcome = 'rejected' | 'failed';

/** A precondition only counts as a rejection while nothing has moved yet. */
export function liquidationOutcome(err: unknown, started: boolean): LiquidationOutcome {
  return !started && err instanceof MarginError && err.category === 'precondition' ? 'rejected' : 'failed';
}

function describeProgress(progress: Progress): Record<string, unknown> {
  return {
    withdrawnEquity: progress.withdrawnEquity.toString(),
    repaidMarkets: progress.repayments.map((r) => r.marketId),
    seizedMarkets: progress.seizures.map((s) => s.marketId),
  };
}

export class HealthEngine {
  private readonly timeoutMs: number;
  private readonly risk: RiskParams;
  private readonly engineLog = log.child({ module: 'margin.engine' });

  constructor(private readonly deps: HealthEngineDeps) {
    this.timeoutMs = deps.callTimeoutMs ?? DEFAULT_CALL_TIMEOUT_MS;
    this.risk = validateRiskParams(deps.risk);
  }

  statusOf(account: Address, snapshot: AggregateSnapshot): HealthStatus {
    return toHealthStatus(account, snapshot.holder, snapshot, this.risk.liquidationThreshold);
  }

  async evaluateHealth(account: Address): Promise<HealthStatus> {
    const sub = this.deps.subAccounts.get(account);
    if (!sub) {
      return toHealthStatus(
        account,
        null,
        { collateralValue: 0n, debtValue: 0n, externalEquity: null },
        this.risk.liquidationThreshold,
      );
    }
    const snapshot = await this.deps.aggregator.aggregate(sub.holder);
    return this.statusOf(account, snapshot);
  }

  async liquidate(account: Address, caller: Address): Promise<LiquidationResult> {
    if (isAddressEqual(caller, zeroAddress)) {
      throw new MarginError(MarginErrorCode.ZeroAddress, 'liquidator must not be the zero address');
    }
    return withAccountLock(account, async () => {
      const progress: Progress = { withdrawnEquity: 0n, repayments: [], seizures: [] };
      try {
        return await this.runLiquidation(account, caller, progress);
      } catch (err) {
        counter.liquidations.inc({ outcome: liquidationOutcome(err, hasStarted(progress)) });
        throw err;
      }
    });
  }

  private async runLiquidation(account: Address, caller: Address, progress: Progress): Promise<LiquidationResult> {
    const { registry, ledger, lending, exchange } = this.deps;
    const sub = this.deps.subAccounts.require(account);
    const holder = sub.holder;
    const snapshot = await this.deps.aggregator.aggregate(holder);
    const healthBefore = this.statusOf(account, snapshot);
    if (healthBefore.healthy) {
      throw new MarginError(MarginErrorCode.PortfolioHealthy, `account ${account} is healthy`, {
        account,
        healthFactor: healthBefore.healthFactor.toString(),
      });
    }

    const loanToken = registry.loanToken();
    let withdrawable = 0n;
    if (loanToken) {
      withdrawable = unwrapCall(
        await guardedCall('exchange', 'withdrawableAmount', () => exchange.withdrawableAmount(holder, loanToken), this.timeoutMs),
        { account, holder },
      );
    }
    const idle = loanToken ? ledger.balanceOf(holder, loanToken) : 0n;
    const hasCollateral = snapshot.markets.some((m) => m.position.collateral > 0n);
    if (withdrawable <= 0n && idle === 0n && !hasCollateral) {
      throw new MarginError(MarginErrorCode.NothingToLiquidate, `account ${account} has nothing to seize or repay`, {
        account,
        debtValue: snapshot.debtValue.toString(),
      });
    }

    try {
      // 1. pull equity off the exchange
      if (loanToken && withdrawable > 0n) {
        const withdrawn = unwrapCall(
          await guardedCall('exchange', 'withdraw', () => exchange.withdraw(holder, loanToken, withdrawable), this.timeoutMs),
          { account, holder },
        );
        if (withdrawn > 0n) {
          ledger.credit(holder, loanToken, withdrawn);
          progress.withdrawnEquity = withdrawn;
        }
      }

      // 2. repay debt with whatever loan token the sub-account holds
      let balance = loanToken ? ledger.balanceOf(holder, loanToken) : 0n;
      for (const entry of snapshot.markets) {
        if (!loanToken || balance === 0n) break;
        if (entry.position.borrowShares === 0n) continue;
        const context = { account, holder, marketId: entry.market.id };
        const state = unwrapCall(
          await guardedCall('lending', 'marketState', () => lending.marketState(entry.market), this.timeoutMs),
          context,
        );
        const request = planRepay(balance, entry.position.borrowShares, state);
        if (!request) continue;
        const receipt = unwrapCall(
          await guardedCall('lending', 'repay', () => lending.repay(holder, entry.market, request), this.timeoutMs),
          context,
        );
        if (receipt.assets > 0n) {
          balance = debitRepaid(ledger, holder, loanToken, receipt.assets);
        }
        progress.repayments.push({ marketId: entry.market.id, assets: receipt.assets, shares: receipt.shares });
      }

      // 3. seize collateral, split between caller and fee recipient
      for (const entry of snapshot.markets) {
        const collateral = entry.position.collateral;
        if (collateral === 0n) continue;
        const seized = unwrapCall(
          await guardedCall(
            'lending',
            'withdrawCollateral',
            () => lending.withdrawCollateral(holder, entry.market, collateral),
            this.timeoutMs,
          ),
          { account, holder, marketId: entry.market.id },
        );
        if (seized <= 0n) continue;
        const token = entry.market.collateralToken;
        const incentiveAmount = mulDivDown(seized, this.risk.liquidationIncentive, WAD);
        const liquidatorAmount = seized - incentiveAmount;
        ledger.credit(holder, token, seized);
        if (liquidatorAmount > 0n) ledger.transfer(holder, caller, token, liquidatorAmount);
        if (incentiveAmount > 0n) ledger.transfer(holder, this.risk.feeRecipient, token, incentiveAmount);
        progress.seizures.push({
          marketId: entry.market.id,
          collateralToken: token,
          collateral: seized,
          liquidatorAmount,
          incentiveAmount,
        });
        counter.seizedCollateral.inc({ market: entry.market.label });
      }
    } catch (err) {
      const steps = describeProgress(progress);
      if (hasStarted(progress)) {
        this.engineLog.error(
          { account, holder, caller, ...steps, err: err instanceof Error ? err.message : String(err) },
          'liquidation-partial',
        );
      }
      if (err instanceof MarginError) {
        throw new MarginError(err.code, err.message, { ...err.detail, completed: steps });
      }
      throw err;
    }

    const result: LiquidationResult = {
      account,
      holder,
      caller,
      feeRecipient: this.risk.feeRecipient,
      incentive: this.risk.liquidationIncentive,
      withdrawnEquity: progress.withdrawnEquity,
      repayments: progress.repayments,
      seizures: progress.seizures,
      healthBefore,
      completedAt: Date.now(),
    };
    counter.liquidations.inc({ outcome: 'completed' });
    this.engineLog.info(
      {
        account,
        holder,
        caller,
        incentive: this.risk.liquidationIncentive.toString(),
        withdrawnEquity: progress.withdrawnEquity.toString(),
        repaid: progress.repayments.length,
        seized: progress.seizures.length,
      },
      'liquidation-complete',
    );
    return result;
  }
}
