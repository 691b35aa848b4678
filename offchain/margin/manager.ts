import { isAddressEqual, type Address } from 'viem';
import { withAccountLock } from '../infra/account_lock';
import { DEFAULT_CALL_TIMEOUT_MS, guardedCall } from '../infra/instrument';
import { log } from '../infra/logger';
import { counter } from '../infra/metrics';
import type { LendingMarket, LendingReceipt, MarginExchange, PerpOrder } from '../protocols/types';
import { unwrapCall, type PositionAggregator } from './aggregator';
import { MarginError, MarginErrorCode } from './errors';
import type { HealthEngine } from './health_engine';
import type { BalanceLedger } from './ledger';
import type { MarketRegistry } from './market_registry';
import { weightedCollateralValue } from './math';
import { debitRepaid, planRepay } from './repay';
import type { SubAccountStore } from './sub_accounts';
import type { AggregateSnapshot, HealthStatus, HealthTotals, MarketId, MarketSnapshot, SubAccount } from './types';

export type MarginManagerDeps = {
  registry: MarketRegistry;
  aggregator: PositionAggregator;
  engine: HealthEngine;
  subAccounts: SubAccountStore;
  ledger: BalanceLedger;
  lending: LendingMarket;
  exchange: MarginExchange;
  callTimeoutMs?: number;
};

function assertPositive(amount: bigint): void {
  if (amount <= 0n) {
    throw new MarginError(MarginErrorCode.InvalidAmount, 'amount must be positive', { amount: amount.toString() });
  }
}

/**
 * Owner-facing operations on a sub-account. Every call is owner-only and runs
 * under the account lock; calls that lower health are checked against the
 * projected status before anything is sent to a collaborator.
 */
export class MarginManager {
  private readonly timeoutMs: number;
  private readonly managerLog = log.child({ module: 'margin.manager' });

  constructor(private readonly deps: MarginManagerDeps) {
    this.timeoutMs = deps.callTimeoutMs ?? DEFAULT_CALL_TIMEOUT_MS;
  }

  async openSubAccount(owner: Address, caller: Address): Promise<SubAccount> {
    return this.run('openSubAccount', owner, caller, async () => this.deps.subAccounts.create(owner), false);
  }

  async fund(owner: Address, caller: Address, token: Address, amount: bigint): Promise<void> {
    await this.run('fund', owner, caller, async (sub) => {
      assertPositive(amount);
      this.deps.ledger.transfer(owner, sub.holder, token, amount);
    });
  }

  async sweep(owner: Address, caller: Address, token: Address, amount: bigint): Promise<void> {
    await this.run('sweep', owner, caller, async (sub) => {
      assertPositive(amount);
      this.deps.ledger.transfer(sub.holder, owner, token, amount);
    });
  }

  async depositCollateral(owner: Address, caller: Address, marketId: MarketId, amount: bigint): Promise<void> {
    await this.run('depositCollateral', owner, caller, async (sub) => {
      assertPositive(amount);
      const market = this.deps.registry.require(marketId);
      this.requireBalance(owner, market.collateralToken, amount);
      unwrapCall(
        await guardedCall(
          'lending',
          'supplyCollateral',
          () => this.deps.lending.supplyCollateral(sub.holder, market, amount),
          this.timeoutMs,
        ),
        { owner, marketId },
      );
      this.deps.ledger.debit(owner, market.collateralToken, amount);
    });
  }

  async withdrawCollateral(owner: Address, caller: Address, marketId: MarketId, amount: bigint): Promise<bigint> {
    return this.run('withdrawCollateral', owner, caller, async (sub) => {
      assertPositive(amount);
      const market = this.deps.registry.require(marketId);
      const snapshot = await this.deps.aggregator.aggregate(sub.holder);
      const entry = this.entryFor(snapshot, marketId);
      if (entry.position.collateral < amount) {
        throw new MarginError(MarginErrorCode.InsufficientBalance, 'withdrawal exceeds posted collateral', {
          marketId,
          collateral: entry.position.collateral.toString(),
          amount: amount.toString(),
        });
      }
      const remainingValue =
        entry.price === null
          ? 0n
          : weightedCollateralValue(
              entry.position.collateral - amount,
              entry.price,
              market.collateralFactor,
              market.collateralDecimals,
              market.loanDecimals,
            );
      this.assertProjectedHealthy(owner, snapshot, {
        collateralValue: snapshot.collateralValue - entry.collateralValue + remainingValue,
        debtValue: snapshot.debtValue,
        externalEquity: snapshot.externalEquity,
      });
      const withdrawn = unwrapCall(
        await guardedCall(
          'lending',
          'withdrawCollateral',
          () => this.deps.lending.withdrawCollateral(sub.holder, market, amount),
          this.timeoutMs,
        ),
        { owner, marketId },
      );
      if (withdrawn > 0n) this.deps.ledger.credit(owner, market.collateralToken, withdrawn);
      return withdrawn;
    });
  }

  async borrow(owner: Address, caller: Address, marketId: MarketId, amount: bigint): Promise<LendingReceipt> {
    return this.run('borrow', owner, caller, async (sub) => {
      assertPositive(amount);
      const market = this.deps.registry.require(marketId);
      const snapshot = await this.deps.aggregator.aggregate(sub.holder);
      this.assertProjectedHealthy(owner, snapshot, {
        collateralValue: snapshot.collateralValue,
        debtValue: snapshot.debtValue + amount,
        externalEquity: snapshot.externalEquity,
      });
      const receipt = unwrapCall(
        await guardedCall('lending', 'borrow', () => this.deps.lending.borrow(sub.holder, market, amount), this.timeoutMs),
        { owner, marketId },
      );
      if (receipt.assets > 0n) this.deps.ledger.credit(sub.holder, market.loanToken, receipt.assets);
      return receipt;
    });
  }

  async repay(owner: Address, caller: Address, marketId: MarketId, amount: bigint): Promise<LendingReceipt> {
    return this.run('repay', owner, caller, async (sub) => {
      assertPositive(amount);
      const market = this.deps.registry.require(marketId);
      this.requireBalance(sub.holder, market.loanToken, amount);
      const snapshot = await this.deps.aggregator.aggregate(sub.holder);
      const entry = this.entryFor(snapshot, marketId);
      const state = unwrapCall(
        await guardedCall('lending', 'marketState', () => this.deps.lending.marketState(market), this.timeoutMs),
        { owner, marketId },
      );
      const request = planRepay(amount, entry.position.borrowShares, state);
      if (!request) {
        throw new MarginError(MarginErrorCode.InvalidAmount, 'nothing to repay on this market', { marketId });
      }
      const receipt = unwrapCall(
        await guardedCall('lending', 'repay', () => this.deps.lending.repay(sub.holder, market, request), this.timeoutMs),
        { owner, marketId },
      );
      if (receipt.assets > 0n) debitRepaid(this.deps.ledger, sub.holder, market.loanToken, receipt.assets);
      return receipt;
    });
  }

  async depositToExchange(owner: Address, caller: Address, token: Address, amount: bigint): Promise<void> {
    await this.run('depositToExchange', owner, caller, async (sub) => {
      assertPositive(amount);
      this.requireBalance(sub.holder, token, amount);
      unwrapCall(
        await guardedCall('exchange', 'deposit', () => this.deps.exchange.deposit(sub.holder, token, amount), this.timeoutMs),
        { owner, token },
      );
      this.deps.ledger.debit(sub.holder, token, amount);
    });
  }

  async withdrawFromExchange(owner: Address, caller: Address, token: Address, amount: bigint): Promise<bigint> {
    return this.run('withdrawFromExchange', owner, caller, async (sub) => {
      assertPositive(amount);
      const withdrawable = unwrapCall(
        await guardedCall(
          'exchange',
          'withdrawableAmount',
          () => this.deps.exchange.withdrawableAmount(sub.holder, token),
          this.timeoutMs,
        ),
        { owner, token },
      );
      if (withdrawable < amount) {
        throw new MarginError(MarginErrorCode.InsufficientBalance, 'withdrawal exceeds withdrawable exchange balance', {
          withdrawable: withdrawable.toString(),
          amount: amount.toString(),
        });
      }
      const snapshot = await this.deps.aggregator.aggregate(sub.holder);
      this.assertProjectedHealthy(owner, snapshot, {
        collateralValue: snapshot.collateralValue,
        debtValue: snapshot.debtValue,
        externalEquity: (snapshot.externalEquity ?? 0n) - amount,
      });
      const withdrawn = unwrapCall(
        await guardedCall('exchange', 'withdraw', () => this.deps.exchange.withdraw(sub.holder, token, amount), this.timeoutMs),
        { owner, token },
      );
      if (withdrawn > 0n) this.deps.ledger.credit(sub.holder, token, withdrawn);
      return withdrawn;
    });
  }

  async placeOrder(owner: Address, caller: Address, order: PerpOrder): Promise<string> {
    return this.run('placeOrder', owner, caller, async (sub) => {
      assertPositive(order.size);
      return unwrapCall(
        await guardedCall('exchange', 'placeOrder', () => this.deps.exchange.placeOrder(sub.holder, order), this.timeoutMs),
        { owner, market: order.market },
      );
    });
  }

  async cancelOrder(owner: Address, caller: Address, orderId: string): Promise<void> {
    await this.run('cancelOrder', owner, caller, async (sub) => {
      unwrapCall(
        await guardedCall('exchange', 'cancelOrder', () => this.deps.exchange.cancelOrder(sub.holder, orderId), this.timeoutMs),
        { owner, orderId },
      );
    });
  }

  private async run<T>(
    operation: string,
    owner: Address,
    caller: Address,
    fn: (sub: SubAccount) => Promise<T>,
    needsSubAccount = true,
  ): Promise<T> {
    if (!isAddressEqual(owner, caller)) {
      counter.managerOps.inc({ operation, outcome: 'unauthorized' });
      throw new MarginError(MarginErrorCode.Unauthorized, `${caller} may not act for ${owner}`, { owner, caller, operation });
    }
    try {
      const result = await withAccountLock(owner, async () => {
        const sub = needsSubAccount
          ? this.deps.subAccounts.require(owner)
          : { owner, holder: this.deps.subAccounts.predictAddress(owner), createdAt: Date.now() };
        return fn(sub);
      });
      counter.managerOps.inc({ operation, outcome: 'ok' });
      this.managerLog.debug({ owner, operation }, 'manager-op-complete');
      return result;
    } catch (err) {
      counter.managerOps.inc({ operation, outcome: 'rejected' });
      if (err instanceof MarginError) {
        this.managerLog.info({ owner, operation, code: err.code }, 'manager-op-rejected');
      }
      throw err;
    }
  }

  private requireBalance(holder: Address, token: Address, amount: bigint): void {
    const balance = this.deps.ledger.balanceOf(holder, token);
    if (balance < amount) {
      throw new MarginError(MarginErrorCode.InsufficientBalance, 'insufficient ledger balance', {
        holder,
        token,
        balance: balance.toString(),
        amount: amount.toString(),
      });
    }
  }

  private entryFor(snapshot: AggregateSnapshot, marketId: MarketId): MarketSnapshot {
    const entry = snapshot.markets.find((m) => m.market.id === marketId);
    if (!entry) {
      throw new MarginError(MarginErrorCode.UnsupportedMarket, `market ${marketId} is not supported`, { marketId });
    }
    return entry;
  }

  private assertProjectedHealthy(owner: Address, snapshot: AggregateSnapshot, projected: HealthTotals): HealthStatus {
    const status = this.deps.engine.statusOf(owner, { ...snapshot, ...projected });
    if (!status.healthy) {
      throw new MarginError(MarginErrorCode.WouldBecomeUnhealthy, 'operation would leave the account unhealthy', {
        owner,
        healthFactor: status.healthFactor.toString(),
        debtValue: projected.debtValue.toString(),
      });
    }
    return status;
  }
}
