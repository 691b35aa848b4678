import { formatWad, INFINITE_HEALTH_FACTOR } from '../margin/math';
import type { MarginError } from '../margin/errors';
import type { LendingReceipt } from '../protocols/types';
import type { HealthStatus, LiquidationResult, MarketConfig, SubAccount } from '../margin/types';

export type HealthStatusSnapshot = {
  account: string;
  holder: string | null;
  collateralValue: string;
  debtValue: string;
  externalEquity: string;
  exchangeAccountExists: boolean;
  healthFactor: string;
  healthFactorDisplay: string;
  healthy: boolean;
  state: HealthStatus['state'];
};

export function serializeHealth(status: HealthStatus): HealthStatusSnapshot {
  return {
    account: status.account,
    holder: status.holder,
    collateralValue: status.collateralValue.toString(),
    debtValue: status.debtValue.toString(),
    externalEquity: status.externalEquity.toString(),
    exchangeAccountExists: status.exchangeAccountExists,
    healthFactor: status.healthFactor === INFINITE_HEALTH_FACTOR ? 'infinite' : status.healthFactor.toString(),
    healthFactorDisplay: formatWad(status.healthFactor, 4),
    healthy: status.healthy,
    state: status.state,
  };
}

export function serializeLiquidation(result: LiquidationResult) {
  return {
    account: result.account,
    holder: result.holder,
    caller: result.caller,
    feeRecipient: result.feeRecipient,
    incentive: result.incentive.toString(),
    withdrawnEquity: result.withdrawnEquity.toString(),
    repayments: result.repayments.map((r) => ({
      marketId: r.marketId,
      assets: r.assets.toString(),
      shares: r.shares.toString(),
    })),
    seizures: result.seizures.map((s) => ({
      marketId: s.marketId,
      collateralToken: s.collateralToken,
      collateral: s.collateral.toString(),
      liquidatorAmount: s.liquidatorAmount.toString(),
      incentiveAmount: s.incentiveAmount.toString(),
    })),
    healthBefore: serializeHealth(result.healthBefore),
    completedAt: new Date(result.completedAt).toISOString(),
  };
}

export function serializeMarket(market: MarketConfig) {
  return {
    id: market.id,
    label: market.label,
    loanToken: market.loanToken,
    collateralToken: market.collateralToken,
    oracle: market.oracle,
    irm: market.irm,
    lltv: formatWad(market.lltv, 4),
    collateralFactor: formatWad(market.collateralFactor, 4),
    collateralDecimals: market.collateralDecimals,
    loanDecimals: market.loanDecimals,
    supported: market.supported,
  };
}

export function serializeSubAccount(sub: SubAccount) {
  return {
    owner: sub.owner,
    holder: sub.holder,
    createdAt: new Date(sub.createdAt).toISOString(),
  };
}

export function serializeReceipt(receipt: LendingReceipt) {
  return { assets: receipt.assets.toString(), shares: receipt.shares.toString() };
}

export function serializeMarginError(err: MarginError) {
  return {
    error: {
      code: err.code,
      category: err.category,
      message: err.message,
      ...(err.detail === undefined ? {} : { detail: err.detail }),
    },
  };
}

export function serializeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return typeof err === 'string' ? err : JSON.stringify(err);
}
