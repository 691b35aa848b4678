import type { Address } from 'viem';
import { log } from '../infra/logger';
import type { RepayRequest } from '../protocols/types';
import type { BalanceLedger } from './ledger';
import { WAD, mulDivUp, toAssetsDown, toAssetsUp } from './math';
import type { MarketState } from './types';

// headroom for interest Morpho accrues between the state read and the repay
export const REPAY_ACCRUAL_BUFFER = WAD / 10_000n;

const repayLog = log.child({ module: 'margin.repay' });

/**
 * Closes the position by shares only when `available` covers the rounded-up
 * cost plus accrual headroom. Otherwise repays assets, capped at the truncated
 * debt so the shares burned never exceed the position.
 */
export function planRepay(available: bigint, borrowShares: bigint, state: MarketState): RepayRequest | null {
  if (available <= 0n || borrowShares === 0n) return null;
  const fullCost = toAssetsUp(borrowShares, state.totalBorrowAssets, state.totalBorrowShares);
  if (available >= fullCost + mulDivUp(fullCost, REPAY_ACCRUAL_BUFFER, WAD)) {
    return { shares: borrowShares };
  }
  const owed = toAssetsDown(borrowShares, state.totalBorrowAssets, state.totalBorrowShares);
  const assets = available < owed ? available : owed;
  return assets > 0n ? { assets } : null;
}

/** Debits what the market charged, capped at the ledger balance. Returns the balance left. */
export function debitRepaid(ledger: BalanceLedger, holder: Address, token: Address, charged: bigint): bigint {
  const balance = ledger.balanceOf(holder, token);
  if (charged > balance) {
    repayLog.warn(
      { holder, token, charged: charged.toString(), balance: balance.toString() },
      'repay-exceeded-ledger',
    );
  }
  const amount = charged < balance ? charged : balance;
  return amount > 0n ? ledger.debit(holder, token, amount) : balance;
}
