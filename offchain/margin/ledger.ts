import type { Address } from 'viem';
import { addressKey } from '../infra/address';
import { MarginError, MarginErrorCode } from './errors';

function assertPositive(amount: bigint, operation: string): void {
  if (amount <= 0n) {
    throw new MarginError(MarginErrorCode.InvalidAmount, `${operation} amount must be positive`, {
      amount: amount.toString(),
    });
  }
}

/** Idle token balances held by sub-accounts, owners, liquidators and the fee recipient. */
export class BalanceLedger {
  private readonly balances = new Map<string, Map<string, bigint>>();

  balanceOf(holder: Address, token: Address): bigint {
    return this.balances.get(addressKey(holder))?.get(addressKey(token)) ?? 0n;
  }

  credit(holder: Address, token: Address, amount: bigint): bigint {
    assertPositive(amount, 'credit');
    const next = this.balanceOf(holder, token) + amount;
    this.set(holder, token, next);
    return next;
  }

  debit(holder: Address, token: Address, amount: bigint): bigint {
    assertPositive(amount, 'debit');
    const current = this.balanceOf(holder, token);
    if (current < amount) {
      throw new MarginError(MarginErrorCode.InsufficientBalance, 'insufficient ledger balance', {
        holder,
        token,
        balance: current.toString(),
        amount: amount.toString(),
      });
    }
    const next = current - amount;
    this.set(holder, token, next);
    return next;
  }

  transfer(from: Address, to: Address, token: Address, amount: bigint): void {
    this.debit(from, token, amount);
    this.credit(to, token, amount);
  }

  private set(holder: Address, token: Address, amount: bigint): void {
    const key = addressKey(holder);
    const tokens = this.balances.get(key) ?? new Map<string, bigint>();
    if (amount === 0n) {
      tokens.delete(addressKey(token));
    } else {
      tokens.set(addressKey(token), amount);
    }
    if (tokens.size === 0) {
      this.balances.delete(key);
    } else {
      this.balances.set(key, tokens);
    }
  }
}
