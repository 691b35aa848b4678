import type { Address } from 'viem';
import type { MarketConfig, MarketState, Position } from '../margin/types';

export type ExternalSource = 'oracle' | 'lending' | 'exchange';

export type ExternalCallErrorKind = 'timeout' | 'failed' | 'invalid-response';

export type ExternalCallError = {
  source: ExternalSource;
  operation: string;
  kind: ExternalCallErrorKind;
  message: string;
};

export type CallResult<T> = { ok: true; value: T } | { ok: false; error: ExternalCallError };

export type RepayRequest = { assets: bigint } | { shares: bigint };

export type LendingReceipt = {
  assets: bigint;
  shares: bigint;
};

export interface LendingMarket {
  position(holder: Address, market: MarketConfig): Promise<Position>;
  marketState(market: MarketConfig): Promise<MarketState>;
  supplyCollateral(holder: Address, market: MarketConfig, amount: bigint): Promise<void>;
  // returns the collateral actually withdrawn
  withdrawCollateral(holder: Address, market: MarketConfig, amount: bigint): Promise<bigint>;
  borrow(holder: Address, market: MarketConfig, assets: bigint): Promise<LendingReceipt>;
  repay(holder: Address, market: MarketConfig, request: RepayRequest): Promise<LendingReceipt>;
}

export type OrderSide = 'buy' | 'sell';

export type PerpOrder = {
  market: number;
  side: OrderSide;
  size: bigint;
  limitPrice: bigint;
  reduceOnly: boolean;
};

export interface MarginExchange {
  /** Signed equity in loan-token units, or null when the account does not exist. */
  accountEquity(holder: Address): Promise<bigint | null>;
  withdrawableAmount(holder: Address, token: Address): Promise<bigint>;
  withdraw(holder: Address, token: Address, amount: bigint): Promise<bigint>;
  deposit(holder: Address, token: Address, amount: bigint): Promise<void>;
  placeOrder(holder: Address, order: PerpOrder): Promise<string>;
  cancelOrder(holder: Address, orderId: string): Promise<void>;
}

export interface PriceOracle {
  /** Whole-token collateral price in loan-token terms, scaled by 1e36. */
  price(market: MarketConfig): Promise<bigint>;
}
