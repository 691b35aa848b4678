import type { Address, Hex } from 'viem';

export type MarketId = Hex;

export type MarketParams = {
  loanToken: Address;
  collateralToken: Address;
  oracle: Address;
  irm: Address;
  lltv: bigint;
};

export type MarketInput = MarketParams & {
  collateralFactor: bigint;
  collateralDecimals: number;
  loanDecimals: number;
  supported?: boolean;
  label?: string;
};

export type MarketConfig = Readonly<
  MarketParams & {
    id: MarketId;
    collateralFactor: bigint;
    collateralDecimals: number;
    loanDecimals: number;
    supported: boolean;
    label: string;
  }
>;

export type Position = {
  collateral: bigint;
  borrowShares: bigint;
};

export type MarketState = {
  totalBorrowAssets: bigint;
  totalBorrowShares: bigint;
};

export type MarketSnapshot = {
  market: MarketConfig;
  position: Position;
  // null when the position holds no collateral and the oracle was not read
  price: bigint | null;
  collateralValue: bigint;
  state: MarketState | null;
  debt: bigint;
};

export type HealthTotals = {
  collateralValue: bigint;
  debtValue: bigint;
  externalEquity: bigint | null;
};

export type AggregateSnapshot = HealthTotals & {
  holder: Address;
  markets: MarketSnapshot[];
  takenAt: number;
};

export type HealthState = 'HEALTHY' | 'LIQUIDATABLE';

export type HealthStatus = {
  account: Address;
  holder: Address | null;
  collateralValue: bigint;
  debtValue: bigint;
  externalEquity: bigint;
  exchangeAccountExists: boolean;
  healthFactor: bigint;
  healthy: boolean;
  state: HealthState;
};

export type RiskParams = {
  liquidationThreshold: bigint;
  liquidationIncentive: bigint;
  feeRecipient: Address;
};

export type SubAccount = {
  owner: Address;
  holder: Address;
  createdAt: number;
};

export type Repayment = {
  marketId: MarketId;
  assets: bigint;
  shares: bigint;
};

export type Seizure = {
  marketId: MarketId;
  collateralToken: Address;
  collateral: bigint;
  liquidatorAmount: bigint;
  incentiveAmount: bigint;
};

export type LiquidationResult = {
  account: Address;
  holder: Address;
  caller: Address;
  feeRecipient: Address;
  incentive: bigint;
  withdrawnEquity: bigint;
  repayments: Repayment[];
  seizures: Seizure[];
  healthBefore: HealthStatus;
  completedAt: number;
};
