export const MarginErrorCode = {
  InvalidCollateralFactor: 'invalid_collateral_factor',
  InvalidLltv: 'invalid_lltv',
  DuplicateMarket: 'duplicate_market',
  ZeroAddress: 'zero_address',
  LoanTokenMismatch: 'loan_token_mismatch',
  InvalidParameter: 'invalid_parameter',
  InvalidConfig: 'invalid_config',
  Unauthorized: 'unauthorized',
  PortfolioHealthy: 'portfolio_healthy',
  NoSubAccount: 'no_sub_account',
  SubAccountExists: 'sub_account_exists',
  WouldBecomeUnhealthy: 'would_become_unhealthy',
  InsufficientBalance: 'insufficient_balance',
  InvalidAmount: 'invalid_amount',
  UnsupportedMarket: 'unsupported_market',
  NothingToLiquidate: 'nothing_to_liquidate',
  ExternalCallFailed: 'external_call_failed',
} as const;

export type MarginErrorCode = (typeof MarginErrorCode)[keyof typeof MarginErrorCode];

export type ErrorCategory = 'configuration' | 'authorization' | 'precondition' | 'external';

const CATEGORY: Record<MarginErrorCode, ErrorCategory> = {
  invalid_collateral_factor: 'configuration',
  invalid_lltv: 'configuration',
  duplicate_market: 'configuration',
  zero_address: 'configuration',
  loan_token_mismatch: 'configuration',
  invalid_parameter: 'configuration',
  invalid_config: 'configuration',
  unauthorized: 'authorization',
  portfolio_healthy: 'precondition',
  no_sub_account: 'precondition',
  sub_account_exists: 'precondition',
  would_become_unhealthy: 'precondition',
  insufficient_balance: 'precondition',
  invalid_amount: 'precondition',
  unsupported_market: 'precondition',
  nothing_to_liquidate: 'precondition',
  external_call_failed: 'external',
};

export function categoryOf(code: MarginErrorCode): ErrorCategory {
  return CATEGORY[code];
}

export class MarginError extends Error {
  public readonly category: ErrorCategory;

  constructor(
    public readonly code: MarginErrorCode,
    message: string,
    public readonly detail?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'MarginError';
    this.category = categoryOf(code);
  }
}

export function isMarginError(err: unknown, code?: MarginErrorCode): err is MarginError {
  return err instanceof MarginError && (code === undefined || err.code === code);
}
