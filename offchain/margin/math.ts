import { maxUint256 } from 'viem';

export const WAD = 10n ** 18n;
export const ORACLE_PRICE_SCALE = 10n ** 36n;
export const INFINITE_HEALTH_FACTOR = maxUint256;

export function mulDivDown(x: bigint, y: bigint, d: bigint): bigint {
  return (x * y) / d;
}

export function mulDivUp(x: bigint, y: bigint, d: bigint): bigint {
  return (x * y + (d - 1n)) / d;
}

export function wMulDown(x: bigint, y: bigint): bigint {
  return mulDivDown(x, y, WAD);
}

export function wDivDown(x: bigint, y: bigint): bigint {
  return mulDivDown(x, WAD, y);
}

/** Truncates, so the result can sit a unit below what the market holds against the debtor. */
export function toAssetsDown(shares: bigint, totalAssets: bigint, totalShares: bigint): bigint {
  if (totalShares === 0n) return 0n;
  return mulDivDown(shares, totalAssets, totalShares);
}

/** What Morpho charges to burn `shares` of debt. */
export function toAssetsUp(shares: bigint, totalAssets: bigint, totalShares: bigint): bigint {
  if (totalShares === 0n) return 0n;
  return mulDivUp(shares, totalAssets, totalShares);
}

export function toSharesDown(assets: bigint, totalAssets: bigint, totalShares: bigint): bigint {
  if (totalAssets === 0n) return 0n;
  return mulDivDown(assets, totalShares, totalAssets);
}

/**
 * Divisor that takes `collateral * price` (collateral in its native units, price
 * in whole tokens scaled by 1e36) into loan-token native units. An 18-decimal and
 * an 8-decimal collateral need different divisors against the same loan token.
 */
export function collateralScale(collateralDecimals: number, loanDecimals: number): { numerator: bigint; divisor: bigint } {
  return {
    numerator: 10n ** BigInt(loanDecimals),
    divisor: ORACLE_PRICE_SCALE * 10n ** BigInt(collateralDecimals),
  };
}

export function collateralToLoanUnits(
  collateral: bigint,
  price: bigint,
  collateralDecimals: number,
  loanDecimals: number,
): bigint {
  const { numerator, divisor } = collateralScale(collateralDecimals, loanDecimals);
  return (collateral * price * numerator) / divisor;
}

export function weightedCollateralValue(
  collateral: bigint,
  price: bigint,
  collateralFactor: bigint,
  collateralDecimals: number,
  loanDecimals: number,
): bigint {
  return wMulDown(collateralToLoanUnits(collateral, price, collateralDecimals, loanDecimals), collateralFactor);
}

export function formatWad(value: bigint, digits = 6): string {
  if (value === INFINITE_HEALTH_FACTOR) return 'infinite';
  const negative = value < 0n;
  const abs = negative ? -value : value;
  const whole = abs / WAD;
  const fraction = (abs % WAD).toString().padStart(18, '0').slice(0, digits);
  return `${negative ? '-' : ''}${whole}.${fraction}`;
}

export function wadToNumber(value: bigint): number {
  if (value === INFINITE_HEALTH_FACTOR) return Number.POSITIVE_INFINITY;
  return Number(value) / Number(WAD);
}
