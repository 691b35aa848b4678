import { zeroAddress, type Address } from 'viem';
import { isAccountLocked } from '../infra/account_lock';
import { MarginError, MarginErrorCode } from '../margin/errors';
import { liquidationOutcome } from '../margin/health_engine';
import { INFINITE_HEALTH_FACTOR, WAD } from '../margin/math';
import type { MarketConfig } from '../margin/types';
import type { LendingReceipt, RepayRequest } from '../protocols/types';
import {
  BTC,
  ETH,
  FEE_RECIPIENT,
  InMemoryLending,
  LIQUIDATOR,
  OTHER_OWNER,
  OWNER,
  USD,
  USDC,
  WBTC,
  WBTC_MARKET,
  WETH,
  WETH_MARKET,
  WSTETH,
  WSTETH_MARKET,
  buildFixture,
  price,
  seedPosition,
} from './fakes';
import { test, expect, expectEqual, expectMarginError } from './test_harness';

test('evaluateHealth reports a funded position', async () => {
  const fx = buildFixture();
  const holder = seedPosition(fx, { collateral: 10n * ETH, debt: 19_000n * USD, wethPrice: 3000n });
  const status = await fx.engine.evaluateHealth(OWNER);
  expectEqual(status.holder, holder);
  expectEqual(status.collateralValue, 25_500n * USD);
  expectEqual(status.debtValue, 19_000n * USD);
  expectEqual(status.healthFactor, 342105263157894736n);
  expectEqual(status.state, 'HEALTHY');
  expectEqual(status.exchangeAccountExists, false);
  expectEqual(status.externalEquity, 0n);
});

test('evaluateHealth without a sub-account is healthy and empty', async () => {
  const fx = buildFixture();
  const status = await fx.engine.evaluateHealth(OWNER);
  expectEqual(status.holder, null);
  expectEqual(status.healthFactor, INFINITE_HEALTH_FACTOR);
  expect(status.healthy, 'empty account should be healthy');
});

test('liquidate rejects a healthy portfolio without touching positions', async () => {
  const fx = buildFixture();
  const holder = seedPosition(fx, { collateral: 10n * ETH, debt: 19_000n * USD, wethPrice: 2400n });
  await expectMarginError(fx.engine.liquidate(OWNER, LIQUIDATOR), MarginErrorCode.PortfolioHealthy);
  const [market] = fx.markets;
  expectEqual(fx.lending.read(holder, market?.id ?? '0x').collateral, 10n * ETH);
  expect(!fx.lending.calls.some((c) => c.startsWith('withdrawCollateral')), 'no collateral should move');
});

test('liquidate requires a sub-account', async () => {
  const fx = buildFixture();
  await expectMarginError(fx.engine.liquidate(OWNER, LIQUIDATOR), MarginErrorCode.NoSubAccount);
});

test('liquidate rejects the zero address as caller', async () => {
  const fx = buildFixture();
  seedPosition(fx, { collateral: 10n * ETH, debt: 19_000n * USD, wethPrice: 2000n });
  await expectMarginError(fx.engine.liquidate(OWNER, zeroAddress), MarginErrorCode.ZeroAddress);
});

test('seized collateral is split between caller and fee recipient', async () => {
  const fx = buildFixture();
  const holder = seedPosition(fx, { collateral: 10n * ETH, debt: 19_000n * USD, wethPrice: 2000n });

  const result = await fx.engine.liquidate(OWNER, LIQUIDATOR);
  expectEqual(result.healthBefore.healthy, false);
  expectEqual(result.healthBefore.healthFactor, 0n);
  expectEqual(result.repayments.length, 0);
  expectEqual(result.seizures.length, 1);
  expectEqual(result.seizures[0]?.collateral, 10n * ETH);
  expectEqual(result.seizures[0]?.liquidatorAmount, (95n * ETH) / 10n);
  expectEqual(result.seizures[0]?.incentiveAmount, ETH / 2n);

  expectEqual(fx.ledger.balanceOf(LIQUIDATOR, WETH), (95n * ETH) / 10n);
  expectEqual(fx.ledger.balanceOf(FEE_RECIPIENT, WETH), ETH / 2n);
  expectEqual(fx.ledger.balanceOf(holder, WETH), 0n);
  const [market] = fx.markets;
  expectEqual(fx.lending.read(holder, market?.id ?? '0x').collateral, 0n);
});

test('liquidation with residual debt and nothing left is rejected', async () => {
  const fx = buildFixture();
  seedPosition(fx, { collateral: 10n * ETH, debt: 19_000n * USD, wethPrice: 2000n });
  await fx.engine.liquidate(OWNER, LIQUIDATOR);

  const after = await fx.engine.evaluateHealth(OWNER);
  expectEqual(after.debtValue, 19_000n * USD);
  expectEqual(after.collateralValue, 0n);
  await expectMarginError(fx.engine.liquidate(OWNER, LIQUIDATOR), MarginErrorCode.NothingToLiquidate);
});

test('external equity and idle funds repay the debt in full', async () => {
  const fx = buildFixture();
  const holder = seedPosition(fx, { collateral: 10n * ETH, debt: 19_000n * USD, wethPrice: 2000n });
  fx.ledger.credit(holder, USDC, 18_000n * USD);
  fx.exchange.setAccount(holder, { equity: 1_500n * USD, withdrawable: 1_500n * USD });

  const before = await fx.engine.evaluateHealth(OWNER);
  expect(!before.healthy, 'equity should not cover the shortfall');

  const result = await fx.engine.liquidate(OWNER, LIQUIDATOR);
  expectEqual(result.withdrawnEquity, 1_500n * USD);
  expectEqual(result.repayments.length, 1);
  expectEqual(result.repayments[0]?.assets, 19_000n * USD);
  expectEqual(fx.ledger.balanceOf(holder, USDC), 500n * USD);
  expectEqual(fx.exchange.account(holder)?.equity, 0n);

  const after = await fx.engine.evaluateHealth(OWNER);
  expectEqual(after.debtValue, 0n);
  expectEqual(after.healthFactor, INFINITE_HEALTH_FACTOR);
  await expectMarginError(fx.engine.liquidate(OWNER, LIQUIDATOR), MarginErrorCode.PortfolioHealthy);
});

test('partial funds repay by assets and leave the remainder', async () => {
  const fx = buildFixture();
  const holder = seedPosition(fx, { collateral: 10n * ETH, debt: 19_000n * USD, wethPrice: 2000n });
  fx.ledger.credit(holder, USDC, 5_000n * USD);

  const result = await fx.engine.liquidate(OWNER, LIQUIDATOR);
  expectEqual(result.repayments[0]?.assets, 5_000n * USD);
  expectEqual(result.repayments[0]?.shares, 5_000n * 10n ** 12n);
  expectEqual(fx.ledger.balanceOf(holder, USDC), 0n);

  const after = await fx.engine.evaluateHealth(OWNER);
  expectEqual(after.debtValue, 14_000n * USD);
  await expectMarginError(fx.engine.liquidate(OWNER, LIQUIDATOR), MarginErrorCode.NothingToLiquidate);
});

test('balance equal to the truncated debt repays by assets after accrual', async () => {
  const fx = buildFixture();
  const [market] = fx.markets;
  if (!market) throw new Error('fixture has no markets');
  fx.lending.openDebt(OTHER_OWNER, market.id, 1_000n * USD);
  const holder = seedPosition(fx, { collateral: 10n * ETH, debt: 19_000n * USD, wethPrice: 2000n });
  fx.lending.accrue(market.id, 7n);
  // owed 19000000006.65: the share repay would charge 19000000007
  fx.ledger.credit(holder, USDC, 19_000_000_006n);

  const result = await fx.engine.liquidate(OWNER, LIQUIDATOR);
  expectEqual(result.repayments[0]?.assets, 19_000_000_006n);
  expectEqual(result.repayments[0]?.shares, 18_999_999_999_350_000n);
  expectEqual(fx.lending.read(holder, market.id).borrowShares, 650_000n);
  expectEqual(fx.ledger.balanceOf(holder, USDC), 0n);
  expectEqual(result.seizures[0]?.collateral, 10n * ETH);
  expectEqual(fx.lending.read(holder, market.id).collateral, 0n);
  expectEqual(fx.ledger.balanceOf(LIQUIDATOR, WETH), (95n * ETH) / 10n);
});

test('surplus funds close the position by shares at the rounded-up cost', async () => {
  const fx = buildFixture();
  const [market] = fx.markets;
  if (!market) throw new Error('fixture has no markets');
  fx.lending.openDebt(OTHER_OWNER, market.id, 1_000n * USD);
  const holder = seedPosition(fx, { collateral: 10n * ETH, debt: 19_000n * USD, wethPrice: 2000n });
  fx.lending.accrue(market.id, 7n);
  fx.ledger.credit(holder, USDC, 19_100n * USD);

  const result = await fx.engine.liquidate(OWNER, LIQUIDATOR);
  expectEqual(result.repayments[0]?.assets, 19_000_000_007n);
  expectEqual(result.repayments[0]?.shares, 19_000_000_000_000_000n);
  expectEqual(fx.lending.read(holder, market.id).borrowShares, 0n);
  expectEqual(fx.ledger.balanceOf(holder, USDC), 99_999_993n);
});

class OverchargingLending extends InMemoryLending {
  async repay(holder: Address, market: MarketConfig, request: RepayRequest): Promise<LendingReceipt> {
    const receipt = await super.repay(holder, market, request);
    return { ...receipt, assets: receipt.assets + 1n };
  }
}

test('a repay charged above the ledger balance debits only what is held', async () => {
  const fx = buildFixture({ lending: new OverchargingLending() });
  const holder = seedPosition(fx, { collateral: 10n * ETH, debt: 19_000n * USD, wethPrice: 2000n });
  fx.ledger.credit(holder, USDC, 5_000n * USD);

  const result = await fx.engine.liquidate(OWNER, LIQUIDATOR);
  expectEqual(result.repayments[0]?.assets, 5_000n * USD + 1n);
  expectEqual(fx.ledger.balanceOf(holder, USDC), 0n);
  expectEqual(result.seizures[0]?.collateral, 10n * ETH);
});

test('preconditions count as rejections only before any step ran', () => {
  const healthy = new MarginError(MarginErrorCode.PortfolioHealthy, 'healthy');
  const shortfall = new MarginError(MarginErrorCode.InsufficientBalance, 'short');
  expectEqual(liquidationOutcome(healthy, false), 'rejected');
  expectEqual(liquidationOutcome(shortfall, false), 'rejected');
  expectEqual(liquidationOutcome(shortfall, true), 'failed');
  expectEqual(liquidationOutcome(new MarginError(MarginErrorCode.ExternalCallFailed, 'down'), false), 'failed');
  expectEqual(liquidationOutcome(new Error('boom'), false), 'failed');
});

test('withdrawable equity alone is enough to liquidate', async () => {
  const fx = buildFixture();
  const holder = seedPosition(fx, { collateral: 0n, debt: 1_000n * USD, wethPrice: 2000n });
  fx.exchange.setAccount(holder, { equity: 500n * USD, withdrawable: 500n * USD });

  const result = await fx.engine.liquidate(OWNER, LIQUIDATOR);
  expectEqual(result.seizures.length, 0);
  expectEqual(result.repayments[0]?.assets, 500n * USD);

  const after = await fx.engine.evaluateHealth(OWNER);
  expectEqual(after.debtValue, 500n * USD);
});

test('positive equity can keep an account out of liquidation', async () => {
  const fx = buildFixture();
  const holder = seedPosition(fx, { collateral: 10n * ETH, debt: 19_000n * USD, wethPrice: 2000n });
  fx.exchange.setAccount(holder, { equity: 3_000n * USD, withdrawable: 0n });
  const status = await fx.engine.evaluateHealth(OWNER);
  expectEqual(status.healthFactor, 52631578947368421n);
  await expectMarginError(fx.engine.liquidate(OWNER, LIQUIDATOR), MarginErrorCode.PortfolioHealthy);
});

test('negative equity does not make a healthy account liquidatable', async () => {
  const fx = buildFixture();
  const holder = seedPosition(fx, { collateral: 10n * ETH, debt: 19_000n * USD, wethPrice: 3000n });
  fx.exchange.setAccount(holder, { equity: -10_000n * USD, withdrawable: 0n });
  const status = await fx.engine.evaluateHealth(OWNER);
  expectEqual(status.healthFactor, 342105263157894736n);
  expectEqual(status.externalEquity, -10_000n * USD);
  expect(status.exchangeAccountExists, 'exchange account should be reported');
  await expectMarginError(fx.engine.liquidate(OWNER, LIQUIDATOR), MarginErrorCode.PortfolioHealthy);
});

test('incentive rounds down and the split conserves collateral', async () => {
  const fx = buildFixture({ risk: { liquidationIncentive: (7n * WAD) / 100n } });
  seedPosition(fx, { collateral: 10n * ETH + 1n, debt: 19_000n * USD, wethPrice: 2000n });

  const result = await fx.engine.liquidate(OWNER, LIQUIDATOR);
  const seizure = result.seizures[0];
  expectEqual(seizure?.incentiveAmount, 700_000_000_000_000_000n);
  expectEqual(seizure?.liquidatorAmount, 9_300_000_000_000_000_001n);
  expectEqual((seizure?.incentiveAmount ?? 0n) + (seizure?.liquidatorAmount ?? 0n), 10n * ETH + 1n);
});

test('zero incentive sends everything to the caller', async () => {
  const fx = buildFixture({ risk: { liquidationIncentive: 0n } });
  seedPosition(fx, { collateral: 10n * ETH, debt: 19_000n * USD, wethPrice: 2000n });
  const result = await fx.engine.liquidate(OWNER, LIQUIDATOR);
  expectEqual(result.seizures[0]?.incentiveAmount, 0n);
  expectEqual(fx.ledger.balanceOf(LIQUIDATOR, WETH), 10n * ETH);
  expectEqual(fx.ledger.balanceOf(FEE_RECIPIENT, WETH), 0n);
});

test('dust seizure rounds the incentive to zero', async () => {
  const fx = buildFixture();
  seedPosition(fx, { collateral: 19n, debt: USD, wethPrice: 2000n });
  const result = await fx.engine.liquidate(OWNER, LIQUIDATOR);
  expectEqual(result.seizures[0]?.incentiveAmount, 0n);
  expectEqual(fx.ledger.balanceOf(LIQUIDATOR, WETH), 19n);
  expectEqual(fx.ledger.balanceOf(FEE_RECIPIENT, WETH), 0n);
});

test('failure mid-liquidation keeps completed seizures and reports them', async () => {
  const fx = buildFixture({ markets: [WETH_MARKET, WBTC_MARKET, WSTETH_MARKET] });
  const [weth, wbtc, wsteth] = fx.markets;
  if (!weth || !wbtc || !wsteth) throw new Error('expected three markets');
  const holder = seedPosition(fx, { collateral: 10n * ETH, debt: 70_000n * USD, wethPrice: 2000n });
  fx.oracle.set(wbtc.id, price(60_000n));
  fx.oracle.set(wsteth.id, price(3000n));
  fx.lending.setPosition(holder, wbtc.id, { collateral: BTC, borrowShares: 0n });
  fx.lending.setPosition(holder, wsteth.id, { collateral: ETH, borrowShares: 0n });
  fx.lending.faults.fail('withdrawCollateral', wbtc.id);

  const err = await expectMarginError(fx.engine.liquidate(OWNER, LIQUIDATOR), MarginErrorCode.ExternalCallFailed);
  expectEqual(err.detail?.marketId, wbtc.id);
  expectEqual(
    JSON.stringify(err.detail?.completed),
    JSON.stringify({ withdrawnEquity: '0', repaidMarkets: [], seizedMarkets: [weth.id] }),
  );
  expectEqual(fx.ledger.balanceOf(LIQUIDATOR, WETH), (95n * ETH) / 10n);
  expectEqual(fx.ledger.balanceOf(LIQUIDATOR, WBTC), 0n);
  expectEqual(fx.lending.read(holder, wbtc.id).collateral, BTC);
  expectEqual(fx.lending.read(holder, wsteth.id).collateral, ETH);
  expectEqual(fx.ledger.balanceOf(LIQUIDATOR, WSTETH), 0n);
});

test('exchange withdrawal failure aborts before any step', async () => {
  const fx = buildFixture();
  const holder = seedPosition(fx, { collateral: 10n * ETH, debt: 19_000n * USD, wethPrice: 2000n });
  fx.exchange.setAccount(holder, { equity: 100n * USD, withdrawable: 100n * USD });
  fx.exchange.faults.fail('withdraw');

  const err = await expectMarginError(fx.engine.liquidate(OWNER, LIQUIDATOR), MarginErrorCode.ExternalCallFailed);
  expectEqual(err.detail?.source, 'exchange');
  expectEqual(
    JSON.stringify(err.detail?.completed),
    JSON.stringify({ withdrawnEquity: '0', repaidMarkets: [], seizedMarkets: [] }),
  );
  expectEqual(fx.ledger.balanceOf(LIQUIDATOR, WETH), 0n);
});

test('timed-out seizure fails the liquidation and releases the lock', async () => {
  const fx = buildFixture({ callTimeoutMs: 20 });
  seedPosition(fx, { collateral: 10n * ETH, debt: 19_000n * USD, wethPrice: 2000n });
  fx.lending.faults.hang('withdrawCollateral');

  const err = await expectMarginError(fx.engine.liquidate(OWNER, LIQUIDATOR), MarginErrorCode.ExternalCallFailed);
  expectEqual(err.detail?.kind, 'timeout');
  expect(!isAccountLocked(OWNER), 'lock should be released after failure');

  fx.lending.faults.heal();
  const result = await fx.engine.liquidate(OWNER, LIQUIDATOR);
  expectEqual(result.seizures[0]?.collateral, 10n * ETH);
});

test('concurrent liquidations of one account run one at a time', async () => {
  const fx = buildFixture();
  const holder = seedPosition(fx, { collateral: 10n * ETH, debt: 19_000n * USD, wethPrice: 2000n });
  fx.ledger.credit(holder, USDC, 19_000n * USD);

  const [first, second] = await Promise.allSettled([
    fx.engine.liquidate(OWNER, LIQUIDATOR),
    fx.engine.liquidate(OWNER, OTHER_OWNER),
  ]);
  expectEqual(first?.status, 'fulfilled');
  expectEqual(second?.status, 'rejected');
  if (second?.status === 'rejected') {
    const reason: unknown = second.reason;
    expect(reason instanceof MarginError && reason.code === MarginErrorCode.PortfolioHealthy, 'second call should see a healthy account');
  }
  expectEqual(fx.ledger.balanceOf(LIQUIDATOR, WETH), (95n * ETH) / 10n);
  expectEqual(fx.ledger.balanceOf(OTHER_OWNER, WETH), 0n);
});

test('risk params are validated on construction', async () => {
  await expectMarginError(() => buildFixture({ risk: { liquidationIncentive: WAD } }), MarginErrorCode.InvalidParameter);
  await expectMarginError(() => buildFixture({ risk: { liquidationThreshold: -1n } }), MarginErrorCode.InvalidParameter);
  await expectMarginError(() => buildFixture({ risk: { feeRecipient: zeroAddress } }), MarginErrorCode.ZeroAddress);
});
