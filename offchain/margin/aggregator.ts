import type { Address } from 'viem';
import { DEFAULT_CALL_TIMEOUT_MS, guardedCall } from '../infra/instrument';
import { log } from '../infra/logger';
import { histogram } from '../infra/metrics';
import type { CallResult, LendingMarket, MarginExchange, PriceOracle } from '../protocols/types';
import { MarginError, MarginErrorCode } from './errors';
import type { MarketRegistry } from './market_registry';
import { toAssetsDown, weightedCollateralValue } from './math';
import type { AggregateSnapshot, MarketConfig, MarketSnapshot } from './types';

export type AggregatorDeps = {
  registry: MarketRegistry;
  lending: LendingMarket;
  oracle: PriceOracle;
  exchange: MarginExchange;
  callTimeoutMs?: number;
};

export function unwrapCall<T>(result: CallResult<T>, context: Record<string, unknown> = {}): T {
  if (result.ok) return result.value;
  const { source, operation, kind, message } = result.error;
  throw new MarginError(MarginErrorCode.ExternalCallFailed, `${source}.${operation} ${kind}: ${message}`, {
    ...context,
    source,
    operation,
    kind,
  });
}

export class PositionAggregator {
  private readonly timeoutMs: number;
  private readonly aggLog = log.child({ module: 'margin.aggregator' });

  constructor(private readonly deps: AggregatorDeps) {
    this.timeoutMs = deps.callTimeoutMs ?? DEFAULT_CALL_TIMEOUT_MS;
  }

  /**
   * Reads every supported market and the exchange account for one holder.
   * Any failed read fails the whole aggregation; totals are never partial.
   */
  async aggregate(holder: Address): Promise<AggregateSnapshot> {
    const end = histogram.aggregateDuration.startTimer();
    try {
      const markets: MarketSnapshot[] = [];
      let collateralValue = 0n;
      let debtValue = 0n;

      for (const market of this.deps.registry.supported()) {
        const snapshot = await this.snapshotMarket(holder, market);
        collateralValue += snapshot.collateralValue;
        debtValue += snapshot.debt;
        markets.push(snapshot);
      }

      const externalEquity = unwrapCall(
        await guardedCall('exchange', 'accountEquity', () => this.deps.exchange.accountEquity(holder), this.timeoutMs),
        { holder },
      );

      return { holder, markets, collateralValue, debtValue, externalEquity, takenAt: Date.now() };
    } catch (err) {
      if (err instanceof MarginError) {
        this.aggLog.warn({ holder, code: err.code, detail: err.detail }, 'aggregate-failed');
      }
      throw err;
    } finally {
      end();
    }
  }

  private async snapshotMarket(holder: Address, market: MarketConfig): Promise<MarketSnapshot> {
    const context = { holder, marketId: market.id };
    const position = unwrapCall(
      await guardedCall('lending', 'position', () => this.deps.lending.position(holder, market), this.timeoutMs),
      context,
    );

    let price: bigint | null = null;
    let collateralValue = 0n;
    if (position.collateral > 0n) {
      const fetched = unwrapCall(
        await guardedCall('oracle', 'price', () => this.deps.oracle.price(market), this.timeoutMs),
        context,
      );
      if (fetched <= 0n) {
        throw new MarginError(MarginErrorCode.ExternalCallFailed, `oracle.price invalid-response: non-positive price`, {
          ...context,
          source: 'oracle',
          operation: 'price',
          kind: 'invalid-response',
          price: fetched.toString(),
        });
      }
      price = fetched;
      collateralValue = weightedCollateralValue(
        position.collateral,
        price,
        market.collateralFactor,
        market.collateralDecimals,
        market.loanDecimals,
      );
    }

    let state: MarketSnapshot['state'] = null;
    let debt = 0n;
    if (position.borrowShares > 0n) {
      state = unwrapCall(
        await guardedCall('lending', 'marketState', () => this.deps.lending.marketState(market), this.timeoutMs),
        context,
      );
      debt = toAssetsDown(position.borrowShares, state.totalBorrowAssets, state.totalBorrowShares);
    }

    return { market, position, price, collateralValue, state, debt };
  }
}
