import { encodeAbiParameters, isAddressEqual, keccak256, zeroAddress, type Address } from 'viem';
import { log } from '../infra/logger';
import { MarginError, MarginErrorCode } from './errors';
import { WAD } from './math';
import type { MarketConfig, MarketId, MarketInput, MarketParams } from './types';

const MARKET_PARAMS_ABI = [
  { name: 'loanToken', type: 'address' },
  { name: 'collateralToken', type: 'address' },
  { name: 'oracle', type: 'address' },
  { name: 'irm', type: 'address' },
  { name: 'lltv', type: 'uint256' },
] as const;

const MAX_DECIMALS = 36;

/** Same derivation as Morpho Blue's MarketParamsLib.id. */
export function marketIdOf(params: MarketParams): MarketId {
  return keccak256(
    encodeAbiParameters(MARKET_PARAMS_ABI, [
      params.loanToken,
      params.collateralToken,
      params.oracle,
      params.irm,
      params.lltv,
    ]),
  );
}

function validDecimals(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= MAX_DECIMALS;
}

export class MarketRegistry {
  private readonly markets: MarketConfig[] = [];
  private readonly byId = new Map<MarketId, MarketConfig>();
  private readonly registryLog = log.child({ module: 'margin.registry' });

  constructor(initial: MarketInput[] = []) {
    for (const input of initial) {
      this.add(input);
    }
  }

  add(input: MarketInput): MarketConfig {
    for (const [field, value] of [
      ['loanToken', input.loanToken],
      ['collateralToken', input.collateralToken],
      ['oracle', input.oracle],
    ] as const) {
      if (isAddressEqual(value, zeroAddress)) {
        throw new MarginError(MarginErrorCode.ZeroAddress, `market ${field} must not be the zero address`, { field });
      }
    }
    if (input.collateralFactor < 0n || input.collateralFactor > WAD) {
      throw new MarginError(MarginErrorCode.InvalidCollateralFactor, 'collateral factor must be within [0, 1]', {
        collateralFactor: input.collateralFactor.toString(),
      });
    }
    if (input.lltv <= 0n || input.lltv >= WAD) {
      throw new MarginError(MarginErrorCode.InvalidLltv, 'lltv must be within (0, 1)', { lltv: input.lltv.toString() });
    }
    if (!validDecimals(input.collateralDecimals) || !validDecimals(input.loanDecimals)) {
      throw new MarginError(MarginErrorCode.InvalidParameter, `token decimals must be integers within [0, ${MAX_DECIMALS}]`, {
        collateralDecimals: input.collateralDecimals,
        loanDecimals: input.loanDecimals,
      });
    }

    const first = this.markets[0];
    if (first && (!isAddressEqual(first.loanToken, input.loanToken) || first.loanDecimals !== input.loanDecimals)) {
      throw new MarginError(MarginErrorCode.LoanTokenMismatch, 'all markets must share one loan token', {
        expected: first.loanToken,
        received: input.loanToken,
      });
    }

    const id = marketIdOf(input);
    if (this.byId.has(id)) {
      throw new MarginError(MarginErrorCode.DuplicateMarket, `market ${id} is already registered`, { marketId: id });
    }

    const market: MarketConfig = Object.freeze({
      id,
      loanToken: input.loanToken,
      collateralToken: input.collateralToken,
      oracle: input.oracle,
      irm: input.irm,
      lltv: input.lltv,
      collateralFactor: input.collateralFactor,
      collateralDecimals: input.collateralDecimals,
      loanDecimals: input.loanDecimals,
      supported: input.supported ?? true,
      label: input.label ?? id.slice(0, 10),
    });
    this.markets.push(market);
    this.byId.set(id, market);
    this.registryLog.info({ marketId: id, label: market.label, supported: market.supported }, 'market-registered');
    return market;
  }

  /** Every registered market, in registration order. */
  list(): readonly MarketConfig[] {
    return this.markets;
  }

  supported(): MarketConfig[] {
    return this.markets.filter((market) => market.supported);
  }

  get(id: MarketId): MarketConfig | undefined {
    return this.byId.get(id);
  }

  require(id: MarketId): MarketConfig {
    const market = this.byId.get(id);
    if (!market || !market.supported) {
      throw new MarginError(MarginErrorCode.UnsupportedMarket, `market ${id} is not supported`, { marketId: id });
    }
    return market;
  }

  loanToken(): Address | undefined {
    return this.markets[0]?.loanToken;
  }

  loanDecimals(): number | undefined {
    return this.markets[0]?.loanDecimals;
  }

  get size(): number {
    return this.markets.length;
  }
}
