import { IOracleAbi } from '../abis/IMorphoAbi';
import { InvalidResponseError } from '../infra/instrument';
import type { ManagedClient } from '../infra/rpc_clients';
import type { MarketConfig } from '../margin/types';
import type { PriceOracle } from '../protocols/types';

/**
 * Turns a Morpho-style oracle price (raw token units, scaled by 1e36) into a
 * whole-token price scaled by 1e36. Prices are read fresh on every call.
 */
export function rawToWholeTokenPrice(raw: bigint, collateralDecimals: number, loanDecimals: number): bigint {
  return (raw * 10n ** BigInt(collateralDecimals)) / 10n ** BigInt(loanDecimals);
}

export class MorphoOracleFeed implements PriceOracle {
  constructor(private readonly client: ManagedClient) {}

  async price(market: MarketConfig): Promise<bigint> {
    const raw = await this.client.readContract({
      address: market.oracle,
      abi: IOracleAbi,
      functionName: 'price',
    });
    if (raw <= 0n) {
      throw new InvalidResponseError(`oracle ${market.oracle} returned non-positive price`);
    }
    return rawToWholeTokenPrice(raw, market.collateralDecimals, market.loanDecimals);
  }
}
