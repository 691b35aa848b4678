import type { Address, Hex } from 'viem';
import { IMorphoAbi } from '../abis/IMorphoAbi';
import type { ManagedClient, SignerClient } from '../infra/rpc_clients';
import { log } from '../infra/logger';
import type { MarketConfig, MarketParams, MarketState, Position } from '../margin/types';
import type { LendingMarket, LendingReceipt, RepayRequest } from './types';

const EMPTY_DATA: Hex = '0x';

function paramsOf(market: MarketConfig): MarketParams {
  return {
    loanToken: market.loanToken,
    collateralToken: market.collateralToken,
    oracle: market.oracle,
    irm: market.irm,
    lltv: market.lltv,
  };
}

/**
 * Morpho Blue adapter. The keeper wallet acts on behalf of sub-accounts through
 * Morpho's authorization, so every write names the sub-account as `onBehalf`.
 * Without a wallet the adapter is read-only.
 */
export class MorphoBlueLending implements LendingMarket {
  private readonly morphoLog = log.child({ module: 'protocols.morphoblue' });

  constructor(
    private readonly morpho: Address,
    private readonly client: ManagedClient,
    private readonly wallet: SignerClient | null = null,
  ) {}

  async position(holder: Address, market: MarketConfig): Promise<Position> {
    const [, borrowShares, collateral] = await this.client.readContract({
      address: this.morpho,
      abi: IMorphoAbi,
      functionName: 'position',
      args: [market.id, holder],
    });
    return { collateral, borrowShares };
  }

  async marketState(market: MarketConfig): Promise<MarketState> {
    const [, , totalBorrowAssets, totalBorrowShares] = await this.client.readContract({
      address: this.morpho,
      abi: IMorphoAbi,
      functionName: 'market',
      args: [market.id],
    });
    return { totalBorrowAssets, totalBorrowShares };
  }

  async supplyCollateral(holder: Address, market: MarketConfig, amount: bigint): Promise<void> {
    const wallet = this.requireWallet('supplyCollateral');
    const { request } = await this.client.simulateContract({
      account: wallet.account,
      address: this.morpho,
      abi: IMorphoAbi,
      functionName: 'supplyCollateral',
      args: [paramsOf(market), amount, holder, EMPTY_DATA],
    });
    await this.confirm(await wallet.writeContract(request), 'supplyCollateral');
  }

  async withdrawCollateral(holder: Address, market: MarketConfig, amount: bigint): Promise<bigint> {
    const wallet = this.requireWallet('withdrawCollateral');
    const { request } = await this.client.simulateContract({
      account: wallet.account,
      address: this.morpho,
      abi: IMorphoAbi,
      functionName: 'withdrawCollateral',
      args: [paramsOf(market), amount, holder, wallet.account.address],
    });
    await this.confirm(await wallet.writeContract(request), 'withdrawCollateral');
    return amount;
  }

  async borrow(holder: Address, market: MarketConfig, assets: bigint): Promise<LendingReceipt> {
    const wallet = this.requireWallet('borrow');
    const { request, result } = await this.client.simulateContract({
      account: wallet.account,
      address: this.morpho,
      abi: IMorphoAbi,
      functionName: 'borrow',
      args: [paramsOf(market), assets, 0n, holder, wallet.account.address],
    });
    await this.confirm(await wallet.writeContract(request), 'borrow');
    return { assets: result[0], shares: result[1] };
  }

  async repay(holder: Address, market: MarketConfig, req: RepayRequest): Promise<LendingReceipt> {
    const wallet = this.requireWallet('repay');
    // Morpho takes exactly one of assets or shares
    const [assets, shares] = 'shares' in req ? [0n, req.shares] : [req.assets, 0n];
    const { request, result } = await this.client.simulateContract({
      account: wallet.account,
      address: this.morpho,
      abi: IMorphoAbi,
      functionName: 'repay',
      args: [paramsOf(market), assets, shares, holder, EMPTY_DATA],
    });
    await this.confirm(await wallet.writeContract(request), 'repay');
    return { assets: result[0], shares: result[1] };
  }

  private requireWallet(operation: string): SignerClient {
    if (!this.wallet) {
      throw new Error(`morpho ${operation} requires a keeper wallet`);
    }
    return this.wallet;
  }

  private async confirm(hash: Hex, operation: string): Promise<void> {
    const receipt = await this.client.waitForTransactionReceipt({ hash });
    if (receipt.status !== 'success') {
      throw new Error(`morpho ${operation} reverted in ${hash}`);
    }
    this.morphoLog.info({ hash, operation, block: receipt.blockNumber.toString() }, 'morpho-tx-confirmed');
  }
}
