import type { Address, Hex } from 'viem';
import { IPerpsExchangeAbi } from '../abis/IPerpsExchangeAbi';
import { log } from '../infra/logger';
import type { ManagedClient, SignerClient } from '../infra/rpc_clients';
import type { MarginExchange, PerpOrder } from './types';

const EQUITY_DECIMALS = 18;

export function equityToLoanUnits(equity: bigint, loanDecimals: number): bigint {
  return (equity * 10n ** BigInt(loanDecimals)) / 10n ** BigInt(EQUITY_DECIMALS);
}

export class RisexExchange implements MarginExchange {
  private readonly exchangeLog = log.child({ module: 'protocols.risex' });

  constructor(
    private readonly exchange: Address,
    private readonly loanDecimals: number,
    private readonly client: ManagedClient,
    private readonly wallet: SignerClient | null = null,
  ) {}

  async accountEquity(holder: Address): Promise<bigint | null> {
    const [equity, exists] = await this.client.readContract({
      address: this.exchange,
      abi: IPerpsExchangeAbi,
      functionName: 'getAccountEquity',
      args: [holder],
    });
    return exists ? equityToLoanUnits(equity, this.loanDecimals) : null;
  }

  async withdrawableAmount(holder: Address, token: Address): Promise<bigint> {
    return this.client.readContract({
      address: this.exchange,
      abi: IPerpsExchangeAbi,
      functionName: 'getWithdrawableAmount',
      args: [holder, token],
    });
  }

  async withdraw(holder: Address, token: Address, amount: bigint): Promise<bigint> {
    const wallet = this.requireWallet('withdraw');
    const { request, result } = await this.client.simulateContract({
      account: wallet.account,
      address: this.exchange,
      abi: IPerpsExchangeAbi,
      functionName: 'withdraw',
      args: [holder, token, amount],
    });
    await this.confirm(await wallet.writeContract(request), 'withdraw');
    return result;
  }

  async deposit(holder: Address, token: Address, amount: bigint): Promise<void> {
    const wallet = this.requireWallet('deposit');
    const { request } = await this.client.simulateContract({
      account: wallet.account,
      address: this.exchange,
      abi: IPerpsExchangeAbi,
      functionName: 'deposit',
      args: [holder, token, amount],
    });
    await this.confirm(await wallet.writeContract(request), 'deposit');
  }

  async placeOrder(holder: Address, order: PerpOrder): Promise<string> {
    const wallet = this.requireWallet('placeOrder');
    const { request, result } = await this.client.simulateContract({
      account: wallet.account,
      address: this.exchange,
      abi: IPerpsExchangeAbi,
      functionName: 'placeOrder',
      args: [
        holder,
        {
          marketId: BigInt(order.market),
          isBuy: order.side === 'buy',
          size: order.size,
          limitPrice: order.limitPrice,
          reduceOnly: order.reduceOnly,
        },
      ],
    });
    await this.confirm(await wallet.writeContract(request), 'placeOrder');
    return result.toString();
  }

  async cancelOrder(holder: Address, orderId: string): Promise<void> {
    const wallet = this.requireWallet('cancelOrder');
    const { request } = await this.client.simulateContract({
      account: wallet.account,
      address: this.exchange,
      abi: IPerpsExchangeAbi,
      functionName: 'cancelOrder',
      args: [holder, BigInt(orderId)],
    });
    await this.confirm(await wallet.writeContract(request), 'cancelOrder');
  }

  private requireWallet(operation: string): SignerClient {
    if (!this.wallet) {
      throw new Error(`exchange ${operation} requires a keeper wallet`);
    }
    return this.wallet;
  }

  private async confirm(hash: Hex, operation: string): Promise<void> {
    const receipt = await this.client.waitForTransactionReceipt({ hash });
    if (receipt.status !== 'success') {
      throw new Error(`exchange ${operation} reverted in ${hash}`);
    }
    this.exchangeLog.info({ hash, operation }, 'exchange-tx-confirmed');
  }
}
