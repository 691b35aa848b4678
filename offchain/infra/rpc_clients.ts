import {
  createPublicClient,
  createWalletClient,
  defineChain,
  http,
  type Account,
  type Chain,
  type Hex,
  type PublicClient,
  type Transport,
  type WalletClient,
} from 'viem';
import { privateKeyToAccount } from 'viem/accounts';
import type { AppConfig } from './config';
import { log } from './logger';

export type ManagedClient = PublicClient<Transport, Chain>;
export type SignerClient = WalletClient<Transport, Chain, Account>;

export function chainFor(cfg: Pick<AppConfig, 'chainId' | 'chainName' | 'rpcUrl'>): Chain {
  return defineChain({
    id: cfg.chainId,
    name: cfg.chainName,
    nativeCurrency: { name: 'Ether', symbol: 'ETH', decimals: 18 },
    rpcUrls: { default: { http: [cfg.rpcUrl] } },
  });
}

export function createClients(cfg: AppConfig, privateKey?: Hex): { publicClient: ManagedClient; walletClient: SignerClient | null } {
  const chain = chainFor(cfg);
  const publicClient = createPublicClient({ chain, transport: http(cfg.rpcUrl) });
  if (!privateKey) {
    log.warn({ chainId: cfg.chainId }, 'rpc-wallet-missing-read-only');
    return { publicClient, walletClient: null };
  }
  const walletClient = createWalletClient({
    account: privateKeyToAccount(privateKey),
    chain,
    transport: http(cfg.rpcUrl),
  });
  return { publicClient, walletClient };
}
