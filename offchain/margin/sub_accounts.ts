import { getCreate2Address, isAddressEqual, pad, zeroAddress, type Address, type Hex } from 'viem';
import { addressKey } from '../infra/address';
import { log } from '../infra/logger';
import { MarginError, MarginErrorCode } from './errors';
import type { SubAccount } from './types';

export type SubAccountFactory = {
  factory: Address;
  initCodeHash: Hex;
};

/**
 * One position holder per owner, keyed by owner. Holder addresses are the
 * CREATE2 addresses the clone factory deploys, so they can be predicted
 * before the sub-account exists.
 */
export class SubAccountStore {
  private readonly accounts = new Map<string, SubAccount>();
  private readonly storeLog = log.child({ module: 'margin.sub-accounts' });

  constructor(private readonly factory: SubAccountFactory) {}

  predictAddress(owner: Address): Address {
    return getCreate2Address({
      from: this.factory.factory,
      salt: pad(owner, { size: 32 }),
      bytecodeHash: this.factory.initCodeHash,
    });
  }

  create(owner: Address): SubAccount {
    if (isAddressEqual(owner, zeroAddress)) {
      throw new MarginError(MarginErrorCode.ZeroAddress, 'sub-account owner must not be the zero address');
    }
    const key = addressKey(owner);
    if (this.accounts.has(key)) {
      throw new MarginError(MarginErrorCode.SubAccountExists, `owner ${owner} already has a sub-account`, { owner });
    }
    const account: SubAccount = { owner, holder: this.predictAddress(owner), createdAt: Date.now() };
    this.accounts.set(key, account);
    this.storeLog.info({ owner, holder: account.holder }, 'sub-account-created');
    return account;
  }

  /** Registers sub-accounts that already exist, e.g. from config at startup. */
  preload(owners: readonly Address[]): SubAccount[] {
    const created = owners.map((owner) => this.create(owner));
    if (created.length > 0) this.storeLog.info({ count: created.length }, 'sub-accounts-preloaded');
    return created;
  }

  get(owner: Address): SubAccount | undefined {
    return this.accounts.get(addressKey(owner));
  }

  require(owner: Address): SubAccount {
    const account = this.get(owner);
    if (!account) {
      throw new MarginError(MarginErrorCode.NoSubAccount, `owner ${owner} has no sub-account`, { owner });
    }
    return account;
  }

  list(): SubAccount[] {
    return Array.from(this.accounts.values());
  }

  get size(): number {
    return this.accounts.size;
  }
}
