import { randomUUID } from 'crypto';
import { redis } from './redis';
import { log } from './logger';

type Release = () => Promise<void>;

const localLocks = new Map<string, Promise<void>>();

const LOCK_TTL_MS = Number(process.env.ACCOUNT_LOCK_TTL_MS ?? 30_000);
const LOCK_RETRY_MS = 100;

async function acquireLocalLock(key: string): Promise<Release> {
  while (true) {
    const held = localLocks.get(key);
    if (!held) break;
    await held;
  }
  let resolveFn: () => void = () => {};
  const pending = new Promise<void>((resolve) => {
    resolveFn = resolve;
  });
  localLocks.set(key, pending);
  return async () => {
    if (localLocks.get(key) === pending) {
      localLocks.delete(key);
    }
    resolveFn();
  };
}

async function acquireDistributedLock(key: string): Promise<Release> {
  const client = redis;
  if (!client) {
    return acquireLocalLock(key);
  }

  const token = randomUUID();
  const lockKey = `account-lock:${key}`;
  while (true) {
    const ok = await client.set(lockKey, token, 'PX', LOCK_TTL_MS, 'NX');
    if (ok) {
      break;
    }
    await new Promise((resolve) => setTimeout(resolve, LOCK_RETRY_MS));
  }

  return async () => {
    try {
      const current = await client.get(lockKey);
      if (current === token) {
        await client.del(lockKey);
      }
    } catch (err) {
      log.warn({ err: err instanceof Error ? err.message : String(err), lockKey }, 'account-lock-release-failed');
    }
  };
}

/**
 * Serializes every mutation of one account's positions. Two liquidations of the
 * same account never interleave; different accounts proceed in parallel.
 */
export async function withAccountLock<T>(account: string, fn: () => Promise<T>): Promise<T> {
  const release = await acquireDistributedLock(account.toLowerCase());
  try {
    return await fn();
  } finally {
    await release();
  }
}

export function isAccountLocked(account: string): boolean {
  return localLocks.has(account.toLowerCase());
}
