import { counter, histogram } from './metrics';
import type { CallResult, ExternalCallError, ExternalSource } from '../protocols/types';

export const DEFAULT_CALL_TIMEOUT_MS = 5_000;

export class CallTimeoutError extends Error {
  constructor(public readonly operation: string, public readonly timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'CallTimeoutError';
  }
}

export class InvalidResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidResponseError';
  }
}

export async function withTimeout<T>(operation: string, fn: () => Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new CallTimeoutError(operation, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([fn(), timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

function toCallError(source: ExternalSource, operation: string, err: unknown): ExternalCallError {
  const message = err instanceof Error ? err.message : String(err);
  if (err instanceof CallTimeoutError) {
    return { source, operation, kind: 'timeout', message };
  }
  if (err instanceof InvalidResponseError) {
    return { source, operation, kind: 'invalid-response', message };
  }
  return { source, operation, kind: 'failed', message };
}

/**
 * Runs one collaborator call under a deadline and reports it as a CallResult.
 * Callers decide whether a failure is a degraded mode or a hard stop.
 */
export async function guardedCall<T>(
  source: ExternalSource,
  operation: string,
  fn: () => Promise<T>,
  timeoutMs: number = DEFAULT_CALL_TIMEOUT_MS,
): Promise<CallResult<T>> {
  const end = histogram.externalCallDuration.startTimer({ source, operation });
  try {
    const value = await withTimeout(`${source}.${operation}`, fn, timeoutMs);
    end({ status: 'success' });
    return { ok: true, value };
  } catch (err) {
    const error = toCallError(source, operation, err);
    end({ status: 'error' });
    counter.externalCallErrors.inc({ source, operation, kind: error.kind });
    return { ok: false, error };
  }
}
