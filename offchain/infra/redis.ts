import Redis from 'ioredis';
import { log } from './logger';

const redisUrl = process.env.REDIS_URL?.trim();

// Shared by account locks across keeper processes; null means locks stay in process.
export const redis = redisUrl ? new Redis(redisUrl, { maxRetriesPerRequest: 2 }) : null;

redis?.on('error', (err: unknown) => {
  log.warn({ err: err instanceof Error ? err.message : String(err) }, 'redis-connection-error');
});
