import Redis from 'ioredis';
import { type SafeLogger } from './logger';

let client: Redis | null = null;

export interface RedisOptions {
  /** Deadline for each command, including ones sent to a connected but silent server. */
  commandTimeoutMs: number;
  logger: SafeLogger;
}

export function initRedis(url: string, opts: RedisOptions): Redis {
  if (client) return client;
  const logger = opts.logger.child({ component: 'redis' });
  // No offline queue: while disconnected, commands fail fast and history
  // falls back to memory instead of piling up behind the reconnect.
  client = new Redis(url, {
    lazyConnect: false,
    maxRetriesPerRequest: 3,
    enableOfflineQueue: false,
    commandTimeout: opts.commandTimeoutMs,
  });
  client.on('error', (err: Error) => {
    logger.warn({ err: err.message }, 'Redis connection error');
  });
  logger.info({}, 'Redis client initialized');
  return client;
}

export async function closeRedis(): Promise<void> {
  if (client) {
    await client.quit();
    client = null;
  }
}
