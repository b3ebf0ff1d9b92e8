import { createClient } from 'redis';
import type { Cache } from './cache.js';
import type { RedisConfig } from '../config.js';
import { errorMeta, type Logger } from '../logger.js';

type RedisClient = ReturnType<typeof createClient>;

const MAX_CONNECT_RETRIES = 3;

export class RedisCache implements Cache {
  private constructor(private readonly client: RedisClient) {}

  static async connect(config: RedisConfig, logger: Logger): Promise<RedisCache> {
    const client = createClient({
      socket: {
        host: config.host,
        port: config.port,
        // Give up instead of retrying forever so startup is never blocked
        reconnectStrategy: (retries: number) =>
          retries >= MAX_CONNECT_RETRIES
            ? new Error(`Redis unreachable after ${retries} retries`)
            : Math.min(100 * (retries + 1), 1000),
      },
      password: config.password,
      database: config.db,
    });

    client.on('error', (err: Error) => {
      logger.error('redis.client_error', errorMeta(err));
    });

    await client.connect();
    logger.info('Redis connected successfully');
    return new RedisCache(client);
  }

  async close(): Promise<void> {
    await this.client.quit();
  }

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async set(key: string, value: string, opts?: { ttlSeconds?: number }): Promise<void> {
    if (opts?.ttlSeconds) {
      await this.client.set(key, value, { EX: opts.ttlSeconds });
      return;
    }
    await this.client.set(key, value);
  }

  async del(key: string): Promise<void> {
    await this.client.del(key);
  }

  async exists(key: string): Promise<boolean> {
    return (await this.client.exists(key)) > 0;
  }

  async ping(): Promise<void> {
    await this.client.ping();
  }
}

/**
 * Best-effort connect: a missing or unreachable Redis yields null and a warning.
 */
export async function connectCache(config: RedisConfig | undefined, logger: Logger): Promise<Cache | null> {
  if (!config) {
    logger.info('REDIS_HOST not set, running without cache');
    return null;
  }

  try {
    return await RedisCache.connect(config, logger);
  } catch (error) {
    logger.warn('Failed to connect to Redis, continuing without cache', errorMeta(error));
    return null;
  }
}
