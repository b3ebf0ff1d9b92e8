import { describe, it, expect, vi } from 'vitest';
import { connectCache } from '../redisCache.js';
import { silentLogger } from '../../../testing/fakes.js';

describe('connectCache', () => {
  it('should run without a cache when no host is configured', async () => {
    const logger = silentLogger();
    const info = vi.spyOn(logger, 'info');

    await expect(connectCache(undefined, logger)).resolves.toBeNull();
    expect(info).toHaveBeenCalledWith('REDIS_HOST not set, running without cache');
  });

  it('should give up on an unreachable host and continue without a cache', async () => {
    const logger = silentLogger();
    const warn = vi.spyOn(logger, 'warn');

    // Nothing listens on port 1; connections are refused straight away
    const cache = await connectCache({ host: '127.0.0.1', port: 1, db: 0 }, logger);

    expect(cache).toBeNull();
    expect(warn).toHaveBeenCalledWith(
      'Failed to connect to Redis, continuing without cache',
      expect.objectContaining({ error: expect.anything() })
    );
  });
});
