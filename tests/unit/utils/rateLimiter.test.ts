import { describe, it, expect, vi, beforeEach } from 'vitest';
import { RateLimiter } from '@src/utils/rateLimiter.js';
import type { Redis } from 'ioredis';
import type { Logger } from '@src/infrastructure/logger.js';

describe('RateLimiter', () => {
  let rateLimiter: RateLimiter;
  let mockRedis: any;
  let mockLogger: any;

  beforeEach(() => {
    mockRedis = {
      multi: vi.fn().mockReturnThis(),
      incr: vi.fn().mockReturnThis(),
      expire: vi.fn().mockReturnThis(),
      exec: vi.fn(),
    };
    mockLogger = { warn: vi.fn() };
    rateLimiter = new RateLimiter(mockRedis as Redis, mockLogger as Logger);
  });

  it('allows request within limit', async () => {
    // Mock redis response: [[null, 5]] (5th request)
    mockRedis.exec.mockResolvedValue([[null, 5], [null, 1]]);

    const allowed = await rateLimiter.isAllowed('chat:@alice:example.org', 10, 60);
    expect(allowed).toBe(true);
    expect(mockRedis.incr).toHaveBeenCalledWith('ratelimit:chat:@alice:example.org');
    expect(mockRedis.expire).toHaveBeenCalledWith('ratelimit:chat:@alice:example.org', 60, 'NX');
  });

  it('allows the request that reaches the limit exactly', async () => {
    mockRedis.exec.mockResolvedValue([[null, 10], [null, 0]]);

    expect(await rateLimiter.isAllowed('k', 10, 60)).toBe(true);
  });

  it('blocks request exceeding limit', async () => {
    mockRedis.exec.mockResolvedValue([[null, 11], [null, 0]]);

    const allowed = await rateLimiter.isAllowed('k', 10, 60);
    expect(allowed).toBe(false);
  });

  it('blocks when the transaction was discarded', async () => {
    mockRedis.exec.mockResolvedValue(null);

    expect(await rateLimiter.isAllowed('k', 10, 60)).toBe(false);
  });

  it('allows messages when redis is unreachable', async () => {
    mockRedis.exec.mockRejectedValue(new Error('Connection is closed.'));

    expect(await rateLimiter.isAllowed('k', 10, 60)).toBe(true);
    expect(mockLogger.warn).toHaveBeenCalledTimes(1);
  });
});
