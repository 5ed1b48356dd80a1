import type { RateLimitConfig } from '../config';
import { RateLimiter } from './rate-limiter';

const baseConfig: RateLimitConfig = {
  requestsPerMinute: 60,
  requestsPerHour: 1000,
  requestsPerDay: 10_000,
  tokensPerMinute: undefined,
  tokensPerDay: undefined,
  costPerDay: undefined,
  burstSize: 10,
  burstCooldownMs: 1000,
};

function track(promise: Promise<unknown>): { done: boolean } {
  const state = { done: false };
  void promise.then(() => {
    state.done = true;
  });
  return state;
}

describe('RateLimiter', () => {
  beforeEach(() => {
    jest.useFakeTimers();
    jest.setSystemTime(new Date('2024-05-01T00:00:00.000Z'));
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('admits a burst then waits for the bucket to refill', async () => {
    const limiter = new RateLimiter({ ...baseConfig, burstSize: 2 });

    await limiter.acquire();
    await limiter.acquire();
    const third = track(limiter.acquire());

    await jest.advanceTimersByTimeAsync(999);
    expect(third.done).toBe(false);

    await jest.advanceTimersByTimeAsync(1);
    expect(third.done).toBe(true);
  });

  it('never admits more than requestsPerMinute in a rolling minute', async () => {
    const limiter = new RateLimiter({ ...baseConfig, requestsPerMinute: 2 });

    const calls = Array.from({ length: 5 }, () => track(limiter.acquire()));
    const admitted = () => calls.filter((call) => call.done).length;

    await jest.advanceTimersByTimeAsync(0);
    expect(admitted()).toBe(2);

    await jest.advanceTimersByTimeAsync(59_999);
    expect(admitted()).toBe(2);

    await jest.advanceTimersByTimeAsync(1);
    expect(admitted()).toBe(4);

    await jest.advanceTimersByTimeAsync(60_000);
    expect(admitted()).toBe(5);
  });

  it('keeps tenants apart', async () => {
    const limiter = new RateLimiter({ ...baseConfig, requestsPerMinute: 1 });

    await limiter.acquire('tenant-a');
    const blocked = track(limiter.acquire('tenant-a'));
    await limiter.acquire('tenant-b');

    await jest.advanceTimersByTimeAsync(0);
    expect(blocked.done).toBe(false);
    expect(limiter.getUsage('tenant-b').requests.minute).toBe(1);
  });

  it('waits for the token window to roll over once the token limit is spent', async () => {
    const limiter = new RateLimiter({ ...baseConfig, tokensPerMinute: 100 });
    limiter.recordUsage({ tokens: 100 });

    const call = track(limiter.acquire());

    await jest.advanceTimersByTimeAsync(59_999);
    expect(call.done).toBe(false);

    await jest.advanceTimersByTimeAsync(1);
    expect(call.done).toBe(true);
    expect(limiter.getUsage().tokens.minute).toBe(0);
  });

  it('blocks on the daily cost limit', async () => {
    const limiter = new RateLimiter({ ...baseConfig, costPerDay: 1 });
    limiter.recordUsage({ cost: 1.5, tenantId: 'tenant-a' });

    const call = track(limiter.acquire('tenant-a'));

    await jest.advanceTimersByTimeAsync(60 * 60_000);
    expect(call.done).toBe(false);
    await expect(limiter.schedule(async () => 'ok', 'tenant-b')).resolves.toBe(
      'ok',
    );
  });

  it('reports usage and configured limits', async () => {
    const limiter = new RateLimiter({ ...baseConfig, tokensPerDay: 5000 });

    await limiter.acquire('tenant-a');
    await limiter.acquire('tenant-a');
    limiter.recordUsage({ tokens: 50, cost: 0.25, tenantId: 'tenant-a' });

    expect(limiter.getUsage('tenant-a')).toEqual({
      tenant_id: 'tenant-a',
      requests: { minute: 2, hour: 2, day: 2 },
      tokens: { minute: 50, day: 50 },
      cost: { day: 0.25 },
      limits: {
        requests_per_minute: 60,
        requests_per_hour: 1000,
        requests_per_day: 10_000,
        tokens_per_minute: null,
        tokens_per_day: 5000,
        cost_per_day: null,
      },
    });
  });

  it('drops minute requests from the report once they age out', async () => {
    const limiter = new RateLimiter(baseConfig);

    await limiter.acquire();
    jest.advanceTimersByTime(60_000);

    expect(limiter.getUsage().requests).toEqual({ minute: 0, hour: 1, day: 1 });
  });

  it('runs scheduled work after acquiring', async () => {
    const limiter = new RateLimiter(baseConfig);
    const work = jest.fn(async () => 42);

    await expect(limiter.schedule(work)).resolves.toBe(42);
    expect(work).toHaveBeenCalledTimes(1);
    expect(limiter.getUsage().requests.minute).toBe(1);
  });
});
