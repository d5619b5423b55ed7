import { describe, expect, it } from 'vitest';
import { testConfig } from '../../test/fixtures.js';
import { MemoryQuotaStore } from '../memory-store.js';
import { QuotaTracker } from '../tracker.js';
import { windowKeys } from '../windows.js';

const NOW = new Date('2024-06-10T12:00:00Z');

const setup = () => {
  const store = new MemoryQuotaStore();
  const tracker = new QuotaTracker(store, 'UTC', () => NOW);
  return { store, tracker, keys: windowKeys('fast', NOW, 'UTC') };
};

describe('QuotaTracker', () => {
  it('rejects a reservation that would pass the minute limit and stores nothing', async () => {
    const { store, tracker, keys } = setup();
    const config = testConfig();

    for (let i = 0; i < 4; i += 1) {
      expect((await tracker.checkAndReserve(config, 'fast', 1, true)).allowed).toBe(true);
    }

    const rejected = await tracker.checkAndReserve(config, 'fast', 2, true);
    expect(rejected).toEqual({ allowed: false, reason: 'minute', dailyCount: 6, minuteCount: 6 });
    expect(await store.read([keys.day, keys.minute])).toEqual([4, 4]);
  });

  it('checks the daily limit first', async () => {
    const { tracker } = setup();
    const config = testConfig();
    config.apiLimits.fast = { requestsPerMinute: 1, requestsPerDay: 2 };

    const result = await tracker.checkAndReserve(config, 'fast', 3, true);
    expect(result.allowed).toBe(false);
    expect(result.reason).toBe('daily');
  });

  it('does not persist a check without commit', async () => {
    const { store, tracker, keys } = setup();

    const result = await tracker.checkAndReserve(testConfig(), 'fast', 1, false);
    expect(result).toEqual({ allowed: true, dailyCount: 1, minuteCount: 1 });
    expect(await store.read([keys.minute])).toEqual([0]);
  });

  it('keeps tiers apart', async () => {
    const { store, tracker } = setup();
    await tracker.checkAndReserve(testConfig(), 'strong', 2, true);

    expect(await store.read([windowKeys('strong', NOW, 'UTC').minute, windowKeys('fast', NOW, 'UTC').minute])).toEqual([2, 0]);
  });
});

describe('MemoryQuotaStore', () => {
  it('purges counters whose expiry has passed', async () => {
    const store = new MemoryQuotaStore();
    await store.reserve([
      { key: 'a', amount: 1, limit: 5, expiresAt: new Date('2024-06-10T12:00:00Z') },
      { key: 'b', amount: 1, limit: 5, expiresAt: new Date('2024-06-10T13:00:00Z') }
    ]);

    expect(await store.purgeExpired(new Date('2024-06-10T12:30:00Z'))).toBe(1);
    expect(await store.read(['a', 'b'])).toEqual([0, 1]);
  });
});
