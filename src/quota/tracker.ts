import type { ModelTier } from '../ai/types.js';
import type { BotConfig } from '../core/schema.js';
import { windowKeys } from './windows.js';

const MINUTE_COUNTER_TTL_MS = 2 * 60 * 1000;
const DAY_COUNTER_TTL_MS = 2 * 24 * 60 * 60 * 1000;

export interface CounterReservation {
  key: string;
  amount: number;
  limit: number;
  expiresAt: Date;
}

export interface ReservationResult {
  /** Index of the first entry whose total would pass its limit, or null when applied. */
  rejectedIndex: number | null;
  /** Post-increment totals, in entry order. */
  totals: number[];
}

export interface QuotaCounterStore {
  read(keys: readonly string[]): Promise<number[]>;
  /** Adds every amount or none of them. */
  reserve(entries: readonly CounterReservation[]): Promise<ReservationResult>;
  purgeExpired(now: Date): Promise<number>;
}

export type QuotaRejection = 'daily' | 'minute';

export interface QuotaCheck {
  allowed: boolean;
  reason?: QuotaRejection;
  dailyCount: number;
  minuteCount: number;
}

export type Clock = () => Date;

export class QuotaTracker {
  constructor(
    private readonly store: QuotaCounterStore,
    private readonly timeZone: string,
    private readonly clock: Clock = () => new Date()
  ) {}

  /**
   * Checks whether `count` more requests fit the tier's day and minute
   * windows. The daily limit is checked first. With `commit`, an allowed
   * check also persists the new totals atomically.
   */
  async checkAndReserve(config: BotConfig, tier: ModelTier, count: number, commit: boolean): Promise<QuotaCheck> {
    const limits = config.apiLimits[tier];
    const now = this.clock();
    const keys = windowKeys(tier, now, this.timeZone);

    if (!commit) {
      const [day, minute] = await this.store.read([keys.day, keys.minute]);
      return this.evaluate(day + count, minute + count, limits.requestsPerDay, limits.requestsPerMinute);
    }

    const result = await this.store.reserve([
      { key: keys.day, amount: count, limit: limits.requestsPerDay, expiresAt: new Date(now.getTime() + DAY_COUNTER_TTL_MS) },
      { key: keys.minute, amount: count, limit: limits.requestsPerMinute, expiresAt: new Date(now.getTime() + MINUTE_COUNTER_TTL_MS) }
    ]);

    const [dailyCount, minuteCount] = result.totals;
    if (result.rejectedIndex === 0) return { allowed: false, reason: 'daily', dailyCount, minuteCount };
    if (result.rejectedIndex === 1) return { allowed: false, reason: 'minute', dailyCount, minuteCount };
    return { allowed: true, dailyCount, minuteCount };
  }

  private evaluate(dailyCount: number, minuteCount: number, dailyLimit: number, minuteLimit: number): QuotaCheck {
    if (dailyCount > dailyLimit) return { allowed: false, reason: 'daily', dailyCount, minuteCount };
    if (minuteCount > minuteLimit) return { allowed: false, reason: 'minute', dailyCount, minuteCount };
    return { allowed: true, dailyCount, minuteCount };
  }
}
