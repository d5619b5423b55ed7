import type { CounterReservation, QuotaCounterStore, ReservationResult } from './tracker.js';

interface Counter {
  count: number;
  expiresAt: Date;
}

/**
 * Process-local counter store. Each call runs to completion without awaiting,
 * so a reservation is never interleaved with another.
 */
export class MemoryQuotaStore implements QuotaCounterStore {
  private readonly counters = new Map<string, Counter>();

  async read(keys: readonly string[]): Promise<number[]> {
    return keys.map((key) => this.counters.get(key)?.count ?? 0);
  }

  async reserve(entries: readonly CounterReservation[]): Promise<ReservationResult> {
    const totals = entries.map((entry) => (this.counters.get(entry.key)?.count ?? 0) + entry.amount);
    const rejected = entries.findIndex((entry, index) => totals[index] > entry.limit);

    if (rejected !== -1) {
      return { rejectedIndex: rejected, totals };
    }

    entries.forEach((entry, index) => {
      this.counters.set(entry.key, { count: totals[index], expiresAt: entry.expiresAt });
    });
    return { rejectedIndex: null, totals };
  }

  async purgeExpired(now: Date): Promise<number> {
    let removed = 0;
    for (const [key, counter] of this.counters) {
      if (counter.expiresAt.getTime() <= now.getTime()) {
        this.counters.delete(key);
        removed += 1;
      }
    }
    return removed;
  }
}
