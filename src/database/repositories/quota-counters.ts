import type { CounterReservation, QuotaCounterStore, ReservationResult } from '../../quota/tracker.js';
import { db } from '../connection.js';

interface CounterRow {
  key: string;
  count: number;
}

export class QuotaCountersRepository implements QuotaCounterStore {
  async read(keys: readonly string[]): Promise<number[]> {
    const result = await db.query<CounterRow>(
      'SELECT key, count FROM quota_counters WHERE key = ANY($1::text[]) AND expires_at > NOW()',
      [[...keys]]
    );

    const counts = new Map(result.rows.map((row) => [row.key, row.count]));
    return keys.map((key) => counts.get(key) ?? 0);
  }

  /**
   * Locks the counter rows, compares the new totals with their limits and
   * writes them only when every entry fits.
   */
  async reserve(entries: readonly CounterReservation[]): Promise<ReservationResult> {
    return db.transaction(async (client) => {
      const keys = entries.map((entry) => entry.key);

      // Rows must exist before they can be locked.
      for (const entry of entries) {
        await client.query(
          `INSERT INTO quota_counters (key, count, expires_at) VALUES ($1, 0, $2)
           ON CONFLICT (key) DO NOTHING`,
          [entry.key, entry.expiresAt]
        );
      }

      const locked = await client.query<CounterRow>(
        `SELECT key, CASE WHEN expires_at > NOW() THEN count ELSE 0 END AS count
         FROM quota_counters WHERE key = ANY($1::text[]) ORDER BY key FOR UPDATE`,
        [keys]
      );
      const current = new Map(locked.rows.map((row) => [row.key, row.count]));

      const totals = entries.map((entry) => (current.get(entry.key) ?? 0) + entry.amount);
      const rejected = entries.findIndex((entry, index) => totals[index] > entry.limit);
      if (rejected !== -1) {
        return { rejectedIndex: rejected, totals };
      }

      for (const [index, entry] of entries.entries()) {
        await client.query(
          'UPDATE quota_counters SET count = $2, expires_at = $3 WHERE key = $1',
          [entry.key, totals[index], entry.expiresAt]
        );
      }

      return { rejectedIndex: null, totals };
    });
  }

  async purgeExpired(now: Date): Promise<number> {
    const result = await db.query('DELETE FROM quota_counters WHERE expires_at <= $1', [now]);
    return result.rowCount ?? 0;
  }
}
