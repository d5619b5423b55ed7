import { env } from '../config/env.js';
import type { QuotaCounterStore } from '../quota/tracker.js';
import { logger } from './logger.js';

interface MaintenanceConfig {
  enabled: boolean;
  cleanupIntervalMinutes: number;
}

/** Periodically deletes quota counters whose window has expired. */
export class MaintenanceScheduler {
  private cleanupTimer?: NodeJS.Timeout;

  constructor(
    private readonly counters: QuotaCounterStore,
    private readonly config: MaintenanceConfig
  ) {}

  start(): void {
    if (!this.config.enabled) {
      logger.info('[Maintenance] disabled by configuration');
      return;
    }

    this.scheduleCleanup(30000);
    logger.info({ everyMinutes: this.config.cleanupIntervalMinutes }, '[Maintenance] quota cleanup enabled');
  }

  stop(): void {
    if (this.cleanupTimer) clearTimeout(this.cleanupTimer);
    this.cleanupTimer = undefined;
  }

  async runCleanup(now: Date = new Date()): Promise<number> {
    const removed = await this.counters.purgeExpired(now);
    logger.info({ removed }, '[Maintenance] expired quota counters removed');
    return removed;
  }

  private scheduleCleanup(delayMs?: number): void {
    const ms = delayMs ?? this.config.cleanupIntervalMinutes * 60 * 1000;
    this.cleanupTimer = setTimeout(() => {
      void this.runScheduledCleanup();
    }, ms);
  }

  private async runScheduledCleanup(): Promise<void> {
    try {
      await this.runCleanup();
    } catch (error) {
      logger.error({ error }, '[Maintenance] quota cleanup failed');
    } finally {
      this.scheduleCleanup();
    }
  }
}

export const createMaintenanceScheduler = (counters: QuotaCounterStore): MaintenanceScheduler => {
  const intervalRaw = Number(env.QUOTA_CLEANUP_INTERVAL_MIN || '10');

  return new MaintenanceScheduler(counters, {
    enabled: env.MAINTENANCE_ENABLED === 'true',
    cleanupIntervalMinutes: Number.isFinite(intervalRaw) && intervalRaw > 0 ? intervalRaw : 10
  });
};
