import { env, requireEnv } from './config/env.js';
import { createAiClients, createCompletionRouter } from './ai/index.js';
import { withRetry } from './ai/utils.js';
import { createTwitchChannel, createTwitchDirectory, createYouTubeChannel, type ChatChannel } from './channels/index.js';
import { CommandDispatcher } from './commands/dispatcher.js';
import { db } from './database/connection.js';
import { runMigrations } from './database/migrate.js';
import { QuotaCountersRepository } from './database/repositories/quota-counters.js';
import { SettingsRepository } from './database/repositories/settings.js';
import { UserProfilesRepository } from './database/repositories/user-profiles.js';
import { createMaintenanceScheduler, logger, setupStructuredLogging } from './ops/index.js';
import { QuotaTracker } from './quota/tracker.js';
import { DEFAULT_TIMEZONES, resolveTimeZone } from './quota/windows.js';

async function main(): Promise<void> {
  setupStructuredLogging();
  console.log('Stream chat translator - Starting...');
  console.log(`Environment: ${env.NODE_ENV}`);

  try {
    requireEnv('DATABASE_URL');

    // Database
    const result = await db.query<{ now: Date }>('SELECT NOW() as now;');
    console.log('[Startup] database connected at:', result.rows[0]?.now);
    await runMigrations();

    // Completion backend
    const aiClients = createAiClients();
    const completion = createCompletionRouter(aiClients);
    const providers = [aiClients.anthropic?.provider, aiClients.ollama?.provider].filter(Boolean);
    if (providers.length === 0) {
      console.warn('[Startup] no completion provider configured; translations will answer with apiError');
    } else {
      console.log(`[Startup] completion providers: ${providers.join(', ')}`);
    }

    // Quota
    const timeZone = resolveTimeZone([env.QUOTA_TIMEZONE, ...DEFAULT_TIMEZONES]);
    const counters = new QuotaCountersRepository();
    const quota = new QuotaTracker(counters, timeZone);
    console.log(`[Startup] quota windows keyed in ${timeZone}`);

    const twitchDirectory = createTwitchDirectory();
    const chunkDelay = Number(env.CHAT_CHUNK_DELAY_MS);

    const dispatcher = new CommandDispatcher(
      {
        settings: new SettingsRepository(),
        profiles: new UserProfilesRepository(),
        quota,
        completion,
        directories: twitchDirectory ? { twitch: twitchDirectory } : {},
        timeZone,
        clock: () => new Date()
      },
      { chunkDelayMs: Number.isFinite(chunkDelay) && chunkDelay >= 0 ? chunkDelay : 500 }
    );

    // Chat surfaces
    const channels: ChatChannel[] = [createTwitchChannel(), createYouTubeChannel()];
    for (const channel of channels) {
      await withRetry(
        async () => channel.start((message, surface) => dispatcher.handle(message, surface)),
        { attempts: 5, baseDelayMs: 1000, maxDelayMs: 30000 }
      );
    }

    const maintenance = createMaintenanceScheduler(counters);
    maintenance.start();

    const shutdown = async (signal: string): Promise<void> => {
      console.log(`[Shutdown] ${signal} received`);
      maintenance.stop();
      await Promise.all(channels.map((channel) => channel.stop()));
      await db.close();
      process.exit(0);
    };

    process.once('SIGINT', () => {
      void shutdown('SIGINT');
    });
    process.once('SIGTERM', () => {
      void shutdown('SIGTERM');
    });

    console.log('Stream chat translator initialized successfully!');
  } catch (error) {
    console.error('Error initializing translator:', error);
    process.exit(1);
  }
}

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled rejection');
});

process.on('uncaughtException', (error) => {
  logger.fatal({ error }, 'Uncaught exception');
});

void main();
