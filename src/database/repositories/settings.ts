import { ConfigurationError, parseBotConfig, parseTemplateTable, type BotConfig, type TemplateTable } from '../../core/schema.js';
import type { ConfigChange, SettingsStore } from '../../core/types.js';
import { db } from '../connection.js';

export const CONFIG_KEY = 'config';
export const TEMPLATES_KEY = 'templates';

interface SettingRow {
  value: unknown;
}

export class SettingsRepository implements SettingsStore {
  async loadConfig(): Promise<BotConfig> {
    return parseBotConfig(await this.loadDocument(CONFIG_KEY));
  }

  /** Locks the config row, so concurrent moderator edits apply one after another. */
  async updateConfig<T>(change: (config: BotConfig) => ConfigChange<T>): Promise<T> {
    return db.transaction(async (client) => {
      const locked = await client.query<SettingRow>(
        'SELECT value FROM bot_settings WHERE key = $1 FOR UPDATE',
        [CONFIG_KEY]
      );
      const row = locked.rows[0];
      if (!row) {
        throw new ConfigurationError(`No "${CONFIG_KEY}" document in bot_settings; run the migrations to seed it`);
      }

      const { config, result } = change(parseBotConfig(row.value));
      if (config) {
        await client.query('UPDATE bot_settings SET value = $2, updated_at = NOW() WHERE key = $1', [
          CONFIG_KEY,
          JSON.stringify(config)
        ]);
      }
      return result;
    });
  }

  async loadTemplates(): Promise<TemplateTable> {
    return parseTemplateTable(await this.loadDocument(TEMPLATES_KEY));
  }

  private async loadDocument(key: string): Promise<unknown> {
    const result = await db.query<SettingRow>('SELECT value FROM bot_settings WHERE key = $1 LIMIT 1', [key]);
    const row = result.rows[0];
    if (!row) {
      throw new ConfigurationError(`No "${key}" document in bot_settings; run the migrations to seed it`);
    }
    return row.value;
  }
}
