import fs from 'node:fs/promises';
import { parseBotConfig, parseTemplateTable } from '../../core/schema.js';
import type { Queryable } from '../connection.js';
import { CONFIG_KEY, TEMPLATES_KEY } from '../repositories/settings.js';

const readSeed = async (name: string): Promise<unknown> => {
  const raw = await fs.readFile(new URL(`../../../data/${name}`, import.meta.url), 'utf8');
  return JSON.parse(raw);
};

export async function up(client: Queryable): Promise<void> {
  console.log('Running migration: 002_seed_settings');

  const config = parseBotConfig(await readSeed('config.json'));
  const templates = parseTemplateTable(await readSeed('templates.json'));

  // Existing documents are left alone so moderator edits survive a re-seed.
  await client.query(
    `INSERT INTO bot_settings (key, value) VALUES ($1, $2), ($3, $4)
     ON CONFLICT (key) DO NOTHING`,
    [CONFIG_KEY, JSON.stringify(config), TEMPLATES_KEY, JSON.stringify(templates)]
  );

  console.log('Migration 002_seed_settings completed');
}

export async function down(client: Queryable): Promise<void> {
  console.log('Rolling back migration: 002_seed_settings');

  await client.query('DELETE FROM bot_settings WHERE key IN ($1, $2);', [CONFIG_KEY, TEMPLATES_KEY]);

  console.log('Rollback 002_seed_settings completed');
}
