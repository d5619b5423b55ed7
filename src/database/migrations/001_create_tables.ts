import type { Queryable } from '../connection.js';

export async function up(client: Queryable): Promise<void> {
  console.log('Running migration: 001_create_tables');

  // Table: bot_settings (configuration and templates as JSON documents)
  await client.query(`
    CREATE TABLE IF NOT EXISTS bot_settings (
      key VARCHAR(64) PRIMARY KEY,
      value JSONB NOT NULL,
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);

  // Table: user_profiles
  await client.query(`
    CREATE TABLE IF NOT EXISTS user_profiles (
      user_id VARCHAR(100) PRIMARY KEY,
      username VARCHAR(255) NOT NULL,
      target_language VARCHAR(16) NOT NULL DEFAULT 'default',
      speaking_language VARCHAR(16) NOT NULL DEFAULT 'en',
      speaking_style VARCHAR(64) NOT NULL DEFAULT 'normal',
      pronouns TEXT,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);

  await client.query(`
    CREATE INDEX IF NOT EXISTS idx_user_profiles_username_lower
    ON user_profiles (LOWER(username));
  `);

  // Table: quota_counters
  await client.query(`
    CREATE TABLE IF NOT EXISTS quota_counters (
      key VARCHAR(128) PRIMARY KEY,
      count INTEGER NOT NULL DEFAULT 0,
      expires_at TIMESTAMPTZ NOT NULL
    );
  `);

  await client.query(`
    CREATE INDEX IF NOT EXISTS idx_quota_counters_expires_at
    ON quota_counters (expires_at);
  `);

  console.log('Migration 001_create_tables completed');
}

export async function down(client: Queryable): Promise<void> {
  console.log('Rolling back migration: 001_create_tables');

  await client.query('DROP TABLE IF EXISTS quota_counters CASCADE;');
  await client.query('DROP TABLE IF EXISTS user_profiles CASCADE;');
  await client.query('DROP TABLE IF EXISTS bot_settings CASCADE;');

  console.log('Rollback 001_create_tables completed');
}
