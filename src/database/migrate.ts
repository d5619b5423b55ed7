import { db, type Queryable } from './connection.js';
import * as migration001 from './migrations/001_create_tables.js';
import * as migration002 from './migrations/002_seed_settings.js';

interface Migration {
  id: number;
  name: string;
  up: (client: Queryable) => Promise<void>;
  down: (client: Queryable) => Promise<void>;
}

const migrations: Migration[] = [
  {
    id: 1,
    name: '001_create_tables',
    up: migration001.up,
    down: migration001.down
  },
  {
    id: 2,
    name: '002_seed_settings',
    up: migration002.up,
    down: migration002.down
  }
];

async function createMigrationsTable(): Promise<void> {
  await db.query(`
    CREATE TABLE IF NOT EXISTS migrations (
      id INTEGER PRIMARY KEY,
      name VARCHAR(255) NOT NULL,
      executed_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);
}

async function getExecutedMigrations(): Promise<number[]> {
  const result = await db.query<{ id: number }>('SELECT id FROM migrations ORDER BY id;');
  return result.rows.map(row => row.id);
}

/** Applies pending migrations, each in its own transaction together with its bookkeeping row. */
export async function runMigrations(): Promise<void> {
  console.log('[Migrations] applying pending migrations');

  await createMigrationsTable();
  const executed = new Set(await getExecutedMigrations());
  const pending = migrations.filter(migration => !executed.has(migration.id));

  for (const migration of pending) {
    await db.transaction(async (client) => {
      await migration.up(client);
      await client.query('INSERT INTO migrations (id, name) VALUES ($1, $2);', [migration.id, migration.name]);
    });
  }

  console.log(`[Migrations] ${pending.length} applied, ${migrations.length - pending.length} already up to date`);
}

export async function rollbackMigration(): Promise<void> {
  await createMigrationsTable();
  const executed = await getExecutedMigrations();
  const lastMigrationId = executed.at(-1);

  if (lastMigrationId === undefined) {
    console.log('[Migrations] nothing to roll back');
    return;
  }

  const migration = migrations.find(m => m.id === lastMigrationId);
  if (!migration) {
    throw new Error(`Migration ${lastMigrationId} not found`);
  }

  await db.transaction(async (client) => {
    await migration.down(client);
    await client.query('DELETE FROM migrations WHERE id = $1;', [migration.id]);
  });
  console.log(`[Migrations] ${migration.name} rolled back`);
}

// CLI runner
if (import.meta.url === `file://${process.argv[1]}`) {
  const command = process.argv[2];
  const task = command === 'up' ? runMigrations : command === 'down' ? rollbackMigration : null;

  if (!task) {
    console.log('Usage: node dist/database/migrate.js [up|down]');
    process.exit(1);
  } else {
    task()
      .then(async () => {
        await db.close();
        process.exit(0);
      })
      .catch(err => {
        console.error(`[Migrations] ${command} failed:`, err);
        process.exit(1);
      });
  }
}
