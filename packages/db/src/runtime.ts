import { mkdir } from 'node:fs/promises';
import path from 'node:path';
import SQLite from 'better-sqlite3';
import { Kysely, SqliteDialect } from 'kysely';
import { migrations } from './migrations/index.ts';
import type { Database } from './schema.ts';
import type { SeedProfile } from './seeds/index.ts';
import { runSeedProfile } from './seeds/index.ts';

export const IN_MEMORY_DB_PATH = ':memory:';

export interface RuntimeDatabaseOptions {
  dbPath: string;
  seedProfile?: SeedProfile;
}

export const createDb = async (dbPath: string): Promise<Kysely<Database>> => {
  if (dbPath !== IN_MEMORY_DB_PATH) {
    await mkdir(path.dirname(dbPath), { recursive: true });
  }

  const sqlite = new SQLite(dbPath);

  return new Kysely<Database>({
    dialect: new SqliteDialect({
      database: sqlite,
    }),
  });
};

const ensureMigrationTable = async (db: Kysely<Database>): Promise<void> => {
  await db.schema
    .createTable('_migrations')
    .ifNotExists()
    .addColumn('name', 'text', (column) => column.primaryKey())
    .addColumn('applied_at', 'text', (column) => column.notNull())
    .execute();
};

export const runMigrations = async (db: Kysely<Database>): Promise<string[]> => {
  await ensureMigrationTable(db);

  const appliedRows = await db.selectFrom('_migrations').select('name').execute();
  const applied = new Set(appliedRows.map((row) => row.name));
  const newlyApplied: string[] = [];

  for (const migration of migrations) {
    if (applied.has(migration.name)) {
      continue;
    }

    await db.transaction().execute(async (trx) => {
      await migration.up(trx);
      await trx
        .insertInto('_migrations')
        .values({
          name: migration.name,
          applied_at: new Date().toISOString(),
        })
        .executeTakeFirst();
    });

    newlyApplied.push(migration.name);
  }

  return newlyApplied;
};

export const initializeRuntimeDatabase = async (
  options: RuntimeDatabaseOptions,
): Promise<Kysely<Database>> => {
  const db = await createDb(options.dbPath);
  await runMigrations(db);

  if (options.seedProfile && options.seedProfile !== 'fresh') {
    await runSeedProfile(db, options.seedProfile);
  }

  return db;
};

export const closeDb = async (db: Kysely<Database>): Promise<void> => {
  await db.destroy();
};
