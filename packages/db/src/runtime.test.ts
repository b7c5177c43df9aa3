import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { sql } from 'kysely';
import { afterEach, describe, expect, it } from 'vitest';
import { migration0001CreateExtractedDocumentText } from './migrations/0001-create-extracted-document-text.ts';
import { IN_MEMORY_DB_PATH, createDb, initializeRuntimeDatabase, runMigrations } from './runtime.ts';
import { BASELINE_PATIENT_ID } from './seeds/index.ts';

const tempDirs: string[] = [];

const makeTempDbPath = async (): Promise<string> => {
  const dir = await mkdtemp(path.join(tmpdir(), 'clinical-db-tests-'));
  tempDirs.push(dir);
  return path.join(dir, 'db.sqlite');
};

afterEach(async () => {
  for (const dir of tempDirs.splice(0, tempDirs.length)) {
    await rm(dir, { recursive: true, force: true });
  }
});

describe('runtime migrations', () => {
  it('creates schema on a fresh DB', async () => {
    const dbPath = await makeTempDbPath();
    const db = await initializeRuntimeDatabase({ dbPath, seedProfile: 'fresh' });

    const tableRow = await sql<{ name: string }>`
      SELECT name
      FROM sqlite_master
      WHERE type = 'table' AND name = 'extracted_document_text'
    `.execute(db);

    expect(tableRow.rows[0]?.name).toBe('extracted_document_text');

    await db.destroy();
  });

  it('applies pending migrations to an older schema', async () => {
    const dbPath = await makeTempDbPath();
    const db = await createDb(dbPath);

    await db.schema
      .createTable('_migrations')
      .ifNotExists()
      .addColumn('name', 'text', (column) => column.primaryKey())
      .addColumn('applied_at', 'text', (column) => column.notNull())
      .execute();

    await migration0001CreateExtractedDocumentText.up(db);
    await db
      .insertInto('_migrations')
      .values({
        name: migration0001CreateExtractedDocumentText.name,
        applied_at: new Date().toISOString(),
      })
      .executeTakeFirst();

    const applied = await runMigrations(db);
    expect(applied).toEqual(['0002-add-content-hash-index', '0003-add-document-type-index']);

    const indexResult = await sql<{ name: string }>`
      PRAGMA index_list('extracted_document_text')
    `.execute(db);

    const indexNames = indexResult.rows.map((row) => row.name);
    expect(indexNames).toContain('idx_extracted_document_text_hash');
    expect(indexNames).toContain('idx_extracted_document_text_type');

    await db.destroy();
  });

  it('does not reapply migrations on a second run', async () => {
    const db = await initializeRuntimeDatabase({ dbPath: IN_MEMORY_DB_PATH });

    expect(await runMigrations(db)).toEqual([]);

    await db.destroy();
  });

  it('seeds baseline documents once', async () => {
    const db = await initializeRuntimeDatabase({
      dbPath: IN_MEMORY_DB_PATH,
      seedProfile: 'baseline',
    });

    const rows = await db
      .selectFrom('extracted_document_text')
      .select(['document_id', 'extraction_success'])
      .where('patient_id', '=', BASELINE_PATIENT_ID)
      .orderBy('document_date')
      .execute();

    expect(rows).toEqual([
      { document_id: 'doc-baseline-consult', extraction_success: 1 },
      { document_id: 'doc-baseline-summary', extraction_success: 1 },
    ]);

    await db.destroy();
  });
});
