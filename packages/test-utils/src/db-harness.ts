import { copyFile, mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  type Database,
  type SeedProfile,
  closeDb,
  createDb,
  initializeRuntimeDatabase,
} from '@clinical/db';
import { type Kysely, sql } from 'kysely';

export interface DbHarness {
  db: Kysely<Database>;
  /** Rows in the document text cache, optionally for one patient only. */
  countCachedDocuments: (patientId?: string) => Promise<number>;
  beginTestCase: () => Promise<void>;
  rollbackTestCase: () => Promise<void>;
  close: () => Promise<void>;
}

const TEST_SAVEPOINT = 'vitest_case';

/**
 * Migrates and seeds a template database once, then runs every test case of a suite against a
 * copy inside a savepoint that is rolled back afterwards.
 */
export const createDbHarness = async (seedProfile: SeedProfile = 'fresh'): Promise<DbHarness> => {
  const rootDir = await mkdtemp(join(tmpdir(), 'clinical-cache-harness-'));
  const templatePath = join(rootDir, 'template.sqlite');
  const runtimePath = join(rootDir, 'runtime.sqlite');

  const templateDb = await initializeRuntimeDatabase({
    dbPath: templatePath,
    seedProfile,
  });
  await closeDb(templateDb);
  await copyFile(templatePath, runtimePath);

  const db = await createDb(runtimePath);
  let caseOpen = false;

  return {
    db,
    countCachedDocuments: async (patientId) => {
      let query = db
        .selectFrom('extracted_document_text')
        .select((expressionBuilder) => expressionBuilder.fn.countAll<number>().as('count'));
      if (patientId !== undefined) {
        query = query.where('patient_id', '=', patientId);
      }
      const row = await query.executeTakeFirstOrThrow();
      return Number(row.count);
    },
    beginTestCase: async () => {
      if (caseOpen) {
        throw new Error('A test case is already open; roll it back first.');
      }
      await sql.raw(`SAVEPOINT ${TEST_SAVEPOINT}`).execute(db);
      caseOpen = true;
    },
    rollbackTestCase: async () => {
      if (!caseOpen) {
        return;
      }
      caseOpen = false;
      await sql.raw(`ROLLBACK TO SAVEPOINT ${TEST_SAVEPOINT}`).execute(db);
      await sql.raw(`RELEASE SAVEPOINT ${TEST_SAVEPOINT}`).execute(db);
    },
    close: async () => {
      await closeDb(db);
      await rm(rootDir, { recursive: true, force: true });
    },
  };
};
