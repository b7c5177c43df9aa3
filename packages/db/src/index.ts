export type { Database, ExtractedDocumentTextTable } from './schema.ts';
export type { DbClient } from './client.ts';
export {
  IN_MEMORY_DB_PATH,
  closeDb,
  createDb,
  initializeRuntimeDatabase,
  runMigrations,
} from './runtime.ts';
export type { SeedProfile } from './seeds/index.ts';
export { BASELINE_PATIENT_ID, runSeedProfile } from './seeds/index.ts';
