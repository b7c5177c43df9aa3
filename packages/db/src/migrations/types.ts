import type { Kysely, Transaction } from 'kysely';
import type { Database } from '../schema.ts';

export type MigrationDatabase = Kysely<Database> | Transaction<Database>;

export interface Migration {
  name: string;
  up: (db: MigrationDatabase) => Promise<void>;
}
