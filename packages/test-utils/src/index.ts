export { type DbHarness, createDbHarness } from './db-harness.ts';
export { type Deferred, createDeferred, flushMicrotasks } from './deferred.ts';
export {
  type InMemoryProviders,
  type ScriptedFieldExtractor,
  type StoredDocument,
  createInMemoryProviders,
  createScriptedFieldExtractor,
} from './providers.ts';
