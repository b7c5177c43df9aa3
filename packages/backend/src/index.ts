export { radiationConcept } from './concepts/radiation.js';
export {
  type ConceptDefinition,
  type ConceptRegistry,
  createConceptRegistry,
} from './concepts/types.js';
export { type BackendConfig, type Env, loadConfig } from './config.js';
export { type BackendDependencies, createBackendHandlers } from './create-api.js';
export { type Backend, type BackendProviders, createBackend } from './create-backend.js';
export { mapWithConcurrency } from './lib/concurrency.js';
export {
  type ConceptPipelineDependencies,
  type ConceptRunRequest,
  DEFAULT_EXTRACTION_CONCURRENCY,
  runConceptExtraction,
} from './services/concept-extraction-service.js';
