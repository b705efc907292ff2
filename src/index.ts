/**
 * signalpath
 *
 * Intent-aware retrieval-augmented assistant for collaboration product
 * support.
 *
 * @packageDocumentation
 */

// Configuration
export * from './config/index.js';

// Storage
export * from './storage/index.js';

// Models
export * from './models/index.js';

// Intent
export * from './intent/index.js';

// Retrieval
export * from './retrieval/index.js';

// Generation
export * from './generation/index.js';

// Orchestration
export * from './orchestrator/index.js';

// HTTP ingress
export * from './server/index.js';

// Composition
export { createAssistant } from './assistant.js';
export type { Assistant, CreateAssistantOptions } from './assistant.js';

// Utilities
export {
  SignalpathError,
  ClassificationError,
  RetrievalError,
  GenerationError,
  PersistenceError,
  DeadlineError,
  ConfigError,
} from './utils/errors.js';
export { createLogger, setLogLevel, setJsonMode } from './utils/logger.js';
export type { Logger, LogLevel } from './utils/logger.js';
