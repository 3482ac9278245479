/**
 * Planboard Core - projects, boards, lists, tasks and labels
 *
 * Entry point for the data model: schemas and validation primitives, the
 * SQLite-backed store, the entity services and the import registry.
 */

// Services
export { ProjectService } from './services/ProjectService.js';
export { BoardService } from './services/BoardService.js';
export { LabelService } from './services/LabelService.js';
export { ListService } from './services/ListService.js';
export { TaskService } from './services/TaskService.js';
export {
  createServices,
  type ServiceContainer,
  type ServiceFactoryConfig,
} from './services/ServiceFactory.js';
export {
  FileSystemImageStorage,
  IMAGE_UPLOAD_DIR,
  type ImageStorage,
} from './services/ImageStorage.js';

// Import registry
export * from './importers/index.js';

// Schemas and validation
export * from './schemas/index.js';
export * from './validation/index.js';
export { deriveSlug } from './utils/slug.js';

// Database
export {
  createDatabase,
  createInMemoryDatabase,
  DatabaseStore,
  parseDbUrl,
  type DatabaseOptions,
  type DbUrl,
  type Store,
} from './database/index.js';

// Errors
export * from './errors/index.js';

// Configuration and logging
export { cfg, configSchema, type AppConfig } from './utils/config.js';
export {
  createModuleLogger,
  createLoggerFactory,
  logger,
  logError,
  logShutdown,
  startTimer,
} from './utils/logger.js';
