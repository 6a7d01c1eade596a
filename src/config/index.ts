export * from './types.js';
export {
  loadConfig,
  validateConfig,
  createCatalogFromConfig,
  createLoggerFromConfig,
  validatedBodyOptionsFromConfig,
  ConfigValidationError,
} from './loader.js';
export type { LoadConfigOptions } from './loader.js';
