export type { CacheEngineConfig, CacheEngineConfigInput } from './schema';
export { CacheEngineConfigSchema, DEFAULT_KEY_DELIMITER, DEFAULT_SINGLE_SUFFIX } from './schema';
export {
  ConfigValidationError,
  resolveEngineConfig,
  validateDefaults,
  validateFromFile,
  validateFromString,
} from './validator';
