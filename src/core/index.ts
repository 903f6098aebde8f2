// Core module exports for binforge

// Config
export {
  CONFIG_FILE_NAME,
  MODE_ENV_VAR,
  parseMode,
  normalizeRepository,
  decodeHex,
  parsePrecompiledConfig,
  loadOptions,
  loadPrecompiledConfig,
  fileUrl,
  parseAppOverrides,
  applyOverrides,
  modeFromEnv,
} from './config';
export type { PrecompiledMode, PrecompiledConfig, BinforgeOptions, AppOverrides, LoadConfigOptions } from './config';

// Precompiled binary resolution
export * from './precompiled';

// Logging
export { Logger, createLogger, createSilentLogger, parseLogLevel } from '../utils/logger';
export type { LogLevel, LoggerOptions } from '../utils/logger';
