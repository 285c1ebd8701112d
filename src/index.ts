// Configuration types and schemas
export type {
  ConverterConfig,
  PercentageConfig,
  PartialConverterConfig,
  PartialPercentageConfig,
} from './types/config.js';
export {
  ConverterConfigSchema,
  PercentageConfigSchema,
  DEFAULT_APP_TARGET_SUFFIX,
  DEFAULT_ALWAYS_COVERED_FILES,
} from './types/config.js';

// Config loader
export { loadConverterConfig, loadPercentageConfig } from './utils/config-loader.js';

// Logger utilities
export { initLogger, isDebug, info, debug, warn, error, success } from './utils/logger.js';

// Errors
export {
  XcresultLcovError,
  MissingInputError,
  LcovParseError,
  XccovCommandError,
  XccovOutputError,
  ConfigError,
} from './types/errors.js';

// LCOV model, parsing and writing
export type { LcovLineRecord, LcovSection, LineCoverageSummary } from './types/lcov.js';
export { parseLcov, parseDataRecord } from './utils/lcov-parser.js';
export { formatLcov, formatLcovSection, writeLcovReport } from './utils/lcov-writer.js';
export { normalizeReportPath, relativeToRoot } from './utils/paths.js';

// Coverage percentage
export {
  coverageForFile,
  collectFileRecords,
  summarizeFileCoverage,
  summarizeLines,
  formatPercentage,
} from './core/coverage-percentage.js';

// xccov conversion
export { XccovClient, runCommand } from './utils/xccov-client.js';
export type { CommandRunner, XccovClientOptions } from './utils/xccov-client.js';
export type { XccovReport, XccovTarget, XccovFile, XccovLineEntry } from './types/xccov.js';
export { convertXcresultToLcov, runConverter, toLineRecords } from './core/xccov-converter.js';
export type { ConvertOptions } from './core/xccov-converter.js';
