export { ArrayLineSource, StreamLineSource, FileLineSource } from './sources/index.js';
export {
  loadVocabulary,
  toVocabulary,
  vocabularyFileSchema,
  DEFAULT_VOCABULARY_PATH,
  loadRuntimeConfig,
  parseLogLevel,
  runtimeEnvSchema,
} from './config/index.js';
export type { VocabularyFile, RuntimeConfig, LogLevel } from './config/index.js';
export {
  exportCsv,
  writeReceivedCsv,
  writeSentCsv,
  toCsv,
  formatCell,
  RECEIVED_COLUMNS,
  SENT_COLUMNS,
} from './export/index.js';
export type { ExportPaths } from './export/index.js';
export { createLogger } from './logging/index.js';
export type { LoggerOptions } from './logging/index.js';
