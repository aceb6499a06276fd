export { loadVocabulary, toVocabulary, vocabularyFileSchema, DEFAULT_VOCABULARY_PATH } from './vocabulary.js';
export type { VocabularyFile } from './vocabulary.js';
export { loadRuntimeConfig, parseLogLevel, runtimeEnvSchema } from './runtime-config.js';
export type { RuntimeConfig, LogLevel } from './runtime-config.js';
