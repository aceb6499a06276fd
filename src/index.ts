/**
 * Public API: parse a node debug log and correlate its compact block events.
 *
 * ```ts
 * const source = await FileLineSource.open('debug.log');
 * const { result } = await parseCompactBlockLog(source, {
 *   parser: new MetadataParser(loadVocabulary()),
 * });
 * ```
 */
export * from './domain/index.js';
export * from './application/index.js';
export * from './infrastructure/index.js';
export { buildProgram } from './interfaces/cli/index.js';
export type { CliDeps } from './interfaces/cli/index.js';
