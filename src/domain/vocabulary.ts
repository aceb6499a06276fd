/**
 * Closed sets of annotation values the disambiguator recognizes.
 *
 * Loaded once (see infrastructure/config) and passed in explicitly.
 */
export interface LogVocabulary {
  /** Logging category names, e.g. "net", "cmpctblock". */
  readonly categories: ReadonlySet<string>;
  /** Fixed thread names, e.g. "msghand". */
  readonly threads: ReadonlySet<string>;
  /** Prefixes of numbered worker threads, matched as `<prefix>.<digits>`. */
  readonly numberedThreadPrefixes: readonly string[];
}
