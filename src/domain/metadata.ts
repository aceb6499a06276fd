/**
 * Annotations recovered from the bracketed prefix of a debug log line.
 *
 * Only `timestamp` is guaranteed. It stays an unparsed ISO-8601 string so
 * that ordering and range checks can compare it lexically.
 *
 * Layout of a fully annotated line:
 *   {time} [{thread}] [{file:line}] [{function}] [{category:level}] [{wallet}] {body}
 */
export interface Metadata {
  readonly timestamp: string;
  readonly category?: string;
  readonly loglevel?: string;
  readonly thread?: string;
  readonly source_file?: string;
  readonly source_line?: number;
  readonly function?: string;
  readonly wallet_name?: string;
}

/** A log line split into its metadata and free-text body. */
export interface ParsedLine {
  readonly metadata: Metadata;
  readonly body: string;
}
