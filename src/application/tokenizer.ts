import { MalformedLineError } from '../domain/index.js';

/** Result of splitting a line into timestamp, annotation prefix and body. */
export interface TokenizedLine {
  readonly timestamp: string;
  /** The annotation prefix exactly as it appeared, trailing whitespace included. */
  readonly rawMetadata: string;
  /** Contents of each bracket group in order, brackets stripped. */
  readonly annotations: readonly string[];
  readonly body: string;
}

const TIMESTAMP_SPLIT = /^(\S+)\s+([\s\S]*)$/;

// Longest run of `[...]` groups at the start of the remainder. Greedy: a body
// that itself opens with bracketed text is absorbed into the prefix.
const METADATA_PREFIX = /^((?:\[[^\]]+\]\s*)*)([\s\S]*)$/;

const BRACKET_GROUP = /\[([^\]]+)\]/g;

/**
 * Splits a trimmed, non-empty line into its timestamp, annotations and body.
 *
 * Throws MalformedLineError when there is no whitespace after the timestamp.
 */
export function tokenizeLine(line: string): TokenizedLine {
  const split = TIMESTAMP_SPLIT.exec(line);
  const timestamp = split?.[1];
  const remainder = split?.[2];
  if (timestamp === undefined || remainder === undefined) {
    throw new MalformedLineError(line);
  }

  const prefix = METADATA_PREFIX.exec(remainder);
  const rawMetadata = prefix?.[1] ?? '';
  const body = prefix?.[2] ?? remainder;

  const annotations: string[] = [];
  for (const group of rawMetadata.matchAll(BRACKET_GROUP)) {
    const content = group[1];
    if (content !== undefined) annotations.push(content);
  }

  return { timestamp, rawMetadata, annotations, body };
}
