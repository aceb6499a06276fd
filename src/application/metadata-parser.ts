import type { LogVocabulary, Metadata, ParsedLine } from '../domain/index.js';
import {
  DuplicateAnnotationError,
  MissingCategoryBeforeWalletError,
  UnrecognizedAnnotationError,
} from '../domain/index.js';
import { tokenizeLine } from './tokenizer.js';

// e.g. net_processing.cpp:1154
const SOURCE_LOCATION = /^([^:]*\.(?:cpp|h)):(\d+)$/;

// e.g. Function_Name9, operator()
const FUNCTION_NAME = /^(?:[a-zA-Z_][a-zA-Z0-9_]*|operator.+)$/;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

type Slot = 'thread' | 'source_location' | 'function';

type MutableMetadata = { -readonly [K in keyof Metadata]: Metadata[K] };

/**
 * Assigns bracketed annotations to metadata slots.
 *
 * Annotations carry no tags, so they are told apart by position and shape:
 * the rightmost one is the category (or a wallet name, with the category
 * just before it), the rest are matched against thread names, source
 * locations and function names in that order.
 */
export class MetadataParser {
  private readonly categoryPattern: RegExp;
  private readonly threadPatterns: readonly RegExp[];
  private readonly threads: ReadonlySet<string>;

  constructor(vocabulary: LogVocabulary) {
    const categories = [...vocabulary.categories].map(escapeRegExp).join('|');
    this.categoryPattern = new RegExp(`^(${categories})(?::(\\w+))?$`);
    this.threads = vocabulary.threads;
    this.threadPatterns = vocabulary.numberedThreadPrefixes.map(
      (prefix) => new RegExp(`^${escapeRegExp(prefix)}\\.\\d+$`),
    );
  }

  /** Tokenizes and disambiguates a full line. */
  parseLine(line: string): ParsedLine {
    const tokens = tokenizeLine(line);
    return {
      metadata: this.disambiguate(tokens.timestamp, tokens.annotations, line),
      body: tokens.body,
    };
  }

  /**
   * Builds Metadata from the annotation list. `line` is only used in error messages.
   */
  disambiguate(timestamp: string, annotations: readonly string[], line: string): Metadata {
    const metadata: MutableMetadata = { timestamp };
    if (annotations.length === 0) return metadata;

    const remaining = [...annotations];
    let rightmost = remaining.pop() ?? '';
    let category = this.categoryPattern.exec(rightmost);

    if (category === null) {
      const walletName = rightmost;
      const beforeWallet = remaining.pop();
      if (beforeWallet === undefined) {
        throw new MissingCategoryBeforeWalletError(walletName, line);
      }
      rightmost = beforeWallet;
      category = this.categoryPattern.exec(rightmost);
      if (category === null) {
        throw new MissingCategoryBeforeWalletError(walletName, line);
      }
      metadata.wallet_name = walletName;
    }

    metadata.category = category[1];
    if (category[2] !== undefined) metadata.loglevel = category[2];

    const filled = new Set<Slot>();
    const claim = (slot: Slot, annotation: string): void => {
      if (filled.has(slot)) throw new DuplicateAnnotationError(slot, annotation, line);
      filled.add(slot);
    };

    for (const annotation of remaining) {
      if (this.isThreadName(annotation)) {
        claim('thread', annotation);
        metadata.thread = annotation;
        continue;
      }

      const location = SOURCE_LOCATION.exec(annotation);
      if (location !== null) {
        claim('source_location', annotation);
        metadata.source_file = location[1];
        metadata.source_line = Number(location[2]);
        continue;
      }

      if (FUNCTION_NAME.test(annotation)) {
        claim('function', annotation);
        metadata.function = annotation;
        continue;
      }

      throw new UnrecognizedAnnotationError(annotation, line);
    }

    return metadata;
  }

  private isThreadName(annotation: string): boolean {
    return this.threads.has(annotation) || this.threadPatterns.some((p) => p.test(annotation));
  }
}
