/**
 * Error classes for log parsing and correlation.
 *
 * `MalformedLineError` and `EventFieldError` are recoverable: the pipeline
 * logs them and skips the line. Everything extending `LogGrammarError`, and `PeerMismatchError`,
 * aborts the run.
 */

/**
 * A line without a separable timestamp.
 */
export class MalformedLineError extends Error {
  constructor(public readonly line: string) {
    super(`Malformed log line (no timestamp separator): ${line}`);
    this.name = 'MalformedLineError';
    Object.setPrototypeOf(this, MalformedLineError.prototype);
  }
}

/**
 * A matched event line whose captured numbers do not fit a safe integer.
 */
export class EventFieldError extends Error {
  constructor(
    public readonly kind: string,
    public readonly fields: readonly string[],
  ) {
    super(`Out of range ${fields.join(', ')} in ${kind} line`);
    this.name = 'EventFieldError';
    Object.setPrototypeOf(this, EventFieldError.prototype);
  }
}

/**
 * Base class for violations of the annotation grammar.
 */
export class LogGrammarError extends Error {
  constructor(
    message: string,
    public readonly line: string,
  ) {
    super(message);
    this.name = 'LogGrammarError';
    Object.setPrototypeOf(this, LogGrammarError.prototype);
  }
}

/**
 * A bracket group that is no known thread, source location or function name.
 */
export class UnrecognizedAnnotationError extends LogGrammarError {
  constructor(
    public readonly annotation: string,
    line: string,
  ) {
    super(`Unrecognized annotation [${annotation}] in: ${line}`, line);
    this.name = 'UnrecognizedAnnotationError';
    Object.setPrototypeOf(this, UnrecognizedAnnotationError.prototype);
  }
}

/**
 * The rightmost group was taken as a wallet name but no category precedes it.
 */
export class MissingCategoryBeforeWalletError extends LogGrammarError {
  constructor(
    public readonly walletName: string,
    line: string,
  ) {
    super(`Expected a log category before wallet name [${walletName}] in: ${line}`, line);
    this.name = 'MissingCategoryBeforeWalletError';
    Object.setPrototypeOf(this, MissingCategoryBeforeWalletError.prototype);
  }
}

/**
 * Two annotations on one line resolved to the same slot.
 */
export class DuplicateAnnotationError extends LogGrammarError {
  constructor(
    public readonly slot: string,
    public readonly annotation: string,
    line: string,
  ) {
    super(`Annotation [${annotation}] fills ${slot} a second time in: ${line}`, line);
    this.name = 'DuplicateAnnotationError';
    Object.setPrototypeOf(this, DuplicateAnnotationError.prototype);
  }
}

/**
 * A send confirmation for a different peer than the pending announce/request.
 *
 * The engine relies on the node emitting announce → send → window lines for
 * one transmission without interleaving; this error means that broke.
 */
export class PeerMismatchError extends Error {
  constructor(
    public readonly blockHash: string,
    public readonly expectedPeer: number,
    public readonly actualPeer: number,
    public readonly timestamp: string,
  ) {
    super(
      `Sent cmpctblock to peer=${actualPeer} at ${timestamp}, but block ${blockHash} was pending for peer=${expectedPeer}`,
    );
    this.name = 'PeerMismatchError';
    Object.setPrototypeOf(this, PeerMismatchError.prototype);
  }
}

/**
 * Invalid environment or vocabulary configuration.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly source: string,
    public readonly originalError?: unknown,
  ) {
    super(message);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}
