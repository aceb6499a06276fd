export type { Metadata, ParsedLine } from './metadata.js';
export type {
  EventKind,
  EventPayload,
  ClassifiedEvent,
  BlockReceivedEvent,
  BlockReconstructedEvent,
  BlockAnnouncedEvent,
  BlockRequestedEvent,
  BlockSentEvent,
  WindowSizeLoggedEvent,
} from './events.js';
export type {
  BlockReceiveRecord,
  BlockSendRecord,
  CorrelationResult,
  CorrelationCounters,
} from './records.js';
export type { LogVocabulary } from './vocabulary.js';
export type { LineSource } from './line-source.js';
export {
  MalformedLineError,
  EventFieldError,
  LogGrammarError,
  UnrecognizedAnnotationError,
  MissingCategoryBeforeWalletError,
  DuplicateAnnotationError,
  PeerMismatchError,
  ConfigError,
} from './errors.js';
