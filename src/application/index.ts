export { tokenizeLine } from './tokenizer.js';
export type { TokenizedLine } from './tokenizer.js';
export { MetadataParser } from './metadata-parser.js';
export { LineClassifier } from './classifier.js';
export { DEFAULT_EVENT_PATTERNS } from './event-patterns.js';
export type { EventPattern, Groups } from './event-patterns.js';
export { CorrelationEngine, correlateEvents, createCorrelationState } from './correlation-engine.js';
export type { CorrelationLog, CorrelationState } from './correlation-engine.js';
export { parseCompactBlockLog } from './pipeline.js';
export type { ParseLogOptions, ParseLogResult, LineCounters } from './pipeline.js';
export { isWithinWindow } from './time-window.js';
export type { TimeWindow } from './time-window.js';
export {
  timestampToMicros,
  deriveReceivedRows,
  deriveSentRows,
  computeReceivedStats,
  computeSentStats,
  computeWindowStats,
  buildReport,
  formatReport,
} from './reporting.js';
export type {
  ReceivedRow,
  SentRow,
  ReceivedStats,
  SentStats,
  WindowStats,
  CompactBlockReport,
} from './reporting.js';
