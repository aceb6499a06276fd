import type { ClassifiedEvent, CorrelationCounters, CorrelationResult, LineSource } from '../domain/index.js';
import { EventFieldError, MalformedLineError } from '../domain/index.js';
import type { CorrelationLog } from './correlation-engine.js';
import { CorrelationEngine } from './correlation-engine.js';
import { LineClassifier } from './classifier.js';
import type { MetadataParser } from './metadata-parser.js';
import type { TokenizedLine } from './tokenizer.js';
import { tokenizeLine } from './tokenizer.js';
import type { TimeWindow } from './time-window.js';
import { isWithinWindow } from './time-window.js';

export interface ParseLogOptions {
  readonly parser: MetadataParser;
  readonly classifier?: LineClassifier;
  readonly log?: CorrelationLog;
  /** Lines outside this window are skipped before any annotation parsing. */
  readonly window?: TimeWindow;
}

export interface LineCounters {
  readonly lines_read: number;
  readonly lines_blank: number;
  readonly lines_skipped_malformed: number;
  readonly lines_skipped_out_of_range: number;
  readonly lines_outside_window: number;
  readonly events_classified: number;
}

export interface ParseLogResult {
  readonly result: CorrelationResult;
  readonly correlation: CorrelationCounters;
  readonly lines: LineCounters;
}

/**
 * Reads a log source to the end and correlates its compact block events.
 *
 * Per line: trim → skip blank → tokenize → time window → disambiguate
 * annotations → classify → fold into the engine.
 *
 * Malformed lines and event lines with out-of-range numbers are logged and
 * skipped. Annotation grammar errors and
 * peer mismatches propagate and abort the run.
 */
export async function parseCompactBlockLog(
  source: LineSource,
  options: ParseLogOptions,
): Promise<ParseLogResult> {
  const classifier = options.classifier ?? new LineClassifier();
  const engine = new CorrelationEngine(options.log);
  const window = options.window ?? {};

  let linesRead = 0;
  let blank = 0;
  let malformed = 0;
  let outOfRange = 0;
  let outsideWindow = 0;
  let classified = 0;

  for (let raw = await source.nextLine(); raw !== null; raw = await source.nextLine()) {
    linesRead++;
    const line = raw.trim();
    if (line === '') {
      blank++;
      continue;
    }

    let tokens: TokenizedLine;
    try {
      tokens = tokenizeLine(line);
    } catch (err: unknown) {
      if (!(err instanceof MalformedLineError)) throw err;
      malformed++;
      options.log?.warn({ line_number: linesRead, line }, 'Malformed log line, skipping');
      continue;
    }

    if (!isWithinWindow(tokens.timestamp, window)) {
      outsideWindow++;
      continue;
    }

    const metadata = options.parser.disambiguate(tokens.timestamp, tokens.annotations, line);
    let event: ClassifiedEvent | null;
    try {
      event = classifier.classify(metadata.category, tokens.body, metadata.timestamp);
    } catch (err: unknown) {
      if (!(err instanceof EventFieldError)) throw err;
      outOfRange++;
      options.log?.warn(
        { line_number: linesRead, line, kind: err.kind, fields: err.fields },
        'Event field out of range, skipping',
      );
      continue;
    }
    if (event === null) continue;

    classified++;
    engine.apply(event);
  }

  return {
    result: engine.result(),
    correlation: engine.stats(),
    lines: {
      lines_read: linesRead,
      lines_blank: blank,
      lines_skipped_malformed: malformed,
      lines_skipped_out_of_range: outOfRange,
      lines_outside_window: outsideWindow,
      events_classified: classified,
    },
  };
}
