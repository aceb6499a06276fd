import type { ClassifiedEvent, ParsedLine } from '../domain/index.js';
import type { EventPattern } from './event-patterns.js';
import { DEFAULT_EVENT_PATTERNS } from './event-patterns.js';

/**
 * Maps (category, body) to a typed event.
 *
 * Patterns are bucketed by category once at construction; a body is only
 * tried against the patterns of its own category, in table order, and the
 * first match wins. Anything else is uninteresting (`null`). A match whose
 * numbers are out of range throws `EventFieldError`.
 *
 * Stateless after construction, so the same input always gives the same output.
 */
export class LineClassifier {
  private readonly buckets: Map<string, EventPattern[]> = new Map();

  constructor(patterns: readonly EventPattern[] = DEFAULT_EVENT_PATTERNS) {
    for (const entry of patterns) {
      const bucket = this.buckets.get(entry.category) ?? [];
      bucket.push(entry);
      this.buckets.set(entry.category, bucket);
    }
  }

  classify(category: string | undefined, body: string, timestamp: string): ClassifiedEvent | null {
    if (category === undefined) return null;
    const bucket = this.buckets.get(category);
    if (bucket === undefined) return null;

    for (const entry of bucket) {
      const match = entry.pattern.exec(body);
      if (match === null) continue;
      return { ...entry.parse(match.groups ?? {}), timestamp };
    }

    return null;
  }

  /** Convenience wrapper for an already parsed line. */
  classifyLine(line: ParsedLine): ClassifiedEvent | null {
    return this.classify(line.metadata.category, line.body, line.metadata.timestamp);
  }
}
