/**
 * Pull-based source of raw log lines.
 *
 * `nextLine()` resolves to `null` once the source is exhausted; sources are
 * read once, in order, and are not restartable.
 */
export interface LineSource {
  nextLine(): Promise<string | null>;
}
