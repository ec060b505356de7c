/**
 * Data source boundary types
 */

/** A table as delivered by a source, before normalization */
export interface RawEventTable {
  readonly columns: readonly string[];
  readonly rows: readonly Readonly<Record<string, unknown>>[];
}

/**
 * Anything that can deliver the pre-aggregated failure-event table. The
 * `id` identifies the source for snapshot caching.
 */
export interface EventSource {
  readonly id: string;
  readTable(): Promise<RawEventTable>;
  close?(): Promise<void>;
}

export interface LoadReport {
  readonly rowsRead: number;
  readonly eventsLoaded: number;
  readonly duplicatesDropped: number;
  readonly invalidRowsSkipped: number;
}
