import type {
  DailyAggregate,
  DailyContentDraft,
  DateKey,
  StoredTimestamps,
} from "./types.js";

/**
 * Persistence boundary for daily aggregates, keyed by DD-MM-YYYY date.
 * Writes are full replacements and last-write-wins; the store adds
 * timestamps and nothing else.
 */
export interface ContentStore {
  upsert(draft: DailyContentDraft): Promise<StoredTimestamps>;
  get(date: DateKey): Promise<DailyAggregate | null>;
  /** Newest first */
  listDates(): Promise<DateKey[]>;
  /** Inclusive on both ends, newest first */
  listRange(from: DateKey, to: DateKey): Promise<DailyAggregate[]>;
  /** True when a document existed and was removed */
  delete(date: DateKey): Promise<boolean>;
}
