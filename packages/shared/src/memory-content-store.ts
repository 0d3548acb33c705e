import { compareDateKeysDesc, dateKeyToDayNumber } from "./date-key.js";
import { InputError } from "./errors.js";
import type { ContentStore } from "./content-store.js";
import type { DailyAggregate, DateKey } from "./types.js";

export interface MemoryContentStoreOptions {
  now?: () => number;
}

/**
 * ContentStore kept in process memory. Same timestamp and ordering rules as
 * the Neo4j store; used by tests and local runs without a database.
 */
export function createMemoryContentStore(
  options: MemoryContentStoreOptions = {},
): ContentStore {
  const now = options.now ?? Date.now;
  const docs = new Map<DateKey, DailyAggregate>();

  return {
    async upsert(draft) {
      const existing = docs.get(draft.date);
      const nowMs = now();
      const previousMs = existing ? Date.parse(existing.updated_at) : undefined;
      const updatedMs =
        previousMs !== undefined && previousMs >= nowMs ? previousMs + 1 : nowMs;

      const timestamps = {
        created_at: existing?.created_at ?? new Date(nowMs).toISOString(),
        updated_at: new Date(updatedMs).toISOString(),
      };
      docs.set(draft.date, { ...structuredClone(draft), ...timestamps });
      return timestamps;
    },

    async get(date) {
      const doc = docs.get(date);
      return doc ? structuredClone(doc) : null;
    },

    async listDates() {
      return [...docs.keys()].sort(compareDateKeysDesc);
    },

    async listRange(from, to) {
      const low = dateKeyToDayNumber(from);
      const high = dateKeyToDayNumber(to);
      if (low > high) {
        throw new InputError(`Range start ${from} is after range end ${to}`);
      }
      return [...docs.values()]
        .filter((doc) => {
          const day = dateKeyToDayNumber(doc.date);
          return day >= low && day <= high;
        })
        .sort((a, b) => compareDateKeysDesc(a.date, b.date))
        .map((doc) => structuredClone(doc));
    },

    async delete(date) {
      return docs.delete(date);
    },
  };
}
