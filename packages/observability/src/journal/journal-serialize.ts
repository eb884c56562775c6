import type { JournalEntry } from "./journal-types.js";

type JsonReplacer = (this: unknown, key: string, value: unknown) => unknown;

const BIGINT_TAG = "[BIGINT]";
const CIRCULAR_TAG = "[CIRCULAR]";

function createSafeReplacer(): JsonReplacer {
  const seen = new WeakSet<object>();
  return function replacer(_key: string, value: unknown): unknown {
    if (typeof value === "bigint") {
      return `${BIGINT_TAG}${value.toString()}`;
    }
    if (value instanceof Error) {
      return { name: value.name, message: value.message };
    }
    if (!value || typeof value !== "object") {
      return value;
    }
    if (seen.has(value)) {
      return CIRCULAR_TAG;
    }
    seen.add(value);
    return value;
  };
}

export const DEFAULT_MAX_ENTRY_BYTES = 64_000;

/** One JSON line per entry; a line over `maxEntryBytes` (UTF-8) keeps only its payload size. */
export function serializeJournalEntry(
  entry: JournalEntry,
  options?: { maxEntryBytes?: number },
): string {
  const maxEntryBytes = options?.maxEntryBytes ?? DEFAULT_MAX_ENTRY_BYTES;
  const serialized = JSON.stringify(entry, createSafeReplacer());
  if (Buffer.byteLength(serialized, "utf8") <= maxEntryBytes) {
    return serialized;
  }
  const payload = JSON.stringify(entry.payload, createSafeReplacer());
  return JSON.stringify(
    { ...entry, payload: { truncated: true, payloadBytes: Buffer.byteLength(payload, "utf8") } },
    createSafeReplacer(),
  );
}
