export type JournalSchemaVersion = "1.0";

export type JournalEntry = {
  schemaVersion: JournalSchemaVersion;
  timestamp: number;
  runId: string;
  eventType: string;
  tunnelId?: number;
  tunnel?: string;
  status?: string;
  payload: Record<string, unknown>;
};

export type JournalEntryInput = Omit<JournalEntry, "schemaVersion" | "timestamp" | "runId"> & {
  timestamp?: number;
};

/** Receives entries one at a time, in the order they were recorded. */
export type JournalSink = {
  append: (entry: JournalEntry) => void | Promise<void>;
  close?: () => void | Promise<void>;
};
