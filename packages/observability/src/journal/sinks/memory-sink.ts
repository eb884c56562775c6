import type { JournalEntry, JournalSink } from "../journal-types.js";

export class MemoryJournalSink implements JournalSink {
  private readonly entries: JournalEntry[] = [];

  append(entry: JournalEntry): void {
    this.entries.push(entry);
  }

  getEntries(): JournalEntry[] {
    return [...this.entries];
  }
}
