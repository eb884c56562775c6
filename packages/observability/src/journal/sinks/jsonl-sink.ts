import fs from "node:fs/promises";
import path from "node:path";
import type { JournalEntry, JournalSink } from "../journal-types.js";
import { serializeJournalEntry } from "../journal-serialize.js";

export type JsonlJournalSinkOptions = {
  dir: string;
  /** File name prefix; one file per UTC day. */
  prefix?: string;
  maxEntryBytes?: number;
};

/** Appends one line per entry to `<prefix>-YYYY-MM-DD.jsonl` under `dir`. */
export class JsonlJournalSink implements JournalSink {
  private readonly prefix: string;
  private dirReady: Promise<void> | null = null;

  constructor(private readonly options: JsonlJournalSinkOptions) {
    this.prefix = options.prefix?.trim() || "tunnels";
  }

  resolveFilePath(timestamp: number): string {
    const day = new Date(timestamp).toISOString().slice(0, 10);
    return path.join(this.options.dir, `${this.prefix}-${day}.jsonl`);
  }

  async append(entry: JournalEntry): Promise<void> {
    if (!this.dirReady) {
      this.dirReady = fs.mkdir(this.options.dir, { recursive: true }).then(
        () => undefined,
        (error: unknown) => {
          this.dirReady = null;
          throw error;
        },
      );
    }
    await this.dirReady;
    const line = serializeJournalEntry(entry, { maxEntryBytes: this.options.maxEntryBytes });
    await fs.appendFile(this.resolveFilePath(entry.timestamp), `${line}\n`, "utf8");
  }
}
