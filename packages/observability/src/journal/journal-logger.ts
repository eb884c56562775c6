import { randomUUID } from "node:crypto";
import type { JournalEntry, JournalEntryInput, JournalSink } from "./journal-types.js";

export const DEFAULT_MAX_BACKLOG = 1_000;

export type JournalLoggerOptions = {
  sink: JournalSink;
  onWriteError: (error: unknown) => void;
  /** Entries recorded while this many are still unwritten are dropped. */
  maxBacklog?: number;
  runId?: string;
  now?: () => number;
};

/**
 * Records tunnel events without making the caller wait. Appends run one after
 * another on a single chain, so the sink sees entries in record order.
 */
export class JournalLogger {
  readonly runId: string;
  private readonly sink: JournalSink;
  private readonly onWriteError: (error: unknown) => void;
  private readonly maxBacklog: number;
  private readonly now: () => number;
  private chain: Promise<void> = Promise.resolve();
  private backlog = 0;
  private dropped = 0;
  private closed: Promise<void> | null = null;

  constructor(options: JournalLoggerOptions) {
    this.sink = options.sink;
    this.onWriteError = options.onWriteError;
    this.maxBacklog = Math.max(1, options.maxBacklog ?? DEFAULT_MAX_BACKLOG);
    this.runId = options.runId?.trim() || randomUUID();
    this.now = options.now ?? Date.now;
  }

  get droppedCount(): number {
    return this.dropped;
  }

  record(input: JournalEntryInput): void {
    if (this.closed || this.backlog >= this.maxBacklog) {
      this.dropped += 1;
      return;
    }
    const entry: JournalEntry = {
      schemaVersion: "1.0",
      timestamp: input.timestamp ?? this.now(),
      runId: this.runId,
      eventType: input.eventType,
      tunnelId: input.tunnelId,
      tunnel: input.tunnel,
      status: input.status,
      payload: input.payload,
    };
    this.backlog += 1;
    this.chain = this.chain
      .then(() => this.sink.append(entry))
      .catch(this.onWriteError)
      .finally(() => {
        this.backlog -= 1;
      });
  }

  /** Waits for every recorded entry, then closes the sink. Later records are dropped. */
  close(): Promise<void> {
    if (!this.closed) {
      this.closed = this.chain.then(() => this.sink.close?.());
    }
    return this.closed;
  }
}
