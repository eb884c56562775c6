export * from "./journal/journal-types.js";
export * from "./journal/journal-serialize.js";
export * from "./journal/journal-logger.js";
export * from "./journal/sinks/jsonl-sink.js";
export * from "./journal/sinks/memory-sink.js";
