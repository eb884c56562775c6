import { Logger, type ILogObj } from "tslog";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";
export type LogFormat = "pretty" | "json";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

// tslog numbering: 0 silly .. 6 fatal.
const MIN_LEVEL: Record<LogLevel, number> = {
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  silent: 7,
};

export type SubsystemLogger = {
  subsystem: string;
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

type LoggingState = {
  level: LogLevel;
  format: LogFormat;
  generation: number;
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.some((level) => level === value);
}

function levelFromEnv(): LogLevel | undefined {
  const raw = process.env.TUNWATCH_LOG_LEVEL?.trim().toLowerCase();
  return isLogLevel(raw) ? raw : undefined;
}

const state: LoggingState = {
  level: levelFromEnv() ?? "info",
  format: "pretty",
  generation: 0,
};

let root: Logger<ILogObj> | null = null;

function rootLogger(): Logger<ILogObj> {
  if (!root) {
    root = new Logger<ILogObj>({
      name: "tunwatch",
      minLevel: MIN_LEVEL[state.level],
      type: state.level === "silent" ? "hidden" : state.format,
    });
  }
  return root;
}

/** `TUNWATCH_LOG_LEVEL` wins over the configured level. */
export function configureLogging(options: { level?: LogLevel; format?: LogFormat }) {
  state.level = levelFromEnv() ?? options.level ?? state.level;
  state.format = options.format ?? state.format;
  state.generation += 1;
  root = null;
}

export function getLogLevel(): LogLevel {
  return state.level;
}

export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  let cached: Logger<ILogObj> | null = null;
  let generation = -1;
  const logger = (): Logger<ILogObj> => {
    if (!cached || generation !== state.generation) {
      cached = rootLogger().getSubLogger({ name: subsystem });
      generation = state.generation;
    }
    return cached;
  };
  return {
    subsystem,
    debug: (message) => {
      logger().debug(message);
    },
    info: (message) => {
      logger().info(message);
    },
    warn: (message) => {
      logger().warn(message);
    },
    error: (message) => {
      logger().error(message);
    },
  };
}
