export class ConfigError extends Error {
  /** The message without the issue list. */
  readonly summary: string;
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigError";
    this.summary = message;
    this.issues = issues;
  }
}

export class SpawnError extends Error {
  readonly tunnel: string;
  readonly code?: string;

  constructor(tunnel: string, message: string, options?: { code?: string; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "SpawnError";
    this.tunnel = tunnel;
    this.code = options?.code;
  }
}

export type ProbeFailureReason = "unreachable" | "timeout" | "process_dead";

export class ProbeError extends Error {
  readonly reason: ProbeFailureReason;
  readonly target: string;

  constructor(reason: ProbeFailureReason, target: string, detail?: string) {
    super(detail ? `${reason} (${target}): ${detail}` : `${reason} (${target})`);
    this.name = "ProbeError";
    this.reason = reason;
    this.target = target;
  }
}

export class ShutdownError extends Error {
  readonly tunnel: string;
  readonly pid?: number;

  constructor(tunnel: string, pid: number | undefined, message: string) {
    super(message);
    this.name = "ShutdownError";
    this.tunnel = tunnel;
    this.pid = pid;
  }
}

export function errorText(value: unknown): string {
  if (value == null) {
    return "";
  }
  if (value instanceof Error) {
    return value.message;
  }
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
    return String(value);
  }
  try {
    return JSON.stringify(value);
  } catch {
    return "unserializable error";
  }
}
