import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import AjvPkg, { type ErrorObject } from "ajv";
import type { LogFormat, LogLevel } from "../logging/subsystem.js";
import {
  ConfigError,
  DEFAULT_CHECK_INTERVAL_MS,
  DEFAULT_PROBE_TIMEOUT_MS,
  DEFAULT_RESTART_POLICY,
  DEFAULT_TERMINATE_GRACE_MS,
  DEFAULT_WARMUP_MS,
  errorText,
  validateForwardingSpecs,
  type ForwardingSpec,
  type ResolvedRestartPolicyOptions,
} from "../../packages/supervisor/src/index.js";
import { parseForwardingSpec } from "./forwarding-spec.js";
import { TunwatchConfigSchema, type TunwatchConfig } from "./schema.js";

export type { TunwatchConfig, RemoteHostConfig } from "./schema.js";

export const DEFAULT_CONFIG_FILE = "tunwatch.json";
export const DEFAULT_SSH_PORT = 22;

const DEFAULT_DATA_DIR = path.resolve(process.cwd(), "tunwatch-data");
const DEFAULT_JOURNAL_DIR = path.join(DEFAULT_DATA_DIR, "journal");

export type LoadedConfig = {
  path: string;
  config: TunwatchConfig;
  forwards: ForwardingSpec[];
};

export type TunnelSettings = {
  intervalMs: number;
  probeTimeoutMs: number;
  warmupMs: number;
  policy: ResolvedRestartPolicyOptions;
  terminateGraceMs: number;
  shutdownTimeoutMs?: number;
  journal: { enabled: boolean; dir: string };
  logging: { level: LogLevel; format: LogFormat };
};

const Ajv = AjvPkg as unknown as new (opts?: object) => import("ajv").default;
const isConfigShape = new Ajv({ allErrors: true, strict: false }).compile<TunwatchConfig>(
  TunwatchConfigSchema,
);

/** `remote.host: must NOT have fewer than 1 characters`, with `<root>` for the document itself. */
function describeShapeErrors(errors: ErrorObject[] | null | undefined): string[] {
  if (!errors || errors.length === 0) {
    return ["invalid config value"];
  }
  return errors.map((error) => {
    const where = error.instancePath.slice(1).split("/").join(".") || "<root>";
    return `${where}: ${error.message ?? "invalid"}`;
  });
}

export function expandHome(value: string): string {
  if (value === "~") {
    return os.homedir();
  }
  if (value.startsWith("~/")) {
    return path.join(os.homedir(), value.slice(2));
  }
  return value;
}

export function resolveConfigPath(explicit?: string, env: NodeJS.ProcessEnv = process.env): string {
  const candidate = explicit?.trim() || env.TUNWATCH_CONFIG?.trim() || DEFAULT_CONFIG_FILE;
  return path.resolve(expandHome(candidate));
}

/** Validates a parsed config document and turns its forwards into specs. */
export function parseConfig(raw: unknown, source: string): Omit<LoadedConfig, "path"> {
  if (!isConfigShape(raw)) {
    throw new ConfigError(`invalid config ${source}`, describeShapeErrors(isConfigShape.errors));
  }
  const config = raw;
  const mode = config.mode ?? "local";
  const issues: string[] = [];
  const forwards: ForwardingSpec[] = [];
  config.forwards.forEach((text, index) => {
    const parsed = parseForwardingSpec(text, mode);
    if (parsed.ok) {
      forwards.push(parsed.value);
    } else {
      issues.push(`forwards[${index}]: ${parsed.error}`);
    }
  });
  if (issues.length === 0) {
    issues.push(...validateForwardingSpecs(forwards));
  }
  const baseMs = config.backoff?.baseMs;
  const maxMs = config.backoff?.maxMs;
  if (baseMs !== undefined && maxMs !== undefined && maxMs < baseMs) {
    issues.push(`backoff.maxMs (${maxMs}) is below backoff.baseMs (${baseMs})`);
  }
  if (issues.length > 0) {
    throw new ConfigError(`invalid config ${source}`, issues);
  }
  return { config, forwards };
}

export function loadConfig(configPath?: string): LoadedConfig {
  const resolved = resolveConfigPath(configPath);
  let text: string;
  try {
    text = fs.readFileSync(resolved, "utf8");
  } catch (error) {
    throw new ConfigError(`cannot read config ${resolved}`, [errorText(error)]);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`cannot parse config ${resolved}`, [errorText(error)]);
  }
  return { path: resolved, ...parseConfig(raw, resolved) };
}

export function resolveTunnelSettings(config: TunwatchConfig): TunnelSettings {
  const backoffBaseMs = config.backoff?.baseMs ?? DEFAULT_RESTART_POLICY.backoffBaseMs;
  return {
    intervalMs: config.health?.intervalMs ?? DEFAULT_CHECK_INTERVAL_MS,
    probeTimeoutMs: config.health?.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS,
    warmupMs: config.health?.warmupMs ?? DEFAULT_WARMUP_MS,
    policy: {
      failureThreshold: config.health?.failureThreshold ?? DEFAULT_RESTART_POLICY.failureThreshold,
      backoffBaseMs,
      backoffMaxMs: Math.max(
        backoffBaseMs,
        config.backoff?.maxMs ?? DEFAULT_RESTART_POLICY.backoffMaxMs,
      ),
    },
    terminateGraceMs: config.shutdown?.graceMs ?? DEFAULT_TERMINATE_GRACE_MS,
    shutdownTimeoutMs: config.shutdown?.timeoutMs,
    journal: {
      enabled: config.journal?.enabled ?? true,
      dir: config.journal?.dir ? path.resolve(expandHome(config.journal.dir)) : DEFAULT_JOURNAL_DIR,
    },
    logging: {
      level: config.logging?.level ?? "info",
      format: config.logging?.format ?? "pretty",
    },
  };
}
