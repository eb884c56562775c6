import type { ShutdownError } from "../errors.js";
import type { ForwardingSpec } from "../forwarding/forwarding-types.js";
import type { TunnelStatus } from "../health/health-types.js";

export type SupervisorLogger = {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

export const SILENT_LOGGER: SupervisorLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export type TunnelStatusSnapshot = {
  id: number;
  spec: ForwardingSpec;
  status: TunnelStatus;
  consecutiveFailures: number;
  attempt: number;
  nextEligibleAt?: number;
  lastCheckedAt?: number;
  pid?: number;
};

export type TunnelEventType =
  | "tunnel.spawned"
  | "tunnel.spawn_failed"
  | "tunnel.check_failed"
  | "tunnel.status_changed"
  | "tunnel.restart_scheduled"
  | "tunnel.restarting"
  | "tunnel.terminated"
  | "tunnel.terminate_timeout";

export type TunnelEvent = {
  type: TunnelEventType;
  tunnelId: number;
  tunnel: string;
  timestamp: number;
  status: TunnelStatus;
  previousStatus?: TunnelStatus;
  consecutiveFailures: number;
  attempt: number;
  pid?: number;
  delayMs?: number;
  eligibleAt?: number;
  reason?: string;
};

export type TunnelEventListener = (event: TunnelEvent) => void;

export type TickOutcome = "skipped" | "healthy" | "failed" | "restarted" | "stopped";

export type ShutdownReport = {
  terminated: number;
  errors: ShutdownError[];
  timedOut: boolean;
};
