import type { ProbeError } from "../errors.js";

export type TunnelStatus = "starting" | "healthy" | "degraded" | "failed";

export type ProbeOutcome = "healthy" | "unreachable" | "timeout";

export type Liveness = "alive" | "dead";

export type ProbeTarget = {
  host: string;
  port: number;
};

export type PortProbe = (
  target: ProbeTarget,
  timeoutMs: number,
  signal?: AbortSignal,
) => Promise<ProbeOutcome>;

export type HealthVerdict = { healthy: true } | { healthy: false; error: ProbeError };
