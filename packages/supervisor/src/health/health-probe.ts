import net from "node:net";
import type { ForwardingSpec } from "../forwarding/forwarding-types.js";
import type { TunnelProcess } from "../process/process-types.js";
import type { HealthVerdict, Liveness, PortProbe, ProbeOutcome, ProbeTarget } from "./health-types.js";
import { ProbeError } from "../errors.js";
import { resolveProbeTarget } from "../forwarding/forwarding-types.js";

export const DEFAULT_PROBE_TIMEOUT_MS = 2_000;

function formatTarget(target: ProbeTarget): string {
  return target.host.includes(":")
    ? `[${target.host}]:${target.port}`
    : `${target.host}:${target.port}`;
}

/**
 * Opens a TCP connection to the target and closes it straight away. Any socket
 * error counts as unreachable; an abort resolves as unreachable too.
 */
export const probeTcpPort: PortProbe = (target, timeoutMs, signal) => {
  if (signal?.aborted) {
    return Promise.resolve("unreachable");
  }
  return new Promise<ProbeOutcome>((resolve) => {
    let settled = false;
    const socket = net.createConnection({ host: target.host, port: target.port });

    const finish = (outcome: ProbeOutcome) => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
      socket.destroy();
      resolve(outcome);
    };
    const onAbort = () => finish("unreachable");

    const timer = setTimeout(() => finish("timeout"), Math.max(1, timeoutMs));
    signal?.addEventListener("abort", onAbort, { once: true });
    socket.once("connect", () => finish("healthy"));
    socket.once("error", () => finish("unreachable"));
  });
};

export function checkLiveness(process: TunnelProcess | undefined): Liveness {
  return process?.isAlive() ? "alive" : "dead";
}

export type TunnelHealthCheckParams = {
  spec: ForwardingSpec;
  process: TunnelProcess | undefined;
  probe: PortProbe;
  timeoutMs: number;
  signal?: AbortSignal;
};

/** Process death short-circuits the port probe: a stale listener must not mask a dead tunnel. */
export async function checkTunnelHealth(params: TunnelHealthCheckParams): Promise<HealthVerdict> {
  const target = resolveProbeTarget(params.spec);
  const label = formatTarget(target);
  if (checkLiveness(params.process) === "dead") {
    return {
      healthy: false,
      error: new ProbeError(
        "process_dead",
        label,
        params.process ? "tunnel process exited" : "no tunnel process",
      ),
    };
  }
  const outcome = await params.probe(target, params.timeoutMs, params.signal);
  if (outcome === "healthy") {
    return { healthy: true };
  }
  return {
    healthy: false,
    error: new ProbeError(
      outcome,
      label,
      outcome === "timeout" ? `no connection within ${params.timeoutMs}ms` : "connection failed",
    ),
  };
}
