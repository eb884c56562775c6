import type { SpawnError } from "../errors.js";
import type { ForwardingSpec } from "../forwarding/forwarding-types.js";

export type TerminationResult = {
  /** False when the process was still running after the forced kill window. */
  exited: boolean;
  forced: boolean;
  exitCode: number | null;
  signal: string | null;
};

/** One external tunnel process. A handle is signalled at most once. */
export interface TunnelProcess {
  readonly pid: number | undefined;
  isAlive(): boolean;
  /**
   * SIGTERM, then SIGKILL once `graceMs` elapses. Repeated calls share the first
   * call's promise.
   */
  terminate(graceMs: number): Promise<TerminationResult>;
}

export type SpawnResult = { ok: true; process: TunnelProcess } | { ok: false; error: SpawnError };

export interface TunnelLauncher {
  spawn(spec: ForwardingSpec): Promise<SpawnResult>;
}
