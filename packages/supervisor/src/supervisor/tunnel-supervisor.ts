import type { ForwardingSpec } from "../forwarding/forwarding-types.js";
import type { PortProbe } from "../health/health-types.js";
import type { TunnelLauncher, TunnelProcess } from "../process/process-types.js";
import type { Clock } from "../util/now.js";
import type {
  ShutdownReport,
  SupervisorLogger,
  TickOutcome,
  TunnelEvent,
  TunnelEventListener,
  TunnelEventType,
  TunnelStatusSnapshot,
} from "./supervisor-types.js";
import { ShutdownError, errorText } from "../errors.js";
import { describeForwardingSpec } from "../forwarding/forwarding-types.js";
import { DEFAULT_PROBE_TIMEOUT_MS, checkTunnelHealth, probeTcpPort } from "../health/health-probe.js";
import {
  initialPolicyState,
  resolveRestartPolicyOptions,
  transition,
  type PolicyAction,
  type PolicyEvent,
  type PolicyState,
  type ResolvedRestartPolicyOptions,
  type RestartPolicyOptions,
} from "../health/restart-policy.js";
import { nowMs } from "../util/now.js";
import { SILENT_LOGGER } from "./supervisor-types.js";

export const DEFAULT_WARMUP_MS = 1_000;
export const DEFAULT_TERMINATE_GRACE_MS = 3_000;

export type TunnelSupervisorOptions = {
  id: number;
  spec: ForwardingSpec;
  launcher: TunnelLauncher;
  probe?: PortProbe;
  policy?: RestartPolicyOptions;
  probeTimeoutMs?: number;
  /** Delay between a spawn and the first health check of that process. */
  warmupMs?: number;
  terminateGraceMs?: number;
  now?: Clock;
  logger?: SupervisorLogger;
  onEvent?: TunnelEventListener;
};

type RetireReason = "restart" | "shutdown";

/**
 * Owns one tunnel: its process handle, its failure history and its restart
 * schedule. Nothing outside this class mutates that state.
 */
export class TunnelSupervisor {
  readonly id: number;
  readonly spec: ForwardingSpec;
  private readonly label: string;
  private readonly launcher: TunnelLauncher;
  private readonly probe: PortProbe;
  private readonly policy: ResolvedRestartPolicyOptions;
  private readonly probeTimeoutMs: number;
  private readonly warmupMs: number;
  private readonly terminateGraceMs: number;
  private readonly now: Clock;
  private readonly log: SupervisorLogger;
  private readonly onEvent?: TunnelEventListener;

  private state: PolicyState = initialPolicyState();
  private process: TunnelProcess | undefined;
  private nextCheckAt = 0;
  private lastCheckedAt: number | undefined;
  private startup: Promise<void> | null = null;
  private inFlight: Promise<TickOutcome> | null = null;
  private stopped = false;
  private shutdownPromise: Promise<ShutdownReport> | null = null;
  private readonly abort = new AbortController();
  private readonly terminations = new Set<Promise<void>>();
  private readonly shutdownErrors: ShutdownError[] = [];
  private shutdownTerminations = 0;

  constructor(options: TunnelSupervisorOptions) {
    this.id = options.id;
    this.spec = options.spec;
    this.label = `#${options.id} ${describeForwardingSpec(options.spec)}`;
    this.launcher = options.launcher;
    this.probe = options.probe ?? probeTcpPort;
    this.policy = resolveRestartPolicyOptions(options.policy);
    this.probeTimeoutMs = Math.max(1, options.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS);
    this.warmupMs = Math.max(0, options.warmupMs ?? DEFAULT_WARMUP_MS);
    this.terminateGraceMs = Math.max(0, options.terminateGraceMs ?? DEFAULT_TERMINATE_GRACE_MS);
    this.now = options.now ?? nowMs;
    this.log = options.logger ?? SILENT_LOGGER;
    this.onEvent = options.onEvent;
  }

  snapshot(): TunnelStatusSnapshot {
    return {
      id: this.id,
      spec: this.spec,
      status: this.state.status,
      consecutiveFailures: this.state.consecutiveFailures,
      attempt: this.state.backoff.attempt,
      nextEligibleAt: this.state.backoff.nextEligibleAt,
      lastCheckedAt: this.lastCheckedAt,
      pid: this.process?.pid,
    };
  }

  start(): Promise<void> {
    if (!this.startup) {
      this.startup = this.stopped ? Promise.resolve() : this.runStartup();
    }
    return this.startup;
  }

  /**
   * Runs one health check if one is due. A call made while the previous tick is
   * still running gets that tick's promise instead of starting another.
   */
  tick(now: number = this.now()): Promise<TickOutcome> {
    if (this.inFlight) {
      return this.inFlight;
    }
    const run = this.runTick(now)
      .catch((error: unknown): TickOutcome => {
        this.log.error(`tunnel ${this.label} tick failed: ${errorText(error)}`);
        if (this.stopped) {
          return "stopped";
        }
        // Any restart this failure calls for runs on the next tick.
        this.applyEvent({ type: "check_failed" }, now, `internal error: ${errorText(error)}`);
        return "failed";
      })
      .finally(() => {
        this.inFlight = null;
      });
    this.inFlight = run;
    return run;
  }

  shutdown(): Promise<ShutdownReport> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.runShutdown();
    }
    return this.shutdownPromise;
  }

  private async runStartup(): Promise<void> {
    const now = this.now();
    const result = await this.launcher.spawn(this.spec);
    if (!result.ok) {
      this.log.warn(`tunnel ${this.label} failed to start: ${result.error.message}`);
      this.emit("tunnel.spawn_failed", { reason: result.error.message });
      this.applyEvent({ type: "spawn_failed" }, now, result.error.message);
      this.nextCheckAt = now;
      return;
    }
    if (this.stopped) {
      void this.retire(result.process, "shutdown");
      return;
    }
    this.process = result.process;
    this.nextCheckAt = now + this.warmupMs;
    this.log.info(`tunnel ${this.label} started (pid ${result.process.pid ?? "?"})`);
    this.emit("tunnel.spawned", { pid: result.process.pid });
  }

  private async runTick(now: number): Promise<TickOutcome> {
    if (this.stopped) {
      return "stopped";
    }
    if (!this.startup) {
      return "skipped";
    }
    await this.startup;
    if (this.stopped) {
      return "stopped";
    }
    if (now < this.nextCheckAt) {
      return "skipped";
    }

    const failure = await this.runCheck();
    if (this.stopped) {
      return "stopped";
    }
    this.lastCheckedAt = now;

    if (failure === undefined) {
      this.applyEvent({ type: "check_succeeded" }, now);
      return "healthy";
    }

    this.log.debug(`tunnel ${this.label} check failed: ${failure}`);
    const action = this.applyEvent({ type: "check_failed" }, now, failure);
    if (action.type === "restart_now") {
      const restarted = await this.restart(now);
      if (this.stopped) {
        return "stopped";
      }
      return restarted ? "restarted" : "failed";
    }
    return "failed";
  }

  /** Resolves with the failure reason, or `undefined` when the tunnel is healthy. */
  private async runCheck(): Promise<string | undefined> {
    try {
      const verdict = await checkTunnelHealth({
        spec: this.spec,
        process: this.process,
        probe: this.probe,
        timeoutMs: this.probeTimeoutMs,
        signal: this.abort.signal,
      });
      return verdict.healthy ? undefined : verdict.error.message;
    } catch (error) {
      this.log.error(`tunnel ${this.label} health check threw: ${errorText(error)}`);
      return `internal error: ${errorText(error)}`;
    }
  }

  /** Resolves `true` once a replacement process is running. */
  private async restart(tickAt: number): Promise<boolean> {
    this.emit("tunnel.restarting", { pid: this.process?.pid });
    this.log.info(
      `tunnel ${this.label} restarting (attempt ${this.state.backoff.attempt}, ` +
        `${this.state.consecutiveFailures} consecutive failures)`,
    );
    const previous = this.process;
    this.process = undefined;
    if (previous) {
      // The old process must release the bound port before the new one binds it.
      await this.retire(previous, "restart");
    }
    if (this.stopped) {
      return false;
    }

    const result = await this.launcher.spawn(this.spec);
    // Terminating the old process can take the whole grace window.
    const now = Math.max(tickAt, this.now());
    if (!result.ok) {
      this.log.warn(`tunnel ${this.label} respawn failed: ${result.error.message}`);
      this.emit("tunnel.spawn_failed", { reason: result.error.message });
      this.applyEvent({ type: "spawn_failed" }, now, result.error.message);
      return false;
    }
    if (this.stopped) {
      void this.retire(result.process, "shutdown");
      return false;
    }
    this.process = result.process;
    this.applyEvent({ type: "restarted" }, now);
    this.nextCheckAt = now + this.warmupMs;
    this.log.info(`tunnel ${this.label} respawned (pid ${result.process.pid ?? "?"})`);
    this.emit("tunnel.spawned", { pid: result.process.pid });
    return true;
  }

  private applyEvent(event: PolicyEvent, now: number, reason?: string): PolicyAction {
    const previous = this.state;
    const next = transition(previous, event, now, this.policy);
    this.state = next.state;

    if (event.type === "check_failed") {
      this.emit("tunnel.check_failed", { reason });
    }
    if (previous.status !== next.state.status) {
      this.logStatusChange(previous, reason);
      this.emit("tunnel.status_changed", { previousStatus: previous.status, reason });
    }
    if (next.action.type === "schedule_restart") {
      this.log.warn(
        `tunnel ${this.label} failed ${next.state.consecutiveFailures} time(s), ` +
          `restart #${next.action.attempt} in ${next.action.delayMs}ms`,
      );
      this.emit("tunnel.restart_scheduled", {
        delayMs: next.action.delayMs,
        eligibleAt: next.action.eligibleAt,
        reason,
      });
    }
    return next.action;
  }

  private logStatusChange(previous: PolicyState, reason?: string) {
    const status = this.state.status;
    const suffix = reason ? `: ${reason}` : "";
    if (status === "healthy") {
      this.log.info(`tunnel ${this.label} is healthy`);
    } else if (status === "degraded") {
      this.log.warn(
        `tunnel ${this.label} degraded ` +
          `(${this.state.consecutiveFailures}/${this.policy.failureThreshold})${suffix}`,
      );
    } else if (status === "failed") {
      this.log.warn(`tunnel ${this.label} failed${suffix}`);
    } else {
      this.log.debug(`tunnel ${this.label} ${previous.status} -> ${status}`);
    }
  }

  private retire(process: TunnelProcess, reason: RetireReason): Promise<void> {
    const pid = process.pid;
    if (reason === "shutdown") {
      this.shutdownTerminations += 1;
    }
    const pending: Promise<void> = process
      .terminate(this.terminateGraceMs)
      .then(
        (result) => {
          if (result.exited) {
            this.emit("tunnel.terminated", { pid, reason });
            return;
          }
          this.recordTerminateFailure(
            pid,
            `process ${pid ?? "?"} still running ${this.terminateGraceMs}ms after SIGTERM and SIGKILL`,
          );
        },
        (error: unknown) => {
          this.recordTerminateFailure(pid, `terminate failed: ${errorText(error)}`);
        },
      )
      .finally(() => {
        this.terminations.delete(pending);
      });
    this.terminations.add(pending);
    return pending;
  }

  private recordTerminateFailure(pid: number | undefined, message: string) {
    const error = new ShutdownError(this.label, pid, message);
    this.shutdownErrors.push(error);
    this.log.warn(`tunnel ${this.label}: ${message}`);
    this.emit("tunnel.terminate_timeout", { pid, reason: message });
  }

  private async runShutdown(): Promise<ShutdownReport> {
    this.stopped = true;
    this.abort.abort();
    const current = this.process;
    this.process = undefined;
    if (current) {
      void this.retire(current, "shutdown");
    }
    // An in-flight startup or tick retires anything it spawns once it sees `stopped`.
    if (this.startup) {
      await this.startup;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
    while (this.terminations.size > 0) {
      await Promise.all([...this.terminations]);
    }
    return {
      terminated: this.shutdownTerminations,
      errors: [...this.shutdownErrors],
      timedOut: false,
    };
  }

  private emit(type: TunnelEventType, extra?: Partial<TunnelEvent>) {
    if (!this.onEvent) {
      return;
    }
    const event: TunnelEvent = {
      type,
      tunnelId: this.id,
      tunnel: this.label,
      timestamp: this.now(),
      status: this.state.status,
      consecutiveFailures: this.state.consecutiveFailures,
      attempt: this.state.backoff.attempt,
      ...extra,
    };
    try {
      this.onEvent(event);
    } catch (error) {
      this.log.warn(`tunnel event listener failed: ${errorText(error)}`);
    }
  }
}
