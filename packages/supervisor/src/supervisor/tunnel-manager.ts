import type { ForwardingSpec } from "../forwarding/forwarding-types.js";
import type { PortProbe } from "../health/health-types.js";
import type { RestartPolicyOptions } from "../health/restart-policy.js";
import type { TunnelLauncher } from "../process/process-types.js";
import type { Clock } from "../util/now.js";
import type {
  ShutdownReport,
  SupervisorLogger,
  TickOutcome,
  TunnelEvent,
  TunnelEventListener,
  TunnelStatusSnapshot,
} from "./supervisor-types.js";
import { ConfigError, ShutdownError } from "../errors.js";
import { describeForwardingSpec } from "../forwarding/forwarding-types.js";
import { validateForwardingSpecs } from "../forwarding/validate-forwarding.js";
import { DEFAULT_PROBE_TIMEOUT_MS } from "../health/health-probe.js";
import { nowMs } from "../util/now.js";
import { sleep, withTimeout } from "../util/sleep.js";
import { SILENT_LOGGER } from "./supervisor-types.js";
import { DEFAULT_TERMINATE_GRACE_MS, TunnelSupervisor } from "./tunnel-supervisor.js";

export const DEFAULT_CHECK_INTERVAL_MS = 5_000;

export type TunnelManagerOptions = {
  launcher: TunnelLauncher;
  probe?: PortProbe;
  intervalMs?: number;
  probeTimeoutMs?: number;
  warmupMs?: number;
  policy?: RestartPolicyOptions;
  terminateGraceMs?: number;
  /** Upper bound on `shutdown()`; defaults to grace + probe timeout + 2s. */
  shutdownTimeoutMs?: number;
  now?: Clock;
  logger?: SupervisorLogger;
};

export class TunnelManager {
  private readonly supervisors: readonly TunnelSupervisor[];
  private readonly listeners = new Set<TunnelEventListener>();
  private readonly loopAbort = new AbortController();
  private readonly intervalMs: number;
  private readonly shutdownTimeoutMs: number;
  private readonly now: Clock;
  private readonly log: SupervisorLogger;
  private running: Promise<void> | null = null;
  private shutdownPromise: Promise<ShutdownReport> | null = null;

  /** @throws ConfigError when the set is empty, malformed, or binds one port twice. */
  constructor(specs: readonly ForwardingSpec[], options: TunnelManagerOptions) {
    const issues = validateForwardingSpecs(specs);
    if (issues.length > 0) {
      throw new ConfigError("invalid forwarding set", issues);
    }
    const terminateGraceMs = Math.max(0, options.terminateGraceMs ?? DEFAULT_TERMINATE_GRACE_MS);
    const probeTimeoutMs = options.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
    this.intervalMs = Math.max(1, options.intervalMs ?? DEFAULT_CHECK_INTERVAL_MS);
    this.shutdownTimeoutMs = Math.max(
      1,
      options.shutdownTimeoutMs ?? terminateGraceMs + probeTimeoutMs + 2_000,
    );
    this.now = options.now ?? nowMs;
    this.log = options.logger ?? SILENT_LOGGER;

    this.supervisors = Object.freeze(
      specs.map(
        (spec, id) =>
          new TunnelSupervisor({
            id,
            spec,
            launcher: options.launcher,
            probe: options.probe,
            policy: options.policy,
            probeTimeoutMs,
            warmupMs: options.warmupMs,
            terminateGraceMs,
            now: this.now,
            logger: this.log,
            onEvent: (event) => this.emitEvent(event),
          }),
      ),
    );
  }

  get size(): number {
    return this.supervisors.length;
  }

  getStatus(): TunnelStatusSnapshot[] {
    return this.supervisors.map((supervisor) => supervisor.snapshot());
  }

  getTunnel(id: number): TunnelStatusSnapshot | undefined {
    return this.supervisors[id]?.snapshot();
  }

  onEvent(listener: TunnelEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Spawns every tunnel and supervises them until `shutdown()` completes. */
  start(): Promise<void> {
    if (this.shutdownPromise) {
      return Promise.reject(new Error("tunnel manager has been shut down"));
    }
    if (this.running) {
      return Promise.reject(new Error("tunnel manager is already running"));
    }
    this.running = this.run();
    return this.running;
  }

  /**
   * Ticks every supervisor once. Supervisors whose previous tick is still running
   * hand back that tick rather than starting a new one.
   */
  tickAll(now: number = this.now()): Promise<TickOutcome[]> {
    return Promise.all(this.supervisors.map((supervisor) => supervisor.tick(now)));
  }

  shutdown(): Promise<ShutdownReport> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.runShutdown();
    }
    return this.shutdownPromise;
  }

  private emitEvent(event: TunnelEvent) {
    for (const listener of this.listeners) {
      listener(event);
    }
  }

  private async run(): Promise<void> {
    this.log.info(`starting ${this.supervisors.length} tunnel(s)`);
    for (const supervisor of this.supervisors) {
      this.log.debug(`tunnel #${supervisor.id}: ${describeForwardingSpec(supervisor.spec)}`);
    }
    await Promise.all(this.supervisors.map((supervisor) => supervisor.start()));

    const signal = this.loopAbort.signal;
    while (!signal.aborted) {
      const elapsed = await sleep(this.intervalMs, signal);
      if (!elapsed || signal.aborted) {
        break;
      }
      // Not awaited: a slow tunnel must not stretch the interval for the others.
      void this.tickAll(this.now());
    }

    if (this.shutdownPromise) {
      await this.shutdownPromise;
    }
    this.log.info("tunnel manager stopped");
  }

  private async runShutdown(): Promise<ShutdownReport> {
    this.loopAbort.abort();
    this.log.info(`shutting down ${this.supervisors.length} tunnel(s)`);

    const reports = new Map<number, ShutdownReport>();
    const all = Promise.all(
      this.supervisors.map(async (supervisor) => {
        reports.set(supervisor.id, await supervisor.shutdown());
      }),
    );
    const finished = await withTimeout(all, this.shutdownTimeoutMs);

    const errors: ShutdownError[] = [];
    let terminated = 0;
    for (const report of reports.values()) {
      terminated += report.terminated;
      errors.push(...report.errors);
    }
    const timedOut = finished === undefined;
    if (timedOut) {
      for (const supervisor of this.supervisors) {
        if (!reports.has(supervisor.id)) {
          errors.push(
            new ShutdownError(
              `#${supervisor.id} ${describeForwardingSpec(supervisor.spec)}`,
              supervisor.snapshot().pid,
              `shutdown did not finish within ${this.shutdownTimeoutMs}ms`,
            ),
          );
        }
      }
    }
    for (const error of errors) {
      this.log.warn(`shutdown: ${error.tunnel}: ${error.message}`);
    }
    this.log.info(
      `shutdown complete: ${terminated} process(es) terminated, ${errors.length} error(s)`,
    );
    return { terminated, errors, timedOut };
  }
}
