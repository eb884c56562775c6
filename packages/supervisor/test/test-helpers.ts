import type { ForwardingSpec } from "../src/forwarding/forwarding-types.js";
import type { PortProbe, ProbeOutcome, ProbeTarget } from "../src/health/health-types.js";
import type {
  SpawnResult,
  TerminationResult,
  TunnelLauncher,
  TunnelProcess,
} from "../src/process/process-types.js";
import { SpawnError } from "../src/errors.js";
import { createForwardingSpec, describeForwardingSpec } from "../src/forwarding/forwarding-types.js";

export function localSpec(localPort: number, bindAddress?: string): ForwardingSpec {
  return createForwardingSpec({
    mode: "local",
    bindAddress,
    localPort,
    remoteHost: "10.0.0.5",
    remotePort: localPort,
  });
}

export function remoteSpec(remoteBindPort: number, localPort: number, host = "127.0.0.1"): ForwardingSpec {
  return createForwardingSpec({
    mode: "remote",
    localPort: remoteBindPort,
    remoteHost: host,
    remotePort: localPort,
  });
}

export class FakeProcess implements TunnelProcess {
  alive = true;
  terminateCalls = 0;
  exitOnTerminate = true;
  hangOnTerminate = false;
  onTerminate?: () => void;

  constructor(readonly pid: number) {}

  isAlive(): boolean {
    return this.alive;
  }

  die() {
    this.alive = false;
  }

  terminate(_graceMs: number): Promise<TerminationResult> {
    this.terminateCalls += 1;
    this.onTerminate?.();
    if (this.hangOnTerminate) {
      return new Promise<TerminationResult>(() => {});
    }
    if (this.exitOnTerminate) {
      this.alive = false;
    }
    return Promise.resolve({
      exited: this.exitOnTerminate,
      forced: !this.exitOnTerminate,
      exitCode: null,
      signal: "SIGTERM",
    });
  }
}

export class FakeLauncher implements TunnelLauncher {
  readonly spawned: Array<{ spec: ForwardingSpec; process: FakeProcess }> = [];
  private readonly pendingFailures = new Map<number, number>();
  private nextPid = 100;

  failNext(localPort: number, count = 1) {
    this.pendingFailures.set(localPort, count);
  }

  processesFor(localPort: number): FakeProcess[] {
    return this.spawned
      .filter((entry) => entry.spec.localPort === localPort)
      .map((entry) => entry.process);
  }

  latest(localPort: number): FakeProcess {
    const process = this.processesFor(localPort).at(-1);
    if (!process) {
      throw new Error(`no process spawned for port ${localPort}`);
    }
    return process;
  }

  async spawn(spec: ForwardingSpec): Promise<SpawnResult> {
    const remaining = this.pendingFailures.get(spec.localPort) ?? 0;
    if (remaining > 0) {
      this.pendingFailures.set(spec.localPort, remaining - 1);
      return {
        ok: false,
        error: new SpawnError(describeForwardingSpec(spec), "spawn ssh ENOENT", { code: "ENOENT" }),
      };
    }
    const process = new FakeProcess(this.nextPid++);
    this.spawned.push({ spec, process });
    return { ok: true, process };
  }
}

export class FakeProbe {
  readonly outcomes = new Map<number, ProbeOutcome>();
  readonly calls: ProbeTarget[] = [];

  readonly probe: PortProbe = async (target) => {
    this.calls.push(target);
    return this.outcomes.get(target.port) ?? "healthy";
  };
}

/** A probe that stays pending until released or aborted. */
export class BlockingProbe {
  calls = 0;
  private releases: Array<(outcome: ProbeOutcome) => void> = [];

  readonly probe: PortProbe = (_target, _timeoutMs, signal) => {
    this.calls += 1;
    return new Promise<ProbeOutcome>((resolve) => {
      this.releases.push(resolve);
      signal?.addEventListener("abort", () => resolve("unreachable"), { once: true });
    });
  };

  release(outcome: ProbeOutcome = "healthy") {
    for (const resolve of this.releases.splice(0, this.releases.length)) {
      resolve(outcome);
    }
  }
}
