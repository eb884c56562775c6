import { spawn as nodeSpawn, type SpawnOptions } from "node:child_process";
import type { ForwardingSpec } from "../forwarding/forwarding-types.js";
import type { SpawnResult, TerminationResult, TunnelLauncher, TunnelProcess } from "./process-types.js";
import { SpawnError, errorText } from "../errors.js";
import { describeForwardingSpec } from "../forwarding/forwarding-types.js";

export type TunnelCommand = {
  command: string;
  args: string[];
};

/** The slice of `ChildProcess` the launcher relies on. */
export interface SpawnedChild {
  readonly pid?: number | undefined;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  readonly stderr: { on(event: "data", listener: (chunk: Buffer) => void): unknown } | null;
  kill(signal?: NodeJS.Signals | number): boolean;
  once(event: "spawn", listener: () => void): unknown;
  once(event: "exit", listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  on(event: "error", listener: (err: Error) => void): unknown;
}

export type SpawnFn = (
  command: string,
  args: readonly string[],
  options: SpawnOptions,
) => SpawnedChild;

export type ChildProcessLauncherOptions = {
  buildCommand: (spec: ForwardingSpec) => TunnelCommand;
  spawn?: SpawnFn;
  /** How long to wait for exit after SIGKILL before giving up. */
  killWaitMs?: number;
  onStderr?: (spec: ForwardingSpec, line: string) => void;
  onProcessError?: (spec: ForwardingSpec, error: Error) => void;
};

function errorCode(error: Error): string | undefined {
  return "code" in error && typeof error.code === "string" ? error.code : undefined;
}

export class ChildTunnelProcess implements TunnelProcess {
  private exitCode: number | null = null;
  private exitSignal: string | null = null;
  private exited = false;
  private readonly exitWaiters = new Set<() => void>();
  private termination?: Promise<TerminationResult>;

  constructor(
    private readonly child: SpawnedChild,
    private readonly killWaitMs: number,
  ) {
    child.once("exit", (code, signal) => {
      this.exited = true;
      this.exitCode = code;
      this.exitSignal = signal;
      for (const resolve of this.exitWaiters) {
        resolve();
      }
      this.exitWaiters.clear();
    });
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  isAlive(): boolean {
    return !this.exited && this.child.exitCode === null && this.child.signalCode === null;
  }

  terminate(graceMs: number): Promise<TerminationResult> {
    if (!this.termination) {
      this.termination = this.runTermination(Math.max(0, graceMs));
    }
    return this.termination;
  }

  private result(exited: boolean, forced: boolean): TerminationResult {
    return {
      exited,
      forced,
      exitCode: this.exitCode ?? this.child.exitCode,
      signal: this.exitSignal ?? this.child.signalCode,
    };
  }

  private waitForExit(timeoutMs: number): Promise<boolean> {
    if (!this.isAlive()) {
      return Promise.resolve(true);
    }
    return new Promise<boolean>((resolve) => {
      const done = () => {
        clearTimeout(timer);
        resolve(true);
      };
      const timer = setTimeout(() => {
        this.exitWaiters.delete(done);
        resolve(false);
      }, timeoutMs);
      this.exitWaiters.add(done);
    });
  }

  private async runTermination(graceMs: number): Promise<TerminationResult> {
    if (!this.isAlive()) {
      return this.result(true, false);
    }
    this.child.kill("SIGTERM");
    if (await this.waitForExit(graceMs)) {
      return this.result(true, false);
    }
    this.child.kill("SIGKILL");
    const exited = await this.waitForExit(this.killWaitMs);
    return this.result(exited, true);
  }
}

/** Runs one child process per tunnel, using whatever command `buildCommand` returns. */
export class ChildProcessLauncher implements TunnelLauncher {
  private readonly buildCommand: (spec: ForwardingSpec) => TunnelCommand;
  private readonly spawnFn: SpawnFn;
  private readonly killWaitMs: number;

  constructor(private readonly options: ChildProcessLauncherOptions) {
    this.buildCommand = options.buildCommand;
    this.spawnFn = options.spawn ?? nodeSpawn;
    this.killWaitMs = Math.max(0, options.killWaitMs ?? 1_000);
  }

  private attachStderr(spec: ForwardingSpec, child: SpawnedChild) {
    const onStderr = this.options.onStderr;
    if (!onStderr || !child.stderr) {
      return;
    }
    let pending = "";
    child.stderr.on("data", (chunk) => {
      pending += chunk.toString("utf8");
      const lines = pending.split("\n");
      pending = lines.pop() ?? "";
      for (const line of lines) {
        const trimmed = line.trim();
        if (trimmed) {
          onStderr(spec, trimmed);
        }
      }
    });
  }

  async spawn(spec: ForwardingSpec): Promise<SpawnResult> {
    const tunnel = describeForwardingSpec(spec);
    const { command, args } = this.buildCommand(spec);

    let child: SpawnedChild;
    try {
      child = this.spawnFn(command, args, {
        stdio: ["ignore", "ignore", this.options.onStderr ? "pipe" : "ignore"],
      });
    } catch (error) {
      return {
        ok: false,
        error: new SpawnError(tunnel, `failed to start ${command}: ${errorText(error)}`, {
          cause: error,
        }),
      };
    }

    const handle = new ChildTunnelProcess(child, this.killWaitMs);
    this.attachStderr(spec, child);

    return await new Promise<SpawnResult>((resolve) => {
      let settled = false;
      child.once("spawn", () => {
        if (settled) {
          return;
        }
        settled = true;
        resolve({ ok: true, process: handle });
      });
      child.on("error", (error) => {
        if (settled) {
          // Later errors (e.g. a failed kill) must not crash the host process.
          this.options.onProcessError?.(spec, error);
          return;
        }
        settled = true;
        resolve({
          ok: false,
          error: new SpawnError(tunnel, `failed to start ${command}: ${error.message}`, {
            code: errorCode(error),
            cause: error,
          }),
        });
      });
    });
  }
}
