import { EventEmitter } from "node:events";
import { describe, expect, it } from "vitest";
import type { ForwardingSpec } from "../src/forwarding/forwarding-types.js";
import { SpawnError } from "../src/errors.js";
import {
  ChildProcessLauncher,
  type ChildProcessLauncherOptions,
  type SpawnedChild,
} from "../src/process/child-process.js";
import { localSpec } from "./test-helpers.js";

class FakeChild extends EventEmitter implements SpawnedChild {
  pid: number | undefined = 4242;
  exitCode: number | null = null;
  signalCode: NodeJS.Signals | null = null;
  readonly stderr = new EventEmitter();
  readonly kills: Array<NodeJS.Signals | number | undefined> = [];

  constructor(private readonly honors: NodeJS.Signals[] = ["SIGTERM", "SIGKILL"]) {
    super();
  }

  kill(signal?: NodeJS.Signals | number): boolean {
    this.kills.push(signal);
    const honored = this.honors.find((candidate) => candidate === signal);
    if (honored) {
      setTimeout(() => this.exit(null, honored), 0);
    }
    return true;
  }

  exit(code: number | null, signal: NodeJS.Signals | null) {
    this.exitCode = code;
    this.signalCode = signal;
    this.emit("exit", code, signal);
  }
}

function createLauncher(
  child: FakeChild,
  overrides: Partial<ChildProcessLauncherOptions> = {},
) {
  const calls: Array<{ command: string; args: readonly string[] }> = [];
  const launcher = new ChildProcessLauncher({
    buildCommand: (spec: ForwardingSpec) => ({ command: "ssh", args: ["-N", String(spec.localPort)] }),
    spawn: (command, args) => {
      calls.push({ command, args });
      return child;
    },
    ...overrides,
  });
  return { launcher, calls };
}

async function spawnRunning(child: FakeChild, overrides: Partial<ChildProcessLauncherOptions> = {}) {
  const { launcher } = createLauncher(child, overrides);
  const pending = launcher.spawn(localSpec(8080));
  child.emit("spawn");
  const result = await pending;
  if (!result.ok) {
    throw result.error;
  }
  return result.process;
}

describe("ChildProcessLauncher", () => {
  it("resolves with a live handle once the child has spawned", async () => {
    const child = new FakeChild();
    const { launcher, calls } = createLauncher(child);

    const pending = launcher.spawn(localSpec(8080));
    child.emit("spawn");
    const result = await pending;

    expect(calls).toEqual([{ command: "ssh", args: ["-N", "8080"] }]);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.process.pid).toBe(4242);
      expect(result.process.isAlive()).toBe(true);
    }
  });

  it("turns an early child error into a SpawnError", async () => {
    const child = new FakeChild();
    const { launcher } = createLauncher(child);

    const pending = launcher.spawn(localSpec(8080));
    child.emit("error", Object.assign(new Error("spawn ssh ENOENT"), { code: "ENOENT" }));
    const result = await pending;

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(SpawnError);
      expect(result.error.code).toBe("ENOENT");
      expect(result.error.tunnel).toBe("L 127.0.0.1:8080 -> 10.0.0.5:8080");
      expect(result.error.message).toBe("failed to start ssh: spawn ssh ENOENT");
    }
  });

  it("turns a synchronous spawn failure into a SpawnError", async () => {
    const launcher = new ChildProcessLauncher({
      buildCommand: () => ({ command: "ssh", args: [] }),
      spawn: () => {
        throw new Error("boom");
      },
    });
    const result = await launcher.spawn(localSpec(8080));
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe("failed to start ssh: boom");
    }
  });

  it("reports errors raised after a successful spawn", async () => {
    const child = new FakeChild();
    const errors: string[] = [];
    await spawnRunning(child, {
      onProcessError: (_spec, error) => errors.push(error.message),
    });
    child.emit("error", new Error("kill EPERM"));
    expect(errors).toEqual(["kill EPERM"]);
  });

  it("splits stderr into trimmed lines", async () => {
    const child = new FakeChild();
    const lines: string[] = [];
    await spawnRunning(child, { onStderr: (_spec, line) => lines.push(line) });

    child.stderr.emit("data", Buffer.from("first line\nsecond"));
    child.stderr.emit("data", Buffer.from(" part\n\n"));
    expect(lines).toEqual(["first line", "second part"]);
  });
});

describe("ChildTunnelProcess.terminate", () => {
  it("stops at SIGTERM when the child exits in time", async () => {
    const child = new FakeChild();
    const handle = await spawnRunning(child);

    const first = handle.terminate(1_000);
    expect(handle.terminate(1_000)).toBe(first);
    await expect(first).resolves.toEqual({
      exited: true,
      forced: false,
      exitCode: null,
      signal: "SIGTERM",
    });
    expect(child.kills).toEqual(["SIGTERM"]);
    expect(handle.isAlive()).toBe(false);
  });

  it("escalates to SIGKILL after the grace period", async () => {
    const child = new FakeChild(["SIGKILL"]);
    const handle = await spawnRunning(child);

    await expect(handle.terminate(20)).resolves.toEqual({
      exited: true,
      forced: true,
      exitCode: null,
      signal: "SIGKILL",
    });
    expect(child.kills).toEqual(["SIGTERM", "SIGKILL"]);
  });

  it("reports a child that survives SIGKILL", async () => {
    const child = new FakeChild([]);
    const handle = await spawnRunning(child, { killWaitMs: 20 });

    const result = await handle.terminate(20);
    expect(result.exited).toBe(false);
    expect(result.forced).toBe(true);
  });

  it("does not signal a child that already exited", async () => {
    const child = new FakeChild();
    const handle = await spawnRunning(child);
    child.exit(255, null);

    await expect(handle.terminate(1_000)).resolves.toMatchObject({ exited: true, exitCode: 255 });
    expect(child.kills).toEqual([]);
  });
});
