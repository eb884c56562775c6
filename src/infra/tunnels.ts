import fs from "node:fs";
import type { LoadedConfig, RemoteHostConfig } from "../config/config.js";
import { expandHome, DEFAULT_SSH_PORT, resolveTunnelSettings } from "../config/config.js";
import { createSubsystemLogger, type SubsystemLogger } from "../logging/subsystem.js";
import {
  JournalLogger,
  JsonlJournalSink,
  type JournalEntryInput,
  type JournalSink,
} from "../../packages/observability/src/index.js";
import {
  ChildProcessLauncher,
  describeForwardingSpec,
  errorText,
  TunnelManager,
  type Clock,
  type PortProbe,
  type ShutdownReport,
  type TunnelEvent,
  type TunnelLauncher,
  type TunnelStatus,
  type TunnelStatusSnapshot,
} from "../../packages/supervisor/src/index.js";
import { buildSshCommand, type SshTarget } from "./ssh-command.js";

const log = createSubsystemLogger("tunnels");
const sshLog = createSubsystemLogger("tunnels/ssh");

export type TunnelRuntimeOptions = {
  launcher?: TunnelLauncher;
  probe?: PortProbe;
  journalSink?: JournalSink;
  now?: Clock;
  logger?: SubsystemLogger;
};

export type TunnelRuntime = {
  manager: TunnelManager;
  journal: JournalLogger | null;
  /** Starts every tunnel; resolves with the shutdown report once stopped. */
  run(): Promise<ShutdownReport>;
  stop(): Promise<ShutdownReport>;
};

const STATUS_ORDER: readonly TunnelStatus[] = ["healthy", "starting", "degraded", "failed"];

export function formatStatusSummary(statuses: readonly TunnelStatusSnapshot[]): string {
  const counts = new Map<TunnelStatus, number>();
  for (const tunnel of statuses) {
    counts.set(tunnel.status, (counts.get(tunnel.status) ?? 0) + 1);
  }
  const parts = STATUS_ORDER.filter((status) => counts.has(status)).map(
    (status) => `${counts.get(status) ?? 0} ${status}`,
  );
  return `${statuses.length} tunnel(s): ${parts.join(", ")}`;
}

export function toJournalEntry(event: TunnelEvent): JournalEntryInput {
  const payload: Record<string, unknown> = {
    consecutiveFailures: event.consecutiveFailures,
    attempt: event.attempt,
  };
  if (event.previousStatus !== undefined) {
    payload.previousStatus = event.previousStatus;
  }
  if (event.pid !== undefined) {
    payload.pid = event.pid;
  }
  if (event.delayMs !== undefined) {
    payload.delayMs = event.delayMs;
  }
  if (event.eligibleAt !== undefined) {
    payload.eligibleAt = event.eligibleAt;
  }
  if (event.reason !== undefined) {
    payload.reason = event.reason;
  }
  return {
    timestamp: event.timestamp,
    eventType: event.type,
    tunnelId: event.tunnelId,
    tunnel: event.tunnel,
    status: event.status,
    payload,
  };
}

/** Drops an identity file that does not exist so ssh falls back to its defaults. */
export function resolveSshTarget(
  remote: RemoteHostConfig,
  logger: SubsystemLogger = log,
): SshTarget {
  const target: SshTarget = {
    host: remote.host.trim(),
    port: remote.port ?? DEFAULT_SSH_PORT,
    user: remote.user.trim(),
  };
  if (remote.identityFile) {
    const identityFile = expandHome(remote.identityFile.trim());
    if (fs.existsSync(identityFile)) {
      target.identityFile = identityFile;
    } else {
      logger.warn(`identity file ${identityFile} not found; using the ssh defaults`);
    }
  }
  return target;
}

function createSshLauncher(target: SshTarget, logger: SubsystemLogger): TunnelLauncher {
  return new ChildProcessLauncher({
    buildCommand: (spec) => buildSshCommand(target, spec),
    onStderr: (spec, line) => {
      sshLog.debug(`${describeForwardingSpec(spec)}: ${line}`);
    },
    onProcessError: (spec, error) => {
      logger.warn(`${describeForwardingSpec(spec)}: ssh process error: ${error.message}`);
    },
  });
}

export function createTunnelRuntime(
  loaded: LoadedConfig,
  options: TunnelRuntimeOptions = {},
): TunnelRuntime {
  const logger = options.logger ?? log;
  const settings = resolveTunnelSettings(loaded.config);
  const now = options.now ?? Date.now;

  const journalSink =
    options.journalSink ??
    (settings.journal.enabled ? new JsonlJournalSink({ dir: settings.journal.dir }) : undefined);
  const journal = journalSink
    ? new JournalLogger({
        sink: journalSink,
        now,
        onWriteError: (error) => {
          logger.warn(`journal write failed: ${errorText(error)}`);
        },
      })
    : null;

  const launcher =
    options.launcher ?? createSshLauncher(resolveSshTarget(loaded.config.remote, logger), logger);
  const manager = new TunnelManager(loaded.forwards, {
    launcher,
    probe: options.probe,
    intervalMs: settings.intervalMs,
    probeTimeoutMs: settings.probeTimeoutMs,
    warmupMs: settings.warmupMs,
    policy: settings.policy,
    terminateGraceMs: settings.terminateGraceMs,
    shutdownTimeoutMs: settings.shutdownTimeoutMs,
    now,
    logger,
  });

  manager.onEvent((event) => {
    journal?.record(toJournalEntry(event));
    if (event.type === "tunnel.status_changed") {
      logger.info(formatStatusSummary(manager.getStatus()));
    }
  });

  let running: Promise<ShutdownReport> | null = null;

  const run = async (): Promise<ShutdownReport> => {
    journal?.record({
      eventType: "manager.started",
      payload: {
        config: loaded.path,
        tunnels: loaded.forwards.map((spec) => describeForwardingSpec(spec)),
      },
    });
    try {
      await manager.start();
      const report = await manager.shutdown();
      journal?.record({
        eventType: "manager.stopped",
        payload: {
          terminated: report.terminated,
          timedOut: report.timedOut,
          errors: report.errors.map((error) => `${error.tunnel}: ${error.message}`),
        },
      });
      return report;
    } finally {
      await journal?.close();
    }
  };

  return {
    manager,
    journal,
    run: () => {
      if (!running) {
        running = run();
      }
      return running;
    },
    stop: () => manager.shutdown(),
  };
}
