import type { Command } from "commander";
import { loadConfig, resolveTunnelSettings } from "../config/config.js";
import { buildSshCommand, formatSshCommand } from "../infra/ssh-command.js";
import { createTunnelRuntime, resolveSshTarget } from "../infra/tunnels.js";
import { configureLogging, createSubsystemLogger } from "../logging/subsystem.js";
import { defaultRuntime } from "../runtime.js";
import { describeForwardingSpec, errorText } from "../../packages/supervisor/src/index.js";

const log = createSubsystemLogger("cli");

type ConfigOpts = { config?: string };
type RunOpts = ConfigOpts & { verbose?: boolean };

const SHUTDOWN_SIGNALS = ["SIGINT", "SIGTERM"] as const;

export function registerTunnelCli(program: Command) {
  program
    .command("run")
    .description("Start every configured tunnel and keep it healthy until interrupted")
    .option("-c, --config <path>", "Config file (default: $TUNWATCH_CONFIG or ./tunwatch.json)")
    .option("--verbose", "Log at debug level", false)
    .action(async (opts: RunOpts) => {
      const loaded = loadConfig(opts.config);
      const settings = resolveTunnelSettings(loaded.config);
      configureLogging({
        level: opts.verbose ? "debug" : settings.logging.level,
        format: settings.logging.format,
      });

      const tunnels = createTunnelRuntime(loaded);
      const onSignal = (signal: NodeJS.Signals) => {
        log.info(`received ${signal}, shutting down`);
        tunnels.stop().catch((error: unknown) => {
          log.error(`shutdown failed: ${errorText(error)}`);
        });
      };
      for (const signal of SHUTDOWN_SIGNALS) {
        process.once(signal, onSignal);
      }
      try {
        const report = await tunnels.run();
        if (report.errors.length > 0 || report.timedOut) {
          for (const error of report.errors) {
            defaultRuntime.error(`${error.tunnel}: ${error.message}`);
          }
          defaultRuntime.exit(1);
        }
      } finally {
        for (const signal of SHUTDOWN_SIGNALS) {
          process.off(signal, onSignal);
        }
      }
    });

  program
    .command("check")
    .description("Validate the config file and list the tunnels it defines")
    .option("-c, --config <path>", "Config file (default: $TUNWATCH_CONFIG or ./tunwatch.json)")
    .action((opts: ConfigOpts) => {
      const loaded = loadConfig(opts.config);
      loaded.forwards.forEach((spec, id) => {
        defaultRuntime.log(`#${id} ${describeForwardingSpec(spec)}`);
      });
      defaultRuntime.log(`ok ${loaded.path}: ${loaded.forwards.length} tunnel(s)`);
    });

  program
    .command("command")
    .description("Print the ssh command each tunnel would run")
    .option("-c, --config <path>", "Config file (default: $TUNWATCH_CONFIG or ./tunwatch.json)")
    .action((opts: ConfigOpts) => {
      const loaded = loadConfig(opts.config);
      const target = resolveSshTarget(loaded.config.remote);
      for (const spec of loaded.forwards) {
        defaultRuntime.log(formatSshCommand(buildSshCommand(target, spec)));
      }
    });
}
