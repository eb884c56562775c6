import { CommanderError } from "commander";
import { ConfigError, errorText } from "../../packages/supervisor/src/index.js";
import { defaultRuntime } from "../runtime.js";
import { buildProgram } from "./program.js";

/** Exit codes: 1 runtime failure, 2 bad configuration. */
export async function runCli(argv: string[]): Promise<void> {
  const program = buildProgram();
  program.exitOverride();
  try {
    await program.parseAsync(argv, { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      if (error.exitCode !== 0) {
        defaultRuntime.exit(error.exitCode);
      }
      return;
    }
    if (error instanceof ConfigError) {
      defaultRuntime.error(`config error: ${error.summary}`);
      for (const issue of error.issues) {
        defaultRuntime.error(`  - ${issue}`);
      }
      defaultRuntime.exit(2);
      return;
    }
    defaultRuntime.error(errorText(error));
    defaultRuntime.exit(1);
  }
}
