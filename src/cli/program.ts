import { Command } from "commander";
import { registerTunnelCli } from "./tunnel-cli.js";

export const CLI_VERSION = "0.1.0";

export function buildProgram(): Command {
  const program = new Command();
  program
    .name("tunwatch")
    .description("Supervise SSH port-forwarding tunnels")
    .version(CLI_VERSION);
  registerTunnelCli(program);
  return program;
}
