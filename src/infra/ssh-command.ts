import type { ForwardingSpec, TunnelCommand } from "../../packages/supervisor/src/index.js";

export type SshTarget = {
  host: string;
  port: number;
  user: string;
  identityFile?: string;
};

export const SSH_BINARY = "ssh";

const SSH_OPTIONS = [
  "ServerAliveInterval=30",
  "ExitOnForwardFailure=yes",
  "StrictHostKeyChecking=accept-new",
] as const;

function bracketIfIpv6(host: string): string {
  return host.includes(":") && !host.startsWith("[") ? `[${host}]` : host;
}

/** `bind:port:host:hostport`, the argument `-L` and `-R` take. */
export function toSshForwardArg(spec: ForwardingSpec): string {
  return [
    bracketIfIpv6(spec.bindAddress),
    spec.localPort,
    bracketIfIpv6(spec.remoteHost),
    spec.remotePort,
  ].join(":");
}

export function buildSshArgs(target: SshTarget, spec: ForwardingSpec): string[] {
  const args = ["-N"];
  for (const option of SSH_OPTIONS) {
    args.push("-o", option);
  }
  args.push(spec.mode === "local" ? "-L" : "-R", toSshForwardArg(spec));
  if (target.identityFile) {
    args.push("-i", target.identityFile);
  }
  args.push("-p", String(target.port), `${target.user}@${target.host}`);
  return args;
}

export function buildSshCommand(
  target: SshTarget,
  spec: ForwardingSpec,
  binary: string = SSH_BINARY,
): TunnelCommand {
  return { command: binary, args: buildSshArgs(target, spec) };
}

const SAFE_SHELL_WORD = /^[A-Za-z0-9_@%+=:,./-]+$/;

function quoteShellWord(word: string): string {
  if (SAFE_SHELL_WORD.test(word)) {
    return word;
  }
  return `'${word.replace(/'/g, `'\\''`)}'`;
}

/** Renders a command the way it could be pasted into a POSIX shell. */
export function formatSshCommand(command: TunnelCommand): string {
  return [command.command, ...command.args].map(quoteShellWord).join(" ");
}
