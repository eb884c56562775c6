export type ForwardingMode = "local" | "remote";

export type ForwardingSpec = Readonly<{
  mode: ForwardingMode;
  bindAddress: string;
  localPort: number;
  remoteHost: string;
  remotePort: number;
}>;

export const DEFAULT_BIND_ADDRESS = "127.0.0.1";

const WILDCARD_ADDRESSES = new Set(["", "*", "0.0.0.0", "::", "[::]"]);

export function createForwardingSpec(input: {
  mode: ForwardingMode;
  bindAddress?: string;
  localPort: number;
  remoteHost: string;
  remotePort: number;
}): ForwardingSpec {
  return Object.freeze({
    mode: input.mode,
    bindAddress: input.bindAddress?.trim() || DEFAULT_BIND_ADDRESS,
    localPort: input.localPort,
    remoteHost: input.remoteHost,
    remotePort: input.remotePort,
  });
}

export function isWildcardAddress(address: string): boolean {
  return WILDCARD_ADDRESSES.has(address.trim());
}

function stripBrackets(address: string): string {
  return address.startsWith("[") && address.endsWith("]") ? address.slice(1, -1) : address;
}

function dialable(address: string, port: number): { host: string; port: number } {
  const trimmed = address.trim();
  if (isWildcardAddress(trimmed)) {
    return { host: trimmed.includes(":") ? "::1" : DEFAULT_BIND_ADDRESS, port };
  }
  return { host: stripBrackets(trimmed), port };
}

/**
 * Host/port on this machine's side of the tunnel. A remote forward binds its
 * port on the SSH server, so its local destination is dialed instead.
 */
export function resolveProbeTarget(spec: ForwardingSpec): { host: string; port: number } {
  if (spec.mode === "remote") {
    return dialable(spec.remoteHost, spec.remotePort);
  }
  return dialable(spec.bindAddress, spec.localPort);
}

export function bindKey(spec: ForwardingSpec): string {
  return `${stripBrackets(spec.bindAddress.trim()).toLowerCase()}:${spec.localPort}`;
}

export function bindsConflict(a: ForwardingSpec, b: ForwardingSpec): boolean {
  if (a.localPort !== b.localPort) {
    return false;
  }
  if (isWildcardAddress(a.bindAddress) || isWildcardAddress(b.bindAddress)) {
    return true;
  }
  return bindKey(a) === bindKey(b);
}

export function describeForwardingSpec(spec: ForwardingSpec): string {
  const flag = spec.mode === "local" ? "L" : "R";
  return `${flag} ${spec.bindAddress}:${spec.localPort} -> ${spec.remoteHost}:${spec.remotePort}`;
}
