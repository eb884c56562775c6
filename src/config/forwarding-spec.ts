import {
  createForwardingSpec,
  type ForwardingMode,
  type ForwardingSpec,
} from "../../packages/supervisor/src/index.js";

export type ForwardingParseResult = { ok: true; value: ForwardingSpec } | { ok: false; error: string };

/** Splits on `:` outside square brackets. */
function splitSegments(text: string): string[] | null {
  const segments: string[] = [];
  let current = "";
  let depth = 0;
  for (const char of text) {
    if (char === "[") {
      depth += 1;
    } else if (char === "]") {
      depth -= 1;
      if (depth < 0) {
        return null;
      }
    }
    if (char === ":" && depth === 0) {
      segments.push(current);
      current = "";
      continue;
    }
    current += char;
  }
  if (depth !== 0) {
    return null;
  }
  segments.push(current);
  return segments;
}

function parsePort(raw: string): number | null {
  if (!/^\d{1,5}$/.test(raw)) {
    return null;
  }
  const port = Number(raw);
  return port >= 1 && port <= 65_535 ? port : null;
}

/**
 * Parses `[bind_address:]port:host:hostport`, reading from the right so a
 * bracketed IPv6 bind address (`[::1]:8080:db:5432`) keeps its colons.
 * An explicitly empty bind address means every interface.
 */
export function parseForwardingSpec(text: string, mode: ForwardingMode): ForwardingParseResult {
  const trimmed = text.trim();
  const segments = splitSegments(trimmed);
  if (!segments || segments.length < 3 || segments.length > 4) {
    return { ok: false, error: `expected [bind_address:]port:host:hostport, got "${trimmed}"` };
  }
  const [remotePortRaw = "", remoteHost = "", localPortRaw = "", bindAddress] = [...segments].reverse();

  const remotePort = parsePort(remotePortRaw);
  if (remotePort === null) {
    return { ok: false, error: `invalid host port "${remotePortRaw}" in "${trimmed}"` };
  }
  if (!remoteHost.trim()) {
    return { ok: false, error: `missing host in "${trimmed}"` };
  }
  const localPort = parsePort(localPortRaw);
  if (localPort === null) {
    return { ok: false, error: `invalid port "${localPortRaw}" in "${trimmed}"` };
  }

  return {
    ok: true,
    value: createForwardingSpec({
      mode,
      bindAddress: bindAddress === undefined ? undefined : bindAddress.trim() || "*",
      localPort,
      remoteHost: remoteHost.trim(),
      remotePort,
    }),
  };
}
