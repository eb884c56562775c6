import type { ForwardingSpec } from "./forwarding-types.js";
import { bindKey, bindsConflict, describeForwardingSpec } from "./forwarding-types.js";

function isPort(value: number): boolean {
  return Number.isInteger(value) && value >= 1 && value <= 65_535;
}

/** Returns every problem with the set; an empty list means the manager may spawn. */
export function validateForwardingSpecs(specs: readonly ForwardingSpec[]): string[] {
  if (specs.length === 0) {
    return ["at least one forwarding spec is required"];
  }
  const issues: string[] = [];
  specs.forEach((spec, index) => {
    if (spec.mode !== "local" && spec.mode !== "remote") {
      issues.push(`forwards[${index}]: unknown mode "${String(spec.mode)}"`);
    }
    if (!isPort(spec.localPort)) {
      issues.push(`forwards[${index}]: invalid local port ${spec.localPort}`);
    }
    if (!isPort(spec.remotePort)) {
      issues.push(`forwards[${index}]: invalid remote port ${spec.remotePort}`);
    }
    if (!spec.remoteHost.trim()) {
      issues.push(`forwards[${index}]: remote host is empty`);
    }
  });
  for (let i = 0; i < specs.length; i += 1) {
    for (let j = i + 1; j < specs.length; j += 1) {
      const a = specs[i];
      const b = specs[j];
      if (a && b && bindsConflict(a, b)) {
        issues.push(
          `forwards[${i}] and forwards[${j}] both bind ${bindKey(b)} ` +
            `(${describeForwardingSpec(a)} / ${describeForwardingSpec(b)})`,
        );
      }
    }
  }
  return issues;
}
