export * from "./errors.js";
export * from "./forwarding/forwarding-types.js";
export * from "./forwarding/validate-forwarding.js";
export * from "./health/health-types.js";
export * from "./health/health-probe.js";
export * from "./health/restart-policy.js";
export * from "./process/process-types.js";
export * from "./process/child-process.js";
export * from "./supervisor/supervisor-types.js";
export * from "./supervisor/tunnel-supervisor.js";
export * from "./supervisor/tunnel-manager.js";
export { nowMs, type Clock } from "./util/now.js";
