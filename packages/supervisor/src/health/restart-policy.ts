import type { TunnelStatus } from "./health-types.js";

export type RestartPolicyOptions = {
  failureThreshold?: number;
  backoffBaseMs?: number;
  backoffMaxMs?: number;
};

export type ResolvedRestartPolicyOptions = Required<RestartPolicyOptions>;

export const DEFAULT_RESTART_POLICY: ResolvedRestartPolicyOptions = {
  failureThreshold: 3,
  backoffBaseMs: 1_000,
  backoffMaxMs: 60_000,
};

export type BackoffState = {
  attempt: number;
  /** Set while a restart is pending; no restart happens before it. */
  nextEligibleAt?: number;
};

export type PolicyState = {
  status: TunnelStatus;
  consecutiveFailures: number;
  backoff: BackoffState;
};

export type PolicyEvent =
  | { type: "check_succeeded" }
  | { type: "check_failed" }
  | { type: "spawn_failed" }
  | { type: "restarted" };

export type PolicyAction =
  | { type: "none" }
  | { type: "schedule_restart"; delayMs: number; eligibleAt: number; attempt: number }
  | { type: "restart_now" };

export type PolicyTransition = {
  state: PolicyState;
  action: PolicyAction;
};

const NO_ACTION: PolicyAction = { type: "none" };

export function resolveRestartPolicyOptions(
  options?: RestartPolicyOptions,
): ResolvedRestartPolicyOptions {
  const backoffBaseMs = Math.max(1, options?.backoffBaseMs ?? DEFAULT_RESTART_POLICY.backoffBaseMs);
  return {
    failureThreshold: Math.max(
      1,
      Math.floor(options?.failureThreshold ?? DEFAULT_RESTART_POLICY.failureThreshold),
    ),
    backoffBaseMs,
    backoffMaxMs: Math.max(
      backoffBaseMs,
      options?.backoffMaxMs ?? DEFAULT_RESTART_POLICY.backoffMaxMs,
    ),
  };
}

export function initialPolicyState(): PolicyState {
  return {
    status: "starting",
    consecutiveFailures: 0,
    backoff: { attempt: 0 },
  };
}

/** `min(base * 2^attempt, max)`, where `attempt` counts restarts already decided. */
export function computeBackoffDelay(
  attempt: number,
  options: Pick<ResolvedRestartPolicyOptions, "backoffBaseMs" | "backoffMaxMs">,
): number {
  const exponent = Math.max(0, Math.floor(attempt));
  return Math.min(options.backoffBaseMs * 2 ** exponent, options.backoffMaxMs);
}

export function isRestartEligible(state: PolicyState, now: number): boolean {
  return typeof state.backoff.nextEligibleAt === "number" && now >= state.backoff.nextEligibleAt;
}

function decideRestart(
  state: PolicyState,
  now: number,
  options: ResolvedRestartPolicyOptions,
): PolicyTransition {
  const delayMs = computeBackoffDelay(state.backoff.attempt, options);
  const attempt = state.backoff.attempt + 1;
  const eligibleAt = now + delayMs;
  return {
    state: {
      ...state,
      status: "failed",
      backoff: { attempt, nextEligibleAt: eligibleAt },
    },
    action: { type: "schedule_restart", delayMs, eligibleAt, attempt },
  };
}

function onFailure(
  state: PolicyState,
  now: number,
  options: ResolvedRestartPolicyOptions,
  spawnFailed: boolean,
): PolicyTransition {
  const failed: PolicyState = {
    ...state,
    consecutiveFailures: state.consecutiveFailures + 1,
  };
  if (failed.consecutiveFailures < options.failureThreshold) {
    return { state: { ...failed, status: "degraded" }, action: NO_ACTION };
  }
  const pending = typeof failed.backoff.nextEligibleAt === "number";
  if (spawnFailed || !pending) {
    return decideRestart(failed, now, options);
  }
  return {
    state: { ...failed, status: "failed" },
    action: isRestartEligible(failed, now) ? { type: "restart_now" } : NO_ACTION,
  };
}

/**
 * Pure restart state machine. Callers pass `now` and act on the returned action;
 * the state they pass in is never mutated.
 */
export function transition(
  state: PolicyState,
  event: PolicyEvent,
  now: number,
  options: ResolvedRestartPolicyOptions = DEFAULT_RESTART_POLICY,
): PolicyTransition {
  switch (event.type) {
    case "check_succeeded":
      return {
        state: {
          status: "healthy",
          consecutiveFailures: 0,
          backoff: { attempt: 0 },
        },
        action: NO_ACTION,
      };
    case "check_failed":
      return onFailure(state, now, options, false);
    case "spawn_failed":
      return onFailure(state, now, options, true);
    case "restarted":
      return {
        state: {
          status: "starting",
          consecutiveFailures: 0,
          backoff: { attempt: state.backoff.attempt },
        },
        action: NO_ACTION,
      };
  }
}
