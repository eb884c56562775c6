import { describe, expect, it } from "vitest";
import {
  computeBackoffDelay,
  DEFAULT_RESTART_POLICY,
  initialPolicyState,
  resolveRestartPolicyOptions,
  transition,
  type PolicyAction,
  type PolicyEvent,
  type PolicyState,
} from "../src/health/restart-policy.js";

const options = DEFAULT_RESTART_POLICY;

function run(
  state: PolicyState,
  events: PolicyEvent["type"][],
  now = 0,
): { state: PolicyState; actions: PolicyAction[] } {
  const actions: PolicyAction[] = [];
  let current = state;
  for (const type of events) {
    const next = transition(current, { type }, now, options);
    current = next.state;
    actions.push(next.action);
  }
  return { state: current, actions };
}

describe("computeBackoffDelay", () => {
  it("doubles from the base and caps at the maximum", () => {
    const delays = Array.from({ length: 9 }, (_, attempt) => computeBackoffDelay(attempt, options));
    expect(delays).toEqual([1_000, 2_000, 4_000, 8_000, 16_000, 32_000, 60_000, 60_000, 60_000]);
  });

  it("stays capped for very large attempts", () => {
    expect(computeBackoffDelay(5_000, options)).toBe(60_000);
  });
});

describe("resolveRestartPolicyOptions", () => {
  it("applies defaults and clamps nonsense values", () => {
    expect(resolveRestartPolicyOptions()).toEqual({
      failureThreshold: 3,
      backoffBaseMs: 1_000,
      backoffMaxMs: 60_000,
    });
    expect(
      resolveRestartPolicyOptions({ failureThreshold: 0, backoffBaseMs: 5_000, backoffMaxMs: 10 }),
    ).toEqual({ failureThreshold: 1, backoffBaseMs: 5_000, backoffMaxMs: 5_000 });
  });
});

describe("restart policy transitions", () => {
  it("degrades below the threshold and fails exactly at it", () => {
    const statuses: string[] = [];
    let state = initialPolicyState();
    const actions: PolicyAction["type"][] = [];
    for (let i = 0; i < 3; i += 1) {
      const next = transition(state, { type: "check_failed" }, 10_000, options);
      state = next.state;
      statuses.push(state.status);
      actions.push(next.action.type);
    }
    expect(statuses).toEqual(["degraded", "degraded", "failed"]);
    expect(actions).toEqual(["none", "none", "schedule_restart"]);
    expect(state.consecutiveFailures).toBe(3);
    expect(state.backoff).toEqual({ attempt: 1, nextEligibleAt: 11_000 });
  });

  it("resets the failure count to zero on a single success", () => {
    const degraded = run(initialPolicyState(), ["check_failed", "check_failed"]).state;
    expect(degraded.consecutiveFailures).toBe(2);

    const next = transition(degraded, { type: "check_succeeded" }, 0, options);
    expect(next.state.consecutiveFailures).toBe(0);
    expect(next.state.status).toBe("healthy");
    expect(next.action).toEqual({ type: "none" });
  });

  it("does not mutate the state it is given", () => {
    const state = Object.freeze({
      status: "healthy" as const,
      consecutiveFailures: 2,
      backoff: Object.freeze({ attempt: 1 }),
    });
    const next = transition(state, { type: "check_failed" }, 0, options);
    expect(state.consecutiveFailures).toBe(2);
    expect(next.state).not.toBe(state);
  });

  it("waits for the backoff window before asking for a restart", () => {
    const failed = run(initialPolicyState(), ["check_failed", "check_failed", "check_failed"], 0);
    expect(failed.state.backoff.nextEligibleAt).toBe(1_000);

    const early = transition(failed.state, { type: "check_failed" }, 999, options);
    expect(early.action).toEqual({ type: "none" });
    expect(early.state.status).toBe("failed");
    expect(early.state.backoff.nextEligibleAt).toBe(1_000);

    const due = transition(early.state, { type: "check_failed" }, 1_000, options);
    expect(due.action).toEqual({ type: "restart_now" });
  });

  it("escalates the delay across consecutive restarts without a success", () => {
    let state = initialPolicyState();
    const delays: number[] = [];
    for (let k = 0; k < 8; k += 1) {
      for (let i = 0; i < 3; i += 1) {
        const next = transition(state, { type: "check_failed" }, 0, options);
        state = next.state;
        if (next.action.type === "schedule_restart") {
          delays.push(next.action.delayMs);
        }
      }
      state = transition(state, { type: "restarted" }, 0, options).state;
      expect(state.status).toBe("starting");
      expect(state.consecutiveFailures).toBe(0);
    }
    expect(delays).toEqual([1_000, 2_000, 4_000, 8_000, 16_000, 32_000, 60_000, 60_000]);
  });

  it("treats a failed respawn as another failure and backs off again", () => {
    const failed = run(initialPolicyState(), ["check_failed", "check_failed", "check_failed"], 0);
    const next = transition(failed.state, { type: "spawn_failed" }, 1_000, options);
    expect(next.state.consecutiveFailures).toBe(4);
    expect(next.state.status).toBe("failed");
    expect(next.action).toEqual({
      type: "schedule_restart",
      delayMs: 2_000,
      eligibleAt: 3_000,
      attempt: 2,
    });
  });

  it("counts an initial spawn failure without skipping degraded", () => {
    const next = transition(initialPolicyState(), { type: "spawn_failed" }, 0, options);
    expect(next.state.status).toBe("degraded");
    expect(next.action).toEqual({ type: "none" });
  });

  it("starts over at the base delay after recovering", () => {
    let state = run(initialPolicyState(), ["check_failed", "check_failed", "check_failed"]).state;
    state = transition(state, { type: "restarted" }, 0, options).state;
    expect(state.backoff.attempt).toBe(1);

    state = run(state, ["check_failed", "check_failed", "check_succeeded"]).state;
    expect(state.backoff.attempt).toBe(0);

    const { actions } = run(state, ["check_failed", "check_failed", "check_failed"], 50_000);
    expect(actions[2]).toEqual({
      type: "schedule_restart",
      delayMs: 1_000,
      eligibleAt: 51_000,
      attempt: 1,
    });
  });

  it("cancels a pending restart when the tunnel recovers on its own", () => {
    const failed = run(initialPolicyState(), ["check_failed", "check_failed", "check_failed"]).state;
    const next = transition(failed, { type: "check_succeeded" }, 500, options);
    expect(next.state.backoff).toEqual({ attempt: 0 });
    expect(next.state.status).toBe("healthy");
  });

  it("fails on the first failure when the threshold is one", () => {
    const strict = resolveRestartPolicyOptions({ failureThreshold: 1 });
    const next = transition(initialPolicyState(), { type: "check_failed" }, 0, strict);
    expect(next.state.status).toBe("failed");
    expect(next.action.type).toBe("schedule_restart");
  });
});
