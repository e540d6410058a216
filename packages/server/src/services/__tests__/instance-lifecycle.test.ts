import { describe, it } from "node:test";
import assert from "node:assert/strict";
import type { Instance, InstanceState } from "@gpubroker/shared";
import { canTransition, isActive, isFinal, transition } from "../instance-lifecycle.js";
import { InvalidTransitionError } from "../../errors.js";

const STATES: InstanceState[] = ["requested", "provisioning", "running", "stopping", "terminated", "failed"];

function instance(state: InstanceState, overrides: Partial<Instance> = {}): Instance {
  return {
    instanceId: "inst-1",
    unitKey: "vastai:h100-1x:us-east:0",
    provider: "vastai",
    instanceType: "h100-1x",
    region: "us-east",
    remoteId: null,
    address: null,
    state,
    pricePerHour: 2,
    accruedCost: 0,
    attempts: 0,
    startedAt: null,
    endedAt: null,
    ...overrides,
  };
}

describe("canTransition", () => {
  it("walks the forward path", () => {
    assert.equal(canTransition("requested", "provisioning"), true);
    assert.equal(canTransition("provisioning", "running"), true);
    assert.equal(canTransition("running", "stopping"), true);
    assert.equal(canTransition("stopping", "terminated"), true);
    assert.equal(canTransition("provisioning", "stopping"), true);
  });

  it("reaches Failed from every non-terminal state", () => {
    for (const from of ["requested", "provisioning", "running", "stopping"] as const) {
      assert.equal(canTransition(from, "failed"), true, from);
    }
  });

  it("rejects every backward move", () => {
    assert.equal(canTransition("stopping", "running"), false);
    assert.equal(canTransition("running", "provisioning"), false);
    assert.equal(canTransition("provisioning", "requested"), false);
    assert.equal(canTransition("running", "requested"), false);
  });

  it("never leaves a terminal state", () => {
    for (const from of ["terminated", "failed"] as const) {
      for (const to of STATES) {
        assert.equal(canTransition(from, to), from === to, `${from} -> ${to}`);
      }
    }
  });

  it("does not skip Provisioning or Stopping", () => {
    assert.equal(canTransition("requested", "running"), false);
    assert.equal(canTransition("running", "terminated"), false);
  });
});

describe("transition", () => {
  it("stamps startedAt on first reaching Running", () => {
    const next = transition(instance("provisioning"), "running", 100);

    assert.equal(next.state, "running");
    assert.equal(next.startedAt, 100);
    assert.equal(next.endedAt, null);
  });

  it("keeps an earlier startedAt", () => {
    const next = transition(instance("provisioning", { startedAt: 50 }), "running", 100);

    assert.equal(next.startedAt, 50);
  });

  it("stamps endedAt on reaching a final state", () => {
    const stopped = transition(instance("stopping", { startedAt: 10 }), "terminated", 200);
    const failed = transition(instance("requested"), "failed", 300);

    assert.equal(stopped.endedAt, 200);
    assert.equal(stopped.startedAt, 10);
    assert.equal(failed.endedAt, 300);
  });

  it("returns the same record when the state does not change", () => {
    const current = instance("running");

    assert.equal(transition(current, "running", 100), current);
  });

  it("throws on a backward move", () => {
    assert.throws(() => transition(instance("stopping"), "running", 100), {
      name: "InvalidTransitionError",
      message: "Instance cannot move from stopping to running",
    });
    assert.throws(() => transition(instance("terminated"), "failed", 100), InvalidTransitionError);
  });
});

describe("isFinal / isActive", () => {
  it("treats only Terminated and Failed as final", () => {
    assert.deepEqual(
      STATES.filter((s) => isFinal(s)),
      ["terminated", "failed"],
    );
    assert.deepEqual(
      STATES.filter((s) => isActive(instance(s))),
      ["requested", "provisioning", "running", "stopping"],
    );
  });
});
