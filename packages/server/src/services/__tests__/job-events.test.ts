import { describe, it, beforeEach } from "node:test";
import assert from "node:assert/strict";
import pino from "pino";
import type { BrokerEvent } from "@gpubroker/shared";
import { JobEventHub } from "../job-events.js";
import { JobStateStore } from "../job-state-store.js";
import { MemoryStateBackend } from "../state-backend.js";

const log = pino({ level: "silent" });

describe("JobEventHub", () => {
  let store: JobStateStore;
  let hub: JobEventHub;
  let events: BrokerEvent[];

  beforeEach(() => {
    store = new JobStateStore(new MemoryStateBackend(), log, { lockPollMs: 1 }, () => 100);
    hub = new JobEventHub(null, log, undefined, () => 7);
    hub.attach(store);
    events = [];
    hub.subscribe((e) => events.push(e));
  });

  it("emits a transition for a new job, then the update", async () => {
    await store.create({ gpuType: "H100", count: 1 }, "job-1");

    assert.deepEqual(
      events.map((e) => e.type),
      ["job-transition", "job-update"],
    );
    assert.deepEqual(events[0].data, {
      jobId: "job-1",
      status: "pending",
      previousStatus: null,
      version: 1,
      timestamp: 7,
    });
  });

  it("emits only an update when the status is unchanged", async () => {
    await store.create({ gpuType: "H100", count: 1 }, "job-1");
    events = [];

    await store.update("job-1", (j) => ({ ...j, warnings: ["note"] }));

    assert.deepEqual(
      events.map((e) => e.type),
      ["job-update"],
    );
  });

  it("reports the previous status on a transition", async () => {
    await store.create({ gpuType: "H100", count: 1 }, "job-1");
    events = [];

    await store.update("job-1", (j) => ({ ...j, status: "provisioning" }));

    const [first] = events;
    assert.equal(first.type, "job-transition");
    if (first.type === "job-transition") {
      assert.equal(first.data.previousStatus, "pending");
      assert.equal(first.data.status, "provisioning");
      assert.equal(first.data.version, 2);
    }
  });

  it("keeps delivering when one listener throws", () => {
    const seen: string[] = [];
    hub.subscribe(() => {
      throw new Error("listener broke");
    });
    hub.subscribe((e) => seen.push(e.type));

    hub.emit({ type: "heartbeat", data: { timestamp: 1 } });

    assert.deepEqual(seen, ["heartbeat"]);
  });
});
