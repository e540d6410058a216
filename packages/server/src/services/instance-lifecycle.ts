import type { Instance, InstanceState } from "@gpubroker/shared";
import { InvalidTransitionError } from "../errors.js";

const FORWARD: Record<InstanceState, readonly InstanceState[]> = {
  requested: ["provisioning", "failed"],
  provisioning: ["running", "stopping", "failed"],
  running: ["stopping", "failed"],
  stopping: ["terminated", "failed"],
  terminated: [],
  failed: [],
};

/** Moves only forward; staying put is a no-op. */
export function canTransition(from: InstanceState, to: InstanceState): boolean {
  return from === to || FORWARD[from].includes(to);
}

/**
 * Returns a copy of `instance` in state `to`. Leaving a live state stamps
 * `endedAt`; reaching Running for the first time stamps `startedAt`.
 */
export function transition(
  instance: Instance,
  to: InstanceState,
  now: number,
): Instance {
  if (!canTransition(instance.state, to)) {
    throw new InvalidTransitionError(instance.state, to);
  }
  if (instance.state === to) return instance;

  return {
    ...instance,
    state: to,
    startedAt: to === "running" && instance.startedAt === null ? now : instance.startedAt,
    endedAt: isFinal(to) && instance.endedAt === null ? now : instance.endedAt,
  };
}

export function isFinal(state: InstanceState): boolean {
  return state === "terminated" || state === "failed";
}

/** Holds (or may hold) a remote resource. */
export function isActive(instance: Instance): boolean {
  return !isFinal(instance.state);
}
