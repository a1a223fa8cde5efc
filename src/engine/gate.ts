import { CommandCancelledError } from "./errors.js";

export type ReleaseGate = () => void;

export interface PriorityGate {
  acquire: ({
    priority,
    signal,
  }?: {
    priority?: boolean;
    signal?: AbortSignal;
  }) => Promise<ReleaseGate>;
  isHeld: () => boolean;
  getWaitingCount: () => number;
}

interface Waiter {
  grant: () => void;
}

/**
 * Single-holder gate with two FIFO lanes. A freed gate goes to the oldest
 * priority waiter, then the oldest normal waiter; the holder is never preempted.
 */
export const createPriorityGate = (): PriorityGate => {
  let held = false;
  const priorityLane: Waiter[] = [];
  const normalLane: Waiter[] = [];

  const makeRelease = (): ReleaseGate => {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      const next = priorityLane.shift() ?? normalLane.shift();
      if (next) {
        next.grant();
        return;
      }
      held = false;
    };
  };

  const acquire: PriorityGate["acquire"] = ({ priority = false, signal } = {}) =>
    new Promise<ReleaseGate>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new CommandCancelledError("cancelled before acquiring the gate"));
        return;
      }
      if (!held) {
        held = true;
        resolve(makeRelease());
        return;
      }
      const lane = priority ? priorityLane : normalLane;
      const onAbort = (): void => {
        const idx = lane.indexOf(waiter);
        if (idx !== -1) {
          lane.splice(idx, 1);
        }
        reject(new CommandCancelledError("cancelled while waiting for the gate"));
      };
      const waiter: Waiter = {
        grant: () => {
          signal?.removeEventListener("abort", onAbort);
          resolve(makeRelease());
        },
      };
      lane.push(waiter);
      signal?.addEventListener("abort", onAbort, { once: true });
    });

  return {
    acquire,
    isHeld: () => held,
    getWaitingCount: () => priorityLane.length + normalLane.length,
  };
};
