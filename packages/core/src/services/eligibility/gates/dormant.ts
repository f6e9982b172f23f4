import type { TaskGate } from "../types.js";

/**
 * Sleep gate - hides tasks put to sleep, normally one-off tasks that were
 * completed and not woken since.
 */
export const dormantGate: TaskGate = {
  name: "dormant",
  description: "Hide inactive tasks until they are woken",

  check(task) {
    if (task.active) return null;
    return { reason: { code: "DORMANT" }, nextDueHint: { kind: "on-demand" } };
  },
};
