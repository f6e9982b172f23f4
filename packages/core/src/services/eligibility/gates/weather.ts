import type { TaskGate } from "../types.js";

/**
 * Weather gate - rain, then wind, then frost; the first avoided condition wins.
 * Snow has no flag in the context, so `avoidSnow` never defers a task here.
 */
export const weatherGate: TaskGate = {
  name: "weather",
  description: "Defer tasks that avoid the current rain, wind or frost",

  check(task, ctx) {
    if (task.avoidRain && ctx.isRaining) {
      return { reason: { code: "RAIN" }, nextDueHint: { kind: "when-clear" } };
    }
    if (task.avoidWind && ctx.isWindy) {
      return { reason: { code: "WIND" }, nextDueHint: { kind: "when-clear" } };
    }
    if (task.avoidFrost && ctx.isFreezing) {
      return { reason: { code: "FROST" }, nextDueHint: { kind: "when-clear" } };
    }
    return null;
  },
};
