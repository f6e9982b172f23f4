import type { TaskCategory } from "../../../types.js";
import type { TaskGate } from "../types.js";

const WINTER_MONTHS = new Set([12, 1, 2]);
const SEASONAL_CATEGORIES = new Set<TaskCategory>(["watering", "mowing"]);

/**
 * Winter gate - frost-sensitive garden work (watering, mowing) waits for spring.
 */
export const winterGate: TaskGate = {
  name: "winter",
  description: "Defer frost-sensitive watering and mowing during Dec-Feb",

  check(task, ctx) {
    if (!WINTER_MONTHS.has(ctx.month)) return null;
    if (!task.avoidFrost || !SEASONAL_CATEGORIES.has(task.category)) return null;
    return { reason: { code: "WINTER" }, nextDueHint: { kind: "next-spring" } };
  },
};
