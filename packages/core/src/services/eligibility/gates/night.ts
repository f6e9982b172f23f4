import type { TaskGate } from "../types.js";

export const NIGHT_START_HOUR = 20;
export const MORNING_HOUR = 7;

export function isNightHour(hour: number): boolean {
  return hour >= NIGHT_START_HOUR || hour < MORNING_HOUR;
}

export const nightGate: TaskGate = {
  name: "night",
  description: "Defer noisy or daylight tasks between 20:00 and 07:00",

  check(task, ctx) {
    if (!task.avoidNight || !isNightHour(ctx.hourOfDay)) return null;
    return { reason: { code: "NIGHT" }, nextDueHint: { kind: "tomorrow-morning" } };
  },
};
