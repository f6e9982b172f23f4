import { ExitCode, HearthError, WEEKDAYS } from "../../types.js";
import { dormantGate } from "./gates/dormant.js";
import { nightGate } from "./gates/night.js";
import { weatherGate } from "./gates/weather.js";
import { winterGate } from "./gates/winter.js";
import type { EligibilityTask, EnvironmentContext, TaskGate, Verdict } from "./types.js";

/** Gates run in this order; the first deferral is final. */
export const GATES: readonly TaskGate[] = [dormantGate, nightGate, winterGate, weatherGate];

export const WEEKDAY_MATCH_SCORE = 1000;
export const REACTIVATED_SCORE = 900;
/** Elapsed days assumed for a recurring task with no recorded completion. */
export const NEVER_DONE_ELAPSED_DAYS = 999;

const HYGIENE_WEIGHT = 10;
const DELAY_WEIGHT = 5;

/**
 * Decide whether a task deserves attention in the given context.
 *
 * Pure: no I/O and no mutation, so the same inputs always give the same verdict.
 * Only a negative interval, which validation rejects upstream, throws.
 */
export function evaluate(
  task: EligibilityTask,
  daysSince: number | null,
  ctx: EnvironmentContext,
): Verdict {
  for (const gate of GATES) {
    const deferral = gate.check(task, ctx);
    if (deferral) {
      return { visible: false, score: 0, ...deferral };
    }
  }

  if (task.targetWeekday !== null) {
    const target = WEEKDAYS.indexOf(task.targetWeekday);
    if (target !== ctx.weekdayIndex) {
      const days = (target - ctx.weekdayIndex + 7) % 7 || 7;
      return {
        visible: false,
        score: 0,
        reason: { code: "WRONG_WEEKDAY", weekday: task.targetWeekday },
        nextDueHint: { kind: "in-days", days },
      };
    }
    return {
      visible: true,
      score: WEEKDAY_MATCH_SCORE,
      reason: { code: "WEEKDAY_MATCH" },
      nextDueHint: { kind: "today" },
    };
  }

  const interval = task.intervalDays ?? 0;
  if (interval < 0) {
    throw new HearthError(
      `Task has a negative recurrence interval (${interval})`,
      ExitCode.GENERAL_ERROR,
    );
  }

  const baseScore = task.priorityBase + task.hygienePriority * HYGIENE_WEIGHT;

  if (interval === 0) {
    if (daysSince === null) {
      return {
        visible: true,
        score: baseScore,
        reason: { code: "NEVER_DONE" },
        nextDueHint: { kind: "asap" },
      };
    }
    // Completion normally puts a one-off task to sleep; being here means it was woken.
    return {
      visible: true,
      score: REACTIVATED_SCORE,
      reason: { code: "REACTIVATED" },
      nextDueHint: { kind: "now" },
    };
  }

  if (daysSince === 0) {
    return {
      visible: false,
      score: 0,
      reason: { code: "DONE_TODAY" },
      nextDueHint: { kind: "in-days", days: interval },
    };
  }

  const elapsed = daysSince ?? NEVER_DONE_ELAPSED_DAYS;
  const delay = elapsed - interval;

  if (delay < 0) {
    return {
      visible: false,
      score: 0,
      reason: { code: "NOT_YET_DUE", daysLeft: -delay },
      nextDueHint: { kind: "in-days", days: -delay },
    };
  }

  return {
    visible: true,
    score: baseScore + delay * DELAY_WEIGHT,
    reason: { code: "OVERDUE", delayDays: delay },
    nextDueHint: { kind: "now" },
  };
}
