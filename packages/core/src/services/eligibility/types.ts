import type { Task, Weekday } from "../../types.js";

/**
 * One-day forecast summary. Any field may be missing when the provider
 * could not supply it.
 */
export interface WeatherSummary {
  minTempC: number | null;
  maxTempC?: number | null;
  maxWindKmh: number | null;
  precipitationMm: number | null;
}

export interface EnvironmentContext {
  isRaining: boolean;
  isWindy: boolean;
  isFreezing: boolean;
  weatherText: string;
  /** 0 = Monday .. 6 = Sunday */
  weekdayIndex: number;
  /** 0-23, household local time */
  hourOfDay: number;
  /** 1-12 */
  month: number;
}

/** The task fields the evaluator reads. */
export type EligibilityTask = Pick<
  Task,
  | "intervalDays"
  | "hygienePriority"
  | "priorityBase"
  | "category"
  | "avoidRain"
  | "avoidWind"
  | "avoidSnow"
  | "avoidFrost"
  | "avoidNight"
  | "targetWeekday"
  | "active"
>;

export type Reason =
  | { code: "DORMANT" }
  | { code: "NIGHT" }
  | { code: "WINTER" }
  | { code: "RAIN" }
  | { code: "WIND" }
  | { code: "FROST" }
  | { code: "WRONG_WEEKDAY"; weekday: Weekday }
  | { code: "NOT_YET_DUE"; daysLeft: number }
  | { code: "DONE_TODAY" }
  | { code: "OVERDUE"; delayDays: number }
  | { code: "NEVER_DONE" }
  | { code: "WEEKDAY_MATCH" }
  | { code: "REACTIVATED" };

export type ReasonCode = Reason["code"];

export type NextDueHint =
  | { kind: "on-demand" }
  | { kind: "tomorrow-morning" }
  | { kind: "next-spring" }
  | { kind: "when-clear" }
  | { kind: "in-days"; days: number }
  | { kind: "today" }
  | { kind: "asap" }
  | { kind: "now" };

export interface Verdict {
  visible: boolean;
  score: number;
  reason: Reason;
  nextDueHint: NextDueHint;
}

/**
 * A precondition that can hide a task whatever its score.
 * Returns the deferral, or null to let the task through.
 */
export interface TaskGate {
  /** Unique identifier */
  name: string;

  /** Human-readable description */
  description: string;

  check(task: EligibilityTask, ctx: EnvironmentContext): GateDeferral | null;
}

export interface GateDeferral {
  reason: Reason;
  nextDueHint: NextDueHint;
}

export interface CatalogEntry {
  task: Task;
  /** Whole local days since the latest completion; null when never done. */
  daysSince: number | null;
}

export interface EvaluatedTask extends CatalogEntry {
  verdict: Verdict;
}

/** An item emitted by `rank`; its verdict is always visible. */
export type RankedItem = EvaluatedTask;

export interface RankOptions {
  /** Keep at most this many items. Unlimited when omitted. */
  limit?: number;
}
