export * from "./types.js";
export { buildContext, FREEZE_THRESHOLD_C, RAIN_THRESHOLD_MM, WIND_THRESHOLD_KMH } from "./context.js";
export type { BuildContextOptions } from "./context.js";
export { calendarDaysBetween, localDateParts, systemTimeZone } from "./calendar.js";
export type { LocalDateParts } from "./calendar.js";
export {
  evaluate,
  GATES,
  NEVER_DONE_ELAPSED_DAYS,
  REACTIVATED_SCORE,
  WEEKDAY_MATCH_SCORE,
} from "./evaluator.js";
export { evaluateAll, rank } from "./ranker.js";
export { describeHint, describeReason } from "./reasons.js";
export { dormantGate } from "./gates/dormant.js";
export { nightGate, isNightHour } from "./gates/night.js";
export { winterGate } from "./gates/winter.js";
export { weatherGate } from "./gates/weather.js";
