import type { Weekday } from "../../types.js";
import type { NextDueHint, Reason } from "./types.js";

function capitalize(weekday: Weekday): string {
  return weekday.charAt(0).toUpperCase() + weekday.slice(1);
}

export function describeReason(reason: Reason): string {
  switch (reason.code) {
    case "DORMANT":
      return "dormant one-off task";
    case "NIGHT":
      return "deferred: nighttime";
    case "WINTER":
      return "deferred: winter season";
    case "RAIN":
      return "deferred: raining";
    case "WIND":
      return "deferred: too windy";
    case "FROST":
      return "deferred: frost risk";
    case "WRONG_WEEKDAY":
      return `scheduled for ${capitalize(reason.weekday)}`;
    case "NOT_YET_DUE":
      return "not yet due";
    case "DONE_TODAY":
      return "already done today";
    case "OVERDUE":
      return `overdue by ${reason.delayDays} days`;
    case "NEVER_DONE":
      return "never done (one-off)";
    case "WEEKDAY_MATCH":
      return "today is the day";
    case "REACTIVATED":
      return "reactivated one-off task";
  }
}

export function describeHint(hint: NextDueHint): string {
  switch (hint.kind) {
    case "on-demand":
      return "on demand";
    case "tomorrow-morning":
      return "tomorrow morning";
    case "next-spring":
      return "next spring";
    case "when-clear":
      return "as soon as it clears";
    case "in-days":
      return `in ${hint.days} days`;
    case "today":
      return "today";
    case "asap":
      return "as soon as possible";
    case "now":
      return "now";
  }
}
