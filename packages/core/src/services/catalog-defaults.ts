import type { TaskCategory } from "../types.js";

/** Interval in days for each catalog frequency label; null means one-off. */
export const FREQUENCY_INTERVALS: Record<string, number | null> = {
  daily: 1,
  "several-weekly": 3,
  weekly: 7,
  biweekly: 14,
  monthly: 30,
  seasonal: 90,
  occasional: null,
};

export const DEFAULT_FREQUENCY = "occasional";

const EVERY_N_DAYS = /^every\s+(\d+)\s+days?$/i;

export interface ParsedFrequency {
  label: string | null;
  intervalDays: number | null;
}

/**
 * Parse a frequency label ("weekly") or an explicit period ("every 10 days").
 * Returns null when the text is neither.
 */
export function parseFrequency(text: string): ParsedFrequency | null {
  const normalized = text.trim().toLowerCase();
  if (Object.hasOwn(FREQUENCY_INTERVALS, normalized)) {
    return { label: normalized, intervalDays: FREQUENCY_INTERVALS[normalized] ?? null };
  }
  const match = normalized.match(EVERY_N_DAYS);
  if (match?.[1]) {
    return { label: null, intervalDays: parseInt(match[1], 10) };
  }
  return null;
}

export function formatFrequency(label: string | null, intervalDays: number | null): string {
  if (label && Object.hasOwn(FREQUENCY_INTERVALS, label) && FREQUENCY_INTERVALS[label] === intervalDays) {
    return label;
  }
  if (intervalDays && intervalDays > 0) {
    return `every ${intervalDays} days`;
  }
  return DEFAULT_FREQUENCY;
}

const OUTDOOR_ROOM_KEYWORDS = ["outdoor", "outside", "exterior", "garage", "garden", "terrace", "patio", "yard"];
const NIGHT_AVOID_TASK_KEYWORDS = ["window", "glass", "garden", "terrace", "garage", "patio"];
const TRASH_TASK_KEYWORDS = ["trash", "garbage", "rubbish", "waste", "recycl", "bins"];

const hasKeyword = (text: string, keywords: string[]) => keywords.some((k) => text.includes(k));

/**
 * Suggest night avoidance for a newly catalogued task: outdoor rooms and
 * window or garden work are daylight jobs, taking the bins out is not.
 */
export function guessAvoidNight(roomName: string, taskName: string): boolean {
  const room = roomName.toLowerCase();
  const task = taskName.toLowerCase();
  if (hasKeyword(task, TRASH_TASK_KEYWORDS)) return false;
  return hasKeyword(room, OUTDOOR_ROOM_KEYWORDS) || hasKeyword(task, NIGHT_AVOID_TASK_KEYWORDS);
}

const CATEGORY_KEYWORDS: Array<[TaskCategory, string[]]> = [
  ["watering", ["watering", "water the", "water plants", "irrigat", "sprinkler"]],
  ["mowing", ["mow", "lawn"]],
];

/** Category suggested from the task name when the catalog gives none. */
export function guessCategory(taskName: string): TaskCategory {
  const name = taskName.toLowerCase();
  for (const [category, keywords] of CATEGORY_KEYWORDS) {
    if (hasKeyword(name, keywords)) return category;
  }
  return "other";
}
