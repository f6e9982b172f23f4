import { evaluate } from "./evaluator.js";
import type {
  CatalogEntry,
  EnvironmentContext,
  EvaluatedTask,
  RankedItem,
  RankOptions,
} from "./types.js";

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function compareEvaluated(a: EvaluatedTask, b: EvaluatedTask): number {
  return (
    b.verdict.score - a.verdict.score ||
    compareText(a.task.roomName, b.task.roomName) ||
    compareText(a.task.name, b.task.name)
  );
}

/**
 * Evaluate every entry, visible or not, in ranking order.
 */
export function evaluateAll(entries: CatalogEntry[], ctx: EnvironmentContext): EvaluatedTask[] {
  return entries
    .map((entry) => ({ ...entry, verdict: evaluate(entry.task, entry.daysSince, ctx) }))
    .sort(compareEvaluated);
}

/**
 * Visible tasks only, highest score first, ties by room then task name.
 */
export function rank(
  entries: CatalogEntry[],
  ctx: EnvironmentContext,
  options: RankOptions = {},
): RankedItem[] {
  const visible = evaluateAll(entries, ctx).filter((item) => item.verdict.visible);
  return options.limit === undefined ? visible : visible.slice(0, options.limit);
}
