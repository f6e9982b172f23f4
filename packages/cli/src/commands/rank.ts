import {
  buildContext,
  describeHint,
  describeReason,
  type EvaluatedTask,
  evaluateAll,
  rank,
  validateLimit,
} from "@hearth/core";
import { Command } from "commander";
import { getContext } from "../lib/context.js";
import { exitWithError } from "../lib/errors.js";
import { outputSuccess } from "../lib/json-output.js";
import { parseInstant, parseIntOption } from "../lib/parse.js";
import { fetchHouseholdWeather } from "../lib/weather.js";

interface RankCommandOptions {
  room?: string;
  limit?: string;
  allHidden?: boolean;
  weather: boolean;
  at?: string;
  json?: boolean;
}

function toJson(item: EvaluatedTask) {
  return {
    taskId: item.task.id,
    room: item.task.roomName,
    task: item.task.name,
    daysSince: item.daysSince,
    visible: item.verdict.visible,
    score: item.verdict.score,
    reason: item.verdict.reason,
    reasonText: describeReason(item.verdict.reason),
    nextDue: describeHint(item.verdict.nextDueHint),
  };
}

function formatItem(item: EvaluatedTask, position: number): string {
  const { verdict, task } = item;
  const label = `${task.roomName}/${task.name}`;
  if (!verdict.visible) {
    return `   -  ${label}  (${describeReason(verdict.reason)}; next: ${describeHint(verdict.nextDueHint)})`;
  }
  return `  ${String(position).padStart(2)}. ${label}  [${verdict.score}] ${describeReason(verdict.reason)}`;
}

export const rankCommand = new Command("rank")
  .description("Show what to do now, most urgent first")
  .option("-r, --room <room>", "Only tasks in this room")
  .option("-l, --limit <n>", "Max tasks (default: config ranking.auditLimit, unlimited with --room)")
  .option("--all-hidden", "Also list hidden tasks with the reason they are hidden")
  .option("--no-weather", "Skip the weather forecast")
  .option("--at <iso>", "Rank as of this instant instead of now")
  .option("-j, --json", "Output as JSON")
  .action(async (options: RankCommandOptions) => {
    const json = options.json;
    try {
      const { config, householdService, taskService } = getContext();
      const { timeZone } = config.household;
      const now = options.at !== undefined ? parseInstant(options.at) : new Date();

      const room = options.room !== undefined ? householdService.resolveRoom(options.room) : null;
      const limit =
        options.limit !== undefined
          ? validateLimit(parseIntOption(options.limit, "Limit"))
          : room
            ? undefined
            : config.ranking.auditLimit;

      const catalog = taskService.fetchCatalog(now, { roomId: room?.id, timeZone });
      const weather = await fetchHouseholdWeather(config, { enabled: options.weather });
      const ctx = buildContext(now, weather, { timeZone });

      if (options.allHidden) {
        const items = evaluateAll(catalog, ctx);
        if (json) {
          outputSuccess({ weather: ctx.weatherText, items: items.map(toJson) });
          return;
        }
        console.log(`\n  Weather: ${ctx.weatherText}\n`);
        let position = 0;
        for (const item of items) {
          if (item.verdict.visible) position++;
          console.log(formatItem(item, position));
        }
        console.log();
        return;
      }

      const ranked = rank(catalog, ctx, { limit });
      if (json) {
        outputSuccess({ weather: ctx.weatherText, items: ranked.map(toJson) });
        return;
      }

      console.log(`\n  Weather: ${ctx.weatherText}\n`);
      if (ranked.length === 0) {
        console.log("  Nothing to do right now.");
      }
      ranked.forEach((item, index) => console.log(formatItem(item, index + 1)));
      console.log();
    } catch (error) {
      exitWithError(error, json);
    }
  });
