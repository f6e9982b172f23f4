import {
  DEFAULT_PRIORITY_BASE,
  ExitCode,
  formatFrequency,
  HearthError,
  type ParsedFrequency,
  parseAvoidFlags,
  parseCategory,
  parseFrequency,
  parseWeekday,
  type RulePatch,
  type Task,
  toTaskInput,
} from "@hearth/core";
import { Command } from "commander";
import { getContext } from "../lib/context.js";
import { exitWithError } from "../lib/errors.js";
import { outputSuccess } from "../lib/json-output.js";
import { parseIntOption } from "../lib/parse.js";

interface TaskAddOptions {
  frequency?: string;
  every?: string;
  hygiene?: string;
  category?: string;
  avoid?: string;
  base?: string;
  on?: string;
  description?: string;
  json?: boolean;
}

interface TaskListOptions {
  room?: string;
  asleep?: boolean;
  json?: boolean;
}

interface SetRuleOptions {
  base?: string;
  on?: string;
  json?: boolean;
}

function readFrequency(options: TaskAddOptions): ParsedFrequency | null {
  if (options.every !== undefined) {
    return { label: null, intervalDays: parseIntOption(options.every, "Interval") };
  }
  if (options.frequency === undefined) return null;

  const frequency = parseFrequency(options.frequency);
  if (!frequency) {
    throw new HearthError(`Unknown frequency '${options.frequency}'`, ExitCode.VALIDATION);
  }
  return frequency;
}

export function formatTaskLine(task: Task): string {
  const flags = [
    task.targetWeekday ? `on ${task.targetWeekday}` : null,
    task.priorityBase !== DEFAULT_PRIORITY_BASE ? `base ${task.priorityBase}` : null,
    task.active ? null : "asleep",
  ].filter((f) => f !== null);

  const suffix = flags.length > 0 ? ` [${flags.join(", ")}]` : "";
  return `  [${task.id.slice(0, 8)}] ${task.roomName}/${task.name}  ${formatFrequency(task.frequency, task.intervalDays)}, hygiene ${task.hygienePriority}${suffix}`;
}

export const taskCommand = new Command("task").description("Manage household tasks");

taskCommand
  .command("add")
  .description("Add a task to a room")
  .argument("<room>", "Room name or id")
  .argument("<name>", "Task name")
  .option("-f, --frequency <label>", "daily, several-weekly, weekly, biweekly, monthly, seasonal or occasional")
  .option("-e, --every <days>", "Explicit period in days")
  .option("-p, --hygiene <n>", "Hygiene priority (higher is more urgent)")
  .option("-c, --category <category>", "watering, mowing or other")
  .option("-a, --avoid <conditions>", "Comma list of rain, wind, snow, frost, night, or none")
  .option("-b, --base <n>", "Rule priority base")
  .option("--on <weekday>", "Pin the task to a weekday")
  .option("-d, --description <text>", "Task description")
  .option("-j, --json", "Output as JSON")
  .action((roomRef: string, name: string, options: TaskAddOptions) => {
    const json = options.json;
    try {
      const { householdService, taskService } = getContext();
      const room = householdService.resolveRoom(roomRef);

      const input = toTaskInput(room.id, room.name, {
        name,
        description: options.description ?? null,
        frequency: readFrequency(options),
        hygienePriority: options.hygiene !== undefined ? parseIntOption(options.hygiene, "Hygiene priority") : null,
        avoid: options.avoid !== undefined ? parseAvoidFlags(options.avoid) : null,
        category: options.category !== undefined ? parseCategory(options.category) : null,
        targetWeekday: options.on !== undefined ? parseWeekday(options.on) : null,
        priorityBase: options.base !== undefined ? parseIntOption(options.base, "Priority base") : null,
      });
      const task = taskService.addTask(input);

      if (json) {
        outputSuccess(task);
        return;
      }
      console.log(`Created task [${task.id.slice(0, 8)}] "${task.name}"`);
      console.log(`  Room: ${task.roomName}`);
      console.log(`  Schedule: ${formatFrequency(task.frequency, task.intervalDays)}`);
    } catch (error) {
      exitWithError(error, json);
    }
  });

taskCommand
  .command("list")
  .description("List tasks")
  .option("-r, --room <room>", "Only tasks in this room")
  .option("--asleep", "Only sleeping tasks")
  .option("-j, --json", "Output as JSON")
  .action((options: TaskListOptions) => {
    const json = options.json;
    try {
      const { householdService, taskService } = getContext();
      const roomId = options.room !== undefined ? householdService.resolveRoom(options.room).id : undefined;
      const tasks = taskService.listTasks({ roomId, active: options.asleep ? false : undefined });

      if (json) {
        outputSuccess(tasks);
        return;
      }
      if (tasks.length === 0) {
        console.log("No tasks found.");
        return;
      }
      for (const task of tasks) {
        console.log(formatTaskLine(task));
      }
    } catch (error) {
      exitWithError(error, json);
    }
  });

taskCommand
  .command("set-rule")
  .description("Change a task's priority base or weekday pin")
  .argument("<task>", "Task id or Room/Task name")
  .option("-b, --base <n>", "Rule priority base")
  .option("--on <weekday>", "Pin to a weekday, or 'none' to unpin")
  .option("-j, --json", "Output as JSON")
  .action((ref: string, options: SetRuleOptions) => {
    const json = options.json;
    try {
      const { taskService } = getContext();
      const task = taskService.resolveTask(ref);

      const patch: RulePatch = {};
      if (options.base !== undefined) {
        patch.priorityBase = parseIntOption(options.base, "Priority base");
      }
      if (options.on !== undefined) {
        patch.targetWeekday = options.on.trim().toLowerCase() === "none" ? null : parseWeekday(options.on);
      }
      if (patch.priorityBase === undefined && patch.targetWeekday === undefined) {
        throw new HearthError("Nothing to change. Pass --base or --on", ExitCode.VALIDATION);
      }

      const updated = taskService.setRule(task.id, patch);

      if (json) {
        outputSuccess(updated);
        return;
      }
      console.log(formatTaskLine(updated));
    } catch (error) {
      exitWithError(error, json);
    }
  });
