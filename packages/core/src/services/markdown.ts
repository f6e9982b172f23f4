import type { AvoidFlag, Room, Task, TaskCategory, Weekday } from "../types.js";
import { AVOID_FLAGS, DEFAULT_PRIORITY_BASE, HearthError } from "../types.js";
import {
  parseAvoidFlags,
  parseCategory,
  parseWeekday,
  validateRoomName,
  validateTaskName,
} from "../validation.js";
import { formatFrequency, type ParsedFrequency, parseFrequency } from "./catalog-defaults.js";

export interface ExportOptions {
  includeIds?: boolean;
}

export interface ParsedTask {
  name: string;
  id?: string;
  description: string | null;
  frequency: ParsedFrequency | null;
  hygienePriority: number | null;
  /** null when the catalog says nothing, [] for an explicit "none" */
  avoid: AvoidFlag[] | null;
  category: TaskCategory | null;
  targetWeekday: Weekday | null;
  priorityBase: number | null;
}

export interface ParsedRoom {
  name: string;
  tasks: ParsedTask[];
}

export interface ParseResult {
  householdName: string;
  rooms: ParsedRoom[];
  errors: string[];
}

function avoidList(task: Task): AvoidFlag[] {
  const set: Record<AvoidFlag, boolean> = {
    rain: task.avoidRain,
    wind: task.avoidWind,
    snow: task.avoidSnow,
    frost: task.avoidFrost,
    night: task.avoidNight,
  };
  return AVOID_FLAGS.filter((flag) => set[flag]);
}

/**
 * Household catalog as Markdown: `## Room` headings, `- Task` bullets and
 * indented metadata lines.
 *
 *     @ weekly          frequency, or "every N days"
 *     @ on: friday      weekday pin
 *     @ base: 60        rule priority base
 *     ! 4               hygiene priority
 *     ~ rain, night     conditions to avoid, or "none"
 *     # watering        category
 *     > text            description
 */
export class MarkdownService {
  exportCatalog(
    household: { name: string },
    rooms: Room[],
    tasksByRoom: Map<string, Task[]>,
    options?: ExportOptions,
  ): string {
    const lines: string[] = [];

    lines.push(`# ${escapeMarkdown(household.name)}`);
    lines.push("");

    const sortedRooms = [...rooms].sort((a, b) => a.name.localeCompare(b.name));

    for (const room of sortedRooms) {
      lines.push(`## ${escapeMarkdown(room.name)}`);
      lines.push("");

      const tasks = tasksByRoom.get(room.id) || [];
      const sortedTasks = [...tasks].sort((a, b) => a.name.localeCompare(b.name));

      for (const task of sortedTasks) {
        if (options?.includeIds) {
          lines.push(`- ${escapeMarkdown(task.name)} <!-- id:${task.id} -->`);
        } else {
          lines.push(`- ${escapeMarkdown(task.name)}`);
        }

        lines.push(`    @ ${formatFrequency(task.frequency, task.intervalDays)}`);
        if (task.targetWeekday) {
          lines.push(`    @ on: ${task.targetWeekday}`);
        }
        if (task.priorityBase !== DEFAULT_PRIORITY_BASE) {
          lines.push(`    @ base: ${task.priorityBase}`);
        }
        lines.push(`    ! ${task.hygienePriority}`);

        const avoid = avoidList(task);
        lines.push(`    ~ ${avoid.length > 0 ? avoid.join(", ") : "none"}`);
        lines.push(`    # ${task.category}`);

        if (task.description) {
          for (const line of task.description.split("\n")) {
            lines.push(`    > ${escapeMarkdown(line)}`);
          }
        }

        lines.push("");
      }
    }

    return lines.join("\n").trimEnd() + "\n";
  }

  parseMarkdown(content: string): ParseResult {
    const lines = content.split("\n");
    const errors: string[] = [];
    let householdName = "Home";
    const rooms: ParsedRoom[] = [];
    let currentRoom: ParsedRoom | null = null;
    let currentTask: ParsedTask | null = null;

    const flushTask = () => {
      if (currentTask && currentRoom) {
        currentRoom.tasks.push(currentTask);
      }
      currentTask = null;
    };

    for (let i = 0; i < lines.length; i++) {
      const line = (lines[i] ?? "").replace(/\r$/, "");
      const lineNum = i + 1;

      if (line.startsWith("# ")) {
        householdName = unescapeMarkdown(line.slice(2).trim());
        continue;
      }

      if (line.startsWith("## ")) {
        flushTask();
        if (currentRoom) {
          rooms.push(currentRoom);
        }
        const roomName = unescapeMarkdown(line.slice(3).trim());
        try {
          currentRoom = { name: validateRoomName(roomName), tasks: [] };
        } catch (error) {
          if (!(error instanceof HearthError)) throw error;
          errors.push(`Line ${lineNum}: ${error.message}`);
          currentRoom = { name: roomName, tasks: [] };
        }
        continue;
      }

      if (line.startsWith("- ")) {
        flushTask();
        if (!currentRoom) {
          errors.push(`Line ${lineNum}: Task listed before any room heading`);
          continue;
        }

        let name = line.slice(2);
        let id: string | undefined;

        const idMatch = name.match(/<!--\s*id:([^\s]+)\s*-->/);
        if (idMatch) {
          id = idMatch[1];
          name = name.replace(idMatch[0], "");
        }

        let taskName: string;
        try {
          taskName = validateTaskName(unescapeMarkdown(name.trim()));
        } catch (error) {
          if (!(error instanceof HearthError)) throw error;
          errors.push(`Line ${lineNum}: ${error.message}`);
          continue;
        }

        currentTask = {
          name: taskName,
          id,
          description: null,
          frequency: null,
          hygienePriority: null,
          avoid: null,
          category: null,
          targetWeekday: null,
          priorityBase: null,
        };
        continue;
      }

      const indentMatch = line.match(/^(\s{4}|\t)/);
      if (!indentMatch || !currentTask) continue;

      const task: ParsedTask = currentTask;
      const text = line.slice(indentMatch[0].length);

      try {
        if (text.startsWith("@ ")) {
          parseScheduleLine(task, text.slice(2).trim(), lineNum, errors);
        } else if (text.startsWith("! ")) {
          const value = text.slice(2).trim();
          if (/^\d+$/.test(value)) {
            task.hygienePriority = parseInt(value, 10);
          } else {
            errors.push(`Line ${lineNum}: Invalid hygiene priority "${value}"`);
          }
        } else if (text.startsWith("~ ")) {
          task.avoid = parseAvoidFlags(text.slice(2));
        } else if (text.startsWith("# ")) {
          task.category = parseCategory(text.slice(2));
        } else if (text.startsWith("> ")) {
          const descLine = unescapeMarkdown(text.slice(2));
          task.description = task.description === null ? descLine : `${task.description}\n${descLine}`;
        }
      } catch (error) {
        if (!(error instanceof HearthError)) throw error;
        errors.push(`Line ${lineNum}: ${error.message}`);
      }
    }

    flushTask();
    if (currentRoom) {
      rooms.push(currentRoom);
    }

    return { householdName, rooms, errors };
  }
}

function parseScheduleLine(task: ParsedTask, value: string, lineNum: number, errors: string[]): void {
  const keyed = value.match(/^(on|base):\s*(.+)$/i);
  if (keyed?.[1] && keyed[2]) {
    const key = keyed[1].toLowerCase();
    const arg = keyed[2].trim();
    if (key === "on") {
      task.targetWeekday = parseWeekday(arg);
    } else if (/^-?\d+$/.test(arg)) {
      task.priorityBase = parseInt(arg, 10);
    } else {
      errors.push(`Line ${lineNum}: Invalid priority base "${arg}"`);
    }
    return;
  }

  const frequency = parseFrequency(value);
  if (frequency) {
    task.frequency = frequency;
  } else {
    errors.push(`Line ${lineNum}: Unknown frequency "${value}"`);
  }
}

function escapeMarkdown(text: string): string {
  return text.replace(/\\/g, "\\\\").replace(/\n/g, " ").replace(/<!--/g, "\\<!--");
}

function unescapeMarkdown(text: string): string {
  return text.replace(/\\<!--/g, "<!--").replace(/\\\\/g, "\\");
}
