import type { Task } from "../types.js";
import { DEFAULT_HYGIENE_PRIORITY, ExitCode, HearthError } from "../types.js";
import { DEFAULT_FREQUENCY, FREQUENCY_INTERVALS, guessAvoidNight, guessCategory } from "./catalog-defaults.js";
import type { HouseholdService } from "./household.js";
import type { MarkdownService, ParsedTask, ParseResult } from "./markdown.js";
import type { AddTaskInput, TaskService } from "./task.js";

export interface ImportSummary {
  roomsCreated: number;
  tasksCreated: number;
  tasksUpdated: number;
}

/**
 * Task input for a parsed catalog entry. Gaps get catalog defaults: hygiene 3,
 * occasional frequency, and avoidance and category guessed from the names.
 */
export function toTaskInput(roomId: string, roomName: string, parsed: ParsedTask): AddTaskInput {
  const avoid = parsed.avoid ?? (guessAvoidNight(roomName, parsed.name) ? ["night" as const] : []);

  return {
    roomId,
    name: parsed.name,
    description: parsed.description,
    frequency: parsed.frequency ? parsed.frequency.label : DEFAULT_FREQUENCY,
    intervalDays: parsed.frequency ? parsed.frequency.intervalDays : FREQUENCY_INTERVALS[DEFAULT_FREQUENCY],
    hygienePriority: parsed.hygienePriority ?? DEFAULT_HYGIENE_PRIORITY,
    category: parsed.category ?? guessCategory(parsed.name),
    avoid,
    priorityBase: parsed.priorityBase ?? undefined,
    targetWeekday: parsed.targetWeekday,
  };
}

export class CatalogService {
  constructor(
    private householdService: HouseholdService,
    private taskService: TaskService,
    private markdownService: MarkdownService,
  ) {}

  parse(content: string): ParseResult {
    return this.markdownService.parseMarkdown(content);
  }

  /**
   * Upsert rooms by name and tasks by (room, name). Existing tasks keep their
   * history and activation state. All or nothing: a catalog with parse errors
   * is refused, and a failure on any entry rolls back the whole import.
   */
  importCatalog(parsed: ParseResult): ImportSummary {
    if (parsed.errors.length > 0) {
      throw new HearthError(`Catalog has errors: ${parsed.errors.join("; ")}`, ExitCode.VALIDATION);
    }

    return this.taskService.transaction(() => {
      const summary: ImportSummary = { roomsCreated: 0, tasksCreated: 0, tasksUpdated: 0 };

      for (const parsedRoom of parsed.rooms) {
        const { room, created } = this.householdService.ensureRoom(parsedRoom.name);
        if (created) summary.roomsCreated++;

        for (const parsedTask of parsedRoom.tasks) {
          const result = this.taskService.upsertTask(toTaskInput(room.id, room.name, parsedTask));
          if (result.created) summary.tasksCreated++;
          else summary.tasksUpdated++;
        }
      }

      return summary;
    });
  }

  exportCatalog(householdName: string, options?: { includeIds?: boolean }): string {
    const rooms = this.householdService.listRooms();
    const tasksByRoom = new Map<string, Task[]>();
    for (const task of this.taskService.listTasks()) {
      const existing = tasksByRoom.get(task.roomId) ?? [];
      existing.push(task);
      tasksByRoom.set(task.roomId, existing);
    }
    return this.markdownService.exportCatalog({ name: householdName }, rooms, tasksByRoom, options);
  }
}
