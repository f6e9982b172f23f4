import { and, desc, eq, max } from "drizzle-orm";
import { ulid } from "ulid";
import { completions, type DB, members, rooms, rules, tasks } from "../db/index.js";
import type { AvoidFlag, Completion, Task, TaskCategory, Weekday } from "../types.js";
import { DEFAULT_HYGIENE_PRIORITY, DEFAULT_PRIORITY_BASE, ExitCode, HearthError } from "../types.js";
import {
  validateHygienePriority,
  validateIntervalDays,
  validatePriorityBase,
  validateTaskName,
} from "../validation.js";
import { calendarDaysBetween, systemTimeZone } from "./eligibility/calendar.js";
import type { CatalogEntry } from "./eligibility/types.js";
import type { HouseholdService } from "./household.js";

export interface AddTaskInput {
  roomId: string;
  name: string;
  description?: string | null;
  frequency?: string | null;
  intervalDays?: number | null;
  hygienePriority?: number;
  category?: TaskCategory;
  avoid?: AvoidFlag[];
  priorityBase?: number;
  targetWeekday?: Weekday | null;
}

export type UpdateTaskInput = Partial<Omit<AddTaskInput, "roomId">>;

export interface RulePatch {
  priorityBase?: number;
  targetWeekday?: Weekday | null;
  active?: boolean;
}

export interface ListTasksFilter {
  roomId?: string;
  active?: boolean;
}

export interface CatalogOptions {
  roomId?: string;
  /** Zone whose calendar days count elapsed time. Defaults to the system zone. */
  timeZone?: string;
}

export interface RecordCompletionInput {
  /** Member display name; an unknown name is recorded without a member. */
  performer?: string;
  comment?: string;
  at?: Date;
  origin?: string;
}

export interface ResolvedRule {
  priorityBase: number;
  targetWeekday: Weekday | null;
  active: boolean;
}

type RuleRow = typeof rules.$inferSelect;
type TaskRow = { task: typeof tasks.$inferSelect; roomName: string; rule: RuleRow | null };

export const COMPLETION_ORIGIN = "hearth-cli";

/**
 * Fill rule defaults for a task with no rule row.
 */
export function resolveRule(rule: Pick<RuleRow, "priorityBase" | "targetWeekday" | "active"> | null): ResolvedRule {
  return {
    priorityBase: rule?.priorityBase ?? DEFAULT_PRIORITY_BASE,
    targetWeekday: rule?.targetWeekday ?? null,
    active: rule?.active ?? true,
  };
}

function toTask({ task, roomName, rule }: TaskRow): Task {
  return { ...task, roomName, ...resolveRule(rule) };
}

function avoidColumns(flags: AvoidFlag[]) {
  return {
    avoidRain: flags.includes("rain"),
    avoidWind: flags.includes("wind"),
    avoidSnow: flags.includes("snow"),
    avoidFrost: flags.includes("frost"),
    avoidNight: flags.includes("night"),
  };
}

export function isOneOff(task: Pick<Task, "intervalDays">): boolean {
  return (task.intervalDays ?? 0) === 0;
}

export class TaskService {
  constructor(
    private db: DB,
    private householdService: HouseholdService,
  ) {}

  addTask(input: AddTaskInput): Task {
    const name = validateTaskName(input.name);
    const intervalDays = validateIntervalDays(input.intervalDays);
    const hygienePriority = validateHygienePriority(input.hygienePriority ?? DEFAULT_HYGIENE_PRIORITY);

    const room = this.householdService.getRoom(input.roomId);
    if (!room) {
      throw new HearthError(`Room '${input.roomId}' not found`, ExitCode.NOT_FOUND);
    }
    if (this.findTaskInRoom(room.id, name)) {
      throw new HearthError(`Task '${name}' already exists in ${room.name}`, ExitCode.CONFLICT);
    }

    const now = new Date();
    const id = ulid();

    this.db
      .insert(tasks)
      .values({
        id,
        name,
        roomId: room.id,
        description: input.description ?? null,
        frequency: input.frequency ?? null,
        intervalDays,
        hygienePriority,
        category: input.category ?? "other",
        ...avoidColumns(input.avoid ?? []),
        createdAt: now,
        updatedAt: now,
      })
      .run();

    if (input.priorityBase !== undefined || input.targetWeekday) {
      this.setRule(id, { priorityBase: input.priorityBase, targetWeekday: input.targetWeekday });
    }

    return this.requireTask(id);
  }

  updateTask(id: string, input: UpdateTaskInput): Task {
    const task = this.requireTask(id);

    const name = input.name !== undefined ? validateTaskName(input.name) : task.name;
    if (name !== task.name) {
      const clash = this.findTaskInRoom(task.roomId, name);
      if (clash) {
        throw new HearthError(`Task '${name}' already exists in ${task.roomName}`, ExitCode.CONFLICT);
      }
    }

    this.db
      .update(tasks)
      .set({
        name,
        description: input.description !== undefined ? input.description : task.description,
        frequency: input.frequency !== undefined ? input.frequency : task.frequency,
        intervalDays:
          input.intervalDays !== undefined ? validateIntervalDays(input.intervalDays) : task.intervalDays,
        hygienePriority:
          input.hygienePriority !== undefined
            ? validateHygienePriority(input.hygienePriority)
            : task.hygienePriority,
        category: input.category ?? task.category,
        ...(input.avoid ? avoidColumns(input.avoid) : {}),
        updatedAt: new Date(),
      })
      .where(eq(tasks.id, id))
      .run();

    if (input.priorityBase !== undefined || input.targetWeekday !== undefined) {
      this.setRule(id, { priorityBase: input.priorityBase, targetWeekday: input.targetWeekday });
    }

    return this.requireTask(id);
  }

  /**
   * Add the task, or update the one with the same name in the same room.
   */
  upsertTask(input: AddTaskInput): { task: Task; created: boolean } {
    const existing = this.findTaskInRoom(input.roomId, validateTaskName(input.name));
    if (existing) {
      const { roomId: _roomId, ...changes } = input;
      return { task: this.updateTask(existing.id, changes), created: false };
    }
    return { task: this.addTask(input), created: true };
  }

  getTask(id: string): Task | null {
    const row = this.selectTasks().where(eq(tasks.id, id)).get();
    return row ? toTask(row) : null;
  }

  findTask(roomName: string, taskName: string): Task | null {
    const row = this.selectTasks()
      .where(and(eq(rooms.name, roomName.trim()), eq(tasks.name, taskName.trim())))
      .get();
    return row ? toTask(row) : null;
  }

  /** Look a task up by id or by "Room/Task name". */
  resolveTask(ref: string): Task {
    const byId = this.getTask(ref);
    if (byId) return byId;

    const slash = ref.indexOf("/");
    const byName = slash > 0 ? this.findTask(ref.slice(0, slash), ref.slice(slash + 1)) : null;
    if (!byName) {
      throw new HearthError(`Task '${ref}' not found`, ExitCode.NOT_FOUND);
    }
    return byName;
  }

  listTasks(filter?: ListTasksFilter): Task[] {
    const rows = this.selectTasks()
      .where(filter?.roomId ? eq(tasks.roomId, filter.roomId) : undefined)
      .orderBy(rooms.name, tasks.name)
      .all()
      .map(toTask);

    return filter?.active === undefined ? rows : rows.filter((t) => t.active === filter.active);
  }

  deleteTask(id: string): void {
    this.requireTask(id);
    this.db.delete(tasks).where(eq(tasks.id, id)).run();
  }

  setRule(taskId: string, patch: RulePatch): Task {
    const task = this.requireTask(taskId);

    const priorityBase =
      patch.priorityBase !== undefined ? validatePriorityBase(patch.priorityBase) : task.priorityBase;
    const next = {
      priorityBase,
      targetWeekday: patch.targetWeekday !== undefined ? patch.targetWeekday : task.targetWeekday,
      active: patch.active ?? task.active,
      updatedAt: new Date(),
    };

    this.db
      .insert(rules)
      .values({ taskId, ...next })
      .onConflictDoUpdate({ target: rules.taskId, set: next })
      .run();

    return this.requireTask(taskId);
  }

  /** Run `fn` in one transaction; a throw rolls back every write made inside it. */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(() => fn());
  }

  /** Wake (true) or put to sleep (false). */
  setActive(taskId: string, active: boolean): Task {
    return this.setRule(taskId, { active });
  }

  /**
   * Append a completion. A one-off task goes to sleep in the same transaction,
   * since the sleep gate is what hides it afterwards.
   */
  recordCompletion(taskId: string, input: RecordCompletionInput = {}): Completion {
    const task = this.requireTask(taskId);
    const member = input.performer ? this.householdService.findMemberByName(input.performer) : null;
    const completedAt = input.at ?? new Date();
    const origin = input.origin ?? COMPLETION_ORIGIN;

    const id = this.db.transaction((tx) => {
      const inserted = tx
        .insert(completions)
        .values({
          taskId: task.id,
          roomId: task.roomId,
          memberId: member?.id ?? null,
          completedAt,
          status: "done",
          comment: input.comment ?? null,
          origin,
        })
        .returning({ id: completions.id })
        .get();

      if (isOneOff(task)) {
        const now = new Date();
        tx.insert(rules)
          .values({
            taskId: task.id,
            priorityBase: task.priorityBase,
            targetWeekday: task.targetWeekday,
            active: false,
            updatedAt: now,
          })
          .onConflictDoUpdate({ target: rules.taskId, set: { active: false, updatedAt: now } })
          .run();
      }

      return inserted.id;
    });

    return {
      id,
      taskId: task.id,
      roomId: task.roomId,
      memberId: member?.id ?? null,
      performer: member?.displayName ?? null,
      completedAt,
      status: "done",
      comment: input.comment ?? null,
      origin,
    };
  }

  getHistory(taskId: string, limit = 20): Completion[] {
    this.requireTask(taskId);

    const rows = this.db
      .select({ completion: completions, performer: members.displayName })
      .from(completions)
      .leftJoin(members, eq(completions.memberId, members.id))
      .where(eq(completions.taskId, taskId))
      .orderBy(desc(completions.completedAt), desc(completions.id))
      .limit(limit)
      .all();

    return rows.map(({ completion, performer }) => ({ ...completion, performer }));
  }

  /**
   * Every task with its rule resolved and the age of its latest completion
   * in whole local calendar days.
   */
  fetchCatalog(now: Date, options: CatalogOptions = {}): CatalogEntry[] {
    const timeZone = options.timeZone ?? systemTimeZone();
    const latest = this.latestCompletions();

    return this.selectTasks()
      .where(options.roomId ? eq(tasks.roomId, options.roomId) : undefined)
      .orderBy(rooms.name, tasks.name)
      .all()
      .map((row) => {
        const task = toTask(row);
        const last = latest.get(task.id);
        return {
          task,
          daysSince: last ? calendarDaysBetween(last, now, timeZone) : null,
        };
      });
  }

  private latestCompletions(): Map<string, Date> {
    const rows = this.db
      .select({ taskId: completions.taskId, last: max(completions.completedAt) })
      .from(completions)
      .groupBy(completions.taskId)
      .all();

    const latest = new Map<string, Date>();
    for (const row of rows) {
      if (row.last) latest.set(row.taskId, row.last);
    }
    return latest;
  }

  private findTaskInRoom(roomId: string, name: string): Task | null {
    const row = this.selectTasks()
      .where(and(eq(tasks.roomId, roomId), eq(tasks.name, name)))
      .get();
    return row ? toTask(row) : null;
  }

  private requireTask(id: string): Task {
    const task = this.getTask(id);
    if (!task) {
      throw new HearthError(`Task '${id}' not found`, ExitCode.NOT_FOUND);
    }
    return task;
  }

  private selectTasks() {
    return this.db
      .select({ task: tasks, roomName: rooms.name, rule: rules })
      .from(tasks)
      .innerJoin(rooms, eq(tasks.roomId, rooms.id))
      .leftJoin(rules, eq(rules.taskId, tasks.id));
  }
}
