import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { createDb, type DB } from "../db/index.js";
import { ExitCode, HearthError } from "../types.js";
import { HouseholdService } from "./household.js";
import { resolveRule, TaskService } from "./task.js";

describe("TaskService", () => {
  let db: DB;
  let householdService: HouseholdService;
  let taskService: TaskService;
  let kitchenId: string;

  beforeEach(() => {
    db = createDb(":memory:");
    householdService = new HouseholdService(db);
    taskService = new TaskService(db, householdService);
    kitchenId = householdService.addRoom({ name: "Kitchen" }).id;
  });

  afterEach(() => {
    db.$close();
  });

  describe("addTask", () => {
    test("fills rule defaults when no rule is given", () => {
      const task = taskService.addTask({ roomId: kitchenId, name: "Wipe counters", intervalDays: 1 });

      expect(task.roomName).toBe("Kitchen");
      expect(task.priorityBase).toBe(50);
      expect(task.targetWeekday).toBeNull();
      expect(task.active).toBe(true);
      expect(task.hygienePriority).toBe(3);
      expect(task.category).toBe("other");
    });

    test("stores avoid flags and rule fields", () => {
      const task = taskService.addTask({
        roomId: kitchenId,
        name: "Clean windows",
        intervalDays: 30,
        avoid: ["rain", "night"],
        priorityBase: 70,
        targetWeekday: "saturday",
      });

      expect(task.avoidRain).toBe(true);
      expect(task.avoidNight).toBe(true);
      expect(task.avoidWind).toBe(false);
      expect(task.priorityBase).toBe(70);
      expect(task.targetWeekday).toBe("saturday");
    });

    test("rejects a negative interval", () => {
      expect(() =>
        taskService.addTask({ roomId: kitchenId, name: "Bad", intervalDays: -3 }),
      ).toThrow(HearthError);
    });

    test("rejects a duplicate name in the same room", () => {
      taskService.addTask({ roomId: kitchenId, name: "Mop" });

      expect(() => taskService.addTask({ roomId: kitchenId, name: "Mop" })).toThrow(/already exists/);
    });

    test("allows the same name in another room", () => {
      const bathroom = householdService.addRoom({ name: "Bathroom" });
      taskService.addTask({ roomId: kitchenId, name: "Mop" });

      const task = taskService.addTask({ roomId: bathroom.id, name: "Mop" });

      expect(task.roomName).toBe("Bathroom");
    });

    test("rejects an unknown room", () => {
      expect(() => taskService.addTask({ roomId: "nope", name: "Mop" })).toThrow(/Room 'nope' not found/);
    });
  });

  describe("resolveTask", () => {
    test("finds by id and by room/name", () => {
      const task = taskService.addTask({ roomId: kitchenId, name: "Empty the bin" });

      expect(taskService.resolveTask(task.id).id).toBe(task.id);
      expect(taskService.resolveTask("Kitchen/Empty the bin").id).toBe(task.id);
    });

    test("throws NOT_FOUND for unknown refs", () => {
      let caught: unknown;
      try {
        taskService.resolveTask("Kitchen/Unknown");
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(HearthError);
      expect(caught instanceof HearthError && caught.code).toBe(ExitCode.NOT_FOUND);
    });
  });

  describe("recordCompletion", () => {
    test("puts a one-off task to sleep", () => {
      const task = taskService.addTask({ roomId: kitchenId, name: "Descale kettle", intervalDays: null });

      taskService.recordCompletion(task.id);

      expect(taskService.getTask(task.id)?.active).toBe(false);
    });

    test("leaves a recurring task active", () => {
      const task = taskService.addTask({ roomId: kitchenId, name: "Dishes", intervalDays: 1 });

      taskService.recordCompletion(task.id);

      expect(taskService.getTask(task.id)?.active).toBe(true);
    });

    test("keeps the rule of a one-off task when putting it to sleep", () => {
      const task = taskService.addTask({
        roomId: kitchenId,
        name: "Defrost freezer",
        priorityBase: 80,
      });

      taskService.recordCompletion(task.id);
      const slept = taskService.getTask(task.id);

      expect(slept?.active).toBe(false);
      expect(slept?.priorityBase).toBe(80);
    });

    test("links a known performer and ignores an unknown one", () => {
      householdService.addMember("Alex");
      const task = taskService.addTask({ roomId: kitchenId, name: "Dishes", intervalDays: 1 });

      const known = taskService.recordCompletion(task.id, {
        performer: "Alex",
        comment: "after dinner",
        at: new Date("2024-03-10T19:00:00Z"),
      });
      const unknown = taskService.recordCompletion(task.id, {
        performer: "Nobody",
        at: new Date("2024-03-11T19:00:00Z"),
      });

      expect(known.performer).toBe("Alex");
      expect(known.memberId).not.toBeNull();
      expect(unknown.memberId).toBeNull();

      const history = taskService.getHistory(task.id);
      expect(history.map((h) => [h.performer, h.comment])).toEqual([
        [null, null],
        ["Alex", "after dinner"],
      ]);
      expect(history[0]?.origin).toBe("hearth-cli");
    });
  });

  describe("setActive", () => {
    test("wakes a dormant task", () => {
      const task = taskService.addTask({ roomId: kitchenId, name: "Clean oven" });
      taskService.recordCompletion(task.id);

      const woken = taskService.setActive(task.id, true);

      expect(woken.active).toBe(true);
    });

    test("creates a rule row with defaults when none exists", () => {
      const task = taskService.addTask({ roomId: kitchenId, name: "Sweep" });

      const slept = taskService.setActive(task.id, false);

      expect(slept.active).toBe(false);
      expect(slept.priorityBase).toBe(50);
    });
  });

  describe("fetchCatalog", () => {
    test("reduces the latest completion to local calendar days", () => {
      const dishes = taskService.addTask({ roomId: kitchenId, name: "Dishes", intervalDays: 1 });
      const oven = taskService.addTask({ roomId: kitchenId, name: "Oven", intervalDays: 30 });
      taskService.recordCompletion(dishes.id, { at: new Date("2024-03-01T08:00:00Z") });
      taskService.recordCompletion(dishes.id, { at: new Date("2024-03-13T21:00:00Z") });

      const catalog = taskService.fetchCatalog(new Date("2024-03-15T09:00:00Z"), { timeZone: "UTC" });

      expect(catalog.map((e) => [e.task.name, e.daysSince])).toEqual([
        ["Dishes", 2],
        ["Oven", null],
      ]);
      expect(catalog[1]?.task.id).toBe(oven.id);
    });

    test("scopes to one room", () => {
      const garden = householdService.addRoom({ name: "Garden" });
      taskService.addTask({ roomId: kitchenId, name: "Dishes" });
      taskService.addTask({ roomId: garden.id, name: "Mow the lawn", category: "mowing" });

      const catalog = taskService.fetchCatalog(new Date(), { roomId: garden.id });

      expect(catalog.map((e) => e.task.name)).toEqual(["Mow the lawn"]);
    });
  });

  describe("updateTask", () => {
    test("updates fields and rule together", () => {
      const task = taskService.addTask({ roomId: kitchenId, name: "Fridge", intervalDays: 14 });

      const updated = taskService.updateTask(task.id, {
        intervalDays: 7,
        hygienePriority: 5,
        targetWeekday: "sunday",
      });

      expect(updated.intervalDays).toBe(7);
      expect(updated.hygienePriority).toBe(5);
      expect(updated.targetWeekday).toBe("sunday");
    });

    test("upsertTask updates an existing task by room and name", () => {
      taskService.addTask({ roomId: kitchenId, name: "Fridge", intervalDays: 14 });

      const result = taskService.upsertTask({ roomId: kitchenId, name: "Fridge", intervalDays: 10 });

      expect(result.created).toBe(false);
      expect(result.task.intervalDays).toBe(10);
      expect(taskService.listTasks()).toHaveLength(1);
    });
  });
});

describe("resolveRule", () => {
  test("defaults a missing rule", () => {
    expect(resolveRule(null)).toEqual({ priorityBase: 50, targetWeekday: null, active: true });
  });
});

describe("HouseholdService", () => {
  let db: DB;
  let householdService: HouseholdService;

  beforeEach(() => {
    db = createDb(":memory:");
    householdService = new HouseholdService(db);
  });

  afterEach(() => {
    db.$close();
  });

  test("lists rooms by name and resolves by name", () => {
    householdService.addRoom({ name: "Kitchen", areaM2: 12 });
    householdService.addRoom({ name: "Attic" });

    expect(householdService.listRooms().map((r) => r.name)).toEqual(["Attic", "Kitchen"]);
    expect(householdService.resolveRoom("Kitchen").areaM2).toBe(12);
  });

  test("ensureRoom reuses an existing room", () => {
    const first = householdService.ensureRoom("Cellar");
    const second = householdService.ensureRoom("Cellar");

    expect(first.created).toBe(true);
    expect(second.created).toBe(false);
    expect(second.room.id).toBe(first.room.id);
  });

  test("rejects duplicate members", () => {
    householdService.addMember("Sam");

    expect(() => householdService.addMember("Sam")).toThrow(/already exists/);
  });
});
