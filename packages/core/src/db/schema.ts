import { integer, real, sqliteTable, text, uniqueIndex } from "drizzle-orm/sqlite-core";
import { TASK_CATEGORIES, WEEKDAYS } from "../types.js";

export const rooms = sqliteTable("rooms", {
  id: text("id").primaryKey(),
  name: text("name").notNull().unique(),
  areaM2: real("area_m2"),
  floor: text("floor"),
  exposure: text("exposure"),
  floorType: text("floor_type"),
  createdAt: integer("created_at", { mode: "timestamp" }).notNull(),
});

export const members = sqliteTable("members", {
  id: text("id").primaryKey(),
  displayName: text("display_name").notNull().unique(),
  active: integer("active", { mode: "boolean" }).notNull().default(true),
  createdAt: integer("created_at", { mode: "timestamp" }).notNull(),
});

export const tasks = sqliteTable(
  "tasks",
  {
    id: text("id").primaryKey(),
    name: text("name").notNull(),
    roomId: text("room_id")
      .notNull()
      .references(() => rooms.id, { onDelete: "cascade" }),
    description: text("description"),
    frequency: text("frequency"),
    intervalDays: integer("interval_days"),
    hygienePriority: integer("hygiene_priority").notNull(),
    category: text("category", { enum: TASK_CATEGORIES }).notNull().default("other"),
    avoidRain: integer("avoid_rain", { mode: "boolean" }).notNull().default(false),
    avoidWind: integer("avoid_wind", { mode: "boolean" }).notNull().default(false),
    avoidSnow: integer("avoid_snow", { mode: "boolean" }).notNull().default(false),
    avoidFrost: integer("avoid_frost", { mode: "boolean" }).notNull().default(false),
    avoidNight: integer("avoid_night", { mode: "boolean" }).notNull().default(false),
    createdAt: integer("created_at", { mode: "timestamp" }).notNull(),
    updatedAt: integer("updated_at", { mode: "timestamp" }).notNull(),
  },
  (table) => ({
    roomName: uniqueIndex("uq_tasks_room_name").on(table.roomId, table.name),
  }),
);

/** At most one rule per task; a missing row means the defaults apply. */
export const rules = sqliteTable("rules", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  taskId: text("task_id")
    .notNull()
    .unique()
    .references(() => tasks.id, { onDelete: "cascade" }),
  priorityBase: integer("priority_base").notNull().default(50),
  targetWeekday: text("target_weekday", { enum: WEEKDAYS }),
  active: integer("active", { mode: "boolean" }).notNull().default(true),
  updatedAt: integer("updated_at", { mode: "timestamp" }).notNull(),
});

export const completions = sqliteTable("completions", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  taskId: text("task_id")
    .notNull()
    .references(() => tasks.id, { onDelete: "cascade" }),
  roomId: text("room_id")
    .notNull()
    .references(() => rooms.id, { onDelete: "cascade" }),
  memberId: text("member_id").references(() => members.id, { onDelete: "set null" }),
  completedAt: integer("completed_at", { mode: "timestamp" }).notNull(),
  status: text("status").notNull().default("done"),
  comment: text("comment"),
  origin: text("origin"),
});
