export const WEEKDAYS = [
  "monday",
  "tuesday",
  "wednesday",
  "thursday",
  "friday",
  "saturday",
  "sunday",
] as const;
export type Weekday = (typeof WEEKDAYS)[number];

export const TASK_CATEGORIES = ["watering", "mowing", "other"] as const;
export type TaskCategory = (typeof TASK_CATEGORIES)[number];

export const AVOID_FLAGS = ["rain", "wind", "snow", "frost", "night"] as const;
export type AvoidFlag = (typeof AVOID_FLAGS)[number];

export const DEFAULT_PRIORITY_BASE = 50;
export const DEFAULT_HYGIENE_PRIORITY = 3;

export interface Room {
  id: string;
  name: string;
  areaM2: number | null;
  floor: string | null;
  exposure: string | null;
  floorType: string | null;
  createdAt: Date;
}

export interface Member {
  id: string;
  displayName: string;
  active: boolean;
  createdAt: Date;
}

/**
 * A task with its rule resolved. Rule fields always hold concrete values:
 * a task without a rule row gets `priorityBase` 50, no weekday pin and
 * `active` true.
 */
export interface Task {
  id: string;
  name: string;
  roomId: string;
  roomName: string;
  description: string | null;
  /** Frequency label the task was catalogued with (e.g. "weekly"). */
  frequency: string | null;
  /** `null` or 0 for a one-off task, otherwise the period in days. */
  intervalDays: number | null;
  hygienePriority: number;
  category: TaskCategory;
  avoidRain: boolean;
  avoidWind: boolean;
  avoidSnow: boolean;
  avoidFrost: boolean;
  avoidNight: boolean;
  priorityBase: number;
  targetWeekday: Weekday | null;
  /**
   * Lifecycle flag and scheduling gate at once. A one-off task is put to
   * sleep (`false`) when completed and stays hidden until woken; a recurring
   * task only goes inactive when someone sleeps it by hand.
   */
  active: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface Completion {
  id: number;
  taskId: string;
  roomId: string;
  memberId: string | null;
  performer: string | null;
  completedAt: Date;
  status: string;
  comment: string | null;
  origin: string | null;
}

export interface HouseholdConfig {
  name: string;
  city: string | null;
  latitude: number | null;
  longitude: number | null;
  timeZone: string;
}

export interface Config {
  household: HouseholdConfig;
  ranking: {
    auditLimit: number;
  };
  weather: {
    enabled: boolean;
    timeoutMs: number;
  };
}

export const DEFAULT_CONFIG: Config = {
  household: {
    name: "Home",
    city: null,
    latitude: null,
    longitude: null,
    timeZone: Intl.DateTimeFormat().resolvedOptions().timeZone,
  },
  ranking: {
    auditLimit: 10,
  },
  weather: {
    enabled: true,
    timeoutMs: 5000,
  },
};

export enum ExitCode {
  SUCCESS = 0,
  GENERAL_ERROR = 1,
  NOT_FOUND = 2,
  CONFLICT = 3,
  VALIDATION = 4,
}

export class HearthError extends Error {
  constructor(
    message: string,
    public code: ExitCode,
  ) {
    super(message);
    this.name = "HearthError";
  }
}
