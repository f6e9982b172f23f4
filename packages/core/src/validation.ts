import {
  AVOID_FLAGS,
  type AvoidFlag,
  ExitCode,
  HearthError,
  TASK_CATEGORIES,
  type TaskCategory,
  WEEKDAYS,
  type Weekday,
} from "./types.js";

const MAX_NAME_LENGTH = 200;

function validateName(kind: string, value: string): string {
  const trimmed = value.trim();
  if (!trimmed) {
    throw new HearthError(`${kind} name cannot be empty`, ExitCode.VALIDATION);
  }
  if (trimmed.length > MAX_NAME_LENGTH) {
    throw new HearthError(
      `${kind} name cannot exceed ${MAX_NAME_LENGTH} characters`,
      ExitCode.VALIDATION,
    );
  }
  return trimmed;
}

export function validateTaskName(name: string): string {
  const trimmed = validateName("Task", name);
  if (trimmed.includes("/")) {
    throw new HearthError("Task name cannot contain '/'", ExitCode.VALIDATION);
  }
  return trimmed;
}

export function validateRoomName(name: string): string {
  const trimmed = validateName("Room", name);
  if (trimmed.includes("/")) {
    throw new HearthError("Room name cannot contain '/'", ExitCode.VALIDATION);
  }
  return trimmed;
}

export function validateMemberName(name: string): string {
  return validateName("Member", name);
}

export function validateIntervalDays(value: number | null | undefined): number | null {
  if (value === null || value === undefined) return null;
  if (!Number.isInteger(value) || value < 0) {
    throw new HearthError(
      `Recurrence interval must be a non-negative whole number of days, got ${value}`,
      ExitCode.VALIDATION,
    );
  }
  return value;
}

export function validateHygienePriority(value: number): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new HearthError(
      `Hygiene priority must be a non-negative integer, got ${value}`,
      ExitCode.VALIDATION,
    );
  }
  return value;
}

export function validatePriorityBase(value: number): number {
  if (!Number.isInteger(value)) {
    throw new HearthError(`Priority base must be an integer, got ${value}`, ExitCode.VALIDATION);
  }
  return value;
}

const WEEKDAY_ALIASES: Record<string, Weekday> = {
  mon: "monday",
  tue: "tuesday",
  wed: "wednesday",
  thu: "thursday",
  fri: "friday",
  sat: "saturday",
  sun: "sunday",
};

export function parseWeekday(token: string): Weekday {
  const normalized = token.trim().toLowerCase();
  const weekday =
    WEEKDAYS.find((day) => day === normalized) ??
    (Object.hasOwn(WEEKDAY_ALIASES, normalized) ? WEEKDAY_ALIASES[normalized] : undefined);
  if (!weekday) {
    throw new HearthError(
      `Invalid weekday '${token}'. Use one of: ${WEEKDAYS.join(", ")}`,
      ExitCode.VALIDATION,
    );
  }
  return weekday;
}

export function parseCategory(token: string): TaskCategory {
  const normalized = token.trim().toLowerCase();
  const category = TASK_CATEGORIES.find((c) => c === normalized);
  if (!category) {
    throw new HearthError(
      `Invalid category '${token}'. Use one of: ${TASK_CATEGORIES.join(", ")}`,
      ExitCode.VALIDATION,
    );
  }
  return category;
}

export function parseAvoidFlags(list: string): AvoidFlag[] {
  const tokens = list
    .split(",")
    .map((t) => t.trim().toLowerCase())
    .filter(Boolean);
  if (tokens.length === 1 && tokens[0] === "none") return [];

  const flags: AvoidFlag[] = [];
  for (const token of tokens) {
    const flag = AVOID_FLAGS.find((f) => f === token);
    if (!flag) {
      throw new HearthError(
        `Invalid condition '${token}'. Use any of: ${AVOID_FLAGS.join(", ")}`,
        ExitCode.VALIDATION,
      );
    }
    if (!flags.includes(flag)) flags.push(flag);
  }
  return flags;
}

export function validateTimeZone(timeZone: string): string {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
  } catch {
    throw new HearthError(`Unknown time zone '${timeZone}'`, ExitCode.VALIDATION);
  }
  return timeZone;
}

export function validateCoordinates(latitude: number, longitude: number): void {
  if (!Number.isFinite(latitude) || latitude < -90 || latitude > 90) {
    throw new HearthError(`Latitude must be between -90 and 90, got ${latitude}`, ExitCode.VALIDATION);
  }
  if (!Number.isFinite(longitude) || longitude < -180 || longitude > 180) {
    throw new HearthError(
      `Longitude must be between -180 and 180, got ${longitude}`,
      ExitCode.VALIDATION,
    );
  }
}

export function validateLimit(value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new HearthError(`Limit must be a positive integer, got ${value}`, ExitCode.VALIDATION);
  }
  return value;
}
