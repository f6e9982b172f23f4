const WEEKDAY_INDEX: Record<string, number> = {
  Mon: 0,
  Tue: 1,
  Wed: 2,
  Thu: 3,
  Fri: 4,
  Sat: 5,
  Sun: 6,
};

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export interface LocalDateParts {
  year: number;
  /** 1-12 */
  month: number;
  day: number;
  /** 0-23 */
  hour: number;
  /** 0 = Monday .. 6 = Sunday */
  weekdayIndex: number;
}

export function systemTimeZone(): string {
  return Intl.DateTimeFormat().resolvedOptions().timeZone;
}

/**
 * Wall-clock fields of an instant as seen in the given IANA time zone.
 */
export function localDateParts(instant: Date, timeZone: string): LocalDateParts {
  const formatter = new Intl.DateTimeFormat("en-US", {
    timeZone,
    year: "numeric",
    month: "numeric",
    day: "numeric",
    hour: "numeric",
    hourCycle: "h23",
    weekday: "short",
  });

  const fields: Record<string, string> = {};
  for (const part of formatter.formatToParts(instant)) {
    fields[part.type] = part.value;
  }

  return {
    year: Number(fields.year),
    month: Number(fields.month),
    day: Number(fields.day),
    hour: Number(fields.hour) % 24,
    weekdayIndex: WEEKDAY_INDEX[fields.weekday ?? ""] ?? 0,
  };
}

function dayNumber(parts: LocalDateParts): number {
  return Math.floor(Date.UTC(parts.year, parts.month - 1, parts.day) / MS_PER_DAY);
}

/**
 * Whole calendar days between two instants in the given zone. A completion
 * at 23:50 counts as one day old at 00:10 the next morning. Instants after
 * `now` count as today.
 */
export function calendarDaysBetween(earlier: Date, now: Date, timeZone: string): number {
  const days = dayNumber(localDateParts(now, timeZone)) - dayNumber(localDateParts(earlier, timeZone));
  return Math.max(0, days);
}
