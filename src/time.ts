export const SECONDS_PER_DAY = 86400;

export interface CalendarDate {
  year: number;
  month: number; // 1-12
  day: number;
}

interface ZonedParts extends CalendarDate {
  hour: number;
  minute: number;
  second: number;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timezone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timezone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone: timezone,
      hourCycle: "h23",
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
    });
    formatters.set(timezone, formatter);
  }
  return formatter;
}

export function zonedParts(instant: Date, timezone: string): ZonedParts {
  const values: Partial<Record<Intl.DateTimeFormatPartTypes, number>> = {};
  for (const part of formatterFor(timezone).formatToParts(instant)) {
    if (part.type !== "literal") {
      values[part.type] = parseInt(part.value, 10);
    }
  }

  return {
    year: values.year ?? 1970,
    month: values.month ?? 1,
    day: values.day ?? 1,
    hour: values.hour ?? 0,
    minute: values.minute ?? 0,
    second: values.second ?? 0,
  };
}

function offsetMs(instantMs: number, timezone: string): number {
  const p = zonedParts(new Date(instantMs), timezone);
  const asUtc = Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second);
  return asUtc - Math.floor(instantMs / 1000) * 1000;
}

/** Unix timestamp (seconds) of local midnight of `date` in `timezone`. */
export function dayStartTimestamp(date: CalendarDate, timezone: string): number {
  const wallClock = Date.UTC(date.year, date.month - 1, date.day);
  let instant = wallClock - offsetMs(wallClock, timezone);
  // Second pass settles days where the offset changes between UTC and local midnight
  instant = wallClock - offsetMs(instant, timezone);
  return Math.floor(instant / 1000);
}

export function calendarDateOf(instant: Date, timezone: string): CalendarDate {
  const { year, month, day } = zonedParts(instant, timezone);
  return { year, month, day };
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  const shifted = new Date(Date.UTC(date.year, date.month - 1, date.day + days));
  return {
    year: shifted.getUTCFullYear(),
    month: shifted.getUTCMonth() + 1,
    day: shifted.getUTCDate(),
  };
}

const pad = (value: number): string => value.toString().padStart(2, "0");

/** "DD.MM.YYYY", the format the utility uses in its table headings. */
export function formatDate({ year, month, day }: CalendarDate): string {
  return `${pad(day)}.${pad(month)}.${year}`;
}

/** "HH:MM DD.MM.YYYY" in `timezone`. */
export function formatUpdateStamp(instant: Date, timezone: string): string {
  const p = zonedParts(instant, timezone);
  return `${pad(p.hour)}:${pad(p.minute)} ${formatDate(p)}`;
}

export function formatDayKey(dayKey: string, timezone: string): string {
  return formatDate(calendarDateOf(new Date(Number(dayKey) * 1000), timezone));
}
