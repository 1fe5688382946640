import { InvalidDeadlineError } from "./errors.js";
import { CalendarEventTime, EventTimeRange } from "./types.js";
import { Clock, systemClock } from "./utils.js";

export interface DeadlineNormalizerOptions {
  timeZone?: string;
  /** Length of the visible calendar block; 0 keeps the deadline a point in time. */
  displayDurationMinutes?: number;
  now?: Clock;
}

export const DEFAULT_TIME_ZONE = "America/New_York";

const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATE_TIME =
  /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?(Z|[+-]\d{2}:?\d{2})?$/i;

interface WallClock {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

function pad(value: number, length = 2): string {
  return String(value).padStart(length, "0");
}

function isValidDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) {
    return false;
  }
  const probe = new Date(Date.UTC(year, month - 1, day));
  return probe.getUTCFullYear() === year && probe.getUTCMonth() === month - 1 && probe.getUTCDate() === day;
}

function formatDate(year: number, month: number, day: number): string {
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

function formatWallClock(value: WallClock): string {
  return `${formatDate(value.year, value.month, value.day)}T${pad(value.hour)}:${pad(value.minute)}:${pad(value.second)}`;
}

function parseOffsetMinutes(zone: string): number | null {
  if (zone.toUpperCase() === "Z") {
    return 0;
  }
  const sign = zone.startsWith("-") ? -1 : 1;
  const digits = zone.slice(1).replace(":", "");
  const hours = Number(digits.slice(0, 2));
  const minutes = Number(digits.slice(2, 4));
  if (minutes > 59) {
    return null;
  }
  return sign * (hours * 60 + minutes);
}

/**
 * Wall-clock reading of an instant in the given IANA timezone.
 */
export function toZonedWallClock(epochMs: number, timeZone: string): WallClock {
  const parts = new Intl.DateTimeFormat("en-US", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hourCycle: "h23"
  }).formatToParts(new Date(epochMs));

  const read = (type: Intl.DateTimeFormatPartTypes): number => {
    const part = parts.find((entry) => entry.type === type);
    return part ? Number(part.value) : 0;
  };

  return {
    year: read("year"),
    month: read("month"),
    day: read("day"),
    hour: read("hour"),
    minute: read("minute"),
    second: read("second")
  };
}

function addMinutes(value: WallClock, minutes: number): WallClock {
  const shifted = new Date(
    Date.UTC(value.year, value.month - 1, value.day, value.hour, value.minute, value.second) + minutes * 60_000
  );
  return {
    year: shifted.getUTCFullYear(),
    month: shifted.getUTCMonth() + 1,
    day: shifted.getUTCDate(),
    hour: shifted.getUTCHours(),
    minute: shifted.getUTCMinutes(),
    second: shifted.getUTCSeconds()
  };
}

/**
 * Canonical event time range for an assignment deadline.
 *
 * - missing deadline: all-day event on today's date in the target timezone
 * - "YYYY-MM-DD": all-day event on that date
 * - date-time with Z/offset: the instant, shown in the target timezone
 * - date-time without offset: read as wall-clock time in the target timezone
 */
export function normalizeDeadline(
  deadline: string | null | undefined,
  options: DeadlineNormalizerOptions = {}
): EventTimeRange {
  const timeZone = options.timeZone ?? DEFAULT_TIME_ZONE;
  const now = options.now ?? systemClock;
  const displayDurationMinutes = Math.max(0, options.displayDurationMinutes ?? 0);

  if (deadline === null || deadline === undefined || deadline.trim().length === 0) {
    const today = toZonedWallClock(now(), timeZone);
    return { kind: "all-day", date: formatDate(today.year, today.month, today.day) };
  }

  const value = deadline.trim();

  const dateOnly = DATE_ONLY.exec(value);
  if (dateOnly) {
    const [year, month, day] = [Number(dateOnly[1]), Number(dateOnly[2]), Number(dateOnly[3])];
    if (!isValidDate(year, month, day)) {
      throw new InvalidDeadlineError(deadline);
    }
    return { kind: "all-day", date: formatDate(year, month, day) };
  }

  const dateTime = DATE_TIME.exec(value);
  if (!dateTime) {
    throw new InvalidDeadlineError(deadline);
  }

  const local: WallClock = {
    year: Number(dateTime[1]),
    month: Number(dateTime[2]),
    day: Number(dateTime[3]),
    hour: Number(dateTime[4]),
    minute: Number(dateTime[5]),
    second: Number(dateTime[6] ?? "0")
  };

  if (!isValidDate(local.year, local.month, local.day) || local.hour > 23 || local.minute > 59 || local.second > 59) {
    throw new InvalidDeadlineError(deadline);
  }

  const zone = dateTime[8];
  let start = local;
  if (zone) {
    const offsetMinutes = parseOffsetMinutes(zone);
    if (offsetMinutes === null || Math.abs(offsetMinutes) > 14 * 60) {
      throw new InvalidDeadlineError(deadline);
    }
    const epochMs =
      Date.UTC(local.year, local.month - 1, local.day, local.hour, local.minute, local.second) -
      offsetMinutes * 60_000;
    start = toZonedWallClock(epochMs, timeZone);
  }

  return {
    kind: "timed",
    start: formatWallClock(start),
    end: formatWallClock(addMinutes(start, displayDurationMinutes)),
    timeZone
  };
}

function nextDate(date: string): string {
  const [year, month, day] = date.split("-").map(Number);
  const next = new Date(Date.UTC(year ?? 0, (month ?? 1) - 1, (day ?? 1) + 1));
  return formatDate(next.getUTCFullYear(), next.getUTCMonth() + 1, next.getUTCDate());
}

/**
 * Google Calendar start/end for a range. All-day ends are exclusive, so the
 * end date is the following day.
 */
export function toCalendarEventTimes(range: EventTimeRange): { start: CalendarEventTime; end: CalendarEventTime } {
  if (range.kind === "all-day") {
    return { start: { date: range.date }, end: { date: nextDate(range.date) } };
  }

  return {
    start: { dateTime: range.start, timeZone: range.timeZone },
    end: { dateTime: range.end, timeZone: range.timeZone }
  };
}
