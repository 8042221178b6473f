export interface DueDateOptions {
  /** Hour used when the due string carries no time. */
  defaultHour: number;
  /** IANA zone the due string is written in, e.g. "Asia/Tokyo". */
  timeZone: string;
  now: Date;
}

interface LocalDateTime {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
}

const DATE_TIME = /^(\d{4})([-/])(\d{1,2})\2(\d{1,2})\s+(\d{1,2}):(\d{2})$/;
const DATE_ONLY = /^(\d{4})([-/])(\d{1,2})\2(\d{1,2})$/;
const MONTH_DAY = /^(\d{1,2})\/(\d{1,2})$/;

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let fmt = formatters.get(timeZone);
  if (!fmt) {
    fmt = new Intl.DateTimeFormat("en-US", {
      timeZone,
      hourCycle: "h23",
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
    });
    formatters.set(timeZone, fmt);
  }
  return fmt;
}

/** Wall-clock fields of `epochMs` as seen in `timeZone`. */
export function localParts(epochMs: number, timeZone: string): LocalDateTime & { second: number } {
  const parts: Record<string, number> = {};
  for (const p of formatterFor(timeZone).formatToParts(new Date(epochMs))) {
    if (p.type !== "literal") parts[p.type] = Number(p.value);
  }
  return {
    year: parts.year,
    month: parts.month,
    day: parts.day,
    hour: parts.hour,
    minute: parts.minute,
    second: parts.second,
  };
}

function offsetMs(epochMs: number, timeZone: string): number {
  const p = localParts(epochMs, timeZone);
  const asUTC = Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second);
  return asUTC - Math.floor(epochMs / 1000) * 1000;
}

/** Epoch milliseconds of a wall-clock time in `timeZone`. Day/hour overflow rolls over. */
export function zonedTimeToEpoch(local: LocalDateTime, timeZone: string): number {
  const guess = Date.UTC(local.year, local.month - 1, local.day, local.hour, local.minute);
  const first = guess - offsetMs(guess, timeZone);
  // second pass settles DST transitions
  return guess - offsetMs(first, timeZone);
}

function isValid(local: LocalDateTime): boolean {
  if (local.month < 1 || local.month > 12) return false;
  if (local.hour > 23 || local.minute > 59) return false;
  const probe = new Date(Date.UTC(local.year, local.month - 1, local.day));
  return probe.getUTCMonth() === local.month - 1 && probe.getUTCDate() === local.day;
}

function readLocal(due: string, opts: DueDateOptions): LocalDateTime | null {
  let m = due.match(DATE_TIME);
  if (m) {
    return { year: +m[1], month: +m[3], day: +m[4], hour: +m[5], minute: +m[6] };
  }
  m = due.match(DATE_ONLY);
  if (m) {
    return { year: +m[1], month: +m[3], day: +m[4], hour: opts.defaultHour, minute: 0 };
  }
  m = due.match(MONTH_DAY);
  if (m) {
    const year = localParts(opts.now.getTime(), opts.timeZone).year;
    return { year, month: +m[1], day: +m[2], hour: opts.defaultHour, minute: 0 };
  }
  return null;
}

/**
 * Resolve a free-form due string to epoch milliseconds.
 *
 * Accepted, first match wins: `YYYY-MM-DD HH:mm`, `YYYY/MM/DD HH:mm`,
 * `YYYY-MM-DD`, `YYYY/MM/DD`, `M/D` (current year). Date-only forms use
 * `defaultHour`. Anything else, including impossible dates, yields null.
 */
export function parseDueDate(due: string | null | undefined, opts: DueDateOptions): number | null {
  if (!due) return null;
  const local = readLocal(due.trim(), opts);
  if (!local || !isValid(local)) return null;
  return zonedTimeToEpoch(local, opts.timeZone);
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** `YYYY-MM-DD HH:mm` in `timeZone`; used for datetime labels on new drafts. */
export function formatLocalDateTime(date: Date, timeZone: string): string {
  const p = localParts(date.getTime(), timeZone);
  return `${p.year}-${pad(p.month)}-${pad(p.day)} ${pad(p.hour)}:${pad(p.minute)}`;
}
