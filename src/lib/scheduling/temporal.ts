import { addDays, addMinutes, format, getDay, isValid, parse } from "date-fns";
import { formatInTimeZone, fromZonedTime } from "date-fns-tz";

import { CLINIC_TIMEZONE, SLOT_DURATION_MINUTES } from "./constants";
import { SchedulingError } from "./errors";

// ---------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------

export type DateResult =
  | { success: true; date: string } // YYYY-MM-DD
  | { success: false; error: string };

export type TimeResult =
  | { success: true; time: string } // hh:mm AM/PM
  | { success: false; error: string };

export interface SlotInterval {
  start: Date;
  end: Date;
}

// ---------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------

const WEEKDAYS: Record<string, number> = {
  sunday: 0,
  sun: 0,
  monday: 1,
  mon: 1,
  tuesday: 2,
  tue: 2,
  tues: 2,
  wednesday: 3,
  wed: 3,
  thursday: 4,
  thu: 4,
  thur: 4,
  thurs: 4,
  friday: 5,
  fri: 5,
  saturday: 6,
  sat: 6,
};

const TOMORROW = "(?:tomorrow|tomorow|tommorow|tommorrow|tmrw|tmr)";
const WEEKDAY = `(${Object.keys(WEEKDAYS).join("|")})`;

const TOMORROW_RE = new RegExp(`^${TOMORROW}$`);
const DAY_AFTER_TOMORROW_RE = new RegExp(`^(?:(?:the )?day after ${TOMORROW}|overmorrow)$`);
const IN_N_DAYS_RE = /^in (\d{1,3}) days?$/;
const NEXT_WEEKDAY_RE = new RegExp(`^next ${WEEKDAY}$`);
const BARE_WEEKDAY_RE = new RegExp(`^(?:on |this )?${WEEKDAY}$`);

// Two-digit year formats come first: "yyyy" would happily read "26" as year 26,
// and "yyyy-MM-dd" would read "15-09-26" as 26 September of year 15.
// "dd" and "MM" take one or two digits; plain "d" cannot read "09".
const FORMATS_WITH_YEAR = [
  "dd-MM-yy",
  "dd/MM/yy",
  "dd.MM.yy",
  "yyyy-MM-dd",
  "dd-MM-yyyy",
  "dd/MM/yyyy",
  "dd.MM.yyyy",
  "dd MMMM yyyy",
  "MMMM dd yyyy",
];

// "MMMM" also accepts abbreviated month names.
const FORMATS_WITHOUT_YEAR = ["dd MMMM", "MMMM dd", "dd/MM", "dd-MM", "dd.MM"];

const DATE_CANDIDATE_PATTERNS = [
  /\b\d{4}-\d{1,2}-\d{1,2}\b/g,
  /\b\d{1,2}[/.-]\d{1,2}(?:[/.-]\d{2,4})?\b/g,
  /\b\d{1,2} [a-z]{3,9}(?: \d{4})?\b/g,
  /\b[a-z]{3,9} \d{1,2}(?: \d{4})?\b/g,
];

const CANONICAL_TIME_RE = /^(\d{2}):(\d{2}) (AM|PM)$/;

// ---------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------

/** Lowercases, drops ordinal suffixes ("1st" → "1") and commas, collapses spaces. */
export function cleanDateInput(raw: string): string {
  return raw
    .trim()
    .toLowerCase()
    .replace(/(\d+)(st|nd|rd|th)\b/g, "$1")
    .replace(/,/g, "")
    .replace(/\s+/g, " ");
}

function clinicToday(now: Date): Date {
  // Local midnight on the host. Only the calendar fields are used from here on.
  return parse(formatInTimeZone(now, CLINIC_TIMEZONE, "yyyy-MM-dd"), "yyyy-MM-dd", new Date());
}

function toDateKey(date: Date): string {
  return format(date, "yyyy-MM-dd");
}

function nextWeekday(today: Date, weekday: number): Date {
  const delta = (weekday - getDay(today) + 7) % 7;
  return addDays(today, delta === 0 ? 7 : delta);
}

function resolveRelative(input: string, today: Date): Date | null {
  if (input === "today") return today;
  if (TOMORROW_RE.test(input)) return addDays(today, 1);
  if (DAY_AFTER_TOMORROW_RE.test(input)) return addDays(today, 2);

  const inDays = input.match(IN_N_DAYS_RE);
  if (inDays) return addDays(today, Number(inDays[1]));

  const next = input.match(NEXT_WEEKDAY_RE) ?? input.match(BARE_WEEKDAY_RE);
  if (next) return nextWeekday(today, WEEKDAYS[next[1]]);

  return null;
}

type ParsedDate =
  | { hasYear: true; date: Date }
  | { hasYear: false; month: number; day: number };

// A leap year, so "29 feb" parses without a year.
const YEARLESS_REFERENCE = new Date(2000, 0, 1);

function parseWithFormats(text: string, reference: Date): ParsedDate | null {
  for (const fmt of FORMATS_WITH_YEAR) {
    const parsed = parse(text, fmt, reference);
    if (isValid(parsed)) return { hasYear: true, date: parsed };
  }
  for (const fmt of FORMATS_WITHOUT_YEAR) {
    const parsed = parse(text, fmt, YEARLESS_REFERENCE);
    if (isValid(parsed)) return { hasYear: false, month: parsed.getMonth(), day: parsed.getDate() };
  }
  return null;
}

/** First date with this month and day strictly after today; leap days may skip years. */
function nextOccurrence(month: number, day: number, today: Date): Date | null {
  const todayKey = toDateKey(today);
  for (let year = today.getFullYear(); year <= today.getFullYear() + 8; year++) {
    const candidate = new Date(year, month, day);
    if (candidate.getMonth() === month && toDateKey(candidate) > todayKey) return candidate;
  }
  return null;
}

/**
 * Day-first fuzzy parse: the whole input first, then every date-looking
 * fragment inside it ("next appointment on 15 aug please").
 */
function parseFuzzyDate(input: string, reference: Date): ParsedDate | null {
  const text = input.replace(/\b(on|the|of)\b/g, " ").replace(/\s+/g, " ").trim();

  const whole = parseWithFormats(text, reference);
  if (whole) return whole;

  for (const pattern of DATE_CANDIDATE_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      const parsed = parseWithFormats(match[0], reference);
      if (parsed) return parsed;
    }
  }
  return null;
}

function formatTime(hours: number, minutes: number): string {
  return format(new Date(2000, 0, 1, hours, minutes), "hh:mm a");
}

// ---------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------

/**
 * Resolves free-form date text to a clinic-local calendar date strictly
 * after today. Dates without a year (or in the past) resolve to their next
 * occurrence.
 */
export function normalizeDate(raw: string, now: Date): DateResult {
  const input = cleanDateInput(raw);
  if (!input) {
    return { success: false, error: "Please tell me which date you would like." };
  }

  const today = clinicToday(now);
  const todayKey = toDateKey(today);

  let resolved = resolveRelative(input, today);

  if (!resolved) {
    const parsed = parseFuzzyDate(input, today);
    if (!parsed) {
      return {
        success: false,
        error: `I couldn't understand the date "${raw}". Please use a date like 15 August or 15-08-2026.`,
      };
    }

    if (parsed.hasYear && toDateKey(parsed.date) >= todayKey) {
      resolved = parsed.date;
    } else {
      const [month, day] = parsed.hasYear
        ? [parsed.date.getMonth(), parsed.date.getDate()]
        : [parsed.month, parsed.day];
      resolved = nextOccurrence(month, day, today);
    }
  }

  if (!resolved) {
    return { success: false, error: `I couldn't find a date matching "${raw}".` };
  }

  const dateKey = toDateKey(resolved);
  if (dateKey <= todayKey) {
    return { success: false, error: "Appointment date must be after today's date." };
  }

  return { success: true, date: dateKey };
}

/**
 * Accepts "9 AM", "9:30pm", "9.30 a.m.", "15:30", "noon" or a time inside
 * free text, and emits "hh:mm AM/PM".
 */
export function normalizeTime(raw: string): TimeResult {
  const input = raw.trim().toLowerCase().replace(/\s+/g, " ");
  const invalid: TimeResult = {
    success: false,
    error: `Invalid time format: ${raw}. Please provide a valid time like 9 AM or 10:30 AM.`,
  };

  if (/\bnoon\b/.test(input)) return { success: true, time: formatTime(12, 0) };
  if (/\bmidnight\b/.test(input)) return { success: true, time: formatTime(0, 0) };

  const twelveHour = input.match(/\b(\d{1,2})(?:[:.](\d{2}))?\s*([ap])\.?\s?m\b/);
  if (twelveHour) {
    const hour = Number(twelveHour[1]);
    const minute = twelveHour[2] ? Number(twelveHour[2]) : 0;
    if (hour < 1 || hour > 12 || minute > 59) return invalid;
    const hours24 = (hour % 12) + (twelveHour[3] === "p" ? 12 : 0);
    return { success: true, time: formatTime(hours24, minute) };
  }

  const twentyFourHour = input.match(/\b(\d{1,2})[:.](\d{2})\b/);
  if (twentyFourHour) {
    const hour = Number(twentyFourHour[1]);
    const minute = Number(twentyFourHour[2]);
    if (hour > 23 || minute > 59) return invalid;
    return { success: true, time: formatTime(hour, minute) };
  }

  const bareHour = input.match(/^(?:at |around )?(\d{1,2})(?: ?o'?clock)?$/);
  if (bareHour) {
    const hour = Number(bareHour[1]);
    if (hour > 23) return invalid;
    return { success: true, time: formatTime(hour, 0) };
  }

  return invalid;
}

/**
 * Anchors a normalized date and time in the clinic timezone. Every slot
 * lasts SLOT_DURATION_MINUTES.
 */
export function resolveInterval(date: string, time: string): SlotInterval {
  const match = time.match(CANONICAL_TIME_RE);
  if (!match || !/^\d{4}-\d{2}-\d{2}$/.test(date)) {
    throw new SchedulingError("invalid_time", `Cannot resolve "${date} ${time}" to a time slot.`);
  }

  const hour = Number(match[1]);
  const hours24 = (hour % 12) + (match[3] === "PM" ? 12 : 0);
  const localIso = `${date}T${String(hours24).padStart(2, "0")}:${match[2]}:00`;

  const start = fromZonedTime(localIso, CLINIC_TIMEZONE);
  return { start, end: addMinutes(start, SLOT_DURATION_MINUTES) };
}

// ── Clinic-local formatting ──

/** ISO-8601 with the clinic offset, e.g. 2026-08-15T10:00:00+05:30 */
export function toClinicIso(instant: Date): string {
  return formatInTimeZone(instant, CLINIC_TIMEZONE, "yyyy-MM-dd'T'HH:mm:ssXXX");
}

export function clinicDateKey(instant: Date): string {
  return formatInTimeZone(instant, CLINIC_TIMEZONE, "yyyy-MM-dd");
}

export function formatClinicTime(instant: Date): string {
  return formatInTimeZone(instant, CLINIC_TIMEZONE, "hh:mm a");
}

export function formatClinicDate(instant: Date): string {
  return formatInTimeZone(instant, CLINIC_TIMEZONE, "EEEE, d MMMM yyyy");
}

export function formatClinicDateTime(instant: Date): string {
  return `${formatClinicDate(instant)} at ${formatClinicTime(instant)}`;
}
