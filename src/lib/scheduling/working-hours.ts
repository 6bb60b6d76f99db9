import { formatInTimeZone } from "date-fns-tz";

import {
  CLINIC_TIMEZONE,
  CLOSE_MINUTES,
  LUNCH_END_MINUTES,
  LUNCH_START_MINUTES,
  OPEN_MINUTES,
} from "./constants";

function clinicMinutesOfDay(instant: Date): number {
  const [hours, minutes] = formatInTimeZone(instant, CLINIC_TIMEZONE, "HH:mm").split(":").map(Number);
  return hours * 60 + minutes;
}

/** True when the instant falls in [09:00, 18:00) clinic time and outside [13:00, 14:00). */
export function withinHours(instant: Date): boolean {
  const minutes = clinicMinutesOfDay(instant);
  if (minutes < OPEN_MINUTES || minutes >= CLOSE_MINUTES) return false;
  return minutes < LUNCH_START_MINUTES || minutes >= LUNCH_END_MINUTES;
}

/**
 * Both ends are checked on their own, so a slot ending at 13:00 or 18:00
 * is rejected along with one that straddles lunch.
 */
export function intervalWithinHours(start: Date, end: Date): boolean {
  return withinHours(start) && withinHours(end);
}

export function describeWorkingHours(): string {
  return "Our clinic hours are 9:00 AM to 6:00 PM, with a lunch break from 1:00 PM to 2:00 PM.";
}
