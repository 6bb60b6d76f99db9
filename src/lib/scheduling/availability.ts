import { addMinutes } from "date-fns";

import type { CalendarCollaborator, CalendarEvent } from "@/lib/booking/types";
import { ALTERNATIVE_SLOT_OFFSETS } from "./constants";
import { SchedulingError } from "./errors";
import { formatClinicTime, toClinicIso } from "./temporal";
import { intervalWithinHours } from "./working-hours";

// ---------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------

export interface AvailableSlot {
  start: string; // ISO datetime, clinic offset
  end: string; // ISO datetime, clinic offset
}

// ---------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------

/** Check whether two time ranges [aStart, aEnd) and [bStart, bEnd) overlap. */
export function rangesOverlap(
  aStart: number,
  aEnd: number,
  bStart: number,
  bEnd: number,
): boolean {
  return aStart < bEnd && bStart < aEnd;
}

/** All-day entries carry a `date` but no `dateTime` and never block a slot. */
function isTimeBounded(event: CalendarEvent): boolean {
  return Boolean(event.start?.dateTime && event.end?.dateTime);
}

// ---------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------

/**
 * Asks the calendar whether [start, end) is free. A failed calendar call is
 * thrown as `calendar_unavailable`, never read as "free".
 */
export async function isFree(
  calendar: CalendarCollaborator,
  start: Date,
  end: Date,
): Promise<boolean> {
  const result = await calendar.listEvents(start.toISOString(), end.toISOString());

  if (!result.success) {
    throw new SchedulingError(
      "calendar_unavailable",
      `Calendar availability check failed: ${result.error ?? "unknown error"}`,
    );
  }

  const blocking = (result.events ?? []).filter(isTimeBounded);
  return blocking.length === 0;
}

/**
 * Probes same-length slots around a rejected start time, in the fixed
 * offset order, and returns the first `maxResults` that are in the future,
 * inside working hours and free.
 */
export async function findAlternatives(
  calendar: CalendarCollaborator,
  requestedStart: Date,
  durationMinutes: number,
  maxResults: number,
  now: Date,
): Promise<AvailableSlot[]> {
  const alternatives: AvailableSlot[] = [];

  for (const offset of ALTERNATIVE_SLOT_OFFSETS) {
    if (alternatives.length >= maxResults) break;

    const start = addMinutes(requestedStart, offset * durationMinutes);
    const end = addMinutes(start, durationMinutes);

    if (start.getTime() < now.getTime()) continue;
    if (!intervalWithinHours(start, end)) continue;

    try {
      if (await isFree(calendar, start, end)) {
        alternatives.push({ start: toClinicIso(start), end: toClinicIso(end) });
      }
    } catch (err) {
      console.warn(
        `[availability] skipping candidate ${toClinicIso(start)}:`,
        err instanceof Error ? err.message : err,
      );
    }
  }

  return alternatives;
}

/**
 * Joins slot start times into a readable list, e.g.
 *   "09:00 AM, 09:30 AM and 10:30 AM"
 */
export function formatAlternatives(slots: AvailableSlot[]): string {
  const times = slots.map((slot) => formatClinicTime(new Date(slot.start)));
  if (times.length <= 1) return times.join("");
  return `${times.slice(0, -1).join(", ")} and ${times[times.length - 1]}`;
}
