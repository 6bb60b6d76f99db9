import { randomUUID } from "node:crypto";
import type { ZodError } from "zod";

import {
  findAlternatives,
  formatAlternatives,
  isFree,
  type AvailableSlot,
} from "@/lib/scheduling/availability";
import { CLINIC_TIMEZONE, MAX_ALTERNATIVES, SLOT_DURATION_MINUTES } from "@/lib/scheduling/constants";
import { SchedulingError, errorMessage } from "@/lib/scheduling/errors";
import {
  formatClinicDateTime,
  normalizeDate,
  normalizeTime,
  resolveInterval,
  toClinicIso,
  type SlotInterval,
} from "@/lib/scheduling/temporal";
import { describeWorkingHours, intervalWithinHours } from "@/lib/scheduling/working-hours";
import {
  bookAppointmentSchema,
  checkSlotSchema,
  contactEmailSchema,
  firstIssue,
  rescheduleAppointmentSchema,
  updatePreferencesSchema,
} from "@/lib/validations/booking";
import { findNearestUpcomingAppointment, toAppointmentSummary } from "./appointments";
import {
  describePreferences,
  filterPreferences,
  hasPreferenceFields,
  mergePreferences,
} from "./preferences";
import { getUserProfile, saveAppointment, saveUserProfile } from "./repository";
import type {
  BookResult,
  BookingContext,
  CalendarCollaborator,
  CancelResult,
  CheckSlotResult,
  GetPreferencesResult,
  InvalidInputResult,
  LastBooking,
  LookupResult,
  RescheduleResult,
  SlotRejection,
  StoredAppointment,
  UpdatePreferencesResult,
} from "./types";

// ── Helpers ──

function clock(ctx: BookingContext): Date {
  return ctx.now ? ctx.now() : new Date();
}

function invalidInput(error: ZodError): InvalidInputResult {
  const { field, message } = firstIssue(error);
  return { status: "invalid_input", field, message };
}

type SlotResolution =
  | { success: true; interval: SlotInterval }
  | { success: false; result: SlotRejection };

/**
 * Raw date/time text → 30-minute interval inside working hours.
 * `fields` names the arguments the text came from, for error reporting.
 */
function resolveSlot(
  rawDate: string,
  rawTime: string,
  now: Date,
  fields: { date: string; time: string } = { date: "date", time: "time" },
): SlotResolution {
  const date = normalizeDate(rawDate, now);
  if (!date.success) {
    return {
      success: false,
      result: { status: "invalid_date", field: fields.date, message: date.error },
    };
  }

  const time = normalizeTime(rawTime);
  if (!time.success) {
    return {
      success: false,
      result: { status: "invalid_time", field: fields.time, message: time.error },
    };
  }

  const interval = resolveInterval(date.date, time.time);
  if (!intervalWithinHours(interval.start, interval.end)) {
    return {
      success: false,
      result: {
        status: "outside_hours",
        message:
          `Sorry, ${formatClinicDateTime(interval.start)} is outside our working hours. ` +
          `${describeWorkingHours()} Please choose a different time.`,
      },
    };
  }

  return { success: true, interval };
}

function unavailableMessage(interval: SlotInterval, alternatives: AvailableSlot[]): string {
  const requested = formatClinicDateTime(interval.start);

  if (alternatives.length === 0) {
    return (
      `Sorry, ${requested} is already booked and there are no free slots close to it. ` +
      "Would you like to try a different date?"
    );
  }

  const noun = alternatives.length === 1 ? "time that day is" : "times that day are";
  return (
    `Sorry, ${requested} is already booked. ` +
    `The nearest available ${noun} ${formatAlternatives(alternatives)}. ` +
    "Would you like one of those instead?"
  );
}

async function searchAlternatives(
  calendar: CalendarCollaborator,
  interval: SlotInterval,
  now: Date,
): Promise<AvailableSlot[]> {
  return findAlternatives(calendar, interval.start, SLOT_DURATION_MINUTES, MAX_ALTERNATIVES, now);
}

function eventSummary(reason: string): string {
  return `Dental appointment - ${reason}`;
}

function eventDescription(patientName: string, userId: string): string {
  return `Patient: ${patientName} (user_id: ${userId})`;
}

async function createCalendarEvent(
  calendar: CalendarCollaborator,
  appointment: StoredAppointment,
): Promise<string | null> {
  const result = await calendar.createEvent({
    summary: eventSummary(appointment.reason),
    description: eventDescription(appointment.patientName, appointment.userId),
    startTime: appointment.startTime,
    endTime: appointment.endTime,
    timezone: CLINIC_TIMEZONE,
  });

  if (!result.success) {
    throw new SchedulingError(
      "calendar_unavailable",
      `Failed to create calendar event: ${result.error ?? "unknown error"}`,
    );
  }

  return result.eventId ?? null;
}

/** Calendar delete never fails a cancellation; problems are only logged. */
async function deleteCalendarEventBestEffort(
  calendar: CalendarCollaborator,
  eventId: string,
): Promise<void> {
  try {
    const result = await calendar.deleteEvent(eventId);
    if (!result.success) {
      console.warn(`[booking] calendar delete failed for ${eventId}:`, result.error);
    }
  } catch (err) {
    console.warn(`[booking] calendar delete threw for ${eventId}:`, errorMessage(err));
  }
}

function toLastBooking(appointment: StoredAppointment, email: string, phone?: string): LastBooking {
  return {
    ...toAppointmentSummary(appointment),
    email,
    ...(phone ? { phone } : {}),
    calendarEventId: appointment.calendarEventId,
  };
}

// ── Operations ──

export async function bookAppointment(args: unknown, ctx: BookingContext): Promise<BookResult> {
  const parsed = bookAppointmentSchema.safeParse(args);
  if (!parsed.success) return invalidInput(parsed.error);

  const input = parsed.data;
  const now = clock(ctx);

  try {
    const slot = resolveSlot(input.date, input.time, now);
    if (!slot.success) return slot.result;
    const { interval } = slot;

    if (!(await isFree(ctx.calendar, interval.start, interval.end))) {
      const alternatives = await searchAlternatives(ctx.calendar, interval, now);
      console.log(
        `[booking] slot ${toClinicIso(interval.start)} taken, offering ${alternatives.length} alternatives`,
      );
      return {
        status: "unavailable",
        message: unavailableMessage(interval, alternatives),
        alternatives,
      };
    }

    const appointment: StoredAppointment = {
      id: randomUUID(),
      userId: input.email,
      patientName: input.patientName,
      reason: input.reason,
      startTime: toClinicIso(interval.start),
      endTime: toClinicIso(interval.end),
      calendarEventId: null,
      status: "confirmed",
    };

    appointment.calendarEventId = await createCalendarEvent(ctx.calendar, appointment);
    await saveAppointment(ctx.records, appointment);

    const existing = await getUserProfile(ctx.records, input.email);
    await saveUserProfile(ctx.records, {
      userId: input.email,
      name: input.patientName,
      email: input.email,
      phone: input.phone,
      preferences: mergePreferences(existing?.preferences ?? {}, input.preferences, now),
    });

    ctx.sessions.setLastBooking(ctx.sessionId, toLastBooking(appointment, input.email, input.phone));

    console.log(`[booking] confirmed ${appointment.id} at ${appointment.startTime}`);

    return {
      status: "confirmed",
      message:
        `Your appointment is confirmed for ${formatClinicDateTime(interval.start)}. ` +
        `Patient: ${input.patientName}. Reason: ${input.reason}. ` +
        "It has been added to the clinic's calendar.",
      appointment: toAppointmentSummary(appointment),
    };
  } catch (err) {
    console.error("[booking] book failed:", err);
    return {
      status: "error",
      message: `Sorry, I couldn't book your appointment due to an internal error: ${errorMessage(err)}`,
    };
  }
}

export async function checkSlot(args: unknown, ctx: BookingContext): Promise<CheckSlotResult> {
  const parsed = checkSlotSchema.safeParse(args);
  if (!parsed.success) return invalidInput(parsed.error);

  const now = clock(ctx);

  try {
    const slot = resolveSlot(parsed.data.date, parsed.data.time, now);
    if (!slot.success) return slot.result;
    const { interval } = slot;

    if (await isFree(ctx.calendar, interval.start, interval.end)) {
      return {
        status: "available",
        message: `${formatClinicDateTime(interval.start)} is available for booking.`,
        slot: { start: toClinicIso(interval.start), end: toClinicIso(interval.end) },
      };
    }

    const alternatives = await searchAlternatives(ctx.calendar, interval, now);
    return {
      status: "unavailable",
      message: unavailableMessage(interval, alternatives),
      alternatives,
    };
  } catch (err) {
    console.error("[booking] check_slot failed:", err);
    return {
      status: "error",
      message: `Sorry, I couldn't check the slot due to an internal error: ${errorMessage(err)}`,
    };
  }
}

/**
 * Moves the nearest upcoming appointment. Working hours are enforced, but
 * the new slot is not checked against other calendar events.
 */
export async function rescheduleAppointment(
  args: unknown,
  ctx: BookingContext,
): Promise<RescheduleResult> {
  const parsed = rescheduleAppointmentSchema.safeParse(args);
  if (!parsed.success) return invalidInput(parsed.error);

  const { email, date, time } = parsed.data;
  const now = clock(ctx);

  try {
    const existing = await findNearestUpcomingAppointment(ctx.records, email, now);
    if (!existing) {
      return {
        status: "not_found",
        message:
          "I couldn't find any upcoming confirmed appointment for that email. " +
          "Please confirm which appointment you want to change.",
      };
    }

    const slot = resolveSlot(date, time, now, { date: "new_date", time: "new_time" });
    if (!slot.success) return slot.result;
    const { interval } = slot;

    const updated: StoredAppointment = {
      ...existing,
      startTime: toClinicIso(interval.start),
      endTime: toClinicIso(interval.end),
    };

    if (existing.calendarEventId) {
      const result = await ctx.calendar.updateEvent(existing.calendarEventId, {
        startTime: updated.startTime,
        endTime: updated.endTime,
        timezone: CLINIC_TIMEZONE,
      });
      if (!result.success) {
        throw new SchedulingError(
          "calendar_unavailable",
          `Failed to move calendar event: ${result.error ?? "unknown error"}`,
        );
      }
      updated.calendarEventId = result.eventId ?? existing.calendarEventId;
    } else {
      updated.calendarEventId = await createCalendarEvent(ctx.calendar, updated);
    }

    await saveAppointment(ctx.records, updated);
    ctx.sessions.setLastBooking(ctx.sessionId, toLastBooking(updated, email));

    console.log(`[booking] rescheduled ${updated.id} from ${existing.startTime} to ${updated.startTime}`);

    return {
      status: "rescheduled",
      message:
        `Your appointment has been rescheduled from ${formatClinicDateTime(new Date(existing.startTime))} ` +
        `to ${formatClinicDateTime(interval.start)}. Reason: ${updated.reason}.`,
      appointment: toAppointmentSummary(updated),
      previousStartTime: existing.startTime,
    };
  } catch (err) {
    console.error("[booking] reschedule failed:", err);
    return {
      status: "error",
      message: `Sorry, I couldn't reschedule your appointment due to an internal error: ${errorMessage(err)}`,
    };
  }
}

export async function cancelAppointment(args: unknown, ctx: BookingContext): Promise<CancelResult> {
  const parsed = contactEmailSchema.safeParse(args);
  if (!parsed.success) return invalidInput(parsed.error);

  const { email } = parsed.data;

  try {
    const existing = await findNearestUpcomingAppointment(ctx.records, email, clock(ctx));
    if (!existing) {
      return {
        status: "not_found",
        message:
          "I couldn't find any upcoming confirmed appointment for that email, so there is nothing to cancel.",
      };
    }

    if (existing.calendarEventId) {
      await deleteCalendarEventBestEffort(ctx.calendar, existing.calendarEventId);
    }

    const cancelled: StoredAppointment = { ...existing, status: "cancelled" };
    await saveAppointment(ctx.records, cancelled);

    if (ctx.sessions.getLastBooking(ctx.sessionId)?.id === cancelled.id) {
      ctx.sessions.setLastBooking(ctx.sessionId, null);
    }

    console.log(`[booking] cancelled ${cancelled.id}`);

    return {
      status: "cancelled",
      message: `Your appointment on ${formatClinicDateTime(new Date(cancelled.startTime))} has been cancelled.`,
      appointment: toAppointmentSummary(cancelled),
    };
  } catch (err) {
    console.error("[booking] cancel failed:", err);
    return {
      status: "error",
      message: `Sorry, I couldn't cancel your appointment due to an internal error: ${errorMessage(err)}`,
    };
  }
}

export async function lookupAppointment(args: unknown, ctx: BookingContext): Promise<LookupResult> {
  const parsed = contactEmailSchema.safeParse(args);
  if (!parsed.success) return invalidInput(parsed.error);

  try {
    const appointment = await findNearestUpcomingAppointment(
      ctx.records,
      parsed.data.email,
      clock(ctx),
    );
    if (!appointment) {
      return {
        status: "not_found",
        message: "I couldn't find any upcoming confirmed appointment for that email.",
      };
    }

    return {
      status: "found",
      message:
        `Your next appointment is on ${formatClinicDateTime(new Date(appointment.startTime))} ` +
        `for ${appointment.reason}.`,
      appointment: toAppointmentSummary(appointment),
    };
  } catch (err) {
    console.error("[booking] lookup failed:", err);
    return {
      status: "error",
      message: `Sorry, I couldn't look up your appointment due to an internal error: ${errorMessage(err)}`,
    };
  }
}

export async function updatePreferences(
  args: unknown,
  ctx: BookingContext,
): Promise<UpdatePreferencesResult> {
  const parsed = updatePreferencesSchema.safeParse(args);
  if (!parsed.success) return invalidInput(parsed.error);

  const { email, preferences } = parsed.data;
  if (!hasPreferenceFields(preferences)) {
    return {
      status: "invalid_input",
      field: "preferences",
      message: "Please tell me which preference you would like to update.",
    };
  }

  try {
    const profile = await getUserProfile(ctx.records, email);
    if (!profile) {
      return {
        status: "not_found",
        message:
          "I couldn't find a patient profile for that email. " +
          "Preferences can be saved once you have booked an appointment.",
      };
    }

    const merged = mergePreferences(profile.preferences, preferences, clock(ctx));
    await saveUserProfile(ctx.records, { ...profile, preferences: merged });

    return {
      status: "updated",
      message: `Thanks, I've updated your preferences (${describePreferences(preferences)}).`,
      preferences: filterPreferences(merged),
    };
  } catch (err) {
    console.error("[booking] update_preferences failed:", err);
    return {
      status: "error",
      message: `Sorry, I couldn't update your preferences due to an internal error: ${errorMessage(err)}`,
    };
  }
}

export async function getPreferences(
  args: unknown,
  ctx: BookingContext,
): Promise<GetPreferencesResult> {
  const parsed = contactEmailSchema.safeParse(args);
  if (!parsed.success) return invalidInput(parsed.error);

  try {
    const profile = await getUserProfile(ctx.records, parsed.data.email);
    if (!profile) {
      return {
        status: "not_found",
        message: "I couldn't find a patient profile for that email.",
      };
    }

    const preferences = filterPreferences(profile.preferences);
    if (!hasPreferenceFields(preferences)) {
      return { status: "no_preferences", message: "You haven't saved any preferences yet." };
    }

    return {
      status: "found",
      message: `Your saved preferences are: ${describePreferences(preferences)}.`,
      preferences,
      ...(profile.preferences.lastUpdated ? { lastUpdated: profile.preferences.lastUpdated } : {}),
    };
  } catch (err) {
    console.error("[booking] get_preferences failed:", err);
    return {
      status: "error",
      message: `Sorry, I couldn't load your preferences due to an internal error: ${errorMessage(err)}`,
    };
  }
}

/** Most recent booking or reschedule made in this session, if any. */
export function getLastBooking(ctx: Pick<BookingContext, "sessions" | "sessionId">): LastBooking | null {
  return ctx.sessions.getLastBooking(ctx.sessionId);
}
