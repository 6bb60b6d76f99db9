import { z } from "zod";

import { SchedulingError } from "@/lib/scheduling/errors";
import type {
  AppointmentStatus,
  RecordMetadata,
  RecordStore,
  StoredAppointment,
  UserPreferences,
  UserProfile,
} from "./types";

export const APPOINTMENTS_NAMESPACE = "appointments";
export const USERS_NAMESPACE = "users";

const APPOINTMENT_PAGE_SIZE = 50;

// ── Record schemas (snake_case, as stored) ──

const appointmentRecordSchema = z.object({
  type: z.literal("appointment"),
  id: z.string().min(1),
  user_id: z.string().min(1),
  patient_name: z.string().default(""),
  reason: z.string().default(""),
  start_time: z.string().datetime({ offset: true }),
  end_time: z.string().datetime({ offset: true }),
  calendar_event_id: z.string().default(""),
  status: z.enum(["confirmed", "cancelled"]).default("confirmed"),
});

const userRecordSchema = z.object({
  type: z.literal("user"),
  user_id: z.string().min(1),
  name: z.string().default(""),
  email: z.string(),
  phone: z.string().default(""),
  preferred_times: z.array(z.string()).optional(),
  preferred_dentist: z.string().optional(),
  insurance_provider: z.string().optional(),
  dental_anxiety: z.boolean().optional(),
  prefers_brief_responses: z.boolean().optional(),
  prefers_emojis: z.boolean().optional(),
  tone: z.enum(["formal", "friendly"]).optional(),
  last_updated: z.string().optional(),
});

// ── Mapping ──

function appointmentKey(id: string): string {
  return `appt-${id}`;
}

function userKey(userId: string): string {
  return `user-${userId}`;
}

function appointmentToRecord(appointment: StoredAppointment): RecordMetadata {
  return {
    type: "appointment",
    id: appointment.id,
    user_id: appointment.userId,
    patient_name: appointment.patientName,
    reason: appointment.reason,
    start_time: appointment.startTime,
    end_time: appointment.endTime,
    calendar_event_id: appointment.calendarEventId ?? "",
    status: appointment.status,
  };
}

function userToRecord(profile: UserProfile): RecordMetadata {
  const record: RecordMetadata = {
    type: "user",
    user_id: profile.userId,
    name: profile.name,
    email: profile.email,
    phone: profile.phone,
  };
  const prefs = profile.preferences;

  if (prefs.preferredTimes !== undefined) record.preferred_times = [...prefs.preferredTimes];
  if (prefs.preferredDentist !== undefined) record.preferred_dentist = prefs.preferredDentist;
  if (prefs.insuranceProvider !== undefined) record.insurance_provider = prefs.insuranceProvider;
  if (prefs.dentalAnxiety !== undefined) record.dental_anxiety = prefs.dentalAnxiety;
  if (prefs.prefersBriefResponses !== undefined) {
    record.prefers_brief_responses = prefs.prefersBriefResponses;
  }
  if (prefs.prefersEmojis !== undefined) record.prefers_emojis = prefs.prefersEmojis;
  if (prefs.tone !== undefined) record.tone = prefs.tone;
  if (prefs.lastUpdated !== undefined) record.last_updated = prefs.lastUpdated;

  return record;
}

function recordToAppointment(record: z.infer<typeof appointmentRecordSchema>): StoredAppointment {
  return {
    id: record.id,
    userId: record.user_id,
    patientName: record.patient_name,
    reason: record.reason,
    startTime: record.start_time,
    endTime: record.end_time,
    calendarEventId: record.calendar_event_id || null,
    status: record.status,
  };
}

function recordToUser(record: z.infer<typeof userRecordSchema>): UserProfile {
  const preferences: UserPreferences = {};

  if (record.preferred_times !== undefined) preferences.preferredTimes = record.preferred_times;
  if (record.preferred_dentist !== undefined) preferences.preferredDentist = record.preferred_dentist;
  if (record.insurance_provider !== undefined) {
    preferences.insuranceProvider = record.insurance_provider;
  }
  if (record.dental_anxiety !== undefined) preferences.dentalAnxiety = record.dental_anxiety;
  if (record.prefers_brief_responses !== undefined) {
    preferences.prefersBriefResponses = record.prefers_brief_responses;
  }
  if (record.prefers_emojis !== undefined) preferences.prefersEmojis = record.prefers_emojis;
  if (record.tone !== undefined) preferences.tone = record.tone;
  if (record.last_updated !== undefined) preferences.lastUpdated = record.last_updated;

  return {
    userId: record.user_id,
    name: record.name,
    email: record.email,
    phone: record.phone,
    preferences,
  };
}

// ── Public API ──

export async function saveAppointment(
  records: RecordStore,
  appointment: StoredAppointment,
): Promise<void> {
  const result = await records.upsert(
    APPOINTMENTS_NAMESPACE,
    appointmentKey(appointment.id),
    appointmentToRecord(appointment),
  );

  if (!result.success) {
    throw new SchedulingError(
      "storage_unavailable",
      `Failed to save appointment: ${result.error ?? "unknown error"}`,
    );
  }
}

/**
 * Every appointment of a user, optionally narrowed to one status, sorted by
 * start time ascending. Reads page by page until the store runs dry.
 */
export async function getAppointmentsForUser(
  records: RecordStore,
  userId: string,
  options: { status?: AppointmentStatus } = {},
): Promise<StoredAppointment[]> {
  const filter: RecordMetadata = { type: "appointment", user_id: userId };
  if (options.status) filter.status = options.status;

  const appointments: StoredAppointment[] = [];

  for (let offset = 0; ; offset += APPOINTMENT_PAGE_SIZE) {
    const result = await records.query(APPOINTMENTS_NAMESPACE, filter, {
      limit: APPOINTMENT_PAGE_SIZE,
      offset,
      orderBy: "start_time",
    });

    if (!result.success) {
      throw new SchedulingError(
        "storage_unavailable",
        `Failed to load appointments: ${result.error ?? "unknown error"}`,
      );
    }

    const page = result.records ?? [];
    for (const record of page) {
      const parsed = appointmentRecordSchema.safeParse(record);
      if (!parsed.success) {
        console.warn(`[repository] skipping malformed appointment record for ${userId}`);
        continue;
      }
      appointments.push(recordToAppointment(parsed.data));
    }

    if (page.length < APPOINTMENT_PAGE_SIZE) break;
  }

  return appointments.sort(
    (a, b) => new Date(a.startTime).getTime() - new Date(b.startTime).getTime(),
  );
}

export async function saveUserProfile(records: RecordStore, profile: UserProfile): Promise<void> {
  const result = await records.upsert(USERS_NAMESPACE, userKey(profile.userId), userToRecord(profile));

  if (!result.success) {
    throw new SchedulingError(
      "storage_unavailable",
      `Failed to save user profile: ${result.error ?? "unknown error"}`,
    );
  }
}

export async function getUserProfile(
  records: RecordStore,
  userId: string,
): Promise<UserProfile | null> {
  const result = await records.query(USERS_NAMESPACE, { type: "user", user_id: userId }, { limit: 1 });

  if (!result.success) {
    throw new SchedulingError(
      "storage_unavailable",
      `Failed to load user profile: ${result.error ?? "unknown error"}`,
    );
  }

  const record = result.records?.[0];
  if (!record) return null;

  const parsed = userRecordSchema.safeParse(record);
  if (!parsed.success) {
    console.warn(`[repository] malformed user record for ${userId}`);
    return null;
  }

  return recordToUser(parsed.data);
}
