import type { AvailableSlot } from "@/lib/scheduling/availability";
import type { SessionStore } from "./session-store";

// ── Calendar Collaborator ──

export interface CalendarEventTime {
  dateTime?: string; // absent on all-day entries
  date?: string;
  timeZone?: string;
}

export interface CalendarEvent {
  id: string;
  summary?: string;
  start?: CalendarEventTime;
  end?: CalendarEventTime;
}

export interface EventInput {
  summary: string;
  description?: string;
  startTime: string;
  endTime: string;
  timezone: string;
}

export interface EventResult {
  success: boolean;
  eventId?: string;
  error?: string;
}

export interface ListEventsResult {
  success: boolean;
  events?: CalendarEvent[];
  error?: string;
}

export interface MutationResult {
  success: boolean;
  error?: string;
}

export interface CalendarCollaborator {
  /** Events overlapping [timeMin, timeMax). */
  listEvents(timeMin: string, timeMax: string): Promise<ListEventsResult>;
  createEvent(input: EventInput): Promise<EventResult>;
  updateEvent(eventId: string, input: Partial<EventInput>): Promise<EventResult>;
  /** Missing events count as deleted. */
  deleteEvent(eventId: string): Promise<MutationResult>;
}

// ── Persistence Collaborator ──

export type RecordValue = string | number | boolean | string[];
export type RecordMetadata = Record<string, RecordValue>;

export interface QueryResult {
  success: boolean;
  records?: RecordMetadata[];
  error?: string;
}

export interface QueryOptions {
  limit?: number;
  offset?: number;
  /** Metadata field to sort ascending by, compared as a string. */
  orderBy?: string;
}

export interface RecordStore {
  upsert(namespace: string, key: string, metadata: RecordMetadata): Promise<MutationResult>;
  /** Exact-match filter on metadata fields. */
  query(namespace: string, filter: RecordMetadata, options?: QueryOptions): Promise<QueryResult>;
}

// ── Domain records ──

export type AppointmentStatus = "confirmed" | "cancelled";

export interface StoredAppointment {
  id: string;
  userId: string;
  patientName: string;
  reason: string;
  startTime: string; // ISO-8601, clinic offset
  endTime: string;
  calendarEventId: string | null;
  status: AppointmentStatus;
}

export type Tone = "formal" | "friendly";

export interface PreferencePatch {
  preferredTimes?: string[];
  preferredDentist?: string;
  insuranceProvider?: string;
  dentalAnxiety?: boolean;
  prefersBriefResponses?: boolean;
  prefersEmojis?: boolean;
  tone?: Tone;
}

export interface UserPreferences extends PreferencePatch {
  lastUpdated?: string;
}

export interface UserProfile {
  userId: string; // email
  name: string;
  email: string;
  phone: string;
  preferences: UserPreferences;
}

/** What a patient sees about one appointment. */
export interface AppointmentSummary {
  id: string;
  patientName: string;
  reason: string;
  date: string; // YYYY-MM-DD
  time: string; // hh:mm AM/PM
  startTime: string;
  endTime: string;
  status: AppointmentStatus;
}

/** Session-scoped projection of the most recent booking or reschedule. */
export interface LastBooking extends AppointmentSummary {
  email: string;
  phone?: string;
  calendarEventId: string | null;
}

// ── Workflow context ──

export interface BookingContext {
  calendar: CalendarCollaborator;
  records: RecordStore;
  sessions: SessionStore;
  sessionId: string;
  now?: () => Date;
}

// ── Operation results ──

export type InvalidInputResult = { status: "invalid_input"; message: string; field: string };
export type InvalidDateResult = { status: "invalid_date"; message: string; field: string };
export type InvalidTimeResult = { status: "invalid_time"; message: string; field: string };
export type OutsideHoursResult = { status: "outside_hours"; message: string };
/** Why requested date/time text could not become a bookable slot. */
export type SlotRejection = InvalidDateResult | InvalidTimeResult | OutsideHoursResult;
export type ErrorResult = { status: "error"; message: string };

type Failure = InvalidInputResult | ErrorResult;

export type BookResult =
  | { status: "confirmed"; message: string; appointment: AppointmentSummary }
  | { status: "unavailable"; message: string; alternatives: AvailableSlot[] }
  | SlotRejection
  | Failure;

export type CheckSlotResult =
  | { status: "available"; message: string; slot: AvailableSlot }
  | { status: "unavailable"; message: string; alternatives: AvailableSlot[] }
  | SlotRejection
  | Failure;

export type RescheduleResult =
  | {
      status: "rescheduled";
      message: string;
      appointment: AppointmentSummary;
      previousStartTime: string;
    }
  | { status: "not_found"; message: string }
  | SlotRejection
  | Failure;

export type CancelResult =
  | { status: "cancelled"; message: string; appointment: AppointmentSummary }
  | { status: "not_found"; message: string }
  | Failure;

export type LookupResult =
  | { status: "found"; message: string; appointment: AppointmentSummary }
  | { status: "not_found"; message: string }
  | Failure;

export type UpdatePreferencesResult =
  | { status: "updated"; message: string; preferences: PreferencePatch }
  | { status: "not_found"; message: string }
  | Failure;

export type GetPreferencesResult =
  | { status: "found"; message: string; preferences: PreferencePatch; lastUpdated?: string }
  | { status: "no_preferences"; message: string }
  | { status: "not_found"; message: string }
  | Failure;
