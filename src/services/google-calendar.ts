import { google, type calendar_v3 } from "googleapis";

import type { AppConfig } from "@/lib/config";
import type {
  CalendarCollaborator,
  CalendarEvent,
  CalendarEventTime,
  EventInput,
  EventResult,
  ListEventsResult,
  MutationResult,
} from "@/lib/booking/types";

export interface GoogleCalendarOptions {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  refreshToken: string;
  calendarId: string;
}

function getCalendarClient(options: GoogleCalendarOptions): calendar_v3.Calendar {
  const oauth2Client = new google.auth.OAuth2(
    options.clientId,
    options.clientSecret,
    options.redirectUri
  );
  oauth2Client.setCredentials({ refresh_token: options.refreshToken });
  return google.calendar({ version: "v3", auth: oauth2Client });
}

function toEventTime(
  time: calendar_v3.Schema$EventDateTime | undefined
): CalendarEventTime | undefined {
  if (!time) return undefined;
  return {
    dateTime: time.dateTime ?? undefined,
    date: time.date ?? undefined,
    timeZone: time.timeZone ?? undefined,
  };
}

function toCalendarEvent(item: calendar_v3.Schema$Event): CalendarEvent | null {
  if (!item.id) return null;
  return {
    id: item.id,
    summary: item.summary ?? undefined,
    start: toEventTime(item.start),
    end: toEventTime(item.end),
  };
}

/** HTTP status carried by a googleapis error, if any. */
function errorStatus(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  if ("status" in err && typeof err.status === "number") return err.status;
  if ("code" in err && typeof err.code === "number") return err.code;
  if (
    "response" in err &&
    typeof err.response === "object" &&
    err.response !== null &&
    "status" in err.response &&
    typeof err.response.status === "number"
  ) {
    return err.response.status;
  }
  return undefined;
}

/**
 * Google Calendar backed collaborator. Every method resolves to a result
 * object; nothing here throws.
 */
export function createGoogleCalendar(options: GoogleCalendarOptions): CalendarCollaborator {
  let client: calendar_v3.Calendar | null = null;
  const calendarId = options.calendarId;

  function calendar(): calendar_v3.Calendar {
    client ??= getCalendarClient(options);
    return client;
  }

  return {
    async listEvents(timeMin: string, timeMax: string): Promise<ListEventsResult> {
      try {
        const response = await calendar().events.list({
          calendarId,
          timeMin,
          timeMax,
          singleEvents: true,
          orderBy: "startTime",
        });

        const events = (response.data.items ?? [])
          .map(toCalendarEvent)
          .filter((event): event is CalendarEvent => event !== null);

        return { success: true, events };
      } catch (err) {
        console.error("[google-calendar] list events error:", err);
        return { success: false, error: String(err) };
      }
    },

    async createEvent(input: EventInput): Promise<EventResult> {
      try {
        const response = await calendar().events.insert({
          calendarId,
          requestBody: {
            summary: input.summary,
            description: input.description,
            start: { dateTime: input.startTime, timeZone: input.timezone },
            end: { dateTime: input.endTime, timeZone: input.timezone },
          },
        });

        const eventId = response.data.id;
        if (!eventId) {
          return { success: false, error: "event created but no ID returned" };
        }

        return { success: true, eventId };
      } catch (err) {
        console.error("[google-calendar] create event error:", err);
        return { success: false, error: String(err) };
      }
    },

    async updateEvent(eventId: string, input: Partial<EventInput>): Promise<EventResult> {
      try {
        const requestBody: calendar_v3.Schema$Event = {};
        if (input.summary !== undefined) {
          requestBody.summary = input.summary;
        }
        if (input.description !== undefined) {
          requestBody.description = input.description;
        }
        if (input.startTime !== undefined) {
          requestBody.start = { dateTime: input.startTime, timeZone: input.timezone };
        }
        if (input.endTime !== undefined) {
          requestBody.end = { dateTime: input.endTime, timeZone: input.timezone };
        }

        const response = await calendar().events.patch({ calendarId, eventId, requestBody });

        return { success: true, eventId: response.data.id ?? eventId };
      } catch (err) {
        console.error("[google-calendar] update event error:", err);
        return { success: false, error: String(err) };
      }
    },

    async deleteEvent(eventId: string): Promise<MutationResult> {
      try {
        await calendar().events.delete({ calendarId, eventId });
        return { success: true };
      } catch (err) {
        const status = errorStatus(err);
        if (status === 404 || status === 410) {
          console.warn(`[google-calendar] event ${eventId} already gone (${status})`);
          return { success: true };
        }
        console.error("[google-calendar] delete event error:", err);
        return { success: false, error: String(err) };
      }
    },
  };
}

export function createGoogleCalendarFromConfig(config: AppConfig): CalendarCollaborator {
  const {
    GOOGLE_CALENDAR_CLIENT_ID: clientId,
    GOOGLE_CALENDAR_CLIENT_SECRET: clientSecret,
    GOOGLE_CALENDAR_REDIRECT_URI: redirectUri,
    GOOGLE_CALENDAR_REFRESH_TOKEN: refreshToken,
  } = config;

  if (!clientId || !clientSecret || !redirectUri || !refreshToken) {
    throw new Error("missing Google Calendar OAuth configuration");
  }

  return createGoogleCalendar({
    clientId,
    clientSecret,
    redirectUri,
    refreshToken,
    calendarId: config.GOOGLE_CALENDAR_ID,
  });
}
