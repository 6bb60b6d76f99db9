import { rangesOverlap } from "@/lib/scheduling/availability";
import type {
  CalendarCollaborator,
  CalendarEvent,
  CalendarEventTime,
  EventInput,
} from "@/lib/booking/types";

export interface InMemoryCalendar extends CalendarCollaborator {
  /** Snapshot of every stored event, in insertion order. */
  events(): CalendarEvent[];
}

function boundary(time: CalendarEventTime | undefined): number | null {
  const value = time?.dateTime ?? time?.date;
  if (!value) return null;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : ms;
}

function copyEvent(event: CalendarEvent): CalendarEvent {
  return {
    ...event,
    start: event.start ? { ...event.start } : undefined,
    end: event.end ? { ...event.end } : undefined,
  };
}

/**
 * Process-local calendar for tests and the terminal chat. Overlap follows
 * the Google semantics: an event blocks [start, end).
 */
export function createInMemoryCalendar(seed: CalendarEvent[] = []): InMemoryCalendar {
  const store = new Map<string, CalendarEvent>();
  let nextId = 1;

  for (const event of seed) {
    store.set(event.id, copyEvent(event));
  }

  return {
    async listEvents(timeMin, timeMax) {
      const min = Date.parse(timeMin);
      const max = Date.parse(timeMax);

      const events = [...store.values()].filter((event) => {
        const start = boundary(event.start);
        const end = boundary(event.end);
        return start !== null && end !== null && rangesOverlap(start, end, min, max);
      });

      return { success: true, events: events.map(copyEvent) };
    },

    async createEvent(input: EventInput) {
      const id = `evt-${nextId++}`;
      store.set(id, {
        id,
        summary: input.summary,
        start: { dateTime: input.startTime, timeZone: input.timezone },
        end: { dateTime: input.endTime, timeZone: input.timezone },
      });
      return { success: true, eventId: id };
    },

    async updateEvent(eventId, input) {
      const event = store.get(eventId);
      if (!event) return { success: false, error: `event ${eventId} not found` };

      if (input.summary !== undefined) event.summary = input.summary;
      if (input.startTime !== undefined) {
        event.start = { dateTime: input.startTime, timeZone: input.timezone };
      }
      if (input.endTime !== undefined) {
        event.end = { dateTime: input.endTime, timeZone: input.timezone };
      }
      return { success: true, eventId };
    },

    async deleteEvent(eventId) {
      store.delete(eventId);
      return { success: true };
    },

    events() {
      return [...store.values()].map(copyEvent);
    },
  };
}
