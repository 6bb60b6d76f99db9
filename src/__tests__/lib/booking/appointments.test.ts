import { describe, it, expect } from "vitest";
import { findNearestUpcomingAppointment, toAppointmentSummary } from "@/lib/booking/appointments";
import { saveAppointment } from "@/lib/booking/repository";
import type { StoredAppointment } from "@/lib/booking/types";
import { createMemoryRecordStore } from "@/services/record-store";

const NOW = new Date("2026-08-17T04:30:00Z"); // 10:00 IST

function appointment(id: string, startTime: string, status: StoredAppointment["status"] = "confirmed"): StoredAppointment {
  return {
    id,
    userId: "asha@example.com",
    patientName: "Asha Verma",
    reason: "Cleaning",
    startTime,
    endTime: startTime.replace(/T(\d{2}):00/, "T$1:30"),
    calendarEventId: null,
    status,
  };
}

describe("findNearestUpcomingAppointment", () => {
  it("picks the soonest confirmed appointment that has not started", async () => {
    const records = createMemoryRecordStore();
    await saveAppointment(records, appointment("past", "2026-08-17T09:00:00+05:30"));
    await saveAppointment(records, appointment("cancelled", "2026-08-17T11:00:00+05:30", "cancelled"));
    await saveAppointment(records, appointment("later", "2026-08-19T09:00:00+05:30"));
    await saveAppointment(records, appointment("next", "2026-08-18T15:00:00+05:30"));

    const nearest = await findNearestUpcomingAppointment(records, "asha@example.com", NOW);

    expect(nearest?.id).toBe("next");
  });

  it("includes an appointment starting exactly now", async () => {
    const records = createMemoryRecordStore();
    await saveAppointment(records, appointment("now", "2026-08-17T10:00:00+05:30"));

    const nearest = await findNearestUpcomingAppointment(records, "asha@example.com", NOW);

    expect(nearest?.id).toBe("now");
  });

  it("returns null when nothing qualifies", async () => {
    const records = createMemoryRecordStore();
    await saveAppointment(records, appointment("cancelled", "2026-08-18T11:00:00+05:30", "cancelled"));

    await expect(
      findNearestUpcomingAppointment(records, "asha@example.com", NOW)
    ).resolves.toBeNull();
  });
});

describe("toAppointmentSummary", () => {
  it("adds the clinic-local date and time", () => {
    expect(toAppointmentSummary(appointment("a1", "2026-08-18T15:00:00+05:30"))).toEqual({
      id: "a1",
      patientName: "Asha Verma",
      reason: "Cleaning",
      date: "2026-08-18",
      time: "03:00 PM",
      startTime: "2026-08-18T15:00:00+05:30",
      endTime: "2026-08-18T15:30:00+05:30",
      status: "confirmed",
    });
  });
});
