import { clinicDateKey, formatClinicTime } from "@/lib/scheduling/temporal";
import { getAppointmentsForUser } from "./repository";
import type { AppointmentSummary, RecordStore, StoredAppointment } from "./types";

/**
 * The user's active appointment: soonest confirmed appointment starting at
 * or after `now`. Reschedule, cancel and lookup all go through here.
 */
export async function findNearestUpcomingAppointment(
  records: RecordStore,
  userId: string,
  now: Date,
): Promise<StoredAppointment | null> {
  const confirmed = await getAppointmentsForUser(records, userId, { status: "confirmed" });

  return confirmed.find((appt) => new Date(appt.startTime).getTime() >= now.getTime()) ?? null;
}

export function toAppointmentSummary(appointment: StoredAppointment): AppointmentSummary {
  const start = new Date(appointment.startTime);
  return {
    id: appointment.id,
    patientName: appointment.patientName,
    reason: appointment.reason,
    date: clinicDateKey(start),
    time: formatClinicTime(start),
    startTime: appointment.startTime,
    endTime: appointment.endTime,
    status: appointment.status,
  };
}
