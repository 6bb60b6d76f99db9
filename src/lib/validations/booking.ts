import { z, type ZodError } from "zod";

import { isValidINMobile, normalizeINPhone } from "@/lib/utils/phone";
import type { PreferencePatch } from "@/lib/booking/types";

// ── Field schemas ──

const emailField = z
  .string({ required_error: "Please provide the email address used for the booking." })
  .trim()
  .toLowerCase()
  .email("Please provide a valid email address.");

const phoneField = z
  .string({ required_error: "Please provide a contact phone number." })
  .transform(normalizeINPhone)
  .refine(
    isValidINMobile,
    "Invalid phone number format. Must be a 10-digit Indian mobile number starting with 6-9.",
  );

const requiredText = (message: string) => z.string({ required_error: message }).trim().min(1, message);

const preferenceFields = {
  preferred_times: z.array(z.string().trim().min(1)).optional(),
  preferred_dentist: z.string().trim().min(1).optional(),
  insurance_provider: z.string().trim().min(1).optional(),
  dental_anxiety: z.boolean().optional(),
  prefers_brief_responses: z.boolean().optional(),
  prefers_emojis: z.boolean().optional(),
  tone: z.enum(["formal", "friendly"]).optional(),
};

type PreferenceFields = {
  [K in keyof typeof preferenceFields]?: z.infer<(typeof preferenceFields)[K]>;
};

function toPreferencePatch(fields: PreferenceFields): PreferencePatch {
  const patch: PreferencePatch = {};
  if (fields.preferred_times !== undefined) patch.preferredTimes = fields.preferred_times;
  if (fields.preferred_dentist !== undefined) patch.preferredDentist = fields.preferred_dentist;
  if (fields.insurance_provider !== undefined) patch.insuranceProvider = fields.insurance_provider;
  if (fields.dental_anxiety !== undefined) patch.dentalAnxiety = fields.dental_anxiety;
  if (fields.prefers_brief_responses !== undefined) {
    patch.prefersBriefResponses = fields.prefers_brief_responses;
  }
  if (fields.prefers_emojis !== undefined) patch.prefersEmojis = fields.prefers_emojis;
  if (fields.tone !== undefined) patch.tone = fields.tone;
  return patch;
}

// ── Operation schemas ──

export const bookAppointmentSchema = z
  .object({
    patient_name: requiredText("Please provide the patient's full name."),
    date: requiredText("Please provide the appointment date."),
    time: requiredText("Please provide the appointment time."),
    reason: requiredText("Please provide the reason for the visit."),
    contact_email: emailField,
    contact_phone: phoneField,
    ...preferenceFields,
  })
  .transform((v) => ({
    patientName: v.patient_name,
    date: v.date,
    time: v.time,
    reason: v.reason,
    email: v.contact_email,
    phone: v.contact_phone,
    preferences: toPreferencePatch(v),
  }));

export const checkSlotSchema = z
  .object({
    date: requiredText("Please provide the appointment date."),
    time: requiredText("Please provide the appointment time."),
  });

export const rescheduleAppointmentSchema = z
  .object({
    contact_email: emailField,
    new_date: requiredText("Please provide the new appointment date."),
    new_time: requiredText("Please provide the new appointment time."),
  })
  .transform((v) => ({ email: v.contact_email, date: v.new_date, time: v.new_time }));

export const contactEmailSchema = z
  .object({ contact_email: emailField })
  .transform((v) => ({ email: v.contact_email }));

export const updatePreferencesSchema = z
  .object({ contact_email: emailField, ...preferenceFields })
  .transform((v) => ({ email: v.contact_email, preferences: toPreferencePatch(v) }));

export const moderationGuardSchema = z.object({
  reason: z.string().optional(),
});

export type BookAppointmentArgs = z.input<typeof bookAppointmentSchema>;
export type BookAppointmentInput = z.output<typeof bookAppointmentSchema>;
export type CheckSlotArgs = z.input<typeof checkSlotSchema>;
export type RescheduleAppointmentArgs = z.input<typeof rescheduleAppointmentSchema>;
export type ContactEmailArgs = z.input<typeof contactEmailSchema>;
export type UpdatePreferencesArgs = z.input<typeof updatePreferencesSchema>;

// ── Error helpers ──

export interface ValidationIssue {
  field: string;
  message: string;
}

export function firstIssue(error: ZodError): ValidationIssue {
  const issue = error.issues[0];
  if (!issue) return { field: "input", message: "The request was invalid." };

  const field = issue.path.length > 0 ? issue.path.join(".") : "input";
  const message = /[.!?]$/.test(issue.message) ? issue.message : `Invalid ${field}: ${issue.message}.`;
  return { field, message };
}
