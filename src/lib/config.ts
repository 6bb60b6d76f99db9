import { z } from "zod";

// Unset and empty variables are treated the same.
const optionalString = z.preprocess(
  (value) => (value === "" ? undefined : value),
  z.string().min(1).optional()
);

const configSchema = z.object({
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.string().min(1).default("gpt-4o-mini"),

  GOOGLE_CALENDAR_CLIENT_ID: optionalString,
  GOOGLE_CALENDAR_CLIENT_SECRET: optionalString,
  GOOGLE_CALENDAR_REDIRECT_URI: optionalString,
  GOOGLE_CALENDAR_REFRESH_TOKEN: optionalString,
  GOOGLE_CALENDAR_ID: z.string().min(1).default("primary"),

  SUPABASE_URL: z.preprocess(
    (value) => (value === "" ? undefined : value),
    z.string().url().optional()
  ),
  SUPABASE_SERVICE_ROLE_KEY: optionalString,

  CLINIC_NAME: z.string().min(1).default("Bright Smile Dental Clinic"),
});

export type AppConfig = z.infer<typeof configSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.safeParse(env);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`invalid configuration: ${details}`);
  }

  return parsed.data;
}

export function hasGoogleCalendarConfig(config: AppConfig): boolean {
  return Boolean(
    config.GOOGLE_CALENDAR_CLIENT_ID &&
      config.GOOGLE_CALENDAR_CLIENT_SECRET &&
      config.GOOGLE_CALENDAR_REDIRECT_URI &&
      config.GOOGLE_CALENDAR_REFRESH_TOKEN
  );
}

export function hasSupabaseConfig(config: AppConfig): boolean {
  return Boolean(config.SUPABASE_URL && config.SUPABASE_SERVICE_ROLE_KEY);
}
