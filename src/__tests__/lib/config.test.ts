import { describe, it, expect } from "vitest";
import { loadConfig, hasGoogleCalendarConfig, hasSupabaseConfig } from "@/lib/config";

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    const config = loadConfig({});

    expect(config.OPENAI_MODEL).toBe("gpt-4o-mini");
    expect(config.GOOGLE_CALENDAR_ID).toBe("primary");
    expect(config.CLINIC_NAME).toBe("Bright Smile Dental Clinic");
    expect(config.OPENAI_API_KEY).toBeUndefined();
    expect(hasGoogleCalendarConfig(config)).toBe(false);
    expect(hasSupabaseConfig(config)).toBe(false);
  });

  it("treats empty variables as unset", () => {
    const config = loadConfig({ OPENAI_API_KEY: "", SUPABASE_URL: "" });

    expect(config.OPENAI_API_KEY).toBeUndefined();
    expect(config.SUPABASE_URL).toBeUndefined();
  });

  it("detects complete collaborator settings", () => {
    const config = loadConfig({
      GOOGLE_CALENDAR_CLIENT_ID: "test-client",
      GOOGLE_CALENDAR_CLIENT_SECRET: "test-secret",
      GOOGLE_CALENDAR_REDIRECT_URI: "http://localhost/callback",
      GOOGLE_CALENDAR_REFRESH_TOKEN: "test-refresh-token",
      SUPABASE_URL: "http://localhost:54321",
      SUPABASE_SERVICE_ROLE_KEY: "test-service-key",
    });

    expect(hasGoogleCalendarConfig(config)).toBe(true);
    expect(hasSupabaseConfig(config)).toBe(true);
  });

  it("rejects a malformed Supabase URL", () => {
    expect(() => loadConfig({ SUPABASE_URL: "not a url" })).toThrow(
      "invalid configuration: SUPABASE_URL: Invalid url"
    );
  });
});
