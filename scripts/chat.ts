/**
 * Terminal chat with the booking assistant
 * Usage: npm run chat
 *
 * Requires: OPENAI_API_KEY in .env or .env.local. Google Calendar and
 * Supabase are used when configured, otherwise in-memory stand-ins.
 *
 * Commands: /reset, /last, /appointments <email>, /quit
 */

import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { randomUUID } from "node:crypto";
import { createInterface } from "node:readline/promises";
import { stdin, stdout } from "node:process";

import { processMessage } from "@/lib/agents";
import { getAppointmentsForUser } from "@/lib/booking/repository";
import { createSessionStore } from "@/lib/booking/session-store";
import type { CalendarCollaborator, RecordStore } from "@/lib/booking/types";
import { getLastBooking } from "@/lib/booking/workflow";
import { hasGoogleCalendarConfig, hasSupabaseConfig, loadConfig } from "@/lib/config";
import { resetSession } from "@/lib/moderation/guard";
import { errorMessage } from "@/lib/scheduling/errors";
import { formatClinicDateTime } from "@/lib/scheduling/temporal";
import { createAdminClient } from "@/lib/supabase/admin";
import { createGoogleCalendarFromConfig } from "@/services/google-calendar";
import { createInMemoryCalendar } from "@/services/in-memory-calendar";
import { createMemoryRecordStore, createSupabaseRecordStore } from "@/services/record-store";

// Load .env manually (no dotenv dependency)
function loadEnv(filePath: string) {
  let content: string;
  try {
    content = readFileSync(resolve(filePath), "utf-8");
  } catch {
    return; // file not found, skip
  }
  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const eqIdx = trimmed.indexOf("=");
    if (eqIdx === -1) continue;
    const key = trimmed.slice(0, eqIdx).trim();
    let val = trimmed.slice(eqIdx + 1).trim();
    if ((val.startsWith('"') && val.endsWith('"')) || (val.startsWith("'") && val.endsWith("'"))) {
      val = val.slice(1, -1);
    }
    if (!process.env[key]) process.env[key] = val;
  }
}
loadEnv(".env.local");
loadEnv(".env");

const config = loadConfig();

if (!config.OPENAI_API_KEY) {
  console.error("OPENAI_API_KEY not found in .env or .env.local");
  process.exit(1);
}

const calendar: CalendarCollaborator = hasGoogleCalendarConfig(config)
  ? createGoogleCalendarFromConfig(config)
  : createInMemoryCalendar();
const records: RecordStore = hasSupabaseConfig(config)
  ? createSupabaseRecordStore(createAdminClient(config))
  : createMemoryRecordStore();
const sessions = createSessionStore();
let sessionId = randomUUID();

console.log(`\n=== ${config.CLINIC_NAME} booking assistant ===`);
console.log(`Calendar: ${hasGoogleCalendarConfig(config) ? "Google Calendar" : "in-memory"}`);
console.log(`Records:  ${hasSupabaseConfig(config) ? "Supabase" : "in-memory"}`);
console.log("Type /quit to exit.\n");

async function handleCommand(line: string): Promise<boolean> {
  const [command, ...rest] = line.split(/\s+/);

  switch (command) {
    case "/quit":
    case "/exit":
      return false;
    case "/reset":
      resetSession(sessions, sessionId);
      sessionId = randomUUID();
      console.log("Session reset.\n");
      return true;
    case "/last": {
      const last = getLastBooking({ sessions, sessionId });
      console.log(
        last
          ? `Last booking: ${last.patientName}, ${last.date} at ${last.time} (${last.reason})\n`
          : "No booking in this session yet.\n"
      );
      return true;
    }
    case "/appointments": {
      const email = rest.join(" ").trim().toLowerCase();
      if (!email) {
        console.log("Usage: /appointments <email>\n");
        return true;
      }
      const appointments = await getAppointmentsForUser(records, email);
      if (appointments.length === 0) {
        console.log(`No appointments for ${email}.\n`);
        return true;
      }
      for (const appt of appointments) {
        console.log(`  [${appt.status}] ${formatClinicDateTime(new Date(appt.startTime))} ${appt.reason}`);
      }
      console.log("");
      return true;
    }
    default:
      console.log(`Unknown command: ${command}\n`);
      return true;
  }
}

async function main() {
  const rl = createInterface({ input: stdin, output: stdout });

  try {
    for (;;) {
      const line = (await rl.question("You: ")).trim();
      if (!line) continue;

      if (line.startsWith("/")) {
        if (!(await handleCommand(line))) break;
        continue;
      }

      try {
        const result = await processMessage(
          { sessionId, message: line },
          {
            calendar,
            records,
            sessions,
            clinicName: config.CLINIC_NAME,
            model: config.OPENAI_MODEL,
            apiKey: config.OPENAI_API_KEY,
          }
        );
        console.log(`Assistant: ${result.responseText}\n`);
      } catch (err) {
        console.error(`[chat] turn failed: ${errorMessage(err)}\n`);
      }
    }
  } finally {
    rl.close();
  }
}

main().catch((err) => {
  console.error("Fatal:", errorMessage(err));
  process.exit(1);
});
