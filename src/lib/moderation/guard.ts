import type { SessionStore } from "@/lib/booking/session-store";

export const BLOCK_THRESHOLD = 3;

export const LOCK_MESSAGE =
  "This conversation has been locked because of repeated inappropriate messages. " +
  "Please contact the clinic directly or start a new session if you need help with an appointment.";

const WARNINGS: Record<number, string> = {
  1: "Please keep our conversation respectful. I'm happy to help you with your dental appointment.",
  2: "This is your final warning. One more inappropriate message will lock this conversation.",
};

export type ModerationResult =
  | { status: "warn"; message: string; violations: number; locked: false }
  | { status: "blocked"; message: string; violations: number; locked: true };

/**
 * Records one flagged turn for the session and picks the response. The
 * caller decides what counts as flagged; the guard only escalates.
 */
export function moderationGuard(sessions: SessionStore, sessionId: string): ModerationResult {
  const violations = sessions.recordViolation(sessionId);

  if (violations >= BLOCK_THRESHOLD) {
    console.warn(`[moderation] session ${sessionId} blocked after ${violations} violations`);
    return { status: "blocked", message: LOCK_MESSAGE, violations, locked: true };
  }

  console.log(`[moderation] session ${sessionId} warned (${violations}/${BLOCK_THRESHOLD})`);
  return { status: "warn", message: WARNINGS[violations], violations, locked: false };
}

export function isSessionBlocked(sessions: SessionStore, sessionId: string): boolean {
  return sessions.getViolations(sessionId) >= BLOCK_THRESHOLD;
}

/** Clears the moderation counter, last booking and history of one session. */
export function resetSession(sessions: SessionStore, sessionId: string): void {
  sessions.reset(sessionId);
  console.log(`[moderation] session ${sessionId} reset`);
}
