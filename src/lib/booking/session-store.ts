import type { LastBooking } from "./types";

export const MAX_HISTORY_MESSAGES = 30;

export interface HistoryMessage {
  role: "user" | "assistant";
  content: string;
}

export interface SessionState {
  violations: number;
  lastBooking: LastBooking | null;
  history: HistoryMessage[];
}

/**
 * Conversation-scoped state. Every read and write names its session, so
 * two conversations never see each other's counters or bookings.
 */
export interface SessionStore {
  /** Snapshot of the session; unknown ids read as empty and are not stored. */
  get(sessionId: string): SessionState;
  has(sessionId: string): boolean;
  getViolations(sessionId: string): number;
  recordViolation(sessionId: string): number;
  getLastBooking(sessionId: string): LastBooking | null;
  setLastBooking(sessionId: string, booking: LastBooking | null): void;
  getHistory(sessionId: string): HistoryMessage[];
  appendHistory(sessionId: string, ...messages: HistoryMessage[]): void;
  reset(sessionId: string): void;
}

function emptyState(): SessionState {
  return { violations: 0, lastBooking: null, history: [] };
}

export function createSessionStore(): SessionStore {
  const sessions = new Map<string, SessionState>();

  function ensure(sessionId: string): SessionState {
    let state = sessions.get(sessionId);
    if (!state) {
      state = emptyState();
      sessions.set(sessionId, state);
    }
    return state;
  }

  return {
    get(sessionId) {
      const state = sessions.get(sessionId) ?? emptyState();
      return {
        violations: state.violations,
        lastBooking: state.lastBooking ? { ...state.lastBooking } : null,
        history: [...state.history],
      };
    },

    has(sessionId) {
      return sessions.has(sessionId);
    },

    getViolations(sessionId) {
      return sessions.get(sessionId)?.violations ?? 0;
    },

    recordViolation(sessionId) {
      const state = ensure(sessionId);
      state.violations += 1;
      return state.violations;
    },

    getLastBooking(sessionId) {
      const booking = sessions.get(sessionId)?.lastBooking;
      return booking ? { ...booking } : null;
    },

    setLastBooking(sessionId, booking) {
      ensure(sessionId).lastBooking = booking ? { ...booking } : null;
    },

    getHistory(sessionId) {
      return [...(sessions.get(sessionId)?.history ?? [])];
    },

    appendHistory(sessionId, ...messages) {
      const state = ensure(sessionId);
      state.history.push(...messages);
      if (state.history.length > MAX_HISTORY_MESSAGES) {
        state.history = state.history.slice(state.history.length - MAX_HISTORY_MESSAGES);
      }
    },

    reset(sessionId) {
      sessions.delete(sessionId);
    },
  };
}
