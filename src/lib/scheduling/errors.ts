export type SchedulingErrorKind =
  // a date and time that do not name a real instant
  | "invalid_time"
  // collaborators
  | "calendar_unavailable"
  | "storage_unavailable";

export class SchedulingError extends Error {
  readonly kind: SchedulingErrorKind;

  constructor(kind: SchedulingErrorKind, message: string) {
    super(message);
    this.name = "SchedulingError";
    this.kind = kind;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : "Unknown error occurred";
}
