// ---------------------------------------------------------------------
// Clinic scheduling constants
// ---------------------------------------------------------------------

/** IANA zone of the clinic. Asia/Kolkata has no DST, so this is a fixed UTC+05:30. */
export const CLINIC_TIMEZONE = "Asia/Kolkata";

export const SLOT_DURATION_MINUTES = 30;

// Local clinic time, minutes since midnight
export const OPEN_MINUTES = 9 * 60;
export const LUNCH_START_MINUTES = 13 * 60;
export const LUNCH_END_MINUTES = 14 * 60;
export const CLOSE_MINUTES = 18 * 60;

/**
 * Multiples of the slot duration scanned around a rejected slot, in the
 * order suggestions are presented. Offset 0 is the rejected slot itself.
 */
export const ALTERNATIVE_SLOT_OFFSETS = [-2, -1, 1, 2, 3, 4, 5, 6, 7, 8] as const;

export const MAX_ALTERNATIVES = 3;
