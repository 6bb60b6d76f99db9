import type { PreferencePatch, UserPreferences } from "./types";

export function hasPreferenceFields(patch: PreferencePatch): boolean {
  return (
    patch.preferredTimes !== undefined ||
    patch.preferredDentist !== undefined ||
    patch.insuranceProvider !== undefined ||
    patch.dentalAnxiety !== undefined ||
    patch.prefersBriefResponses !== undefined ||
    patch.prefersEmojis !== undefined ||
    patch.tone !== undefined
  );
}

/**
 * Field-wise merge: a field in the patch overwrites, an absent one keeps
 * the stored value. `lastUpdated` only moves when something was provided.
 */
export function mergePreferences(
  current: UserPreferences,
  patch: PreferencePatch,
  now: Date,
): UserPreferences {
  const merged: UserPreferences = { ...current };

  if (patch.preferredTimes !== undefined) merged.preferredTimes = [...patch.preferredTimes];
  if (patch.preferredDentist !== undefined) merged.preferredDentist = patch.preferredDentist;
  if (patch.insuranceProvider !== undefined) merged.insuranceProvider = patch.insuranceProvider;
  if (patch.dentalAnxiety !== undefined) merged.dentalAnxiety = patch.dentalAnxiety;
  if (patch.prefersBriefResponses !== undefined) {
    merged.prefersBriefResponses = patch.prefersBriefResponses;
  }
  if (patch.prefersEmojis !== undefined) merged.prefersEmojis = patch.prefersEmojis;
  if (patch.tone !== undefined) merged.tone = patch.tone;

  if (hasPreferenceFields(patch)) {
    merged.lastUpdated = now.toISOString();
  }

  return merged;
}

/** Only the fields that are set; an empty preferred-times list counts as unset. */
export function filterPreferences(preferences: UserPreferences): PreferencePatch {
  const filtered: PreferencePatch = {};

  if (preferences.preferredTimes && preferences.preferredTimes.length > 0) {
    filtered.preferredTimes = [...preferences.preferredTimes];
  }
  if (preferences.preferredDentist) filtered.preferredDentist = preferences.preferredDentist;
  if (preferences.insuranceProvider) filtered.insuranceProvider = preferences.insuranceProvider;
  if (preferences.dentalAnxiety !== undefined) filtered.dentalAnxiety = preferences.dentalAnxiety;
  if (preferences.prefersBriefResponses !== undefined) {
    filtered.prefersBriefResponses = preferences.prefersBriefResponses;
  }
  if (preferences.prefersEmojis !== undefined) filtered.prefersEmojis = preferences.prefersEmojis;
  if (preferences.tone) filtered.tone = preferences.tone;

  return filtered;
}

export function describePreferences(preferences: PreferencePatch): string {
  const parts: string[] = [];

  if (preferences.preferredTimes) {
    parts.push(`preferred times: ${preferences.preferredTimes.join(", ")}`);
  }
  if (preferences.preferredDentist) parts.push(`preferred dentist: ${preferences.preferredDentist}`);
  if (preferences.insuranceProvider) parts.push(`insurance: ${preferences.insuranceProvider}`);
  if (preferences.dentalAnxiety !== undefined) {
    parts.push(`dental anxiety: ${preferences.dentalAnxiety ? "yes" : "no"}`);
  }
  if (preferences.prefersBriefResponses !== undefined) {
    parts.push(`brief responses: ${preferences.prefersBriefResponses ? "yes" : "no"}`);
  }
  if (preferences.prefersEmojis !== undefined) {
    parts.push(`emojis: ${preferences.prefersEmojis ? "yes" : "no"}`);
  }
  if (preferences.tone) parts.push(`tone: ${preferences.tone}`);

  return parts.join("; ");
}
