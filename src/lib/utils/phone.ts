/**
 * Phone number utilities for Indian mobile numbers.
 *
 * Canonical form is the 10-digit national number, which always starts
 * with 6, 7, 8 or 9. Callers may include the +91 country code, a trunk
 * 0, spaces or dashes.
 */

const MOBILE_PATTERN = /^[6-9]\d{9}$/;

/**
 * Strip all non-digit characters from a phone string.
 */
export function stripNonDigits(phone: string): string {
  return phone.replace(/\D/g, "");
}

/**
 * Normalize to the 10-digit national number:
 *   "+91 98765-43210" → "9876543210"
 *   "09876543210"     → "9876543210"
 *   "9876543210"      → "9876543210"
 *
 * Anything else is returned as bare digits and fails validation.
 */
export function normalizeINPhone(phone: string): string {
  const digits = stripNonDigits(phone);

  if (digits.length === 12 && digits.startsWith("91")) {
    return digits.slice(2);
  }
  if (digits.length === 11 && digits.startsWith("0")) {
    return digits.slice(1);
  }

  return digits;
}

export function isValidINMobile(phone: string): boolean {
  return MOBILE_PATTERN.test(phone);
}
