// lib/phone.ts
// Dial-in number detection for free-text event descriptions.

// +1 (415) 555-0132 | 415-555-0132 | 415.555.0132 | 4155550132
// Not allowed to start or end inside a longer run of digits (meeting ids, PINs).
const NANP_PHONE = /(?<!\d)(?:\+?1[\s.-]*)?(?:\(\d{3}\)|\d{3})[\s.-]*\d{3}[\s.-]*\d{4}(?!\d)/;

/**
 * First North-American phone number in `text`, exactly as written.
 * Descriptions with several numbers are not disambiguated.
 */
export function extractPhoneNumber(text?: string | null): string | null {
  if (!text) return null;
  const m = NANP_PHONE.exec(text);
  return m ? m[0] : null;
}
