const MIN_PHONE_DIGITS = 10;
const MAX_PHONE_DIGITS = 15;

export const DEFAULT_MAX_MESSAGE_LENGTH = 5000;

/**
 * Reduces a phone-like string to its digits. Returns null unless the result
 * has 10-15 digits and at least one of them is non-zero.
 */
export function normalizePhone(raw: string | null | undefined): string | null {
  if (!raw) return null;

  const digits = raw.replace(/\D/g, '');
  if (digits.length < MIN_PHONE_DIGITS || digits.length > MAX_PHONE_DIGITS) {
    return null;
  }
  if (/^0+$/.test(digits)) {
    return null;
  }
  return digits;
}

/**
 * Extracts the canonical phone from a WhatsApp JID,
 * e.g. "5511999999999@s.whatsapp.net" -> "5511999999999".
 */
export function extractWhatsAppPhone(remoteJid: string | null | undefined): string | null {
  if (!remoteJid) return null;
  const [user] = remoteJid.split('@');
  return normalizePhone(user);
}

/** Drops control characters except newline and tab, then truncates. */
export function sanitizeText(text: string | null | undefined, maxLength: number = DEFAULT_MAX_MESSAGE_LENGTH): string {
  if (!text) return '';

  // Iterates code points so truncation never splits a surrogate pair.
  const kept: string[] = [];
  for (const char of text) {
    if (kept.length >= maxLength) break;
    const code = char.charCodeAt(0);
    if (code >= 32 || char === '\n' || char === '\t') {
      kept.push(char);
    }
  }
  return kept.join('');
}

/** HH:MM inside business hours, start inclusive and end exclusive on the hour. */
export function isBusinessHoursTime(time: string, startHour: number = 9, endHour: number = 18): boolean {
  const match = /^([0-1]?[0-9]|2[0-3]):([0-5][0-9])$/.exec(time);
  if (!match) return false;

  const hours = parseInt(match[1], 10);
  return hours >= startHour && hours < endHour;
}
