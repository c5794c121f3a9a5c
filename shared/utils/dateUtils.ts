/**
 * Trading date keys are read as UTC so a key always maps to the same instant
 * wherever the process runs.
 */

const DATE_KEY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2}))?)?$/;

/**
 * Parse a provider date key ("2024-01-02" or "2024-01-02 16:00:00") into a Date.
 * @returns the UTC instant, or null when the key is not a real calendar date/time
 */
export function parseTradingDate(key: string): Date | null {
  const match = DATE_KEY_PATTERN.exec(key.trim());
  if (!match) {
    return null;
  }

  const [, y, mo, d, h = '00', mi = '00', s = '00'] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);

  if (month < 1 || month > 12 || day < 1 || hour > 23 || minute > 59 || second > 59) {
    return null;
  }

  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));

  // Date.UTC rolls 2024-02-30 over into March
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }

  return date;
}
