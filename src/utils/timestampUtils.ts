const ISO_TIMESTAMP =
  /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2})(?::(\d{2})(?:\.(\d+))?)?(Z|[+\- ]\d{2}:?\d{2})?$/i;

/**
 * Parses the ISO-8601 variants clients send for `before`: with or without
 * fractional seconds (any precision, truncated to milliseconds) and with or
 * without a `Z`/offset suffix. A missing zone means UTC. A space in place of
 * `+` (an unencoded query string) is accepted as a positive offset.
 */
export const parseTimestamp = (raw: string): Date | null => {
  const match = ISO_TIMESTAMP.exec(raw.trim());
  if (!match) return null;

  const [, date, hoursMinutes, seconds, fraction, zone] = match;
  const millis = (fraction || '').slice(0, 3).padEnd(3, '0');

  let offset = 'Z';
  if (zone && zone.toUpperCase() !== 'Z') {
    const sign = zone[0] === '-' ? '-' : '+';
    const digits = zone.slice(1).replace(':', '');
    offset = `${sign}${digits.slice(0, 2)}:${digits.slice(2)}`;
  }

  const parsed = new Date(`${date}T${hoursMinutes}:${seconds || '00'}.${millis}${offset}`);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
};
