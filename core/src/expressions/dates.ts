export type DateTimeRange = { start: string; end: string };

const PARTIAL_DATE_TIME =
  /^(\d{4})(?:-(\d{2})(?:-(\d{2})(?:T(\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?(Z|[+-]\d{2}:\d{2})?)?)?)?$/;

function int(v: string | undefined): number | undefined {
  return v === undefined ? undefined : Number.parseInt(v, 10);
}

function offsetMinutes(zone: string | undefined): number {
  if (!zone || zone === 'Z') return 0;
  const sign = zone.startsWith('-') ? -1 : 1;
  const [h = '0', m = '0'] = zone.slice(1).split(':');
  return sign * (Number.parseInt(h, 10) * 60 + Number.parseInt(m, 10));
}

// Date.UTC maps years 0-99 onto 1900-1999; setUTCFullYear does not.
function utc(year: number, monthIndex: number, day: number, hour = 0, minute = 0, second = 0, ms = 0): number {
  const d = new Date(0);
  d.setUTCFullYear(year, monthIndex, day);
  d.setUTCHours(hour, minute, second, ms);
  return d.getTime();
}

function daysInMonth(year: number, month: number): number {
  return new Date(utc(year, month, 0)).getUTCDate();
}

/**
 * Expands a partial FHIR date/dateTime into the UTC instant range it covers,
 * e.g. `2020-02` covers `2020-02-01T00:00:00.000Z` to `2020-02-29T23:59:59.999Z`.
 * Returns undefined for malformed input.
 */
export function parseDateTimeRange(value: string): DateTimeRange | undefined {
  const m = PARTIAL_DATE_TIME.exec(value.trim());
  if (!m) return undefined;

  const year = int(m[1]) ?? 0;
  const month = int(m[2]);
  const day = int(m[3]);
  const hour = int(m[4]);
  const minute = int(m[5]);
  const second = int(m[6]);
  const fraction = m[7];

  if (month !== undefined && (month < 1 || month > 12)) return undefined;
  if (day !== undefined && month !== undefined && (day < 1 || day > daysInMonth(year, month))) return undefined;
  if (hour !== undefined && hour > 23) return undefined;
  if (minute !== undefined && minute > 59) return undefined;
  if (second !== undefined && second > 59) return undefined;

  const ms = fraction ? Number.parseInt(fraction.slice(0, 3).padEnd(3, '0'), 10) : 0;
  const start = utc(year, (month ?? 1) - 1, day ?? 1, hour ?? 0, minute ?? 0, second ?? 0, ms);

  let next: number;
  if (month === undefined) next = utc(year + 1, 0, 1);
  else if (day === undefined) next = utc(year, month, 1);
  else if (hour === undefined) next = utc(year, month - 1, day + 1);
  else if (second === undefined) next = start + 60_000;
  else if (!fraction) next = start + 1000;
  else next = start + 1;

  const shift = offsetMinutes(m[8]) * 60_000;
  return {
    start: new Date(start - shift).toISOString(),
    end: new Date(next - 1 - shift).toISOString(),
  };
}
