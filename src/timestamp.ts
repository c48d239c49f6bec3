// Timestamp Normalizer
// Workers write timestamps in one of two dialects:
//   A: HH:MM:SS.fff  (three fields)
//   B: MM:SS.ff      (two fields)
// Everything downstream works in seconds and renders the canonical MM:SS.hh form.

/**
 * Convert either dialect to seconds.
 *
 * The dialect is chosen by counting `:` separators. Any other shape, or a
 * field that is not a number, yields 0 rather than throwing.
 */
export function parseTimestamp(ts: string): number {
  const fields = ts.trim().split(":");

  let seconds: number;
  if (fields.length === 3) {
    const [h, m, s] = fields;
    seconds = parseField(h) * 3600 + parseField(m) * 60 + parseField(s);
  } else if (fields.length === 2) {
    const [m, s] = fields;
    seconds = parseField(m) * 60 + parseField(s);
  } else {
    return 0;
  }

  return Number.isFinite(seconds) ? seconds : 0;
}

function parseField(field: string): number {
  // Number("") is 0, which would hide an empty field
  if (field.trim().length === 0) return NaN;
  return Number(field);
}

/**
 * Render seconds as `MM:SS.hh`. Minutes are not wrapped into hours.
 *
 * The value is rounded to hundredths before splitting so that 59.999 renders
 * as `01:00.00` rather than `00:60.00`.
 */
export function renderTimestamp(seconds: number): string {
  const centis = Number.isFinite(seconds) ? Math.max(0, Math.round(seconds * 100)) : 0;
  const minutes = Math.floor(centis / 6000);
  const remainder = centis % 6000;
  const wholeSeconds = Math.floor(remainder / 100);
  const hundredths = remainder % 100;
  return `${String(minutes).padStart(2, "0")}:${String(wholeSeconds).padStart(2, "0")}.${String(hundredths).padStart(2, "0")}`;
}

/** Re-render a timestamp in either dialect as the canonical form. */
export function toCanonical(ts: string): string {
  return renderTimestamp(parseTimestamp(ts));
}
