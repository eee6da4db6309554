import { failedReading, okReading, Reading } from '../types/telemetry';

/**
 * Line format of the record store (UTF-8, one record per '\n'-terminated line):
 *
 *   2025-02-12 11:28:13.000Z, 1.9899999870176543e-9 mbar
 *   2025-02-12 11:29:00.000Z, FAILED: timeout
 *
 * Timestamps are written in UTC with a 'Z' designator. When parsing, the
 * fraction is optional and a timestamp without 'Z' is read as local time,
 * which is how older stores were written.
 */

const FAILED_PREFIX = 'FAILED: ';

const LINE_PATTERN =
  /^(\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}(?:\.\d{1,3})?Z?), (.*)$/;

const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,3}))?(Z)?$/;

const NUMBER_PATTERN = /^(?:[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?|NaN|[-+]?Infinity)$/;

const singleLine = (text: string): string => text.replace(/[\r\n]+/g, ' ');

export function formatTimestamp(date: Date): string {
  // 2025-02-12T11:28:13.000Z -> 2025-02-12 11:28:13.000Z
  return date.toISOString().replace('T', ' ');
}

export function parseTimestamp(text: string): Date | null {
  const match = TIMESTAMP_PATTERN.exec(text);
  if (!match) return null;
  const [year, month, day, hours, minutes, seconds] = match.slice(1, 7).map(Number);
  const ms = match[7] ? Number(match[7].padEnd(3, '0')) : 0;
  const utc = match[8] === 'Z';

  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth) return null;
  if (hours > 23 || minutes > 59 || seconds > 59) return null;

  return utc
    ? new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds, ms))
    : new Date(year, month - 1, day, hours, minutes, seconds, ms);
}

/** Encodes one reading as a record line, without the terminating newline. */
export function formatRecord(reading: Reading): string {
  const ts = formatTimestamp(reading.timestamp);
  if (reading.status.kind === 'failed') {
    return `${ts}, ${FAILED_PREFIX}${singleLine(reading.status.reason)}`;
  }
  const unit = singleLine(reading.unit);
  const value = Object.is(reading.value, -0) ? '-0' : String(reading.value);
  return unit ? `${ts}, ${value} ${unit}` : `${ts}, ${value}`;
}

/** Decodes one record line (trailing '\r' tolerated). Returns null for anything malformed. */
export function parseRecord(line: string): Reading | null {
  const match = LINE_PATTERN.exec(line.replace(/\r$/, ''));
  if (!match) return null;
  const timestamp = parseTimestamp(match[1]);
  if (!timestamp) return null;
  const body = match[2];

  if (body.startsWith(FAILED_PREFIX)) {
    return failedReading(timestamp, body.slice(FAILED_PREFIX.length));
  }

  const space = body.indexOf(' ');
  const valueText = space === -1 ? body : body.slice(0, space);
  const unit = space === -1 ? '' : body.slice(space + 1);
  if (!NUMBER_PATTERN.test(valueText)) return null;
  return okReading(timestamp, Number(valueText), unit);
}
