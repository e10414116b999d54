/**
 * Date helpers
 *
 * Calendar math runs in UTC. Wall-clock stamps for stored documents use the
 * configured time zone.
 */

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const NAIVE_DATETIME = /^\d{4}-\d{2}-\d{2}[ T]\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;

/**
 * Parse a strict YYYY-MM-DD date at UTC midnight, or null
 */
export function parseIsoDate(value: string): Date | null {
  const match = ISO_DATE.exec(value.trim());
  if (!match) {
    return null;
  }
  const [, y, m, d] = match;
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  // Reject overflow such as 2025-02-30
  if (date.getUTCMonth() !== Number(m) - 1 || date.getUTCDate() !== Number(d)) {
    return null;
  }
  return date;
}

/**
 * Parse an instant as the Guru API reports it: epoch seconds, epoch
 * milliseconds, ISO strings, or "YYYY-MM-DD HH:MM:SS" read as UTC
 */
export function parseInstant(value: unknown): Date | null {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      return null;
    }
    return new Date(value > 1e12 ? value : value * 1000);
  }

  if (typeof value !== 'string') {
    return null;
  }

  const text = value.trim();
  if (text === '') {
    return null;
  }
  if (/^\d+(\.\d+)?$/.test(text)) {
    return parseInstant(Number(text));
  }

  const dateOnly = parseIsoDate(text);
  if (dateOnly) {
    return dateOnly;
  }

  const normalized = NAIVE_DATETIME.test(text) ? `${text.replace(' ', 'T')}Z` : text;
  const parsed = new Date(normalized);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * 2025-03-07
 */
export function formatIsoDate(date: Date): string {
  return `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

/**
 * 07/03/2025
 */
export function formatBrDate(date: Date): string {
  return `${pad(date.getUTCDate())}/${pad(date.getUTCMonth() + 1)}/${pad(date.getUTCFullYear(), 4)}`;
}

/**
 * Local wall-clock timestamp "YYYY-MM-DD HH:MM:SS" in the given IANA zone
 */
export function formatLocalTimestamp(date: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(date);

  const get = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((part) => part.type === type)?.value ?? '00';

  return `${get('year')}-${get('month')}-${get('day')} ${get('hour')}:${get('minute')}:${get('second')}`;
}
