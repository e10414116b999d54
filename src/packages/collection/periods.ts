/**
 * Period partitioning
 *
 * The Guru transactions endpoint rejects wide date ranges, so collection
 * windows are cut into blocks that close at the end of April, August and
 * December (or at the requested end).
 */

import type { Periodicity } from '../../types/domain.js';
import { formatIsoDate, parseIsoDate } from '../../utils/dates.js';
import { ValidationError } from '../../utils/errors.js';

export type DateBlock = [start: string, end: string];

export interface SubscriptionPeriod {
  start: Date;
  end: Date;
  /** Month number (monthly) or bimester number 1..6 (bimonthly) */
  period: number;
}

// ============================================================================
// Calendar helpers (UTC)
// ============================================================================

export function bimesterOfMonth(month: number): number {
  return 1 + Math.floor((month - 1) / 2);
}

export function monthStart(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), 1));
}

/**
 * Last millisecond of the month containing `date`
 */
export function monthEnd(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth() + 1, 1) - 1);
}

export function firstDayOfNextMonth(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth() + 1, 1));
}

export function bimesterStart(date: Date): Date {
  const month = date.getUTCMonth();
  return new Date(Date.UTC(date.getUTCFullYear(), month - (month % 2), 1));
}

export function bimesterEnd(date: Date): Date {
  const month = date.getUTCMonth();
  return new Date(Date.UTC(date.getUTCFullYear(), month - (month % 2) + 2, 1) - 1);
}

function startOfDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

function toDay(value: Date | string, field: string): Date {
  if (value instanceof Date) {
    return startOfDay(value);
  }
  const parsed = parseIsoDate(value);
  if (!parsed) {
    throw new ValidationError(`Invalid date, expected YYYY-MM-DD: ${value}`, field);
  }
  return parsed;
}

// ============================================================================
// Partitioning
// ============================================================================

/**
 * Split [start, end] into contiguous day-granular blocks closing on
 * Apr 30, Aug 31, Dec 31 or `end`
 */
export function splitIntoQuarterBlocks(start: Date | string, end: Date | string): DateBlock[] {
  const first = toDay(start, 'start');
  const last = toDay(end, 'end');
  const blocks: DateBlock[] = [];

  let cursor = first;
  while (cursor.getTime() <= last.getTime()) {
    const month = cursor.getUTCMonth() + 1;
    const closingMonth = month <= 4 ? 4 : month <= 8 ? 8 : 12;
    // Day 0 of the following month is the last day of closingMonth
    const closing = new Date(Date.UTC(cursor.getUTCFullYear(), closingMonth, 0));
    const blockEnd = closing.getTime() > last.getTime() ? last : closing;

    blocks.push([formatIsoDate(cursor), formatIsoDate(blockEnd)]);
    cursor = firstDayOfNextMonth(blockEnd);
  }

  return blocks;
}

/**
 * Bounds of the subscription period for (year, month)
 */
export function subscriptionPeriod(year: number, month: number, periodicity: Periodicity): SubscriptionPeriod {
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new ValidationError('Month must be between 1 and 12', 'month');
  }
  if (!Number.isInteger(year) || year < 1900) {
    throw new ValidationError('Invalid year', 'year');
  }

  const reference = new Date(Date.UTC(year, month - 1, 1));
  if (periodicity === 'monthly') {
    return { start: monthStart(reference), end: monthEnd(reference), period: month };
  }
  return { start: bimesterStart(reference), end: bimesterEnd(reference), period: bimesterOfMonth(month) };
}

/**
 * Month or bimester number containing `date`
 */
export function periodOfDate(date: Date, periodicity: Periodicity): number {
  const month = date.getUTCMonth() + 1;
  return periodicity === 'monthly' ? month : bimesterOfMonth(month);
}

/**
 * Look-back blocks for an N-year plan: from `years` before the month after
 * `periodEnd`, never earlier than `floor`, up to `periodEnd`
 */
export function multiYearWindow(periodEnd: Date, years: number, floor: Date): DateBlock[] {
  const base = firstDayOfNextMonth(periodEnd);
  const lookBack = new Date(Date.UTC(base.getUTCFullYear() - years, base.getUTCMonth(), 1));
  const start = lookBack.getTime() < floor.getTime() ? floor : lookBack;
  return splitIntoQuarterBlocks(start, periodEnd);
}
