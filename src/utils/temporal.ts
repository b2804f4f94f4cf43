/**
 * Temporal API utility functions
 * Instants are the storage form; day boundaries and clock times are
 * always derived in a display time zone.
 */

import { Temporal } from 'temporal-polyfill';
import { TimeRange } from '../types/event';

export const MS_PER_MINUTE = 60_000;

export function nowInstant(): Temporal.Instant {
  return Temporal.Now.instant();
}

// calendar files keep whole seconds; instants entering the model are cut to match
export function toStoredPrecision(instant: Temporal.Instant): Temporal.Instant {
  return instant.round({ smallestUnit: 'second', roundingMode: 'floor' });
}

export function systemTimeZone(): string {
  return Temporal.Now.timeZoneId();
}

export function instantFromMs(ms: number): Temporal.Instant {
  return Temporal.Instant.fromEpochMilliseconds(ms);
}

export function addMs(instant: Temporal.Instant, ms: number): Temporal.Instant {
  return instantFromMs(instant.epochMilliseconds + ms);
}

export function durationMs(range: TimeRange): number {
  return range.end.epochMilliseconds - range.begin.epochMilliseconds;
}

export function minInstant(a: Temporal.Instant, b: Temporal.Instant): Temporal.Instant {
  return Temporal.Instant.compare(a, b) <= 0 ? a : b;
}

export function maxInstant(a: Temporal.Instant, b: Temporal.Instant): Temporal.Instant {
  return Temporal.Instant.compare(a, b) >= 0 ? a : b;
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    Temporal.Now.zonedDateTimeISO(timeZone);
    return true;
  } catch {
    return false;
  }
}

// ============================================================================
// Day helpers
// ============================================================================

/**
 * Calendar day an instant falls on in the display zone
 */
export function displayDay(
  instant: Temporal.Instant,
  timeZone: string
): Temporal.PlainDate {
  return instant.toZonedDateTimeISO(timeZone).toPlainDate();
}

/**
 * [start of day, start of next day) in the display zone.
 * Not always 24h long: DST transition days are 23h or 25h.
 */
export function dayWindow(day: Temporal.PlainDate, timeZone: string): TimeRange {
  return {
    begin: day.toZonedDateTime({ timeZone }).toInstant(),
    end: day.add({ days: 1 }).toZonedDateTime({ timeZone }).toInstant(),
  };
}

/**
 * Display days touched by a half-open range. A zero-length range touches
 * the day it sits on; a range ending exactly at midnight does not touch
 * the following day.
 */
export function daysTouched(range: TimeRange, timeZone: string): Temporal.PlainDate[] {
  const first = displayDay(range.begin, timeZone);
  const lastInstant =
    durationMs(range) > 0 ? addMs(range.end, -1) : range.begin;
  const last = displayDay(lastInstant, timeZone);

  const days: Temporal.PlainDate[] = [];
  for (
    let day = first;
    Temporal.PlainDate.compare(day, last) <= 0;
    day = day.add({ days: 1 })
  ) {
    days.push(day);
  }
  return days;
}

export function spansSingleDay(range: TimeRange, timeZone: string): boolean {
  return daysTouched(range, timeZone).length === 1;
}

// ============================================================================
// Formatting
// ============================================================================

/**
 * Format instant as HH:MM in the display zone
 */
export function formatClock(instant: Temporal.Instant, timeZone: string): string {
  const zdt = instant.toZonedDateTimeISO(timeZone);
  return `${zdt.hour.toString().padStart(2, '0')}:${zdt.minute
    .toString()
    .padStart(2, '0')}`;
}

export function formatTimeRange(range: TimeRange, timeZone: string): string {
  return `${formatClock(range.begin, timeZone)} - ${formatClock(range.end, timeZone)}`;
}

// setTimeout keeps its delay in a signed 32-bit integer
export const MAX_TIMER_DELAY_MS = 2_147_483_647;
