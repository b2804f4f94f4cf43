import { Temporal } from 'temporal-polyfill';
import { MS_PER_MINUTE } from '../utils/temporal';

const MINUTES_PER_DAY = 24 * 60;

/**
 * Round a minute-of-day value to the nearest multiple of step, halves up
 */
export const roundToStep = (minutes: number, step: number): number =>
  Math.floor(minutes / step + 0.5) * step;

/**
 * Snap an instant to the wall-clock grid of the display zone.
 * 10:07 snaps to 10:00 and 10:08 to 10:15 at 15 minute granularity;
 * a result of 24:00 becomes the start of the next day. In the repeated hour
 * after a fall-back the pointer's own offset decides which 01:00 is meant.
 */
export function snapInstant(
  instant: Temporal.Instant,
  granularityMinutes: number,
  timeZone: string
): Temporal.Instant {
  const zdt = instant.toZonedDateTimeISO(timeZone);
  const minuteOfDay =
    zdt.hour * 60 +
    zdt.minute +
    (zdt.second * 1000 + zdt.millisecond) / MS_PER_MINUTE;

  let snapped = roundToStep(minuteOfDay, granularityMinutes);
  let day = zdt.toPlainDate();
  if (snapped >= MINUTES_PER_DAY) {
    snapped -= MINUTES_PER_DAY;
    day = day.add({ days: 1 });
  }

  const wall = day.toPlainDateTime({ hour: Math.floor(snapped / 60), minute: snapped % 60 });
  const earlier = wall.toZonedDateTime(timeZone, { disambiguation: 'earlier' });
  const later = wall.toZonedDateTime(timeZone, { disambiguation: 'later' });
  const repeated = !earlier.equals(later) && earlier.toPlainDateTime().equals(wall);
  if (repeated && later.offsetNanoseconds === zdt.offsetNanoseconds) {
    return later.toInstant();
  }
  // gaps resolve forward
  return wall.toZonedDateTime(timeZone).toInstant();
}
