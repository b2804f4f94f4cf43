import { PlannerEvent } from '../types';
import { durationMs, formatClock, formatTimeRange } from '../utils/temporal';

export interface NotificationMessage {
  title: string;
  body: string;
}

/**
 * Notification text for an event starting now, times in the display zone
 */
export function renderNotification(
  event: PlannerEvent,
  timeZone: string
): NotificationMessage {
  const when =
    durationMs(event) === 0
      ? formatClock(event.begin, timeZone)
      : formatTimeRange(event, timeZone);

  return {
    title: `Time for ${event.title}`,
    body: event.notes ? `${when}\n${event.notes}` : when,
  };
}
