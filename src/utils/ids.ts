import { randomUUID } from 'node:crypto';
import { EventId } from '../types/event';

/**
 * Generate a stable event identifier (UUID v4, also used as the iCalendar UID)
 */
export function newEventId(): EventId {
  return randomUUID();
}
