import { Temporal } from 'temporal-polyfill';
import { EventId, PlannerEvent } from './event';

export type Clock = () => Temporal.Instant;

/**
 * External notification delivery (e.g. an OS "show notification" call).
 * Fire-and-forget: the scheduler never awaits delivery.
 */
export interface Notifier {
  notify(title: string, body: string, fireTime: Temporal.Instant): void;
}

export interface FiredNotification {
  eventId: EventId;
  title: string;
  body: string;
  fireTime: Temporal.Instant;
}

/**
 * Read access to event start times, ordered by begin
 */
export interface NotificationSource {
  // events with after < begin <= until
  beginningBetween(after: Temporal.Instant, until: Temporal.Instant): PlannerEvent[];
  // events with begin > after, ascending by begin
  beginningAfter(after: Temporal.Instant): Iterable<PlannerEvent>;
}

export interface NotificationConfig {
  enabled: boolean;
  maxSleepMs: number;
  anomalyToleranceMs: number;
}
