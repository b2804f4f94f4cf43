import { Temporal } from 'temporal-polyfill';

export type EventId = string;

/**
 * Calendar event (using Temporal API)
 * begin/end are absolute instants; the display time zone is applied only
 * when laying out, snapping and rendering.
 */
export interface PlannerEvent {
  readonly id: EventId;
  readonly title: string;
  readonly notes?: string;

  // Half-open interval [begin, end). begin === end marks a reminder.
  readonly begin: Temporal.Instant;
  readonly end: Temporal.Instant;

  // Calendar tag; one group maps to one calendar file
  readonly group: string;
  readonly completed: boolean;

  readonly createdAt: Temporal.Instant;
  readonly modifiedAt: Temporal.Instant;
}

export interface TimeRange {
  readonly begin: Temporal.Instant;
  readonly end: Temporal.Instant;
}

/**
 * Fields that may be changed on an existing event
 */
export type EventPatch = Partial<
  Pick<PlannerEvent, 'title' | 'notes' | 'begin' | 'end' | 'group' | 'completed'>
>;

export interface CreateEventOptions {
  id?: EventId;
  notes?: string;
  completed?: boolean;
  createdAt?: Temporal.Instant;
}
