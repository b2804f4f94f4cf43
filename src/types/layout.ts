// Event layout related type definitions
import { Temporal } from 'temporal-polyfill';
import { EventId, PlannerEvent } from './event';

/**
 * Column placement of one event within its overlap cluster.
 * The render layer divides the day column width by columnCount.
 */
export interface ColumnAssignment {
  column: number;
  columnCount: number;
}

export interface LaidOutEvent extends ColumnAssignment {
  event: PlannerEvent;
  day: Temporal.PlainDate;
  // event range clipped to the day
  begin: Temporal.Instant;
  end: Temporal.Instant;
}

export type DayLayout = Map<EventId, ColumnAssignment>;

/**
 * Minimal interval shape consumed by the layout packer
 */
export interface LayoutInterval {
  id: EventId;
  beginMs: number;
  endMs: number;
}
