import { Temporal } from 'temporal-polyfill';
import { EventId, PlannerEvent, TimeRange } from '../types';
import { IntervalTree } from './intervalTree';

/**
 * Time index over the event set: incremental upsert/remove keyed by event id,
 * overlap queries answered by the interval tree.
 */
export class IntervalIndex {
  private tree = new IntervalTree<PlannerEvent>();
  private byId = new Map<EventId, PlannerEvent>();

  get size(): number {
    return this.byId.size;
  }

  upsert(event: PlannerEvent): void {
    const previous = this.byId.get(event.id);
    if (previous) {
      this.tree.remove(previous.id, previous.begin.epochMilliseconds);
    }
    this.tree.insert(
      event.id,
      event.begin.epochMilliseconds,
      event.end.epochMilliseconds,
      event
    );
    this.byId.set(event.id, event);
  }

  remove(id: EventId): boolean {
    const previous = this.byId.get(id);
    if (!previous) return false;
    this.tree.remove(previous.id, previous.begin.epochMilliseconds);
    this.byId.delete(id);
    return true;
  }

  has(id: EventId): boolean {
    return this.byId.has(id);
  }

  rebuild(events: Iterable<PlannerEvent>): void {
    this.clear();
    for (const event of events) {
      this.upsert(event);
    }
  }

  clear(): void {
    this.tree.clear();
    this.byId.clear();
  }

  /**
   * Events overlapping the instant
   */
  at(instant: Temporal.Instant): PlannerEvent[] {
    return this.tree.queryPoint(instant.epochMilliseconds);
  }

  /**
   * Events overlapping [range.begin, range.end), ascending by begin
   */
  overlapping(range: TimeRange): PlannerEvent[] {
    return this.tree.queryRange(
      range.begin.epochMilliseconds,
      range.end.epochMilliseconds
    );
  }

  /**
   * Other events whose interval overlaps the given event
   */
  conflictsFor(id: EventId): PlannerEvent[] {
    const event = this.byId.get(id);
    if (!event) return [];
    return this.overlapping(event).filter(other => other.id !== id);
  }

  beginningBetween(
    after: Temporal.Instant,
    until: Temporal.Instant
  ): PlannerEvent[] {
    return this.tree.beginsBetween(
      after.epochMilliseconds,
      until.epochMilliseconds
    );
  }

  beginningAfter(after: Temporal.Instant): Iterable<PlannerEvent> {
    return this.tree.beginsAfter(after.epochMilliseconds);
  }

  all(): PlannerEvent[] {
    return this.tree.values();
  }
}
