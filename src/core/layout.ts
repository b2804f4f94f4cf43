import { Temporal } from 'temporal-polyfill';
import {
  DayLayout,
  LaidOutEvent,
  LayoutInterval,
  PlannerEvent,
  TimeRange,
} from '../types';
import { IntervalIndex } from './intervalIndex';
import {
  dayWindow,
  daysTouched,
  maxInstant,
  minInstant,
} from '../utils/temporal';

function isWithin(event: TimeRange, window: TimeRange): boolean {
  const begin = event.begin.epochMilliseconds;
  const end = event.end.epochMilliseconds;
  const from = window.begin.epochMilliseconds;
  const to = window.end.epochMilliseconds;
  if (begin === end) return from <= begin && begin < to;
  return begin < to && end > from;
}

export class EventLayoutCalculator {
  /**
   * Deterministic order: begin, then shorter duration, then id
   */
  static sortForLayout(intervals: LayoutInterval[]): LayoutInterval[] {
    return [...intervals].sort((a, b) => {
      if (a.beginMs !== b.beginMs) return a.beginMs - b.beginMs;
      const durationA = a.endMs - a.beginMs;
      const durationB = b.endMs - b.beginMs;
      if (durationA !== durationB) return durationA - durationB;
      if (a.id === b.id) return 0;
      return a.id < b.id ? -1 : 1;
    });
  }

  /**
   * Split sorted intervals into contiguous clusters of overlapping events
   */
  static groupOverlapping(sorted: LayoutInterval[]): LayoutInterval[][] {
    const groups: LayoutInterval[][] = [];
    let current: LayoutInterval[] = [];
    let clusterEnd = Number.NEGATIVE_INFINITY;

    for (const interval of sorted) {
      if (current.length > 0 && interval.beginMs < clusterEnd) {
        current.push(interval);
        clusterEnd = Math.max(clusterEnd, interval.endMs);
        continue;
      }
      if (current.length > 0) groups.push(current);
      current = [interval];
      clusterEnd = interval.endMs;
    }

    if (current.length > 0) groups.push(current);
    return groups;
  }

  /**
   * Greedy column packing: each event goes to the lowest column whose last
   * end is <= its begin. Every event of a cluster shares the cluster's
   * column count.
   */
  static packColumns(intervals: LayoutInterval[]): DayLayout {
    const layout: DayLayout = new Map();
    const groups = this.groupOverlapping(this.sortForLayout(intervals));

    for (const group of groups) {
      const columnEnds: number[] = [];
      const placed: Array<[string, number]> = [];

      for (const interval of group) {
        let column = columnEnds.findIndex(end => end <= interval.beginMs);
        if (column === -1) {
          column = columnEnds.length;
          columnEnds.push(interval.endMs);
        } else {
          columnEnds[column] = interval.endMs;
        }
        placed.push([interval.id, column]);
      }

      for (const [id, column] of placed) {
        layout.set(id, { column, columnCount: columnEnds.length });
      }
    }

    return layout;
  }

  /**
   * Lay out one display day. Events are clipped to the day window first, so
   * an event crossing midnight takes part in both days' clusters.
   */
  static calculateDayLayout(
    events: PlannerEvent[],
    day: Temporal.PlainDate,
    timeZone: string
  ): LaidOutEvent[] {
    const window = dayWindow(day, timeZone);
    const clipped = events
      .filter(event => isWithin(event, window))
      .map(event => ({
        event,
        begin: maxInstant(event.begin, window.begin),
        end: minInstant(event.end, window.end),
      }));

    const layout = this.packColumns(
      clipped.map(({ event, begin, end }) => ({
        id: event.id,
        beginMs: begin.epochMilliseconds,
        endMs: end.epochMilliseconds,
      }))
    );

    const laidOut: LaidOutEvent[] = [];
    for (const { event, begin, end } of clipped) {
      const assignment = layout.get(event.id);
      if (!assignment) continue;
      laidOut.push({ event, day, begin, end, ...assignment });
    }

    return laidOut.sort(
      (a, b) =>
        a.begin.epochMilliseconds - b.begin.epochMilliseconds ||
        a.column - b.column
    );
  }

  /**
   * Events overlapping the window with their per-day column assignment.
   * Layout always covers whole days so clusters reaching outside the
   * window still get stable columns.
   */
  static layoutWindow(
    index: IntervalIndex,
    window: TimeRange,
    timeZone: string
  ): LaidOutEvent[] {
    const result: LaidOutEvent[] = [];

    for (const day of daysTouched(window, timeZone)) {
      const dayEvents = index.overlapping(dayWindow(day, timeZone));
      for (const item of this.calculateDayLayout(dayEvents, day, timeZone)) {
        if (isWithin(item, window)) {
          result.push(item);
        }
      }
    }

    return result;
  }
}

/**
 * Largest number of intervals sharing a point in time. A zero-length
 * interval counts at its instant against intervals strictly containing it.
 */
export function maxConcurrency(intervals: LayoutInterval[]): number {
  // order at equal time: positive ends, reminders, positive begins
  const points: Array<{ at: number; order: number; delta: number }> = [];
  for (const { beginMs, endMs } of intervals) {
    if (beginMs === endMs) {
      points.push({ at: beginMs, order: 1, delta: 0 });
    } else {
      points.push({ at: beginMs, order: 2, delta: 1 });
      points.push({ at: endMs, order: 0, delta: -1 });
    }
  }
  points.sort((a, b) => a.at - b.at || a.order - b.order);

  let open = 0;
  let max = 0;
  for (const point of points) {
    if (point.order === 1) {
      max = Math.max(max, open + 1);
      continue;
    }
    open += point.delta;
    max = Math.max(max, open);
  }
  return max;
}
