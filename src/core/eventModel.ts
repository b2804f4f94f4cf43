import { Temporal } from 'temporal-polyfill';
import {
  CreateEventOptions,
  EventId,
  EventPatch,
  PlannerEvent,
} from '../types';
import { InvalidRangeError, NotFoundError } from './errors';
import { newEventId } from '../utils/ids';
import { nowInstant, toStoredPrecision } from '../utils/temporal';

/**
 * Validate a (partial) event, returning human readable problems
 */
export function validateEvent(event: Partial<PlannerEvent>): string[] {
  const errors: string[] = [];

  if (event.title !== undefined && typeof event.title !== 'string') {
    errors.push('Event title must be a string');
  }

  if (event.id !== undefined && (typeof event.id !== 'string' || event.id === '')) {
    errors.push('Event ID must be a non-empty string');
  }

  if (event.group !== undefined && event.group.trim() === '') {
    errors.push('Event group is required');
  }

  if (
    event.begin &&
    event.end &&
    Temporal.Instant.compare(event.end, event.begin) < 0
  ) {
    errors.push('End time must not be before begin time');
  }

  return errors;
}

function assertRange(begin: Temporal.Instant, end: Temporal.Instant): void {
  if (Temporal.Instant.compare(end, begin) < 0) {
    throw new InvalidRangeError(begin, end);
  }
}

/**
 * Arena of events keyed by id. Owned by the edit history; every other
 * component reads through the history's query methods.
 */
export class EventModel {
  private events = new Map<EventId, PlannerEvent>();

  constructor(private readonly clock: () => Temporal.Instant = nowInstant) {}

  /**
   * Build and insert a new event with a fresh identifier
   */
  create(
    title: string,
    begin: Temporal.Instant,
    end: Temporal.Instant,
    group: string,
    options: CreateEventOptions = {}
  ): PlannerEvent {
    assertRange(begin, end);
    const event = buildEvent(title, begin, end, group, {
      ...options,
      createdAt: options.createdAt ?? this.clock(),
    });
    this.events.set(event.id, event);
    return event;
  }

  update(id: EventId, patch: EventPatch): PlannerEvent {
    const existing = this.events.get(id);
    if (!existing) {
      throw new NotFoundError(id);
    }

    const begin = toStoredPrecision(patch.begin ?? existing.begin);
    const end = toStoredPrecision(patch.end ?? existing.end);
    assertRange(begin, end);

    const updated: PlannerEvent = {
      ...existing,
      ...patch,
      begin,
      end,
      modifiedAt: toStoredPrecision(this.clock()),
    };
    this.events.set(id, updated);
    return updated;
  }

  delete(id: EventId): PlannerEvent {
    const existing = this.events.get(id);
    if (!existing) {
      throw new NotFoundError(id);
    }
    this.events.delete(id);
    return existing;
  }

  /**
   * Insert a snapshot verbatim (undo of a delete, loading from storage)
   */
  restore(event: PlannerEvent): PlannerEvent {
    assertRange(event.begin, event.end);
    const stored = atStoredPrecision(event);
    this.events.set(stored.id, stored);
    return stored;
  }

  get(id: EventId): PlannerEvent | undefined {
    return this.events.get(id);
  }

  has(id: EventId): boolean {
    return this.events.has(id);
  }

  all(): PlannerEvent[] {
    return [...this.events.values()];
  }

  get size(): number {
    return this.events.size;
  }

  clear(): void {
    this.events.clear();
  }
}

/**
 * Construct an event value without inserting it anywhere
 */
export function buildEvent(
  title: string,
  begin: Temporal.Instant,
  end: Temporal.Instant,
  group: string,
  options: CreateEventOptions = {}
): PlannerEvent {
  assertRange(begin, end);
  const createdAt = toStoredPrecision(options.createdAt ?? nowInstant());
  const event: PlannerEvent = {
    id: options.id ?? newEventId(),
    title,
    begin: toStoredPrecision(begin),
    end: toStoredPrecision(end),
    group,
    completed: options.completed ?? false,
    createdAt,
    modifiedAt: createdAt,
  };
  return options.notes === undefined ? event : { ...event, notes: options.notes };
}

function atStoredPrecision(event: PlannerEvent): PlannerEvent {
  const fields = ['begin', 'end', 'createdAt', 'modifiedAt'] as const;
  if (fields.every(field => event[field].epochMilliseconds % 1000 === 0)) {
    return event;
  }
  return {
    ...event,
    begin: toStoredPrecision(event.begin),
    end: toStoredPrecision(event.end),
    createdAt: toStoredPrecision(event.createdAt),
    modifiedAt: toStoredPrecision(event.modifiedAt),
  };
}
