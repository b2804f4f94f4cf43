/**
 * Edit command builders and interpreters
 *
 * Builders read the current event once and capture both the pre- and the
 * post-state, so inverting a command never consults the model again.
 */

import { Temporal } from 'temporal-polyfill';
import {
  CreateCommand,
  DeleteCommand,
  EditCommand,
  EventDetails,
  EventId,
  MarkCompleteCommand,
  ModelChange,
  MoveCommand,
  PlannerEvent,
  ResizeCommand,
  RetitleCommand,
  TimeRange,
  UpdateCommand,
} from '../types';
import { DuplicateIdError, InvalidRangeError, NotFoundError } from './errors';
import { EventModel } from './eventModel';

export interface EventReader {
  get(id: EventId): PlannerEvent | undefined;
}

function requireEvent(model: EventReader, id: EventId): PlannerEvent {
  const event = model.get(id);
  if (!event) {
    throw new NotFoundError(id);
  }
  return event;
}

function checkedRange(range: TimeRange): TimeRange {
  if (Temporal.Instant.compare(range.end, range.begin) < 0) {
    throw new InvalidRangeError(range.begin, range.end);
  }
  return { begin: range.begin, end: range.end };
}

const rangeOf = (event: PlannerEvent): TimeRange => ({
  begin: event.begin,
  end: event.end,
});

const detailsOf = (event: PlannerEvent): EventDetails =>
  event.notes === undefined
    ? { group: event.group }
    : { notes: event.notes, group: event.group };

// ============================================================================
// Builders
// ============================================================================

export function createCommand(event: PlannerEvent): CreateCommand {
  checkedRange(event);
  return { kind: 'create', eventId: event.id, after: event };
}

export function deleteCommand(model: EventReader, id: EventId): DeleteCommand {
  return { kind: 'delete', eventId: id, before: requireEvent(model, id) };
}

export function moveCommand(
  model: EventReader,
  id: EventId,
  to: TimeRange
): MoveCommand {
  const event = requireEvent(model, id);
  return {
    kind: 'move',
    eventId: id,
    before: rangeOf(event),
    after: checkedRange(to),
  };
}

export function resizeCommand(
  model: EventReader,
  id: EventId,
  to: TimeRange
): ResizeCommand {
  const event = requireEvent(model, id);
  return {
    kind: 'resize',
    eventId: id,
    before: rangeOf(event),
    after: checkedRange(to),
  };
}

export function retitleCommand(
  model: EventReader,
  id: EventId,
  title: string
): RetitleCommand {
  const event = requireEvent(model, id);
  return { kind: 'retitle', eventId: id, before: event.title, after: title };
}

export function markCompleteCommand(
  model: EventReader,
  id: EventId,
  completed = true
): MarkCompleteCommand {
  const event = requireEvent(model, id);
  return {
    kind: 'mark-complete',
    eventId: id,
    before: event.completed,
    after: completed,
  };
}

export function updateCommand(
  model: EventReader,
  id: EventId,
  details: Partial<EventDetails>
): UpdateCommand {
  const event = requireEvent(model, id);
  const before = detailsOf(event);
  const after: EventDetails = {
    group: details.group ?? before.group,
    notes: 'notes' in details ? details.notes : before.notes,
  };
  return { kind: 'update', eventId: id, before, after };
}

// ============================================================================
// Interpretation
// ============================================================================

/**
 * Pure inverse of a command
 */
export function invertCommand(command: EditCommand): EditCommand {
  switch (command.kind) {
    case 'create':
      return { kind: 'delete', eventId: command.eventId, before: command.after };
    case 'delete':
      return { kind: 'create', eventId: command.eventId, after: command.before };
    case 'move':
    case 'resize':
      return { ...command, before: command.after, after: command.before };
    case 'retitle':
      return { ...command, before: command.after, after: command.before };
    case 'mark-complete':
      return { ...command, before: command.after, after: command.before };
    case 'update':
      return { ...command, before: command.after, after: command.before };
  }
}

/**
 * Apply a command's forward effect to the model. Throws before mutating
 * when the event is missing, a created id is taken, or the resulting range
 * is inverted.
 */
export function applyToModel(model: EventModel, command: EditCommand): ModelChange {
  const { eventId } = command;

  switch (command.kind) {
    case 'create': {
      if (model.has(eventId)) {
        throw new DuplicateIdError(eventId);
      }
      const after = model.restore(command.after);
      return { eventId, before: null, after };
    }
    case 'delete': {
      const before = model.delete(eventId);
      return { eventId, before, after: null };
    }
    case 'move':
    case 'resize': {
      const before = requireEvent(model, eventId);
      const after = model.update(eventId, {
        begin: command.after.begin,
        end: command.after.end,
      });
      return { eventId, before, after };
    }
    case 'retitle': {
      const before = requireEvent(model, eventId);
      const after = model.update(eventId, { title: command.after });
      return { eventId, before, after };
    }
    case 'mark-complete': {
      const before = requireEvent(model, eventId);
      const after = model.update(eventId, { completed: command.after });
      return { eventId, before, after };
    }
    case 'update': {
      const before = requireEvent(model, eventId);
      const after = model.update(eventId, {
        group: command.after.group,
        notes: command.after.notes,
      });
      return { eventId, before, after };
    }
  }
}

export function describeCommand(command: EditCommand): string {
  return `${command.kind} ${command.eventId}`;
}
