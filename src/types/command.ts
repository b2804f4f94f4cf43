// Edit command type definitions
import { EventId, PlannerEvent, TimeRange } from './event';

interface CommandBase {
  readonly eventId: EventId;
}

export interface CreateCommand extends CommandBase {
  readonly kind: 'create';
  readonly after: PlannerEvent;
}

export interface DeleteCommand extends CommandBase {
  readonly kind: 'delete';
  readonly before: PlannerEvent;
}

export interface MoveCommand extends CommandBase {
  readonly kind: 'move';
  readonly before: TimeRange;
  readonly after: TimeRange;
}

export interface ResizeCommand extends CommandBase {
  readonly kind: 'resize';
  readonly before: TimeRange;
  readonly after: TimeRange;
}

export interface RetitleCommand extends CommandBase {
  readonly kind: 'retitle';
  readonly before: string;
  readonly after: string;
}

export interface MarkCompleteCommand extends CommandBase {
  readonly kind: 'mark-complete';
  readonly before: boolean;
  readonly after: boolean;
}

/**
 * Notes and calendar group edits
 */
export interface EventDetails {
  readonly notes?: string;
  readonly group: string;
}

export interface UpdateCommand extends CommandBase {
  readonly kind: 'update';
  readonly before: EventDetails;
  readonly after: EventDetails;
}

export type EditCommand =
  | CreateCommand
  | DeleteCommand
  | MoveCommand
  | ResizeCommand
  | RetitleCommand
  | MarkCompleteCommand
  | UpdateCommand;

export type EditCommandKind = EditCommand['kind'];

/**
 * One event's state before and after a model mutation.
 * before === null: event was created; after === null: event was removed.
 */
export interface ModelChange {
  readonly eventId: EventId;
  readonly before: PlannerEvent | null;
  readonly after: PlannerEvent | null;
}

export type ChangeSource = 'commit' | 'undo' | 'redo' | 'load' | 'refresh';

export type ModelChangeListener = (
  changes: readonly ModelChange[],
  source: ChangeSource
) => void;
