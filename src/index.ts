// Core exports
export { createPlannerStore } from './core/plannerStore';
export type {
  PlannerStore,
  PlannerStoreApi,
  PlannerStoreDeps,
  PlannerStoreState,
  PlannerStoreActions,
  NewEventInput,
} from './core/plannerStore';
export { EditHistory } from './core/editHistory';
export type { CommitResult, EditHistoryOptions } from './core/editHistory';
export { EventModel, buildEvent, validateEvent } from './core/eventModel';
export { IntervalTree } from './core/intervalTree';
export { IntervalIndex } from './core/intervalIndex';
export { EventLayoutCalculator, maxConcurrency } from './core/layout';
export * from './core/commands';
export * from './core/errors';
export {
  ConfigManager,
  createPlannerConfig,
  defaultPlannerConfig,
  deepMerge,
  validatePlannerConfig,
} from './core/config';

// Drag
export { DragEngine, DragSession } from './drag/dragEngine';
export { snapInstant, roundToStep } from './drag/snap';

// Persistence
export { PersistenceBridge, sameEvent } from './persistence/persistenceBridge';
export type { PersistenceBridgeOptions } from './persistence/persistenceBridge';
export { SqliteCacheStore } from './persistence/sqliteCacheStore';
export { CalendarDirectory } from './persistence/calendarDirectory';
export { parseCalendar, serializeCalendar } from './persistence/icalCodec';
export type { ParseOptions } from './persistence/icalCodec';

// Notifications
export { NotificationScheduler } from './notifications/notificationScheduler';
export type { NotificationSchedulerOptions } from './notifications/notificationScheduler';
export { renderNotification } from './notifications/messages';

// Plugins
export * from './plugins';

// Utilities
export { logger } from './utils/logger';
export * from './utils/temporal';

// Types
export * from './types';
