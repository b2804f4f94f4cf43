import { DragConfig } from './drag';
import { PersistenceConfig } from './persistence';
import { NotificationConfig } from './notification';

export interface HookConfig {
  // command followed by its arguments
  postUpdate: string[] | null;
  postUpdateDelayMs: number;
}

export interface HistoryConfig {
  maxDepth: number;
}

export interface PlannerConfig {
  timeZone: string;
  defaultGroup: string;
  drag: DragConfig;
  persistence: PersistenceConfig;
  notifications: NotificationConfig;
  hooks: HookConfig;
  history: HistoryConfig;
}

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends readonly unknown[] | string | number | boolean | null
    ? T[K]
    : DeepPartial<T[K]>;
};
