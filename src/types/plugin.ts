// Plugin-related type definitions
import { EventId, PlannerEvent } from './event';
import { ModelChangeListener } from './command';
import { PlannerConfig } from './config';
import { Clock, NotificationSource } from './notification';

export type ConfigChangeListener = (config: PlannerConfig, previous: PlannerConfig) => void;

/**
 * Surface handed to plugins at install time
 */
export interface PlannerApp {
  getConfig: () => PlannerConfig;
  // called after every accepted updateConfig
  onConfigChange: (listener: ConfigChangeListener) => () => void;
  clock: Clock;
  getEvent: (id: EventId) => PlannerEvent | undefined;
  onModelChange: (listener: ModelChangeListener) => () => void;
  notificationSource: () => NotificationSource;
}

export interface PlannerPlugin<TApi = unknown> {
  name: string;
  config?: Record<string, unknown>;
  install: (app: PlannerApp) => void;
  uninstall?: () => void | Promise<void>;
  api?: TApi;
}
