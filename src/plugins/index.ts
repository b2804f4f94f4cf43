// Plugin module export file
import { createNotificationsPlugin, NotificationsPluginConfig } from './notificationsPlugin';
import { createPostUpdateHookPlugin, PostUpdateHookPluginConfig } from './postUpdateHookPlugin';
import { PlannerPlugin } from '../types';

export * from './notificationsPlugin';
export * from './postUpdateHookPlugin';

// Convenient plugin package creation function
export function createStandardPlugins(config: {
  notifications: NotificationsPluginConfig;
  hooks?: PostUpdateHookPluginConfig;
}): PlannerPlugin[] {
  return [
    createNotificationsPlugin(config.notifications),
    createPostUpdateHookPlugin(config.hooks),
  ];
}
