export {
  ConfigManager,
  ConfigError,
  DEFAULT_CONFIG,
  DEFAULT_GOAL_PRIORITY,
  resolveConfig,
  workstreamTag,
} from './config_manager';
export type {
  Goal,
  GoalUpdate,
  IConfigManager,
  LockSettings,
  SyncSettings,
  TaskdeckConfig,
  Workstream,
} from './config_manager.types';
