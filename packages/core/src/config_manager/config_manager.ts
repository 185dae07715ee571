/**
 * ConfigManager - data directory configuration
 *
 * Typed access to `.taskdeck.yaml` through the ConfigStore abstraction.
 * Missing keys fall back to the defaults below; a file that fails the
 * schema is ignored as a whole (logged, never fatal).
 */

import { fileURLToPath } from 'url';
import type { ConfigStore } from '../config_store';
import { SchemaValidationCache, toValidationIssues } from '../schemas/schema_cache';
import { TaskdeckError, ValidationError } from '../validation/errors';
import { createLogger, type Logger } from '../logger';
import type {
  Goal,
  GoalUpdate,
  IConfigManager,
  LockSettings,
  SyncSettings,
  TaskdeckConfig,
  Workstream,
} from './config_manager.types';

const CONFIG_SCHEMA_PATH = fileURLToPath(new URL('./config.schema.yaml', import.meta.url));

const WORKSTREAM_KEYS = ['1', '2', '3', '4', '5', '6', '7', '8', '9'] as const;
/** Keys 1 and 2 belong to the default workstreams. */
const FIRST_FREE_KEY_INDEX = 2;

export const DEFAULT_CONFIG: TaskdeckConfig = {
  sync: { enabled: true, autoInit: false, stepTimeoutMs: 15_000, batchWindowMs: 150 },
  lock: { timeoutMs: 5_000, staleMs: 60_000, pollIntervalMs: 50 },
  workstreams: [
    { name: 'Work', key: '1', tag: 'work' },
    { name: 'Personal', key: '2', tag: 'personal' },
  ],
  goals: [],
};

export const DEFAULT_GOAL_PRIORITY = 3;
const HIGHEST_GOAL_PRIORITY = 1;
const LOWEST_GOAL_PRIORITY = 5;

export class ConfigError extends TaskdeckError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function numberOr(section: Record<string, unknown>, key: string, fallback: number): number {
  const value = section[key];
  return typeof value === 'number' ? value : fallback;
}

function booleanOr(section: Record<string, unknown>, key: string, fallback: boolean): boolean {
  const value = section[key];
  return typeof value === 'boolean' ? value : fallback;
}

export function workstreamTag(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, '-');
}

function cloneConfig(config: TaskdeckConfig): TaskdeckConfig {
  return {
    sync: { ...config.sync },
    lock: { ...config.lock },
    workstreams: config.workstreams.map((w) => ({ ...w })),
    goals: config.goals.map((g) => ({ ...g })),
  };
}

/**
 * Builds a full configuration from a parsed document: schema check, then
 * defaults for every absent key.
 */
export function resolveConfig(document: unknown): TaskdeckConfig {
  if (document === null || document === undefined) {
    return cloneConfig(DEFAULT_CONFIG);
  }

  const validate = SchemaValidationCache.getValidator(CONFIG_SCHEMA_PATH);
  if (validate(document) !== true || !isObject(document)) {
    throw new ValidationError(toValidationIssues(validate.errors, document));
  }

  const sync = isObject(document['sync']) ? document['sync'] : {};
  const lock = isObject(document['lock']) ? document['lock'] : {};
  const defaults = DEFAULT_CONFIG;

  const workstreams: Workstream[] = [];
  const rawWorkstreams = document['workstreams'];
  if (Array.isArray(rawWorkstreams)) {
    for (const item of rawWorkstreams) {
      if (!isObject(item)) continue;
      const { name, key, tag } = item;
      if (typeof name !== 'string' || typeof key !== 'string') continue;
      if (workstreams.some((w) => w.key === key)) {
        throw ValidationError.forField('workstreams', `key ${key} is used twice`, key);
      }
      workstreams.push({ name, key, tag: typeof tag === 'string' ? tag : workstreamTag(name) });
    }
  }

  const goals: Goal[] = [];
  const rawGoals = document['goals'];
  if (Array.isArray(rawGoals)) {
    for (const item of rawGoals) {
      if (!isObject(item)) continue;
      const { description, area } = item;
      if (typeof description !== 'string' || typeof area !== 'string') continue;
      goals.push({
        description,
        area,
        priority: numberOr(item, 'priority', DEFAULT_GOAL_PRIORITY),
        active: booleanOr(item, 'active', true),
      });
    }
  }

  return {
    sync: {
      enabled: booleanOr(sync, 'enabled', defaults.sync.enabled),
      autoInit: booleanOr(sync, 'autoInit', defaults.sync.autoInit),
      stepTimeoutMs: numberOr(sync, 'stepTimeoutMs', defaults.sync.stepTimeoutMs),
      batchWindowMs: numberOr(sync, 'batchWindowMs', defaults.sync.batchWindowMs),
    },
    lock: {
      timeoutMs: numberOr(lock, 'timeoutMs', defaults.lock.timeoutMs),
      staleMs: numberOr(lock, 'staleMs', defaults.lock.staleMs),
      pollIntervalMs: numberOr(lock, 'pollIntervalMs', defaults.lock.pollIntervalMs),
    },
    workstreams: Array.isArray(rawWorkstreams) ? workstreams : defaults.workstreams.map((w) => ({ ...w })),
    goals,
  };
}

/**
 * Configuration Manager Class
 *
 * @example
 * ```typescript
 * const configManager = new ConfigManager(new FsConfigStore('/home/me/tasks'));
 * const { sync } = await configManager.loadConfig();
 *
 * // Tests
 * const store = new MemoryConfigStore();
 * store.setDocument({ sync: { enabled: false } });
 * const configManager = new ConfigManager(store);
 * ```
 */
export class ConfigManager implements IConfigManager {
  private readonly configStore: ConfigStore;
  private readonly logger: Logger;

  constructor(configStore: ConfigStore, logger?: Logger) {
    this.configStore = configStore;
    this.logger = logger ?? createLogger('[Config] ');
  }

  async loadConfig(): Promise<TaskdeckConfig> {
    try {
      return resolveConfig(await this.configStore.loadDocument());
    } catch (error) {
      const detail = error instanceof ValidationError
        ? error.errors.map((e) => `${e.field} ${e.message}`).join('; ')
        : error instanceof Error ? error.message : String(error);
      this.logger.warn(`Ignoring invalid configuration (${detail}); using defaults`);
      return cloneConfig(DEFAULT_CONFIG);
    }
  }

  async getSyncSettings(): Promise<SyncSettings> {
    return (await this.loadConfig()).sync;
  }

  async getLockSettings(): Promise<LockSettings> {
    return (await this.loadConfig()).lock;
  }

  async getWorkstreams(): Promise<Workstream[]> {
    return [...(await this.loadConfig()).workstreams].sort((a, b) => a.key.localeCompare(b.key));
  }

  async getWorkstreamByKey(key: string): Promise<Workstream | null> {
    const workstreams = await this.getWorkstreams();
    return workstreams.find((w) => w.key === key) ?? null;
  }

  /**
   * Adds a workstream on the next free key from 3 to 9.
   * @throws ConfigError when the name exists or no key is left
   */
  async addWorkstream(name: string, tag?: string): Promise<Workstream> {
    const trimmed = name.trim();
    if (!trimmed) {
      throw ValidationError.forField('name', 'must not be empty', name);
    }

    const config = await this.loadConfig();
    if (config.workstreams.some((w) => w.name.toLowerCase() === trimmed.toLowerCase())) {
      throw new ConfigError(`Workstream "${trimmed}" already exists`);
    }

    const used = new Set(config.workstreams.map((w) => w.key));
    const key = WORKSTREAM_KEYS.slice(FIRST_FREE_KEY_INDEX).find((k) => !used.has(k));
    if (!key) {
      throw new ConfigError('No free workstream key left (3-9 are taken)');
    }

    const workstream: Workstream = { name: trimmed, key, tag: tag?.trim() || workstreamTag(trimmed) };
    config.workstreams.push(workstream);
    await this.configStore.saveConfig(config);
    return workstream;
  }

  /** Renames a workstream; its key and tag stay. */
  async renameWorkstream(oldName: string, newName: string): Promise<Workstream> {
    const trimmed = newName.trim();
    if (!trimmed) {
      throw ValidationError.forField('name', 'must not be empty', newName);
    }

    const config = await this.loadConfig();
    const workstream = config.workstreams.find((w) => w.name === oldName);
    if (!workstream) {
      throw new ConfigError(`Workstream "${oldName}" not found`);
    }

    workstream.name = trimmed;
    await this.configStore.saveConfig(config);
    return { ...workstream };
  }

  async removeWorkstream(name: string): Promise<boolean> {
    const config = await this.loadConfig();
    const remaining = config.workstreams.filter((w) => w.name !== name);
    if (remaining.length === config.workstreams.length) {
      return false;
    }

    await this.configStore.saveConfig({ ...config, workstreams: remaining });
    return true;
  }

  // ─────────────────────────────────────────────────────────
  // Goals
  // ─────────────────────────────────────────────────────────

  async getGoals(): Promise<Goal[]> {
    return (await this.loadConfig()).goals;
  }

  async getActiveGoals(): Promise<Goal[]> {
    const goals = await this.getGoals();
    return goals.filter((g) => g.active).sort((a, b) => a.priority - b.priority);
  }

  async addGoal(description: string, area: string): Promise<Goal> {
    const trimmed = description.trim();
    if (!trimmed) {
      throw ValidationError.forField('description', 'must not be empty', description);
    }

    const config = await this.loadConfig();
    const goal: Goal = { description: trimmed, area: area.trim(), priority: DEFAULT_GOAL_PRIORITY, active: true };
    config.goals.push(goal);
    await this.configStore.saveConfig(config);
    return { ...goal };
  }

  async updateGoal(index: number, update: GoalUpdate): Promise<Goal> {
    const description = update.description?.trim();
    if (description !== undefined && !description) {
      throw ValidationError.forField('description', 'must not be empty', update.description);
    }

    return this.editGoal(index, (goal) => {
      if (description !== undefined) goal.description = description;
      if (update.area !== undefined) goal.area = update.area.trim();
    });
  }

  async cycleGoalPriority(index: number): Promise<Goal> {
    return this.editGoal(index, (goal) => {
      goal.priority = goal.priority >= LOWEST_GOAL_PRIORITY ? HIGHEST_GOAL_PRIORITY : goal.priority + 1;
    });
  }

  async toggleGoal(index: number): Promise<Goal> {
    return this.editGoal(index, (goal) => {
      goal.active = !goal.active;
    });
  }

  async removeGoal(index: number): Promise<boolean> {
    const config = await this.loadConfig();
    if (!config.goals[index]) {
      return false;
    }

    await this.configStore.saveConfig({ ...config, goals: config.goals.filter((_, i) => i !== index) });
    return true;
  }

  /** @throws ConfigError when there is no goal at `index` */
  private async editGoal(index: number, edit: (goal: Goal) => void): Promise<Goal> {
    const config = await this.loadConfig();
    const goal = config.goals[index];
    if (!goal) {
      throw new ConfigError(`Goal ${index + 1} not found`);
    }

    edit(goal);
    await this.configStore.saveConfig(config);
    return { ...goal };
  }
}
