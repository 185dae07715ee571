/**
 * Configuration kept in `<dataDir>/.taskdeck.yaml`. Versioned together
 * with the records, so every machine sharing the data directory shares it.
 */

/** Tag shortcut on the board: pressing `key` filters by `tag`. */
export type Workstream = {
  name: string;
  /** `1` to `9`. */
  key: string;
  tag: string;
};

/**
 * A standing goal shown above the board. `area` usually names a
 * workstream; `priority` runs from 1 (highest) to 5.
 */
export type Goal = {
  description: string;
  area: string;
  priority: number;
  active: boolean;
};

/** Changes accepted by `updateGoal`. */
export type GoalUpdate = {
  description?: string;
  area?: string;
};

export type SyncSettings = {
  enabled: boolean;
  /** Runs `git init` when the data directory is not a repository. */
  autoInit: boolean;
  stepTimeoutMs: number;
  batchWindowMs: number;
};

export type LockSettings = {
  timeoutMs: number;
  staleMs: number;
  pollIntervalMs: number;
};

export type TaskdeckConfig = {
  sync: SyncSettings;
  lock: LockSettings;
  workstreams: Workstream[];
  goals: Goal[];
};

export interface IConfigManager {
  /** Configuration merged over the defaults. Never throws for a missing or invalid file. */
  loadConfig(): Promise<TaskdeckConfig>;
  getSyncSettings(): Promise<SyncSettings>;
  getLockSettings(): Promise<LockSettings>;
  getWorkstreams(): Promise<Workstream[]>;
  getWorkstreamByKey(key: string): Promise<Workstream | null>;
  addWorkstream(name: string, tag?: string): Promise<Workstream>;
  renameWorkstream(oldName: string, newName: string): Promise<Workstream>;
  removeWorkstream(name: string): Promise<boolean>;
  /** Goals are addressed by their position in `getGoals()`, starting at 0. */
  getGoals(): Promise<Goal[]>;
  /** Active goals, highest priority first. */
  getActiveGoals(): Promise<Goal[]>;
  addGoal(description: string, area: string): Promise<Goal>;
  updateGoal(index: number, update: GoalUpdate): Promise<Goal>;
  /** Steps the priority 1 → 2 → … → 5 → 1. */
  cycleGoalPriority(index: number): Promise<Goal>;
  toggleGoal(index: number): Promise<Goal>;
  removeGoal(index: number): Promise<boolean>;
}
