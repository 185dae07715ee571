import type { Goal, RecordHeader, RecordStatus, SyncOutcome, SyncState } from '@taskdeck/core';

export const STATUS_ICONS: Record<RecordStatus, string> = {
  active: '●',
  next: '→',
  waiting: '⏸',
  done: '✓',
  archived: '▣',
};

/**
 * One line per record: `● <id>  <title>  (goal, high, due 2025-10-15, #home)`.
 * Tasks omit the kind.
 */
export function formatHeaderLine(header: RecordHeader): string {
  const meta: string[] = [];
  if (header.kind !== 'task') meta.push(header.kind);
  if (header.priority) meta.push(header.priority);
  if (header.dueDate) meta.push(`due ${header.dueDate}`);
  if (header.tags.length > 0) meta.push(header.tags.map((tag) => `#${tag}`).join(' '));

  const line = `${STATUS_ICONS[header.status]} ${header.id}  ${header.title}`;
  return meta.length > 0 ? `${line}  (${meta.join(', ')})` : line;
}

/** Extra line for a write whose sync side did not finish; none when it did. */
export function formatSyncOutcome(outcome: SyncOutcome): string[] {
  const detail = outcome.error ? `: ${outcome.error}` : '';
  switch (outcome.status) {
    case 'pending':
      return [`⏳ Saved locally, sync pending${detail}`];
    case 'blocked':
      return [`⛔ Sync blocked${detail}. Resolve the conflict, then run "taskdeck sync --now"`];
    default:
      return [];
  }
}

export function formatSyncState(state: SyncState): string[] {
  const lines = [
    `Sync: ${state.phase} (${state.mode})`,
    `Pending changes: ${state.pendingChanges}`,
    `Last synced: ${state.lastSyncedAt ?? 'never'}`,
  ];
  if (state.lastError) {
    lines.push(`⚠️ ${state.lastError.code}: ${state.lastError.message}`);
  }
  for (const file of state.conflictedFiles) {
    lines.push(`  conflict: ${file}`);
  }
  return lines;
}

/** Splits `a, b,,c` into `['a', 'b', 'c']`. */
export function parseList(value: string): string[] {
  return value.split(',').map((item) => item.trim()).filter((item) => item.length > 0);
}

/** `★★★★★` for priority 1 down to `★` for priority 5. */
export function goalStars(priority: number): string {
  return '★'.repeat(Math.max(1, 6 - priority));
}

/** `★★★ [work] Ship the beta`; the area is left out when empty. */
export function formatGoal(goal: Goal): string {
  const area = goal.area ? `[${goal.area}] ` : '';
  return `${goalStars(goal.priority)} ${area}${goal.description}`;
}
