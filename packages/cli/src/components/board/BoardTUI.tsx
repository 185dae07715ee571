import React, { useState, useEffect, useMemo, useCallback } from 'react';
import { Box, Text, render, useApp, useInput } from 'ink';
import type {
  EventBus,
  Goal,
  IRecordAdapter,
  RecordHeader,
  RecordStatus,
  SyncOutcome,
  SyncState,
  Workstream,
} from '@taskdeck/core';
import { StatusBadge } from '../shared/StatusBadge';
import { formatGoal } from '../../utils/format';

/** Board columns, top to bottom. Archived records stay off the board. */
export const BOARD_GROUPS: readonly RecordStatus[] = ['active', 'next', 'waiting', 'done'];

export interface BoardProps {
  adapter: IRecordAdapter;
  eventBus: EventBus.IEventStream;
  workstreams: Workstream[];
  /** Active goals, shown above the columns. */
  goals?: Goal[];
}

type Group = { status: RecordStatus; records: RecordHeader[] };

function groupRecords(records: RecordHeader[]): Group[] {
  return BOARD_GROUPS.map((status) => ({
    status,
    records: records.filter((record) => record.status === status),
  }));
}

function describeOutcome(action: string, outcome: SyncOutcome): string {
  switch (outcome.status) {
    case 'pending':
      return `${action}, sync pending`;
    case 'blocked':
      return `${action}, sync blocked`;
    default:
      return action;
  }
}

function errorMessage(error: unknown): string {
  return `❌ ${error instanceof Error ? error.message : String(error)}`;
}

/**
 * Interactive board: records grouped by status, kept current through the
 * event bus, with single-key actions on the selected record.
 */
export const BoardTUI: React.FC<BoardProps> = ({ adapter, eventBus, workstreams, goals = [] }) => {
  const { exit } = useApp();
  const [filter, setFilter] = useState<Workstream | null>(null);
  const [records, setRecords] = useState<RecordHeader[]>([]);
  const [selected, setSelected] = useState(0);
  const [syncState, setSyncState] = useState<SyncState>(() => adapter.syncStatus());
  const [message, setMessage] = useState<string | null>(null);
  // Title being typed after `n`; null while no prompt is open
  const [draft, setDraft] = useState<string | null>(null);
  const [focusId, setFocusId] = useState<string | null>(null);

  const refresh = useCallback(() => {
    setRecords(adapter.list({ sort: 'priority', ...(filter ? { tag: filter.tag } : {}) }));
    setSyncState(adapter.syncStatus());
  }, [adapter, filter]);

  useEffect(() => {
    refresh();
  }, [refresh]);

  // Writes from this process, other processes and sync cycles all land here
  useEffect(() => {
    const subscriptions = [
      eventBus.subscribe('store.changed', refresh),
      eventBus.subscribe('record.created', refresh),
      eventBus.subscribe('record.updated', refresh),
      eventBus.subscribe('record.status.changed', refresh),
      eventBus.subscribe('sync.phase.changed', () => setSyncState(adapter.syncStatus())),
    ];
    return () => {
      for (const subscription of subscriptions) {
        eventBus.unsubscribe(subscription.id);
      }
    };
  }, [adapter, eventBus, refresh]);

  const groups = useMemo(() => groupRecords(records), [records]);
  const ordered = useMemo(() => groups.flatMap((group) => group.records), [groups]);

  useEffect(() => {
    if (selected >= ordered.length && ordered.length > 0) {
      setSelected(ordered.length - 1);
    }
  }, [ordered, selected]);

  useEffect(() => {
    if (!focusId) return;
    const index = ordered.findIndex((record) => record.id === focusId);
    if (index >= 0) {
      setSelected(index);
      setFocusId(null);
    }
  }, [ordered, focusId]);

  const current: RecordHeader | undefined = ordered[selected];

  const runAction = (action: Promise<string>) => {
    action.then(
      (text) => {
        setMessage(text);
        refresh();
      },
      (error: unknown) => setMessage(errorMessage(error)),
    );
  };

  const submitDraft = (title: string) => {
    setDraft(null);
    if (!title.trim()) return;
    runAction(
      adapter
        .create({ title, ...(filter ? { tags: [filter.tag] } : {}) })
        .then(({ record, sync }) => {
          setFocusId(record.id);
          return describeOutcome(`Created "${record.title}"`, sync);
        }),
    );
  };

  useInput((input, key) => {
    if (draft !== null) {
      if (key.return) {
        submitDraft(draft);
      } else if (key.escape) {
        setDraft(null);
      } else if (key.backspace || key.delete) {
        setDraft((text) => (text ?? '').slice(0, -1));
      } else if (input && !key.ctrl && !key.meta) {
        setDraft((text) => `${text ?? ''}${input}`);
      }
      return;
    }

    if (key.upArrow || input === 'k') {
      setSelected((index) => Math.max(0, index - 1));
      return;
    }
    if (key.downArrow || input === 'j') {
      setSelected((index) => Math.min(Math.max(ordered.length - 1, 0), index + 1));
      return;
    }

    if (/^[1-9]$/.test(input)) {
      const workstream = workstreams.find((w) => w.key === input);
      if (workstream) {
        setFilter(workstream);
        setSelected(0);
        setMessage(null);
      } else {
        setMessage(`No workstream on key ${input}`);
      }
      return;
    }

    switch (input) {
      case 'n':
        setDraft('');
        setMessage(null);
        break;
      case '0':
        setFilter(null);
        setSelected(0);
        setMessage(null);
        break;
      case 'd':
        if (current) {
          const { id, title } = current;
          runAction(adapter.complete(id).then(({ sync }) => describeOutcome(`Completed "${title}"`, sync)));
        }
        break;
      case 'a':
        if (current) {
          const { id, title } = current;
          runAction(adapter.archive(id).then(({ sync }) => describeOutcome(`Archived "${title}"`, sync)));
        }
        break;
      case 's':
        runAction(adapter.syncNow().then((outcome) => `Sync: ${outcome.status}`));
        break;
      case 'r':
        runAction(adapter.reload().then((report) =>
          `Reloaded: ${report.added.length} added, ${report.updated.length} updated, ${report.removed.length} removed`,
        ));
        break;
      case 'q':
        exit();
        break;
    }
  });

  return (
    <Box flexDirection="column">
      <Box>
        <Text bold color="cyan">taskdeck</Text>
        {filter ? <Text color="yellow">{`  [${filter.key}] ${filter.name} #${filter.tag}`}</Text> : null}
      </Box>

      {goals.map((goal, index) => (
        <Text key={`${index}-${goal.description}`} color="magenta">{`🎯 ${formatGoal(goal)}`}</Text>
      ))}

      {groups.map((group) => (
        <Box key={group.status} flexDirection="column" marginTop={1}>
          <StatusBadge status={group.status} count={group.records.length} />
          {group.records.map((record) => {
            const isSelected = current?.id === record.id;
            const meta = [record.priority, record.dueDate ? `due ${record.dueDate}` : undefined]
              .filter((part): part is string => part !== undefined)
              .join(', ');
            return (
              <Text key={record.id} inverse={isSelected}>
                {`${isSelected ? '›' : ' '} ${record.title}${meta ? `  (${meta})` : ''}`}
              </Text>
            );
          })}
        </Box>
      ))}

      <Box marginTop={1} flexDirection="column">
        <Text color={syncState.phase === 'SyncBlocked' ? 'red' : 'gray'}>
          {`Sync: ${syncState.phase}`}
          {syncState.pendingChanges > 0 ? ` · ${syncState.pendingChanges} pending` : ''}
          {syncState.lastError ? `  ⚠️ ${syncState.lastError.message}` : ''}
        </Text>
        {draft !== null ? <Text color="cyan">{`New task: ${draft}_`}</Text> : null}
        {message ? <Text>{message}</Text> : null}
        <Text dimColor>{draft !== null
          ? 'enter create · esc cancel'
          : 'j/k move · n new · d done · a archive · 1-9 workstream · 0 all · s sync · r reload · q quit'}</Text>       </Box>
    </Box>
  );
};

/**
 * Renders the board on the terminal and resolves once the user quits.
 */
export async function renderBoard(props: BoardProps): Promise<void> {
  const { waitUntilExit } = render(<BoardTUI {...props} />);
  await waitUntilExit();
}

export default BoardTUI;
