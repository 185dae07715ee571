import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { MockInstance } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { MemoryGitModule } from '@taskdeck/core/memory';
import { TodayCommand, renderSummary } from './today-command';
import { DependencyInjectionService } from '../../services/dependency-injection';

const NOW = new Date(2025, 9, 15, 9, 30);

describe('TodayCommand', () => {
  let root: string;
  let di: DependencyInjectionService;
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  const printed = (): string[] => logSpy.mock.calls.map((call) => String(call[0]));

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'taskdeck-cli-today-'));
    di = new DependencyInjectionService({ dataDir: path.join(root, 'tasks'), git: new MemoryGitModule(), now: () => NOW });
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    await di.close();
    vi.restoreAllMocks();
    process.exitCode = undefined;
    await fs.rm(root, { recursive: true, force: true });
  });

  it('should list high priority, due and overdue records for the injected day', async () => {
    const adapter = await di.getRecordAdapter();
    const { record: urgent } = await adapter.create({ title: 'Ship release', priority: 'high', dueDate: '2025-10-15' });
    const { record: late } = await adapter.create({ title: 'Renew passport', priority: 'low', dueDate: '2025-10-01' });
    await adapter.create({ title: 'Later', priority: 'low', dueDate: '2025-12-01' });

    await new TodayCommand(di).execute({});

    expect(printed()).toEqual([
      '📅 2025-10-15: 3 active',
      '',
      '🔥 High priority (1)',
      `  ● ${urgent.id}  Ship release  (high, due 2025-10-15)`,
      '',
      '📌 Due today (1)',
      `  ● ${urgent.id}  Ship release  (high, due 2025-10-15)`,
      '',
      '⏰ Overdue (1)',
      `  ● ${late.id}  Renew passport  (low, due 2025-10-01)`,
    ]);
  });

  it('should summarize another day with --date', async () => {
    const adapter = await di.getRecordAdapter();
    await adapter.create({ title: 'Later', priority: 'low', dueDate: '2025-12-01' });

    await new TodayCommand(di).execute({ date: '2025-12-01', json: true });

    const output = JSON.parse(String(logSpy.mock.calls[0]?.[0]));
    expect(output.data).toMatchObject({ date: '2025-12-01', dueTodayCount: 1, overdueCount: 0 });
  });

  it('should reject a malformed date', async () => {
    await new TodayCommand(di).execute({ date: '15/10/2025' });

    expect(errorSpy).toHaveBeenCalledWith('❌ Validation failed: date: must be a calendar date (YYYY-MM-DD)');
    expect(process.exitCode).toBe(1);
  });
});

describe('renderSummary', () => {
  it('should say when nothing is urgent', () => {
    expect(renderSummary({
      date: '2025-10-15',
      highPriority: [],
      dueToday: [],
      overdue: [],
      totalActive: 0,
      highPriorityCount: 0,
      dueTodayCount: 0,
      overdueCount: 0,
    })).toEqual(['📅 2025-10-15: 0 active', 'Nothing urgent today.']);
  });
});
