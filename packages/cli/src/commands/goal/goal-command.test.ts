import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { MockInstance } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { MemoryGitModule } from '@taskdeck/core/memory';
import { GoalCommand } from './goal-command';
import { DependencyInjectionService } from '../../services/dependency-injection';

describe('GoalCommand', () => {
  let root: string;
  let di: DependencyInjectionService;
  let command: GoalCommand;
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  const printed = (): string[] => logSpy.mock.calls.map((call) => String(call[0]));

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'taskdeck-cli-goal-'));
    di = new DependencyInjectionService({ dataDir: path.join(root, 'tasks'), git: new MemoryGitModule() });
    command = new GoalCommand(di);
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    await di.close();
    vi.restoreAllMocks();
    process.exitCode = undefined;
    await fs.rm(root, { recursive: true, force: true });
  });

  it('should say when there are no goals', async () => {
    await command.executeList({});

    expect(printed()).toEqual(['No goals yet.']);
  });

  it('should add goals and list them by number', async () => {
    await command.executeAdd('Ship the beta', { area: 'work' });
    await command.executeAdd('Read more', { quiet: true });
    logSpy.mockClear();

    await command.executeList({});

    expect(printed()).toEqual(['1. ★★★ [work] Ship the beta', '2. ★★★ Read more']);
  });

  it('should print the new number in quiet mode', async () => {
    await command.executeAdd('First', { quiet: true });
    await command.executeAdd('Second', { quiet: true });

    expect(printed()).toEqual(['1', '2']);
  });

  it('should cycle the priority and mark inactive goals', async () => {
    await command.executeAdd('Learn Spanish', { area: 'personal', quiet: true });

    await command.executeCycle('1', {});
    await command.executeToggle('1', {});
    logSpy.mockClear();
    await command.executeList({});

    expect(printed()).toEqual(['1. ★★ [personal] Learn Spanish  (inactive)']);
  });

  it('should update the description', async () => {
    await command.executeAdd('Run a 10k', { area: 'health', quiet: true });
    logSpy.mockClear();

    await command.executeUpdate('1', { description: 'Run a half marathon' });

    expect(printed()).toEqual(['✅ Updated 1. ★★★ [health] Run a half marathon']);
  });

  it('should require something to update', async () => {
    await command.executeUpdate('1', {});

    expect(errorSpy).toHaveBeenCalledWith('❌ Validation failed: update: give --description or --area');
    expect(process.exitCode).toBe(1);
  });

  it('should refuse a goal number that is not a positive integer', async () => {
    await command.executeToggle('0', { json: true });

    expect(JSON.parse(String(logSpy.mock.calls[0]?.[0]))).toEqual({
      success: false,
      error: 'Validation failed: number: must be a positive integer',
      code: 'VALIDATION_ERROR',
      exitCode: 1,
    });
  });

  it('should remove a goal and report an unknown one', async () => {
    await command.executeAdd('Drop me', { quiet: true });
    logSpy.mockClear();

    await command.executeRemove('1', {});
    await command.executeRemove('1', {});

    expect(printed()).toEqual(['✅ Removed goal 1']);
    expect(errorSpy).toHaveBeenCalledWith('❌ Goal 1 not found');
  });

  it('should leave switched-off goals out of the active list', async () => {
    await command.executeAdd('Visible', { area: 'work', quiet: true });
    await command.executeAdd('Hidden', { quiet: true });
    await command.executeToggle('2', { quiet: true });

    const goals = await (await di.getConfigManager()).getActiveGoals();

    expect(goals.map((goal) => goal.description)).toEqual(['Visible']);
  });
});
