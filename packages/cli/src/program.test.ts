import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { MockInstance } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { MemoryGitModule } from '@taskdeck/core/memory';
import { runCli } from './program';
import { DependencyInjectionService } from './services/dependency-injection';

describe('runCli', () => {
  let root: string;
  let dataDir: string;
  let git: MemoryGitModule;
  let logSpy: MockInstance<typeof console.log>;

  const lastJson = (): unknown => JSON.parse(String(logSpy.mock.calls.at(-1)?.[0]));
  const cli = (...args: string[]) =>
    runCli(['node', 'taskdeck', '-d', dataDir, ...args], new DependencyInjectionService({ git }));

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'taskdeck-cli-program-'));
    dataDir = path.join(root, 'tasks');
    git = new MemoryGitModule();
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    await fs.rm(root, { recursive: true, force: true });
  });

  it('should route global options and subcommand options to the command', async () => {
    await cli('--json', 'new', 'Book flights', '-p', 'high', '-t', 'travel');

    expect(lastJson()).toMatchObject({
      success: true,
      data: { record: { title: 'Book flights', priority: 'high', tags: ['travel'] }, sync: { status: 'synced' } },
    });
    expect(git.commits).toHaveLength(1);
  });

  it('should keep records between invocations on the same data directory', async () => {
    await cli('--quiet', 'new', 'First');
    const id = String(logSpy.mock.calls[0]?.[0]);

    await cli('--quiet', 'update', id, 'status', 'waiting');
    await cli('--json', 'list', '--status', 'waiting');

    expect(lastJson()).toMatchObject({ success: true, data: [{ id, title: 'First', status: 'waiting' }] });
    expect(git.commits.map((commit) => commit.message)).toEqual([
      'taskdeck: create task "First"',
      `taskdeck: update ${id} status`,
    ]);
  });

  it('should manage workstreams through the nested command', async () => {
    await cli('--json', 'workstream', 'add', 'Reading');

    expect(lastJson()).toMatchObject({ success: true, data: { name: 'Reading', key: '3', tag: 'reading' } });
  });

  it('should exit with code 1 for a failing command', async () => {
    await cli('--json', 'done', 'missing');

    expect(lastJson()).toMatchObject({ success: false, code: 'NOT_FOUND' });
    expect(process.exitCode).toBe(1);
  });
});
