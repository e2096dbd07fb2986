import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  IConfigService,
  IDoctorService,
  IGitService,
  ILayoutService,
  ISyncService,
  ITrackerService,
  RepoPaths,
  TYPES,
  createContainer,
  initRepo,
} from '@brd/core';
import { CliDeps, VERSION, buildListFilter, runCli } from './index';
import {
  BASE_CONFIG,
  FakeGitService,
  makeIssue,
  makeTempRepo,
  removeTempRepo,
  writeConfig,
  writeIssueFile,
} from '../../core/src/testing/fakes';
import * as path from 'path';

describe('brd CLI', () => {
  let paths: RepoPaths;
  let git: FakeGitService;
  let stdout: string[];
  let stderr: string[];
  let deps: CliDeps;

  const run = (...args: string[]): Promise<number> => {
    stdout = [];
    stderr = [];
    return runCli(['node', 'brd', ...args], deps);
  };

  const parseStdout = (): Record<string, unknown> => JSON.parse(stdout.join('\n'));

  beforeEach(() => {
    paths = makeTempRepo();
    git = new FakeGitService();
    stdout = [];
    stderr = [];
    deps = {
      async open(_dir, logger) {
        const container = createContainer(paths, { agentId: 'agent-one', logger });
        container.rebind<IGitService>(TYPES.IGitService).toConstantValue(git);
        return {
          paths,
          tracker: () => container.get<ITrackerService>(TYPES.ITrackerService),
          doctor: () => container.get<IDoctorService>(TYPES.IDoctorService),
          layout: () => container.get<ILayoutService>(TYPES.ILayoutService),
          config: () => container.get<IConfigService>(TYPES.IConfigService),
          sync: () => container.get<ISyncService>(TYPES.ISyncService),
          init: options => initRepo(paths, options, logger),
        };
      },
      stdout: text => stdout.push(text),
      stderr: text => stderr.push(text),
      env: { BRD_LOG_LEVEL: 'silent' },
      cwd: '/unused',
    };
  });

  afterEach(() => {
    removeTempRepo(paths);
  });

  it('prints the version', async () => {
    expect(await run('--version')).toBe(0);
    expect(stdout).toEqual([VERSION]);
  });

  it('initializes, adds and lists issues', async () => {
    expect(await run('init')).toBe(0);
    expect(stdout).toEqual([`initialized braid in ${paths.worktreeRoot} (prefix 'brdt')`]);

    expect(await run('add', 'first', '-p', 'P1', '--tag', 'api')).toBe(0);
    const match = /^created (brdt-[0-9a-z]{4}): first$/.exec(stdout[0]);
    expect(match).not.toBeNull();
    const id = match?.[1] ?? '';

    expect(await run('ls')).toBe(0);
    expect(stdout).toEqual([`${id}  P1  ready    first`]);
  });

  it('walks an issue through start and done', async () => {
    writeConfig(paths, BASE_CONFIG);
    writeIssueFile(path.join(paths.worktreeRoot, '.braid', 'issues'), makeIssue('tst-aaaa'));

    expect(await run('start', 'aaaa')).toBe(0);
    expect(stdout).toEqual(['started tst-aaaa: Issue tst-aaaa']);

    expect(await run('--json', 'status')).toBe(0);
    expect(parseStdout()).toMatchObject({ ok: true, summary: { doing: [{ id: 'tst-aaaa', owner: 'agent-one' }] } });

    expect(await run('done', 'tst-aaaa')).toBe(0);
    expect(stdout).toEqual(['done tst-aaaa: Issue tst-aaaa']);

    expect(await run('ready')).toBe(0);
    expect(stdout).toEqual(['no ready issues']);
  });

  it('wraps JSON output with ok', async () => {
    writeConfig(paths, BASE_CONFIG);
    writeIssueFile(path.join(paths.worktreeRoot, '.braid', 'issues'), makeIssue('tst-aaaa'));

    expect(await run('--json', 'show', 'tst-aaaa')).toBe(0);
    const output = parseStdout();
    expect(output.ok).toBe(true);
    expect(output.dependents).toEqual([]);
    expect(output.issue).toMatchObject({ id: 'tst-aaaa', derived: { is_ready: true } });
  });

  describe('errors', () => {
    it('exits with the error code and prints to stderr', async () => {
      writeConfig(paths, BASE_CONFIG);
      expect(await run('show', 'nope')).toBe(12);
      expect(stderr).toEqual(['error: issue not found: nope']);
      expect(stdout).toEqual([]);
    });

    it('prints a JSON error in JSON mode', async () => {
      writeConfig(paths, BASE_CONFIG);
      expect(await run('--json', 'show', 'nope')).toBe(12);
      expect(parseStdout()).toEqual({ ok: false, code: 'issue_not_found', message: 'issue not found: nope', exit: 12 });
    });

    it('reports an uninitialized repository', async () => {
      expect(await run('ls')).toBe(11);
      expect(stderr).toEqual(['error: braid not initialized in this repository (run `brd init`)']);
    });

    it('maps argument errors to the usage code', async () => {
      expect(await run('add')).toBe(2);
      expect(stderr).toEqual(["error: missing required argument 'title'"]);
    });

    it('maps bad option values to the usage code', async () => {
      writeConfig(paths, BASE_CONFIG);
      expect(await run('add', 'x', '-p', 'P9')).toBe(2);
      expect(await run('config', 'auto-sync', 'maybe')).toBe(2);
      expect(stderr).toEqual(["error: expected 'on' or 'off', got 'maybe'"]);
    });

    it('reports unknown commands as JSON usage errors', async () => {
      expect(await run('--json', 'frobnicate')).toBe(2);
      expect(parseStdout()).toMatchObject({ ok: false, code: 'usage_error', exit: 2 });
    });
  });

  it('exits with the graph code when doctor finds a cycle', async () => {
    writeConfig(paths, BASE_CONFIG);
    const issuesDir = path.join(paths.worktreeRoot, '.braid', 'issues');
    writeIssueFile(issuesDir, makeIssue('tst-aaaa', { deps: ['tst-bbbb'] }));
    writeIssueFile(issuesDir, makeIssue('tst-bbbb', { deps: ['tst-aaaa'] }));

    expect(await run('doctor')).toBe(15);
    const lines = stdout.join('\n').split('\n');
    expect(lines).toContain('error: dependency cycle: tst-aaaa -> tst-bbbb -> tst-aaaa');
    expect(lines[lines.length - 1]).toBe('1 problem(s) found');
  });

  it('prints the path of an issue file', async () => {
    writeConfig(paths, BASE_CONFIG);
    const file = writeIssueFile(path.join(paths.worktreeRoot, '.braid', 'issues'), makeIssue('tst-aaaa'));

    expect(await run('path', 'aaaa')).toBe(0);
    expect(stdout).toEqual([file]);
  });

  it('commits .braid changes with a generated message', async () => {
    writeConfig(paths, BASE_CONFIG);
    expect(await run('commit')).toBe(0);
    expect(stdout).toEqual(['nothing to commit']);

    git.staged = [{ status: 'A', path: '.braid/issues/tst-aaaa.md' }];
    expect(await run('--json', 'commit')).toBe(0);
    expect(parseStdout()).toEqual({ ok: true, committed: true, message: 'chore(braid): add 1 issue (tst-aaaa)' });
  });

  it('refuses to sync outside issues-branch mode', async () => {
    writeConfig(paths, BASE_CONFIG);
    expect(await run('sync')).toBe(1);
    expect(stderr).toEqual(['error: not in issues-branch mode; run `brd config issues-branch <name>` to enable']);
  });

  it('toggles auto-sync without committing', async () => {
    writeConfig(paths, BASE_CONFIG);
    expect(await run('config', 'auto-sync', 'on')).toBe(0);
    expect(stdout).toEqual(['auto-sync on']);
    expect(git.commits).toEqual([]);

    expect(await run('config')).toBe(0);
    expect(stdout.join('\n')).toContain('auto_push      = true');
    expect(stdout.join('\n')).toContain('mode: git-native');
  });
});

describe('buildListFilter', () => {
  it('parses comma-separated statuses and normalizes values', () => {
    expect(buildListFilter({ status: 'open, doing', priority: 'p1', type: 'design', ready: true })).toEqual({
      status: ['open', 'doing'],
      priority: 'P1',
      tag: undefined,
      type: 'design',
      owner: undefined,
      ready: true,
      blocked: undefined,
      all: undefined,
    });
  });

  it('rejects an unknown status', () => {
    expect(() => buildListFilter({ status: 'waiting' })).toThrow(/invalid status 'waiting'/);
  });
});
