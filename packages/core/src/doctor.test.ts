import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { DoctorReport, IDoctorService, doctorExitCode, uniqueCycles } from './doctor';
import { createContainer, TYPES } from './container';
import { IGitService } from './git';
import { RepoPaths } from './types';
import {
  BASE_CONFIG,
  FakeGitService,
  RecordingLogger,
  makeIssue,
  makeTempRepo,
  removeTempRepo,
  writeConfig,
  writeIssueFile,
} from './testing/fakes';

describe('DoctorService', () => {
  let paths: RepoPaths;
  let issuesDir: string;

  const runDoctor = (): Promise<DoctorReport> => {
    const container = createContainer(paths, { agentId: 'agent-one', logger: new RecordingLogger() });
    container.rebind<IGitService>(TYPES.IGitService).toConstantValue(new FakeGitService());
    return container.get<IDoctorService>(TYPES.IDoctorService).run();
  };

  const failedChecks = (report: DoctorReport): string[] =>
    report.checks.filter(check => !check.passed).map(check => check.name);

  beforeEach(() => {
    paths = makeTempRepo();
    issuesDir = path.join(paths.worktreeRoot, '.braid', 'issues');
  });

  afterEach(() => {
    removeTempRepo(paths);
  });

  it('stops when braid is not initialized', async () => {
    const report = await runDoctor();
    expect(report.ok).toBe(false);
    expect(report.checks).toEqual([{ name: 'braid_dir', description: '.braid directory exists', passed: false }]);
    expect(report.errors).toEqual([{ code: 'control_root_invalid', message: '.braid not found (run `brd init`)' }]);
    expect(doctorExitCode(report)).toBe(1);
  });

  it('reports a clean store', async () => {
    writeConfig(paths, BASE_CONFIG);
    writeIssueFile(issuesDir, makeIssue('tst-aaaa'));
    writeIssueFile(issuesDir, makeIssue('tst-bbbb', { deps: ['tst-aaaa'] }));

    const report = await runDoctor();

    expect(report.ok).toBe(true);
    expect(report.checks.map(check => check.name)).toEqual([
      'braid_dir',
      'config_valid',
      'issues_parse',
      'schema_current',
      'state_invariants',
      'temp_files',
      'missing_deps',
      'cycles',
    ]);
    expect(failedChecks(report)).toEqual([]);
    expect(report.warnings).toEqual([]);
    expect(doctorExitCode(report)).toBe(0);
  });

  it('stops on an invalid config', async () => {
    writeConfig(paths, 'schema_version = 9\nid_prefix = "UPPER"\n');
    const report = await runDoctor();
    expect(failedChecks(report)).toEqual(['config_valid']);
    expect(report.checks).toHaveLength(2);
    expect(report.errors[0]).toMatchObject({ code: 'control_root_invalid' });
  });

  it('reports cycles with the graph exit code', async () => {
    writeConfig(paths, BASE_CONFIG);
    writeIssueFile(issuesDir, makeIssue('tst-aaaa', { deps: ['tst-bbbb'] }));
    writeIssueFile(issuesDir, makeIssue('tst-bbbb', { deps: ['tst-aaaa'] }));

    const report = await runDoctor();

    expect(report.errors).toEqual([{ code: 'cycle', cycle: ['tst-aaaa', 'tst-bbbb', 'tst-aaaa'] }]);
    expect(failedChecks(report)).toEqual(['cycles']);
    expect(doctorExitCode(report)).toBe(15);
  });

  it('reports missing deps and broken lifecycle state', async () => {
    writeConfig(paths, BASE_CONFIG);
    writeIssueFile(issuesDir, makeIssue('tst-aaaa', { deps: ['tst-gone'] }));
    writeIssueFile(issuesDir, makeIssue('tst-bbbb', { status: 'doing', started_at: '2024-01-02T00:00:00.000Z' }));

    const report = await runDoctor();

    expect(report.errors).toEqual([
      { code: 'invalid_state', issue: 'tst-bbbb', message: 'tst-bbbb is doing but has no owner' },
      { code: 'missing_dep', issue: 'tst-aaaa', dep: 'tst-gone' },
    ]);
    expect(failedChecks(report)).toEqual(['state_invariants', 'missing_deps']);
    expect(doctorExitCode(report)).toBe(1);
  });

  it('warns about unparseable, outdated and leftover files', async () => {
    writeConfig(paths, BASE_CONFIG);
    const broken = path.join(issuesDir, 'tst-cccc.md');
    fs.writeFileSync(broken, 'not an issue\n');
    const old = path.join(issuesDir, 'tst-oldd.md');
    fs.writeFileSync(
      old,
      '---\nschema_version: 8\nid: tst-oldd\ntitle: Old\npriority: P2\nstatus: open\ndeps: []\ncreated_at: "2024-01-01T00:00:00Z"\n---\n'
    );
    const leftover = path.join(issuesDir, 'tst-oldd.md.3f2a9c');
    fs.writeFileSync(leftover, 'partial');

    const report = await runDoctor();

    expect(report.ok).toBe(true);
    expect(failedChecks(report)).toEqual(['issues_parse', 'schema_current', 'temp_files']);
    expect(report.warnings).toEqual([
      {
        code: 'parse_error',
        file: broken,
        message: `failed to parse ${broken}: missing frontmatter (file must start with ---)`,
      },
      { code: 'schema_outdated', file: old, version: 8 },
      { code: 'stale_temp_file', file: leftover },
    ]);
    expect(fs.existsSync(leftover)).toBe(true);
  });

  it('checks the issues worktree in issues-branch mode', async () => {
    writeConfig(paths, `${BASE_CONFIG}issues_branch = "braid-issues"\n`);
    const report = await runDoctor();
    expect(report.checks[2]).toEqual({
      name: 'issues_worktree',
      description: "issues worktree for 'braid-issues' exists",
      passed: false,
    });
    expect(report.errors).toEqual([]);
  });
});

describe('uniqueCycles', () => {
  it('collapses rotations of the same cycle', () => {
    expect(
      uniqueCycles([
        ['b', 'c', 'a', 'b'],
        ['a', 'b', 'c', 'a'],
        ['x', 'y', 'x'],
      ])
    ).toEqual([
      ['a', 'b', 'c', 'a'],
      ['x', 'y', 'x'],
    ]);
  });
});
