import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { StorageService } from './storage';
import { LayoutService } from './layout';
import { ConfigService } from './config';
import { LockService } from './lock';
import { ConsoleLogger, LogLevel } from './logger';
import { serializeIssue } from './issue';
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

describe('StorageService', () => {
  let paths: RepoPaths;
  let logger: RecordingLogger;
  let storage: StorageService;
  let issuesDir: string;

  beforeEach(() => {
    paths = makeTempRepo();
    writeConfig(paths, BASE_CONFIG);
    issuesDir = path.join(paths.worktreeRoot, '.braid', 'issues');
    logger = new RecordingLogger();
    const lock = new LockService(paths, new ConsoleLogger(LogLevel.SILENT));
    const layout = new LayoutService(paths, new ConfigService(paths), new FakeGitService(), lock, logger);
    storage = new StorageService(layout, lock, logger);
  });

  afterEach(() => {
    removeTempRepo(paths);
  });

  it('loads nothing from an empty directory', async () => {
    const result = await storage.loadAll();
    expect(result.issues.size).toBe(0);
    expect(result.failures).toEqual([]);
  });

  it('loads issue files and ignores everything else', async () => {
    writeIssueFile(issuesDir, makeIssue('tst-aaaa'));
    writeIssueFile(issuesDir, makeIssue('tst-bbbb', { priority: 'P0' }));
    fs.writeFileSync(path.join(issuesDir, 'notes.txt'), 'not an issue');

    const issues = await storage.loadIssues();

    expect([...issues.keys()]).toEqual(['tst-aaaa', 'tst-bbbb']);
    expect(issues.get('tst-bbbb')?.priority).toBe('P0');
  });

  it('skips unparseable files with a warning', async () => {
    writeIssueFile(issuesDir, makeIssue('tst-aaaa'));
    const broken = path.join(issuesDir, 'tst-cccc.md');
    fs.writeFileSync(broken, 'no frontmatter here\n');

    const issues = await storage.loadIssues();

    expect([...issues.keys()]).toEqual(['tst-aaaa']);
    expect(logger.warnings).toEqual([
      `failed to load ${broken}: failed to parse ${broken}: missing frontmatter (file must start with ---)`,
    ]);
  });

  it('reports an id that does not match its filename', async () => {
    const file = path.join(issuesDir, 'tst-bbbb.md');
    fs.writeFileSync(file, serializeIssue(makeIssue('tst-aaaa')));

    const { issues, failures } = await storage.loadAll();

    expect(issues.size).toBe(0);
    expect(failures).toEqual([
      { file, message: `failed to parse ${file}: id 'tst-aaaa' does not match filename 'tst-bbbb'` },
    ]);
  });

  it('writes the canonical form', async () => {
    const issue = makeIssue('tst-aaaa', { tags: ['backend'], body: 'Details.\n' });
    await storage.saveIssue(issue);
    const content = fs.readFileSync(path.join(issuesDir, 'tst-aaaa.md'), 'utf-8');
    expect(content).toBe(serializeIssue(issue));
  });

  it('deletes issue files', async () => {
    writeIssueFile(issuesDir, makeIssue('tst-aaaa'));
    await storage.deleteIssue('tst-aaaa');
    expect(fs.existsSync(path.join(issuesDir, 'tst-aaaa.md'))).toBe(false);
    await expect(storage.deleteIssue('tst-aaaa')).rejects.toMatchObject({ kind: 'io_error' });
  });

  describe('updateIssues', () => {
    it('applies writes and removals and returns the result', async () => {
      writeIssueFile(issuesDir, makeIssue('tst-aaaa'));
      writeIssueFile(issuesDir, makeIssue('tst-bbbb'));

      const result = await storage.updateIssues(issues => {
        const a = issues.get('tst-aaaa');
        if (!a) throw new Error('missing tst-aaaa');
        return { write: [{ ...a, status: 'skip', completed_at: '2024-02-01T00:00:00.000Z' }], remove: ['tst-bbbb'], result: issues.size };
      });

      expect(result).toBe(2);
      const after = await storage.loadIssues();
      expect([...after.keys()]).toEqual(['tst-aaaa']);
      expect(after.get('tst-aaaa')?.status).toBe('skip');
    });

    it('writes nothing when an issue fails validation', async () => {
      writeIssueFile(issuesDir, makeIssue('tst-aaaa'));

      await expect(
        storage.updateIssues(() => ({
          write: [makeIssue('tst-bbbb'), makeIssue('tst-aaaa', { title: '  ' })],
          result: undefined,
        }))
      ).rejects.toThrow('invalid issue data in update: tst-aaaa: title must be a non-empty string');

      expect(fs.existsSync(path.join(issuesDir, 'tst-bbbb.md'))).toBe(false);
    });

    it('runs concurrent updates one after another', async () => {
      writeIssueFile(issuesDir, makeIssue('tst-aaaa'));
      const addTag = (tag: string) =>
        storage.updateIssues(issues => {
          const issue = issues.get('tst-aaaa');
          if (!issue) throw new Error('missing tst-aaaa');
          return { write: [{ ...issue, tags: [...issue.tags, tag] }], result: undefined };
        });

      await Promise.all([addTag('one'), addTag('two'), addTag('three')]);

      expect((await storage.loadIssues()).get('tst-aaaa')?.tags).toEqual(['one', 'two', 'three']);
    });
  });

  it('scans declared schema versions without migrating', async () => {
    writeIssueFile(issuesDir, makeIssue('tst-aaaa'));
    const old = path.join(issuesDir, 'tst-bbbb.md');
    fs.writeFileSync(
      old,
      '---\nschema_version: 6\nid: tst-bbbb\ntitle: Old\npriority: P2\nstatus: open\ndeps: []\nowner: null\ncreated_at: 2024-01-01T00:00:00Z\n---\n'
    );
    const broken = path.join(issuesDir, 'tst-cccc.md');
    fs.writeFileSync(broken, '---\nid: [unclosed\n');

    const { versions, failures } = await storage.scanVersions();

    expect(versions).toEqual([
      { id: 'tst-aaaa', file: path.join(issuesDir, 'tst-aaaa.md'), version: 9 },
      { id: 'tst-bbbb', file: old, version: 6 },
    ]);
    expect(failures).toEqual([
      { file: broken, message: `failed to parse ${broken}: unterminated frontmatter (no closing ---)` },
    ]);
    expect(fs.readFileSync(old, 'utf-8')).toContain('schema_version: 6');
  });
});
