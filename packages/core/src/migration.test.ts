import { describe, it, expect } from 'vitest';
import {
  CURRENT_SCHEMA,
  MIGRATIONS,
  getSchemaVersion,
  migrateFrontmatter,
  migrationSummary,
  needsMigration,
} from './migration';

describe('migration pipeline', () => {
  it('has one step per version up to the current schema', () => {
    expect(MIGRATIONS).toHaveLength(CURRENT_SCHEMA);
    MIGRATIONS.forEach((step, index) => {
      expect(step.from).toBe(index);
      expect(step.to).toBe(index + 1);
    });
  });

  describe('getSchemaVersion', () => {
    it('prefers schema_version, then brd, then 0', () => {
      expect(getSchemaVersion({ schema_version: 7, brd: 1 })).toBe(7);
      expect(getSchemaVersion({ brd: 1 })).toBe(1);
      expect(getSchemaVersion({ id: 'x' })).toBe(0);
    });

    it('rejects non-integer versions', () => {
      expect(() => getSchemaVersion({ schema_version: 'nine' })).toThrow(/invalid schema_version/);
    });
  });

  it('takes a v1 tree with legacy keys to the current shape', () => {
    const { frontmatter, fromVersion, migrated } = migrateFrontmatter({
      brd: 1,
      id: 'tst-a1b2',
      status: 'todo',
      labels: ['ui'],
    });

    expect(fromVersion).toBe(1);
    expect(migrated).toBe(true);
    expect(frontmatter).toEqual({
      schema_version: 9,
      id: 'tst-a1b2',
      status: 'open',
      owner: null,
      tags: ['ui'],
    });
  });

  it('derives started_at and completed_at from updated_at', () => {
    const doing = migrateFrontmatter({ schema_version: 7, status: 'doing', updated_at: '2024-02-01T10:00:00Z' });
    expect(doing.frontmatter).toEqual({ schema_version: 9, status: 'doing', started_at: '2024-02-01T10:00:00Z' });

    const done = migrateFrontmatter({ schema_version: 7, status: 'done', updated_at: '2024-02-01T10:00:00Z' });
    expect(done.frontmatter).toEqual({
      schema_version: 9,
      status: 'done',
      started_at: '2024-02-01T10:00:00Z',
      completed_at: '2024-02-01T10:00:00Z',
    });

    const open = migrateFrontmatter({ schema_version: 7, status: 'open', updated_at: '2024-02-01T10:00:00Z' });
    expect(open.frontmatter).toEqual({ schema_version: 9, status: 'open' });
  });

  it('keeps an existing owner when adding the field', () => {
    const { frontmatter } = migrateFrontmatter({ schema_version: 2, owner: 'alice' });
    expect(frontmatter.owner).toBe('alice');
  });

  it('is idempotent once current', () => {
    const once = migrateFrontmatter({ id: 'tst-a1b2', status: 'todo' }).frontmatter;
    const twice = migrateFrontmatter(once);
    expect(twice.migrated).toBe(false);
    expect(twice.frontmatter).toBe(once);
  });

  it('does not mutate its input', () => {
    const input = { brd: 1, status: 'todo' };
    migrateFrontmatter(input);
    expect(input).toEqual({ brd: 1, status: 'todo' });
  });

  it('reports which trees need migrating', () => {
    expect(needsMigration({ schema_version: 8 })).toBe(true);
    expect(needsMigration({ schema_version: 9 })).toBe(false);
  });

  it('summarizes the steps from a version', () => {
    expect(migrationSummary(7)).toEqual([
      'v7→v8: replace updated_at with started_at/completed_at',
      'v8→v9: add scheduled_for field',
    ]);
    expect(migrationSummary(0)[0]).toBe('v0→v1: add schema version field');
    expect(migrationSummary(CURRENT_SCHEMA)).toEqual([]);
  });
});
