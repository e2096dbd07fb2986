import { BrdError } from './errors';

/** Schema version written by this build. */
export const CURRENT_SCHEMA = 9;

/** Untyped frontmatter, as produced by the YAML parser. */
export type Frontmatter = Record<string, unknown>;

export interface MigrationStep {
  from: number;
  to: number;
  summary: string;
  migrate: (frontmatter: Frontmatter) => Frontmatter;
}

function bump(frontmatter: Frontmatter, version: number): Frontmatter {
  return { ...frontmatter, schema_version: version };
}

/**
 * Ordered steps; MIGRATIONS[k] takes a tree from version k to k + 1.
 * Every step is pure and returns a new object.
 */
export const MIGRATIONS: readonly MigrationStep[] = [
  {
    from: 0,
    to: 1,
    summary: 'add schema version field',
    migrate: fm => ({ ...fm, brd: 1 }),
  },
  {
    from: 1,
    to: 2,
    summary: "rename 'brd' to 'schema_version'",
    migrate: ({ brd: _legacy, ...rest }) => bump(rest, 2),
  },
  {
    from: 2,
    to: 3,
    summary: "add required 'owner' field",
    migrate: fm => bump('owner' in fm ? fm : { ...fm, owner: null }, 3),
  },
  {
    from: 3,
    to: 4,
    summary: "rename 'labels' to 'tags'",
    migrate: ({ labels, ...rest }) => bump(labels === undefined ? rest : { ...rest, tags: labels }, 4),
  },
  {
    from: 4,
    to: 5,
    summary: 'external-repo config support',
    migrate: fm => bump(fm, 5),
  },
  {
    from: 5,
    to: 6,
    summary: 'auto_pull/auto_push config support',
    migrate: fm => bump(fm, 6),
  },
  {
    from: 6,
    to: 7,
    summary: "rename status 'todo' to 'open'",
    migrate: fm => bump(fm.status === 'todo' ? { ...fm, status: 'open' } : fm, 7),
  },
  {
    from: 7,
    to: 8,
    summary: 'replace updated_at with started_at/completed_at',
    migrate: ({ updated_at: updatedAt, ...rest }) => {
      const next: Frontmatter = { ...rest };
      if (updatedAt !== undefined && updatedAt !== null) {
        if (rest.status === 'doing') {
          next.started_at = updatedAt;
        } else if (rest.status === 'done' || rest.status === 'skip') {
          next.started_at = updatedAt;
          next.completed_at = updatedAt;
        }
      }
      return bump(next, 8);
    },
  },
  {
    from: 8,
    to: 9,
    summary: 'add scheduled_for field',
    migrate: fm => bump(fm, 9),
  },
];

function readVersion(value: unknown, key: string): number {
  if (typeof value === 'number' && Number.isInteger(value) && value >= 0) {
    return value;
  }
  throw new BrdError('parse_error', `invalid ${key}: expected a non-negative integer, got ${JSON.stringify(value)}`);
}

/**
 * Declared version of a frontmatter tree: `schema_version`, else the legacy
 * `brd` key, else 0.
 */
export function getSchemaVersion(frontmatter: Frontmatter): number {
  if (frontmatter.schema_version !== undefined) {
    return readVersion(frontmatter.schema_version, 'schema_version');
  }
  if (frontmatter.brd !== undefined) {
    return readVersion(frontmatter.brd, 'brd');
  }
  return 0;
}

export function needsMigration(frontmatter: Frontmatter): boolean {
  return getSchemaVersion(frontmatter) < CURRENT_SCHEMA;
}

export interface MigrationResult {
  frontmatter: Frontmatter;
  fromVersion: number;
  migrated: boolean;
}

/**
 * Brings a tree up to `target`. Trees already at or above the target are
 * returned untouched; rejecting versions newer than the build is the
 * caller's decision.
 */
export function migrateFrontmatter(frontmatter: Frontmatter, target: number = CURRENT_SCHEMA): MigrationResult {
  const fromVersion = getSchemaVersion(frontmatter);
  let current = frontmatter;
  for (let version = fromVersion; version < target; version++) {
    const step = MIGRATIONS[version];
    if (!step) {
      throw new BrdError('error', `no migration registered from schema v${version}`);
    }
    current = step.migrate(current);
  }
  return { frontmatter: current, fromVersion, migrated: fromVersion < target };
}

export function migrationSummary(fromVersion: number, toVersion: number = CURRENT_SCHEMA): string[] {
  return MIGRATIONS.filter(step => step.from >= fromVersion && step.to <= toVersion).map(
    step => `v${step.from}→v${step.to}: ${step.summary}`
  );
}
