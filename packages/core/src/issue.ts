import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { Issue, IssueType, Priority } from './types';
import { BrdError } from './errors';
import { CURRENT_SCHEMA, Frontmatter, getSchemaVersion, migrateFrontmatter } from './migration';
import {
  appendUnique,
  isRecord,
  isValidIssueStatus,
  isValidIssueType,
  isValidPriority,
  isValidTimestamp,
  timestamp,
} from './utils';

const FENCE = '---';

export interface FrontmatterSplit {
  frontmatter: string;
  body: string;
}

const LEADING_NEWLINES = /^(\r?\n)+/;

/**
 * Bodies are stored without leading blank lines and end with a newline, the
 * same shape `splitFrontmatter` reads back.
 */
export function normalizeBody(body: string): string {
  const trimmed = body.replace(LEADING_NEWLINES, '');
  return trimmed.length > 0 && !trimmed.endsWith('\n') ? `${trimmed}\n` : trimmed;
}

/**
 * Splits `---\n<yaml>\n---\n\n<body>` into its two halves.
 */
export function splitFrontmatter(content: string, file: string = '<input>'): FrontmatterSplit {
  const trimmed = content.trimStart();
  if (!trimmed.startsWith(FENCE)) {
    throw BrdError.parse(file, 'missing frontmatter (file must start with ---)');
  }
  const rest = trimmed.slice(FENCE.length);
  const end = rest.indexOf(`\n${FENCE}`);
  if (end === -1) {
    throw BrdError.parse(file, 'unterminated frontmatter (no closing ---)');
  }
  return {
    frontmatter: rest.slice(0, end).trim(),
    body: rest.slice(end + FENCE.length + 1).replace(LEADING_NEWLINES, ''),
  };
}

/**
 * Parses the YAML half without migrating it.
 */
export function readFrontmatter(content: string, file: string = '<input>'): { frontmatter: Frontmatter; body: string } {
  const split = splitFrontmatter(content, file);
  let parsed: unknown;
  try {
    parsed = parseYaml(split.frontmatter);
  } catch (error) {
    throw new BrdError('parse_error', `failed to parse ${file}: ${error instanceof Error ? error.message : String(error)}`, { file }, { cause: error });
  }
  if (!isRecord(parsed)) {
    throw BrdError.parse(file, 'frontmatter must be a YAML mapping');
  }
  return { frontmatter: parsed, body: split.body };
}

function requireString(fm: Frontmatter, key: string, file: string): string {
  const value = fm[key];
  if (typeof value !== 'string' || value.length === 0) {
    throw BrdError.parse(file, `missing or invalid '${key}'`);
  }
  return value;
}

function optionalString(fm: Frontmatter, key: string, file: string): string | undefined {
  const value = fm[key];
  if (value === undefined || value === null || value === '') return undefined;
  if (typeof value !== 'string') {
    throw BrdError.parse(file, `'${key}' must be a string`);
  }
  return value;
}

function optionalTimestamp(fm: Frontmatter, key: string, file: string): string | undefined {
  const value = optionalString(fm, key, file);
  if (value !== undefined && !isValidTimestamp(value)) {
    throw BrdError.parse(file, `'${key}' is not an RFC 3339 timestamp: ${value}`);
  }
  return value;
}

function stringList(fm: Frontmatter, key: string, file: string): string[] {
  const value = fm[key];
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw BrdError.parse(file, `'${key}' must be a list`);
  }
  const items: string[] = [];
  for (const item of value) {
    if (typeof item === 'string') {
      items.push(item);
    } else if (typeof item === 'number' || typeof item === 'boolean') {
      items.push(String(item));
    } else {
      throw BrdError.parse(file, `'${key}' must contain only strings`);
    }
  }
  return items;
}

/**
 * Decodes a tree that is already at the current schema.
 */
export function decodeIssue(fm: Frontmatter, body: string, file: string = '<input>'): Issue {
  const priorityRaw = requireString(fm, 'priority', file).toUpperCase();
  if (!isValidPriority(priorityRaw)) {
    throw BrdError.parse(file, `unknown priority '${String(fm.priority)}'`);
  }
  const priority: Priority = priorityRaw;

  const status = fm.status;
  if (!isValidIssueStatus(status)) {
    throw BrdError.parse(file, `unknown status '${String(status)}'`);
  }

  // older writers used `type` for the issue type
  const typeRaw = fm.issue_type ?? fm.type;
  let issueType: IssueType | undefined;
  if (typeRaw !== undefined && typeRaw !== null) {
    if (!isValidIssueType(typeRaw)) {
      throw BrdError.parse(file, `unknown issue type '${String(typeRaw)}'`);
    }
    issueType = typeRaw;
  }

  const createdAt = requireString(fm, 'created_at', file);
  if (!isValidTimestamp(createdAt)) {
    throw BrdError.parse(file, `'created_at' is not an RFC 3339 timestamp: ${createdAt}`);
  }

  const issue: Issue = {
    schema_version: CURRENT_SCHEMA,
    id: requireString(fm, 'id', file),
    title: requireString(fm, 'title', file),
    priority,
    status,
    deps: appendUnique([], ...stringList(fm, 'deps', file)),
    tags: appendUnique([], ...stringList(fm, 'tags', file)),
    created_at: createdAt,
    acceptance: stringList(fm, 'acceptance', file),
    body,
  };
  if (issueType) issue.issue_type = issueType;

  const owner = optionalString(fm, 'owner', file);
  if (owner !== undefined) issue.owner = owner;
  const startedAt = optionalTimestamp(fm, 'started_at', file);
  if (startedAt !== undefined) issue.started_at = startedAt;
  const completedAt = optionalTimestamp(fm, 'completed_at', file);
  if (completedAt !== undefined) issue.completed_at = completedAt;
  const scheduledFor = optionalTimestamp(fm, 'scheduled_for', file);
  if (scheduledFor !== undefined) issue.scheduled_for = scheduledFor;

  return issue;
}

export interface ParseOptions {
  /** Label used in error messages, normally the file path. */
  file?: string;
  /** When set, the decoded id must equal it (the file stem). */
  expectedId?: string;
}

export interface ParsedIssue {
  issue: Issue;
  /** Schema version declared on disk before migration. */
  fromVersion: number;
}

export function parseIssueWithVersion(content: string, options: ParseOptions = {}): ParsedIssue {
  const file = options.file ?? '<input>';
  const { frontmatter, body } = readFrontmatter(content, file);

  let fromVersion: number;
  try {
    fromVersion = getSchemaVersion(frontmatter);
  } catch (error) {
    throw BrdError.parse(file, error instanceof Error ? error.message : String(error));
  }
  if (fromVersion > CURRENT_SCHEMA) {
    throw BrdError.parse(
      file,
      `issue uses schema v${fromVersion}, but this brd only supports up to v${CURRENT_SCHEMA}; upgrade brd`
    );
  }

  const migrated = migrateFrontmatter(frontmatter).frontmatter;
  const issue = decodeIssue(migrated, body, file);

  if (options.expectedId !== undefined && issue.id !== options.expectedId) {
    throw BrdError.parse(file, `id '${issue.id}' does not match filename '${options.expectedId}'`);
  }
  return { issue, fromVersion };
}

export function parseIssue(content: string, options: ParseOptions = {}): Issue {
  return parseIssueWithVersion(content, options).issue;
}

/**
 * Canonical on-disk form. Key order is fixed; empty optional fields and
 * empty tags/acceptance are left out.
 */
export function serializeIssue(issue: Issue): string {
  const doc: Record<string, unknown> = {
    schema_version: CURRENT_SCHEMA,
    id: issue.id,
    title: issue.title,
    priority: issue.priority,
    status: issue.status,
  };
  if (issue.issue_type) doc.issue_type = issue.issue_type;
  doc.deps = issue.deps;
  if (issue.owner) doc.owner = issue.owner;
  if (issue.tags.length > 0) doc.tags = issue.tags;
  doc.created_at = issue.created_at;
  if (issue.started_at) doc.started_at = issue.started_at;
  if (issue.completed_at) doc.completed_at = issue.completed_at;
  if (issue.scheduled_for) doc.scheduled_for = issue.scheduled_for;
  if (issue.acceptance.length > 0) doc.acceptance = issue.acceptance;

  const yaml = stringifyYaml(doc, { lineWidth: 0 });
  const header = `${FENCE}\n${yaml}${FENCE}\n`;
  return issue.body.length > 0 ? `${header}\n${issue.body}` : header;
}

export interface NewIssueInput {
  id: string;
  title: string;
  priority?: Priority;
  issueType?: IssueType;
  deps?: string[];
  tags?: string[];
  acceptance?: string[];
  body?: string;
  scheduledFor?: string;
  createdAt?: string;
}

export function createIssue(input: NewIssueInput): Issue {
  const issue: Issue = {
    schema_version: CURRENT_SCHEMA,
    id: input.id,
    title: input.title.trim(),
    priority: input.priority ?? 'P2',
    status: 'open',
    deps: appendUnique([], ...(input.deps ?? [])),
    tags: appendUnique([], ...(input.tags ?? [])),
    created_at: input.createdAt ?? timestamp(),
    acceptance: [...(input.acceptance ?? [])],
    body: normalizeBody(input.body ?? ''),
  };
  if (input.issueType) issue.issue_type = input.issueType;
  if (input.scheduledFor) issue.scheduled_for = input.scheduledFor;
  return issue;
}
