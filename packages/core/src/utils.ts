import * as fs from 'fs';
import * as path from 'path';
import { customAlphabet } from 'nanoid';
import { Issue, IssueStatus, IssueType, Priority } from './types';
import { BrdError } from './errors';

export const PRIORITIES: readonly Priority[] = ['P0', 'P1', 'P2', 'P3'];
export const ISSUE_STATUSES: readonly IssueStatus[] = ['open', 'doing', 'done', 'skip'];
export const ISSUE_TYPES: readonly IssueType[] = ['design', 'meta'];

export const ID_ALPHABET = '0123456789abcdefghijklmnopqrstuvwxyz';
export const MAX_ID_ATTEMPTS = 20;

const TIMESTAMP_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?(Z|[+-]\d{2}:\d{2})$/;
const ISSUE_ID_PATTERN = /^[a-z0-9]{2,12}-[a-z0-9]{4,10}$/;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Type guard to check if a value is a valid IssueStatus
 */
export function isValidIssueStatus(status: unknown): status is IssueStatus {
  return typeof status === 'string' && ISSUE_STATUSES.some(s => s === status);
}

/**
 * Type guard to check if a value is a valid Priority
 */
export function isValidPriority(priority: unknown): priority is Priority {
  return typeof priority === 'string' && PRIORITIES.some(p => p === priority);
}

/**
 * Type guard to check if a value is a valid IssueType
 */
export function isValidIssueType(type: unknown): type is IssueType {
  return typeof type === 'string' && ISSUE_TYPES.some(t => t === type);
}

/**
 * RFC 3339 timestamp with an explicit offset.
 */
export function isValidTimestamp(value: unknown): value is string {
  return typeof value === 'string' && TIMESTAMP_PATTERN.test(value) && !isNaN(Date.parse(value));
}

export function isValidIssueId(id: unknown): id is string {
  return typeof id === 'string' && ISSUE_ID_PATTERN.test(id);
}

export function parsePriority(input: string): Priority {
  const normalized = input.trim().toUpperCase();
  if (isValidPriority(normalized)) return normalized;
  throw BrdError.usage(`invalid priority '${input}' (expected one of ${PRIORITIES.join(', ')})`);
}

export function parseIssueStatus(input: string): IssueStatus {
  const normalized = input.trim().toLowerCase();
  if (isValidIssueStatus(normalized)) return normalized;
  throw BrdError.usage(`invalid status '${input}' (expected one of ${ISSUE_STATUSES.join(', ')})`);
}

export function parseIssueType(input: string): IssueType {
  const normalized = input.trim().toLowerCase();
  if (isValidIssueType(normalized)) return normalized;
  throw BrdError.usage(`invalid issue type '${input}' (expected one of ${ISSUE_TYPES.join(', ')})`);
}

export function timestamp(date: Date = new Date()): string {
  return date.toISOString();
}

/**
 * Ordering used by `ready` and `ls`: priority, then creation time, then id.
 */
export function compareIssues(a: Issue, b: Issue): number {
  const byPriority = PRIORITIES.indexOf(a.priority) - PRIORITIES.indexOf(b.priority);
  if (byPriority !== 0) return byPriority;
  const byCreated = Date.parse(a.created_at) - Date.parse(b.created_at);
  if (byCreated !== 0) return byCreated;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

export function sortIssues(issues: Iterable<Issue>): Issue[] {
  return [...issues].sort(compareIssues);
}

/** Appends values not already present, preserving order. */
export function appendUnique(list: readonly string[], ...values: string[]): string[] {
  const result = [...list];
  for (const value of values) {
    if (!result.includes(value)) result.push(value);
  }
  return result;
}

/**
 * Draws random base-36 suffixes until `<issuesDir>/<prefix>-<suffix>.md` is free.
 */
export function generateIssueId(
  prefix: string,
  idLen: number,
  issuesDir: string,
  random: () => string = customAlphabet(ID_ALPHABET, idLen)
): string {
  for (let attempt = 0; attempt < MAX_ID_ATTEMPTS; attempt++) {
    const id = `${prefix}-${random()}`;
    if (!fs.existsSync(path.join(issuesDir, `${id}.md`))) {
      return id;
    }
  }
  throw BrdError.other(`failed to generate unique ID after ${MAX_ID_ATTEMPTS} attempts`);
}

/**
 * Exact id first; otherwise every id that contains or ends with the input.
 */
export function resolveIssueId(input: string, ids: Iterable<string>): string {
  const all = [...ids];
  if (all.includes(input)) return input;

  const matches = all.filter(id => id.includes(input) || id.endsWith(input)).sort();
  if (matches.length === 0) throw BrdError.notFound(input);
  if (matches.length > 1) throw BrdError.ambiguous(input, matches);
  return matches[0];
}

/**
 * Structural validation applied before any issue is written.
 */
export function validateIssue(issue: Issue): { isValid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!isValidIssueId(issue.id)) {
    errors.push(`id '${issue.id}' must look like <prefix>-<suffix> in lowercase base-36`);
  }

  if (issue.title.trim().length === 0) {
    errors.push('title must be a non-empty string');
  }

  if (!isValidPriority(issue.priority)) {
    errors.push(`priority must be one of: ${PRIORITIES.join(', ')}`);
  }

  if (!isValidIssueStatus(issue.status)) {
    errors.push(`status must be one of: ${ISSUE_STATUSES.join(', ')}`);
  }

  if (issue.issue_type !== undefined && !isValidIssueType(issue.issue_type)) {
    errors.push(`issue_type must be one of: ${ISSUE_TYPES.join(', ')}`);
  }

  if (issue.deps.includes(issue.id)) {
    errors.push('an issue cannot depend on itself');
  }

  if (new Set(issue.deps).size !== issue.deps.length) {
    errors.push('deps must not contain duplicates');
  }

  const timestamps = {
    created_at: issue.created_at,
    started_at: issue.started_at,
    completed_at: issue.completed_at,
    scheduled_for: issue.scheduled_for,
  };
  for (const [field, value] of Object.entries(timestamps)) {
    if ((field === 'created_at' || value !== undefined) && !isValidTimestamp(value)) {
      errors.push(`${field} must be an RFC 3339 timestamp`);
    }
  }

  return { isValid: errors.length === 0, errors };
}

/**
 * Lifecycle invariants: doing needs an owner and a start time, closed
 * issues need a completion time. Reported by `doctor`, never enforced on
 * read.
 */
export function checkStateInvariants(issue: Issue): string[] {
  const problems: string[] = [];
  if (issue.status === 'doing') {
    if (!issue.owner) problems.push(`${issue.id} is doing but has no owner`);
    if (!issue.started_at) problems.push(`${issue.id} is doing but has no started_at`);
  }
  if ((issue.status === 'done' || issue.status === 'skip') && !issue.completed_at) {
    problems.push(`${issue.id} is ${issue.status} but has no completed_at`);
  }
  return problems;
}
