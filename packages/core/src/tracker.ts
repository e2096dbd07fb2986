import { injectable, inject, optional } from 'inversify';
import * as fs from 'fs';
import { BraidConfig, Issue, IssueStatus, IssueType, IssueView, Priority } from './types';
import { BrdError } from './errors';
import { ILogger, ConsoleLogger, LogLevel } from './logger';
import { IConfigService } from './config';
import { IStorageService, FileVersion } from './storage';
import { IGraphService, IssueMap } from './graph';
import { ILockService } from './lock';
import { ISyncService, SyncReport } from './sync';
import { createIssue } from './issue';
import { CURRENT_SCHEMA, migrationSummary } from './migration';
import {
  appendUnique,
  generateIssueId,
  isValidTimestamp,
  parseIssueStatus,
  parseIssueType,
  parsePriority,
  resolveIssueId,
  sortIssues,
  timestamp,
} from './utils';
import { TYPES } from './tokens';

export interface AddIssueInput {
  title: string;
  priority?: Priority;
  issueType?: IssueType;
  deps?: string[];
  tags?: string[];
  acceptance?: string[];
  body?: string;
  scheduledFor?: string;
}

export interface StartOptions {
  id?: string;
  force?: boolean;
  /** Pull before claiming when `auto_pull` is on. Defaults to true. */
  sync?: boolean;
  /** Commit and push the claim when `auto_push` is on. Defaults to true. */
  push?: boolean;
}

export interface StartResult {
  issue: IssueView;
  /** Other issues this agent already has in progress. */
  alsoDoing: string[];
  sync: SyncReport | null;
}

export interface DoneOptions {
  id: string;
  force?: boolean;
  results?: string[];
  push?: boolean;
}

export interface DoneResult {
  issue: IssueView;
  results: string[];
  /** Issues whose deps changed through propagation. */
  updated: string[];
  sync: SyncReport | null;
}

export interface RemoveResult {
  id: string;
  /** Issues still listing the removed id in their deps. */
  dependents: string[];
}

export interface DependencyChange {
  child: string;
  parent: string;
  changed: boolean;
}

export interface ListFilter {
  status?: IssueStatus[];
  priority?: Priority;
  tag?: string;
  type?: IssueType;
  owner?: string;
  ready?: boolean;
  blocked?: boolean;
  /** Include done and skip issues when no status filter is given. */
  all?: boolean;
}

export interface IssuePath {
  id: string;
  path: string;
}

export interface ShowResult {
  issue: IssueView;
  dependents: string[];
}

export interface StatusSummary {
  total: number;
  by_status: Record<IssueStatus, number>;
  ready: number;
  blocked: number;
  doing: { id: string; owner: string | null }[];
}

export interface MigrationReport {
  dry_run: boolean;
  schema_version: number;
  files: { id: string; file: string; from: number }[];
  steps: string[];
  failures: { file: string; message: string }[];
}

export interface ITrackerService {
  add(input: AddIssueInput): Promise<IssueView>;
  start(options?: StartOptions): Promise<StartResult>;
  done(options: DoneOptions): Promise<DoneResult>;
  skip(id: string): Promise<IssueView>;
  reopen(id: string): Promise<IssueView>;
  set(id: string, field: string, value: string): Promise<IssueView>;
  remove(id: string, force?: boolean): Promise<RemoveResult>;
  addDependency(child: string, parent: string): Promise<DependencyChange>;
  removeDependency(child: string, parent: string): Promise<DependencyChange>;
  list(filter?: ListFilter): Promise<IssueView[]>;
  show(id: string): Promise<ShowResult>;
  /** Absolute path of the issue's file in the active layout. */
  path(id: string): Promise<IssuePath>;
  ready(): Promise<IssueView[]>;
  next(): Promise<IssueView | null>;
  summary(): Promise<StatusSummary>;
  migrate(dryRun?: boolean): Promise<MigrationReport>;
  setAutoSync(enabled: boolean): Promise<BraidConfig>;
}

function withoutOwner(issue: Issue): Issue {
  const { owner: _owner, ...rest } = issue;
  return rest;
}

function withoutCompletion(issue: Issue): Issue {
  const { completed_at: _completedAt, ...rest } = issue;
  return rest;
}

function normalizeTimestamp(input: string): string {
  if (isValidTimestamp(input)) return input;
  const parsed = Date.parse(input);
  if (isNaN(parsed)) {
    throw BrdError.usage(`invalid timestamp '${input}'`);
  }
  return timestamp(new Date(parsed));
}

/**
 * Lock-protected read/transform/write operations over the issue store, and
 * the lock-free read queries.
 */
@injectable()
export class TrackerService implements ITrackerService {
  private logger: ILogger;

  constructor(
    @inject(TYPES.IStorageService) private storage: IStorageService,
    @inject(TYPES.IGraphService) private graph: IGraphService,
    @inject(TYPES.IConfigService) private config: IConfigService,
    @inject(TYPES.ILockService) private lock: ILockService,
    @inject(TYPES.ISyncService) private sync: ISyncService,
    @inject(TYPES.AgentId) private agentId: string,
    @inject(TYPES.ILogger) @optional() logger?: ILogger
  ) {
    this.logger = logger || new ConsoleLogger(LogLevel.INFO);
  }

  private view(issue: Issue, issues: IssueMap): IssueView {
    return { ...issue, derived: this.graph.computeDerived(issue, issues) };
  }

  private lookup(input: string, issues: IssueMap): Issue {
    const id = resolveIssueId(input, issues.keys());
    const issue = issues.get(id);
    if (!issue) throw BrdError.notFound(input);
    return issue;
  }

  private withChange(issues: IssueMap, changed: Issue[]): Map<string, Issue> {
    const next = new Map(issues);
    for (const issue of changed) next.set(issue.id, issue);
    return next;
  }

  async add(input: AddIssueInput): Promise<IssueView> {
    const title = input.title.trim();
    if (!title) throw BrdError.usage('title must not be empty');
    const config = await this.config.load();

    return this.storage.updateIssues(async issues => {
      const deps = (input.deps ?? []).map(dep => resolveIssueId(dep, issues.keys()));
      const dir = await this.storage.getIssuesDir();
      await fs.promises.mkdir(dir, { recursive: true });

      const issue = createIssue({
        id: generateIssueId(config.id_prefix, config.id_len, dir),
        title,
        priority: input.priority,
        issueType: input.issueType,
        deps,
        tags: input.tags,
        acceptance: input.acceptance,
        body: input.body,
        scheduledFor: input.scheduledFor === undefined ? undefined : normalizeTimestamp(input.scheduledFor),
      });
      this.logger.debug(`created ${issue.id}`);
      return { write: [issue], result: this.view(issue, this.withChange(issues, [issue])) };
    });
  }

  async start(options: StartOptions = {}): Promise<StartResult> {
    const config = await this.config.load();
    if (config.auto_pull && options.sync !== false) {
      await this.sync.pull();
    }

    return this.lock.withLock(async () => {
      const outcome = await this.storage.updateIssues(issues => {
        let issue: Issue;
        if (options.id !== undefined) {
          issue = this.lookup(options.id, issues);
        } else {
          const candidate = this.graph.getReadyIssues(issues).find(ready => ready.issue_type !== 'meta');
          if (!candidate) throw BrdError.other('no ready issues');
          issue = candidate;
        }

        if (issue.status === 'doing' && !options.force) {
          throw BrdError.claimConflict(
            `issue ${issue.id} is already being worked on by '${issue.owner ?? 'unknown'}' (use --force to reassign)`
          );
        }

        const started: Issue = {
          ...withoutCompletion(issue),
          status: 'doing',
          owner: this.agentId,
          started_at: timestamp(),
        };
        const alsoDoing = [...issues.values()]
          .filter(other => other.id !== issue.id && other.status === 'doing' && other.owner === this.agentId)
          .map(other => other.id)
          .sort();
        return {
          write: [started],
          result: { issue: this.view(started, this.withChange(issues, [started])), alsoDoing },
        };
      });

      if (outcome.alsoDoing.length > 0) {
        this.logger.warn(`${this.agentId} is also working on: ${outcome.alsoDoing.join(', ')}`);
      }
      const sync = config.auto_push && options.push !== false
        ? await this.sync.commitChange('start', outcome.issue.id, true)
        : null;
      return { ...outcome, sync };
    });
  }

  async done(options: DoneOptions): Promise<DoneResult> {
    const config = await this.config.load();

    return this.lock.withLock(async () => {
      const outcome = await this.storage.updateIssues(issues => {
        const issue = this.lookup(options.id, issues);
        const results = appendUnique([], ...(options.results ?? []).map(r => resolveIssueId(r, issues.keys())));

        if (results.includes(issue.id)) {
          throw BrdError.usage(`${issue.issue_type === 'design' ? 'design issue' : 'issue'} cannot list itself as a result`);
        }
        if (issue.issue_type === 'design' && results.length === 0 && !options.force) {
          throw BrdError.other(
            'design issues require --result <issue-id> to specify resulting issues\nuse --force to close without results'
          );
        }

        const propagated = this.graph.propagateResults(issue.id, results, issues);
        const closed: Issue = {
          ...withoutOwner(issue),
          status: 'done',
          completed_at: timestamp(),
        };
        const changed = [closed, ...propagated.filter(other => other.id !== issue.id)];
        return {
          write: changed,
          result: {
            issue: this.view(closed, this.withChange(issues, changed)),
            results,
            updated: propagated.map(other => other.id).sort(),
          },
        };
      });

      const sync = config.auto_push && options.push !== false
        ? await this.sync.commitChange('done', outcome.issue.id, true)
        : null;
      return { ...outcome, sync };
    });
  }

  async skip(id: string): Promise<IssueView> {
    return this.transition(id, issue => ({ ...withoutOwner(issue), status: 'skip', completed_at: timestamp() }));
  }

  async reopen(id: string): Promise<IssueView> {
    return this.transition(id, issue => ({ ...withoutCompletion(withoutOwner(issue)), status: 'open' }));
  }

  async set(id: string, field: string, value: string): Promise<IssueView> {
    return this.transition(id, issue => this.applyField(issue, field, value));
  }

  private applyField(issue: Issue, field: string, value: string): Issue {
    switch (field) {
      case 'priority':
      case 'p':
        return { ...issue, priority: parsePriority(value) };
      case 'status':
        return this.applyStatus(issue, parseIssueStatus(value));
      case 'type':
      case 'issue_type': {
        if (value === '-') {
          const { issue_type: _cleared, ...rest } = issue;
          return rest;
        }
        return { ...issue, issue_type: parseIssueType(value) };
      }
      case 'owner': {
        if (value === '-') {
          if (issue.status === 'doing') {
            throw BrdError.usage(`cannot clear the owner of ${issue.id} while it is doing (reopen or skip it first)`);
          }
          return withoutOwner(issue);
        }
        if (!value.trim()) throw BrdError.usage('owner must not be empty');
        return { ...issue, owner: value.trim() };
      }
      case 'title': {
        if (!value.trim()) throw BrdError.usage('title must not be empty');
        return { ...issue, title: value.trim() };
      }
      case 'tag': {
        const remove = value.startsWith('-');
        const tag = value.replace(/^[+-]/, '').trim();
        if (!tag) throw BrdError.usage('tag must not be empty');
        return remove
          ? { ...issue, tags: issue.tags.filter(existing => existing !== tag) }
          : { ...issue, tags: appendUnique(issue.tags, tag) };
      }
      default:
        throw BrdError.usage(`unknown field '${field}' (expected priority, status, type, owner, title or tag)`);
    }
  }

  // keeps the lifecycle invariants when status is edited directly
  private applyStatus(issue: Issue, status: IssueStatus): Issue {
    switch (status) {
      case 'open':
        return { ...withoutCompletion(withoutOwner(issue)), status };
      case 'doing':
        return {
          ...withoutCompletion(issue),
          status,
          owner: issue.owner ?? this.agentId,
          started_at: issue.started_at ?? timestamp(),
        };
      case 'done':
      case 'skip':
        return { ...withoutOwner(issue), status, completed_at: issue.completed_at ?? timestamp() };
    }
  }

  private async transition(id: string, change: (issue: Issue) => Issue): Promise<IssueView> {
    return this.storage.updateIssues(issues => {
      const updated = change(this.lookup(id, issues));
      return { write: [updated], result: this.view(updated, this.withChange(issues, [updated])) };
    });
  }

  async remove(id: string, force: boolean = false): Promise<RemoveResult> {
    const result = await this.storage.updateIssues(issues => {
      const issue = this.lookup(id, issues);
      if (issue.status === 'doing' && !force) {
        throw BrdError.claimConflict(`issue ${issue.id} is in progress (use --force to delete anyway)`);
      }
      return {
        remove: [issue.id],
        result: { id: issue.id, dependents: this.graph.getDependents(issue.id, issues) },
      };
    });
    if (result.dependents.length > 0) {
      this.logger.warn(`${result.dependents.join(', ')} still depend on ${result.id}; \`brd doctor\` will report them`);
    }
    return result;
  }

  async addDependency(child: string, parent: string): Promise<DependencyChange> {
    return this.storage.updateIssues(issues => {
      const childId = resolveIssueId(child, issues.keys());
      const parentId = resolveIssueId(parent, issues.keys());
      const updated = this.graph.addDependency(childId, parentId, issues);
      return {
        write: updated ? [updated] : [],
        result: { child: childId, parent: parentId, changed: updated !== null },
      };
    });
  }

  async removeDependency(child: string, parent: string): Promise<DependencyChange> {
    return this.storage.updateIssues(issues => {
      const childId = resolveIssueId(child, issues.keys());
      // the parent may already be gone, so fall back to the literal input
      const parentId = issues.has(parent) ? parent : this.resolveDepOf(issues.get(childId), parent);
      const updated = this.graph.removeDependency(childId, parentId, issues);
      return {
        write: updated ? [updated] : [],
        result: { child: childId, parent: parentId, changed: updated !== null },
      };
    });
  }

  private resolveDepOf(child: Issue | undefined, input: string): string {
    if (!child) return input;
    try {
      return resolveIssueId(input, child.deps);
    } catch (error) {
      if (error instanceof BrdError && error.kind === 'issue_not_found') return input;
      throw error;
    }
  }

  async list(filter: ListFilter = {}): Promise<IssueView[]> {
    const issues = await this.storage.loadIssues();
    const views = sortIssues(issues.values()).map(issue => this.view(issue, issues));
    return views.filter(issue => {
      if (filter.status && filter.status.length > 0) {
        if (!filter.status.includes(issue.status)) return false;
      } else if (!filter.all && !filter.ready && !filter.blocked && (issue.status === 'done' || issue.status === 'skip')) {
        return false;
      }
      if (filter.priority && issue.priority !== filter.priority) return false;
      if (filter.tag && !issue.tags.includes(filter.tag)) return false;
      if (filter.type && issue.issue_type !== filter.type) return false;
      if (filter.owner && issue.owner !== filter.owner) return false;
      if (filter.ready && !issue.derived.is_ready) return false;
      if (filter.blocked && !issue.derived.is_blocked) return false;
      return true;
    });
  }

  async show(id: string): Promise<ShowResult> {
    const issues = await this.storage.loadIssues();
    const issue = this.lookup(id, issues);
    return { issue: this.view(issue, issues), dependents: this.graph.getDependents(issue.id, issues) };
  }

  async path(id: string): Promise<IssuePath> {
    const issues = await this.storage.loadIssues();
    const issue = this.lookup(id, issues);
    return { id: issue.id, path: await this.storage.getIssuePath(issue.id) };
  }

  async ready(): Promise<IssueView[]> {
    const issues = await this.storage.loadIssues();
    return this.graph.getReadyIssues(issues).map(issue => this.view(issue, issues));
  }

  async next(): Promise<IssueView | null> {
    const issues = await this.storage.loadIssues();
    const issue = this.graph.getReadyIssues(issues).find(ready => ready.issue_type !== 'meta');
    return issue ? this.view(issue, issues) : null;
  }

  async summary(): Promise<StatusSummary> {
    const issues = await this.storage.loadIssues();
    const byStatus: Record<IssueStatus, number> = { open: 0, doing: 0, done: 0, skip: 0 };
    let ready = 0;
    let blocked = 0;
    const doing: { id: string; owner: string | null }[] = [];
    for (const issue of sortIssues(issues.values())) {
      byStatus[issue.status]++;
      const derived = this.graph.computeDerived(issue, issues);
      if (derived.is_ready) ready++;
      if (derived.is_blocked) blocked++;
      if (issue.status === 'doing') doing.push({ id: issue.id, owner: issue.owner ?? null });
    }
    return { total: issues.size, by_status: byStatus, ready, blocked, doing };
  }

  /**
   * Rewrites every file whose on-disk schema is older than the current one.
   */
  async migrate(dryRun: boolean = false): Promise<MigrationReport> {
    const plan = async (): Promise<{ stale: FileVersion[]; failures: MigrationReport['failures'] }> => {
      const { versions, failures } = await this.storage.scanVersions();
      const tooNew = versions.filter(v => v.version > CURRENT_SCHEMA);
      for (const file of tooNew) {
        failures.push({
          file: file.file,
          message: `schema v${file.version} is newer than supported v${CURRENT_SCHEMA}`,
        });
      }
      return { stale: versions.filter(v => v.version < CURRENT_SCHEMA), failures };
    };

    const report = (stale: FileVersion[], failures: MigrationReport['failures']): MigrationReport => ({
      dry_run: dryRun,
      schema_version: CURRENT_SCHEMA,
      files: stale.map(v => ({ id: v.id, file: v.file, from: v.version })),
      steps: stale.length > 0 ? migrationSummary(Math.min(...stale.map(v => v.version))) : [],
      failures,
    });

    if (dryRun) {
      const { stale, failures } = await plan();
      return report(stale, failures);
    }

    return this.storage.updateIssues(async issues => {
      const { stale, failures } = await plan();
      const write = stale.map(v => issues.get(v.id)).filter((issue): issue is Issue => issue !== undefined);
      return { write, result: report(stale, failures) };
    });
  }

  async setAutoSync(enabled: boolean): Promise<BraidConfig> {
    return this.lock.withLock(async () => {
      const config = { ...(await this.config.load()), auto_pull: enabled, auto_push: enabled };
      await this.config.save(config);
      return config;
    });
  }
}
