import { injectable, inject, optional } from 'inversify';
import * as fs from 'fs';
import * as path from 'path';
import { Issue, IssueLoadFailure, IssueLoadResult } from './types';
import { BrdError, toBrdError } from './errors';
import { ILogger, ConsoleLogger, LogLevel } from './logger';
import { parseIssue, readFrontmatter, serializeIssue } from './issue';
import { getSchemaVersion } from './migration';
import { atomicWrite } from './atomic';
import { validateIssue } from './utils';
import { ILayoutService } from './layout';
import { ILockService, LockOptions } from './lock';
import { TYPES } from './tokens';

export interface IssueUpdate<T> {
  /** Issues to (re)write. */
  write?: Issue[];
  /** Ids whose files are deleted. */
  remove?: string[];
  result: T;
}

export type IssueUpdater<T> = (issues: Map<string, Issue>) => IssueUpdate<T> | Promise<IssueUpdate<T>>;

export interface FileVersion {
  id: string;
  file: string;
  version: number;
}

export interface IStorageService {
  getIssuesDir(): Promise<string>;
  getIssuePath(id: string): Promise<string>;
  listIssueFiles(): Promise<string[]>;
  loadAll(): Promise<IssueLoadResult>;
  loadIssues(): Promise<Map<string, Issue>>;
  saveIssue(issue: Issue): Promise<void>;
  deleteIssue(id: string): Promise<void>;
  updateIssues<T>(updater: IssueUpdater<T>, options?: LockOptions): Promise<T>;
  scanVersions(): Promise<{ versions: FileVersion[]; failures: IssueLoadFailure[] }>;
}

/**
 * One markdown file per issue under the resolved issues directory. Reads
 * take no lock; `updateIssues` is the single locked read-modify-write path.
 */
@injectable()
export class StorageService implements IStorageService {
  private writeQueue: Promise<void> = Promise.resolve(); // Serialize all write operations within this process
  private logger: ILogger;

  constructor(
    @inject(TYPES.ILayoutService) private layout: ILayoutService,
    @inject(TYPES.ILockService) private lock: ILockService,
    @inject(TYPES.ILogger) @optional() logger?: ILogger
  ) {
    this.logger = logger || new ConsoleLogger(LogLevel.INFO);
  }

  async getIssuesDir(): Promise<string> {
    return this.layout.resolveIssuesDir();
  }

  async getIssuePath(id: string): Promise<string> {
    return path.join(await this.getIssuesDir(), `${id}.md`);
  }

  async listIssueFiles(): Promise<string[]> {
    const dir = await this.getIssuesDir();
    if (!fs.existsSync(dir)) return [];
    const entries = await fs.promises.readdir(dir, { withFileTypes: true });
    return entries
      .filter(entry => entry.isFile() && entry.name.endsWith('.md'))
      .map(entry => path.join(dir, entry.name))
      .sort();
  }

  async loadAll(): Promise<IssueLoadResult> {
    const issues = new Map<string, Issue>();
    const failures: IssueLoadFailure[] = [];

    for (const file of await this.listIssueFiles()) {
      try {
        const content = await fs.promises.readFile(file, 'utf-8');
        const issue = parseIssue(content, { file, expectedId: path.basename(file, '.md') });
        issues.set(issue.id, issue);
      } catch (error) {
        failures.push({ file, message: toBrdError(error).message });
      }
    }

    return { issues, failures };
  }

  async loadIssues(): Promise<Map<string, Issue>> {
    const { issues, failures } = await this.loadAll();
    // Unparseable files are skipped so one bad file never blocks the store
    for (const failure of failures) {
      this.logger.warn(`failed to load ${failure.file}: ${failure.message}`);
    }
    return issues;
  }

  async saveIssue(issue: Issue): Promise<void> {
    await this.lock.withLock(() => this.enqueue(() => this.writeIssue(issue)));
  }

  async deleteIssue(id: string): Promise<void> {
    await this.lock.withLock(() => this.enqueue(() => this.removeIssueFile(id)));
  }

  async updateIssues<T>(updater: IssueUpdater<T>, options: LockOptions = {}): Promise<T> {
    // lock first: a queued writer must never wait behind a caller that holds the lock
    return this.lock.withLock(() => this.enqueue(() => this.applyUpdate(updater)), options);
  }

  private async applyUpdate<T>(updater: IssueUpdater<T>): Promise<T> {
    const issues = await this.loadIssues();
    const update = await updater(issues);
    const toWrite = update.write ?? [];

    const validationErrors: string[] = [];
    for (const issue of toWrite) {
      const validation = validateIssue(issue);
      if (!validation.isValid) {
        validationErrors.push(`${issue.id}: ${validation.errors.join(', ')}`);
      }
    }
    if (validationErrors.length > 0) {
      throw BrdError.other(`invalid issue data in update: ${validationErrors.join('; ')}`);
    }

    for (const issue of toWrite) {
      await this.writeIssue(issue);
    }
    for (const id of update.remove ?? []) {
      await this.removeIssueFile(id);
    }
    this.logger.debug(`updated ${toWrite.length} issue(s), removed ${update.remove?.length ?? 0}`);
    return update.result;
  }

  async scanVersions(): Promise<{ versions: FileVersion[]; failures: IssueLoadFailure[] }> {
    const versions: FileVersion[] = [];
    const failures: IssueLoadFailure[] = [];
    for (const file of await this.listIssueFiles()) {
      try {
        const content = await fs.promises.readFile(file, 'utf-8');
        const { frontmatter } = readFrontmatter(content, file);
        versions.push({ id: path.basename(file, '.md'), file, version: getSchemaVersion(frontmatter) });
      } catch (error) {
        failures.push({ file, message: toBrdError(error).message });
      }
    }
    return { versions, failures };
  }

  private async writeIssue(issue: Issue): Promise<void> {
    const validation = validateIssue(issue);
    if (!validation.isValid) {
      throw BrdError.other(`invalid issue data for ${issue.id}: ${validation.errors.join(', ')}`);
    }
    await atomicWrite(await this.getIssuePath(issue.id), serializeIssue(issue));
  }

  private async removeIssueFile(id: string): Promise<void> {
    const file = await this.getIssuePath(id);
    try {
      await fs.promises.unlink(file);
    } catch (error) {
      throw BrdError.io(`failed to delete ${file}`, error);
    }
  }

  private enqueue<T>(operation: () => Promise<T>): Promise<T> {
    const run = this.writeQueue.then(operation);
    this.writeQueue = run.then(
      () => undefined,
      err => {
        this.logger.debug('queued storage operation failed:', err);
      }
    );
    return run;
  }
}
