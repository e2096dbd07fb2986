import { injectable, inject, optional } from 'inversify';
import simpleGit, { SimpleGit } from 'simple-git';
import { RepoPaths } from './types';
import { ILogger, ConsoleLogger, LogLevel } from './logger';
import { TYPES } from './tokens';

export interface WorktreeInfo {
  path: string;
  head?: string;
  branch?: string;
}

/** One line of `git diff --cached --name-status`. */
export interface StagedChange {
  status: string;
  path: string;
}

export interface PushOptions {
  setUpstream?: boolean;
}

export interface IGitService {
  isClean(cwd?: string): Promise<boolean>;
  add(pathspec: string | string[], cwd?: string): Promise<void>;
  /**
   * Commits whatever is staged, limited to `pathspec` when given; resolves
   * false when nothing was.
   */
  commit(message: string, cwd?: string, pathspec?: string): Promise<boolean>;
  stagedChanges(pathspec: string, cwd?: string): Promise<StagedChange[]>;
  /** Stashes tracked and untracked changes; resolves false when nothing was stashed. */
  stashPush(message: string, cwd?: string): Promise<boolean>;
  stashPop(cwd?: string): Promise<void>;
  hasUpstream(branch: string, cwd?: string): Promise<boolean>;
  branchExists(branch: string, cwd?: string): Promise<boolean>;
  createBranch(branch: string, cwd?: string): Promise<void>;
  addWorktree(dir: string, branch: string, cwd?: string): Promise<void>;
  listWorktrees(cwd?: string): Promise<WorktreeInfo[]>;
  commitsBehind(ref: string, cwd?: string): Promise<number>;
  hasRemote(remote: string, cwd?: string): Promise<boolean>;
  hasRemoteBranch(remote: string, branch: string, cwd?: string): Promise<boolean>;
  fetch(remote: string, branch: string, cwd?: string): Promise<void>;
  /** Rebases onto `upstream`, aborting the rebase before rethrowing on failure. */
  rebase(upstream: string, cwd?: string): Promise<void>;
  push(remote: string, refspec: string, cwd?: string, options?: PushOptions): Promise<void>;
}

/**
 * Parses `git worktree list --porcelain`.
 */
export function parseWorktreeList(output: string): WorktreeInfo[] {
  const worktrees: WorktreeInfo[] = [];
  let current: WorktreeInfo | undefined;
  for (const line of output.split('\n')) {
    if (line.startsWith('worktree ')) {
      current = { path: line.slice('worktree '.length) };
      worktrees.push(current);
    } else if (current && line.startsWith('HEAD ')) {
      current.head = line.slice('HEAD '.length);
    } else if (current && line.startsWith('branch ')) {
      current.branch = line.slice('branch '.length).replace(/^refs\/heads\//, '');
    }
  }
  return worktrees;
}

export function parseNameStatus(output: string): StagedChange[] {
  const changes: StagedChange[] = [];
  for (const line of output.split('\n')) {
    const [status, file] = line.trim().split(/\s+/);
    if (status && file) changes.push({ status, path: file });
  }
  return changes;
}

@injectable()
export class GitService implements IGitService {
  private clients = new Map<string, SimpleGit>();
  private readonly defaultCwd: string;
  private logger: ILogger;

  constructor(
    @inject(TYPES.RepoPaths) paths: RepoPaths,
    @inject(TYPES.ILogger) @optional() logger?: ILogger
  ) {
    this.defaultCwd = paths.worktreeRoot;
    this.logger = logger || new ConsoleLogger(LogLevel.INFO);
  }

  private git(cwd: string = this.defaultCwd): SimpleGit {
    let client = this.clients.get(cwd);
    if (!client) {
      client = simpleGit(cwd);
      this.clients.set(cwd, client);
    }
    return client;
  }

  async isClean(cwd?: string): Promise<boolean> {
    const status = await this.git(cwd).status();
    return status.isClean();
  }

  async add(pathspec: string | string[], cwd?: string): Promise<void> {
    await this.git(cwd).add(pathspec);
  }

  async commit(message: string, cwd?: string, pathspec?: string): Promise<boolean> {
    const git = this.git(cwd);
    const status = await git.status();
    const staged = status.files.some(
      file =>
        file.index !== ' ' &&
        file.index !== '?' &&
        (pathspec === undefined || file.path === pathspec || file.path.startsWith(`${pathspec}/`))
    );
    if (!staged) return false;
    if (pathspec === undefined) {
      await git.commit(message);
    } else {
      await git.commit(message, [pathspec]);
    }
    return true;
  }

  async stagedChanges(pathspec: string, cwd?: string): Promise<StagedChange[]> {
    const output = await this.git(cwd).raw(['diff', '--cached', '--name-status', '--', pathspec]);
    return parseNameStatus(output);
  }

  async stashPush(message: string, cwd?: string): Promise<boolean> {
    const git = this.git(cwd);
    const before = (await git.stashList()).total;
    await git.stash(['push', '--include-untracked', '-m', message]);
    const after = (await git.stashList()).total;
    return after > before;
  }

  async stashPop(cwd?: string): Promise<void> {
    await this.git(cwd).stash(['pop']);
  }

  async hasUpstream(branch: string, cwd?: string): Promise<boolean> {
    try {
      await this.git(cwd).raw(['rev-parse', '--abbrev-ref', `${branch}@{u}`]);
      return true;
    } catch (error) {
      this.logger.debug(`no upstream for ${branch}:`, error);
      return false;
    }
  }

  async branchExists(branch: string, cwd?: string): Promise<boolean> {
    const branches = await this.git(cwd).branchLocal();
    return branches.all.includes(branch);
  }

  async createBranch(branch: string, cwd?: string): Promise<void> {
    await this.git(cwd).raw(['branch', branch]);
  }

  async addWorktree(dir: string, branch: string, cwd?: string): Promise<void> {
    await this.git(cwd).raw(['worktree', 'add', dir, branch]);
  }

  async listWorktrees(cwd?: string): Promise<WorktreeInfo[]> {
    const output = await this.git(cwd).raw(['worktree', 'list', '--porcelain']);
    return parseWorktreeList(output);
  }

  async commitsBehind(ref: string, cwd?: string): Promise<number> {
    const output = await this.git(cwd).raw(['rev-list', '--count', `HEAD..${ref}`]);
    const count = parseInt(output.trim(), 10);
    return isNaN(count) ? 0 : count;
  }

  async hasRemote(remote: string, cwd?: string): Promise<boolean> {
    const remotes = await this.git(cwd).getRemotes();
    return remotes.some(r => r.name === remote);
  }

  async hasRemoteBranch(remote: string, branch: string, cwd?: string): Promise<boolean> {
    const output = await this.git(cwd).raw(['branch', '-r', '--list', `${remote}/${branch}`]);
    return output.trim().length > 0;
  }

  async fetch(remote: string, branch: string, cwd?: string): Promise<void> {
    await this.git(cwd).fetch(remote, branch);
  }

  async rebase(upstream: string, cwd?: string): Promise<void> {
    const git = this.git(cwd);
    try {
      await git.rebase([upstream]);
    } catch (error) {
      await git.rebase(['--abort']).catch(abortError => {
        this.logger.warn(`git rebase --abort failed in ${cwd ?? this.defaultCwd}:`, abortError);
      });
      throw error;
    }
  }

  async push(remote: string, refspec: string, cwd?: string, options: PushOptions = {}): Promise<void> {
    if (options.setUpstream) {
      await this.git(cwd).push(remote, refspec, ['--set-upstream']);
    } else {
      await this.git(cwd).push(remote, refspec);
    }
  }
}
