import { injectable, inject, optional } from 'inversify';
import * as fs from 'fs';
import * as path from 'path';
import { BraidConfig, LayoutMode, RepoPaths } from './types';
import { BrdError } from './errors';
import { ILogger, ConsoleLogger, LogLevel } from './logger';
import { IConfigService, BRAID_DIR, configPathFor, readConfigFile } from './config';
import { IGitService, WorktreeInfo } from './git';
import { ILockService } from './lock';
import { discoverRepo, issuesWorktreeDir, localIssuesDir } from './repo';
import { TYPES } from './tokens';

/**
 * Where issue files physically live, and which checkout commits them.
 */
export interface IssuesLocation {
  mode: LayoutMode;
  issuesDir: string;
  /** Checkout whose `.braid` holds the issue files. */
  gitRoot: string;
  /** Remote branch the issues are synced with. */
  syncBranch: string;
  /** Refspec pushed after committing. */
  pushRefspec: string;
}

export interface ModeChangeResult {
  mode: LayoutMode;
  /** Issue files moved or copied by the change. */
  moved: number;
  /** Sibling agent worktrees that must rebase onto main to see the new config. */
  staleWorktrees: WorktreeInfo[];
}

export interface ILayoutService {
  getMode(): Promise<LayoutMode>;
  resolveLocation(): Promise<IssuesLocation>;
  resolveIssuesDir(): Promise<string>;
  ensureIssuesWorktree(branch: string): Promise<string>;
  enableIssuesBranch(branch: string): Promise<ModeChangeResult>;
  disableIssuesBranch(): Promise<ModeChangeResult>;
  setExternalRepo(repoPath: string): Promise<ModeChangeResult>;
  clearExternalRepo(): Promise<ModeChangeResult>;
  findAgentWorktreesNeedingRebase(): Promise<WorktreeInfo[]>;
}

export function layoutModeOf(config: BraidConfig): LayoutMode {
  if (config.issues_repo !== undefined) return { kind: 'external-repo', path: config.issues_repo };
  if (config.issues_branch !== undefined) return { kind: 'issues-branch', branch: config.issues_branch };
  return { kind: 'git-native' };
}

export function describeMode(mode: LayoutMode): string {
  switch (mode.kind) {
    case 'git-native':
      return 'git-native';
    case 'issues-branch':
      return `issues-branch (${mode.branch})`;
    case 'external-repo':
      return `external-repo (${mode.path})`;
  }
}

function isValidBranchName(branch: string): boolean {
  return branch.length > 0 && !/[\s~^:?*[\\]/.test(branch) && !branch.startsWith('-') && !branch.includes('..');
}

async function listMarkdown(dir: string): Promise<string[]> {
  if (!fs.existsSync(dir)) return [];
  const entries = await fs.promises.readdir(dir);
  return entries.filter(name => name.endsWith('.md')).sort();
}

/**
 * Maps the logical issues directory onto the active layout mode: the local
 * `.braid/issues` (git-native), a shared checkout of a dedicated branch under
 * the git common dir (issues-branch), or another braid repository
 * (external-repo).
 */
@injectable()
export class LayoutService implements ILayoutService {
  private location?: IssuesLocation;
  private logger: ILogger;

  constructor(
    @inject(TYPES.RepoPaths) private paths: RepoPaths,
    @inject(TYPES.IConfigService) private config: IConfigService,
    @inject(TYPES.IGitService) private git: IGitService,
    @inject(TYPES.ILockService) private lock: ILockService,
    @inject(TYPES.ILogger) @optional() logger?: ILogger
  ) {
    this.logger = logger || new ConsoleLogger(LogLevel.INFO);
  }

  async getMode(): Promise<LayoutMode> {
    return layoutModeOf(await this.config.load());
  }

  async resolveLocation(): Promise<IssuesLocation> {
    if (!this.location) {
      this.location = await this.locate(this.paths, await this.config.load(), true);
    }
    return this.location;
  }

  async resolveIssuesDir(): Promise<string> {
    return (await this.resolveLocation()).issuesDir;
  }

  async ensureIssuesWorktree(branch: string): Promise<string> {
    return this.ensureWorktreeFor(this.paths, branch);
  }

  private async locate(paths: RepoPaths, config: BraidConfig, allowExternal: boolean): Promise<IssuesLocation> {
    const mode = layoutModeOf(config);
    switch (mode.kind) {
      case 'git-native':
        return {
          mode,
          issuesDir: localIssuesDir(paths),
          gitRoot: paths.worktreeRoot,
          syncBranch: 'main',
          pushRefspec: 'HEAD:main',
        };
      case 'issues-branch': {
        const worktree = await this.ensureWorktreeFor(paths, mode.branch);
        return {
          mode,
          issuesDir: path.join(worktree, BRAID_DIR, 'issues'),
          gitRoot: worktree,
          syncBranch: mode.branch,
          pushRefspec: mode.branch,
        };
      }
      case 'external-repo': {
        if (!allowExternal) {
          throw BrdError.controlRoot(
            `external repo at ${paths.worktreeRoot} itself points to another repo (${mode.path}); chaining is not supported`
          );
        }
        const external = await this.discoverExternal(paths, mode.path);
        const target = await this.locate(external.paths, external.config, false);
        return { ...target, mode };
      }
    }
  }

  private async discoverExternal(paths: RepoPaths, repoPath: string): Promise<{ paths: RepoPaths; config: BraidConfig }> {
    const resolved = path.resolve(paths.worktreeRoot, repoPath);
    if (!fs.existsSync(resolved)) {
      throw BrdError.controlRoot(`external repo not found: ${repoPath}`);
    }
    const externalPaths = await discoverRepo(resolved);
    const externalConfig = await readConfigFile(configPathFor(externalPaths.worktreeRoot));
    return { paths: externalPaths, config: externalConfig };
  }

  private async ensureWorktreeFor(paths: RepoPaths, branch: string): Promise<string> {
    const worktree = issuesWorktreeDir(paths);
    if (!fs.existsSync(path.join(worktree, '.git'))) {
      if (!(await this.git.branchExists(branch, paths.worktreeRoot))) {
        this.logger.info(`creating branch '${branch}'`);
        await this.git.createBranch(branch, paths.worktreeRoot);
      }
      await fs.promises.mkdir(paths.brdCommonDir, { recursive: true });
      this.logger.info(`creating issues worktree at ${worktree}`);
      await this.git.addWorktree(worktree, branch, paths.worktreeRoot);
    }
    await fs.promises.mkdir(path.join(worktree, BRAID_DIR, 'issues'), { recursive: true });
    return worktree;
  }

  private async requireCleanTree(): Promise<void> {
    if (!(await this.git.isClean(this.paths.worktreeRoot))) {
      throw BrdError.other('working tree has uncommitted changes; commit or stash them first');
    }
  }

  async enableIssuesBranch(branch: string): Promise<ModeChangeResult> {
    if (!isValidBranchName(branch)) {
      throw BrdError.usage(`invalid branch name '${branch}'`);
    }

    const outcome = await this.lock.withLock(async () => {
      const config = await this.config.load();
      if (config.issues_repo !== undefined) {
        throw BrdError.other(
          `external-repo is set to '${config.issues_repo}'; run \`brd config clear-external-repo\` first`
        );
      }
      if (config.issues_branch === branch) {
        return { changed: false, moved: 0 };
      }
      if (config.issues_branch !== undefined) {
        throw BrdError.other(
          `issues-branch is already set to '${config.issues_branch}'; run \`brd config clear-issues-branch\` first`
        );
      }
      await this.requireCleanTree();

      const worktree = await this.ensureIssuesWorktree(branch);
      if (!(await this.git.isClean(worktree))) {
        throw BrdError.other(`issues worktree at ${worktree} has uncommitted changes`);
      }

      const source = localIssuesDir(this.paths);
      const target = path.join(worktree, BRAID_DIR, 'issues');
      const files = await listMarkdown(source);
      for (const file of files) {
        await fs.promises.copyFile(path.join(source, file), path.join(target, file));
        await fs.promises.unlink(path.join(source, file));
      }

      await this.config.save({ ...config, issues_branch: branch });
      this.location = undefined;

      await this.git.add(BRAID_DIR, this.paths.worktreeRoot);
      await this.git.commit(`chore(braid): set issues-branch to '${branch}'`, this.paths.worktreeRoot);
      if (files.length > 0) {
        await this.git.add(BRAID_DIR, worktree);
        await this.git.commit('chore(braid): initial issues', worktree);
      }
      return { changed: true, moved: files.length };
    });

    const mode: LayoutMode = { kind: 'issues-branch', branch };
    if (!outcome.changed) {
      this.logger.info(`issues-branch already set to '${branch}'`);
      return { mode, moved: 0, staleWorktrees: [] };
    }
    return { mode, moved: outcome.moved, staleWorktrees: await this.warnStaleWorktrees() };
  }

  async disableIssuesBranch(): Promise<ModeChangeResult> {
    const moved = await this.lock.withLock(async () => {
      const config = await this.config.load();
      const branch = config.issues_branch;
      if (branch === undefined) {
        throw BrdError.other('issues-branch is not set');
      }
      await this.requireCleanTree();

      const worktree = issuesWorktreeDir(this.paths);
      if (fs.existsSync(worktree) && !(await this.git.isClean(worktree))) {
        throw BrdError.other(`issues worktree at ${worktree} has uncommitted changes; commit or discard them first`);
      }

      const source = path.join(worktree, BRAID_DIR, 'issues');
      const target = localIssuesDir(this.paths);
      await fs.promises.mkdir(target, { recursive: true });
      const files = await listMarkdown(source);
      for (const file of files) {
        await fs.promises.copyFile(path.join(source, file), path.join(target, file));
      }

      const { issues_branch: _cleared, ...rest } = config;
      await this.config.save(rest);
      this.location = undefined;

      await this.git.add(BRAID_DIR, this.paths.worktreeRoot);
      await this.git.commit(`chore(braid): clear issues-branch (was '${branch}')`, this.paths.worktreeRoot);
      if (fs.existsSync(worktree)) {
        this.logger.info(`the issues worktree at ${worktree} was left in place; remove it with \`git worktree remove\``);
      }
      return files.length;
    });

    return { mode: { kind: 'git-native' }, moved, staleWorktrees: await this.warnStaleWorktrees() };
  }

  async setExternalRepo(repoPath: string): Promise<ModeChangeResult> {
    await this.lock.withLock(async () => {
      const config = await this.config.load();
      if (config.issues_branch !== undefined) {
        throw BrdError.other(
          `issues-branch is set to '${config.issues_branch}'; run \`brd config clear-issues-branch\` first`
        );
      }
      const external = await this.discoverExternal(this.paths, repoPath);
      if (external.paths.worktreeRoot === this.paths.worktreeRoot) {
        throw BrdError.usage('external repo cannot be this repository');
      }
      if (external.config.issues_repo !== undefined) {
        throw BrdError.controlRoot(
          `external repo at ${external.paths.worktreeRoot} itself points to another repo (${external.config.issues_repo})`
        );
      }
      await this.requireCleanTree();

      await this.config.save({ ...config, issues_repo: repoPath });
      this.location = undefined;

      await this.git.add(path.join(BRAID_DIR, 'config.toml'), this.paths.worktreeRoot);
      await this.git.commit(`chore(braid): set external-repo to '${repoPath}'`, this.paths.worktreeRoot);
    });

    return { mode: { kind: 'external-repo', path: repoPath }, moved: 0, staleWorktrees: await this.warnStaleWorktrees() };
  }

  async clearExternalRepo(): Promise<ModeChangeResult> {
    await this.lock.withLock(async () => {
      const config = await this.config.load();
      const previous = config.issues_repo;
      if (previous === undefined) {
        throw BrdError.other('external-repo is not set');
      }
      await this.requireCleanTree();

      const { issues_repo: _cleared, ...rest } = config;
      await this.config.save(rest);
      this.location = undefined;

      await this.git.add(path.join(BRAID_DIR, 'config.toml'), this.paths.worktreeRoot);
      await this.git.commit(`chore(braid): clear external-repo (was '${previous}')`, this.paths.worktreeRoot);
    });

    return { mode: { kind: 'git-native' }, moved: 0, staleWorktrees: await this.warnStaleWorktrees() };
  }

  /**
   * Sibling worktrees with an agent identity that are behind main.
   */
  async findAgentWorktreesNeedingRebase(): Promise<WorktreeInfo[]> {
    const worktrees = await this.git.listWorktrees(this.paths.worktreeRoot);
    const self = path.resolve(this.paths.worktreeRoot);
    const stale: WorktreeInfo[] = [];
    for (const worktree of worktrees) {
      if (path.resolve(worktree.path) === self) continue;
      if (!fs.existsSync(path.join(worktree.path, BRAID_DIR, 'agent.toml'))) continue;
      try {
        if ((await this.git.commitsBehind('main', worktree.path)) > 0) {
          stale.push(worktree);
        }
      } catch (error) {
        this.logger.debug(`could not compare ${worktree.path} with main:`, error);
      }
    }
    return stale;
  }

  private async warnStaleWorktrees(): Promise<WorktreeInfo[]> {
    const stale = await this.findAgentWorktreesNeedingRebase();
    if (stale.length > 0) {
      this.logger.warn(`${stale.length} agent worktree(s) are behind main:`);
      for (const worktree of stale) {
        this.logger.warn(`  ${worktree.path}${worktree.branch ? ` (${worktree.branch})` : ''}`);
      }
      this.logger.warn('Run `git rebase main` in each worktree to pick up the new config.');
    }
    return stale;
  }
}
