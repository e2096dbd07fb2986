import { injectable, inject, optional } from 'inversify';
import * as fs from 'fs';
import * as path from 'path';
import { RepoPaths } from './types';
import { BrdError } from './errors';
import { ILogger, ConsoleLogger, LogLevel } from './logger';
import { IGitService, StagedChange } from './git';
import { ILayoutService } from './layout';
import { ILockService } from './lock';
import { BRAID_DIR } from './config';
import { TYPES } from './tokens';

export const MAX_PUSH_RETRIES = 2;
export const SYNC_COMMIT_MESSAGE = 'chore(braid): sync issues';
export const SYNC_STASH_MESSAGE = 'brd sync: stashing local changes';

export interface SyncReport {
  committed: boolean;
  pushed: boolean;
}

export interface BranchSyncReport {
  branch: string;
  issues_worktree: string;
  stashed: boolean;
  rebased: boolean;
  committed: boolean;
  pushed: boolean;
}

export interface BraidCommitReport {
  committed: boolean;
  message?: string;
}

export interface ISyncService {
  /** Fetches and rebases the issues checkout; false when skipped. */
  pull(): Promise<boolean>;
  /** Stages `.braid`, commits `chore(braid): <action> <id> (<agent>)` and optionally pushes. */
  commitChange(action: string, issueId: string, push: boolean): Promise<SyncReport>;
  /**
   * Brings the shared issues worktree up to date with `origin/<issues_branch>`
   * and commits whatever is left. Pushes when the branch has an upstream or
   * `push` is set.
   */
  syncIssuesBranch(push?: boolean): Promise<BranchSyncReport>;
  /** Commits this worktree's `.braid` changes, and nothing else that is staged. */
  commitBraid(message?: string): Promise<BraidCommitReport>;
}

export function commitMessage(action: string, issueId: string, agentId: string): string {
  return `chore(braid): ${action} ${issueId} (${agentId})`;
}

const ISSUE_FILE = /^\.braid\/issues\/(.+)\.md$/;

/**
 * Summarizes staged `.braid` changes, naming the issues when there are at
 * most three.
 */
export function generateCommitMessage(changes: StagedChange[]): string {
  const counts: Record<'add' | 'update' | 'remove', number> = { add: 0, update: 0, remove: 0 };
  const ids: string[] = [];
  for (const change of changes) {
    const id = ISSUE_FILE.exec(change.path)?.[1];
    if (id) ids.push(id);
    if (change.status === 'A') counts.add++;
    else if (change.status === 'M') counts.update++;
    else if (change.status === 'D') counts.remove++;
  }

  const parts = Object.entries(counts)
    .filter(([, count]) => count > 0)
    .map(([verb, count]) => `${verb} ${count}`);
  if (parts.length === 0) return 'chore(braid): update issues';

  const action = parts.join(', ');
  if (ids.length === 1) return `chore(braid): ${action} issue (${ids[0]})`;
  if (ids.length > 1 && ids.length <= 3) return `chore(braid): ${action} issues (${ids.join(', ')})`;
  return `chore(braid): ${action} issues`;
}

/**
 * Moves issue changes through git for whichever checkout the active layout
 * mode stores them in.
 */
@injectable()
export class SyncService implements ISyncService {
  private logger: ILogger;

  constructor(
    @inject(TYPES.RepoPaths) private paths: RepoPaths,
    @inject(TYPES.ILayoutService) private layout: ILayoutService,
    @inject(TYPES.IGitService) private git: IGitService,
    @inject(TYPES.ILockService) private lock: ILockService,
    @inject(TYPES.AgentId) private agentId: string,
    @inject(TYPES.ILogger) @optional() logger?: ILogger
  ) {
    this.logger = logger || new ConsoleLogger(LogLevel.INFO);
  }

  async pull(): Promise<boolean> {
    const location = await this.layout.resolveLocation();
    const cwd = location.gitRoot;
    if (!(await this.git.hasRemote('origin', cwd))) {
      this.logger.debug(`no origin remote in ${cwd}; skipping pull`);
      return false;
    }
    if (!(await this.git.isClean(cwd))) {
      this.logger.warn(`uncommitted changes in ${cwd}; skipping pull`);
      return false;
    }

    await this.git.fetch('origin', location.syncBranch, cwd);
    if (await this.git.hasRemoteBranch('origin', location.syncBranch, cwd)) {
      await this.rebaseOnto(location.syncBranch, cwd);
    }
    return true;
  }

  async commitChange(action: string, issueId: string, push: boolean): Promise<SyncReport> {
    const location = await this.layout.resolveLocation();
    const cwd = location.gitRoot;

    await this.git.add(BRAID_DIR, cwd);
    const committed = await this.git.commit(commitMessage(action, issueId, this.agentId), cwd);
    if (!committed) {
      this.logger.info('(no changes to commit)');
    }
    if (!push) {
      return { committed, pushed: false };
    }
    if (!(await this.git.hasRemote('origin', cwd))) {
      this.logger.info('(no origin remote, skipping push)');
      return { committed, pushed: false };
    }

    for (let attempt = 0; attempt <= MAX_PUSH_RETRIES; attempt++) {
      try {
        await this.git.push('origin', location.pushRefspec, cwd);
        return { committed, pushed: true };
      } catch (error) {
        if (attempt === MAX_PUSH_RETRIES) {
          throw new BrdError(
            'error',
            `push failed after ${MAX_PUSH_RETRIES} retries; another agent may have pushed. ` +
              `Run \`git pull --rebase origin ${location.syncBranch}\` and check whether ${issueId} is still available`,
            {},
            { cause: error }
          );
        }
        this.logger.warn(`push rejected, rebasing and retrying (${attempt + 1}/${MAX_PUSH_RETRIES})...`);
        await this.git.fetch('origin', location.syncBranch, cwd);
        await this.rebaseOnto(location.syncBranch, cwd);
      }
    }
    return { committed, pushed: false };
  }

  async syncIssuesBranch(push: boolean = false): Promise<BranchSyncReport> {
    const mode = await this.layout.getMode();
    if (mode.kind !== 'issues-branch') {
      throw BrdError.other('not in issues-branch mode; run `brd config issues-branch <name>` to enable');
    }
    const branch = mode.branch;
    const worktree = await this.layout.ensureIssuesWorktree(branch);

    return this.lock.withLock(async () => {
      const upstream = await this.git.hasUpstream(branch, worktree);
      const shouldPush = upstream || push;
      this.logger.info(
        shouldPush ? `syncing issues with origin/${branch}...` : `syncing issues locally on '${branch}'...`
      );

      let stashed = false;
      if (!(await this.git.isClean(worktree))) {
        this.logger.info('stashing local changes...');
        stashed = await this.git.stashPush(SYNC_STASH_MESSAGE, worktree);
      }

      let rebased = false;
      if (upstream) {
        await this.git.fetch('origin', branch, worktree);
        if (await this.git.hasRemoteBranch('origin', branch, worktree)) {
          try {
            await this.rebaseOnto(branch, worktree);
            rebased = true;
          } catch (error) {
            if (stashed) {
              await this.git.stashPop(worktree).catch(popError => {
                this.logger.warn(`failed to restore stashed changes in ${worktree}:`, popError);
              });
            }
            throw error;
          }
        }
      }

      if (stashed) {
        try {
          await this.git.stashPop(worktree);
        } catch (error) {
          throw new BrdError('error', `failed to restore local changes from stash in ${worktree}`, {}, { cause: error });
        }
      }

      let committed = false;
      if (!(await this.git.isClean(worktree))) {
        await this.git.add(BRAID_DIR, worktree);
        committed = await this.git.commit(SYNC_COMMIT_MESSAGE, worktree);
      }

      if (shouldPush) {
        await this.pushBranch(branch, worktree);
      }
      return { branch, issues_worktree: worktree, stashed, rebased, committed, pushed: shouldPush };
    });
  }

  async commitBraid(message?: string): Promise<BraidCommitReport> {
    const cwd = this.paths.worktreeRoot;
    if (!fs.existsSync(path.join(cwd, BRAID_DIR))) {
      throw BrdError.notInitialized();
    }

    return this.lock.withLock(async () => {
      await this.git.add(BRAID_DIR, cwd);
      const changes = await this.git.stagedChanges(BRAID_DIR, cwd);
      if (changes.length === 0) {
        return { committed: false };
      }
      const text = message ?? generateCommitMessage(changes);
      this.logger.debug(`committing with message: ${text}`);
      const committed = await this.git.commit(text, cwd, BRAID_DIR);
      return committed ? { committed, message: text } : { committed };
    });
  }

  // a first push of a new branch needs --set-upstream
  private async pushBranch(branch: string, cwd: string): Promise<void> {
    try {
      await this.git.push('origin', branch, cwd);
    } catch (error) {
      this.logger.debug(`push to origin/${branch} failed, retrying with --set-upstream:`, error);
      try {
        await this.git.push('origin', branch, cwd, { setUpstream: true });
      } catch (retryError) {
        throw new BrdError(
          'error',
          `failed to push to origin/${branch}; you may need to pull and retry`,
          {},
          { cause: retryError }
        );
      }
    }
  }

  private async rebaseOnto(branch: string, cwd: string): Promise<void> {
    try {
      await this.git.rebase(`origin/${branch}`, cwd);
    } catch (error) {
      throw new BrdError('error', `rebase onto origin/${branch} failed in ${cwd}; resolve manually`, {}, { cause: error });
    }
  }
}
