import * as fs from 'fs';
import * as path from 'path';
import simpleGit from 'simple-git';
import { RepoPaths } from './types';
import { BrdError } from './errors';
import { BRAID_DIR } from './config';

/**
 * Finds the enclosing checkout and the shared git directory. Sibling
 * worktrees resolve to the same `gitCommonDir`, so they share one lock.
 */
export async function discoverRepo(startDir: string = process.cwd()): Promise<RepoPaths> {
  const dir = path.resolve(startDir);
  if (!fs.existsSync(dir)) {
    throw BrdError.notGitRepo(dir);
  }

  let topLevel: string;
  let commonDir: string;
  try {
    const git = simpleGit(dir);
    topLevel = (await git.revparse(['--show-toplevel'])).trim();
    commonDir = (await git.revparse(['--git-common-dir'])).trim();
  } catch (error) {
    throw BrdError.notGitRepo(dir, error);
  }
  if (!topLevel || !commonDir) {
    throw BrdError.notGitRepo(dir);
  }

  // --git-common-dir is relative to the directory git ran in
  const gitCommonDir = path.resolve(dir, commonDir);
  return {
    worktreeRoot: path.resolve(topLevel),
    gitCommonDir,
    brdCommonDir: path.join(gitCommonDir, 'brd'),
  };
}

export function braidDir(paths: RepoPaths): string {
  return path.join(paths.worktreeRoot, BRAID_DIR);
}

export function localIssuesDir(paths: RepoPaths): string {
  return path.join(paths.worktreeRoot, BRAID_DIR, 'issues');
}

export function agentTomlPath(paths: RepoPaths): string {
  return path.join(paths.worktreeRoot, BRAID_DIR, 'agent.toml');
}

export function lockPath(paths: RepoPaths): string {
  return path.join(paths.brdCommonDir, 'lock');
}

/** Shared checkout of the issues branch (issues-branch mode). */
export function issuesWorktreeDir(paths: RepoPaths): string {
  return path.join(paths.brdCommonDir, 'issues');
}
