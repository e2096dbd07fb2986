export type Priority = 'P0' | 'P1' | 'P2' | 'P3';

export type IssueStatus = 'open' | 'doing' | 'done' | 'skip';

export type IssueType = 'design' | 'meta';

export interface Issue {
  schema_version: number;
  id: string;
  title: string;
  priority: Priority;
  status: IssueStatus;
  issue_type?: IssueType;
  deps: string[];
  owner?: string;
  tags: string[];
  created_at: string;
  started_at?: string;
  completed_at?: string;
  scheduled_for?: string;
  acceptance: string[];
  body: string;
}

// computed, never persisted
export interface DerivedState {
  is_ready: boolean;
  open_deps: string[];
  missing_deps: string[];
  is_blocked: boolean;
}

export interface IssueView extends Issue {
  derived: DerivedState;
}

export interface BraidConfig {
  schema_version: number;
  id_prefix: string;
  id_len: number;
  issues_branch?: string;
  issues_repo?: string;
  auto_pull: boolean;
  auto_push: boolean;
}

export interface RepoPaths {
  /** The enclosing checkout. */
  worktreeRoot: string;
  /** The `.git` directory shared by every sibling worktree. */
  gitCommonDir: string;
  /** `<gitCommonDir>/brd`: lock file and the issues-branch worktree. */
  brdCommonDir: string;
}

export type LayoutMode =
  | { kind: 'git-native' }
  | { kind: 'issues-branch'; branch: string }
  | { kind: 'external-repo'; path: string };

export interface IssueLoadFailure {
  file: string;
  message: string;
}

export interface IssueLoadResult {
  issues: Map<string, Issue>;
  failures: IssueLoadFailure[];
}
