import {
  BraidConfig,
  DoctorProblem,
  DoctorReport,
  IssueView,
  LayoutMode,
  MigrationReport,
  ShowResult,
  StatusSummary,
  describeMode,
} from '@brd/core';

export function toJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

function marker(issue: IssueView): string {
  if (issue.derived.is_ready) return 'ready';
  if (issue.derived.is_blocked) return 'blocked';
  return issue.status;
}

/**
 * One line per issue: id, priority, state, owner when doing, title.
 */
export function formatIssueLine(issue: IssueView): string {
  const type = issue.issue_type ? ` [${issue.issue_type}]` : '';
  const owner = issue.status === 'doing' && issue.owner ? ` @${issue.owner}` : '';
  return `${issue.id}  ${issue.priority}  ${marker(issue).padEnd(7)}  ${issue.title}${type}${owner}`;
}

export function formatIssueList(issues: IssueView[], empty: string = 'no issues'): string {
  if (issues.length === 0) return empty;
  return issues.map(formatIssueLine).join('\n');
}

export function formatIssueDetail({ issue, dependents }: ShowResult): string {
  const lines = [
    `${issue.id}: ${issue.title}`,
    `  status:    ${issue.status}${issue.owner ? ` (${issue.owner})` : ''}`,
    `  priority:  ${issue.priority}`,
  ];
  if (issue.issue_type) lines.push(`  type:      ${issue.issue_type}`);
  if (issue.tags.length > 0) lines.push(`  tags:      ${issue.tags.join(', ')}`);
  lines.push(`  created:   ${issue.created_at}`);
  if (issue.started_at) lines.push(`  started:   ${issue.started_at}`);
  if (issue.completed_at) lines.push(`  completed: ${issue.completed_at}`);
  if (issue.scheduled_for) lines.push(`  scheduled: ${issue.scheduled_for}`);

  if (issue.deps.length > 0) {
    const annotate = (dep: string): string => {
      if (issue.derived.missing_deps.includes(dep)) return `${dep} (missing)`;
      if (issue.derived.open_deps.includes(dep)) return `${dep} (open)`;
      return `${dep} (done)`;
    };
    lines.push(`  deps:      ${issue.deps.map(annotate).join(', ')}`);
  }
  if (dependents.length > 0) lines.push(`  blocks:    ${dependents.join(', ')}`);
  lines.push(`  ready:     ${issue.derived.is_ready ? 'yes' : 'no'}`);

  if (issue.acceptance.length > 0) {
    lines.push('', 'Acceptance:');
    for (const criterion of issue.acceptance) lines.push(`  - ${criterion}`);
  }
  const body = issue.body.trimEnd();
  if (body) lines.push('', body);
  return lines.join('\n');
}

export function formatStatus(summary: StatusSummary): string {
  const { by_status: counts } = summary;
  const lines = [
    `${summary.total} issues: ${counts.open} open, ${counts.doing} doing, ${counts.done} done, ${counts.skip} skip`,
    `${summary.ready} ready, ${summary.blocked} blocked`,
  ];
  if (summary.doing.length > 0) {
    lines.push('in progress:');
    for (const entry of summary.doing) {
      lines.push(`  ${entry.id}  ${entry.owner ?? '(no owner)'}`);
    }
  }
  return lines.join('\n');
}

function describeProblem(problem: DoctorProblem): string {
  switch (problem.code) {
    case 'missing_dep':
      return `${problem.issue} depends on missing issue ${problem.dep}`;
    case 'cycle':
      return `dependency cycle: ${problem.cycle.join(' -> ')}`;
    case 'parse_error':
      return `${problem.file}: ${problem.message}`;
    case 'invalid_state':
      return problem.message;
    case 'schema_outdated':
      return `${problem.file} is at schema v${problem.version} (run \`brd migrate\`)`;
    case 'stale_temp_file':
      return `leftover temp file ${problem.file}`;
    case 'control_root_invalid':
      return problem.message;
  }
}

export function formatDoctor(report: DoctorReport): string {
  const lines = report.checks.map(check => `${check.passed ? 'ok  ' : 'FAIL'}  ${check.name}: ${check.description}`);
  for (const warning of report.warnings) lines.push(`warning: ${describeProblem(warning)}`);
  for (const error of report.errors) lines.push(`error: ${describeProblem(error)}`);
  lines.push(report.ok ? 'no problems found' : `${report.errors.length} problem(s) found`);
  return lines.join('\n');
}

export function formatMigration(report: MigrationReport): string {
  if (report.files.length === 0) {
    return `all issues are at schema v${report.schema_version}`;
  }
  const verb = report.dry_run ? 'would migrate' : 'migrated';
  const lines = [`${verb} ${report.files.length} issue(s) to schema v${report.schema_version}:`];
  for (const file of report.files) lines.push(`  ${file.id} (v${file.from})`);
  lines.push('steps:');
  for (const step of report.steps) lines.push(`  ${step}`);
  return lines.join('\n');
}

export function formatConfig(config: BraidConfig, mode: LayoutMode): string {
  const lines = [
    `schema_version = ${config.schema_version}`,
    `id_prefix      = ${config.id_prefix}`,
    `id_len         = ${config.id_len}`,
  ];
  if (config.issues_branch !== undefined) lines.push(`issues_branch  = ${config.issues_branch}`);
  if (config.issues_repo !== undefined) lines.push(`issues_repo    = ${config.issues_repo}`);
  lines.push(`auto_pull      = ${config.auto_pull}`, `auto_push      = ${config.auto_push}`, `mode: ${describeMode(mode)}`);
  return lines.join('\n');
}
