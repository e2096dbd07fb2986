import { injectable, inject, optional } from 'inversify';
import * as fs from 'fs';
import * as path from 'path';
import { BraidConfig, Issue, RepoPaths } from './types';
import { ExitCode, toBrdError } from './errors';
import { ILogger, ConsoleLogger, LogLevel } from './logger';
import { IConfigService, BRAID_DIR } from './config';
import { ILayoutService, IssuesLocation } from './layout';
import { IStorageService } from './storage';
import { IGraphService } from './graph';
import { CURRENT_SCHEMA } from './migration';
import { isStaleTempFile } from './atomic';
import { checkStateInvariants } from './utils';
import { braidDir, issuesWorktreeDir } from './repo';
import { TYPES } from './tokens';

export interface DoctorCheck {
  name: string;
  description: string;
  passed: boolean;
}

export type DoctorProblem =
  | { code: 'missing_dep'; issue: string; dep: string }
  | { code: 'cycle'; cycle: string[] }
  | { code: 'parse_error'; file: string; message: string }
  | { code: 'invalid_state'; issue: string; message: string }
  | { code: 'schema_outdated'; file: string; version: number }
  | { code: 'stale_temp_file'; file: string }
  | { code: 'control_root_invalid'; message: string };

export interface DoctorReport {
  ok: boolean;
  checks: DoctorCheck[];
  errors: DoctorProblem[];
  warnings: DoctorProblem[];
}

export interface IDoctorService {
  run(): Promise<DoctorReport>;
}

/**
 * 0 when clean, the graph code when a cycle was found, generic failure for
 * any other error.
 */
export function doctorExitCode(report: DoctorReport): ExitCode {
  if (report.errors.length === 0) return ExitCode.SUCCESS;
  return report.errors.some(problem => problem.code === 'cycle') ? ExitCode.INVALID_GRAPH : ExitCode.FAILURE;
}

/**
 * Each cycle once, rotated to start at its smallest id.
 */
export function uniqueCycles(cycles: string[][]): string[][] {
  const seen = new Set<string>();
  const unique: string[][] = [];
  for (const cycle of cycles) {
    const ring = cycle.slice(0, -1);
    if (ring.length === 0) continue;
    const start = ring.indexOf([...ring].sort()[0]);
    const rotated = [...ring.slice(start), ...ring.slice(0, start)];
    const key = rotated.join('\u0000');
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push([...rotated, rotated[0]]);
  }
  return unique;
}

async function staleTempFiles(dir: string): Promise<string[]> {
  if (!fs.existsSync(dir)) return [];
  const entries = await fs.promises.readdir(dir);
  return entries.filter(isStaleTempFile).sort().map(name => path.join(dir, name));
}

/**
 * Read-only consistency report over the control root and the issue store.
 */
@injectable()
export class DoctorService implements IDoctorService {
  private logger: ILogger;

  constructor(
    @inject(TYPES.RepoPaths) private paths: RepoPaths,
    @inject(TYPES.IConfigService) private config: IConfigService,
    @inject(TYPES.ILayoutService) private layout: ILayoutService,
    @inject(TYPES.IStorageService) private storage: IStorageService,
    @inject(TYPES.IGraphService) private graph: IGraphService,
    @inject(TYPES.ILogger) @optional() logger?: ILogger
  ) {
    this.logger = logger || new ConsoleLogger(LogLevel.INFO);
  }

  async run(): Promise<DoctorReport> {
    const checks: DoctorCheck[] = [];
    const errors: DoctorProblem[] = [];
    const warnings: DoctorProblem[] = [];
    const finish = (): DoctorReport => ({ ok: errors.length === 0, checks, errors, warnings });

    const hasBraidDir = fs.existsSync(braidDir(this.paths));
    checks.push({ name: 'braid_dir', description: `${BRAID_DIR} directory exists`, passed: hasBraidDir });
    if (!hasBraidDir) {
      errors.push({ code: 'control_root_invalid', message: `${BRAID_DIR} not found (run \`brd init\`)` });
      return finish();
    }

    let config: BraidConfig;
    try {
      config = await this.config.load();
      checks.push({ name: 'config_valid', description: 'config.toml parses and validates', passed: true });
    } catch (error) {
      checks.push({ name: 'config_valid', description: 'config.toml parses and validates', passed: false });
      errors.push({ code: 'control_root_invalid', message: toBrdError(error).message });
      return finish();
    }

    if (config.issues_branch !== undefined) {
      const present = fs.existsSync(path.join(issuesWorktreeDir(this.paths), '.git'));
      checks.push({
        name: 'issues_worktree',
        description: `issues worktree for '${config.issues_branch}' exists`,
        passed: present,
      });
      if (!present) this.logger.info('issues worktree is missing; it will be recreated');
    }

    let location: IssuesLocation;
    try {
      location = await this.layout.resolveLocation();
      if (config.issues_repo !== undefined) {
        checks.push({
          name: 'external_repo',
          description: `external repo '${config.issues_repo}' is a supported braid repo`,
          passed: true,
        });
      }
    } catch (error) {
      const name = config.issues_repo !== undefined ? 'external_repo' : 'issues_location';
      checks.push({ name, description: 'issues directory can be resolved', passed: false });
      errors.push({ code: 'control_root_invalid', message: toBrdError(error).message });
      return finish();
    }

    const { issues, failures } = await this.storage.loadAll();
    checks.push({ name: 'issues_parse', description: 'all issue files parse', passed: failures.length === 0 });
    for (const failure of failures) {
      warnings.push({ code: 'parse_error', file: failure.file, message: failure.message });
    }

    const { versions } = await this.storage.scanVersions();
    const outdated = versions.filter(v => v.version < CURRENT_SCHEMA);
    checks.push({
      name: 'schema_current',
      description: `issue files are at schema v${CURRENT_SCHEMA}${outdated.length > 0 ? ' (run `brd migrate`)' : ''}`,
      passed: outdated.length === 0,
    });
    for (const file of outdated) {
      warnings.push({ code: 'schema_outdated', file: file.file, version: file.version });
    }

    this.checkStates(issues, checks, errors);

    const temps = [
      ...(await staleTempFiles(braidDir(this.paths))),
      ...(await staleTempFiles(location.issuesDir)),
    ];
    checks.push({ name: 'temp_files', description: 'no leftovers from interrupted writes', passed: temps.length === 0 });
    for (const file of temps) {
      warnings.push({ code: 'stale_temp_file', file });
    }

    this.checkGraph(issues, checks, errors);
    return finish();
  }

  private checkStates(issues: Map<string, Issue>, checks: DoctorCheck[], errors: DoctorProblem[]): void {
    let passed = true;
    for (const issue of issues.values()) {
      for (const message of checkStateInvariants(issue)) {
        passed = false;
        errors.push({ code: 'invalid_state', issue: issue.id, message });
      }
    }
    checks.push({ name: 'state_invariants', description: 'doing/done/skip issues carry owner and timestamps', passed });
  }

  private checkGraph(issues: Map<string, Issue>, checks: DoctorCheck[], errors: DoctorProblem[]): void {
    const missing: DoctorProblem[] = [];
    for (const issue of [...issues.values()].sort((a, b) => a.id.localeCompare(b.id))) {
      for (const dep of this.graph.computeDerived(issue, issues).missing_deps) {
        missing.push({ code: 'missing_dep', issue: issue.id, dep });
      }
    }
    checks.push({ name: 'missing_deps', description: 'every dep refers to an existing issue', passed: missing.length === 0 });
    errors.push(...missing);

    const cycles = uniqueCycles(this.graph.findCycles(issues));
    checks.push({ name: 'cycles', description: 'dependency graph is acyclic', passed: cycles.length === 0 });
    errors.push(...cycles.map((cycle): DoctorProblem => ({ code: 'cycle', cycle })));
  }
}
