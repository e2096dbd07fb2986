#!/usr/bin/env node

import 'reflect-metadata';
import { Command, CommanderError } from 'commander';
import * as path from 'path';
import {
  BrdError,
  ConsoleLogger,
  ExitCode,
  IConfigService,
  IDoctorService,
  ILayoutService,
  ISyncService,
  ITrackerService,
  InitOptions,
  InitResult,
  IssueView,
  ListFilter,
  LogLevel,
  RepoPaths,
  TYPES,
  createContainer,
  describeMode,
  discoverRepo,
  doctorExitCode,
  initRepo,
  parseIdLen,
  parseIssueStatus,
  parseIssueType,
  parseLogLevel,
  parsePriority,
  toBrdError,
} from '@brd/core';
import {
  formatConfig,
  formatDoctor,
  formatIssueDetail,
  formatIssueLine,
  formatIssueList,
  formatMigration,
  formatStatus,
  toJson,
} from './output';

export const VERSION = '0.1.0';

/**
 * Services of one repository, created on first use so that commands only
 * build what they touch.
 */
export interface CliServices {
  paths: RepoPaths;
  tracker(): ITrackerService;
  doctor(): IDoctorService;
  layout(): ILayoutService;
  config(): IConfigService;
  sync(): ISyncService;
  init(options: InitOptions): Promise<InitResult>;
}

export interface CliDeps {
  open(dir: string, logger: ConsoleLogger): Promise<CliServices>;
  stdout(text: string): void;
  stderr(text: string): void;
  env: NodeJS.ProcessEnv;
  cwd: string;
}

interface GlobalOptions {
  json?: boolean;
  repo?: string;
  verbose?: boolean;
  quiet?: boolean;
}

interface AddCommandOptions {
  priority?: string;
  type?: string;
  dep: string[];
  tag: string[];
  ac: string[];
  body?: string;
  scheduledFor?: string;
}

interface ListCommandOptions {
  status?: string;
  priority?: string;
  tag?: string;
  type?: string;
  owner?: string;
  ready?: boolean;
  blocked?: boolean;
  all?: boolean;
}

interface StartCommandOptions {
  force?: boolean;
  sync: boolean;
  push: boolean;
}

interface DoneCommandOptions {
  force?: boolean;
  result: string[];
  push: boolean;
}

const collect = (value: string, previous: string[]): string[] => [...previous, value];

export function defaultDeps(): CliDeps {
  return {
    async open(dir, logger) {
      const paths = await discoverRepo(dir);
      const container = createContainer(paths, { logger });
      return {
        paths,
        tracker: () => container.get<ITrackerService>(TYPES.ITrackerService),
        doctor: () => container.get<IDoctorService>(TYPES.IDoctorService),
        layout: () => container.get<ILayoutService>(TYPES.ILayoutService),
        config: () => container.get<IConfigService>(TYPES.IConfigService),
        sync: () => container.get<ISyncService>(TYPES.ISyncService),
        init: options => initRepo(paths, options, logger),
      };
    },
    stdout: text => process.stdout.write(`${text}\n`),
    stderr: text => process.stderr.write(`${text}\n`),
    env: process.env,
    cwd: process.cwd(),
  };
}

function parseOnOff(value: string): boolean {
  switch (value.toLowerCase()) {
    case 'on':
    case 'true':
      return true;
    case 'off':
    case 'false':
      return false;
    default:
      throw BrdError.usage(`expected 'on' or 'off', got '${value}'`);
  }
}

export function buildListFilter(options: ListCommandOptions): ListFilter {
  return {
    status: options.status ? options.status.split(',').map(s => parseIssueStatus(s.trim())) : undefined,
    priority: options.priority ? parsePriority(options.priority) : undefined,
    tag: options.tag,
    type: options.type ? parseIssueType(options.type) : undefined,
    owner: options.owner,
    ready: options.ready,
    blocked: options.blocked,
    all: options.all,
  };
}

/**
 * Builds the `brd` program. `state.exitCode` carries a non-error exit
 * status out of an action (doctor findings).
 */
export function createProgram(deps: CliDeps, logger: ConsoleLogger, state: { exitCode: number }): Command {
  const program = new Command();
  const globals = (): GlobalOptions => program.opts<GlobalOptions>();

  let services: CliServices | undefined;
  const open = async (): Promise<CliServices> => {
    if (!services) {
      const dir = path.resolve(deps.cwd, globals().repo ?? '.');
      services = await deps.open(dir, logger);
    }
    return services;
  };

  // JSON mode prints `{ ok: true, ...payload }`; human mode prints the text
  const emit = (payload: Record<string, unknown>, human: () => string): void => {
    deps.stdout(globals().json ? toJson({ ok: true, ...payload }) : human());
  };

  program
    .name('brd')
    .description('Repo-local, file-backed issue tracker for agents sharing a git repository')
    .version(VERSION)
    .option('--json', 'emit machine-readable JSON')
    .option('--repo <dir>', 'run as if started in <dir>')
    .option('-v, --verbose', 'log debug output')
    .option('-q, --quiet', 'log errors only')
    .configureOutput({
      writeOut: text => deps.stdout(text.trimEnd()),
      writeErr: text => deps.stderr(text.trimEnd()),
    })
    .exitOverride()
    .hook('preAction', () => {
      const options = globals();
      let level = LogLevel.INFO;
      if (options.verbose) level = LogLevel.DEBUG;
      if (options.quiet) level = LogLevel.ERROR;
      logger.setLevel(parseLogLevel(deps.env.BRD_LOG_LEVEL) ?? level);
    });

  program
    .command('init')
    .description('Initialize braid in this repository')
    .option('--prefix <prefix>', 'issue id prefix (default: derived from the directory name)')
    .option('--id-len <n>', 'random id suffix length, 4-10')
    .action(async (options: { prefix?: string; idLen?: string }) => {
      const repo = await open();
      const result = await repo.init({
        prefix: options.prefix,
        idLen: options.idLen === undefined ? undefined : parseIdLen(options.idLen),
      });
      emit({ config: result.config, created: result.created }, () =>
        result.created.length === 0
          ? `braid already initialized (prefix '${result.config.id_prefix}')`
          : `initialized braid in ${repo.paths.worktreeRoot} (prefix '${result.config.id_prefix}')`
      );
    });

  program
    .command('add <title>')
    .description('Create an issue')
    .option('-p, --priority <priority>', 'P0-P3', 'P2')
    .option('-t, --type <type>', 'design or meta')
    .option('-d, --dep <id>', 'dependency (repeatable)', collect, [])
    .option('--tag <tag>', 'tag (repeatable)', collect, [])
    .option('--ac <criterion>', 'acceptance criterion (repeatable)', collect, [])
    .option('-b, --body <text>', 'markdown body')
    .option('--scheduled-for <time>', 'do not start before this time')
    .action(async (title: string, options: AddCommandOptions) => {
      const issue = await (await open()).tracker().add({
        title,
        priority: options.priority ? parsePriority(options.priority) : undefined,
        issueType: options.type ? parseIssueType(options.type) : undefined,
        deps: options.dep,
        tags: options.tag,
        acceptance: options.ac,
        body: options.body,
        scheduledFor: options.scheduledFor,
      });
      emit({ issue }, () => `created ${issue.id}: ${issue.title}`);
    });

  program
    .command('ls')
    .alias('list')
    .description('List issues (open and doing unless filtered)')
    .option('-s, --status <status>', 'comma-separated statuses')
    .option('-p, --priority <priority>', 'only this priority')
    .option('--tag <tag>', 'only issues with this tag')
    .option('-t, --type <type>', 'only this issue type')
    .option('--owner <agent>', 'only issues owned by this agent')
    .option('--ready', 'only ready issues')
    .option('--blocked', 'only blocked issues')
    .option('-a, --all', 'include done and skipped issues')
    .action(async (options: ListCommandOptions) => {
      const issues = await (await open()).tracker().list(buildListFilter(options));
      emit({ issues }, () => formatIssueList(issues));
    });

  program
    .command('show <id>')
    .description('Show an issue with its derived state')
    .action(async (id: string) => {
      const result = await (await open()).tracker().show(id);
      emit({ issue: result.issue, dependents: result.dependents }, () => formatIssueDetail(result));
    });

  program
    .command('path <id>')
    .description("Print the absolute path of an issue's file")
    .action(async (id: string) => {
      const result = await (await open()).tracker().path(id);
      emit({ id: result.id, path: result.path }, () => result.path);
    });

  program
    .command('ready')
    .description('List issues ready to start')
    .action(async () => {
      const issues = await (await open()).tracker().ready();
      emit({ issues }, () => formatIssueList(issues, 'no ready issues'));
    });

  program
    .command('next')
    .description('Show the issue `brd start` would pick')
    .action(async () => {
      const issue = await (await open()).tracker().next();
      emit({ issue }, () => (issue ? formatIssueLine(issue) : 'no ready issues'));
    });

  program
    .command('status')
    .description('Summarize the issue store')
    .action(async () => {
      const summary = await (await open()).tracker().summary();
      emit({ summary }, () => formatStatus(summary));
    });

  program
    .command('start [id]')
    .description('Claim an issue (the next ready one when no id is given)')
    .option('-f, --force', 'reassign an issue that is already doing')
    .option('--no-sync', 'do not pull before claiming')
    .option('--no-push', 'do not commit and push the claim')
    .action(async (id: string | undefined, options: StartCommandOptions) => {
      const result = await (await open()).tracker().start({
        id,
        force: options.force,
        sync: options.sync,
        push: options.push,
      });
      emit({ issue: result.issue, also_doing: result.alsoDoing, sync: result.sync }, () =>
        `started ${result.issue.id}: ${result.issue.title}`
      );
    });

  program
    .command('done <id>')
    .description('Complete an issue')
    .option('-f, --force', 'close a design issue without results')
    .option('-r, --result <id>', 'issue produced by this one (repeatable)', collect, [])
    .option('--no-push', 'do not commit and push')
    .action(async (id: string, options: DoneCommandOptions) => {
      const result = await (await open()).tracker().done({
        id,
        force: options.force,
        results: options.result,
        push: options.push,
      });
      emit({ issue: result.issue, results: result.results, updated: result.updated, sync: result.sync }, () => {
        const lines = [`done ${result.issue.id}: ${result.issue.title}`];
        if (result.updated.length > 0) lines.push(`updated deps of ${result.updated.join(', ')}`);
        return lines.join('\n');
      });
    });

  const transition = (name: string, description: string, run: (tracker: ITrackerService, id: string) => Promise<IssueView>): void => {
    program
      .command(`${name} <id>`)
      .description(description)
      .action(async (id: string) => {
        const issue = await run((await open()).tracker(), id);
        emit({ issue }, () => `${issue.id} is now ${issue.status}`);
      });
  };
  transition('skip', 'Close an issue without doing it', (tracker, id) => tracker.skip(id));
  transition('reopen', 'Move an issue back to open', (tracker, id) => tracker.reopen(id));

  program
    .command('set <id> <field> <value>')
    .description('Edit one field: priority, status, type, owner, title or tag (+tag / -tag)')
    .action(async (id: string, field: string, value: string) => {
      const issue = await (await open()).tracker().set(id, field, value);
      emit({ issue }, () => `updated ${issue.id}`);
    });

  program
    .command('rm <id>')
    .description('Delete an issue')
    .option('-f, --force', 'delete even when the issue is doing')
    .action(async (id: string, options: { force?: boolean }) => {
      const result = await (await open()).tracker().remove(id, options.force);
      emit({ id: result.id, dependents: result.dependents }, () => `removed ${result.id}`);
    });

  const dep = program.command('dep').description('Edit dependencies');
  dep
    .command('add <child> <parent>')
    .description('Make <child> depend on <parent>')
    .action(async (child: string, parent: string) => {
      const change = await (await open()).tracker().addDependency(child, parent);
      emit({ ...change }, () =>
        change.changed
          ? `${change.child} now depends on ${change.parent}`
          : `${change.child} already depends on ${change.parent}`
      );
    });
  dep
    .command('rm <child> <parent>')
    .description('Remove the dependency of <child> on <parent>')
    .action(async (child: string, parent: string) => {
      const change = await (await open()).tracker().removeDependency(child, parent);
      emit({ ...change }, () =>
        change.changed
          ? `${change.child} no longer depends on ${change.parent}`
          : `${change.child} did not depend on ${change.parent}`
      );
    });

  program
    .command('sync')
    .description('Sync the shared issues worktree with its remote branch (issues-branch mode)')
    .option('--push', 'push even when the branch has no upstream yet')
    .action(async (options: { push?: boolean }) => {
      const report = await (await open()).sync().syncIssuesBranch(options.push ?? false);
      emit({ ...report }, () =>
        report.pushed ? `synced issues with origin/${report.branch}` : `synced issues on '${report.branch}'`
      );
    });

  program
    .command('commit')
    .description('Commit .braid changes in this worktree')
    .option('-m, --message <message>', 'commit message (default: generated from the changes)')
    .action(async (options: { message?: string }) => {
      const report = await (await open()).sync().commitBraid(options.message);
      emit({ ...report }, () => (report.committed ? `committed: ${report.message ?? ''}` : 'nothing to commit'));
    });

  program
    .command('migrate')
    .description('Rewrite issue files older than the current schema')
    .option('--dry-run', 'list what would change without writing')
    .action(async (options: { dryRun?: boolean }) => {
      const report = await (await open()).tracker().migrate(options.dryRun ?? false);
      emit({ report }, () => formatMigration(report));
    });

  program
    .command('doctor')
    .description('Check the control root and the issue graph')
    .action(async () => {
      const report = await (await open()).doctor().run();
      if (globals().json) {
        deps.stdout(toJson(report));
      } else {
        deps.stdout(formatDoctor(report));
      }
      state.exitCode = doctorExitCode(report);
    });

  const config = program.command('config').description('Show or change the repository config');
  config
    .command('show', { isDefault: true })
    .description('Print the config and the active layout mode')
    .action(async () => {
      const repo = await open();
      const current = await repo.config().load();
      const mode = await repo.layout().getMode();
      emit({ config: current, mode: describeMode(mode) }, () => formatConfig(current, mode));
    });
  config
    .command('issues-branch <name>')
    .description('Keep issues on a dedicated branch in a shared worktree')
    .action(async (name: string) => {
      const result = await (await open()).layout().enableIssuesBranch(name);
      emit({ mode: describeMode(result.mode), moved: result.moved }, () =>
        `issues-branch set to '${name}' (${result.moved} issue(s) moved)`
      );
    });
  config
    .command('clear-issues-branch')
    .description('Move issues back into this repository')
    .action(async () => {
      const result = await (await open()).layout().disableIssuesBranch();
      emit({ mode: describeMode(result.mode), moved: result.moved }, () =>
        `issues-branch cleared (${result.moved} issue(s) copied back)`
      );
    });
  config
    .command('external-repo <path>')
    .description('Track issues in another braid repository')
    .action(async (repoPath: string) => {
      const result = await (await open()).layout().setExternalRepo(repoPath);
      emit({ mode: describeMode(result.mode) }, () => `external-repo set to '${repoPath}'`);
    });
  config
    .command('clear-external-repo')
    .description('Track issues in this repository again')
    .action(async () => {
      const result = await (await open()).layout().clearExternalRepo();
      emit({ mode: describeMode(result.mode) }, () => 'external-repo cleared');
    });
  config
    .command('auto-sync <state>')
    .description('Turn auto_pull and auto_push on or off')
    .action(async (value: string) => {
      const updated = await (await open()).tracker().setAutoSync(parseOnOff(value));
      emit({ config: updated }, () => `auto-sync ${updated.auto_push ? 'on' : 'off'}`);
    });

  return program;
}

/**
 * Runs one command line and returns the process exit code.
 */
export async function runCli(argv: string[], deps: CliDeps = defaultDeps()): Promise<number> {
  const logger = new ConsoleLogger(LogLevel.INFO);
  const state = { exitCode: ExitCode.SUCCESS };
  const program = createProgram(deps, logger, state);
  const json = argv.includes('--json');

  try {
    await program.parseAsync(argv);
    return state.exitCode;
  } catch (error) {
    if (error instanceof CommanderError) {
      // help and version exit through here too
      if (error.exitCode === 0) return ExitCode.SUCCESS;
      if (json) deps.stdout(toJson(BrdError.usage(error.message.replace(/^error: /, '')).toJSON()));
      return ExitCode.USAGE;
    }
    const brdError = toBrdError(error);
    if (json) {
      deps.stdout(toJson(brdError.toJSON()));
    } else {
      deps.stderr(`error: ${brdError.message}`);
    }
    logger.debug('stack:', brdError.stack);
    return brdError.exitCode;
  }
}

if (require.main === module) {
  runCli(process.argv).then(
    code => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = ExitCode.FAILURE;
    }
  );
}
