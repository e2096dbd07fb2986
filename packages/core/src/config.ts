import { injectable, inject } from 'inversify';
import * as path from 'path';
import { parse as parseToml, stringify as stringifyToml } from 'smol-toml';
import { BraidConfig, RepoPaths } from './types';
import { BrdError } from './errors';
import { CURRENT_SCHEMA } from './migration';
import { atomicWrite, safeReadFile } from './atomic';
import { isRecord } from './utils';
import { TYPES } from './tokens';

export const BRAID_DIR = '.braid';
export const CONFIG_FILE = 'config.toml';
export const DEFAULT_ID_LEN = 4;

export function configPathFor(worktreeRoot: string): string {
  return path.join(worktreeRoot, BRAID_DIR, CONFIG_FILE);
}

/**
 * First four ASCII alphanumerics of the repo directory name, lowercased and
 * right-padded with `x`.
 */
export function derivePrefix(repoName: string): string {
  const chars = [...repoName]
    .filter(c => /^[A-Za-z0-9]$/.test(c))
    .slice(0, 4)
    .join('')
    .toLowerCase();
  return chars.padEnd(4, 'x');
}

export function defaultConfig(idPrefix: string): BraidConfig {
  return {
    schema_version: CURRENT_SCHEMA,
    id_prefix: idPrefix,
    id_len: DEFAULT_ID_LEN,
    auto_pull: true,
    auto_push: true,
  };
}

/**
 * Upgrades an older config table in memory. Below v5 the branch key was
 * `sync_branch`; below v6 the auto-sync flags did not exist.
 */
export function migrateConfigTable(table: Record<string, unknown>): { table: Record<string, unknown>; migrated: boolean } {
  const version = table.schema_version;
  if (typeof version !== 'number' || version >= CURRENT_SCHEMA) {
    return { table, migrated: false };
  }
  const next: Record<string, unknown> = { ...table };
  if (version < 5 && next.sync_branch !== undefined) {
    if (next.issues_branch === undefined) next.issues_branch = next.sync_branch;
    delete next.sync_branch;
  }
  if (version < 6) {
    if (next.auto_pull === undefined) next.auto_pull = true;
    if (next.auto_push === undefined) next.auto_push = true;
  }
  next.schema_version = CURRENT_SCHEMA;
  return { table: next, migrated: true };
}

function newerThanToolError(file: string, version: number): BrdError {
  return BrdError.parse(
    file,
    `this repo uses schema v${version}, but this brd only supports up to v${CURRENT_SCHEMA}; ` +
      'upgrade brd (in an agent worktree, rebase onto main instead)'
  );
}

/**
 * Throws a parse error naming the first violated constraint.
 */
export function validateConfig(config: BraidConfig, file: string = CONFIG_FILE): void {
  if (config.schema_version > CURRENT_SCHEMA) {
    throw newerThanToolError(file, config.schema_version);
  }
  if (config.id_prefix.length < 2 || config.id_prefix.length > 12) {
    throw BrdError.parse(file, `id_prefix must be 2-12 characters, got '${config.id_prefix}'`);
  }
  if (!/^[a-z0-9]+$/.test(config.id_prefix)) {
    throw BrdError.parse(file, `id_prefix must be lowercase alphanumeric, got '${config.id_prefix}'`);
  }
  if (!Number.isInteger(config.id_len) || config.id_len < 4 || config.id_len > 10) {
    throw BrdError.parse(file, `id_len must be between 4 and 10, got ${config.id_len}`);
  }
  if (config.issues_branch !== undefined && config.issues_repo !== undefined) {
    throw BrdError.parse(file, 'issues_branch and issues_repo are mutually exclusive');
  }
}

function readBoolean(table: Record<string, unknown>, key: string, file: string, fallback: boolean): boolean {
  const value = table[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'boolean') throw BrdError.parse(file, `${key} must be a boolean`);
  return value;
}

function readOptionalString(table: Record<string, unknown>, key: string, file: string): string | undefined {
  const value = table[key];
  if (value === undefined || value === '') return undefined;
  if (typeof value !== 'string') throw BrdError.parse(file, `${key} must be a string`);
  return value;
}

export function decodeConfig(content: string, file: string = CONFIG_FILE): { config: BraidConfig; migrated: boolean } {
  let raw: unknown;
  try {
    raw = parseToml(content);
  } catch (error) {
    throw new BrdError(
      'parse_error',
      `failed to parse ${file}: ${error instanceof Error ? error.message : String(error)}`,
      { file },
      { cause: error }
    );
  }
  if (!isRecord(raw)) {
    throw BrdError.parse(file, 'config must be a TOML table');
  }

  const version = raw.schema_version;
  if (typeof version !== 'number' || !Number.isInteger(version)) {
    throw BrdError.parse(file, 'schema_version must be an integer');
  }
  if (version > CURRENT_SCHEMA) {
    throw newerThanToolError(file, version);
  }

  const { table, migrated } = migrateConfigTable(raw);

  const idPrefix = table.id_prefix;
  if (typeof idPrefix !== 'string') throw BrdError.parse(file, 'id_prefix must be a string');
  const idLen = table.id_len ?? DEFAULT_ID_LEN;
  if (typeof idLen !== 'number') throw BrdError.parse(file, 'id_len must be an integer');

  const config: BraidConfig = {
    schema_version: CURRENT_SCHEMA,
    id_prefix: idPrefix,
    id_len: idLen,
    auto_pull: readBoolean(table, 'auto_pull', file, true),
    auto_push: readBoolean(table, 'auto_push', file, true),
  };
  const issuesBranch = readOptionalString(table, 'issues_branch', file);
  if (issuesBranch !== undefined) config.issues_branch = issuesBranch;
  const issuesRepo = readOptionalString(table, 'issues_repo', file);
  if (issuesRepo !== undefined) config.issues_repo = issuesRepo;

  validateConfig(config, file);
  return { config, migrated };
}

export function serializeConfig(config: BraidConfig): string {
  const table: Record<string, string | number | boolean> = {
    schema_version: config.schema_version,
    id_prefix: config.id_prefix,
    id_len: config.id_len,
  };
  if (config.issues_branch !== undefined) table.issues_branch = config.issues_branch;
  if (config.issues_repo !== undefined) table.issues_repo = config.issues_repo;
  table.auto_pull = config.auto_pull;
  table.auto_push = config.auto_push;
  return `${stringifyToml(table).trimEnd()}\n`;
}

export async function readConfigFile(file: string): Promise<BraidConfig> {
  const content = await safeReadFile(file);
  if (content === null) {
    throw BrdError.notInitialized();
  }
  return decodeConfig(content, file).config;
}

export async function writeConfigFile(file: string, config: BraidConfig): Promise<void> {
  validateConfig(config, file);
  await atomicWrite(file, serializeConfig({ ...config, schema_version: CURRENT_SCHEMA }));
}

export interface IConfigService {
  getConfigPath(): string;
  load(): Promise<BraidConfig>;
  save(config: BraidConfig): Promise<void>;
}

/**
 * Reads `.braid/config.toml` once per process and caches it.
 */
@injectable()
export class ConfigService implements IConfigService {
  private cached?: BraidConfig;

  constructor(@inject(TYPES.RepoPaths) private paths: RepoPaths) {}

  getConfigPath(): string {
    return configPathFor(this.paths.worktreeRoot);
  }

  async load(): Promise<BraidConfig> {
    if (!this.cached) {
      this.cached = await readConfigFile(this.getConfigPath());
    }
    return this.cached;
  }

  async save(config: BraidConfig): Promise<void> {
    await writeConfigFile(this.getConfigPath(), config);
    this.cached = { ...config, schema_version: CURRENT_SCHEMA };
  }
}
