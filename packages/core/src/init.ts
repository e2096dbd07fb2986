import * as fs from 'fs';
import * as path from 'path';
import { stringify as stringifyToml } from 'smol-toml';
import { BraidConfig, RepoPaths } from './types';
import { BrdError } from './errors';
import { ILogger } from './logger';
import { atomicWrite } from './atomic';
import { configPathFor, defaultConfig, derivePrefix, readConfigFile, validateConfig, writeConfigFile } from './config';
import { DEFAULT_AGENT_ID } from './agent';
import { agentTomlPath, braidDir, localIssuesDir } from './repo';

export const BRAID_GITIGNORE = 'agent.toml\nruntime/\n';

export interface InitOptions {
  prefix?: string;
  idLen?: number;
  /** Agent id written to a new agent.toml; defaults to USER. */
  agentId?: string;
}

export interface InitResult {
  config: BraidConfig;
  /** Paths created by this run; empty when everything already existed. */
  created: string[];
}

/**
 * Lays out `.braid/` in the worktree and the shared `brd` directory under
 * the git common dir. Existing files are left untouched.
 */
export async function initRepo(paths: RepoPaths, options: InitOptions, logger: ILogger): Promise<InitResult> {
  const created: string[] = [];
  const ensureDir = async (dir: string): Promise<void> => {
    if (!fs.existsSync(dir)) {
      await fs.promises.mkdir(dir, { recursive: true });
      created.push(dir);
    }
  };

  await ensureDir(localIssuesDir(paths));
  await ensureDir(paths.brdCommonDir);

  const configPath = configPathFor(paths.worktreeRoot);
  let config: BraidConfig;
  if (fs.existsSync(configPath)) {
    config = await readConfigFile(configPath);
    if (options.prefix !== undefined || options.idLen !== undefined) {
      logger.warn(`${configPath} already exists; --prefix and --id-len were ignored`);
    }
  } else {
    config = {
      ...defaultConfig(options.prefix ?? derivePrefix(path.basename(paths.worktreeRoot))),
      ...(options.idLen !== undefined ? { id_len: options.idLen } : {}),
    };
    validateConfig(config, configPath);
    await writeConfigFile(configPath, config);
    created.push(configPath);
  }

  const gitignore = path.join(braidDir(paths), '.gitignore');
  if (!fs.existsSync(gitignore)) {
    await atomicWrite(gitignore, BRAID_GITIGNORE);
    created.push(gitignore);
  }

  const agentToml = agentTomlPath(paths);
  if (!fs.existsSync(agentToml)) {
    const agentId = options.agentId?.trim() || process.env.USER?.trim() || DEFAULT_AGENT_ID;
    await atomicWrite(agentToml, `${stringifyToml({ agent_id: agentId }).trimEnd()}\n`);
    created.push(agentToml);
  }

  if (created.length === 0) {
    logger.info(`braid already initialized in ${paths.worktreeRoot}`);
  } else {
    logger.debug(`created ${created.join(', ')}`);
  }
  return { config, created };
}

export function parseIdLen(input: string): number {
  const value = Number(input);
  if (!Number.isInteger(value) || value < 4 || value > 10) {
    throw BrdError.usage(`--id-len must be an integer between 4 and 10, got '${input}'`);
  }
  return value;
}
